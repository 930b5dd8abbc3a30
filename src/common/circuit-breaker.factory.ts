import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { isAxiosError } from 'axios';
import CircuitBreaker from 'opossum';

export interface CircuitBreakerConfig {
  timeout: number;
  errorThreshold: number;
  resetTimeout: number;
  volumeThreshold: number;
}

export interface CircuitHealth {
  state: 'CLOSED' | 'OPEN' | 'HALF_OPEN';
  stats: {
    failures: number;
    successes: number;
    rejects: number;
    fires: number;
  };
}

type ManagedBreaker = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'stats' | 'close' | 'shutdown'
>;

/** HTTP status carried by an axios error or one of our API errors. */
export function statusOf(error: unknown): number | undefined {
  if (isAxiosError(error)) {
    return error.response?.status;
  }
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}

@Injectable()
export class CircuitBreakerFactory implements OnModuleDestroy {
  private readonly logger = new Logger(CircuitBreakerFactory.name);
  private breakers: Map<string, ManagedBreaker> = new Map();

  private readonly DEFAULT_CONFIG: CircuitBreakerConfig = {
    timeout: 30000, // 30 seconds
    errorThreshold: 50, // 50% failure rate
    resetTimeout: 60000, // longer than a typical run
    volumeThreshold: 5, // Min requests before calculating failure %
  };

  createBreaker<TI extends unknown[], TR>(
    name: string,
    action: (...args: TI) => Promise<TR>,
    config?: Partial<CircuitBreakerConfig>,
  ): CircuitBreaker<TI, TR> {
    if (this.breakers.has(name)) {
      throw new Error(`Circuit breaker ${name} already exists`);
    }

    const mergedConfig = { ...this.DEFAULT_CONFIG, ...config };

    const breaker = new CircuitBreaker(action, {
      name,
      timeout: mergedConfig.timeout,
      errorThresholdPercentage: mergedConfig.errorThreshold,
      resetTimeout: mergedConfig.resetTimeout,
      volumeThreshold: mergedConfig.volumeThreshold,

      // Client errors (expired session, bad flow token) say nothing about
      // the remote service's health
      errorFilter: (error: unknown) => {
        const statusCode = statusOf(error);
        return (
          statusCode !== undefined && statusCode >= 400 && statusCode < 500
        );
      },
    });

    breaker.on('open', () => {
      this.logger.error(`[OPEN] Circuit breaker OPEN for ${name}`);
    });

    breaker.on('halfOpen', () => {
      this.logger.warn(`[HALF-OPEN] Circuit breaker HALF-OPEN for ${name}`);
    });

    breaker.on('close', () => {
      this.logger.log(`[CLOSED] Circuit breaker CLOSED for ${name}`);
    });

    breaker.on('timeout', () => {
      this.logger.warn(`Circuit breaker timeout for ${name}`);
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  /**
   * Get health status of all circuit breakers
   */
  health(): Record<string, CircuitHealth> {
    const health: Record<string, CircuitHealth> = {};

    this.breakers.forEach((breaker, name) => {
      const stats = breaker.stats;
      health[name] = {
        state: breaker.opened
          ? 'OPEN'
          : breaker.halfOpen
            ? 'HALF_OPEN'
            : 'CLOSED',
        stats: {
          failures: stats.failures,
          successes: stats.successes,
          rejects: stats.rejects,
          fires: stats.fires,
        },
      };
    });

    return health;
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }
}
