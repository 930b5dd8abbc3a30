import { Module } from '@nestjs/common';
import { CircuitBreakerFactory } from './circuit-breaker.factory';
import { metricsProviders } from './metrics.providers';
import { MetricsService } from './metrics.service';

@Module({
  providers: [CircuitBreakerFactory, MetricsService, ...metricsProviders],
  exports: [CircuitBreakerFactory, MetricsService],
})
export class CommonModule {}
