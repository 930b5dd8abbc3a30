import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import { Counter, Gauge, Pushgateway, register } from 'prom-client';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { errorMessage } from './errors';
import {
  LAST_RUN_DURATION_SECONDS,
  LAST_SUCCESS_TIMESTAMP_SECONDS,
  MESSAGES_POSTED_TOTAL,
  SALESFORCE_REQUESTS_TOTAL,
} from './metrics.providers';

export const PUSHGATEWAY_JOB_NAME = 'sforce_flowdock';

export type MessageKind = 'new' | 'updated' | 'chatter';
export type DeliveryStatus = 'success' | 'failure' | 'skipped';

/**
 * Metrics for a run-to-completion job: nothing scrapes the process, so the
 * registry is pushed to a Pushgateway when one is configured.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  constructor(
    private readonly configService: ConfigService,
    @InjectMetric(MESSAGES_POSTED_TOTAL)
    private readonly messagesCounter: Counter<string>,
    @InjectMetric(SALESFORCE_REQUESTS_TOTAL)
    private readonly salesforceRequestsCounter: Counter<string>,
    @InjectMetric(LAST_RUN_DURATION_SECONDS)
    private readonly runDurationGauge: Gauge<string>,
    @InjectMetric(LAST_SUCCESS_TIMESTAMP_SECONDS)
    private readonly lastSuccessGauge: Gauge<string>,
  ) {}

  recordMessage(kind: MessageKind, status: DeliveryStatus): void {
    this.messagesCounter.inc({ kind, status });
  }

  recordSalesforceRequest(
    operation: string,
    status: 'success' | 'failure',
  ): void {
    this.salesforceRequestsCounter.inc({ operation, status });
  }

  recordRun(durationMs: number, success: boolean): void {
    this.runDurationGauge.set(
      { status: success ? 'success' : 'failure' },
      durationMs / 1000,
    );
    if (success) {
      this.lastSuccessGauge.set(Date.now() / 1000);
    }
    this.logger.debug(`Run finished in ${durationMs}ms (success=${success})`);
  }

  /** Push the registry; failures are logged and never fail the run. */
  async push(): Promise<boolean> {
    const { pushgatewayUrl } =
      this.configService.getOrThrow<AppConfig>(APP_CONFIG);
    if (!pushgatewayUrl) {
      return false;
    }

    try {
      const gateway = new Pushgateway(pushgatewayUrl, {}, register);
      await gateway.pushAdd({ jobName: PUSHGATEWAY_JOB_NAME });
      this.logger.log(`Pushed metrics to ${pushgatewayUrl}`);
      return true;
    } catch (error) {
      this.logger.warn(`Metrics push failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
