import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import { DeliveryError, errorMessage } from '../common/errors';
import { MessageKind, MetricsService } from '../common/metrics.service';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { readJsonConfig } from '../config/json-config';
import { Limits, LimitsSchema, SyncState } from '../config/schemas';
import { FlowdockService } from '../flowdock/flowdock.service';
import { TeamInboxMessage } from '../flowdock/flowdock.types';
import {
  formatChangedOpportunity,
  formatChatter,
  formatNewOpportunity,
} from '../notifications/formatters';
import { ChatterService } from '../salesforce/chatter.service';
import { OpportunityService } from '../salesforce/opportunity.service';
import { SalesforceClient } from '../salesforce/salesforce.client';
import { Opportunity } from '../salesforce/salesforce.types';
import { StateStore } from '../state/state.store';

export interface SyncSummary {
  posted: number;
  skipped: number;
  failed: number;
}

export const emptySummary = (): SyncSummary => ({
  posted: 0,
  skipped: 0,
  failed: 0,
});

/**
 * One poll-and-post pass: opportunities first, then Chatter. State is only
 * advanced past items that reached Flowdock, so the next run retries the
 * rest.
 */
@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly opportunityService: OpportunityService,
    private readonly chatterService: ChatterService,
    private readonly salesforceClient: SalesforceClient,
    private readonly flowdockService: FlowdockService,
    private readonly stateStore: StateStore,
    private readonly metrics: MetricsService,
    private readonly circuitBreakerFactory: CircuitBreakerFactory,
  ) {}

  getLimits(): Promise<Limits> {
    const { paths } = this.configService.getOrThrow<AppConfig>(APP_CONFIG);
    return readJsonConfig(paths.limits, LimitsSchema);
  }

  async run(): Promise<SyncSummary> {
    const startedAt = Date.now();
    const summary = emptySummary();
    let success = false;

    try {
      const limits = await this.getLimits();
      const state = await this.stateStore.readState();

      await this.postNewAndModifiedOpportunities(limits, summary);
      await this.postOpportunitiesChatter(limits, state, summary);

      this.logger.log(
        `Run complete: ${summary.posted} posted, ${summary.skipped} skipped, ${summary.failed} failed`,
      );
      if (summary.failed > 0) {
        throw new DeliveryError(summary.failed);
      }
      success = true;
      return summary;
    } finally {
      this.metrics.recordRun(Date.now() - startedAt, success);
      this.logger.debug(
        `Circuit breakers: ${JSON.stringify(this.circuitBreakerFactory.health())}`,
      );
      await this.metrics.push();
    }
  }

  /**
   * Post new and changed opportunities. On the first run there is nothing
   * to compare against: the snapshot is saved and nothing is posted.
   */
  async postNewAndModifiedOpportunities(
    limits: Limits,
    summary: SyncSummary = emptySummary(),
  ): Promise<SyncSummary> {
    const known = await this.stateStore.readKnownOpportunities();
    const { all, added, changed } =
      await this.opportunityService.getOpportunityChanges(
        known ?? new Map(),
        limits.maxTeamOpportunities,
        limits.maxPages,
      );

    if (!known) {
      this.logger.warn(
        `No previous opportunities snapshot; saving ${all.length} without posting`,
      );
      await this.stateStore.writeKnownOpportunities(all);
      return summary;
    }

    const failedIds = new Set<string>();

    for (const op of added) {
      const format = (timeZone: string) => formatNewOpportunity(op, timeZone);
      if (!(await this.deliver('new', format, op, summary))) {
        failedIds.add(op.id);
      }
    }

    for (const op of changed) {
      const previous = known.get(op.id);
      if (!previous) {
        this.logger.warn(`Changed opportunity ${op.id} not in old opportunities`);
        continue;
      }
      const format = (timeZone: string) =>
        formatChangedOpportunity(previous, op, timeZone);
      if (!(await this.deliver('updated', format, op, summary))) {
        failedIds.add(op.id);
      }
    }

    // Undelivered records keep their old snapshot so they show up again
    const snapshot = all.flatMap((op): Opportunity[] => {
      if (!failedIds.has(op.id)) {
        return [op];
      }
      const previous = known.get(op.id);
      return previous ? [previous] : [];
    });
    await this.stateStore.writeKnownOpportunities(snapshot);
    return summary;
  }

  /**
   * Post Chatter on opportunities since `state.updatesUrl`, oldest first.
   * The feed position only moves forward when every item was delivered;
   * until then the ids already posted are remembered and skipped.
   */
  async postOpportunitiesChatter(
    limits: Limits,
    state: SyncState,
    summary: SyncSummary = emptySummary(),
  ): Promise<SyncSummary> {
    const { details, updatesUrl } =
      await this.chatterService.getOpportunitiesChatterDetails(
        limits,
        state.updatesUrl,
      );

    const delivered = new Set(state.deliveredChatterIds);
    let failures = 0;

    for (const detail of [...details].reverse()) {
      if (delivered.has(detail.feedItemId)) {
        this.logger.debug(`Feed item ${detail.feedItemId} already posted`);
        continue;
      }
      const format = (timeZone: string) => formatChatter(detail, timeZone);
      if (await this.deliver('chatter', format, detail.opportunity, summary)) {
        delivered.add(detail.feedItemId);
      } else {
        failures += 1;
      }
    }

    if (failures === 0) {
      await this.stateStore.writeState({
        updatesUrl: updatesUrl ?? state.updatesUrl,
        deliveredChatterIds: [],
      });
    } else {
      await this.stateStore.writeState({
        updatesUrl: state.updatesUrl,
        deliveredChatterIds: [...delivered],
      });
    }
    return summary;
  }

  /**
   * Format and post one item. Formatting failures count as failed posts so
   * one bad record does not stop the run.
   */
  private async deliver(
    kind: MessageKind,
    format: (timeZone: string) => TeamInboxMessage,
    op: Opportunity,
    summary: SyncSummary,
  ): Promise<boolean> {
    try {
      const timeZone = await this.flowdockService.getTeamTimezone(op.team);
      const message = format(timeZone);
      const link = await this.salesforceClient.getRecordUrl(op.id);
      const outcome = await this.flowdockService.postTeamInbox({
        ...message,
        link,
      });
      if (outcome === 'posted') {
        summary.posted += 1;
        this.metrics.recordMessage(kind, 'success');
      } else {
        summary.skipped += 1;
        this.metrics.recordMessage(kind, 'skipped');
      }
      return true;
    } catch (error) {
      summary.failed += 1;
      this.metrics.recordMessage(kind, 'failure');
      this.logger.error(
        `While posting ${kind} opportunity ${op.id} «${op.name}»: ${errorMessage(error)}`,
      );
      return false;
    }
  }
}
