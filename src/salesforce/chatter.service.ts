import { Injectable, Logger } from '@nestjs/common';
import { differenceInSeconds, parseISO } from 'date-fns';
import { SalesforceApiError } from '../common/errors';
import { Limits } from '../config/schemas';
import { OpportunityService, capPerTeam } from './opportunity.service';
import { SalesforceClient } from './salesforce.client';
import {
  ChatterDetail,
  ChatterLimits,
  ChatterPage,
  FeedItem,
  FeedPageSchema,
} from './salesforce.types';

export const COMPANY_FEED_URL = 'chatter/feeds/company/feed-items';

export interface ChatterDetails {
  details: ChatterDetail[];
  updatesUrl?: string;
}

@Injectable()
export class ChatterService {
  private readonly logger = new Logger(ChatterService.name);

  constructor(
    private readonly client: SalesforceClient,
    private readonly opportunityService: OpportunityService,
  ) {}

  /**
   * Read the company feed (or a previous `updatesUrl`) page by page. Stops
   * at the last page, after `maxPages`, or once items get older than
   * `maxSeconds`; older items are not returned.
   */
  async getCompanyChatter(
    limits: ChatterLimits,
    url: string = COMPANY_FEED_URL,
    now: Date = new Date(),
  ): Promise<ChatterPage> {
    const items: FeedItem[] = [];
    let updatesUrl: string | undefined;
    let next: string | undefined = url;
    let pages = 0;
    let tooOld = false;

    while (next && !tooOld && pages < limits.maxPages) {
      const parsed = FeedPageSchema.safeParse(
        await this.client.getJson(next, 'chatter'),
      );
      if (!parsed.success) {
        throw new SalesforceApiError(`Unexpected feed response from ${next}`);
      }
      const page = parsed.data;

      if (pages === 0) {
        updatesUrl = page.updatesUrl ?? undefined;
        this.logger.log(`Future updates at ${updatesUrl ?? '<none>'}`);
      }
      pages += 1;

      for (const item of page.items) {
        if (this.isOlderThan(item, limits.maxSeconds, now)) {
          tooOld = true;
        } else {
          items.push(item);
        }
      }
      next = page.nextPageUrl ?? undefined;
    }

    return { items, updatesUrl };
  }

  async getOpportunitiesChatter(
    limits: ChatterLimits,
    url?: string,
    now?: Date,
  ): Promise<ChatterPage> {
    const page = await this.getCompanyChatter(limits, url, now);
    return {
      items: page.items.filter((item) => item.parent?.type === 'Opportunity'),
      updatesUrl: page.updatesUrl,
    };
  }

  /**
   * Opportunity feed items joined with their opportunity, newest first,
   * at most `maxTeamOpportunities` per team.
   */
  async getOpportunitiesChatterDetails(
    limits: Limits,
    url?: string,
    now?: Date,
  ): Promise<ChatterDetails> {
    const { items, updatesUrl } = await this.getOpportunitiesChatter(
      limits,
      url,
      now,
    );

    const parentIds = items.flatMap((item) =>
      item.parent ? [item.parent.id] : [],
    );
    const opportunities =
      await this.opportunityService.getOpportunitiesById(parentIds);

    const details: ChatterDetail[] = [];
    for (const item of items) {
      const opportunity = item.parent && opportunities.get(item.parent.id);
      if (!opportunity) {
        this.logger.warn(
          `Opportunity ${item.parent?.id ?? '?'} of feed item ${item.id} not found`,
        );
        continue;
      }
      details.push({
        feedItemId: item.id,
        actorName: item.actor?.displayName ?? item.actor?.name ?? 'Unknown',
        text: item.body?.text ?? '',
        modifiedDate: item.modifiedDate,
        opportunity,
      });
    }

    return {
      details: capPerTeam(
        details,
        (detail) => detail.opportunity.team,
        limits.maxTeamOpportunities,
      ),
      updatesUrl,
    };
  }

  private isOlderThan(item: FeedItem, maxSeconds: number, now: Date): boolean {
    return [item.createdDate, item.modifiedDate].some(
      (date) => differenceInSeconds(now, parseISO(date)) > maxSeconds,
    );
  }
}
