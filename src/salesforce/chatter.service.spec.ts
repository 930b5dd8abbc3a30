import { Test, TestingModule } from '@nestjs/testing';
import {
  OPPORTUNITY_ID,
  makeOpportunity,
} from '../../test/fixtures/opportunities';
import { COMPANY_FEED_URL, ChatterService } from './chatter.service';
import { OpportunityService } from './opportunity.service';
import { SalesforceClient } from './salesforce.client';

const NOW = new Date('2024-03-07T12:00:00Z');
const LIMITS = { maxSeconds: 86400, maxPages: 5, maxTeamOpportunities: 10 };
const PAGE_2 = '/services/data/v60.0/chatter/feeds/company/feed-items?page=2';
const PAGE_3 = '/services/data/v60.0/chatter/feeds/company/feed-items?page=3';
const UPDATES =
  '/services/data/v60.0/chatter/feeds/company/feed-items?updatedSince=2024-03-07';

const feedItem = (
  id: string,
  createdDate: string,
  parent: { id: string; type: string } = {
    id: OPPORTUNITY_ID,
    type: 'Opportunity',
  },
) => ({
  id,
  type: 'TextPost',
  createdDate,
  modifiedDate: createdDate,
  actor: { displayName: 'Dave Seller', name: 'Dave Seller' },
  body: { text: `Post ${id}` },
  parent,
});

describe('ChatterService', () => {
  let service: ChatterService;
  let client: { getJson: jest.Mock };
  let opportunityService: { getOpportunitiesById: jest.Mock };

  beforeEach(async () => {
    client = { getJson: jest.fn() };
    opportunityService = { getOpportunitiesById: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ChatterService,
        { provide: SalesforceClient, useValue: client },
        { provide: OpportunityService, useValue: opportunityService },
      ],
    }).compile();

    service = module.get<ChatterService>(ChatterService);
  });

  describe('getCompanyChatter', () => {
    it('should page until items get too old', async () => {
      client.getJson
        .mockResolvedValueOnce({
          items: [feedItem('i1', '2024-03-07T10:00:00.000+0000')],
          nextPageUrl: PAGE_2,
          updatesUrl: UPDATES,
        })
        .mockResolvedValueOnce({
          items: [
            feedItem('i2', '2024-03-07T09:00:00.000+0000'),
            feedItem('i3', '2024-03-05T09:00:00.000+0000'),
          ],
          nextPageUrl: PAGE_3,
          updatesUrl: 'ignored',
        });

      const page = await service.getCompanyChatter(LIMITS, undefined, NOW);

      expect(page.items.map((item) => item.id)).toEqual(['i1', 'i2']);
      expect(page.updatesUrl).toBe(UPDATES);
      expect(client.getJson.mock.calls).toEqual([
        [COMPANY_FEED_URL, 'chatter'],
        [PAGE_2, 'chatter'],
      ]);
    });

    it('should stop after maxPages', async () => {
      client.getJson.mockResolvedValue({
        items: [feedItem('i1', '2024-03-07T10:00:00.000+0000')],
        nextPageUrl: PAGE_2,
        updatesUrl: UPDATES,
      });

      await service.getCompanyChatter({ ...LIMITS, maxPages: 2 }, UPDATES, NOW);

      expect(client.getJson).toHaveBeenCalledTimes(2);
      expect(client.getJson).toHaveBeenNthCalledWith(1, UPDATES, 'chatter');
    });

    it('should drop items modified too long ago', async () => {
      client.getJson.mockResolvedValue({
        items: [
          {
            ...feedItem('i1', '2024-03-07T10:00:00.000+0000'),
            modifiedDate: '2024-03-01T10:00:00.000+0000',
          },
        ],
        nextPageUrl: null,
        updatesUrl: UPDATES,
      });

      const page = await service.getCompanyChatter(LIMITS, undefined, NOW);

      expect(page.items).toEqual([]);
    });

    it('should reject an unexpected response', async () => {
      client.getJson.mockResolvedValue({ feed: [] });

      await expect(
        service.getCompanyChatter(LIMITS, undefined, NOW),
      ).rejects.toThrow(`Unexpected feed response from ${COMPANY_FEED_URL}`);
    });
  });

  describe('getOpportunitiesChatterDetails', () => {
    it('should join opportunity items with their opportunity', async () => {
      const op = makeOpportunity();
      client.getJson.mockResolvedValue({
        items: [
          feedItem('i1', '2024-03-07T10:00:00.000+0000'),
          feedItem('i2', '2024-03-07T09:00:00.000+0000', {
            id: '005000000000001',
            type: 'User',
          }),
          feedItem('i3', '2024-03-07T08:00:00.000+0000', {
            id: '006000000000404',
            type: 'Opportunity',
          }),
        ],
        updatesUrl: UPDATES,
      });
      opportunityService.getOpportunitiesById.mockResolvedValue(
        new Map([[op.id, op]]),
      );

      const result = await service.getOpportunitiesChatterDetails(
        LIMITS,
        undefined,
        NOW,
      );

      expect(opportunityService.getOpportunitiesById).toHaveBeenCalledWith([
        OPPORTUNITY_ID,
        '006000000000404',
      ]);
      expect(result).toEqual({
        details: [
          {
            feedItemId: 'i1',
            actorName: 'Dave Seller',
            text: 'Post i1',
            modifiedDate: '2024-03-07T10:00:00.000+0000',
            opportunity: op,
          },
        ],
        updatesUrl: UPDATES,
      });
    });

    it('should fall back for missing actor and body', async () => {
      const op = makeOpportunity();
      client.getJson.mockResolvedValue({
        items: [
          {
            ...feedItem('i1', '2024-03-07T10:00:00.000+0000'),
            actor: null,
            body: { text: null },
          },
        ],
      });
      opportunityService.getOpportunitiesById.mockResolvedValue(
        new Map([[op.id, op]]),
      );

      const { details, updatesUrl } =
        await service.getOpportunitiesChatterDetails(LIMITS, undefined, NOW);

      expect(details[0]).toMatchObject({ actorName: 'Unknown', text: '' });
      expect(updatesUrl).toBeUndefined();
    });

    it('should cap items per team', async () => {
      const op = makeOpportunity();
      client.getJson.mockResolvedValue({
        items: [
          feedItem('i1', '2024-03-07T10:00:00.000+0000'),
          feedItem('i2', '2024-03-07T09:00:00.000+0000'),
        ],
        updatesUrl: UPDATES,
      });
      opportunityService.getOpportunitiesById.mockResolvedValue(
        new Map([[op.id, op]]),
      );

      const { details } = await service.getOpportunitiesChatterDetails(
        { ...LIMITS, maxTeamOpportunities: 1 },
        undefined,
        NOW,
      );

      expect(details.map((d) => d.feedItemId)).toEqual(['i1']);
    });
  });
});
