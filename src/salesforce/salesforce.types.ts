import { z } from 'zod';

/** Opportunity as stored in the snapshot file and handed to formatters. */
export const OpportunitySchema = z.object({
  id: z.string(),
  name: z.string(),
  stageName: z.string().nullable(),
  ownerName: z.string().nullable(),
  accountName: z.string().nullable(),
  amount: z.number().nullable(),
  probability: z.number().nullable(),
  averageHourPrice: z.number().nullable(),
  closeDate: z.string().nullable(),
  typeOfSales: z.string().nullable(),
  description: z.string().nullable(),
  createdDate: z.string(),
  createdByName: z.string().nullable(),
  lastModifiedDate: z.string(),
  lastModifiedByName: z.string().nullable(),
  team: z.string().nullable(),
});
export type Opportunity = z.infer<typeof OpportunitySchema>;

export const OpportunityListSchema = z.array(OpportunitySchema);

export type OpportunityField = Exclude<
  keyof Opportunity,
  'id' | 'createdDate' | 'createdByName' | 'lastModifiedDate' | 'lastModifiedByName'
>;

/** Fields whose change is announced, in display order. */
export const OPPORTUNITY_CHANGED_FIELDS: ReadonlyArray<
  [field: OpportunityField, label: string]
> = [
  ['name', 'Name'],
  ['stageName', 'Stage'],
  ['ownerName', 'Owner'],
  ['accountName', 'Account'],
  ['amount', 'Amount'],
  ['probability', 'Probability'],
  ['averageHourPrice', 'Avg. hour price'],
  ['closeDate', 'Close date'],
  ['typeOfSales', 'Type of sales'],
  ['description', 'Description'],
];

/** Raw SOQL row; custom field names come from configuration. */
export type SoqlRecord = Record<string, unknown>;

export const SoqlQueryResponseSchema = z.object({
  totalSize: z.number(),
  done: z.boolean(),
  nextRecordsUrl: z.string().optional(),
  records: z.array(z.record(z.unknown())),
});

export const FeedItemSchema = z
  .object({
    id: z.string(),
    type: z.string().optional(),
    createdDate: z.string(),
    modifiedDate: z.string(),
    actor: z
      .object({
        displayName: z.string().optional(),
        name: z.string().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    body: z
      .object({ text: z.string().nullable().optional() })
      .passthrough()
      .nullable()
      .optional(),
    parent: z
      .object({
        id: z.string(),
        type: z.string().optional(),
        name: z.string().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();
export type FeedItem = z.infer<typeof FeedItemSchema>;

export const FeedPageSchema = z
  .object({
    items: z.array(FeedItemSchema),
    nextPageUrl: z.string().nullable().optional(),
    updatesUrl: z.string().nullable().optional(),
    currentPageUrl: z.string().nullable().optional(),
  })
  .passthrough();
export type FeedPage = z.infer<typeof FeedPageSchema>;

/** A Chatter feed item joined with its parent opportunity. */
export interface ChatterDetail {
  feedItemId: string;
  actorName: string;
  text: string;
  modifiedDate: string;
  opportunity: Opportunity;
}

export interface ChatterLimits {
  maxSeconds: number;
  maxPages: number;
}

export interface ChatterPage {
  items: FeedItem[];
  updatesUrl?: string;
}

export const ApiVersionListSchema = z.array(
  z.object({
    label: z.string(),
    url: z.string(),
    version: z.string(),
  }),
);
export type ApiVersion = z.infer<typeof ApiVersionListSchema>[number];

export interface OpportunityChanges {
  all: Opportunity[];
  added: Opportunity[];
  changed: Opportunity[];
}
