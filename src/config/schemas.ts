import { z } from 'zod';

export const DEFAULT_LOGIN_URL = 'https://login.salesforce.com';

export const OpportunityFieldsSchema = z.object({
  team: z.string().default('Team__c'),
  averageHourPrice: z.string().default('Average_Hour_Price__c'),
  typeOfSales: z.string().default('Type_of_Sales__c'),
});

export const SalesforceConfigSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uri: z.string().url(),
  apiVersionUrl: z.string().min(1),
  loginUrl: z.string().url().default(DEFAULT_LOGIN_URL),
  opportunityFields: OpportunityFieldsSchema.default({}),
});
export type SalesforceConfig = z.infer<typeof SalesforceConfigSchema>;
export type OpportunityFieldNames = z.infer<typeof OpportunityFieldsSchema>;

export const SalesforceTokenSchema = z
  .object({
    access_token: z.string().min(1),
    instance_url: z.string().url(),
    refresh_token: z.string().optional(),
    id: z.string().optional(),
    issued_at: z.string().optional(),
    signature: z.string().optional(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
  })
  .passthrough();
export type SalesforceToken = z.infer<typeof SalesforceTokenSchema>;

function isTimeZone(name: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

const TimeZoneSchema = z
  .string()
  .refine(isTimeZone, (name) => ({ message: `Unknown time zone "${name}"` }));

export const FlowdockConfigSchema = z.object({
  flowForTeam: z.record(z.string().min(1)),
  defaultFlow: z.string().min(1).optional(),
  teamInbox: z.object({
    source: z.string().min(1),
    from_address: z.string().email(),
    from_name: z.string().optional(),
    tags: z.array(z.string()).default([]),
  }),
  timezoneForTeam: z.record(TimeZoneSchema).default({}),
  defaultTimezone: TimeZoneSchema.default('UTC'),
});
export type FlowdockConfig = z.infer<typeof FlowdockConfigSchema>;

export const LimitsSchema = z.object({
  maxSeconds: z.number().int().positive(),
  maxPages: z.number().int().positive(),
  maxTeamOpportunities: z.number().int().positive(),
});
export type Limits = z.infer<typeof LimitsSchema>;

export const SyncStateSchema = z.object({
  updatesUrl: z.string().optional(),
  deliveredChatterIds: z.array(z.string()).default([]),
});
export type SyncState = z.infer<typeof SyncStateSchema>;
