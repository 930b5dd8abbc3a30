import { Opportunity } from '../../src/salesforce/salesforce.types';

export const OPPORTUNITY_ID = '0061t000000AbCdAAK';

export const makeOpportunity = (
  overrides: Partial<Opportunity> = {},
): Opportunity => ({
  id: OPPORTUNITY_ID,
  name: 'Website redesign',
  stageName: 'Prospecting',
  ownerName: 'Alice Owner',
  accountName: 'Acme Ltd',
  amount: 50000,
  probability: 20,
  averageHourPrice: null,
  closeDate: '2024-04-30',
  typeOfSales: null,
  description: 'Needs a new site',
  createdDate: '2024-03-05T14:07:00.000+0000',
  createdByName: 'Bob Creator',
  lastModifiedDate: '2024-03-05T14:07:00.000+0000',
  lastModifiedByName: 'Bob Creator',
  team: 'Web',
  ...overrides,
});

const relation = (name: string | null) => (name === null ? null : { Name: name });

/** The SOQL row SalesForce returns for `op` with default custom fields. */
export const toSoqlRecord = (op: Opportunity): Record<string, unknown> => ({
  attributes: {
    type: 'Opportunity',
    url: `/services/data/v60.0/sobjects/Opportunity/${op.id}`,
  },
  Id: op.id,
  Name: op.name,
  StageName: op.stageName,
  Owner: relation(op.ownerName),
  Account: relation(op.accountName),
  Amount: op.amount,
  Probability: op.probability,
  CloseDate: op.closeDate,
  Description: op.description,
  CreatedDate: op.createdDate,
  CreatedBy: relation(op.createdByName),
  LastModifiedDate: op.lastModifiedDate,
  LastModifiedBy: relation(op.lastModifiedByName),
  Team__c: op.team,
  Average_Hour_Price__c: op.averageHourPrice,
  Type_of_Sales__c: op.typeOfSales,
});
