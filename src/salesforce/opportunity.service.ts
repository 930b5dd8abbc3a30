import { Injectable, Logger } from '@nestjs/common';
import { OpportunityFieldNames } from '../config/schemas';
import { SalesforceAuthService } from './salesforce-auth.service';
import { SalesforceClient } from './salesforce.client';
import {
  OPPORTUNITY_CHANGED_FIELDS,
  Opportunity,
  OpportunityChanges,
  SoqlRecord,
} from './salesforce.types';
import { SoqlSanitizer } from './soql.sanitizer';

const STANDARD_FIELDS = [
  'Id',
  'Name',
  'StageName',
  'Owner.Name',
  'Account.Name',
  'Amount',
  'Probability',
  'CloseDate',
  'Description',
  'CreatedDate',
  'CreatedBy.Name',
  'LastModifiedDate',
  'LastModifiedBy.Name',
];

/** Walk a dotted SOQL relationship path through a returned record. */
export function fieldValue(record: SoqlRecord, path: string): unknown {
  let value: unknown = record;
  for (const part of path.split('.')) {
    if (typeof value !== 'object' || value === null || !(part in value)) {
      return null;
    }
    value = Reflect.get(value, part);
  }
  return value ?? null;
}

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

export function toOpportunity(
  record: SoqlRecord,
  fields: OpportunityFieldNames,
): Opportunity {
  return {
    id: String(fieldValue(record, 'Id')),
    name: asString(fieldValue(record, 'Name')) ?? '',
    stageName: asString(fieldValue(record, 'StageName')),
    ownerName: asString(fieldValue(record, 'Owner.Name')),
    accountName: asString(fieldValue(record, 'Account.Name')),
    amount: asNumber(fieldValue(record, 'Amount')),
    probability: asNumber(fieldValue(record, 'Probability')),
    averageHourPrice: asNumber(fieldValue(record, fields.averageHourPrice)),
    closeDate: asString(fieldValue(record, 'CloseDate')),
    typeOfSales: asString(fieldValue(record, fields.typeOfSales)),
    description: asString(fieldValue(record, 'Description')),
    createdDate: asString(fieldValue(record, 'CreatedDate')) ?? '',
    createdByName: asString(fieldValue(record, 'CreatedBy.Name')),
    lastModifiedDate: asString(fieldValue(record, 'LastModifiedDate')) ?? '',
    lastModifiedByName: asString(fieldValue(record, 'LastModifiedBy.Name')),
    team: asString(fieldValue(record, fields.team)),
  };
}

/** Tracked fields whose values differ between two snapshots. */
export function changedFields(
  oldOp: Opportunity,
  newOp: Opportunity,
): typeof OPPORTUNITY_CHANGED_FIELDS {
  return OPPORTUNITY_CHANGED_FIELDS.filter(
    ([field]) => oldOp[field] !== newOp[field],
  );
}

/** Keep the first `max` opportunities of each team, preserving order. */
export function capPerTeam<T>(
  items: T[],
  teamOf: (item: T) => string | null,
  max: number,
): T[] {
  const counts = new Map<string, number>();
  return items.filter((item) => {
    const team = teamOf(item) ?? '';
    const count = counts.get(team) ?? 0;
    if (count >= max) {
      return false;
    }
    counts.set(team, count + 1);
    return true;
  });
}

@Injectable()
export class OpportunityService {
  private readonly logger = new Logger(OpportunityService.name);

  constructor(
    private readonly client: SalesforceClient,
    private readonly authService: SalesforceAuthService,
    private readonly sanitizer: SoqlSanitizer,
  ) {}

  private async selectClause(): Promise<{
    select: string;
    fields: OpportunityFieldNames;
  }> {
    const { opportunityFields } = await this.authService.getConfig();
    const select = this.sanitizer.buildSelect(
      [
        ...STANDARD_FIELDS,
        opportunityFields.team,
        opportunityFields.averageHourPrice,
        opportunityFields.typeOfSales,
      ],
      'Opportunity',
    );
    return { select, fields: opportunityFields };
  }

  /**
   * Most recently modified opportunities, at most `maxTeamItems` per team.
   */
  async getRecentOpportunities(
    maxTeamItems: number,
    maxPages: number,
  ): Promise<Opportunity[]> {
    const { select, fields } = await this.selectClause();
    const records = await this.client.query(
      `${select} ORDER BY LastModifiedDate DESC`,
      maxPages,
    );
    const opportunities = records.map((r) => toOpportunity(r, fields));
    return capPerTeam(opportunities, (op) => op.team, maxTeamItems);
  }

  async getOpportunityChanges(
    known: ReadonlyMap<string, Opportunity>,
    maxTeamItems: number,
    maxPages: number,
  ): Promise<OpportunityChanges> {
    const all = await this.getRecentOpportunities(maxTeamItems, maxPages);
    const added: Opportunity[] = [];
    const changed: Opportunity[] = [];

    for (const op of all) {
      const previous = known.get(op.id);
      if (!previous) {
        added.push(op);
      } else if (changedFields(previous, op).length > 0) {
        changed.push(op);
      }
    }

    this.logger.log(
      `Fetched ${all.length} opportunities: ${added.length} new, ${changed.length} changed`,
    );
    return { all, added, changed };
  }

  async getOpportunitiesById(ids: string[]): Promise<Map<string, Opportunity>> {
    const valid = [...new Set(ids)].filter((id) => {
      const ok = this.sanitizer.validateId(id);
      if (!ok) {
        this.logger.warn(`Ignoring invalid opportunity id ${id}`);
      }
      return ok;
    });
    if (valid.length === 0) {
      return new Map();
    }

    const { select, fields } = await this.selectClause();
    const where = this.sanitizer.buildFilterClause('Id', 'IN', valid);
    const records = await this.client.query(`${select} WHERE ${where}`);
    return new Map(
      records.map((r) => {
        const op = toOpportunity(r, fields);
        return [op.id, op] as const;
      }),
    );
  }
}
