import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigFileError } from '../common/errors';
import { writeJsonAtomic } from '../common/files';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { readJsonFile } from '../config/json-config';
import { SyncState, SyncStateSchema } from '../config/schemas';
import {
  Opportunity,
  OpportunityListSchema,
} from '../salesforce/salesforce.types';

/**
 * High-water marks kept between runs: the Chatter `updatesUrl` in
 * state.json and the last delivered opportunity snapshot in
 * opportunities.json.
 */
@Injectable()
export class StateStore {
  private readonly logger = new Logger(StateStore.name);

  constructor(private readonly configService: ConfigService) {}

  private get paths(): AppConfig['paths'] {
    return this.configService.getOrThrow<AppConfig>(APP_CONFIG).paths;
  }

  async readState(): Promise<SyncState> {
    const data = await readJsonFile(this.paths.state);
    if (data === undefined) {
      return { deliveredChatterIds: [] };
    }
    const parsed = SyncStateSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigFileError(
        this.paths.state,
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      );
    }
    return parsed.data;
  }

  async writeState(state: SyncState): Promise<void> {
    await writeJsonAtomic(this.paths.state, state);
  }

  /**
   * Known opportunities by id, or `undefined` when there is no usable
   * snapshot yet (first run, or a damaged file).
   */
  async readKnownOpportunities(): Promise<Map<string, Opportunity> | undefined> {
    let data: unknown;
    try {
      data = await readJsonFile(this.paths.opportunities);
    } catch (error) {
      if (!(error instanceof ConfigFileError)) {
        throw error;
      }
      this.logger.warn(`While reading opportunities file: ${error.message}`);
      return undefined;
    }

    if (data === undefined) {
      this.logger.warn(`No opportunities file at ${this.paths.opportunities}`);
      return undefined;
    }

    const parsed = OpportunityListSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(
        `Ignoring invalid opportunities file ${this.paths.opportunities}`,
      );
      return undefined;
    }
    return new Map(parsed.data.map((op) => [op.id, op] as const));
  }

  async writeKnownOpportunities(opportunities: Opportunity[]): Promise<void> {
    await writeJsonAtomic(this.paths.opportunities, opportunities);
  }
}
