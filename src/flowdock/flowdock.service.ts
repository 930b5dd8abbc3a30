import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import { FlowdockApiError, errorMessage } from '../common/errors';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { readJsonConfig } from '../config/json-config';
import { FlowdockConfig, FlowdockConfigSchema } from '../config/schemas';
import {
  ChatPayload,
  FLOWDOCK_API_URL,
  PostOutcome,
  TeamInboxMessage,
  TeamInboxPayload,
} from './flowdock.types';
import { textToHtml } from './html';

export interface InboxFields {
  source: string;
  fromAddress: string;
  subject: string;
  textContent: string;
  fromName?: string;
  project?: string | null;
  tags?: string[];
  link?: string;
}

/**
 * Flowdock push API client. Messages are routed to a flow by team name
 * using the `flowForTeam` map of flowdock-config.json.
 */
@Injectable()
export class FlowdockService {
  private readonly logger = new Logger(FlowdockService.name);
  private readonly breaker: CircuitBreaker<
    [AxiosRequestConfig],
    AxiosResponse<unknown>
  >;
  private config?: Promise<FlowdockConfig>;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
    circuitBreakerFactory: CircuitBreakerFactory,
  ) {
    this.breaker = circuitBreakerFactory.createBreaker(
      'flowdock',
      (config: AxiosRequestConfig) =>
        firstValueFrom(this.httpService.request<unknown>(config)),
    );
  }

  getConfig(): Promise<FlowdockConfig> {
    if (!this.config) {
      const { paths } = this.configService.getOrThrow<AppConfig>(APP_CONFIG);
      this.config = readJsonConfig(paths.flowdock, FlowdockConfigSchema);
    }
    return this.config;
  }

  /**
   * Post to a flow's chat as an external user. Flowdock rejects user names
   * containing whitespace.
   */
  async chat(
    flowToken: string,
    externalUserName: string,
    content: string,
    tags: string[] = [],
  ): Promise<void> {
    if (/\s/.test(externalUserName)) {
      throw new FlowdockApiError(
        `External user name "${externalUserName}" must not contain spaces`,
      );
    }
    const payload: ChatPayload = {
      external_user_name: externalUserName,
      content,
      tags,
    };
    this.logger.log(`Posting chat message: ${content}`);
    await this.post('chat', flowToken, payload);
  }

  /**
   * Post to a flow's Team Inbox. The text content is sent as HTML.
   */
  async postToInbox(flowToken: string, fields: InboxFields): Promise<void> {
    const payload: TeamInboxPayload = {
      source: fields.source,
      from_address: fields.fromAddress,
      subject: fields.subject,
      content: textToHtml(fields.textContent),
      format: 'html',
      tags: fields.tags ?? [],
    };
    if (fields.fromName) {
      payload.from_name = fields.fromName;
    }
    if (fields.project) {
      payload.project = fields.project;
    }
    if (fields.link) {
      payload.link = fields.link;
    }

    this.logger.log(`Posting message to Team Inbox: ${payload.subject}`);
    await this.post('team_inbox', flowToken, payload);
  }

  /** Flow token for a team, falling back to the default flow. */
  async resolveFlow(teamName: string | null): Promise<string | undefined> {
    const config = await this.getConfig();
    if (teamName && teamName in config.flowForTeam) {
      return config.flowForTeam[teamName];
    }
    if (config.defaultFlow) {
      this.logger.warn(
        `Unknown team: ${teamName ?? '<none>'}, posting to default flow`,
      );
      return config.defaultFlow;
    }
    this.logger.warn(
      `Unknown team: ${teamName ?? '<none>'} and no default flow configured`,
    );
    return undefined;
  }

  async postTeamInbox(message: TeamInboxMessage): Promise<PostOutcome> {
    const flowToken = await this.resolveFlow(message.teamName);
    if (!flowToken) {
      return 'skipped';
    }

    const { teamInbox } = await this.getConfig();
    await this.postToInbox(flowToken, {
      source: teamInbox.source,
      fromAddress: teamInbox.from_address,
      fromName: teamInbox.from_name,
      tags: teamInbox.tags,
      subject: message.subject,
      textContent: message.textContent,
      project: message.project,
      link: message.link,
    });
    return 'posted';
  }

  async getTeamTimezone(teamName: string | null): Promise<string> {
    const config = await this.getConfig();
    return (
      (teamName ? config.timezoneForTeam[teamName] : undefined) ??
      config.defaultTimezone
    );
  }

  private async post(
    endpoint: 'chat' | 'team_inbox',
    flowToken: string,
    payload: ChatPayload | TeamInboxPayload,
  ): Promise<void> {
    try {
      await this.breaker.fire({
        method: 'POST',
        url: `${FLOWDOCK_API_URL}/messages/${endpoint}/${encodeURIComponent(flowToken)}`,
        data: payload,
        headers: { 'Content-Type': 'application/json; charset=UTF-8' },
      });
    } catch (error) {
      // The flow token is part of the URL; keep it out of the error
      if (isAxiosError(error)) {
        throw new FlowdockApiError(
          `Flowdock ${endpoint} request failed with status ${error.response?.status ?? 'n/a'}: ${error.code ?? error.name}`,
          error.response?.status,
        );
      }
      throw new FlowdockApiError(
        `Flowdock ${endpoint} request failed: ${errorMessage(error)}`,
      );
    }
  }
}
