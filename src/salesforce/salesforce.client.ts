import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { CircuitBreakerFactory } from '../common/circuit-breaker.factory';
import { SalesforceApiError, errorMessage } from '../common/errors';
import { MetricsService } from '../common/metrics.service';
import { SalesforceToken } from '../config/schemas';
import { SalesforceAuthService } from './salesforce-auth.service';
import { TokenStore } from './token.store';
import {
  ApiVersion,
  ApiVersionListSchema,
  SoqlQueryResponseSchema,
  SoqlRecord,
} from './salesforce.types';

interface SalesforceErrorBody {
  errorCode?: unknown;
  message?: unknown;
}

function firstError(data: unknown): SalesforceErrorBody | undefined {
  if (Array.isArray(data) && data.length > 0) {
    const [first]: unknown[] = data;
    if (typeof first === 'object' && first !== null) {
      return {
        errorCode: 'errorCode' in first ? first.errorCode : undefined,
        message: 'message' in first ? first.message : undefined,
      };
    }
  }
  return undefined;
}

/**
 * True for the 401 SalesForce returns when the access token expired:
 * `[{ "errorCode": "INVALID_SESSION_ID", ... }]`.
 */
export function isInvalidSession(
  status: number | undefined,
  data: unknown,
): boolean {
  return (
    status === 401 && firstError(data)?.errorCode === 'INVALID_SESSION_ID'
  );
}

/**
 * Authenticated SalesForce REST client. Relative URLs resolve against the
 * API root (`instance_url` + `apiVersionUrl`).
 */
@Injectable()
export class SalesforceClient {
  private readonly logger = new Logger(SalesforceClient.name);
  private readonly breaker: CircuitBreaker<
    [AxiosRequestConfig],
    AxiosResponse<unknown>
  >;

  constructor(
    private readonly httpService: HttpService,
    private readonly authService: SalesforceAuthService,
    private readonly tokenStore: TokenStore,
    private readonly metrics: MetricsService,
    circuitBreakerFactory: CircuitBreakerFactory,
  ) {
    this.breaker = circuitBreakerFactory.createBreaker(
      'salesforce',
      (config: AxiosRequestConfig) =>
        firstValueFrom(this.httpService.request<unknown>(config)),
    );
  }

  async getApiRootUrl(): Promise<string> {
    const [token, config] = await Promise.all([
      this.tokenStore.load(),
      this.authService.getConfig(),
    ]);
    const url = new URL(config.apiVersionUrl, token.instance_url).toString();
    return url.endsWith('/') ? url : `${url}/`;
  }

  /** Web UI link to a record, e.g. `https://eu1.salesforce.com/006...` */
  async getRecordUrl(id: string): Promise<string> {
    const token = await this.tokenStore.load();
    return new URL(`/${encodeURIComponent(id)}`, token.instance_url).toString();
  }

  /**
   * GET `url` as JSON. Relative to the API root unless absolute.
   */
  async getJson(url: string, operation = 'get'): Promise<unknown> {
    const absolute = new URL(url, await this.getApiRootUrl()).toString();
    return this.request(absolute, operation);
  }

  /** Versions listed by the instance; needs no API version configured. */
  async getApiVersions(): Promise<ApiVersion[]> {
    const token = await this.tokenStore.load();
    const url = new URL('/services/data/', token.instance_url).toString();
    const data = await this.request(url, 'versions');
    const parsed = ApiVersionListSchema.safeParse(data);
    if (!parsed.success) {
      throw new SalesforceApiError('Unexpected API versions response');
    }
    return parsed.data;
  }

  async getAvailableResources(): Promise<Record<string, string>> {
    const data = await this.getJson('', 'resources');
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new SalesforceApiError('Unexpected resources response');
    }
    return Object.fromEntries(
      Object.entries(data).filter(
        (entry): entry is [string, string] => typeof entry[1] === 'string',
      ),
    );
  }

  /**
   * Run a SOQL query, following `nextRecordsUrl` for at most `maxPages`
   * pages.
   */
  async query(soql: string, maxPages = Infinity): Promise<SoqlRecord[]> {
    const records: SoqlRecord[] = [];
    let url: string | undefined = `query?q=${encodeURIComponent(soql)}`;
    let pages = 0;

    while (url && pages < maxPages) {
      const parsed = SoqlQueryResponseSchema.safeParse(
        await this.getJson(url, 'query'),
      );
      if (!parsed.success) {
        throw new SalesforceApiError('Unexpected SOQL query response');
      }
      const page = parsed.data;
      pages += 1;
      records.push(...page.records);
      url = page.done ? undefined : page.nextRecordsUrl;
    }

    if (url) {
      this.logger.warn(`Stopped SOQL paging after ${pages} page(s)`);
    }
    return records;
  }

  private async request(url: string, operation: string): Promise<unknown> {
    const token = await this.tokenStore.load();
    try {
      const data = await this.send(url, token);
      this.metrics.recordSalesforceRequest(operation, 'success');
      return data;
    } catch (error) {
      const expired =
        isAxiosError(error) &&
        isInvalidSession(error.response?.status, error.response?.data);
      if (!expired) {
        this.metrics.recordSalesforceRequest(operation, 'failure');
        throw this.toApiError(error, url);
      }
    }

    // Session expired: refresh once and repeat the same request
    const refreshed = await this.authService.refresh();
    try {
      const data = await this.send(url, refreshed);
      this.metrics.recordSalesforceRequest(operation, 'success');
      return data;
    } catch (error) {
      this.metrics.recordSalesforceRequest(operation, 'failure');
      throw this.toApiError(error, url);
    }
  }

  private async send(url: string, token: SalesforceToken): Promise<unknown> {
    this.logger.debug(`GET ${url}`);
    const response = await this.breaker.fire({
      method: 'GET',
      url,
      headers: {
        Authorization: `Bearer ${token.access_token}`,
        Accept: 'application/json',
      },
    });
    return response.data;
  }

  private toApiError(error: unknown, url: string): SalesforceApiError {
    if (isAxiosError(error)) {
      const body = firstError(error.response?.data);
      const errorCode =
        typeof body?.errorCode === 'string' ? body.errorCode : undefined;
      const detail =
        typeof body?.message === 'string' ? body.message : error.message;
      return new SalesforceApiError(
        `GET ${url} failed: ${detail}`,
        error.response?.status,
        errorCode,
      );
    }
    return new SalesforceApiError(`GET ${url} failed: ${errorMessage(error)}`);
  }
}
