import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppConfig, buildAppConfig } from '../../src/config/configuration';

export const makeTempDir = (): Promise<string> =>
  mkdtemp(join(tmpdir(), 'sforce-flowdock-'));

export const removeDir = (dir: string): Promise<void> =>
  rm(dir, { recursive: true, force: true });

export async function writeJson(
  dir: string,
  name: string,
  data: unknown,
): Promise<string> {
  const filePath = join(dir, name);
  await writeFile(filePath, JSON.stringify(data), 'utf-8');
  return filePath;
}

export const appConfigFor = (dir: string): AppConfig =>
  buildAppConfig(dir, {});

/** ConfigService stand-in that only answers the `app` namespace. */
export const mockConfigService = (dir: string) => ({
  getOrThrow: jest.fn().mockReturnValue(appConfigFor(dir)),
});

export const SALESFORCE_CONFIG = {
  client_id: 'test-client-id',
  client_secret: 'test-secret',
  redirect_uri: 'https://localhost/callback',
  apiVersionUrl: '/services/data/v60.0/',
};

export const SALESFORCE_TOKEN = {
  access_token: 'test-access-token',
  refresh_token: 'test-refresh-token',
  instance_url: 'https://example.my.salesforce.com',
  token_type: 'Bearer',
};

export const FLOWDOCK_CONFIG = {
  flowForTeam: { Web: 'web-flow-token', Mobile: 'mobile-flow-token' },
  teamInbox: {
    source: 'SalesForce',
    from_address: 'sales@example.com',
    from_name: 'Sales',
    tags: ['sales'],
  },
  timezoneForTeam: { Mobile: 'Europe/Helsinki' },
};

export const LIMITS = {
  maxSeconds: 86400,
  maxPages: 5,
  maxTeamOpportunities: 10,
};
