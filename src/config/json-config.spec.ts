import { writeFile } from 'fs/promises';
import { join } from 'path';
import { ConfigFileError } from '../common/errors';
import {
  LIMITS,
  makeTempDir,
  removeDir,
  writeJson,
} from '../../test/fixtures/config';
import { readJsonConfig, readJsonFile } from './json-config';
import { FlowdockConfigSchema, LimitsSchema } from './schemas';

describe('json-config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('readJsonFile', () => {
    it('should resolve undefined for a missing file', async () => {
      await expect(readJsonFile(join(dir, 'nope.json'))).resolves.toBeUndefined();
    });

    it('should reject malformed JSON with ConfigFileError', async () => {
      const filePath = join(dir, 'broken.json');
      await writeFile(filePath, '{ not json', 'utf-8');

      await expect(readJsonFile(filePath)).rejects.toBeInstanceOf(ConfigFileError);
    });

    it('should reject a directory with ConfigFileError', async () => {
      await expect(readJsonFile(dir)).rejects.toBeInstanceOf(ConfigFileError);
    });
  });

  describe('readJsonConfig', () => {
    it('should return the parsed value', async () => {
      const filePath = await writeJson(dir, 'limits.json', LIMITS);

      await expect(readJsonConfig(filePath, LimitsSchema)).resolves.toEqual(LIMITS);
    });

    it('should apply schema defaults', async () => {
      const filePath = await writeJson(dir, 'flowdock-config.json', {
        flowForTeam: {},
        teamInbox: { source: 'SalesForce', from_address: 'sales@example.com' },
      });

      const config = await readJsonConfig(filePath, FlowdockConfigSchema);

      expect(config.defaultTimezone).toBe('UTC');
      expect(config.timezoneForTeam).toEqual({});
      expect(config.teamInbox.tags).toEqual([]);
    });

    it('should reject an unknown time zone', async () => {
      const filePath = await writeJson(dir, 'flowdock-config.json', {
        flowForTeam: {},
        teamInbox: { source: 'SalesForce', from_address: 'sales@example.com' },
        timezoneForTeam: { Mobile: 'Europe/Nowhere' },
      });

      await expect(readJsonConfig(filePath, FlowdockConfigSchema)).rejects.toThrow(
        `Invalid configuration file ${filePath}: timezoneForTeam.Mobile: Unknown time zone "Europe/Nowhere"`,
      );
    });

    it('should reject a missing file', async () => {
      const filePath = join(dir, 'limits.json');

      await expect(readJsonConfig(filePath, LimitsSchema)).rejects.toThrow(
        `Invalid configuration file ${filePath}: file not found`,
      );
    });

    it('should name the failing fields', async () => {
      const filePath = await writeJson(dir, 'limits.json', {
        ...LIMITS,
        maxPages: 0,
      });

      const error: unknown = await readJsonConfig(filePath, LimitsSchema).catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(ConfigFileError);
      expect(error).toMatchObject({
        filePath,
        issues: ['maxPages: Number must be greater than 0'],
      });
    });
  });
});
