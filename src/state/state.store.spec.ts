import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { ConfigFileError } from '../common/errors';
import {
  makeTempDir,
  mockConfigService,
  removeDir,
  writeJson,
} from '../../test/fixtures/config';
import { makeOpportunity } from '../../test/fixtures/opportunities';
import { StateStore } from './state.store';

describe('StateStore', () => {
  let dir: string;
  let store: StateStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StateStore,
        { provide: ConfigService, useValue: mockConfigService(dir) },
      ],
    }).compile();
    store = module.get<StateStore>(StateStore);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe('state', () => {
    it('should start empty without a state file', async () => {
      await expect(store.readState()).resolves.toEqual({
        deliveredChatterIds: [],
      });
    });

    it('should round-trip the high-water mark', async () => {
      const state = { updatesUrl: '/feed?since=1', deliveredChatterIds: ['i1'] };

      await store.writeState(state);

      await expect(store.readState()).resolves.toEqual(state);
    });

    it('should default delivered ids for older state files', async () => {
      await writeJson(dir, 'state.json', { updatesUrl: '/feed?since=1' });

      await expect(store.readState()).resolves.toEqual({
        updatesUrl: '/feed?since=1',
        deliveredChatterIds: [],
      });
    });

    it('should refuse an invalid state file', async () => {
      await writeJson(dir, 'state.json', { updatesUrl: 42 });

      await expect(store.readState()).rejects.toBeInstanceOf(ConfigFileError);
    });
  });

  describe('known opportunities', () => {
    it('should be undefined on the first run', async () => {
      await expect(store.readKnownOpportunities()).resolves.toBeUndefined();
    });

    it('should be undefined for a damaged file', async () => {
      await writeFile(join(dir, 'opportunities.json'), '[{', 'utf-8');

      await expect(store.readKnownOpportunities()).resolves.toBeUndefined();
    });

    it('should be undefined for a file of the wrong shape', async () => {
      await writeJson(dir, 'opportunities.json', [{ id: 1 }]);

      await expect(store.readKnownOpportunities()).resolves.toBeUndefined();
    });

    it('should map saved opportunities by id', async () => {
      const a = makeOpportunity({ id: '006000000000001' });
      const b = makeOpportunity({ id: '006000000000002', name: 'Other' });

      await store.writeKnownOpportunities([a, b]);

      await expect(store.readKnownOpportunities()).resolves.toEqual(
        new Map([
          [a.id, a],
          [b.id, b],
        ]),
      );
      const raw: unknown = JSON.parse(
        await readFile(join(dir, 'opportunities.json'), 'utf-8'),
      );
      expect(raw).toEqual([a, b]);
    });
  });
});
