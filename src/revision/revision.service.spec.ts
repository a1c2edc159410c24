import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RevisionService, REVISION_CLOCK } from './revision.service';
import { SEARCH_BACKEND, SearchPreset } from '../typesense/interfaces/search-backend.interface';
import { RevisionState } from '../common/interfaces/revision.interface';
import { ClientError } from '../common/errors/client.error';
import { ConnectivityError } from '../common/errors/connectivity.error';
import { RevisionStateError } from '../common/errors/revision-state.error';
import { InMemorySearchBackend } from '../../test/utils/in-memory-search-backend';
import { createConfigService, createIndicesConfig } from '../../test/utils/test-helpers';

describe('RevisionService', () => {
  const DE = 'www-example-de';
  const EN = 'www-example-en';
  const REVISION = '2024-05-10-08-15';

  let service: RevisionService;
  let backend: InMemorySearchBackend;
  let now: Date;

  const createService = async (
    preset: SearchPreset | null = { name: 'default', value: { query_by: 'title' } },
  ) => {
    const config = createIndicesConfig({
      indices: {
        [DE]: { fields: [{ name: 'title', type: 'string' }] },
        [EN]: { fields: [{ name: 'title', type: 'string' }] },
      },
      preset,
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RevisionService,
        { provide: SEARCH_BACKEND, useValue: backend },
        { provide: ConfigService, useValue: createConfigService(config) },
        { provide: REVISION_CLOCK, useValue: () => now },
      ],
    }).compile();

    return module.get<RevisionService>(RevisionService);
  };

  beforeEach(async () => {
    backend = new InMemorySearchBackend();
    now = new Date(2024, 4, 10, 8, 15, 30);
    service = await createService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('indices', () => {
    it('should return the configured index IDs', () => {
      expect(service.indices()).toEqual([DE, EN]);
    });
  });

  describe('healthz', () => {
    it('should pass when the backend is healthy', async () => {
      await expect(service.healthz()).resolves.toBeUndefined();
    });

    it('should throw ConnectivityError when the backend is unhealthy', async () => {
      backend.healthy = false;

      await expect(service.healthz()).rejects.toBeInstanceOf(ConnectivityError);
    });

    it('should wrap transport failures of the probe', async () => {
      jest.spyOn(backend, 'health').mockRejectedValueOnce(new ClientError('No response', 0));

      await expect(service.healthz()).rejects.toThrow(
        'Search backend health check failed: No response',
      );
    });
  });

  describe('initialize', () => {
    it('should create one generation per index and return the revision', async () => {
      const revisionID = await service.initialize();

      expect(revisionID).toBe(REVISION);
      expect(backend.collectionNames()).toEqual([`${DE}-${REVISION}`, `${EN}-${REVISION}`]);
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.INITIALIZED);
      expect(service.currentRevisionID).toBe(REVISION);
    });

    it('should upsert the configured search preset', async () => {
      await service.initialize();

      expect(backend.presets.get('default')).toEqual({ query_by: 'title' });
    });

    it('should skip the preset when none is configured', async () => {
      service = await createService(null);
      const upsertPreset = jest.spyOn(backend, 'upsertPreset');

      await service.initialize();

      expect(upsertPreset).not.toHaveBeenCalled();
    });

    it('should leave existing aliases on the previous generation', async () => {
      backend.addCollection(`${DE}-2024-05-09-08-15`);
      backend.aliases.set(DE, `${DE}-2024-05-09-08-15`);

      await service.initialize();

      expect(backend.aliases.get(DE)).toBe(`${DE}-2024-05-09-08-15`);
      expect(backend.aliases.has(EN)).toBe(false);
    });

    it('should tolerate an alias pointing at a missing generation', async () => {
      backend.aliases.set(DE, `${DE}-2024-01-01-00-00`);

      await expect(service.initialize()).resolves.toBe(REVISION);
      expect(backend.aliases.get(DE)).toBe(`${DE}-2024-01-01-00-00`);
    });

    it('should reuse a generation that already exists for the revision', async () => {
      backend.addCollection(`${DE}-${REVISION}`, [{ id: 'kept' }]);
      const createCollection = jest.spyOn(backend, 'createCollection');

      await service.initialize();

      expect(createCollection).toHaveBeenCalledTimes(1);
      expect(createCollection).toHaveBeenCalledWith(`${EN}-${REVISION}`, {
        fields: [{ name: 'title', type: 'string' }],
      });
      expect(backend.collections.get(`${DE}-${REVISION}`)?.documents.has('kept')).toBe(true);
    });

    it('should refuse to reopen a committed revision within the same minute', async () => {
      const revisionID = await service.initialize();
      await service.commitRevision(revisionID);

      await expect(service.initialize()).rejects.toThrow(
        `Cannot initialize revision ${REVISION} in state committed`,
      );
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.COMMITTED);
      await expect(service.revertRevision(revisionID)).rejects.toBeInstanceOf(RevisionStateError);
      expect(backend.aliases.get(DE)).toBe(`${DE}-${REVISION}`);
      expect(backend.collectionNames()).toEqual([`${DE}-${REVISION}`, `${EN}-${REVISION}`]);
    });

    it('should refuse a revision whose generation an alias already serves', async () => {
      backend.addCollection(`${EN}-${REVISION}`, [{ id: 'live' }]);
      backend.aliases.set(EN, `${EN}-${REVISION}`);
      const createCollection = jest.spyOn(backend, 'createCollection');

      await expect(service.initialize()).rejects.toBeInstanceOf(RevisionStateError);
      expect(createCollection).not.toHaveBeenCalled();
      expect(service.getRevisionState(REVISION)).toBe(RevisionState.UNINITIALIZED);
      expect(backend.collections.get(`${EN}-${REVISION}`)?.documents.has('live')).toBe(true);
    });

    it('should forget settled revisions once a newer one is initialized', async () => {
      const first = await service.initialize();
      await service.commitRevision(first);
      now = new Date(2024, 4, 10, 9, 0);

      const second = await service.initialize();

      expect(second).toBe('2024-05-10-09-00');
      expect(service.getRevisionState(first)).toBe(RevisionState.UNINITIALIZED);
      expect(service.getRevisionState(second)).toBe(RevisionState.INITIALIZED);
    });

    it('should keep revisions that are still open', async () => {
      const first = await service.initialize();
      now = new Date(2024, 4, 10, 9, 0);

      await service.initialize();

      expect(service.getRevisionState(first)).toBe(RevisionState.INITIALIZED);
    });

    it('should fail without creating anything when the backend is unhealthy', async () => {
      backend.healthy = false;

      await expect(service.initialize()).rejects.toBeInstanceOf(ConnectivityError);
      expect(backend.collectionNames()).toEqual([]);
      expect(service.currentRevisionID).toBeUndefined();
    });

    it('should propagate a failure to create a generation', async () => {
      jest
        .spyOn(backend, 'createCollection')
        .mockRejectedValueOnce(new ClientError('Bad schema', 400));

      await expect(service.initialize()).rejects.toThrow('Bad schema');
      expect(service.getRevisionState(REVISION)).toBe(RevisionState.UNINITIALIZED);
    });

    it('should propagate a failure to upsert the preset', async () => {
      jest.spyOn(backend, 'upsertPreset').mockRejectedValueOnce(new ClientError('Forbidden', 403));

      await expect(service.initialize()).rejects.toThrow('Forbidden');
    });
  });

  describe('upsertDocuments', () => {
    beforeEach(async () => {
      await service.initialize();
    });

    it('should write documents into the generation of the revision', async () => {
      const outcome = await service.upsertDocuments(REVISION, DE, [{ id: 'a' }, { id: 'b' }]);

      expect(outcome).toEqual({ attempted: 2, succeeded: 2, failed: 0 });
      expect([...(backend.collections.get(`${DE}-${REVISION}`)?.documents.keys() ?? [])]).toEqual([
        'a',
        'b',
      ]);
    });

    it('should succeed without a request for an empty document set', async () => {
      const importDocuments = jest.spyOn(backend, 'importDocuments');

      const outcome = await service.upsertDocuments(REVISION, DE, []);

      expect(outcome).toEqual({ attempted: 0, succeeded: 0, failed: 0 });
      expect(importDocuments).not.toHaveBeenCalled();
    });

    it('should count rejected documents without failing', async () => {
      backend.rejectedDocumentIDs.add('b');

      const outcome = await service.upsertDocuments(REVISION, DE, [
        { id: 'a' },
        { id: 'b' },
        { id: 'c' },
      ]);

      expect(outcome).toEqual({ attempted: 3, succeeded: 2, failed: 1 });
    });

    it('should throw when the whole import is rejected', async () => {
      await expect(
        service.upsertDocuments('2000-01-01-00-00', DE, [{ id: 'a' }]),
      ).rejects.toBeInstanceOf(ClientError);
    });
  });

  describe('commitRevision', () => {
    it('should point every alias at the new generation', async () => {
      const revisionID = await service.initialize();

      await service.commitRevision(revisionID);

      expect(backend.aliases.get(DE)).toBe(`${DE}-${REVISION}`);
      expect(backend.aliases.get(EN)).toBe(`${EN}-${REVISION}`);
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.COMMITTED);
    });

    it('should keep only the current and the previous generation', async () => {
      for (const revision of ['2024-05-07-08-15', '2024-05-08-08-15', '2024-05-09-08-15']) {
        backend.addCollection(`${DE}-${revision}`);
      }
      backend.aliases.set(DE, `${DE}-2024-05-09-08-15`);
      backend.addCollection('unrelated-collection');

      await service.commitRevision(await service.initialize());

      expect(backend.collectionNames()).toEqual([
        'unrelated-collection',
        `${DE}-2024-05-09-08-15`,
        `${DE}-${REVISION}`,
        `${EN}-${REVISION}`,
      ]);
    });

    it('should keep going when one old generation cannot be deleted', async () => {
      for (const revision of ['2024-05-07-08-15', '2024-05-08-08-15', '2024-05-09-08-15']) {
        backend.addCollection(`${DE}-${revision}`);
      }
      const revisionID = await service.initialize();
      jest
        .spyOn(backend, 'deleteCollection')
        .mockRejectedValueOnce(new ClientError('Locked', 409));

      await service.commitRevision(revisionID);

      expect(backend.collectionNames()).toEqual([
        `${DE}-2024-05-08-08-15`,
        `${DE}-2024-05-09-08-15`,
        `${DE}-${REVISION}`,
        `${EN}-${REVISION}`,
      ]);
    });

    it('should not fail the commit when pruning fails', async () => {
      const revisionID = await service.initialize();
      jest
        .spyOn(backend, 'retrieveCollections')
        .mockRejectedValue(new ClientError('Unavailable', 503));

      await expect(service.commitRevision(revisionID)).resolves.toBeUndefined();
      expect(backend.aliases.get(EN)).toBe(`${EN}-${REVISION}`);
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.COMMITTED);
    });

    it('should abort the remaining indices when an alias cannot be updated', async () => {
      const revisionID = await service.initialize();
      jest.spyOn(backend, 'upsertAlias').mockRejectedValueOnce(new ClientError('Unavailable', 503));

      await expect(service.commitRevision(revisionID)).rejects.toThrow('Unavailable');
      expect(backend.aliases.has(DE)).toBe(false);
      expect(backend.aliases.has(EN)).toBe(false);
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.INITIALIZED);
    });

    it('should leave already swapped aliases in place when a later alias fails', async () => {
      backend.addCollection(`${EN}-2024-05-09-08-15`);
      backend.aliases.set(EN, `${EN}-2024-05-09-08-15`);
      const revisionID = await service.initialize();
      const upsertAlias = backend.upsertAlias.bind(backend);
      jest.spyOn(backend, 'upsertAlias').mockImplementation(async (name, collectionName) => {
        if (name === EN) {
          throw new ClientError('Unavailable', 503);
        }
        return upsertAlias(name, collectionName);
      });

      await expect(service.commitRevision(revisionID)).rejects.toThrow('Unavailable');
      expect(backend.aliases.get(DE)).toBe(`${DE}-${REVISION}`);
      expect(backend.aliases.get(EN)).toBe(`${EN}-2024-05-09-08-15`);
      expect(backend.collectionNames()).toEqual([
        `${DE}-${REVISION}`,
        `${EN}-2024-05-09-08-15`,
        `${EN}-${REVISION}`,
      ]);
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.INITIALIZED);
    });

    it('should reject a revision that was never initialized', async () => {
      await expect(service.commitRevision('2024-01-01-00-00')).rejects.toBeInstanceOf(
        RevisionStateError,
      );
    });

    it('should reject a second commit of the same revision', async () => {
      const revisionID = await service.initialize();
      await service.commitRevision(revisionID);

      await expect(service.commitRevision(revisionID)).rejects.toThrow(
        `Cannot commit revision ${REVISION} in state committed`,
      );
    });
  });

  describe('revertRevision', () => {
    it('should delete the generations of the revision and leave aliases alone', async () => {
      backend.addCollection(`${DE}-2024-05-09-08-15`);
      backend.aliases.set(DE, `${DE}-2024-05-09-08-15`);
      const revisionID = await service.initialize();

      await service.revertRevision(revisionID);

      expect(backend.collectionNames()).toEqual([`${DE}-2024-05-09-08-15`]);
      expect(backend.aliases.get(DE)).toBe(`${DE}-2024-05-09-08-15`);
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.REVERTED);
    });

    it('should propagate a deletion failure', async () => {
      const revisionID = await service.initialize();
      jest.spyOn(backend, 'deleteCollection').mockRejectedValueOnce(new ClientError('Locked', 409));

      await expect(service.revertRevision(revisionID)).rejects.toThrow('Locked');
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.INITIALIZED);
    });

    it('should keep the remaining generations when a later deletion fails', async () => {
      const revisionID = await service.initialize();
      const deleteCollection = backend.deleteCollection.bind(backend);
      jest.spyOn(backend, 'deleteCollection').mockImplementation(async name => {
        if (name === `${EN}-${REVISION}`) {
          throw new ClientError('Locked', 409);
        }
        return deleteCollection(name);
      });

      await expect(service.revertRevision(revisionID)).rejects.toThrow('Locked');
      expect(backend.collectionNames()).toEqual([`${EN}-${REVISION}`]);
      expect(service.getRevisionState(revisionID)).toBe(RevisionState.INITIALIZED);
    });

    it('should not commit a reverted revision', async () => {
      const revisionID = await service.initialize();
      await service.revertRevision(revisionID);

      await expect(service.commitRevision(revisionID)).rejects.toBeInstanceOf(RevisionStateError);
      expect(backend.aliases.size).toBe(0);
    });
  });
});
