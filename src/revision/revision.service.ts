import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../common/errors/configuration.error';
import { ConnectivityError } from '../common/errors/connectivity.error';
import { RevisionStateError } from '../common/errors/revision-state.error';
import {
  IndexDocument,
  IndexID,
  RevisionID,
  RevisionState,
  UpsertOutcome,
} from '../common/interfaces/revision.interface';
import { errorMessage } from '../common/utils/error.utils';
import { IndicesConfig } from '../config/indices.config';
import {
  CollectionAlias,
  ImportResult,
  SEARCH_BACKEND,
  SearchBackend,
} from '../typesense/interfaces/search-backend.interface';
import {
  extractRevisionID,
  formatCollectionName,
  generateRevisionID,
  selectCollectionsToPrune,
} from './revision-id';

export const REVISION_CLOCK = 'REVISION_CLOCK';

const DEFAULT_HEALTH_TIMEOUT = 5000;

/**
 * Owns the generations and aliases of the configured indices.
 *
 * A build goes through `initialize → upsertDocuments → commitRevision |
 * revertRevision`. Initialize creates one generation `<index>-<revision>` per
 * index without touching the aliases, so consumers keep querying the previous
 * generation until commit repoints every alias. Commit also prunes generations
 * beyond the current one and the one before it.
 *
 * Only one build may run against an index set at a time; nothing here locks
 * the aliases against a concurrent process.
 */
@Injectable()
export class RevisionService {
  private readonly logger = new Logger(RevisionService.name);
  private readonly config: IndicesConfig;
  private readonly healthTimeout: number;
  private readonly states = new Map<RevisionID, RevisionState>();
  private latestRevisionID: RevisionID | undefined;

  constructor(
    @Inject(SEARCH_BACKEND) private readonly backend: SearchBackend,
    configService: ConfigService,
    @Optional() @Inject(REVISION_CLOCK) private readonly clock: () => Date = () => new Date(),
  ) {
    this.config = configService.getOrThrow<IndicesConfig>('indices');
    this.healthTimeout =
      configService.get<number>('typesense.healthTimeout') ?? DEFAULT_HEALTH_TIMEOUT;
  }

  /**
   * Revision minted by the last successful initialize
   */
  get currentRevisionID(): RevisionID | undefined {
    return this.latestRevisionID;
  }

  getRevisionState(revisionID: RevisionID): RevisionState {
    return this.states.get(revisionID) ?? RevisionState.UNINITIALIZED;
  }

  async healthz(): Promise<void> {
    let healthy: boolean;
    try {
      healthy = await this.backend.health(this.healthTimeout);
    } catch (error) {
      throw new ConnectivityError(`Search backend health check failed: ${errorMessage(error)}`);
    }
    if (!healthy) {
      throw new ConnectivityError('Search backend reported unhealthy');
    }
  }

  indices(): IndexID[] {
    const indices = Object.keys(this.config.indices);
    if (indices.length === 0) {
      throw new ConfigurationError('No indices configured');
    }
    return indices;
  }

  /**
   * Checks the backend connection, reconciles existing aliases, creates the
   * generations of a new revision and makes sure the search preset exists.
   * Any failure here is fatal for the build.
   */
  async initialize(): Promise<RevisionID> {
    this.logger.log('Initializing collections and aliases...');

    try {
      await this.healthz();
    } catch (error) {
      this.logger.error(errorMessage(error));
      throw error;
    }

    let aliases: CollectionAlias[];
    try {
      aliases = await this.backend.retrieveAliases();
    } catch (error) {
      this.logger.error(`Failed to retrieve aliases: ${errorMessage(error)}`);
      throw error;
    }
    const existingCollections = await this.fetchExistingCollections();

    this.reconcileAliases(aliases, existingCollections);

    const revisionID = generateRevisionID(this.clock());
    this.assertRevisionUnused(revisionID, aliases);
    this.forgetSettledRevisions();
    this.logger.log(`Generated new revision ${revisionID}`);

    for (const [indexID, schema] of Object.entries(this.config.indices)) {
      const collectionName = formatCollectionName(indexID, revisionID);

      if (existingCollections.has(collectionName)) {
        // Left behind by a build of this minute that never settled
        this.logger.warn(
          `Collection ${collectionName} already exists, reusing it for revision ${revisionID}`,
        );
        continue;
      }

      try {
        await this.backend.createCollection(collectionName, schema);
      } catch (error) {
        this.logger.error(`Failed to create collection ${collectionName}: ${errorMessage(error)}`);
        throw error;
      }
      this.logger.log(`Created collection ${collectionName} for index ${indexID}`);
    }

    if (this.config.preset) {
      try {
        await this.backend.upsertPreset(this.config.preset);
      } catch (error) {
        this.logger.error(
          `Failed to upsert search preset ${this.config.preset.name}: ${errorMessage(error)}`,
        );
        throw error;
      }
    }

    this.states.set(revisionID, RevisionState.INITIALIZED);
    this.latestRevisionID = revisionID;
    this.logger.log(`Initialization completed for revision ${revisionID}`);

    return revisionID;
  }

  /**
   * Bulk-writes documents into the generation of the index. Documents the
   * backend rejects individually are counted and logged; only a rejected
   * request throws.
   */
  async upsertDocuments<T extends IndexDocument>(
    revisionID: RevisionID,
    indexID: IndexID,
    documents: T[],
  ): Promise<UpsertOutcome> {
    if (documents.length === 0) {
      this.logger.warn(`No documents provided for upsert into index ${indexID}`);
      return { attempted: 0, succeeded: 0, failed: 0 };
    }

    const collectionName = formatCollectionName(indexID, revisionID);

    let results: ImportResult[];
    try {
      results = await this.backend.importDocuments(collectionName, documents, 'upsert');
    } catch (error) {
      this.logger.error(
        `Failed to bulk upsert documents into ${collectionName}: ${errorMessage(error)}`,
      );
      throw error;
    }

    let succeeded = 0;
    let failed = 0;
    for (const result of results) {
      if (result.success) {
        succeeded++;
      } else {
        failed++;
        this.logger.warn(`Document failed to upsert into ${collectionName}: ${result.error}`);
      }
    }

    this.logger.log(
      `Bulk upsert into ${collectionName} completed: ${succeeded} succeeded, ${failed} failed`,
    );
    return { attempted: documents.length, succeeded, failed };
  }

  /**
   * Points every alias at the generation of the revision, then prunes old
   * generations. An alias failure aborts the remaining indices; indices
   * already repointed stay repointed.
   */
  async commitRevision(revisionID: RevisionID): Promise<void> {
    this.assertInitialized(revisionID, 'commit');

    for (const indexID of Object.keys(this.config.indices)) {
      const collectionName = formatCollectionName(indexID, revisionID);

      try {
        await this.backend.upsertAlias(indexID, collectionName);
      } catch (error) {
        this.logger.error(`Failed to update alias ${indexID}: ${errorMessage(error)}`);
        throw error;
      }
      this.logger.log(`Updated alias ${indexID} to ${collectionName}`);

      try {
        const deleted = await this.pruneOldCollections(indexID, collectionName);
        if (deleted > 0) {
          this.logger.log(`Pruned ${deleted} old collections of ${indexID}`);
        }
      } catch (error) {
        this.logger.error(
          `Failed to clean up old collections of ${indexID}: ${errorMessage(error)}`,
        );
      }
    }

    this.states.set(revisionID, RevisionState.COMMITTED);
    this.logger.log(`Committed revision ${revisionID}`);
  }

  /**
   * Deletes the generations of the revision. Aliases are left untouched.
   */
  async revertRevision(revisionID: RevisionID): Promise<void> {
    this.assertInitialized(revisionID, 'revert');

    for (const indexID of Object.keys(this.config.indices)) {
      const collectionName = formatCollectionName(indexID, revisionID);

      try {
        await this.backend.deleteCollection(collectionName);
      } catch (error) {
        this.logger.error(`Failed to delete collection ${collectionName}: ${errorMessage(error)}`);
        throw error;
      }
      this.logger.log(`Reverted and deleted collection ${collectionName}`);
    }

    this.states.set(revisionID, RevisionState.REVERTED);
  }

  /**
   * Deletes generations of the index older than the one before the current.
   * Returns the number of deleted generations.
   */
  private async pruneOldCollections(
    indexID: IndexID,
    currentCollection: string,
  ): Promise<number> {
    const collections = await this.backend.retrieveCollections();
    const toDelete = selectCollectionsToPrune(
      indexID,
      collections.map(collection => collection.name),
      currentCollection,
    );

    let deleted = 0;
    for (const collectionName of toDelete) {
      try {
        await this.backend.deleteCollection(collectionName);
        deleted++;
        this.logger.log(`Deleted old collection ${collectionName}`);
      } catch (error) {
        this.logger.error(`Failed to delete collection ${collectionName}: ${errorMessage(error)}`);
      }
    }
    return deleted;
  }

  /**
   * A revision ID minted twice within the same minute must not reopen a
   * settled revision or reuse a generation an alias already serves.
   */
  private assertRevisionUnused(revisionID: RevisionID, aliases: CollectionAlias[]): void {
    const state = this.states.get(revisionID);
    if (state !== undefined) {
      throw new RevisionStateError(revisionID, state, 'initialize');
    }

    const servedCollections = new Set(aliases.map(alias => alias.collection_name));
    for (const indexID of Object.keys(this.config.indices)) {
      if (servedCollections.has(formatCollectionName(indexID, revisionID))) {
        throw new RevisionStateError(revisionID, RevisionState.COMMITTED, 'initialize');
      }
    }
  }

  // Committed and reverted revisions cannot change state again
  private forgetSettledRevisions(): void {
    for (const [revisionID, state] of this.states) {
      if (state === RevisionState.COMMITTED || state === RevisionState.REVERTED) {
        this.states.delete(revisionID);
      }
    }
  }

  private assertInitialized(revisionID: RevisionID, action: string): void {
    const state = this.getRevisionState(revisionID);
    if (state !== RevisionState.INITIALIZED) {
      throw new RevisionStateError(revisionID, state, action);
    }
  }

  private async fetchExistingCollections(): Promise<Set<string>> {
    try {
      const collections = await this.backend.retrieveCollections();
      return new Set(collections.map(collection => collection.name));
    } catch (error) {
      this.logger.error(`Failed to retrieve collections: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Aliases pointing at a missing or foreign collection are only reported;
   * the next commit repoints them.
   */
  private reconcileAliases(aliases: CollectionAlias[], existingCollections: Set<string>): void {
    const aliasByIndex = new Map(aliases.map(alias => [alias.name, alias.collection_name]));

    for (const indexID of Object.keys(this.config.indices)) {
      const collectionName = aliasByIndex.get(indexID);
      if (collectionName === undefined) {
        this.logger.log(`Index ${indexID} has no alias yet`);
        continue;
      }

      const revisionID = extractRevisionID(collectionName, indexID);
      if (revisionID !== undefined && existingCollections.has(collectionName)) {
        this.logger.debug(`Alias ${indexID} points to revision ${revisionID}`);
      } else {
        this.logger.warn(
          `Alias ${indexID} points to missing collection ${collectionName}, it will be repointed on commit`,
        );
      }
    }
  }
}
