import { Inject, Injectable, Logger } from '@nestjs/common';
import { BuildInProgressError } from '../common/errors/build-in-progress.error';
import { DocumentProvider } from '../common/interfaces/document-provider.interface';
import { IndexDocument, IndexID, RevisionID } from '../common/interfaces/revision.interface';
import { errorMessage } from '../common/utils/error.utils';
import { RevisionService } from '../revision/revision.service';
import { BuildReport, IndexBuildReport } from './interfaces/build-report.interface';

export const DOCUMENT_PROVIDER = 'DOCUMENT_PROVIDER';

/**
 * Runs one full re-index: initialize a revision, fill the generation of
 * every index, then commit or revert.
 *
 * A failing index taints the run but the remaining indices are still
 * attempted. Only an untainted run that indexed at least one document is
 * committed; an empty run usually means the content source returned nothing
 * and publishing it would empty the live index.
 */
@Injectable()
export class IndexerService {
  private readonly logger = new Logger(IndexerService.name);
  private running = false;

  constructor(
    private readonly revisionService: RevisionService,
    @Inject(DOCUMENT_PROVIDER) private readonly documentProvider: DocumentProvider,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  async healthz(): Promise<void> {
    await this.revisionService.healthz();
  }

  /**
   * Throws only when the revision itself cannot be initialized, committed
   * or reverted. A reverted build resolves with its report.
   */
  async run(signal?: AbortSignal): Promise<BuildReport> {
    if (this.running) {
      throw new BuildInProgressError();
    }
    this.running = true;

    try {
      return await this.build(signal);
    } finally {
      this.running = false;
    }
  }

  private async build(signal?: AbortSignal): Promise<BuildReport> {
    const revisionID = await this.revisionService.initialize();
    if (!revisionID) {
      throw new Error('Initialize returned an empty revision ID');
    }

    let indices: IndexID[];
    try {
      indices = this.revisionService.indices();
    } catch (error) {
      this.logger.error(`Failed to get configured indices: ${errorMessage(error)}`);
      await this.revisionService.revertRevision(revisionID);
      throw error;
    }

    let tainted = false;
    let aborted = false;
    let documentCount = 0;
    const reports: IndexBuildReport[] = [];

    for (const indexID of indices) {
      if (signal?.aborted) {
        this.logger.warn(`Build of revision ${revisionID} aborted before index ${indexID}`);
        aborted = true;
        tainted = true;
        break;
      }

      const report = await this.buildIndex(revisionID, indexID);
      reports.push(report);
      if (report.error !== undefined) {
        tainted = true;
      }
      documentCount += report.upsert?.succeeded ?? 0;
    }

    if (!tainted && documentCount > 0) {
      await this.revisionService.commitRevision(revisionID);
      this.logger.log(`Revision ${revisionID} committed with ${documentCount} documents`);
      return { revisionID, outcome: 'committed', tainted, aborted, documentCount, indices: reports };
    }

    this.logger.warn(
      tainted
        ? `Reverting revision ${revisionID}: at least one index failed (${documentCount} documents indexed)`
        : `Reverting revision ${revisionID}: no documents were indexed`,
    );
    await this.revisionService.revertRevision(revisionID);
    return { revisionID, outcome: 'reverted', tainted, aborted, documentCount, indices: reports };
  }

  private async buildIndex(revisionID: RevisionID, indexID: IndexID): Promise<IndexBuildReport> {
    let slots: Array<IndexDocument | undefined>;
    try {
      slots = await this.documentProvider.provide(indexID);
    } catch (error) {
      this.logger.error(`Failed to provide documents for index ${indexID}: ${errorMessage(error)}`);
      return { indexID, documents: 0, skipped: 0, error: errorMessage(error) };
    }

    const documents = slots.filter(
      (document): document is IndexDocument => document !== undefined,
    );
    const skipped = slots.length - documents.length;

    try {
      const upsert = await this.revisionService.upsertDocuments(revisionID, indexID, documents);
      return { indexID, documents: documents.length, skipped, upsert };
    } catch (error) {
      this.logger.error(
        `Failed to upsert ${documents.length} documents into index ${indexID} for revision ${revisionID}: ${errorMessage(error)}`,
      );
      return { indexID, documents: documents.length, skipped, error: errorMessage(error) };
    }
  }
}
