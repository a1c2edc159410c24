import { IndexID, RevisionID, UpsertOutcome } from '../../common/interfaces/revision.interface';

export interface IndexBuildReport {
  indexID: IndexID;
  // Assembled documents handed to the backend
  documents: number;
  // Empty slots left by the document provider
  skipped: number;
  upsert?: UpsertOutcome;
  error?: string;
}

export interface BuildReport {
  revisionID: RevisionID;
  outcome: 'committed' | 'reverted';
  tainted: boolean;
  aborted: boolean;
  // Documents the backend accepted across all indices
  documentCount: number;
  indices: IndexBuildReport[];
}
