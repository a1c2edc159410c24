/**
 * Stable logical name of one searchable collection family, e.g. a
 * site/language combination. Doubles as the public alias name.
 */
export type IndexID = string;

/**
 * Generation label derived from wall-clock time at minute granularity,
 * formatted `YYYY-MM-DD-HH-mm` so lexicographic and chronological order agree.
 */
export type RevisionID = string;

export type DocumentID = string;

export type DocumentType = string;

export enum RevisionState {
  UNINITIALIZED = 'uninitialized',
  INITIALIZED = 'initialized',
  COMMITTED = 'committed',
  REVERTED = 'reverted',
}

/**
 * Base shape of a document handed to the search backend.
 */
export interface IndexDocument {
  id: DocumentID;
  [field: string]: unknown;
}

/**
 * Counts reported for one bulk write into a generation.
 */
export interface UpsertOutcome {
  attempted: number;
  succeeded: number;
  failed: number;
}

/**
 * Relevance of one hit. Text match scores are 64-bit, so they are kept as
 * bigint to stay comparable.
 */
export interface Score {
  id: DocumentID;
  index: bigint;
}

export type Scores = Record<DocumentID, Score>;
