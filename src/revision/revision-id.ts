import { IndexID, RevisionID } from '../common/interfaces/revision.interface';

/**
 * Length of `YYYY-MM-DD-HH-mm`
 */
export const REVISION_ID_LENGTH = 16;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Mints a revision label from local wall-clock time at minute granularity.
 */
export function generateRevisionID(now: Date = new Date()): RevisionID {
  return [
    String(now.getFullYear()).padStart(4, '0'),
    pad(now.getMonth() + 1),
    pad(now.getDate()),
    pad(now.getHours()),
    pad(now.getMinutes()),
  ].join('-');
}

export function formatCollectionName(indexID: IndexID, revisionID: RevisionID): string {
  return `${indexID}-${revisionID}`;
}

/**
 * Returns the revision embedded in a generation name, or undefined when the
 * name does not belong to the index. Unrelated names sharing a prefix are
 * expected and ignored.
 */
export function extractRevisionID(
  collectionName: string,
  indexID: IndexID,
): RevisionID | undefined {
  const prefix = `${indexID}-`;
  if (!collectionName.startsWith(prefix)) {
    return undefined;
  }

  const revisionID = collectionName.slice(prefix.length);
  if (revisionID.length !== REVISION_ID_LENGTH) {
    return undefined;
  }
  return revisionID;
}

/**
 * Retention: keeps the current generation and the most recent one before
 * it. Returns the generation names of the index that should be deleted,
 * newest first.
 */
export function selectCollectionsToPrune(
  indexID: IndexID,
  collectionNames: string[],
  currentCollection: string,
): string[] {
  const previous = collectionNames
    .filter(
      name => name !== currentCollection && extractRevisionID(name, indexID) !== undefined,
    )
    .sort((a, b) => (a > b ? -1 : a < b ? 1 : 0));

  return previous.slice(1);
}
