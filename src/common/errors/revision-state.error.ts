import { RevisionID, RevisionState } from '../interfaces/revision.interface';

/**
 * A revision was asked for a transition its state does not allow: commit or
 * revert outside the initialized state, or initialize of a revision that
 * already exists. Committed and reverted revisions are terminal.
 */
export class RevisionStateError extends Error {
  readonly revisionID: RevisionID;
  readonly state: RevisionState;

  constructor(revisionID: RevisionID, state: RevisionState, action: string) {
    super(`Cannot ${action} revision ${revisionID} in state ${state}`);
    this.name = 'RevisionStateError';
    this.revisionID = revisionID;
    this.state = state;
    Object.setPrototypeOf(this, RevisionStateError.prototype);
  }
}
