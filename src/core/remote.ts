/**
 * Remote change client contract
 *
 * The core only talks to the review server through this interface.
 * Failures surface as GclError with codes NOT_FOUND, CONFLICT, NOT_READY,
 * AUTH_FAILURE or NETWORK_ERROR.
 */

import { Change, ChangeFilter, PatchSet } from './types';

export interface RemoteChangeClient {
  /** null when the server does not know the change */
  getChange(changeId: string): Promise<Change | null>;
  /** Ordered by patch set number; NOT_FOUND for an unknown change */
  getPatchSets(changeId: string): Promise<PatchSet[]>;
  listChanges(filter: ChangeFilter): Promise<Change[]>;
  /** Upload a commit as the next patch set of the change */
  pushPatchSet(changeId: string, commit: string, parentRef: string): Promise<PatchSet>;
  submit(changeId: string): Promise<Change>;
}
