/**
 * Reconciliation Engine
 *
 * Compares local history with the server's view of each change and decides,
 * per change, what a rebase has to do:
 *
 *   UP_TO_DATE     local commit is the latest patch set
 *   NEEDS_REBASE   same diff as the latest patch set, different parent
 *                  (also when the local commit is an older patch set of it)
 *   DIVERGED       content differs and is not a pure rebase
 *   REMOTE_AHEAD   local commit is an older patch set
 *   NEW            the server does not know the Change-Id yet
 */

import { Change, LocalCommit, PatchSet, firstParent, latestPatchSet } from './types';
import { ChangeBinding, ChangeIndex } from './change-index';
import { PatchDiffer } from './patch';
import { Logger, logger } from '../utils/logger';

export type ChangeState = 'NEW' | 'UP_TO_DATE' | 'NEEDS_REBASE' | 'DIVERGED' | 'REMOTE_AHEAD';

/**
 * How the local commit's position relates to the latest patch set's
 */
export type Departure =
  | 'same-parent'        // both sit on the same parent
  | 'parent-in-history'  // the patch set's parent is further down local history
  | 'parent-unknown'     // the patch set's parent is not in local history
  | 'none';              // nothing to compare against

export interface Classification {
  state: ChangeState;
  /** Patch set the local commit was compared against */
  latest: PatchSet | null;
  /** Patch set the local commit is (by hash or by diff), if any */
  matchedPatchSet: number | null;
  departure: Departure;
  reason: string;
}

export interface ReconciledChange extends ChangeBinding {
  /** Position in the change index */
  index: number;
  classification: Classification;
}

/**
 * Ordered stack of changes, base first
 */
export type DependencyChain = readonly ReconciledChange[];

/**
 * Result of one reconciliation pass
 */
export class Reconciliation {
  constructor(
    readonly index: ChangeIndex,
    /** Same order as index.bindings */
    readonly changes: readonly ReconciledChange[]
  ) {}

  get unbound(): readonly LocalCommit[] {
    return this.index.unbound;
  }

  get untracked(): readonly Change[] {
    return this.index.untracked;
  }

  get(changeId: string): ReconciledChange | null {
    const index = this.index.indexOf(changeId);
    return index === null ? null : this.changes[index];
  }

  chains(): DependencyChain[] {
    return this.index.chains().map(chain => chain.map(i => this.changes[i]));
  }

  chainFor(changeId: string): DependencyChain {
    return this.index.chainFor(changeId).map(i => this.changes[i]);
  }

  /**
   * Every change that has to follow when this one is rebased
   */
  dependentsOf(changeId: string): ReconciledChange[] {
    const result: ReconciledChange[] = [];
    const queue = this.index.dependentsOf(changeId);

    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      const reconciled = this.get(next.changeId);
      if (reconciled) {
        result.push(reconciled);
      }
      queue.push(...this.index.dependentsOf(next.changeId));
    }

    return result;
  }

  /**
   * Count of changes per state
   */
  summary(): Record<ChangeState, number> {
    const counts: Record<ChangeState, number> = {
      NEW: 0,
      UP_TO_DATE: 0,
      NEEDS_REBASE: 0,
      DIVERGED: 0,
      REMOTE_AHEAD: 0,
    };
    for (const change of this.changes) {
      counts[change.classification.state]++;
    }
    return counts;
  }
}

export class ReconciliationEngine {
  constructor(
    private differ: PatchDiffer,
    private log: Logger = logger.child({ component: 'reconcile' })
  ) {}

  /**
   * Build the change index and classify every binding
   */
  async reconcile(localCommits: readonly LocalCommit[], remoteChanges: readonly Change[]): Promise<Reconciliation> {
    const done = this.log.time('reconciled', { commits: localCommits.length, changes: remoteChanges.length });
    const index = ChangeIndex.build(localCommits, remoteChanges);
    const byHash = new Map(localCommits.map(commit => [commit.hash, commit]));

    const changes: ReconciledChange[] = [];
    for (let i = 0; i < index.bindings.length; i++) {
      const binding = index.bindings[i];
      const classification = await this.classify(binding, ancestryOf(binding.commit, byHash));
      this.log.debug('classified', {
        changeId: binding.changeId,
        commit: binding.commit.hash.slice(0, 8),
        state: classification.state,
        departure: classification.departure,
      });
      changes.push({ ...binding, index: i, classification });
    }

    done();
    return new Reconciliation(index, changes);
  }

  /**
   * Classify one binding.
   * `ancestry` holds the local commit's first-parent ancestors, nearest first.
   */
  async classify(binding: ChangeBinding, ancestry: readonly string[]): Promise<Classification> {
    const { commit, change } = binding;
    const latest = change ? latestPatchSet(change) : null;

    if (!change || !latest) {
      return {
        state: 'NEW',
        latest: null,
        matchedPatchSet: null,
        departure: 'none',
        reason: change ? 'change has no patch sets' : 'not uploaded yet',
      };
    }

    const departure = departureOf(ancestry, latest.parent);

    if (commit.hash === latest.commit) {
      return { state: 'UP_TO_DATE', latest, matchedPatchSet: latest.number, departure, reason: 'matches the latest patch set' };
    }

    const parent = firstParent(commit);
    const olderByHash = change.patchSets.find(ps => ps.number !== latest.number && ps.commit === commit.hash);

    if (olderByHash) {
      // An interrupted rebase may already have uploaded this commit rebased
      if (parent !== null && latest.parent !== '' && parent !== latest.parent) {
        const rebased = (await this.differ.diff(commit.hash, parent)) === (await this.differ.diff(latest.commit, latest.parent));
        if (rebased) {
          return {
            state: 'NEEDS_REBASE',
            latest,
            matchedPatchSet: latest.number,
            departure,
            reason: `latest patch set is patch set ${olderByHash.number} on another parent`,
          };
        }
      }
      return {
        state: 'REMOTE_AHEAD',
        latest,
        matchedPatchSet: olderByHash.number,
        departure,
        reason: `local commit is patch set ${olderByHash.number} of ${latest.number}`,
      };
    }

    if (parent === null) {
      return { state: 'DIVERGED', latest, matchedPatchSet: null, departure, reason: 'root commit has nothing to diff against' };
    }
    if (latest.parent === '') {
      return { state: 'DIVERGED', latest, matchedPatchSet: null, departure, reason: 'latest patch set is a root commit' };
    }

    const localPatch = await this.differ.diff(commit.hash, parent);

    if (localPatch === (await this.differ.diff(latest.commit, latest.parent))) {
      if (parent !== latest.parent) {
        return {
          state: 'NEEDS_REBASE',
          latest,
          matchedPatchSet: latest.number,
          departure,
          reason: 'same changes on a different parent',
        };
      }
      return {
        state: 'DIVERGED',
        latest,
        matchedPatchSet: null,
        departure,
        reason: 'same changes and parent, amended commit metadata',
      };
    }

    const older = change.patchSets.filter(ps => ps.number !== latest.number && ps.parent !== '').reverse();
    for (const patchSet of older) {
      if (localPatch === (await this.differ.diff(patchSet.commit, patchSet.parent))) {
        return {
          state: 'REMOTE_AHEAD',
          latest,
          matchedPatchSet: patchSet.number,
          departure,
          reason: `local changes match patch set ${patchSet.number} of ${latest.number}`,
        };
      }
    }

    return { state: 'DIVERGED', latest, matchedPatchSet: null, departure, reason: 'local changes differ from every patch set' };
  }
}

/**
 * First-parent ancestors of a commit as far as local history is known,
 * nearest first. The boundary commit (parent of the oldest listed commit)
 * is included.
 */
export function ancestryOf(commit: LocalCommit, byHash: ReadonlyMap<string, LocalCommit>): string[] {
  const ancestry: string[] = [];
  const seen = new Set<string>();
  let parent = firstParent(commit);

  while (parent !== null && !seen.has(parent)) {
    ancestry.push(parent);
    seen.add(parent);
    const next = byHash.get(parent);
    parent = next ? firstParent(next) : null;
  }

  return ancestry;
}

function departureOf(ancestry: readonly string[], remoteParent: string): Departure {
  if (ancestry.length > 0 && ancestry[0] === remoteParent) return 'same-parent';
  if (ancestry.includes(remoteParent)) return 'parent-in-history';
  return 'parent-unknown';
}
