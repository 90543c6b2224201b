/**
 * Change Index
 *
 * Maps Change-Ids to the local commit and remote change they bind together.
 * Bindings live in one flat array; lookups and dependency edges are indices
 * into it, so changes, patch sets and bindings never reference each other.
 *
 *   bindings:  [ I1 -> C1 ] [ I2 -> C2 ] [ I3 -> C3 ]
 *   parentOf:   null          0            1
 *   childrenOf: [1]           [2]          []
 */

import { Change, LocalCommit, firstParent } from './types';
import { Errors } from './errors';

/**
 * A local commit paired with the change it belongs to.
 * `change` is null when the server does not know the Change-Id yet.
 */
export interface ChangeBinding {
  changeId: string;
  commit: LocalCommit;
  change: Change | null;
  /** Local commit without a Change-Id this commit sits on, if any */
  unboundParent: LocalCommit | null;
}

export class ChangeIndex {
  private readonly byChangeId = new Map<string, number>();
  private readonly byCommit = new Map<string, number>();
  private readonly parentOf: (number | null)[] = [];
  private readonly childrenOf: number[][] = [];

  private constructor(
    /** Bindings in local history order, oldest first */
    readonly bindings: readonly ChangeBinding[],
    /** Local commits without a Change-Id (not uploaded yet) */
    readonly unbound: readonly LocalCommit[],
    /** Remote changes no local commit refers to */
    readonly untracked: readonly Change[]
  ) {
    bindings.forEach((binding, index) => {
      this.byChangeId.set(binding.changeId, index);
      this.byCommit.set(binding.commit.hash, index);
      this.childrenOf.push([]);
    });

    bindings.forEach((binding, index) => {
      const parent = firstParent(binding.commit);
      const parentIndex = parent === null ? undefined : this.byCommit.get(parent);
      if (parentIndex === undefined) {
        this.parentOf.push(null);
      } else {
        this.parentOf.push(parentIndex);
        this.childrenOf[parentIndex].push(index);
      }
    });
  }

  /**
   * Build the index from local history and the remote changes.
   * Throws AMBIGUOUS_CHANGE_ID when a Change-Id appears on two local commits
   * or on two remote changes.
   */
  static build(localCommits: readonly LocalCommit[], remoteChanges: readonly Change[]): ChangeIndex {
    const remote = new Map<string, Change>();
    for (const change of remoteChanges) {
      const existing = remote.get(change.changeId);
      if (existing && existing.id !== change.id) {
        throw Errors.ambiguousRemoteChange(change.changeId, [existing.id, change.id]);
      }
      remote.set(change.changeId, change);
    }

    const seen = new Map<string, LocalCommit>();
    const bindings: ChangeBinding[] = [];
    const unbound = new Map<string, LocalCommit>();

    for (const commit of localCommits) {
      if (commit.changeId === null) {
        unbound.set(commit.hash, commit);
        continue;
      }

      const previous = seen.get(commit.changeId);
      if (previous) {
        throw Errors.ambiguousChangeId(commit.changeId, [previous.hash, commit.hash]);
      }
      seen.set(commit.changeId, commit);

      bindings.push({
        changeId: commit.changeId,
        commit,
        change: remote.get(commit.changeId) ?? null,
        unboundParent: unbound.get(firstParent(commit) ?? '') ?? null,
      });
    }

    const untracked = [...remote.values()].filter(change => !seen.has(change.changeId));

    return new ChangeIndex(bindings, [...unbound.values()], untracked);
  }

  get size(): number {
    return this.bindings.length;
  }

  indexOf(changeId: string): number | null {
    return this.byChangeId.get(changeId) ?? null;
  }

  get(changeId: string): ChangeBinding | null {
    const index = this.indexOf(changeId);
    return index === null ? null : this.bindings[index];
  }

  findByCommit(hash: string): ChangeBinding | null {
    const index = this.byCommit.get(hash);
    return index === undefined ? null : this.bindings[index];
  }

  /**
   * The binding this change is built on, if it is bound too
   */
  dependencyOf(changeId: string): ChangeBinding | null {
    const index = this.indexOf(changeId);
    if (index === null) return null;
    const parent = this.parentOf[index];
    return parent === null ? null : this.bindings[parent];
  }

  /**
   * Bindings built directly on this change
   */
  dependentsOf(changeId: string): ChangeBinding[] {
    const index = this.indexOf(changeId);
    if (index === null) return [];
    return this.childrenOf[index].map(child => this.bindings[child]);
  }

  /**
   * Every maximal linear chain, each as binding indices from base to tip.
   * A change with more than one dependent is refused.
   */
  chains(): number[][] {
    const result: number[][] = [];
    this.parentOf.forEach((parent, index) => {
      if (parent === null) {
        result.push(this.walkUp(index));
      }
    });
    return result;
  }

  /**
   * The chain containing the change, from its base to its tip
   */
  chainFor(changeId: string): number[] {
    let index = this.indexOf(changeId);
    if (index === null) {
      throw Errors.changeNotFound(changeId);
    }

    let parent = this.parentOf[index];
    while (parent !== null) {
      index = parent;
      parent = this.parentOf[index];
    }
    return this.walkUp(index);
  }

  private walkUp(root: number): number[] {
    const chain = [root];
    let current = root;

    for (;;) {
      const children = this.childrenOf[current];
      if (children.length === 0) break;
      if (children.length > 1) {
        throw Errors.nonLinearHistory(
          this.bindings[current].changeId,
          children.map(child => this.bindings[child].changeId)
        );
      }
      current = children[0];
      chain.push(current);
    }

    return chain;
  }
}
