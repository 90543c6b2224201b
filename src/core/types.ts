/**
 * Change states as reported by the review server
 */
export type ChangeStatus = 'NEW' | 'MERGED' | 'ABANDONED';

/**
 * Author/Committer information
 */
export interface Author {
  name: string;
  email: string;
  timestamp: number;
  timezone: string;
}

/**
 * A review server account
 */
export interface Account {
  accountId?: number;
  name?: string;
  email?: string;
  username?: string;
}

/**
 * One revision of a change
 */
export interface PatchSet {
  /** 1-based, strictly increasing within a change */
  number: number;
  /** Commit hash of the revision */
  commit: string;
  /** First parent of the revision's commit, empty for a root commit */
  parent: string;
  createdAt: Date;
  /** Fetchable ref, e.g. refs/changes/45/12345/2 */
  ref?: string;
  uploader?: Account;
}

/**
 * A remote review unit
 */
export interface Change {
  /** Server triplet: project~branch~Change-Id */
  id: string;
  /** Stable Change-Id, unchanged across patch sets */
  changeId: string;
  /** Server sequential number */
  number: number;
  project: string;
  branch: string;
  subject: string;
  status: ChangeStatus;
  owner: Account;
  /** Ordered by patch set number */
  patchSets: PatchSet[];
  created?: Date;
  updated?: Date;
  mergeable?: boolean;
  submittable?: boolean;
}

/**
 * A commit of the local working history
 */
export interface LocalCommit {
  hash: string;
  parents: string[];
  tree: string;
  message: string;
  subject: string;
  /** Parsed from the commit message trailer */
  changeId: string | null;
  author: Author;
}

/**
 * A reviewer and their votes on a change
 */
export interface Reviewer {
  account: Account;
  approvals: Record<string, string>;
}

/**
 * Filter for change queries
 */
export interface ChangeFilter {
  status?: string;
  owner?: string;
  branch?: string;
  project?: string;
  watched?: boolean;
  changeIds?: string[];
  limit?: number;
}

/**
 * Latest patch set of a change, or null for a change without any
 */
export function latestPatchSet(change: Change): PatchSet | null {
  return change.patchSets.length > 0 ? change.patchSets[change.patchSets.length - 1] : null;
}

/**
 * First parent of a commit, null for a root commit
 */
export function firstParent(commit: LocalCommit): string | null {
  return commit.parents.length > 0 ? commit.parents[0] : null;
}
