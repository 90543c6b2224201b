/**
 * Workspace snapshot
 *
 * Gathers everything a command needs to reason about the current branch:
 * the upstream base, the local commits above it, the server's changes for
 * their Change-Ids, and the reconciliation of both.
 */

import { Change, LocalCommit } from './types';
import { Errors } from './errors';
import { LocalRepository } from './local-repository';
import { DiffSource, LocalPatchDiffer, PatchDiffer } from './patch';
import { RemoteChangeClient } from './remote';
import { GerritConfig } from './config';
import { Reconciliation, ReconciliationEngine } from './reconcile';
import { Logger, logger } from '../utils/logger';

/**
 * What a snapshot needs from the working copy
 */
export interface WorkspaceRepository extends LocalRepository, DiffSource {
  resolve(ref: string): string | null;
  hasCommit(hash: string): boolean;
  fetch(remote: string, refs: string[]): void;
}

export interface WorkspaceSnapshot {
  /** Remote-tracking ref the branch is compared against, e.g. gerrit/master */
  upstream: string;
  /** Commit the upstream ref points at */
  base: string;
  /** Local commits above the base, oldest first */
  commits: LocalCommit[];
  changes: Change[];
  reconciliation: Reconciliation;
}

export interface SnapshotOptions {
  /** Fetch the upstream branch first (default true) */
  fetch?: boolean;
  differ?: PatchDiffer;
  log?: Logger;
}

/**
 * Remote-tracking ref for the configured branch
 */
export function upstreamRef(config: GerritConfig): string {
  return `${config.remote}/${config.branch}`;
}

export async function loadSnapshot(
  repo: WorkspaceRepository,
  client: RemoteChangeClient,
  config: GerritConfig,
  options: SnapshotOptions = {}
): Promise<WorkspaceSnapshot> {
  const log = options.log ?? logger.child({ component: 'workspace' });
  const upstream = upstreamRef(config);

  if (options.fetch ?? true) {
    log.debug('fetching upstream', { upstream });
    repo.fetch(config.remote, [`+refs/heads/${config.branch}:refs/remotes/${upstream}`]);
  }

  const base = repo.resolve(`refs/remotes/${upstream}`);
  if (!base) {
    throw Errors.invalidState(`Upstream ${upstream} does not exist`, { upstream });
  }

  const commits = repo.listCommits(`${base}..HEAD`);
  const changeIds = [...new Set(commits.map(commit => commit.changeId).filter((id): id is string => id !== null))];

  const changes =
    changeIds.length > 0
      ? await client.listChanges({
          changeIds,
          project: config.project ?? undefined,
          branch: config.branch,
        })
      : [];

  // The differ needs every patch set's commit locally
  const missing = changes
    .flatMap(change => change.patchSets)
    .filter(patchSet => patchSet.ref !== undefined && !repo.hasCommit(patchSet.commit))
    .map(patchSet => patchSet.ref)
    .filter((ref): ref is string => ref !== undefined);

  if (missing.length > 0) {
    log.debug('fetching patch sets', { count: missing.length });
    repo.fetch(config.remote, missing);
  }

  const engine = new ReconciliationEngine(options.differ ?? new LocalPatchDiffer(repo), log.child({ component: 'reconcile' }));
  const reconciliation = await engine.reconcile(commits, changes);

  log.info('snapshot', { upstream, commits: commits.length, changes: changes.length });
  return { upstream, base, commits, changes, reconciliation };
}
