/**
 * Shared setup for commands: configuration, review client, working copy
 */

import { Account, Change, Reviewer } from '../core/types';
import { GerritConfig, loadConfig } from '../core/config';
import { GitLocalRepository } from '../core/local-repository';
import { GerritClient } from '../core/gerrit/client';
import { GitPushUploader } from '../core/gerrit/upload';
import { RemoteChangeClient } from '../core/remote';
import { WorkspaceRepository } from '../core/workspace';
import { logger } from '../utils/logger';

/**
 * Working copy operations the commands use beyond the snapshot
 */
export interface CommandRepository extends WorkspaceRepository {
  currentBranch(): string | null;
  moveBranch(branch: string, commit: string): void;
  dirtyFiles(): string[];
}

/**
 * Review server operations the commands use beyond the core's
 */
export interface CommandClient extends RemoteChangeClient {
  rebaseOnServer(changeId: string, base?: string): Promise<Change>;
  getPatch(changeId: string, revision?: string | number): Promise<string>;
  getReviewers(changeId: string): Promise<Reviewer[]>;
  addReviewer(changeId: string, reviewer: string, confirmed?: boolean): Promise<Reviewer[]>;
  deleteReviewer(changeId: string, account: string): Promise<Reviewer | null>;
  getAccount(account?: string): Promise<Account>;
}

export interface CommandContext {
  config: GerritConfig;
  client: CommandClient;
  /** Working copy, located on first use */
  repository(): CommandRepository;
}

export function createContext(cwd: string = process.cwd()): CommandContext {
  const { config, files } = loadConfig({ cwd });
  logger.debug('configuration loaded', { files, host: config.host, project: config.project });

  let repo: GitLocalRepository | null = null;
  const repository = (): GitLocalRepository => {
    if (!repo) {
      repo = GitLocalRepository.find(cwd);
    }
    return repo;
  };

  const uploader = new GitPushUploader(
    { push: (remote, commit, ref) => repository().push(remote, commit, ref) },
    config.remote
  );

  return {
    config,
    client: new GerritClient(config, { uploader }),
    repository,
  };
}
