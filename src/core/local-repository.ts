/**
 * Local repository access
 *
 * The core reads history and rewrites commits through the LocalRepository
 * interface. GitLocalRepository implements it on top of the git binary.
 */

import { spawnSync } from 'child_process';
import { Errors, ErrorCode, GclError } from './errors';
import { parseChangeId } from './change-id';
import { LocalCommit } from './types';
import { DiffSource } from './patch';

/**
 * Outcome of re-applying a commit on a new parent
 */
export type CherryPickResult =
  | { success: true; commit: LocalCommit }
  | { success: false; conflicts: string[] };

/**
 * Result of a git command that is allowed to fail
 */
export interface GitCommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * What the core needs from the working copy
 */
export interface LocalRepository {
  /** Commits in the range, oldest first, following first parents only */
  listCommits(range: string): LocalCommit[];
  getCommit(ref: string): LocalCommit;
  createCommit(tree: string, parent: string, message: string): LocalCommit;
  checkout(ref: string): void;
  cherryPick(commit: string, ontoParent: string): CherryPickResult;
}

// NUL between fields, RS between records; the message goes last
const FIELD = '\x00';
const RECORD = '\x1e';
const LOG_FORMAT = ['%H', '%P', '%T', '%an', '%ae', '%ad', '%B'].join('%x00') + '%x1e';

/**
 * Parse `git log --format=LOG_FORMAT --date=raw` output
 */
export function parseLog(output: string): LocalCommit[] {
  const commits: LocalCommit[] = [];

  for (const raw of output.split(RECORD)) {
    const record = raw.replace(/^\n/, '');
    if (!record.trim()) continue;

    const fields = record.split(FIELD);
    if (fields.length < 7) {
      throw Errors.invalidState(`Unexpected git log record: ${record.slice(0, 80)}`);
    }

    const [hash, parents, tree, name, email, date, ...rest] = fields;
    const message = rest.join(FIELD);
    const [seconds, timezone] = date.split(' ');

    commits.push({
      hash,
      parents: parents ? parents.split(' ') : [],
      tree,
      message,
      subject: message.split('\n')[0],
      changeId: parseChangeId(message),
      author: {
        name,
        email,
        timestamp: parseInt(seconds, 10),
        timezone: timezone ?? '+0000',
      },
    });
  }

  return commits;
}

/**
 * LocalRepository backed by the git binary
 */
export class GitLocalRepository implements LocalRepository, DiffSource {
  constructor(readonly workDir: string) {}

  /**
   * Find the working copy containing the given directory
   */
  static find(startPath: string = process.cwd()): GitLocalRepository {
    const result = runGit(['rev-parse', '--show-toplevel'], startPath);
    if (!result.success) {
      throw Errors.notARepository(startPath);
    }
    return new GitLocalRepository(result.stdout.trim());
  }

  listCommits(range: string): LocalCommit[] {
    const output = this.git(['log', '--first-parent', '--reverse', '--date=raw', `--format=${LOG_FORMAT}`, range]);
    return parseLog(output);
  }

  getCommit(ref: string): LocalCommit {
    const output = this.git(['show', '-s', '--date=raw', `--format=${LOG_FORMAT}`, ref]);
    const [commit] = parseLog(output);
    if (!commit) {
      throw Errors.invalidState(`No commit for ${ref}`);
    }
    return commit;
  }

  createCommit(tree: string, parent: string, message: string): LocalCommit {
    const hash = this.git(['commit-tree', tree, '-p', parent, '-F', '-'], message).trim();
    return this.getCommit(hash);
  }

  checkout(ref: string): void {
    this.git(['checkout', '--quiet', ref]);
  }

  cherryPick(commit: string, ontoParent: string): CherryPickResult {
    this.git(['checkout', '--quiet', '--detach', ontoParent]);

    const result = this.tryGit(['cherry-pick', '--allow-empty', commit]);
    if (result.success) {
      return { success: true, commit: this.getCommit('HEAD') };
    }

    const conflicts = this.git(['diff', '--name-only', '--diff-filter=U'])
      .split('\n')
      .map(line => line.trim())
      .filter(Boolean);

    this.tryGit(['cherry-pick', '--abort']);

    if (conflicts.length === 0) {
      throw Errors.gitFailed(['cherry-pick', commit], result.stderr.trim());
    }
    return { success: false, conflicts };
  }

  /**
   * Resolve a ref to a commit hash, null if it does not exist
   */
  resolve(ref: string): string | null {
    const result = this.tryGit(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    return result.success ? result.stdout.trim() : null;
  }

  hasCommit(hash: string): boolean {
    return this.tryGit(['cat-file', '-e', `${hash}^{commit}`]).success;
  }

  currentBranch(): string | null {
    const result = this.tryGit(['symbolic-ref', '--quiet', '--short', 'HEAD']);
    return result.success ? result.stdout.trim() : null;
  }

  moveBranch(branch: string, commit: string): void {
    this.git(['update-ref', `refs/heads/${branch}`, commit]);
  }

  /**
   * Paths with uncommitted modifications to tracked files
   */
  dirtyFiles(): string[] {
    return this.git(['status', '--porcelain', '--untracked-files=no'])
      .split('\n')
      .filter(line => line.trim())
      .map(line => line.slice(3));
  }

  fetch(remote: string, refs: string[]): void {
    if (refs.length === 0) return;
    this.git(['fetch', '--quiet', remote, ...refs]);
  }

  push(remote: string, commit: string, ref: string): GitCommandResult {
    return this.tryGit(['push', '--porcelain', remote, `${commit}:${ref}`]);
  }

  diff(commit: string, parent: string): string {
    return this.git(['diff', '--no-color', '--no-ext-diff', '--full-index', '--binary', parent, commit]);
  }

  private git(args: string[], input?: string): string {
    const result = runGit(args, this.workDir, input);
    if (!result.success) {
      throw Errors.gitFailed(args, result.stderr.trim());
    }
    return result.stdout;
  }

  private tryGit(args: string[]): GitCommandResult {
    return runGit(args, this.workDir);
  }
}

function runGit(args: string[], cwd: string, input?: string): GitCommandResult {
  const result = spawnSync('git', args, {
    cwd,
    input,
    encoding: 'utf8',
    maxBuffer: 64 * 1024 * 1024,
  });

  if (result.error) {
    throw new GclError(`Cannot run git: ${result.error.message}`, ErrorCode.GIT_FAILED, ['Install git and make sure it is on PATH'], { args });
  }

  return {
    success: result.status === 0,
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.status ?? -1,
  };
}
