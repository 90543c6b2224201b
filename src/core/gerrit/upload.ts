/**
 * Patch-set upload through git push to refs/for/<branch>
 */

import { Errors, ErrorCode, GclError } from '../errors';
import { GitCommandResult } from '../local-repository';
import { Logger, logger } from '../../utils/logger';

export interface PatchSetUploader {
  /** Push a commit for review on a branch; throws a classified GclError */
  upload(commit: string, branch: string): void;
}

/**
 * The part of the local repository an upload needs
 */
export interface PushTarget {
  push(remote: string, commit: string, ref: string): GitCommandResult;
}

const AUTH_PATTERNS = [
  /authentication failed/i,
  /permission denied/i,
  /could not read username/i,
  /returned error: 40[13]/i,
  /prohibited by gerrit/i,
];

const NETWORK_PATTERNS = [
  /could not resolve host/i,
  /connection refused/i,
  /connection reset/i,
  /timed out/i,
  /network is unreachable/i,
  /unable to access/i,
  /could not read from remote repository/i,
];

/**
 * Map git push stderr to an error code
 */
export function classifyPushError(stderr: string): ErrorCode {
  if (AUTH_PATTERNS.some(pattern => pattern.test(stderr))) {
    return ErrorCode.AUTH_FAILURE;
  }
  if (NETWORK_PATTERNS.some(pattern => pattern.test(stderr))) {
    return ErrorCode.NETWORK_ERROR;
  }
  return ErrorCode.CONFLICT;
}

export class GitPushUploader implements PatchSetUploader {
  constructor(
    private target: PushTarget,
    private remote: string,
    private log: Logger = logger.child({ component: 'upload' })
  ) {}

  upload(commit: string, branch: string): void {
    const ref = `refs/for/${branch}`;
    const result = this.target.push(this.remote, commit, ref);

    if (result.success) {
      this.log.debug('pushed', { commit: commit.slice(0, 8), ref });
      return;
    }

    // Gerrit refuses a commit it already has as a patch set
    if (/no new changes/i.test(result.stderr)) {
      this.log.debug('already uploaded', { commit: commit.slice(0, 8), ref });
      return;
    }

    const stderr = result.stderr.trim();
    const url = `${this.remote} ${ref}`;

    switch (classifyPushError(stderr)) {
      case ErrorCode.AUTH_FAILURE:
        throw Errors.authenticationFailed(url, stderr);
      case ErrorCode.NETWORK_ERROR:
        throw Errors.networkError(url, stderr);
      default:
        throw new GclError(
          `Push of ${commit.slice(0, 8)} to ${ref} was rejected${stderr ? `: ${lastLine(stderr)}` : ''}`,
          ErrorCode.CONFLICT,
          ['gcl status    # Check whether the change moved on the server'],
          { commit, ref, stderr }
        );
    }
  }
}

function lastLine(text: string): string {
  const lines = text.split('\n').filter(line => line.trim());
  return lines.length > 0 ? lines[lines.length - 1].trim() : text;
}
