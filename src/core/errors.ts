/**
 * Error handling for gcl
 * Structured errors with a machine-readable code, hints and context
 */

/**
 * Error codes for the different failure kinds
 */
export enum ErrorCode {
  // Reconciliation errors
  AMBIGUOUS_CHANGE_ID = 'AMBIGUOUS_CHANGE_ID',
  REMOTE_AHEAD = 'REMOTE_AHEAD',
  DIVERGED = 'DIVERGED',
  CHANGE_CLOSED = 'CHANGE_CLOSED',
  NON_LINEAR_HISTORY = 'NON_LINEAR_HISTORY',
  MISSING_CHANGE_ID = 'MISSING_CHANGE_ID',
  NOT_UPLOADED = 'NOT_UPLOADED',

  // Rebase / submit errors
  CONFLICT = 'CONFLICT',
  NOT_READY = 'NOT_READY',

  // Remote errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  AUTH_FAILURE = 'AUTH_FAILURE',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_RESPONSE = 'INVALID_RESPONSE',

  // Local errors
  GIT_FAILED = 'GIT_FAILED',
  CONFIG_ERROR = 'CONFIG_ERROR',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INVALID_STATE = 'INVALID_STATE',
  OPERATION_FAILED = 'OPERATION_FAILED',
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  [key: string]: unknown;
}

/**
 * Main error class for gcl
 */
export class GclError extends Error {
  public readonly code: ErrorCode;
  public readonly suggestions: string[];
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode,
    suggestions: string[] = [],
    context: ErrorContext = {}
  ) {
    super(message);
    this.name = 'GclError';
    this.code = code;
    this.suggestions = suggestions;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GclError);
    }
  }

  /**
   * Format error for display
   *
   * Output format:
   *   error [CODE]: [Short, clear description]
   *
   *   hint:
   *     [Command or action]
   */
  format(colors: boolean = true): string {
    const red = colors ? '\x1b[31m' : '';
    const yellow = colors ? '\x1b[33m' : '';
    const cyan = colors ? '\x1b[36m' : '';
    const dim = colors ? '\x1b[2m' : '';
    const reset = colors ? '\x1b[0m' : '';

    let output = `${red}error${reset} [${this.code}]: ${this.message}\n`;

    if (typeof this.context.affectedFiles === 'string') {
      output += `${dim}  Affected: ${this.context.affectedFiles}${reset}\n`;
    }

    if (this.suggestions.length > 0) {
      output += `\n${yellow}hint${reset}:\n`;
      for (const suggestion of this.suggestions) {
        if (suggestion.includes('#') || suggestion.startsWith('gcl ') || suggestion.startsWith('git ')) {
          output += `  ${cyan}${suggestion}${reset}\n`;
        } else {
          output += `  ${dim}${suggestion}${reset}\n`;
        }
      }
    }

    return output;
  }

  /**
   * Create error as JSON for programmatic use
   */
  toJSON(): object {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestions: this.suggestions,
      context: this.context,
    };
  }
}

/**
 * Wrap anything thrown into a GclError, keeping GclErrors as they are
 */
export function toGclError(error: unknown, code: ErrorCode = ErrorCode.OPERATION_FAILED): GclError {
  if (error instanceof GclError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GclError(message, code);
}

/**
 * Find similar strings using Levenshtein distance
 */
export function findSimilar(input: string, candidates: string[], maxDistance: number = 3): string[] {
  const results: { candidate: string; distance: number }[] = [];

  for (const candidate of candidates) {
    const distance = levenshteinDistance(input.toLowerCase(), candidate.toLowerCase());
    if (distance <= maxDistance) {
      results.push({ candidate, distance });
    }
  }

  return results
    .sort((a, b) => a.distance - b.distance)
    .slice(0, 3)
    .map(r => r.candidate);
}

/**
 * Calculate Levenshtein distance between two strings
 */
function levenshteinDistance(a: string, b: string): number {
  let previous: number[] = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const current: number[] = [i];
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        current[j] = previous[j - 1];
      } else {
        current[j] = Math.min(
          previous[j - 1] + 1, // substitution
          current[j - 1] + 1,  // insertion
          previous[j] + 1      // deletion
        );
      }
    }
    previous = current;
  }

  return previous[a.length];
}

function listFiles(files: string[]): string {
  return files.length <= 5
    ? files.join(', ')
    : `${files.slice(0, 5).join(', ')} (+${files.length - 5} more)`;
}

/**
 * Factory functions for common errors
 */
export const Errors = {
  ambiguousChangeId(changeId: string, commits: string[]): GclError {
    return new GclError(
      `Change-Id ${changeId} is used by more than one commit: ${commits.map(c => c.slice(0, 8)).join(', ')}`,
      ErrorCode.AMBIGUOUS_CHANGE_ID,
      [
        'git rebase -i <base>    # Squash or reword one of the commits',
        'Remove the Change-Id trailer from one commit so a new one is generated',
      ],
      { changeId, commits }
    );
  },

  ambiguousRemoteChange(changeId: string, ids: string[]): GclError {
    return new GclError(
      `Change-Id ${changeId} matches ${ids.length} changes on the server: ${ids.join(', ')}`,
      ErrorCode.AMBIGUOUS_CHANGE_ID,
      ['Set "project" in .gitreview so the lookup is limited to one project'],
      { changeId, ids }
    );
  },

  remoteAhead(changeId: string, localPatchSet: number | null, latestPatchSet: number): GclError {
    const local = localPatchSet === null ? 'an older revision' : `patch set ${localPatchSet}`;
    return new GclError(
      `Change ${changeId} has patch set ${latestPatchSet} on the server, but the local commit is ${local}`,
      ErrorCode.REMOTE_AHEAD,
      [
        'git fetch <remote> <patch-set-ref> && git cherry-pick FETCH_HEAD    # Bring the latest patch set in',
        'gcl status    # Review the state of every change',
      ],
      { changeId, localPatchSet, latestPatchSet }
    );
  },

  diverged(changeId: string, commit: string): GclError {
    return new GclError(
      `Change ${changeId}: local commit ${commit.slice(0, 8)} differs from the latest patch set in content`,
      ErrorCode.DIVERGED,
      [
        'Upload the local version first, or reset to the latest patch set',
        'gcl status    # Review the state of every change',
      ],
      { changeId, commit }
    );
  },

  changeClosed(changeId: string, status: string): GclError {
    return new GclError(
      `Change ${changeId} is ${status.toLowerCase()} and cannot receive new patch sets`,
      ErrorCode.CHANGE_CLOSED,
      ['git rebase -i <base>    # Drop the commit from the local branch'],
      { changeId, status }
    );
  },

  nonLinearHistory(changeId: string, dependants: string[]): GclError {
    return new GclError(
      `Change ${changeId} has ${dependants.length} dependent changes (${dependants.join(', ')}); cannot pick one chain`,
      ErrorCode.NON_LINEAR_HISTORY,
      ['Rebase each branch of the stack separately'],
      { changeId, dependants }
    );
  },

  missingChangeId(changeId: string, commit: string, subject: string): GclError {
    return new GclError(
      `Change ${changeId} sits on commit ${commit.slice(0, 8)} ("${subject}"), which has no Change-Id`,
      ErrorCode.MISSING_CHANGE_ID,
      [
        'git rebase -i <base>    # Reword that commit so the commit-msg hook adds a Change-Id',
        'Or move the commit above the stack',
      ],
      { changeId, commit }
    );
  },

  notUploaded(changeId: string, below: string): GclError {
    return new GclError(
      `Change ${changeId} depends on ${below}, which is not on the server yet; uploading ${changeId} would create it`,
      ErrorCode.NOT_UPLOADED,
      [
        `git push <remote> <commit>:refs/for/<branch>    # Upload ${below} first`,
        'gcl status    # Review the state of every change',
      ],
      { changeId, below }
    );
  },

  reviewerRejected(changeId: string, reviewer: string, details: string): GclError {
    return new GclError(
      `Cannot add ${reviewer} as reviewer of ${changeId}: ${details}`,
      ErrorCode.OPERATION_FAILED,
      [],
      { changeId, reviewer, details }
    );
  },

  confirmationRequired(changeId: string, reviewer: string, details: string): GclError {
    return new GclError(
      `Adding ${reviewer} to ${changeId} needs confirmation: ${details}`,
      ErrorCode.INVALID_STATE,
      [`gcl assign ${changeId} +${reviewer} --confirm    # Add every member anyway`],
      { changeId, reviewer, details }
    );
  },

  accountNotFound(account: string): GclError {
    return new GclError(
      `No such account: ${account}`,
      ErrorCode.NOT_FOUND,
      ['Use a username, an email address or "self"'],
      { account }
    );
  },

  conflict(paths: string[], changeId?: string): GclError {
    return new GclError(
      `Conflict in ${paths.length} file(s)${changeId ? ` while rebasing ${changeId}` : ''}`,
      ErrorCode.CONFLICT,
      [
        'Resolve the conflict by hand, amend the commit, then run the command again',
      ],
      { paths, changeId, affectedFiles: listFiles(paths) }
    );
  },

  serverConflict(changeId: string, details: string): GclError {
    return new GclError(
      `Change ${changeId} cannot be merged with its target: ${details}`,
      ErrorCode.CONFLICT,
      [`gcl rebase ${changeId}    # Rebase locally and resolve the conflict`],
      { changeId, details }
    );
  },

  notReady(changeId: string, details?: string): GclError {
    return new GclError(
      `Change ${changeId} is not ready to be submitted${details ? `: ${details}` : ''}`,
      ErrorCode.NOT_READY,
      [`gcl review ${changeId}    # Check reviews and submit requirements`],
      { changeId, details }
    );
  },

  changeNotFound(changeId: string): GclError {
    return new GclError(
      `No such change: ${changeId}`,
      ErrorCode.NOT_FOUND,
      [
        'gcl list    # List your open changes',
        'Check that you are authenticated (username/password in .gitreview)',
      ],
      { changeId }
    );
  },

  networkError(url: string, details?: string): GclError {
    return new GclError(
      `Failed to connect to '${url}'${details ? `: ${details}` : ''}`,
      ErrorCode.NETWORK_ERROR,
      [
        'Check your network connection',
        'Verify the host in .gitreview',
      ],
      { url, details }
    );
  },

  authenticationFailed(url: string, details?: string): GclError {
    return new GclError(
      `Authentication failed for '${url}'${details ? `: ${details}` : ''}`,
      ErrorCode.AUTH_FAILURE,
      [
        'Check username and password in .gitreview',
        'Generate a new HTTP password in the Gerrit settings page',
      ],
      { url, details }
    );
  },

  invalidResponse(what: string, details?: string): GclError {
    return new GclError(
      `Unexpected response from the server for ${what}${details ? `: ${details}` : ''}`,
      ErrorCode.INVALID_RESPONSE,
      [],
      { what, details }
    );
  },

  notARepository(path: string): GclError {
    return new GclError(
      `Not a git repository (or any parent up to root): ${path}`,
      ErrorCode.GIT_FAILED,
      ['cd <repo>    # Run gcl from inside a git working copy'],
      { path }
    );
  },

  uncommittedChanges(files: string[]): GclError {
    return new GclError(
      'You have uncommitted changes that a rebase would overwrite',
      ErrorCode.INVALID_STATE,
      [
        'git stash              # Stash your changes',
        'git commit --amend     # Or fold them into the last commit',
      ],
      { files, affectedFiles: listFiles(files) }
    );
  },

  gitFailed(args: string[], stderr: string): GclError {
    return new GclError(
      `git ${args.join(' ')} failed${stderr ? `: ${stderr}` : ''}`,
      ErrorCode.GIT_FAILED,
      [],
      { args, stderr }
    );
  },

  config(message: string, file?: string): GclError {
    return new GclError(
      message,
      ErrorCode.CONFIG_ERROR,
      [
        'Create a .gitreview file with a [gerrit] section and a host key',
      ],
      { file }
    );
  },

  invalidArgument(arg: string, expected: string): GclError {
    return new GclError(
      `Invalid argument: ${arg}. Expected: ${expected}`,
      ErrorCode.INVALID_ARGUMENT,
      [],
      { argument: arg, expected }
    );
  },

  invalidState(message: string, context: ErrorContext = {}): GclError {
    return new GclError(message, ErrorCode.INVALID_STATE, [], context);
  },
};
