/**
 * Assign Command
 *
 * Adds (+name) and removes (-name) reviewers on one or more changes.
 * A reviewer the server refuses is reported and the others still go through.
 */

import { Change, Reviewer } from '../core/types';
import { ErrorCode, Errors, GclError } from '../core/errors';
import { colors } from '../utils/colors';
import { CommandContext, createContext } from './context';
import { changesFromArgs } from './change-specs';
import { formatAccount } from './review';

export const ASSIGN_HELP = `
gcl assign - Add or remove reviewers

Usage: gcl assign <change>... [+<reviewer>]... [-<reviewer>]... [--confirm]

A reviewer is a username, an email address or a group name.

Options:
  --confirm   Add every member of a large group without asking

Examples:
  gcl assign 12345 +alice -bob
  gcl assign 12340..12342 +core-reviewers --confirm
`;

const USAGE = 'gcl assign <change>... +<reviewer> -<reviewer>';

// Failures that concern one reviewer; anything else stops the command
const REVIEWER_ERRORS: readonly ErrorCode[] = [ErrorCode.OPERATION_FAILED, ErrorCode.INVALID_STATE];

export interface AssignOptions {
  changes: string[];
  add: string[];
  remove: string[];
  confirm: boolean;
}

export function parseAssignArgs(args: string[]): AssignOptions {
  const specs: string[] = [];
  const options: Omit<AssignOptions, 'changes'> = { add: [], remove: [], confirm: false };

  for (const arg of args) {
    if (arg === '--confirm') {
      options.confirm = true;
    } else if (arg.startsWith('--')) {
      throw Errors.invalidArgument(arg, '--confirm');
    } else if (arg.startsWith('+') || arg.startsWith('-')) {
      const name = arg.slice(1);
      if (!name) {
        throw Errors.invalidArgument(arg, 'a reviewer name after + or -');
      }
      (arg.startsWith('+') ? options.add : options.remove).push(name);
    } else {
      specs.push(arg);
    }
  }

  if (options.add.length === 0 && options.remove.length === 0) {
    throw Errors.invalidArgument(args.join(' ') || '(none)', `reviewers to add (+name) or remove (-name). Usage: ${USAGE}`);
  }

  return { changes: changesFromArgs(specs, USAGE), ...options };
}

export function formatAssignment(change: Change, added: Reviewer[], removed: Reviewer[]): string[] {
  const lines = [`${colors.bold(`Change ${change.number}`)}: ${change.subject}`];

  if (added.length === 0 && removed.length === 0) {
    lines.push(colors.dim('  nothing to do (reviewers already up to date)'));
    return lines;
  }

  for (const reviewer of added) {
    lines.push(`  ${colors.green('+')} ${formatAccount(reviewer.account)}`);
  }
  for (const reviewer of removed) {
    lines.push(`  ${colors.red('-')} ${formatAccount(reviewer.account)}`);
  }
  return lines;
}

export async function handleAssign(args: string[], context: CommandContext = createContext()): Promise<void> {
  const options = parseAssignArgs(args);
  let failures = 0;

  const reportFailure = (change: Change, what: string, error: unknown): void => {
    if (!(error instanceof GclError) || !REVIEWER_ERRORS.includes(error.code)) {
      throw error;
    }
    failures++;
    console.error(colors.yellow('warning: ') + `${change.number}: cannot ${what}: ${error.message}`);
  };

  for (let i = 0; i < options.changes.length; i++) {
    const spec = options.changes[i];
    const change = await context.client.getChange(spec);
    if (!change) {
      throw Errors.changeNotFound(spec);
    }

    const added: Reviewer[] = [];
    const removed: Reviewer[] = [];

    for (const reviewer of options.add) {
      try {
        added.push(...(await context.client.addReviewer(spec, reviewer, options.confirm)));
      } catch (error) {
        reportFailure(change, `add ${reviewer}`, error);
      }
    }

    for (const reviewer of options.remove) {
      try {
        const deleted = await context.client.deleteReviewer(spec, reviewer);
        if (deleted) {
          removed.push(deleted);
        }
      } catch (error) {
        reportFailure(change, `remove ${reviewer}`, error);
      }
    }

    if (i > 0) console.log('');
    for (const line of formatAssignment(change, added, removed)) {
      console.log(line);
    }
  }

  if (failures > 0) {
    throw new GclError(`${failures} reviewer update(s) failed`, ErrorCode.OPERATION_FAILED, [], { failures });
  }
}
