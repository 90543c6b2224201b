/**
 * Review Command
 *
 * Shows the details of one or more changes: metadata, patch sets and votes.
 */

import { Account, Change, Reviewer, latestPatchSet } from '../core/types';
import { Errors } from '../core/errors';
import { colors } from '../utils/colors';
import { CommandContext, createContext } from './context';
import { changesFromArgs } from './change-specs';

export const REVIEW_HELP = `
gcl review - Show change details

Usage: gcl review <change>... [--patch]

A change is a number (12345), a range of numbers (12345..12350)
or a Change-Id (I8473b95934b5732ac55d26311a706c9c2bde9940).

Options:
  --patch     Also print the patch of the latest patch set

Examples:
  gcl review 12345
  gcl review 12345..12347 --patch
`;

export function formatAccount(account: Account): string {
  const name = account.name ?? account.username ?? (account.accountId !== undefined ? `#${account.accountId}` : 'unknown');
  return account.email ? `${name} <${account.email}>` : name;
}

/**
 * "Code-Review=+2 Verified=+1", labels sorted
 */
export function formatVotes(reviewer: Reviewer): string {
  return Object.keys(reviewer.approvals)
    .sort()
    .map(label => `${label}=${reviewer.approvals[label]}`)
    .join(' ');
}

export function formatChange(change: Change, reviewers: Reviewer[]): string[] {
  const lines: string[] = [];
  const latest = latestPatchSet(change);

  lines.push(colors.bold(`Change ${change.number}`) + ` ${colors.dim(change.changeId)}`);
  lines.push(`  Subject:     ${change.subject}`);
  lines.push(`  Status:      ${change.status}`);
  lines.push(`  Owner:       ${formatAccount(change.owner)}`);
  lines.push(`  Project:     ${change.project}`);
  lines.push(`  Branch:      ${change.branch}`);

  if (latest) {
    lines.push(`  Patch sets:  ${change.patchSets.length} (latest ${colors.yellow(latest.commit.slice(0, 8))}, ${latest.createdAt.toISOString()})`);
  } else {
    lines.push('  Patch sets:  none');
  }

  if (reviewers.length > 0) {
    lines.push('  Reviewers:');
    for (const reviewer of reviewers) {
      const votes = formatVotes(reviewer);
      lines.push(`    ${formatAccount(reviewer.account)}${votes ? `  ${votes}` : ''}`);
    }
  }

  return lines;
}

export async function handleReview(args: string[], context: CommandContext = createContext()): Promise<void> {
  const withPatch = args.includes('--patch');
  const unknown = args.filter(arg => arg.startsWith('-') && arg !== '--patch');
  if (unknown.length > 0) {
    throw Errors.invalidArgument(unknown[0], '--patch');
  }

  const changes = changesFromArgs(args.filter(arg => !arg.startsWith('-')), 'gcl review <change>...');

  for (let i = 0; i < changes.length; i++) {
    const change = await context.client.getChange(changes[i]);
    if (!change) {
      throw Errors.changeNotFound(changes[i]);
    }

    const reviewers = await context.client.getReviewers(changes[i]);
    if (i > 0) console.log('');
    for (const line of formatChange(change, reviewers)) {
      console.log(line);
    }

    if (withPatch) {
      console.log('');
      console.log(await context.client.getPatch(changes[i], 'current'));
    }
  }
}
