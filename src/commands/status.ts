/**
 * Status Command
 *
 * Reconciliation report for the current branch: every local change above
 * the upstream branch with its state on the server.
 */

import { Errors } from '../core/errors';
import { ChangeState, ReconciledChange } from '../core/reconcile';
import { loadSnapshot, WorkspaceSnapshot } from '../core/workspace';
import { colors } from '../utils/colors';
import { CommandContext, createContext } from './context';

export const STATUS_HELP = `
gcl status - Show how local changes relate to the server

Usage: gcl status

States:
  up to date     the local commit is the latest patch set
  needs rebase   same change, uploaded on an older base
  new            not uploaded yet
  diverged       local content differs from the latest patch set
  remote ahead   the server has a newer patch set than the local commit
`;

const STATE_LABELS: Record<ChangeState, [string, (s: string) => string]> = {
  UP_TO_DATE: ['up to date', colors.green],
  NEEDS_REBASE: ['needs rebase', colors.yellow],
  NEW: ['new', colors.cyan],
  DIVERGED: ['diverged', colors.red],
  REMOTE_AHEAD: ['remote ahead', colors.magenta],
};

const STATE_ORDER: ChangeState[] = ['UP_TO_DATE', 'NEEDS_REBASE', 'NEW', 'DIVERGED', 'REMOTE_AHEAD'];

export function formatStatusLine(change: ReconciledChange): string {
  const [label, paint] = STATE_LABELS[change.classification.state];
  const number = change.change ? String(change.change.number) : '-';
  const latest = change.classification.latest;
  const patchSet = latest ? colors.dim(` [ps ${change.classification.matchedPatchSet ?? '?'}/${latest.number}]`) : '';
  return `  ${colors.yellow(change.commit.hash.slice(0, 8))} ${number.padStart(7)}  ${paint(label.padEnd(12))}  ${change.commit.subject}${patchSet}`;
}

export function formatStatus(snapshot: WorkspaceSnapshot, branch: string | null): string[] {
  const lines: string[] = [];
  const { reconciliation } = snapshot;

  lines.push(
    `${branch ? `On branch ${colors.cyan(branch)}` : 'HEAD detached'}, ` +
      `${snapshot.commits.length} commit(s) above ${snapshot.upstream}`
  );

  const chains = reconciliation.chains();
  chains.forEach((chain, i) => {
    lines.push('');
    if (chains.length > 1) {
      lines.push(colors.bold(`Stack ${i + 1}:`));
    }
    // Top of the stack first, like git log
    for (const change of [...chain].reverse()) {
      lines.push(formatStatusLine(change));
    }
  });

  if (reconciliation.unbound.length > 0) {
    lines.push('');
    lines.push(colors.bold('Commits without a Change-Id:'));
    for (const commit of reconciliation.unbound) {
      lines.push(`  ${colors.yellow(commit.hash.slice(0, 8))} ${commit.subject}`);
    }
  }

  if (reconciliation.untracked.length > 0) {
    lines.push('');
    lines.push(colors.bold('On the server but not in local history:'));
    for (const change of reconciliation.untracked) {
      lines.push(`  ${String(change.number).padStart(7)}  ${change.subject} ${colors.dim(change.changeId)}`);
    }
  }

  const summary = reconciliation.summary();
  const counts = STATE_ORDER
    .filter(state => summary[state] > 0)
    .map(state => `${summary[state]} ${STATE_LABELS[state][0]}`);
  if (counts.length > 0) {
    lines.push('');
    lines.push(counts.join(', '));
  }

  return lines;
}

export async function handleStatus(args: string[], context: CommandContext = createContext()): Promise<void> {
  if (args.length > 0) {
    throw Errors.invalidArgument(args[0], 'no arguments. Usage: gcl status');
  }

  const repo = context.repository();
  const snapshot = await loadSnapshot(repo, context.client, context.config);

  for (const line of formatStatus(snapshot, repo.currentBranch())) {
    console.log(line);
  }
}
