/**
 * Rebase Command
 *
 * Rebases the dependency chain containing a change onto the upstream branch
 * (or --onto), uploading a new patch set for every change that moved.
 * With --remote the server rebases the single change instead.
 */

import { Errors } from '../core/errors';
import { CHANGE_ID, parseChangeSpec } from '../core/change-id';
import { loadSnapshot, WorkspaceSnapshot } from '../core/workspace';
import { PlannedStep, RebaseOrchestrator, RebaseOutcome, RebaseReport } from '../core/rebase';
import { DependencyChain } from '../core/reconcile';
import { latestPatchSet } from '../core/types';
import { colors } from '../utils/colors';
import { CommandContext, CommandRepository, createContext } from './context';

export const REBASE_HELP = `
gcl rebase - Rebase a stack of changes

Usage: gcl rebase <change> [options]

Rebases every change of the stack that contains <change>, base first,
and uploads a new patch set for each change that moved. After a conflict
or a failed upload, fix the problem and run it again: changes already
uploaded are reused.

Options:
  --onto <ref>    Rebase onto this commit instead of the upstream branch
  --dry-run       Show what would happen without changing anything
  --remote        Ask the server to rebase the change (no local changes)

Examples:
  gcl rebase 12345
  gcl rebase 12345 --dry-run
  gcl rebase I8473b95934b5732ac55d26311a706c9c2bde9940 --onto gerrit/release-2
  gcl rebase 12345 --remote
`;

export interface RebaseOptions {
  change: string;
  onto: string | null;
  dryRun: boolean;
  remote: boolean;
}

export function parseRebaseArgs(args: string[]): RebaseOptions {
  const positional: string[] = [];
  const options: Omit<RebaseOptions, 'change'> = { onto: null, dryRun: false, remote: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--onto': {
        const value = args[i + 1];
        if (!value || value.startsWith('-')) {
          throw Errors.invalidArgument('--onto', 'a commit or ref to rebase onto');
        }
        options.onto = value;
        i++;
        break;
      }
      case '--dry-run':
      case '-n':
        options.dryRun = true;
        break;
      case '--remote':
        options.remote = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw Errors.invalidArgument(arg, 'one of --onto, --dry-run, --remote');
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 1) {
    throw Errors.invalidArgument(positional.join(' ') || '(none)', 'exactly one change. Usage: gcl rebase <change>');
  }

  return { change: parseChangeSpec(positional[0]), ...options };
}

const OUTCOME_LABELS: Record<RebaseOutcome, [string, (s: string) => string]> = {
  SKIPPED: ['unchanged', colors.dim],
  REBASED: ['rebased', colors.green],
  CONFLICTED: ['conflict', colors.red],
  BLOCKED: ['blocked', colors.yellow],
  FAILED: ['failed', colors.red],
};

const ACTION_LABELS: Record<PlannedStep['action'], string> = {
  skip: 'nothing to do',
  push: 'upload as new patch set',
  reuse: 'use the uploaded rebase',
  rewrite: 'rebase locally (not uploaded yet)',
  'rewrite-and-push': 'rebase and upload',
};

/**
 * Find the change a specifier names among the local changes
 */
export function findChangeId(snapshot: WorkspaceSnapshot, spec: string): string {
  if (CHANGE_ID.test(spec)) {
    if (!snapshot.reconciliation.get(spec)) {
      throw Errors.changeNotFound(spec);
    }
    return spec;
  }

  const number = parseInt(spec, 10);
  const match = snapshot.reconciliation.changes.find(binding => binding.change !== null && binding.change.number === number);
  if (!match) {
    throw Errors.changeNotFound(spec);
  }
  return match.changeId;
}

export function formatPlan(chain: DependencyChain, steps: PlannedStep[]): string[] {
  return steps.map((step, i) => {
    const member = chain[i];
    const number = member.change ? String(member.change.number) : 'new';
    return `  ${colors.yellow(step.commit.slice(0, 8))} ${number.padStart(7)}  ${ACTION_LABELS[step.action]}  ${colors.dim(member.commit.subject)}`;
  });
}

export function formatReport(report: RebaseReport): string[] {
  const lines = report.entries.map(entry => {
    const number = entry.number === null ? 'new' : String(entry.number);
    const patchSet = entry.patchSet === null ? '' : colors.dim(` (patch set ${entry.patchSet})`);
    const [label, paint] = OUTCOME_LABELS[entry.outcome];
    return `  ${paint(label.padEnd(10))} ${number.padStart(7)}  ${entry.subject}${patchSet}`;
  });

  lines.push('');
  lines.push(`${report.rewrites} rebased locally, ${report.pushes} uploaded`);
  return lines;
}

export async function handleRebase(args: string[], context: CommandContext = createContext()): Promise<void> {
  const options = parseRebaseArgs(args);

  if (options.remote) {
    const change = await context.client.rebaseOnServer(options.change, options.onto ?? undefined);
    const latest = latestPatchSet(change);
    console.log(
      `${colors.green('Rebased')} ${change.number} on the server` +
        (latest ? ` ${colors.dim(`(patch set ${latest.number})`)}` : '')
    );
    return;
  }

  const repo = context.repository();
  const dirty = repo.dirtyFiles();
  if (dirty.length > 0) {
    throw Errors.uncommittedChanges(dirty);
  }

  const snapshot = await loadSnapshot(repo, context.client, context.config);
  const target = options.onto ? repo.resolve(options.onto) : snapshot.base;
  if (!target) {
    throw Errors.invalidArgument(`--onto ${options.onto ?? ''}`, 'an existing commit or ref');
  }

  const changeId = findChangeId(snapshot, options.change);
  const chain = snapshot.reconciliation.chainFor(changeId);
  const orchestrator = new RebaseOrchestrator(repo, context.client);

  if (options.dryRun) {
    const steps = orchestrator.plan(chain, target);
    console.log(colors.bold(`Plan for ${chain.length} change(s) onto ${target.slice(0, 8)}:`));
    for (const line of formatPlan(chain, steps)) {
      console.log(line);
    }
    return;
  }

  const branch = repo.currentBranch();
  const head = repo.resolve('HEAD');
  const report = await orchestrator.rebase(chain, target);

  console.log(colors.bold(`Rebase onto ${target.slice(0, 8)}:`));
  for (const line of formatReport(report)) {
    console.log(line);
  }

  if (report.haltedAt !== null) {
    recoverFromHalt(repo, orchestrator, branch, head, chain, report);
    const failed = report.entries.find(entry => entry.changeId === report.haltedAt);
    throw failed && failed.error ? failed.error : Errors.invalidState(`Rebase stopped at ${report.haltedAt}`);
  }

  updateBranch(repo, branch, head, chain, report.tip);
}

/**
 * Put the stack where a second run picks it up. When the rest of the chain
 * re-applies cleanly on the last good commit it lands like a full run;
 * otherwise the branch is left as it was.
 */
function recoverFromHalt(
  repo: CommandRepository,
  orchestrator: RebaseOrchestrator,
  branch: string | null,
  head: string | null,
  chain: DependencyChain,
  report: RebaseReport
): void {
  const top = orchestrator.reapplyRest(report);

  console.error('');
  if (top === null) {
    const original = branch ?? head;
    if (original) {
      repo.checkout(original);
    }
    console.error(
      `Stopped at ${report.haltedAt}; changes below it are uploaded and ${branch ? `branch ${branch}` : 'HEAD'} was left unchanged.`
    );
  } else {
    updateBranch(repo, branch, head, chain, top);
    console.error(`Stopped at ${report.haltedAt}; the rest of the stack is rebased locally but not uploaded.`);
  }
  console.error('Fix the problem and run the command again to continue.');
}

function updateBranch(repo: CommandRepository, branch: string | null, head: string | null, chain: DependencyChain, tip: string): void {
  const top = chain[chain.length - 1];

  // Commits above the chain would be dropped by moving the branch
  if (branch && head === top.commit.hash) {
    if (tip !== head) {
      repo.moveBranch(branch, tip);
    }
    repo.checkout(branch);
    return;
  }

  repo.checkout(tip);
  if (tip !== head) {
    console.log(
      colors.dim(
        branch
          ? `Branch ${branch} has commits above the stack and was left unchanged; HEAD is at ${tip.slice(0, 8)}`
          : `HEAD is at ${tip.slice(0, 8)}`
      )
    );
  }
}
