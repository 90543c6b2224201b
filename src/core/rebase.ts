/**
 * Rebase Orchestrator
 *
 * Rebases a dependency chain onto a new base, base of the stack first.
 * Each change is re-applied on the commit produced for the change below it
 * (or on the target base for the first one), then uploaded as a new patch set.
 *
 * A conflict stops the whole chain: the conflicting change is CONFLICTED and
 * everything above it BLOCKED. A failed upload stops it the same way; patch
 * sets already uploaded stay uploaded, and a later run reuses them.
 */

import { firstParent, LocalCommit } from './types';
import { Errors, GclError, toGclError } from './errors';
import { withChangeId } from './change-id';
import { CherryPickResult, LocalRepository } from './local-repository';
import { RemoteChangeClient } from './remote';
import { DependencyChain, ReconciledChange } from './reconcile';
import { Logger, logger } from '../utils/logger';

export type RebaseOutcome = 'SKIPPED' | 'REBASED' | 'CONFLICTED' | 'BLOCKED' | 'FAILED';

export type SessionState = 'UNPROCESSED' | 'REBASING' | RebaseOutcome;

/**
 * What a chain member needs
 */
export type RebaseAction =
  | 'skip'              // already where it should be
  | 'push'              // right parent locally, server has an older base
  | 'reuse'             // the latest patch set already sits on the right base
  | 'rewrite'           // re-apply locally only (change not uploaded)
  | 'rewrite-and-push'; // re-apply and upload

export interface PlannedStep {
  changeId: string;
  action: RebaseAction;
  commit: string;
  /** Commit the change will sit on; null when it is the rewritten change below */
  onto: string | null;
}

export interface RebaseEntry {
  changeId: string;
  number: number | null;
  subject: string;
  outcome: RebaseOutcome;
  originalCommit: string;
  newCommit: string | null;
  patchSet: number | null;
  conflicts: string[];
  error: GclError | null;
}

export interface RebaseReport {
  targetBase: string;
  entries: RebaseEntry[];
  /** Last commit that later work can build on */
  tip: string;
  /** Change the run stopped at, null when the chain went through */
  haltedAt: string | null;
  pushes: number;
  rewrites: number;
}

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  UNPROCESSED: ['SKIPPED', 'REBASING', 'BLOCKED'],
  REBASING: ['REBASED', 'CONFLICTED', 'FAILED'],
  SKIPPED: [],
  REBASED: [],
  CONFLICTED: [],
  BLOCKED: [],
  FAILED: [],
};

/**
 * Per-change state machine for one rebase run.
 * A change may only start (REBASING or SKIPPED) once every change
 * below it in the chain is REBASED or SKIPPED.
 */
export class RebaseSession {
  private states: SessionState[];

  constructor(private changeIds: readonly string[]) {
    this.states = changeIds.map(() => 'UNPROCESSED');
  }

  state(position: number): SessionState {
    return this.states[position];
  }

  transition(position: number, to: SessionState): void {
    const from = this.states[position];
    if (!TRANSITIONS[from].includes(to)) {
      throw Errors.invalidState(`Change ${this.changeIds[position]} cannot go from ${from} to ${to}`, {
        changeId: this.changeIds[position],
        from,
        to,
      });
    }

    if (to === 'REBASING' || to === 'SKIPPED') {
      for (let i = 0; i < position; i++) {
        if (this.states[i] !== 'REBASED' && this.states[i] !== 'SKIPPED') {
          throw Errors.invalidState(
            `Change ${this.changeIds[position]} cannot start before ${this.changeIds[i]} (${this.states[i]})`,
            { changeId: this.changeIds[position], waitingOn: this.changeIds[i] }
          );
        }
      }
    }

    this.states[position] = to;
  }

  /**
   * Mark every change from `position` on as BLOCKED
   */
  blockFrom(position: number): void {
    for (let i = position; i < this.states.length; i++) {
      this.transition(i, 'BLOCKED');
    }
  }
}

/**
 * Commit a change sits at after the action, when known before running it
 */
function landsAt(member: ReconciledChange, action: RebaseAction): string | null {
  switch (action) {
    case 'skip':
    case 'push':
      return member.commit.hash;
    case 'reuse':
      return member.classification.latest?.commit ?? null;
    default:
      return null;
  }
}

const UPLOADS: readonly RebaseAction[] = ['push', 'rewrite-and-push'];

/**
 * Decide what a change needs, given the commit it must end up on
 */
export function decideAction(member: ReconciledChange, expectedBase: string | null): RebaseAction {
  const inPlace = expectedBase !== null && firstParent(member.commit) === expectedBase;

  switch (member.classification.state) {
    case 'UP_TO_DATE':
      return inPlace ? 'skip' : 'rewrite-and-push';
    case 'NEEDS_REBASE':
      if (inPlace) return 'push';
      return member.classification.latest?.parent === expectedBase ? 'reuse' : 'rewrite-and-push';
    case 'NEW':
      return inPlace ? 'skip' : 'rewrite';
    default:
      throw Errors.invalidState(
        `Change ${member.changeId} is ${member.classification.state} and cannot be rebased`,
        { changeId: member.changeId }
      );
  }
}

export interface RebaseOrchestratorOptions {
  log?: Logger;
}

export class RebaseOrchestrator {
  private log: Logger;

  constructor(
    private local: LocalRepository,
    private remote: RemoteChangeClient,
    options: RebaseOrchestratorOptions = {}
  ) {
    this.log = options.log ?? logger.child({ component: 'rebase' });
  }

  /**
   * Refuse chains that cannot be rebased safely; nothing is touched
   */
  preflight(chain: DependencyChain): void {
    for (const member of chain) {
      if (member.unboundParent) {
        throw Errors.missingChangeId(member.changeId, member.unboundParent.hash, member.unboundParent.subject);
      }

      const { state, latest, matchedPatchSet } = member.classification;
      if (state === 'REMOTE_AHEAD') {
        throw Errors.remoteAhead(member.changeId, matchedPatchSet, latest ? latest.number : 0);
      }
      if (state === 'DIVERGED') {
        throw Errors.diverged(member.changeId, member.commit.hash);
      }
      if (member.change && member.change.status !== 'NEW') {
        throw Errors.changeClosed(member.changeId, member.change.status);
      }
    }
  }

  /**
   * Actions the chain needs to land on the target base, without running them
   */
  plan(chain: DependencyChain, targetBase: string): PlannedStep[] {
    this.preflight(chain);

    const steps: PlannedStep[] = [];
    let base: string | null = targetBase;

    let notUploaded: string | null = null;

    for (const member of chain) {
      const action = decideAction(member, base);
      // Pushing a commit uploads every ancestor the server does not have
      if (notUploaded !== null && UPLOADS.includes(action)) {
        throw Errors.notUploaded(member.changeId, notUploaded);
      }
      if (member.classification.state === 'NEW' && notUploaded === null) {
        notUploaded = member.changeId;
      }

      steps.push({ changeId: member.changeId, action, commit: member.commit.hash, onto: base });
      base = landsAt(member, action);
    }

    return steps;
  }

  async rebase(chain: DependencyChain, targetBase: string): Promise<RebaseReport> {
    this.plan(chain, targetBase);

    const session = new RebaseSession(chain.map(member => member.changeId));
    const report: RebaseReport = {
      targetBase,
      entries: chain.map(member => ({
        changeId: member.changeId,
        number: member.change ? member.change.number : null,
        subject: member.commit.subject,
        outcome: 'BLOCKED',
        originalCommit: member.commit.hash,
        newCommit: null,
        patchSet: null,
        conflicts: [],
        error: null,
      })),
      tip: targetBase,
      haltedAt: null,
      pushes: 0,
      rewrites: 0,
    };

    let base = targetBase;

    for (let i = 0; i < chain.length; i++) {
      const member = chain[i];
      const entry = report.entries[i];
      const action = decideAction(member, base);
      const log = this.log.child({ changeId: member.changeId });

      if (action === 'skip' || action === 'reuse') {
        const landed = landsAt(member, action) ?? member.commit.hash;
        session.transition(i, 'SKIPPED');
        entry.outcome = 'SKIPPED';
        entry.newCommit = landed;
        base = landed;
        report.tip = base;
        log.info(action === 'reuse' ? 'reused latest patch set' : 'skipped', { commit: landed.slice(0, 8) });
        continue;
      }

      session.transition(i, 'REBASING');
      let commit: LocalCommit = member.commit;

      try {
        if (action === 'rewrite' || action === 'rewrite-and-push') {
          const result = this.local.cherryPick(member.commit.hash, base);
          if (!result.success) {
            session.transition(i, 'CONFLICTED');
            entry.outcome = 'CONFLICTED';
            entry.conflicts = result.conflicts;
            entry.error = Errors.conflict(result.conflicts, member.changeId);
            report.haltedAt = member.changeId;
            session.blockFrom(i + 1);
            log.warn('conflict', { paths: result.conflicts });
            break;
          }

          commit = this.keepChangeId(result.commit, member.changeId, base);
          entry.newCommit = commit.hash;
          report.rewrites++;
          log.debug('re-applied', { from: member.commit.hash.slice(0, 8), to: commit.hash.slice(0, 8) });
        }

        if (action === 'push' || action === 'rewrite-and-push') {
          const patchSet = await this.remote.pushPatchSet(member.changeId, commit.hash, base);
          entry.patchSet = patchSet.number;
          report.pushes++;
          log.info('uploaded', { patchSet: patchSet.number, commit: commit.hash.slice(0, 8) });
        }
      } catch (error) {
        session.transition(i, 'FAILED');
        entry.outcome = 'FAILED';
        entry.newCommit = commit === member.commit ? null : commit.hash;
        entry.error = toGclError(error);
        report.haltedAt = member.changeId;
        session.blockFrom(i + 1);
        log.error('failed', { code: entry.error.code, error: entry.error.message });
        break;
      }

      session.transition(i, 'REBASED');
      entry.outcome = 'REBASED';
      entry.newCommit = commit.hash;
      base = commit.hash;
      report.tip = base;
    }

    return report;
  }

  /**
   * After a halted run, re-apply the changes that did not go through on top
   * of the last good commit, locally only. Returns the new top, or null when
   * one of them does not apply cleanly.
   */
  reapplyRest(report: RebaseReport): string | null {
    const start = report.entries.findIndex(entry => entry.changeId === report.haltedAt);
    if (start < 0) {
      return report.tip;
    }

    let tip = report.tip;
    for (const entry of report.entries.slice(start)) {
      if (entry.outcome === 'CONFLICTED') {
        return null;
      }

      // A failed upload leaves its commit on the last good one
      const ready = entry.newCommit ?? entry.originalCommit;
      if (firstParent(this.local.getCommit(ready)) === tip) {
        tip = ready;
        continue;
      }

      let result: CherryPickResult;
      try {
        result = this.local.cherryPick(entry.originalCommit, tip);
      } catch (error) {
        this.log.warn('cannot re-apply', { changeId: entry.changeId, error: toGclError(error).message });
        return null;
      }
      if (!result.success) {
        this.log.info('stopped re-applying at a conflict', { changeId: entry.changeId, paths: result.conflicts });
        return null;
      }
      tip = this.keepChangeId(result.commit, entry.changeId, tip).hash;
    }

    this.log.info('re-applied the rest locally', { from: report.haltedAt, tip: tip.slice(0, 8) });
    return tip;
  }

  /**
   * Make sure the re-applied commit still carries the change's trailer
   */
  private keepChangeId(commit: LocalCommit, changeId: string, parent: string): LocalCommit {
    if (commit.changeId === changeId) {
      return commit;
    }
    this.log.warn('Change-Id trailer lost while re-applying, restoring it', { changeId });
    return this.local.createCommit(commit.tree, parent, withChangeId(commit.message, changeId));
  }
}
