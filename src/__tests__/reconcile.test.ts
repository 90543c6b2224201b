/**
 * Tests for change classification
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReconciliationEngine, ancestryOf } from '../core/reconcile';
import { LocalPatchDiffer } from '../core/patch';
import { ErrorCode } from '../core/errors';
import { FakeRemote, FakeRepository, makeCommit, patchText } from './test-utils';

const I1 = 'I0000000000000001';
const I2 = 'I0000000000000002';
const I3 = 'I0000000000000003';
const IY = 'I00000000000000ff';

const PATCH_A = patchText('a.txt', 'first version');
const PATCH_B = patchText('a.txt', 'second version');

describe('ReconciliationEngine', () => {
  let repo: FakeRepository;
  let remote: FakeRemote;
  let engine: ReconciliationEngine;

  beforeEach(() => {
    repo = new FakeRepository();
    remote = new FakeRemote(repo);
    repo.add({ hash: 'base', parent: null }, patchText('base.txt', 'base'));
    repo.add({ hash: 'newbase', parent: 'base' }, patchText('other.txt', 'upstream work'));
    engine = new ReconciliationEngine(new LocalPatchDiffer(repo));
  });

  async function classify(commits: string[]) {
    const local = commits.map(hash => repo.getCommit(hash));
    return engine.reconcile(local, [...remote.changes.values()]);
  }

  it('should classify the latest patch set as UP_TO_DATE', async () => {
    repo.add({ hash: 'c1', parent: 'base', changeId: I1 }, PATCH_A);
    remote.addChange(I1, [{ commit: 'c1', parent: 'base' }]);

    const result = await classify(['c1']);
    const change = result.get(I1);

    expect(change?.classification.state).toBe('UP_TO_DATE');
    expect(change?.classification.matchedPatchSet).toBe(1);
    expect(change?.classification.departure).toBe('same-parent');
  });

  it('should classify the same diff on another parent as NEEDS_REBASE', async () => {
    repo.add({ hash: 'p1', parent: 'base', changeId: I1, tree: 'tree-a' }, PATCH_A);
    repo.add({ hash: 'c1', parent: 'newbase', changeId: I1, tree: 'tree-a' }, PATCH_A);
    remote.addChange(I1, [{ commit: 'p1', parent: 'base' }]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('NEEDS_REBASE');
    expect(change?.classification.matchedPatchSet).toBe(1);
    expect(change?.classification.departure).toBe('parent-unknown');
  });

  it('should find the patch set parent further down local history', async () => {
    repo.add({ hash: 'p1', parent: 'base', changeId: I1, tree: 'tree-a' }, PATCH_A);
    repo.add({ hash: 'c1', parent: 'newbase', changeId: I1, tree: 'tree-a' }, PATCH_A);
    remote.addChange(I1, [{ commit: 'p1', parent: 'base' }]);

    const change = (await classify(['newbase', 'c1'])).get(I1);

    expect(change?.classification.state).toBe('NEEDS_REBASE');
    expect(change?.classification.departure).toBe('parent-in-history');
  });

  it('should classify different content as DIVERGED', async () => {
    repo.add({ hash: 'p1', parent: 'base', changeId: I1 }, PATCH_A);
    repo.add({ hash: 'c1', parent: 'newbase', changeId: I1 }, PATCH_B);
    remote.addChange(I1, [{ commit: 'p1', parent: 'base' }]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('DIVERGED');
    expect(change?.classification.matchedPatchSet).toBeNull();
    expect(change?.classification.reason).toBe('local changes differ from every patch set');
  });

  it('should classify an amended message on the same parent as DIVERGED', async () => {
    repo.add({ hash: 'p1', parent: 'base', changeId: I1, tree: 'tree-a' }, PATCH_A);
    repo.add({ hash: 'c1', parent: 'base', changeId: I1, tree: 'tree-a', subject: 'Reworded' }, PATCH_A);
    remote.addChange(I1, [{ commit: 'p1', parent: 'base' }]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('DIVERGED');
    expect(change?.classification.reason).toBe('same changes and parent, amended commit metadata');
  });

  it('should classify an older patch set commit as REMOTE_AHEAD', async () => {
    repo.add({ hash: 'c1', parent: 'base', changeId: I1 }, PATCH_A);
    repo.add({ hash: 'p2', parent: 'base', changeId: I1 }, PATCH_B);
    remote.addChange(I1, [
      { commit: 'c1', parent: 'base' },
      { commit: 'p2', parent: 'base' },
    ]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('REMOTE_AHEAD');
    expect(change?.classification.matchedPatchSet).toBe(1);
    expect(change?.classification.latest?.number).toBe(2);
  });

  it('should classify the diff of an older patch set as REMOTE_AHEAD', async () => {
    repo.add({ hash: 'p1', parent: 'base', changeId: I1, tree: 'tree-a' }, PATCH_A);
    repo.add({ hash: 'p2', parent: 'base', changeId: I1, tree: 'tree-b' }, PATCH_B);
    repo.add({ hash: 'c1', parent: 'newbase', changeId: I1, tree: 'tree-a' }, PATCH_A);
    remote.addChange(I1, [
      { commit: 'p1', parent: 'base' },
      { commit: 'p2', parent: 'base' },
    ]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('REMOTE_AHEAD');
    expect(change?.classification.matchedPatchSet).toBe(1);
  });

  it('should classify an older patch set whose rebase is the latest as NEEDS_REBASE', async () => {
    repo.add({ hash: 'c1', parent: 'base', changeId: I1, tree: 'tree-a' }, PATCH_A);
    repo.add({ hash: 'p2', parent: 'newbase', changeId: I1, tree: 'tree-a' }, PATCH_A);
    remote.addChange(I1, [
      { commit: 'c1', parent: 'base' },
      { commit: 'p2', parent: 'newbase' },
    ]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('NEEDS_REBASE');
    expect(change?.classification.matchedPatchSet).toBe(2);
    expect(change?.classification.reason).toBe('latest patch set is patch set 1 on another parent');
  });

  it('should classify against a root patch set without diffing against an empty parent', async () => {
    const diffs = vi.spyOn(repo, 'diff');
    repo.add({ hash: 'r1', parent: null, changeId: I1 }, PATCH_A);
    repo.add({ hash: 'c1', parent: 'base', changeId: I1 }, PATCH_A);
    remote.addChange(I1, [{ commit: 'r1', parent: '' }]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('DIVERGED');
    expect(change?.classification.reason).toBe('latest patch set is a root commit');
    expect(diffs).not.toHaveBeenCalled();
  });

  it('should skip a root patch set when matching older patch sets', async () => {
    const diffs = vi.spyOn(repo, 'diff');
    repo.add({ hash: 'r1', parent: null, changeId: I1 }, PATCH_B);
    repo.add({ hash: 'p2', parent: 'base', changeId: I1 }, PATCH_A);
    repo.add({ hash: 'c1', parent: 'newbase', changeId: I1 }, PATCH_B);
    remote.addChange(I1, [
      { commit: 'r1', parent: '' },
      { commit: 'p2', parent: 'base' },
    ]);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('DIVERGED');
    expect(diffs.mock.calls.map(([, parent]) => parent)).toEqual(['newbase', 'base']);
  });

  it('should classify a Change-Id unknown to the server as NEW', async () => {
    repo.add({ hash: 'c1', parent: 'base', changeId: I1 }, PATCH_A);

    const change = (await classify(['c1'])).get(I1);

    expect(change?.classification.state).toBe('NEW');
    expect(change?.classification.latest).toBeNull();
    expect(change?.classification.reason).toBe('not uploaded yet');
  });

  it('should classify a root commit that is not the latest patch set as DIVERGED', async () => {
    repo.add({ hash: 'root', parent: null, changeId: I1 }, PATCH_A);
    repo.add({ hash: 'p1', parent: 'base', changeId: I1 }, PATCH_A);
    remote.addChange(I1, [{ commit: 'p1', parent: 'base' }]);

    const change = (await classify(['root'])).get(I1);

    expect(change?.classification.state).toBe('DIVERGED');
  });

  it('should leave a remote change without local commit untracked', async () => {
    repo.add({ hash: 'c1', parent: 'base', changeId: I1 }, PATCH_A);
    repo.add({ hash: 'py', parent: 'base', changeId: IY }, PATCH_B);
    remote.addChange(I1, [{ commit: 'c1', parent: 'base' }]);
    remote.addChange(IY, [{ commit: 'py', parent: 'base' }]);

    const result = await classify(['c1']);

    expect(result.get(IY)).toBeNull();
    expect(result.untracked.map(change => change.changeId)).toEqual([IY]);
    expect(result.changes).toHaveLength(1);
  });

  it('should refuse two local commits with the same Change-Id', async () => {
    repo.add({ hash: 'c1', parent: 'base', changeId: I1 }, PATCH_A);
    repo.add({ hash: 'c2', parent: 'c1', changeId: I1 }, PATCH_B);

    await expect(classify(['c1', 'c2'])).rejects.toMatchObject({ code: ErrorCode.AMBIGUOUS_CHANGE_ID });
  });

  it('should give the same result when run twice', async () => {
    repo.add({ hash: 'p1', parent: 'base', changeId: I1, tree: 'tree-a' }, PATCH_A);
    repo.add({ hash: 'c1', parent: 'newbase', changeId: I1, tree: 'tree-a' }, PATCH_A);
    repo.add({ hash: 'c2', parent: 'c1', changeId: I2 }, PATCH_B);
    remote.addChange(I1, [{ commit: 'p1', parent: 'base' }]);

    const first = await classify(['c1', 'c2']);
    const second = await classify(['c1', 'c2']);

    expect(second.changes.map(c => c.classification)).toEqual(first.changes.map(c => c.classification));
  });

  it('should count states and collect dependents transitively', async () => {
    repo.add({ hash: 'c1', parent: 'base', changeId: I1 }, PATCH_A);
    repo.add({ hash: 'c2', parent: 'c1', changeId: I2 }, PATCH_B);
    repo.add({ hash: 'c3', parent: 'c2', changeId: I3 }, patchText('b.txt', 'three'));
    remote.addChange(I1, [{ commit: 'c1', parent: 'base' }]);

    const result = await classify(['c1', 'c2', 'c3']);

    expect(result.summary()).toEqual({ NEW: 2, UP_TO_DATE: 1, NEEDS_REBASE: 0, DIVERGED: 0, REMOTE_AHEAD: 0 });
    expect(result.dependentsOf(I1).map(c => c.changeId)).toEqual([I2, I3]);
    expect(result.chainFor(I3).map(c => c.changeId)).toEqual([I1, I2, I3]);
  });
});

describe('ancestryOf', () => {
  it('should walk first parents through known commits, nearest first', () => {
    const a = makeCommit({ hash: 'a', parent: 'root' });
    const b = makeCommit({ hash: 'b', parent: 'a' });
    const c = makeCommit({ hash: 'c', parent: 'b' });
    const byHash = new Map([a, b, c].map(commit => [commit.hash, commit]));

    expect(ancestryOf(c, byHash)).toEqual(['b', 'a', 'root']);
  });
});
