/**
 * Tests for loading a workspace snapshot
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadSnapshot, upstreamRef } from '../core/workspace';
import { ErrorCode } from '../core/errors';
import { FakeRemote, FakeRepository, patchText, testConfig } from './test-utils';

const I1 = 'I0000000000000001';

/**
 * Repository where fetching a patch set ref brings in the patch set commit
 */
class FetchingRepository extends FakeRepository {
  readonly remoteCommits = new Map<string, () => void>();

  fetch(remote: string, refs: string[]): void {
    super.fetch(remote, refs);
    for (const ref of refs) {
      this.remoteCommits.get(ref)?.();
    }
  }
}

describe('loadSnapshot', () => {
  let repo: FetchingRepository;
  let remote: FakeRemote;

  beforeEach(() => {
    repo = new FetchingRepository();
    remote = new FakeRemote(repo);
    repo.add({ hash: 'C0', parent: null }, patchText('base.txt', 'base'));
    repo.add({ hash: 'C1', parent: 'C0', changeId: I1, tree: 'tree-one' }, patchText('one.txt', 'one'));
    repo.refs.set('refs/remotes/gerrit/master', 'C0');
    repo.onBranch('main', 'C1');
  });

  it('should name the upstream after the configured remote and branch', () => {
    expect(upstreamRef(testConfig({ remote: 'origin', branch: 'main' }))).toBe('origin/main');
  });

  it('should fetch patch sets missing locally before classifying', async () => {
    remote.addChange(I1, [{ commit: 'P1', parent: 'OLD' }]);
    repo.remoteCommits.set('refs/changes/01/101/1', () => {
      repo.add({ hash: 'OLD', parent: null }, patchText('old.txt', 'old'));
      repo.add({ hash: 'P1', parent: 'OLD', changeId: I1, tree: 'tree-one' }, patchText('one.txt', 'one'));
    });

    const snapshot = await loadSnapshot(repo, remote, testConfig());

    expect(repo.fetches).toEqual([
      { remote: 'gerrit', refs: ['+refs/heads/master:refs/remotes/gerrit/master'] },
      { remote: 'gerrit', refs: ['refs/changes/01/101/1'] },
    ]);
    expect(snapshot.upstream).toBe('gerrit/master');
    expect(snapshot.base).toBe('C0');
    expect(snapshot.commits.map(commit => commit.hash)).toEqual(['C1']);
    expect(snapshot.reconciliation.get(I1)?.classification.state).toBe('NEEDS_REBASE');
  });

  it('should limit the query to the local Change-Ids, project and branch', async () => {
    await loadSnapshot(repo, remote, testConfig(), { fetch: false });

    expect(repo.fetches).toEqual([]);
    expect(remote.queries).toEqual([{ changeIds: [I1], project: 'project', branch: 'master' }]);
  });

  it('should not query the server when no commit carries a Change-Id', async () => {
    repo.refs.set('refs/remotes/gerrit/master', 'C1');

    const snapshot = await loadSnapshot(repo, remote, testConfig(), { fetch: false });

    expect(remote.queries).toEqual([]);
    expect(snapshot.commits).toEqual([]);
  });

  it('should fail when the upstream branch does not exist', async () => {
    repo.refs.delete('refs/remotes/gerrit/master');

    await expect(loadSnapshot(repo, remote, testConfig())).rejects.toMatchObject({ code: ErrorCode.INVALID_STATE });
  });
});
