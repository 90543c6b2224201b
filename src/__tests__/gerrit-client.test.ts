/**
 * Tests for the Gerrit REST client, against an in-process transport
 */

import { describe, it, expect } from 'vitest';
import { GerritClient, buildQuery } from '../core/gerrit/client';
import { HttpRequest, HttpResponse, Transport, withRetry } from '../core/gerrit/http';
import { parseGerritJson, parseTimestamp } from '../core/gerrit/schemas';
import { PatchSetUploader } from '../core/gerrit/upload';
import { ErrorCode } from '../core/errors';
import { testConfig } from './test-utils';

const I1 = 'I0000000000000001';
const OPTIONS = 'o=ALL_REVISIONS&o=ALL_COMMITS&o=DETAILED_ACCOUNTS';

function changeInfo(revisions: Record<string, { number: number; parent: string | null }>, status = 'NEW') {
  const entries = Object.entries(revisions).map(([commit, revision]) => [
    commit,
    {
      _number: revision.number,
      created: `2024-01-0${revision.number} 10:00:00.000000000`,
      ref: `refs/changes/01/101/${revision.number}`,
      commit: { parents: revision.parent === null ? [] : [{ commit: revision.parent }] },
    },
  ]);
  return {
    id: `project~master~${I1}`,
    project: 'project',
    branch: 'master',
    change_id: I1,
    subject: 'Add feature',
    status,
    _number: 101,
    owner: { _account_id: 1000, name: 'Test User', email: 'test@example.com', username: 'test' },
    revisions: Object.fromEntries(entries),
  };
}

function json(status: number, payload: unknown): HttpResponse {
  return { status, body: `)]}'\n${JSON.stringify(payload)}` };
}

/**
 * Transport that records requests and answers from a handler
 */
function fakeTransport(handler: (request: HttpRequest, call: number) => HttpResponse) {
  const requests: HttpRequest[] = [];
  const transport: Transport = async request => {
    requests.push(request);
    return handler(request, requests.length);
  };
  return { transport, requests };
}

describe('buildQuery', () => {
  it('should encode each term and join them with +', () => {
    expect(buildQuery({ status: 'open', owner: 'self' })).toBe('status%3Aopen+owner%3Aself');
  });

  it('should prefer is:watched over owner', () => {
    expect(buildQuery({ status: 'open', owner: 'self', watched: true })).toBe('status%3Aopen+is%3Awatched');
  });

  it('should OR several Change-Ids together', () => {
    expect(buildQuery({ project: 'tools/gcl', changeIds: ['Ia1', 'Ib2'] })).toBe(
      'project%3Atools%2Fgcl+(change%3AIa1%20OR%20change%3AIb2)'
    );
    expect(buildQuery({ branch: 'main', changeIds: ['Ia1'] })).toBe('branch%3Amain+change%3AIa1');
  });
});

describe('schemas', () => {
  it('should parse timestamps as UTC with millisecond precision', () => {
    expect(parseTimestamp('2024-03-01 09:15:42.123456789')?.toISOString()).toBe('2024-03-01T09:15:42.123Z');
    expect(parseTimestamp('2024-03-01 09:15:42')?.toISOString()).toBe('2024-03-01T09:15:42.000Z');
    expect(parseTimestamp('yesterday')).toBeNull();
  });

  it('should strip the XSSI prefix', () => {
    expect(parseGerritJson(")]}'\n{\"a\":1}")).toEqual({ a: 1 });
    expect(parseGerritJson('[]')).toEqual([]);
  });
});

describe('GerritClient', () => {
  it('should fetch a change with authentication and sort its patch sets', async () => {
    const { transport, requests } = fakeTransport(() =>
      json(200, changeInfo({ bbb: { number: 2, parent: 'base2' }, aaa: { number: 1, parent: 'base1' } }))
    );
    const client = new GerritClient(testConfig(), { transport });

    const change = await client.getChange(I1);

    expect(requests[0].url).toBe(`https://review.example.com/a/changes/${I1}?${OPTIONS}`);
    expect(requests[0].method).toBe('GET');
    expect(requests[0].headers?.Authorization).toBe(`Basic ${Buffer.from('test:test-secret').toString('base64')}`);
    expect(change?.number).toBe(101);
    expect(change?.patchSets.map(ps => [ps.number, ps.commit, ps.parent])).toEqual([
      [1, 'aaa', 'base1'],
      [2, 'bbb', 'base2'],
    ]);
    expect(change?.patchSets[0].createdAt.toISOString()).toBe('2024-01-01T10:00:00.000Z');
    expect(change?.owner.username).toBe('test');
  });

  it('should use an empty parent for a root revision', async () => {
    const { transport } = fakeTransport(() => json(200, changeInfo({ aaa: { number: 1, parent: null } })));
    const client = new GerritClient(testConfig(), { transport });

    expect((await client.getPatchSets(I1))[0].parent).toBe('');
  });

  it('should skip /a/ and the header without credentials', async () => {
    const { transport, requests } = fakeTransport(() => json(200, changeInfo({})));
    const client = new GerritClient(testConfig({ username: null, password: null }), { transport });

    await client.getChange(I1);

    expect(requests[0].url).toBe(`https://review.example.com/changes/${I1}?${OPTIONS}`);
    expect(requests[0].headers?.Authorization).toBeUndefined();
  });

  it('should return null for an unknown change', async () => {
    const { transport } = fakeTransport(() => ({ status: 404, body: 'Not found' }));
    const client = new GerritClient(testConfig(), { transport });

    expect(await client.getChange(I1)).toBeNull();
    await expect(client.getPatchSets(I1)).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
  });

  it('should query changes with the encoded filter and limit', async () => {
    const { transport, requests } = fakeTransport(() => json(200, [changeInfo({ aaa: { number: 1, parent: 'base' } })]));
    const client = new GerritClient(testConfig(), { transport });

    const changes = await client.listChanges({ status: 'open', owner: 'self', limit: 25 });

    expect(requests[0].url).toBe(
      `https://review.example.com/a/changes/?q=status%3Aopen+owner%3Aself&${OPTIONS}&n=25`
    );
    expect(changes.map(change => change.changeId)).toEqual([I1]);
  });

  it('should map 401 to AUTH_FAILURE and 5xx to NETWORK_ERROR', async () => {
    const denied = new GerritClient(testConfig(), { transport: fakeTransport(() => ({ status: 401, body: 'Unauthorized' })).transport });
    const broken = new GerritClient(testConfig(), { transport: fakeTransport(() => ({ status: 500, body: '' })).transport });

    await expect(denied.getChange(I1)).rejects.toMatchObject({ code: ErrorCode.AUTH_FAILURE });
    await expect(broken.getChange(I1)).rejects.toMatchObject({ code: ErrorCode.NETWORK_ERROR });
  });

  it('should map a socket error to NETWORK_ERROR', async () => {
    const client = new GerritClient(testConfig(), {
      transport: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });

    await expect(client.listChanges({})).rejects.toMatchObject({
      code: ErrorCode.NETWORK_ERROR,
      message: `Failed to connect to 'https://review.example.com/a/changes/?${OPTIONS}': connect ECONNREFUSED`,
    });
  });

  it('should reject payloads that do not match the schema', async () => {
    const wrongShape = new GerritClient(testConfig(), { transport: fakeTransport(() => json(200, { id: 1 })).transport });
    const notJson = new GerritClient(testConfig(), { transport: fakeTransport(() => ({ status: 200, body: '<html>' })).transport });

    await expect(wrongShape.getChange(I1)).rejects.toMatchObject({ code: ErrorCode.INVALID_RESPONSE });
    await expect(notJson.getChange(I1)).rejects.toMatchObject({ code: ErrorCode.INVALID_RESPONSE });
  });

  describe('submit', () => {
    it('should POST and return the merged change', async () => {
      const { transport, requests } = fakeTransport(() => json(200, changeInfo({}, 'MERGED')));
      const client = new GerritClient(testConfig(), { transport });

      const change = await client.submit('101');

      expect(requests[0].method).toBe('POST');
      expect(requests[0].url).toBe('https://review.example.com/a/changes/101/submit');
      expect(requests[0].body).toBe('{}');
      expect(requests[0].headers?.['Content-Type']).toBe('application/json; charset=UTF-8');
      expect(change.status).toBe('MERGED');
    });

    it('should tell a merge conflict from missing approvals', async () => {
      const conflict = new GerritClient(testConfig(), {
        transport: fakeTransport(() => ({ status: 409, body: 'Change 101: Change could not be merged due to a path conflict.' })).transport,
      });
      const blocked = new GerritClient(testConfig(), {
        transport: fakeTransport(() => ({ status: 409, body: 'submit requirement Code-Review is unsatisfied\n' })).transport,
      });

      await expect(conflict.submit('101')).rejects.toMatchObject({ code: ErrorCode.CONFLICT });
      await expect(blocked.submit('101')).rejects.toMatchObject({
        code: ErrorCode.NOT_READY,
        message: 'Change 101 is not ready to be submitted: submit requirement Code-Review is unsatisfied',
      });
    });
  });

  it('should ask the server to rebase onto a given base', async () => {
    const { transport, requests } = fakeTransport(() => json(200, changeInfo({})));
    const client = new GerritClient(testConfig(), { transport });

    await client.rebaseOnServer('101', 'abc123');

    expect(requests[0].url).toBe('https://review.example.com/a/changes/101/rebase');
    expect(requests[0].body).toBe('{"base":"abc123"}');
  });

  it('should decode the base64 patch of the current revision', async () => {
    const patch = 'diff --git a/x.txt b/x.txt\n+hello\n';
    const { transport, requests } = fakeTransport(() => ({ status: 200, body: `${Buffer.from(patch).toString('base64')}\n` }));
    const client = new GerritClient(testConfig(), { transport });

    expect(await client.getPatch('101')).toBe(patch);
    expect(requests[0].url).toBe('https://review.example.com/a/changes/101/revisions/current/patch');
  });

  it('should read reviewers and trim their votes', async () => {
    const { transport } = fakeTransport(() =>
      json(200, [{ _account_id: 1001, name: 'Reviewer', approvals: { 'Code-Review': '+2', Verified: ' 0' } }])
    );
    const client = new GerritClient(testConfig(), { transport });

    expect(await client.getReviewers('101')).toEqual([
      { account: { accountId: 1001, name: 'Reviewer' }, approvals: { 'Code-Review': '+2', Verified: '0' } },
    ]);
  });

  describe('reviewers', () => {
    it('should add a reviewer and return who was added', async () => {
      const { transport, requests } = fakeTransport(() =>
        json(200, { input: 'alice', reviewers: [{ _account_id: 1002, name: 'Alice', email: 'alice@example.com' }] })
      );
      const client = new GerritClient(testConfig(), { transport });

      expect(await client.addReviewer('101', 'alice')).toEqual([
        { account: { accountId: 1002, name: 'Alice', email: 'alice@example.com' }, approvals: {} },
      ]);
      expect(requests[0].method).toBe('POST');
      expect(requests[0].url).toBe('https://review.example.com/a/changes/101/reviewers');
      expect(requests[0].body).toBe('{"reviewer":"alice"}');
    });

    it('should ask for confirmation before adding a large group', async () => {
      const ask = fakeTransport(() =>
        json(200, { input: 'everyone', error: 'The group everyone has 40 members.', confirm: true })
      );
      const confirmed = fakeTransport(() => json(200, { input: 'everyone', reviewers: [] }));

      await expect(new GerritClient(testConfig(), { transport: ask.transport }).addReviewer('101', 'everyone')).rejects.toMatchObject({
        code: ErrorCode.INVALID_STATE,
      });
      expect(await new GerritClient(testConfig(), { transport: confirmed.transport }).addReviewer('101', 'everyone', true)).toEqual([]);
      expect(confirmed.requests[0].body).toBe('{"reviewer":"everyone","confirmed":true}');
    });

    it('should report a reviewer the server refuses', async () => {
      const inBody = fakeTransport(() => json(200, { input: 'ghost', error: 'ghost does not identify a registered user or group' }));
      const inStatus = fakeTransport(() => ({ status: 422, body: 'Account ghost not found\n' }));

      await expect(new GerritClient(testConfig(), { transport: inBody.transport }).addReviewer('101', 'ghost')).rejects.toMatchObject({
        code: ErrorCode.OPERATION_FAILED,
        message: 'Cannot add ghost as reviewer of 101: ghost does not identify a registered user or group',
      });
      await expect(new GerritClient(testConfig(), { transport: inStatus.transport }).addReviewer('101', 'ghost')).rejects.toMatchObject({
        code: ErrorCode.OPERATION_FAILED,
        message: 'Cannot add ghost as reviewer of 101: Account ghost not found',
      });
    });

    it('should look a reviewer up, then delete it', async () => {
      const { transport, requests } = fakeTransport(request =>
        request.method === 'GET'
          ? json(200, [{ _account_id: 1003, name: 'Bob', approvals: { 'Code-Review': ' 0' } }])
          : { status: 204, body: '' }
      );
      const client = new GerritClient(testConfig(), { transport });

      expect(await client.deleteReviewer('101', 'bob')).toEqual({
        account: { accountId: 1003, name: 'Bob' },
        approvals: { 'Code-Review': '0' },
      });
      expect(requests.map(request => [request.method, request.url])).toEqual([
        ['GET', 'https://review.example.com/a/changes/101/reviewers/bob'],
        ['DELETE', 'https://review.example.com/a/changes/101/reviewers/bob'],
      ]);
    });

    it('should return null for someone who is not a reviewer', async () => {
      const { transport, requests } = fakeTransport(() => ({ status: 404, body: 'Not found' }));
      const client = new GerritClient(testConfig(), { transport });

      expect(await client.deleteReviewer('101', 'carol')).toBeNull();
      expect(requests).toHaveLength(1);
    });
  });

  describe('getAccount', () => {
    it('should fetch your own account', async () => {
      const { transport, requests } = fakeTransport(() =>
        json(200, { _account_id: 1000, name: 'Test User', email: 'test@example.com', username: 'test' })
      );
      const client = new GerritClient(testConfig(), { transport });

      expect(await client.getAccount()).toEqual({ accountId: 1000, name: 'Test User', email: 'test@example.com', username: 'test' });
      expect(requests[0].url).toBe('https://review.example.com/a/accounts/self');
    });

    it('should map 404 to NOT_FOUND', async () => {
      const client = new GerritClient(testConfig(), { transport: fakeTransport(() => ({ status: 404, body: 'Not found' })).transport });

      await expect(client.getAccount('ghost')).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
    });
  });

  describe('pushPatchSet', () => {
    it('should upload to the change branch and return the new patch set', async () => {
      const uploads: Array<[string, string]> = [];
      const uploader: PatchSetUploader = { upload: (commit, branch) => void uploads.push([commit, branch]) };
      const { transport } = fakeTransport((_request, call) =>
        call === 1
          ? json(200, changeInfo({ aaa: { number: 1, parent: 'base1' } }))
          : json(200, changeInfo({ aaa: { number: 1, parent: 'base1' }, bbb: { number: 2, parent: 'base2' } }))
      );
      const client = new GerritClient(testConfig(), { transport, uploader });

      const patchSet = await client.pushPatchSet(I1, 'bbb', 'base2');

      expect(uploads).toEqual([['bbb', 'master']]);
      expect(patchSet.number).toBe(2);
      expect(patchSet.parent).toBe('base2');
    });

    it('should fail when the server shows no patch set for the pushed commit', async () => {
      const uploader: PatchSetUploader = { upload: () => undefined };
      const { transport } = fakeTransport(() => json(200, changeInfo({ aaa: { number: 1, parent: 'base1' } })));
      const client = new GerritClient(testConfig(), { transport, uploader });

      await expect(client.pushPatchSet(I1, 'bbb', 'base2')).rejects.toMatchObject({ code: ErrorCode.INVALID_RESPONSE });
    });

    it('should refuse to push without an uploader', async () => {
      const client = new GerritClient(testConfig(), { transport: fakeTransport(() => json(200, changeInfo({}))).transport });

      await expect(client.pushPatchSet(I1, 'bbb', 'base2')).rejects.toMatchObject({ code: ErrorCode.INVALID_STATE });
    });
  });
});

describe('withRetry', () => {
  function sequence(responses: Array<HttpResponse | Error>) {
    let calls = 0;
    const transport: Transport = async () => {
      const next = responses[Math.min(calls, responses.length - 1)];
      calls++;
      if (next instanceof Error) throw next;
      return next;
    };
    return { transport, calls: () => calls };
  }

  const GET: HttpRequest = { method: 'GET', url: 'https://review.example.com/changes/' };

  it('should retry gateway errors with growing delays', async () => {
    const sleeps: number[] = [];
    const stub = sequence([{ status: 503, body: '' }, { status: 502, body: '' }, { status: 200, body: 'ok' }]);
    const transport = withRetry(stub.transport, { sleep: async ms => void sleeps.push(ms) });

    expect(await transport(GET)).toEqual({ status: 200, body: 'ok' });
    expect(stub.calls()).toBe(3);
    expect(sleeps).toEqual([500, 1000]);
  });

  it('should return the last response once attempts run out', async () => {
    const stub = sequence([{ status: 504, body: '' }]);
    const transport = withRetry(stub.transport, { sleep: async () => undefined });

    expect((await transport(GET)).status).toBe(504);
    expect(stub.calls()).toBe(3);
  });

  it('should retry socket errors and rethrow the last one', async () => {
    const stub = sequence([new Error('ECONNRESET')]);
    const transport = withRetry(stub.transport, { attempts: 2, sleep: async () => undefined });

    await expect(transport(GET)).rejects.toThrow('ECONNRESET');
    expect(stub.calls()).toBe(2);
  });

  it('should not retry writes', async () => {
    const stub = sequence([{ status: 503, body: '' }, { status: 200, body: '' }]);
    const transport = withRetry(stub.transport, { sleep: async () => undefined });

    expect((await transport({ ...GET, method: 'POST' })).status).toBe(503);
    expect(stub.calls()).toBe(1);
  });
});
