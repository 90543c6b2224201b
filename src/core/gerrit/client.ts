/**
 * Gerrit REST client
 *
 * Implements RemoteChangeClient against the Gerrit REST API. Configuration
 * comes in as a struct; nothing is read from the environment here.
 */

import { z } from 'zod';
import { Account, Change, ChangeFilter, PatchSet, Reviewer } from '../types';
import { Errors, ErrorCode, GclError } from '../errors';
import { RemoteChangeClient } from '../remote';
import { GerritConfig, baseUrl } from '../config';
import { HttpMethod, HttpResponse, Transport, httpRequest, withRetry } from './http';
import {
  accountInfoSchema,
  addReviewerResultSchema,
  changeInfoSchema,
  parseGerritJson,
  reviewerInfoSchema,
  toAccount,
  toChange,
  toReviewer,
} from './schemas';
import { PatchSetUploader } from './upload';
import { Logger, logger } from '../../utils/logger';

const CHANGE_OPTIONS = ['ALL_REVISIONS', 'ALL_COMMITS', 'DETAILED_ACCOUNTS'];

export interface GerritClientOptions {
  /** Defaults to Node http(s) with read retries */
  transport?: Transport;
  /** Needed for pushPatchSet only */
  uploader?: PatchSetUploader;
  log?: Logger;
}

/**
 * Build the `q` parameter for a change query; terms are joined with '+'
 */
export function buildQuery(filter: ChangeFilter): string {
  const terms: string[] = [];

  if (filter.status) terms.push(`status:${filter.status}`);
  if (filter.watched) {
    terms.push('is:watched');
  } else if (filter.owner) {
    terms.push(`owner:${filter.owner}`);
  }
  if (filter.project) terms.push(`project:${filter.project}`);
  if (filter.branch) terms.push(`branch:${filter.branch}`);

  const ids = filter.changeIds ?? [];
  if (ids.length === 1) {
    terms.push(`change:${ids[0]}`);
  } else if (ids.length > 1) {
    terms.push(`(${ids.map(id => `change:${id}`).join(' OR ')})`);
  }

  return terms.map(term => encodeURIComponent(term)).join('+');
}

function optionParams(): string {
  return CHANGE_OPTIONS.map(option => `o=${option}`).join('&');
}

export class GerritClient implements RemoteChangeClient {
  private readonly base: string;
  private readonly authorization: string | null;
  private readonly transport: Transport;
  private readonly uploader: PatchSetUploader | null;
  private readonly log: Logger;

  constructor(config: GerritConfig, options: GerritClientOptions = {}) {
    this.authorization =
      config.username && config.password
        ? `Basic ${Buffer.from(`${config.username}:${config.password}`).toString('base64')}`
        : null;
    // Authenticated REST calls live under /a/
    this.base = `${baseUrl(config)}${this.authorization ? '/a' : ''}`;
    this.log = options.log ?? logger.child({ component: 'gerrit' });
    this.transport = options.transport ?? withRetry(request => httpRequest(request), { log: this.log });
    this.uploader = options.uploader ?? null;
  }

  async getChange(changeId: string): Promise<Change | null> {
    const what = `change ${changeId}`;
    const response = await this.request('GET', `/changes/${encodeURIComponent(changeId)}?${optionParams()}`);

    if (response.status === 404) {
      return null;
    }
    this.expectOk(response, what);

    return toChange(this.parse(changeInfoSchema, response.body, what));
  }

  async getPatchSets(changeId: string): Promise<PatchSet[]> {
    const change = await this.getChange(changeId);
    if (!change) {
      throw Errors.changeNotFound(changeId);
    }
    return change.patchSets;
  }

  async listChanges(filter: ChangeFilter): Promise<Change[]> {
    const query = buildQuery(filter);
    const params = [query ? `q=${query}` : '', optionParams(), filter.limit ? `n=${filter.limit}` : '']
      .filter(Boolean)
      .join('&');

    const response = await this.request('GET', `/changes/?${params}`);
    this.expectOk(response, 'change query');

    const infos = this.parse(z.array(changeInfoSchema), response.body, 'change query');
    this.log.debug('listed changes', { query: decodeURIComponent(query), count: infos.length });
    return infos.map(toChange);
  }

  async pushPatchSet(changeId: string, commit: string, parentRef: string): Promise<PatchSet> {
    if (!this.uploader) {
      throw Errors.invalidState('This client was created without an uploader and cannot push patch sets');
    }

    const change = await this.getChange(changeId);
    if (!change) {
      throw Errors.changeNotFound(changeId);
    }

    this.uploader.upload(commit, change.branch);

    const patchSets = await this.getPatchSets(changeId);
    const uploaded = patchSets.find(ps => ps.commit === commit);
    if (!uploaded) {
      throw Errors.invalidResponse(`change ${changeId}`, `no patch set for pushed commit ${commit.slice(0, 8)}`);
    }
    if (uploaded.parent !== parentRef) {
      this.log.warn('patch set parent differs from the requested base', {
        changeId,
        parent: uploaded.parent.slice(0, 8),
        expected: parentRef.slice(0, 8),
      });
    }

    this.log.info('uploaded patch set', { changeId, patchSet: uploaded.number });
    return uploaded;
  }

  async submit(changeId: string): Promise<Change> {
    const what = `submit of ${changeId}`;
    const response = await this.request('POST', `/changes/${encodeURIComponent(changeId)}/submit`, {});

    if (response.status === 404) {
      throw Errors.changeNotFound(changeId);
    }
    if (response.status === 409) {
      const details = response.body.trim();
      throw /conflict/i.test(details) ? Errors.serverConflict(changeId, details) : Errors.notReady(changeId, details);
    }
    this.expectOk(response, what);

    return toChange(this.parse(changeInfoSchema, response.body, what));
  }

  /**
   * Ask the server to rebase a change, onto `base` or the tip of its branch
   */
  async rebaseOnServer(changeId: string, base?: string): Promise<Change> {
    const what = `rebase of ${changeId}`;
    const response = await this.request(
      'POST',
      `/changes/${encodeURIComponent(changeId)}/rebase`,
      base ? { base } : {}
    );

    if (response.status === 404) {
      throw Errors.changeNotFound(changeId);
    }
    if (response.status === 409) {
      throw Errors.serverConflict(changeId, response.body.trim());
    }
    this.expectOk(response, what);

    return toChange(this.parse(changeInfoSchema, response.body, what));
  }

  /**
   * Formatted patch of a revision ("current" for the latest)
   */
  async getPatch(changeId: string, revision: string | number = 'current'): Promise<string> {
    const response = await this.request(
      'GET',
      `/changes/${encodeURIComponent(changeId)}/revisions/${encodeURIComponent(String(revision))}/patch`
    );

    if (response.status === 404) {
      throw Errors.changeNotFound(changeId);
    }
    this.expectOk(response, `patch of ${changeId}`);

    return Buffer.from(response.body.trim(), 'base64').toString('utf8');
  }

  async getReviewers(changeId: string): Promise<Reviewer[]> {
    const what = `reviewers of ${changeId}`;
    const response = await this.request('GET', `/changes/${encodeURIComponent(changeId)}/reviewers/`);

    if (response.status === 404) {
      throw Errors.changeNotFound(changeId);
    }
    this.expectOk(response, what);

    return this.parse(z.array(reviewerInfoSchema), response.body, what).map(toReviewer);
  }

  /**
   * Add an account, or every member of a group, as reviewer.
   * Large groups need `confirmed`; without it the server only asks for it.
   */
  async addReviewer(changeId: string, reviewer: string, confirmed = false): Promise<Reviewer[]> {
    const what = `reviewer ${reviewer} of ${changeId}`;
    const response = await this.request(
      'POST',
      `/changes/${encodeURIComponent(changeId)}/reviewers`,
      confirmed ? { reviewer, confirmed: true } : { reviewer }
    );

    if (response.status === 404) {
      throw Errors.changeNotFound(changeId);
    }
    if (response.status === 400 || response.status === 422) {
      throw Errors.reviewerRejected(changeId, reviewer, response.body.trim());
    }
    this.expectOk(response, what);

    const result = this.parse(addReviewerResultSchema, response.body, what);
    if (result.confirm) {
      throw Errors.confirmationRequired(changeId, reviewer, result.error ?? 'the server asks for confirmation');
    }
    if (result.error) {
      throw Errors.reviewerRejected(changeId, reviewer, result.error);
    }

    this.log.debug('added reviewer', { changeId, reviewer, count: result.reviewers?.length ?? 0 });
    return (result.reviewers ?? []).map(toReviewer);
  }

  /**
   * Remove a reviewer; null when the account is not a reviewer of the change
   */
  async deleteReviewer(changeId: string, account: string): Promise<Reviewer | null> {
    const what = `reviewer ${account} of ${changeId}`;
    const path = `/changes/${encodeURIComponent(changeId)}/reviewers/${encodeURIComponent(account)}`;

    const lookup = await this.request('GET', path);
    if (lookup.status === 404) {
      return null;
    }
    this.expectOk(lookup, what);
    const infos = this.parse(z.array(reviewerInfoSchema), lookup.body, what);

    const response = await this.request('DELETE', path);
    if (response.status === 404) {
      return null;
    }
    this.expectOk(response, what);

    this.log.debug('deleted reviewer', { changeId, account });
    return infos.length > 0 ? toReviewer(infos[0]) : null;
  }

  /**
   * Account details; "self" is the authenticated user
   */
  async getAccount(account = 'self'): Promise<Account> {
    const what = `account ${account}`;
    const response = await this.request('GET', `/accounts/${encodeURIComponent(account)}`);

    if (response.status === 404) {
      throw Errors.accountNotFound(account);
    }
    this.expectOk(response, what);

    return toAccount(this.parse(accountInfoSchema, response.body, what));
  }

  private async request(method: HttpMethod, path: string, body?: object): Promise<HttpResponse> {
    const url = `${this.base}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.authorization) {
      headers.Authorization = this.authorization;
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json; charset=UTF-8';
    }

    let response: HttpResponse;
    const done = this.log.time('request', { method, path });
    try {
      response = await this.transport({
        method,
        url,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      throw Errors.networkError(url, error instanceof Error ? error.message : String(error));
    }
    done();

    if (response.status === 401 || response.status === 403) {
      throw Errors.authenticationFailed(url, response.body.trim() || `HTTP ${response.status}`);
    }
    if (response.status >= 500) {
      throw Errors.networkError(url, `HTTP ${response.status}`);
    }

    return response;
  }

  private expectOk(response: HttpResponse, what: string): void {
    if (response.status < 200 || response.status >= 300) {
      throw new GclError(
        `Request for ${what} failed: HTTP ${response.status}${response.body.trim() ? ` ${response.body.trim()}` : ''}`,
        ErrorCode.OPERATION_FAILED,
        [],
        { status: response.status }
      );
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: string, what: string): z.output<S> {
    let json: unknown;
    try {
      json = parseGerritJson(body);
    } catch (error) {
      throw Errors.invalidResponse(what, error instanceof Error ? error.message : String(error));
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw Errors.invalidResponse(what, issues.join('; '));
    }
    return result.data;
  }
}
