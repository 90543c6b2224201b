/**
 * Gerrit REST payloads
 *
 * Only the fields gcl reads are declared; zod drops the rest.
 */

import { z } from 'zod';
import { Account, Change, PatchSet, Reviewer } from '../types';

// Gerrit's anti-XSSI prefix on every JSON response
const XSSI_PREFIX = ")]}'";

/**
 * Parse a Gerrit timestamp ("2024-03-01 09:15:42.000000000", always UTC)
 */
export function parseTimestamp(value: string): Date | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?$/);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds, fraction] = match;
  const millis = fraction ? parseInt(fraction.padEnd(3, '0').slice(0, 3), 10) : 0;

  return new Date(
    Date.UTC(
      parseInt(year, 10),
      parseInt(month, 10) - 1,
      parseInt(day, 10),
      parseInt(hours, 10),
      parseInt(minutes, 10),
      parseInt(seconds, 10),
      millis
    )
  );
}

const timestampSchema = z.string().transform((value, ctx) => {
  const date = parseTimestamp(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp: ${value}` });
    return z.NEVER;
  }
  return date;
});

export const accountInfoSchema = z.object({
  _account_id: z.number().optional(),
  name: z.string().optional(),
  email: z.string().optional(),
  username: z.string().optional(),
});

export const revisionInfoSchema = z.object({
  _number: z.number().int().positive(),
  created: timestampSchema,
  ref: z.string().optional(),
  uploader: accountInfoSchema.optional(),
  commit: z.object({
    parents: z.array(z.object({ commit: z.string() })),
  }),
});

export const changeInfoSchema = z.object({
  id: z.string(),
  project: z.string(),
  branch: z.string(),
  change_id: z.string(),
  subject: z.string(),
  status: z.enum(['NEW', 'MERGED', 'ABANDONED']),
  _number: z.number().int(),
  owner: accountInfoSchema,
  created: timestampSchema.optional(),
  updated: timestampSchema.optional(),
  mergeable: z.boolean().optional(),
  submittable: z.boolean().optional(),
  current_revision: z.string().optional(),
  revisions: z.record(revisionInfoSchema).optional(),
  _more_changes: z.boolean().optional(),
});

export const reviewerInfoSchema = accountInfoSchema.extend({
  approvals: z.record(z.string()).optional(),
});

// Gerrit answers 200 with `error` set when it will not add the reviewer
export const addReviewerResultSchema = z.object({
  input: z.string().optional(),
  reviewers: z.array(reviewerInfoSchema).optional(),
  error: z.string().optional(),
  confirm: z.boolean().optional(),
});

export type AccountInfo = z.infer<typeof accountInfoSchema>;
export type ChangeInfo = z.infer<typeof changeInfoSchema>;

/**
 * Strip the XSSI prefix and parse JSON
 */
export function parseGerritJson(body: string): unknown {
  const text = body.startsWith(XSSI_PREFIX) ? body.slice(XSSI_PREFIX.length) : body;
  return JSON.parse(text);
}

export function toAccount(info: AccountInfo): Account {
  return {
    accountId: info._account_id,
    name: info.name,
    email: info.email,
    username: info.username,
  };
}

export function toChange(info: ChangeInfo): Change {
  const patchSets: PatchSet[] = Object.entries(info.revisions ?? {})
    .map(([commit, revision]) => ({
      number: revision._number,
      commit,
      parent: revision.commit.parents.length > 0 ? revision.commit.parents[0].commit : '',
      createdAt: revision.created,
      ref: revision.ref,
      uploader: revision.uploader ? toAccount(revision.uploader) : undefined,
    }))
    .sort((a, b) => a.number - b.number);

  return {
    id: info.id,
    changeId: info.change_id,
    number: info._number,
    project: info.project,
    branch: info.branch,
    subject: info.subject,
    status: info.status,
    owner: toAccount(info.owner),
    patchSets,
    created: info.created,
    updated: info.updated,
    mergeable: info.mergeable,
    submittable: info.submittable,
  };
}

export function toReviewer(info: z.infer<typeof reviewerInfoSchema>): Reviewer {
  const { approvals, ...account } = info;
  const votes: Record<string, string> = {};
  for (const [label, value] of Object.entries(approvals ?? {})) {
    votes[label] = value.trim();
  }
  return { account: toAccount(account), approvals: votes };
}
