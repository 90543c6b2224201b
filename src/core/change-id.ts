/**
 * Change-Id trailers and change specifiers
 *
 * A change can be named on the command line by:
 *   - its number:            12345
 *   - a range of numbers:    12340..12345
 *   - its Change-Id:         I0123456789abcdef0123456789abcdef01234567
 */

import { Errors } from './errors';

/** A Gerrit Change-Id */
export const CHANGE_ID = /^I[0-9a-f]{8,40}$/;

/** A change number */
export const CHANGE_NUMBER = /^\d+$/;

/** A range of change numbers, e.g. 345..349 */
export const CHANGE_NUMBER_RANGE = /^(\d+)\.\.(\d+)$/;

const TRAILER = /^Change-Id:\s*(I[0-9a-f]{8,40})\s*$/;

/**
 * Extract the Change-Id trailer from a commit message.
 *
 * Only the last paragraph is considered, and the last Change-Id line
 * in it wins, matching what the server does on upload.
 */
export function parseChangeId(message: string): string | null {
  const paragraphs = message.replace(/\r\n/g, '\n').trim().split(/\n\s*\n/);
  const footer = paragraphs[paragraphs.length - 1];

  let found: string | null = null;
  for (const line of footer.split('\n')) {
    const match = line.trim().match(TRAILER);
    if (match) {
      found = match[1];
    }
  }
  return found;
}

/**
 * Return the message with its Change-Id trailer set to the given id.
 * An existing trailer is replaced; otherwise one is appended.
 */
export function withChangeId(message: string, changeId: string): string {
  const body = message.replace(/\r\n/g, '\n').replace(/\s+$/, '');
  const lines = body.split('\n');

  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim() === '') break;
    if (TRAILER.test(lines[i].trim())) {
      lines[i] = `Change-Id: ${changeId}`;
      return `${lines.join('\n')}\n`;
    }
  }

  const lastParagraph = body.split(/\n\s*\n/).pop() ?? '';
  const isTrailerBlock = lastParagraph
    .split('\n')
    .every(line => /^[A-Za-z0-9-]+:\s/.test(line));
  const separator = isTrailerBlock && lines.length > 1 ? '\n' : '\n\n';
  return `${body}${separator}Change-Id: ${changeId}\n`;
}

/**
 * Expand command-line change specifiers.
 * Invalid specifiers are returned separately so the caller can warn about them.
 */
export function expandChangeSpecs(specs: string[]): { changes: string[]; invalid: string[] } {
  const changes: string[] = [];
  const invalid: string[] = [];

  for (const spec of specs) {
    if (CHANGE_ID.test(spec) || CHANGE_NUMBER.test(spec)) {
      changes.push(spec);
      continue;
    }

    const range = spec.match(CHANGE_NUMBER_RANGE);
    if (range) {
      const lower = parseInt(range[1], 10);
      const upper = parseInt(range[2], 10);
      if (lower > upper) {
        invalid.push(spec);
        continue;
      }
      for (let n = lower; n <= upper; n++) {
        changes.push(String(n));
      }
      continue;
    }

    invalid.push(spec);
  }

  return { changes, invalid };
}

/**
 * Validate a single change specifier (number or Change-Id)
 */
export function parseChangeSpec(spec: string): string {
  if (CHANGE_ID.test(spec) || CHANGE_NUMBER.test(spec)) {
    return spec;
  }
  throw Errors.invalidArgument(spec, 'a change number or a Change-Id (I followed by 8-40 hex digits)');
}
