/**
 * List Command
 *
 * Usage:
 *   gcl list                       Your open changes
 *   gcl list --status merged       Your merged changes
 *   gcl list --watched             Open changes you watch
 *   gcl list --owner alice         Someone else's changes
 */

import { Change } from '../core/types';
import { Errors } from '../core/errors';
import { colors } from '../utils/colors';
import { CommandContext, createContext } from './context';

export const LIST_HELP = `
gcl list - List changes on the review server

Usage: gcl list [options]

Options:
  --status <status>   open (default), merged, abandoned, closed, reviewed, submitted
  --owner <who>       Owner of the changes (default: self)
  --watched           Changes in projects you watch instead of your own
  --branch <branch>   Only changes for this target branch
  --limit <n>         At most n changes

Examples:
  gcl list
  gcl list --status merged --limit 10
  gcl list --watched --branch main
`;

export const CHANGE_STATUSES = ['open', 'merged', 'abandoned', 'closed', 'reviewed', 'submitted'];

export interface ListOptions {
  status: string;
  owner: string | null;
  watched: boolean;
  branch: string | null;
  limit: number | null;
}

export function parseListArgs(args: string[]): ListOptions {
  const options: ListOptions = { status: 'open', owner: 'self', watched: false, branch: null, limit: null };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    switch (arg) {
      case '--status':
        if (!value || !CHANGE_STATUSES.includes(value)) {
          throw Errors.invalidArgument(`--status ${value ?? ''}`.trim(), CHANGE_STATUSES.join(', '));
        }
        options.status = value;
        i++;
        break;

      case '--owner':
        if (!value) throw Errors.invalidArgument('--owner', 'an account name, email or "self"');
        options.owner = value;
        i++;
        break;

      case '--watched':
        options.watched = true;
        break;

      case '--branch':
        if (!value) throw Errors.invalidArgument('--branch', 'a branch name');
        options.branch = value;
        i++;
        break;

      case '--limit':
        if (!value || !/^[1-9]\d*$/.test(value)) {
          throw Errors.invalidArgument(`--limit ${value ?? ''}`.trim(), 'a positive number');
        }
        options.limit = parseInt(value, 10);
        i++;
        break;

      default:
        throw Errors.invalidArgument(arg, 'one of --status, --owner, --watched, --branch, --limit');
    }
  }

  if (options.watched) {
    options.owner = null;
  }

  return options;
}

/**
 * One line per change: number, status, branch, subject, owner
 */
export function formatChangeLine(change: Change): string {
  const owner = change.owner.name ?? change.owner.username ?? change.owner.email ?? '';
  const status = change.status === 'NEW' ? colors.green('open') : colors.dim(change.status.toLowerCase());
  return [
    colors.yellow(String(change.number).padStart(7)),
    status,
    colors.cyan(change.branch),
    change.subject,
    colors.dim(owner),
  ].join('  ');
}

export async function handleList(args: string[], context: CommandContext = createContext()): Promise<void> {
  const options = parseListArgs(args);

  const changes = await context.client.listChanges({
    status: options.status,
    owner: options.owner ?? undefined,
    watched: options.watched,
    branch: options.branch ?? undefined,
    project: context.config.project ?? undefined,
    limit: options.limit ?? undefined,
  });

  if (changes.length === 0) {
    console.log('No changes found');
    return;
  }

  for (const change of changes) {
    console.log(formatChangeLine(change));
  }
}
