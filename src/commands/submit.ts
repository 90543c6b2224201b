/**
 * Submit Command
 *
 * Submits changes in the order given and stops at the first one the
 * server refuses.
 */

import { Errors } from '../core/errors';
import { colors } from '../utils/colors';
import { CommandContext, createContext } from './context';
import { changesFromArgs } from './change-specs';

export const SUBMIT_HELP = `
gcl submit - Submit changes for merging

Usage: gcl submit <change>...

Changes are submitted in order; the first failure stops the rest.

Examples:
  gcl submit 12345
  gcl submit 12340..12342
`;

export async function handleSubmit(args: string[], context: CommandContext = createContext()): Promise<void> {
  const flag = args.find(arg => arg.startsWith('-'));
  if (flag) {
    throw Errors.invalidArgument(flag, 'change numbers, ranges or Change-Ids');
  }

  const changes = changesFromArgs(args, 'gcl submit <change>...');

  for (const spec of changes) {
    const change = await context.client.submit(spec);
    console.log(`${colors.green('Submitted')} ${change.number}: ${change.subject} ${colors.dim(`(${change.status.toLowerCase()})`)}`);
  }
}
