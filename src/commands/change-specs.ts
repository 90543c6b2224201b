import { Errors } from '../core/errors';
import { expandChangeSpecs } from '../core/change-id';
import { colors } from '../utils/colors';

/**
 * Expand change arguments, warning about the ones that are not changes.
 * Throws when nothing usable is left.
 */
export function changesFromArgs(specs: string[], usage: string): string[] {
  const { changes, invalid } = expandChangeSpecs(specs);

  for (const spec of invalid) {
    console.error(colors.yellow('warning: ') + `skipping '${spec}', not a change number, range or Change-Id`);
  }

  if (changes.length === 0) {
    throw Errors.invalidArgument(specs.length > 0 ? specs.join(' ') : '(none)', `at least one change. Usage: ${usage}`);
  }

  return changes;
}
