/**
 * Account Command
 *
 * Shows username, name and email of accounts, yours by default.
 */

import { Account } from '../core/types';
import { Errors } from '../core/errors';
import { colors } from '../utils/colors';
import { CommandContext, createContext } from './context';

export const ACCOUNT_HELP = `
gcl account - Show account details

Usage: gcl account [<account>...]

An account is a username, an email address, an account id or "self"
(the default).

Examples:
  gcl account
  gcl account alice bob@example.com
`;

const COLUMNS = ['Username', 'Name', 'Email'];

/**
 * Left-aligned table, one row per account
 */
export function formatAccounts(accounts: Account[]): string[] {
  const rows = accounts.map(account => [account.username ?? '-', account.name ?? '-', account.email ?? '-']);
  const widths = COLUMNS.map((title, column) => Math.max(title.length, ...rows.map(row => row[column].length)));
  const line = (cells: string[]): string => cells.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

  return [colors.bold(line(COLUMNS)), ...rows.map(line)];
}

export async function handleAccount(args: string[], context: CommandContext = createContext()): Promise<void> {
  const flag = args.find(arg => arg.startsWith('-'));
  if (flag) {
    throw Errors.invalidArgument(flag, 'account names');
  }

  const accounts: Account[] = [];
  const seen = new Set<number>();

  for (const name of args.length > 0 ? args : ['self']) {
    const account = await context.client.getAccount(name);
    if (account.accountId !== undefined) {
      if (seen.has(account.accountId)) continue;
      seen.add(account.accountId);
    }
    accounts.push(account);
  }

  for (const line of formatAccounts(accounts)) {
    console.log(line);
  }
}
