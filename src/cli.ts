#!/usr/bin/env node

import { COMMANDS, hasHelpFlag, printCommandHelp } from './commands';
import { GclError, findSimilar } from './core/errors';
import { setLogLevel, logger } from './utils/logger';
import { colors, colorsEnabled } from './utils/colors';

const VERSION = '1.0.0';

const HELP = `
gcl - Work with Gerrit changes from a git working copy

Usage: gcl [-v] <command> [<args>]

Changes:
  list                  List changes on the server (default: your open ones)
  review <change>...    Show change details, patch sets and votes
  submit <change>...    Submit changes for merging
  assign <change>...    Add (+name) or remove (-name) reviewers

Stacks:
  status                Show how local commits relate to their changes
  rebase <change>       Rebase the stack containing a change and upload it

Accounts:
  account [<account>...]  Show account details (default: yours)

Options:
  -v, --verbose         Debug logging on stderr
  -h, --help            Show help (gcl <command> --help for a command)
  --version             Show version

Configuration is read from .gitreview ([gerrit] host, project,
defaultbranch, defaultremote, username, password), first in your home
directory and then in the working copy.

Examples:
  gcl list --status merged
  gcl review 12345..12347
  gcl assign 12345 +alice -bob
  gcl rebase 12345 --dry-run
`;

const GLOBAL_FLAGS = new Set(['-v', '--verbose', '-h', '--help', '--version']);

function parseArgs(args: string[]): { command: string; args: string[]; flags: Set<string> } {
  const flags = new Set<string>();
  let i = 0;

  // Global flags come before the command
  while (i < args.length && GLOBAL_FLAGS.has(args[i])) {
    flags.add(args[i]);
    i++;
  }

  return { command: args[i] ?? '', args: args.slice(i + 1), flags };
}

function printError(error: unknown): void {
  if (error instanceof GclError) {
    console.error(error.format(colorsEnabled()));
  } else if (error instanceof Error) {
    console.error(colors.red('error: ') + error.message);
    logger.debug('stack', { stack: error.stack });
  } else {
    console.error(colors.red('error: ') + String(error));
  }
}

async function main(): Promise<number> {
  const { command, args, flags } = parseArgs(process.argv.slice(2));

  if (flags.has('-v') || flags.has('--verbose')) {
    setLogLevel('debug');
  }

  if (flags.has('--version')) {
    console.log(`gcl version ${VERSION}`);
    return 0;
  }

  if (!command || command === 'help') {
    if (command === 'help' && args.length > 0 && printCommandHelp(args[0])) {
      return 0;
    }
    console.log(HELP);
    return 0;
  }

  const entry = COMMANDS[command];
  if (!entry) {
    const similar = findSimilar(command, Object.keys(COMMANDS));
    console.error(`gcl: '${command}' is not a gcl command. See 'gcl --help'.`);
    if (similar.length > 0) {
      console.error('\nDid you mean one of these?');
      for (const cmd of similar) {
        console.error(`  ${cmd}`);
      }
    }
    return 1;
  }

  if (flags.has('-h') || flags.has('--help') || hasHelpFlag(args)) {
    printCommandHelp(command);
    return 0;
  }

  try {
    await entry.handler(args);
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    printError(error);
    process.exitCode = 1;
  });
