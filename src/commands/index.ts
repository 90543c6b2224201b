import { LIST_HELP, handleList } from './list';
import { REVIEW_HELP, handleReview } from './review';
import { SUBMIT_HELP, handleSubmit } from './submit';
import { REBASE_HELP, handleRebase } from './rebase';
import { STATUS_HELP, handleStatus } from './status';
import { ASSIGN_HELP, handleAssign } from './assign';
import { ACCOUNT_HELP, handleAccount } from './account';

export { handleList, handleReview, handleSubmit, handleRebase, handleStatus, handleAssign, handleAccount };
export { createContext } from './context';
export type { CommandContext, CommandClient, CommandRepository } from './context';

export type CommandHandler = (args: string[]) => Promise<void>;

export const COMMANDS: Record<string, { handler: CommandHandler; help: string }> = {
  list: { handler: args => handleList(args), help: LIST_HELP },
  review: { handler: args => handleReview(args), help: REVIEW_HELP },
  submit: { handler: args => handleSubmit(args), help: SUBMIT_HELP },
  assign: { handler: args => handleAssign(args), help: ASSIGN_HELP },
  rebase: { handler: args => handleRebase(args), help: REBASE_HELP },
  status: { handler: args => handleStatus(args), help: STATUS_HELP },
  account: { handler: args => handleAccount(args), help: ACCOUNT_HELP },
};

export function hasHelpFlag(args: string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Print a command's help; false for an unknown command
 */
export function printCommandHelp(command: string): boolean {
  const entry = COMMANDS[command];
  if (!entry) {
    return false;
  }
  console.log(entry.help);
  return true;
}
