import type { CommandContext } from './context.js';
import { handleDoneCommand, printDoneHelp } from './done-command.js';
import { handleEditCommand, printEditHelp } from './edit-command.js';
import type { ExitCode } from './errors.js';
import { handleListCommand, printListHelp } from './list-command.js';
import { handleNewCommand, printNewHelp } from './new-command.js';
import { handleShowCommand, printShowHelp } from './show-command.js';

export interface CommandSpec {
  usage: string;
  summary: string;
  run: (args: string[], ctx: CommandContext) => Promise<ExitCode>;
  printHelp: () => void;
}

export const COMMANDS = {
  new: {
    usage: 'new <summary...> -l <list>',
    summary: 'Create a task',
    run: handleNewCommand,
    printHelp: printNewHelp,
  },
  list: {
    usage: 'list [<list>...]',
    summary: 'List open and recently completed tasks',
    run: handleListCommand,
    printHelp: printListHelp,
  },
  show: {
    usage: 'show <id>',
    summary: 'Show details about a task',
    run: handleShowCommand,
    printHelp: printShowHelp,
  },
  edit: {
    usage: 'edit <id>',
    summary: 'Edit a task interactively',
    run: handleEditCommand,
    printHelp: printEditHelp,
  },
  done: {
    usage: 'done <id>...',
    summary: 'Mark tasks as done',
    run: handleDoneCommand,
    printHelp: printDoneHelp,
  },
} satisfies Record<string, CommandSpec>;

export type CommandName = keyof typeof COMMANDS;

/** Runs when no command is given at all. */
export const DEFAULT_COMMAND: CommandName = 'list';

function isCommandName(name: string): name is CommandName {
  return Object.hasOwn(COMMANDS, name);
}

export function findCommand(name: string): CommandSpec | undefined {
  return isCommandName(name) ? COMMANDS[name] : undefined;
}
