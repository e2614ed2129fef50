/**
 * todo new - Create a task in a list
 */

import { createTodo } from '../editor/task-editor.js';
import type { CommandContext } from './context.js';
import { CliUsageError, ExitCode } from './errors.js';
import { extractBooleanFlags, extractFlags, flagValue, rejectUnknownOptions } from './flag-utils.js';
import { selectLists } from './list-command.js';
import { dimText } from './terminal.js';

export async function handleNewCommand(args: string[], ctx: CommandContext): Promise<ExitCode> {
  // Everything after `--` is summary text, even if it looks like an option.
  const separator = args.indexOf('--');
  const literal = separator === -1 ? [] : args.splice(separator).slice(1);

  const boolFlags = extractBooleanFlags(args, ['--interactive', '-i']);
  const valueFlags = extractFlags(args, ['--list', '-l', '--due', '-d']);
  rejectUnknownOptions(args, 'new');

  const listName = flagValue(valueFlags, '--list', '-l') ?? ctx.config.defaultList;
  if (listName === undefined) {
    throw new CliUsageError("Missing option '--list' / '-l'. Usage: todo new <summary...> --list <list>");
  }
  const [list] = selectLists(ctx.collection.values(), [listName]);
  if (!list) {
    throw new CliUsageError(`Unknown list '${listName}'.`);
  }

  const due = ctx.formatter.parseDate(flagValue(valueFlags, '--due', '-d') ?? '');
  const todo = createTodo([...args, ...literal].join(' '), due);

  if (boolFlags.has('--interactive') || boolFlags.has('-i')) {
    const saved = await ctx.editor.edit(todo, list, ctx.collection.values());
    console.log();
    if (!saved) {
      console.error(dimText('Canceled; nothing was saved.'));
      return ExitCode.Canceled;
    }
  }

  if (!todo.summary.trim()) {
    throw new CliUsageError('No summary specified. Usage: todo new <summary...> --list <list>');
  }

  list.save(todo);
  console.log(ctx.formatter.detailed(todo, list));
  return ExitCode.Ok;
}

export function printNewHelp(): void {
  console.log(`Usage: todo new <summary...> --list <list> [options]

Create a new task with SUMMARY.

Options:
  --list, -l <list>     List to create the task in (default: defaultList from config)
  --due, -d <date>      Due date, in the configured dateFormat or, unless
                        --no-human-time is given, an informal phrase ("tomorrow")
  --interactive, -i     Open the editor before saving
  -h, --help            Show this help

Examples:
  todo new Pay rent --list home --due 2026-11-01
  todo new Call the bank -l home -d "tomorrow 10am"
  todo new -l work -i
`);
}
