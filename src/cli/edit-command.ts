/**
 * todo edit - Edit a task interactively
 */

import { resolveTodo } from '../indexer/index-file.js';
import type { CommandContext } from './context.js';
import { CliUsageError, ExitCode } from './errors.js';
import { parseTaskId, rejectUnknownOptions } from './flag-utils.js';
import { dimText, greenText } from './terminal.js';

export async function handleEditCommand(args: string[], ctx: CommandContext): Promise<ExitCode> {
  rejectUnknownOptions(args, 'edit');
  const [raw, ...rest] = args;
  if (raw === undefined || rest.length > 0) {
    throw new CliUsageError('Usage: todo edit <id>');
  }

  const id = parseTaskId(raw);
  const { todo, list } = resolveTodo(ctx.collection, ctx.cachePath, id);

  const saved = await ctx.editor.edit(todo, list, ctx.collection.values());
  if (!saved) {
    console.log(dimText('Edit canceled.'));
    return ExitCode.Ok;
  }

  list.save(todo);
  console.log(`${greenText('Saved:')} ${id} (${todo.summary})`);
  return ExitCode.Ok;
}

export function printEditHelp(): void {
  console.log(`Usage: todo edit <id>

Edit a task in a full-screen editor.

Keys:
  s                 Edit the summary
  d                 Edit the due date
  c                 Toggle done
  Enter             Save and quit
  Esc               Quit without saving

Arguments:
  <id>              Task number from the last \`todo list\`

Examples:
  todo edit 2
`);
}
