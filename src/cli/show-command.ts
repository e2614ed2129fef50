/**
 * todo show - Display one task from the last listing
 */

import { resolveTodo } from '../indexer/index-file.js';
import type { CommandContext } from './context.js';
import { CliUsageError, ExitCode } from './errors.js';
import { parseTaskId, rejectUnknownOptions } from './flag-utils.js';

export async function handleShowCommand(args: string[], ctx: CommandContext): Promise<ExitCode> {
  rejectUnknownOptions(args, 'show');
  const [raw, ...rest] = args;
  if (raw === undefined || rest.length > 0) {
    throw new CliUsageError('Usage: todo show <id>');
  }

  const { todo, list } = resolveTodo(ctx.collection, ctx.cachePath, parseTaskId(raw));
  console.log(ctx.formatter.detailed(todo, list));
  return ExitCode.Ok;
}

export function printShowHelp(): void {
  const lines = [
    'Usage: todo show <id>',
    '',
    'Display details about a task.',
    '',
    'Arguments:',
    '  <id>                  Task number from the last `todo list`',
    '',
    'Examples:',
    '  todo show 3',
  ];
  console.log(lines.join('\n'));
}
