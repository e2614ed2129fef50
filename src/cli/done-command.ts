/**
 * todo done - Mark one or more tasks from the last listing as completed
 */

import { markTodoDone } from '../editor/task-editor.js';
import { resolveTodo } from '../indexer/index-file.js';
import type { ListedTodo } from '../query/filters.js';
import type { CommandContext } from './context.js';
import { CliUsageError, ExitCode, TaskResolutionError } from './errors.js';
import { parseTaskId, rejectUnknownOptions } from './flag-utils.js';
import { dimText, greenText } from './terminal.js';

export async function handleDoneCommand(args: string[], ctx: CommandContext): Promise<ExitCode> {
  rejectUnknownOptions(args, 'done');
  if (args.length === 0) {
    throw new CliUsageError('Missing task id. Usage: todo done <id>...');
  }

  // Every id is validated before anything is written.
  const ids = args.map(parseTaskId);
  let failed = false;

  for (const id of ids) {
    const resolved = resolveForBatch(ctx, id);
    if (!resolved) {
      failed = true;
      continue;
    }

    const { todo, list } = resolved;
    const change = markTodoDone(todo, ctx.now());
    if (change.alreadyInState) {
      console.log(`${dimText('Task already done:')} ${id} (${todo.summary})`);
      continue;
    }

    list.save(todo);
    console.log(`${greenText('Marked as done:')} ${id} (${todo.summary})`);
  }

  return failed ? ExitCode.Failure : ExitCode.Ok;
}

/**
 * Resolution failures are reported here and isolated to their id; anything else propagates.
 */
function resolveForBatch(ctx: CommandContext, id: number): ListedTodo | null {
  try {
    return resolveTodo(ctx.collection, ctx.cachePath, id);
  } catch (error) {
    if (!(error instanceof TaskResolutionError)) throw error;
    console.error(`Error: ${error.message}`);
    return null;
  }
}

export function printDoneHelp(): void {
  console.log(`Usage: todo done <id>...

Mark tasks as completed.

Notes:
  - Ids come from the last \`todo list\`; each id is handled on its own, so one
    id that no longer resolves does not stop the others.

Arguments:
  <id>              Task number from the last \`todo list\` (repeatable)

Examples:
  todo done 3
  todo done 1 4 5
`);
}
