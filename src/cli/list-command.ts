/**
 * todo list - Number the visible tasks and remember the numbering for later commands
 */

import { writeIndexFile } from '../indexer/index-file.js';
import { selectTodos, visibleInListing, type ListedTodo } from '../query/filters.js';
import type { IdIndexRow } from '../schema/index.js';
import type { TaskList } from '../store/task-list.js';
import type { CommandContext } from './context.js';
import { CliUsageError, ExitCode } from './errors.js';
import { rejectUnknownOptions } from './flag-utils.js';
import type { TodoFormatter } from './list-formatters.js';
import { redText, yellowText } from './terminal.js';

export interface RenderedListing {
  lines: string[];
  rows: IdIndexRow[];
}

export async function handleListCommand(args: string[], ctx: CommandContext): Promise<ExitCode> {
  rejectUnknownOptions(args, 'list');
  const lists = selectLists(ctx.collection.values(), args);

  for (const list of lists) {
    for (const warning of list.warnings) {
      const where = warning.line ? `${warning.file}:${warning.line}` : warning.file;
      console.error(yellowText(`Warning: skipped ${warning.list}/${where}: ${warning.message}`));
    }
  }

  const entries = selectTodos(lists, visibleInListing(ctx.now()));
  const { lines, rows } = renderListing(entries, ctx.formatter);
  for (const line of lines) {
    console.log(line);
  }

  writeIndexFile(rows, ctx.cachePath, ctx.now());
  return ExitCode.Ok;
}

/**
 * No names means every list. Unknown names are rejected with the valid choices.
 */
export function selectLists(available: readonly TaskList[], names: readonly string[]): TaskList[] {
  if (names.length === 0) {
    return [...available];
  }

  const byName = new Map(available.map((list) => [list.name, list]));
  const selected: TaskList[] = [];
  for (const name of new Set(names)) {
    const list = byName.get(name);
    if (!list) {
      const choices = [...byName.keys()].sort().join(', ');
      throw new CliUsageError(`Unknown list '${name}'. Available lists are: ${choices || '(none)'}`);
    }
    selected.push(list);
  }
  return selected;
}

/**
 * Positions are assigned before formatting, so a record that fails to format
 * still owns its number and still lands in the index.
 */
export function renderListing(entries: readonly ListedTodo[], formatter: TodoFormatter): RenderedListing {
  const lines: string[] = [];
  const rows: IdIndexRow[] = [];

  entries.forEach(({ list, todo }, i) => {
    const id = i + 1;
    const filename = todo.filename ?? '';
    rows.push({ id, list: list.name, filename });

    const position = String(id).padStart(2);
    try {
      lines.push(`${position} ${formatter.compact(todo, list)}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      lines.push(`${position} ${redText(`Error while showing ${list.name}/${filename}: ${reason}`)}`);
    }
  });

  return { lines, rows };
}

export function printListHelp(): void {
  const lines = [
    'Usage: todo list [<list>...]',
    '',
    'List open tasks, plus tasks completed during the last 7 days, most urgent first.',
    'The numbers shown are the ids that show, edit and done accept.',
    '',
    'Arguments:',
    '  <list>                Only show these lists (default: all)',
    '',
    'Examples:',
    '  todo list             # every list',
    '  todo list work home   # two lists',
  ];
  console.log(lines.join('\n'));
}
