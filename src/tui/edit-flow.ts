import { DateParseError } from '../cli/errors.js';
import { UNREADABLE_DATE, type TodoFormatter } from '../cli/list-formatters.js';
import { cloneTodo, describeStatus, markTodoDone, reopenTodo, setTodoDue } from '../editor/task-editor.js';
import type { Todo } from '../schema/index.js';
import type { TaskList } from '../store/task-list.js';
import { promptText as defaultPromptText, showKeyMenu as defaultShowKeyMenu } from './prompts.js';
import type { EditorTerm } from './term.js';

export type EditFlowResult = { saved: true; todo: Todo } | { saved: false };

const SAVE = 'save';

export interface EditFlowOptions {
  term: EditorTerm;
  /** Left untouched; edits go to a copy returned on save. */
  todo: Todo;
  list: TaskList;
  lists: readonly TaskList[];
  formatter: TodoFormatter;
  now: () => Date;
  showKeyMenu?: typeof defaultShowKeyMenu;
  promptText?: typeof defaultPromptText;
}

function describeDue(draft: Todo, formatter: TodoFormatter): string {
  return draft.due ? formatter.describeDate(draft.due) : 'none';
}

function describeDraft(draft: Todo, list: TaskList, lists: readonly TaskList[], formatter: TodoFormatter): string[] {
  const others = lists.map((l) => l.name).filter((name) => name !== list.name);
  return [
    `Summary: ${draft.summary || '(empty)'}`,
    `Due:     ${describeDue(draft, formatter)}`,
    `Status:  ${describeStatus(draft)}`,
    `List:    ${list.name}${others.length > 0 ? `  (other lists: ${others.join(', ')})` : ''}`,
  ];
}

/**
 * Menu loop over a working copy: [s] summary, [d] due date, [c] toggle done,
 * Enter saves, Esc cancels. Text prompts canceled with Esc leave the field as it was.
 */
export async function runEditFlow(options: EditFlowOptions): Promise<EditFlowResult> {
  const { term, list, lists, formatter, now } = options;
  const showKeyMenu = options.showKeyMenu ?? defaultShowKeyMenu;
  const promptText = options.promptText ?? defaultPromptText;
  const draft = cloneTodo(options.todo);
  let message: string | null = null;

  while (true) {
    const lines = [
      ...describeDraft(draft, list, lists, formatter),
      ...(message ? ['', `! ${message}`] : []),
      '',
      '[s] summary  [d] due date  [c] toggle done',
    ];
    message = null;

    const choice = await showKeyMenu(term, `Edit task — ${list.name}`, lines, ['s', 'd', 'c'], { enter: SAVE });
    if (choice === null) return { saved: false };
    if (choice === SAVE) return { saved: true, todo: draft };

    if (choice === 's') {
      const next = await promptText(term, `Edit summary — ${list.name}`, 'Summary:', draft.summary);
      if (next !== null) draft.summary = next.trim();
      continue;
    }

    if (choice === 'd') {
      const current = draft.due ? describeDue(draft, formatter) : '';
      const input = await promptText(
        term,
        `Edit due date — ${list.name}`,
        `Due date (${formatter.dateFormat}, empty clears):`,
        current === UNREADABLE_DATE ? '' : current
      );
      if (input === null) continue;
      try {
        setTodoDue(draft, formatter.parseDate(input));
      } catch (error) {
        if (!(error instanceof DateParseError)) throw error;
        message = error.message;
      }
      continue;
    }

    if (choice === 'c') {
      if (draft.completed) reopenTodo(draft);
      else markTodoDone(draft, now());
    }
  }
}
