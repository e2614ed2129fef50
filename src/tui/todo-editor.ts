import type { TodoFormatter } from '../cli/list-formatters.js';
import { applyTodoEdits } from '../editor/task-editor.js';
import type { Todo } from '../schema/index.js';
import type { TaskList } from '../store/task-list.js';
import { runEditFlow } from './edit-flow.js';
import { openTerminalSession, type TerminalSession } from './term.js';

/**
 * Blocking edit session. Resolves true when the user saved; the record has then
 * been updated in place. On false the record is unchanged and nothing is persisted.
 */
export interface TodoEditor {
  edit(todo: Todo, list: TaskList, lists: readonly TaskList[]): Promise<boolean>;
}

export class TerminalTodoEditor implements TodoEditor {
  constructor(
    private readonly formatter: TodoFormatter,
    private readonly now: () => Date,
    private readonly openSession: () => TerminalSession = openTerminalSession
  ) {}

  async edit(todo: Todo, list: TaskList, lists: readonly TaskList[]): Promise<boolean> {
    const session = this.openSession();
    try {
      const result = await runEditFlow({
        term: session.term,
        todo,
        list,
        lists,
        formatter: this.formatter,
        now: this.now,
      });
      if (result.saved) {
        applyTodoEdits(todo, result.todo);
      }
      return result.saved;
    } finally {
      session.close();
    }
  }
}
