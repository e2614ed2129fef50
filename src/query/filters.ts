import type { Todo } from '../schema/index.js';
import type { TaskList } from '../store/task-list.js';

export const RECENT_COMPLETION_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

export interface ListedTodo {
  list: TaskList;
  todo: Todo;
}

export type TodoFilter = (todo: Todo) => boolean;

/**
 * Open records, plus records completed within the last seven days.
 * Completion exactly seven days before `now` falls outside the window.
 */
export function visibleInListing(now: Date): TodoFilter {
  const windowStart = now.getTime() - RECENT_COMPLETION_WINDOW_MS;
  return (todo) => {
    if (!todo.completed) return true;
    if (!todo.completedAt) return false;
    return todo.completedAt.getTime() > windowStart;
  };
}

function dueTime(todo: Todo): number | null {
  if (!todo.due) return null;
  const time = todo.due.getTime();
  return Number.isNaN(time) ? null : time;
}

/**
 * Positive when `a` outranks `b`: open before done, dated before undated,
 * earlier due before later, then list name and filename ascending.
 */
export function compareByPriority(a: ListedTodo, b: ListedTodo): number {
  if (a.todo.completed !== b.todo.completed) {
    return a.todo.completed ? -1 : 1;
  }

  const aDue = dueTime(a.todo);
  const bDue = dueTime(b.todo);
  if (aDue !== bDue) {
    if (aDue === null) return -1;
    if (bDue === null) return 1;
    return bDue - aDue;
  }

  const listCmp = a.list.name.localeCompare(b.list.name);
  if (listCmp !== 0) return -listCmp;
  return -(a.todo.filename ?? '').localeCompare(b.todo.filename ?? '');
}

/**
 * Union of the given lists' records that pass `filter`, highest priority first.
 */
export function selectTodos(lists: readonly TaskList[], filter: TodoFilter): ListedTodo[] {
  const selected: ListedTodo[] = [];
  for (const list of lists) {
    for (const todo of list.todos.values()) {
      if (filter(todo)) selected.push({ list, todo });
    }
  }
  return selected.sort((a, b) => compareByPriority(b, a));
}
