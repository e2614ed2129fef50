import { randomUUID } from 'node:crypto';
import type { Todo } from '../schema/index.js';

export type TaskStatus = 'open' | 'done';

export interface StatusChange {
  previousStatus: TaskStatus;
  newStatus: TaskStatus;
  alreadyInState: boolean;
}

export function createTodo(summary: string, due: Date | null = null): Todo {
  return {
    uid: randomUUID(),
    filename: null,
    summary,
    due,
    status: 'NEEDS-ACTION',
    completed: false,
    completedAt: null,
    extra: [],
  };
}

export function cloneTodo(todo: Todo): Todo {
  return {
    ...todo,
    due: todo.due ? new Date(todo.due.getTime()) : null,
    completedAt: todo.completedAt ? new Date(todo.completedAt.getTime()) : null,
    extra: todo.extra.map((prop) => ({ ...prop })),
  };
}

function dropRawProperty(todo: Todo, name: string): void {
  todo.extra = todo.extra.filter((prop) => prop.name !== name);
}

/**
 * How a record's state reads to the user. CANCELLED counts as closed but keeps
 * its own label.
 */
export function describeStatus(todo: Todo): string {
  if (!todo.completed) return 'open';
  return todo.status?.toUpperCase() === 'CANCELLED' ? 'cancelled' : 'done';
}

/**
 * Completion flag, STATUS and timestamp always change together.
 * A record that is already closed keeps its original STATUS and completion time.
 */
export function markTodoDone(todo: Todo, now: Date): StatusChange {
  if (todo.completed) {
    return { previousStatus: 'done', newStatus: 'done', alreadyInState: true };
  }
  todo.completed = true;
  todo.status = 'COMPLETED';
  todo.completedAt = new Date(now.getTime());
  dropRawProperty(todo, 'COMPLETED');
  return { previousStatus: 'open', newStatus: 'done', alreadyInState: false };
}

export function reopenTodo(todo: Todo): StatusChange {
  if (!todo.completed) {
    return { previousStatus: 'open', newStatus: 'open', alreadyInState: true };
  }
  todo.completed = false;
  todo.status = 'NEEDS-ACTION';
  todo.completedAt = null;
  dropRawProperty(todo, 'COMPLETED');
  return { previousStatus: 'done', newStatus: 'open', alreadyInState: false };
}

export function setTodoDue(todo: Todo, due: Date | null): void {
  todo.due = due;
  dropRawProperty(todo, 'DUE');
}

/**
 * Copies an edited working copy back onto the record that is about to be saved.
 */
export function applyTodoEdits(target: Todo, edited: Todo): void {
  target.summary = edited.summary;
  target.due = edited.due;
  target.status = edited.status;
  target.completed = edited.completed;
  target.completedAt = edited.completedAt;
  target.extra = edited.extra;
}
