import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { Todo } from '../../src/schema/index.js';
import type { TaskList } from '../../src/store/task-list.js';
import type { TodoEditor } from '../../src/tui/todo-editor.js';

export const NOW = new Date('2026-10-18T12:00:00Z');

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export interface VtodoFields {
  uid?: string;
  summary?: string;
  /** Raw iCalendar value, e.g. `20261019` (written as VALUE=DATE) or `20261019T090000Z`. */
  due?: string;
  status?: string;
  completed?: string;
  extraLines?: string[];
}

export function vtodoText(fields: VtodoFields): string {
  const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0', 'PRODID:-//test//test//EN', 'BEGIN:VTODO'];
  if (fields.uid) lines.push(`UID:${fields.uid}`);
  if (fields.summary !== undefined) lines.push(`SUMMARY:${fields.summary}`);
  if (fields.due) lines.push(fields.due.includes('T') ? `DUE:${fields.due}` : `DUE;VALUE=DATE:${fields.due}`);
  if (fields.status) lines.push(`STATUS:${fields.status}`);
  if (fields.completed) lines.push(`COMPLETED:${fields.completed}`);
  lines.push(...(fields.extraLines ?? []));
  lines.push('END:VTODO', 'END:VCALENDAR');
  return `${lines.join('\r\n')}\r\n`;
}

export function writeVtodo(dir: string, filename: string, fields: VtodoFields): string {
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, filename);
  fs.writeFileSync(filePath, vtodoText(fields), 'utf-8');
  return filePath;
}

/**
 * `<root>/lists/<name>` directories plus a config file pointing at them.
 */
export function writeWorkspace(root: string, lists: string[], config: Record<string, unknown> = {}): string {
  for (const name of lists) {
    fs.mkdirSync(path.join(root, 'lists', name), { recursive: true });
  }
  const configPath = path.join(root, 'config.json');
  fs.writeFileSync(
    configPath,
    JSON.stringify({
      path: path.join(root, 'lists', '*'),
      cachePath: path.join(root, 'cache', 'ids.json'),
      ...config,
    }),
    'utf-8'
  );
  return configPath;
}

export function makeTodo(overrides: Partial<Todo> = {}): Todo {
  return {
    uid: 'uid-1',
    filename: 'uid-1.ics',
    summary: 'Task',
    due: null,
    status: null,
    completed: false,
    completedAt: null,
    extra: [],
    ...overrides,
  };
}

export interface CapturedConsole {
  out: string[];
  err: string[];
}

export function captureConsole(): CapturedConsole {
  const captured: CapturedConsole = { out: [], err: [] };
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    captured.out.push(args.map(String).join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    captured.err.push(args.map(String).join(' '));
  });
  return captured;
}

export type EditBehavior = (todo: Todo, list: TaskList, lists: readonly TaskList[]) => boolean;

export function fakeEditor(behavior: EditBehavior): TodoEditor & { calls: number } {
  const editor = {
    calls: 0,
    async edit(todo: Todo, list: TaskList, lists: readonly TaskList[]): Promise<boolean> {
      editor.calls += 1;
      return behavior(todo, list, lists);
    },
  };
  return editor;
}
