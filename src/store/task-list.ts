import fs from 'node:fs';
import path from 'node:path';
import { ParseError } from '../cli/errors.js';
import { parseVtodo, serializeVtodo } from '../parser/vtodo.js';
import type { LoadWarning, Todo } from './types.js';

const RECORD_EXTENSION = '.ics';

export function listNameForDirectory(directory: string): string {
  return path.basename(path.resolve(directory));
}

/**
 * One list directory. Every record is read when the list is opened; files that
 * cannot be read become warnings and are left out of `todos`.
 */
export class TaskList {
  readonly name: string;
  readonly directory: string;
  readonly todos = new Map<string, Todo>();
  readonly warnings: LoadWarning[] = [];

  private constructor(directory: string) {
    this.directory = path.resolve(directory);
    this.name = listNameForDirectory(directory);
  }

  static open(directory: string): TaskList {
    const list = new TaskList(directory);
    list.load();
    return list;
  }

  private load(): void {
    const entries = fs
      .readdirSync(this.directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith(RECORD_EXTENSION))
      .map((entry) => entry.name)
      .sort();

    for (const filename of entries) {
      const filePath = path.join(this.directory, filename);
      try {
        const todo = parseVtodo(fs.readFileSync(filePath, 'utf-8'), filePath);
        this.todos.set(filename, todo);
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        this.warnings.push({
          list: this.name,
          file: filename,
          line: error.line,
          message: error.reason,
        });
      }
    }
  }

  get(filename: string): Todo | undefined {
    return this.todos.get(filename);
  }

  pathOf(todo: Todo): string | null {
    return todo.filename ? path.join(this.directory, todo.filename) : null;
  }

  /**
   * Writes the record to its file. A record without a filename gets `<uid>.ics`.
   */
  save(todo: Todo): string {
    if (!todo.filename) {
      todo.filename = `${todo.uid}${RECORD_EXTENSION}`;
    }
    const filePath = path.join(this.directory, todo.filename);
    fs.writeFileSync(filePath, serializeVtodo(todo), 'utf-8');
    this.todos.set(todo.filename, todo);
    return filePath;
  }
}
