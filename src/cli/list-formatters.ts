/**
 * Output formatters for records: one-line rows for `list`, blocks for `show`/`new`.
 */

import { describeStatus } from '../editor/task-editor.js';
import type { Todo } from '../schema/index.js';
import type { TaskList } from '../store/task-list.js';
import { formatDueDate, isOverdue, parseDueDate } from './date-utils.js';
import { boldText, cyanText, dimText, greenText, redText } from './terminal.js';

export const UNREADABLE_DATE = '(unreadable)';

export interface FormatterOptions {
  dateFormat: string;
  humanTime: boolean;
  now: () => Date;
}

export class TodoFormatter {
  constructor(private readonly options: FormatterOptions) {}

  get dateFormat(): string {
    return this.options.dateFormat;
  }

  formatDate(date: Date): string {
    return formatDueDate(date, this.options.dateFormat);
  }

  /** Like {@link formatDate}, but a date that cannot be printed reads `(unreadable)`. */
  describeDate(date: Date): string {
    try {
      return this.formatDate(date);
    } catch (error) {
      if (error instanceof RangeError) return UNREADABLE_DATE;
      throw error;
    }
  }

  /**
   * Inverse of {@link formatDate}; also accepts informal phrases when enabled.
   */
  parseDate(input: string): Date | null {
    return parseDueDate(input, {
      dateFormat: this.options.dateFormat,
      humanTime: this.options.humanTime,
      now: this.options.now(),
    });
  }

  /**
   * `[ ] 2026-10-19 Pay rent @home`. The summary is collapsed to a single line.
   */
  compact(todo: Todo, list: TaskList): string {
    const parts: string[] = [todo.completed ? dimText('[X]') : '[ ]'];
    if (todo.due) {
      const due = this.formatDate(todo.due);
      parts.push(!todo.completed && isOverdue(todo.due, this.options.now()) ? redText(due) : due);
    }
    const summary = oneLine(todo.summary);
    parts.push(todo.completed ? dimText(summary) : summary);
    parts.push(cyanText(`@${list.name}`));
    return parts.join(' ');
  }

  detailed(todo: Todo, list: TaskList): string {
    const lines: string[] = [];
    lines.push(`Task: ${boldText(oneLine(todo.summary))}`);
    lines.push(`List: ${cyanText(list.name)}`);
    const status = describeStatus(todo);
    if (todo.completed) {
      const at = todo.completedAt ? ` (${this.describeDate(todo.completedAt)})` : '';
      lines.push(`Status: ${dimText(status)}${at}`);
    } else {
      lines.push(`Status: ${greenText(status)}`);
    }
    lines.push(`Due: ${todo.due ? this.describeDate(todo.due) : dimText('none')}`);
    const filePath = list.pathOf(todo);
    if (filePath) {
      lines.push(`File: ${filePath}`);
    }
    return lines.join('\n');
  }
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
