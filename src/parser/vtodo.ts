/**
 * Reads and writes the single-VTODO `.ics` files a list directory holds.
 *
 * Only UID, SUMMARY, DUE, STATUS and COMPLETED are interpreted. Every other
 * content line inside the VTODO (nested VALARMs included) is carried through
 * in order, so a save does not lose what another client wrote.
 */

import path from 'node:path';
import { format } from 'date-fns';
import { ParseError } from '../cli/errors.js';
import type { IcalProperty, Todo } from '../schema/index.js';

const PRODID = '-//todo-vdir//todo-vdir//EN';
const MANAGED = new Set(['UID', 'SUMMARY', 'DUE', 'STATUS', 'COMPLETED']);
const ICAL_DATE_REGEX = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})(Z)?)?$/;
const FOLD_OCTETS = 75;
const CLOSED_STATUSES = new Set(['COMPLETED', 'CANCELLED']);

function unfold(content: string): string[] {
  const lines: string[] = [];
  for (const raw of content.split(/\r?\n/)) {
    if ((raw.startsWith(' ') || raw.startsWith('\t')) && lines.length > 0) {
      lines[lines.length - 1] += raw.slice(1);
      continue;
    }
    if (raw.length > 0) lines.push(raw);
  }
  return lines;
}

/**
 * Lines are limited to 75 octets, continuation lines included with their leading
 * space. Breaks fall between code points.
 */
function fold(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= FOLD_OCTETS) return line;
  const parts: string[] = [];
  let current = '';
  let size = 0;
  let limit = FOLD_OCTETS;
  for (const ch of line) {
    const octets = Buffer.byteLength(ch, 'utf-8');
    if (size + octets > limit) {
      parts.push(current);
      current = '';
      size = 0;
      limit = FOLD_OCTETS - 1;
    }
    current += ch;
    size += octets;
  }
  parts.push(current);
  return parts.join('\r\n ');
}

/**
 * Splits `NAME;PARAM=x:value` at the first colon outside a quoted parameter value.
 */
export function parseContentLine(line: string): IcalProperty | null {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') quoted = !quoted;
    if (ch === ':' && !quoted) {
      const head = line.slice(0, i);
      const semi = head.indexOf(';');
      return {
        name: (semi === -1 ? head : head.slice(0, semi)).toUpperCase(),
        params: semi === -1 ? '' : head.slice(semi + 1),
        value: line.slice(i + 1),
      };
    }
  }
  return null;
}

export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch));
}

export function escapeText(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/;/g, '\\;').replace(/,/g, '\\,').replace(/\r?\n/g, '\\n');
}

/**
 * DATE values and floating DATE-TIMEs are read as local time, `Z` values as UTC.
 * A value that does not match gives an invalid Date rather than throwing, so a
 * single bad field surfaces where the record is displayed.
 */
export function parseIcalDate(value: string): Date {
  const match = value.trim().match(ICAL_DATE_REGEX);
  if (!match) return new Date(Number.NaN);
  const [, y, mo, d, h, mi, s, utc] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = Number(h ?? '0');
  const minutes = Number(mi ?? '0');
  const seconds = Number(s ?? '0');
  if (utc) {
    return new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  }
  return new Date(year, month - 1, day, hours, minutes, seconds);
}

/** COMPLETED and CANCELLED both close a task. */
export function isClosedStatus(status: string | null): boolean {
  return status !== null && CLOSED_STATUSES.has(status.toUpperCase());
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

function formatUtcDateTime(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
}

function isLocalMidnight(date: Date): boolean {
  return date.getHours() === 0 && date.getMinutes() === 0 && date.getSeconds() === 0 && date.getMilliseconds() === 0;
}

export function parseVtodo(content: string, filePath: string): Todo {
  const lines = unfold(content);
  const begin = lines.findIndex((line) => line.toUpperCase() === 'BEGIN:VTODO');
  if (begin === -1) {
    throw new ParseError('no VTODO component found', filePath);
  }

  const todo: Todo = {
    uid: '',
    filename: path.basename(filePath),
    summary: '',
    due: null,
    status: null,
    completed: false,
    completedAt: null,
    extra: [],
  };

  let depth = 0;
  let closed = false;

  for (let i = begin + 1; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const prop = parseContentLine(line);
    if (!prop) {
      throw new ParseError(`malformed content line '${line}'`, filePath, i + 1);
    }

    if (prop.name === 'END' && prop.value.toUpperCase() === 'VTODO' && depth === 0) {
      closed = true;
      break;
    }
    if (prop.name === 'BEGIN') depth += 1;
    if (prop.name === 'END') depth -= 1;

    if (depth > 0 || prop.name === 'END' || !MANAGED.has(prop.name)) {
      todo.extra.push(prop);
      continue;
    }

    switch (prop.name) {
      case 'UID':
        todo.uid = prop.value;
        break;
      case 'SUMMARY':
        todo.summary = unescapeText(prop.value);
        break;
      case 'DUE':
        todo.due = parseIcalDate(prop.value);
        if (!isValidDate(todo.due)) todo.extra.push(prop);
        break;
      case 'STATUS':
        todo.status = prop.value;
        break;
      case 'COMPLETED':
        todo.completedAt = parseIcalDate(prop.value);
        if (!isValidDate(todo.completedAt)) todo.extra.push(prop);
        break;
    }
  }

  if (!closed) {
    throw new ParseError('VTODO component is not terminated', filePath);
  }

  todo.completed = isClosedStatus(todo.status) || todo.completedAt !== null;
  if (!todo.uid) {
    todo.uid = path.basename(filePath, '.ics');
  }
  return todo;
}

function serializeProperty(prop: IcalProperty): string {
  const head = prop.params ? `${prop.name};${prop.params}` : prop.name;
  return fold(`${head}:${prop.value}`);
}

export function serializeVtodo(todo: Todo): string {
  const props: IcalProperty[] = [
    { name: 'UID', params: '', value: todo.uid },
    { name: 'SUMMARY', params: '', value: escapeText(todo.summary) },
  ];

  // An unreadable DUE/COMPLETED was kept verbatim in `extra` when the file was read.
  if (todo.due && isValidDate(todo.due)) {
    props.push(
      isLocalMidnight(todo.due)
        ? { name: 'DUE', params: 'VALUE=DATE', value: format(todo.due, 'yyyyMMdd') }
        : { name: 'DUE', params: '', value: formatUtcDateTime(todo.due) }
    );
  }

  props.push({ name: 'STATUS', params: '', value: todo.status ?? (todo.completed ? 'COMPLETED' : 'NEEDS-ACTION') });
  if (todo.completedAt && isValidDate(todo.completedAt)) {
    props.push({ name: 'COMPLETED', params: '', value: formatUtcDateTime(todo.completedAt) });
  }

  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODID}`,
    'BEGIN:VTODO',
    ...[...props, ...todo.extra].map(serializeProperty),
    'END:VTODO',
    'END:VCALENDAR',
  ];
  return `${lines.join('\r\n')}\r\n`;
}
