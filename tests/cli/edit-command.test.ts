import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runCli } from '../../src/cli/run.js';
import { parseVtodo } from '../../src/parser/vtodo.js';
import type { TodoEditor } from '../../src/tui/todo-editor.js';
import { captureConsole, fakeEditor, makeTempDir, NOW, writeVtodo, writeWorkspace } from '../helpers/fixtures.js';

let root: string;
let configPath: string;
let reportPath: string;

function run(args: string[], editor: TodoEditor = fakeEditor(() => false)) {
  return runCli(['--config', configPath, ...args], { now: () => NOW, editor });
}

beforeEach(async () => {
  root = makeTempDir('todo-edit-cmd-');
  configPath = writeWorkspace(root, ['work', 'home']);
  reportPath = writeVtodo(path.join(root, 'lists', 'work'), 'report.ics', { uid: 'report', summary: 'Write report' });
  captureConsole();
  await run(['list']);
  vi.restoreAllMocks();
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(root, { recursive: true, force: true });
});

describe('todo edit', () => {
  it('saves the edited task back to its file', async () => {
    const editor = fakeEditor((todo, list) => {
      expect(list.name).toBe('work');
      todo.summary = 'Write final report';
      todo.due = new Date('2026-10-20T00:00:00Z');
      return true;
    });
    const output = captureConsole();

    expect(await run(['edit', '1'], editor)).toBe(0);
    expect(output.out).toEqual(['Saved: 1 (Write final report)']);

    const todo = parseVtodo(fs.readFileSync(reportPath, 'utf-8'), reportPath);
    expect(todo.uid).toBe('report');
    expect(todo.summary).toBe('Write final report');
    expect(todo.due?.toISOString()).toBe('2026-10-20T00:00:00.000Z');
  });

  it('keeps a STATUS written by another client when only the summary changes', async () => {
    const otherPath = writeVtodo(path.join(root, 'lists', 'home'), 'draft.ics', {
      uid: 'draft',
      summary: 'Draft plan',
      status: 'IN-PROCESS',
    });
    captureConsole();
    await run(['list', 'home']);
    const editor = fakeEditor((todo) => {
      todo.summary = 'Final plan';
      return true;
    });

    expect(await run(['edit', '1'], editor)).toBe(0);
    const lines = fs.readFileSync(otherPath, 'utf-8').split('\r\n');
    expect(lines).toContain('SUMMARY:Final plan');
    expect(lines).toContain('STATUS:IN-PROCESS');
  });

  it('leaves the file alone when the edit is canceled', async () => {
    const before = fs.readFileSync(reportPath, 'utf-8');
    const output = captureConsole();

    expect(await run(['edit', '1'])).toBe(0);
    expect(output.out).toEqual(['Edit canceled.']);
    expect(fs.readFileSync(reportPath, 'utf-8')).toBe(before);
  });

  it('does not open the editor for an unknown id', async () => {
    const editor = fakeEditor(() => true);
    const output = captureConsole();

    expect(await run(['edit', '4'], editor)).toBe(1);
    expect(editor.calls).toBe(0);
    expect(output.err).toEqual(['Error: No task with id 4 in the last listing. Run `todo list` to see current ids.']);
  });
});
