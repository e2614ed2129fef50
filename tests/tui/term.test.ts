import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openTerminalSession } from '../../src/tui/term.js';

type KeyListener = (name: string) => void;
type InputCallback = (error: unknown, input?: string) => void;

const fake = vi.hoisted(() => {
  const listeners = new Set<KeyListener>();
  const terminal = Object.assign(vi.fn(), {
    width: 80,
    height: 24,
    fullscreen: vi.fn(),
    grabInput: vi.fn(),
    bold: vi.fn(),
    dim: vi.fn(),
    red: vi.fn(),
    clear: vi.fn(),
    moveTo: vi.fn(),
    inputField: vi.fn((_options: unknown, callback: InputCallback) => {
      callback(undefined, 'typed');
    }),
    on: vi.fn((_event: string, listener: KeyListener) => {
      listeners.add(listener);
    }),
    removeListener: vi.fn((_event: string, listener: KeyListener) => {
      listeners.delete(listener);
    }),
  });
  const press = (name: string): void => {
    for (const listener of listeners) listener(name);
  };
  return { terminal, listeners, press };
});

vi.mock('terminal-kit', () => ({ default: { terminal: fake.terminal } }));

let pause: { mockRestore(): void } | undefined;

beforeEach(() => {
  pause = vi.spyOn(process.stdin, 'pause').mockReturnValue(process.stdin);
});

afterEach(() => {
  pause?.mockRestore();
  fake.listeners.clear();
});

describe('openTerminalSession', () => {
  it('routes keys to the current handler only', () => {
    const session = openTerminalSession();
    const seen: string[] = [];

    session.term.onKey((name) => seen.push(name));
    fake.press('s');
    session.term.onKey(null);
    fake.press('d');

    expect(seen).toEqual(['s']);
    session.close();
  });

  it('removes its key listener and releases the terminal on close', () => {
    const session = openTerminalSession();
    expect(fake.listeners.size).toBe(1);

    session.close();

    expect(fake.listeners.size).toBe(0);
    expect(fake.terminal.grabInput).toHaveBeenLastCalledWith(false);
    expect(fake.terminal.fullscreen).toHaveBeenLastCalledWith(false);
  });

  it('resolves the input field with the entered text', async () => {
    const session = openTerminalSession();
    await expect(session.term.inputField('old')).resolves.toBe('typed');
    expect(fake.terminal.inputField).toHaveBeenCalledWith(
      { default: 'old', cancelable: true },
      expect.any(Function)
    );
    session.close();
  });
});
