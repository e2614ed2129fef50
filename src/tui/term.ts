import terminalKit from 'terminal-kit';

/**
 * The slice of a terminal-kit terminal the editor draws with. Tests drive it with a stub.
 */
export interface EditorTerm {
  readonly width: number;
  readonly height: number;
  write(text: string): void;
  bold(text: string): void;
  dim(text: string): void;
  red(text: string): void;
  clear(): void;
  moveTo(x: number, y: number): void;
  /** One key listener at a time; `null` detaches it. */
  onKey(handler: ((name: string) => void) | null): void;
  /** Resolves with the entered text, or null when the field is canceled with Esc. */
  inputField(initial: string): Promise<string | null>;
}

export interface TerminalSession {
  term: EditorTerm;
  close(): void;
}

/**
 * Takes over the terminal (alternate screen, raw input) until `close()`.
 */
export function openTerminalSession(): TerminalSession {
  const term = terminalKit.terminal;
  let current: ((name: string) => void) | null = null;
  const dispatch = (name: string): void => {
    current?.(name);
  };

  term.fullscreen(true);
  term.grabInput(true);
  term.on('key', dispatch);

  const editorTerm: EditorTerm = {
    get width() {
      return term.width;
    },
    get height() {
      return term.height;
    },
    write: (text) => {
      term(text);
    },
    bold: (text) => {
      term.bold(text);
    },
    dim: (text) => {
      term.dim(text);
    },
    red: (text) => {
      term.red(text);
    },
    clear: () => {
      term.clear();
    },
    moveTo: (x, y) => {
      term.moveTo(x, y);
    },
    onKey: (handler) => {
      current = handler;
    },
    inputField: (initial) =>
      new Promise<string | null>((resolve) => {
        term.inputField({ default: initial, cancelable: true }, (error: unknown, input?: string) => {
          resolve(error || input === undefined ? null : input);
        });
      }),
  };

  return {
    term: editorTerm,
    close: () => {
      current = null;
      term.removeListener('key', dispatch);
      term.grabInput(false);
      term.fullscreen(false);
      // Let the one-shot process exit once the command finishes.
      process.stdin.pause();
    },
  };
}
