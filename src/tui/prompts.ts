import type { EditorTerm } from './term.js';

function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  if (width <= 1) return chars.slice(0, width).join('');
  return `${chars.slice(0, width - 1).join('')}…`;
}

function choiceHint(allowed: readonly string[], hasEnter: boolean): string {
  const keys = allowed.length > 0 ? `Press [${allowed.join('/')}]` : '';
  const parts = [keys, hasEnter ? '[Enter] save' : '', '[Esc] cancel'].filter(Boolean);
  return parts.join('  ');
}

/**
 * Draws `lines` under a title and waits for one of `allowed`. Enter resolves with
 * `options.enter` when given; Esc and Ctrl-C resolve with null.
 */
export async function showKeyMenu(
  term: EditorTerm,
  title: string,
  lines: readonly string[],
  allowed: readonly string[],
  options?: { enter?: string }
): Promise<string | null> {
  const width = Math.max(1, term.width);
  term.clear();
  term.moveTo(1, 1);
  term.bold(truncate(title, width));
  lines.forEach((line, i) => {
    term.moveTo(1, 3 + i);
    if (line.startsWith('! ')) term.red(truncate(line.slice(2), width));
    else term.write(truncate(line, width));
  });
  term.moveTo(1, 4 + lines.length);
  term.dim(truncate(choiceHint(allowed, options?.enter !== undefined), width));

  return await new Promise<string | null>((resolve) => {
    term.onKey((name) => {
      if (name === 'ESCAPE' || name === 'CTRL_C') {
        term.onKey(null);
        resolve(null);
        return;
      }
      if (name === 'ENTER' && options?.enter !== undefined) {
        term.onKey(null);
        resolve(options.enter);
        return;
      }
      const lower = name.toLowerCase();
      if (allowed.includes(lower)) {
        term.onKey(null);
        resolve(lower);
      }
    });
  });
}

export async function promptText(
  term: EditorTerm,
  title: string,
  label: string,
  initial: string
): Promise<string | null> {
  const width = Math.max(1, term.width);
  term.onKey(null);
  term.clear();
  term.moveTo(1, 1);
  term.bold(truncate(title, width));
  term.moveTo(1, 2);
  term.dim(truncate('[Enter] keep  [Esc] discard', width));
  term.moveTo(1, 3);
  term.write(truncate(label, width));
  term.moveTo(1, 4);
  return await term.inputField(initial);
}
