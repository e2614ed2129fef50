import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

/**
 * Removes `--flag value` and `--flag=value` pairs for the given keys from `args`
 * (in place) and returns them. The last occurrence wins.
 */
export function extractFlags(args: string[], keys: readonly string[]): FlagMap {
  const flags: FlagMap = {};
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined) {
      index += 1;
      continue;
    }

    const eq = token.indexOf('=');
    if (token.startsWith('--') && eq > 0 && keys.includes(token.slice(0, eq))) {
      flags[token.slice(0, eq)] = token.slice(eq + 1);
      args.splice(index, 1);
      continue;
    }

    if (!keys.includes(token)) {
      index += 1;
      continue;
    }
    const value = args[index + 1];
    if (value === undefined) {
      throw new CliUsageError(`Option '${token}' requires a value.`);
    }
    flags[token] = value;
    args.splice(index, 2);
  }
  return flags;
}

export function extractBooleanFlags(args: string[], keys: readonly string[]): Set<string> {
  const flags = new Set<string>();
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    flags.add(token);
    args.splice(index, 1);
  }
  return flags;
}

/**
 * First value present among the aliases of one option (e.g. `--list` / `-l`).
 */
export function flagValue(flags: FlagMap, ...aliases: string[]): string | undefined {
  for (const alias of aliases) {
    const value = flags[alias];
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Anything still starting with a dash after extraction is an option the command does not know.
 */
export function rejectUnknownOptions(args: readonly string[], command: string): void {
  const unknown = args.find((arg) => arg.startsWith('-') && arg !== '-' && !/^-\d+$/.test(arg));
  if (unknown !== undefined) {
    throw new CliUsageError(`Unknown option '${unknown}' for 'todo ${command}'.`);
  }
}

export function parseTaskId(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new CliUsageError(`Invalid task id: '${raw}'. Expected a positive integer from \`todo list\`.`);
  }
  const id = Number.parseInt(raw, 10);
  if (id < 1 || !Number.isSafeInteger(id)) {
    throw new CliUsageError(`Invalid task id: '${raw}'. Expected a positive integer from \`todo list\`.`);
  }
  return id;
}
