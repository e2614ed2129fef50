export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Usage: 2,
  Canceled: 3,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class DateParseError extends CliUsageError {
  constructor(public readonly input: string, message: string) {
    super(message);
    this.name = 'DateParseError';
  }
}

/**
 * Raised before any command runs: the collection or the config file itself is unusable.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ParseError extends Error {
  constructor(
    public readonly reason: string,
    public readonly filePath: string,
    public readonly line?: number
  ) {
    super(line ? `${filePath}:${line}: ${reason}` : `${filePath}: ${reason}`);
    this.name = 'ParseError';
  }
}

export class IndexCacheError extends Error {
  constructor(cachePath: string, reason: string) {
    super(`Index cache ${cachePath} is unreadable (${reason}). Run \`todo list\` to rebuild it.`);
    this.name = 'IndexCacheError';
  }
}

export abstract class TaskResolutionError extends Error {
  constructor(
    message: string,
    public readonly id: number
  ) {
    super(message);
  }
}

export class IndexEntryNotFoundError extends TaskResolutionError {
  constructor(id: number) {
    super(`No task with id ${id} in the last listing. Run \`todo list\` to see current ids.`, id);
    this.name = 'IndexEntryNotFoundError';
  }
}

export class StaleIndexError extends TaskResolutionError {
  constructor(
    id: number,
    public readonly listName: string,
    public readonly filename: string
  ) {
    super(`Task ${id} (${listName}/${filename}) no longer exists. Run \`todo list\` to refresh ids.`, id);
    this.name = 'StaleIndexError';
  }
}
