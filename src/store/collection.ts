import fs from 'node:fs';
import fg from 'fast-glob';
import { ConfigurationError } from '../cli/errors.js';
import { expandHome } from '../utils/paths.js';
import { TaskList } from './task-list.js';

/**
 * Every list reachable through the configured glob, keyed by name.
 * Built once per invocation and never persisted.
 */
export class Collection {
  private readonly lists = new Map<string, TaskList>();

  /**
   * Expands `pattern` and opens each directory match as a list. Matches that are
   * not directories are skipped. Two directories with the same name abort the
   * whole build.
   */
  static discover(pattern: string): Collection {
    let matches: string[];
    try {
      matches = fg.sync(expandHome(pattern), {
        onlyFiles: false,
        absolute: true,
        unique: true,
        followSymbolicLinks: true,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Invalid list path pattern '${pattern}': ${reason}`);
    }

    const collection = new Collection();
    for (const match of matches) {
      if (!isDirectory(match)) continue;
      collection.add(TaskList.open(match));
    }
    return collection;
  }

  add(list: TaskList): void {
    const existing = this.lists.get(list.name);
    if (existing) {
      throw new ConfigurationError(
        `Detected two lists named '${list.name}': ${existing.directory} and ${list.directory}`
      );
    }
    this.lists.set(list.name, list);
  }

  get(name: string): TaskList | undefined {
    return this.lists.get(name);
  }

  names(): string[] {
    return [...this.lists.keys()].sort();
  }

  /** Lists in name order. */
  values(): TaskList[] {
    return this.names().flatMap((name) => {
      const list = this.lists.get(name);
      return list ? [list] : [];
    });
  }

  get size(): number {
    return this.lists.size;
  }
}

function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory();
  } catch {
    return false;
  }
}
