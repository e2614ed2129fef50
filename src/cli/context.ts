import { loadConfig, resolveCachePath, resolveHumanTime, type Config } from '../config/loader.js';
import { Collection } from '../store/collection.js';
import { TerminalTodoEditor, type TodoEditor } from '../tui/todo-editor.js';
import { TodoFormatter } from './list-formatters.js';

/**
 * What every command sees. Built once per invocation, before the command runs.
 */
export interface CommandContext {
  config: Config;
  collection: Collection;
  formatter: TodoFormatter;
  cachePath: string;
  editor: TodoEditor;
  now: () => Date;
}

export interface ContextOptions {
  configPath?: string;
  globalFlags: ReadonlySet<string>;
  now?: () => Date;
  editor?: TodoEditor;
}

export function buildContext(options: ContextOptions): CommandContext {
  const config = loadConfig(options.configPath);
  const now = options.now ?? (() => new Date());
  const formatter = new TodoFormatter({
    dateFormat: config.dateFormat,
    humanTime: resolveHumanTime(config, options.globalFlags),
    now,
  });
  const collection = Collection.discover(config.path);

  return {
    config,
    collection,
    formatter,
    cachePath: resolveCachePath(config),
    editor: options.editor ?? new TerminalTodoEditor(formatter, now),
    now,
  };
}
