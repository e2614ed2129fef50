import type { TodoEditor } from '../tui/todo-editor.js';
import { DEFAULT_COMMAND, findCommand } from './commands.js';
import { buildContext } from './context.js';
import { CliUsageError, ConfigurationError, ExitCode } from './errors.js';
import { extractBooleanFlags } from './flag-utils.js';
import { printHelp, printVersion } from './help.js';

export const VERSION = '0.1.0';

export interface CliDependencies {
  now?: () => Date;
  editor?: TodoEditor;
}

interface GlobalOptions {
  flags: Set<string>;
  configPath?: string;
}

/**
 * Global options are only recognized before the command name.
 */
function takeGlobalOptions(args: string[]): GlobalOptions {
  const options: GlobalOptions = { flags: new Set() };
  while (args.length > 0) {
    const token = args[0];
    if (token === '--human-time' || token === '--no-human-time') {
      options.flags.add(token);
      args.shift();
      continue;
    }
    if (token === '--config' || token === '-c') {
      const value = args[1];
      if (value === undefined) {
        throw new CliUsageError(`Option '${token}' requires a value.`);
      }
      options.configPath = value;
      args.splice(0, 2);
      continue;
    }
    if (token?.startsWith('--config=')) {
      options.configPath = token.slice('--config='.length);
      args.shift();
      continue;
    }
    break;
  }
  return options;
}

/**
 * Parses argv, builds the collection once and dispatches through the command table.
 * Returns the process exit status instead of exiting.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<ExitCode> {
  const args = [...argv];

  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return ExitCode.Ok;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return ExitCode.Ok;
  }

  try {
    const globals = takeGlobalOptions(args);
    const commandName = args.shift() ?? DEFAULT_COMMAND;

    if (commandName === 'help') {
      const topicName = args[0];
      const topic = topicName === undefined ? undefined : findCommand(topicName);
      if (topic) topic.printHelp();
      else printHelp();
      return ExitCode.Ok;
    }

    const command = findCommand(commandName);
    if (!command) {
      printHelp(`Unknown command '${commandName}'.`);
      return ExitCode.Usage;
    }

    const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
    if (helpFlags.size > 0) {
      command.printHelp();
      return ExitCode.Ok;
    }

    const ctx = buildContext({
      configPath: globals.configPath,
      globalFlags: globals.flags,
      now: deps.now,
      editor: deps.editor,
    });
    return await command.run(args, ctx);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      return ExitCode.Usage;
    }
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      return ExitCode.Failure;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      return ExitCode.Failure;
    }
    throw error;
  }
}
