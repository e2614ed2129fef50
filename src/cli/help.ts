import { COMMANDS } from './commands.js';
import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('todo')} ${dimText('— tasks in vdir calendars')}`
    : 'todo — tasks in vdir calendars';

  const lines = [
    title,
    '',
    'Usage: todo [global options] [<command>] [options]',
    '',
    formatSection(
      'Commands',
      Object.values(COMMANDS).map((command): [string, string] => [command.usage, command.summary])
    ),
    '',
    formatSection('Global options', [
      ['--human-time', 'Accept informal dates such as "tomorrow" (default)'],
      ['--no-human-time', 'Only accept dates in the configured dateFormat'],
      ['--config, -c <path>', 'Path to config file'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .todo-vdir.json (walks up from cwd)'],
      ['Global config', '~/.config/todo-vdir/config.json'],
      ['Key fields', 'path (glob of list directories), dateFormat, humanTime, cachePath, defaultList'],
    ]),
    '',
    dimText('Without a command, `todo` runs `todo list`.'),
    dimText('Run `todo <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
