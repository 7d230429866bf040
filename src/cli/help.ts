export function formatHelp(): string {
  const lines = [
    'ytui - youtube search in the terminal',
    '',
    'Usage: ytui [options]',
    'Takes no positional arguments; anything else is a usage error (exit 1).',
    '',
    formatSection('Options', [
      ['--config, -c <path>', 'Path to config file'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Keys (normal mode)', [
      ['s', 'Enter search mode'],
      ['q, esc', 'Quit'],
      ['h j k l', 'Reserved for list navigation'],
    ]),
    '',
    formatSection('Keys (search mode)', [
      ['enter, esc', 'Leave search mode'],
      ['left/right, home/end', 'Move the cursor'],
      ['backspace, delete', 'Delete a character'],
      ['ctrl+w, ctrl+u, ctrl+k', 'Delete word / to start / to end'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .ytui.json (walks up from cwd)'],
      ['Global config', '~/.config/ytui/config.json'],
      ['Key fields', 'colors.disable'],
    ]),
  ];
  return lines.join('\n');
}

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }
  console.error(formatHelp());
}

function formatSection(title: string, entries: [string, string][]): string {
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => `  ${name.padEnd(maxLen)}  ${desc}`);
  return [title, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
