import { loadConfig } from '../config/loader.js';
import { runInteractiveTui } from '../tui/interactive.js';
import { createTerminalKitDriver, type TerminalDriver } from '../tui/terminal.js';
import { CliUsageError } from './errors.js';
import { extractFlags } from './flag-utils.js';

interface InteractiveOptions {
  configPath: string | null;
}

export function parseInteractiveFlags(args: string[]): InteractiveOptions {
  const remaining = [...args];
  const valueFlags = extractFlags(remaining, ['--config', '-c']);
  const unknown = remaining[0];
  if (unknown !== undefined) {
    throw new CliUsageError(`Unknown argument '${unknown}'.`);
  }
  return { configPath: valueFlags['--config'] ?? valueFlags['-c'] ?? null };
}

export async function handleInteractiveCommand(
  args: string[],
  driver: TerminalDriver = createTerminalKitDriver()
): Promise<void> {
  const options = parseInteractiveFlags(args);
  const config = loadConfig(options.configPath ?? undefined);

  await runInteractiveTui({
    driver,
    render: { colorsDisabled: config.colors.disable },
  });
}
