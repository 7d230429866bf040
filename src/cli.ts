#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleInteractiveCommand } from './cli/interactive-command.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const flags = extractBooleanFlags(args, ['--help', '-h', '--version', '-v']);
  if (flags.has('--help') || flags.has('-h')) {
    printHelp();
    return;
  }
  if (flags.has('--version') || flags.has('-v')) {
    printVersion(VERSION);
    return;
  }

  try {
    await handleInteractiveCommand(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      printHelp(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
