import { CliUsageError } from './errors.js';

export type FlagMap = Partial<Record<string, string>>;

/**
 * Removes `--flag value` pairs for the given keys from `args` (in place).
 */
export function extractFlags(args: string[], keys: readonly string[]): FlagMap {
  const flags: FlagMap = {};
  let index = 0;
  while (index < args.length) {
    const token = args[index];
    if (token === undefined || !keys.includes(token)) {
      index += 1;
      continue;
    }
    const value = args[index + 1];
    if (value === undefined) {
      throw new CliUsageError(`Flag '${token}' requires a value.`);
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
