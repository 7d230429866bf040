import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const ConfigSchema = z.object({
  colors: z
    .object({
      disable: z.boolean().default(false),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.ytui.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that point the home directory elsewhere behave correctly.
  return path.join(os.homedir(), '.config', 'ytui', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
  return ConfigSchema.parse(parsed);
}
