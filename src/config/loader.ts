import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const ConfigSchema = z.object({
  tasksFile: z.string().default('tasks.md'),
  exportFile: z.string().default('tasks.json'),
  interactive: z
    .object({
      pollIntervalMs: z.number().int().positive().default(100),
      colors: z
        .object({
          disable: z.boolean().optional(),
        })
        .optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.taskloop.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub the home directory behave correctly.
  return path.join(os.homedir(), '.config', 'taskloop', 'config.json');
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

  try {
    const content = fs.readFileSync(pathToLoad, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }
}

export function resolveTaskPaths(config: Config, cwd: string = process.cwd()): { tasksFile: string; exportFile: string } {
  return {
    tasksFile: path.resolve(cwd, config.tasksFile),
    exportFile: path.resolve(cwd, config.exportFile),
  };
}
