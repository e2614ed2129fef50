import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../cli/errors.js';
import { cacheHome, configHome, expandHome } from '../utils/paths.js';

export const ConfigSchema = z
  .object({
    /** Glob matching the list directories, e.g. `~/.local/share/calendars/*`. */
    path: z.string().min(1).default('~/.local/share/calendars/*'),
    /** date-fns pattern used to print and read due dates. */
    dateFormat: z.string().min(1).default('yyyy-MM-dd'),
    humanTime: z.boolean().default(true),
    cachePath: z.string().min(1).optional(),
    defaultList: z.string().min(1).optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.todo-vdir.json';

export function getGlobalConfigPath(): string {
  return path.join(configHome(), 'todo-vdir', 'config.json');
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

/**
 * Explicit path, else the nearest project file walking up from the cwd, else the
 * global file. A missing file means defaults, except when the path was given explicitly.
 */
export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath !== undefined) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${pathToLoad}: ${issues}`);
  }
  return result.data;
}

export function resolveCachePath(config: Config): string {
  return config.cachePath ? expandHome(config.cachePath) : path.join(cacheHome(), 'todo-vdir', 'ids.json');
}

export function resolveHumanTime(config: Config, flags: ReadonlySet<string>): boolean {
  if (flags.has('--no-human-time')) return false;
  if (flags.has('--human-time')) return true;
  return config.humanTime;
}
