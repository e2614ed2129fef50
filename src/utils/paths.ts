import os from 'node:os';
import path from 'node:path';

function homeDir(): string {
  // Read per call; tests stub HOME.
  return process.env.HOME ?? process.env.USERPROFILE ?? os.homedir();
}

export function expandHome(value: string): string {
  if (value === '~') return homeDir();
  if (value.startsWith('~/')) return path.join(homeDir(), value.slice(2));
  return value;
}

export function configHome(): string {
  return process.env.XDG_CONFIG_HOME || path.join(homeDir(), '.config');
}

export function cacheHome(): string {
  return process.env.XDG_CACHE_HOME || path.join(homeDir(), '.cache');
}
