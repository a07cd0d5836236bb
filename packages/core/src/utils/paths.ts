import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function defaultHomeDir(): string {
  return join(homedir(), '.bridgeline');
}
