import * as os from 'node:os';
import * as path from 'node:path';

/** Read an environment variable, treating empty values as unset */
export function getEnv(name: string): string | undefined {
  const value = process.env[name];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function isGitHubActions(): boolean {
  return getEnv('GITHUB_ACTIONS') === 'true';
}

/** Expand a leading `~` and resolve to an absolute path */
export function expandPath(input: string): string {
  if (input === '~') return os.homedir();
  if (input.startsWith('~/')) return path.join(os.homedir(), input.slice(2));
  return path.resolve(input);
}
