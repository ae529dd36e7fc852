/**
 * Console output grouping on GitHub Actions. A no-op everywhere else.
 */

import { isGitHubActions } from './env.js';

export async function withGroup<T>(title: string, fn: () => Promise<T>): Promise<T> {
  if (!isGitHubActions()) {
    return fn();
  }

  process.stdout.write(`::group::${title}\n`);
  try {
    return await fn();
  } finally {
    process.stdout.write('::endgroup::\n');
  }
}
