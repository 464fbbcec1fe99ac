/**
 * Per-file mutual exclusion within the process. A migration run owns its
 * pipeline file for the whole sequence of scripts, so two runs targeting
 * the same file queue behind each other.
 */

import * as path from 'node:path';

const fileLocks = new Map<string, Promise<void>>();

export async function withFileLock<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
  const key = path.resolve(filePath);
  const previous = fileLocks.get(key) ?? Promise.resolve();

  const run = previous.then(operation);
  // The queue only tracks completion; the outcome reaches the caller via `run`
  const settled = run.then(
    () => undefined,
    () => undefined
  );
  fileLocks.set(key, settled);

  try {
    return await run;
  } finally {
    if (fileLocks.get(key) === settled) {
      fileLocks.delete(key);
    }
  }
}
