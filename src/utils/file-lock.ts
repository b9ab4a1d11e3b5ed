import * as lockfile from "proper-lockfile";

/**
 * Run `fn` while holding an advisory lock on `filePath`. With `realpath`
 * disabled the target itself does not need to exist, only its directory.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: 5, minTimeout: 50, maxTimeout: 500 },
      stale: 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
