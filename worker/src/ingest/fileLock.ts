import fs from 'fs/promises';
import path from 'path';
import { LockTimeoutError } from './errors.js';
import { delay } from './retry.js';

const DEFAULT_STALE_MS = 30 * 60 * 1000;
const DEFAULT_TIMEOUT_MS = 10_000;
const POLL_MS = 25;

export type FileLockOptions = {
  /** A lock file older than this is assumed abandoned by a dead process. */
  staleMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

async function tryAcquire(lockPath: string): Promise<boolean> {
  try {
    const handle = await fs.open(lockPath, 'wx');
    await handle.writeFile(
      JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }),
    );
    await handle.close();
    return true;
  } catch (err) {
    if (errorCode(err) === 'EEXIST') return false;
    throw err;
  }
}

async function removeIfStale(
  lockPath: string,
  staleMs: number,
  now: number,
): Promise<boolean> {
  const stat = await fs.stat(lockPath).catch((err: unknown) => {
    if (errorCode(err) === 'ENOENT') return null;
    throw err;
  });
  if (!stat || now - stat.mtimeMs <= staleMs) return false;
  await fs.rm(lockPath, { force: true });
  return true;
}

/**
 * Run `fn` while holding an exclusive lock file. Serialises load-modify-save
 * cycles across worker processes sharing the same state files.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  opts: FileLockOptions = {},
): Promise<T> {
  const staleMs = opts.staleMs ?? DEFAULT_STALE_MS;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const sleep = opts.sleep ?? delay;
  const now = opts.now ?? Date.now;
  const deadline = now() + timeoutMs;

  await fs.mkdir(path.dirname(lockPath), { recursive: true });
  while (!(await tryAcquire(lockPath))) {
    if (await removeIfStale(lockPath, staleMs, now())) continue;
    if (now() >= deadline) throw new LockTimeoutError(lockPath);
    await sleep(POLL_MS);
  }

  try {
    return await fn();
  } finally {
    await fs.rm(lockPath, { force: true });
  }
}
