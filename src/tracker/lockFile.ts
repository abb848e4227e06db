import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import path from "path";
import { LockTimeoutError, isErrnoException } from "../core/errors.js";
import { isJsonObject } from "../core/json.js";
import { createLogger } from "../core/log.js";

const log = createLogger("lock");

export interface LockHandle {
  lockPath: string;
  fh: FileHandle;
}

export interface LockOptions {
  timeoutMs?: number;
  staleAfterMs?: number;
}

function backoff(attempt: number): number {
  return Math.min(50 * 2 ** attempt, 1000);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === "EPERM";
  }
}

async function isStale(lockPath: string, staleAfterMs: number): Promise<boolean> {
  let text: string;
  try {
    text = await fs.readFile(lockPath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    // a holder that has created the file but not yet written to it looks like this
    const st = await fs.stat(lockPath).catch(() => null);
    return st !== null && Date.now() - st.mtimeMs > staleAfterMs;
  }
  if (!isJsonObject(data)) return true;
  const pid = data.pid;
  const startedMs = data.started_ms;
  if (typeof pid === "number" && pid !== process.pid && !pidAlive(pid)) return true;
  return typeof startedMs === "number" && Date.now() - startedMs > staleAfterMs;
}

/** Exclusive-create lock file with PID and age based stale detection. */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockHandle> {
  const timeoutMs = options.timeoutMs ?? 10_000;
  const staleAfterMs = options.staleAfterMs ?? 10 * 60_000;
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  const started = Date.now();
  for (let attempt = 0; ; attempt++) {
    let fh: FileHandle | null = null;
    try {
      fh = await fs.open(lockPath, "wx");
    } catch (err) {
      if (!(isErrnoException(err) && err.code === "EEXIST")) throw err;
    }
    if (fh) {
      try {
        await fh.writeFile(JSON.stringify({ pid: process.pid, started_ms: Date.now() }));
      } catch (err) {
        // the lock was never announced: give it back
        await fh.close();
        await fs.rm(lockPath, { force: true });
        throw err;
      }
      return { lockPath, fh };
    }

    if (await isStale(lockPath, staleAfterMs)) {
      log.warn("removing stale lock", { lockPath });
      await fs.rm(lockPath, { force: true });
      continue;
    }
    if (Date.now() - started >= timeoutMs) throw new LockTimeoutError(lockPath);
    await sleep(backoff(attempt));
  }
}

export async function releaseLock(handle: LockHandle): Promise<void> {
  await handle.fh.close();
  await fs.rm(handle.lockPath, { force: true });
}
