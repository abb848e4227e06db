import { randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { isErrnoException } from "../core/errors.js";
import { createLogger } from "../core/log.js";

const log = createLogger("file-tx");

/** temp file, fsync, rename over the target, then fsync the directory where the platform allows it. */
export async function atomicWriteFile(filePath: string, content: string | Buffer): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmp = `${filePath}.tmp.${randomBytes(4).toString("hex")}`;

  try {
    const fh = await fs.open(tmp, "w", 0o644);
    try {
      await fh.writeFile(content);
      await fh.datasync();
    } finally {
      await fh.close();
    }
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }

  try {
    const dirFh = await fs.open(dir, "r");
    try {
      await dirFh.sync();
    } finally {
      await dirFh.close();
    }
  } catch (err) {
    if (isErrnoException(err) && (err.code === "EISDIR" || err.code === "EPERM" || err.code === "EINVAL")) {
      log.debug("directory fsync unsupported", { dir, code: err.code });
      return;
    }
    throw err;
  }
}

interface StagedWrite {
  target: string;
  content: string;
}

interface Backup {
  target: string;
  previous: Buffer | null;
}

/**
 * Stages writes and applies them together. If any write fails, every target
 * already touched is put back to its previous bytes (or removed if it was new).
 */
export class FileTransaction {
  private readonly staged: StagedWrite[] = [];
  private readonly backups: Backup[] = [];
  private committed = false;

  stage(target: string, content: string): void {
    if (this.committed) throw new Error("transaction already committed");
    this.staged.push({ target, content });
  }

  get size(): number {
    return this.staged.length;
  }

  async commit(): Promise<string[]> {
    if (this.committed) throw new Error("transaction already committed");
    this.committed = true;
    const written: string[] = [];

    try {
      for (const w of this.staged) {
        this.backups.push({ target: w.target, previous: await readIfExists(w.target) });
        await atomicWriteFile(w.target, w.content);
        written.push(w.target);
      }
    } catch (err) {
      await this.rollback();
      throw err;
    }
    return written;
  }

  private async rollback(): Promise<void> {
    for (const b of [...this.backups].reverse()) {
      try {
        if (b.previous === null) await fs.rm(b.target, { force: true });
        else await atomicWriteFile(b.target, b.previous);
      } catch (err) {
        log.error("rollback failed", { target: b.target, error: err instanceof Error ? err.message : String(err) });
      }
    }
  }
}

export async function readIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
}
