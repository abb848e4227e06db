import { promises as fs } from "fs";
import type { Dirent } from "fs";
import path from "path";
import * as z from "zod/v4";
import { sha256File, stableJsonPretty } from "../core/canonicalJson.js";
import { isErrnoException } from "../core/errors.js";
import { createLogger } from "../core/log.js";
import { compareStrings, normalizeRelPath, safeJoin, toWorkspaceRelative } from "../core/paths.js";
import { atomicWriteFile } from "../collaborators/fileTransaction.js";
import { acquireLock, releaseLock } from "./lockFile.js";
import type { LockOptions } from "./lockFile.js";

const log = createLogger("tracker");

export const DEFAULT_STATE_PATH = ".proofgen/state.json";

const zTrackedEntry = z.object({
  ontology_hash: z.string(),
  template_hash: z.string(),
  artifact_hash: z.string(),
  dependencies: z.array(z.string()).default([]),
  recorded_at: z.string()
});

const zStateFile = z.record(z.string(), zTrackedEntry);

export type TrackedEntry = z.infer<typeof zTrackedEntry>;

export interface ArtifactRecord extends TrackedEntry {
  output_path: string;
}

export interface TrackerOptions {
  clock?: () => Date;
  lock?: LockOptions;
}

/** Serializes save() calls for one state file within this process. */
const saveChains = new Map<string, Promise<void>>();

async function readState(statePath: string): Promise<Map<string, TrackedEntry>> {
  let text: string;
  try {
    text = await fs.readFile(statePath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return new Map();
    log.warn("ArtifactTrackerCorruption: state file is unreadable, starting empty", {
      statePath,
      error: err instanceof Error ? err.message : String(err)
    });
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    log.warn("ArtifactTrackerCorruption: state file is not JSON, starting empty", {
      statePath,
      error: err instanceof Error ? err.message : String(err)
    });
    return new Map();
  }
  const result = zStateFile.safeParse(parsed);
  if (!result.success) {
    log.warn("ArtifactTrackerCorruption: state file does not match the schema, starting empty", {
      statePath,
      issues: result.error.issues.length
    });
    return new Map();
  }
  return new Map(Object.entries(result.data));
}

/**
 * Last-known provenance of every generated output, persisted as one JSON map
 * keyed by workspace-relative output path.
 */
export class ArtifactTracker {
  /** null marks a removal */
  private readonly pending = new Map<string, TrackedEntry | null>();
  private readonly clock: () => Date;

  private constructor(
    readonly statePath: string,
    readonly rootDir: string,
    private records: Map<string, TrackedEntry>,
    private readonly options: TrackerOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** A missing or corrupt state file yields an empty tracker. */
  static async load(statePath: string, rootDir: string, options: TrackerOptions = {}): Promise<ArtifactTracker> {
    const abs = path.resolve(rootDir, statePath);
    return new ArtifactTracker(abs, path.resolve(rootDir), await readState(abs), options);
  }

  get size(): number {
    return this.records.size;
  }

  get(outputPath: string): ArtifactRecord | null {
    const key = normalizeRelPath(outputPath);
    const entry = this.records.get(key);
    return entry ? { output_path: key, ...entry } : null;
  }

  entries(): ArtifactRecord[] {
    return [...this.records.entries()]
      .sort((a, b) => compareStrings(a[0], b[0]))
      .map(([output_path, entry]) => ({ output_path, ...entry }));
  }

  private async currentHash(key: string): Promise<string | null> {
    try {
      return (await sha256File(path.join(this.rootDir, key))).sha256;
    } catch (err) {
      if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "EISDIR")) return null;
      throw err;
    }
  }

  /** In-memory only until save(). Without an explicit hash the file on disk is hashed ("" when absent). */
  async recordArtifact(
    outputPath: string,
    ontologyHash: string,
    templateHash: string,
    dependencies: readonly string[],
    artifactHash?: string
  ): Promise<void> {
    const key = normalizeRelPath(outputPath);
    const entry: TrackedEntry = {
      ontology_hash: ontologyHash,
      template_hash: templateHash,
      artifact_hash: artifactHash ?? (await this.currentHash(key)) ?? "",
      dependencies: [...dependencies].map(normalizeRelPath).sort(compareStrings),
      recorded_at: this.clock().toISOString()
    };
    this.records.set(key, entry);
    this.pending.set(key, entry);
  }

  removeArtifact(outputPath: string): boolean {
    const key = normalizeRelPath(outputPath);
    const existed = this.records.delete(key);
    this.pending.set(key, null);
    return existed;
  }

  async isStale(outputPath: string, ontologyHash: string, templateHash: string): Promise<boolean> {
    const key = normalizeRelPath(outputPath);
    const recorded = this.records.get(key);
    if (!recorded) return true;
    if (recorded.ontology_hash !== ontologyHash || recorded.template_hash !== templateHash) return true;
    const current = await this.currentHash(key);
    return current === null || current !== recorded.artifact_hash;
  }

  async getStaleArtifacts(currentOntologyHash: string): Promise<string[]> {
    const stale: string[] = [];
    for (const [key, entry] of this.records) {
      if (await this.isStale(key, currentOntologyHash, entry.template_hash)) stale.push(key);
    }
    return stale.sort(compareStrings);
  }

  /**
   * Regular files under `generatedRoot` that no record claims. Tracked files gone from disk are not orphans.
   * Throws UnsafePathError unless `generatedRoot` is a subdirectory of the workspace.
   */
  async findOrphanedFiles(generatedRoot: string): Promise<string[]> {
    const start = safeJoin(this.rootDir, generatedRoot);
    const orphans: string[] = [];
    const walk = async (absDir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(absDir, { withFileTypes: true });
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") return;
        throw err;
      }
      for (const e of entries) {
        const abs = path.join(absDir, e.name);
        if (e.isDirectory()) await walk(abs);
        else if (e.isFile()) {
          const rel = toWorkspaceRelative(this.rootDir, abs);
          if (!this.records.has(rel)) orphans.push(rel);
        }
      }
    };
    await walk(start);
    return orphans.sort(compareStrings);
  }

  async cleanupOrphaned(generatedRoot: string, dryRun: boolean): Promise<string[]> {
    const orphans = await this.findOrphanedFiles(generatedRoot);
    if (dryRun) return orphans;
    const removed: string[] = [];
    for (const rel of orphans) {
      try {
        await fs.unlink(path.join(this.rootDir, rel));
        removed.push(rel);
      } catch (err) {
        log.warn("could not remove orphaned file", { path: rel, error: err instanceof Error ? err.message : String(err) });
      }
    }
    return removed;
  }

  /**
   * Read-modify-write under the in-process chain and the lock file: the state on
   * disk is re-read and only this tracker's own mutations are applied on top.
   */
  async save(): Promise<void> {
    const prev = saveChains.get(this.statePath) ?? Promise.resolve();
    const run = prev.then(() => this.saveLocked());
    const settled = run.catch(() => undefined);
    saveChains.set(this.statePath, settled);
    try {
      await run;
    } finally {
      if (saveChains.get(this.statePath) === settled) saveChains.delete(this.statePath);
    }
  }

  private async saveLocked(): Promise<void> {
    const handle = await acquireLock(`${this.statePath}.lock`, this.options.lock);
    try {
      const merged = await readState(this.statePath);
      for (const [key, entry] of this.pending) {
        if (entry === null) merged.delete(key);
        else merged.set(key, entry);
      }
      const out: Record<string, TrackedEntry> = {};
      for (const key of [...merged.keys()].sort(compareStrings)) {
        const entry = merged.get(key);
        if (entry) out[key] = entry;
      }
      await atomicWriteFile(this.statePath, stableJsonPretty(out));
      this.pending.clear();
      this.records = merged;
      log.debug("tracker saved", { statePath: this.statePath, artifacts: merged.size });
    } finally {
      await releaseLock(handle);
    }
  }
}
