import { describe, it, expect, vi } from "vitest";
import { promises } from "fs";
import type { FileHandle } from "fs/promises";
import { access, mkdir, readFile, rm, writeFile } from "fs/promises";
import path from "path";
import { sha256Prefixed } from "../src/core/canonicalJson.js";
import { LockTimeoutError, UnsafePathError } from "../src/core/errors.js";
import { setLogSink } from "../src/core/log.js";
import type { LogEntry } from "../src/core/log.js";
import { ArtifactTracker, DEFAULT_STATE_PATH } from "../src/tracker/artifactTracker.js";
import { acquireLock, releaseLock } from "../src/tracker/lockFile.js";
import { emptyWorkspace, fixedClock, writeWorkspaceFile } from "./helpers/workspace.js";

const ONTOLOGY = sha256Prefixed("ontology v1");
const TEMPLATE = sha256Prefixed("template v1");
const clock = fixedClock("2026-01-01T00:00:00.000Z");

async function withRoot(fn: (root: string) => Promise<void>): Promise<void> {
  const root = await emptyWorkspace();
  try {
    await fn(root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

async function exists(p: string): Promise<boolean> {
  return access(p).then(
    () => true,
    () => false
  );
}

describe("ArtifactTracker", () => {
  it("decides staleness from ontology, template and file bytes", async () => {
    await withRoot(async (root) => {
      await writeWorkspaceFile(root, "out/a.rs", "pub struct A;\n");
      const tracker = await ArtifactTracker.load(DEFAULT_STATE_PATH, root, { clock });

      expect(await tracker.isStale("out/a.rs", ONTOLOGY, TEMPLATE)).toBe(true);

      await tracker.recordArtifact("out/a.rs", ONTOLOGY, TEMPLATE, ["templates/a.njk", "queries/a.rq"]);
      expect(tracker.get("./out/a.rs")).toEqual({
        output_path: "out/a.rs",
        ontology_hash: ONTOLOGY,
        template_hash: TEMPLATE,
        artifact_hash: sha256Prefixed("pub struct A;\n"),
        dependencies: ["queries/a.rq", "templates/a.njk"],
        recorded_at: "2026-01-01T00:00:00.000Z"
      });

      expect(await tracker.isStale("out/a.rs", ONTOLOGY, TEMPLATE)).toBe(false);
      expect(await tracker.isStale("out/a.rs", sha256Prefixed("ontology v2"), TEMPLATE)).toBe(true);
      expect(await tracker.isStale("out/a.rs", ONTOLOGY, sha256Prefixed("template v2"))).toBe(true);

      await writeWorkspaceFile(root, "out/a.rs", "pub struct B;\n");
      expect(await tracker.isStale("out/a.rs", ONTOLOGY, TEMPLATE)).toBe(true);

      await rm(path.join(root, "out/a.rs"));
      expect(await tracker.isStale("out/a.rs", ONTOLOGY, TEMPLATE)).toBe(true);
    });
  });

  it("lists stale artifacts against the current ontology", async () => {
    await withRoot(async (root) => {
      await writeWorkspaceFile(root, "out/a.rs", "a\n");
      await writeWorkspaceFile(root, "out/b.rs", "b\n");
      const tracker = await ArtifactTracker.load(DEFAULT_STATE_PATH, root, { clock });
      await tracker.recordArtifact("out/a.rs", ONTOLOGY, TEMPLATE, []);
      await tracker.recordArtifact("out/b.rs", ONTOLOGY, TEMPLATE, []);

      expect(await tracker.getStaleArtifacts(ONTOLOGY)).toEqual([]);
      await writeWorkspaceFile(root, "out/b.rs", "b edited\n");
      expect(await tracker.getStaleArtifacts(ONTOLOGY)).toEqual(["out/b.rs"]);
      expect(await tracker.getStaleArtifacts(sha256Prefixed("ontology v2"))).toEqual(["out/a.rs", "out/b.rs"]);
    });
  });

  it("finds and removes orphaned files under the generated root", async () => {
    await withRoot(async (root) => {
      await writeWorkspaceFile(root, "out/a.rs", "a\n");
      await writeWorkspaceFile(root, "out/b.rs", "b\n");
      await writeWorkspaceFile(root, "out/sub/c.rs", "c\n");
      await writeWorkspaceFile(root, "elsewhere/d.rs", "d\n");
      const tracker = await ArtifactTracker.load(DEFAULT_STATE_PATH, root, { clock });
      await tracker.recordArtifact("out/a.rs", ONTOLOGY, TEMPLATE, []);
      await tracker.recordArtifact("out/gone.rs", ONTOLOGY, TEMPLATE, []);

      expect(await tracker.findOrphanedFiles("out")).toEqual(["out/b.rs", "out/sub/c.rs"]);
      expect(await tracker.findOrphanedFiles("missing")).toEqual([]);

      expect(await tracker.cleanupOrphaned("out", true)).toEqual(["out/b.rs", "out/sub/c.rs"]);
      expect(await exists(path.join(root, "out/b.rs"))).toBe(true);

      expect(await tracker.cleanupOrphaned("out", false)).toEqual(["out/b.rs", "out/sub/c.rs"]);
      expect(await exists(path.join(root, "out/b.rs"))).toBe(false);
      expect(await exists(path.join(root, "out/sub/c.rs"))).toBe(false);
      expect(await exists(path.join(root, "out/a.rs"))).toBe(true);
    });
  });

  it("refuses to look for orphans outside the workspace", async () => {
    await withRoot(async (root) => {
      await writeWorkspaceFile(root, "proofgen.yaml", "version: 1\n");
      const tracker = await ArtifactTracker.load(DEFAULT_STATE_PATH, root, { clock });

      await expect(tracker.findOrphanedFiles("..")).rejects.toBeInstanceOf(UnsafePathError);
      await expect(tracker.findOrphanedFiles(".")).rejects.toBeInstanceOf(UnsafePathError);
      await expect(tracker.findOrphanedFiles(path.dirname(root))).rejects.toBeInstanceOf(UnsafePathError);
      await expect(tracker.cleanupOrphaned("out/../..", false)).rejects.toBeInstanceOf(UnsafePathError);
      expect(await exists(path.join(root, "proofgen.yaml"))).toBe(true);
    });
  });

  it("records an empty artifact hash for a file that is not on disk", async () => {
    await withRoot(async (root) => {
      const tracker = await ArtifactTracker.load(DEFAULT_STATE_PATH, root, { clock });
      await tracker.recordArtifact("out/never.rs", ONTOLOGY, TEMPLATE, []);
      expect(tracker.get("out/never.rs")?.artifact_hash).toBe("");
      expect(await tracker.isStale("out/never.rs", ONTOLOGY, TEMPLATE)).toBe(true);
    });
  });

  it("starts empty when the state file is corrupt", async () => {
    await withRoot(async (root) => {
      const entries: LogEntry[] = [];
      const previous = setLogSink((e) => entries.push(e));
      try {
        await writeWorkspaceFile(root, DEFAULT_STATE_PATH, "{not json");
        expect((await ArtifactTracker.load(DEFAULT_STATE_PATH, root)).size).toBe(0);

        await writeWorkspaceFile(root, DEFAULT_STATE_PATH, JSON.stringify({ "out/a.rs": { ontology_hash: 1 } }));
        expect((await ArtifactTracker.load(DEFAULT_STATE_PATH, root)).size).toBe(0);
      } finally {
        setLogSink(previous);
      }
      const warnings = entries.filter((e) => e.level === "warn").map((e) => e.msg);
      expect(warnings).toEqual([
        "ArtifactTrackerCorruption: state file is not JSON, starting empty",
        "ArtifactTrackerCorruption: state file does not match the schema, starting empty"
      ]);
    });
  });

  it("starts empty when the state file cannot be read", async () => {
    await withRoot(async (root) => {
      await mkdir(path.join(root, DEFAULT_STATE_PATH), { recursive: true });
      const entries: LogEntry[] = [];
      const previous = setLogSink((e) => entries.push(e));
      try {
        expect((await ArtifactTracker.load(DEFAULT_STATE_PATH, root)).size).toBe(0);
      } finally {
        setLogSink(previous);
      }
      expect(entries.filter((e) => e.level === "warn").map((e) => e.msg)).toEqual([
        "ArtifactTrackerCorruption: state file is unreadable, starting empty"
      ]);
    });
  });

  it("persists sorted state and merges concurrent saves", async () => {
    await withRoot(async (root) => {
      await writeWorkspaceFile(root, "out/a.rs", "a\n");
      await writeWorkspaceFile(root, "out/b.rs", "b\n");
      const first = await ArtifactTracker.load(DEFAULT_STATE_PATH, root, { clock });
      const second = await ArtifactTracker.load(DEFAULT_STATE_PATH, root, { clock });
      await second.recordArtifact("out/b.rs", ONTOLOGY, TEMPLATE, []);
      await first.recordArtifact("out/a.rs", ONTOLOGY, TEMPLATE, []);
      await Promise.all([first.save(), second.save()]);

      const text = await readFile(path.join(root, DEFAULT_STATE_PATH), "utf8");
      const parsed: unknown = JSON.parse(text);
      expect(Object.keys(parsed && typeof parsed === "object" ? parsed : {})).toEqual(["out/a.rs", "out/b.rs"]);
      expect(await exists(path.join(root, `${DEFAULT_STATE_PATH}.lock`))).toBe(false);

      const reloaded = await ArtifactTracker.load(DEFAULT_STATE_PATH, root);
      expect(reloaded.entries().map((e) => e.output_path)).toEqual(["out/a.rs", "out/b.rs"]);

      expect(reloaded.removeArtifact("out/a.rs")).toBe(true);
      await reloaded.save();
      expect((await ArtifactTracker.load(DEFAULT_STATE_PATH, root)).entries().map((e) => e.output_path)).toEqual(["out/b.rs"]);
    });
  });
});

describe("lock file", () => {
  it("times out while another holder has the lock", async () => {
    await withRoot(async (root) => {
      const lockPath = path.join(root, "state.lock");
      const held = await acquireLock(lockPath);
      try {
        await expect(acquireLock(lockPath, { timeoutMs: 120 })).rejects.toBeInstanceOf(LockTimeoutError);
      } finally {
        await releaseLock(held);
      }
      const again = await acquireLock(lockPath, { timeoutMs: 120 });
      await releaseLock(again);
    });
  });

  it("closes and removes the lock file when announcing the holder fails", async () => {
    await withRoot(async (root) => {
      const lockPath = path.join(root, "state.lock");
      const realOpen = promises.open.bind(promises);
      let closes = 0;
      const open = vi.spyOn(promises, "open").mockImplementationOnce(async (file, flags, mode) => {
        const fh: FileHandle = await realOpen(file, flags, mode);
        const realClose = fh.close.bind(fh);
        vi.spyOn(fh, "writeFile").mockRejectedValueOnce(new Error("disk full"));
        vi.spyOn(fh, "close").mockImplementation(async () => {
          closes++;
          await realClose();
        });
        return fh;
      });
      try {
        await expect(acquireLock(lockPath, { timeoutMs: 50 })).rejects.toThrow("disk full");
      } finally {
        open.mockRestore();
      }
      expect(closes).toBe(1);
      expect(await exists(lockPath)).toBe(false);

      const handle = await acquireLock(lockPath, { timeoutMs: 50 });
      await releaseLock(handle);
    });
  });

  it("takes over a lock left by a process that no longer exists", async () => {
    await withRoot(async (root) => {
      const lockPath = path.join(root, "state.lock");
      await writeFile(lockPath, JSON.stringify({ pid: 2 ** 22 + 12345, started_ms: Date.now() }), "utf8");
      const handle = await acquireLock(lockPath, { timeoutMs: 500 });
      expect(JSON.parse(await readFile(lockPath, "utf8")).pid).toBe(process.pid);
      await releaseLock(handle);
    });
  });
});
