import { describe, it, expect } from "vitest";
import { access, readFile, rm, writeFile } from "fs/promises";
import path from "path";
import { sha256Prefixed } from "../src/core/canonicalJson.js";
import { RunCancelledError, WorkspaceConfigError } from "../src/core/errors.js";
import { OUTPUT_DIR, generate } from "../src/generation/generate.js";
import type { GenerateParams, GenerateSummary } from "../src/generation/generate.js";
import { ReceiptVerifier } from "../src/receipts/receiptVerifier.js";
import type { VerificationResult } from "../src/receipts/receiptVerifier.js";
import { ENTITIES_RS, copyFixtureWorkspace, fixedClock } from "./helpers/workspace.js";

async function exists(p: string): Promise<boolean> {
  return access(p).then(
    () => true,
    () => false
  );
}

async function withFixture(fn: (ws: string) => Promise<void>): Promise<void> {
  const ws = await copyFixtureWorkspace();
  try {
    await fn(ws);
  } finally {
    await rm(ws, { recursive: true, force: true });
  }
}

function run(ws: string, at: string, params: Omit<GenerateParams, "workspace_root"> = {}): Promise<GenerateSummary> {
  return generate({ workspace_root: ws, ...params }, { clock: fixedClock(at), parallelism: 2 });
}

async function verify(summary: GenerateSummary): Promise<VerificationResult> {
  if (!summary.receipt_path) throw new Error(`no receipt for ${summary.status}`);
  return new ReceiptVerifier().verify(summary.receipt_path);
}

function failedChecks(result: VerificationResult): string[] {
  return result.checks.filter((c) => c.verdict === "fail").map((c) => c.check_id);
}

describe("generate", () => {
  it("previews without touching the generated root", async () => {
    await withFixture(async (ws) => {
      const summary = await run(ws, "2026-01-01T00:00:00.000Z");
      expect(summary.status).toBe("success");
      expect(summary.mode).toBe("preview");
      expect(summary.outputs).toEqual([
        {
          path: "out/a.rs",
          hash: sha256Prefixed(ENTITIES_RS),
          size: 104,
          status: "skipped",
          language: "rust",
          rule: "entities"
        }
      ]);
      expect(await exists(path.join(ws, "out/a.rs"))).toBe(false);
      expect(summary.receipt_path).toBe(path.join(ws, OUTPUT_DIR, "receipts", `${summary.run_id}.json`));
      expect(summary.report_path).toBe(path.join(ws, OUTPUT_DIR, "reports", `${summary.run_id}.md`));

      const patch = await readFile(summary.diff_path ?? "", "utf8");
      expect(patch).toContain("+++ b/out/a.rs");
      expect(patch).toContain("+pub struct Account;");

      const report = await readFile(summary.report_path ?? "", "utf8");
      expect(report.startsWith(`# Generation report ${summary.run_id}\n`)).toBe(true);
      expect(report).toContain(`| out/a.rs | skipped | rust | 104 | ${sha256Prefixed(ENTITIES_RS)} |`);

      const result = await verify(summary);
      expect(result.result).toBe("VERIFIED");
      expect(result.checks[3]?.message).toBe("0 output hashes match");
    });
  });

  it("applies, verifies, and pins a one-byte edit to V4", async () => {
    await withFixture(async (ws) => {
      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { preview: false });
      expect(summary.status).toBe("success");
      expect(summary.outputs.map((o) => o.status)).toEqual(["generated"]);
      expect(summary.stats).toMatchObject({ generated: 1, unchanged: 0, cache_hit_rate: 0 });
      expect(await readFile(path.join(ws, "out/a.rs"), "utf8")).toBe(ENTITIES_RS);
      expect(summary.stale).toEqual([]);
      expect(summary.orphans).toEqual([]);

      const verified = await verify(summary);
      expect(verified.result).toBe("VERIFIED");
      expect(verified.checks.map((c) => c.verdict)).toEqual(["pass", "pass", "pass", "pass", "pass", "pass", "skip"]);
      expect(verified.checks[3]?.message).toBe("1 output hashes match");

      await writeFile(path.join(ws, "out/a.rs"), ENTITIES_RS.replace("Account", "Accounx"), "utf8");
      const edited = await verify(summary);
      expect(edited.result).toBe("FAILED");
      expect(failedChecks(edited)).toEqual(["V4"]);
      expect(edited.checks[3]?.message).toBe("output hash mismatch: out/a.rs");
    });
  });

  it("reuses unchanged outputs on the next apply", async () => {
    await withFixture(async (ws) => {
      await run(ws, "2026-01-01T00:00:00.000Z", { preview: false });
      const again = await run(ws, "2026-01-01T00:01:00.000Z", { preview: false });
      expect(again.outputs.map((o) => [o.status, o.hash, o.size])).toEqual([["unchanged", sha256Prefixed(ENTITIES_RS), 104]]);
      expect(again.stats.cache_hit_rate).toBe(1);
      expect(again.diff_path).toBeNull();
      expect((await verify(again)).result).toBe("VERIFIED");

      const forced = await run(ws, "2026-01-01T00:02:00.000Z", { preview: false, force: true });
      expect(forced.outputs.map((o) => o.status)).toEqual(["generated"]);
    });
  });

  it("regenerates when an included template changes", async () => {
    await withFixture(async (ws) => {
      const main = await readFile(path.join(ws, "templates/entities.rs.njk"), "utf8");
      await writeFile(path.join(ws, "templates/_header.njk"), "// header v1\n", "utf8");
      await writeFile(path.join(ws, "templates/entities.rs.njk"), `{% include "templates/_header.njk" %}\n${main}`, "utf8");

      const first = await run(ws, "2026-01-01T00:00:00.000Z", { preview: false });
      expect(first.outputs.map((o) => o.status)).toEqual(["generated"]);
      expect((await readFile(path.join(ws, "out/a.rs"), "utf8")).startsWith("// header v1\n")).toBe(true);

      await writeFile(path.join(ws, "templates/_header.njk"), "// header v2\n", "utf8");
      const second = await run(ws, "2026-01-01T00:02:00.000Z", { preview: false });
      expect(second.outputs.map((o) => o.status)).toEqual(["generated"]);
      expect((await readFile(path.join(ws, "out/a.rs"), "utf8")).startsWith("// header v2\n")).toBe(true);
      expect((await verify(second)).result).toBe("VERIFIED");
    });
  });

  it("resolves includes only against discovered templates", async () => {
    await withFixture(async (ws) => {
      await writeFile(path.join(ws, "notes.txt"), "not a template\n", "utf8");
      await writeFile(path.join(ws, "templates/entities.rs.njk"), `{% include "notes.txt" %}\n`, "utf8");

      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { preview: false });
      expect(summary.status).toBe("success");
      expect(summary.outputs.map((o) => o.status)).toEqual(["blocked"]);
      expect(summary.outputs[0]?.diagnostic).toContain("template not found: notes.txt");
      expect(await exists(path.join(ws, "out/a.rs"))).toBe(false);
    });
  });

  it("refuses a generated root outside the workspace before listing orphans", async () => {
    await withFixture(async (ws) => {
      const config = await readFile(path.join(ws, "proofgen.yaml"), "utf8");
      await writeFile(path.join(ws, "proofgen.yaml"), config.replace("generated_root: out", "generated_root: .."), "utf8");
      await expect(run(ws, "2026-01-01T00:00:00.000Z")).rejects.toBeInstanceOf(WorkspaceConfigError);
      expect(await exists(path.join(ws, OUTPUT_DIR))).toBe(false);
    });
  });

  it("lists stale and orphaned files", async () => {
    await withFixture(async (ws) => {
      await run(ws, "2026-01-01T00:00:00.000Z", { preview: false });
      await writeFile(path.join(ws, "out/a.rs"), "// hand edit\n", "utf8");
      await writeFile(path.join(ws, "out/stray.rs"), "// nobody owns this\n", "utf8");

      const summary = await run(ws, "2026-01-01T00:01:00.000Z");
      expect(summary.stale).toEqual(["out/a.rs"]);
      expect(summary.orphans).toEqual(["out/stray.rs"]);
    });
  });

  it("returns guard_failure and writes nothing when a guard fails", async () => {
    await withFixture(async (ws) => {
      await writeFile(path.join(ws, "templates/entities.rs.njk"), "{% frobnicate %}\n", "utf8");
      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { preview: false });
      expect(summary.status).toBe("guard_failure");
      expect(summary.guards.map((g) => g.status)).toEqual(["pass", "pass", "fail", "skip", "skip", "skip", "skip"]);
      expect(summary.receipt_path).toBeNull();
      expect(summary.outputs).toEqual([]);
      expect(await exists(path.join(ws, OUTPUT_DIR))).toBe(false);
      expect(await exists(path.join(ws, "out"))).toBe(false);
    });
  });

  it("continues past failed guards under force and records them for V5", async () => {
    await withFixture(async (ws) => {
      await writeFile(
        path.join(ws, "proofgen.yaml"),
        (await readFile(path.join(ws, "proofgen.yaml"), "utf8")) + "limits:\n  max_output_files: 0\n",
        "utf8"
      );
      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { preview: false, force: true });
      expect(summary.status).toBe("success");
      expect(summary.guards.map((g) => `${g.guard_id}:${g.status}`)).toEqual([
        "G1:pass",
        "G2:pass",
        "G3:pass",
        "G4:pass",
        "G5:pass",
        "G6:pass",
        "G7:fail"
      ]);
      expect(await readFile(path.join(ws, "out/a.rs"), "utf8")).toBe(ENTITIES_RS);

      const result = await verify(summary);
      expect(failedChecks(result)).toEqual(["V5"]);
      expect(result.checks[4]?.message).toBe("guards not passed: G7=fail");
    });
  });

  it("blocks outputs that share a path even under force", async () => {
    await withFixture(async (ws) => {
      await writeFile(
        path.join(ws, "proofgen.yaml"),
        [
          "version: 1",
          "generated_root: out",
          "rules:",
          "  - name: entities",
          "    query: queries/entities.rq",
          "    template: templates/entities.rs.njk",
          "    output: out/a.rs",
          "  - name: again",
          "    query: queries/entities.rq",
          "    template: templates/entities.rs.njk",
          "    output: out/./a.rs",
          "  - name: other",
          "    query: queries/entities.rq",
          "    template: templates/entities.rs.njk",
          "    output: out/b.rs",
          ""
        ].join("\n"),
        "utf8"
      );
      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { preview: false, force: true });
      expect(summary.guards[1]?.status).toBe("fail");
      expect(summary.outputs.map((o) => [o.rule, o.status, o.diagnostic])).toEqual([
        ["entities", "blocked", "output path is shared with another rule"],
        ["again", "blocked", "output path is shared with another rule"],
        ["other", "generated", undefined]
      ]);
      expect(summary.stats.blocked).toBe(2);
      expect(await exists(path.join(ws, "out/a.rs"))).toBe(false);
      expect(await readFile(path.join(ws, "out/b.rs"), "utf8")).toBe(ENTITIES_RS.replace("entities", "other"));
    });
  });

  it("fails validation on malformed JSON output and writes nothing", async () => {
    await withFixture(async (ws) => {
      await writeFile(path.join(ws, "templates/data.json.njk"), '{ "count": {{ rows | length }}, }\n', "utf8");
      await writeFile(
        path.join(ws, "proofgen.yaml"),
        [
          "version: 1",
          "generated_root: out",
          "rules:",
          "  - name: data",
          "    query: queries/entities.rq",
          "    template: templates/data.json.njk",
          "    output: out/data.json",
          ""
        ].join("\n"),
        "utf8"
      );
      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { preview: false });
      expect(summary.status).toBe("validation_failed");
      expect(summary.outputs.map((o) => [o.path, o.status, o.language])).toEqual([["out/data.json", "invalid", "json"]]);
      expect(summary.validation_issues.map((i) => [i.path, i.language])).toEqual([["out/data.json", "json"]]);
      expect(await exists(path.join(ws, "out/data.json"))).toBe(false);
      expect(summary.receipt_path).not.toBeNull();

      const skipped = await run(ws, "2026-01-01T00:01:00.000Z", { preview: false, validate: false });
      expect(skipped.status).toBe("success");
      expect(await readFile(path.join(ws, "out/data.json"), "utf8")).toBe('{ "count": 4, }\n');
    });
  });

  it("stops after the guards in validate-only mode", async () => {
    await withFixture(async (ws) => {
      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { validate_only: true });
      expect(summary.status).toBe("validated");
      expect(summary.guards.map((g) => g.status)).toEqual(["pass", "pass", "pass", "pass", "pass", "skip", "pass"]);
      expect(summary.receipt_path).toBeNull();
      expect(await exists(path.join(ws, OUTPUT_DIR))).toBe(false);
    });
  });

  it("skips the receipt when asked to", async () => {
    await withFixture(async (ws) => {
      const summary = await run(ws, "2026-01-01T00:00:00.000Z", { emit_receipt: false });
      expect(summary.status).toBe("success");
      expect(summary.receipt_path).toBeNull();
      expect(summary.receipt_id).toBeNull();
      expect(await exists(path.join(ws, OUTPUT_DIR, "receipts"))).toBe(false);
    });
  });

  it("stops at the next stage boundary once cancelled", async () => {
    await withFixture(async (ws) => {
      const controller = new AbortController();
      controller.abort();
      await expect(
        generate({ workspace_root: ws }, { signal: controller.signal, clock: fixedClock("2026-01-01T00:00:00.000Z") })
      ).rejects.toBeInstanceOf(RunCancelledError);
    });
  });
});
