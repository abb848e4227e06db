import { describe, it, expect } from "vitest";
import { rm, writeFile } from "fs/promises";
import path from "path";
import { GuardInfrastructureError } from "../src/core/errors.js";
import { defaultCollaborators } from "../src/collaborators/index.js";
import type { Collaborators } from "../src/collaborators/index.js";
import { GuardKernel, createGuardRegistry } from "../src/guards/index.js";
import type { Guard, GuardOptions, GuardReport } from "../src/guards/index.js";
import { pathSafetyGuard } from "../src/guards/pathSafety.js";
import { pass, fail } from "../src/guards/types.js";
import { planOutputs } from "../src/generation/plan.js";
import { RuleRenderer } from "../src/generation/renderer.js";
import { discoverWorkspace } from "../src/workspace/discovery.js";
import { copyFixtureWorkspace } from "./helpers/workspace.js";

const FAIL_FAST: GuardOptions = { failFast: true, force: false, parallelism: 4 };

async function evaluate(
  ws: string,
  options: GuardOptions,
  extra: { custom?: Guard[]; collaborators?: (root: string) => Collaborators } = {}
): Promise<GuardReport> {
  const ctx = await discoverWorkspace(ws);
  const collaborators = extra.collaborators ? extra.collaborators(ctx.root) : defaultCollaborators();
  const renderer = new RuleRenderer(ctx, collaborators);
  const kernel = new GuardKernel(createGuardRegistry(extra.custom ?? []));
  return kernel.evaluate(
    { workspace: ctx, planned: planOutputs(ctx), renderer, validateOnly: options.validateOnly ?? false },
    options
  );
}

async function writeRules(ws: string, rules: Array<{ name: string; query?: string; template?: string; output: string }>, extra = ""): Promise<void> {
  const lines = ["version: 1", "generated_root: out", "rules:"];
  for (const r of rules) {
    lines.push(
      `  - name: ${r.name}`,
      `    query: ${JSON.stringify(r.query ?? "queries/entities.rq")}`,
      `    template: ${JSON.stringify(r.template ?? "templates/entities.rs.njk")}`,
      `    output: ${JSON.stringify(r.output)}`
    );
  }
  await writeFile(path.join(ws, "proofgen.yaml"), lines.join("\n") + "\n" + extra, "utf8");
}

function statuses(report: GuardReport): string[] {
  return report.verdicts.map((v) => `${v.guard_id}:${v.status}`);
}

async function withFixture(fn: (ws: string) => Promise<void>): Promise<void> {
  const ws = await copyFixtureWorkspace();
  try {
    await fn(ws);
  } finally {
    await rm(ws, { recursive: true, force: true });
  }
}

describe("GuardKernel", () => {
  it("passes G1-G7 on a clean workspace", async () => {
    await withFixture(async (ws) => {
      const report = await evaluate(ws, FAIL_FAST);
      expect(report.overall).toBe("pass");
      expect(statuses(report)).toEqual(["G1:pass", "G2:pass", "G3:pass", "G4:pass", "G5:pass", "G6:pass", "G7:pass"]);
      const byId = new Map(report.verdicts.map((v) => [v.guard_id, v]));
      expect(byId.get("G1")?.diagnostic).toBe("3 paths are inside the workspace");
      expect(byId.get("G4")?.metadata).toEqual({ files: 1, triples: 10 });
      expect(byId.get("G5")?.metadata).toEqual({ queries: 1, rows: 4 });
      expect(byId.get("G7")?.metadata).toEqual({ planned_outputs: 1, output_bytes: 104 });
      expect(report.verdicts.every((v) => v.remediation === undefined)).toBe(true);
    });
  });

  it("G1 rejects '..' segments and skips the rest under fail-fast", async () => {
    await withFixture(async (ws) => {
      await writeRules(ws, [{ name: "entities", output: "../escape.rs" }]);
      const report = await evaluate(ws, FAIL_FAST);
      expect(report.overall).toBe("fail");
      const [g1, ...rest] = report.verdicts;
      expect(g1?.status).toBe("fail");
      expect(g1?.diagnostic).toBe('rule entities: output "../escape.rs": path contains a \'..\' segment');
      expect(g1?.remediation).toBe(pathSafetyGuard.remediation);
      expect(rest.map((v) => [v.status, v.diagnostic])).toEqual(
        Array.from({ length: 6 }, () => ["skip", "not evaluated: G1 failed"])
      );
    });
  });

  it("G1 rejects absolute outputs and outputs that overwrite an input", async () => {
    await withFixture(async (ws) => {
      await writeRules(ws, [
        { name: "abs", output: "/tmp/escape.rs" },
        { name: "clobber", output: "ontology/domain.ttl" }
      ]);
      const report = await evaluate(ws, FAIL_FAST);
      expect(report.verdicts[0]?.diagnostic).toBe(
        'rule abs: output "/tmp/escape.rs": path is absolute; rule clobber: output "ontology/domain.ttl" overwrites a declared input'
      );
    });
  });

  it("G2 reports rules that share a normalized output path", async () => {
    await withFixture(async (ws) => {
      await writeRules(ws, [
        { name: "entities", output: "out/a.rs" },
        { name: "again", output: "./out//a.rs" }
      ]);
      const report = await evaluate(ws, FAIL_FAST);
      expect(statuses(report).slice(0, 3)).toEqual(["G1:pass", "G2:fail", "G3:skip"]);
      expect(report.verdicts[1]?.diagnostic).toBe("out/a.rs is written by entities, again");
    });
  });

  it("G3 reports the template compile error location", async () => {
    await withFixture(async (ws) => {
      await writeFile(path.join(ws, "templates/entities.rs.njk"), "// header\n{% frobnicate %}\n", "utf8");
      const report = await evaluate(ws, FAIL_FAST);
      expect(statuses(report)).toEqual(["G1:pass", "G2:pass", "G3:fail", "G4:skip", "G5:skip", "G6:skip", "G7:skip"]);
      const g3 = report.verdicts[2];
      expect(g3?.diagnostic.startsWith("templates/entities.rs.njk (line 2")).toBe(true);
      expect(g3?.diagnostic).toContain("unknown block tag: frobnicate");
    });
  });

  it("G4 reports Turtle syntax errors with the file and line", async () => {
    await withFixture(async (ws) => {
      await writeFile(
        path.join(ws, "ontology/domain.ttl"),
        "@prefix ex: <http://example.org/> .\nex:a ex:b ex:c .\nex:a ex:b .\n",
        "utf8"
      );
      const report = await evaluate(ws, FAIL_FAST);
      expect(statuses(report)).toEqual(["G1:pass", "G2:pass", "G3:pass", "G4:fail", "G5:skip", "G6:skip", "G7:skip"]);
      const g4 = report.verdicts[3];
      expect(g4?.diagnostic.startsWith("ontology/domain.ttl: ")).toBe(true);
      expect(g4?.diagnostic.endsWith("(line 3)")).toBe(true);
      expect(g4?.metadata).toEqual({ files: 1 });
    });
  });

  it("evaluates every guard under force, and without fail-fast", async () => {
    await withFixture(async (ws) => {
      await writeFile(path.join(ws, "templates/entities.rs.njk"), "{% frobnicate %}\n", "utf8");
      const expected = ["G1:pass", "G2:pass", "G3:fail", "G4:pass", "G5:pass", "G6:pass", "G7:pass"];
      const forced = await evaluate(ws, { failFast: true, force: true, parallelism: 4 });
      expect(statuses(forced)).toEqual(expected);
      expect(statuses(await evaluate(ws, { failFast: false, force: false, parallelism: 1 }))).toEqual(expected);
    });
  });

  it("leaves outputs that cannot render out of the determinism comparison", async () => {
    await withFixture(async (ws) => {
      await writeFile(path.join(ws, "templates/entities.rs.njk"), "{% frobnicate %}\n", "utf8");
      const report = await evaluate(ws, { failFast: false, force: false, parallelism: 1 });
      const g6 = report.verdicts[5];
      expect(g6?.status).toBe("pass");
      expect(g6?.metadata).toMatchObject({ rendered: 0, not_compared: 1 });
      expect(g6?.diagnostic.startsWith("0 outputs rendered identically twice; 1 not compared: templates/entities.rs.njk")).toBe(true);
    });
  });

  it("stops at the configured guard in validate-only mode", async () => {
    await withFixture(async (ws) => {
      const atG5 = await evaluate(ws, { ...FAIL_FAST, validateOnly: true, validateOnlyStopsAt: "G5" });
      expect(statuses(atG5)).toEqual(["G1:pass", "G2:pass", "G3:pass", "G4:pass", "G5:pass", "G6:skip", "G7:pass"]);
      expect(atG5.verdicts[5]?.diagnostic).toBe("not evaluated in validate-only mode");
      expect(atG5.verdicts[6]?.metadata).toEqual({ planned_outputs: 1, output_bytes: "not estimated" });

      const atG4 = await evaluate(ws, { ...FAIL_FAST, validateOnly: true, validateOnlyStopsAt: "G4" });
      expect(statuses(atG4)).toEqual(["G1:pass", "G2:pass", "G3:pass", "G4:pass", "G5:skip", "G6:skip", "G7:pass"]);
    });
  });

  it("G6 catches templates that render differently on each call", async () => {
    await withFixture(async (ws) => {
      let calls = 0;
      const report = await evaluate(ws, FAIL_FAST, {
        collaborators: () => ({
          ...defaultCollaborators(),
          templateEngine: {
            compile: (source) => ({ path: source.path, render: () => `// render ${++calls}\n` })
          }
        })
      });
      expect(statuses(report)).toEqual(["G1:pass", "G2:pass", "G3:pass", "G4:pass", "G5:pass", "G6:fail", "G7:skip"]);
      expect(report.verdicts[5]?.diagnostic.startsWith("non-deterministic output: entities -> out/a.rs (sha256:")).toBe(true);
      expect(report.verdicts[5]?.remediation).toContain("ORDER BY");
    });
  });

  it("G7 enforces output count and per-file size", async () => {
    await withFixture(async (ws) => {
      await writeRules(ws, [{ name: "entities", output: "out/a.rs" }], "limits:\n  max_output_files: 0\n  max_file_bytes: 10\n");
      const report = await evaluate(ws, FAIL_FAST);
      const g7 = report.verdicts[6];
      expect(g7?.status).toBe("fail");
      expect(g7?.diagnostic).toBe("1 planned outputs exceed max_output_files=0; out/a.rs is 104 bytes, limit 10");
    });
  });

  it("runs custom guards after the built-ins", async () => {
    await withFixture(async (ws) => {
      const headerGuard: Guard = {
        id: "C1",
        name: "Generated Header",
        description: "Every output starts with a generated-by comment.",
        remediation: "Start the template with a '// generated by' line.",
        async check(ctx) {
          for (const p of ctx.planned) {
            const r = await ctx.renderer.render(p);
            if (!r.content.startsWith("// generated by")) return fail(`${p.path} has no header`);
          }
          return pass("headers present");
        }
      };
      const ok = await evaluate(ws, FAIL_FAST, { custom: [headerGuard] });
      expect(statuses(ok).slice(-1)).toEqual(["C1:pass"]);

      await writeFile(path.join(ws, "templates/entities.rs.njk"), "{{ rows | length }}\n", "utf8");
      const bad = await evaluate(ws, FAIL_FAST, { custom: [headerGuard] });
      expect(bad.verdicts[7]).toEqual({
        guard_id: "C1",
        name: "Generated Header",
        status: "fail",
        diagnostic: "out/a.rs has no header",
        remediation: "Start the template with a '// generated by' line."
      });
    });
  });

  it("propagates guard crashes as infrastructure errors", async () => {
    await withFixture(async (ws) => {
      const crashing: Guard = {
        id: "C9",
        name: "Crash",
        description: "Always throws.",
        remediation: "n/a",
        async check() {
          throw new Error("disk on fire");
        }
      };
      const run = evaluate(ws, FAIL_FAST, { custom: [crashing] });
      await expect(run).rejects.toBeInstanceOf(GuardInfrastructureError);
      await expect(run).rejects.toThrow("guard C9 failed to evaluate: disk on fire");
    });
  });

  it("refuses duplicate guard ids", () => {
    expect(() => createGuardRegistry([pathSafetyGuard])).toThrow("guard already registered: G1");
  });
});
