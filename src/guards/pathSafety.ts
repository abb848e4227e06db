import { normalizeRelPath, pathSafetyViolation } from "../core/paths.js";
import { allInputs } from "../workspace/discovery.js";
import { fail, pass } from "./types.js";
import type { Guard } from "./types.js";

export const pathSafetyGuard: Guard = {
  id: "G1",
  name: "Path Safety",
  description: "Every planned output, query and template path stays inside the workspace root.",
  remediation: "Use workspace-relative paths without '..' segments or absolute prefixes, and never target an input file.",
  barrier: true,
  async check(ctx) {
    const root = ctx.workspace.root;
    const inputPaths = new Set(allInputs(ctx.workspace.inputs).map((d) => d.path));
    const problems: string[] = [];
    let checked = 0;

    for (const p of ctx.planned) {
      const refs: Array<[string, string]> = [
        ["output", p.rule.output],
        ["query", p.rule.query],
        ["template", p.rule.template]
      ];
      for (const [kind, raw] of refs) {
        checked++;
        const reason = pathSafetyViolation(root, raw);
        if (reason) problems.push(`rule ${p.rule.name}: ${kind} ${JSON.stringify(raw)}: ${reason}`);
      }
      if (inputPaths.has(normalizeRelPath(p.rule.output))) {
        problems.push(`rule ${p.rule.name}: output ${JSON.stringify(p.rule.output)} overwrites a declared input`);
      }
    }

    if (problems.length) return fail(problems.join("; "), { violations: problems.length });
    return pass(`${checked} paths are inside the workspace`, { paths_checked: checked });
  }
};
