import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { CollaboratorError } from "../core/errors.js";
import { pathSafetyViolation } from "../core/paths.js";
import { allInputs } from "../workspace/discovery.js";
import { fail, pass } from "./types.js";
import type { Guard } from "./types.js";

export const determinismGuard: Guard = {
  id: "G6",
  name: "Determinism",
  description: "Rendering every rule twice from the same inputs yields identical bytes.",
  remediation: "Remove time, randomness or unordered iteration from the template; add ORDER BY to the query.",
  async check(ctx) {
    const inputHash = sha256Prefixed(
      stableJsonStringify(allInputs(ctx.workspace.inputs).map((d) => ({ path: d.path, hash: d.hash })))
    );
    const unstable: string[] = [];
    const errors: string[] = [];
    let rendered = 0;

    for (const p of ctx.planned) {
      const root = ctx.workspace.root;
      if (pathSafetyViolation(root, p.rule.query) || pathSafetyViolation(root, p.rule.template)) continue;
      try {
        const first = await ctx.renderer.render(p);
        const second = await ctx.renderer.renderFresh(p);
        rendered++;
        if (first.hash !== second.hash) unstable.push(`${p.rule.name} -> ${p.path} (${first.hash} != ${second.hash})`);
      } catch (err) {
        if (!(err instanceof CollaboratorError)) throw err;
        errors.push(err.message);
      }
    }

    if (unstable.length) return fail(`non-deterministic output: ${unstable.join("; ")}`, { input_hash: inputHash });
    // outputs that cannot render are listed, not compared
    const summary = `${rendered} outputs rendered identically twice`;
    if (errors.length) {
      return pass(`${summary}; ${errors.length} not compared: ${errors.join("; ")}`, {
        input_hash: inputHash,
        rendered,
        not_compared: errors.length
      });
    }
    return pass(summary, { input_hash: inputHash, rendered });
  }
};
