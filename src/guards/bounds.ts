import { CollaboratorError } from "../core/errors.js";
import { pathSafetyViolation } from "../core/paths.js";
import { fail, pass } from "./types.js";
import type { Guard, GuardMetadata } from "./types.js";

export const boundsGuard: Guard = {
  id: "G7",
  name: "Bounds",
  description: "Output count, output size and input sizes stay within the configured limits.",
  remediation: "Split the generation into smaller rules or raise the limits in proofgen.yaml.",
  async check(ctx) {
    const limits = ctx.workspace.config.limits;
    const { inputs } = ctx.workspace;
    const problems: string[] = [];

    if (ctx.planned.length > limits.max_output_files) {
      problems.push(`${ctx.planned.length} planned outputs exceed max_output_files=${limits.max_output_files}`);
    }

    const caps: Array<[string, typeof inputs.ontologies, number]> = [
      ["ontology", inputs.ontologies, limits.max_ontology_bytes],
      ["template", inputs.templates, limits.max_template_bytes],
      ["query", inputs.queries, limits.max_query_bytes]
    ];
    for (const [kind, list, cap] of caps) {
      for (const d of list) {
        if (d.size > cap) problems.push(`${kind} ${d.path} is ${d.size} bytes, limit ${cap}`);
      }
    }

    const metadata: GuardMetadata = { planned_outputs: ctx.planned.length };
    if (ctx.validateOnly) {
      metadata.output_bytes = "not estimated";
    } else {
      let total = 0;
      for (const p of ctx.planned) {
        const root = ctx.workspace.root;
        if (pathSafetyViolation(root, p.rule.query) || pathSafetyViolation(root, p.rule.template)) continue;
        try {
          const r = await ctx.renderer.render(p);
          total += r.size;
          if (r.size > limits.max_file_bytes) problems.push(`${p.path} is ${r.size} bytes, limit ${limits.max_file_bytes}`);
        } catch (err) {
          // render failures are reported by G3, G5 or as blocked outputs
          if (!(err instanceof CollaboratorError)) throw err;
        }
      }
      metadata.output_bytes = total;
      if (total > limits.max_output_bytes) {
        problems.push(`${total} output bytes exceed max_output_bytes=${limits.max_output_bytes}`);
      }
    }

    if (problems.length) return fail(problems.join("; "), metadata);
    return pass("within limits", metadata);
  }
};
