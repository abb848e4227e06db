import { TemplateCompileError } from "../core/errors.js";
import { compareStrings, pathSafetyViolation } from "../core/paths.js";
import { fail, pass } from "./types.js";
import type { Guard } from "./types.js";

export const templateCompileGuard: Guard = {
  id: "G3",
  name: "Template Compile",
  description: "Every referenced template compiles.",
  remediation: "Fix the template syntax at the reported line and column.",
  async check(ctx) {
    const templates = [...new Set(ctx.planned.map((p) => p.rule.template))]
      .filter((t) => !pathSafetyViolation(ctx.workspace.root, t))
      .sort(compareStrings);
    const errors: string[] = [];
    for (const t of templates) {
      try {
        ctx.renderer.template(t);
      } catch (err) {
        if (!(err instanceof TemplateCompileError)) throw err;
        errors.push(err.message);
      }
    }
    if (errors.length) return fail(errors.join("; "), { failed: errors.length });
    return pass(`${templates.length} templates compiled`, { templates: templates.length });
  }
};
