import { QueryExecutionError } from "../core/errors.js";
import { compareStrings, pathSafetyViolation } from "../core/paths.js";
import { fail, pass } from "./types.js";
import type { Guard } from "./types.js";

export const queryExecutionGuard: Guard = {
  id: "G5",
  name: "Query Execution",
  description: "Every referenced query parses and runs against the loaded graph.",
  remediation: "Fix the query, or the ontology it reads, so that it runs as a SELECT.",
  async check(ctx) {
    const queries = [...new Set(ctx.planned.map((p) => p.rule.query))]
      .filter((q) => !pathSafetyViolation(ctx.workspace.root, q))
      .sort(compareStrings);
    const errors: string[] = [];
    let rows = 0;
    for (const q of queries) {
      try {
        rows += (await ctx.renderer.rows(q)).length;
      } catch (err) {
        if (!(err instanceof QueryExecutionError)) throw err;
        errors.push(err.message);
      }
    }
    if (errors.length) return fail(errors.join("; "), { failed: errors.length });
    return pass(`${queries.length} queries returned ${rows} rows`, { queries: queries.length, rows });
  }
};
