import { compareStrings } from "../core/paths.js";
import { fail, pass } from "./types.js";
import type { Guard } from "./types.js";

export const outputOverlapGuard: Guard = {
  id: "G2",
  name: "Output Overlap",
  description: "No two generation rules write the same normalized output path.",
  remediation: "Give each rule a distinct output path.",
  barrier: true,
  async check(ctx) {
    const owners = new Map<string, string[]>();
    for (const p of ctx.planned) {
      const list = owners.get(p.path) ?? [];
      list.push(p.rule.name);
      owners.set(p.path, list);
    }
    const conflicts = [...owners.entries()]
      .filter(([, rules]) => rules.length > 1)
      .sort((a, b) => compareStrings(a[0], b[0]))
      .map(([p, rules]) => `${p} is written by ${rules.join(", ")}`);

    if (conflicts.length) return fail(conflicts.join("; "), { conflicts: conflicts.length });
    return pass(`${owners.size} distinct output paths`, { outputs: owners.size });
  }
};

/** Output paths claimed by more than one rule. */
export function overlappingPaths(paths: readonly string[]): Set<string> {
  const seen = new Set<string>();
  const dup = new Set<string>();
  for (const p of paths) {
    if (seen.has(p)) dup.add(p);
    seen.add(p);
  }
  return dup;
}
