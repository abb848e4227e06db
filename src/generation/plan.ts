import { normalizeRelPath } from "../core/paths.js";
import type { GenerationRule, WorkspaceContext } from "../workspace/discovery.js";

export interface PlannedOutput {
  rule: GenerationRule;
  /** Lexically normalized, workspace-relative. */
  path: string;
}

export function planOutputs(ctx: WorkspaceContext): PlannedOutput[] {
  return ctx.rules.map((rule) => ({ rule, path: normalizeRelPath(rule.output) }));
}
