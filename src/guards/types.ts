import type { RuleRenderer } from "../generation/renderer.js";
import type { PlannedOutput } from "../generation/plan.js";
import type { WorkspaceContext } from "../workspace/discovery.js";

export type GuardStatus = "pass" | "fail" | "skip";

export type GuardMetadata = Record<string, string | number | boolean>;

export interface GuardVerdict {
  guard_id: string;
  name: string;
  status: GuardStatus;
  diagnostic: string;
  remediation?: string;
  metadata?: GuardMetadata;
}

export interface GuardCheckResult {
  status: Exclude<GuardStatus, "skip">;
  diagnostic: string;
  metadata?: GuardMetadata;
}

export interface GuardContext {
  readonly workspace: WorkspaceContext;
  readonly planned: readonly PlannedOutput[];
  readonly renderer: RuleRenderer;
  readonly validateOnly: boolean;
}

/** A guard only reads. It reports a Fail through its result, never by writing or throwing. */
export interface Guard {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly remediation: string;
  /** Evaluated, in order, before any guard is handed to the parallel pool. */
  readonly barrier?: boolean;
  check(ctx: GuardContext): Promise<GuardCheckResult>;
}

export function pass(diagnostic: string, metadata?: GuardMetadata): GuardCheckResult {
  return { status: "pass", diagnostic, ...(metadata ? { metadata } : {}) };
}

export function fail(diagnostic: string, metadata?: GuardMetadata): GuardCheckResult {
  return { status: "fail", diagnostic, ...(metadata ? { metadata } : {}) };
}
