import type { RunId } from "./ids.js";

export type RunKind = "generate" | "verify";

export type RunStatus = "running" | "succeeded" | "failed" | "blocked";

export interface RunRecord {
  runId: RunId;
  kind: RunKind;
  workspaceRoot: string;
  fingerprint: string | null;
  mode: string | null;
  status: RunStatus;
  receiptId: string | null;
  receiptPath: string | null;
  error: string | null;
  createdAt: string;
  finishedAt: string | null;
  summary: Record<string, unknown> | null;
}

export interface RunEventRecord {
  ts: string;
  kind: string;
  message: string | null;
  data: Record<string, unknown> | null;
}
