import type { Kysely, Selectable } from "kysely";
import type { RunId } from "../core/ids.js";
import { isRunId } from "../core/ids.js";
import type { RunEventRecord, RunKind, RunRecord, RunStatus } from "../core/run.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

const RUN_STATUSES: readonly RunStatus[] = ["running", "succeeded", "failed", "blocked"];
const RUN_KINDS: readonly RunKind[] = ["generate", "verify"];

function toRunStatus(value: string): RunStatus {
  const found = RUN_STATUSES.find((s) => s === value);
  if (!found) throw new Error(`unknown run status in store: ${value}`);
  return found;
}

function toRunKind(value: string): RunKind {
  const found = RUN_KINDS.find((k) => k === value);
  if (!found) throw new Error(`unknown run kind in store: ${value}`);
  return found;
}

/** Audit trail of generation and verification runs. */
export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createRun(input: {
    runId: RunId;
    kind: RunKind;
    workspaceRoot: string;
    fingerprint: string | null;
    mode: string | null;
  }): Promise<RunRecord> {
    await this.db
      .insertInto("runs")
      .values({
        run_id: input.runId,
        kind: input.kind,
        workspace_root: input.workspaceRoot,
        fingerprint: input.fingerprint,
        mode: input.mode,
        status: "running"
      })
      .onConflict((oc) => oc.column("run_id").doNothing())
      .execute();

    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", input.runId).executeTakeFirstOrThrow();
    return this.mapRun(row);
  }

  async getRun(runId: RunId): Promise<RunRecord | null> {
    const row = await this.db.selectFrom("runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapRun(row) : null;
  }

  async listRuns(workspaceRoot: string, limit: number): Promise<RunRecord[]> {
    const rows = await this.db
      .selectFrom("runs")
      .selectAll()
      .where("workspace_root", "=", workspaceRoot)
      .orderBy("created_at", "desc")
      .orderBy("run_id", "desc")
      .limit(limit)
      .execute();
    return rows.map((r) => this.mapRun(r));
  }

  async updateRun(
    runId: RunId,
    patch: Partial<{
      status: RunStatus;
      receiptId: string | null;
      receiptPath: string | null;
      error: string | null;
      finishedAt: string | null;
      summary: Record<string, unknown> | null;
    }>
  ): Promise<void> {
    await this.db
      .updateTable("runs")
      .set({
        ...(patch.status !== undefined ? { status: patch.status } : {}),
        ...(patch.receiptId !== undefined ? { receipt_id: patch.receiptId } : {}),
        ...(patch.receiptPath !== undefined ? { receipt_path: patch.receiptPath } : {}),
        ...(patch.error !== undefined ? { error: patch.error } : {}),
        ...(patch.finishedAt !== undefined ? { finished_at: patch.finishedAt } : {}),
        ...(patch.summary !== undefined ? { summary: patch.summary } : {})
      })
      .where("run_id", "=", runId)
      .execute();
  }

  async addRunEvent(runId: RunId, kind: string, message: string | null, data: Record<string, unknown> | null): Promise<void> {
    await this.db
      .insertInto("run_events")
      .values({
        run_id: runId,
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEventRecord[]> {
    const rows = await this.db
      .selectFrom("run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({ ts: toIso(r.ts), kind: r.kind, message: r.message, data: r.data ?? null }));
  }

  private mapRun(row: Selectable<DB["runs"]>): RunRecord {
    if (!isRunId(row.run_id)) throw new Error(`malformed run_id in store: ${row.run_id}`);
    return {
      runId: row.run_id,
      kind: toRunKind(row.kind),
      workspaceRoot: row.workspace_root,
      fingerprint: row.fingerprint,
      mode: row.mode,
      status: toRunStatus(row.status),
      receiptId: row.receipt_id,
      receiptPath: row.receipt_path,
      error: row.error,
      createdAt: toIso(row.created_at),
      finishedAt: toIsoOrNull(row.finished_at),
      summary: row.summary ?? null
    };
  }
}
