import type { RunId } from "../core/ids.js";
import type { RunKind, RunStatus } from "../core/run.js";
import { createLogger } from "../core/log.js";
import type { PostgresStore } from "../store/postgresStore.js";

const log = createLogger("ledger");

/** Records one run and its ordered events in the store. */
export class LedgerRun {
  private finished = false;

  constructor(
    private readonly store: PostgresStore,
    readonly runId: RunId,
    private readonly info: { kind: RunKind; workspaceRoot: string; fingerprint: string | null; mode: string | null }
  ) {}

  async start(): Promise<void> {
    await this.store.createRun({ runId: this.runId, ...this.info });
    await this.event("run.started", `${this.info.kind} ${this.info.workspaceRoot}`, {
      fingerprint: this.info.fingerprint,
      mode: this.info.mode
    });
  }

  async event(kind: string, message: string, data: Record<string, unknown> | null): Promise<void> {
    await this.store.addRunEvent(this.runId, kind, message, data);
  }

  async finishSuccess(summary: Record<string, unknown>, receipt: { id: string; path: string } | null): Promise<void> {
    await this.finish("succeeded", null, summary, receipt);
  }

  async finishBlocked(reason: string, summary: Record<string, unknown> | null): Promise<void> {
    await this.finish("blocked", reason, summary, null);
  }

  async finishFailure(errorMessage: string): Promise<void> {
    await this.finish("failed", errorMessage, null, null);
  }

  private async finish(
    status: Exclude<RunStatus, "running">,
    error: string | null,
    summary: Record<string, unknown> | null,
    receipt: { id: string; path: string } | null
  ): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    await this.event(`run.${status}`, error ?? status, error ? { error } : null);
    await this.store.updateRun(this.runId, {
      status,
      error,
      summary,
      finishedAt: new Date().toISOString(),
      ...(receipt ? { receiptId: receipt.id, receiptPath: receipt.path } : {})
    });
    log.debug("run finished", { runId: this.runId, status });
  }
}

export class RunLedger {
  constructor(readonly store: PostgresStore) {}

  open(runId: RunId, info: { kind: RunKind; workspaceRoot: string; fingerprint: string | null; mode: string | null }): LedgerRun {
    return new LedgerRun(this.store, runId, info);
  }
}
