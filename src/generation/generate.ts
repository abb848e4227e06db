import { promises as fs } from "fs";
import path from "path";
import { isSha256Digest, sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { Sha256Digest } from "../core/canonicalJson.js";
import { CollaboratorError, RunCancelledError, errorMessage } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import { createLogger } from "../core/log.js";
import { normalizeRelPath, pathSafetyViolation } from "../core/paths.js";
import { defaultParallelism, mapBounded } from "../core/pool.js";
import { detectLanguage } from "../core/detectLanguage.js";
import { defaultCollaborators } from "../collaborators/index.js";
import type { Collaborators } from "../collaborators/index.js";
import { unifiedDiff } from "../collaborators/diff.js";
import type { OutputChange } from "../collaborators/diff.js";
import { FileTransaction, atomicWriteFile, readIfExists } from "../collaborators/fileTransaction.js";
import { renderMarkdownReport } from "../collaborators/report.js";
import type { ValidationIssue } from "../collaborators/validators.js";
import { GuardKernel, createGuardRegistry } from "../guards/index.js";
import type { GuardRegistry, GuardVerdict } from "../guards/index.js";
import { overlappingPaths } from "../guards/outputOverlap.js";
import { ReceiptGenerator } from "../receipts/receiptGenerator.js";
import type { OutputStatus, ReceiptOutput } from "../receipts/receipt.js";
import type { ReceiptSigner } from "../receipts/signing.js";
import { deriveRunId } from "../runs/runIdentity.js";
import type { LedgerRun, RunLedger } from "../runs/runLedger.js";
import { ArtifactTracker, DEFAULT_STATE_PATH } from "../tracker/artifactTracker.js";
import { allInputs, discoverWorkspace } from "../workspace/discovery.js";
import type { GenerationRule, WorkspaceContext } from "../workspace/discovery.js";
import { planOutputs } from "./plan.js";
import type { PlannedOutput } from "./plan.js";
import { RuleRenderer } from "./renderer.js";

const log = createLogger("generate");

export const OUTPUT_DIR = "proofgen.out";

export interface GenerateParams {
  workspace_root: string;
  /** Default true: nothing under the generated root is written. */
  preview?: boolean;
  force?: boolean;
  validate?: boolean;
  fail_fast?: boolean;
  validate_only?: boolean;
  emit_diff?: boolean;
  /** Default true. */
  emit_receipt?: boolean;
}

export interface GenerateDeps {
  collaborators?: Collaborators;
  registry?: GuardRegistry;
  clock?: () => Date;
  signer?: ReceiptSigner | null;
  ledger?: RunLedger | null;
  signal?: AbortSignal;
  parallelism?: number;
  statePath?: string;
}

export type GenerateStatus = "success" | "guard_failure" | "validated" | "validation_failed";

export interface OutputSummary extends ReceiptOutput {
  rule: string;
  diagnostic?: string;
}

export interface GenerateSummary {
  status: GenerateStatus;
  run_id: RunId;
  mode: "preview" | "apply";
  workspace_root: string;
  fingerprint: Sha256Digest;
  guards: GuardVerdict[];
  outputs: OutputSummary[];
  validation_issues: ValidationIssue[];
  stale: string[];
  orphans: string[];
  receipt_path: string | null;
  receipt_id: string | null;
  report_path: string | null;
  diff_path: string | null;
  stats: {
    total_duration_ms: number;
    cache_hit_rate: number;
    generated: number;
    unchanged: number;
    skipped: number;
    blocked: number;
    invalid: number;
  };
}

/**
 * Provenance of a rule's "program": its template, the query that feeds it, and
 * every other discovered template, any of which it may `{% include %}`.
 */
export function ruleTemplateHash(ctx: WorkspaceContext, rule: GenerationRule): Sha256Digest {
  const byPath = new Map(allInputs(ctx.inputs).map((d) => [d.path, d.hash]));
  return sha256Prefixed(
    stableJsonStringify({
      template: byPath.get(normalizeRelPath(rule.template)) ?? null,
      query: byPath.get(normalizeRelPath(rule.query)) ?? null,
      templates: ctx.inputs.templates.map((d) => [d.path, d.hash])
    })
  );
}

function ruleDependencies(ctx: WorkspaceContext, rule: GenerationRule): string[] {
  const deps = [
    normalizeRelPath(rule.query),
    normalizeRelPath(rule.template),
    ...ctx.inputs.templates.map((d) => d.path),
    ...ctx.inputs.ontologies.map((d) => d.path)
  ];
  return [...new Set(deps)];
}

/** Outputs that must not be written even under force: unsafe paths and shared paths. */
function blockedOutputs(ctx: WorkspaceContext, planned: readonly PlannedOutput[]): Map<PlannedOutput, string> {
  const blocked = new Map<PlannedOutput, string>();
  const inputPaths = new Set(allInputs(ctx.inputs).map((d) => d.path));
  const shared = overlappingPaths(planned.map((p) => p.path));
  for (const p of planned) {
    const reason =
      pathSafetyViolation(ctx.root, p.rule.output) ??
      pathSafetyViolation(ctx.root, p.rule.query) ??
      pathSafetyViolation(ctx.root, p.rule.template) ??
      (inputPaths.has(p.path) ? "output overwrites a declared input" : null) ??
      (shared.has(p.path) ? "output path is shared with another rule" : null);
    if (reason) blocked.set(p, reason);
  }
  return blocked;
}

function checkCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw new RunCancelledError(stage);
}

class StageTimer {
  readonly stages: Record<string, number> = {};
  private last = Date.now();
  readonly started = this.last;

  mark(stage: string): void {
    const now = Date.now();
    this.stages[stage] = now - this.last;
    this.last = now;
  }

  total(): number {
    return Date.now() - this.started;
  }
}

interface PendingOutput {
  planned: PlannedOutput;
  status: OutputStatus;
  hash: Sha256Digest;
  size: number;
  content: string | null;
  diagnostic?: string;
}

/**
 * discovery, guards, cache check, render, validation, atomic write, tracker update,
 * then the report, diff and receipt. A guard Fail without `force` returns a
 * guard_failure summary and writes nothing at all.
 */
export async function generate(params: GenerateParams, deps: GenerateDeps = {}): Promise<GenerateSummary> {
  const clock = deps.clock ?? (() => new Date());
  const startedAt = clock();
  const timer = new StageTimer();
  const preview = params.preview ?? true;
  const force = params.force ?? false;
  const mode = preview ? "preview" : "apply";

  const ctx = await discoverWorkspace(params.workspace_root);
  timer.mark("discovery");

  const runId = deriveRunId({ kind: "generate", subject: `${ctx.fingerprint}|${mode}`, startedAt });
  const ledgerRun: LedgerRun | null = deps.ledger
    ? deps.ledger.open(runId, { kind: "generate", workspaceRoot: ctx.root, fingerprint: ctx.fingerprint, mode })
    : null;
  await ledgerRun?.start();

  try {
    const summary = await runStages(ctx, runId, startedAt, timer, { ...params, preview, force }, deps, ledgerRun);
    if (summary.status === "guard_failure") {
      const failed = summary.guards.filter((g) => g.status === "fail").map((g) => g.guard_id);
      await ledgerRun?.finishBlocked(`guards failed: ${failed.join(", ")}`, { status: summary.status, guards: failed });
    } else {
      await ledgerRun?.finishSuccess(
        { status: summary.status, outputs: summary.outputs.length, stale: summary.stale.length, orphans: summary.orphans.length },
        summary.receipt_id && summary.receipt_path ? { id: summary.receipt_id, path: summary.receipt_path } : null
      );
    }
    return summary;
  } catch (err) {
    await ledgerRun?.finishFailure(errorMessage(err));
    throw err;
  }
}

async function runStages(
  ctx: WorkspaceContext,
  runId: RunId,
  startedAt: Date,
  timer: StageTimer,
  params: GenerateParams & { preview: boolean; force: boolean },
  deps: GenerateDeps,
  ledgerRun: LedgerRun | null
): Promise<GenerateSummary> {
  const mode = params.preview ? "preview" : "apply";
  const collaborators = deps.collaborators ?? defaultCollaborators();
  const parallelism = deps.parallelism ?? defaultParallelism();
  const planned = planOutputs(ctx);
  const renderer = new RuleRenderer(ctx, collaborators);
  const kernel = new GuardKernel(deps.registry ?? createGuardRegistry());

  const base = {
    run_id: runId,
    mode,
    workspace_root: ctx.root,
    fingerprint: ctx.fingerprint
  } as const;
  const emptyStats = { cache_hit_rate: 0, generated: 0, unchanged: 0, skipped: 0, blocked: 0, invalid: 0 };

  checkCancelled(deps.signal, "guards");
  const report = await kernel.evaluate(
    { workspace: ctx, planned, renderer, validateOnly: params.validate_only ?? false },
    {
      failFast: params.fail_fast ?? ctx.config.guards.fail_fast,
      force: params.force,
      validateOnly: params.validate_only ?? false,
      validateOnlyStopsAt: ctx.config.guards.validate_only_stops_at,
      parallelism
    }
  );
  timer.mark("guards");
  for (const v of report.verdicts) {
    await ledgerRun?.event(`guard.${v.status}`, `${v.guard_id} ${v.name}`, { diagnostic: v.diagnostic });
  }

  if ((report.overall === "fail" && !params.force) || params.validate_only) {
    const status: GenerateStatus = report.overall === "fail" ? "guard_failure" : "validated";
    log.info(status === "validated" ? "workspace validated" : "generation blocked by guards", { runId });
    return {
      ...base,
      status,
      guards: report.verdicts,
      outputs: [],
      validation_issues: [],
      stale: [],
      orphans: [],
      receipt_path: null,
      receipt_id: null,
      report_path: null,
      diff_path: null,
      stats: { total_duration_ms: timer.total(), ...emptyStats }
    };
  }
  if (report.overall === "fail") log.warn("continuing past failed guards (force)", { runId });

  const tracker = await ArtifactTracker.load(deps.statePath ?? DEFAULT_STATE_PATH, ctx.root, { clock: deps.clock });
  const blocked = blockedOutputs(ctx, planned);

  checkCancelled(deps.signal, "generation");
  const pending = await mapBounded(planned, parallelism, async (p): Promise<PendingOutput> => {
    const reason = blocked.get(p);
    if (reason !== undefined) {
      return { planned: p, status: "blocked", hash: sha256Prefixed(""), size: 0, content: null, diagnostic: reason };
    }
    const templateHash = ruleTemplateHash(ctx, p.rule);
    if (mode === "apply" && !params.force && !(await tracker.isStale(p.path, ctx.ontologyHash, templateHash))) {
      const record = tracker.get(p.path);
      if (record && isSha256Digest(record.artifact_hash)) {
        const st = await fs.stat(path.join(ctx.root, p.path));
        return { planned: p, status: "unchanged", hash: record.artifact_hash, size: st.size, content: null };
      }
    }
    try {
      const r = await renderer.render(p);
      return { planned: p, status: mode === "apply" ? "generated" : "skipped", hash: r.hash, size: r.size, content: r.content };
    } catch (err) {
      if (!(err instanceof CollaboratorError)) throw err;
      return { planned: p, status: "blocked", hash: sha256Prefixed(""), size: 0, content: null, diagnostic: err.message };
    }
  });
  timer.mark("generation");

  const issues: ValidationIssue[] = [];
  if (params.validate ?? true) {
    for (const o of pending) {
      if (o.content === null) continue;
      const found = collaborators.validator.validate(o.planned.path, o.content);
      if (found.length) {
        o.status = "invalid";
        o.diagnostic = found.map((i) => i.message).join("; ");
        issues.push(...found);
      }
    }
  }
  timer.mark("validation");

  const validationFailed = issues.length > 0;
  if (validationFailed) {
    // nothing is written when any output is invalid
    for (const o of pending) if (o.status === "generated") o.status = "skipped";
    log.warn("output validation failed", { runId, issues: issues.length });
  }

  const changes: OutputChange[] = [];
  for (const o of pending) {
    if (o.content === null) continue;
    const previous = await readIfExists(path.join(ctx.root, o.planned.path));
    changes.push({ path: o.planned.path, previous: previous ? previous.toString("utf8") : null, next: o.content });
  }

  checkCancelled(deps.signal, "write");
  if (mode === "apply" && !validationFailed) {
    const tx = new FileTransaction();
    for (const o of pending) {
      if (o.status === "generated" && o.content !== null) tx.stage(path.join(ctx.root, o.planned.path), o.content);
    }
    await tx.commit();
    for (const o of pending) {
      if (o.status !== "generated") continue;
      const rule = o.planned.rule;
      await tracker.recordArtifact(o.planned.path, ctx.ontologyHash, ruleTemplateHash(ctx, rule), ruleDependencies(ctx, rule), o.hash);
    }
    await tracker.save();
    await ledgerRun?.event("outputs.written", `${tx.size} files`, { files: tx.size });
  }
  timer.mark("write");

  const stale = await tracker.getStaleArtifacts(ctx.ontologyHash);
  const orphans = await tracker.findOrphanedFiles(ctx.config.generated_root);

  checkCancelled(deps.signal, "receipt");
  const outputs: OutputSummary[] = pending.map((o) => ({
    path: o.planned.path,
    hash: o.hash,
    size: o.size,
    status: o.status,
    language: detectLanguage(o.planned.path),
    rule: o.planned.rule.name,
    ...(o.diagnostic !== undefined ? { diagnostic: o.diagnostic } : {})
  }));
  const count = (s: OutputStatus): number => outputs.filter((o) => o.status === s).length;
  const renderable = outputs.filter((o) => o.status !== "blocked").length;
  const cacheHitRate = renderable === 0 ? 0 : count("unchanged") / renderable;
  const status: GenerateStatus = validationFailed ? "validation_failed" : "success";
  const receiptOutputs: ReceiptOutput[] = outputs.map(({ path: p, hash, size, status: s, language }) => ({
    path: p,
    hash,
    size,
    status: s,
    language
  }));

  const reportRel = `${OUTPUT_DIR}/reports/${runId}.md`;
  await atomicWriteFile(
    path.join(ctx.root, reportRel),
    renderMarkdownReport({
      runId,
      mode,
      status,
      timestamp: startedAt.toISOString(),
      workspaceRoot: ctx.root,
      fingerprint: ctx.fingerprint,
      verdicts: report.verdicts,
      outputs: receiptOutputs,
      issues,
      stale,
      orphans,
      totalDurationMs: timer.total(),
      cacheHitRate
    })
  );

  let diffRel: string | null = null;
  const patch = params.emit_diff === false ? "" : unifiedDiff(changes);
  if (patch.length > 0) {
    diffRel = `${OUTPUT_DIR}/diffs/${runId}.patch`;
    await atomicWriteFile(path.join(ctx.root, diffRel), patch);
  }
  timer.mark("report");

  let receiptAbs: string | null = null;
  let receiptId: string | null = null;
  if (params.emit_receipt ?? true) {
    const generator = new ReceiptGenerator({ clock: deps.clock, signer: deps.signer ?? null });
    const receipt = generator.generate({
      mode,
      workspace: { root: ctx.root, fingerprint: ctx.fingerprint, inputs: ctx.inputs },
      tripleCounts: await tripleCountsIfLoaded(renderer),
      verdicts: report.verdicts,
      outputs: receiptOutputs,
      performance: { total_duration_ms: timer.total(), cache_hit_rate: cacheHitRate, stages: { ...timer.stages } },
      artifacts: { report: reportRel, diff: diffRel }
    });
    const receiptRel = `${OUTPUT_DIR}/receipts/${runId}.json`;
    receiptAbs = path.join(ctx.root, receiptRel);
    receiptId = receipt.receipt_id;
    await generator.write(receipt, receiptAbs);
    await ledgerRun?.event("receipt.written", receiptRel, { receipt_id: receipt.receipt_id });
  }

  log.info("generation finished", {
    runId,
    mode,
    status,
    generated: count("generated"),
    unchanged: count("unchanged"),
    receipt: receiptAbs ?? "none"
  });

  return {
    ...base,
    status,
    guards: report.verdicts,
    outputs,
    validation_issues: issues,
    stale,
    orphans,
    receipt_path: receiptAbs,
    receipt_id: receiptId,
    report_path: path.join(ctx.root, reportRel),
    diff_path: diffRel ? path.join(ctx.root, diffRel) : null,
    stats: {
      total_duration_ms: timer.total(),
      cache_hit_rate: cacheHitRate,
      generated: count("generated"),
      unchanged: count("unchanged"),
      skipped: count("skipped"),
      blocked: count("blocked"),
      invalid: count("invalid")
    }
  };
}

async function tripleCountsIfLoaded(renderer: RuleRenderer): Promise<Record<string, number> | undefined> {
  try {
    return (await renderer.graph()).tripleCounts;
  } catch (err) {
    if (err instanceof CollaboratorError) return undefined;
    throw err;
  }
}
