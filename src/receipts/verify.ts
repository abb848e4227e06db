import path from "path";
import { errorMessage } from "../core/errors.js";
import type { RunLedger } from "../runs/runLedger.js";
import { deriveRunId } from "../runs/runIdentity.js";
import { ReceiptVerifier } from "./receiptVerifier.js";
import type { VerificationResult } from "./receiptVerifier.js";

export interface VerifyParams {
  receipt_path: string;
}

export interface VerifyDeps {
  ledger?: RunLedger | null;
  clock?: () => Date;
  maxClockSkewMs?: number;
}

/** Verify entry point. An audit failure is a FAILED result, never an exception. */
export async function verifyReceipt(params: VerifyParams, deps: VerifyDeps = {}): Promise<VerificationResult> {
  const receiptPath = path.resolve(params.receipt_path);
  const verifier = new ReceiptVerifier({ clock: deps.clock, maxClockSkewMs: deps.maxClockSkewMs });
  if (!deps.ledger) return verifier.verify(receiptPath);

  const startedAt = (deps.clock ?? (() => new Date()))();
  const run = deps.ledger.open(deriveRunId({ kind: "verify", subject: receiptPath, startedAt }), {
    kind: "verify",
    workspaceRoot: path.dirname(receiptPath),
    fingerprint: null,
    mode: null
  });
  await run.start();

  let result: VerificationResult;
  try {
    result = await verifier.verify(receiptPath);
  } catch (err) {
    await run.finishFailure(errorMessage(err));
    throw err;
  }

  for (const c of result.checks) await run.event(`check.${c.verdict}`, `${c.check_id} ${c.name}`, { message: c.message });
  const summary = { result: result.result, failed: result.checks.filter((c) => c.verdict === "fail").map((c) => c.check_id) };
  if (result.result === "VERIFIED") {
    await run.finishSuccess(summary, result.receipt_info ? { id: result.receipt_info.receipt_id, path: receiptPath } : null);
  } else {
    await run.finishBlocked(`verification failed at ${summary.failed.join(", ")}`, summary);
  }
  return result;
}
