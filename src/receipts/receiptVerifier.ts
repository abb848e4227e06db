import { promises as fs } from "fs";
import { sha256File } from "../core/canonicalJson.js";
import { ReceiptIntegrityError, errorMessage, isErrnoException } from "../core/errors.js";
import { isJsonObject } from "../core/json.js";
import { createLogger } from "../core/log.js";
import { safeJoin } from "../core/paths.js";
import { fingerprintWorkspace } from "../workspace/discovery.js";
import { WRITTEN_STATUSES, computeReceiptId, isSemver, zGenerationReceipt } from "./receipt.js";
import type { GenerationReceipt, ReceiptInput } from "./receipt.js";
import { checkReceiptSignature } from "./signing.js";

const log = createLogger("verify");

export type CheckId = "V1" | "V2" | "V3" | "V4" | "V5" | "V6" | "V7";
export type CheckVerdict = "pass" | "fail" | "skip";

export interface VerificationCheck {
  check_id: CheckId;
  name: string;
  verdict: CheckVerdict;
  message: string;
}

export interface ReceiptInfo {
  receipt_id: string;
  timestamp: string;
  compiler_version: string;
  mode: "preview" | "apply";
  input_count: number;
  output_count: number;
}

export interface VerificationResult {
  receipt_path: string;
  checks: VerificationCheck[];
  result: "VERIFIED" | "FAILED";
  receipt_info?: ReceiptInfo;
}

export const CHECK_NAMES: Record<CheckId, string> = {
  V1: "Schema Version",
  V2: "Workspace Fingerprint",
  V3: "Input Hashes",
  V4: "Output Hashes",
  V5: "Guard Integrity",
  V6: "Metadata Consistency",
  V7: "Signature"
};

const SUPPORTED_MAJOR = 1;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

function check(check_id: CheckId, verdict: CheckVerdict, message: string): VerificationCheck {
  return { check_id, name: CHECK_NAMES[check_id], verdict, message };
}

function summarize(receiptPath: string, checks: VerificationCheck[], info?: ReceiptInfo): VerificationResult {
  const ok = checks.every((c) => c.verdict !== "fail");
  return { receipt_path: receiptPath, checks, result: ok ? "VERIFIED" : "FAILED", ...(info ? { receipt_info: info } : {}) };
}

/** Problems found recomputing each entry's hash; empty when everything matches. */
async function compareHashes(root: string, entries: readonly ReceiptInput[], label: string): Promise<string[]> {
  const problems: string[] = [];
  for (const e of entries) {
    let abs: string;
    try {
      abs = safeJoin(root, e.path);
    } catch (err) {
      problems.push(`${e.path}: ${errorMessage(err)}`);
      continue;
    }
    try {
      const { sha256, sizeBytes } = await sha256File(abs);
      if (sha256 !== e.hash) problems.push(`${label} hash mismatch: ${e.path}`);
      else if (sizeBytes !== e.size) problems.push(`${label} size mismatch: ${e.path}`);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") problems.push(`${label} missing: ${e.path}`);
      else problems.push(`${label} unreadable: ${e.path}: ${errorMessage(err)}`);
    }
  }
  return problems;
}

function hashCheck(id: "V3" | "V4", problems: string[], count: number, noun: string): VerificationCheck {
  if (problems.length) return check(id, "fail", problems.join("; "));
  return check(id, "pass", `${count} ${noun} match`);
}

export interface ReceiptVerifierOptions {
  clock?: () => Date;
  maxClockSkewMs?: number;
}

/**
 * Seven-check audit of a receipt against the filesystem as it is now.
 * Never throws: every problem, including an unreadable receipt, is a check result.
 */
export class ReceiptVerifier {
  private readonly clock: () => Date;
  private readonly maxClockSkewMs: number;

  constructor(options: ReceiptVerifierOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.maxClockSkewMs = options.maxClockSkewMs ?? 5 * 60_000;
  }

  async verify(receiptPath: string): Promise<VerificationResult> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(receiptPath, "utf8"));
    } catch (err) {
      return this.unreadable(receiptPath, `cannot read receipt: ${errorMessage(err)}`);
    }
    const parsed = zGenerationReceipt.safeParse(raw);
    if (!parsed.success || !isJsonObject(raw)) {
      const detail = parsed.success
        ? "receipt is not a JSON object"
        : parsed.error.issues
            .slice(0, 5)
            .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
            .join("; ");
      return this.unreadable(receiptPath, `receipt does not match the schema: ${detail}`);
    }

    const receipt = parsed.data;
    const checks: VerificationCheck[] = [
      this.checkVersion(receipt),
      await this.checkFingerprint(receipt),
      await this.checkInputs(receipt),
      await this.checkOutputs(receipt),
      this.checkGuards(receipt),
      this.checkMetadata(receipt, raw),
      this.checkSignature(receipt, raw)
    ];

    const inputs = receipt.inputs;
    const info: ReceiptInfo = {
      receipt_id: receipt.receipt_id,
      timestamp: receipt.timestamp,
      compiler_version: receipt.compiler_version,
      mode: receipt.mode,
      input_count: (inputs.config ? 1 : 0) + inputs.ontologies.length + inputs.queries.length + inputs.templates.length,
      output_count: receipt.outputs.length
    };
    const result = summarize(receiptPath, checks, info);
    log.info("receipt verified", {
      receipt: receiptPath,
      result: result.result,
      failed: checks.filter((c) => c.verdict === "fail").map((c) => c.check_id).join(",") || "none"
    });
    return result;
  }

  private unreadable(receiptPath: string, message: string): VerificationResult {
    const rest: CheckId[] = ["V2", "V3", "V4", "V5", "V6", "V7"];
    log.warn("receipt unreadable", { receipt: receiptPath, message });
    return summarize(receiptPath, [
      check("V1", "fail", message),
      ...rest.map((id) => check(id, "skip", "receipt could not be parsed"))
    ]);
  }

  private checkVersion(receipt: GenerationReceipt): VerificationCheck {
    const v = receipt.version;
    if (!isSemver(v)) return check("V1", "fail", `version ${JSON.stringify(v)} is not a semantic version`);
    if (Number(v.split(".")[0]) !== SUPPORTED_MAJOR) return check("V1", "fail", `unsupported receipt version ${v}`);
    return check("V1", "pass", `schema version ${v}`);
  }

  private async checkFingerprint(receipt: GenerationReceipt): Promise<VerificationCheck> {
    try {
      const current = await fingerprintWorkspace(receipt.workspace.root);
      if (current !== receipt.workspace.fingerprint) {
        return check("V2", "fail", `workspace fingerprint changed: recorded ${receipt.workspace.fingerprint}, now ${current}`);
      }
      return check("V2", "pass", "workspace fingerprint matches");
    } catch (err) {
      return check("V2", "fail", `cannot fingerprint workspace: ${errorMessage(err)}`);
    }
  }

  private async checkInputs(receipt: GenerationReceipt): Promise<VerificationCheck> {
    const { config, ontologies, queries, templates } = receipt.inputs;
    const entries = [...(config ? [config] : []), ...ontologies, ...queries, ...templates];
    return hashCheck("V3", await compareHashes(receipt.workspace.root, entries, "input"), entries.length, "input hashes");
  }

  private async checkOutputs(receipt: GenerationReceipt): Promise<VerificationCheck> {
    const written = receipt.outputs.filter((o) => WRITTEN_STATUSES.has(o.status));
    return hashCheck("V4", await compareHashes(receipt.workspace.root, written, "output"), written.length, "output hashes");
  }

  private checkGuards(receipt: GenerationReceipt): VerificationCheck {
    if (receipt.guards.length === 0) return check("V5", "fail", "receipt records no guard verdicts");
    const notPassed = receipt.guards.filter((g) => g.verdict !== "pass");
    if (notPassed.length) {
      return check("V5", "fail", `guards not passed: ${notPassed.map((g) => `${g.id}=${g.verdict}`).join(", ")}`);
    }
    return check("V5", "pass", `${receipt.guards.length} guards passed`);
  }

  private checkMetadata(receipt: GenerationReceipt, raw: Record<string, unknown>): VerificationCheck {
    const problems: string[] = [];
    const ts = Date.parse(receipt.timestamp);
    if (!ISO_TIMESTAMP.test(receipt.timestamp) || Number.isNaN(ts)) {
      problems.push(`timestamp ${JSON.stringify(receipt.timestamp)} is not ISO-8601`);
    } else if (ts - this.clock().getTime() > this.maxClockSkewMs) {
      problems.push(`timestamp ${receipt.timestamp} is in the future`);
    }
    if (!isSemver(receipt.compiler_version)) problems.push(`compiler_version ${JSON.stringify(receipt.compiler_version)} is not semver`);
    const recomputed = computeReceiptId(raw);
    if (recomputed !== receipt.receipt_id) problems.push(`receipt_id mismatch: recorded ${receipt.receipt_id}, computed ${recomputed}`);

    if (problems.length) return check("V6", "fail", problems.join("; "));
    return check("V6", "pass", "timestamp, versions and receipt_id are consistent");
  }

  private checkSignature(receipt: GenerationReceipt, raw: Record<string, unknown>): VerificationCheck {
    if (!receipt.signature) return check("V7", "skip", "receipt is unsigned");
    const problem = checkReceiptSignature(raw, receipt.signature);
    return problem ? check("V7", "fail", problem) : check("V7", "pass", `signed by ${receipt.signature.key_id}`);
  }
}

/**
 * Strict loader for callers that want the receipt itself. With `verifyIntegrity`
 * the receipt_id and any signature must hold, else ReceiptIntegrityError.
 */
export async function loadReceipt(receiptPath: string, options: { verifyIntegrity?: boolean } = {}): Promise<GenerationReceipt> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(receiptPath, "utf8"));
  } catch (err) {
    throw new ReceiptIntegrityError(`cannot read receipt: ${errorMessage(err)}`, receiptPath);
  }
  const parsed = zGenerationReceipt.safeParse(raw);
  if (!parsed.success || !isJsonObject(raw)) throw new ReceiptIntegrityError("receipt does not match the schema", receiptPath);

  if (options.verifyIntegrity) {
    const recomputed = computeReceiptId(raw);
    if (recomputed !== parsed.data.receipt_id) {
      throw new ReceiptIntegrityError(`receipt_id mismatch: recorded ${parsed.data.receipt_id}, computed ${recomputed}`, receiptPath);
    }
    if (parsed.data.signature) {
      const problem = checkReceiptSignature(raw, parsed.data.signature);
      if (problem) throw new ReceiptIntegrityError(problem, receiptPath);
    }
  }
  return parsed.data;
}
