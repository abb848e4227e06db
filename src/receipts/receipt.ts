import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { Sha256Digest } from "../core/canonicalJson.js";

export const RECEIPT_VERSION = "1.0.0";

const SEMVER = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;

export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zReceiptInput = z.object({
  path: z.string().min(1),
  hash: zSha256,
  size: z.int().nonnegative()
});

export const zReceiptOntology = zReceiptInput.extend({
  triple_count: z.int().nonnegative().optional()
});

export const zReceiptGuard = z.object({
  id: z.string().min(1),
  name: z.string(),
  verdict: z.enum(["pass", "fail", "skip"]),
  diagnostic: z.string(),
  remediation: z.string().optional()
});

export const zOutputStatus = z.enum(["generated", "unchanged", "skipped", "invalid", "blocked"]);

export const zReceiptOutput = z.object({
  path: z.string().min(1),
  hash: zSha256,
  size: z.int().nonnegative(),
  status: zOutputStatus,
  language: z.string()
});

export const zReceiptSignature = z.object({
  alg: z.literal("ed25519"),
  key_id: zSha256,
  public_key: z.string().min(1),
  sig_base64: z.string().min(1)
});

export const zGenerationReceipt = z.object({
  version: z.string(),
  timestamp: z.string(),
  compiler_version: z.string(),
  mode: z.enum(["preview", "apply"]),
  workspace: z.object({ root: z.string().min(1), fingerprint: zSha256 }),
  inputs: z.object({
    config: zReceiptInput.nullable(),
    ontologies: z.array(zReceiptOntology),
    queries: z.array(zReceiptInput),
    templates: z.array(zReceiptInput)
  }),
  guards: z.array(zReceiptGuard),
  outputs: z.array(zReceiptOutput),
  performance: z.object({
    total_duration_ms: z.number().nonnegative(),
    cache_hit_rate: z.number().min(0).max(1),
    stages: z.record(z.string(), z.number().nonnegative())
  }),
  artifacts: z.object({ report: z.string().nullable(), diff: z.string().nullable() }),
  receipt_id: zSha256,
  signature: zReceiptSignature.optional()
});

export type ReceiptInput = z.infer<typeof zReceiptInput>;
export type ReceiptOntology = z.infer<typeof zReceiptOntology>;
export type ReceiptGuard = z.infer<typeof zReceiptGuard>;
export type OutputStatus = z.infer<typeof zOutputStatus>;
export type ReceiptOutput = z.infer<typeof zReceiptOutput>;
export type ReceiptSignature = z.infer<typeof zReceiptSignature>;
export type GenerationReceipt = z.infer<typeof zGenerationReceipt>;
export type ReceiptBody = Omit<GenerationReceipt, "receipt_id" | "signature">;

/** Outputs a verifier can expect on disk. */
export const WRITTEN_STATUSES: ReadonlySet<OutputStatus> = new Set(["generated", "unchanged"]);

export function isSemver(value: string): boolean {
  return SEMVER.test(value);
}

function omitKeys(doc: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(doc)) if (!keys.includes(k)) out[k] = v;
  return out;
}

/** Hash over every field except receipt_id and signature. Takes raw JSON so unknown fields count too. */
export function computeReceiptId(doc: ReceiptBody | Record<string, unknown>): Sha256Digest {
  return sha256Prefixed(stableJsonStringify(omitKeys({ ...doc }, ["receipt_id", "signature"])));
}

/** Bytes covered by the signature: everything except the signature itself. */
export function signingPayload(doc: GenerationReceipt | Record<string, unknown>): string {
  return stableJsonStringify(omitKeys({ ...doc }, ["signature"]));
}
