import * as z from "zod/v4";

const crockford26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${crockford26}$`), "invalid run_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zGuardVerdict = z.object({
  guard_id: z.string(),
  name: z.string(),
  status: z.enum(["pass", "fail", "skip"]),
  diagnostic: z.string(),
  remediation: z.string().optional(),
  metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional()
});

export const zOutputSummary = z.object({
  path: z.string(),
  hash: zSha256,
  size: z.number().int().nonnegative(),
  status: z.enum(["generated", "unchanged", "skipped", "invalid", "blocked"]),
  language: z.string(),
  rule: z.string(),
  diagnostic: z.string().optional()
});

export const zGenerateInput = z.object({
  workspace_root: z.string().min(1).optional(),
  preview: z.boolean().default(true),
  force: z.boolean().default(false),
  validate: z.boolean().default(true),
  fail_fast: z.boolean().optional(),
  validate_only: z.boolean().default(false),
  emit_diff: z.boolean().default(true),
  emit_receipt: z.boolean().default(true)
});

export const zGenerateOutput = z.object({
  status: z.enum(["success", "guard_failure", "validated", "validation_failed"]),
  run_id: zRunId,
  mode: z.enum(["preview", "apply"]),
  workspace_root: z.string(),
  fingerprint: zSha256,
  guards: z.array(zGuardVerdict),
  outputs: z.array(zOutputSummary),
  validation_issues: z.array(z.object({ path: z.string(), language: z.string(), message: z.string() })),
  stale: z.array(z.string()),
  orphans: z.array(z.string()),
  receipt_path: z.string().nullable(),
  receipt_id: zSha256.nullable(),
  report_path: z.string().nullable(),
  diff_path: z.string().nullable(),
  stats: z.object({
    total_duration_ms: z.number().nonnegative(),
    cache_hit_rate: z.number().min(0).max(1),
    generated: z.number().int(),
    unchanged: z.number().int(),
    skipped: z.number().int(),
    blocked: z.number().int(),
    invalid: z.number().int()
  })
});

export const zVerifyInput = z.object({
  receipt_path: z.string().min(1)
});

export const zVerifyOutput = z.object({
  receipt_path: z.string(),
  result: z.enum(["VERIFIED", "FAILED"]),
  checks: z.array(
    z.object({
      check_id: z.enum(["V1", "V2", "V3", "V4", "V5", "V6", "V7"]),
      name: z.string(),
      verdict: z.enum(["pass", "fail", "skip"]),
      message: z.string()
    })
  ),
  receipt_info: z
    .object({
      receipt_id: z.string(),
      timestamp: z.string(),
      compiler_version: z.string(),
      mode: z.enum(["preview", "apply"]),
      input_count: z.number().int(),
      output_count: z.number().int()
    })
    .optional()
});
