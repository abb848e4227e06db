import { createHash } from "crypto";
import { encodeCrockfordBase32_128bits } from "./canonicalJson.js";

export type RunId = `run_${string}`;

export function isRunId(value: string): value is RunId {
  return /^run_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}

export function deriveRunIdFromParts(parts: string[]): RunId {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  const digest = h.digest();
  const first16 = digest.subarray(0, 16);
  return `run_${encodeCrockfordBase32_128bits(first16)}` as const;
}
