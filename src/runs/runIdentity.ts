import type { RunId } from "../core/ids.js";
import { deriveRunIdFromParts } from "../core/ids.js";
import type { RunKind } from "../core/run.js";

/** Same workspace state at the same instant, same id; a re-run a moment later gets a new one. */
export function deriveRunId(input: { kind: RunKind; subject: string; startedAt: Date }): RunId {
  return deriveRunIdFromParts([`kind=${input.kind}`, `subject=${input.subject}`, `at=${input.startedAt.toISOString()}`]);
}
