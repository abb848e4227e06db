import { boundsGuard } from "./bounds.js";
import { determinismGuard } from "./determinism.js";
import { graphParseGuard } from "./graphParse.js";
import { GuardRegistry } from "./kernel.js";
import { outputOverlapGuard } from "./outputOverlap.js";
import { pathSafetyGuard } from "./pathSafety.js";
import { queryExecutionGuard } from "./queryExecution.js";
import { templateCompileGuard } from "./templateCompile.js";
import type { Guard } from "./types.js";

export const BUILTIN_GUARDS: readonly Guard[] = [
  pathSafetyGuard,
  outputOverlapGuard,
  templateCompileGuard,
  graphParseGuard,
  queryExecutionGuard,
  determinismGuard,
  boundsGuard
];

/** G1 through G7 in order, followed by any custom guards. */
export function createGuardRegistry(custom: readonly Guard[] = []): GuardRegistry {
  return new GuardRegistry([...BUILTIN_GUARDS, ...custom]);
}

export { GuardKernel, GuardRegistry } from "./kernel.js";
export type { GuardOptions, GuardReport } from "./kernel.js";
export type { Guard, GuardCheckResult, GuardContext, GuardStatus, GuardVerdict } from "./types.js";
