import { CollaboratorError, GuardInfrastructureError } from "../core/errors.js";
import { createLogger } from "../core/log.js";
import { defaultParallelism, mapBounded } from "../core/pool.js";
import type { Guard, GuardContext, GuardVerdict } from "./types.js";

const log = createLogger("guards");

export interface GuardOptions {
  failFast: boolean;
  force: boolean;
  validateOnly?: boolean;
  /** Last guard that runs in validate-only mode. */
  validateOnlyStopsAt?: "G4" | "G5";
  parallelism?: number;
}

export interface GuardReport {
  verdicts: GuardVerdict[];
  overall: "pass" | "fail";
}

const VALIDATE_ONLY_SKIPS: Record<"G4" | "G5", ReadonlySet<string>> = {
  G4: new Set(["G5", "G6"]),
  G5: new Set(["G6"])
};

export class GuardRegistry {
  private readonly guards: Guard[] = [];

  constructor(initial: readonly Guard[] = []) {
    for (const g of initial) this.register(g);
  }

  register(guard: Guard): this {
    if (this.guards.some((g) => g.id === guard.id)) throw new Error(`guard already registered: ${guard.id}`);
    this.guards.push(guard);
    return this;
  }

  list(): readonly Guard[] {
    return this.guards;
  }
}

function skipped(guard: Guard, diagnostic: string): GuardVerdict {
  return { guard_id: guard.id, name: guard.name, status: "skip", diagnostic };
}

export class GuardKernel {
  constructor(private readonly registry: GuardRegistry) {}

  async evaluate(ctx: GuardContext, options: GuardOptions): Promise<GuardReport> {
    const guards = this.registry.list();
    const skipSet = options.validateOnly ? VALIDATE_ONLY_SKIPS[options.validateOnlyStopsAt ?? "G5"] : new Set<string>();

    const runOne = async (guard: Guard): Promise<GuardVerdict> => {
      if (skipSet.has(guard.id)) return skipped(guard, "not evaluated in validate-only mode");
      const started = Date.now();
      let verdict: GuardVerdict;
      try {
        const r = await guard.check(ctx);
        verdict = {
          guard_id: guard.id,
          name: guard.name,
          status: r.status,
          diagnostic: r.diagnostic,
          ...(r.status === "fail" ? { remediation: guard.remediation } : {}),
          ...(r.metadata ? { metadata: r.metadata } : {})
        };
      } catch (err) {
        if (!(err instanceof CollaboratorError)) throw new GuardInfrastructureError(guard.id, err);
        verdict = { guard_id: guard.id, name: guard.name, status: "fail", diagnostic: err.message, remediation: guard.remediation };
      }
      log.debug("guard evaluated", { guard: guard.id, status: verdict.status, ms: Date.now() - started });
      return verdict;
    };

    let verdicts: GuardVerdict[];
    if (options.failFast && !options.force) {
      verdicts = [];
      let failedAt: string | null = null;
      for (const guard of guards) {
        if (failedAt) {
          verdicts.push(skipped(guard, `not evaluated: ${failedAt} failed`));
          continue;
        }
        const v = await runOne(guard);
        verdicts.push(v);
        if (v.status === "fail") failedAt = guard.id;
      }
    } else {
      let barrierEnd = 0;
      guards.forEach((g, i) => {
        if (g.barrier) barrierEnd = i + 1;
      });
      verdicts = [];
      for (const guard of guards.slice(0, barrierEnd)) verdicts.push(await runOne(guard));
      verdicts.push(...(await mapBounded(guards.slice(barrierEnd), options.parallelism ?? defaultParallelism(), runOne)));
    }

    const overall = verdicts.some((v) => v.status === "fail") ? "fail" : "pass";
    if (overall === "fail") {
      log.warn("guard evaluation failed", {
        failed: verdicts.filter((v) => v.status === "fail").map((v) => v.guard_id).join(",")
      });
    }
    return { verdicts, overall };
  }
}
