import { stableJsonPretty } from "../core/canonicalJson.js";
import type { Sha256Digest } from "../core/canonicalJson.js";
import { compareStrings } from "../core/paths.js";
import { COMPILER_VERSION } from "../core/version.js";
import { atomicWriteFile } from "../collaborators/fileTransaction.js";
import type { GuardVerdict } from "../guards/types.js";
import type { InputDescriptor, WorkspaceInputs } from "../workspace/discovery.js";
import { RECEIPT_VERSION, computeReceiptId } from "./receipt.js";
import type { GenerationReceipt, ReceiptBody, ReceiptInput, ReceiptOutput } from "./receipt.js";
import { signReceipt } from "./signing.js";
import type { ReceiptSigner } from "./signing.js";

export interface ReceiptArgs {
  mode: "preview" | "apply";
  workspace: { root: string; fingerprint: Sha256Digest; inputs: WorkspaceInputs };
  tripleCounts?: Readonly<Record<string, number>>;
  verdicts: readonly GuardVerdict[];
  outputs: readonly ReceiptOutput[];
  performance: GenerationReceipt["performance"];
  artifacts: GenerationReceipt["artifacts"];
}

export interface ReceiptGeneratorOptions {
  clock?: () => Date;
  signer?: ReceiptSigner | null;
  compilerVersion?: string;
}

function toInput(d: InputDescriptor): ReceiptInput {
  return { path: d.path, hash: d.hash, size: d.size };
}

function byPath<T extends { path: string }>(list: readonly T[]): T[] {
  return [...list].sort((a, b) => compareStrings(a.path, b.path));
}

export class ReceiptGenerator {
  private readonly clock: () => Date;

  constructor(private readonly options: ReceiptGeneratorOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  /** Same arguments, same receipt; only `timestamp` follows the clock. */
  generate(args: ReceiptArgs): GenerationReceipt {
    const { inputs } = args.workspace;
    const body: ReceiptBody = {
      version: RECEIPT_VERSION,
      timestamp: this.clock().toISOString(),
      compiler_version: this.options.compilerVersion ?? COMPILER_VERSION,
      mode: args.mode,
      workspace: { root: args.workspace.root, fingerprint: args.workspace.fingerprint },
      inputs: {
        config: inputs.config ? toInput(inputs.config) : null,
        ontologies: byPath(inputs.ontologies).map((d) => {
          const count = args.tripleCounts?.[d.path];
          return count === undefined ? toInput(d) : { ...toInput(d), triple_count: count };
        }),
        queries: byPath(inputs.queries).map(toInput),
        templates: byPath(inputs.templates).map(toInput)
      },
      guards: args.verdicts.map((v) => ({
        id: v.guard_id,
        name: v.name,
        verdict: v.status,
        diagnostic: v.diagnostic,
        ...(v.remediation ? { remediation: v.remediation } : {})
      })),
      outputs: byPath(args.outputs),
      performance: args.performance,
      artifacts: args.artifacts
    };

    const receipt: GenerationReceipt = { ...body, receipt_id: computeReceiptId(body) };
    const signer = this.options.signer;
    return signer ? { ...receipt, signature: signReceipt(receipt, signer) } : receipt;
  }

  async write(receipt: GenerationReceipt, filePath: string): Promise<void> {
    await atomicWriteFile(filePath, stableJsonPretty(receipt));
  }
}
