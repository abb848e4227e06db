import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import path from "path";
import { WorkspaceConfigError, WorkspaceIoError, errorMessage } from "../core/errors.js";
import { createLogger } from "../core/log.js";
import { COMPILER_NAME, COMPILER_VERSION } from "../core/version.js";
import type { Collaborators } from "../collaborators/index.js";
import { generate } from "../generation/generate.js";
import type { GenerateSummary } from "../generation/generate.js";
import type { GuardRegistry } from "../guards/index.js";
import type { ReceiptSigner } from "../receipts/signing.js";
import { verifyReceipt } from "../receipts/verify.js";
import type { RunLedger } from "../runs/runLedger.js";
import { zGenerateInput, zGenerateOutput, zVerifyInput, zVerifyOutput } from "./toolSchemas.js";

const log = createLogger("gateway");

export interface GatewayDeps {
  ledger: RunLedger;
  /** Every workspace and receipt the tools touch must resolve inside this directory. */
  workspaceRoot: string;
  signer?: ReceiptSigner | null;
  registry?: GuardRegistry;
  collaborators?: (workspaceRoot: string) => Collaborators;
  clock?: () => Date;
}

function resolveWithinRoot(root: string, requested: string, label: string): string {
  const base = path.resolve(root);
  const abs = path.resolve(base, requested);
  const rel = path.relative(base, abs);
  if (rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new McpError(ErrorCode.InvalidRequest, `policy denied ${label} outside ${base}: ${requested}`);
  }
  return abs;
}

function describeSummary(summary: GenerateSummary): string {
  if (summary.status === "guard_failure") {
    const failed = summary.guards.filter((g) => g.status === "fail");
    return `guards failed (run ${summary.run_id}): ${failed.map((g) => `${g.guard_id} ${g.diagnostic}`).join("; ")}`;
  }
  const s = summary.stats;
  return (
    `${summary.status} ${summary.mode} (run ${summary.run_id}): ` +
    `${s.generated} generated, ${s.unchanged} unchanged, ${s.skipped} skipped, ${s.blocked} blocked, ${s.invalid} invalid`
  );
}

function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof WorkspaceConfigError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof WorkspaceIoError) return new McpError(ErrorCode.InternalError, `${e.message} (${e.filePath})`);
  return new McpError(ErrorCode.InternalError, errorMessage(e));
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: `${COMPILER_NAME}-gateway`,
    version: COMPILER_VERSION
  });

  mcp.registerTool(
    "proofgen_generate",
    {
      description:
        "Compile ontology, queries and templates into source files behind guards G1-G7, then write a report, a diff and a hash-chained receipt. Defaults to preview.",
      inputSchema: zGenerateInput,
      outputSchema: zGenerateOutput
    },
    async (args) => {
      try {
        const workspaceRoot = resolveWithinRoot(deps.workspaceRoot, args.workspace_root ?? ".", "workspace_root");
        const summary = await generate(
          {
            workspace_root: workspaceRoot,
            preview: args.preview,
            force: args.force,
            validate: args.validate,
            validate_only: args.validate_only,
            emit_diff: args.emit_diff,
            emit_receipt: args.emit_receipt,
            ...(args.fail_fast !== undefined ? { fail_fast: args.fail_fast } : {})
          },
          {
            ledger: deps.ledger,
            signer: deps.signer ?? null,
            ...(deps.registry ? { registry: deps.registry } : {}),
            ...(deps.collaborators ? { collaborators: deps.collaborators(workspaceRoot) } : {}),
            ...(deps.clock ? { clock: deps.clock } : {})
          }
        );

        const text = describeSummary(summary);
        if (summary.status === "guard_failure") {
          return { isError: true, content: [{ type: "text", text }], structuredContent: { ...summary } };
        }
        return { content: [{ type: "text", text }], structuredContent: { ...summary } };
      } catch (e) {
        const mapped = toMcpError(e);
        log.warn("proofgen_generate failed", { code: mapped.code, error: mapped.message });
        throw mapped;
      }
    }
  );

  mcp.registerTool(
    "proofgen_verify",
    {
      description: "Audit a generation receipt against the current filesystem (checks V1-V7).",
      inputSchema: zVerifyInput,
      outputSchema: zVerifyOutput
    },
    async (args) => {
      try {
        const receiptPath = resolveWithinRoot(deps.workspaceRoot, args.receipt_path, "receipt_path");
        const result = await verifyReceipt({ receipt_path: receiptPath }, { ledger: deps.ledger, ...(deps.clock ? { clock: deps.clock } : {}) });
        const failed = result.checks.filter((c) => c.verdict === "fail").map((c) => c.check_id);
        const text = result.result === "VERIFIED" ? `VERIFIED ${receiptPath}` : `FAILED ${receiptPath}: ${failed.join(", ")}`;
        return { content: [{ type: "text", text }], structuredContent: { ...result } };
      } catch (e) {
        const mapped = toMcpError(e);
        log.warn("proofgen_verify failed", { code: mapped.code, error: mapped.message });
        throw mapped;
      }
    }
  );

  return mcp;
}
