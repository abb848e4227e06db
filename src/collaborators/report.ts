import type { GuardVerdict } from "../guards/types.js";
import type { ReceiptOutput } from "../receipts/receipt.js";
import type { ValidationIssue } from "./validators.js";

export interface ReportInput {
  runId: string;
  mode: "preview" | "apply";
  status: string;
  timestamp: string;
  workspaceRoot: string;
  fingerprint: string;
  verdicts: readonly GuardVerdict[];
  outputs: readonly ReceiptOutput[];
  issues: readonly ValidationIssue[];
  stale: readonly string[];
  orphans: readonly string[];
  totalDurationMs: number;
  cacheHitRate: number;
}

function cell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

export function renderMarkdownReport(input: ReportInput): string {
  const lines: string[] = [
    `# Generation report ${input.runId}`,
    "",
    `- mode: ${input.mode}`,
    `- status: ${input.status}`,
    `- started: ${input.timestamp}`,
    `- workspace: ${input.workspaceRoot}`,
    `- fingerprint: ${input.fingerprint}`,
    `- duration: ${input.totalDurationMs} ms`,
    `- cache hit rate: ${(input.cacheHitRate * 100).toFixed(1)}%`,
    "",
    "## Guards",
    "",
    "| id | name | verdict | diagnostic |",
    "| --- | --- | --- | --- |",
    ...input.verdicts.map((v) => `| ${v.guard_id} | ${cell(v.name)} | ${v.status} | ${cell(v.diagnostic)} |`),
    "",
    "## Outputs",
    ""
  ];

  if (input.outputs.length === 0) {
    lines.push("No outputs.");
  } else {
    lines.push("| path | status | language | size | hash |", "| --- | --- | --- | --- | --- |");
    for (const o of input.outputs) lines.push(`| ${cell(o.path)} | ${o.status} | ${o.language} | ${o.size} | ${o.hash} |`);
  }

  if (input.issues.length) {
    lines.push("", "## Validation issues", "");
    for (const i of input.issues) lines.push(`- ${i.path} (${i.language}): ${i.message}`);
  }
  if (input.stale.length) {
    lines.push("", "## Stale artifacts", "");
    for (const p of input.stale) lines.push(`- ${p}`);
  }
  if (input.orphans.length) {
    lines.push("", "## Orphaned files", "");
    for (const p of input.orphans) lines.push(`- ${p}`);
  }
  return lines.join("\n") + "\n";
}
