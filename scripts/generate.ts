import path from "path";
import { generate } from "../src/generation/generate.js";
import { loadSignerFromPemFile } from "../src/receipts/signing.js";

const BOOLEAN_FLAGS = new Set(["help", "apply", "force", "no-validate", "validate-only", "no-fail-fast", "no-diff", "json"]);

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/generate.ts --workspace <dir> [--apply] [--force] [--no-validate] [--validate-only]",
    "                          [--no-fail-fast] [--no-diff] [--signing-key <pem>] [--json]",
    "",
    "notes:",
    "  - Without --apply nothing under the generated root is written (preview).",
    "  - --force continues past failed guards; unsafe or overlapping outputs are still blocked.",
    "  - Exit code 2 means guards failed, 3 means output validation failed.",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (BOOLEAN_FLAGS.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  const workspace = args.workspace;
  if (typeof workspace !== "string") throw new Error(`--workspace is required\n\n${usage()}`);
  const keyPath = args["signing-key"] ?? process.env.PROOFGEN_SIGNING_KEY;
  const signer = typeof keyPath === "string" ? await loadSignerFromPemFile(keyPath) : null;

  const summary = await generate(
    {
      workspace_root: path.resolve(workspace),
      preview: !args.apply,
      force: args.force === true,
      validate: !args["no-validate"],
      validate_only: args["validate-only"] === true,
      emit_diff: !args["no-diff"],
      ...(args["no-fail-fast"] ? { fail_fast: false } : {})
    },
    { signer }
  );

  if (args.json) {
    process.stdout.write(JSON.stringify(summary, null, 2) + "\n");
  } else {
    for (const g of summary.guards) process.stdout.write(`${g.guard_id} ${g.status.padEnd(4)} ${g.diagnostic}\n`);
    for (const o of summary.outputs) process.stdout.write(`${o.status.padEnd(9)} ${o.path}${o.diagnostic ? ` (${o.diagnostic})` : ""}\n`);
    process.stdout.write(`${summary.status} run=${summary.run_id}${summary.receipt_path ? ` receipt=${summary.receipt_path}` : ""}\n`);
  }
  if (summary.status === "guard_failure") process.exitCode = 2;
  else if (summary.status === "validation_failed") process.exitCode = 3;
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
