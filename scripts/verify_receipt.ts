import { verifyReceipt } from "../src/receipts/verify.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/verify_receipt.ts --receipt <path> [--json]",
    "",
    "notes:",
    "  - Exit code 0 means VERIFIED, 2 means at least one check failed.",
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
    if (key === "help" || key === "json") {
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
  const receipt = args.receipt;
  if (typeof receipt !== "string") throw new Error(`--receipt is required\n\n${usage()}`);

  const result = await verifyReceipt({ receipt_path: receipt });
  if (args.json) {
    process.stdout.write(JSON.stringify(result, null, 2) + "\n");
  } else {
    for (const c of result.checks) process.stdout.write(`${c.check_id} ${c.verdict.padEnd(4)} ${c.name}: ${c.message}\n`);
    process.stdout.write(`${result.result}\n`);
  }
  if (result.result !== "VERIFIED") process.exitCode = 2;
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
