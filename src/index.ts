import * as pg from "pg";
import { newDb } from "pg-mem";
import path from "path";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDb, createPgPool } from "./db/connection.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createLogger } from "./core/log.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { loadSignerFromPemFile } from "./receipts/signing.js";
import { RunLedger } from "./runs/runLedger.js";
import { PostgresStore } from "./store/postgresStore.js";

const log = createLogger("main");

async function createPool(): Promise<pg.Pool> {
  const url = process.env.DATABASE_URL;
  if (url) return createPgPool(url);

  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

async function main(): Promise<void> {
  const workspaceRoot = path.resolve(process.env.PROOFGEN_WORKSPACE_ROOT ?? ".");
  const signingKeyPath = process.env.PROOFGEN_SIGNING_KEY;
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const pool = await createPool();
  if (!process.env.DATABASE_URL || autoSchema) {
    await applySqlFile(pool, "db/schema.sql");
  }

  const db = createDb(pool);
  const ledger = new RunLedger(new PostgresStore(db));
  const signer = signingKeyPath ? await loadSignerFromPemFile(signingKeyPath) : null;

  const server = createGatewayServer({ ledger, workspaceRoot, signer });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("proofgen gateway ready", {
    workspaceRoot,
    store: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    signing: signer ? signer.keyId : "off"
  });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
