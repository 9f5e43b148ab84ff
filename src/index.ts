#!/usr/bin/env node
import { loadConfigFromFile } from "./config/config.js";
import { isPipelineError } from "./core/errors.js";
import { applySchema } from "./db/bootstrap.js";
import { createDb, createInMemoryPool, createPgPool } from "./db/connection.js";
import { createLogger } from "./logging/logger.js";
import { runPipeline } from "./pipeline/pipeline.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const configPath = process.argv[2] ?? process.env.BINFLOW_CONFIG;
  if (!configPath) {
    throw new Error("usage: binflow <config.yaml> (or set BINFLOW_CONFIG); see config/binflow.example.yaml");
  }
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const config = await loadConfigFromFile(configPath);
  const logger = createLogger({ level: config.logLevel, scope: "binflow" });

  const url = process.env.DATABASE_URL;
  const pool = url ? createPgPool(url) : createInMemoryPool();
  if (!url || autoSchema) {
    await applySchema(pool);
  }
  const db = createDb(pool);

  try {
    const outcome = await runPipeline(config, { store: new PostgresStore(db), logger });
    if (outcome.kind === "dry_run") {
      for (const step of outcome.plan) console.log(step.taskId);
    }
  } finally {
    await db.destroy();
  }
}

main().catch((err) => {
  console.error(isPipelineError(err) ? err.message : err);
  process.exitCode = 1;
});
