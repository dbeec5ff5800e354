import { getConfig, validateProductionBootConfig } from "../src/config";
import { applyMigrations, assertMigrationTarget, readMigrationFiles } from "../src/db/migrate";
import { buildPool } from "../src/db/pool";
import { buildLogger } from "../src/logger";

async function main(): Promise<void> {
  const config = getConfig();
  validateProductionBootConfig(config);
  assertMigrationTarget(config);

  const logger = buildLogger(config);
  const pool = buildPool(config, logger);
  const client = await pool.connect();
  try {
    const applied = await applyMigrations(client, readMigrationFiles(), logger);
    logger.info({ applied }, "rate history schema up to date");
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[db:migrate] Migration failed: ${message}`);
  process.exit(1);
});
