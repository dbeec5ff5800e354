import fs from "node:fs";
import path from "node:path";
import { ConfigError, type AppConfig } from "../config";

export interface MigrationFile {
  name: string;
  sql: string;
}

export interface MigrationClient {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

interface MigrationLogger {
  info(payload: Record<string, unknown>, message: string): void;
}

export const MIGRATIONS_DIR = path.resolve(__dirname, "migrations");

export function assertMigrationTarget(config: Pick<AppConfig, "historyBackend">): void {
  if (config.historyBackend !== "postgres") {
    throw new ConfigError(
      "CONFIG_INVALID",
      `db:migrate only applies to HISTORY_BACKEND=postgres (current: ${config.historyBackend}).`,
    );
  }
}

export function readMigrationFiles(migrationsDir: string = MIGRATIONS_DIR): MigrationFile[] {
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b, "en"))
    .map((name) => ({
      name,
      sql: fs.readFileSync(path.join(migrationsDir, name), "utf8"),
    }));
}

function appliedName(row: unknown): string | null {
  if (row && typeof row === "object" && "name" in row && typeof row.name === "string") {
    return row.name;
  }
  return null;
}

/**
 * Applies pending migrations in file-name order, each in its own transaction,
 * and records them in `schema_migrations`. Returns the names applied this time.
 */
export async function applyMigrations(
  client: MigrationClient,
  migrations: MigrationFile[],
  logger: MigrationLogger,
): Promise<string[]> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const existing = await client.query("SELECT name FROM schema_migrations");
  const done = new Set(existing.rows.map(appliedName));
  const pending = migrations.filter((migration) => !done.has(migration.name));

  logger.info(
    { backend: "postgres", pending: pending.length, total: migrations.length },
    "migrating rate history schema",
  );

  const applied: string[] = [];
  for (const migration of pending) {
    await client.query("BEGIN");
    try {
      await client.query(migration.sql);
      await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [migration.name]);
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    }
    applied.push(migration.name);
    logger.info({ migration: migration.name }, "migration applied");
  }

  return applied;
}
