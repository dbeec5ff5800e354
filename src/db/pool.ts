import fs from "node:fs";
import path from "node:path";
import { Pool, type PoolConfig } from "pg";
import type { AppConfig } from "../config";

interface PoolLogger {
  info(payload: Record<string, unknown>, message: string): void;
}

const SSL_REQUIRED_MODES = new Set([
  "require",
  "verify-ca",
  "verify-full",
  "no-verify",
]);

function normalizeConnectionString(raw: string): {
  connectionString: string;
  sslMode?: string;
} {
  const parsed = new URL(raw);
  const sslMode =
    parsed.searchParams.get("sslmode")?.trim().toLowerCase() ?? undefined;
  parsed.searchParams.delete("sslmode");
  return {
    connectionString: parsed.toString(),
    sslMode,
  };
}

export function buildPool(
  config: Pick<AppConfig, "databaseUrl" | "databaseSslRootCertPath">,
  logger?: PoolLogger,
): Pool {
  if (!config.databaseUrl) {
    throw new Error(
      "DATABASE_URL is required when HISTORY_BACKEND=postgres.",
    );
  }

  const { connectionString, sslMode } = normalizeConnectionString(
    config.databaseUrl,
  );
  const isProduction = process.env.NODE_ENV === "production";
  if (isProduction && sslMode === "no-verify") {
    throw new Error(
      "Fatal config error: DATABASE_URL must not use sslmode=no-verify in production. Set DATABASE_SSL_ROOT_CERT_PATH instead.",
    );
  }
  const poolConfig: PoolConfig = { connectionString, max: 2 };

  const certPath = config.databaseSslRootCertPath.trim();
  if (certPath) {
    if (!path.isAbsolute(certPath)) {
      throw new Error(
        `Fatal config error: DATABASE_SSL_ROOT_CERT_PATH must be an absolute path (received: ${certPath}).`,
      );
    }

    poolConfig.ssl = {
      ca: fs.readFileSync(certPath, "utf8"),
      rejectUnauthorized: true,
    };
    logger?.info({ dbSslMode: "ca_verify" }, "database pool SSL mode configured");
    return new Pool(poolConfig);
  }

  if (sslMode && SSL_REQUIRED_MODES.has(sslMode)) {
    // Without a CA bundle, TLS is encrypted but unverified.
    poolConfig.ssl = { rejectUnauthorized: false };
    logger?.info(
      { dbSslMode: "insecure_ssl", databaseUrlSslmodeParam: sslMode },
      "database pool SSL mode configured",
    );
  } else {
    poolConfig.ssl = false;
    logger?.info(
      { dbSslMode: "disabled", databaseUrlSslmodeParam: sslMode ?? null },
      "database pool SSL mode configured",
    );
  }

  return new Pool(poolConfig);
}
