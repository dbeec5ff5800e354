import path from "node:path";
import type { AppConfig } from "../../config";
import { buildPool } from "../../db/pool";
import { FileHistoryStore, PostgresHistoryStore, type HistoryStore } from "./store";

interface FactoryLogger {
  info(payload: Record<string, unknown>, message: string): void;
}

export interface HistoryStoreHandle {
  store: HistoryStore;
  close(): Promise<void>;
}

export function createHistoryStore(
  config: Pick<AppConfig, "historyBackend" | "historyFilePath" | "databaseUrl" | "databaseSslRootCertPath">,
  logger?: FactoryLogger,
): HistoryStoreHandle {
  if (config.historyBackend === "postgres") {
    const pool = buildPool(config, logger);
    logger?.info({ backend: "postgres" }, "rate history store ready");
    return {
      store: new PostgresHistoryStore(pool),
      close: () => pool.end(),
    };
  }

  const filePath = path.resolve(config.historyFilePath);
  logger?.info({ backend: "file", filePath }, "rate history store ready");
  return {
    store: new FileHistoryStore(filePath),
    close: async () => undefined,
  };
}
