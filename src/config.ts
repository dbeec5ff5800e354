export type HistoryBackend = "file" | "postgres";

export interface AppConfig {
  port: number;
  logLevel: string;
  historyBackend: HistoryBackend;
  historyFilePath: string;
  historyRetentionDays: number;
  databaseUrl: string;
  databaseSslRootCertPath: string;
  monitorConfigPath: string;
  changeThresholdPercent: number | null;
  exchangeApiKey: string;
  exchangeApiUrl: string;
  rateFetchTimeoutMs: number;
  alertWebhookUrls: string[];
  alertWebhookTimeoutMs: number;
  alertSigningPrivateKey: string;
  statusApiToken: string;
}

export class ConfigError extends Error {
  constructor(
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function optionalFloatFromEnv(name: string): number | null {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return null;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(
      "CONFIG_INVALID",
      `${name} must be a positive number (received: ${raw}).`,
    );
  }
  return parsed;
}

function listFromEnv(name: string): string[] {
  return (process.env[name] ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseHistoryBackend(raw: string | undefined): HistoryBackend {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (!normalized || normalized === "file") {
    return "file";
  }
  if (normalized === "postgres") {
    return "postgres";
  }

  throw new ConfigError(
    "CONFIG_INVALID",
    `HISTORY_BACKEND must be one of file, postgres (received: ${raw}).`,
  );
}

export function getConfig(): AppConfig {
  return {
    port: intFromEnv("PORT", 3001),
    logLevel: process.env.LOG_LEVEL ?? "info",
    historyBackend: parseHistoryBackend(process.env.HISTORY_BACKEND),
    historyFilePath: process.env.HISTORY_FILE ?? "data/exchange_history.json",
    historyRetentionDays: intFromEnv("HISTORY_RETENTION_DAYS", 30),
    databaseUrl: process.env.DATABASE_URL ?? "",
    databaseSslRootCertPath: process.env.DATABASE_SSL_ROOT_CERT_PATH ?? "",
    monitorConfigPath: process.env.MONITOR_CONFIG_PATH ?? "config/monitor.json",
    changeThresholdPercent: optionalFloatFromEnv("CHANGE_THRESHOLD_PERCENT"),
    exchangeApiKey: process.env.EXCHANGE_API_KEY ?? "",
    exchangeApiUrl:
      process.env.EXCHANGE_API_URL ?? "http://op.juhe.cn/onebox/exchange/currency",
    rateFetchTimeoutMs: intFromEnv("RATE_FETCH_TIMEOUT_MS", 10000),
    alertWebhookUrls: listFromEnv("ALERT_WEBHOOK_URLS"),
    alertWebhookTimeoutMs: intFromEnv("ALERT_WEBHOOK_TIMEOUT_MS", 10000),
    alertSigningPrivateKey: process.env.ALERT_SIGNING_PRIVATE_KEY ?? "",
    statusApiToken: process.env.STATUS_API_TOKEN ?? "",
  };
}

export function validateProductionBootConfig(config: AppConfig): void {
  if (process.env.NODE_ENV !== "production") {
    return;
  }

  const missing: string[] = [];
  if (!config.exchangeApiKey.trim()) {
    missing.push("EXCHANGE_API_KEY");
  }
  if (config.historyBackend === "postgres" && !config.databaseUrl.trim()) {
    missing.push("DATABASE_URL");
  }

  if (missing.length > 0) {
    throw new ConfigError(
      "CONFIG_MISSING",
      `Fatal config error: missing required production settings: ${missing.join(", ")}`,
    );
  }
}
