import type { AppConfig } from "../../src/config";

export function buildTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 3001,
    logLevel: "silent",
    historyBackend: "file",
    historyFilePath: "data/exchange_history.json",
    historyRetentionDays: 30,
    databaseUrl: "",
    databaseSslRootCertPath: "",
    monitorConfigPath: "config/monitor.json",
    changeThresholdPercent: null,
    exchangeApiKey: "test-key",
    exchangeApiUrl: "http://rates.test/onebox/exchange/currency",
    rateFetchTimeoutMs: 1000,
    alertWebhookUrls: [],
    alertWebhookTimeoutMs: 1000,
    alertSigningPrivateKey: "",
    statusApiToken: "",
    ...overrides,
  };
}
