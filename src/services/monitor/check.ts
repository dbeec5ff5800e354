import type { AppConfig } from "../../config";
import type { HistoryStore } from "../history/store";
import type { RateFetcher } from "../rates/juhe.client";
import { derivePublicKeyFromPrivateKey } from "../alerts/signature";
import type { MonitorConfig } from "./monitor.config";
import { pairLabel } from "./pair";

export type CheckStatus = "pass" | "warn" | "fail";

export interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
}

export interface HealthCheckOptions {
  config: AppConfig;
  loadMonitorConfig: () => MonitorConfig;
  store: HistoryStore;
  fetcher: RateFetcher;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Operator pre-flight for a deployment: configuration, history, credentials, upstream API. */
export async function runHealthCheck(options: HealthCheckOptions): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  const { config } = options;

  let monitor: MonitorConfig | null = null;
  try {
    monitor = options.loadMonitorConfig();
    results.push({
      name: "monitor_config",
      status: "pass",
      message: `${monitor.pairs.length} pair(s), threshold ${monitor.evaluator.changeThresholdPercent}%`,
    });
  } catch (error) {
    results.push({ name: "monitor_config", status: "fail", message: describeError(error) });
  }

  try {
    const entries = await options.store.list();
    results.push({
      name: "rate_history",
      status: "pass",
      message: `${entries.length} baseline(s) stored (${config.historyBackend})`,
    });
  } catch (error) {
    results.push({ name: "rate_history", status: "fail", message: describeError(error) });
  }

  results.push(
    config.alertWebhookUrls.length > 0
      ? {
        name: "alert_webhooks",
        status: "pass",
        message: `${config.alertWebhookUrls.length} webhook(s) configured`,
      }
      : {
        name: "alert_webhooks",
        status: "warn",
        message: "ALERT_WEBHOOK_URLS is empty; alerts will only be logged",
      },
  );

  if (config.alertSigningPrivateKey) {
    try {
      derivePublicKeyFromPrivateKey(config.alertSigningPrivateKey);
      results.push({ name: "alert_signing", status: "pass", message: "signing key is valid" });
    } catch (error) {
      results.push({ name: "alert_signing", status: "fail", message: describeError(error) });
    }
  }

  if (!config.exchangeApiKey) {
    results.push({
      name: "exchange_api",
      status: "fail",
      message: "EXCHANGE_API_KEY is not configured",
    });
  } else if (monitor) {
    const probe = monitor.pairs[0].pair;
    try {
      const fetched = await options.fetcher.fetchRate(probe);
      results.push(
        fetched.success
          ? {
            name: "exchange_api",
            status: "pass",
            message: `${pairLabel(probe)} = ${fetched.rate ?? "no rate returned"}`,
          }
          : { name: "exchange_api", status: "fail", message: fetched.reason },
      );
    } catch (error) {
      results.push({ name: "exchange_api", status: "fail", message: describeError(error) });
    }
  }

  return results;
}
