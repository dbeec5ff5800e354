#!/usr/bin/env node
import { CliUsageError, parseCliArgs, pruneCutoff, USAGE } from "./cli";
import { getConfig, validateProductionBootConfig, type AppConfig } from "./config";
import { buildLogger } from "./logger";
import { buildServer } from "./server";
import { WebhookAlertNotifier } from "./services/alerts/webhook.notifier";
import { createHistoryStore } from "./services/history/factory";
import { HistoryStoreError } from "./services/history/store";
import { runHealthCheck } from "./services/monitor/check";
import { loadMonitorConfig } from "./services/monitor/monitor.config";
import { pairKey } from "./services/monitor/pair";
import { runMonitor } from "./services/monitor/runner";
import { JuheRateClient } from "./services/rates/juhe.client";

const EXIT_DELIVERY_FAILED = 2;

function buildFetcher(config: AppConfig): JuheRateClient {
  return new JuheRateClient({
    apiKey: config.exchangeApiKey,
    baseUrl: config.exchangeApiUrl,
    timeoutMs: config.rateFetchTimeoutMs,
  });
}

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.name === "help") {
    console.log(USAGE);
    return 0;
  }

  const config = getConfig();
  validateProductionBootConfig(config);
  const logger = buildLogger(config);

  if (command.name === "serve") {
    const server = await buildServer({ config });
    await server.listen({ port: config.port, host: "0.0.0.0" });
    server.log.info({ port: config.port }, "status api started");
    return 0;
  }

  const history = createHistoryStore(config, logger);
  try {
    switch (command.name) {
      case "run": {
        const monitor = loadMonitorConfig(config.monitorConfigPath, {
          changeThresholdPercent: config.changeThresholdPercent,
        });
        const summary = await runMonitor({
          pairs: monitor.pairs,
          evaluator: monitor.evaluator,
          fetcher: buildFetcher(config),
          store: history.store,
          notifier: new WebhookAlertNotifier({
            webhookUrls: config.alertWebhookUrls,
            signingPrivateKey: config.alertSigningPrivateKey,
            timeoutMs: config.alertWebhookTimeoutMs,
            logger,
          }),
          logger,
        });
        return summary.deliveryFailures > 0 ? EXIT_DELIVERY_FAILED : 0;
      }
      case "check": {
        const results = await runHealthCheck({
          config,
          loadMonitorConfig: () =>
            loadMonitorConfig(config.monitorConfigPath, {
              changeThresholdPercent: config.changeThresholdPercent,
            }),
          store: history.store,
          fetcher: buildFetcher(config),
        });
        for (const result of results) {
          console.log(`[${result.status}] ${result.name}: ${result.message}`);
        }
        return results.some((result) => result.status === "fail") ? 1 : 0;
      }
      case "history-list": {
        const entries = await history.store.list();
        const document = Object.fromEntries(
          entries.map((entry) => [
            pairKey(entry.pair),
            { rate: entry.rate, observedAt: entry.observedAt },
          ]),
        );
        console.log(JSON.stringify(document, null, 2));
        return 0;
      }
      case "history-prune": {
        const days = command.days ?? config.historyRetentionDays;
        const cutoff = pruneCutoff(new Date(), days);
        const removed = await history.store.prune(cutoff);
        logger.info({ removed, days, cutoff: cutoff.toISOString() }, "rate history pruned");
        return 0;
      }
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
      }
    }
  } finally {
    await history.close();
  }
}

main()
  .then((code) => {
    if (code !== 0) {
      process.exitCode = code;
    }
  })
  .catch((err: unknown) => {
    if (err instanceof CliUsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
      process.exit(64);
    }
    if (err instanceof HistoryStoreError) {
      console.error(`[${err.code}] ${err.message}`);
      process.exit(1);
    }
    console.error(err);
    process.exit(1);
  });
