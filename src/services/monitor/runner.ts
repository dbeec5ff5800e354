import type { AlertNotifier, DeliveryReport } from "../alerts/webhook.notifier";
import type { HistoryStore } from "../history/store";
import type { RateFetcher } from "../rates/juhe.client";
import type { AlertPayload, AnomalyKind, CurrencyPair, FetchResult } from "../../types/rate";
import { buildAlertPayload } from "./alert.payload";
import { classifyObservation, type EvaluatorConfig } from "./evaluator";
import type { MonitoredPair } from "./monitor.config";
import { pairKey } from "./pair";

interface MonitorLogger {
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export interface PairRunResult {
  pairKey: string;
  name: string;
  kind: AnomalyKind;
  rate: number | null;
  baselineUpdated: boolean;
  alert: AlertPayload | null;
  delivery: DeliveryReport | null;
}

export interface MonitorRunSummary {
  startedAt: string;
  finishedAt: string;
  results: PairRunResult[];
  alerts: number;
  deliveryFailures: number;
}

export interface RunMonitorOptions {
  pairs: MonitoredPair[];
  fetcher: RateFetcher;
  store: HistoryStore;
  notifier: AlertNotifier;
  evaluator: EvaluatorConfig;
  logger: MonitorLogger;
  now?: () => Date;
}

async function fetchSafely(
  fetcher: RateFetcher,
  pair: CurrencyPair,
  now: () => Date,
): Promise<FetchResult> {
  try {
    return await fetcher.fetchRate(pair);
  } catch (error) {
    return {
      success: false,
      reason: error instanceof Error ? error.message : String(error),
      observedAt: now().toISOString(),
    };
  }
}

/**
 * One scheduled pass over every monitored pair, in order. Each pair's
 * get/classify/put runs to completion before the next pair starts.
 * HistoryStoreError is not caught here and ends the run.
 *
 * Overlapping invocations are expected to be prevented by the scheduler.
 */
export async function runMonitor(options: RunMonitorOptions): Promise<MonitorRunSummary> {
  const now = options.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const results: PairRunResult[] = [];

  for (const monitored of options.pairs) {
    const { pair, name } = monitored;
    const key = pairKey(pair);

    const fetched = await fetchSafely(options.fetcher, pair, now);
    const prior = await options.store.get(pair);
    const { verdict, entryToPersist } = classifyObservation(
      pair,
      fetched,
      prior,
      options.evaluator,
    );

    if (entryToPersist) {
      await options.store.put(entryToPersist);
    }

    const alert = buildAlertPayload(verdict);
    let delivery: DeliveryReport | null = null;
    if (alert) {
      options.logger.warn(
        {
          pair: key,
          kind: verdict.kind,
          previousRate: verdict.details.previousRate,
          newRate: verdict.details.newRate,
          percentChange: verdict.details.percentChange,
          breached: verdict.details.breached,
          reason: verdict.details.reason,
        },
        "rate anomaly detected",
      );
      delivery = await options.notifier.send(alert);
    } else {
      options.logger.info(
        {
          pair: key,
          rate: verdict.details.newRate,
          percentChange: verdict.details.percentChange,
          seeded: prior === null,
        },
        "rate accepted",
      );
    }

    results.push({
      pairKey: key,
      name,
      kind: verdict.kind,
      rate: verdict.details.newRate,
      baselineUpdated: entryToPersist !== null,
      alert,
      delivery,
    });
  }

  const summary: MonitorRunSummary = {
    startedAt,
    finishedAt: now().toISOString(),
    results,
    alerts: results.filter((result) => result.alert !== null).length,
    deliveryFailures: results.reduce(
      (total, result) => total + (result.delivery?.failures.length ?? 0),
      0,
    ),
  };

  options.logger.info(
    {
      pairs: results.length,
      alerts: summary.alerts,
      deliveryFailures: summary.deliveryFailures,
    },
    "monitor run complete",
  );
  return summary;
}
