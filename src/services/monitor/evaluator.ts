import type {
  AnomalyKind,
  AnomalyVerdict,
  BreachedLimit,
  CurrencyPair,
  FetchResult,
  HistoryEntry,
  MovementDirection,
  PlausibleRange,
  VerdictDetails,
} from "../../types/rate";
import { pairKey } from "./pair";

export const DEFAULT_CHANGE_THRESHOLD_PERCENT = 5.0;
export const DEFAULT_PLAUSIBLE_RANGE: PlausibleRange = { min: 0.01, max: 10000 };

export interface EvaluatorConfig {
  changeThresholdPercent: number;
  defaultRange: PlausibleRange;
  pairRanges: Record<string, PlausibleRange>;
}

export interface ClassificationResult {
  verdict: AnomalyVerdict;
  /** `null` leaves the stored baseline untouched. */
  entryToPersist: HistoryEntry | null;
}

export function defaultEvaluatorConfig(): EvaluatorConfig {
  return {
    changeThresholdPercent: DEFAULT_CHANGE_THRESHOLD_PERCENT,
    defaultRange: { ...DEFAULT_PLAUSIBLE_RANGE },
    pairRanges: {},
  };
}

export function resolvePlausibleRange(
  config: EvaluatorConfig,
  pair: CurrencyPair,
): PlausibleRange {
  return config.pairRanges[pairKey(pair)] ?? config.defaultRange;
}

export function percentChange(previousRate: number, newRate: number): number {
  return (Math.abs(newRate - previousRate) / previousRate) * 100;
}

function movementDirection(previousRate: number, newRate: number): MovementDirection {
  if (newRate > previousRate) {
    return "up";
  }
  if (newRate < previousRate) {
    return "down";
  }
  return "flat";
}

function usablePrior(prior: HistoryEntry | null): HistoryEntry | null {
  if (!prior || !Number.isFinite(prior.rate) || prior.rate <= 0) {
    return null;
  }
  return prior;
}

/**
 * Classifies one fetched observation against the stored baseline for the same
 * pair. Rules are checked in priority order and the first match wins.
 */
export function classifyObservation(
  pair: CurrencyPair,
  fetched: FetchResult,
  prior: HistoryEntry | null,
  config: EvaluatorConfig,
): ClassificationResult {
  const baseline = usablePrior(prior);
  const range = resolvePlausibleRange(config, pair);
  const details: VerdictDetails = {
    previousRate: baseline?.rate ?? null,
    newRate: null,
    percentChange: null,
    direction: null,
    thresholdPercent: config.changeThresholdPercent,
    plausibleRange: { ...range },
    breached: null,
    reason: null,
    sourceUpdatedAt: null,
  };

  const reject = (kind: AnomalyKind, breached: BreachedLimit): ClassificationResult => ({
    verdict: {
      kind,
      pair,
      observedAt: fetched.observedAt,
      details: { ...details, breached },
    },
    entryToPersist: null,
  });

  if (!fetched.success) {
    details.reason = fetched.reason;
    return reject("FetchFailed", "fetch_failed");
  }

  details.sourceUpdatedAt = fetched.sourceUpdatedAt ?? null;
  // The inbound shape may come from a cache or a fixture; anything but a number is missing.
  const rate: unknown = fetched.rate;
  if (typeof rate !== "number" || Number.isNaN(rate)) {
    return reject("EmptyOrMissingData", "missing_rate");
  }

  details.newRate = rate;
  if (rate <= 0) {
    return reject("NonPositiveRate", "non_positive");
  }
  if (rate < range.min) {
    return reject("OutOfPlausibleRange", "plausible_min");
  }
  if (rate > range.max) {
    return reject("OutOfPlausibleRange", "plausible_max");
  }

  const entryToPersist: HistoryEntry = {
    pair,
    rate,
    observedAt: fetched.observedAt,
  };

  let kind: AnomalyKind = "Normal";
  if (baseline) {
    const change = percentChange(baseline.rate, rate);
    details.percentChange = change;
    details.direction = movementDirection(baseline.rate, rate);
    if (change >= config.changeThresholdPercent) {
      kind = "ExcessiveMovement";
      details.breached = "change_threshold";
    }
  }

  return {
    verdict: {
      kind,
      pair,
      observedAt: fetched.observedAt,
      details,
    },
    entryToPersist,
  };
}
