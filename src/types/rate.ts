export interface CurrencyPair {
  base: string;
  quote: string;
}

export interface PlausibleRange {
  min: number;
  max: number;
}

export interface RateObservation {
  pair: CurrencyPair;
  rate: number | null;
  observedAt: string;
}

/** A stored baseline: an accepted observation, so the rate is always present. */
export interface HistoryEntry extends RateObservation {
  rate: number;
}

export type FetchResult =
  | {
    success: true;
    rate: number | null;
    observedAt: string;
    sourceUpdatedAt?: string | null;
  }
  | {
    success: false;
    reason: string;
    observedAt: string;
  };

export const ANOMALY_KINDS = [
  "Normal",
  "EmptyOrMissingData",
  "NonPositiveRate",
  "OutOfPlausibleRange",
  "ExcessiveMovement",
  "FetchFailed",
] as const;

export type AnomalyKind = (typeof ANOMALY_KINDS)[number];

export type BreachedLimit =
  | "change_threshold"
  | "plausible_min"
  | "plausible_max"
  | "non_positive"
  | "missing_rate"
  | "fetch_failed";

export type MovementDirection = "up" | "down" | "flat";

export interface VerdictDetails {
  previousRate: number | null;
  newRate: number | null;
  percentChange: number | null;
  direction: MovementDirection | null;
  thresholdPercent: number;
  plausibleRange: PlausibleRange;
  breached: BreachedLimit | null;
  reason: string | null;
  sourceUpdatedAt: string | null;
}

export interface AnomalyVerdict {
  kind: AnomalyKind;
  pair: CurrencyPair;
  observedAt: string;
  details: VerdictDetails;
}

export interface AlertPayload {
  pair: string;
  pairKey: string;
  kind: Exclude<AnomalyKind, "Normal">;
  previousRate: number | "none";
  newRate: number | "unavailable";
  percentChange: string;
  direction: MovementDirection | null;
  thresholdPercent: number;
  timestamp: string;
  reason: string | null;
}
