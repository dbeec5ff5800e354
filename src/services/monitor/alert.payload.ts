import type { AlertPayload, AnomalyVerdict } from "../../types/rate";
import { pairKey, pairLabel } from "./pair";

export function formatPercentChange(value: number | null): string {
  if (value === null || !Number.isFinite(value)) {
    return "n/a";
  }
  return `${value.toFixed(2)}%`;
}

/** Returns `null` for `Normal` verdicts, which are never delivered. */
export function buildAlertPayload(verdict: AnomalyVerdict): AlertPayload | null {
  if (verdict.kind === "Normal") {
    return null;
  }

  const { details } = verdict;
  const newRate = details.newRate !== null && Number.isFinite(details.newRate)
    ? details.newRate
    : "unavailable";

  return {
    pair: pairLabel(verdict.pair),
    pairKey: pairKey(verdict.pair),
    kind: verdict.kind,
    previousRate: details.previousRate ?? "none",
    newRate,
    percentChange: formatPercentChange(details.percentChange),
    direction: details.direction,
    thresholdPercent: details.thresholdPercent,
    timestamp: verdict.observedAt,
    reason: details.reason,
  };
}
