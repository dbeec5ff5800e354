import assert from "node:assert/strict";
import test from "node:test";
import { buildAlertPayload, formatPercentChange } from "../../src/services/monitor/alert.payload";
import { classifyObservation, type EvaluatorConfig } from "../../src/services/monitor/evaluator";

const PHP = { base: "CNY", quote: "PHP" };
const OBSERVED_AT = "2026-03-02T00:30:00.000Z";

const config: EvaluatorConfig = {
  changeThresholdPercent: 5,
  defaultRange: { min: 0.01, max: 10000 },
  pairRanges: {},
};

test("excessive movement payload carries rates, percent change and threshold", () => {
  const { verdict } = classifyObservation(
    PHP,
    { success: true, rate: 8.34, observedAt: OBSERVED_AT },
    { pair: PHP, rate: 7.85, observedAt: "2026-03-01T00:30:00.000Z" },
    config,
  );

  assert.deepEqual(buildAlertPayload(verdict), {
    pair: "CNY/PHP",
    pairKey: "CNY_PHP",
    kind: "ExcessiveMovement",
    previousRate: 7.85,
    newRate: 8.34,
    percentChange: "6.24%",
    direction: "up",
    thresholdPercent: 5,
    timestamp: OBSERVED_AT,
    reason: null,
  });
});

test("fetch failure payload uses placeholders for missing values", () => {
  const { verdict } = classifyObservation(
    PHP,
    { success: false, reason: "Exchange API responded with status 502", observedAt: OBSERVED_AT },
    null,
    config,
  );

  assert.deepEqual(buildAlertPayload(verdict), {
    pair: "CNY/PHP",
    pairKey: "CNY_PHP",
    kind: "FetchFailed",
    previousRate: "none",
    newRate: "unavailable",
    percentChange: "n/a",
    direction: null,
    thresholdPercent: 5,
    timestamp: OBSERVED_AT,
    reason: "Exchange API responded with status 502",
  });
});

test("non-positive payload reports the rejected rate", () => {
  const { verdict } = classifyObservation(
    PHP,
    { success: true, rate: 0, observedAt: OBSERVED_AT },
    { pair: PHP, rate: 7.85, observedAt: "2026-03-01T00:30:00.000Z" },
    config,
  );
  const payload = buildAlertPayload(verdict);

  assert.equal(payload?.kind, "NonPositiveRate");
  assert.equal(payload?.previousRate, 7.85);
  assert.equal(payload?.newRate, 0);
  assert.equal(payload?.percentChange, "n/a");
});

test("a falling rate is reported with its direction", () => {
  const { verdict } = classifyObservation(
    PHP,
    { success: true, rate: 7.4, observedAt: OBSERVED_AT },
    { pair: PHP, rate: 7.85, observedAt: "2026-03-01T00:30:00.000Z" },
    config,
  );
  const payload = buildAlertPayload(verdict);

  assert.equal(payload?.kind, "ExcessiveMovement");
  assert.equal(payload?.percentChange, "5.73%");
  assert.equal(payload?.direction, "down");
});

test("Normal verdicts produce no payload", () => {
  const { verdict } = classifyObservation(
    PHP,
    { success: true, rate: 7.85, observedAt: OBSERVED_AT },
    null,
    config,
  );

  assert.equal(buildAlertPayload(verdict), null);
});

test("formatPercentChange rounds to two decimals", () => {
  assert.equal(formatPercentChange(6.242038), "6.24%");
  assert.equal(formatPercentChange(5), "5.00%");
  assert.equal(formatPercentChange(null), "n/a");
});
