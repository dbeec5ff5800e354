import assert from "node:assert/strict";
import test from "node:test";
import {
  classifyObservation,
  defaultEvaluatorConfig,
  percentChange,
  resolvePlausibleRange,
  type EvaluatorConfig,
} from "../../src/services/monitor/evaluator";
import type { FetchResult, HistoryEntry } from "../../src/types/rate";

const PHP = { base: "CNY", quote: "PHP" };
const OBSERVED_AT = "2026-03-02T00:30:00.000Z";
const PRIOR_AT = "2026-03-01T00:30:00.000Z";

function testConfig(overrides: Partial<EvaluatorConfig> = {}): EvaluatorConfig {
  return {
    changeThresholdPercent: 5,
    defaultRange: { min: 0.01, max: 10000 },
    pairRanges: { CNY_PHP: { min: 5, max: 12 } },
    ...overrides,
  };
}

function fetched(rate: number | null): FetchResult {
  return { success: true, rate, observedAt: OBSERVED_AT, sourceUpdatedAt: "2026-03-02 08:00:00" };
}

function prior(rate: number): HistoryEntry {
  return { pair: PHP, rate, observedAt: PRIOR_AT };
}

test("first observation seeds the baseline without alerting", () => {
  const result = classifyObservation(PHP, fetched(7.85), null, testConfig());

  assert.equal(result.verdict.kind, "Normal");
  assert.equal(result.verdict.details.previousRate, null);
  assert.equal(result.verdict.details.percentChange, null);
  assert.deepEqual(result.entryToPersist, { pair: PHP, rate: 7.85, observedAt: OBSERVED_AT });
});

test("movement below the threshold is Normal and moves the baseline", () => {
  const result = classifyObservation(PHP, fetched(8.0), prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "Normal");
  assert.equal(result.verdict.details.direction, "up");
  assert.equal(result.verdict.details.breached, null);
  assert.equal(result.entryToPersist?.rate, 8.0);
});

test("7.85 to 8.34 is ExcessiveMovement and still becomes the new baseline", () => {
  const result = classifyObservation(PHP, fetched(8.34), prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "ExcessiveMovement");
  assert.equal(result.verdict.details.previousRate, 7.85);
  assert.equal(result.verdict.details.newRate, 8.34);
  assert.equal(result.verdict.details.percentChange?.toFixed(2), "6.24");
  assert.equal(result.verdict.details.breached, "change_threshold");
  assert.equal(result.verdict.details.thresholdPercent, 5);
  assert.deepEqual(result.entryToPersist, { pair: PHP, rate: 8.34, observedAt: OBSERVED_AT });
});

test("a downward move uses the absolute change", () => {
  const result = classifyObservation(PHP, fetched(7.4), prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "ExcessiveMovement");
  assert.equal(result.verdict.details.direction, "down");
  assert.equal(result.verdict.details.percentChange?.toFixed(2), "5.73");
});

test("a change exactly at the threshold alerts", () => {
  const config = testConfig({ pairRanges: {}, changeThresholdPercent: 5 });
  const result = classifyObservation(
    PHP,
    fetched(105),
    { pair: PHP, rate: 100, observedAt: PRIOR_AT },
    config,
  );

  assert.equal(result.verdict.details.percentChange, 5);
  assert.equal(result.verdict.kind, "ExcessiveMovement");
});

test("zero rate is NonPositiveRate and keeps the previous baseline", () => {
  const result = classifyObservation(PHP, fetched(0), prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "NonPositiveRate");
  assert.equal(result.verdict.details.previousRate, 7.85);
  assert.equal(result.verdict.details.newRate, 0);
  assert.equal(result.verdict.details.breached, "non_positive");
  assert.equal(result.entryToPersist, null);
});

test("negative rate is NonPositiveRate even without a baseline", () => {
  const result = classifyObservation(PHP, fetched(-1.5), null, testConfig());

  assert.equal(result.verdict.kind, "NonPositiveRate");
  assert.equal(result.entryToPersist, null);
});

test("missing rate is EmptyOrMissingData", () => {
  const result = classifyObservation(PHP, fetched(null), prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "EmptyOrMissingData");
  assert.equal(result.verdict.details.newRate, null);
  assert.equal(result.verdict.details.breached, "missing_rate");
  assert.equal(result.entryToPersist, null);
});

test("NaN rate is EmptyOrMissingData", () => {
  const result = classifyObservation(PHP, fetched(Number.NaN), null, testConfig());

  assert.equal(result.verdict.kind, "EmptyOrMissingData");
  assert.equal(result.entryToPersist, null);
});

test("a payload without a rate field is EmptyOrMissingData", () => {
  const payload: FetchResult = JSON.parse(`{"success":true,"observedAt":"${OBSERVED_AT}"}`);

  const result = classifyObservation(PHP, payload, prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "EmptyOrMissingData");
  assert.equal(result.verdict.details.newRate, null);
  assert.equal(result.entryToPersist, null);
});

test("a string rate is EmptyOrMissingData and never reaches history", () => {
  const payload: FetchResult = JSON.parse(
    `{"success":true,"rate":"7.85","observedAt":"${OBSERVED_AT}"}`,
  );

  const result = classifyObservation(PHP, payload, prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "EmptyOrMissingData");
  assert.equal(result.verdict.details.breached, "missing_rate");
  assert.equal(result.entryToPersist, null);
});

test("rates outside the pair range are rejected without touching history", () => {
  const low = classifyObservation(PHP, fetched(0.5), prior(7.85), testConfig());
  const high = classifyObservation(PHP, fetched(78.5), prior(7.85), testConfig());
  const infinite = classifyObservation(PHP, fetched(Number.POSITIVE_INFINITY), null, testConfig());

  assert.equal(low.verdict.kind, "OutOfPlausibleRange");
  assert.equal(low.verdict.details.breached, "plausible_min");
  assert.equal(low.entryToPersist, null);
  assert.equal(high.verdict.kind, "OutOfPlausibleRange");
  assert.equal(high.verdict.details.breached, "plausible_max");
  assert.equal(high.entryToPersist, null);
  assert.equal(infinite.verdict.kind, "OutOfPlausibleRange");
  assert.deepEqual(high.verdict.details.plausibleRange, { min: 5, max: 12 });
});

test("out-of-range is checked before movement", () => {
  const result = classifyObservation(PHP, fetched(13), prior(7.85), testConfig());

  assert.equal(result.verdict.kind, "OutOfPlausibleRange");
  assert.equal(result.verdict.details.percentChange, null);
});

test("fetch failure keeps history and carries the reason", () => {
  const failure: FetchResult = { success: false, reason: "timeout", observedAt: OBSERVED_AT };
  const withPrior = classifyObservation(PHP, failure, prior(7.85), testConfig());
  const withoutPrior = classifyObservation(PHP, failure, null, testConfig());

  assert.equal(withPrior.verdict.kind, "FetchFailed");
  assert.equal(withPrior.verdict.details.reason, "timeout");
  assert.equal(withPrior.verdict.details.previousRate, 7.85);
  assert.equal(withPrior.entryToPersist, null);
  assert.equal(withoutPrior.verdict.kind, "FetchFailed");
  assert.equal(withoutPrior.entryToPersist, null);
});

test("an unchanged rate stays Normal on consecutive runs", () => {
  const config = testConfig();
  const first = classifyObservation(PHP, fetched(7.85), null, config);
  assert.ok(first.entryToPersist);
  const second = classifyObservation(PHP, fetched(7.85), first.entryToPersist, config);
  assert.ok(second.entryToPersist);
  const third = classifyObservation(PHP, fetched(7.85), second.entryToPersist, config);

  assert.equal(first.verdict.kind, "Normal");
  assert.equal(second.verdict.kind, "Normal");
  assert.equal(second.verdict.details.percentChange, 0);
  assert.equal(second.verdict.details.direction, "flat");
  assert.equal(third.verdict.kind, "Normal");
});

test("a settled large move alerts once and then goes quiet", () => {
  const config = testConfig();
  const moved = classifyObservation(PHP, fetched(8.34), prior(7.85), config);
  assert.ok(moved.entryToPersist);
  const settled = classifyObservation(PHP, fetched(8.34), moved.entryToPersist, config);

  assert.equal(moved.verdict.kind, "ExcessiveMovement");
  assert.equal(settled.verdict.kind, "Normal");
});

test("pairs without a configured range fall back to the default range", () => {
  const config = testConfig();
  const myr = { base: "CNY", quote: "MYR" };

  assert.deepEqual(resolvePlausibleRange(config, myr), { min: 0.01, max: 10000 });
  assert.deepEqual(resolvePlausibleRange(defaultEvaluatorConfig(), PHP), { min: 0.01, max: 10000 });
  assert.equal(defaultEvaluatorConfig().changeThresholdPercent, 5);
});

test("percentChange is symmetric in sign", () => {
  assert.equal(percentChange(100, 110), 10);
  assert.equal(percentChange(100, 90), 10);
});
