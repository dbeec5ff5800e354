import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../../config";
import type { CurrencyPair, PlausibleRange } from "../../types/rate";
import {
  DEFAULT_CHANGE_THRESHOLD_PERCENT,
  DEFAULT_PLAUSIBLE_RANGE,
  type EvaluatorConfig,
} from "./evaluator";
import { isCurrencyCode, pairKey } from "./pair";

export interface MonitoredPair {
  pair: CurrencyPair;
  name: string;
}

export interface MonitorConfig {
  pairs: MonitoredPair[];
  evaluator: EvaluatorConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function asCode(value: unknown, field: string): string {
  const code = String(value ?? "").trim().toUpperCase();
  if (!isCurrencyCode(code)) {
    throw new ConfigError("MONITOR_CONFIG_INVALID", `${field} must be a three-letter currency code`);
  }
  return code;
}

function asPositiveNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError("MONITOR_CONFIG_INVALID", `${field} must be a positive number`);
  }
  return value;
}

function parseRange(value: unknown, field: string): PlausibleRange {
  if (!isRecord(value)) {
    throw new ConfigError("MONITOR_CONFIG_INVALID", `${field} must be an object with min and max`);
  }

  const min = asPositiveNumber(value.min, `${field}.min`);
  const max = asPositiveNumber(value.max, `${field}.max`);
  if (min >= max) {
    throw new ConfigError("MONITOR_CONFIG_INVALID", `${field}.min must be lower than ${field}.max`);
  }
  return { min, max };
}

export function parseMonitorConfig(
  raw: unknown,
  overrides: { changeThresholdPercent?: number | null } = {},
): MonitorConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("MONITOR_CONFIG_INVALID", "monitor config must be a JSON object");
  }

  const changeThresholdPercent = overrides.changeThresholdPercent
    ?? (raw.changeThresholdPercent === undefined
      ? DEFAULT_CHANGE_THRESHOLD_PERCENT
      : asPositiveNumber(raw.changeThresholdPercent, "changeThresholdPercent"));

  const defaultRange = raw.defaultRange === undefined
    ? { ...DEFAULT_PLAUSIBLE_RANGE }
    : parseRange(raw.defaultRange, "defaultRange");

  if (!Array.isArray(raw.pairs) || raw.pairs.length === 0) {
    throw new ConfigError("MONITOR_CONFIG_INVALID", "pairs must be a non-empty array");
  }

  const pairs: MonitoredPair[] = [];
  const pairRanges: Record<string, PlausibleRange> = {};
  raw.pairs.forEach((item: unknown, index: number) => {
    const field = `pairs[${index}]`;
    if (!isRecord(item)) {
      throw new ConfigError("MONITOR_CONFIG_INVALID", `${field} must be an object`);
    }

    const pair = {
      base: asCode(item.base, `${field}.base`),
      quote: asCode(item.quote, `${field}.quote`),
    };
    const key = pairKey(pair);
    if (pair.base === pair.quote) {
      throw new ConfigError("MONITOR_CONFIG_INVALID", `${field} must name two different currencies`);
    }
    if (pairs.some((existing) => pairKey(existing.pair) === key)) {
      throw new ConfigError("MONITOR_CONFIG_INVALID", `${field} duplicates pair ${key}`);
    }

    if (item.range !== undefined) {
      pairRanges[key] = parseRange(item.range, `${field}.range`);
    }
    pairs.push({
      pair,
      name: String(item.name ?? key).trim() || key,
    });
  });

  return {
    pairs,
    evaluator: {
      changeThresholdPercent,
      defaultRange,
      pairRanges,
    },
  };
}

export function loadMonitorConfig(
  configPath: string,
  overrides: { changeThresholdPercent?: number | null } = {},
): MonitorConfig {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = fs.readFileSync(resolved, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      "MONITOR_CONFIG_UNREADABLE",
      `Unable to read monitor config at ${resolved}: ${message}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      "MONITOR_CONFIG_INVALID",
      `Monitor config at ${resolved} is not valid JSON: ${message}`,
    );
  }

  return parseMonitorConfig(parsed, overrides);
}
