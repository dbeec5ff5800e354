import type { CurrencyPair, FetchResult } from "../../types/rate";
import { pairLabel } from "../monitor/pair";

export interface RateFetcher {
  fetchRate(pair: CurrencyPair): Promise<FetchResult>;
}

export interface JuheRateClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function parseRateValue(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isNaN(raw) ? null : raw;
  }
  if (typeof raw !== "string" || !raw.trim()) {
    return null;
  }

  const value = Number(raw.trim());
  return Number.isNaN(value) ? null : value;
}

/**
 * Maps a Juhe `onebox/exchange/currency` response body onto the monitor's
 * inbound contract. `result[0].exchange` is quote units per one base unit.
 */
export function parseJuheResponse(payload: unknown, observedAt: string): FetchResult {
  if (!isRecord(payload)) {
    return { success: false, reason: "Exchange API returned a non-object body", observedAt };
  }

  const errorCode = Number(payload.error_code);
  if (errorCode !== 0) {
    const reason = String(payload.reason ?? "").trim() || "unknown error";
    return {
      success: false,
      reason: `Exchange API error ${String(payload.error_code ?? "?")}: ${reason}`,
      observedAt,
    };
  }

  const results = Array.isArray(payload.result) ? payload.result : [];
  const first: unknown = results[0];
  if (!isRecord(first)) {
    return { success: true, rate: null, observedAt, sourceUpdatedAt: null };
  }

  const updateTime = String(first.updateTime ?? "").trim();
  return {
    success: true,
    rate: parseRateValue(first.exchange),
    observedAt,
    sourceUpdatedAt: updateTime || null,
  };
}

export class JuheRateClient implements RateFetcher {
  private readonly fetchImpl: typeof fetch;

  private readonly now: () => Date;

  constructor(private readonly options: JuheRateClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async fetchRate(pair: CurrencyPair): Promise<FetchResult> {
    const observedAt = this.now().toISOString();
    if (!this.options.apiKey) {
      return { success: false, reason: "EXCHANGE_API_KEY is not configured", observedAt };
    }

    const url = new URL(this.options.baseUrl);
    url.searchParams.set("key", this.options.apiKey);
    url.searchParams.set("from", pair.base);
    url.searchParams.set("to", pair.quote);
    url.searchParams.set("version", "2");

    let ok: boolean;
    let status: number;
    let text: string;
    try {
      // The timeout signal also covers reading the body.
      const response = await this.fetchImpl(url.toString(), {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(Math.max(500, this.options.timeoutMs)),
      });
      ok = response.ok;
      status = response.status;
      text = ok ? await response.text() : "";
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        reason: `Exchange API request for ${pairLabel(pair)} failed: ${message}`,
        observedAt,
      };
    }

    if (!ok) {
      return {
        success: false,
        reason: `Exchange API responded with status ${status}`,
        observedAt,
      };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      return { success: false, reason: "Exchange API returned a non-JSON body", observedAt };
    }

    return parseJuheResponse(payload, observedAt);
  }
}
