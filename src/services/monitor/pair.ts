import type { CurrencyPair } from "../../types/rate";

const CURRENCY_CODE = /^[A-Z]{3}$/;

export class PairFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PairFormatError";
  }
}

export function isCurrencyCode(value: string): boolean {
  return CURRENCY_CODE.test(value);
}

export function pairKey(pair: CurrencyPair): string {
  return `${pair.base}_${pair.quote}`;
}

export function pairLabel(pair: CurrencyPair): string {
  return `${pair.base}/${pair.quote}`;
}

/** Accepts `CNY_PHP`, `CNY/PHP` or `cny-php`. */
export function parsePair(raw: string): CurrencyPair {
  const parts = raw.trim().toUpperCase().split(/[_/-]/);
  if (parts.length !== 2) {
    throw new PairFormatError(`Invalid currency pair: ${JSON.stringify(raw)}`);
  }

  const [base, quote] = parts;
  if (!isCurrencyCode(base) || !isCurrencyCode(quote)) {
    throw new PairFormatError(
      `Currency pair codes must be three letters: ${JSON.stringify(raw)}`,
    );
  }
  if (base === quote) {
    throw new PairFormatError(`Currency pair must name two currencies: ${JSON.stringify(raw)}`);
  }

  return { base, quote };
}
