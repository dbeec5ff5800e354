import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { HistoryEntry, CurrencyPair } from "../../types/rate";
import { pairKey, parsePair, PairFormatError } from "../monitor/pair";

export type HistoryStoreErrorCode =
  | "HISTORY_READ_FAILED"
  | "HISTORY_WRITE_FAILED"
  | "HISTORY_CORRUPT";

/** Persistence failure. Fatal to a run: the baseline can no longer be trusted. */
export class HistoryStoreError extends Error {
  constructor(
    public readonly code: HistoryStoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HistoryStoreError";
  }
}

export interface HistoryStore {
  get(pair: CurrencyPair): Promise<HistoryEntry | null>;
  put(entry: HistoryEntry): Promise<void>;
  list(): Promise<HistoryEntry[]>;
  /** Removes entries observed before the cutoff; returns how many were removed. */
  prune(olderThan: Date): Promise<number>;
}

function copyEntry(entry: HistoryEntry): HistoryEntry {
  return {
    pair: { base: entry.pair.base, quote: entry.pair.quote },
    rate: entry.rate,
    observedAt: entry.observedAt,
  };
}

function sortEntries(entries: HistoryEntry[]): HistoryEntry[] {
  return entries.sort((a, b) => pairKey(a.pair).localeCompare(pairKey(b.pair), "en"));
}

function isStale(entry: HistoryEntry, olderThan: Date): boolean {
  const observedMs = Date.parse(entry.observedAt);
  // Entries with an unreadable timestamp are kept.
  return Number.isFinite(observedMs) && observedMs < olderThan.getTime();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export class MemoryHistoryStore implements HistoryStore {
  private readonly entries = new Map<string, HistoryEntry>();

  constructor(seed: HistoryEntry[] = []) {
    for (const entry of seed) {
      this.entries.set(pairKey(entry.pair), copyEntry(entry));
    }
  }

  async get(pair: CurrencyPair): Promise<HistoryEntry | null> {
    const entry = this.entries.get(pairKey(pair));
    return entry ? copyEntry(entry) : null;
  }

  async put(entry: HistoryEntry): Promise<void> {
    this.entries.set(pairKey(entry.pair), copyEntry(entry));
  }

  async list(): Promise<HistoryEntry[]> {
    return sortEntries([...this.entries.values()].map(copyEntry));
  }

  async prune(olderThan: Date): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries.entries()) {
      if (isStale(entry, olderThan)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}

/**
 * JSON snapshot on local disk: `{ "CNY_PHP": { "rate": 7.85, "observedAt": "..." } }`.
 *
 * Every write replaces the whole file through a temporary sibling and a rename,
 * so a reader sees either the previous snapshot or the new one.
 */
export class FileHistoryStore implements HistoryStore {
  constructor(private readonly filePath: string) {}

  async get(pair: CurrencyPair): Promise<HistoryEntry | null> {
    const snapshot = await this.readSnapshot();
    const entry = snapshot.get(pairKey(pair));
    return entry ?? null;
  }

  async put(entry: HistoryEntry): Promise<void> {
    const snapshot = await this.readSnapshot();
    snapshot.set(pairKey(entry.pair), copyEntry(entry));
    await this.writeSnapshot(snapshot);
  }

  async list(): Promise<HistoryEntry[]> {
    const snapshot = await this.readSnapshot();
    return sortEntries([...snapshot.values()]);
  }

  async prune(olderThan: Date): Promise<number> {
    const snapshot = await this.readSnapshot();
    let removed = 0;
    for (const [key, entry] of snapshot.entries()) {
      if (isStale(entry, olderThan)) {
        snapshot.delete(key);
        removed += 1;
      }
    }

    if (removed > 0) {
      await this.writeSnapshot(snapshot);
    }
    return removed;
  }

  private async readSnapshot(): Promise<Map<string, HistoryEntry>> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return new Map();
      }
      throw new HistoryStoreError(
        "HISTORY_READ_FAILED",
        `Unable to read rate history at ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (!text.trim()) {
      return new Map();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new HistoryStoreError(
        "HISTORY_CORRUPT",
        `Rate history at ${this.filePath} is not valid JSON: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    return this.decodeSnapshot(parsed);
  }

  private decodeSnapshot(parsed: unknown): Map<string, HistoryEntry> {
    if (!isRecord(parsed)) {
      throw new HistoryStoreError(
        "HISTORY_CORRUPT",
        `Rate history at ${this.filePath} must be a JSON object keyed by pair`,
      );
    }

    const snapshot = new Map<string, HistoryEntry>();
    for (const [key, value] of Object.entries(parsed)) {
      let pair: CurrencyPair;
      try {
        pair = parsePair(key);
      } catch (error) {
        if (error instanceof PairFormatError) {
          throw new HistoryStoreError(
            "HISTORY_CORRUPT",
            `Rate history at ${this.filePath} has an invalid pair key ${JSON.stringify(key)}`,
            { cause: error },
          );
        }
        throw error;
      }

      if (
        !isRecord(value)
        || typeof value.rate !== "number"
        || !Number.isFinite(value.rate)
        || value.rate <= 0
        || typeof value.observedAt !== "string"
      ) {
        throw new HistoryStoreError(
          "HISTORY_CORRUPT",
          `Rate history entry ${key} at ${this.filePath} must hold a positive rate and an observedAt string`,
        );
      }

      snapshot.set(pairKey(pair), {
        pair,
        rate: value.rate,
        observedAt: value.observedAt,
      });
    }
    return snapshot;
  }

  private async writeSnapshot(snapshot: Map<string, HistoryEntry>): Promise<void> {
    const document: Record<string, { rate: number; observedAt: string }> = {};
    for (const key of [...snapshot.keys()].sort()) {
      const entry = snapshot.get(key);
      if (entry) {
        document[key] = { rate: entry.rate, observedAt: entry.observedAt };
      }
    }
    const text = `${JSON.stringify(document, null, 2)}\n`;

    const directory = path.dirname(this.filePath);
    const tmpPath = path.join(
      directory,
      `.${path.basename(this.filePath)}.${process.pid}.${randomUUID()}.tmp`,
    );

    let tmpCreated = false;
    try {
      await fs.promises.mkdir(directory, { recursive: true });
      const handle = await fs.promises.open(tmpPath, "w");
      tmpCreated = true;
      try {
        await handle.writeFile(text, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tmpPath, this.filePath);
      tmpCreated = false;
      await this.syncDirectory(directory);
    } catch (error) {
      if (tmpCreated) {
        await fs.promises.rm(tmpPath, { force: true });
      }
      throw new HistoryStoreError(
        "HISTORY_WRITE_FAILED",
        `Unable to write rate history at ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /** Flushes the directory entry so the rename survives a crash. */
  private async syncDirectory(directory: string): Promise<void> {
    const handle = await fs.promises.open(directory, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}

export interface HistoryQueryClient {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

function decodeRow(row: unknown): HistoryEntry {
  if (
    !isRecord(row)
    || typeof row.base !== "string"
    || typeof row.quote !== "string"
    || typeof row.rate !== "number"
    || typeof row.observed_at !== "string"
  ) {
    throw new HistoryStoreError("HISTORY_CORRUPT", "rate_history row has an unexpected shape");
  }

  return {
    pair: { base: row.base, quote: row.quote },
    rate: row.rate,
    observedAt: row.observed_at,
  };
}

export class PostgresHistoryStore implements HistoryStore {
  constructor(private readonly pool: HistoryQueryClient) {}

  async get(pair: CurrencyPair): Promise<HistoryEntry | null> {
    const result = await this.run(
      "HISTORY_READ_FAILED",
      `
        SELECT base, quote, rate, observed_at
        FROM rate_history
        WHERE pair_key = $1
      `,
      [pairKey(pair)],
    );

    const row = result.rows[0];
    return row === undefined ? null : decodeRow(row);
  }

  async put(entry: HistoryEntry): Promise<void> {
    await this.run(
      "HISTORY_WRITE_FAILED",
      `
        INSERT INTO rate_history (pair_key, base, quote, rate, observed_at, updated_at)
        VALUES ($1, $2, $3, $4, $5, NOW())
        ON CONFLICT (pair_key) DO UPDATE
        SET rate = EXCLUDED.rate,
            observed_at = EXCLUDED.observed_at,
            updated_at = NOW()
      `,
      [pairKey(entry.pair), entry.pair.base, entry.pair.quote, entry.rate, entry.observedAt],
    );
  }

  async list(): Promise<HistoryEntry[]> {
    const result = await this.run(
      "HISTORY_READ_FAILED",
      `
        SELECT base, quote, rate, observed_at
        FROM rate_history
        ORDER BY pair_key ASC
      `,
      [],
    );
    return result.rows.map(decodeRow);
  }

  async prune(olderThan: Date): Promise<number> {
    const entries = await this.list();
    const staleKeys = entries
      .filter((entry) => isStale(entry, olderThan))
      .map((entry) => pairKey(entry.pair));
    if (staleKeys.length === 0) {
      return 0;
    }

    const result = await this.run(
      "HISTORY_WRITE_FAILED",
      "DELETE FROM rate_history WHERE pair_key = ANY($1)",
      [staleKeys],
    );
    return result.rowCount ?? 0;
  }

  private async run(
    code: HistoryStoreErrorCode,
    text: string,
    values: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }> {
    try {
      return await this.pool.query(text, values);
    } catch (error) {
      throw new HistoryStoreError(code, `rate_history query failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
