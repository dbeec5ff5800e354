import type { FastifyInstance } from "fastify";
import { getConfig, type AppConfig } from "../config";
import { createHistoryStore } from "../services/history/factory";
import type { HistoryStore } from "../services/history/store";
import { pairKey, pairLabel, parsePair, PairFormatError } from "../services/monitor/pair";
import type { HistoryEntry } from "../types/rate";
import { errorEnvelope, okEnvelope } from "../utils/http-envelope";

export interface HistoryRouteOptions {
  config?: AppConfig;
  store?: HistoryStore;
}

function toApiEntry(entry: HistoryEntry): Record<string, unknown> {
  return {
    pair: pairLabel(entry.pair),
    pair_key: pairKey(entry.pair),
    base: entry.pair.base,
    quote: entry.pair.quote,
    rate: entry.rate,
    observed_at: entry.observedAt,
  };
}

export async function historyRoutes(app: FastifyInstance, options: HistoryRouteOptions = {}) {
  let store = options.store;
  if (!store) {
    const handle = createHistoryStore(options.config ?? getConfig(), app.log);
    app.addHook("onClose", async () => {
      await handle.close();
    });
    store = handle.store;
  }
  const historyStore = store;

  app.get("/history", async () => {
    const entries = await historyStore.list();
    return okEnvelope(entries.map(toApiEntry), { count: entries.length });
  });

  app.get<{ Params: { pair: string } }>("/history/:pair", async (request, reply) => {
    let key: string;
    let entry: HistoryEntry | null;
    try {
      const pair = parsePair(request.params.pair);
      key = pairKey(pair);
      entry = await historyStore.get(pair);
    } catch (error) {
      if (error instanceof PairFormatError) {
        return reply.code(400).send(errorEnvelope("VALIDATION_ERROR", error.message));
      }
      throw error;
    }

    if (!entry) {
      return reply
        .code(404)
        .send(errorEnvelope("HISTORY_NOT_FOUND", `No baseline stored for ${key}`));
    }

    return okEnvelope(toApiEntry(entry));
  });
}
