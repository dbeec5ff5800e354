import Fastify from "fastify";
import { getConfig, type AppConfig } from "./config";
import { healthRoutes } from "./routes/health";
import { historyRoutes, type HistoryRouteOptions } from "./routes/history";
import { validateStatusAuth } from "./plugins/status-auth";
import { withRequestMeta } from "./utils/http-envelope";

export interface BuildServerOptions {
  config?: AppConfig;
  history?: HistoryRouteOptions;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? options.history?.config ?? getConfig();
  const app = Fastify({
    logger: options.logger === false ? false : { level: config.logLevel },
  });

  app.addHook("onSend", (request, reply, payload, done) => {
    reply.header("x-request-id", request.id);
    done(null, payload);
  });

  app.addHook("preSerialization", (request, _reply, payload, done) => {
    done(null, withRequestMeta(payload, request.id));
  });

  app.addHook("preHandler", async (request, reply) => {
    const ok = await validateStatusAuth(request, reply, config);
    if (!ok) {
      return reply;
    }
  });

  app.register(healthRoutes, { prefix: "/api/v1" });
  app.register(historyRoutes, {
    prefix: "/api/v1",
    config,
    ...(options.history ?? {}),
  });

  return app;
}
