import pino, { type Logger } from "pino";
import type { AppConfig } from "./config";

/** Logs go to stderr; stdout is reserved for command output such as `history list`. */
export function buildLogger(config: Pick<AppConfig, "logLevel">): Logger {
  return pino(
    {
      name: "fx-rate-sentinel",
      level: config.logLevel,
    },
    pino.destination(2),
  );
}
