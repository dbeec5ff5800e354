export type CliCommand =
  | { name: "run" }
  | { name: "check" }
  | { name: "serve" }
  | { name: "history-list" }
  | { name: "history-prune"; days: number | null }
  | { name: "help" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = [
  "Usage: fx-rate-sentinel <command>",
  "",
  "Commands:",
  "  run                      fetch, classify and record every monitored pair (default)",
  "  check                    verify configuration, rate history and credentials",
  "  serve                    start the read-only status API",
  "  history list             print the stored baselines as JSON",
  "  history prune [--days N] remove baselines older than N days",
].join("\n");

function parseDays(raw: string | undefined): number {
  const days = Number.parseInt(raw ?? "", 10);
  if (!Number.isInteger(days) || days <= 0 || String(days) !== (raw ?? "").trim()) {
    throw new CliUsageError(`--days must be a positive integer (received: ${raw ?? "nothing"})`);
  }
  return days;
}

/** Parses arguments after the script name, e.g. `process.argv.slice(2)`. */
export function parseCliArgs(args: string[]): CliCommand {
  const [command = "run", ...rest] = args;

  if ((command === "run" || command === "check" || command === "serve") && rest.length > 0) {
    throw new CliUsageError(`${command} takes no arguments`);
  }

  switch (command) {
    case "run":
      return { name: "run" };
    case "check":
      return { name: "check" };
    case "serve":
      return { name: "serve" };
    case "help":
    case "--help":
    case "-h":
      return { name: "help" };
    case "history": {
      const [sub, ...flags] = rest;
      if (sub === "list" && flags.length === 0) {
        return { name: "history-list" };
      }
      if (sub === "prune") {
        if (flags.length === 0) {
          return { name: "history-prune", days: null };
        }
        if (flags.length === 2 && flags[0] === "--days") {
          return { name: "history-prune", days: parseDays(flags[1]) };
        }
        if (flags.length === 1 && flags[0].startsWith("--days=")) {
          return { name: "history-prune", days: parseDays(flags[0].slice("--days=".length)) };
        }
      }
      throw new CliUsageError("history expects `list` or `prune [--days N]`");
    }
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}

export function pruneCutoff(now: Date, days: number): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}
