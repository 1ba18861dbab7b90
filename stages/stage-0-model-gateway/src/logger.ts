import type { RequestLogger } from "./types.js";

export type LogLevel = "silent" | "error" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  info: 2,
  debug: 3,
};

export function isLevelEnabled(current: LogLevel, wanted: LogLevel): boolean {
  return LEVEL_RANK[current] >= LEVEL_RANK[wanted];
}

/** One JSON line per gateway event, tagged with `event`. */
export function createConsoleLogger(level: LogLevel = "info"): RequestLogger {
  const write =
    (event: string, wanted: LogLevel, sink: (line: string) => void) =>
    (entry: object) => {
      if (isLevelEnabled(level, wanted)) {
        sink(JSON.stringify({ event, ...entry }));
      }
    };

  return {
    logRequest: write("request", "debug", console.log),
    logResponse: write("response", "info", console.log),
    logRetry: write("retry", "info", console.warn),
    logError: write("error", "error", console.error),
  };
}
