import {
  isLevelEnabled,
  type LogLevel,
} from "../../stage-0-model-gateway/src/logger.js";
import type {
  OutcomeLog,
  RetryLog,
  RunLogger,
  StepLog,
  ToolCallLog,
} from "./types.js";

function toJson(
  event: string,
  entry: StepLog | ToolCallLog | RetryLog | OutcomeLog
): string {
  return JSON.stringify({ event, ...entry });
}

export function createConsoleRunLogger(level: LogLevel = "info"): RunLogger {
  return {
    logStep(entry: StepLog) {
      if (isLevelEnabled(level, "debug")) {
        console.log(toJson("step", entry));
      }
    },
    logToolCall(entry: ToolCallLog) {
      if (isLevelEnabled(level, "debug")) {
        console.log(toJson("tool_call", entry));
      }
    },
    logRetry(entry: RetryLog) {
      if (isLevelEnabled(level, "info")) {
        console.log(toJson("retry", entry));
      }
    },
    logOutcome(entry: OutcomeLog) {
      if (entry.outcome === "accepted") {
        if (isLevelEnabled(level, "info")) {
          console.log(toJson("outcome", entry));
        }
      } else if (isLevelEnabled(level, "error")) {
        console.error(toJson("outcome", entry));
      }
    },
  };
}

export function createSilentRunLogger(): RunLogger {
  return {
    logStep: () => {},
    logToolCall: () => {},
    logRetry: () => {},
    logOutcome: () => {},
  };
}
