export { runAgent } from "./agent.js";
export { RunLoopError } from "./errors.js";
export { createConsoleRunLogger, createSilentRunLogger } from "./logger.js";
export {
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_STEPS,
  defaultRetryPrompt,
} from "./run.js";
export { createAgentStateStore } from "./state.js";
export { AgentRunStream, streamAgent } from "./stream.js";
export type {
  AgentDeps,
  AgentFailureReason,
  AgentRunOptions,
  AgentRunResult,
  AgentRunState,
  AgentRunStatus,
  AgentStateStore,
  OutcomeLog,
  RetryLog,
  RunDiagnostics,
  RunLogger,
  RunLoopErrorReason,
  StepLog,
  StreamEvent,
  ToolCallLog,
} from "./types.js";
