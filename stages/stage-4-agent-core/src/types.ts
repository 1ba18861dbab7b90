/**
 * Stage 4 Agent Core types.
 * One run drives the model from a prompt to a validated result: tool calls are
 * dispatched and fed back, rejected answers are retried with feedback, and the
 * whole exchange is bounded by a step limit.
 */

import type {
  ModelGateway,
  ModelReply,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";
import type { ConversationMessage } from "../../stage-1-conversation-history/src/types.js";
import type { ResultValidator } from "../../stage-2-output-control/src/types.js";
import type {
  ToolFailureKind,
  ToolRegistry,
} from "../../stage-3-tool-system/src/types.js";

/** Expected ways a run ends without a result; returned, never thrown. */
export type AgentFailureReason = "validation_exhausted" | "step_limit_exceeded";

/** Faults that end a run by throwing RunLoopError. */
export type RunLoopErrorReason =
  | "gateway_error"
  | "deadline_exceeded"
  | "protocol_error"
  | "tool_error"
  | "cancelled";

/** Enough context to diagnose a run without re-running it. */
export interface RunDiagnostics {
  runId: string;
  steps: number;
  retriesRemaining: number;
  lastReply?: ModelReply;
  lastErrors: string[];
  historyLength: number;
}

interface RunSummary {
  runId: string;
  /** Snapshot of the conversation when the run ended. */
  history: readonly ConversationMessage[];
  /** Model invocations made. */
  steps: number;
  retriesRemaining: number;
  /** Token usage summed over every reply that reported it. */
  usage: Usage;
}

export type AgentRunResult<T> =
  | (RunSummary & { success: true; value: T })
  | (RunSummary & {
      success: false;
      reason: AgentFailureReason;
      lastReply?: ModelReply;
      /** Validation errors of the last rejected answer, if any. */
      lastErrors: string[];
    });

export type StreamEvent<T> =
  | { kind: "partial-text"; delta: string; step: number }
  | { kind: "tool-call-started"; toolName: string; callId: string; step: number }
  | { kind: "final"; result: AgentRunResult<T> };

/** Status of a single agent run. */
export type AgentRunStatus = "running" | "completed" | "failed";

/** Snapshot of an agent run for audit. */
export interface AgentRunState {
  runId: string;
  status: AgentRunStatus;
  /** When the run started (ISO string). */
  startedAt: string;
  /** Set once status is completed or failed. */
  finishedAt?: string;
  steps: number;
  retriesRemaining: number;
  reason?: AgentFailureReason | RunLoopErrorReason;
  /** Error message when the run threw. */
  error?: string;
}

/** Store for agent run states. */
export interface AgentStateStore {
  get(runId: string): AgentRunState | undefined;
  set(state: AgentRunState): void;
  delete(runId: string): boolean;
  /** Oldest first. */
  list(): AgentRunState[];
}

export interface StepLog {
  timestamp: string;
  runId: string;
  step: number;
  messageCount: number;
  toolCount: number;
  stream: boolean;
  /** One-line description of the message the model is answering. */
  lastMessage?: string;
}

export interface ToolCallLog {
  timestamp: string;
  runId: string;
  step: number;
  callId: string;
  toolName: string;
  isError: boolean;
  failure?: ToolFailureKind;
}

export interface RetryLog {
  timestamp: string;
  runId: string;
  step: number;
  retriesRemaining: number;
  errors: string[];
}

export interface OutcomeLog {
  timestamp: string;
  runId: string;
  outcome: "accepted" | AgentFailureReason | RunLoopErrorReason | "error";
  steps: number;
  retriesRemaining: number;
  durationMs: number;
  usage: Usage;
  error?: string;
}

export interface RunLogger {
  logStep(entry: StepLog): void;
  logToolCall(entry: ToolCallLog): void;
  logRetry(entry: RetryLog): void;
  logOutcome(entry: OutcomeLog): void;
}

/** Collaborators of a run. The gateway and registry may be shared across runs. */
export interface AgentDeps<T> {
  gateway: ModelGateway;
  validator: ResultValidator<T>;
  /** Without one, every tool call gets an unknown-tool error result. */
  toolRegistry?: ToolRegistry;
  /** Defaults to a silent logger. */
  logger?: RunLogger;
  stateStore?: AgentStateStore;
}

export interface AgentRunOptions {
  systemPrompt?: string;
  /** Validation retries; tool-call cycles never consume one. Default 1. */
  maxRetries?: number;
  /** Model invocations per run. Default 10. */
  maxSteps?: number;
  /** Timeout for each model call, each stream chunk and each tool dispatch. */
  deadlineMs?: number;
  /** Run the calls of one reply concurrently. Default true. */
  parallelToolCalls?: boolean;
  /** Corrective prompt appended after a rejected answer. */
  buildRetryPrompt?: (errors: readonly string[]) => string;
  abortSignal?: AbortSignal;
  runId?: string;
}
