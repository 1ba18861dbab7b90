/**
 * State of one run, shared by the blocking and the streaming loop. Owns the
 * history and the counters; the loops only decide when to call the model.
 */

import {
  DeadlineExceededError,
  withDeadline,
} from "../../stage-0-model-gateway/src/deadline.js";
import { GatewayProtocolError } from "../../stage-0-model-gateway/src/errors.js";
import type {
  GatewayRequest,
  ModelReply,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";
import {
  createConversationHistory,
  describeMessage,
} from "../../stage-1-conversation-history/src/history.js";
import type {
  ConversationHistory,
  ConversationMessage,
  ToolCallRequest,
} from "../../stage-1-conversation-history/src/types.js";
import type { ResultValidator } from "../../stage-2-output-control/src/types.js";
import { createToolRegistry } from "../../stage-3-tool-system/src/registry.js";
import type {
  ToolDispatchResult,
  ToolRegistry,
} from "../../stage-3-tool-system/src/types.js";
import { RunLoopError } from "./errors.js";
import { createSilentRunLogger } from "./logger.js";
import type {
  AgentDeps,
  AgentFailureReason,
  AgentRunOptions,
  AgentRunResult,
  AgentRunState,
  AgentStateStore,
  RunDiagnostics,
  RunLoopErrorReason,
  RunLogger,
} from "./types.js";

export const DEFAULT_MAX_RETRIES = 1;
export const DEFAULT_MAX_STEPS = 10;

export function defaultRetryPrompt(errors: readonly string[]): string {
  return `Validation feedback:\n${errors
    .map((e) => `- ${e}`)
    .join("\n")}\n\nFix the errors and try again.`;
}

function generateRunId(): string {
  return `run_${Date.now().toString(36)}_${Math.random()
    .toString(36)
    .slice(2, 10)}`;
}

function nowIso(): string {
  return new Date().toISOString();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readCount(
  name: string,
  value: number | undefined,
  fallback: number,
  min: number
): number {
  const count = value ?? fallback;
  if (!Number.isInteger(count) || count < min) {
    throw new RangeError(`${name} must be an integer >= ${min}, got ${count}`);
  }
  return count;
}

/** Undefined means no deadline; anything else must be a positive duration. */
function readDeadline(value: number | undefined): number | undefined {
  if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
    throw new RangeError(`deadlineMs must be a positive number, got ${value}`);
  }
  return value;
}

export class AgentRun<T> {
  readonly runId: string;
  private readonly history: ConversationHistory;
  private readonly validator: ResultValidator<T>;
  private readonly tools: ToolRegistry;
  private readonly logger: RunLogger;
  private readonly stateStore: AgentStateStore | undefined;
  private readonly maxSteps: number;
  private readonly deadlineMs: number | undefined;
  private readonly parallelToolCalls: boolean;
  private readonly buildRetryPrompt: (errors: readonly string[]) => string;
  readonly abortSignal: AbortSignal | undefined;

  private readonly startedAt = nowIso();
  private readonly startTime = Date.now();
  private readonly seenCallIds = new Set<string>();
  private steps = 0;
  private retriesRemaining: number;
  private usage: Usage = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
  private lastReply: ModelReply | undefined;
  private lastErrors: string[] = [];

  constructor(
    private readonly deps: AgentDeps<T>,
    prompt: string,
    options: AgentRunOptions
  ) {
    this.retriesRemaining = readCount(
      "maxRetries",
      options.maxRetries,
      DEFAULT_MAX_RETRIES,
      0
    );
    this.maxSteps = readCount("maxSteps", options.maxSteps, DEFAULT_MAX_STEPS, 1);
    this.deadlineMs = readDeadline(options.deadlineMs);
    this.parallelToolCalls = options.parallelToolCalls ?? true;
    this.buildRetryPrompt = options.buildRetryPrompt ?? defaultRetryPrompt;
    this.abortSignal = options.abortSignal;
    this.runId = options.runId ?? generateRunId();
    this.validator = deps.validator;
    this.tools = deps.toolRegistry ?? createToolRegistry();
    this.logger = deps.logger ?? createSilentRunLogger();
    this.stateStore = deps.stateStore;

    const seed: ConversationMessage[] = [];
    if (options.systemPrompt !== undefined) {
      seed.push({ kind: "system-prompt", content: options.systemPrompt });
    }
    seed.push({ kind: "user-prompt", content: prompt });
    this.history = createConversationHistory(seed);

    this.saveState("running");
  }

  /** Current step number; 0 before the first model call. */
  get step(): number {
    return this.steps;
  }

  /**
   * Start the next model invocation. False once the step limit is reached.
   * Throws the abort reason if the run has been cancelled.
   */
  beginStep(stream: boolean): boolean {
    this.abortSignal?.throwIfAborted();
    if (this.steps >= this.maxSteps) {
      return false;
    }
    this.steps += 1;
    const last = this.history.last();
    this.logger.logStep({
      timestamp: nowIso(),
      runId: this.runId,
      step: this.steps,
      messageCount: this.history.length,
      toolCount: this.tools.size,
      stream,
      lastMessage: last && describeMessage(last),
    });
    return true;
  }

  request(abortSignal: AbortSignal | undefined): GatewayRequest {
    return {
      messages: this.history.messages(),
      tools: this.tools.specs(),
      abortSignal,
      requestId: `${this.runId}:${this.steps}`,
      outputSchema: this.validator.schema,
    };
  }

  /** Run one gateway operation under the deadline; faults become RunLoopError. */
  async callGateway<R>(
    operation: string,
    task: (signal: AbortSignal | undefined) => Promise<R>,
    signal: AbortSignal | undefined = this.abortSignal
  ): Promise<R> {
    try {
      return await withDeadline(
        `model gateway ${operation}`,
        this.deadlineMs,
        signal,
        task
      );
    } catch (err) {
      throw this.classifyGatewayError(err);
    }
  }

  recordReply(reply: ModelReply): void {
    this.lastReply = reply;
    if (reply.usage) {
      this.usage = {
        inputTokens: this.usage.inputTokens + reply.usage.inputTokens,
        outputTokens: this.usage.outputTokens + reply.usage.outputTokens,
        totalTokens: this.usage.totalTokens + reply.usage.totalTokens,
      };
    }
  }

  /** Check the reply's call ids and append it to the history. */
  acceptToolCalls(calls: readonly ToolCallRequest[]): void {
    if (calls.length === 0) {
      throw this.error("protocol_error", "Model returned a tool-call reply with no calls");
    }
    const ids = new Set<string>();
    for (const call of calls) {
      if (!call.callId) {
        throw this.error(
          "protocol_error",
          `Tool call to "${call.toolName}" has an empty call id`
        );
      }
      if (ids.has(call.callId) || this.seenCallIds.has(call.callId)) {
        throw this.error("protocol_error", `Duplicate tool call id "${call.callId}"`);
      }
      ids.add(call.callId);
    }
    for (const id of ids) {
      this.seenCallIds.add(id);
    }
    this.history.append({ kind: "model-tool-calls", calls });
  }

  /** Never rejects for the built-in registry; results come back in request order. */
  dispatch(calls: readonly ToolCallRequest[]): Promise<ToolDispatchResult[]> {
    return this.tools.dispatchAll(calls, {
      parallel: this.parallelToolCalls,
      deadlineMs: this.deadlineMs,
      signal: this.abortSignal,
    });
  }

  /** Append every result, then fail on the first fatal one. */
  recordToolResults(results: readonly ToolDispatchResult[]): void {
    for (const { message, failure } of results) {
      this.history.append(message);
      this.logger.logToolCall({
        timestamp: nowIso(),
        runId: this.runId,
        step: this.steps,
        callId: message.callId,
        toolName: message.toolName,
        isError: message.isError,
        failure: failure?.kind,
      });
    }
    for (const { message, failure } of results) {
      if (failure?.fatal) {
        throw this.error(
          failure.kind === "timeout" ? "deadline_exceeded" : "tool_error",
          `Tool call ${message.toolName}#${message.callId} failed: ${failure.error}`,
          failure.cause
        );
      }
    }
  }

  /**
   * Append the model's answer and validate it. Returns the final result, or
   * undefined when a corrective prompt was appended and the loop continues.
   */
  acceptText(text: string): AgentRunResult<T> | undefined {
    this.history.append({ kind: "model-text", content: text });
    const outcome = this.validator.validate(text);
    if (outcome.accepted) {
      this.lastErrors = [];
      return this.finish({ success: true, value: outcome.value, ...this.summary() });
    }

    this.lastErrors = outcome.errors;
    if (this.retriesRemaining === 0) {
      return this.failure("validation_exhausted");
    }
    this.retriesRemaining -= 1;
    this.history.append({
      kind: "user-prompt",
      content: this.buildRetryPrompt(outcome.errors),
      retry: true,
    });
    this.logger.logRetry({
      timestamp: nowIso(),
      runId: this.runId,
      step: this.steps,
      retriesRemaining: this.retriesRemaining,
      errors: outcome.errors,
    });
    return undefined;
  }

  stepLimitExceeded(): AgentRunResult<T> {
    return this.failure("step_limit_exceeded");
  }

  /**
   * Record a fault and return what the loop should throw: a RunLoopError when
   * the run was cancelled or already classified, otherwise the fault itself.
   */
  fail(err: unknown): unknown {
    const error =
      !(err instanceof RunLoopError) && this.abortSignal?.aborted
        ? this.error("cancelled", "Run was cancelled", err)
        : err;
    const reason = error instanceof RunLoopError ? error.reason : undefined;

    this.saveState("failed", { reason, error: errorMessage(error) });
    this.logger.logOutcome({
      timestamp: nowIso(),
      runId: this.runId,
      outcome: reason ?? "error",
      steps: this.steps,
      retriesRemaining: this.retriesRemaining,
      durationMs: Date.now() - this.startTime,
      usage: this.usage,
      error: errorMessage(error),
    });
    return error;
  }

  diagnostics(): RunDiagnostics {
    return {
      runId: this.runId,
      steps: this.steps,
      retriesRemaining: this.retriesRemaining,
      lastReply: this.lastReply,
      lastErrors: [...this.lastErrors],
      historyLength: this.history.length,
    };
  }

  error(reason: RunLoopErrorReason, message: string, cause?: unknown): RunLoopError {
    return new RunLoopError({
      reason,
      message,
      diagnostics: this.diagnostics(),
      cause,
    });
  }

  private classifyGatewayError(err: unknown): RunLoopError {
    if (err instanceof RunLoopError) {
      return err;
    }
    if (this.abortSignal?.aborted) {
      return this.error("cancelled", "Run was cancelled", err);
    }
    if (err instanceof DeadlineExceededError) {
      return this.error("deadline_exceeded", err.message, err);
    }
    if (err instanceof GatewayProtocolError) {
      return this.error("protocol_error", err.message, err);
    }
    return this.error(
      "gateway_error",
      `Model gateway ${this.deps.gateway.name} failed: ${errorMessage(err)}`,
      err
    );
  }

  private summary() {
    return {
      runId: this.runId,
      history: this.history.messages(),
      steps: this.steps,
      retriesRemaining: this.retriesRemaining,
      usage: this.usage,
    };
  }

  private failure(reason: AgentFailureReason): AgentRunResult<T> {
    return this.finish({
      success: false,
      reason,
      ...this.summary(),
      lastReply: this.lastReply,
      lastErrors: [...this.lastErrors],
    });
  }

  private finish(result: AgentRunResult<T>): AgentRunResult<T> {
    const reason = result.success ? undefined : result.reason;
    this.saveState(result.success ? "completed" : "failed", { reason });
    this.logger.logOutcome({
      timestamp: nowIso(),
      runId: this.runId,
      outcome: reason ?? "accepted",
      steps: this.steps,
      retriesRemaining: this.retriesRemaining,
      durationMs: Date.now() - this.startTime,
      usage: this.usage,
    });
    return result;
  }

  private saveState(
    status: AgentRunState["status"],
    extra: Pick<AgentRunState, "reason" | "error"> = {}
  ): void {
    if (!this.stateStore) {
      return;
    }
    const state: AgentRunState = {
      runId: this.runId,
      status,
      startedAt: this.startedAt,
      steps: this.steps,
      retriesRemaining: this.retriesRemaining,
    };
    if (status !== "running") {
      state.finishedAt = nowIso();
    }
    if (extra.reason) {
      state.reason = extra.reason;
    }
    if (extra.error !== undefined) {
      state.error = extra.error;
    }
    this.stateStore.set(state);
  }
}
