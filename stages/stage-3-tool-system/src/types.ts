/**
 * Stage 3 Tool System types.
 * Tools are registered explicitly with a name, a description and an argument
 * schema; the registry advertises them to the model and dispatches its calls.
 */

import type { ToolSpec } from "../../stage-0-model-gateway/src/types.js";
import type {
  ToolCallRequest,
  ToolResultMessage,
} from "../../stage-1-conversation-history/src/types.js";
import type { JsonSchema } from "../../stage-2-output-control/src/types.js";

export interface ToolContext {
  callId: string;
  /** Aborts when the run is cancelled or the dispatch deadline passes. */
  signal?: AbortSignal;
}

/** Single tool: name, description, parameters schema, and execute function. */
export interface Tool<TArgs extends object = Record<string, unknown>, TResult = unknown> {
  /** Unique tool name (used by the model to pick the tool). */
  name: string;
  /** Human-readable description for the model. */
  description: string;
  /** JSON Schema for tool arguments; arguments are validated before execute. */
  parameters: JsonSchema;
  /** JSON Schema the return value must satisfy, when declared. */
  returns?: JsonSchema;
  /** A throwing execute ends the run instead of being reported to the model. */
  fatalOnError?: boolean;
  execute(args: TArgs, context: ToolContext): Promise<TResult> | TResult;
}

export type ToolFailureKind =
  | "unknown_tool"
  | "invalid_arguments"
  | "execution_error"
  | "timeout";

export interface ToolFailure {
  kind: ToolFailureKind;
  /** Fatal failures end the run after the results are recorded. */
  fatal: boolean;
  error: string;
  cause?: unknown;
}

export interface ToolDispatchResult {
  message: ToolResultMessage;
  failure?: ToolFailure;
}

export interface DispatchOptions {
  /** Per-dispatch timeout; exceeding it is always fatal. */
  deadlineMs?: number;
  signal?: AbortSignal;
}

export interface DispatchAllOptions extends DispatchOptions {
  /** Run the calls of one reply concurrently (default true). */
  parallel?: boolean;
}

/** Tool registry: register tools by name, advertise specs, dispatch calls. */
export interface ToolRegistry {
  readonly size: number;
  /** Throws ToolRegistrationError on an empty or already-registered name. */
  register<TArgs extends object, TResult>(tool: Tool<TArgs, TResult>): void;
  has(name: string): boolean;
  get(name: string): ToolSpec | undefined;
  /** Specs in registration order. */
  specs(): ToolSpec[];
  /** Never rejects: every failure becomes an error tool result. */
  dispatch(call: ToolCallRequest, options?: DispatchOptions): Promise<ToolDispatchResult>;
  /** Results in request order regardless of completion order. */
  dispatchAll(
    calls: readonly ToolCallRequest[],
    options?: DispatchAllOptions
  ): Promise<ToolDispatchResult[]>;
}
