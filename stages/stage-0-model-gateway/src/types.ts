import type { ClientOptions } from "openai";

import type {
  ConversationMessage,
  ToolCallRequest,
} from "../../stage-1-conversation-history/src/types.js";

export type ProviderName = "deepseek" | "glm";

/** Tool advertised to the model on every call. */
export interface ToolSpec {
  name: string;
  description: string;
  /** JSON Schema for the tool's arguments. */
  parameters: Record<string, unknown>;
  /** JSON Schema for the tool's return value, when declared. */
  returns?: Record<string, unknown>;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/** A complete (non-streamed) model reply. Exactly one of text or tool calls. */
export type ModelReply =
  | { kind: "text"; text: string; usage?: Usage }
  | { kind: "tool-calls"; calls: ToolCallRequest[]; usage?: Usage };

/** Incremental piece of a streamed reply. */
export type ModelStreamChunk =
  | { kind: "text-delta"; delta: string }
  | {
      kind: "tool-call-delta";
      /** Position of the call within the reply; deltas with the same index merge. */
      index: number;
      callId?: string;
      name?: string;
      argumentsDelta?: string;
    }
  | { kind: "usage"; usage: Usage };

/**
 * Pull-based handle on a streamed reply. `next` resolves undefined once the
 * reply is complete; `close` releases the underlying stream early.
 */
export interface ModelStreamHandle {
  next(): Promise<ModelStreamChunk | undefined>;
  close(): Promise<void>;
}

export interface GatewayRequest {
  /** Full ordered history; replayed verbatim. */
  messages: readonly ConversationMessage[];
  tools: ToolSpec[];
  abortSignal?: AbortSignal;
  requestId?: string;
  /** Shape the final answer must take; absent when free text is accepted. */
  outputSchema?: Record<string, unknown>;
}

/** The contract the run loop depends on. */
export interface ModelGateway {
  readonly name: string;
  send(request: GatewayRequest): Promise<ModelReply>;
  stream(request: GatewayRequest): Promise<ModelStreamHandle>;
}

export interface RetryOptions {
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  jitter?: number;
}

export interface RequestLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  messageCount: number;
  toolCount: number;
  stream: boolean;
  timeoutMs?: number;
}

export interface ResponseLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  replyKind: ModelReply["kind"] | "stream";
  usage?: Usage;
}

export interface ErrorLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  durationMs: number;
  error: {
    name: string;
    message: string;
    status?: number;
    code?: string;
  };
}

export interface RequestRetryLog {
  timestamp: string;
  requestId: string;
  model: string;
  provider: ProviderName;
  attempt: number;
  delayMs: number;
  error: ErrorLog["error"];
}

export interface RequestLogger {
  logRequest(entry: RequestLog): void;
  logResponse(entry: ResponseLog): void;
  logError(entry: ErrorLog): void;
  logRetry(entry: RequestRetryLog): void;
}

export interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl?: string;
  organization?: string;
  /** Transport handed to the SDK client; defaults to the SDK's own. */
  fetch?: ClientOptions["fetch"];
}

export type DeepSeekConfig = OpenAICompatibleConfig;

export type GLMConfig = OpenAICompatibleConfig;

export interface ProviderConfig {
  deepseek?: DeepSeekConfig;
  glm?: GLMConfig;
}

export interface GatewayConfig {
  providers: ProviderConfig;
  defaultModel?: string;
  /** Pin every request to this provider instead of looking the model up. */
  provider?: ProviderName;
  modelProviderMap?: Record<string, ProviderName>;
  fallbackModels?: string[];
  retry?: RetryOptions;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  logger?: RequestLogger;
}

/** Request as seen by a provider: model resolved, signal merged with timeout. */
export interface ProviderRequest extends GatewayRequest {
  model: string;
  requestId: string;
  temperature?: number;
  maxTokens?: number;
}
