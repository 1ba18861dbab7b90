/**
 * Stage 1 Conversation History types.
 * Messages are the single source of truth for what the model sees: the full
 * list is replayed, in order, on every gateway call.
 */

/** One tool invocation requested by the model. */
export interface ToolCallRequest {
  /** Unique within a run. */
  callId: string;
  toolName: string;
  /** JSON string (wire / streamed deltas) or an already-decoded object. */
  rawArguments: string | Record<string, unknown>;
}

export interface SystemPromptMessage {
  kind: "system-prompt";
  content: string;
}

export interface UserPromptMessage {
  kind: "user-prompt";
  content: string;
  /** Set on corrective prompts synthesized after a validation rejection. */
  retry?: boolean;
}

export interface ModelTextMessage {
  kind: "model-text";
  content: string;
}

export interface ModelToolCallsMessage {
  kind: "model-tool-calls";
  calls: readonly ToolCallRequest[];
}

export interface ToolResultMessage {
  kind: "tool-result";
  callId: string;
  toolName: string;
  payload: unknown;
  /** True when the payload describes a failure the model should correct. */
  isError: boolean;
}

export type ConversationMessage =
  | SystemPromptMessage
  | UserPromptMessage
  | ModelTextMessage
  | ModelToolCallsMessage
  | ToolResultMessage;

export type MessageKind = ConversationMessage["kind"];

/** Append-only, ordered log of one run's exchange. */
export interface ConversationHistory {
  readonly length: number;
  /** Freeze and append; throws HistoryProtocolError on an unmatched tool result. */
  append(message: ConversationMessage): void;
  messages(): readonly ConversationMessage[];
  last(): ConversationMessage | undefined;
  /** Calls of the latest model-tool-calls message that still lack a result. */
  pendingToolCalls(): ToolCallRequest[];
}
