/**
 * Conversation History: append-only message log with tool-result pairing checks.
 */

import type {
  ConversationHistory,
  ConversationMessage,
  ModelToolCallsMessage,
  ToolCallRequest,
} from "./types.js";

export class HistoryProtocolError extends Error {
  readonly callId?: string;

  constructor(options: { message: string; callId?: string }) {
    super(options.message);
    this.name = "HistoryProtocolError";
    this.callId = options.callId;
  }
}

function deepFreeze<V>(value: V): V {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
  }
  return value;
}

/**
 * The log keeps its own frozen copy of every message, arguments and payloads
 * included; throws if the message holds a value that cannot be copied.
 */
function freezeMessage(message: ConversationMessage): ConversationMessage {
  return deepFreeze(structuredClone(message));
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** One-line description of a message, for logs and diagnostics. */
export function describeMessage(message: ConversationMessage): string {
  switch (message.kind) {
    case "system-prompt":
      return `system: ${truncate(message.content, 80)}`;
    case "user-prompt":
      return `${message.retry ? "user (retry)" : "user"}: ${truncate(message.content, 80)}`;
    case "model-text":
      return `model: ${truncate(message.content, 80)}`;
    case "model-tool-calls":
      return `model: call ${message.calls
        .map((c) => `${c.toolName}#${c.callId}`)
        .join(", ")}`;
    case "tool-result":
      return `tool ${message.toolName}#${message.callId}${
        message.isError ? " (error)" : ""
      }`;
  }
}

export function createConversationHistory(
  seed: ConversationMessage[] = []
): ConversationHistory {
  const log: ConversationMessage[] = [];
  // Latest model-tool-calls message and the call ids answered since.
  let openCalls: { message: ModelToolCallsMessage; answered: Set<string> } | undefined;

  function checkToolResult(callId: string): void {
    if (!openCalls) {
      throw new HistoryProtocolError({
        message: `Tool result ${callId} does not follow a tool-call request`,
        callId,
      });
    }
    if (!openCalls.message.calls.some((c) => c.callId === callId)) {
      throw new HistoryProtocolError({
        message: `Tool result ${callId} matches no call in the preceding model reply`,
        callId,
      });
    }
    if (openCalls.answered.has(callId)) {
      throw new HistoryProtocolError({
        message: `Duplicate tool result for call ${callId}`,
        callId,
      });
    }
  }

  const history: ConversationHistory = {
    get length() {
      return log.length;
    },

    append(message: ConversationMessage): void {
      const frozen = freezeMessage(message);
      if (frozen.kind === "tool-result") {
        checkToolResult(frozen.callId);
        openCalls?.answered.add(frozen.callId);
      } else if (frozen.kind === "model-tool-calls") {
        openCalls = { message: frozen, answered: new Set() };
      } else {
        openCalls = undefined;
      }
      log.push(frozen);
    },

    messages(): readonly ConversationMessage[] {
      return log.slice();
    },

    last(): ConversationMessage | undefined {
      return log[log.length - 1];
    },

    pendingToolCalls(): ToolCallRequest[] {
      if (!openCalls) return [];
      const { message, answered } = openCalls;
      return message.calls.filter((c) => !answered.has(c.callId));
    },
  };

  for (const message of seed) {
    history.append(message);
  }
  return history;
}
