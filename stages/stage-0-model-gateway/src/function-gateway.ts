/**
 * Function Gateway: replies come from local functions instead of a model API.
 * Drives runs deterministically in tests and examples.
 */

import type { ConversationMessage } from "../../stage-1-conversation-history/src/types.js";
import { GatewayProtocolError } from "./errors.js";
import type {
  GatewayRequest,
  ModelGateway,
  ModelReply,
  ModelStreamChunk,
  ModelStreamHandle,
  ToolSpec,
} from "./types.js";

/** Passed to gateway functions alongside the messages. */
export interface GatewayInfo {
  tools: ToolSpec[];
  requestId?: string;
  /** Whether a plain-text reply can be accepted as the final answer. */
  allowTextResult: boolean;
  outputSchema?: Record<string, unknown>;
}

/** Incremental change to one tool call of a streamed reply. */
export interface DeltaToolCall {
  name?: string;
  jsonArgs?: string;
  callId?: string;
}

/** Tool-call deltas keyed by the call's index within the reply. */
export type DeltaToolCalls = Record<number, DeltaToolCall>;

export type FunctionDef = (
  messages: readonly ConversationMessage[],
  info: GatewayInfo
) => ModelReply | Promise<ModelReply>;

/**
 * Yields either only strings (a text reply) or only DeltaToolCalls (a
 * tool-call reply); the first item decides which.
 */
export type StreamFunctionDef = (
  messages: readonly ConversationMessage[],
  info: GatewayInfo
) => AsyncIterable<string | DeltaToolCalls>;

export interface FunctionGatewayOptions {
  send?: FunctionDef;
  stream?: StreamFunctionDef;
}

function toDeltaChunks(delta: DeltaToolCalls): ModelStreamChunk[] {
  return Object.entries(delta)
    .map(([key, value]) => ({ index: Number(key), value }))
    .sort((a, b) => a.index - b.index)
    .map(({ index, value }): ModelStreamChunk => ({
      kind: "tool-call-delta",
      index,
      callId: value.callId,
      name: value.name,
      argumentsDelta: value.jsonArgs,
    }));
}

class FunctionStreamHandle implements ModelStreamHandle {
  private readonly iterator: AsyncIterator<string | DeltaToolCalls>;
  private readonly queued: ModelStreamChunk[] = [];
  private mode: "text" | "tool-calls" | undefined;
  private finished = false;

  constructor(
    private readonly gatewayName: string,
    source: AsyncIterable<string | DeltaToolCalls>,
    private readonly signal: AbortSignal | undefined
  ) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  async next(): Promise<ModelStreamChunk | undefined> {
    while (true) {
      const queued = this.queued.shift();
      if (queued) {
        return queued;
      }
      if (this.finished) {
        return undefined;
      }
      this.signal?.throwIfAborted();

      const item = await this.iterator.next();
      if (item.done) {
        this.finished = true;
        if (!this.mode) {
          throw this.protocolError("Stream function must return at least one item");
        }
        return undefined;
      }

      if (typeof item.value === "string") {
        this.enter("text");
        return { kind: "text-delta", delta: item.value };
      }
      this.enter("tool-calls");
      this.queued.push(...toDeltaChunks(item.value));
    }
  }

  async close(): Promise<void> {
    if (this.finished) {
      return;
    }
    this.finished = true;
    await this.iterator.return?.();
  }

  private enter(mode: "text" | "tool-calls"): void {
    if (this.mode && this.mode !== mode) {
      throw this.protocolError(
        "Stream function must yield only text or only tool-call deltas"
      );
    }
    this.mode = mode;
  }

  private protocolError(message: string): GatewayProtocolError {
    return new GatewayProtocolError({ gateway: this.gatewayName, message });
  }
}

export function createFunctionGateway(
  options: FunctionGatewayOptions
): ModelGateway {
  const { send: sendFn, stream: streamFn } = options;
  if (!sendFn && !streamFn) {
    throw new TypeError("Either `send` or `stream` must be provided");
  }

  const labels: string[] = [];
  if (sendFn) labels.push(sendFn.name);
  if (streamFn) labels.push(`stream-${streamFn.name}`);
  const name = `function:${labels.join(",")}`;

  function info(request: GatewayRequest): GatewayInfo {
    const outputSchema = request.outputSchema;
    return {
      tools: request.tools,
      requestId: request.requestId,
      allowTextResult: outputSchema === undefined || outputSchema.type === "string",
      outputSchema,
    };
  }

  return {
    name,

    async send(request: GatewayRequest): Promise<ModelReply> {
      if (!sendFn) {
        throw new TypeError(`${name} has no \`send\` function`);
      }
      request.abortSignal?.throwIfAborted();
      return sendFn(request.messages, info(request));
    },

    async stream(request: GatewayRequest): Promise<ModelStreamHandle> {
      if (!streamFn) {
        throw new TypeError(`${name} has no \`stream\` function`);
      }
      request.abortSignal?.throwIfAborted();
      return new FunctionStreamHandle(
        name,
        streamFn(request.messages, info(request)),
        request.abortSignal
      );
    },
  };
}
