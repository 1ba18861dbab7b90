/**
 * OpenAI-compatible chat provider on the official SDK with a `baseURL`
 * override; DeepSeek and GLM both speak this wire format.
 */

import OpenAI from "openai";

import type { ConversationMessage } from "../../../stage-1-conversation-history/src/types.js";
import type {
  ModelReply,
  ModelStreamChunk,
  ModelStreamHandle,
  OpenAICompatibleConfig,
  ProviderName,
  ProviderRequest,
  ToolSpec,
  Usage,
} from "../types.js";
import { ProviderError, type LLMProvider } from "./types.js";

type ChatChunk = OpenAI.Chat.ChatCompletionChunk;

/** String form of a tool payload for text-only transports. */
export function formatPayload(payload: unknown): string {
  if (typeof payload === "string") {
    return payload;
  }
  return JSON.stringify(payload) ?? "null";
}

export function toWireMessages(
  messages: readonly ConversationMessage[]
): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (message.kind) {
      case "system-prompt":
        return { role: "system", content: message.content };
      case "user-prompt":
        return { role: "user", content: message.content };
      case "model-text":
        return { role: "assistant", content: message.content };
      case "model-tool-calls":
        return {
          role: "assistant",
          content: null,
          tool_calls: message.calls.map((call) => ({
            id: call.callId,
            type: "function" as const,
            function: {
              name: call.toolName,
              arguments:
                typeof call.rawArguments === "string"
                  ? call.rawArguments
                  : JSON.stringify(call.rawArguments),
            },
          })),
        };
      case "tool-result":
        return {
          role: "tool",
          tool_call_id: message.callId,
          content: formatPayload(message.payload),
        };
    }
  });
}

function toWireTools(tools: ToolSpec[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

function toUsage(usage: OpenAI.CompletionUsage | null | undefined): Usage | undefined {
  if (!usage) {
    return undefined;
  }
  return {
    inputTokens: usage.prompt_tokens ?? 0,
    outputTokens: usage.completion_tokens ?? 0,
    totalTokens: usage.total_tokens ?? 0,
  };
}

/**
 * Interpret a chat completion. Any tool call makes it a tool-call reply; a
 * call without an id gets one derived from the request id.
 */
export function parseCompletion(
  completion: OpenAI.Chat.ChatCompletion,
  requestId: string
): ModelReply {
  const message = completion.choices?.[0]?.message;
  const usage = toUsage(completion.usage);

  const calls = (message?.tool_calls ?? []).map((call, index) => ({
    callId: call.id || `call_${requestId}_${index}`,
    toolName: call.function?.name ?? "",
    rawArguments: call.function?.arguments ?? "{}",
  }));
  if (calls.length > 0) {
    return { kind: "tool-calls", calls, usage };
  }
  return { kind: "text", text: message?.content ?? "", usage };
}

/** Turn one streamed completion chunk into stream chunks. */
export function parseStreamEvent(chunk: ChatChunk): ModelStreamChunk[] {
  const chunks: ModelStreamChunk[] = [];
  const delta = chunk.choices?.[0]?.delta;

  if (delta?.content) {
    chunks.push({ kind: "text-delta", delta: delta.content });
  }
  for (const call of delta?.tool_calls ?? []) {
    chunks.push({
      kind: "tool-call-delta",
      index: call.index ?? 0,
      callId: call.id || undefined,
      name: call.function?.name,
      argumentsDelta: call.function?.arguments,
    });
  }

  const usage = toUsage(chunk.usage);
  if (usage) {
    chunks.push({ kind: "usage", usage });
  }
  return chunks;
}

function readErrorMessage(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null || !("message" in body)) {
    return undefined;
  }
  return typeof body.message === "string" ? body.message : undefined;
}

/** SDK errors become ProviderError; a caller abort passes through unchanged. */
function toProviderError(providerName: ProviderName, error: unknown): unknown {
  if (error instanceof OpenAI.APIUserAbortError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderError({
      provider: providerName,
      message: error.message,
      code: "connection_error",
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderError({
      provider: providerName,
      message: readErrorMessage(error.error) ?? error.message,
      status: error.status,
      code: error.code ?? error.type ?? undefined,
      cause: error,
    });
  }
  return error;
}

/** Pull-based view of the SDK's chunk stream. */
class ChunkStreamHandle implements ModelStreamHandle {
  private readonly chunks: AsyncIterator<ChatChunk>;
  private readonly queued: ModelStreamChunk[] = [];
  private finished = false;

  constructor(
    private readonly providerName: ProviderName,
    private readonly stream: AsyncIterable<ChatChunk> & { controller: AbortController }
  ) {
    this.chunks = stream[Symbol.asyncIterator]();
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

      let result: IteratorResult<ChatChunk>;
      try {
        result = await this.chunks.next();
      } catch (error) {
        this.finished = true;
        throw toProviderError(this.providerName, error);
      }
      if (result.done) {
        this.finished = true;
        continue;
      }
      this.queued.push(...parseStreamEvent(result.value));
    }
  }

  async close(): Promise<void> {
    if (this.finished) {
      return;
    }
    this.finished = true;
    this.stream.controller.abort();
  }
}

export function createOpenAICompatibleProvider(
  providerName: ProviderName,
  config: OpenAICompatibleConfig,
  defaultBaseUrl: string
): LLMProvider {
  let client: OpenAI | undefined;

  function getClient(): OpenAI {
    if (!config.apiKey) {
      throw new ProviderError({
        provider: providerName,
        message: "API key is required for OpenAI-compatible providers.",
      });
    }
    // 重试由 gateway 负责，SDK 自身不重试
    client ??= new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl ?? defaultBaseUrl,
      organization: config.organization,
      maxRetries: 0,
      fetch: config.fetch,
    });
    return client;
  }

  function baseBody(request: ProviderRequest) {
    return {
      model: request.model,
      messages: toWireMessages(request.messages),
      tools: request.tools.length > 0 ? toWireTools(request.tools) : undefined,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };
  }

  return {
    name: providerName,

    async send(request: ProviderRequest): Promise<ModelReply> {
      try {
        const completion = await getClient().chat.completions.create(
          { ...baseBody(request), stream: false },
          { signal: request.abortSignal }
        );
        return parseCompletion(completion, request.requestId);
      } catch (error) {
        throw toProviderError(providerName, error);
      }
    },

    async stream(request: ProviderRequest): Promise<ModelStreamHandle> {
      try {
        const stream = await getClient().chat.completions.create(
          {
            ...baseBody(request),
            stream: true,
            stream_options: { include_usage: true },
          },
          { signal: request.abortSignal }
        );
        return new ChunkStreamHandle(providerName, stream);
      } catch (error) {
        throw toProviderError(providerName, error);
      }
    },
  };
}
