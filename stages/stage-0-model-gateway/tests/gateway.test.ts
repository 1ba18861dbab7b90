import { describe, expect, it, vi } from "vitest";

import {
  backoffDelay,
  createModelGateway,
  isRetryableError,
  ProviderError,
  toWireMessages,
  type GatewayRequest,
  type ModelStreamChunk,
  type RequestLogger,
  withRetry,
} from "../src/index.js";

function silentLogger(): RequestLogger {
  return {
    logRequest: vi.fn(),
    logResponse: vi.fn(),
    logError: vi.fn(),
    logRetry: vi.fn(),
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function requestBody(fetchMock: ReturnType<typeof vi.fn>, call = 0): unknown {
  const init: unknown = fetchMock.mock.calls[call][1];
  if (typeof init !== "object" || init === null || !("body" in init)) {
    throw new Error("fetch was called without a body");
  }
  return JSON.parse(String(init.body));
}

const request: GatewayRequest = {
  messages: [
    { kind: "system-prompt", content: "be brief" },
    { kind: "user-prompt", content: "What is 2+2?" },
    {
      kind: "model-tool-calls",
      calls: [{ callId: "c1", toolName: "add", rawArguments: { a: 2, b: 2 } }],
    },
    {
      kind: "tool-result",
      callId: "c1",
      toolName: "add",
      payload: 4,
      isError: false,
    },
  ],
  tools: [
    {
      name: "add",
      description: "Add two integers",
      parameters: { type: "object" },
    },
  ],
};

describe("toWireMessages", () => {
  it("maps every message kind onto chat roles", () => {
    expect(toWireMessages(request.messages)).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "What is 2+2?" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "c1",
            type: "function",
            function: { name: "add", arguments: '{"a":2,"b":2}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "c1", content: "4" },
    ]);
  });
});

describe("withRetry", () => {
  it("doubles the backoff up to the cap", () => {
    const retry = { maxRetries: 3, backoffMs: 100, maxBackoffMs: 250, jitter: 0 };

    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, retry))).toEqual([
      100, 200, 250,
    ]);
  });

  it("does not retry once the signal has aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const failure = new ProviderError({ provider: "glm", message: "busy", status: 503 });
    const fn = vi.fn().mockRejectedValue(failure);

    await expect(
      withRetry(fn, { maxRetries: 3, backoffMs: 0 }, { signal: controller.signal })
    ).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("isRetryableError", () => {
  it("retries rate limits, server errors and network resets only", () => {
    expect(
      isRetryableError(new ProviderError({ provider: "glm", message: "", status: 429 }))
    ).toBe(true);
    expect(
      isRetryableError(new ProviderError({ provider: "glm", message: "", status: 503 }))
    ).toBe(true);
    expect(
      isRetryableError(new ProviderError({ provider: "glm", message: "", status: 400 }))
    ).toBe(false);
    expect(isRetryableError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(isRetryableError(new Error("boom"))).toBe(false);
  });
});

describe("createModelGateway", () => {
  it("sends history and tools and returns a text reply", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        choices: [{ message: { content: "4" } }],
        usage: { prompt_tokens: 12, completion_tokens: 1, total_tokens: 13 },
      })
    );
    const gateway = createModelGateway({
      providers: { deepseek: { apiKey: "test-key", fetch: fetchMock } },
      defaultModel: "deepseek-chat",
      logger: silentLogger(),
    });

    const reply = await gateway.send(request);

    expect(reply).toEqual({
      kind: "text",
      text: "4",
      usage: { inputTokens: 12, outputTokens: 1, totalTokens: 13 },
    });
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://api.deepseek.com/v1/chat/completions"
    );
    expect(requestBody(fetchMock)).toMatchObject({
      model: "deepseek-chat",
      stream: false,
      tools: [
        {
          type: "function",
          function: {
            name: "add",
            description: "Add two integers",
            parameters: { type: "object" },
          },
        },
      ],
    });
  });

  it("prefers tool calls over content and names calls that lack an id", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({
        choices: [
          {
            message: {
              content: "let me check",
              tool_calls: [
                { id: "x", type: "function", function: { name: "add", arguments: '{"a":1}' } },
                { type: "function", function: { name: "add", arguments: '{"a":2}' } },
              ],
            },
          },
        ],
      })
    );
    const gateway = createModelGateway({
      providers: { deepseek: { apiKey: "test-key", fetch: fetchMock } },
      defaultModel: "deepseek-chat",
      logger: silentLogger(),
    });

    await expect(gateway.send({ ...request, requestId: "run-1:2" })).resolves.toEqual({
      kind: "tool-calls",
      calls: [
        { callId: "x", toolName: "add", rawArguments: '{"a":1}' },
        { callId: "call_run-1:2_1", toolName: "add", rawArguments: '{"a":2}' },
      ],
      usage: undefined,
    });
  });

  it("unlinks from the caller's signal once the request settles", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ choices: [{ message: { content: "ok" } }] }));
    const gateway = createModelGateway({
      providers: { deepseek: { apiKey: "test-key", fetch: fetchMock } },
      defaultModel: "deepseek-chat",
      logger: silentLogger(),
    });
    const controller = new AbortController();
    const added = vi.spyOn(controller.signal, "addEventListener");
    const removed = vi.spyOn(controller.signal, "removeEventListener");

    await gateway.send({ ...request, abortSignal: controller.signal });

    expect(added).toHaveBeenCalledTimes(1);
    expect(removed).toHaveBeenCalledTimes(1);
    expect(removed).toHaveBeenCalledWith("abort", added.mock.calls[0][1]);
  });

  it("retries a server error and then succeeds", async () => {
    const logger = silentLogger();
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ error: { message: "overloaded" } }, 503))
      .mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: "ok" } }] }));
    const gateway = createModelGateway({
      providers: { glm: { apiKey: "test-key", fetch: fetchMock } },
      defaultModel: "glm-4-flash",
      retry: { maxRetries: 1, backoffMs: 0, jitter: 0 },
      logger,
    });

    await expect(gateway.send(request)).resolves.toMatchObject({
      kind: "text",
      text: "ok",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(logger.logRetry).toHaveBeenCalledTimes(1);
    expect(logger.logRetry).toHaveBeenCalledWith(
      expect.objectContaining({ attempt: 1, delayMs: 0, model: "glm-4-flash" })
    );
  });

  it("falls back to the next model after a non-retryable error", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse({ error: { message: "bad model", code: "invalid_model" } }, 400)
      )
      .mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: "ok" } }] }));
    const logger = silentLogger();
    const gateway = createModelGateway({
      providers: {
        deepseek: { apiKey: "test-key", fetch: fetchMock },
        glm: { apiKey: "test-key", fetch: fetchMock },
      },
      defaultModel: "deepseek-chat",
      fallbackModels: ["glm-4-flash"],
      logger,
    });

    await gateway.send(request);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe(
      "https://open.bigmodel.cn/api/paas/v4/chat/completions"
    );
    expect(logger.logError).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "deepseek-chat",
        error: {
          name: "ProviderError",
          message: "bad model",
          status: 400,
          code: "invalid_model",
        },
      })
    );
  });

  it("throws the last provider error when every model fails", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValue(jsonResponse({ error: { message: "bad key" } }, 401));
    const gateway = createModelGateway({
      providers: { deepseek: { apiKey: "test-key", fetch: fetchMock } },
      defaultModel: "deepseek-chat",
      logger: silentLogger(),
    });

    await expect(gateway.send(request)).rejects.toMatchObject({
      name: "ProviderError",
      status: 401,
      message: "bad key",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("streams completion chunks and unlinks the signal at the end", async () => {
    const events = [
      { choices: [{ index: 0, delta: { content: "4" } }] },
      {
        choices: [
          {
            index: 0,
            delta: {
              tool_calls: [
                { index: 0, id: "c9", function: { name: "add", arguments: "{" } },
              ],
            },
          },
        ],
      },
      { choices: [], usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 } },
    ];
    const body = `${events
      .map((e) => `data: ${JSON.stringify(e)}\n\n`)
      .join("")}data: [DONE]\n\n`;
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(body, { headers: { "Content-Type": "text/event-stream" } })
    );
    const gateway = createModelGateway({
      providers: { deepseek: { apiKey: "test-key", fetch: fetchMock } },
      defaultModel: "deepseek-chat",
      logger: silentLogger(),
    });
    const controller = new AbortController();
    const removed = vi.spyOn(controller.signal, "removeEventListener");

    const handle = await gateway.stream({ ...request, abortSignal: controller.signal });
    expect(removed).not.toHaveBeenCalled();
    const chunks: ModelStreamChunk[] = [];
    for (let chunk = await handle.next(); chunk; chunk = await handle.next()) {
      chunks.push(chunk);
    }

    expect(requestBody(fetchMock)).toMatchObject({
      stream: true,
      stream_options: { include_usage: true },
    });
    expect(chunks).toEqual([
      { kind: "text-delta", delta: "4" },
      {
        kind: "tool-call-delta",
        index: 0,
        callId: "c9",
        name: "add",
        argumentsDelta: "{",
      },
      { kind: "usage", usage: { inputTokens: 5, outputTokens: 2, totalTokens: 7 } },
    ]);
    expect(removed).toHaveBeenCalledTimes(1);
  });
});
