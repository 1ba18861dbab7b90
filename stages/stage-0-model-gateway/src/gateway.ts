import { randomUUID } from "node:crypto";

import { createConsoleLogger } from "./logger.js";
import { buildProviderRegistry } from "./providers/index.js";
import type { LLMProvider } from "./providers/types.js";
import { withRetry } from "./retry.js";
import type {
  GatewayConfig,
  GatewayRequest,
  ModelGateway,
  ModelReply,
  ModelStreamHandle,
  ProviderName,
  ProviderRequest,
  RequestLogger,
  ResponseLog,
} from "./types.js";

const DEFAULT_MODEL_PROVIDER_MAP: Record<string, ProviderName> = {
  "glm-4.7": "glm",
  "glm-4-flash": "glm",
  "glm-4-plus": "glm",
  "deepseek-chat": "deepseek",
  "deepseek-reasoner": "deepseek",
};

interface MergedSignal {
  signal?: AbortSignal;
  /** Stop the per-attempt timer; the caller's signal stays linked. */
  clearTimer: () => void;
  /** Clear the timer and unlink from the caller's signal. */
  dispose: () => void;
}

function createMergedSignal(
  abortSignal: AbortSignal | undefined,
  timeoutMs: number | undefined
): MergedSignal {
  if (!abortSignal && !timeoutMs) {
    return { clearTimer: () => {}, dispose: () => {} };
  }

  const controller = new AbortController();
  const timeoutId = timeoutMs
    ? setTimeout(() => controller.abort(), timeoutMs)
    : undefined;
  const onAbort = () => controller.abort(abortSignal?.reason);

  if (abortSignal?.aborted) {
    onAbort();
  } else {
    abortSignal?.addEventListener("abort", onAbort, { once: true });
  }

  const clearTimer = () => clearTimeout(timeoutId);
  return {
    signal: controller.signal,
    clearTimer,
    dispose: () => {
      clearTimer();
      abortSignal?.removeEventListener("abort", onAbort);
    },
  };
}

/** Unlink the attempt's signal once the stream ends, fails or is closed. */
function releaseOnEnd(handle: ModelStreamHandle, release: () => void): ModelStreamHandle {
  return {
    async next() {
      try {
        const chunk = await handle.next();
        if (!chunk) {
          release();
        }
        return chunk;
      } catch (error) {
        release();
        throw error;
      }
    },
    async close() {
      release();
      await handle.close();
    },
  };
}

function resolveProviderName(
  model: string,
  explicitProvider: ProviderName | undefined,
  modelProviderMap: Record<string, ProviderName>
): ProviderName {
  if (explicitProvider) {
    return explicitProvider;
  }

  const provider = modelProviderMap[model];
  if (!provider) {
    throw new Error(`No provider mapping found for model: ${model}`);
  }

  return provider;
}

function ensureProvider(
  registry: Map<ProviderName, LLMProvider>,
  providerName: ProviderName
): LLMProvider {
  const provider = registry.get(providerName);
  if (!provider) {
    throw new Error(`Provider not configured: ${providerName}`);
  }
  return provider;
}

function describeError(error: unknown) {
  if (!(error instanceof Error)) {
    return { name: "Error", message: String(error) };
  }
  const extra: { status?: number; code?: string } = {};
  if ("status" in error && typeof error.status === "number") {
    extra.status = error.status;
  }
  if ("code" in error && typeof error.code === "string") {
    extra.code = error.code;
  }
  return { name: error.name, message: error.message, ...extra };
}

/**
 * HTTP Model Gateway over OpenAI-compatible providers: model → provider
 * routing, fallback models, per-request timeout and transport retry.
 */
export function createModelGateway(config: GatewayConfig): ModelGateway {
  const modelProviderMap = {
    ...DEFAULT_MODEL_PROVIDER_MAP,
    ...(config.modelProviderMap ?? {}),
  };
  const registry = buildProviderRegistry(config.providers);
  const logger: RequestLogger = config.logger ?? createConsoleLogger("info");

  async function attempt<T>(
    request: GatewayRequest,
    stream: boolean,
    call: (
      provider: LLMProvider,
      request: ProviderRequest,
      signal: MergedSignal
    ) => Promise<T>,
    summarize: (result: T) => Pick<ResponseLog, "replyKind" | "usage">
  ): Promise<T> {
    const model = config.defaultModel;
    if (!model) {
      throw new Error("Model is required. Provide config.defaultModel.");
    }

    const modelsToTry = [model, ...(config.fallbackModels ?? [])];
    const requestId = request.requestId ?? randomUUID();
    let lastError: unknown;

    for (const candidate of modelsToTry) {
      const providerName = resolveProviderName(
        candidate,
        config.provider,
        modelProviderMap
      );
      const provider = ensureProvider(registry, providerName);
      const attemptStart = Date.now();

      logger.logRequest({
        timestamp: new Date().toISOString(),
        requestId,
        model: candidate,
        provider: providerName,
        messageCount: request.messages.length,
        toolCount: request.tools.length,
        stream,
        timeoutMs: config.timeoutMs,
      });

      try {
        const result = await withRetry(async () => {
          const merged = createMergedSignal(request.abortSignal, config.timeoutMs);
          try {
            return await call(
              provider,
              {
                ...request,
                model: candidate,
                requestId,
                abortSignal: merged.signal,
                temperature: config.temperature,
                maxTokens: config.maxTokens,
              },
              merged
            );
          } catch (error) {
            merged.dispose();
            throw error;
          }
        }, config.retry, {
          signal: request.abortSignal,
          onRetry: ({ attempt, delayMs, error }) =>
            logger.logRetry({
              timestamp: new Date().toISOString(),
              requestId,
              model: candidate,
              provider: providerName,
              attempt,
              delayMs,
              error: describeError(error),
            }),
        });

        logger.logResponse({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs: Date.now() - attemptStart,
          ...summarize(result),
        });
        return result;
      } catch (error) {
        lastError = error;
        logger.logError({
          timestamp: new Date().toISOString(),
          requestId,
          model: candidate,
          provider: providerName,
          durationMs: Date.now() - attemptStart,
          error: describeError(error),
        });
        if (request.abortSignal?.aborted) {
          break;
        }
      }
    }

    throw (
      lastError ?? new Error("Model Gateway failed without an explicit error.")
    );
  }

  return {
    name: `http:${config.defaultModel ?? "unset"}`,

    send(request: GatewayRequest): Promise<ModelReply> {
      return attempt(
        request,
        false,
        async (provider, providerRequest, merged) => {
          try {
            return await provider.send(providerRequest);
          } finally {
            merged.dispose();
          }
        },
        (reply) => ({ replyKind: reply.kind, usage: reply.usage })
      );
    },

    stream(request: GatewayRequest): Promise<ModelStreamHandle> {
      return attempt(
        request,
        true,
        async (provider, providerRequest, merged) => {
          const handle = await provider.stream(providerRequest);
          // 流式请求只对建立连接计时，逐块超时由调用方负责；调用方的取消信号保持到流结束
          merged.clearTimer();
          return releaseOnEnd(handle, merged.dispose);
        },
        () => ({ replyKind: "stream" })
      );
    },
  };
}
