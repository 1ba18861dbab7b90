export { DeadlineExceededError, withDeadline } from "./deadline.js";
export { GatewayProtocolError } from "./errors.js";
export {
  createFunctionGateway,
  type DeltaToolCall,
  type DeltaToolCalls,
  type FunctionDef,
  type FunctionGatewayOptions,
  type GatewayInfo,
  type StreamFunctionDef,
} from "./function-gateway.js";
export { createModelGateway } from "./gateway.js";
export { createConsoleLogger, isLevelEnabled, type LogLevel } from "./logger.js";
export { createProvider, DEFAULT_BASE_URLS } from "./providers/index.js";
export {
  formatPayload,
  parseCompletion,
  parseStreamEvent,
  toWireMessages,
} from "./providers/openai.js";
export { ProviderError, type LLMProvider } from "./providers/types.js";
export { backoffDelay, isRetryableError, withRetry, type RetryHooks } from "./retry.js";
export type {
  DeepSeekConfig,
  ErrorLog,
  GatewayConfig,
  GatewayRequest,
  GLMConfig,
  ModelGateway,
  ModelReply,
  ModelStreamChunk,
  ModelStreamHandle,
  OpenAICompatibleConfig,
  ProviderConfig,
  ProviderName,
  ProviderRequest,
  RequestLog,
  RequestLogger,
  RequestRetryLog,
  ResponseLog,
  RetryOptions,
  ToolSpec,
  Usage,
} from "./types.js";
