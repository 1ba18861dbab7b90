import type {
  ModelReply,
  ModelStreamHandle,
  ProviderName,
  ProviderRequest,
} from "../types.js";

export interface LLMProvider {
  name: ProviderName;
  send(request: ProviderRequest): Promise<ModelReply>;
  stream(request: ProviderRequest): Promise<ModelStreamHandle>;
}

export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;
  readonly code?: string;

  constructor(options: {
    provider: ProviderName;
    message: string;
    status?: number;
    code?: string;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status = options.status;
    this.code = options.code;
  }
}
