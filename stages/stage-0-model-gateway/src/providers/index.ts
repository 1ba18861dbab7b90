import type { OpenAICompatibleConfig, ProviderConfig, ProviderName } from "../types.js";
import { createOpenAICompatibleProvider } from "./openai.js";
import type { LLMProvider } from "./types.js";

export const DEFAULT_BASE_URLS: Record<ProviderName, string> = {
  deepseek: "https://api.deepseek.com/v1",
  glm: "https://open.bigmodel.cn/api/paas/v4",
};

export function createProvider(
  name: ProviderName,
  config: OpenAICompatibleConfig
): LLMProvider {
  return createOpenAICompatibleProvider(name, config, DEFAULT_BASE_URLS[name]);
}

export function buildProviderRegistry(
  providers: ProviderConfig
): Map<ProviderName, LLMProvider> {
  const registry = new Map<ProviderName, LLMProvider>();
  if (providers.deepseek) {
    registry.set("deepseek", createProvider("deepseek", providers.deepseek));
  }
  if (providers.glm) {
    registry.set("glm", createProvider("glm", providers.glm));
  }
  return registry;
}

export { ProviderError, type LLMProvider } from "./types.js";
