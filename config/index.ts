import "dotenv/config";

import type { LogLevel } from "../stages/stage-0-model-gateway/src/logger.js";
import type {
  ProviderConfig,
  ProviderName,
} from "../stages/stage-0-model-gateway/src/types.js";

export interface ModelMap {
  model: string;
  endpoint: string;
  apiKey?: string;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly variable: string;

  constructor(options: { variable: string; message: string }) {
    super(options.message);
    this.name = "ConfigError";
    this.variable = options.variable;
  }
}

export function getModelMaps(env: Env = process.env): Record<ProviderName, ModelMap> {
  return {
    deepseek: {
      model: "deepseek-chat",
      endpoint: "https://api.deepseek.com/v1",
      apiKey: env.DEEPSEEK_API_KEY,
    },
    glm: {
      model: "glm-4.7",
      endpoint: "https://open.bigmodel.cn/api/paas/v4",
      apiKey: env.GLM_API_KEY,
    },
  };
}

// 按 deepseek -> glm 的顺序选择 fallback
const PROVIDER_ORDER: ProviderName[] = ["deepseek", "glm"];

export interface RunConfig {
  maxRetries: number;
  maxSteps: number;
  deadlineMs?: number;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "info", "debug"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readInteger(
  env: Env,
  variable: string,
  options: { min: number }
): number | undefined {
  const raw = env[variable]?.trim();
  if (!raw) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < options.min) {
    throw new ConfigError({
      variable,
      message: `${variable} must be an integer >= ${options.min}, got "${raw}"`,
    });
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) {
    return "info";
  }
  if (!isLogLevel(raw)) {
    throw new ConfigError({
      variable: "LOG_LEVEL",
      message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`,
    });
  }
  return raw;
}

// 从 .env 读取 run 相关配置，避免在调用处直接读取环境变量
export function loadRunConfig(env: Env = process.env): RunConfig {
  return {
    maxRetries: readInteger(env, "AGENT_MAX_RETRIES", { min: 0 }) ?? 1,
    maxSteps: readInteger(env, "AGENT_MAX_STEPS", { min: 1 }) ?? 10,
    deadlineMs: readInteger(env, "AGENT_DEADLINE_MS", { min: 1 }),
    logLevel: readLogLevel(env),
  };
}

// 从 model map 构建 Provider 配置（apiKey + baseUrl）
export function buildProviderConfigFromModelMaps(
  env: Env = process.env
): ProviderConfig {
  const maps = getModelMaps(env);
  const providers: ProviderConfig = {};
  for (const name of PROVIDER_ORDER) {
    const { apiKey, endpoint } = maps[name];
    if (apiKey) {
      providers[name] = { apiKey, baseUrl: endpoint };
    }
  }
  return providers;
}

// model -> provider 映射（始终包含 model map 中的 model，与 apiKey 无关）
export function getModelProviderMapFromMaps(
  env: Env = process.env
): Record<string, ProviderName> {
  const maps = getModelMaps(env);
  const map: Record<string, ProviderName> = {};
  for (const name of PROVIDER_ORDER) {
    map[maps[name].model] = name;
  }
  return map;
}

// 有 apiKey 的 model，按 deepseek -> glm 排序
export function getFallbackModelsFromMaps(env: Env = process.env): string[] {
  const maps = getModelMaps(env);
  return PROVIDER_ORDER.filter((name) => maps[name].apiKey).map(
    (name) => maps[name].model
  );
}

// DEFAULT_MODEL 优先，否则取第一个有 apiKey 的 model
export function getDefaultModelFromMaps(env: Env = process.env): string {
  const fromEnv = env.DEFAULT_MODEL?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const [first] = getFallbackModelsFromMaps(env);
  if (first) {
    return first;
  }
  throw new ConfigError({
    variable: "DEFAULT_MODEL",
    message: "No API key found. Set DEEPSEEK_API_KEY or GLM_API_KEY in .env.",
  });
}
