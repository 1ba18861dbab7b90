/**
 * Stage 0 Model Gateway 基础用法：
 * 从全局配置组装 HTTP Gateway，发一次 send 请求，再发一次 stream 请求，
 * 展示返回的 reply 类型 / 文本 / usage。
 */

import {
  buildProviderConfigFromModelMaps,
  getDefaultModelFromMaps,
  getFallbackModelsFromMaps,
  getModelProviderMapFromMaps,
} from "../../../config/index.js";
import {
  createModelGateway,
  type GatewayRequest,
  type ModelReply,
} from "../src/index.js";

/** 打印 Stage 0 知识点. */
function printKnowledgePoints() {
  console.log("\n========== Stage 0 知识点 ==========");
  console.log(
    "1. 模型网关：run loop 只依赖 ModelGateway 契约（send / stream），不关心具体厂商。"
  );
  console.log(
    "2. HTTP Gateway：OpenAI 兼容接口，支持模型切换、超时、重试、降级。"
  );
  console.log(
    "3. Reply 只有两种：text 或 tool-calls；流式返回 text-delta / tool-call-delta / usage 块。"
  );
  console.log("====================================\n");
}

function summarizeReply(reply: ModelReply): string {
  if (reply.kind === "text") {
    return reply.text.slice(0, 300) + (reply.text.length > 300 ? "..." : "");
  }
  return reply.calls.map((c) => `${c.toolName}#${c.callId}`).join(", ");
}

async function main() {
  printKnowledgePoints();

  const defaultModel = getDefaultModelFromMaps();
  const gateway = createModelGateway({
    providers: buildProviderConfigFromModelMaps(),
    defaultModel,
    modelProviderMap: getModelProviderMapFromMaps(),
    fallbackModels: getFallbackModelsFromMaps().filter(
      (m) => m !== defaultModel
    ),
    timeoutMs: 20000,
    retry: { maxRetries: 2, backoffMs: 400, maxBackoffMs: 2000, jitter: 0.2 },
    temperature: 0.2,
    logger: {
      logRequest: () => {},
      logResponse: () => {},
      logError: (e) => console.error(e),
      logRetry: (e) => console.warn(`重试第 ${e.attempt} 次，${e.delayMs}ms 后`),
    },
  });

  const request: GatewayRequest = {
    messages: [{ kind: "user-prompt", content: "今天是星期几" }],
    tools: [],
  };

  const reply = await gateway.send(request);
  console.log("========== send ==========");
  console.log(`[${reply.kind}]`, summarizeReply(reply));
  if (reply.usage) console.log("Usage:", reply.usage);

  console.log("\n========== stream ==========");
  const handle = await gateway.stream(request);
  try {
    for (let chunk = await handle.next(); chunk; chunk = await handle.next()) {
      if (chunk.kind === "text-delta") {
        process.stdout.write(chunk.delta);
      } else if (chunk.kind === "usage") {
        console.log("\nUsage:", chunk.usage);
      }
    }
  } finally {
    await handle.close();
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
