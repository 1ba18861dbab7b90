/**
 * Stage 4 Agent Core 基础用法（离线可运行）：
 * - Function Gateway 模拟模型：先调用 add 工具，再给出一次不合格答案，最后给出正确答案
 * - runAgent：工具结果回注、校验失败后带反馈重试、最终得到 Accepted(4)
 * - streamAgent：同样的协议，逐块输出 partial-text / tool-call-started / final
 * 运行参数（maxRetries / maxSteps / deadline / LOG_LEVEL）来自 .env。
 */

import { loadRunConfig } from "../../../config/index.js";
import {
  createFunctionGateway,
  type DeltaToolCalls,
  type ModelReply,
} from "../../stage-0-model-gateway/src/index.js";
import {
  describeMessage,
  type ConversationMessage,
} from "../../stage-1-conversation-history/src/index.js";
import { createSchemaValidator } from "../../stage-2-output-control/src/index.js";
import { createToolRegistry, type Tool } from "../../stage-3-tool-system/src/index.js";
import {
  createAgentStateStore,
  createConsoleRunLogger,
  runAgent,
  streamAgent,
} from "../src/index.js";

const addTool: Tool<{ a: number; b: number }, number> = {
  name: "add",
  description: "Add two numbers.",
  parameters: {
    type: "object",
    properties: {
      a: { type: "number" },
      b: { type: "number" },
    },
    required: ["a", "b"],
    additionalProperties: false,
  },
  execute: ({ a, b }) => a + b,
};

/** 模拟模型：根据已有消息决定下一步 */
function scriptedModel(messages: readonly ConversationMessage[]): ModelReply {
  const last = messages[messages.length - 1];
  if (last?.kind === "user-prompt" && !last.retry) {
    return {
      kind: "tool-calls",
      calls: [{ callId: "1", toolName: "add", rawArguments: { a: 2, b: 2 } }],
    };
  }
  if (last?.kind === "tool-result") {
    return { kind: "text", text: "The answer is four." };
  }
  return { kind: "text", text: "4" };
}

async function* scriptedStream(
  messages: readonly ConversationMessage[]
): AsyncIterable<string | DeltaToolCalls> {
  const reply = scriptedModel(messages);
  if (reply.kind === "tool-calls") {
    // 参数分两块到达，由 stream adapter 合并
    yield { 0: { name: "add", jsonArgs: '{"a":2,' } };
    yield { 0: { jsonArgs: '"b":2}' } };
    return;
  }
  for (const word of reply.text.split(/(?<= )/)) {
    yield word;
  }
}

async function main() {
  const config = loadRunConfig();
  const gateway = createFunctionGateway({
    send: scriptedModel,
    stream: scriptedStream,
  });
  const toolRegistry = createToolRegistry();
  toolRegistry.register(addTool);
  const stateStore = createAgentStateStore();
  const deps = {
    gateway,
    validator: createSchemaValidator<number>({ type: "integer" }),
    toolRegistry,
    stateStore,
    logger: createConsoleRunLogger(config.logLevel),
  };
  const options = {
    systemPrompt: "Answer with a single integer.",
    maxRetries: config.maxRetries,
    maxSteps: config.maxSteps,
    deadlineMs: config.deadlineMs,
  };

  console.log("========== runAgent ==========");
  const result = await runAgent(deps, "What is 2+2?", options);
  for (const message of result.history) {
    console.log(describeMessage(message));
  }
  console.log(
    result.success
      ? `Accepted: ${result.value}`
      : `Failure: ${result.reason} (${result.lastErrors.join("; ")})`,
    `steps=${result.steps} retriesRemaining=${result.retriesRemaining}`
  );

  console.log("\n========== streamAgent ==========");
  for await (const event of streamAgent(deps, "What is 2+2?", options)) {
    switch (event.kind) {
      case "partial-text":
        console.log(`[step ${event.step}] partial: ${JSON.stringify(event.delta)}`);
        break;
      case "tool-call-started":
        console.log(`[step ${event.step}] tool call: ${event.toolName}#${event.callId}`);
        break;
      case "final":
        console.log(
          "final:",
          event.result.success ? event.result.value : event.result.reason
        );
        break;
    }
  }

  console.log("\n========== Runs ==========");
  for (const run of stateStore.list()) {
    console.log(run.runId, run.status, `steps=${run.steps}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
