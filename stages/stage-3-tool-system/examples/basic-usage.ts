/**
 * Stage 3 Tool System 基础用法：
 * - 注册若干工具（get_weather、get_time）
 * - 查看提供给模型的工具描述
 * - 分发一组工具调用（包括未知工具和非法参数），结果按请求顺序返回
 */

import { createToolRegistry, type Tool } from "../src/index.js";

// ---------- 工具定义 ----------

/** 模拟天气工具：根据城市返回假数据 */
const getWeatherTool: Tool<
  { city: string },
  { city: string; temp: number; unit: string }
> = {
  name: "get_weather",
  description:
    "Get current weather for a given city. Use when user asks about weather.",
  parameters: {
    type: "object",
    properties: {
      city: {
        type: "string",
        description: "City name, e.g. Beijing, Shanghai",
      },
    },
    required: ["city"],
    additionalProperties: false,
  },
  async execute(args) {
    // 模拟查询：固定返回假数据
    return { city: args.city, temp: 21, unit: "celsius" };
  },
};

/** 模拟当前时间工具 */
const getTimeTool: Tool<Record<string, never>, string> = {
  name: "get_time",
  description:
    "Get current date and time. Use when user asks what time it is or today's date.",
  parameters: {
    type: "object",
    properties: {},
    additionalProperties: false,
  },
  async execute() {
    return new Date().toISOString();
  },
};

async function main() {
  const registry = createToolRegistry();
  registry.register(getWeatherTool);
  registry.register(getTimeTool);

  console.log("========== Tool specs ==========");
  console.log(JSON.stringify(registry.specs(), null, 2));

  const results = await registry.dispatchAll(
    [
      { callId: "1", toolName: "get_weather", rawArguments: '{"city":"Beijing"}' },
      { callId: "2", toolName: "get_time", rawArguments: {} },
      { callId: "3", toolName: "get_stock", rawArguments: {} },
      { callId: "4", toolName: "get_weather", rawArguments: { town: "Paris" } },
    ],
    { deadlineMs: 5_000 }
  );

  console.log("\n========== Dispatch results ==========");
  for (const { message, failure } of results) {
    console.log(
      `${message.toolName}#${message.callId}`,
      failure ? `[${failure.kind}]` : "[ok]",
      message.payload
    );
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
