/**
 * Stage 1 Conversation History 基础用法：
 * 追加消息、查看未完成的工具调用、演示非法工具结果被拒绝。
 */

import {
  createConversationHistory,
  describeMessage,
  HistoryProtocolError,
} from "../src/index.js";

function main() {
  const history = createConversationHistory([
    { kind: "system-prompt", content: "You are a calculator." },
    { kind: "user-prompt", content: "What is 2+2?" },
  ]);

  history.append({
    kind: "model-tool-calls",
    calls: [{ callId: "1", toolName: "add", rawArguments: { a: 2, b: 2 } }],
  });
  console.log(
    "Pending tool calls:",
    history.pendingToolCalls().map((c) => `${c.toolName}#${c.callId}`)
  );

  history.append({
    kind: "tool-result",
    callId: "1",
    toolName: "add",
    payload: 4,
    isError: false,
  });
  history.append({ kind: "model-text", content: "4" });

  console.log("\n========== History ==========");
  for (const message of history.messages()) {
    console.log(describeMessage(message));
  }

  try {
    history.append({
      kind: "tool-result",
      callId: "1",
      toolName: "add",
      payload: 4,
      isError: false,
    });
  } catch (error) {
    if (error instanceof HistoryProtocolError) {
      console.log("\nRejected:", error.message);
    } else {
      throw error;
    }
  }
}

main();
