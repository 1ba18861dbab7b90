import { describe, expect, it } from "vitest";

import type { ToolCallRequest } from "../../stage-1-conversation-history/src/types.js";
import {
  createToolRegistry,
  ToolRegistrationError,
  type Tool,
} from "../src/index.js";

const addTool: Tool<{ a: number; b: number }, number> = {
  name: "add",
  description: "Add two numbers",
  parameters: {
    type: "object",
    properties: { a: { type: "number" }, b: { type: "number" } },
    required: ["a", "b"],
    additionalProperties: false,
  },
  execute: ({ a, b }) => a + b,
};

function call(
  toolName: string,
  rawArguments: ToolCallRequest["rawArguments"],
  callId = "1"
): ToolCallRequest {
  return { callId, toolName, rawArguments };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("createToolRegistry", () => {
  it("lists specs in registration order", () => {
    const registry = createToolRegistry();
    registry.register(addTool);
    registry.register({
      name: "echo",
      description: "Echo a string",
      parameters: { type: "object" },
      returns: { type: "string" },
      execute: (args: { text?: string }) => String(args.text),
    });

    expect(registry.size).toBe(2);
    expect(registry.has("echo")).toBe(true);
    expect(registry.specs().map((s) => s.name)).toEqual(["add", "echo"]);
    expect(registry.get("echo")).toEqual({
      name: "echo",
      description: "Echo a string",
      parameters: { type: "object" },
      returns: { type: "string" },
    });
    expect(registry.get("missing")).toBeUndefined();
  });

  it("rejects duplicate and empty names", () => {
    const registry = createToolRegistry();
    registry.register(addTool);

    expect(() => registry.register(addTool)).toThrow(
      new ToolRegistrationError({
        toolName: "add",
        message: "Tool already registered: add",
      })
    );
    expect(() => registry.register({ ...addTool, name: "  " })).toThrow(
      "Tool name is required"
    );
    expect(registry.size).toBe(1);
  });

  it("rejects a schema ajv cannot compile", () => {
    const registry = createToolRegistry();

    expect(() =>
      registry.register({ ...addTool, parameters: { type: "not-a-type" } })
    ).toThrow(ToolRegistrationError);
    expect(registry.has("add")).toBe(false);
  });

  it("runs a tool with object or JSON-string arguments", async () => {
    const registry = createToolRegistry();
    registry.register(addTool);

    await expect(registry.dispatch(call("add", { a: 2, b: 3 }))).resolves.toEqual({
      message: {
        kind: "tool-result",
        callId: "1",
        toolName: "add",
        payload: 5,
        isError: false,
      },
    });
    const fromJson = await registry.dispatch(call("add", '{"a":1,"b":1}'));
    expect(fromJson.message.payload).toBe(2);
  });

  it("reports an unknown tool with the available names", async () => {
    const registry = createToolRegistry();
    const empty = await registry.dispatch(call("nope", {}));
    expect(empty.message.payload).toBe(
      'Unknown tool "nope". No tools are available.'
    );

    registry.register(addTool);
    const result = await registry.dispatch(call("nope", {}));
    expect(result.message).toEqual({
      kind: "tool-result",
      callId: "1",
      toolName: "nope",
      payload: 'Unknown tool "nope". Available tools: add',
      isError: true,
    });
    expect(result.failure?.kind).toBe("unknown_tool");
    expect(result.failure?.fatal).toBe(false);
  });

  it("reports arguments that fail the schema without running the tool", async () => {
    const registry = createToolRegistry();
    let executed = false;
    const tracked: Tool<{ a: number; b: number }, number> = {
      ...addTool,
      execute: ({ a, b }) => {
        executed = true;
        return a + b;
      },
    };
    registry.register(tracked);

    const result = await registry.dispatch(call("add", { a: 1 }));

    expect(executed).toBe(false);
    expect(result.message.isError).toBe(true);
    expect(result.message.payload).toBe(
      'Invalid arguments for tool "add":\n' +
        `- / must have required property 'b' ({"missingProperty":"b"})`
    );
    expect(result.failure?.kind).toBe("invalid_arguments");
  });

  it("reports arguments that are not JSON", async () => {
    const registry = createToolRegistry();
    registry.register(addTool);

    const result = await registry.dispatch(call("add", "{bad"));

    expect(String(result.message.payload)).toMatch(
      /^Invalid arguments for tool "add":\n- arguments are not valid JSON \(/
    );
    expect(result.failure?.kind).toBe("invalid_arguments");
  });

  it("treats blank string arguments as an empty object", async () => {
    const registry = createToolRegistry();
    registry.register({
      name: "now",
      description: "Fixed clock",
      parameters: { type: "object", properties: {} },
      execute: () => "2024-01-01T00:00:00Z",
    });

    const result = await registry.dispatch(call("now", "  "));
    expect(result.message.payload).toBe("2024-01-01T00:00:00Z");
  });

  it("reports a throwing tool as a non-fatal error result", async () => {
    const registry = createToolRegistry();
    registry.register({
      name: "fail",
      description: "Always fails",
      parameters: { type: "object" },
      execute: () => {
        throw new Error("disk full");
      },
    });

    const result = await registry.dispatch(call("fail", {}));

    expect(result.message.payload).toBe("Error: disk full");
    expect(result.message.isError).toBe(true);
    expect(result.failure?.kind).toBe("execution_error");
    expect(result.failure?.fatal).toBe(false);
    expect(result.failure?.cause).toBeInstanceOf(Error);
  });

  it("marks the failure fatal for fatalOnError tools", async () => {
    const registry = createToolRegistry();
    registry.register({
      name: "fail",
      description: "Always fails",
      parameters: { type: "object" },
      fatalOnError: true,
      execute: async () => {
        throw new Error("boom");
      },
    });

    const result = await registry.dispatch(call("fail", {}));
    expect(result.failure?.fatal).toBe(true);
    expect(result.message.payload).toBe("Error: boom");
  });

  it("rejects a return value that breaks the declared schema", async () => {
    const registry = createToolRegistry();
    registry.register({
      name: "count",
      description: "Returns a count",
      parameters: { type: "object" },
      returns: { type: "integer" },
      execute: () => "three",
    });

    const result = await registry.dispatch(call("count", {}));
    expect(result.message.payload).toBe(
      'Error: tool "count" returned an invalid result: / must be integer ({"type":"integer"})'
    );
    expect(result.failure?.kind).toBe("execution_error");
  });

  it("treats a timeout as fatal and aborts the tool's signal", async () => {
    const registry = createToolRegistry();
    let seenSignal: AbortSignal | undefined;
    registry.register({
      name: "hang",
      description: "Never returns",
      parameters: { type: "object" },
      execute: (_args, context) => {
        seenSignal = context.signal;
        return new Promise<never>(() => {});
      },
    });

    const result = await registry.dispatch(call("hang", {}, "h1"), {
      deadlineMs: 20,
    });

    expect(result.message).toEqual({
      kind: "tool-result",
      callId: "h1",
      toolName: "hang",
      payload: 'Error: tool "hang" exceeded its 20 ms deadline',
      isError: true,
    });
    expect(result.failure?.kind).toBe("timeout");
    expect(result.failure?.fatal).toBe(true);
    expect(seenSignal?.aborted).toBe(true);
  });

  it("passes the call id to the tool", async () => {
    const registry = createToolRegistry();
    registry.register({
      name: "whoami",
      description: "Returns the call id",
      parameters: { type: "object" },
      execute: (_args, context) => context.callId,
    });

    const result = await registry.dispatch(call("whoami", {}, "call_7"));
    expect(result.message.payload).toBe("call_7");
  });

  it("hands the tool a copy of the arguments and keeps a copy of its result", async () => {
    const registry = createToolRegistry();
    const kept: string[][] = [];
    registry.register({
      name: "tag",
      description: "Tags a name",
      parameters: { type: "object", properties: { name: { type: "string" } } },
      execute: (args: { name: string }) => {
        args.name = "changed";
        const out = ["tagged"];
        kept.push(out);
        return out;
      },
    });
    const request = call("tag", { name: "ada" });

    const result = await registry.dispatch(request);
    kept[0].push("later");

    expect(request.rawArguments).toEqual({ name: "ada" });
    expect(result.message.payload).toEqual(["tagged"]);
  });

  it("reports a result that cannot be copied as an execution error", async () => {
    const registry = createToolRegistry();
    registry.register({
      name: "callback",
      description: "Returns a function",
      parameters: { type: "object" },
      execute: () => () => "nope",
    });

    const result = await registry.dispatch(call("callback", {}));

    expect(result.message.isError).toBe(true);
    expect(result.failure?.kind).toBe("execution_error");
    expect(String(result.message.payload)).toMatch(
      /^Error: tool "callback" returned a value that cannot be copied: /
    );
  });

  describe("dispatchAll", () => {
    const sleepTool: Tool<{ ms: number; label: string }, string> = {
      name: "sleep",
      description: "Wait, then return the label",
      parameters: {
        type: "object",
        properties: { ms: { type: "number" }, label: { type: "string" } },
        required: ["ms", "label"],
      },
      execute: async ({ ms, label }) => {
        await sleep(ms);
        finished.push(label);
        return label;
      },
    };
    let finished: string[] = [];

    it("keeps request order when calls finish out of order", async () => {
      finished = [];
      const registry = createToolRegistry();
      registry.register(sleepTool);

      const results = await registry.dispatchAll([
        call("sleep", { ms: 30, label: "slow" }, "a"),
        call("sleep", { ms: 1, label: "fast" }, "b"),
      ]);

      expect(finished).toEqual(["fast", "slow"]);
      expect(results.map((r) => r.message.callId)).toEqual(["a", "b"]);
      expect(results.map((r) => r.message.payload)).toEqual(["slow", "fast"]);
    });

    it("runs calls one at a time when parallel is off", async () => {
      finished = [];
      const registry = createToolRegistry();
      registry.register(sleepTool);

      await registry.dispatchAll(
        [
          call("sleep", { ms: 30, label: "slow" }, "a"),
          call("sleep", { ms: 1, label: "fast" }, "b"),
        ],
        { parallel: false }
      );

      expect(finished).toEqual(["slow", "fast"]);
    });

    it("returns an error result per failing call", async () => {
      const registry = createToolRegistry();
      registry.register(addTool);

      const results = await registry.dispatchAll([
        call("add", { a: 1, b: 2 }, "a"),
        call("missing", {}, "b"),
      ]);

      expect(results.map((r) => r.message.isError)).toEqual([false, true]);
      expect(results[1]?.failure?.kind).toBe("unknown_tool");
    });
  });
});
