/**
 * Tool Registry: register tools by name, list specs for the model, dispatch calls.
 */

import {
  DeadlineExceededError,
  withDeadline,
} from "../../stage-0-model-gateway/src/deadline.js";
import type { ToolSpec } from "../../stage-0-model-gateway/src/types.js";
import type { ToolCallRequest } from "../../stage-1-conversation-history/src/types.js";
import type { ValidationOutcome } from "../../stage-2-output-control/src/types.js";
import { compileSchema } from "../../stage-2-output-control/src/validate.js";
import type {
  DispatchAllOptions,
  DispatchOptions,
  Tool,
  ToolContext,
  ToolDispatchResult,
  ToolFailure,
  ToolRegistry,
} from "./types.js";

export class ToolRegistrationError extends Error {
  readonly toolName: string;

  constructor(options: { toolName: string; message: string }) {
    super(options.message);
    this.name = "ToolRegistrationError";
    this.toolName = options.toolName;
  }
}

type BoundCall = (context: ToolContext) => Promise<unknown>;

interface RegisteredTool {
  spec: ToolSpec;
  fatalOnError: boolean;
  /** Validate arguments; on success, a thunk that runs the tool with them. */
  bind(args: unknown): ValidationOutcome<BoundCall>;
  checkReturn?: (value: unknown) => ValidationOutcome<unknown>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function decodeArguments(
  raw: ToolCallRequest["rawArguments"]
): ValidationOutcome<unknown> {
  if (typeof raw !== "string") {
    // the tool gets its own copy; the request may already sit in the history
    return { accepted: true, value: structuredClone(raw) };
  }
  if (!raw.trim()) {
    return { accepted: true, value: {} };
  }
  try {
    return { accepted: true, value: JSON.parse(raw) as unknown };
  } catch (err) {
    return {
      accepted: false,
      errors: [`arguments are not valid JSON (${errorMessage(err)})`],
    };
  }
}

function toRegisteredTool<TArgs extends object, TResult>(
  tool: Tool<TArgs, TResult>,
  name: string
): RegisteredTool {
  const checkArgs = compileSchema<TArgs>(tool.parameters);
  const spec: ToolSpec = {
    name,
    description: tool.description,
    parameters: tool.parameters,
  };
  if (tool.returns) {
    spec.returns = tool.returns;
  }

  return {
    spec,
    fatalOnError: tool.fatalOnError ?? false,
    bind(args: unknown): ValidationOutcome<BoundCall> {
      const outcome = checkArgs(args);
      if (!outcome.accepted) {
        return outcome;
      }
      const validArgs = outcome.value;
      return {
        accepted: true,
        value: async (context) => tool.execute(validArgs, context),
      };
    },
    checkReturn: tool.returns ? compileSchema(tool.returns) : undefined,
  };
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, RegisteredTool>();

  function unknownToolError(name: string): string {
    const available = Array.from(tools.keys());
    return available.length > 0
      ? `Unknown tool "${name}". Available tools: ${available.join(", ")}`
      : `Unknown tool "${name}". No tools are available.`;
  }

  function failed(
    call: ToolCallRequest,
    failure: ToolFailure
  ): ToolDispatchResult {
    return {
      message: {
        kind: "tool-result",
        callId: call.callId,
        toolName: call.toolName,
        payload: failure.error,
        isError: true,
      },
      failure,
    };
  }

  async function dispatch(
    call: ToolCallRequest,
    options: DispatchOptions = {}
  ): Promise<ToolDispatchResult> {
    const tool = tools.get(call.toolName);
    if (!tool) {
      return failed(call, {
        kind: "unknown_tool",
        fatal: false,
        error: unknownToolError(call.toolName),
      });
    }

    const decoded = decodeArguments(call.rawArguments);
    const bound = decoded.accepted ? tool.bind(decoded.value) : decoded;
    if (!bound.accepted) {
      return failed(call, {
        kind: "invalid_arguments",
        fatal: false,
        error: `Invalid arguments for tool "${call.toolName}":\n${bound.errors
          .map((e) => `- ${e}`)
          .join("\n")}`,
      });
    }

    const run = bound.value;
    let payload: unknown;
    try {
      payload = await withDeadline(
        `tool "${call.toolName}"`,
        options.deadlineMs,
        options.signal,
        (signal) => run({ callId: call.callId, signal })
      );
    } catch (err) {
      if (err instanceof DeadlineExceededError) {
        return failed(call, {
          kind: "timeout",
          fatal: true,
          error: `Error: ${err.message}`,
          cause: err,
        });
      }
      return failed(call, {
        kind: "execution_error",
        fatal: tool.fatalOnError,
        error: `Error: ${errorMessage(err)}`,
        cause: err,
      });
    }

    // snapshot at return time: later changes by the tool must not reach the history
    try {
      payload = structuredClone(payload);
    } catch (err) {
      return failed(call, {
        kind: "execution_error",
        fatal: tool.fatalOnError,
        error: `Error: tool "${call.toolName}" returned a value that cannot be copied: ${errorMessage(err)}`,
        cause: err,
      });
    }

    const returned = tool.checkReturn?.(payload);
    if (returned && !returned.accepted) {
      return failed(call, {
        kind: "execution_error",
        fatal: tool.fatalOnError,
        error: `Error: tool "${call.toolName}" returned an invalid result: ${returned.errors.join("; ")}`,
      });
    }

    return {
      message: {
        kind: "tool-result",
        callId: call.callId,
        toolName: call.toolName,
        payload,
        isError: false,
      },
    };
  }

  return {
    get size() {
      return tools.size;
    },

    register<TArgs extends object, TResult>(tool: Tool<TArgs, TResult>): void {
      const name = tool.name?.trim();
      if (!name) {
        throw new ToolRegistrationError({
          toolName: tool.name ?? "",
          message: "Tool name is required",
        });
      }
      if (tools.has(name)) {
        throw new ToolRegistrationError({
          toolName: name,
          message: `Tool already registered: ${name}`,
        });
      }
      let registered: RegisteredTool;
      try {
        registered = toRegisteredTool(tool, name);
      } catch (err) {
        throw new ToolRegistrationError({
          toolName: name,
          message: `Invalid schema for tool ${name}: ${errorMessage(err)}`,
        });
      }
      tools.set(name, registered);
    },

    has(name: string): boolean {
      return tools.has(name);
    },

    get(name: string): ToolSpec | undefined {
      return tools.get(name)?.spec;
    },

    specs(): ToolSpec[] {
      return Array.from(tools.values(), (t) => t.spec);
    },

    dispatch,

    async dispatchAll(
      calls: readonly ToolCallRequest[],
      options: DispatchAllOptions = {}
    ): Promise<ToolDispatchResult[]> {
      if (options.parallel ?? true) {
        return Promise.all(calls.map((call) => dispatch(call, options)));
      }
      const results: ToolDispatchResult[] = [];
      for (const call of calls) {
        results.push(await dispatch(call, options));
      }
      return results;
    },
  };
}
