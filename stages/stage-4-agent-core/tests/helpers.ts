import { createFunctionGateway } from "../../stage-0-model-gateway/src/function-gateway.js";
import type {
  ModelGateway,
  ModelReply,
  ModelStreamChunk,
  ModelStreamHandle,
} from "../../stage-0-model-gateway/src/types.js";
import type { ConversationMessage } from "../../stage-1-conversation-history/src/types.js";
import type { Tool } from "../../stage-3-tool-system/src/types.js";

export interface ScriptedGateway {
  gateway: ModelGateway;
  /** Messages seen by each model call, in call order. */
  calls: (readonly ConversationMessage[])[];
}

/** Gateway that answers each call with the next scripted reply. */
export function scriptedGateway(replies: ModelReply[]): ScriptedGateway {
  const calls: (readonly ConversationMessage[])[] = [];
  const gateway = createFunctionGateway({
    send: function scripted(messages) {
      calls.push(messages);
      const reply = replies[calls.length - 1];
      if (!reply) {
        throw new Error(`no scripted reply for call ${calls.length}`);
      }
      return reply;
    },
  });
  return { gateway, calls };
}

export function text(value: string): ModelReply {
  return { kind: "text", text: value };
}

export function toolCalls(
  ...calls: Array<[callId: string, toolName: string, args: Record<string, unknown> | string]>
): ModelReply {
  return {
    kind: "tool-calls",
    calls: calls.map(([callId, toolName, rawArguments]) => ({
      callId,
      toolName,
      rawArguments,
    })),
  };
}

export const addTool: Tool<{ a: number; b: number }, number> = {
  name: "add",
  description: "Add two numbers",
  parameters: {
    type: "object",
    properties: { a: { type: "number" }, b: { type: "number" } },
    required: ["a", "b"],
  },
  execute: ({ a, b }) => a + b,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class FakeStreamHandle implements ModelStreamHandle {
  closed = false;

  constructor(
    private readonly chunks: ModelStreamChunk[],
    private readonly hang: boolean
  ) {}

  async next(): Promise<ModelStreamChunk | undefined> {
    if (this.closed) {
      return undefined;
    }
    const chunk = this.chunks.shift();
    if (!chunk && this.hang) {
      return new Promise<never>(() => {});
    }
    return chunk;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export interface ChunkGateway {
  gateway: ModelGateway;
  handles: FakeStreamHandle[];
}

/**
 * Streaming gateway that replays raw chunks, one list per model call. With
 * `hang`, a handle never ends once its chunks run out.
 */
export function chunkGateway(
  replies: ModelStreamChunk[][],
  options: { hang?: boolean } = {}
): ChunkGateway {
  const handles: FakeStreamHandle[] = [];
  const gateway: ModelGateway = {
    name: "chunks",
    send: () => Promise.reject(new Error("chunks gateway only streams")),
    stream: async () => {
      const chunks = replies[handles.length];
      if (!chunks) {
        throw new Error(`no scripted stream for call ${handles.length + 1}`);
      }
      const handle = new FakeStreamHandle([...chunks], options.hang ?? false);
      handles.push(handle);
      return handle;
    },
  };
  return { gateway, handles };
}
