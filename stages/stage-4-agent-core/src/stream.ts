/**
 * Streaming run: the same protocol as runAgent, driven one event at a time by
 * the consumer. Model text is forwarded as it arrives and validated once the
 * reply is complete.
 */

import type {
  ModelStreamHandle,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";
import type { ToolCallRequest } from "../../stage-1-conversation-history/src/types.js";
import type { ToolDispatchResult } from "../../stage-3-tool-system/src/types.js";
import { AgentRun } from "./run.js";
import type {
  AgentDeps,
  AgentRunOptions,
  AgentRunResult,
  StreamEvent,
} from "./types.js";

interface PendingCall {
  callId?: string;
  name: string;
  args: string;
}

/** What has arrived so far of the reply being streamed. */
interface ReplyBuffer {
  text: string;
  calls: Map<number, PendingCall>;
  contentChunks: number;
  usage?: Usage;
}

type DispatchOutcome =
  | { ok: true; results: ToolDispatchResult[] }
  | { ok: false; error: unknown };

type StreamState =
  | { kind: "model" }
  | { kind: "streaming"; handle: ModelStreamHandle; reply: ReplyBuffer }
  | { kind: "tools"; dispatching: Promise<DispatchOutcome> }
  | { kind: "done" };

type StreamResult<T> = IteratorResult<StreamEvent<T>, undefined>;

const DONE = { done: true, value: undefined } as const;

/** Settles with the task, or rejects with the abort reason once the signal aborts. */
function untilAborted<R>(
  signal: AbortSignal | undefined,
  task: Promise<R>
): Promise<R> {
  if (!signal) {
    return task;
  }
  return new Promise<R>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    void task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export class AgentRunStream<T> implements AsyncIterableIterator<StreamEvent<T>> {
  private readonly run: AgentRun<T>;
  private readonly queue: StreamEvent<T>[] = [];
  private state: StreamState = { kind: "model" };
  private closed = false;
  /** Aborts the gateway stream; tools only follow the caller's signal. */
  private readonly streamAbort = new AbortController();
  private readonly onCallerAbort = () =>
    this.streamAbort.abort(this.run.abortSignal?.reason);
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly deps: AgentDeps<T>,
    prompt: string,
    options: AgentRunOptions
  ) {
    this.run = new AgentRun(deps, prompt, options);
    this.run.abortSignal?.addEventListener("abort", this.onCallerAbort, {
      once: true,
    });
  }

  get runId(): string {
    return this.run.runId;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  next(): Promise<StreamResult<T>> {
    // one pull at a time; a rejected pull must not block the ones queued after it
    const result = this.tail.then(() => this.pull());
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Stop the run: release the gateway stream, wait for tool calls already
   * dispatched and drop their results.
   */
  async return(): Promise<StreamResult<T>> {
    if (this.closed || this.state.kind === "done") {
      this.closed = true;
      return DONE;
    }
    this.closed = true;
    this.queue.length = 0;
    const state = this.state;
    this.state = { kind: "done" };
    this.detach();
    this.streamAbort.abort();

    if (state.kind === "streaming") {
      await state.handle.close();
    } else if (state.kind === "tools") {
      await state.dispatching;
    }
    this.run.fail(this.run.error("cancelled", "Stream was closed by the consumer"));
    return DONE;
  }

  private async pull(): Promise<StreamResult<T>> {
    while (true) {
      if (this.closed) {
        return DONE;
      }
      const event = this.queue.shift();
      if (event) {
        return { done: false, value: event };
      }
      if (this.state.kind === "done") {
        return DONE;
      }

      try {
        await this.advance();
      } catch (err) {
        if (this.closed) {
          return DONE;
        }
        const state = this.state;
        this.state = { kind: "done" };
        this.detach();
        if (state.kind === "streaming") {
          await state.handle.close();
        }
        throw this.run.fail(err);
      }
    }
  }

  private advance(): Promise<void> {
    const state = this.state;
    switch (state.kind) {
      case "model":
        return this.openStream();
      case "streaming":
        return this.readChunk(state.handle, state.reply);
      case "tools":
        return this.collectToolResults(state.dispatching);
      case "done":
        return Promise.resolve();
    }
  }

  private async openStream(): Promise<void> {
    if (!this.run.beginStep(true)) {
      this.finish(this.run.stepLimitExceeded());
      return;
    }
    const handle = await this.run.callGateway(
      "stream",
      (signal) => this.deps.gateway.stream(this.run.request(signal)),
      this.streamAbort.signal
    );
    if (this.closed) {
      await handle.close();
      return;
    }
    this.state = {
      kind: "streaming",
      handle,
      reply: { text: "", calls: new Map(), contentChunks: 0 },
    };
  }

  private async readChunk(
    handle: ModelStreamHandle,
    reply: ReplyBuffer
  ): Promise<void> {
    const chunk = await this.run.callGateway(
      "stream chunk",
      (signal) => untilAborted(signal, handle.next()),
      this.streamAbort.signal
    );
    if (this.closed) {
      return;
    }
    if (!chunk) {
      this.completeReply(reply);
      return;
    }

    switch (chunk.kind) {
      case "text-delta":
        reply.contentChunks += 1;
        reply.text += chunk.delta;
        if (chunk.delta) {
          this.queue.push({
            kind: "partial-text",
            delta: chunk.delta,
            step: this.run.step,
          });
        }
        break;
      case "tool-call-delta": {
        reply.contentChunks += 1;
        const pending = reply.calls.get(chunk.index) ?? { name: "", args: "" };
        pending.callId = pending.callId ?? chunk.callId;
        pending.name += chunk.name ?? "";
        pending.args += chunk.argumentsDelta ?? "";
        reply.calls.set(chunk.index, pending);
        break;
      }
      case "usage":
        reply.usage = chunk.usage;
        break;
    }
  }

  /** Any tool-call delta makes the reply a tool-call reply. */
  private completeReply(reply: ReplyBuffer): void {
    this.state = { kind: "model" };
    if (reply.contentChunks === 0) {
      throw this.run.error("protocol_error", "Model stream ended without any content");
    }

    if (reply.calls.size > 0) {
      const step = this.run.step;
      const calls = Array.from(reply.calls.entries())
        .sort(([a], [b]) => a - b)
        .map(
          ([index, call]): ToolCallRequest => ({
            callId: call.callId ?? `call_${step}_${index}`,
            toolName: call.name,
            rawArguments: call.args,
          })
        );
      this.run.recordReply({ kind: "tool-calls", calls, usage: reply.usage });
      this.run.acceptToolCalls(calls);
      for (const call of calls) {
        this.queue.push({
          kind: "tool-call-started",
          toolName: call.toolName,
          callId: call.callId,
          step,
        });
      }
      this.state = {
        kind: "tools",
        dispatching: this.run.dispatch(calls).then(
          (results): DispatchOutcome => ({ ok: true, results }),
          (error: unknown): DispatchOutcome => ({ ok: false, error })
        ),
      };
      return;
    }

    this.run.recordReply({ kind: "text", text: reply.text, usage: reply.usage });
    const result = this.run.acceptText(reply.text);
    if (result) {
      this.finish(result);
    }
  }

  private async collectToolResults(
    dispatching: Promise<DispatchOutcome>
  ): Promise<void> {
    const outcome = await dispatching;
    if (this.closed) {
      return;
    }
    this.state = { kind: "model" };
    if (!outcome.ok) {
      throw outcome.error;
    }
    this.run.recordToolResults(outcome.results);
  }

  private finish(result: AgentRunResult<T>): void {
    this.queue.push({ kind: "final", result });
    this.state = { kind: "done" };
    this.detach();
  }

  private detach(): void {
    this.run.abortSignal?.removeEventListener("abort", this.onCallerAbort);
  }
}

/**
 * Start a streaming run. Nothing happens until the first `next()`; breaking
 * out of `for await` cancels the run.
 */
export function streamAgent<T>(
  deps: AgentDeps<T>,
  prompt: string,
  options: AgentRunOptions = {}
): AgentRunStream<T> {
  return new AgentRunStream(deps, prompt, options);
}
