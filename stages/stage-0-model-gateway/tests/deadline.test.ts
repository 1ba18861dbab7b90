import { describe, expect, it } from "vitest";

import { DeadlineExceededError, withDeadline } from "../src/index.js";

describe("withDeadline", () => {
  it("runs the task with the caller's signal when no deadline is set", async () => {
    const controller = new AbortController();
    let seen: AbortSignal | undefined;

    await withDeadline("call", undefined, controller.signal, async (signal) => {
      seen = signal;
    });

    expect(seen).toBe(controller.signal);
  });

  it("resolves with the task's value inside the deadline", async () => {
    await expect(withDeadline("call", 1000, undefined, async () => 42)).resolves.toBe(42);
  });

  it("rejects and aborts the task once the deadline passes", async () => {
    let taskSignal: AbortSignal | undefined;
    const pending = withDeadline("tool add", 10, undefined, (signal) => {
      taskSignal = signal;
      return new Promise<never>(() => {});
    });

    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(pending).rejects.toThrow("tool add exceeded its 10 ms deadline");
    expect(taskSignal?.aborted).toBe(true);
  });

  it("forwards the caller's abort to the task", async () => {
    const controller = new AbortController();
    let taskSignal: AbortSignal | undefined;
    const pending = withDeadline("call", 1000, controller.signal, (signal) => {
      taskSignal = signal;
      return new Promise<string>((resolve) => {
        signal?.addEventListener("abort", () => resolve("aborted"));
      });
    });

    controller.abort();

    await expect(pending).resolves.toBe("aborted");
    expect(taskSignal?.aborted).toBe(true);
  });
});
