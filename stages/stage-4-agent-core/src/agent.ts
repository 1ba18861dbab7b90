/**
 * Agent Core: drive the model from a prompt to a validated result.
 * Uses Stage 0 Gateway, Stage 1 Conversation History, Stage 2 Result
 * Validator and Stage 3 Tool Registry.
 */

import { AgentRun } from "./run.js";
import type { AgentDeps, AgentRunOptions, AgentRunResult } from "./types.js";

/**
 * Run the agent on a prompt. Validation exhaustion and the step limit come
 * back as a failed result; gateway, deadline, protocol, fatal tool and
 * cancellation faults reject with RunLoopError.
 */
export async function runAgent<T>(
  deps: AgentDeps<T>,
  prompt: string,
  options: AgentRunOptions = {}
): Promise<AgentRunResult<T>> {
  const run = new AgentRun(deps, prompt, options);

  try {
    while (run.beginStep(false)) {
      const reply = await run.callGateway("send", (signal) =>
        deps.gateway.send(run.request(signal))
      );
      run.recordReply(reply);

      switch (reply.kind) {
        case "tool-calls": {
          run.acceptToolCalls(reply.calls);
          run.recordToolResults(await run.dispatch(reply.calls));
          break;
        }
        case "text": {
          const result = run.acceptText(reply.text);
          if (result) {
            return result;
          }
          break;
        }
      }
    }
    return run.stepLimitExceeded();
  } catch (err) {
    throw run.fail(err);
  }
}
