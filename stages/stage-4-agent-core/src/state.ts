/**
 * In-memory store for agent run states: one snapshot per run, written when the
 * run starts and replaced when it ends.
 */

import type { AgentRunState, AgentStateStore } from "./types.js";

/** Create an in-memory agent state store. */
export function createAgentStateStore(): AgentStateStore {
  const byRunId = new Map<string, AgentRunState>();

  return {
    get(runId: string): AgentRunState | undefined {
      return byRunId.get(runId);
    },

    set(state: AgentRunState): void {
      byRunId.set(state.runId, { ...state });
    },

    delete(runId: string): boolean {
      return byRunId.delete(runId);
    },

    list(): AgentRunState[] {
      return Array.from(byRunId.values()).sort(
        (a, b) =>
          new Date(a.startedAt).getTime() - new Date(b.startedAt).getTime()
      );
    },
  };
}
