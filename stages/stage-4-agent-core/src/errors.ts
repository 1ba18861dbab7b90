import type { RunDiagnostics, RunLoopErrorReason } from "./types.js";

/** A run ended on a fault rather than on a result or an expected failure. */
export class RunLoopError extends Error {
  readonly reason: RunLoopErrorReason;
  readonly diagnostics: RunDiagnostics;

  constructor(options: {
    reason: RunLoopErrorReason;
    message: string;
    diagnostics: RunDiagnostics;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = "RunLoopError";
    this.reason = options.reason;
    this.diagnostics = options.diagnostics;
  }
}
