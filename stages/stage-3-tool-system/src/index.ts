export { createToolRegistry, ToolRegistrationError } from "./registry.js";
export type {
  DispatchAllOptions,
  DispatchOptions,
  Tool,
  ToolContext,
  ToolDispatchResult,
  ToolFailure,
  ToolFailureKind,
  ToolRegistry,
} from "./types.js";
