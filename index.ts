export * from "./config/index.js";
export * from "./stages/stage-0-model-gateway/src/index.js";
export * from "./stages/stage-1-conversation-history/src/index.js";
export * from "./stages/stage-2-output-control/src/index.js";
export * from "./stages/stage-3-tool-system/src/index.js";
export * from "./stages/stage-4-agent-core/src/index.js";
