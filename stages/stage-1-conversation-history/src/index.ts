export {
  createConversationHistory,
  describeMessage,
  HistoryProtocolError,
} from "./history.js";
export type {
  ConversationHistory,
  ConversationMessage,
  MessageKind,
  ModelTextMessage,
  ModelToolCallsMessage,
  SystemPromptMessage,
  ToolCallRequest,
  ToolResultMessage,
  UserPromptMessage,
} from "./types.js";
