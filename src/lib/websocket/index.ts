export {
  classifyCloseCode,
  openStreamSocket,
  type CloseCategory,
  type HeartbeatConfig,
  type StreamSocketConfig,
} from "./stream-socket";

export {
  createMessageParser,
  isRecord,
  type MessageHandler,
  type MessageParser,
  type MessageParserConfig,
} from "./message-parser";
