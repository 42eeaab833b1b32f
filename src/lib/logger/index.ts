export {
  createLogger,
  formatLog,
  serializeLogValue,
  toError,
  type LogFormat,
  type Logger,
  type LoggerConfig,
} from "./logger";

export { logLevelSchema, type LogLevel } from "./schema";
