export { Logger, getLogger, setLogger } from "./logger.js";

export type { LogContext, LogEntry, LogLevel, LoggerOptions } from "./logger.js";
