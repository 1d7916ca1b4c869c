export { createConsoleHandler } from "./console-handler";
export { createDefaultLogger, toError } from "./helpers";
export { isLogLevel, LOG_LEVEL_RANK } from "./levels";
export { Logger } from "./logger";
export type { LogEntry, LoggerContext, LoggerOptions, LogHandler, LogLevel } from "./types";
