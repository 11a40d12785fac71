export type { Logger, LogLevel } from "./logger";
export { ConsoleLogger, LOG_LEVELS, createLogger, isLogLevel, resolveLogLevel } from "./logger";
