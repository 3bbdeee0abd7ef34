export { Logger, silentLogger, LOG_LEVELS } from "./logger"
export type { LogLevel, LogSink, LoggerOptions } from "./logger"
