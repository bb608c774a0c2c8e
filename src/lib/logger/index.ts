export { createLogger, logger, type Logger, type LoggerConfig } from "./logger";

export { logLevelSchema, type LogLevel } from "./schema";
