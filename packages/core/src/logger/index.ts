export { createLogger, logger, resolveLogLevel } from "./logger";
export type { Logger, LogLevel } from "./logger";
