export { createLogger, createPinoOptions } from "./logger.js";
export type { LogDestination, Logger, PinoLoggerOptions } from "./logger.js";
