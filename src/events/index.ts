export { EventLogger } from "./logger.js";
export type { EventCallback, EventLoggerOptions, LogOptions } from "./logger.js";
export { consoleLogger, silentLogger, errorMessage } from "./console.js";
export type { Logger } from "./console.js";
