/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createConfiguredLogger,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
