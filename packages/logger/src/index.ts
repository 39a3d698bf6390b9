/**
 * @docqa/logger
 *
 * Structured logging with secret redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, REDACTED } from "./redact.js";
