/**
 * Structured JSON logging with pino.
 *
 * - JSON in production, pino-pretty when LOG_FORMAT=pretty
 * - Level from LOG_LEVEL
 * - Request correlation IDs (X-Request-Id header or generated)
 */

import pino from "pino";
import { getConfig } from "../config.js";

export type Logger = pino.Logger;

let _logger: pino.Logger | null = null;

/**
 * Initialize the global logger from config.
 * Call once at startup after config is available.
 */
export function initLogger(): pino.Logger {
  const config = getConfig();
  _logger = pino({
    level: config.logLevel,
    base: { service: "scopegate" },
    transport:
      config.logFormat === "pretty"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });
  return _logger;
}

/**
 * Get the global logger instance (lazy-initialized if needed).
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = initLogger();
  }
  return _logger;
}

/**
 * Create a child logger with a request correlation ID.
 */
export function createRequestLogger(requestId: string): pino.Logger {
  return getLogger().child({ requestId });
}

export function resetLogger(): void {
  _logger = null;
}
