/**
 * GiveVault Logger
 * Structured logging with Pino
 */

import pino, { type Logger, type LoggerOptions } from "pino";

// ============================================
// LOGGER CONFIGURATION
// ============================================

const isDevelopment = process.env.NODE_ENV === "development";
const logLevel = process.env.LOG_LEVEL || "info";
const logFormat = process.env.LOG_FORMAT || "json";

const baseOptions: LoggerOptions = {
  level: logLevel,
  base: {
    service: "givevault",
    env: process.env.NODE_ENV || "production",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      service: bindings.service,
      env: bindings.env,
    }),
  },
  redact: {
    paths: [
      "*.privateKey",
      "*.password",
      "*.secret",
      "*.apiKey",
      "*.mnemonic",
      "*.KEEPER_PRIVATE_KEY",
    ],
    censor: "[REDACTED]",
  },
};

// Pretty printing for development
const devOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      messageFormat: "{msg}",
    },
  },
};

// ============================================
// LOGGER INSTANCE
// ============================================

export const logger: Logger =
  isDevelopment && logFormat === "pretty"
    ? pino(devOptions)
    : pino(baseOptions);

// ============================================
// CHILD LOGGERS FOR SERVICES
// ============================================

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

// Pre-configured service loggers
export const engineLogger = createServiceLogger("engine");
export const keeperLogger = createServiceLogger("keeper");

// ============================================
// STRUCTURED LOG HELPERS
// ============================================

export interface UpkeepLogContext {
  target: string;
  address: string;
  performData?: string;
  durationMs?: number;
}

/**
 * Logs an upkeep event with structured context
 */
export function logUpkeep(
  level: "info" | "warn" | "error",
  event: string,
  context: UpkeepLogContext,
  message?: string
): void {
  keeperLogger[level](
    {
      event,
      upkeep: context,
    },
    message || event
  );
}

// ============================================
// AUDIT LOGGING
// ============================================

export interface AuditLogEntry {
  action: string;
  entityType: string;
  entityId?: string;
  actor: string;
  details?: Record<string, unknown>;
}

/**
 * Creates an audit log entry for privileged (admin, registry) actions
 */
export function audit(entry: AuditLogEntry): void {
  logger.info(
    {
      audit: true,
      ...entry,
      timestamp: new Date().toISOString(),
    },
    `AUDIT: ${entry.action} on ${entry.entityType}${entry.entityId ? ` (${entry.entityId})` : ""} by ${entry.actor}`
  );
}

// ============================================
// ERROR LOGGING
// ============================================

/**
 * Logs an error with stack trace and context
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
  message?: string
): void {
  logger.error(
    {
      err: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    message || error.message
  );
}

/**
 * Logs a fatal error (process should shut down)
 */
export function logFatal(
  error: Error,
  context?: Record<string, unknown>,
  message?: string
): void {
  logger.fatal(
    {
      err: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    message || `FATAL: ${error.message}`
  );
}

// ============================================
// PERFORMANCE LOGGING
// ============================================

/**
 * Creates a timer for measuring operation duration.
 * Returns the elapsed milliseconds when stopped.
 */
export function createTimer(operationName: string): () => number {
  const start = performance.now();

  return () => {
    const duration = performance.now() - start;
    logger.debug(
      {
        operation: operationName,
        durationMs: duration.toFixed(2),
      },
      `${operationName} completed in ${duration.toFixed(2)}ms`
    );
    return duration;
  };
}
