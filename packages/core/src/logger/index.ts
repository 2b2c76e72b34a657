/**
 * Logger Module
 *
 * Structured logging with Winston, supporting:
 * - stderr output (stdout is reserved for the MCP channel)
 * - optional rotating JSON log files (LOG_DIR)
 * - correlation IDs for request tracing
 * - service-specific loggers
 * - sensitive data redaction
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { randomUUID } from 'crypto';

const logLevel = process.env.LOG_LEVEL || 'info';
const logsDir = process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : null;

export const LOG_ROTATION_CONFIG = {
  maxSize: process.env.LOG_MAX_SIZE || '10m',
  maxDays: process.env.LOG_MAX_DAYS || '14d',
  compress: true,
};

// Patterns for sensitive data redaction
const SENSITIVE_PATTERNS = [
  /access_token['":\s=]+['"]?([^'"}\s,&]+)/gi,
  /refresh_token['":\s=]+['"]?([^'"}\s,&]+)/gi,
  /client_secret['":\s=]+['"]?([^'"}\s,&]+)/gi,
  /password['":\s]+['"]?([^'"}\s,]+)/gi,
  /secret['":\s]+['"]?([^'"}\s,]+)/gi,
  /authorization['":\s]+['"]?([^'"}\s,]+)/gi,
  /bearer\s+([^\s'"]+)/gi,
];

const SENSITIVE_KEYS = ['token', 'secret', 'password', 'apikey', 'api_key', 'authorization'];

/**
 * Redact sensitive information from log data or user-facing text
 */
export function redactSensitive(data: unknown): unknown {
  if (typeof data === 'string') {
    return redactText(data);
  }
  if (Array.isArray(data)) {
    return data.map(redactSensitive);
  }
  if (data && typeof data === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSensitive(value);
      }
    }
    return redacted;
  }
  return data;
}

/**
 * String form of redactSensitive
 */
export function redactText(text: string): string {
  let result = text;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, (match: string, group: string) =>
      match.replace(group, '[REDACTED]')
    );
  }
  return result;
}

/**
 * Format log entry as structured JSON
 */
const jsonFormat = winston.format.printf((info) => {
  const { level, message, timestamp, correlationId, service, operation, duration, ...meta } = info;

  const logEntry: Record<string, unknown> = {
    timestamp,
    level: level.toUpperCase(),
    message,
  };

  if (correlationId) logEntry.correlationId = correlationId;
  if (service) logEntry.service = service;
  if (operation) logEntry.operation = operation;
  if (duration !== undefined) logEntry.durationMs = duration;

  if (Object.keys(meta).length > 0) {
    logEntry.meta = redactSensitive(meta);
  }

  return JSON.stringify(logEntry);
});

/**
 * Human-readable format for stderr
 */
const humanFormat = winston.format.printf((info) => {
  const { level, message, timestamp, correlationId, service, operation, duration, stack, ...meta } =
    info;
  let output = `${timestamp} [${level.toUpperCase()}]`;

  if (correlationId && typeof correlationId === 'string') {
    output += ` [${correlationId.slice(0, 8)}]`;
  }
  if (service) output += ` [${service}]`;
  if (operation) output += ` ${operation}:`;

  output += ` ${message}`;

  if (duration !== undefined) output += ` (${duration}ms)`;

  if (stack) {
    output += `\n${stack}`;
  }

  if (Object.keys(meta).length > 0) {
    const redactedMeta = redactSensitive(meta);
    output += `\n  → ${JSON.stringify(redactedMeta, null, 2).replace(/\n/g, '\n  ')}`;
  }

  return output;
});

function createFileTransports(dir: string): winston.transport[] {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const fileFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    jsonFormat
  );

  return [
    new DailyRotateFile({
      filename: path.join(dir, 'outlook-connector-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: LOG_ROTATION_CONFIG.maxSize,
      maxFiles: LOG_ROTATION_CONFIG.maxDays,
      zippedArchive: LOG_ROTATION_CONFIG.compress,
      format: fileFormat,
    }),
    new DailyRotateFile({
      filename: path.join(dir, 'outlook-connector-error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: LOG_ROTATION_CONFIG.maxSize,
      maxFiles: '7d',
      zippedArchive: LOG_ROTATION_CONFIG.compress,
      format: fileFormat,
    }),
  ];
}

export const logger = winston.createLogger({
  level: logLevel === 'silent' ? 'error' : logLevel,
  silent: logLevel === 'silent',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true })
  ),
  transports: [
    // Every level goes to stderr; stdout carries the MCP protocol
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
        humanFormat
      ),
    }),
    ...(logsDir ? createFileTransports(logsDir) : []),
  ],
});

let currentCorrelationId: string | null = null;

export function generateCorrelationId(): string {
  return randomUUID();
}

export function setCorrelationId(id: string): void {
  currentCorrelationId = id;
}

export function getCorrelationId(): string | null {
  return currentCorrelationId;
}

export function clearCorrelationId(): void {
  currentCorrelationId = null;
}

export interface OperationLogger {
  success: (message?: string, resultMeta?: Record<string, unknown>) => void;
  failure: (error: Error | string, resultMeta?: Record<string, unknown>) => void;
}

/**
 * Service logger interface - returned by createServiceLogger
 */
export interface ServiceLogger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  startOperation: (operation: string, meta?: Record<string, unknown>) => OperationLogger;
}

/**
 * Create a child logger with specific context (service name, correlation ID)
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  const context = () => ({ service: serviceName, correlationId: getCorrelationId() });

  return {
    debug: (message, meta) => {
      logger.debug(message, { ...context(), ...meta });
    },
    info: (message, meta) => {
      logger.info(message, { ...context(), ...meta });
    },
    warn: (message, meta) => {
      logger.warn(message, { ...context(), ...meta });
    },
    error: (message, meta) => {
      logger.error(message, { ...context(), ...meta });
    },
    /**
     * Log the start of an operation and return handles to log its completion
     */
    startOperation: (operation, meta) => {
      const startTime = Date.now();
      logger.debug(`Starting ${operation}`, { ...context(), operation, ...meta });

      return {
        success: (message, resultMeta) => {
          logger.info(message || `Completed ${operation}`, {
            ...context(),
            operation,
            duration: Date.now() - startTime,
            status: 'success',
            ...resultMeta,
          });
        },
        failure: (error, resultMeta) => {
          const errorMessage = error instanceof Error ? error.message : error;
          logger.error(`Failed ${operation}: ${errorMessage}`, {
            ...context(),
            operation,
            duration: Date.now() - startTime,
            status: 'failure',
            error: errorMessage,
            stack: error instanceof Error ? error.stack : undefined,
            ...resultMeta,
          });
        },
      };
    },
  };
}

function summarizeText(text: string): string {
  return text.length > 500 ? `${text.slice(0, 500)}... (truncated)` : text;
}

/**
 * MCP tool logger - specialized for logging tool invocations
 */
export const mcpToolLogger = {
  toolStart: (toolName: string, args: Record<string, unknown>, correlationId: string) => {
    setCorrelationId(correlationId);
    logger.info(`Tool invoked: ${toolName}`, {
      service: 'mcp-server',
      operation: 'tool_call',
      correlationId,
      tool: toolName,
      input: redactSensitive(args),
    });
  },

  toolSuccess: (toolName: string, text: string, duration: number) => {
    logger.info(`Tool completed: ${toolName}`, {
      service: 'mcp-server',
      operation: 'tool_call',
      correlationId: getCorrelationId(),
      tool: toolName,
      duration,
      status: 'success',
      output: redactText(summarizeText(text)),
    });
  },

  toolError: (toolName: string, error: Error | string, duration: number) => {
    const errorMessage = error instanceof Error ? error.message : error;
    logger.error(`Tool failed: ${toolName}`, {
      service: 'mcp-server',
      operation: 'tool_call',
      correlationId: getCorrelationId(),
      tool: toolName,
      duration,
      status: 'error',
      error: redactText(errorMessage),
      stack: error instanceof Error ? error.stack : undefined,
    });
  },
};

export default logger;
