/**
 * Configurable Logger - Zero dependencies
 * Supports log streaming to subscribers (for real-time monitoring)
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text' | 'pretty';

// ═══════════════════════════════════════════════════════════════════
// Log Entry Type (for streaming)
// ═══════════════════════════════════════════════════════════════════

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId?: string;
  data?: Record<string, unknown>;
}

export type LogSubscriber = (entry: LogEntry) => void;

// ═══════════════════════════════════════════════════════════════════
// Correlation ID Management (for distributed tracing)
// ═══════════════════════════════════════════════════════════════════

const correlationStore = new AsyncLocalStorage<string>();

/**
 * Get correlation ID of the current async context
 */
export function getCorrelationId(): string | undefined {
  return correlationStore.getStore();
}

/**
 * Generate a new correlation ID
 */
export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Run function with correlation ID context. Concurrent calls keep their own id.
 */
export function withCorrelationId<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return correlationStore.run(id, fn);
}

// ═══════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════

export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Output format (default: 'json') */
  format?: LogFormat;
  /** Include timestamp (default: true) */
  timestamp?: boolean;
  /** Service name to include in logs */
  service?: string;
  /** Custom metadata to include in every log */
  metadata?: Record<string, unknown>;
}

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let config: Required<Omit<LoggerConfig, 'metadata'>> & { metadata?: Record<string, unknown> } = {
  level: 'info',
  format: 'json',
  timestamp: true,
  service: '',
};

// ═══════════════════════════════════════════════════════════════════
// Log Subscribers (for streaming)
// ═══════════════════════════════════════════════════════════════════

const subscribers = new Set<LogSubscriber>();

export function subscribeToLogs(subscriber: LogSubscriber): () => void {
  subscribers.add(subscriber);
  return () => subscribers.delete(subscriber);
}

function notifySubscribers(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (subscribers.size === 0) return;

  const correlationId = getCorrelationId();
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service: config.service || 'unknown',
    message,
    ...(correlationId && { correlationId }),
    ...(data && { data }),
  };

  for (const subscriber of subscribers) {
    try {
      subscriber(entry);
    } catch (error) {
      process.stderr.write(`Log subscriber failed: ${String(error)}\n`);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════
// Formatters
// ═══════════════════════════════════════════════════════════════════

const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m',  // cyan
  info: '\x1b[32m',   // green
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

function formatJson(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const correlationId = getCorrelationId();
  return JSON.stringify({
    ...(config.timestamp && { timestamp: new Date().toISOString() }),
    level,
    ...(config.service && { service: config.service }),
    ...(correlationId && { correlationId }),
    message,
    ...config.metadata,
    ...data,
  });
}

function formatText(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const parts: string[] = [];
  if (config.timestamp) parts.push(new Date().toISOString());
  parts.push(`[${level.toUpperCase()}]`);
  if (config.service) parts.push(`[${config.service}]`);
  const correlationId = getCorrelationId();
  if (correlationId) parts.push(`[${correlationId}]`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(JSON.stringify(data));
  }
  return parts.join(' ');
}

function formatPretty(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const color = colors[level];
  const parts: string[] = [];
  if (config.timestamp) parts.push(`\x1b[90m${new Date().toISOString()}\x1b[0m`);
  parts.push(`${color}${level.toUpperCase().padEnd(5)}${colors.reset}`);
  if (config.service) parts.push(`\x1b[90m[${config.service}]\x1b[0m`);
  const correlationId = getCorrelationId();
  if (correlationId) parts.push(`\x1b[90m[${correlationId}]\x1b[0m`);
  parts.push(message);
  if (data && Object.keys(data).length > 0) {
    parts.push(`\x1b[90m${JSON.stringify(data)}\x1b[0m`);
  }
  return parts.join(' ');
}

const formatters: Record<LogFormat, (level: LogLevel, message: string, data?: Record<string, unknown>) => string> = {
  json: formatJson,
  text: formatText,
  pretty: formatPretty,
};

// ═══════════════════════════════════════════════════════════════════
// Core Logger
// ═══════════════════════════════════════════════════════════════════

function log(level: LogLevel, message: string, data?: object): void {
  if (levels[level] >= levels[config.level]) {
    const fields = data ? { ...data } : undefined;
    const formatted = formatters[config.format](level, message, fields);
    (level === 'error' ? process.stderr : process.stdout).write(formatted + '\n');

    notifySubscribers(level, message, fields);
  }
}

export interface Logger {
  debug(msg: string, data?: object): void;
  info(msg: string, data?: object): void;
  warn(msg: string, data?: object): void;
  error(msg: string, data?: object): void;
}

export const logger = {
  debug: (msg: string, data?: object) => log('debug', msg, data),
  info: (msg: string, data?: object) => log('info', msg, data),
  warn: (msg: string, data?: object) => log('warn', msg, data),
  error: (msg: string, data?: object) => log('error', msg, data),

  /** Configure logger settings */
  configure: (cfg: LoggerConfig) => {
    config = { ...config, ...cfg };
  },

  /** Get current configuration */
  getConfig: () => ({ ...config }),
};

// ═══════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════

export function configureLogger(cfg: LoggerConfig) {
  logger.configure(cfg);
}

// ═══════════════════════════════════════════════════════════════════
// Child Logger (for creating scoped loggers)
// ═══════════════════════════════════════════════════════════════════

export function createChildLogger(childConfig: { component?: string; metadata?: Record<string, unknown> }): Logger {
  const childMeta = {
    ...childConfig.metadata,
    ...(childConfig.component && { component: childConfig.component }),
  };

  return {
    debug: (msg: string, data?: object) => log('debug', msg, { ...childMeta, ...data }),
    info: (msg: string, data?: object) => log('info', msg, { ...childMeta, ...data }),
    warn: (msg: string, data?: object) => log('warn', msg, { ...childMeta, ...data }),
    error: (msg: string, data?: object) => log('error', msg, { ...childMeta, ...data }),
  };
}
