/**
 * Configurable Logger - Zero dependencies
 * Supports log streaming to subscribers (used by tests and live monitoring)
 */

import { AsyncLocalStorage } from 'node:async_hooks';

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

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

// ═══════════════════════════════════════════════════════════════════
// Correlation ID Management
// ═══════════════════════════════════════════════════════════════════

const correlationStore = new AsyncLocalStorage<string>();

export function getCorrelationId(): string | undefined {
  return correlationStore.getStore();
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

/**
 * Run function with correlation ID context.
 * Every log line written inside `fn` (including awaited work) carries the id.
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
  /** Write to stdout/stderr (default: true). Subscribers are notified either way. */
  console?: boolean;
}

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let config: Required<Omit<LoggerConfig, 'metadata'>> & { metadata?: Record<string, unknown> } = {
  level: 'info',
  format: 'json',
  timestamp: true,
  service: '',
  console: true,
};

// ═══════════════════════════════════════════════════════════════════
// Log Subscribers (for streaming)
// ═══════════════════════════════════════════════════════════════════

const subscribers = new Set<LogSubscriber>();

export function subscribeToLogs(subscriber: LogSubscriber): () => void {
  subscribers.add(subscriber);
  return () => {
    subscribers.delete(subscriber);
  };
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
      // A broken subscriber must not take the caller down; report it once on stderr.
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
  const parts: string[] = [];
  if (config.timestamp) parts.push(`\x1b[90m${new Date().toISOString()}\x1b[0m`);
  parts.push(`${colors[level]}${level.toUpperCase().padEnd(5)}${colors.reset}`);
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

/** Exposed for tests of the output format. */
export function formatLogLine(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  return formatters[config.format](level, message, data);
}

// ═══════════════════════════════════════════════════════════════════
// Core Logger
// ═══════════════════════════════════════════════════════════════════

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (levels[level] < levels[config.level]) return;

  if (config.console) {
    const formatted = formatLogLine(level, message, data);
    (level === 'error' ? process.stderr : process.stdout).write(formatted + '\n');
  }

  notifySubscribers(level, message, data);
}

export const logger = {
  debug: (msg: string, data?: Record<string, unknown>) => log('debug', msg, data),
  info: (msg: string, data?: Record<string, unknown>) => log('info', msg, data),
  warn: (msg: string, data?: Record<string, unknown>) => log('warn', msg, data),
  error: (msg: string, data?: Record<string, unknown>) => log('error', msg, data),

  configure: (cfg: LoggerConfig) => {
    config = { ...config, ...cfg };
  },

  getConfig: () => ({ ...config }),
};

export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

export function configureLogger(cfg: LoggerConfig): void {
  logger.configure(cfg);
}

// ═══════════════════════════════════════════════════════════════════
// Child Logger (for creating scoped loggers)
// ═══════════════════════════════════════════════════════════════════

/**
 * Scoped logger that merges fixed metadata (e.g. `{ component: 'wallet-ledger' }`)
 * into every entry.
 */
export function createChildLogger(metadata: Record<string, unknown>): Logger {
  return {
    debug: (msg, data) => log('debug', msg, { ...metadata, ...data }),
    info: (msg, data) => log('info', msg, { ...metadata, ...data }),
    warn: (msg, data) => log('warn', msg, { ...metadata, ...data }),
    error: (msg, data) => log('error', msg, { ...metadata, ...data }),
  };
}
