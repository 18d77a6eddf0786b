/**
 * Namespaced console logger with sensitive data redaction.
 * Home Assistant access tokens must never reach the log output.
 */

/** Fields that should be redacted from logs */
const SENSITIVE_FIELDS = new Set([
  'access_token',
  'accesstoken',
  'token',
  'ha_token',
  'hatoken',
  'password',
  'secret',
  'authorization',
  'auth',
  'bearer',
  'credential',
  'credentials',
  'refresh_token',
]);

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = 'info';

/** Set the process-wide minimum level. Messages below it are dropped. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

/**
 * Recursively redacts sensitive fields from a value.
 * Returns a deep copy; the input is left untouched.
 */
export function redactSensitive<T>(value: T): T;
export function redactSensitive(value: unknown): unknown {
  if (value === null || value === undefined || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item));
  }

  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactSensitive(val);
    }
  }
  return result;
}

/** Logger interface */
export interface Logger {
  namespace: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Creates a namespaced logger, e.g. `createLogger('scene-controller')`.
 *
 * Lines look like `[2026-01-01T00:00:00.000Z] [INFO] [hub] Scenes loaded {"count":3}`.
 */
export function createLogger(namespace: string): Logger {
  const formatMessage = (level: LogLevel, message: string, data?: Record<string, unknown>): string => {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${namespace}]`;
    if (data) {
      return `${prefix} ${message} ${JSON.stringify(redactSensitive(data))}`;
    }
    return `${prefix} ${message}`;
  };

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];

  return {
    namespace,
    debug(message, data) {
      if (enabled('debug')) console.debug(formatMessage('debug', message, data));
    },
    info(message, data) {
      if (enabled('info')) console.info(formatMessage('info', message, data));
    },
    warn(message, data) {
      if (enabled('warn')) console.warn(formatMessage('warn', message, data));
    },
    error(message, data) {
      if (enabled('error')) console.error(formatMessage('error', message, data));
    },
  };
}
