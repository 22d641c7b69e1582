export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogPayload = Record<string, unknown>;

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string, payload?: LogPayload): void;
  info(message: string, payload?: LogPayload): void;
  warn(message: string, payload?: LogPayload): void;
  error(message: string, payload?: LogPayload): void;
  child(fields: LogPayload): Logger;
}

const SENSITIVE_KEYS = ['token', 'secret', 'apikey', 'api_key', 'authorization', 'password'];

function isSensitive(key: string): boolean {
  const lowered = key.toLowerCase();
  return SENSITIVE_KEYS.some((needle) => lowered.includes(needle));
}

export function redact(payload: object): LogPayload {
  const result: LogPayload = {};
  for (const [key, value] of Object.entries(payload)) {
    if (isSensitive(key)) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      result[key] = redact(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(`${line}\n`);
};

export function createLogger(
  baseFields: LogPayload = { service: 'stopResolution' },
  sink: LogSink = stdoutSink,
  debugEnabled = process.env.LOG_LEVEL === 'debug'
): Logger {
  function log(level: LogLevel, message: string, payload?: LogPayload): void {
    if (level === 'debug' && !debugEnabled) {
      return;
    }
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...redact({ ...baseFields, ...payload })
    };
    sink(JSON.stringify(entry));
  }

  return {
    debug(message, payload) {
      log('debug', message, payload);
    },
    info(message, payload) {
      log('info', message, payload);
    },
    warn(message, payload) {
      log('warn', message, payload);
    },
    error(message, payload) {
      log('error', message, payload);
    },
    child(fields) {
      return createLogger({ ...baseFields, ...fields }, sink, debugEnabled);
    }
  };
}

export const logger = createLogger();
