import { getEnv } from '../config/env';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  runId?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel | 'silent';
  service?: string;
  runId?: string;
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// --- Redaction ---
// Profile values flow through matcher/executor logs; keys naming personal
// data are masked outright, free text is scrubbed by pattern.

const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'authorization',
  'cookie',
  'fullname',
  'firstname',
  'lastname',
  'email',
  'phone',
  'address',
  'value',
  'coercedvalue',
  'expected',
  'observed',
]);

const SENSITIVE_PATTERNS = [
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /(?:eyJ)[a-zA-Z0-9._-]{20,}/g, // JWTs
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
  /\+?\d[\d\s().-]{6,}\d/g, // Phone numbers
];

function redactValue(key: string, value: unknown): unknown {
  if (typeof value === 'string') {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.has(lowerKey)) {
      return '[REDACTED]';
    }
    let redacted = value;
    for (const pattern of SENSITIVE_PATTERNS) {
      redacted = redacted.replace(pattern, '[REDACTED]');
    }
    return redacted;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isRecord(value)) {
      result[key] = redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) =>
        isRecord(item) ? redactObject(item) : redactValue(key, item),
      );
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

function defaultLevel(): LogLevel | 'silent' {
  const env = getEnv();
  if (env.FORMPILOT_LOG_LEVEL) return env.FORMPILOT_LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

// --- Logger class ---

export class Logger {
  private level: LogLevel | 'silent';
  private service: string;
  private context: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? defaultLevel();
    this.service = opts.service ?? 'formpilot';
    this.context = {};

    if (opts.runId) this.context.runId = opts.runId;
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({
      level: this.level,
      service: this.service,
    });
    child.context = { ...this.context, ...bindings };
    return child;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.context,
      ...(data ? redactObject(data) : {}),
    };

    const line = JSON.stringify(entry);

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

// --- Singleton for convenience ---

let _defaultLogger: Logger | null = null;

export function getLogger(opts?: LoggerOptions): Logger {
  if (opts) {
    return new Logger(opts);
  }
  if (!_defaultLogger) {
    _defaultLogger = new Logger();
  }
  return _defaultLogger;
}
