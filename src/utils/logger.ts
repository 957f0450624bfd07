export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  method?: string;
  url?: string;
  statusCode?: number;
  error?: unknown;
  duration?: number | string;
  ip?: string;
  [key: string]: unknown;
}

export type LogData = Partial<Omit<LogEntry, 'timestamp' | 'level' | 'message'>>;

const STANDARD_FIELDS = ['timestamp', 'level', 'message', 'method', 'url', 'statusCode', 'duration', 'ip', 'error'];

/**
 * Minimum level taken from LOG_LEVEL at call time. "silent" disables output
 * entirely; when unset, DEBUG is only emitted in development.
 */
function minimumWeight(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  switch (configured) {
    case 'silent':
      return Number.POSITIVE_INFINITY;
    case 'error':
      return LEVEL_WEIGHT[LogLevel.ERROR];
    case 'warn':
      return LEVEL_WEIGHT[LogLevel.WARN];
    case 'info':
      return LEVEL_WEIGHT[LogLevel.INFO];
    case 'debug':
      return LEVEL_WEIGHT[LogLevel.DEBUG];
    default:
      return process.env.NODE_ENV === 'development' ? LEVEL_WEIGHT[LogLevel.DEBUG] : LEVEL_WEIGHT[LogLevel.INFO];
  }
}

function formatStatusCode(statusCode: number): string {
  if (statusCode >= 500) return `[${statusCode}] 🔴`;
  if (statusCode >= 400) return `[${statusCode}] 🟠`;
  if (statusCode >= 300) return `[${statusCode}] 🟡`;
  if (statusCode >= 200) return `[${statusCode}] 🟢`;
  return `[${statusCode}]`;
}

function indent(text: string): string {
  return text.split('\n').map(line => `   ${line}`).join('\n');
}

function formatLogEntry(entry: LogEntry): string {
  const timestamp = new Date(entry.timestamp).toLocaleTimeString();
  const parts: string[] = [];

  const headerParts = [`[${timestamp}]`, `[${entry.level}]`];

  if (entry.statusCode !== undefined) {
    headerParts.push(formatStatusCode(entry.statusCode));
  }

  if (entry.method && entry.url) {
    headerParts.push(`${entry.method} ${entry.url}`);
  }

  if (entry.duration !== undefined) {
    const durationStr = typeof entry.duration === 'string' ? entry.duration : `${entry.duration}ms`;
    headerParts.push(`(${durationStr})`);
  }

  if (entry.ip) {
    headerParts.push(`IP: ${entry.ip}`);
  }

  parts.push(headerParts.join(' '));
  parts.push(`📝 ${entry.message}`);

  const dataFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.includes(key) && value !== undefined) {
      dataFields[key] = value;
    }
  }

  if (Object.keys(dataFields).length > 0) {
    parts.push(`\n📦 Data:\n${JSON.stringify(dataFields, null, 2)}`);
  }

  if (entry.error !== undefined && entry.error !== null) {
    parts.push(`\n❌ Error Details:`);
    if (entry.error instanceof Error) {
      parts.push(`   Message: ${entry.error.message}`);
      if (entry.error.stack && process.env.NODE_ENV === 'development') {
        parts.push(`   Stack:\n${indent(entry.error.stack)}`);
      }
    } else {
      parts.push(indent(JSON.stringify(entry.error, null, 2)));
    }
  }

  return parts.join('\n');
}

export class Logger {
  static log(level: LogLevel, message: string, data?: LogData): void {
    if (LEVEL_WEIGHT[level] < minimumWeight()) {
      return;
    }

    const entry: LogEntry = {
      ...data,
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const separator = '─'.repeat(80);
    const output = `\n${separator}\n${formatLogEntry(entry)}\n${separator}\n`;

    switch (level) {
      case LogLevel.ERROR:
        console.error(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  static info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  static error(message: string, error?: unknown, data?: LogData): void {
    this.log(LogLevel.ERROR, message, { ...data, error });
  }

  static warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  static debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }
}
