// Structured logging with level filtering. One Logger is built at startup and passed to every component.
import { createWriteStream, openSync } from 'node:fs';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';
export type LogFormat = 'json' | 'text';
export type LogOutput = 'stdout' | 'stderr' | 'file';
export type LogFields = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  output: LogOutput;
  filePath?: string;
  redactQueryParams: string[];
}

export type LogSink = (line: string) => void;

// Log level hierarchy: DEBUG < INFO < WARN < ERROR < NONE
const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  NONE: 4
};

const REDACTED_VALUE = '[REDACTED]';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = (value ?? '').toUpperCase();
  if (upper === 'WARNING') return 'WARN';
  return isLogLevel(upper) ? upper : fallback;
}

export class Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly format: LogFormat,
    private readonly sink: LogSink,
    private readonly fields: LogFields = {}
  ) {}

  child(fields: LogFields): Logger {
    return new Logger(this.level, this.format, this.sink, { ...this.fields, ...fields });
  }

  shouldLog(level: LogLevel): boolean {
    return level !== 'NONE' && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, fields?: LogFields): void {
    this.log('DEBUG', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log('INFO', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log('WARN', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log('ERROR', message, fields);
  }

  private log(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      ...normalizeFields({ ...this.fields, ...fields }),
      timestamp: new Date().toISOString(),
      level,
      message
    };

    this.sink(this.format === 'json' ? JSON.stringify(entry) : formatText(entry));
  }
}

function normalizeFields(fields: LogFields): LogFields {
  const normalized: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    // JSON.stringify renders Error as {}
    normalized[key] = value instanceof Error ? value.message : value;
  }
  return normalized;
}

function formatText(entry: LogEntry): string {
  const { timestamp, level, message, ...rest } = entry;
  const pairs = Object.entries(rest).map(([key, value]) => {
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    return /\s|"/.test(rendered) ? `${key}=${JSON.stringify(rendered)}` : `${key}=${rendered}`;
  });
  return [timestamp, level.padEnd(5), message, ...pairs].join(' ');
}

export function createLogger(config: LoggingConfig): Logger {
  let sink: LogSink;

  switch (config.output) {
    case 'stderr':
      sink = line => console.error(line);
      break;
    case 'file': {
      if (!config.filePath) {
        throw new Error('logging.file_path is required when logging.output is "file"');
      }
      // Opened here so an unwritable path fails at startup
      const fd = openSync(config.filePath, 'a');
      const stream = createWriteStream(config.filePath, { fd });
      stream.on('error', error => {
        console.error(`Failed to write log file ${config.filePath}: ${error.message}`);
      });
      sink = line => {
        stream.write(`${line}\n`);
      };
      break;
    }
    default:
      sink = line => console.log(line);
  }

  return new Logger(config.level, config.format, sink);
}

/**
 * Replace the values of sensitive query parameters with [REDACTED].
 * Values are grouped per parameter in first-seen order; an empty redaction
 * list returns the raw query untouched.
 */
export function sanitizeQuery(rawQuery: string, redactParams: readonly string[]): string {
  const query = rawQuery.startsWith('?') ? rawQuery.slice(1) : rawQuery;
  if (redactParams.length === 0 || query === '') {
    return query;
  }

  const parsed = new URLSearchParams(query);
  const output = new URLSearchParams();
  const seen = new Set<string>();

  for (const name of parsed.keys()) {
    if (seen.has(name)) continue;
    seen.add(name);

    if (redactParams.includes(name)) {
      output.append(name, REDACTED_VALUE);
      continue;
    }
    for (const value of parsed.getAll(name)) {
      output.append(name, value);
    }
  }

  return output.toString();
}
