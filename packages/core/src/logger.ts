import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { dirname } from 'node:path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger sharing sinks and level, tagged `<parent>.<name>`. */
  child(name: string): Logger;
}

export interface LogSink {
  write(line: string, level: LogLevel): void;
  close?(): Promise<void>;
}

export function formatLogLine(name: string, level: LogLevel, message: string, now = new Date()): string {
  return `${now.toISOString()} - ${name} - ${level.toUpperCase()} - ${message}`;
}

export const consoleSink: LogSink = {
  write(line) {
    console.log(line);
  },
};

/** Appends lines to a file, creating its directory on first use. */
export class FileSink implements LogSink {
  private stream: WriteStream;

  constructor(readonly path: string) {
    mkdirSync(dirname(path), { recursive: true });
    this.stream = createWriteStream(path, { flags: 'a' });
    this.stream.on('error', (err) => {
      console.error(`[logger] Cannot write ${path}: ${err.message}`);
    });
  }

  write(line: string): void {
    this.stream.write(`${line}\n`);
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}

class SinkLogger implements Logger {
  constructor(
    private name: string,
    private level: LogLevel,
    private sinks: LogSink[],
  ) {}

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  child(name: string): Logger {
    return new SinkLogger(`${this.name}.${name}`, this.level, this.sinks);
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const line = formatLogLine(this.name, level, message);
    for (const sink of this.sinks) {
      sink.write(line, level);
    }
  }
}

export function createLogger(
  name: string,
  options: { level?: LogLevel; sinks?: LogSink[] } = {},
): Logger {
  return new SinkLogger(name, options.level ?? 'info', options.sinks ?? [consoleSink]);
}
