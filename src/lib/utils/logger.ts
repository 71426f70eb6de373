/**
 * Simple structured logger for ghostpad
 */

import fs from 'fs';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Where log lines go. The full-screen editor owns stdout, so while it runs
 * lines are appended to a file or dropped.
 */
export type LogSink = (level: 'debug' | 'info' | 'warn' | 'error', line: string) => void;

const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

/**
 * Appends lines to `filePath`. Once a write fails the sink stops writing
 * and drops every later line.
 */
export function createFileSink(filePath: string): LogSink {
  let broken = false;
  return (_level, line) => {
    if (broken) return;
    try {
      fs.appendFileSync(filePath, `${new Date().toISOString()} ${line}\n`, 'utf-8');
    } catch {
      broken = true;
    }
  };
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) return '';
  return ` ${JSON.stringify(meta)}`;
}

class Logger {
  private level: LogLevel = LogLevel.INFO;
  private sink: LogSink = consoleSink;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSink(sink: LogSink | null) {
    this.sink = sink ?? consoleSink;
  }

  debug(message: string, meta?: unknown) {
    if (this.level <= LogLevel.DEBUG) {
      this.sink('debug', `[DEBUG] ${message}${formatMeta(meta)}`);
    }
  }

  info(message: string, meta?: unknown) {
    if (this.level <= LogLevel.INFO) {
      this.sink('info', `[INFO] ${message}${formatMeta(meta)}`);
    }
  }

  warn(message: string, meta?: unknown) {
    if (this.level <= LogLevel.WARN) {
      this.sink('warn', `[WARN] ${message}${formatMeta(meta)}`);
    }
  }

  error(message: string, error?: unknown) {
    if (this.level <= LogLevel.ERROR) {
      const detail =
        error === undefined ? '' : ` ${error instanceof Error ? error.stack : JSON.stringify(error)}`;
      this.sink('error', `[ERROR] ${message}${detail}`);
    }
  }
}

export const logger = new Logger();
