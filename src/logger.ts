// Scoped console logging with a level filter and a ring buffer of recent
// entries. No DOM and no Tauri calls, so every webview and every test can
// import it.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const BUFFER_SIZE = 200;

let minLevel: LogLevel = 'info';
const buffer: LogEntry[] = [];

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export function formatLogPrefix(entry: LogEntry): string {
  return `[${entry.timestamp}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}]`;
}

export function getRecentLogs(count = 50): readonly LogEntry[] {
  return buffer.slice(-count);
}

export function clearLogBuffer(): void {
  buffer.length = 0;
}

function writeConsole(entry: LogEntry): void {
  const prefix = formatLogPrefix(entry);
  const data = entry.data ?? '';
  switch (entry.level) {
    case 'debug':
      console.debug(prefix, entry.message, data);
      break;
    case 'info':
      console.info(prefix, entry.message, data);
      break;
    case 'warn':
      console.warn(prefix, entry.message, data);
      break;
    case 'error':
      console.error(prefix, entry.message, data);
      break;
  }
}

export function createLogger(module: string): Logger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      module,
      message,
      timestamp: new Date().toISOString(),
      data,
    };

    writeConsole(entry);

    buffer.push(entry);
    if (buffer.length > BUFFER_SIZE) {
      buffer.shift();
    }
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}
