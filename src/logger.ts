// ABOUTME: Leveled diagnostics written to stderr
// ABOUTME: stdout stays free for the MCP stdio transport and CLI reports

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[currentLevel]) {
      return;
    }
    console.error(`[${component}] ${message}`, ...details);
  };

  return {
    error: (message, ...details) => write('error', message, details),
    warn: (message, ...details) => write('warn', message, details),
    info: (message, ...details) => write('info', message, details),
    debug: (message, ...details) => write('debug', message, details),
  };
}
