export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(value: string | undefined, fallback = LogLevel.WARN): LogLevel {
  if (!value) return fallback;
  return LEVEL_NAMES[value.trim().toLowerCase()] ?? fallback;
}

let globalLevel = parseLogLevel(process.env.PAPERQA_LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

/**
 * Leveled logger. Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */
export class Logger {
  constructor(private readonly scope: string) {}

  public child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`);
  }

  public debug(message: string, ...args: unknown[]): void {
    if (globalLevel <= LogLevel.DEBUG) {
      console.error(`[${this.scope}:DEBUG] ${message}`, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (globalLevel <= LogLevel.INFO) {
      console.error(`[${this.scope}:INFO] ${message}`, ...args);
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (globalLevel <= LogLevel.WARN) {
      console.warn(`[${this.scope}:WARN] ${message}`, ...args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (globalLevel <= LogLevel.ERROR) {
      console.error(`[${this.scope}:ERROR] ${message}`, ...args);
    }
  }
}

export const logger = new Logger('paperqa');

export function createLogger(scope: string): Logger {
  return logger.child(scope);
}
