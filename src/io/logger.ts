import { ConsoleLogHandler, LogLevel } from '../models';

interface LogMessage {
  level: LogLevel;
  params: unknown[];
}

export interface LoggerOptions {
  level?: LogLevel;
  logMethod?: (level: LogLevel, ...params: unknown[]) => void;
  noTrace?: boolean;
}

export class Logger implements ConsoleLogHandler {
  private collectCache: Array<LogMessage> | undefined;

  constructor(readonly options: LoggerOptions) {}

  /**
   * Buffers messages until {@link flush} is called, so output of concurrent work
   * does not interleave with a progress bar.
   */
  collectMessages(): void {
    this.collectCache = [];
  }

  flush(): void {
    if (this.collectCache) {
      const messages = this.collectCache;
      this.collectCache = [];
      for (const message of messages) {
        this.writeLog(message.level, ...message.params);
      }
    }
  }

  private log_(level: LogLevel, params: unknown[]) {
    if (this.options.level !== undefined && level < this.options.level) {
      return;
    }
    if (this.collectCache) {
      this.collectCache.push({ level, params });
    } else {
      this.writeLog(level, ...params);
    }
  }

  private writeLog(level: LogLevel, ...params: unknown[]) {
    if (this.options.logMethod) {
      this.options.logMethod(level, ...params);
      return;
    }
    switch (level) {
      case LogLevel.trace:
        if (!this.options.noTrace) {
          console.debug(...params);
        }
        break;
      case LogLevel.debug:
        console.debug(...params);
        break;
      case LogLevel.warn:
        console.warn(...params);
        break;
      case LogLevel.error:
        console.error(...params);
        break;
      default:
        console.info(...params);
        break;
    }
  }

  info(...params: unknown[]): void {
    this.log_(LogLevel.info, params);
  }

  log(...params: unknown[]): void {
    this.log_(LogLevel.info, params);
  }

  trace(...params: unknown[]): void {
    this.log_(LogLevel.trace, params);
  }

  debug(...params: unknown[]): void {
    this.log_(LogLevel.debug, params);
  }

  error(...params: unknown[]): void {
    this.log_(LogLevel.error, params);
  }

  warn(...params: unknown[]): void {
    this.log_(LogLevel.warn, params);
  }
}

export const log = new Logger({
  level: LogLevel.warn,
  noTrace: true,
});
