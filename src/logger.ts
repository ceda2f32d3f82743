// Levelled console logger shared by the CLI and the generator

export enum LogLevel {
  SILENT = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4
}

export interface LogSink {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const consoleSink: LogSink = {
  error: message => console.error(message),
  warn: message => console.warn(message),
  info: message => console.error(message),
  debug: message => console.error(message)
};

export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = LogLevel.WARN, sink: LogSink = consoleSink) {
    this.level = level;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  error(message: string): void {
    if (this.enabled(LogLevel.ERROR)) this.sink.error(`error: ${message}`);
  }

  warn(message: string): void {
    if (this.enabled(LogLevel.WARN)) this.sink.warn(`warning: ${message}`);
  }

  info(message: string): void {
    if (this.enabled(LogLevel.INFO)) this.sink.info(message);
  }

  debug(message: string): void {
    if (this.enabled(LogLevel.DEBUG)) this.sink.debug(`debug: ${message}`);
  }

  private enabled(level: LogLevel): boolean {
    return level <= this.level;
  }
}

export const logger = new Logger();
