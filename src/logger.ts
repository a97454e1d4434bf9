// Leveled console logging for the compiler driver and the CLI

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export interface LogSink {
  log(message: string): void;
  error(message: string): void;
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = LogLevel.WARN, private readonly sink: LogSink = console) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.write(LogLevel.WARN, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;
    const line = `[${LogLevel[level]}] ${message}`;
    if (level >= LogLevel.WARN) {
      this.sink.error(line);
    } else {
      this.sink.log(line);
    }
  }
}

export const logger = new Logger();
