import { createWriteStream, WriteStream, mkdirSync, existsSync } from "fs";
import { join } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface ScopedLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Process-wide logger. Everything goes to stderr because stdout carries the
 * JSON-RPC stream when the server runs over stdio.
 */
export class Logger implements ScopedLogger {
  private static instance: Logger;
  private logStream: WriteStream | null = null;
  private logFilePath: string | null = null;
  private level: LogLevel;

  private constructor() {
    const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
    this.level = isLogLevel(configured) ? configured : "info";

    const logDir = process.env.MCP_LOGS_DIR;
    if (logDir) {
      this.openLogFile(logDir);
    }

    process.on("exit", () => this.logStream?.end());
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private openLogFile(logDir: string): void {
    const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
    try {
      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }
      this.logFilePath = join(logDir, `meteo-mcp-${timestamp}.log`);
      this.logStream = createWriteStream(this.logFilePath, { flags: "a" });
      process.stderr.write(`Log file created at: ${this.logFilePath}\n`);
    } catch (err) {
      process.stderr.write(`Failed to create log file in ${logDir}: ${err}\n`);
      process.stderr.write(`Logs will only be written to stderr\n`);
      this.logFilePath = null;
    }
  }

  /**
   * Applies settings resolved after start-up, such as those read from `.env`.
   * A log file already open is kept.
   */
  public configure(options: { level?: LogLevel; logsDir?: string }): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.logsDir && !this.logStream) {
      this.openLogFile(options.logsDir);
    }
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  public child(scope: string): ScopedLogger {
    return {
      debug: (message) => this.write("debug", message, scope),
      info: (message) => this.write("info", message, scope),
      warn: (message) => this.write("warn", message, scope),
      error: (message) => this.write("error", message, scope),
    };
  }

  private formatMessage(level: string, message: string, scope?: string): string {
    const prefix = scope ? `[${scope}] ` : "";
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${prefix}${message}\n`;
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, scope?: string): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const formattedMessage = this.formatMessage(level, message, scope);
    if (this.logStream) {
      this.logStream.write(formattedMessage);
    }
    process.stderr.write(formattedMessage);
  }

  public info(message: string): void {
    this.write("info", message);
  }

  public error(message: string): void {
    this.write("error", message);
  }

  public warn(message: string): void {
    this.write("warn", message);
  }

  public debug(message: string): void {
    this.write("debug", message);
  }

  /** Ends the log file stream; resolves once it is flushed. */
  public close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise((resolve) => stream.end(() => resolve()));
  }

  public getLogPath(): string | null {
    return this.logFilePath;
  }
}

export const logger = Logger.getInstance();
