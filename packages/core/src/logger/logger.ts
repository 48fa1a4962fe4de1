export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

// Level of loggers created without one; null until setLogLevel() is called
let sharedLevel: LogLevel | null = null;

class ConsoleLogger implements Logger {
  private level: LogLevel | null;
  private readonly prefix: string;

  constructor(prefix: string = "", level: LogLevel | null = null) {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const current = this.getLevel();
    const currentLevelIndex = LEVELS.indexOf(current);
    const messageLevelIndex = LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && current !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? sharedLevel ?? resolveDefaultLogLevel();
  }
}

/**
 * Default level: LOG_LEVEL when it names a level, silent under NODE_ENV=test, info otherwise.
 */
export function resolveDefaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = env["LOG_LEVEL"];
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return env["NODE_ENV"] === "test" ? "silent" : "info";
}

/**
 * Creates a logger that prefixes every message. Without an explicit level it
 * starts at resolveDefaultLogLevel() and follows setLogLevel().
 */
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level ?? null);
}

/**
 * Changes the level of every logger that was created without an explicit level
 * and has not had setLevel() called on it.
 */
export function setLogLevel(level: LogLevel): void {
  sharedLevel = level;
}

// Shared logger for code outside the framework services
export const logger = createLogger("[Atelier] ");
