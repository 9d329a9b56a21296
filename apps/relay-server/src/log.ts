/**
 * Process-wide logging. Configured once at startup, before any unit runs;
 * every scope then writes `<timestamp> - <LEVEL> - [<scope>] <message>`.
 */

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: number | null = null;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Set the level for the whole process. Only the first call has effect. */
export function configureLogging(level: LogLevel): void {
  if (threshold !== null) return;
  threshold = SEVERITY[level];
}

function write(level: Exclude<LogLevel, "silent">, scope: string, message: string, args: unknown[]): void {
  if (SEVERITY[level] < (threshold ?? SEVERITY.info)) return;
  const line = `${new Date().toISOString()} - ${level.toUpperCase()} - [${scope}] ${message}`;
  if (level === "warn" || level === "error") {
    console.error(line, ...args);
  } else {
    console.log(line, ...args);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, ...args) => write("debug", scope, message, args),
    info: (message, ...args) => write("info", scope, message, args),
    warn: (message, ...args) => write("warn", scope, message, args),
    error: (message, ...args) => write("error", scope, message, args),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
