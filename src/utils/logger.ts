import * as fs from "fs";
import * as path from "path";
import { describeError } from "../errors";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

interface LoggingOptions {
  level: LogLevel;
  logDir: string | null;
}

const options: LoggingOptions = {
  level: "INFO",
  logDir: null,
};

export function configureLogging(next: Partial<LoggingOptions>): void {
  if (next.level !== undefined) options.level = next.level;
  if (next.logDir !== undefined) {
    options.logDir = next.logDir;
    if (options.logDir && !fs.existsSync(options.logDir)) {
      fs.mkdirSync(options.logDir, { recursive: true });
    }
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Daily file: match_tracker_YYYY-MM-DD.log */
export function logFilePath(logDir: string, at: Date = new Date()): string {
  return path.join(logDir, `match_tracker_${at.toISOString().slice(0, 10)}.log`);
}

function write(level: LogLevel, component: string, message: string): void {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(options.level)) return;

  const now = new Date();
  const line = `${now.toISOString()} [${level}] [${component}] ${message}`;
  if (level === "ERROR") {
    console.error(line);
  } else {
    console.log(line);
  }

  if (!options.logDir) return;
  try {
    fs.appendFileSync(logFilePath(options.logDir, now), line + "\n");
  } catch (err) {
    // Fall back to console only
    console.error(`Log file disabled: ${describeError(err)}`);
    options.logDir = null;
  }
}

export function createLogger(component: string): Logger {
  return {
    debug: (message) => write("DEBUG", component, message),
    info: (message) => write("INFO", component, message),
    warn: (message) => write("WARN", component, message),
    error: (message, err) =>
      write("ERROR", component, err === undefined ? message : `${message}: ${describeError(err)}`),
  };
}
