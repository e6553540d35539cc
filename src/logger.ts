import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  /** Lines are appended here as well as printed. */
  logFile?: string;
  /** Enables debug output. */
  verbose?: boolean;
  /** Print to stderr; stdout stays free for command output and the MCP transport. */
  console?: boolean;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const printToConsole = options.console ?? true;
  let logFile = options.logFile;

  if (logFile) {
    const dir = dirname(logFile);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const write = (level: LogLevel, message: string): void => {
    if (level === "debug" && !options.verbose) return;

    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}`;

    if (printToConsole) {
      console.error(line);
    }

    if (logFile) {
      try {
        appendFileSync(logFile, line + "\n");
      } catch (error) {
        console.error(`[${timestamp}] WARN log file ${logFile} disabled: ${errorMessage(error)}`);
        logFile = undefined;
      }
    }
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) =>
      write("error", error === undefined ? message : `${message}: ${errorMessage(error)}`),
  };
}
