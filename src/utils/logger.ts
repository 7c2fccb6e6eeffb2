import * as fs from "fs";
import * as path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = typeof raw === "string" ? raw.trim().toLowerCase() : "";
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return "info";
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for the log file; `null` disables file output. */
  logDir?: string | null;
}

export class Logger {
  private level: LogLevel;
  private logFilePath: string | null = null;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";

    this.setLogDir(
      options.logDir === undefined
        ? path.join(process.cwd(), "logs")
        : options.logDir
    );
  }

  /**
   * Starts a new log file in `logDir`, or stops file output for `null`.
   */
  public setLogDir(logDir: string | null) {
    if (logDir === null) {
      this.logFilePath = null;
      return;
    }

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    // log_YYYY-MM-DD_HH-mm-ss.log
    const timestamp = this.formatDateForFilename(new Date());
    this.logFilePath = path.join(logDir, `log_${timestamp}.log`);
    this.write("debug", "SYSTEM", `Log file: ${this.logFilePath}`);
  }

  public setLevel(level: LogLevel) {
    this.level = level;
  }

  private formatDateForFilename(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, "0");
    const yyyy = date.getFullYear();
    const MM = pad(date.getMonth() + 1);
    const dd = pad(date.getDate());
    const HH = pad(date.getHours());
    const mm = pad(date.getMinutes());
    const ss = pad(date.getSeconds());
    return `${yyyy}-${MM}-${dd}_${HH}-${mm}-${ss}`;
  }

  private formatMessage(label: string, message: string): string {
    const now = new Date().toISOString();
    return `[${now}] [${label}] ${message}`;
  }

  /**
   * Writes to stderr (stdout is reserved for command output) and to the log
   * file when one is configured.
   */
  private write(level: LogLevel, label: string, message: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const formatted = this.formatMessage(label, message);
    process.stderr.write(formatted + "\n");

    if (this.logFilePath) {
      try {
        fs.appendFileSync(this.logFilePath, formatted + "\n");
      } catch (err) {
        process.stderr.write(
          `Failed to write to log file: ${
            err instanceof Error ? err.message : String(err)
          }\n`
        );
      }
    }
  }

  public info(message: string) {
    this.write("info", "INFO", message);
  }

  public warn(message: string) {
    this.write("warn", "WARN", message);
  }

  public error(message: string, error?: unknown) {
    let msg = message;
    if (error !== undefined) {
      msg += ` | Error: ${error instanceof Error ? error.message : String(error)}`;
      if (error instanceof Error && error.stack) {
        msg += `\nStack: ${error.stack}`;
      }
    }
    this.write("error", "ERROR", msg);
  }

  public debug(message: string) {
    this.write("debug", "DEBUG", message);
  }
}

/**
 * Log directory from `LOG_TO_FILE` / `LOG_DIR`; file output is off in tests.
 */
export function resolveLogDir(env: Record<string, string | undefined>): string | null {
  if (env.LOG_TO_FILE === "false" || env.NODE_ENV === "test") {
    return null;
  }
  return env.LOG_DIR || path.join(process.cwd(), "logs");
}

// File output starts once the environment is loaded, see ConfigLoader.
export const logger = new Logger({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  logDir: null,
});
