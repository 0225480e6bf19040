import { format } from "node:util";

export const C = {
  reset: "\x1b[0m",
  bold: (s: string) => `\x1b[1m${s}\x1b[0m`,
  red: (s: string) => `\x1b[31m${s}\x1b[0m`,
  green: (s: string) => `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string) => `\x1b[33m${s}\x1b[0m`,
  blue: (s: string) => `\x1b[34m${s}\x1b[0m`,
  magenta: (s: string) => `\x1b[35m${s}\x1b[0m`,
  cyan: (s: string) => `\x1b[36m${s}\x1b[0m`,
  gray: (s: string) => `\x1b[90m${s}\x1b[0m`,
};

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives formatted log lines instead of the console (the TUI installs one). */
export type LogSink = (level: LogLevel, line: string) => void;

export class Logger {
  private static _verbose = false;
  private static _sink: LogSink | null = null;

  static setVerbose(v: boolean) { Logger._verbose = v; }
  static isVerbose() { return Logger._verbose; }

  /** Pass null to restore console output. */
  static setSink(sink: LogSink | null) { Logger._sink = sink; }

  static info(...args: unknown[]) { Logger.emit("info", args); }
  static warn(...args: unknown[]) { Logger.emit("warn", args); }
  static error(...args: unknown[]) { Logger.emit("error", args); }

  static debug(...args: unknown[]) {
    // Debug requires BOTH verbose mode AND STRATUS_LOG_LEVEL=DEBUG
    const debugLevel = (process.env.STRATUS_LOG_LEVEL ?? "").toUpperCase() === "DEBUG";
    if (Logger._verbose && debugLevel) Logger.emit("debug", args);
  }

  static streamInfo(s: string) { process.stdout.write(s); }
  static endStreamLine(suffix = "") { process.stdout.write(suffix + "\n"); }

  private static emit(level: LogLevel, args: unknown[]) {
    if (Logger._sink) {
      Logger._sink(level, format(...args));
      return;
    }
    if (level === "warn") console.warn(...args);
    else if (level === "error") console.error(...args);
    else console.log(...args);
  }
}
