import fs from "fs";
import path from "path";
import os from "os";

export type LogLevel = "info" | "warn" | "error";

const LOG_FILE_PATH = path.join(os.tmpdir(), `marquee-server-${Date.now()}.log`);

const CONSOLE_METHOD = {
  info: "log",
  warn: "warn",
  error: "error",
} as const satisfies Record<LogLevel, "log" | "warn" | "error">;

// One switch per logger tree: children see the root's console toggle.
interface ConsoleSwitch {
  on: boolean;
}

/**
 * Scoped logger. Every logger created through {@link Logger.child} shares its
 * root's console switch and the process log file.
 *
 * Info lines reach the file only while the console is on; warnings and errors
 * always reach it.
 */
export class Logger {
  private static fileStream: fs.WriteStream | null = null;

  readonly scope: string;
  private consoleSwitch: ConsoleSwitch;

  constructor(scope: string, consoleEnabled = false) {
    this.scope = scope;
    this.consoleSwitch = { on: consoleEnabled };
  }

  static getLogFilePath(): string {
    return LOG_FILE_PATH;
  }

  static closeFileStream(): void {
    Logger.fileStream?.end();
    Logger.fileStream = null;
  }

  private static file(): fs.WriteStream {
    if (!Logger.fileStream) {
      Logger.fileStream = fs.createWriteStream(LOG_FILE_PATH, { flags: "a" });
    }
    return Logger.fileStream;
  }

  /** Logger for a sub-component, scoped as `parent:name`. */
  child(name: string): Logger {
    const child = new Logger(`${this.scope}:${name}`);
    child.consoleSwitch = this.consoleSwitch;
    return child;
  }

  setEnabled(enabled: boolean): void {
    this.consoleSwitch.on = enabled;
  }

  isEnabled(): boolean {
    return this.consoleSwitch.on;
  }

  log(...args: unknown[]): void {
    if (this.consoleSwitch.on) {
      this.write("info", args);
    }
  }

  warn(...args: unknown[]): void {
    this.write("warn", args);
  }

  error(...args: unknown[]): void {
    this.write("error", args);
  }

  private write(level: LogLevel, args: unknown[]): void {
    const tag = `[${this.scope}]`;
    Logger.file().write(`${new Date().toISOString()} ${level.toUpperCase()} ${tag} ${formatLogArgs(args)}\n`);
    if (this.consoleSwitch.on) {
      console[CONSOLE_METHOD[level]](tag, ...args);
    }
  }
}

export function formatLogArgs(args: readonly unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        return arg.stack ?? `${arg.name}: ${arg.message}`;
      }
      return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
    })
    .join(" ");
}
