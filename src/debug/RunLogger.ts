/**
 * RunLogger - Levelled console logging for command-line runs
 *
 * Core modules never log; they expose hooks (such as onProgress) and the
 * entry point forwards those here.
 */

import type { RenderProgress } from "@/types";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogEntry {
  timestamp: number;
  level: Exclude<LogLevel, "silent">;
  message: string;
}

/** The subset of Console the logger writes through */
export type LogConsole = Pick<Console, "log" | "warn" | "error">;

export class RunLogger {
  private level: LogLevel;
  private readonly out: LogConsole;
  private readonly history: LogEntry[] = [];
  private readonly maxHistory = 100;

  constructor(level: LogLevel = "info", out: LogConsole = console) {
    this.level = level;
    this.out = out;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  /**
   * Progress line in the "Progress: 11/360 frames" form
   */
  progress({ completed, total }: RenderProgress, unit = "frames"): void {
    this.info(`Progress: ${completed}/${total} ${unit}`);
  }

  /** Most recent entries that passed the level filter, oldest first */
  recent(): readonly LogEntry[] {
    return this.history;
  }

  private write(level: Exclude<LogLevel, "silent">, message: string): void {
    if (!this.isEnabled(level)) return;

    this.history.push({ timestamp: Date.now(), level, message });
    // Keep only the last N entries
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    switch (level) {
      case "error":
        this.out.error(message);
        break;
      case "warn":
        this.out.warn(message);
        break;
      default:
        this.out.log(message);
    }
  }
}

export function createRunLogger(level: LogLevel = "info", out: LogConsole = console): RunLogger {
  return new RunLogger(level, out);
}
