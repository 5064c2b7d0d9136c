// File: ./tests/logger.mock.ts

import type { ILogger } from "../types/dataset.ts";
import type { LogLevel } from "../core/logger.ts";

/**
 * Captures every message per level so tests can assert on what was logged.
 */
export class MockLogger implements ILogger {
  logs: Record<LogLevel, string[]> = {
    error: [],
    warn: [],
    info: [],
    impt: [],
    attn: [],
  };

  clear(): void {
    this.logs = { error: [], warn: [], info: [], impt: [], attn: [] };
  }

  attn(...args: unknown[]): void {
    this.logs.attn.push(this.formatArgs(args));
  }

  impt(...args: unknown[]): void {
    this.logs.impt.push(this.formatArgs(args));
  }

  info(...args: unknown[]): void {
    this.logs.info.push(this.formatArgs(args));
  }

  warn(...args: unknown[]): void {
    this.logs.warn.push(this.formatArgs(args));
  }

  error(...args: unknown[]): void {
    this.logs.error.push(this.formatArgs(args));
  }

  /**
   * Strings as they are, errors by message, anything else as JSON.
   */
  private formatArgs(args: unknown[]): string {
    return args
      .map((arg) => {
        if (typeof arg === "string") return arg;
        if (arg instanceof Error) return arg.message;
        return JSON.stringify(arg, null, 2);
      })
      .join(" ");
  }
}
