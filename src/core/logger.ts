// File: src/core/logger.ts
import winston from "winston";
import chalk, { type ChalkInstance } from "chalk";
import { dirname } from "node:path";
import { ensureDirectory } from "./file-utils.ts";
import { getEnv } from "./env.ts";
import type { ILogger } from "../types/dataset.ts";

/**
 * Acceptable color strings for the custom log levels.
 */
type ChalkColor = "red" | "blue" | "green" | "cyan" | "yellow" | "white";

const chalkMethods: Record<ChalkColor, ChalkInstance> = {
  red: chalk.red,
  blue: chalk.blue,
  green: chalk.green,
  cyan: chalk.cyan,
  yellow: chalk.yellow,
  white: chalk.white,
};

export const LOG_LEVELS = {
  error: 0,
  warn: 1,
  info: 2,
  impt: 3,
  attn: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

const LEVEL_COLORS: Record<LogLevel, ChalkColor> = {
  error: "red",
  warn: "yellow",
  info: "green",
  impt: "blue",
  attn: "cyan",
};

export interface LoggerOptions {
  /** Plain-text file that receives a timestamped copy of every message. */
  logFilePath?: string;
  /** Most verbose level that is still written. Defaults to `attn` (everything). */
  level?: LogLevel;
  /** Turns every transport off. */
  silent?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Logger with a coloured console transport and an optional plain file transport.
 */
export class Logger implements ILogger {
  private logger: winston.Logger;

  /**
   * @param options - File path, level threshold and silence switch.
   *
   * The console transport colours the level tag with chalk; the file transport
   * strips ANSI codes and prefixes every line with a timestamp.
   */
  constructor(options: LoggerOptions = {}) {
    const { logFilePath, level = "attn", silent = false } = options;

    winston.addColors(LEVEL_COLORS);

    const consoleTransport = new winston.transports.Console({
      format: winston.format.printf(({ level: lvl, message }) => {
        const colorKey = isLogLevel(lvl) ? LEVEL_COLORS[lvl] : "white";
        const colourFn = chalkMethods[colorKey];
        const plainMessage = this.stripConsoleFormatting(String(message));
        return `${colourFn(`[${lvl.toUpperCase()}]`)} ${plainMessage}`;
      }),
    });

    if (logFilePath) {
      ensureDirectory(dirname(logFilePath));
    }

    const fileTransport = logFilePath
      ? new winston.transports.File({
          filename: logFilePath,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.printf(({ level: lvl, message, timestamp }) => {
              const plainMessage = this.stripConsoleFormatting(String(message));
              return `${String(timestamp)} [${lvl.toUpperCase()}] ${plainMessage}`;
            })
          ),
        })
      : undefined;

    this.logger = winston.createLogger({
      levels: LOG_LEVELS,
      level,
      silent,
      transports: fileTransport ? [consoleTransport, fileTransport] : [consoleTransport],
    });
  }

  attn(...args: unknown[]): void {
    this.log("attn", ...args);
  }

  impt(...args: unknown[]): void {
    this.log("impt", ...args);
  }

  info(...args: unknown[]): void {
    this.log("info", ...args);
  }

  warn(...args: unknown[]): void {
    this.log("warn", ...args);
  }

  error(...args: unknown[]): void {
    this.log("error", ...args);
  }

  private log(level: LogLevel, ...args: unknown[]): void {
    this.logger.log({ level, message: this.stringifyMessage(args) });
  }

  /**
   * Joins log arguments into one message. Errors contribute their message,
   * other non-strings are pretty-printed JSON.
   */
  private stringifyMessage(args: unknown[]): string {
    return args
      .map((arg) => {
        if (typeof arg === "string") return arg;
        if (arg instanceof Error) return arg.message;
        return JSON.stringify(arg, null, 2);
      })
      .join(" ");
  }

  private stripConsoleFormatting(message: string): string {
    // eslint-disable-next-line no-control-regex
    return message.replace(/\x1b\[[0-9;]*m/g, "");
  }
}

/**
 * A logger that discards everything.
 */
export function noopLogger(): ILogger {
  return {
    attn: () => {},
    impt: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

let defaultLogger: Logger | undefined;

/**
 * Process-wide logger used when a component is not handed one.
 * Reads `LOG_PATH` (optional file transport) and `LOG_LEVEL` on first use.
 */
export function getLogger(): ILogger {
  if (!defaultLogger) {
    const logFilePath = getEnv("LOG_PATH", "");
    const level = getEnv("LOG_LEVEL", "attn");
    defaultLogger = new Logger({
      logFilePath: logFilePath || undefined,
      level: isLogLevel(level) ? level : "attn",
    });
  }
  return defaultLogger;
}
