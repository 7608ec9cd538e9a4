/**
 * Logger Utility
 * Handles diagnostic output with different log levels
 *
 * Everything goes to stderr: stdout is reserved for the Markdown path
 */

import { chalkStderr, type ChalkInstance } from "chalk";
import type { LogLevel } from "../types";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
  chalk?: ChalkInstance;
}

export class Logger {
  private readonly level: LogLevel;
  private write: (line: string) => void;
  private chalk: ChalkInstance;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
    this.chalk = options.chalk ?? chalkStderr;
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.write(this.chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.write(`${this.chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.write(`${this.chalk.yellow("[WARN]")} ${message}`);
    }
  }

  error(message: string, error?: Error): void {
    this.write(`${this.chalk.red("[ERROR]")} ${message}`);
    if (error?.stack && this.enabled("debug")) {
      this.write(this.chalk.dim(error.stack));
    }
  }
}
