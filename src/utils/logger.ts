// src/utils/logger.ts

import { format } from 'util';
import chalk from 'chalk';
import type { OutputSink } from '../core/types/output-sink.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export class Logger {
  private static level: LogLevel = LogLevel.INFO;
  private static output: OutputSink = process.stderr;

  static setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Route every log line to the given sink. The runner points this at the
   * error stream before anything else runs.
   */
  static setOutput(output: OutputSink): void {
    this.output = output;
  }

  static debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write(chalk.dim(`🔍 ${message}`), args);
    }
  }

  static info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      this.write(`ℹ️  ${message}`, args);
    }
  }

  static warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      this.write(chalk.yellow(`⚠️  ${message}`), args);
    }
  }

  static error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      this.write(chalk.red(`❌ ${message}`), args);
    }
  }

  private static write(line: string, args: unknown[]): void {
    this.output.write(`${format(line, ...args)}\n`);
  }
}
