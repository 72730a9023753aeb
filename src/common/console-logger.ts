/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Console logger writing to stderr, so stdout stays free for data output.
*/

import { LOG_LEVEL_PRIORITY, type Logger, type LogLevel } from './logger';

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private readonly level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.context = undefined;
    this.level = level;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.level);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    if (this.enabled('debug')) this.write('trace', message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    if (this.enabled('debug')) this.write('debug', message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    if (this.enabled('info')) this.write('info', message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    if (this.enabled('warnings')) this.write('warning', message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    if (this.enabled('errors')) this.write('-ERROR-', message, attributes);
  }

  private enabled(required: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[this.level] >= LOG_LEVEL_PRIORITY[required];
  }

  private write(label: string, message: string, attributes: unknown[]): void {
    const prefix = `| ${label.padEnd(7)} :`;
    if (this.context) console.error(prefix, this.context, message, ...attributes);
    else console.error(prefix, message, ...attributes);
  }
}
