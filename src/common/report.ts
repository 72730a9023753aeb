/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from './console-logger';
import type { Logger } from './logger';

export type ReportKind = 'warning' | 'error';

export type ReportCode =
  | 'skipped-element'
  | 'overlap'
  | 'auto-close'
  | 'unmatched-end-tag'
  | 'bad-reference'
  | 'special-character'
  | 'comment'
  | 'comment-syntax'
  | 'comment-in-header'
  | 'processing-instruction'
  | 'declaration'
  | 'header-metadata';

/** Where in the source an event happened. */
export interface SourceLocation {
  /** 1-based line in the markup source. */
  line: number;
  /** 0-based column in the markup source. */
  column: number;
  /** Position in the de-anchored text at the time of the event. */
  position: number;
}

export interface ReportEvent extends SourceLocation {
  kind: ReportKind;
  code: ReportCode;
  message: string;
}

export interface ReportSummary {
  warnings: number;
  errors: number;
  events: ReportEvent[];
}

/**
 * Collects the warnings and errors of one document. Every event is kept for
 * inspection and forwarded to the logger, prefixed with its source location.
 */
export class ReportContext {
  readonly events: ReportEvent[] = [];
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger();
  }

  get warnings(): number {
    return this.count('warning');
  }

  get errors(): number {
    return this.count('error');
  }

  warn(code: ReportCode, location: SourceLocation, message: string): void {
    this.events.push({ kind: 'warning', code, message, ...location });
    this.logger.warn(`{${location.line}:${location.column}} ${message}`);
  }

  error(code: ReportCode, location: SourceLocation, message: string): void {
    this.events.push({ kind: 'error', code, message, ...location });
    this.logger.error(`{${location.line}:${location.column}} ${message}`);
  }

  byCode(code: ReportCode): ReportEvent[] {
    return this.events.filter((e) => e.code === code);
  }

  summary(): ReportSummary {
    return { warnings: this.warnings, errors: this.errors, events: [...this.events] };
  }

  private count(kind: ReportKind): number {
    let n = 0;
    for (const e of this.events) if (e.kind === kind) n++;
    return n;
  }
}
