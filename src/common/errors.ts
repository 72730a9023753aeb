/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Fatal errors. Problems in the markup itself are not thrown, they are
  reported as events (see report.ts); what ends up here are file-format and
  configuration violations.
*/

export interface ErrorContext {
  file?: string;
  [key: string]: unknown;
}

export interface CorpusErrorJSON {
  code: string;
  message: string;
  context: ErrorContext;
}

export abstract class CorpusError extends Error {
  abstract readonly code: string;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): CorpusErrorJSON {
    return { code: this.code, message: this.message, context: this.context };
  }
}

/** Invalid parser or segmenter setup, detected before any input is read. */
export class ConfigurationError extends CorpusError {
  readonly code = 'ERR_CONFIGURATION';
}

/** An annotation file line without the key/value delimiter. */
export class CorruptAnnotationError extends CorpusError {
  readonly code = 'ERR_CORRUPT_ANNOTATION';

  constructor(file: string, lineNumber: number, line: string) {
    super(`Corrupt annotation at ${file}:${lineNumber}: no delimiter in ${JSON.stringify(line)}`, {
      file,
      lineNumber,
    });
  }
}

/** A corpus text with an anchor marker that is opened but never closed. */
export class MismatchedAnchorDelimitersError extends CorpusError {
  readonly code = 'ERR_MISMATCHED_ANCHOR_DELIMITERS';

  constructor(offset: number, file?: string) {
    super(`Mismatched anchor delimiters in corpus text${file ? ` ${file}` : ''} at offset ${offset}`, {
      file,
      offset,
    });
  }
}

/** An edge refers to an anchor that the corpus text does not define. */
export class UnknownAnchorError extends CorpusError {
  readonly code = 'ERR_UNKNOWN_ANCHOR';

  constructor(anchor: string, edge: string) {
    super(`Unknown anchor ${anchor} in edge ${edge}`, { anchor, edge });
  }
}
