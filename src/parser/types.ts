/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import type { ReportContext, ReportSummary } from '../common/report';

/** An element whose start tag has been seen but not yet its end tag. */
export interface OpenElement {
  name: string;
  /** Anchor at the position where the element starts. */
  anchor: string;
  /** Attributes in source order, followed by ['', ''] for the bare element. */
  attributes: Array<[string, string]>;
  line: number;
  column: number;
}

export interface ParserOptions {
  /** Anchor prefix, usually the document id. */
  prefix: string;
  /** Seed for anchor identifiers; defaults to the prefix. */
  seed?: string;
  /** Expected upper bound of anchors, used to size identifiers. */
  maxIdentifiers?: number;
  /** Event sink; a new one logging to `logger` is created if absent. */
  report?: ReportContext;
  logger?: Logger;
}

/** Everything a parsed document produces, ready to be written. */
export interface ParsedDocument {
  text: string;
  positionToAnchor: Map<number, string>;
  anchorToPosition: Map<string, number>;
  /** Store name -> (edge or metadata key -> value), in configuration order. */
  stores: Map<string, Map<string, string>>;
  report: ReportSummary;
}
