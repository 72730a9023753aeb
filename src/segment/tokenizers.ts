/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConfigurationError } from '../common/errors';
import { TEXT_TOKEN } from '../parser/pseudo-xml-parser';

/** Character offsets into a string, end exclusive. */
export type TextSpan = [start: number, end: number];

/** Splits a text into spans; offsets are relative to that text. */
export type SpanTokenizer = (text: string) => TextSpan[];

/** Non-empty matches of `pattern` in `text`, left to right. */
function matches(pattern: RegExp, text: string): RegExpExecArray[] {
  const global = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  const found: RegExpExecArray[] = [];
  for (let m = global.exec(text); m; m = global.exec(text)) {
    if (m[0] === '') global.lastIndex++;
    else found.push(m);
  }
  return found;
}

/**
 * Tokenizer whose pattern matches the separators: everything between two
 * matches is a span. Empty spans are left out.
 */
export function gapTokenizer(separator: RegExp): SpanTokenizer {
  return (text) => {
    const spans: TextSpan[] = [];
    let left = 0;
    for (const m of matches(separator, text)) {
      if (m.index !== left) spans.push([left, m.index]);
      left = m.index + m[0].length;
    }
    if (left !== text.length) spans.push([left, text.length]);
    return spans;
  };
}

/** Tokenizer whose pattern matches the spans themselves. */
export function matchTokenizer(token: RegExp, keep: (match: string) => boolean = () => true): SpanTokenizer {
  return (text) => {
    const spans: TextSpan[] = [];
    for (const m of matches(token, text)) {
      if (keep(m[0])) spans.push([m.index, m.index + m[0].length]);
    }
    return spans;
  };
}

export const whitespaceTokenizer = gapTokenizer(/\s+/);

export const linebreakTokenizer = gapTokenizer(/\s*\n\s*/);

export const blanklineTokenizer = gapTokenizer(/\s*\n\s*\n\s*/);

const sentenceGaps = gapTokenizer(/[.!?]\s*/);

/**
 * Cuts after every '.', '!' or '?' and the blanks following it, whatever the
 * context. A sentence runs from the start of one stretch of text to the
 * start of the next, so it keeps its closing punctuation.
 */
export const punctuationTokenizer: SpanTokenizer = (text) => {
  const starts = sentenceGaps(text).map(([start]) => start);
  const spans: TextSpan[] = [];
  let start = starts.length > 0 ? starts[0] : 0;
  for (const next of starts.slice(1)) {
    spans.push([start, next]);
    start = next;
  }
  spans.push([start, text.length]);
  return spans;
};

/** The parser's own token rule, without the blanks. */
export const wordTokenizer = matchTokenizer(TEXT_TOKEN, (token) => token.trim() !== '');

export const SEGMENTERS: ReadonlyMap<string, SpanTokenizer> = new Map([
  ['whitespace', whitespaceTokenizer],
  ['linebreaks', linebreakTokenizer],
  ['blanklines', blanklineTokenizer],
  ['punctuation', punctuationTokenizer],
  ['tokens', wordTokenizer],
]);

export function getSegmenter(name: string): SpanTokenizer {
  const segmenter = SEGMENTERS.get(name);
  if (!segmenter) {
    const available = [...SEGMENTERS.keys()].sort().join(', ');
    throw new ConfigurationError(`Unknown segmenter '${name}'. Available segmenters: ${available}`, {
      segmenter: name,
    });
  }
  return segmenter;
}
