/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Tag-level lexer for pseudo-XML. It does no nesting checks at all, which is
  what lets the parser accept overlapping elements.
*/

import { parseStartTag } from './attributes';

export interface TokenLocation {
  /** 1-based line. */
  line: number;
  /** 0-based column. */
  column: number;
  /** Offset in the source. */
  offset: number;
  /** Source text of the token. */
  raw: string;
}

export type MarkupToken = TokenLocation &
  (
    | { type: 'start'; name: string; attributes: Array<[string, string]>; selfClosing: boolean }
    | { type: 'end'; name: string }
    | { type: 'text'; text: string }
    | { type: 'charref'; ref: string }
    | { type: 'entityref'; name: string }
    | { type: 'comment'; text: string }
    | { type: 'pi'; data: string }
    | { type: 'decl'; data: string }
  );

const START_TAG =
  /<[A-Za-z_][-.:\w]*(?:\s+[^\s"'>/=]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s"'>]+))?)*\s*(\/?)>/y;
const END_TAG = /<\/([A-Za-z_][-.:\w]*)\s*>/y;
const REFERENCE = /&(#[0-9]+|#[xX][0-9a-fA-F]+|[A-Za-z][-.\w]*);/y;
const TEXT_STOP = /[<&]/g;

/** Maps source offsets to line/column. */
class LineIndex {
  private readonly starts: number[] = [0];

  constructor(source: string) {
    for (let i = source.indexOf('\n'); i >= 0; i = source.indexOf('\n', i + 1)) this.starts.push(i + 1);
  }

  locate(offset: number): { line: number; column: number } {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - this.starts[lo] };
  }
}

export interface LexResult {
  tokens: MarkupToken[];
  /** Location just past the last character. */
  end: { line: number; column: number; offset: number };
}

function matchAt(pattern: RegExp, source: string, offset: number): RegExpExecArray | null {
  pattern.lastIndex = offset;
  return pattern.exec(source);
}

/**
 * Split markup into tokens. A '<' or '&' that does not start a tag,
 * comment, declaration, processing instruction or reference is text, as is
 * an unterminated construct at the end of the input. Adjacent text is merged.
 */
export function lexMarkup(source: string): LexResult {
  const index = new LineIndex(source);
  const tokens: MarkupToken[] = [];
  let textStart = -1;
  let i = 0;

  const at = (offset: number, end: number) => ({
    ...index.locate(offset),
    offset,
    raw: source.slice(offset, end),
  });
  const flushText = () => {
    if (textStart < 0) return;
    const loc = at(textStart, i);
    tokens.push({ type: 'text', text: loc.raw, ...loc });
    textStart = -1;
  };
  const emit = (token: MarkupToken, end: number) => {
    flushText();
    tokens.push(token);
    i = end;
  };
  const literal = (end: number) => {
    if (textStart < 0) textStart = i;
    i = end;
  };

  while (i < source.length) {
    const ch = source[i];
    if (ch === '<') {
      if (source.startsWith('<!--', i)) {
        const close = source.indexOf('-->', i + 4);
        if (close < 0) literal(source.length);
        else emit({ type: 'comment', text: source.slice(i + 4, close), ...at(i, close + 3) }, close + 3);
      } else if (source.startsWith('<![CDATA[', i)) {
        const close = source.indexOf(']]>', i);
        if (close < 0) literal(source.length);
        else emit({ type: 'decl', data: source.slice(i + 2, close + 2), ...at(i, close + 3) }, close + 3);
      } else if (source.startsWith('<!', i) || source.startsWith('<?', i)) {
        const close = source.indexOf('>', i + 2);
        if (close < 0) literal(source.length);
        else {
          const data = source.slice(i + 2, close);
          if (source[i + 1] === '!') emit({ type: 'decl', data, ...at(i, close + 1) }, close + 1);
          else emit({ type: 'pi', data, ...at(i, close + 1) }, close + 1);
        }
      } else if (source[i + 1] === '/') {
        const m = matchAt(END_TAG, source, i);
        if (!m) literal(i + 1);
        else emit({ type: 'end', name: m[1].toLowerCase(), ...at(i, i + m[0].length) }, i + m[0].length);
      } else {
        const m = matchAt(START_TAG, source, i);
        const tag = m ? parseStartTag(m[0]) : undefined;
        if (!m || !tag) literal(i + 1);
        else {
          const end = i + m[0].length;
          emit({ type: 'start', ...tag, selfClosing: m[1] === '/', ...at(i, end) }, end);
        }
      }
    } else if (ch === '&') {
      const m = matchAt(REFERENCE, source, i);
      if (!m) literal(i + 1);
      else {
        const end = i + m[0].length;
        const body = m[1];
        if (body.startsWith('#')) emit({ type: 'charref', ref: body, ...at(i, end) }, end);
        else emit({ type: 'entityref', name: body, ...at(i, end) }, end);
      }
    } else {
      TEXT_STOP.lastIndex = i;
      const stop = TEXT_STOP.exec(source);
      literal(stop ? stop.index : source.length);
    }
  }
  flushText();

  return { tokens, end: { ...index.locate(source.length), offset: source.length } };
}
