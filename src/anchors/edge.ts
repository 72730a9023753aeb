/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Edge keys: 'name:start-end[:start-end...]'.
  Decoding only ever splits on the first or last separator, so a name
  carrying a span separator (e.g. 'sub-title') still decodes.
*/

export const EDGE_SEPARATOR = ':';
export const SPAN_SEPARATOR = '-';

/** A pair of anchors: start and end of a stretch of text. */
export type Span = readonly [start: string, end: string];

function strip(part: string, separator: string): string {
  return part.split(separator).join('');
}

function safeJoin(separator: string, parts: readonly string[]): string {
  return parts.map((p) => strip(p, separator)).join(separator);
}

export function encodeEdge(name: string, spans: readonly Span[]): string {
  const encodedSpans = spans.map(([start, end]) =>
    safeJoin(SPAN_SEPARATOR, [strip(start, EDGE_SEPARATOR), strip(end, EDGE_SEPARATOR)])
  );
  return safeJoin(EDGE_SEPARATOR, [name, ...encodedSpans]);
}

export function edgeName(edge: string): string {
  const ix = edge.indexOf(EDGE_SEPARATOR);
  return ix < 0 ? edge : edge.slice(0, ix);
}

export function edgeSpans(edge: string): Span[] {
  const groups = edge.split(EDGE_SEPARATOR).slice(1);
  return groups.map((group) => {
    const first = group.indexOf(SPAN_SEPARATOR);
    const last = group.lastIndexOf(SPAN_SEPARATOR);
    if (first < 0) return [group, ''] as const;
    return [group.slice(0, first), group.slice(last + 1)] as const;
  });
}

/** Start anchor of the first span. */
export function edgeStart(edge: string): string {
  const ix = edge.indexOf(EDGE_SEPARATOR);
  if (ix < 0) return '';
  const rest = edge.slice(ix + 1);
  const dash = rest.indexOf(SPAN_SEPARATOR);
  return dash < 0 ? rest : rest.slice(0, dash);
}

/** End anchor of the last span. */
export function edgeEnd(edge: string): string {
  return edge.slice(edge.lastIndexOf(SPAN_SEPARATOR) + 1);
}
