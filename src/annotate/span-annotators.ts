/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Annotations derived from the edges of another annotation: the covered
  text, the anchor span, or a fixed value.
*/

import type { AnchorMaps } from '../anchors/anchor-store';
import { edgeEnd, edgeStart, SPAN_SEPARATOR } from '../anchors/edge';
import { UnknownAnchorError } from '../common/errors';
import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { readAnnotationKeys, writeAnnotation, type AnnotationEntry, type AnnotationValue } from '../storage/annotation-file';
import { readCorpusText, type CorpusText } from '../storage/corpus-text';

function positionOf(corpus: AnchorMaps, anchor: string, edge: string): number {
  const position = corpus.anchorToPosition.get(anchor);
  if (position === undefined) throw new UnknownAnchorError(anchor, edge);
  return position;
}

/** Each edge with the text from its start anchor to its end anchor. */
export function textSpans(corpus: CorpusText, keys: Iterable<string>): AnnotationEntry[] {
  const entries: AnnotationEntry[] = [];
  for (const edge of keys) {
    const start = positionOf(corpus, edgeStart(edge), edge);
    const end = positionOf(corpus, edgeEnd(edge), edge);
    entries.push([edge, corpus.text.slice(start, end)]);
  }
  return entries;
}

/** Each edge with 'start-end' of its anchors. */
export function spanAsValue(keys: Iterable<string>): AnnotationEntry[] {
  return [...keys].map((edge): AnnotationEntry => [edge, edgeStart(edge) + SPAN_SEPARATOR + edgeEnd(edge)]);
}

export function constantAnnotation(keys: Iterable<string>, value: AnnotationValue): AnnotationEntry[] {
  return [...keys].map((edge): AnnotationEntry => [edge, value]);
}

export interface SpanAnnotationOptions {
  /** Annotation whose edges are annotated. */
  keysFile: string;
  outFile: string;
  logger?: Logger;
}

export function writeTextSpans(options: SpanAnnotationOptions & { textFile: string }): number {
  const logger = options.logger ?? new ConsoleLogger();
  const corpus = readCorpusText(options.textFile, logger);
  return writeAnnotation(options.outFile, textSpans(corpus, readAnnotationKeys(options.keysFile, logger)), logger);
}

export function writeSpanAsValue(options: SpanAnnotationOptions): number {
  const logger = options.logger ?? new ConsoleLogger();
  return writeAnnotation(options.outFile, spanAsValue(readAnnotationKeys(options.keysFile, logger)), logger);
}

export function writeConstant(options: SpanAnnotationOptions & { value?: string }): number {
  const logger = options.logger ?? new ConsoleLogger();
  return writeAnnotation(
    options.outFile,
    constantAnnotation(readAnnotationKeys(options.keysFile, logger), options.value),
    logger
  );
}
