/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Segmentation of anchored text: chunk edges (e.g. sentences) cut the text
  into intervals, an existing finer segmentation is carved out of them, and
  what is left is split by a span tokenizer into new edges.
*/

import { AnchorStore } from '../anchors/anchor-store';
import { edgeSpans, encodeEdge } from '../anchors/edge';
import { UnknownAnchorError } from '../common/errors';
import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import {
  readAnnotationEntries,
  readAnnotationKeys,
  writeAnnotation,
  type AnnotationEntry,
  type AnnotationValue,
} from '../storage/annotation-file';
import { readCorpusText, writeCorpusText } from '../storage/corpus-text';
import { getSegmenter, type SpanTokenizer, type TextSpan } from './tokenizers';

export interface RechunkInput {
  /** Text without anchor markers. */
  text: string;
  /** Anchors of `text`; new anchors are added here. */
  anchors: AnchorStore;
  /** Chunk edges; only their anchors matter. */
  chunks: Iterable<string>;
  /** Pre-existing segmentation, kept as-is in the result. */
  existing?: Iterable<AnnotationEntry>;
  tokenizer: SpanTokenizer;
  /** Name of the new edges. */
  element: string;
}

export interface RechunkResult {
  /** Existing entries first, then the new edges with no value. */
  entries: Map<string, AnnotationValue>;
  /** Intervals handed to the tokenizer. */
  intervals: TextSpan[];
  createdAnchors: number;
}

function compareSpans(a: TextSpan, b: TextSpan): number {
  return a[0] - b[0] || a[1] - b[1];
}

/** Intervals between consecutive boundaries, including 0 and `textLength`. */
export function chunkIntervals(textLength: number, boundaries: Iterable<number>): TextSpan[] {
  const positions = [...new Set([0, textLength, ...boundaries])].sort((a, b) => a - b);
  const intervals: TextSpan[] = [];
  for (let i = 1; i < positions.length; i++) intervals.push([positions[i - 1], positions[i]]);
  return intervals;
}

/**
 * Remove the `tokens` spans from the intervals: the stretch before each
 * token becomes an interval of its own and the interval resumes after it.
 * Empty and inverted intervals are dropped; the result is sorted.
 */
export function carveExisting(intervals: readonly TextSpan[], tokens: readonly TextSpan[]): TextSpan[] {
  const sortedTokens = [...tokens].sort(compareSpans);
  const carved: TextSpan[] = [];
  for (const [start, end] of intervals) {
    let chunkStart = start;
    for (const [tokenStart, tokenEnd] of sortedTokens) {
      if (tokenEnd <= chunkStart) continue;
      if (tokenStart >= end) break;
      if (chunkStart !== tokenStart) carved.push([chunkStart, tokenStart]);
      chunkStart = tokenEnd;
    }
    carved.push([chunkStart, end]);
  }
  return carved.filter(([start, end]) => start < end).sort(compareSpans);
}

function spanPositions(anchors: AnchorStore, edge: string): TextSpan[] {
  return edgeSpans(edge).map(([start, end]) => {
    const from = anchors.positionOf(start);
    if (from === undefined) throw new UnknownAnchorError(start, edge);
    const to = anchors.positionOf(end);
    if (to === undefined) throw new UnknownAnchorError(end, edge);
    return [from, to];
  });
}

export function rechunk(input: RechunkInput): RechunkResult {
  const { text, anchors, tokenizer, element } = input;
  const before = anchors.size;

  const boundaries: number[] = [];
  for (const edge of input.chunks) {
    for (const [start, end] of spanPositions(anchors, edge)) boundaries.push(start, end);
  }
  let intervals = chunkIntervals(text.length, boundaries);

  const entries = new Map<string, AnnotationValue>();
  if (input.existing) {
    const tokens: TextSpan[] = [];
    for (const [edge, value] of input.existing) {
      tokens.push(...spanPositions(anchors, edge));
      entries.set(edge, value);
    }
    intervals = carveExisting(intervals, tokens);
  }

  for (const [offset, end] of intervals) {
    for (const [spanStart, spanEnd] of tokenizer(text.slice(offset, end))) {
      const start = offset + spanStart;
      const stop = offset + spanEnd;
      if (text.slice(start, stop).trim() === '') continue;
      const edge = encodeEdge(element, [[anchors.anchorAt(start), anchors.anchorAt(stop)]]);
      if (!entries.has(edge)) entries.set(edge, undefined);
    }
  }

  return { entries, intervals, createdAnchors: anchors.size - before };
}

export interface SegmentCorpusOptions {
  /** Anchored corpus text; rewritten when new anchors are needed. */
  textFile: string;
  /** Annotation file whose edges delimit the chunks. */
  chunkFile: string;
  outFile: string;
  element: string;
  /** Name of a registered segmenter, see SEGMENTERS. */
  segmenter: string;
  /** Existing segmentation to keep and segment around. */
  existingFile?: string;
  /** Prefix of new anchors. */
  prefix?: string;
  /** Seed of new anchors; defaults to the text file and element. */
  seed?: string;
  logger?: Logger;
}

/** Segment the chunks of one corpus text and write the new annotation. */
export function segmentCorpus(options: SegmentCorpusOptions): RechunkResult {
  const logger = options.logger ?? new ConsoleLogger();
  const tokenizer = getSegmenter(options.segmenter);
  const corpus = readCorpusText(options.textFile, logger);
  const anchors = new AnchorStore(
    options.prefix ?? '',
    options.seed ?? `${options.textFile} ${options.element}`,
    corpus.text.length,
    corpus
  );

  const result = rechunk({
    text: corpus.text,
    anchors,
    chunks: readAnnotationKeys(options.chunkFile, logger),
    existing: options.existingFile ? readAnnotationEntries(options.existingFile, logger) : undefined,
    tokenizer,
    element: options.element,
  });
  if (options.existingFile) logger.info(`Reorganized into ${result.intervals.length} chunks`);

  writeAnnotation(options.outFile, result.entries, logger);
  if (result.createdAnchors > 0) {
    logger.debug(`Created ${result.createdAnchors} anchors`);
    writeCorpusText(options.textFile, corpus.text, anchors.positionToAnchor, logger);
  }
  return result;
}
