/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './parser';

export { AnchorStore, HexStream, anchorLength, DEFAULT_ANCHOR_LENGTH } from './anchors/anchor-store';
export type { AnchorMaps, IdentifierSet } from './anchors/anchor-store';
export { encodeEdge, edgeName, edgeSpans, edgeStart, edgeEnd, EDGE_SEPARATOR, SPAN_SEPARATOR } from './anchors/edge';
export type { Span } from './anchors/edge';

export {
  ANNOTATION_DELIMITER,
  escapeValue,
  unescapeValue,
  formatAnnotation,
  parseAnnotation,
  writeAnnotation,
  readAnnotation,
  readAnnotationEntries,
  readAnnotationKeys,
  annotationExists,
} from './storage/annotation-file';
export type { AnnotationEntry, AnnotationValue } from './storage/annotation-file';
export { ANCHOR_DELIMITER, encodeCorpusText, decodeCorpusText, writeCorpusText, readCorpusText } from './storage/corpus-text';
export type { CorpusText } from './storage/corpus-text';

export { rechunk, chunkIntervals, carveExisting, segmentCorpus } from './segment/rechunker';
export type { RechunkInput, RechunkResult, SegmentCorpusOptions } from './segment/rechunker';
export {
  SEGMENTERS,
  getSegmenter,
  gapTokenizer,
  matchTokenizer,
  whitespaceTokenizer,
  linebreakTokenizer,
  blanklineTokenizer,
  punctuationTokenizer,
  wordTokenizer,
} from './segment/tokenizers';
export type { SpanTokenizer, TextSpan } from './segment/tokenizers';

export {
  textSpans,
  spanAsValue,
  constantAnnotation,
  writeTextSpans,
  writeSpanAsValue,
  writeConstant,
} from './annotate/span-annotators';
export type { SpanAnnotationOptions } from './annotate/span-annotators';

export { ConsoleLogger } from './common/console-logger';
export { NullLogger, LOG_LEVEL_PRIORITY } from './common/logger';
export type { Logger, LogLevel } from './common/logger';
export { ReportContext } from './common/report';
export type { ReportCode, ReportEvent, ReportKind, ReportSummary, SourceLocation } from './common/report';
export {
  CorpusError,
  ConfigurationError,
  CorruptAnnotationError,
  MismatchedAnchorDelimitersError,
  UnknownAnchorError,
} from './common/errors';
export type { ErrorContext, CorpusErrorJSON } from './common/errors';
