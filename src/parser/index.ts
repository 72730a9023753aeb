/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { PseudoXmlParser, TEXT_TOKEN } from './pseudo-xml-parser';
export { parseMarkupConfig, loadMarkupConfig, elementKey, canOverlap, DEFAULT_HEADER_ELEMENT } from './config';
export { lexMarkup } from './lexer';
export { parseStartTag } from './attributes';
export { resolveCharRef, resolveEntity, isControlCode } from './entities';
export { extractHeaderMetadata } from './header-metadata';
export { parseSource, writeDocument } from './parse-source';
export type { MarkupConfig, MarkupConfigInput } from './config';
export type { MarkupToken, LexResult, TokenLocation } from './lexer';
export type { OpenElement, ParserOptions, ParsedDocument } from './types';
export type { ParseSourceOptions, WriteDocumentOptions } from './parse-source';
