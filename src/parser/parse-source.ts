/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as path from 'path';

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { ReportContext, type ReportSummary } from '../common/report';
import { writeAnnotation } from '../storage/annotation-file';
import { writeCorpusText } from '../storage/corpus-text';
import type { MarkupConfig } from './config';
import { PseudoXmlParser } from './pseudo-xml-parser';
import type { ParsedDocument } from './types';

export interface WriteDocumentOptions {
  /** Destination of the anchored corpus text. */
  textFile: string;
  /** Base directory for relative store names; defaults to the working directory. */
  outDir?: string;
  logger?: Logger;
}

export interface ParseSourceOptions extends WriteDocumentOptions {
  /** Pseudo-XML source file. */
  source: string;
  /** Anchor prefix (and seed) for this document. */
  prefix: string;
  config: MarkupConfig;
  encoding?: BufferEncoding;
}

/** Write the corpus text and every store of a parsed document. */
export function writeDocument(doc: ParsedDocument, options: WriteDocumentOptions): void {
  const logger = options.logger ?? new ConsoleLogger();
  const outDir = options.outDir ?? process.cwd();
  writeCorpusText(options.textFile, doc.text, doc.positionToAnchor, logger);
  for (const [name, entries] of doc.stores) {
    writeAnnotation(path.resolve(outDir, name), entries, logger);
  }
}

/** Parse one source file into its corpus text and annotation files. */
export function parseSource(options: ParseSourceOptions): ReportSummary {
  const logger = options.logger ?? new ConsoleLogger();
  const content = fs.readFileSync(options.source, options.encoding ?? 'utf8');
  logger.info(`Parsing ${options.source}`);

  const documentLogger = logger.clone();
  documentLogger.setContext(path.basename(options.source));
  const report = new ReportContext(documentLogger);
  const parser = new PseudoXmlParser(options.config, {
    prefix: options.prefix,
    maxIdentifiers: content.length,
    report,
  });
  writeDocument(parser.parse(content), { ...options, logger });
  return report.summary();
}
