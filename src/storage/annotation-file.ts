/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Annotation files: one 'key value' record per line, split on the first
  space. Backslash and newline in values are escaped so every record stays
  on one line.
*/

import * as fs from 'fs';
import * as path from 'path';

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { CorruptAnnotationError } from '../common/errors';

export const ANNOTATION_DELIMITER = ' ';

export type AnnotationValue = string | null | undefined;
export type AnnotationEntry = readonly [key: string, value: AnnotationValue];

export function escapeValue(value: AnnotationValue): string {
  if (value === null || value === undefined) return '';
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

export function unescapeValue(value: string): string {
  return value.replace(/\\([\\nr])/g, (_m, ch: string) => (ch === 'n' ? '\n' : ch === 'r' ? '\r' : '\\'));
}

export function formatAnnotation(entries: Iterable<AnnotationEntry>): { content: string; count: number } {
  let content = '';
  let count = 0;
  for (const [key, value] of entries) {
    content += key + ANNOTATION_DELIMITER + escapeValue(value) + '\n';
    count++;
  }
  return { content, count };
}

/**
 * Parse annotation file content into ordered entries.
 * @param source file name used in error messages
 */
export function parseAnnotation(content: string, source = '<annotation>'): Array<[string, string]> {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.map((raw, i) => {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    const ix = line.indexOf(ANNOTATION_DELIMITER);
    if (ix < 0) throw new CorruptAnnotationError(source, i + 1, line);
    return [line.slice(0, ix), unescapeValue(line.slice(ix + 1))];
  });
}

/** Write (overwrite) an annotation file. Returns the number of records. */
export function writeAnnotation(
  file: string,
  entries: Iterable<AnnotationEntry>,
  logger: Logger = new ConsoleLogger()
): number {
  const { content, count } = formatAnnotation(entries);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf8');
  logger.info(`Wrote ${count} items: ${file}`);
  return count;
}

export function readAnnotationEntries(file: string, logger: Logger = new ConsoleLogger()): Array<[string, string]> {
  const entries = parseAnnotation(fs.readFileSync(file, 'utf8'), file);
  logger.info(`Read ${entries.length} items: ${file}`);
  return entries;
}

/** Read an annotation file into a map; a repeated key keeps its last value. */
export function readAnnotation(file: string, logger?: Logger): Map<string, string> {
  return new Map(readAnnotationEntries(file, logger));
}

export function readAnnotationKeys(file: string, logger?: Logger): string[] {
  return readAnnotationEntries(file, logger).map(([key]) => key);
}

export function annotationExists(file: string): boolean {
  return fs.existsSync(file);
}
