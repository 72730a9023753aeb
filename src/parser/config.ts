/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';

import { ConfigurationError } from '../common/errors';

export const DEFAULT_HEADER_ELEMENT = 'teiheader';

type ListInput = string | readonly string[];

/**
 * Markup configuration as written by users: `elements[i]` (e.g. 'p',
 * 'w:pos', 'head+title') feeds the annotation store `annotations[i]`.
 * Lists may be arrays or whitespace separated strings.
 */
export interface MarkupConfigInput {
  elements: ListInput;
  annotations: ListInput;
  skip?: ListInput;
  overlap?: ListInput;
  header?: string;
  headerStore?: string;
}

export interface MarkupConfig {
  /** elementKey(element, attribute) -> annotation store name. */
  readonly annotations: ReadonlyMap<string, string>;
  /** Store names in configuration order, without duplicates. */
  readonly stores: readonly string[];
  readonly skip: ReadonlySet<string>;
  /** Unordered element pairs, as elementKey(a, b), allowed to overlap. */
  readonly overlap: ReadonlySet<string>;
  readonly header: string;
  readonly headerStore?: string;
}

/** Key for an (element, attribute) pair; the bare element has attribute ''. */
export function elementKey(element: string, attribute = ''): string {
  return `${element} ${attribute}`;
}

export function canOverlap(config: MarkupConfig, a: string, b: string): boolean {
  return config.overlap.has(elementKey(a, b));
}

function toList(input: ListInput | undefined): string[] {
  if (input === undefined) return [];
  const items = typeof input === 'string' ? input.split(/\s+/) : [...input];
  return items.map((s) => s.trim()).filter(Boolean);
}

/** 'w:pos' -> ['w', 'pos'], 'p' -> ['p', '']. Splits on the first colon. */
export function splitElement(item: string): [string, string] {
  const ix = item.indexOf(':');
  const [element, attribute] = ix < 0 ? [item, ''] : [item.slice(0, ix), item.slice(ix + 1)];
  if (!element) throw new ConfigurationError(`Missing element name in '${item}'`);
  return [element.toLowerCase(), attribute.toLowerCase()];
}

export function parseMarkupConfig(input: MarkupConfigInput): MarkupConfig {
  const elements = toList(input.elements);
  const annotationNames = toList(input.annotations);
  if (elements.length !== annotationNames.length) {
    throw new ConfigurationError(
      `elements and annotations must be the same length (${elements.length} != ${annotationNames.length})`
    );
  }

  const annotations = new Map<string, string>();
  elements.forEach((group, i) => {
    for (const item of group.split('+')) {
      const [element, attribute] = splitElement(item);
      annotations.set(elementKey(element, attribute), annotationNames[i]);
    }
  });

  const skip = new Set<string>();
  for (const item of toList(input.skip)) {
    const [element, attribute] = splitElement(item);
    skip.add(elementKey(element, attribute));
  }
  const clash = [...skip].filter((key) => annotations.has(key));
  if (clash.length > 0) {
    const names = clash.map((key) => key.trim().replace(' ', ':'));
    throw new ConfigurationError(`skip and elements must be disjoint: ${names.join(', ')}`);
  }

  const overlap = new Set<string>();
  for (const group of toList(input.overlap)) {
    const names = group.split('+').map((n) => n.toLowerCase());
    for (const a of names) for (const b of names) if (a !== b) overlap.add(elementKey(a, b));
  }

  const header = (input.header ?? DEFAULT_HEADER_ELEMENT).toLowerCase();
  if (!header) throw new ConfigurationError('Header element name must not be empty');

  return Object.freeze({
    annotations,
    stores: [...new Set(annotationNames)],
    skip,
    overlap,
    header,
    headerStore: input.headerStore,
  });
}

function readList(raw: Record<string, unknown>, field: string, file: string): ListInput | undefined {
  const value = raw[field];
  if (value === undefined || typeof value === 'string') return value;
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
  throw new ConfigurationError(`${file}: '${field}' must be a string or a list of strings`, { file });
}

function readString(raw: Record<string, unknown>, field: string, file: string): string | undefined {
  const value = raw[field];
  if (value === undefined || typeof value === 'string') return value;
  throw new ConfigurationError(`${file}: '${field}' must be a string`, { file });
}

/** Load a JSON file with the MarkupConfigInput shape. */
export function loadMarkupConfig(file: string): MarkupConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`${file}: ${err instanceof Error ? err.message : String(err)}`, { file });
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`${file}: expected a JSON object`, { file });
  }
  const record: Record<string, unknown> = { ...raw };
  const elements = readList(record, 'elements', file);
  const annotations = readList(record, 'annotations', file);
  if (elements === undefined || annotations === undefined) {
    throw new ConfigurationError(`${file}: 'elements' and 'annotations' are required`, { file });
  }
  try {
    return parseMarkupConfig({
      elements,
      annotations,
      skip: readList(record, 'skip', file),
      overlap: readList(record, 'overlap', file),
      header: readString(record, 'header', file),
      headerStore: readString(record, 'headerStore', file),
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`${file}: ${err.message}`, { ...err.context, file });
    }
    throw err;
  }
}
