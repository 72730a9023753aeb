/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Anchored corpus text: the plain text with '#anchor#' markers at anchored
  positions and every literal '#' doubled.
*/

import * as fs from 'fs';
import * as path from 'path';

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { MismatchedAnchorDelimitersError } from '../common/errors';
import type { AnchorMaps } from '../anchors/anchor-store';

export const ANCHOR_DELIMITER = '#';

export interface CorpusText extends AnchorMaps {
  text: string;
}

function escapeText(text: string): string {
  return text.split(ANCHOR_DELIMITER).join(ANCHOR_DELIMITER + ANCHOR_DELIMITER);
}

export function encodeCorpusText(text: string, positionToAnchor: ReadonlyMap<number, string>): string {
  const sorted = [...positionToAnchor.entries()].sort((a, b) => a[0] - b[0]);
  const out: string[] = [];
  let pos = 0;
  for (const [next, anchor] of sorted) {
    out.push(escapeText(text.slice(pos, next)), ANCHOR_DELIMITER, anchor, ANCHOR_DELIMITER);
    pos = next;
  }
  out.push(escapeText(text.slice(pos)));
  return out.join('');
}

/**
 * Inverse of encodeCorpusText.
 * @param source file name used in error messages
 */
export function decodeCorpusText(raw: string, source?: string): CorpusText {
  const buffer: string[] = [];
  const positionToAnchor = new Map<number, string>();
  const anchorToPosition = new Map<string, number>();
  let position = 0;
  let end = -1;
  for (;;) {
    const start = raw.indexOf(ANCHOR_DELIMITER, end + 1);
    if (start < 0) {
      buffer.push(raw.slice(end + 1));
      break;
    }
    buffer.push(raw.slice(end + 1, start));
    position += start - end - 1;
    end = raw.indexOf(ANCHOR_DELIMITER, start + 1);
    if (end < 0) throw new MismatchedAnchorDelimitersError(start, source);
    if (end === start + 1) {
      buffer.push(ANCHOR_DELIMITER);
      position += 1;
    } else {
      const anchor = raw.slice(start + 1, end);
      anchorToPosition.set(anchor, position);
      positionToAnchor.set(position, anchor);
    }
  }
  return { text: buffer.join(''), positionToAnchor, anchorToPosition };
}

export function writeCorpusText(
  file: string,
  text: string,
  positionToAnchor: ReadonlyMap<number, string>,
  logger: Logger = new ConsoleLogger()
): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, encodeCorpusText(text, positionToAnchor), 'utf8');
  logger.info(`Wrote ${text.length} chars, ${positionToAnchor.size} anchors: ${file}`);
}

export function readCorpusText(file: string, logger: Logger = new ConsoleLogger()): CorpusText {
  const corpus = decodeCorpusText(fs.readFileSync(file, 'utf8'), file);
  logger.info(`Read ${corpus.text.length} chars, ${corpus.anchorToPosition.size} anchors: ${file}`);
  return corpus;
}
