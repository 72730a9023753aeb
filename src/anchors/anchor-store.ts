/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { createHash } from 'crypto';
import { ANCHOR_DELIMITER } from '../storage/corpus-text';
import { EDGE_SEPARATOR, SPAN_SEPARATOR } from './edge';

export const DEFAULT_ANCHOR_LENGTH = 10;

/**
 * Number of hex digits needed so that `maxIdentifiers` random identifiers
 * rarely collide: grows with log16 of the count.
 */
export function anchorLength(maxIdentifiers?: number): number {
  if (!maxIdentifiers || maxIdentifiers < 1) return DEFAULT_ANCHOR_LENGTH;
  return Math.floor(Math.log(maxIdentifiers) / Math.log(16) + 1.5);
}

/**
 * Deterministic stream of hex digits: SHA-256 in counter mode over the seed.
 * Same seed, same stream; nothing is shared between instances.
 */
export class HexStream {
  private buffer = '';
  private counter = 0;

  constructor(private readonly seed: string) {}

  take(digits: number): string {
    while (this.buffer.length < digits) {
      this.buffer += createHash('sha256').update(`${this.seed}\u0000${this.counter++}`).digest('hex');
    }
    const out = this.buffer.slice(0, digits);
    this.buffer = this.buffer.slice(digits);
    return out;
  }
}

export interface AnchorMaps {
  positionToAnchor: Map<number, string>;
  anchorToPosition: Map<string, number>;
}

/** Anything that can tell whether an identifier is taken. */
export interface IdentifierSet {
  has(identifier: string): boolean;
}

/**
 * Binds text positions to anchors for one document. Anchors are created on
 * first reference and never change afterwards.
 */
export class AnchorStore implements AnchorMaps {
  readonly positionToAnchor: Map<number, string>;
  readonly anchorToPosition: Map<string, number>;
  private readonly prefix: string;
  private random: HexStream;
  private length: number;

  /**
   * @param prefix prepended to every anchor, usually the document id
   * @param seed seeds the identifier stream; defaults to the prefix
   * @param existing maps read back from a corpus text, reused as-is
   */
  constructor(prefix: string, seed: string = prefix, maxIdentifiers?: number, existing?: AnchorMaps) {
    this.prefix = prefix;
    this.positionToAnchor = existing ? new Map(existing.positionToAnchor) : new Map();
    this.anchorToPosition = existing ? new Map(existing.anchorToPosition) : new Map();
    this.random = new HexStream(seed);
    this.length = anchorLength(maxIdentifiers);
  }

  get identifierLength(): number {
    return this.length;
  }

  get size(): number {
    return this.positionToAnchor.size;
  }

  reset(seed: string, maxIdentifiers?: number): void {
    this.random = new HexStream(seed);
    if (maxIdentifiers) this.length = anchorLength(maxIdentifiers);
  }

  /**
   * Draw identifiers until one is not in `existing`. Not recorded anywhere.
   * Edge separators and the corpus text delimiter are removed from `prefix`.
   */
  newIdentifier(prefix: string, existing: IdentifierSet): string {
    let cleanPrefix = prefix;
    for (const reserved of [EDGE_SEPARATOR, SPAN_SEPARATOR, ANCHOR_DELIMITER]) {
      cleanPrefix = cleanPrefix.split(reserved).join('');
    }
    for (;;) {
      const identifier = cleanPrefix + this.random.take(this.length);
      if (!existing.has(identifier)) return identifier;
    }
  }

  anchorAt(position: number): string {
    const known = this.positionToAnchor.get(position);
    if (known !== undefined) return known;
    const anchor = this.newIdentifier(this.prefix, this.anchorToPosition);
    this.positionToAnchor.set(position, anchor);
    this.anchorToPosition.set(anchor, position);
    return anchor;
  }

  has(position: number): boolean {
    return this.positionToAnchor.has(position);
  }

  positionOf(anchor: string): number | undefined {
    return this.anchorToPosition.get(anchor);
  }
}
