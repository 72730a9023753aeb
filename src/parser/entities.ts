/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Named entities: HTML 4, 'apos', and the Latin-2 additions (entities.json).
*/

import entityTable from './entities.json';

const NAMED_ENTITIES: ReadonlyMap<string, number> = new Map(Object.entries(entityTable));

const MAX_CODE_POINT = 0x10ffff;

export function isControlCode(code: number): boolean {
  return code < 0x20 || (code >= 0x80 && code < 0xa0);
}

/**
 * Resolve the body of a character reference ('#233', '#xE9').
 * Returns undefined for control codes and values outside Unicode.
 */
export function resolveCharRef(ref: string): string | undefined {
  const hex = ref[1] === 'x' || ref[1] === 'X';
  const code = parseInt(ref.slice(hex ? 2 : 1), hex ? 16 : 10);
  if (Number.isNaN(code) || code > MAX_CODE_POINT || isControlCode(code)) return undefined;
  return String.fromCodePoint(code);
}

/** Resolve a named entity; names are case sensitive. */
export function resolveEntity(name: string): string | undefined {
  const code = NAMED_ENTITIES.get(name);
  return code === undefined ? undefined : String.fromCodePoint(code);
}
