/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { NullLogger } from '../common/logger';
import { MismatchedAnchorDelimitersError } from '../common/errors';
import { encodeCorpusText, decodeCorpusText, writeCorpusText, readCorpusText } from './corpus-text';

function invert(map: Map<number, string>): Map<string, number> {
  return new Map([...map].map(([p, a]) => [a, p]));
}

describe('encodeCorpusText', () => {
  it('inserts markers in position order', () => {
    const m = new Map([
      [5, 'b'],
      [0, 'a'],
      [11, 'c'],
    ]);
    expect(encodeCorpusText('Hello world', m)).toBe('#a#Hello#b# world#c#');
  });

  it('doubles literal delimiters', () => {
    expect(encodeCorpusText('C# and #x', new Map([[2, 'k']]))).toBe('C###k# and ##x');
  });
});

describe('decodeCorpusText', () => {
  it('reverses encoding', () => {
    const cases: Array<[string, Map<number, string>]> = [
      ['Hello world', new Map([[0, 'a'], [5, 'b'], [11, 'c']])],
      ['#', new Map([[0, 'x'], [1, 'y']])],
      ['##a#', new Map([[1, 'p'], [2, 'q']])],
      ['', new Map([[0, 'only']])],
      ['no anchors # here', new Map()],
    ];
    for (const [text, m] of cases) {
      const decoded = decodeCorpusText(encodeCorpusText(text, m));
      expect(decoded.text).toBe(text);
      expect(decoded.positionToAnchor).toEqual(m);
      expect(decoded.anchorToPosition).toEqual(invert(m));
    }
  });

  it('fails on an unterminated marker', () => {
    expect(() => decodeCorpusText('abc#a1#de#f')).toThrow(MismatchedAnchorDelimitersError);
  });

  it('reports the offset of the open delimiter', () => {
    try {
      decodeCorpusText('ab#x', 'c.txt');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MismatchedAnchorDelimitersError);
      if (err instanceof MismatchedAnchorDelimitersError) {
        expect(err.context).toEqual({ file: 'c.txt', offset: 2 });
      }
    }
  });
});

describe('corpus text files', () => {
  it('writes and reads back', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'corpus-'));
    try {
      const file = path.join(dir, 'out', 'text');
      const m = new Map([[0, 'd01'], [3, 'd02'], [4, 'd03']]);
      writeCorpusText(file, 'ab#c', m, new NullLogger());
      expect(fs.readFileSync(file, 'utf8')).toBe('#d01#ab###d02#c#d03#');
      const corpus = readCorpusText(file, new NullLogger());
      expect(corpus.text).toBe('ab#c');
      expect(corpus.positionToAnchor).toEqual(m);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
