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

import { UnknownAnchorError } from '../common/errors';
import { NullLogger } from '../common/logger';
import { writeAnnotation } from '../storage/annotation-file';
import { decodeCorpusText, writeCorpusText } from '../storage/corpus-text';
import { constantAnnotation, spanAsValue, textSpans, writeTextSpans } from './span-annotators';

const corpus = decodeCorpusText('#a0#Hej#a3# #a4#du#a6#');

describe('textSpans', () => {
  it('takes the text between the start and end anchors', () => {
    expect(textSpans(corpus, ['w:a0-a3', 'w:a4-a6', 'link:a0-a3:a4-a6'])).toEqual([
      ['w:a0-a3', 'Hej'],
      ['w:a4-a6', 'du'],
      ['link:a0-a3:a4-a6', 'Hej du'],
    ]);
  });

  it('fails on an anchor missing from the text', () => {
    expect(() => textSpans(corpus, ['w:a0-zz'])).toThrow(UnknownAnchorError);
  });
});

describe('spanAsValue', () => {
  it('uses the outer anchors as the value', () => {
    expect(spanAsValue(['w:a0-a3', 'link:a0-a3:a4-a6'])).toEqual([
      ['w:a0-a3', 'a0-a3'],
      ['link:a0-a3:a4-a6', 'a0-a6'],
    ]);
  });
});

describe('constantAnnotation', () => {
  it('gives every key the same value', () => {
    expect(constantAnnotation(['x', 'y'], 'sv')).toEqual([
      ['x', 'sv'],
      ['y', 'sv'],
    ]);
  });
});

describe('writeTextSpans', () => {
  it('reads the keys and the text and writes the spans', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'annotate-'));
    try {
      const textFile = path.join(dir, 'text');
      const keysFile = path.join(dir, 'token');
      const outFile = path.join(dir, 'token.word');
      writeCorpusText(textFile, corpus.text, corpus.positionToAnchor, new NullLogger());
      writeAnnotation(keysFile, [['w:a4-a6', 'ignored']], new NullLogger());

      expect(writeTextSpans({ textFile, keysFile, outFile, logger: new NullLogger() })).toBe(1);
      expect(fs.readFileSync(outFile, 'utf8')).toBe('w:a4-a6 du\n');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
