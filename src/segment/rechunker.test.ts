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

import { AnchorStore, type AnchorMaps } from '../anchors/anchor-store';
import { edgeSpans, encodeEdge } from '../anchors/edge';
import { ConfigurationError, UnknownAnchorError } from '../common/errors';
import { NullLogger } from '../common/logger';
import { readAnnotationEntries, writeAnnotation, type AnnotationValue } from '../storage/annotation-file';
import { readCorpusText, writeCorpusText } from '../storage/corpus-text';
import { carveExisting, chunkIntervals, rechunk, segmentCorpus } from './rechunker';
import { whitespaceTokenizer } from './tokenizers';

const TEXT = 'Hej du. Bra!';

/** Anchored TEXT with two sentence chunks, [0, 7] and [8, 12]. */
function sentences(): { maps: AnchorMaps; chunks: string[] } {
  const store = new AnchorStore('d');
  const chunks = [
    [0, 7],
    [8, 12],
  ].map(([start, end]) => encodeEdge('s', [[store.anchorAt(start), store.anchorAt(end)]]));
  return { maps: store, chunks };
}

function spansOf(entries: Map<string, AnnotationValue>, anchors: AnchorStore): Array<[number?, number?]> {
  return [...entries.keys()].flatMap((edge) =>
    edgeSpans(edge).map(([start, end]): [number?, number?] => [anchors.positionOf(start), anchors.positionOf(end)])
  );
}

describe('chunkIntervals', () => {
  it('pairs consecutive boundaries', () => {
    expect(chunkIntervals(10, [4, 4, 10])).toEqual([
      [0, 4],
      [4, 10],
    ]);
  });

  it('returns nothing for an empty text', () => {
    expect(chunkIntervals(0, [])).toEqual([]);
  });
});

describe('carveExisting', () => {
  it('keeps the gaps around existing tokens', () => {
    expect(
      carveExisting(
        [[0, 10]],
        [
          [6, 10],
          [2, 4],
        ]
      )
    ).toEqual([
      [0, 2],
      [4, 6],
    ]);
  });

  it('drops what a token crossing a boundary leaves inverted', () => {
    expect(
      carveExisting(
        [
          [0, 5],
          [5, 10],
        ],
        [[3, 7]]
      )
    ).toEqual([
      [0, 3],
      [7, 10],
    ]);
  });
});

describe('rechunk', () => {
  it('segments each chunk and anchors the new boundaries', () => {
    const { maps, chunks } = sentences();
    const anchors = new AnchorStore('d', 'seg', TEXT.length, maps);
    const result = rechunk({ text: TEXT, anchors, chunks, tokenizer: whitespaceTokenizer, element: 'w' });

    expect(result.intervals).toEqual([
      [0, 7],
      [7, 8],
      [8, 12],
    ]);
    expect(spansOf(result.entries, anchors)).toEqual([
      [0, 3],
      [4, 7],
      [8, 12],
    ]);
    expect([...result.entries.values()]).toEqual([undefined, undefined, undefined]);
    expect(result.createdAnchors).toBe(2);
    expect(maps.positionToAnchor.size).toBe(4);
  });

  it('keeps an existing segmentation and segments around it', () => {
    const { maps, chunks } = sentences();
    const setup = new AnchorStore('d', 'setup', TEXT.length, maps);
    const du = encodeEdge('w', [[setup.anchorAt(4), setup.anchorAt(6)]]);

    const anchors = new AnchorStore('d', 'seg', TEXT.length, setup);
    const result = rechunk({
      text: TEXT,
      anchors,
      chunks,
      existing: [[du, 'x']],
      tokenizer: whitespaceTokenizer,
      element: 'w',
    });

    expect(result.intervals).toEqual([
      [0, 4],
      [6, 7],
      [7, 8],
      [8, 12],
    ]);
    expect(spansOf(result.entries, anchors)).toEqual([
      [4, 6],
      [0, 3],
      [6, 7],
      [8, 12],
    ]);
    expect(result.entries.get(du)).toBe('x');
    expect(result.createdAnchors).toBe(1);
  });

  it('gives the same result for the same input', () => {
    const { maps, chunks } = sentences();
    const run = (from: AnchorMaps) => {
      const anchors = new AnchorStore('d', 'seg', TEXT.length, from);
      return { anchors, result: rechunk({ text: TEXT, anchors, chunks, tokenizer: whitespaceTokenizer, element: 'w' }) };
    };

    const first = run(maps);
    const second = run(maps);
    expect([...second.result.entries]).toEqual([...first.result.entries]);

    const again = run(first.anchors);
    expect(again.result.createdAnchors).toBe(0);
    expect([...again.result.entries]).toEqual([...first.result.entries]);
  });

  it('gives the same result for the same existing segmentation', () => {
    const { maps, chunks } = sentences();
    const setup = new AnchorStore('d', 'setup', TEXT.length, maps);
    const existing: Array<[string, string]> = [[encodeEdge('w', [[setup.anchorAt(4), setup.anchorAt(6)]]), 'x']];
    const run = (from: AnchorMaps) => {
      const anchors = new AnchorStore('d', 'seg', TEXT.length, from);
      return {
        anchors,
        result: rechunk({ text: TEXT, anchors, chunks, existing, tokenizer: whitespaceTokenizer, element: 'w' }),
      };
    };

    const first = run(setup);
    const second = run(setup);
    expect([...second.result.entries]).toEqual([...first.result.entries]);
    expect(second.result.createdAnchors).toBe(1);

    const again = run(first.anchors);
    expect(again.result.createdAnchors).toBe(0);
    expect([...again.result.entries]).toEqual([...first.result.entries]);
    expect(again.result.intervals).toEqual(first.result.intervals);
  });

  it('fails on a chunk anchor the text does not define', () => {
    const { maps } = sentences();
    const anchors = new AnchorStore('d', 'seg', TEXT.length, maps);
    const start = anchors.anchorAt(0);
    const edge = `s:${start}-nowhere`;
    try {
      rechunk({ text: TEXT, anchors, chunks: [edge], tokenizer: whitespaceTokenizer, element: 'w' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownAnchorError);
      if (err instanceof UnknownAnchorError) expect(err.context).toEqual({ anchor: 'nowhere', edge });
    }
  });
});

describe('segmentCorpus', () => {
  it('writes the segmentation and adds the new anchors to the text', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'segment-'));
    try {
      const { maps, chunks } = sentences();
      const textFile = path.join(dir, 'text');
      const chunkFile = path.join(dir, 'sentence');
      const outFile = path.join(dir, 'token');
      writeCorpusText(textFile, TEXT, maps.positionToAnchor, new NullLogger());
      writeAnnotation(
        chunkFile,
        chunks.map((edge) => [edge, ''] as const),
        new NullLogger()
      );
      const options = { textFile, chunkFile, outFile, element: 'w', segmenter: 'whitespace', logger: new NullLogger() };

      const first = segmentCorpus(options);
      expect(first.createdAnchors).toBe(2);
      const corpus = readCorpusText(textFile, new NullLogger());
      expect(corpus.text).toBe(TEXT);
      expect([...corpus.positionToAnchor.keys()].sort((a, b) => a - b)).toEqual([0, 3, 4, 7, 8, 12]);
      const written = readAnnotationEntries(outFile, new NullLogger());
      expect(written.map(([edge]) => edge)).toEqual([...first.entries.keys()]);
      expect(written.map(([, value]) => value)).toEqual(['', '', '']);

      const encoded = fs.readFileSync(textFile, 'utf8');
      const second = segmentCorpus(options);
      expect(second.createdAnchors).toBe(0);
      expect(fs.readFileSync(textFile, 'utf8')).toBe(encoded);
      expect([...second.entries.keys()]).toEqual([...first.entries.keys()]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('rejects an unknown segmenter before reading anything', () => {
    expect(() =>
      segmentCorpus({
        textFile: 'missing',
        chunkFile: 'missing',
        outFile: 'missing',
        element: 'w',
        segmenter: 'nope',
        logger: new NullLogger(),
      })
    ).toThrow(ConfigurationError);
  });
});
