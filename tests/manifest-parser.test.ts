import { describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadManifestFile, parseManifest, toAnnotation } from '../src/dataset/manifest-parser';
import { FatalIOError, ParseError } from '../src/types/evaluation-errors';

const SQUARE = [[0, 0], [10, 0], [10, 5], [0, 5]];

function line(imagePath: string, annotations: unknown): string {
  return `${imagePath}\t${JSON.stringify(annotations)}`;
}

describe('toAnnotation', () => {
  it('accepts a transcription with points and a difficult flag', () => {
    expect(toAnnotation({ transcription: 'PLA196.12', points: SQUARE, difficult: true })).toEqual({
      transcription: 'PLA196.12',
      points: [[0, 0], [10, 0], [10, 5], [0, 5]],
      difficult: true,
    });
  });

  it('defaults difficult to false', () => {
    expect(toAnnotation({ transcription: 'A' })).toEqual({ transcription: 'A', difficult: false });
  });

  it('rejects malformed annotations', () => {
    expect(toAnnotation(null)).toBeNull();
    expect(toAnnotation({ transcription: 7 })).toBeNull();
    expect(toAnnotation({ transcription: 'A', points: [[0, 0]] })).toBeNull();
    expect(toAnnotation({ transcription: 'A', points: [[0, 0], [1, 1], [2, 2], [3, 'x']] })).toBeNull();
    expect(toAnnotation({ transcription: 'A', difficult: 'yes' })).toBeNull();
  });
});

describe('parseManifest', () => {
  it('parses one record per line with the first annotation by default', () => {
    const text = [
      line('img1.jpg', [{ transcription: 'ABC123', points: SQUARE }, { transcription: 'other' }]),
      line('img2.jpg', [{ transcription: 'XY9', difficult: false }]),
    ].join('\n');

    const result = parseManifest(text);

    expect(result.skippedLines).toBe(0);
    expect(result.records).toEqual([
      { imagePath: 'img1.jpg', transcription: 'ABC123', points: SQUARE, difficult: false, lineNumber: 1 },
      { imagePath: 'img2.jpg', transcription: 'XY9', difficult: false, lineNumber: 2 },
    ]);
  });

  it('keeps every well-formed annotation under the "all" policy', () => {
    const text = line('img1.jpg', [{ transcription: 'A' }, { bogus: true }, { transcription: 'B' }]);

    const result = parseManifest(text, { annotationPolicy: 'all' });

    expect(result.records.map((record) => [record.imagePath, record.transcription])).toEqual([
      ['img1.jpg', 'A'],
      ['img1.jpg', 'B'],
    ]);
  });

  it('skips malformed lines with their line numbers and keeps going', () => {
    const text = [
      'no-tab-here',
      'img1.jpg\t{not json',
      line('img2.jpg', { transcription: 'A' }),
      line('img3.jpg', [{ transcription: 3 }]),
      '',
      line('img4.jpg', [{ transcription: 'OK' }]),
      '\t[]',
    ].join('\n');

    const result = parseManifest(text);

    expect(result.records.map((record) => record.imagePath)).toEqual(['img4.jpg']);
    expect(result.skippedLines).toBe(5);
    expect(result.errors.map((error) => error.lineNumber)).toEqual([1, 2, 3, 4, 7]);
    expect(result.errors.every((error) => error instanceof ParseError)).toBe(true);
    expect(result.errors[2].message).toBe('Line 3: annotations must be a JSON array');
    expect(result.errors[3].message).toBe('Line 4: no well-formed annotation');
  });

  it('ignores blank lines, a byte order mark and CRLF endings', () => {
    const text = `\uFEFF${line('a.jpg', [{ transcription: 'A' }])}\r\n\r\n   \r\n${line('b.jpg', [{ transcription: 'B' }])}\r\n`;

    const result = parseManifest(text);

    expect(result.skippedLines).toBe(0);
    expect(result.records.map((record) => [record.imagePath, record.lineNumber])).toEqual([
      ['a.jpg', 1],
      ['b.jpg', 4],
    ]);
  });

  it('drops difficult annotations before the policy when asked to', () => {
    const text = [
      line('a.jpg', [{ transcription: 'hard', difficult: true }, { transcription: 'easy' }]),
      line('b.jpg', [{ transcription: 'only-hard', difficult: true }]),
    ].join('\n');

    const result = parseManifest(text, { skipDifficult: true });

    expect(result.records.map((record) => record.transcription)).toEqual(['easy']);
    expect(result.skippedLines).toBe(0);
  });

  it('maps image paths and tags the directory', () => {
    const result = parseManifest(line('lot/a.jpg', [{ transcription: 'A' }]), {
      directory: 'batch-1',
      mapImagePath: (imagePath) => `batch-1/${imagePath.split('/').pop() ?? imagePath}`,
    });

    expect(result.records[0]).toMatchObject({ imagePath: 'batch-1/a.jpg', directory: 'batch-1' });
  });
});

describe('loadManifestFile', () => {
  it('reads a UTF-8 manifest from disk', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'manifest-'));
    try {
      const manifestPath = path.join(dir, 'Label.txt');
      await writeFile(manifestPath, line('a.jpg', [{ transcription: 'Ünïcode' }]), 'utf8');

      const result = await loadManifestFile(manifestPath);

      expect(result.records[0].transcription).toBe('Ünïcode');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('raises a fatal error for an unreadable file', async () => {
    const missing = path.join(os.tmpdir(), 'does-not-exist', 'Label.txt');
    await expect(loadManifestFile(missing)).rejects.toBeInstanceOf(FatalIOError);
  });
});
