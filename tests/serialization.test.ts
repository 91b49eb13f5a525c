import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError, PersistenceFormatError } from '../src/errors.js';
import { formatCsvField, parseCsv, stringifyCsv } from '../src/serialization/csv.js';
import sharp from 'sharp';
import { readImage, writeImage } from '../src/serialization/images.js';
import {
  applySplit,
  defaultPrompts,
  loadDatasetSplit,
  loadImagePrompts,
  loadInpaintingPrompts,
  loadPromptStrings,
  parseSplit,
} from '../src/serialization/prompts.js';
import {
  inferTableFormat,
  readGroundTruthTable,
  readScoreTable,
  readTable,
  writeGroundTruthTable,
  writeScoreTable,
  writeTable,
} from '../src/serialization/tables.js';
import type { GroundTruthRecord, Image, ScoreRecord } from '../src/types.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'serialization-test-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ============ CSV ============

describe('CSV codec', () => {
  it('quotes fields holding separators, quotes or line breaks', () => {
    expect(formatCsvField('plain')).toBe('plain');
    expect(formatCsvField('a,b')).toBe('"a,b"');
    expect(formatCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvField('two\nlines')).toBe('"two\nlines"');
    expect(formatCsvField(0.5)).toBe('0.5');
    expect(formatCsvField(undefined)).toBe('');
  });

  it('writes a header row and terminates every row', () => {
    expect(stringifyCsv(['prompt', 'output'], [{ prompt: 'q', output: 'a,b' }])).toBe(
      'prompt,output\nq,"a,b"\n',
    );
  });

  it('parses quoted fields spanning lines and CRLF terminators', () => {
    const { columns, rows } = parseCsv('prompt,output\r\n"one\ntwo","x ""y"""\r\n\r\n');
    expect(columns).toEqual(['prompt', 'output']);
    expect(rows).toEqual([{ prompt: 'one\ntwo', output: 'x "y"' }]);
  });

  it('keeps empty trailing fields', () => {
    expect(parseCsv('a,b\n1,\n').rows).toEqual([{ a: '1', b: '' }]);
  });

  it('rejects ragged rows and unterminated quotes', () => {
    expect(() => parseCsv('a,b\n1,2,3\n')).toThrow('Row 1 has 3 fields, expected 2 (a, b)');
    expect(() => parseCsv('a\n"open\n')).toThrow('Unterminated quoted field');
  });

  it('returns nothing for empty input', () => {
    expect(parseCsv('')).toEqual({ columns: [], rows: [] });
  });
});

// ============ Tables ============

describe('tables', () => {
  const groundTruth: GroundTruthRecord[] = [
    { prompt: 'Say "hi", then\nleave', output: 'hi, bye' },
    { prompt: 'Count to three', output: '1 2 3' },
  ];

  it.each(['gt.csv', 'gt.json', 'gt.yaml'])('round-trips ground truth through %s', (name) => {
    const path = join(dir, name);
    writeGroundTruthTable(path, groundTruth);
    expect(readGroundTruthTable(path)).toEqual(groundTruth);
  });

  it('writes CSV with prompt and output columns in order', () => {
    const path = join(dir, 'gt.csv');
    writeGroundTruthTable(path, groundTruth);
    expect(readFileSync(path, 'utf-8')).toBe(
      'prompt,output\n"Say ""hi"", then\nleave","hi, bye"\nCount to three,1 2 3\n',
    );
  });

  it('adds image and mask columns only when a record has them', () => {
    const path = join(dir, 'gt.csv');
    writeGroundTruthTable(path, [
      { prompt: 'p', output: 'out.png', image: 'src.png', mask: 'mask.png' },
      { prompt: 'q', output: 'out2.png' },
    ]);
    expect(readFileSync(path, 'utf-8').split('\n')[0]).toBe('prompt,output,image,mask');
    expect(readGroundTruthTable(path)).toEqual([
      { prompt: 'p', output: 'out.png', image: 'src.png', mask: 'mask.png' },
      { prompt: 'q', output: 'out2.png' },
    ]);
  });

  it('rejects a ground truth table without a prompt column', () => {
    const path = join(dir, 'gt.csv');
    writeFileSync(path, 'output\nx\n');
    expect(() => readGroundTruthTable(path)).toThrow(PersistenceFormatError);
    expect(() => readGroundTruthTable(path)).toThrow(
      `Invalid row 1 (missing 'prompt' column): ${path}`,
    );
  });

  it('wraps malformed JSON tables', () => {
    const path = join(dir, 'gt.json');
    writeFileSync(path, '[{"prompt": true}]');
    expect(() => readTable(path)).toThrow(PersistenceFormatError);
    expect(() => readTable(path)).toThrow('Invalid json table');
  });

  it('reads score tables with numeric metric columns', () => {
    const path = join(dir, 'metrics_per_question.csv');
    const records: ScoreRecord[] = [
      { prompt: 'a', source_model: 'x', optimized_model: 'y', similarity: 0.5, bleu: 12 },
      { prompt: 'b', source_model: 'x', optimized_model: 'x', similarity: 1, bleu: 100 },
    ];
    writeScoreTable(path, records);
    const loaded = readScoreTable(path);
    expect(loaded).toEqual(records);
    expect(Object.keys(loaded[0] ?? {})).toEqual([
      'prompt',
      'source_model',
      'optimized_model',
      'similarity',
      'bleu',
    ]);
  });

  it('rejects a blank similarity cell instead of reading it as zero', () => {
    const path = join(dir, 'metrics_per_question.csv');
    writeFileSync(
      path,
      'prompt,source_model,optimized_model,similarity\na,x,y,0.5\nb,x,y,\n',
    );
    expect(() => readScoreTable(path)).toThrow(PersistenceFormatError);
    expect(() => readScoreTable(path)).toThrow(
      `Invalid row 2 (empty 'similarity' cell): ${path}`,
    );
  });

  it('writes rows with the union of their keys as columns', () => {
    const path = join(dir, 'metrics.csv');
    writeTable(path, [{ similarity: 0.9 }, { similarity: 0.8, bleu: 3 }]);
    expect(readFileSync(path, 'utf-8')).toBe('similarity,bleu\n0.9,\n0.8,3\n');
  });

  it('infers the format from the extension', () => {
    expect(inferTableFormat('a.CSV')).toBe('csv');
    expect(inferTableFormat('a.yml')).toBe('yaml');
    expect(inferTableFormat('a.json')).toBe('json');
    expect(() => inferTableFormat('a.txt')).toThrow("Could not infer format for filename 'a.txt'");
  });
});

// ============ Images ============

describe('image files', () => {
  const image: Image = {
    width: 2,
    height: 1,
    channels: 3,
    data: Uint8Array.from([255, 0, 0, 0, 255, 0]),
  };

  it('writes PNG into missing directories and reads it back', async () => {
    const path = join(dir, 'nested', 'img.png');
    await writeImage(path, image);
    const meta = await sharp(path).metadata();
    expect(meta.format).toBe('png');
    expect(await readImage(path)).toEqual(image);
  });

  it('keeps greyscale images single-channel', async () => {
    const data = Uint8Array.from([0, 64, 128, 255]);
    const mask: Image = { width: 2, height: 2, channels: 1, data };
    const path = join(dir, 'mask.png');
    await writeImage(path, mask);
    expect(await readImage(path)).toEqual(mask);
  });

  it('decodes other formats and drops alpha', async () => {
    const path = join(dir, 'rgba.webp');
    await sharp(Buffer.from([10, 20, 30, 255]), { raw: { width: 1, height: 1, channels: 4 } })
      .webp({ lossless: true })
      .toFile(path);
    expect(await readImage(path)).toEqual({
      width: 1,
      height: 1,
      channels: 3,
      data: Uint8Array.from([10, 20, 30]),
    });
  });

  it('rejects data that does not match the dimensions', async () => {
    const path = join(dir, 'x.png');
    await expect(writeImage(path, { ...image, data: new Uint8Array(5) })).rejects.toThrow(
      'Image data has 5 bytes, expected 6 for 2x1x3',
    );
  });

  it('reports unreadable image files as format errors', async () => {
    const path = join(dir, 'bad.png');
    writeFileSync(path, 'not an image');
    await expect(readImage(path)).rejects.toThrow(PersistenceFormatError);
    await expect(readImage(path)).rejects.toThrow(`Invalid image file: ${path}`);
  });
});

// ============ Prompts ============

describe('default prompts', () => {
  it('provides English and Chinese text prompts', () => {
    const en = defaultPrompts('text', 'en');
    expect(en[0]).toBe('Who is Mark Twain?');
    expect(en).toHaveLength(30);
    expect(defaultPrompts('text', 'cn')).toHaveLength(20);
  });

  it('falls back to English for text-to-image', () => {
    expect(defaultPrompts('text-to-image', 'cn')).toEqual(defaultPrompts('text-to-image', 'en'));
    expect(defaultPrompts('text-to-image', 'en')).toHaveLength(12);
  });

  it('returns a fresh copy each call', () => {
    const first = defaultPrompts('text', 'en');
    first.pop();
    expect(defaultPrompts('text', 'en')).toHaveLength(30);
  });
});

describe('splits', () => {
  it('parses names with optional slices', () => {
    expect(parseSplit('validation')).toEqual({ name: 'validation', start: null, end: null });
    expect(parseSplit('train[:32]')).toEqual({ name: 'train', start: null, end: 32 });
    expect(parseSplit('test[10:20]')).toEqual({ name: 'test', start: 10, end: 20 });
    expect(parseSplit('test[-2:]')).toEqual({ name: 'test', start: -2, end: null });
  });

  it('rejects malformed splits', () => {
    expect(() => parseSplit('train[')).toThrow(ConfigurationError);
  });

  it('rejects a sign without digits as a bound', () => {
    expect(() => parseSplit('train[-:3]')).toThrow(
      "Invalid split 'train[-:3]', expected e.g. 'train' or 'train[:32]'",
    );
    expect(() => parseSplit('train[2:-]')).toThrow(ConfigurationError);
    expect(parseSplit('train[0:3]')).toEqual({ name: 'train', start: 0, end: 3 });
  });

  it('slices with negative bounds counting from the end', () => {
    const items = [1, 2, 3, 4, 5];
    expect(applySplit(items, parseSplit('x[-2:]'))).toEqual([4, 5]);
    expect(applySplit(items, parseSplit('x[1:3]'))).toEqual([2, 3]);
    expect(applySplit(items, parseSplit('x'))).toEqual(items);
  });
});

describe('prompt datasets', () => {
  it('loads strings and records from a YAML split', () => {
    const path = join(dir, 'prompts.yaml');
    writeFileSync(
      path,
      ['validation:', '  - plain prompt', '  - text: record prompt', '    lang: en', ''].join('\n'),
    );
    expect(loadPromptStrings(path, { split: 'validation', field: 'text' })).toEqual([
      'plain prompt',
      'record prompt',
    ]);
  });

  it('applies the slice of the split', () => {
    const path = join(dir, 'prompts.json');
    writeFileSync(path, JSON.stringify({ train: ['a', 'b', 'c'] }));
    expect(loadPromptStrings(path, { split: 'train[:2]', field: 'text' })).toEqual(['a', 'b']);
  });

  it('names the available splits when one is missing', () => {
    const path = join(dir, 'prompts.json');
    writeFileSync(path, JSON.stringify({ validation: ['a'] }));
    expect(() => loadDatasetSplit(path, 'train')).toThrow(
      `Split 'train' not found in ${path}. Available splits: validation`,
    );
  });

  it('requires the prompt field on records', () => {
    const path = join(dir, 'prompts.json');
    writeFileSync(path, JSON.stringify({ validation: [{ question: 'a' }] }));
    expect(() => loadPromptStrings(path, { split: 'validation', field: 'text' })).toThrow(
      `Row 1 has no string field 'text': ${path}`,
    );
  });

  it('loads PNG images with paths relative to the dataset file', async () => {
    const image: Image = { width: 1, height: 1, channels: 3, data: Uint8Array.from([1, 2, 3]) };
    const mask: Image = { width: 1, height: 1, channels: 1, data: Uint8Array.from([255]) };
    await sharp(Buffer.from(image.data), { raw: { width: 1, height: 1, channels: 3 } })
      .png()
      .toFile(join(dir, 'cat.png'));
    await writeImage(join(dir, 'images', 'cat-mask.png'), mask);
    const path = join(dir, 'prompts.yaml');
    writeFileSync(
      path,
      [
        'validation:',
        '  - text: a cat',
        '    image: cat.png',
        '    mask: images/cat-mask.png',
        '',
      ].join('\n'),
    );

    const selection = { split: 'validation', field: 'text' };
    expect(await loadImagePrompts(path, selection)).toEqual([{ prompt: 'a cat', image }]);
    expect(await loadInpaintingPrompts(path, selection)).toEqual([
      { prompt: 'a cat', image, mask },
    ]);
  });

  it('names the dataset image that cannot be decoded', async () => {
    writeFileSync(join(dir, 'broken.png'), 'not an image');
    const path = join(dir, 'prompts.json');
    writeFileSync(path, JSON.stringify({ validation: [{ text: 'a', image: 'broken.png' }] }));
    await expect(loadImagePrompts(path, { split: 'validation', field: 'text' })).rejects.toThrow(
      `Invalid image file: ${join(dir, 'broken.png')}`,
    );
  });
});
