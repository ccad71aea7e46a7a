import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadCategories, loadDefaultCategories, parseCategoryCatalog } from './catalog.js';
import { DEFAULT_CATEGORY_IDS } from './types.js';
import { SAMPLE_QUESTIONS } from './samples.js';
import { ConfigError } from '../errors/index.js';

describe('loadDefaultCategories', () => {
  it('should load the nine built-in categories in canonical order', async () => {
    const categories = await loadDefaultCategories();

    expect(categories).toHaveLength(9);
    expect(categories.map(c => c.id)).toEqual([...DEFAULT_CATEGORY_IDS]);
  });

  it('should keep display names and examples', async () => {
    const categories = await loadDefaultCategories();
    const stok = categories.find(c => c.id === 'stok');
    const iade = categories.find(c => c.id === 'iade_degisim');

    expect(stok?.displayName).toBe('stok');
    expect(stok?.examples[0]).toBe('Bu ürün stokta var mı?');
    expect(iade?.displayName).toBe('İade ve değişim');
    expect(categories.every(c => c.examples.length > 0)).toBe(true);
  });

  it('should return frozen definitions', async () => {
    const [first] = await loadDefaultCategories();

    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first?.examples)).toBe(true);
  });
});

describe('SAMPLE_QUESTIONS', () => {
  it('should have one question per default category', () => {
    expect(Object.keys(SAMPLE_QUESTIONS)).toEqual([...DEFAULT_CATEGORY_IDS]);
  });
});

describe('parseCategoryCatalog', () => {
  it('should trim ids, names and examples', () => {
    const categories = parseCategoryCatalog({
      categories: [{ id: ' stok ', displayName: 'Stok ', examples: [' Kaç tane kaldı? '] }],
    });

    expect(categories).toEqual([{ id: 'stok', displayName: 'Stok', examples: ['Kaç tane kaldı?'] }]);
  });

  it('should reject a category without examples', () => {
    expect(() =>
      parseCategoryCatalog({ categories: [{ id: 'stok', displayName: 'stok', examples: [] }] }, 'custom.json'),
    ).toThrow(
      'Invalid category catalog (custom.json): categories.0.examples: Each category needs at least one example phrase',
    );
  });

  it('should reject an empty catalog', () => {
    expect(() => parseCategoryCatalog({ categories: [] })).toThrow(
      'Invalid category catalog (<inline>): categories: Catalog must define at least one category',
    );
  });

  it('should reject a value that is not an object', () => {
    expect(() => parseCategoryCatalog(null)).toThrow(ConfigError);
  });
});

describe('loadCategories', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'quecat-catalog-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should read a custom catalog file', async () => {
    const file = path.join(tempDir, 'catalog.json');
    await fs.writeFile(
      file,
      JSON.stringify({ categories: [{ id: 'a', displayName: 'A', examples: ['one', 'two'] }] }),
    );

    const categories = await loadCategories(file);

    expect(categories).toEqual([{ id: 'a', displayName: 'A', examples: ['one', 'two'] }]);
  });

  it('should report invalid JSON as a config error', async () => {
    const file = path.join(tempDir, 'broken.json');
    await fs.writeFile(file, '{ not json');

    await expect(loadCategories(file)).rejects.toBeInstanceOf(ConfigError);
    await expect(loadCategories(file)).rejects.toThrow('Category catalog is not valid JSON');
  });

  it('should report a missing file as a config error', async () => {
    await expect(loadCategories(path.join(tempDir, 'missing.json'))).rejects.toThrow(
      'Cannot read category catalog',
    );
  });
});
