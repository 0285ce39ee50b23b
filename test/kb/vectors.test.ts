import type Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IN_MEMORY, closeDatabase, openDatabase } from '../../src/db.js';
import { SqliteVectorStore, deserializeFloat32, normalize, serializeFloat32 } from '../../src/kb/vectors.js';

let db: Database.Database;
let store: SqliteVectorStore;

beforeEach(() => {
  db = openDatabase({ dataDir: '', dbFile: IN_MEMORY });
  store = new SqliteVectorStore(db, { useVss: false });
});

afterEach(() => {
  closeDatabase(db);
});

describe('SqliteVectorStore', () => {
  it('uses the scan search when sqlite-vss is disabled', () => {
    expect(store.isVssAvailable()).toBe(false);
  });

  it('returns nearest neighbours by cosine distance', async () => {
    await store.add('items', 'a', [1, 0]);
    await store.add('items', 'b', [0, 1]);
    await store.add('items', 'd', [1, 1]);

    const matches = await store.query('items', [2, 0], 3);

    expect(matches.map((m) => m.id)).toEqual(['a', 'd', 'b']);
    expect(matches[0].distance).toBeCloseTo(0, 6);
    expect(matches[1].distance).toBeCloseTo(1 - Math.SQRT1_2, 6);
    expect(matches[2].distance).toBeCloseTo(1, 6);
  });

  it('caps results at k', async () => {
    await store.add('items', 'a', [1, 0]);
    await store.add('items', 'b', [0, 1]);

    expect(await store.query('items', [1, 0], 1)).toHaveLength(1);
    expect(await store.query('items', [1, 0], 0)).toEqual([]);
  });

  it('keeps collections apart', async () => {
    await store.add('items', 'a', [1, 0]);
    await store.add('other', 'x', [1, 0]);

    expect((await store.query('items', [1, 0], 5)).map((m) => m.id)).toEqual(['a']);
    expect(await store.count('other')).toBe(1);
  });

  it('overwrites the vector of an existing id', async () => {
    await store.add('items', 'a', [1, 0], { title: 'first' });
    await store.add('items', 'a', [0, 1], { title: 'second' });

    expect(await store.count('items')).toBe(1);
    const [match] = await store.query('items', [0, 1], 1);
    expect(match.id).toBe('a');
    expect(match.distance).toBeCloseTo(0, 6);
  });

  it('ignores vectors of another dimension', async () => {
    await store.add('items', 'a', [1, 0]);

    expect(await store.query('items', [1, 0, 0], 5)).toEqual([]);
  });

  it('tracks presence and removal', async () => {
    await store.add('items', 'a', [1, 0]);

    expect(await store.has('items', 'a')).toBe(true);
    expect(await store.remove('items', 'a')).toBe(true);
    expect(await store.has('items', 'a')).toBe(false);
    expect(await store.remove('items', 'a')).toBe(false);
    expect(await store.count('items')).toBe(0);
  });
});

describe('vector helpers', () => {
  it('normalizes to unit length and leaves zero vectors alone', () => {
    expect(Array.from(normalize(Float32Array.from([3, 4])))).toEqual([
      Math.fround(0.6),
      Math.fround(0.8),
    ]);
    expect(Array.from(normalize(new Float32Array(2)))).toEqual([0, 0]);
  });

  it('stores float32 values losslessly', () => {
    const values = Float32Array.from([1.5, -2, 0.25]);
    expect(Array.from(deserializeFloat32(serializeFloat32(values)))).toEqual([1.5, -2, 0.25]);
  });
});
