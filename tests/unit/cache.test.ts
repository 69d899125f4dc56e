/**
 * Unit Tests: Response Cache
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';

import { FileResponseCache, Fingerprint, MemoryResponseCache } from '../../src/pipeline/cache.js';
import { makeTempDir, quietLogger, removeDir, writeNote } from '../helpers.js';

const HOUR = 60 * 60 * 1000;

interface Answer {
  text: string;
}

function isAnswer(value: unknown): value is Answer {
  return value !== null && typeof value === 'object' && 'text' in value && typeof value.text === 'string';
}

describe('Fingerprint', () => {
  it('is deterministic', () => {
    const a = new Fingerprint().add('model').add('text').digest();
    const b = new Fingerprint().add('model').add('text').digest();
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('keeps part boundaries apart', () => {
    const a = new Fingerprint().add('ab').add('c').digest();
    const b = new Fingerprint().add('a').add('bc').digest();
    expect(a).not.toBe(b);
  });

  it('hashes bytes the same as the equivalent string', () => {
    const fromString = new Fingerprint().add('abc').digest();
    const fromBytes = new Fingerprint().add(new Uint8Array([97, 98, 99])).digest();
    expect(fromBytes).toBe(fromString);
  });
});

describe('FileResponseCache', () => {
  let dir: string;
  let now: Date;
  let cache: FileResponseCache<Answer>;

  beforeEach(async () => {
    dir = await makeTempDir();
    now = new Date('2024-03-05T12:00:00Z');
    cache = new FileResponseCache<Answer>(join(dir, 'cache'), {
      freshnessMs: 2 * HOUR,
      validate: isAnswer,
      now: () => now,
      logger: quietLogger,
    });
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('misses when nothing is stored', async () => {
    expect(await cache.get('abc')).toBeUndefined();
  });

  it('serves entries inside the freshness window', async () => {
    await cache.set('abc', { text: 'cached' });
    now = new Date('2024-03-05T13:59:00Z');
    expect(await cache.get('abc')).toEqual({ text: 'cached' });
  });

  it('never serves stale entries', async () => {
    await cache.set('abc', { text: 'cached' });
    now = new Date('2024-03-05T14:00:01Z');
    expect(await cache.get('abc')).toBeUndefined();
  });

  it('rejects entries with an unexpected value shape', async () => {
    await writeNote(
      dir,
      'cache/abc.json',
      JSON.stringify({ fingerprint: 'abc', storedAt: '2024-03-05T12:00:00.000Z', value: { other: 1 } })
    );
    expect(await cache.get('abc')).toBeUndefined();
  });

  it('rejects entries stored under another fingerprint', async () => {
    await writeNote(
      dir,
      'cache/abc.json',
      JSON.stringify({ fingerprint: 'xyz', storedAt: '2024-03-05T12:00:00.000Z', value: { text: 'x' } })
    );
    expect(await cache.get('abc')).toBeUndefined();
  });

  it('ignores corrupted files', async () => {
    await writeNote(dir, 'cache/abc.json', '{"fingerprint":');
    expect(await cache.get('abc')).toBeUndefined();
  });
});

describe('MemoryResponseCache', () => {
  it('applies the same freshness rule', async () => {
    let now = new Date('2024-03-05T12:00:00Z');
    const cache = new MemoryResponseCache<string>(HOUR, () => now);

    await cache.set('k', 'v');
    expect(await cache.get('k')).toBe('v');

    now = new Date('2024-03-05T13:00:01Z');
    expect(await cache.get('k')).toBeUndefined();
  });
});
