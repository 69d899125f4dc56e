/**
 * Response cache with a freshness window
 *
 * Entries live in `<dir>/<fingerprint>.json` and are never served once older
 * than the window.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';

export interface ResponseCache<T> {
  get(fingerprint: string): Promise<T | undefined>;
  set(fingerprint: string, value: T): Promise<void>;
}

interface CacheEntry {
  fingerprint: string;
  storedAt: string;
  value: unknown;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (value === null || typeof value !== 'object') return false;
  const record: Record<string, unknown> = { ...value };
  return typeof record.fingerprint === 'string' && typeof record.storedAt === 'string' && 'value' in record;
}

/**
 * Incremental sha256 over the parts of a request
 */
export class Fingerprint {
  private readonly hash = createHash('sha256');

  add(part: string | Uint8Array): this {
    // length prefix keeps ('ab','c') and ('a','bc') apart
    const bytes = typeof part === 'string' ? Buffer.from(part, 'utf-8') : part;
    this.hash.update(`${bytes.length}:`);
    this.hash.update(bytes);
    return this;
  }

  digest(): string {
    return this.hash.digest('hex');
  }
}

export interface CacheOptions<T> {
  freshnessMs: number;
  /** Rejects entries whose stored value no longer has the expected shape */
  validate: (value: unknown) => value is T;
  now?: () => Date;
  logger?: Logger;
}

/**
 * File-backed cache
 */
export class FileResponseCache<T> implements ResponseCache<T> {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly dir: string,
    private readonly options: CacheOptions<T>
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? defaultLogger).child({ component: 'cache' });
  }

  private entryPath(fingerprint: string): string {
    return join(this.dir, `${fingerprint}.json`);
  }

  async get(fingerprint: string): Promise<T | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.entryPath(fingerprint), 'utf-8');
    } catch {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log.debug('Ignoring unreadable cache entry', { fingerprint, error: toError(error).message });
      return undefined;
    }

    if (!isCacheEntry(parsed) || parsed.fingerprint !== fingerprint) return undefined;

    const age = this.now().getTime() - new Date(parsed.storedAt).getTime();
    if (Number.isNaN(age) || age < 0 || age > this.options.freshnessMs) {
      return undefined;
    }

    return this.options.validate(parsed.value) ? parsed.value : undefined;
  }

  async set(fingerprint: string, value: T): Promise<void> {
    const entry: CacheEntry = { fingerprint, storedAt: this.now().toISOString(), value };
    const target = this.entryPath(fingerprint);
    const temp = `${target}.${process.pid}.tmp`;
    await mkdir(this.dir, { recursive: true });
    await writeFile(temp, JSON.stringify(entry), 'utf-8');
    await rename(temp, target);
  }
}

/**
 * In-memory cache, same freshness rules
 */
export class MemoryResponseCache<T> implements ResponseCache<T> {
  private readonly entries = new Map<string, { storedAt: number; value: T }>();
  private readonly now: () => Date;

  constructor(
    private readonly freshnessMs: number,
    now?: () => Date
  ) {
    this.now = now ?? (() => new Date());
  }

  async get(fingerprint: string): Promise<T | undefined> {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;
    const age = this.now().getTime() - entry.storedAt;
    return age >= 0 && age <= this.freshnessMs ? entry.value : undefined;
  }

  async set(fingerprint: string, value: T): Promise<void> {
    this.entries.set(fingerprint, { storedAt: this.now().getTime(), value });
  }
}
