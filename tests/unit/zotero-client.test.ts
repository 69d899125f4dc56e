/**
 * Unit Tests: Zotero Client
 *
 * Runs the client against a stubbed global fetch serving an in-memory library.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  buildCollectionPaths,
  createZoteroClient,
  extractYear,
  formatCreator,
} from '../../src/api/zotero.js';
import { ApiRequestError } from '../../src/api/retry.js';
import type { ZoteroClientConfig } from '../../src/api/types.js';
import { quietLogger } from '../helpers.js';

// =============================================================================
// Fixtures
// =============================================================================

const BASE_URL = 'https://zotero.test';

const COLLECTIONS = [
  { key: 'C1', data: { key: 'C1', name: 'AI' }, meta: { numItems: 2 } },
  { key: 'C2', data: { key: 'C2', name: 'ML', parentCollection: 'C1' }, meta: {} },
];

const ATTACHMENTS = [
  { key: 'ATT1', data: { key: 'ATT1', itemType: 'attachment', parentItem: 'I1', contentType: 'application/pdf' } },
  { key: 'ATT2', data: { key: 'ATT2', itemType: 'attachment', parentItem: 'I2', contentType: 'text/html' } },
];

const TOP_ITEMS = [
  {
    key: 'I1',
    data: {
      key: 'I1',
      itemType: 'journalArticle',
      title: 'Deep Nets',
      creators: [
        { creatorType: 'author', firstName: 'Jane', lastName: 'Doe' },
        { creatorType: 'editor', lastName: 'Editor' },
        { creatorType: 'author', name: 'ACME Lab' },
      ],
      date: 'March 2021',
      DOI: '10.1000/xyz',
      tags: [{ tag: 'ml' }],
      collections: ['C2'],
      publicationTitle: 'Journal of Tests',
      volume: 3,
    },
  },
  { key: 'I2', data: { key: 'I2', itemType: 'preprint', title: '  ', collections: ['C1'] } },
  { key: 'BAD', data: { title: 'no item type' } },
];

function jsonPage(all: unknown[], url: URL): Response {
  const start = Number(url.searchParams.get('start') ?? '0');
  const limit = Number(url.searchParams.get('limit') ?? '100');
  return new Response(JSON.stringify(all.slice(start, start + limit)), {
    status: 200,
    headers: { 'Content-Type': 'application/json', 'Total-Results': String(all.length) },
  });
}

/**
 * Serves the fixtures for user library 42
 */
function route(url: URL): Response {
  switch (url.pathname) {
    case '/users/42/collections':
      return jsonPage(COLLECTIONS, url);
    case '/users/42/items':
      return jsonPage(url.searchParams.get('itemType') === 'attachment' ? ATTACHMENTS : [], url);
    case '/users/42/items/top':
      return jsonPage(TOP_ITEMS, url);
    case '/users/42/items/ATT1/file':
      return new Response(new Uint8Array([37, 80, 68, 70]), { status: 200 });
    default:
      return new Response('Not found', { status: 404 });
  }
}

function requestUrl(input: string | URL | Request): URL {
  return new URL(input instanceof Request ? input.url : String(input));
}

describe('createZoteroClient', () => {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => route(requestUrl(input)));
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };

  function createClient(overrides: Partial<ZoteroClientConfig> = {}) {
    return createZoteroClient(
      { libraryId: '42', apiKey: 'test-secret', baseUrl: BASE_URL, pageSize: 1, ...overrides },
      { logger: quietLogger, sleep }
    );
  }

  beforeEach(() => {
    delays.length = 0;
    fetchMock.mockClear();
    fetchMock.mockImplementation(async (input) => route(requestUrl(input)));
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  // ===========================================================================
  // listItems
  // ===========================================================================

  it('lists items with resolved collection paths and PDF attachments', async () => {
    const items = await createClient().listItems();

    expect(items).toEqual([
      {
        key: 'I1',
        title: 'Deep Nets',
        authors: ['Doe, Jane', 'ACME Lab'],
        collectionPaths: [['AI', 'ML']],
        attachmentRef: 'ATT1',
        abstract: undefined,
        year: '2021',
        doi: '10.1000/xyz',
        tags: ['ml'],
        extra: { publicationTitle: 'Journal of Tests', volume: '3' },
      },
      {
        key: 'I2',
        title: 'Untitled',
        authors: [],
        collectionPaths: [['AI']],
        attachmentRef: undefined,
        abstract: undefined,
        year: undefined,
        doi: undefined,
        tags: [],
        extra: {},
      },
    ]);
  });

  it('follows pagination until Total-Results is reached', async () => {
    await createClient().listItems();

    const topStarts = fetchMock.mock.calls
      .map(([input]) => requestUrl(input))
      .filter((url) => url.pathname === '/users/42/items/top')
      .map((url) => url.searchParams.get('start'));
    expect(topStarts).toEqual(['0', '1', '2']);
  });

  it('sends the API key and version headers and the item type filter', async () => {
    await createClient().listItems();

    const topCall = fetchMock.mock.calls.find(([input]) => requestUrl(input).pathname === '/users/42/items/top');
    expect(topCall?.[1]?.headers).toEqual({ 'Zotero-API-Key': 'test-secret', 'Zotero-API-Version': '3' });
    expect(requestUrl(topCall?.[0] ?? '').searchParams.get('itemType')).toBe(
      'journalArticle || preprint || conferencePaper'
    );
  });

  it('filters items by collection path substring', async () => {
    const items = await createClient().listItems('ml');
    expect(items.map((item) => item.key)).toEqual(['I1']);
  });

  it('addresses group libraries', async () => {
    fetchMock.mockImplementation(async (input) => {
      const url = requestUrl(input);
      return url.pathname === '/groups/7/collections' ? jsonPage([], url) : new Response('', { status: 500 });
    });

    expect(await createClient({ libraryId: '7', libraryType: 'group' }).listCollections()).toEqual([]);
  });

  // ===========================================================================
  // listCollections / fetchAttachment
  // ===========================================================================

  it('lists collections sorted by path', async () => {
    expect(await createClient().listCollections()).toEqual([
      { key: 'C1', name: 'AI', path: ['AI'], itemCount: 2 },
      { key: 'C2', name: 'ML', path: ['AI', 'ML'], itemCount: undefined },
    ]);
  });

  it('downloads attachment bytes', async () => {
    expect(await createClient().fetchAttachment('ATT1')).toEqual(new Uint8Array([37, 80, 68, 70]));
  });

  it('returns null for a missing attachment', async () => {
    expect(await createClient().fetchAttachment('MISSING')).toBeNull();
  });

  // ===========================================================================
  // Errors and retries
  // ===========================================================================

  it('retries a rate-limited request after Retry-After', async () => {
    fetchMock.mockImplementationOnce(async () => new Response('slow down', { status: 429, headers: { 'Retry-After': '2' } }));

    const collections = await createClient().listCollections();

    expect(collections).toHaveLength(2);
    expect(delays).toEqual([2000]);
  });

  it('does not retry a rejected key', async () => {
    fetchMock.mockImplementation(async () => new Response('Forbidden', { status: 403 }));

    const failure = createClient().listCollections();

    await expect(failure).rejects.toBeInstanceOf(ApiRequestError);
    await expect(failure).rejects.toThrow('Zotero API error (403): Forbidden');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries network failures a fixed number of times', async () => {
    fetchMock.mockImplementation(async () => {
      throw new TypeError('fetch failed');
    });

    await expect(createClient().listCollections()).rejects.toThrow('Zotero request failed: fetch failed');
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([2000, 2000]);
  });
});

// =============================================================================
// Mapping helpers
// =============================================================================

describe('formatCreator', () => {
  it('formats people as "Last, First"', () => {
    expect(formatCreator({ creatorType: 'author', firstName: 'Jane', lastName: 'Doe' })).toBe('Doe, Jane');
  });

  it('falls back to whichever name exists', () => {
    expect(formatCreator({ creatorType: 'author', lastName: 'Doe' })).toBe('Doe');
    expect(formatCreator({ creatorType: 'author', name: 'ACME Lab' })).toBe('ACME Lab');
    expect(formatCreator({ creatorType: 'author' })).toBeUndefined();
  });
});

describe('extractYear', () => {
  it('finds the first four-digit year', () => {
    expect(extractYear('2021-03-01')).toBe('2021');
    expect(extractYear('Spring 1999')).toBe('1999');
    expect(extractYear('n.d.')).toBeUndefined();
    expect(extractYear(undefined)).toBeUndefined();
  });
});

describe('buildCollectionPaths', () => {
  it('walks parent links', () => {
    const paths = buildCollectionPaths([
      { key: 'C3', name: 'Deep', parentCollection: 'C2' },
      { key: 'C2', name: 'ML', parentCollection: 'C1' },
      { key: 'C1', name: 'AI' },
    ]);
    expect(paths.get('C3')).toEqual(['AI', 'ML', 'Deep']);
  });

  it('terminates on cycles', () => {
    const paths = buildCollectionPaths([
      { key: 'A', name: 'A', parentCollection: 'B' },
      { key: 'B', name: 'B', parentCollection: 'A' },
    ]);
    expect(paths.get('A')).toEqual(['B', 'A']);
  });
});
