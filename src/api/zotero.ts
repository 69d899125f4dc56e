/**
 * Zotero API Client
 *
 * Read-only LibraryClient over the Zotero Web API v3 with:
 * - Retry with exponential backoff (429, Retry-After / Backoff headers)
 * - Pagination through `start`/`limit` and the Total-Results header
 * - Validation of every item at the boundary
 * - Logging with API key redaction
 */

import type {
  CollectionPath,
  LibraryClient,
  LibraryCollection,
  LibraryItem,
} from '../library/types.js';
import { matchesFilter } from '../library/paths.js';
import type { HttpMethod, ZoteroClientConfig, ZoteroCollectionData, ZoteroCreator, ZoteroItemData } from './types.js';
import { parseCollection, parseItem } from './types.js';
import { withRetry, ApiRequestError, parseRetryAfter, type RetryPolicy } from './retry.js';
import { logger as defaultLogger, type Logger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

export const ZOTERO_API_URL = 'https://api.zotero.org';
export const ZOTERO_API_VERSION = '3';
export const DEFAULT_ITEM_TYPES = ['journalArticle', 'preprint', 'conferencePaper'];
const MAX_PAGE_SIZE = 100;

// =============================================================================
// Mapping
// =============================================================================

/**
 * "Last, First" for people, the single name field for institutions
 */
export function formatCreator(creator: ZoteroCreator): string | undefined {
  if (creator.lastName && creator.firstName) return `${creator.lastName}, ${creator.firstName}`;
  return creator.lastName ?? creator.name ?? creator.firstName;
}

/**
 * First four-digit year in a Zotero date string
 */
export function extractYear(date: string | undefined): string | undefined {
  return date?.match(/\b(\d{4})\b/)?.[1];
}

/**
 * Resolve every collection's full path by walking parentCollection links
 */
export function buildCollectionPaths(collections: readonly ZoteroCollectionData[]): Map<string, string[]> {
  const byKey = new Map(collections.map((c) => [c.key, c]));
  const paths = new Map<string, string[]>();

  const resolve = (key: string, seen: Set<string>): string[] => {
    const known = paths.get(key);
    if (known) return known;

    const collection = byKey.get(key);
    if (!collection) return [];

    let path = [collection.name];
    const parent = collection.parentCollection;
    if (parent && !seen.has(parent)) {
      seen.add(parent);
      path = [...resolve(parent, seen), collection.name];
    }
    paths.set(key, path);
    return path;
  };

  for (const collection of collections) {
    resolve(collection.key, new Set([collection.key]));
  }
  return paths;
}

/**
 * Convert a validated wire item into a LibraryItem
 */
export function toLibraryItem(
  data: ZoteroItemData,
  collectionPaths: ReadonlyMap<string, string[]>,
  attachmentRef?: string
): LibraryItem {
  const paths: CollectionPath[] = data.collections
    .map((key) => collectionPaths.get(key))
    .filter((path): path is string[] => path !== undefined && path.length > 0);

  const authors = data.creators
    .filter((creator) => creator.creatorType === 'author')
    .map(formatCreator)
    .filter((name): name is string => name !== undefined);

  return {
    key: data.key,
    title: data.title.trim() || 'Untitled',
    authors,
    collectionPaths: paths,
    attachmentRef,
    abstract: data.abstractNote,
    year: extractYear(data.date),
    doi: data.DOI,
    tags: data.tags,
    extra: { ...data.other },
  };
}

// =============================================================================
// Client Implementation
// =============================================================================

export interface ZoteroClientDeps {
  logger?: Logger;
  policy?: RetryPolicy;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Create a Zotero library client with retry and logging
 */
export function createZoteroClient(config: ZoteroClientConfig, deps: ZoteroClientDeps = {}): LibraryClient {
  const baseUrl = (config.baseUrl ?? ZOTERO_API_URL).replace(/\/+$/, '');
  const prefix = `/${config.libraryType === 'group' ? 'groups' : 'users'}/${config.libraryId}`;
  const timeout = config.timeout ?? 30000;
  const pageSize = Math.min(config.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
  const itemTypes = config.itemTypes ?? DEFAULT_ITEM_TYPES;
  const log = (deps.logger ?? defaultLogger).child({ component: 'zotero' });

  const defaultHeaders: Record<string, string> = {
    'Zotero-API-Key': config.apiKey,
    'Zotero-API-Version': ZOTERO_API_VERSION,
  };

  /**
   * Make an API request with retry logic
   */
  async function request(
    method: HttpMethod,
    path: string,
    params: Record<string, string | number | undefined> = {}
  ): Promise<Response> {
    const url = new URL(`${baseUrl}${prefix}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    log.request(method, url.toString(), defaultHeaders);

    const makeRequest = async (): Promise<Response> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        let response: Response;
        try {
          response = await fetch(url.toString(), { method, headers: defaultHeaders, signal: controller.signal });
        } catch (error) {
          if (error instanceof Error && error.name === 'AbortError') throw error;
          throw new ApiRequestError(`Zotero request failed: ${error instanceof Error ? error.message : String(error)}`, 0, {
            code: 'ECONNECTION',
            cause: error,
          });
        }
        log.response(response.status, url.toString(), Date.now() - startTime);

        if (response.status === 404) {
          return response;
        }

        if (!response.ok) {
          const body = await response.text().catch(() => '');
          const retryAfter =
            parseRetryAfter(response.headers.get('Retry-After')) ?? parseRetryAfter(response.headers.get('Backoff'));
          throw new ApiRequestError(
            `Zotero API error (${response.status})${body ? `: ${body.substring(0, 200)}` : ''}`,
            response.status,
            { retryAfter }
          );
        }

        return response;
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const result = await withRetry(makeRequest, {
      policy: deps.policy,
      logger: log,
      label: `GET ${path}`,
      sleep: deps.sleep,
    });

    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  /**
   * Fetch every page of a list endpoint
   */
  async function listAll(path: string, params: Record<string, string | number | undefined> = {}): Promise<unknown[]> {
    const results: unknown[] = [];
    let start = 0;

    for (;;) {
      const response = await request('GET', path, { ...params, start, limit: pageSize });
      if (response.status === 404) {
        throw new ApiRequestError(`Zotero resource not found: ${prefix}${path}`, 404);
      }

      const page: unknown = await response.json();
      if (!Array.isArray(page)) {
        throw new ApiRequestError(`Unexpected response from ${path}: expected an array`, response.status);
      }
      results.push(...page);

      const total = Number.parseInt(response.headers.get('Total-Results') ?? '', 10);
      start += page.length;
      if (page.length === 0 || Number.isNaN(total) || start >= total) {
        break;
      }
    }

    return results;
  }

  async function fetchCollections(): Promise<ZoteroCollectionData[]> {
    const raw = await listAll('/collections');
    const collections: ZoteroCollectionData[] = [];
    for (const entry of raw) {
      const parsed = parseCollection(entry);
      if (parsed) {
        collections.push(parsed);
      } else {
        log.warn('Skipping malformed collection in Zotero response');
      }
    }
    return collections;
  }

  /**
   * First PDF attachment per parent item
   */
  async function fetchPdfAttachments(): Promise<Map<string, string>> {
    const raw = await listAll('/items', { itemType: 'attachment' });
    const byParent = new Map<string, string>();
    for (const entry of raw) {
      const attachment = parseItem(entry);
      if (!attachment?.parentItem || attachment.contentType !== 'application/pdf') continue;
      if (!byParent.has(attachment.parentItem)) {
        byParent.set(attachment.parentItem, attachment.key);
      }
    }
    return byParent;
  }

  return {
    /**
     * List items of the configured types. When a filter is given, only items
     * with a matching collection path are returned; reconciliation must use
     * the unfiltered list so that moved-out items are not mistaken for deleted.
     */
    async listItems(collectionFilter?: string): Promise<LibraryItem[]> {
      const collections = await fetchCollections();
      const collectionPaths = buildCollectionPaths(collections);
      const attachments = await fetchPdfAttachments();
      const raw = await listAll('/items/top', { itemType: itemTypes.join(' || ') });

      const items: LibraryItem[] = [];
      for (const entry of raw) {
        const data = parseItem(entry);
        if (!data) {
          log.warn('Skipping malformed item in Zotero response');
          continue;
        }
        items.push(toLibraryItem(data, collectionPaths, attachments.get(data.key)));
      }

      log.info(`Fetched ${items.length} item(s) from Zotero`, {
        collections: collections.length,
        withPdf: items.filter((item) => item.attachmentRef).length,
      });

      if (!collectionFilter) return items;
      return items.filter((item) => item.collectionPaths.some((path) => matchesFilter(path, collectionFilter)));
    },

    async fetchAttachment(attachmentRef: string): Promise<Uint8Array | null> {
      const response = await request('GET', `/items/${encodeURIComponent(attachmentRef)}/file`);
      if (response.status === 404) {
        return null;
      }
      return new Uint8Array(await response.arrayBuffer());
    },

    async listCollections(): Promise<LibraryCollection[]> {
      const collections = await fetchCollections();
      const paths = buildCollectionPaths(collections);
      return collections
        .map((collection) => ({
          key: collection.key,
          name: collection.name,
          path: paths.get(collection.key) ?? [collection.name],
          itemCount: collection.numItems,
        }))
        .sort((a, b) => a.path.join('/').localeCompare(b.path.join('/')));
    },
  };
}
