/**
 * Zotero Web API v3 wire types
 *
 * Only the fields this tool reads are modelled. Responses are validated on
 * the way in; anything malformed is dropped with a warning by the client.
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * HTTP methods the client issues
 */
export type HttpMethod = 'GET';

export type LibraryType = 'user' | 'group';

/**
 * Zotero client configuration
 */
export interface ZoteroClientConfig {
  /** Numeric user or group ID */
  libraryId: string;
  libraryType?: LibraryType;
  apiKey: string;
  /** Defaults to https://api.zotero.org */
  baseUrl?: string;
  /** Item types listed by listItems */
  itemTypes?: string[];
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Page size, at most 100 (default: 100) */
  pageSize?: number;
}

// =============================================================================
// Resources
// =============================================================================

export interface ZoteroCreator {
  creatorType: string;
  firstName?: string;
  lastName?: string;
  /** Single-field names (institutions) */
  name?: string;
}

export interface ZoteroItemData {
  key: string;
  itemType: string;
  title: string;
  creators: ZoteroCreator[];
  date?: string;
  abstractNote?: string;
  DOI?: string;
  tags: string[];
  collections: string[];
  parentItem?: string;
  contentType?: string;
  /** Remaining scalar fields (publicationTitle, volume, pages, url, ...) */
  other: Record<string, string>;
}

export interface ZoteroCollectionData {
  key: string;
  name: string;
  parentCollection?: string;
  numItems?: number;
}

// =============================================================================
// Validation
// =============================================================================

const KNOWN_ITEM_FIELDS = new Set([
  'key',
  'version',
  'itemType',
  'title',
  'creators',
  'date',
  'abstractNote',
  'DOI',
  'tags',
  'collections',
  'relations',
  'parentItem',
  'contentType',
  'dateAdded',
  'dateModified',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function parseCreator(value: unknown): ZoteroCreator | undefined {
  if (!isRecord(value) || typeof value.creatorType !== 'string') return undefined;
  return {
    creatorType: value.creatorType,
    firstName: optionalString(value.firstName),
    lastName: optionalString(value.lastName),
    name: optionalString(value.name),
  };
}

/**
 * Validate one element of an items response (`{ key, data: {...} }`)
 */
export function parseItem(value: unknown): ZoteroItemData | undefined {
  if (!isRecord(value) || !isRecord(value.data)) return undefined;
  const data = value.data;

  const key = optionalString(data.key) ?? optionalString(value.key);
  if (!key || typeof data.itemType !== 'string') return undefined;

  const creators = Array.isArray(data.creators)
    ? data.creators.map(parseCreator).filter((c): c is ZoteroCreator => c !== undefined)
    : [];

  const tags = Array.isArray(data.tags)
    ? data.tags
        .map((tag) => (isRecord(tag) ? optionalString(tag.tag) : undefined))
        .filter((tag): tag is string => tag !== undefined)
    : [];

  const collections = Array.isArray(data.collections)
    ? data.collections.filter((c): c is string => typeof c === 'string')
    : [];

  const other: Record<string, string> = {};
  for (const [field, fieldValue] of Object.entries(data)) {
    if (KNOWN_ITEM_FIELDS.has(field)) continue;
    if (typeof fieldValue === 'string' && fieldValue.length > 0) {
      other[field] = fieldValue;
    } else if (typeof fieldValue === 'number') {
      other[field] = String(fieldValue);
    }
  }

  return {
    key,
    itemType: data.itemType,
    title: typeof data.title === 'string' ? data.title : '',
    creators,
    date: optionalString(data.date),
    abstractNote: optionalString(data.abstractNote),
    DOI: optionalString(data.DOI),
    tags,
    collections,
    parentItem: optionalString(data.parentItem),
    contentType: optionalString(data.contentType),
    other,
  };
}

/**
 * Validate one element of a collections response
 */
export function parseCollection(value: unknown): ZoteroCollectionData | undefined {
  if (!isRecord(value) || !isRecord(value.data)) return undefined;
  const data = value.data;

  const key = optionalString(data.key) ?? optionalString(value.key);
  if (!key || typeof data.name !== 'string') return undefined;

  const numItems = isRecord(value.meta) && typeof value.meta.numItems === 'number' ? value.meta.numItems : undefined;

  return {
    key,
    name: data.name,
    parentCollection: optionalString(data.parentCollection),
    numItems,
  };
}
