/**
 * Domain types shared by the reconciler and the batch pipeline
 */

/**
 * Ordered folder names, outermost first (e.g. ['AI', 'ML'])
 */
export type CollectionPath = readonly string[];

/**
 * Sentinel path for items that belong to no collection
 */
export const UNCATEGORIZED = 'Uncategorized';

/**
 * A record in the reference library. Read-only to this tool.
 */
export interface LibraryItem {
  /** Stable unique key, immutable for the item's lifetime */
  key: string;
  title: string;
  /** Formatted as "Last, First" */
  authors: string[];
  /** Every collection the item is filed under; may be empty */
  collectionPaths: CollectionPath[];
  /** Opaque pointer to the PDF attachment */
  attachmentRef?: string;
  abstract?: string;
  year?: string;
  doi?: string;
  tags: string[];
  /** Rarely used metadata (publicationTitle, volume, pages, ...) */
  extra: Record<string, string>;
}

/**
 * A collection with its resolved path
 */
export interface LibraryCollection {
  key: string;
  name: string;
  path: CollectionPath;
  /** Number of top-level items filed directly in the collection, when known */
  itemCount?: number;
}

/**
 * Read-only view of the external library
 */
export interface LibraryClient {
  /** All items, paginated internally; filtered by collection when given */
  listItems(collectionFilter?: string): Promise<LibraryItem[]>;
  /** Attachment bytes, or null when the attachment does not exist */
  fetchAttachment(attachmentRef: string): Promise<Uint8Array | null>;
  listCollections(): Promise<LibraryCollection[]>;
}

/**
 * A generated note found in the document store
 */
export interface LocalDocument {
  key: string;
  /** Folder names below the store root */
  folderPath: CollectionPath;
  fileName: string;
  /** Path relative to the store root, '/'-separated */
  relativePath: string;
  /** Absolute path on disk */
  absolutePath: string;
  content: string;
}
