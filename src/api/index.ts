/**
 * API client module
 *
 * Provides:
 * - Zotero Web API client (items, collections, attachments)
 * - OpenAI summarization adapter
 * - Retry logic with separate rate-limit and transient budgets
 * - JSON logging with secret redaction
 */

// Zotero
export {
  createZoteroClient,
  toLibraryItem,
  formatCreator,
  extractYear,
  buildCollectionPaths,
  ZOTERO_API_URL,
  ZOTERO_API_VERSION,
  DEFAULT_ITEM_TYPES,
} from './zotero.js';

export type { ZoteroClientDeps } from './zotero.js';

// OpenAI
export {
  OpenAISummarizer,
  buildPrompt,
  parseSummary,
  toApiRequestError,
  DEFAULT_MODEL,
  MAX_INPUT_CHARS,
} from './openai.js';

export type { OpenAISummarizerOptions } from './openai.js';

// Retry utilities
export {
  withRetry,
  classifyError,
  createRetryPolicy,
  backoffDelay,
  parseRetryAfter,
  sleep,
  ApiRequestError,
  DEFAULT_RETRY_POLICY,
  RATE_LIMIT_STATUS,
  REQUEST_TIMEOUT_STATUS,
  SERVER_ERROR_THRESHOLD,
} from './retry.js';

export type {
  ErrorClass,
  RateLimitBudget,
  TransientBudget,
  RetryPolicy,
  RetryResult,
  RetryOptions,
} from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  Logger,
  redactString,
  redactPatterns,
  redactValue,
  redactContext,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  HttpMethod,
  LibraryType,
  ZoteroClientConfig,
  ZoteroCreator,
  ZoteroItemData,
  ZoteroCollectionData,
} from './types.js';

export { parseItem, parseCollection } from './types.js';
