/**
 * Pipeline stages: Fetch → Extract → Summarize → Render
 *
 * Each stage is a plain async function over the item being processed.
 * Collaborator-output problems (missing attachment, unusable text) degrade to
 * fallback input; everything else throws and fails the item.
 */

import { posix } from 'node:path';

import type { LibraryItem } from '../library/types.js';
import { canonicalPaths, documentFileName, formatPath, primaryPath } from '../library/paths.js';
import { IMAGE_DIR, type DocumentStore } from '../store/document-store.js';
import { NonRetryableError, RetriesExhaustedError, StageError, toError } from '../errors.js';
import type { Logger } from '../api/logger.js';
import { isoDate } from '../utils/dates.js';
import { Fingerprint } from './cache.js';
import type {
  ExtractionResult,
  Extractor,
  ImageBlob,
  RenderFields,
  Renderer,
  StageConfig,
  StageName,
  Summary,
  SummaryCaller,
  SummaryRequest,
} from './types.js';

export const EXTRACTION_FAILED_NOTE = '[NOTE: PDF extraction failed, using abstract only]';
export const NO_TEXT_AVAILABLE = '[No text available - neither PDF nor abstract could be extracted]';
export const SUMMARIZATION_SKIPPED = '[Summarization skipped]';

/**
 * Images sent along with the text
 */
const MAX_IMAGES = 3;

export interface StageDeps {
  fetchAttachment: (attachmentRef: string) => Promise<Uint8Array | null>;
  extractor: Extractor;
  summarizer: SummaryCaller;
  renderer: Renderer;
  store: Pick<DocumentStore, 'writeAt' | 'writeBinary'>;
  /** Store-relative path of the existing document per key, overwritten in place */
  existingDocuments: ReadonlyMap<string, string>;
  logger: Logger;
}

export interface ExtractedContent {
  text: string;
  images: ImageBlob[];
  /** Set when the abstract (or nothing) stood in for the PDF text */
  fallbackReason?: string;
  confidence: number;
}

// =============================================================================
// Fetch
// =============================================================================

/**
 * @returns PDF bytes, or null when the item has no usable attachment
 */
export async function fetchStage(item: LibraryItem, deps: StageDeps): Promise<Uint8Array | null> {
  if (!item.attachmentRef) {
    deps.logger.debug(`${item.key}: no PDF attachment`);
    return null;
  }

  const bytes = await deps.fetchAttachment(item.attachmentRef);
  if (!bytes) {
    deps.logger.warn(`${item.key}: attachment ${item.attachmentRef} not found`);
  }
  return bytes;
}

// =============================================================================
// Extract
// =============================================================================

/**
 * Text used when the PDF could not provide any
 */
export function fallbackText(item: Pick<LibraryItem, 'abstract'>): string {
  const abstract = item.abstract?.trim();
  return abstract ? `${EXTRACTION_FAILED_NOTE}\n\n${abstract}` : NO_TEXT_AVAILABLE;
}

export async function extractStage(
  item: LibraryItem,
  pdf: Uint8Array | null,
  deps: StageDeps
): Promise<ExtractedContent> {
  if (!pdf) {
    return { text: fallbackText(item), images: [], fallbackReason: 'no attachment', confidence: 0 };
  }

  let result: ExtractionResult;
  try {
    result = await deps.extractor.extractText(pdf);
  } catch (error) {
    result = { kind: 'fallback', reason: toError(error).message };
  }

  if (result.kind === 'fallback') {
    deps.logger.warn(`${item.key}: using fallback text (${result.reason})`);
    return { text: fallbackText(item), images: [], fallbackReason: result.reason, confidence: 0 };
  }

  let images: ImageBlob[] = [];
  try {
    images = (await deps.extractor.extractImages(pdf)).slice(0, MAX_IMAGES);
  } catch (error) {
    deps.logger.debug(`${item.key}: image extraction failed`, { error: toError(error).message });
  }

  return { text: result.text, images, confidence: result.confidence };
}

// =============================================================================
// Summarize
// =============================================================================

/**
 * Deterministic cache fingerprint of a summary request
 */
export function fingerprintSummaryRequest(request: SummaryRequest): string {
  const fingerprint = new Fingerprint()
    .add(request.model ?? '')
    .add(request.languageHint)
    .add(request.text);
  for (const image of request.images ?? []) {
    fingerprint.add(image.mimeType).add(image.data);
  }
  return fingerprint.digest();
}

export function placeholderSummary(item: Pick<LibraryItem, 'tags'>): Summary {
  return {
    shortSummary: SUMMARIZATION_SKIPPED,
    longSummary: SUMMARIZATION_SKIPPED,
    sections: {
      contributions: SUMMARIZATION_SKIPPED,
      limitations: SUMMARIZATION_SKIPPED,
      ideas: SUMMARIZATION_SKIPPED,
    },
    keywords: [...item.tags],
  };
}

export async function summarizeStage(
  item: LibraryItem,
  content: ExtractedContent,
  config: Pick<StageConfig, 'skipSummarization' | 'languageHint' | 'model'>,
  deps: StageDeps
): Promise<Summary> {
  if (config.skipSummarization) {
    return placeholderSummary(item);
  }

  const summary = await deps.summarizer.call({
    text: content.text,
    images: content.images.length > 0 ? content.images : undefined,
    languageHint: config.languageHint,
    model: config.model,
  });

  // Library tags take precedence over generated keywords
  return item.tags.length > 0 ? { ...summary, keywords: [...item.tags] } : summary;
}

// =============================================================================
// Render
// =============================================================================

/**
 * Files written next to a document, as links relative to the document's folder
 */
export interface DocumentAssets {
  imageLinks: string[];
  featuredImage?: string;
  pdfLink?: string;
}

/**
 * Template fields for an item
 */
export function buildRenderFields(
  item: LibraryItem,
  summary: Summary,
  content: Pick<ExtractedContent, 'fallbackReason'>,
  now: Date = new Date(),
  assets: DocumentAssets = { imageLinks: [] }
): RenderFields {
  const pdfLink =
    assets.pdfLink ?? (item.attachmentRef ? `zotero://open-pdf/library/items/${item.attachmentRef}` : undefined);
  return {
    key: item.key,
    title: item.title,
    authors: item.authors,
    year: item.year,
    doi: item.doi,
    abstract: item.abstract ?? '',
    tags: item.tags,
    keywords: summary.keywords,
    collections: canonicalPaths(item).map(formatPath),
    publication: item.extra.publicationTitle,
    zoteroLink: `zotero://select/library/items/${item.key}`,
    created: isoDate(now),
    shortSummary: summary.shortSummary,
    longSummary: summary.longSummary,
    contributions: summary.sections.contributions,
    limitations: summary.sections.limitations,
    ideas: summary.sections.ideas,
    extractionNote: content.fallbackReason ? `Source text: abstract only (${content.fallbackReason})` : '',
    featuredImage: assets.featuredImage ? `![Featured figure](<${assets.featuredImage}>)` : '',
    figures: assets.imageLinks.map((link, index) => `![Figure ${index + 1}](<${link}>)`).join('\n\n'),
    pdfLink: pdfLink ? `[Open PDF](<${pdfLink}>)` : '',
  };
}

/**
 * Store-relative path the item's document is written to
 */
export function documentPath(item: LibraryItem, existingDocuments: ReadonlyMap<string, string>): string {
  return existingDocuments.get(item.key) ?? [...primaryPath(item), documentFileName(item.title, item.key)].join('/');
}

/**
 * Index of the image shown at the top of the note: the largest by pixel
 * area, or by byte size when dimensions are unknown
 */
export function pickFeaturedImage(images: readonly ImageBlob[]): number | undefined {
  let best: number | undefined;
  let bestScore = -1;
  images.forEach((image, index) => {
    const score = image.width && image.height ? image.width * image.height : image.data.length;
    if (score > bestScore) {
      best = index;
      bestScore = score;
    }
  });
  return best;
}

export function imageFileName(image: ImageBlob, index: number): string {
  const subtype = image.mimeType.split('/')[1] ?? 'bin';
  const extension = subtype === 'jpeg' ? 'jpg' : subtype;
  const page = image.page !== undefined ? `_p${image.page}` : '';
  return `figure_${index + 1}${page}.${extension}`;
}

/**
 * Link from a document to another store-relative path
 */
export function relativeLink(fromDocument: string, target: string): string {
  return posix.relative(posix.dirname(fromDocument), target);
}

/**
 * Write extracted images under `img/<document stem>/` and, when asked, the
 * PDF under `<document folder>/PDFs/`. A failed write drops that link only.
 */
export async function writeAssets(
  item: LibraryItem,
  relativePath: string,
  content: Pick<ExtractedContent, 'images'>,
  pdf: Uint8Array | null,
  config: Pick<StageConfig, 'copyPdfs'>,
  deps: Pick<StageDeps, 'store' | 'logger'>
): Promise<DocumentAssets> {
  const stem = posix.basename(relativePath, '.md');
  const assets: DocumentAssets = { imageLinks: [] };
  const featured = pickFeaturedImage(content.images);

  for (const [index, image] of content.images.entries()) {
    const target = `${IMAGE_DIR}/${stem}/${imageFileName(image, index)}`;
    try {
      await deps.store.writeBinary(target, image.data);
    } catch (error) {
      deps.logger.warn(`${item.key}: could not save image ${target}`, { error: toError(error).message });
      continue;
    }
    const link = relativeLink(relativePath, target);
    assets.imageLinks.push(link);
    if (index === featured) {
      assets.featuredImage = link;
    }
  }

  if (config.copyPdfs && pdf) {
    const target = posix.join(posix.dirname(relativePath), 'PDFs', `${stem}.pdf`);
    try {
      await deps.store.writeBinary(target, pdf);
      assets.pdfLink = relativeLink(relativePath, target);
    } catch (error) {
      deps.logger.warn(`${item.key}: could not copy PDF to ${target}`, { error: toError(error).message });
    }
  }

  return assets;
}

/**
 * Write the document's assets, render it and write it to the store.
 * An existing document for the key is overwritten in place.
 *
 * @returns Store-relative path of the written document
 */
export async function renderStage(
  item: LibraryItem,
  summary: Summary,
  content: ExtractedContent,
  pdf: Uint8Array | null,
  config: Pick<StageConfig, 'templateId' | 'copyPdfs'>,
  deps: StageDeps
): Promise<string> {
  const relativePath = documentPath(item, deps.existingDocuments);
  const assets = await writeAssets(item, relativePath, content, pdf, config, deps);
  const fields = buildRenderFields(item, summary, content, new Date(), assets);
  const document = await deps.renderer.render(config.templateId, fields);
  return deps.store.writeAt(relativePath, document);
}

// =============================================================================
// Failure reasons
// =============================================================================

/**
 * Map an error thrown inside a stage to its Failed(stage, reason) pair
 */
export function describeFailure(error: unknown, current: StageName): { stage: StageName; reason: string } {
  if (error instanceof StageError && isStageName(error.stage)) {
    return { stage: error.stage, reason: error.reason };
  }
  if (error instanceof RetriesExhaustedError) {
    return { stage: current, reason: 'retries-exhausted' };
  }
  if (error instanceof NonRetryableError) {
    return { stage: current, reason: `non-retryable: ${error.lastError.message}` };
  }
  return { stage: current, reason: toError(error).message };
}

function isStageName(value: string): value is StageName {
  return value === 'Fetching' || value === 'Extracting' || value === 'Summarizing' || value === 'Rendering';
}
