/**
 * PDF extraction through pdf-parse
 *
 * Parse failures and unusable text surface as a fallback result, never as an
 * exception.
 */

import { toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';
import type { ExtractionResult, Extractor, ImageBlob } from '../pipeline/types.js';

// =============================================================================
// Text quality
// =============================================================================

export type TextAssessment =
  | { ok: true; confidence: number; wordCount: number }
  | { ok: false; reason: string };

/**
 * Decide whether extracted text is real prose or extraction garbage
 *
 * Thresholds: more than 100 characters, average length of the first 100
 * words between 2 and 30, at least half of the first 1000 characters ASCII,
 * and some sentence structure in the first 500 characters.
 */
export function assessTextQuality(text: string): TextAssessment {
  const trimmed = text.trim();
  if (trimmed.length <= 100) {
    return { ok: false, reason: `text too short (${trimmed.length} chars)` };
  }

  const words = trimmed.split(/\s+/).filter((word) => word.length > 0);
  const sample = words.slice(0, 100);
  const avgWordLength = sample.reduce((sum, word) => sum + word.length, 0) / sample.length;

  const head = text.slice(0, 1000);
  let asciiChars = 0;
  for (const ch of head) {
    if (ch.charCodeAt(0) < 128) asciiChars++;
  }
  const asciiRatio = asciiChars / head.length;

  if (avgWordLength < 2 || avgWordLength > 30 || asciiRatio < 0.5) {
    return {
      ok: false,
      reason: `text failed validation (avg word length ${avgWordLength.toFixed(1)}, ASCII ratio ${asciiRatio.toFixed(2)})`,
    };
  }

  const opening = text.slice(0, 500);
  if (!opening.includes(' ') || (!opening.includes('.') && words.length <= 100)) {
    return { ok: false, reason: 'text has no sentence structure' };
  }

  const lengthScore = Math.min(1, words.length / 1000);
  const confidence = Math.round((lengthScore * 0.5 + asciiRatio * 0.5) * 100) / 100;
  return { ok: true, confidence, wordCount: words.length };
}

// =============================================================================
// pdf-parse extractor
// =============================================================================

/**
 * The part of pdf-parse's `PDFParse` the extractor uses
 */
export interface PdfParser {
  getText(): Promise<{ text: string; total: number }>;
  /** `first` limits the scan to that many leading pages */
  getImage(params: { first?: number; imageThreshold?: number; imageDataUrl?: boolean }): Promise<PdfImages>;
  destroy(): Promise<void>;
}

export interface PdfImages {
  pages: Array<{ pageNumber: number; images: Array<{ data: Uint8Array; width: number; height: number }> }>;
}

export type PdfParserFactory = (data: Uint8Array) => Promise<PdfParser>;

const loadPdfParse: PdfParserFactory = async (data) => {
  const { PDFParse } = await import('pdf-parse');
  return new PDFParse({ data });
};

export interface PdfExtractorOptions {
  /** Maximum images returned per document (default: 5) */
  maxImages?: number;
  /** Only scan this many leading pages for images (default: 10) */
  imagePages?: number;
  /** Images smaller than this are icons or rules (default: 10 KiB) */
  minImageBytes?: number;
  /** Images narrower or shorter than this many pixels are skipped (default: 80) */
  minImageSize?: number;
  createParser?: PdfParserFactory;
  logger?: Logger;
}

export class PdfExtractor implements Extractor {
  private readonly log: Logger;
  private readonly maxImages: number;
  private readonly imagePages: number;
  private readonly minImageBytes: number;
  private readonly minImageSize: number;
  private readonly createParser: PdfParserFactory;

  constructor(options: PdfExtractorOptions = {}) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'extract' });
    this.maxImages = options.maxImages ?? 5;
    this.imagePages = options.imagePages ?? 10;
    this.minImageBytes = options.minImageBytes ?? 10 * 1024;
    this.minImageSize = options.minImageSize ?? 80;
    this.createParser = options.createParser ?? loadPdfParse;
  }

  async extractText(pdf: Uint8Array): Promise<ExtractionResult> {
    let text: string;
    let pages: number;
    try {
      ({ text, total: pages } = await this.withParser(pdf, (parser) => parser.getText()));
    } catch (error) {
      return { kind: 'fallback', reason: `PDF parse failed: ${toError(error).message}` };
    }

    const assessment = assessTextQuality(text);
    if (!assessment.ok) {
      return { kind: 'fallback', reason: assessment.reason };
    }

    this.log.debug('Extracted text', { pages, words: assessment.wordCount, confidence: assessment.confidence });
    return { kind: 'text', text: text.trim(), confidence: assessment.confidence };
  }

  async extractImages(pdf: Uint8Array): Promise<ImageBlob[]> {
    let result: PdfImages;
    try {
      result = await this.withParser(pdf, (parser) =>
        parser.getImage({ first: this.imagePages, imageThreshold: this.minImageSize, imageDataUrl: false })
      );
    } catch (error) {
      this.log.debug('Image extraction failed', { error: toError(error).message });
      return [];
    }

    const images: ImageBlob[] = [];
    for (const page of result.pages) {
      for (const image of page.images) {
        if (images.length >= this.maxImages) return images;
        if (image.data.length < this.minImageBytes) continue;
        images.push({
          data: image.data,
          mimeType: 'image/png',
          page: page.pageNumber,
          width: image.width,
          height: image.height,
        });
      }
    }
    return images;
  }

  /**
   * Run one task against a parser over a copy of the bytes; the parser may
   * take ownership of the buffer it is given
   */
  private async withParser<T>(pdf: Uint8Array, task: (parser: PdfParser) => Promise<T>): Promise<T> {
    const parser = await this.createParser(new Uint8Array(pdf));
    try {
      return await task(parser);
    } finally {
      await parser.destroy().catch((error: unknown) => {
        this.log.debug('Could not release PDF parser', { error: toError(error).message });
      });
    }
  }
}
