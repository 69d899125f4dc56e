/**
 * Types for the batch pipeline
 */

import type { LibraryItem } from '../library/types.js';

// =============================================================================
// Item lifecycle
// =============================================================================

/**
 * Stages an item passes through, strictly in this order
 */
export const STAGES = ['Fetching', 'Extracting', 'Summarizing', 'Rendering'] as const;

export type StageName = (typeof STAGES)[number];

/**
 * Per-item state: Queued → Fetching → Extracting → Summarizing → Rendering → Done,
 * with Failed(stage, reason) reachable from any non-terminal state
 */
export type ItemState =
  | { status: 'Queued' }
  | { status: StageName }
  | { status: 'Done'; relativePath: string }
  | { status: 'Failed'; stage: StageName; reason: string };

export type TerminalState = Extract<ItemState, { status: 'Done' } | { status: 'Failed' }>;

export interface ItemOutcome {
  key: string;
  state: TerminalState;
  durationMs: number;
}

// =============================================================================
// Collaborators
// =============================================================================

export interface ImageBlob {
  data: Uint8Array;
  mimeType: string;
  page?: number;
  width?: number;
  height?: number;
}

/**
 * Output of text extraction. `fallback` tells the pipeline to use the
 * item's abstract instead.
 */
export type ExtractionResult =
  | { kind: 'text'; text: string; confidence: number }
  | { kind: 'fallback'; reason: string };

export interface Extractor {
  extractText(pdf: Uint8Array): Promise<ExtractionResult>;
  extractImages(pdf: Uint8Array): Promise<ImageBlob[]>;
}

export interface SummaryRequest {
  text: string;
  images?: ImageBlob[];
  languageHint: string;
  model?: string;
}

export interface Summary {
  shortSummary: string;
  longSummary: string;
  sections: {
    contributions: string;
    limitations: string;
    ideas: string;
  };
  keywords: string[];
}

/**
 * Shape check for summaries read back from the response cache
 */
export function isSummary(value: unknown): value is Summary {
  if (value === null || typeof value !== 'object') return false;
  const record: Record<string, unknown> = { ...value };
  const sections = record.sections;
  if (sections === null || typeof sections !== 'object') return false;
  const parts: Record<string, unknown> = { ...sections };
  return (
    typeof record.shortSummary === 'string' &&
    typeof record.longSummary === 'string' &&
    typeof parts.contributions === 'string' &&
    typeof parts.limitations === 'string' &&
    typeof parts.ideas === 'string' &&
    Array.isArray(record.keywords) &&
    record.keywords.every((keyword) => typeof keyword === 'string')
  );
}

export interface Summarizer {
  summarize(request: SummaryRequest): Promise<Summary>;
}

/**
 * What the Summarize stage calls (a RateLimitedCaller in production)
 */
export interface SummaryCaller {
  call(request: SummaryRequest): Promise<Summary>;
}

export type RenderFields = Readonly<Record<string, string | readonly string[] | undefined>>;

export interface Renderer {
  render(templateId: string, fields: RenderFields): Promise<string>;
}

// =============================================================================
// Run configuration and results
// =============================================================================

export interface StageConfig {
  /** Worker pool size */
  workers: number;
  /** Persist the checkpoint after this many completed items */
  checkpointEvery: number;
  /** Continue from the last checkpoint */
  resume: boolean;
  /** Reprocess keys already in the done record */
  force: boolean;
  /** Replace summaries with a placeholder */
  skipSummarization: boolean;
  /** Copy the PDF next to the note under `PDFs/` and link it */
  copyPdfs: boolean;
  languageHint: string;
  templateId: string;
  model?: string;
  /** Cap on the number of items processed */
  limit?: number;
}

export const DEFAULT_STAGE_CONFIG: StageConfig = {
  workers: 5,
  checkpointEvery: 10,
  resume: false,
  force: false,
  skipSummarization: false,
  copyPdfs: false,
  languageHint: 'en',
  templateId: 'literature_note',
};

export interface FailedItem {
  key: string;
  stage: StageName;
  reason: string;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  /** Candidate keys given to the run */
  candidates: number;
  /** Candidates skipped because they were already done */
  skipped: number;
  /** Keys queued for this run */
  queued: number;
  succeeded: string[];
  failed: FailedItem[];
  /** Keys never dequeued because the run was stopped */
  remaining: string[];
  interrupted: boolean;
  resumed: boolean;
  success: boolean;
}

/**
 * Lookup of the items a run may process
 */
export type ItemIndex = ReadonlyMap<string, LibraryItem>;
