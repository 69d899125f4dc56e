/**
 * Batch pipeline exports
 */

export type {
  StageName,
  ItemState,
  TerminalState,
  ItemOutcome,
  ImageBlob,
  ExtractionResult,
  Extractor,
  SummaryRequest,
  Summary,
  Summarizer,
  SummaryCaller,
  RenderFields,
  Renderer,
  StageConfig,
  FailedItem,
  RunSummary,
  ItemIndex,
} from './types.js';
export { STAGES, DEFAULT_STAGE_CONFIG, isSummary } from './types.js';

export { DoneRecord } from './done-record.js';

export type { Checkpoint, CheckpointSink } from './checkpoint.js';
export { CheckpointStore, CheckpointWriter, isCheckpoint } from './checkpoint.js';

export type { ResponseCache, CacheOptions } from './cache.js';
export { FileResponseCache, MemoryResponseCache, Fingerprint } from './cache.js';

export type { RateLimitedCallerOptions, CallerStats } from './caller.js';
export { RateLimitedCaller } from './caller.js';

export type { StageDeps, ExtractedContent, DocumentAssets } from './stages.js';
export {
  fetchStage,
  extractStage,
  summarizeStage,
  renderStage,
  fallbackText,
  placeholderSummary,
  buildRenderFields,
  documentPath,
  writeAssets,
  pickFeaturedImage,
  fingerprintSummaryRequest,
  describeFailure,
} from './stages.js';

export type { PipelineDeps } from './batch.js';
export { BatchPipeline } from './batch.js';
