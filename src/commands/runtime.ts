/**
 * Wiring of collaborators for the commands
 *
 * State lives under `<stateDir>`:
 *   done.txt          DoneRecord
 *   checkpoint.json   pipeline checkpoint
 *   cache/            summarization responses
 *   logs/             reconcile-YYYYMMDD.jsonl, pipeline-YYYYMMDD.jsonl
 *
 * Collaborators are created on first use so that commands only require the
 * settings they actually need.
 */

import { join } from 'node:path';

import { createZoteroClient, OpenAISummarizer, type Logger } from '../api/index.js';
import { PdfExtractor } from '../collaborators/extract.js';
import { TemplateRenderer } from '../collaborators/render.js';
import {
  requireBackupDir,
  requireOpenAIKey,
  requireOutputDir,
  requireZotero,
  type Settings,
} from '../config/settings.js';
import type { LibraryClient } from '../library/types.js';
import {
  CheckpointStore,
  DoneRecord,
  FileResponseCache,
  RateLimitedCaller,
  fingerprintSummaryRequest,
  isSummary,
  type Extractor,
  type Renderer,
  type Summary,
  type SummaryCaller,
  type SummaryRequest,
} from '../pipeline/index.js';
import { AuditLog, type AuditChannel, type AuditSink } from '../store/audit-log.js';
import { TarSnapshotter, type Snapshotter } from '../store/backup.js';
import { DocumentStore } from '../store/document-store.js';

export const DONE_RECORD_FILE = 'done.txt';
export const CHECKPOINT_FILE = 'checkpoint.json';

/**
 * Everything a command reaches outside its own process
 */
export interface Runtime {
  store(): DocumentStore;
  library(): LibraryClient;
  snapshotter(): Snapshotter;
  extractor(): Extractor;
  renderer(): Renderer;
  summarizer(): SummaryCaller;
  doneRecord(): Promise<DoneRecord>;
  checkpoints(): CheckpointStore;
  audit(channel: AuditChannel): AuditSink;
}

/**
 * Build the production runtime from resolved settings
 */
export function createRuntime(settings: Settings, logger: Logger): Runtime {
  const once = <T>(factory: () => T): (() => T) => {
    let value: { current: T } | undefined;
    return () => {
      if (!value) value = { current: factory() };
      return value.current;
    };
  };

  const store = once(() => new DocumentStore(requireOutputDir(settings), { logger }));

  const library = once(() => {
    const { userId, apiKey } = requireZotero(settings);
    return createZoteroClient(
      {
        libraryId: userId,
        libraryType: settings.zotero.libraryType,
        apiKey,
        itemTypes: settings.zotero.itemTypes,
      },
      { logger }
    );
  });

  const summarizer = once(() => {
    const openai = new OpenAISummarizer({
      apiKey: requireOpenAIKey(settings),
      model: settings.openai.model,
      logger,
    });
    return new RateLimitedCaller<SummaryRequest, Summary>({
      invoke: (request) => openai.summarize(request),
      fingerprint: fingerprintSummaryRequest,
      cache: new FileResponseCache(join(settings.stateDir, 'cache'), {
        freshnessMs: settings.cache.freshnessHours * 60 * 60 * 1000,
        validate: isSummary,
        logger,
      }),
      logger,
      label: 'summarize',
    });
  });

  const audits = new Map<AuditChannel, AuditLog>();

  return {
    store,
    library,
    snapshotter: once(() => new TarSnapshotter(requireBackupDir(settings), { logger })),
    extractor: once(() => new PdfExtractor({ logger })),
    renderer: once(() => new TemplateRenderer()),
    summarizer,
    doneRecord: () => DoneRecord.open(join(settings.stateDir, DONE_RECORD_FILE)),
    checkpoints: once(() => new CheckpointStore(join(settings.stateDir, CHECKPOINT_FILE), { logger })),
    audit: (channel) => {
      let log = audits.get(channel);
      if (!log) {
        log = new AuditLog(join(settings.stateDir, 'logs'), channel);
        audits.set(channel, log);
      }
      return log;
    },
  };
}
