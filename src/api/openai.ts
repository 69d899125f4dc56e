/**
 * Summarization over the OpenAI chat completions API
 *
 * One JSON-mode completion per document. The SDK's own retries are disabled;
 * SDK errors are converted to ApiRequestError so the shared retry policy
 * decides what to retry.
 */

import OpenAI from 'openai';
import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';

import type { Summarizer, Summary, SummaryRequest } from '../pipeline/types.js';
import { ApiRequestError, parseRetryAfter } from './retry.js';
import { logger as defaultLogger, type Logger } from './logger.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Characters of document text sent to the model
 */
export const MAX_INPUT_CHARS = 30000;

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  ja: 'Japanese',
  de: 'German',
  fr: 'French',
  es: 'Spanish',
  zh: 'Chinese',
  ko: 'Korean',
};

export interface OpenAISummarizerOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  /** Request timeout in milliseconds (default: 120000) */
  timeout?: number;
  logger?: Logger;
  /** Injected for tests */
  client?: Pick<OpenAI, 'chat'>;
}

/**
 * System and user prompt for a request
 */
export function buildPrompt(request: SummaryRequest): { system: string; user: string } {
  const language = LANGUAGE_NAMES[request.languageHint] ?? request.languageHint;
  const text =
    request.text.length > MAX_INPUT_CHARS ? `${request.text.slice(0, MAX_INPUT_CHARS)}\n[...truncated]` : request.text;

  const system = [
    'You summarize academic papers for a personal research notebook.',
    `Write every field in ${language}.`,
    'Respond with a JSON object with exactly these fields:',
    '"shortSummary" (2-3 sentences), "longSummary" (3-5 paragraphs),',
    '"contributions", "limitations", "ideas" (each a short bulleted list as one string),',
    '"keywords" (an array of 3-8 short strings).',
  ].join(' ');

  return { system, user: `Paper text:\n\n${text}` };
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) {
    return value
      .filter((entry): entry is string => typeof entry === 'string')
      .map((entry) => `- ${entry}`)
      .join('\n');
  }
  return '';
}

/**
 * Validate the model's JSON answer
 *
 * @throws Error when the content is not a JSON object with the summary fields
 */
export function parseSummary(content: string): Summary {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error('Summary response is not valid JSON', { cause: error });
  }
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Summary response is not a JSON object');
  }

  const record: Record<string, unknown> = { ...parsed };
  const shortSummary = asText(record.shortSummary);
  const longSummary = asText(record.longSummary);
  if (!shortSummary || !longSummary) {
    throw new Error('Summary response is missing shortSummary or longSummary');
  }

  const keywords = Array.isArray(record.keywords)
    ? record.keywords.filter((k): k is string => typeof k === 'string' && k.trim().length > 0).map((k) => k.trim())
    : [];

  return {
    shortSummary,
    longSummary,
    sections: {
      contributions: asText(record.contributions),
      limitations: asText(record.limitations),
      ideas: asText(record.ideas),
    },
    keywords,
  };
}

/**
 * Convert SDK errors into ApiRequestError for the shared classifier
 */
export function toApiRequestError(error: unknown): unknown {
  if (error instanceof OpenAI.APIConnectionError) {
    return new ApiRequestError(`OpenAI connection error: ${error.message}`, 0, { code: 'ECONNECTION', cause: error });
  }
  if (error instanceof OpenAI.APIError) {
    const header = error.headers?.['retry-after'];
    return new ApiRequestError(`OpenAI API error: ${error.message}`, error.status ?? 0, {
      code: error.code ?? undefined,
      retryAfter: parseRetryAfter(header ?? null),
      cause: error,
    });
  }
  return error;
}

export class OpenAISummarizer implements Summarizer {
  private readonly client: Pick<OpenAI, 'chat'>;
  private readonly model: string;
  private readonly log: Logger;

  constructor(options: OpenAISummarizerOptions) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeout ?? 120_000,
        maxRetries: 0,
      });
    this.model = options.model ?? DEFAULT_MODEL;
    this.log = (options.logger ?? defaultLogger).child({ component: 'openai' });
  }

  async summarize(request: SummaryRequest): Promise<Summary> {
    const model = request.model ?? this.model;
    const { system, user } = buildPrompt(request);

    const content: ChatCompletionContentPart[] = [{ type: 'text', text: user }];
    for (const image of request.images ?? []) {
      content.push({
        type: 'image_url',
        image_url: { url: `data:${image.mimeType};base64,${Buffer.from(image.data).toString('base64')}` },
      });
    }

    this.log.debug('Requesting summary', { model, chars: request.text.length, images: request.images?.length ?? 0 });

    let answer: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model,
        response_format: { type: 'json_object' },
        temperature: 0.3,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content },
        ],
      });
      answer = completion.choices[0]?.message.content;
    } catch (error) {
      throw toApiRequestError(error);
    }

    if (!answer) {
      throw new Error('Summary response was empty');
    }
    return parseSummary(answer);
  }
}
