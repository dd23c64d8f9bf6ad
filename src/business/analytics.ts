/**
 * Post-processing for the business text endpoints.
 *
 * Pure functions over worker results: label normalisation, grouping,
 * summary metrics and plain text statistics.
 */

import { z } from 'zod';
import { toGatewayError, validationError } from '../api/errors.js';
import type { ClassifyResult, Entity, SentimentResult } from '../inference/schemas.js';

export const WORDS_PER_MINUTE = 200;
export const MIN_SUMMARY_WORDS = 10;
export const DEFAULT_TRANSLATION_PAIRS = ['es-en', 'en-es'] as const;

export type SentimentLabel = 'very_negative' | 'negative' | 'neutral' | 'positive' | 'very_positive';
export type SentimentIntensity = 'high' | 'medium' | 'low';

const SENTIMENT_LABELS: Readonly<Record<string, SentimentLabel>> = {
  POSITIVE: 'positive',
  NEGATIVE: 'negative',
  NEUTRAL: 'neutral',
  LABEL_0: 'very_negative',
  LABEL_1: 'negative',
  LABEL_2: 'neutral',
  LABEL_3: 'positive',
  LABEL_4: 'very_positive',
};

// Star ratings, as numbers or as "N star(s)"
const STAR_LABELS: readonly SentimentLabel[] = ['very_negative', 'negative', 'neutral', 'positive', 'very_positive'];

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Map a model label onto the five-step scale. Unknown labels are
 * passed through lower-cased.
 */
export function normalizeSentimentLabel(label: string | number): string {
  const stars = typeof label === 'number' ? label : parseStars(label);
  if (stars !== undefined) {
    return STAR_LABELS[stars - 1] ?? String(label).toLowerCase();
  }
  return SENTIMENT_LABELS[String(label).toUpperCase()] ?? String(label).toLowerCase();
}

function parseStars(label: string): number | undefined {
  const match = /^([1-5]) stars?$/i.exec(label.trim());
  return match ? Number(match[1]) : undefined;
}

export function sentimentIntensity(sentiment: string): SentimentIntensity {
  if (sentiment.startsWith('very_')) {
    return 'high';
  }
  if (sentiment === 'positive' || sentiment === 'negative') {
    return 'medium';
  }
  return 'low';
}

export interface SentimentReport {
  text: string;
  sentiment: string;
  score: number;
  intensity: SentimentIntensity;
  language: string;
  character_count: number;
}

export function buildSentimentReport(text: string, result: SentimentResult, language?: string): SentimentReport {
  const sentiment = normalizeSentimentLabel(result.label);
  return {
    text: truncate(text, 200),
    sentiment,
    score: round(result.score, 4),
    intensity: sentimentIntensity(sentiment),
    language: language ?? 'auto-detected',
    character_count: text.length,
  };
}

export interface EntityMention {
  text: string;
  score: number;
  start: number;
  end: number;
}

export interface EntityReport {
  text: string;
  entities: Record<string, EntityMention[]>;
  counts: Record<string, number>;
  total_entities: number;
  entity_types_found: string[];
}

/**
 * Group entities by type, keeping only `entityTypes` when given.
 * Types are listed in order of first appearance.
 */
export function buildEntityReport(text: string, found: readonly Entity[], entityTypes?: readonly string[]): EntityReport {
  const wanted = entityTypes && entityTypes.length > 0 ? new Set(entityTypes) : undefined;
  const kept = wanted ? found.filter((entity) => wanted.has(entity.entity_group)) : [...found];

  const grouped = new Map<string, EntityMention[]>();
  for (const entity of kept) {
    let mentions = grouped.get(entity.entity_group);
    if (!mentions) {
      mentions = [];
      grouped.set(entity.entity_group, mentions);
    }
    mentions.push({
      text: entity.word,
      score: round(entity.score, 4),
      start: entity.start,
      end: entity.end,
    });
  }

  const entities: Record<string, EntityMention[]> = {};
  const counts: Record<string, number> = {};
  for (const [type, mentions] of grouped) {
    entities[type] = mentions;
    counts[type] = mentions.length;
  }

  return {
    text: truncate(text, 300),
    entities,
    counts,
    total_entities: kept.length,
    entity_types_found: [...grouped.keys()],
  };
}

export interface ClassificationReport {
  text: string;
  labels: string[];
  scores: number[];
  top_category: string;
  confidence: number;
  multi_label: boolean;
}

export function buildClassificationReport(
  text: string,
  result: ClassifyResult,
  multiLabel: boolean
): ClassificationReport {
  const scores = result.scores.map((score) => round(score, 4));
  return {
    text,
    labels: result.labels,
    scores,
    top_category: result.labels[0] ?? '',
    confidence: scores[0] ?? 0,
    multi_label: multiLabel,
  };
}

/**
 * Summary bounds for a request. Texts under ten words are refused
 * before any model is touched.
 */
export function summaryBounds(text: string, maxLength: number, minLength?: number): { maxLength: number; minLength: number } {
  if (countWords(text) < MIN_SUMMARY_WORDS) {
    throw validationError(`Text must contain at least ${MIN_SUMMARY_WORDS} words to be summarized`, {
      field: 'text',
    });
  }
  return {
    maxLength,
    minLength: minLength ?? Math.max(30, Math.floor(maxLength / 3)),
  };
}

export interface SummaryReport {
  original_length: { words: number; characters: number };
  summary_length: { words: number; characters: number };
  compression_ratio: number;
  compression_percentage: string;
  summary: string;
  type: 'abstractive' | 'extractive';
  reading_time_saved: string;
}

export function buildSummaryReport(
  text: string,
  summary: string,
  type: 'abstractive' | 'extractive'
): SummaryReport {
  const words = countWords(text);
  const summaryWords = countWords(summary);
  const ratio = words > 0 ? summaryWords / words : 0;

  return {
    original_length: { words, characters: text.length },
    summary_length: { words: summaryWords, characters: summary.length },
    compression_ratio: round(ratio, 3),
    compression_percentage: `${(ratio * 100).toFixed(1)}%`,
    summary,
    type,
    reading_time_saved: `${round((words - summaryWords) / WORDS_PER_MINUTE, 1).toFixed(1)} min`,
  };
}

const PairsOptionSchema = z.array(z.string().regex(/^[a-z]{2}-[a-z]{2}$/));

/**
 * Language pairs a translation model accepts, from its `pairs` option.
 */
export function supportedPairs(options: Record<string, unknown>): string[] {
  const parsed = PairsOptionSchema.safeParse(options.pairs);
  return parsed.success && parsed.data.length > 0 ? parsed.data : [...DEFAULT_TRANSLATION_PAIRS];
}

export function assertSupportedPair(source: string, target: string, pairs: readonly string[]): void {
  if (!pairs.includes(`${source}-${target}`)) {
    throw validationError(`Unsupported language pair ${source}-${target}; supported: ${pairs.join(', ')}`, {
      field: 'target_lang',
    });
  }
}

export interface TranslationReport {
  original: { text: string; language: string; character_count: number };
  translation: { text: string; language: string; character_count: number };
  pair: string;
}

export function buildTranslationReport(
  text: string,
  translated: string,
  source: string,
  target: string
): TranslationReport {
  return {
    original: { text, language: source, character_count: text.length },
    translation: { text: translated, language: target, character_count: translated.length },
    pair: `${source}→${target}`,
  };
}

export type Complexity = 'alta' | 'media' | 'baja';

export interface TextStatistics {
  words: number;
  characters: number;
  sentences: number;
  paragraphs: number;
  average_word_length: number;
  average_words_per_sentence: number;
  reading_time_minutes: number;
  complexity: Complexity;
}

export function textStatistics(text: string): TextStatistics {
  const words = splitWords(text);
  const sentences = text.split('.').filter((sentence) => sentence.trim().length > 0).length;
  const paragraphs = text.split('\n\n').filter((paragraph) => paragraph.trim().length > 0).length;
  const letters = words.reduce((sum, word) => sum + word.length, 0);
  const wordsPerSentence = words.length / Math.max(sentences, 1);

  return {
    words: words.length,
    characters: text.length,
    sentences,
    paragraphs,
    average_word_length: round(letters / Math.max(words.length, 1), 2),
    average_words_per_sentence: round(wordsPerSentence, 1),
    reading_time_minutes: round(words.length / WORDS_PER_MINUTE, 1),
    complexity: wordsPerSentence > 20 ? 'alta' : wordsPerSentence > 10 ? 'media' : 'baja',
  };
}

export interface FailedStep {
  status: 'error';
  code: string;
  message: string;
}

/**
 * A step's error as reported in place of its result. Internal errors
 * keep their code but not their message.
 */
export function failedStep(error: unknown): FailedStep {
  const gatewayError = toGatewayError(error, 'BackendError');
  return {
    status: 'error',
    code: gatewayError.code,
    message: gatewayError.code === 'InternalError' ? 'Internal server error' : gatewayError.message,
  };
}

export function isFailedStep(value: unknown): value is FailedStep {
  return typeof value === 'object' && value !== null && 'status' in value && value.status === 'error';
}

/**
 * Share of successful steps as a whole percentage, "0%" when nothing ran.
 */
export function successRate(steps: readonly unknown[]): string {
  if (steps.length === 0) {
    return '0%';
  }
  const ok = steps.filter((step) => !isFailedStep(step)).length;
  return `${Math.round((ok / steps.length) * 100)}%`;
}
