import { describe, it, expect } from 'vitest';
import {
  assertSupportedPair,
  buildClassificationReport,
  buildEntityReport,
  buildSentimentReport,
  buildSummaryReport,
  buildTranslationReport,
  failedStep,
  normalizeSentimentLabel,
  sentimentIntensity,
  successRate,
  summaryBounds,
  supportedPairs,
  textStatistics,
  truncate,
} from '../../../src/business/analytics.js';
import { GatewayError } from '../../../src/api/errors.js';

describe('business analytics', () => {
  describe('sentiment', () => {
    it('maps star ratings and LABEL_n onto the five-step scale', () => {
      expect(normalizeSentimentLabel('1 star')).toBe('very_negative');
      expect(normalizeSentimentLabel('4 stars')).toBe('positive');
      expect(normalizeSentimentLabel(5)).toBe('very_positive');
      expect(normalizeSentimentLabel('LABEL_2')).toBe('neutral');
      expect(normalizeSentimentLabel('negative')).toBe('negative');
    });

    it('passes unknown labels through lower-cased', () => {
      expect(normalizeSentimentLabel('Mixed')).toBe('mixed');
      expect(normalizeSentimentLabel(9)).toBe('9');
    });

    it('derives intensity from the label', () => {
      expect(sentimentIntensity('very_positive')).toBe('high');
      expect(sentimentIntensity('negative')).toBe('medium');
      expect(sentimentIntensity('neutral')).toBe('low');
    });

    it('builds a report with a rounded score', () => {
      expect(buildSentimentReport('Great service', { label: '5 stars', score: 0.876543 })).toEqual({
        text: 'Great service',
        sentiment: 'very_positive',
        score: 0.8765,
        intensity: 'high',
        language: 'auto-detected',
        character_count: 13,
      });
    });
  });

  describe('entities', () => {
    const found = [
      { entity_group: 'PER', word: 'Ana', score: 0.99123, start: 0, end: 3 },
      { entity_group: 'LOC', word: 'Lima', score: 0.9, start: 12, end: 16 },
      { entity_group: 'PER', word: 'Luis', score: 0.8, start: 20, end: 24 },
    ];

    it('groups mentions by type in order of first appearance', () => {
      const report = buildEntityReport('Ana went to Lima with Luis', found);

      expect(report.entity_types_found).toEqual(['PER', 'LOC']);
      expect(report.counts).toEqual({ PER: 2, LOC: 1 });
      expect(report.total_entities).toBe(3);
      expect(report.entities.PER[0]).toEqual({ text: 'Ana', score: 0.9912, start: 0, end: 3 });
    });

    it('keeps only requested types', () => {
      const report = buildEntityReport('Ana went to Lima with Luis', found, ['LOC']);

      expect(report.entity_types_found).toEqual(['LOC']);
      expect(report.total_entities).toBe(1);
    });
  });

  describe('classification', () => {
    it('reports the first label as the top category', () => {
      expect(
        buildClassificationReport('invoice overdue', { labels: ['billing', 'support'], scores: [0.91234, 0.08766] }, false)
      ).toEqual({
        text: 'invoice overdue',
        labels: ['billing', 'support'],
        scores: [0.9123, 0.0877],
        top_category: 'billing',
        confidence: 0.9123,
        multi_label: false,
      });
    });
  });

  describe('summary', () => {
    const tenWords = 'one two three four five six seven eight nine ten';

    it('refuses texts under ten words', () => {
      expect(() => summaryBounds('too short to summarize', 100)).toThrow(
        expect.objectContaining({ code: 'ValidationError' })
      );
    });

    it('defaults the minimum length to a third of the maximum, at least 30', () => {
      expect(summaryBounds(tenWords, 150)).toEqual({ maxLength: 150, minLength: 50 });
      expect(summaryBounds(tenWords, 60)).toEqual({ maxLength: 60, minLength: 30 });
      expect(summaryBounds(tenWords, 60, 5)).toEqual({ maxLength: 60, minLength: 5 });
    });

    it('reports compression metrics', () => {
      const text = Array.from({ length: 400 }, () => 'word').join(' ');
      const report = buildSummaryReport(text, 'short summary here now', 'abstractive');

      expect(report.original_length).toEqual({ words: 400, characters: 1999 });
      expect(report.summary_length).toEqual({ words: 4, characters: 22 });
      expect(report.compression_ratio).toBe(0.01);
      expect(report.compression_percentage).toBe('1.0%');
      expect(report.reading_time_saved).toBe('2.0 min');
    });
  });

  describe('translation', () => {
    it('reads pairs from model options with a default', () => {
      expect(supportedPairs({ pairs: ['fr-en'] })).toEqual(['fr-en']);
      expect(supportedPairs({ pairs: 'es-en' })).toEqual(['es-en', 'en-es']);
      expect(supportedPairs({})).toEqual(['es-en', 'en-es']);
    });

    it('refuses unsupported pairs', () => {
      expect(() => assertSupportedPair('es', 'en', ['es-en'])).not.toThrow();
      expect(() => assertSupportedPair('en', 'fr', ['es-en', 'en-es'])).toThrow(
        'Unsupported language pair en-fr; supported: es-en, en-es'
      );
    });

    it('builds a report', () => {
      expect(buildTranslationReport('hola', 'hello', 'es', 'en')).toEqual({
        original: { text: 'hola', language: 'es', character_count: 4 },
        translation: { text: 'hello', language: 'en', character_count: 5 },
        pair: 'es→en',
      });
    });
  });

  describe('text statistics', () => {
    it('counts words, sentences and paragraphs', () => {
      const stats = textStatistics('The cat sat. The dog ran.\n\nBirds fly.');

      expect(stats).toMatchObject({
        words: 8,
        sentences: 3,
        paragraphs: 2,
        average_words_per_sentence: 2.7,
        complexity: 'baja',
      });
    });

    it('rates long sentences as complex', () => {
      const sentence = `${Array.from({ length: 25 }, () => 'word').join(' ')}.`;
      expect(textStatistics(sentence).complexity).toBe('alta');
    });
  });

  it('computes the success rate of steps', () => {
    expect(successRate([])).toBe('0%');
    expect(successRate([{ sentiment: 'x' }, { status: 'error', code: 'BackendError', message: 'down' }])).toBe('50%');
    expect(successRate([{}, {}, { status: 'error', code: 'X', message: 'y' }])).toBe('67%');
  });

  it('reports a failed step by code and hides internal messages', () => {
    expect(failedStep(new Error('worker gone'))).toEqual({ status: 'error', code: 'BackendError', message: 'worker gone' });
    expect(failedStep(new GatewayError('InternalError', 'stack detail'))).toEqual({
      status: 'error',
      code: 'InternalError',
      message: 'Internal server error',
    });
  });

  it('truncates long text with an ellipsis', () => {
    expect(truncate('abcdef', 3)).toBe('abc...');
    expect(truncate('abc', 3)).toBe('abc');
  });
});
