import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { createGateway, type Gateway } from '../../src/gateway.js';
import type { Capability, RateLimitPolicy } from '../../src/types/auth.js';
import { FakeBackend } from '../helpers/fake-backend.js';
import { testConfig } from '../helpers/config.js';
import { createTestLogger } from '../helpers/mock-logger.js';

const TextsParams = z.object({ texts: z.array(z.string()) });

function createBackend(): FakeBackend {
  return new FakeBackend({
    handlers: {
      chat: () => ({
        message: { role: 'assistant', content: 'Hello there' },
        finish_reason: 'stop',
        usage: { total_tokens: 5 },
      }),
      complete: () => ({ text: 'done', tokens_used: 3 }),
      embed: (params) => ({ embeddings: TextsParams.parse(params).texts.map((text) => [text.length, 1]) }),
      transcribe: () => ({ text: ' hola mundo ', language: 'es', duration: 1.5 }),
      recognize: () => ({
        results: [{ text: 'STOP', confidence: 0.9, bbox: [[0, 0], [10, 5]] }],
        image_size: { width: 10, height: 5 },
      }),
      classify: () => ({ labels: ['billing', 'support'], scores: [0.8, 0.2] }),
      sentiment: () => ({ label: '4 stars', score: 0.75 }),
      entities: () => ({ entities: [{ entity_group: 'PER', word: 'Ana', score: 0.99, start: 0, end: 3 }] }),
      summarize: () => ({ summary_text: ' short summary ' }),
      translate: () => ({ translation_text: 'hello' }),
    },
  });
}

interface ApiResponse {
  status: number;
  body: unknown;
  headers: Headers;
}

describe('HTTP API', () => {
  let gateway: Gateway;
  let backend: FakeBackend;
  let baseUrl: string;
  let adminKey: string;

  async function request(
    method: 'GET' | 'POST',
    path: string,
    options: { key?: string; json?: unknown; raw?: Buffer | string; contentType?: string } = {}
  ): Promise<ApiResponse> {
    const headers: Record<string, string> = {};
    if (options.key !== undefined) {
      headers['x-api-key'] = options.key;
    }
    let body: Buffer | string | undefined;
    if (options.json !== undefined) {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(options.json);
    } else if (options.raw !== undefined) {
      headers['content-type'] = options.contentType ?? 'application/octet-stream';
      body = options.raw;
    }

    const response = await fetch(`${baseUrl}${path}`, { method, headers, body });
    const text = await response.text();
    return {
      status: response.status,
      body: text.length > 0 ? JSON.parse(text) : undefined,
      headers: response.headers,
    };
  }

  async function keyWith(capabilities: Capability[], rateLimit?: RateLimitPolicy): Promise<string> {
    const created = await gateway.components.registry.create({ owner: 'test client', capabilities, rateLimit });
    return created.rawKey;
  }

  beforeEach(async () => {
    backend = createBackend();
    gateway = createGateway(testConfig(), { backend, logger: createTestLogger() });
    const address = await gateway.start();
    baseUrl = `http://127.0.0.1:${address.port}`;
    adminKey = await keyWith(['admin']);
  });

  afterEach(async () => {
    await gateway.stop();
  });

  describe('health and errors', () => {
    it('answers the liveness check without a key', async () => {
      const res = await request('GET', '/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'ok', models: { ready: 0, loading: 0, failed: 0 } });
    });

    it('rejects a request without a key', async () => {
      const res = await request('POST', '/embeddings', { json: { texts: ['a'] } });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: { code: 'AuthError', message: 'API key missing' } });
    });

    it('reports malformed JSON as a validation error', async () => {
      const key = await keyWith(['embed']);

      const res = await request('POST', '/embeddings', { key, raw: '{"texts": [', contentType: 'application/json' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: { code: 'ValidationError', message: 'Malformed JSON body', details: { field: 'body' } },
      });
    });

    it('checks the key before reading the body', async () => {
      const res = await request('POST', '/embeddings', { raw: '{"texts": [', contentType: 'application/json' });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: { code: 'AuthError', message: 'API key missing' } });
    });

    it('refuses an oversized upload from an unknown key as unauthenticated', async () => {
      const oversized = Buffer.alloc(2 * 1024 * 1024, 1);

      const res = await request('POST', '/transcribe', { key: 'ai_unknownkey', raw: oversized, contentType: 'audio/wav' });

      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ error: { code: 'AuthError' } });
    });

    it('reports an oversized upload from a valid key as a validation error', async () => {
      const key = await keyWith(['transcribe']);
      const oversized = Buffer.alloc(2 * 1024 * 1024, 1);

      const res = await request('POST', '/transcribe', { key, raw: oversized, contentType: 'audio/wav' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: { code: 'ValidationError', message: 'Request body too large', details: { field: 'body' } },
      });
      expect(backend.loads).toEqual([]);
    });

    it('answers unknown routes with NotFound', async () => {
      const res = await request('GET', '/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: { code: 'NotFound', message: 'Route GET /nope not found' } });
    });

    it('maps a worker failure to 502', async () => {
      backend.handlers.classify = () => {
        throw new Error('model crashed');
      };
      const key = await keyWith(['business']);

      const res = await request('POST', '/business/classify', {
        key,
        json: { text: 'invoice overdue', categories: ['billing'] },
      });

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ error: { code: 'BackendError', message: 'model crashed' } });
    });
  });

  describe('authorization and quota', () => {
    it('refuses a capability the key lacks', async () => {
      const key = await keyWith(['embed']);

      const res = await request('POST', '/transcribe', { key, raw: Buffer.from('RIFFdata'), contentType: 'audio/wav' });

      expect(res.status).toBe(403);
      expect(res.body).toMatchObject({ error: { code: 'PermissionDenied' } });
      expect(backend.loads).toEqual([]);
    });

    it('refuses a key revoked mid-session', async () => {
      const key = await keyWith(['embed']);
      expect((await request('POST', '/embeddings', { key, json: { texts: ['a'] } })).status).toBe(200);

      const revoked = await request('POST', '/admin/keys/revoke', {
        key: adminKey,
        json: { key_prefix: key.slice(0, 12) },
      });
      expect(revoked.status).toBe(200);
      expect(revoked.body).toMatchObject({ success: true, key: { status: 'revoked' } });

      const res = await request('POST', '/embeddings', { key, json: { texts: ['a'] } });
      expect(res.status).toBe(401);
    });

    it('returns 429 with Retry-After once the window is used up', async () => {
      const key = await keyWith(['embed'], { maxRequests: 2, windowMs: 60_000 });

      const first = await request('POST', '/embeddings', { key, json: { texts: ['a'] } });
      expect(first.headers.get('x-ratelimit-limit')).toBe('2');
      expect(first.headers.get('x-ratelimit-remaining')).toBe('1');
      expect((await request('POST', '/embeddings', { key, json: { texts: ['a'] } })).status).toBe(200);

      const res = await request('POST', '/embeddings', { key, json: { texts: ['a'] } });

      expect(res.status).toBe(429);
      expect(res.body).toMatchObject({ error: { code: 'RateLimitExceeded', details: { limit: 2, windowMs: 60_000 } } });
      const retryAfter = Number(res.headers.get('retry-after'));
      expect(retryAfter).toBeGreaterThan(0);
      expect(retryAfter).toBeLessThanOrEqual(60);
      expect(res.headers.get('x-ratelimit-remaining')).toBe('0');
      expect(backend.calls.filter((call) => call.method === 'embed')).toHaveLength(2);
    });

    it('does not charge quota for the business health check', async () => {
      const key = await keyWith(['business'], { maxRequests: 1, windowMs: 60_000 });

      const health = await request('GET', '/business/health', { key });
      expect((await request('GET', '/business/health', { key })).status).toBe(200);
      expect(health.status).toBe(200);
      expect(health.body).toMatchObject({
        overall: 'healthy',
        api_key: key.slice(0, 12),
        services: {
          classifier: { model_id: 'classify:zs', enabled: true, state: 'unloaded' },
          translator: { model_id: 'translate:es-en', enabled: true, state: 'unloaded' },
        },
      });

      expect((await request('POST', '/business/sentiment', { key, json: { text: 'good' } })).status).toBe(200);
      expect((await request('POST', '/business/sentiment', { key, json: { text: 'good' } })).status).toBe(429);
    });

    it('records authenticated requests in the usage log', async () => {
      const key = await keyWith(['embed']);
      await request('POST', '/embeddings', { key, json: { texts: ['a'] } });

      await vi.waitFor(() => {
        expect(gateway.components.usageLog.entries(key.slice(0, 12))).toEqual([
          expect.objectContaining({ endpoint: expect.stringContaining('/embeddings'), method: 'POST', status: 200 }),
        ]);
      });
    });
  });

  describe('inference routes', () => {
    it('embeds texts in input order', async () => {
      const key = await keyWith(['embed']);

      const res = await request('POST', '/embeddings', { key, json: { texts: ['hello', 'hi there'] } });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        embeddings: [
          [5, 1],
          [8, 1],
        ],
        model: 'embed:mini',
        dimensions: 2,
        tokens_used: 3,
      });
    });

    it('compares two vectors without touching a model', async () => {
      const key = await keyWith(['embed']);

      const res = await request('POST', '/embeddings/similarity', {
        key,
        json: { embeddings: [[1, 0], [1, 1]] },
      });

      expect(res.body).toEqual({ similarity: 0.707107, similarity_percentage: 70.71 });
      expect(backend.loads).toEqual([]);
    });

    it('chats with the generation model', async () => {
      const key = await keyWith(['generate']);

      const res = await request('POST', '/generate/chat', {
        key,
        json: { messages: [{ role: 'user', content: 'Hi' }] },
      });

      expect(res.body).toEqual({
        message: { role: 'assistant', content: 'Hello there' },
        model: 'llm:tiny',
        finish_reason: 'stop',
        usage: { total_tokens: 5 },
      });
    });

    it('flattens messages into a prompt for completion', async () => {
      const key = await keyWith(['generate']);

      const res = await request('POST', '/generate/completion', {
        key,
        json: {
          messages: [
            { role: 'system', content: 'Be brief' },
            { role: 'user', content: 'Hi' },
          ],
          max_tokens: 20,
        },
      });

      expect(res.body).toEqual({ text: 'done', model: 'llm:tiny', finish_reason: 'stop', tokens_used: 3 });
      expect(backend.calls.find((call) => call.method === 'complete')?.params).toMatchObject({
        prompt: 'system: Be brief\nuser: Hi\nassistant: ',
        max_tokens: 20,
        temperature: 0.7,
      });
    });

    it('transcribes an uploaded audio file', async () => {
      const key = await keyWith(['transcribe']);
      const audio = Buffer.from('RIFFdata');

      const res = await request('POST', '/transcribe?language=es', { key, raw: audio, contentType: 'audio/wav' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        text: 'hola mundo',
        language: 'es',
        duration: 1.5,
        confidence: null,
        segments: [],
        model: 'whisper:tiny',
      });
      expect(backend.calls[0].params).toEqual({
        audio_base64: audio.toString('base64'),
        content_type: 'audio/wav',
        language: 'es',
        task: 'transcribe',
        timestamps: false,
      });
    });

    it('refuses unsupported audio types and non-English speech translation', async () => {
      const key = await keyWith(['transcribe']);

      const wrongType = await request('POST', '/transcribe', { key, raw: 'plain', contentType: 'text/plain' });
      expect(wrongType.status).toBe(400);
      expect(wrongType.body).toMatchObject({ error: { code: 'ValidationError', details: { field: 'content-type' } } });

      const french = await request('POST', '/transcribe/translate?target_language=fr', {
        key,
        raw: Buffer.from('RIFFdata'),
        contentType: 'audio/wav',
      });
      expect(french.status).toBe(400);
      expect(french.body).toMatchObject({ error: { message: 'Speech translation only targets English' } });
      expect(backend.calls).toEqual([]);
    });

    it('recognizes text in a base64 image', async () => {
      const key = await keyWith(['ocr']);

      const res = await request('POST', '/ocr/recognize-base64', { key, json: { image: 'aGVs\nbG8=' } });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        texts: [{ text: 'STOP', confidence: 0.9 }],
        image_size: { width: 10, height: 5 },
        language: 'es,en',
      });
      expect(backend.calls[0].params).toEqual({ image_base64: 'aGVsbG8=', languages: ['es', 'en'], detail: true });
    });
  });

  describe('informational routes', () => {
    it('describes the generation model without loading it', async () => {
      const key = await keyWith(['generate']);

      const res = await request('GET', '/generate/model-info', { key });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        model_id: 'llm:tiny',
        kind: 'generate',
        state: 'unloaded',
        loaded: false,
        enabled: true,
        pinned: false,
        estimated_memory_mb: 100,
        reserved_memory_mb: 0,
        max_concurrent: 1,
        load_count: 0,
        last_error: null,
        options: {},
      });
      expect(res.headers.get('x-ratelimit-remaining')).toBe('99');
      expect(backend.loads).toEqual([]);
    });

    it('reports the embedding model as loaded after use', async () => {
      const key = await keyWith(['embed']);
      await request('POST', '/embeddings', { key, json: { texts: ['a'] } });

      const res = await request('GET', '/embeddings/model-info', { key });

      expect(res.body).toMatchObject({
        model_id: 'embed:mini',
        state: 'ready',
        loaded: true,
        reserved_memory_mb: 100,
        max_concurrent: 2,
        load_count: 1,
        max_texts: 100,
        normalized_by_default: true,
      });
    });

    it('lists accepted audio formats and speech languages', async () => {
      const key = await keyWith(['transcribe']);

      const formats = await request('GET', '/transcribe/supported-formats', { key });
      expect(formats.body).toEqual({
        supported_formats: [
          'audio/mpeg',
          'audio/wav',
          'audio/x-wav',
          'audio/mp4',
          'audio/x-m4a',
          'audio/ogg',
          'audio/webm',
          'audio/flac',
        ],
        max_size_mb: 1,
      });

      const languages = await request('GET', '/transcribe/supported-languages', { key });
      expect(languages.body).toMatchObject({ total: 12, auto_detect: true });
      expect(languages.body).toMatchObject({ languages: expect.arrayContaining(['es', 'en', 'ja']) });
    });

    it('lists OCR languages and reports OCR health without charging quota', async () => {
      const key = await keyWith(['ocr'], { maxRequests: 1, windowMs: 60_000 });

      const health = await request('GET', '/ocr/health', { key });
      expect(health.status).toBe(200);
      expect(health.body).toEqual({
        status: 'inactive',
        model_id: 'ocr:basic',
        state: 'unloaded',
        enabled: true,
        languages_loaded: [],
      });

      const languages = await request('GET', '/ocr/supported-languages', { key });
      expect(languages.body).toEqual({ supported_languages: ['es', 'en'], total_supported: 2 });
      expect((await request('GET', '/ocr/supported-languages', { key })).status).toBe(429);
    });

    it('refuses informational routes without a key', async () => {
      expect((await request('GET', '/generate/model-info')).status).toBe(401);
      expect((await request('GET', '/ocr/health')).status).toBe(401);
    });
  });

  describe('OCR batches', () => {
    it('recognizes each image and reports a failed one in its slot', async () => {
      const ImageParams = z.object({ image_base64: z.string() });
      backend.handlers.recognize = (params) => {
        if (ImageParams.parse(params).image_base64 === 'YmFk') {
          throw new Error('unreadable image');
        }
        return { results: [{ text: 'STOP', confidence: 0.9, bbox: [[0, 0], [10, 5]] }], image_size: { width: 10, height: 5 } };
      };
      const key = await keyWith(['ocr']);

      const res = await request('POST', '/ocr/batch', { key, json: { images: ['aGVs\nbG8=', 'YmFk'], languages: ['en'] } });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        results: [
          { index: 0, status: 'ok', texts: [{ text: 'STOP', confidence: 0.9 }], language: 'en' },
          { index: 1, status: 'error', code: 'BackendError', message: 'unreadable image' },
        ],
        succeeded: 1,
        failed: 1,
      });
      expect(res.headers.get('x-ratelimit-remaining')).toBe('99');
      expect(backend.calls.map((call) => call.params)).toEqual([
        { image_base64: 'aGVsbG8=', languages: ['en'], detail: true },
        { image_base64: 'YmFk', languages: ['en'], detail: true },
      ]);
    });

    it('refuses more than ten images', async () => {
      const key = await keyWith(['ocr']);

      const res = await request('POST', '/ocr/batch', { key, json: { images: Array.from({ length: 11 }, () => 'aGVsbG8=') } });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: { code: 'ValidationError' } });
      expect(backend.calls).toEqual([]);
    });
  });

  describe('business routes', () => {
    it('translates a supported pair and refuses others', async () => {
      const key = await keyWith(['business']);

      const ok = await request('POST', '/business/translate', { key, json: { text: 'hola' } });
      expect(ok.body).toEqual({
        original: { text: 'hola', language: 'es', character_count: 4 },
        translation: { text: 'hello', language: 'en', character_count: 5 },
        pair: 'es→en',
      });

      const bad = await request('POST', '/business/translate', {
        key,
        json: { text: 'bonjour', source_lang: 'fr', target_lang: 'en' },
      });
      expect(bad.status).toBe(400);
      expect(bad.body).toMatchObject({
        error: { code: 'ValidationError', message: 'Unsupported language pair fr-en; supported: es-en, en-es' },
      });
    });

    it('reports a failed step in place during comprehensive analysis', async () => {
      const key = await keyWith(['business'], { maxRequests: 1, windowMs: 60_000 });

      const res = await request('POST', '/business/analyze/comprehensive', { key, json: { text: 'Ana loves Lima.' } });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        metadata: { api_key: key.slice(0, 12), text_length: 15, word_count: 3, success_rate: '67%' },
        analysis: {
          sentiment: { sentiment: 'positive', score: 0.75, intensity: 'medium' },
          entities: { total_entities: 1, entity_types_found: ['PER'] },
          summary: {
            status: 'error',
            code: 'ValidationError',
            message: 'Text must contain at least 10 words to be summarized',
          },
        },
        statistics: { words: 3, sentences: 1 },
      });
      expect(backend.calls.map((call) => call.method)).toEqual(['sentiment', 'entities']);
    });
  });

  describe('admin routes', () => {
    it('creates a key that works immediately and lists it', async () => {
      const created = await request('POST', '/admin/keys/create', {
        key: adminKey,
        json: { owner: 'new client', capabilities: ['embed'] },
      });

      expect(created.status).toBe(201);
      const CreatedBody = z.object({ api_key: z.string(), key_prefix: z.string() });
      const { api_key: apiKey, key_prefix: keyPrefix } = CreatedBody.parse(created.body);
      expect(apiKey.startsWith('ai_')).toBe(true);
      expect(keyPrefix).toBe(apiKey.slice(0, 12));

      expect((await request('POST', '/embeddings', { key: apiKey, json: { texts: ['a'] } })).status).toBe(200);

      const list = await request('GET', '/admin/keys/list', { key: adminKey });
      expect(list.body).toMatchObject({
        total: 2,
        keys: expect.arrayContaining([expect.objectContaining({ key_prefix: keyPrefix, owner: 'new client' })]),
      });
      expect(JSON.stringify(list.body)).not.toContain(apiKey);
    });

    it('refuses admin routes to keys without the admin capability', async () => {
      const key = await keyWith(['embed', 'generate', 'transcribe', 'ocr', 'business']);

      const res = await request('GET', '/admin/keys/list', { key });

      expect(res.status).toBe(403);
    });

    it('reports key info and statistics', async () => {
      const key = await keyWith(['embed']);
      const prefix = key.slice(0, 12);
      await request('POST', '/embeddings', { key, json: { texts: ['a'] } });

      const info = await request('GET', `/admin/keys/info/${prefix}`, { key: adminKey });
      expect(info.body).toMatchObject({
        key_prefix: prefix,
        status: 'active',
        expired: false,
        expires_at: null,
        usage: { authorizations: 1, by_capability: { embed: 1 } },
      });

      const stats = await request('GET', '/admin/keys/stats', { key: adminKey });
      expect(stats.body).toMatchObject({ total_keys: 2, active_keys: 2, admin_keys: 1 });

      const missing = await request('GET', '/admin/keys/info/ai_unknown00', { key: adminKey });
      expect(missing.status).toBe(404);
    });

    it('shows model slots and unloads an idle model', async () => {
      const key = await keyWith(['embed']);
      await request('POST', '/embeddings', { key, json: { texts: ['a'] } });

      const models = await request('GET', '/admin/models', { key: adminKey });
      expect(models.body).toMatchObject({
        slots: expect.arrayContaining([expect.objectContaining({ modelId: 'embed:mini', state: 'ready' })]),
        routes: { embed: 'embed:mini' },
      });

      const unloaded = await request('POST', '/admin/models/unload', { key: adminKey, json: { model_id: 'embed:mini' } });
      expect(unloaded.status).toBe(200);
      expect(unloaded.body).toMatchObject({ success: true, model_id: 'embed:mini', slot: { state: 'unloaded' } });
      expect(backend.unloads).toEqual(['embed:mini']);
    });
  });
});
