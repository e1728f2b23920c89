import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { ZodError } from 'zod';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      openaiApiKey: undefined,
      chromaUrl: 'http://localhost:8000',
      chatModel: 'gpt-4.1',
      embeddingModel: 'text-embedding-3-small',
      dataDir: path.resolve('./data'),
      chunkSize: 2000,
      chunkOverlap: 200,
      maxChunkSize: 3000,
      sessionExpiryHours: 4,
      ingestionConcurrency: 2,
      extractImages: false,
    });
  });

  it('should derive storage locations from the data directory', () => {
    const config = loadConfig({ TOGAF_DATA_DIR: '/srv/tutor' });

    expect(config.profilesDir).toBe(path.join('/srv/tutor', 'users', 'profiles'));
    expect(config.learningSessionsDir).toBe(path.join('/srv/tutor', 'users', 'learning_sessions'));
    expect(config.embeddingCacheFile).toBe(path.join('/srv/tutor', 'knowledge_base', 'embedding_cache.json'));
    expect(config.imagesDir).toBe(path.join('/srv/tutor', 'knowledge_base', 'images'));
  });

  it('should coerce numbers and flags from strings', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      TOGAF_CHUNK_SIZE: '1000',
      TOGAF_CHUNK_OVERLAP: '100',
      TOGAF_MAX_CHUNK_SIZE: '1500',
      TOGAF_EXTRACT_IMAGES: '1',
    });

    expect(config.openaiApiKey).toBe('test-key');
    expect([config.chunkSize, config.chunkOverlap, config.maxChunkSize]).toEqual([1000, 100, 1500]);
    expect(config.extractImages).toBe(true);
  });

  it('should treat an empty API key as missing', () => {
    expect(loadConfig({ OPENAI_API_KEY: '' }).openaiApiKey).toBeUndefined();
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ CHROMA_URL: 'not a url' })).toThrow(ZodError);
    expect(() => loadConfig({ TOGAF_SESSION_EXPIRY_HOURS: '-1' })).toThrow(ZodError);
    expect(() => loadConfig({ TOGAF_EXTRACT_IMAGES: 'yes' })).toThrow(ZodError);
  });

  it('should reject inconsistent chunk sizes', () => {
    expect(() => loadConfig({ TOGAF_CHUNK_OVERLAP: '2000' }))
      .toThrow('TOGAF_CHUNK_OVERLAP must be smaller than TOGAF_CHUNK_SIZE');
    expect(() => loadConfig({ TOGAF_MAX_CHUNK_SIZE: '1000' }))
      .toThrow('TOGAF_MAX_CHUNK_SIZE must be at least TOGAF_CHUNK_SIZE');
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
