/**
 * Unit tests for configuration loading
 */

import { DEFAULTS, loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('Configuration', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      dataDirectory: 'data',
      dbDirectory: 'db',
      chunking: { chunkSize: 400, overlap: 60 },
      embedding: {
        provider: 'hashing',
        dimensions: 384,
        batchSize: 32,
        model: undefined,
        apiUrl: undefined,
        apiKey: undefined
      },
      groq: {
        apiKey: '',
        model: DEFAULTS.groqModel,
        temperature: 0.2,
        maxTokens: 512,
        maxRetries: 2,
        timeoutMs: 60000
      },
      topK: 3,
      maxPromptChars: 6000,
      defaultLocation: 'Delhi',
      weatherTimeoutMs: 5000
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      DATA_DIR: 'pdfs',
      CHUNK_SIZE: '800',
      CHUNK_OVERLAP: '100',
      TOP_K: '5',
      DEFAULT_LOCATION: 'Nagpur',
      GROQ_API_KEY: 'test-api-key',
      LLM_TEMPERATURE: '0.5',
      EMBEDDING_PROVIDER: 'OpenAI',
      EMBEDDING_MODEL: 'test-embed',
      EMBEDDING_API_URL: 'https://embeddings.test/v1',
      EMBEDDING_API_KEY: 'test-key'
    });

    expect(config.dataDirectory).toBe('pdfs');
    expect(config.chunking).toEqual({ chunkSize: 800, overlap: 100 });
    expect(config.topK).toBe(5);
    expect(config.defaultLocation).toBe('Nagpur');
    expect(config.groq.apiKey).toBe('test-api-key');
    expect(config.groq.temperature).toBe(0.5);
    expect(config.embedding).toMatchObject({
      provider: 'openai',
      model: 'test-embed',
      apiUrl: 'https://embeddings.test/v1',
      apiKey: 'test-key'
    });
  });

  it('should let CLI overrides win over the environment', () => {
    const config = loadConfig(
      { DATA_DIR: 'pdfs', DB_DIR: 'store', TOP_K: '5', GROQ_API_KEY: 'env-key' },
      { dataDirectory: 'other', dbDirectory: 'other-db', topK: 7, groqApiKey: 'test-api-key' }
    );

    expect(config.dataDirectory).toBe('other');
    expect(config.dbDirectory).toBe('other-db');
    expect(config.topK).toBe(7);
    expect(config.groq.apiKey).toBe('test-api-key');
  });

  describe('Validation', () => {
    it('should reject a non-integer chunk size', () => {
      expect(() => loadConfig({ CHUNK_SIZE: 'big' })).toThrow('CHUNK_SIZE must be an integer, got "big"');
    });

    it('should reject an overlap as large as the chunk size', () => {
      expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
        'CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100)'
      );
    });

    it('should reject a top-k below 1', () => {
      expect(() => loadConfig({ TOP_K: '0' })).toThrow('TOP_K must be at least 1, got 0');
    });

    it('should reject an unknown embedding provider', () => {
      expect(() => loadConfig({ EMBEDDING_PROVIDER: 'magic' })).toThrow(ConfigError);
    });

    it('should reject a non-numeric temperature', () => {
      expect(() => loadConfig({ LLM_TEMPERATURE: 'warm' })).toThrow('LLM_TEMPERATURE must be a number, got "warm"');
    });
  });
});
