/**
 * Configuration
 * Built once at start-up from environment variables (and CLI overrides),
 * then passed explicitly to the pipelines.
 */

import { AppConfig, EmbeddingProvider } from './types';
import { ConfigError } from './errors';

export const DEFAULTS = {
  dataDirectory: 'data',
  dbDirectory: 'db',
  chunkSize: 400,
  chunkOverlap: 60,
  topK: 3,
  maxPromptChars: 6000,
  defaultLocation: 'Delhi',
  weatherTimeoutMs: 5000,
  groqModel: 'llama-3.1-8b-instant',
  llmTemperature: 0.2,
  llmMaxTokens: 512,
  llmMaxRetries: 2,
  llmTimeoutMs: 60000,
  embeddingProvider: 'hashing',
  embeddingDimensions: 384,
  embeddingBatchSize: 32
};

export interface ConfigOverrides {
  dataDirectory?: string;
  dbDirectory?: string;
  groqApiKey?: string;
  topK?: number;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  { integer = true, min = 0 }: { integer?: boolean; min?: number } = {}
): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigError(`${name} must be ${integer ? 'an integer' : 'a number'}, got "${raw}"`);
  }
  if (value < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

function readProvider(env: Env): EmbeddingProvider {
  const raw = readString(env, 'EMBEDDING_PROVIDER', DEFAULTS.embeddingProvider).toLowerCase();
  if (raw === 'hashing' || raw === 'openai') {
    return raw;
  }
  throw new ConfigError(`EMBEDDING_PROVIDER must be "hashing" or "openai", got "${raw}"`);
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const chunkSize = readNumber(env, 'CHUNK_SIZE', DEFAULTS.chunkSize, { min: 1 });
  const overlap = readNumber(env, 'CHUNK_OVERLAP', DEFAULTS.chunkOverlap);
  if (overlap >= chunkSize) {
    throw new ConfigError(`CHUNK_OVERLAP (${overlap}) must be smaller than CHUNK_SIZE (${chunkSize})`);
  }

  const topK = overrides.topK ?? readNumber(env, 'TOP_K', DEFAULTS.topK, { min: 1 });
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ConfigError(`Top-k must be a positive integer, got ${topK}`);
  }

  const embeddingModel = env.EMBEDDING_MODEL?.trim();

  return {
    dataDirectory: overrides.dataDirectory ?? readString(env, 'DATA_DIR', DEFAULTS.dataDirectory),
    dbDirectory: overrides.dbDirectory ?? readString(env, 'DB_DIR', DEFAULTS.dbDirectory),
    chunking: { chunkSize, overlap },
    embedding: {
      provider: readProvider(env),
      dimensions: readNumber(env, 'EMBEDDING_DIMENSIONS', DEFAULTS.embeddingDimensions, { min: 1 }),
      batchSize: readNumber(env, 'EMBEDDING_BATCH_SIZE', DEFAULTS.embeddingBatchSize, { min: 1 }),
      model: embeddingModel || undefined,
      apiUrl: env.EMBEDDING_API_URL?.trim() || undefined,
      apiKey: env.EMBEDDING_API_KEY?.trim() || undefined
    },
    groq: {
      apiKey: overrides.groqApiKey ?? readString(env, 'GROQ_API_KEY', ''),
      model: readString(env, 'GROQ_MODEL', DEFAULTS.groqModel),
      temperature: readNumber(env, 'LLM_TEMPERATURE', DEFAULTS.llmTemperature, { integer: false }),
      maxTokens: readNumber(env, 'LLM_MAX_TOKENS', DEFAULTS.llmMaxTokens, { min: 1 }),
      maxRetries: readNumber(env, 'LLM_MAX_RETRIES', DEFAULTS.llmMaxRetries),
      timeoutMs: readNumber(env, 'LLM_TIMEOUT_MS', DEFAULTS.llmTimeoutMs, { min: 1 })
    },
    topK,
    maxPromptChars: readNumber(env, 'MAX_PROMPT_CHARS', DEFAULTS.maxPromptChars, { min: 1 }),
    defaultLocation: readString(env, 'DEFAULT_LOCATION', DEFAULTS.defaultLocation),
    weatherTimeoutMs: readNumber(env, 'WEATHER_TIMEOUT_MS', DEFAULTS.weatherTimeoutMs, { min: 1 })
  };
}
