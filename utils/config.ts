import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';

const numberFromEnv = (fallback: number) =>
  z.coerce.number().positive().default(fallback);

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  CHROMA_URL: z.string().url().default('http://localhost:8000'),
  TOGAF_CHAT_MODEL: z.string().min(1).default('gpt-4.1'),
  TOGAF_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  TOGAF_DATA_DIR: z.string().min(1).default('./data'),
  TOGAF_DOCUMENTS_DIR: z.string().min(1).default('./documents'),
  TOGAF_CHUNK_SIZE: numberFromEnv(2000),
  TOGAF_CHUNK_OVERLAP: numberFromEnv(200),
  TOGAF_MAX_CHUNK_SIZE: numberFromEnv(3000),
  TOGAF_SESSION_EXPIRY_HOURS: numberFromEnv(4),
  TOGAF_INGESTION_CONCURRENCY: numberFromEnv(2),
  TOGAF_EXTRACT_IMAGES: booleanFromEnv,
});

export interface AppConfig {
  openaiApiKey?: string;
  chromaUrl: string;
  chatModel: string;
  embeddingModel: string;
  dataDir: string;
  documentsDir: string;
  usersDir: string;
  profilesDir: string;
  sessionsDir: string;
  learningSessionsDir: string;
  analyticsDir: string;
  adaptivePathsDir: string;
  knowledgeBaseDir: string;
  embeddingCacheFile: string;
  imagesDir: string;
  chunkSize: number;
  chunkOverlap: number;
  maxChunkSize: number;
  sessionExpiryHours: number;
  ingestionConcurrency: number;
  extractImages: boolean;
}

/**
 * Build a validated configuration from an environment map.
 * Throws a ZodError describing every invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = EnvSchema.parse(env);

  if (parsed.TOGAF_CHUNK_OVERLAP >= parsed.TOGAF_CHUNK_SIZE) {
    throw new Error('TOGAF_CHUNK_OVERLAP must be smaller than TOGAF_CHUNK_SIZE');
  }
  if (parsed.TOGAF_MAX_CHUNK_SIZE < parsed.TOGAF_CHUNK_SIZE) {
    throw new Error('TOGAF_MAX_CHUNK_SIZE must be at least TOGAF_CHUNK_SIZE');
  }

  const dataDir = path.resolve(parsed.TOGAF_DATA_DIR);
  const usersDir = path.join(dataDir, 'users');
  const knowledgeBaseDir = path.join(dataDir, 'knowledge_base');

  return Object.freeze({
    openaiApiKey: parsed.OPENAI_API_KEY || undefined,
    chromaUrl: parsed.CHROMA_URL,
    chatModel: parsed.TOGAF_CHAT_MODEL,
    embeddingModel: parsed.TOGAF_EMBEDDING_MODEL,
    dataDir,
    documentsDir: path.resolve(parsed.TOGAF_DOCUMENTS_DIR),
    usersDir,
    profilesDir: path.join(usersDir, 'profiles'),
    sessionsDir: path.join(usersDir, 'sessions'),
    learningSessionsDir: path.join(usersDir, 'learning_sessions'),
    analyticsDir: path.join(usersDir, 'analytics'),
    adaptivePathsDir: path.join(usersDir, 'adaptive_paths'),
    knowledgeBaseDir,
    embeddingCacheFile: path.join(knowledgeBaseDir, 'embedding_cache.json'),
    imagesDir: path.join(knowledgeBaseDir, 'images'),
    chunkSize: parsed.TOGAF_CHUNK_SIZE,
    chunkOverlap: parsed.TOGAF_CHUNK_OVERLAP,
    maxChunkSize: parsed.TOGAF_MAX_CHUNK_SIZE,
    sessionExpiryHours: parsed.TOGAF_SESSION_EXPIRY_HOURS,
    ingestionConcurrency: parsed.TOGAF_INGESTION_CONCURRENCY,
    extractImages: parsed.TOGAF_EXTRACT_IMAGES,
  });
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    dotenv.config();
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}
