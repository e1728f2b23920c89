import { logger } from '../utils/logger';
import type { AppConfig } from '../utils/config';
import { createEmbeddingModel } from '../utils/llm';
import type { IService, ServiceHealthResult } from '../services/interfaces';
import type { IChatProvider, IEmbeddingProvider } from '../shared/llm-types';

// Models
import { ChromaVectorModel, type IVectorStoreModel } from '../models/ChromaVectorModel';
import { JsonFileCache } from '../models/JsonFileCache';
import { JsonFileStore } from '../models/JsonFileStore';

// Schemas
import {
  AdaptiveLearningPathSchema,
  LearningSessionSchema,
  ProgressAnalyticsSchema,
  UserProfileSchema,
} from '../shared/schemas/profileSchemas';
import { ConversationSessionSchema } from '../shared/schemas/conversationSchemas';
import { EmbeddingVectorSchema } from '../shared/schemas/metadataSchemas';

// Services
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from '../services/llm_providers/openai';
import { ProfileService } from '../services/ProfileService';
import { ProgressTrackerService } from '../services/ProgressTrackerService';
import { SessionManagerService } from '../services/SessionManagerService';
import { SemanticSearchService } from '../services/SemanticSearchService';
import { AdaptiveAgentService } from '../services/AdaptiveAgentService';
import { TutorService } from '../services/TutorService';
import { PdfParseReader } from '../services/ingestion/PdfParseReader';
import { DocumentExtractor } from '../services/ingestion/DocumentExtractor';
import { MetadataBuilder } from '../services/ingestion/MetadataBuilder';
import { ContentChunker } from '../services/ingestion/ContentChunker';
import { EmbeddingGenerator } from '../services/ingestion/EmbeddingGenerator';
import { IngestionPipeline } from '../services/ingestion/IngestionPipeline';

/**
 * Services used while tutoring.
 */
export interface ServiceRegistry {
  profile: ProfileService;
  progressTracker: ProgressTrackerService;
  sessionManager: SessionManagerService;
  search: SemanticSearchService;
  agent: AdaptiveAgentService;
  tutor: TutorService;
}

/**
 * Services used by offline ingestion.
 */
export interface IngestionRegistry {
  extractor: DocumentExtractor;
  chunker: ContentChunker;
  embeddings: EmbeddingGenerator;
  pipeline: IngestionPipeline;
  vectorStore: IVectorStoreModel;
}

/** Replacements for the external clients, for scripts and tests. */
export interface ExternalOverrides {
  chat?: IChatProvider;
  embeddings?: IEmbeddingProvider;
  vectorStore?: IVectorStoreModel;
}

async function createService<T extends IService>(name: string, factory: () => T): Promise<T> {
  logger.info(`[ServiceBootstrap] Creating ${name}...`);
  const service = factory();
  await service.initialize();
  logger.info(`[ServiceBootstrap] ${name} initialized`);
  return service;
}

function createVectorStore(config: AppConfig): IVectorStoreModel {
  return new ChromaVectorModel({
    chromaUrl: config.chromaUrl,
    embeddings: createEmbeddingModel(config.embeddingModel, config.openaiApiKey),
  });
}

function createEmbeddingProvider(config: AppConfig): IEmbeddingProvider {
  return new OpenAIEmbeddingProvider(config.embeddingModel, config.openaiApiKey);
}

/**
 * Build the tutoring services over JSON file stores under the data directory.
 */
export async function initializeServices(config: AppConfig, overrides: ExternalOverrides = {}): Promise<ServiceRegistry> {
  const startTime = Date.now();
  logger.info('[ServiceBootstrap] Starting service initialization...');

  try {
    const embeddings = overrides.embeddings ?? createEmbeddingProvider(config);
    const vectorStore = overrides.vectorStore ?? createVectorStore(config);
    const chat = overrides.chat ?? new OpenAIChatProvider(config.chatModel, config.openaiApiKey);

    const profile = await createService('ProfileService', () => new ProfileService({
      profiles: new JsonFileStore(config.profilesDir, UserProfileSchema, 'ProfileStore'),
    }));

    const progressTracker = await createService('ProgressTrackerService', () => new ProgressTrackerService({
      profileService: profile,
      sessions: new JsonFileStore(config.learningSessionsDir, LearningSessionSchema, 'LearningSessionStore'),
      analytics: new JsonFileStore(config.analyticsDir, ProgressAnalyticsSchema, 'AnalyticsStore'),
      paths: new JsonFileStore(config.adaptivePathsDir, AdaptiveLearningPathSchema, 'AdaptivePathStore'),
    }));

    const sessionManager = await createService('SessionManagerService', () => new SessionManagerService({
      profileService: profile,
      sessions: new JsonFileStore(config.sessionsDir, ConversationSessionSchema, 'ConversationSessionStore'),
      expiryHours: config.sessionExpiryHours,
    }));

    const search = await createService('SemanticSearchService', () => new SemanticSearchService({
      vectorStore,
      embeddings,
      chromaUrl: config.chromaUrl,
    }));

    const agent = await createService('AdaptiveAgentService', () => new AdaptiveAgentService({
      chat,
      search,
      progressTracker,
      sessionManager,
    }));

    const tutor = await createService('TutorService', () => new TutorService({
      profileService: profile,
      progressTracker,
      sessionManager,
      search,
      agent,
    }));

    logger.info(`[ServiceBootstrap] Service initialization completed in ${Date.now() - startTime}ms`);
    return { profile, progressTracker, sessionManager, search, agent, tutor };
  } catch (error) {
    logger.error('[ServiceBootstrap] Failed to initialize services:', error);
    throw error;
  }
}

/**
 * Build the ingestion pipeline: pdf-parse extraction, chunking, cached
 * embeddings and the Chroma store.
 */
export async function initializeIngestion(config: AppConfig, overrides: ExternalOverrides = {}): Promise<IngestionRegistry> {
  const provider = overrides.embeddings ?? createEmbeddingProvider(config);
  const vectorStore = overrides.vectorStore ?? createVectorStore(config);

  const extractor = await createService('DocumentExtractor', () => new DocumentExtractor({
    reader: new PdfParseReader(),
    imagesDir: config.extractImages ? config.imagesDir : undefined,
  }));

  const chunker = await createService('ContentChunker', () => new ContentChunker({
    metadataBuilder: new MetadataBuilder(),
    options: {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      maxChunkSize: config.maxChunkSize,
    },
  }));

  const embeddings = await createService('EmbeddingGenerator', () => new EmbeddingGenerator({
    provider,
    cache: new JsonFileCache(config.embeddingCacheFile, EmbeddingVectorSchema),
  }));

  const pipeline = await createService('IngestionPipeline', () => new IngestionPipeline({
    extractor,
    chunker,
    embeddings,
    vectorStore,
    concurrency: config.ingestionConcurrency,
  }));

  return { extractor, chunker, embeddings, pipeline, vectorStore };
}

/**
 * Run every service's health check. A check that throws is reported unhealthy.
 */
export async function checkServiceHealth(registry: ServiceRegistry): Promise<ServiceHealthResult[]> {
  const results: ServiceHealthResult[] = [];
  for (const [name, service] of Object.entries(registry)) {
    try {
      const healthy = await service.healthCheck();
      results.push({ service: name, healthy, timestamp: new Date() });
    } catch (error) {
      results.push({
        service: name,
        healthy: false,
        message: error instanceof Error ? error.message : String(error),
        timestamp: new Date(),
      });
    }
  }
  return results;
}

/**
 * Cleanup all services in the registry, dependents first.
 */
export async function cleanupServices(registry: ServiceRegistry): Promise<void> {
  logger.info('[ServiceBootstrap] Starting service cleanup...');
  const servicesToCleanup: IService[] = [
    registry.tutor,
    registry.agent,
    registry.search,
    registry.sessionManager,
    registry.progressTracker,
    registry.profile,
  ];

  for (const service of servicesToCleanup) {
    try {
      await service.cleanup();
      logger.debug(`[ServiceBootstrap] Cleaned up ${service.constructor.name}`);
    } catch (error) {
      logger.error(`[ServiceBootstrap] Failed to cleanup ${service.constructor.name}:`, error);
    }
  }
  logger.info('[ServiceBootstrap] Service cleanup completed');
}
