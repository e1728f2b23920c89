import { Chroma } from '@langchain/community/vectorstores/chroma';
import { Document, type DocumentInterface } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { ChromaClient, type Where } from 'chromadb';
import { logger } from '../utils/logger';
import type {
  CertificationLevel,
  ContentType,
  DifficultyLevel,
  FoundationPart,
  PractitionerGuide,
} from '../shared/types/metadata.types';
import {
  COLLECTION_KEYS,
  type CollectionCounts,
  type CollectionKey,
  type CollectionStats,
  type EmbeddingRecord,
  type FlatChunkMetadata,
  type StoredMetadata,
  type VectorFilters,
  type VectorSearchOptions,
  type VectorSearchResult,
} from '../shared/types/vector.types';

const COLLECTION_PREFIX = 'togaf_';
const DEFAULT_N_RESULTS = 10;

/** Filter keys that map one-to-one onto an `$eq` condition, in clause order. */
const EQUALITY_FILTER_KEYS = [
  'certification_level',
  'content_type',
  'difficulty_level',
  'has_images',
  'has_tables',
  'source_directory',
  'foundation_part',
  'practitioner_guide',
] as const satisfies ReadonlyArray<keyof VectorFilters>;

/** The part of a LangChain Chroma store this model relies on. */
export interface VectorCollectionStore {
  addVectors(vectors: number[][], documents: DocumentInterface[], options?: { ids?: string[] }): Promise<string[] | void>;
  similaritySearchVectorWithScore(query: number[], k: number, filter?: Where): Promise<[DocumentInterface, number][]>;
  delete(params: { ids?: string[] }): Promise<void>;
  ensureCollection(): Promise<{ count(): Promise<number> }>;
}

/** Collection administration that LangChain does not wrap. */
export interface ChromaAdmin {
  deleteCollection(params: { name: string }): Promise<void>;
  heartbeat(): Promise<number>;
}

/**
 * Generic interface for vector store operations.
 * Decouples services from the Chroma implementation.
 */
export interface IVectorStoreModel {
  storeEmbeddings(records: EmbeddingRecord[]): Promise<CollectionCounts>;
  search(queryVector: number[], options?: VectorSearchOptions): Promise<VectorSearchResult[]>;
  deleteByIds(ids: string[]): Promise<void>;
  getCollectionStats(): Promise<Record<CollectionKey, CollectionStats>>;
  deleteCollection(collection: CollectionKey): Promise<boolean>;
  resetAll(): Promise<boolean>;
  isReady(): Promise<boolean>;
}

interface ChromaVectorModelDeps {
  chromaUrl: string;
  /** Used by Chroma only for text queries; records arrive with vectors already computed. */
  embeddings: EmbeddingsInterface;
  createStore?: (collectionName: string) => VectorCollectionStore;
  client?: ChromaAdmin;
}

export function physicalCollectionName(collection: CollectionKey): string {
  return `${COLLECTION_PREFIX}${collection}`;
}

/** Assessment chunks have their own collection; everything else goes by certification level. */
export function determineCollection(record: EmbeddingRecord): CollectionKey {
  if (record.chunkType.toLowerCase().includes('assessment')) {
    return 'assessments';
  }
  return record.metadata.certificationLevel === 'practitioner' ? 'practitioner' : 'foundation';
}

export function flattenMetadata(record: EmbeddingRecord): FlatChunkMetadata {
  const { metadata } = record;
  const flat: FlatChunkMetadata = {
    chunk_id: record.chunkId,
    content_hash: record.contentHash,
    chunk_type: record.chunkType,
    word_count: record.wordCount,
    char_count: record.charCount,
    start_page: record.startPage,
    end_page: record.endPage,
    has_images: record.hasImages,
    has_tables: record.hasTables,
    image_count: record.imageCount,
    table_count: record.tableCount,
    certification_level: metadata.certificationLevel,
    content_type: metadata.contentType,
    difficulty_level: metadata.difficultyLevel,
    document_title: metadata.documentInfo.documentTitle,
    source_file: metadata.documentInfo.sourceFile,
    source_directory: metadata.documentInfo.sourceDirectory,
    page_number: metadata.structuralInfo.pageNumber,
    chapter_title: metadata.structuralInfo.chapterTitle ?? '',
    chapter_number: metadata.structuralInfo.chapterNumber ?? '',
    section_title: metadata.structuralInfo.sectionTitle ?? '',
    foundation_part: metadata.foundationPart ?? '',
    practitioner_guide: metadata.practitionerGuide ?? '',
    content_quality_score: record.contentQualityScore,
    extraction_confidence: record.extractionConfidence,
    embedding_model: record.embeddingModel,
    embedding_dimensions: record.embeddingDimensions,
  };

  if (metadata.semanticInfo.keyConcepts.length > 0) {
    flat.key_concepts = metadata.semanticInfo.keyConcepts.join(',');
  }
  if (metadata.semanticInfo.admPhases.length > 0) {
    flat.adm_phases = metadata.semanticInfo.admPhases.join(',');
  }
  if (record.searchTags.length > 0) {
    flat.search_tags = record.searchTags.join(',');
  }
  return flat;
}

/**
 * Builds a Chroma `where` clause. A single condition is used as-is, several
 * are combined under `$and`, and no conditions yield `undefined`.
 */
export function buildWhereClause(filters: VectorFilters | undefined): Where | undefined {
  if (!filters) return undefined;
  const conditions: Where[] = [];

  for (const key of EQUALITY_FILTER_KEYS) {
    const value = filters[key];
    if (value !== undefined) {
      conditions.push({ [key]: { $eq: value } });
    }
  }
  if (filters.min_word_count !== undefined) {
    conditions.push({ word_count: { $gte: filters.min_word_count } });
  }
  if (filters.max_word_count !== undefined) {
    conditions.push({ word_count: { $lte: filters.max_word_count } });
  }

  if (conditions.length === 0) return undefined;
  if (conditions.length === 1) return conditions[0];
  return { $and: conditions };
}

/**
 * Model for the three TOGAF collections in Chroma, using the LangChain
 * Chroma integration per collection and the raw client for administration.
 */
export class ChromaVectorModel implements IVectorStoreModel {
  private readonly stores = new Map<CollectionKey, VectorCollectionStore>();
  private readonly client: ChromaAdmin;
  private readonly createStore: (collectionName: string) => VectorCollectionStore;

  constructor(deps: ChromaVectorModelDeps) {
    this.client = deps.client ?? new ChromaClient({ path: deps.chromaUrl });
    this.createStore = deps.createStore ?? (collectionName => new Chroma(deps.embeddings, {
      collectionName,
      url: deps.chromaUrl,
      collectionMetadata: { description: `TOGAF ${collectionName} content embeddings` },
    }));
    for (const key of COLLECTION_KEYS) {
      this.stores.set(key, this.createStore(physicalCollectionName(key)));
    }
    logger.info(`[ChromaVectorModel] Using Chroma at ${deps.chromaUrl}`);
  }

  async isReady(): Promise<boolean> {
    try {
      await this.client.heartbeat();
      return true;
    } catch (error) {
      logger.warn('[ChromaVectorModel] Heartbeat failed:', error);
      return false;
    }
  }

  /**
   * Writes records grouped by collection. A failed collection write propagates;
   * ids already written by earlier collections are left for the caller to remove.
   */
  async storeEmbeddings(records: EmbeddingRecord[]): Promise<CollectionCounts> {
    const counts: CollectionCounts = { foundation: 0, practitioner: 0, assessments: 0 };
    if (records.length === 0) {
      logger.debug('[ChromaVectorModel] storeEmbeddings called with empty array.');
      return counts;
    }

    const grouped = new Map<CollectionKey, EmbeddingRecord[]>();
    for (const record of records) {
      const key = determineCollection(record);
      grouped.set(key, [...(grouped.get(key) ?? []), record]);
    }

    for (const [key, group] of grouped) {
      const documents = group.map(record => new Document({
        pageContent: record.text,
        metadata: flattenMetadata(record),
      }));
      try {
        await this.store(key).addVectors(
          group.map(record => record.vector),
          documents,
          { ids: group.map(record => record.chunkId) }
        );
      } catch (error) {
        logger.error(`[ChromaVectorModel] Failed to add ${group.length} records to ${key}:`, error);
        throw error;
      }
      counts[key] = group.length;
    }

    logger.info(`[ChromaVectorModel] Added records to collections: ${JSON.stringify(counts)}`);
    return counts;
  }

  /**
   * Queries each requested collection and merges hits by relevance.
   * A collection that fails to answer is logged and skipped.
   */
  async search(queryVector: number[], options: VectorSearchOptions = {}): Promise<VectorSearchResult[]> {
    const nResults = options.nResults ?? DEFAULT_N_RESULTS;
    const collections = options.collections ?? [...COLLECTION_KEYS];
    const where = buildWhereClause(options.filters);
    const results: VectorSearchResult[] = [];

    for (const collection of collections) {
      try {
        const hits = await this.store(collection).similaritySearchVectorWithScore(queryVector, nResults, where);
        for (const [document, distance] of hits) {
          const metadata = toStoredMetadata(document.metadata);
          results.push({
            chunkId: document.id ?? stringField(metadata, 'chunk_id'),
            collection,
            document: document.pageContent,
            metadata,
            distance,
            relevanceScore: 1 - distance,
          });
        }
      } catch (error) {
        logger.error(`[ChromaVectorModel] Error searching collection ${collection}:`, error);
      }
    }

    return results
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, nResults);
  }

  async deleteByIds(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      logger.debug('[ChromaVectorModel] deleteByIds called with empty array.');
      return;
    }
    logger.warn(`[ChromaVectorModel] Deleting ${ids.length} records from all collections`);
    for (const key of COLLECTION_KEYS) {
      await this.store(key).delete({ ids });
    }
  }

  async getCollectionStats(): Promise<Record<CollectionKey, CollectionStats>> {
    const entries = await Promise.all(COLLECTION_KEYS.map(async (key): Promise<[CollectionKey, CollectionStats]> => {
      try {
        const collection = await this.store(key).ensureCollection();
        return [key, { name: key, documentCount: await collection.count() }];
      } catch (error) {
        logger.error(`[ChromaVectorModel] Error getting stats for collection ${key}:`, error);
        return [key, { name: key, documentCount: 0, error: error instanceof Error ? error.message : String(error) }];
      }
    }));
    return {
      foundation: entries[0][1],
      practitioner: entries[1][1],
      assessments: entries[2][1],
    };
  }

  /** Drops the collection and replaces it with an empty one. */
  async deleteCollection(collection: CollectionKey): Promise<boolean> {
    const name = physicalCollectionName(collection);
    try {
      await this.client.deleteCollection({ name });
      this.stores.set(collection, this.createStore(name));
      logger.info(`[ChromaVectorModel] Deleted and recreated collection: ${collection}`);
      return true;
    } catch (error) {
      logger.error(`[ChromaVectorModel] Error deleting collection ${collection}:`, error);
      return false;
    }
  }

  async resetAll(): Promise<boolean> {
    let ok = true;
    for (const key of COLLECTION_KEYS) {
      ok = (await this.deleteCollection(key)) && ok;
    }
    logger.info(`[ChromaVectorModel] Reset all collections (${ok ? 'ok' : 'with errors'})`);
    return ok;
  }

  private store(key: CollectionKey): VectorCollectionStore {
    const store = this.stores.get(key);
    if (!store) {
      throw new Error(`Unknown collection '${key}'`);
    }
    return store;
  }
}

function toStoredMetadata(raw: Record<string, unknown>): StoredMetadata {
  const metadata: StoredMetadata = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value === null) {
      metadata[key] = value;
    }
  }
  return metadata;
}

function stringField(metadata: StoredMetadata, key: string): string {
  const value = metadata[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Ready-made filter fragments for common TOGAF queries.
 */
export const MetadataSearchBuilder = {
  foundationOnly(): VectorFilters {
    return { certification_level: 'foundation' };
  },

  practitionerOnly(): VectorFilters {
    return { certification_level: 'practitioner' };
  },

  difficultyLevel(level: DifficultyLevel): VectorFilters {
    return { difficulty_level: level };
  },

  contentType(contentType: ContentType): VectorFilters {
    return { content_type: contentType };
  },

  withImages(): VectorFilters {
    return { has_images: true };
  },

  withTables(): VectorFilters {
    return { has_tables: true };
  },

  foundationPart(part: FoundationPart): VectorFilters {
    return { certification_level: 'foundation', foundation_part: part };
  },

  practitionerGuide(guide: PractitionerGuide): VectorFilters {
    return { certification_level: 'practitioner', practitioner_guide: guide };
  },

  certificationLevel(level: CertificationLevel): VectorFilters {
    return { certification_level: level };
  },

  combine(...filters: VectorFilters[]): VectorFilters {
    return filters.reduce<VectorFilters>((combined, filter) => ({ ...combined, ...filter }), {});
  },
};
