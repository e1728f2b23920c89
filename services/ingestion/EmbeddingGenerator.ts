import { createHash } from 'crypto';
import { BaseService } from '../base/BaseService';
import { getSearchTags } from './MetadataBuilder';
import type { IKeyValueCache } from '../interfaces';
import type { IEmbeddingProvider } from '../../shared/llm-types';
import type { ContentChunk } from '../../shared/types/ingestion.types';
import type { EmbeddingRecord } from '../../shared/types/vector.types';
import { titleCase } from '../../utils/text';

const EMBEDDING_TEXT_SEPARATOR = ' | ';
const MAX_KEY_CONCEPTS = 5;

interface EmbeddingGeneratorDeps {
  provider: IEmbeddingProvider;
  /** content hash -> vector */
  cache: IKeyValueCache<number[]>;
}

export interface EmbeddingCacheStats {
  cachedEmbeddings: number;
  hits: number;
  misses: number;
  embeddingModel: string;
}

/**
 * The chunk text followed by its place in the curriculum, so that identical
 * wording in two parts of the standard embeds differently.
 */
export function createEmbeddingText(chunk: ContentChunk): string {
  const { metadata } = chunk;
  const parts = [chunk.text, `TOGAF ${metadata.certificationLevel} level content`];

  if (metadata.foundationPart) {
    parts.push(`From ${titleCase(metadata.foundationPart)}`);
  }
  if (metadata.practitionerGuide) {
    parts.push(`From TOGAF Series Guide: ${titleCase(metadata.practitionerGuide)}`);
  }
  if (metadata.structuralInfo.chapterTitle) {
    parts.push(`Chapter: ${metadata.structuralInfo.chapterTitle}`);
  }
  if (metadata.structuralInfo.sectionTitle) {
    parts.push(`Section: ${metadata.structuralInfo.sectionTitle}`);
  }
  if (metadata.semanticInfo.keyConcepts.length > 0) {
    parts.push(`Key concepts: ${metadata.semanticInfo.keyConcepts.slice(0, MAX_KEY_CONCEPTS).join(', ')}`);
  }
  if (metadata.semanticInfo.admPhases.length > 0) {
    parts.push(`ADM phases: ${metadata.semanticInfo.admPhases.map(titleCase).join(', ')}`);
  }
  parts.push(`Content type: ${titleCase(metadata.contentType)}`);

  return parts.join(EMBEDDING_TEXT_SEPARATOR);
}

export function contentHash(text: string): string {
  return createHash('md5').update(text, 'utf8').digest('hex');
}

/**
 * Embeds chunks through a hash-keyed vector cache. Uncached texts go to the
 * provider in one batch; the cache is written only after that batch succeeds.
 */
export class EmbeddingGenerator extends BaseService<EmbeddingGeneratorDeps> {
  private cacheLoaded = false;
  private hits = 0;
  private misses = 0;

  constructor(deps: EmbeddingGeneratorDeps) {
    super('EmbeddingGenerator', deps);
  }

  async initialize(): Promise<void> {
    await this.ensureCacheLoaded();
  }

  async generateEmbeddings(chunks: readonly ContentChunk[]): Promise<EmbeddingRecord[]> {
    return this.execute('generateEmbeddings', async () => {
      await this.ensureCacheLoaded();
      const { cache, provider } = this.deps;

      const prepared = chunks.map(chunk => {
        const embeddingText = createEmbeddingText(chunk);
        return { chunk, embeddingText, hash: contentHash(embeddingText) };
      });

      // Chunks sharing a hash are embedded once.
      const pending = new Map<string, string>();
      for (const item of prepared) {
        if (cache.has(item.hash)) {
          this.hits++;
        } else if (!pending.has(item.hash)) {
          pending.set(item.hash, item.embeddingText);
        }
      }

      const fresh = new Map<string, number[]>();
      if (pending.size > 0) {
        const hashes = [...pending.keys()];
        this.logInfo(`Requesting ${hashes.length} embeddings from ${provider.modelName}`);
        const vectors = await provider.embedDocuments([...pending.values()], { taskType: 'ingestion' });
        if (vectors.length !== hashes.length) {
          throw new Error(`Embedding provider returned ${vectors.length} vectors for ${hashes.length} texts`);
        }
        hashes.forEach((hash, index) => fresh.set(hash, vectors[index]));
        this.misses += hashes.length;

        for (const [hash, vector] of fresh) {
          cache.set(hash, vector);
        }
        try {
          await cache.save();
        } catch (error) {
          for (const hash of fresh.keys()) {
            cache.delete(hash);
          }
          throw error;
        }
      }

      const records = prepared.map(({ chunk, embeddingText, hash }) => {
        const vector = fresh.get(hash) ?? cache.get(hash);
        if (!vector) {
          throw new Error(`No embedding available for chunk ${chunk.chunkId}`);
        }
        return this.toRecord(chunk, vector, embeddingText, hash);
      });

      this.logInfo(`Generated ${records.length} embedding records (${fresh.size} new)`);
      return records;
    }, { chunks: chunks.length });
  }

  getCacheStats(): EmbeddingCacheStats {
    return {
      cachedEmbeddings: this.deps.cache.size(),
      hits: this.hits,
      misses: this.misses,
      embeddingModel: this.deps.provider.modelName,
    };
  }

  private async ensureCacheLoaded(): Promise<void> {
    if (!this.cacheLoaded) {
      await this.deps.cache.load();
      this.cacheLoaded = true;
    }
  }

  private toRecord(chunk: ContentChunk, vector: number[], embeddingText: string, hash: string): EmbeddingRecord {
    return {
      chunkId: chunk.chunkId,
      contentHash: hash,
      text: chunk.text,
      embeddingText,
      vector,
      chunkType: chunk.chunkType,
      wordCount: chunk.wordCount,
      charCount: chunk.charCount,
      startPage: chunk.startPage,
      endPage: chunk.endPage,
      metadata: chunk.metadata,
      searchTags: getSearchTags(chunk.metadata),
      hasImages: chunk.images.length > 0,
      hasTables: chunk.tables.length > 0,
      imageCount: chunk.images.length,
      tableCount: chunk.tables.length,
      embeddingModel: this.deps.provider.modelName,
      embeddingDimensions: vector.length,
      contentQualityScore: chunk.metadata.contentQualityScore,
      extractionConfidence: chunk.metadata.extractionConfidence,
    };
  }
}
