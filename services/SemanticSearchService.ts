import { BaseService } from './base/BaseService';
import { MetadataSearchBuilder, type IVectorStoreModel } from '../models/ChromaVectorModel';
import type { IEmbeddingProvider } from '../shared/llm-types';
import type { CertificationLevel, DifficultyLevel } from '../shared/types/metadata.types';
import type {
  EnhancedSearchResult,
  FoundationSearchOptions,
  PractitionerSearchOptions,
  SearchQuery,
  SearchSystemStats,
  SearchUserContext,
} from '../shared/types/search.types';
import type { CollectionKey, StoredMetadata, VectorFilters, VectorSearchResult } from '../shared/types/vector.types';
import { titleCase } from '../utils/text';

const DEFAULT_N_RESULTS = 10;
const CONVENIENCE_N_RESULTS = 5;
const MAX_SUGGESTIONS = 5;

const USER_LEVEL_DIFFICULTY: Record<string, DifficultyLevel> = {
  beginner: 'basic',
  intermediate: 'intermediate',
  advanced: 'advanced',
  expert: 'advanced',
};

const SEARCH_EXPANSIONS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['adm', ['Architecture Development Method', 'ADM phases', 'ADM guidelines']],
  ['architecture', ['Business Architecture', 'Data Architecture', 'Application Architecture', 'Technology Architecture']],
  ['governance', ['Architecture Governance', 'Architecture Board', 'Architecture Compliance']],
  ['stakeholder', ['Stakeholder Management', 'Stakeholder Requirements', 'Stakeholder Concerns']],
  ['gap', ['Gap Analysis', 'Architecture Gap', 'Solution Gap']],
  ['migration', ['Migration Planning', 'Implementation Migration', 'Transition Architecture']],
];

interface SemanticSearchServiceDeps {
  vectorStore: IVectorStoreModel;
  embeddings: IEmbeddingProvider;
  chromaUrl: string;
}

/** Merges the query's typed fields over its free-form filters. */
export function buildFilters(query: SearchQuery): VectorFilters {
  const filters: VectorFilters = { ...query.filters };
  if (query.certificationLevel) filters.certification_level = query.certificationLevel;
  if (query.contentType) filters.content_type = query.contentType;
  if (query.difficultyLevel) filters.difficulty_level = query.difficultyLevel;
  if (query.includeImages !== undefined) filters.has_images = query.includeImages;
  if (query.includeTables !== undefined) filters.has_tables = query.includeTables;
  return filters;
}

function textField(metadata: StoredMetadata, key: string): string {
  const value = metadata[key];
  return typeof value === 'string' ? value : '';
}

function splitList(value: string): string[] {
  return value ? value.split(',').map(item => item.trim()) : [];
}

export function createContentSummary(metadata: StoredMetadata): string {
  const parts = [titleCase(textField(metadata, 'content_type'))];
  if (metadata.has_images === true) parts.push('with diagrams');
  if (metadata.has_tables === true) parts.push('with tables');
  const wordCount = typeof metadata.word_count === 'number' ? metadata.word_count : 0;
  parts.push(`(${wordCount} words)`);
  return parts.join(' ');
}

export function enhanceSearchResult(raw: VectorSearchResult): EnhancedSearchResult {
  const { metadata } = raw;
  const level = textField(metadata, 'certification_level');
  const partOrGuide = textField(metadata, 'foundation_part') || textField(metadata, 'practitioner_guide');

  let certificationContext = 'TOGAF Content';
  if (level === 'foundation') {
    certificationContext = `TOGAF Foundation - ${titleCase(partOrGuide)}`;
  } else if (level === 'practitioner') {
    certificationContext = `TOGAF Practitioner - ${titleCase(partOrGuide)}`;
  }

  const chapter = textField(metadata, 'chapter_title');
  const section = textField(metadata, 'section_title');
  const chapterContext = chapter && section ? `${chapter} → ${section}` : chapter || null;

  return {
    chunkId: raw.chunkId,
    content: raw.document,
    relevanceScore: raw.relevanceScore,
    metadata,
    collection: raw.collection,
    certificationContext,
    contentSummary: createContentSummary(metadata),
    keyConcepts: splitList(textField(metadata, 'key_concepts')),
    chapterContext,
    admPhases: splitList(textField(metadata, 'adm_phases')).map(titleCase),
  };
}

/**
 * TOGAF-aware retrieval over the vector store: builds filters from a typed
 * query, embeds the query text and decorates each hit with curriculum context.
 */
export class SemanticSearchService extends BaseService<SemanticSearchServiceDeps> {
  constructor(deps: SemanticSearchServiceDeps) {
    super('SemanticSearchService', deps);
  }

  async healthCheck(): Promise<boolean> {
    return this.deps.vectorStore.isReady();
  }

  async search(query: SearchQuery): Promise<EnhancedSearchResult[]> {
    return this.execute('search', async () => {
      const vector = await this.deps.embeddings.embedQuery(query.text, { taskType: 'search' });
      const raw = await this.deps.vectorStore.search(vector, {
        nResults: query.nResults ?? DEFAULT_N_RESULTS,
        collections: query.collections,
        filters: buildFilters(query),
      });
      const results = raw.map(enhanceSearchResult);
      this.logInfo(`Found ${results.length} results for query`);
      return results;
    }, { query: query.text.slice(0, 50) });
  }

  async searchFoundationContent(text: string, options: FoundationSearchOptions = {}): Promise<EnhancedSearchResult[]> {
    const filters = options.part
      ? MetadataSearchBuilder.foundationPart(options.part)
      : MetadataSearchBuilder.foundationOnly();
    return this.search({
      text,
      filters,
      difficultyLevel: options.difficulty,
      nResults: options.nResults ?? CONVENIENCE_N_RESULTS,
      collections: ['foundation'],
    });
  }

  async searchPractitionerContent(text: string, options: PractitionerSearchOptions = {}): Promise<EnhancedSearchResult[]> {
    const filters = options.guide
      ? MetadataSearchBuilder.practitionerGuide(options.guide)
      : MetadataSearchBuilder.practitionerOnly();
    return this.search({
      text,
      filters,
      difficultyLevel: options.difficulty,
      nResults: options.nResults ?? CONVENIENCE_N_RESULTS,
      collections: ['practitioner'],
    });
  }

  /**
   * Search scoped by the learner: difficulty follows their experience level
   * and collections follow their certification goal.
   */
  async searchWithContext(text: string, context: SearchUserContext = {}): Promise<EnhancedSearchResult[]> {
    const difficulty = USER_LEVEL_DIFFICULTY[context.userLevel ?? 'beginner'] ?? 'basic';
    let certificationLevel: CertificationLevel | undefined;
    let collections: CollectionKey[] = ['foundation', 'practitioner'];
    if (context.certificationGoal === 'foundation' || context.certificationGoal === 'practitioner') {
      certificationLevel = context.certificationGoal;
      collections = [context.certificationGoal];
    }

    return this.search({
      text,
      certificationLevel,
      difficultyLevel: difficulty,
      nResults: context.nResults ?? DEFAULT_N_RESULTS,
      collections,
    });
  }

  getSearchSuggestions(partial: string): string[] {
    const lower = partial.toLowerCase();
    return SEARCH_EXPANSIONS
      .filter(([keyword]) => lower.includes(keyword))
      .flatMap(([, expansions]) => expansions)
      .slice(0, MAX_SUGGESTIONS);
  }

  async getSystemStats(): Promise<SearchSystemStats> {
    const collections = await this.deps.vectorStore.getCollectionStats();
    return {
      collections,
      embeddingModel: this.deps.embeddings.modelName,
      chromaUrl: this.deps.chromaUrl,
      totalDocuments: Object.values(collections).reduce((sum, stats) => sum + stats.documentCount, 0),
    };
  }
}
