import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Document, type DocumentInterface } from '@langchain/core/documents';
import type { Where } from 'chromadb';
import {
  ChromaVectorModel,
  MetadataSearchBuilder,
  buildWhereClause,
  determineCollection,
  flattenMetadata,
  physicalCollectionName,
  type ChromaAdmin,
  type VectorCollectionStore,
} from '../ChromaVectorModel';
import { MetadataBuilder, getSearchTags } from '../../services/ingestion/MetadataBuilder';
import { FakeEmbeddingProvider } from '../../test-utils/fakes';
import type { EmbeddingRecord } from '../../shared/types/vector.types';

vi.mock('../../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

class FakeCollectionStore implements VectorCollectionStore {
  readonly added: Array<{ vectors: number[][]; documents: DocumentInterface[]; ids?: string[] }> = [];
  readonly queries: Array<{ query: number[]; k: number; filter?: Where }> = [];
  readonly deleted: string[][] = [];
  hits: [DocumentInterface, number][] = [];
  count = 0;
  failure: Error | null = null;

  constructor(readonly name: string) {}

  async addVectors(vectors: number[][], documents: DocumentInterface[], options?: { ids?: string[] }): Promise<string[]> {
    if (this.failure) throw this.failure;
    this.added.push({ vectors, documents, ids: options?.ids });
    return options?.ids ?? [];
  }

  async similaritySearchVectorWithScore(query: number[], k: number, filter?: Where): Promise<[DocumentInterface, number][]> {
    if (this.failure) throw this.failure;
    this.queries.push({ query, k, filter });
    return this.hits;
  }

  async delete(params: { ids?: string[] }): Promise<void> {
    this.deleted.push(params.ids ?? []);
  }

  async ensureCollection(): Promise<{ count(): Promise<number> }> {
    if (this.failure) throw this.failure;
    return { count: async () => this.count };
  }
}

class FakeAdmin implements ChromaAdmin {
  readonly deletedCollections: string[] = [];
  healthy = true;
  failDelete = false;

  async deleteCollection(params: { name: string }): Promise<void> {
    if (this.failDelete) throw new Error('collection locked');
    this.deletedCollections.push(params.name);
  }

  async heartbeat(): Promise<number> {
    if (!this.healthy) throw new Error('connection refused');
    return 1;
  }
}

function record(chunkId: string, sourcePath: string, overrides: Partial<EmbeddingRecord> = {}): EmbeddingRecord {
  const metadata = new MetadataBuilder().build({
    sourcePath,
    text: 'Stakeholders are mapped early.',
    imageCount: 0,
    tableCount: 0,
    section: { number: '5', title: 'Phase B: Business Architecture', fullHeader: '5 Phase B: Business Architecture' },
    pageNumber: 9,
    totalPages: 40,
    processingMethod: 'structured',
  });
  return {
    chunkId,
    contentHash: `hash-${chunkId}`,
    text: 'Stakeholders are mapped early.',
    embeddingText: 'Stakeholders are mapped early. | TOGAF',
    vector: [0.1, 0.2, 0.3],
    chunkType: 'section',
    wordCount: 4,
    charCount: 30,
    startPage: 9,
    endPage: 9,
    metadata,
    searchTags: getSearchTags(metadata),
    hasImages: false,
    hasTables: false,
    imageCount: 0,
    tableCount: 0,
    embeddingModel: 'fake-embedding',
    embeddingDimensions: 3,
    contentQualityScore: 1,
    extractionConfidence: 1,
    ...overrides,
  };
}

const CORE = '/docs/core_topics/C220-Part1e.pdf';
const GUIDE = '/docs/extended_topics/G152e.pdf';

describe('buildWhereClause', () => {
  it('should return undefined without conditions', () => {
    expect(buildWhereClause(undefined)).toBeUndefined();
    expect(buildWhereClause({})).toBeUndefined();
  });

  it('should use a single condition as-is', () => {
    expect(buildWhereClause({ certification_level: 'foundation' })).toEqual({ certification_level: { $eq: 'foundation' } });
  });

  it('should combine several conditions under $and in a fixed order', () => {
    expect(buildWhereClause({
      max_word_count: 500,
      difficulty_level: 'basic',
      min_word_count: 50,
      certification_level: 'foundation',
    })).toEqual({
      $and: [
        { certification_level: { $eq: 'foundation' } },
        { difficulty_level: { $eq: 'basic' } },
        { word_count: { $gte: 50 } },
        { word_count: { $lte: 500 } },
      ],
    });
  });

  it('should build filters from combined fragments', () => {
    const filters = MetadataSearchBuilder.combine(
      MetadataSearchBuilder.foundationPart('part_1_architecture_development_method'),
      MetadataSearchBuilder.withTables()
    );

    expect(buildWhereClause(filters)).toEqual({
      $and: [
        { certification_level: { $eq: 'foundation' } },
        { has_tables: { $eq: true } },
        { foundation_part: { $eq: 'part_1_architecture_development_method' } },
      ],
    });
  });
});

describe('collection routing', () => {
  it('should prefix physical collection names', () => {
    expect(physicalCollectionName('assessments')).toBe('togaf_assessments');
  });

  it('should route by chunk type first and certification level second', () => {
    expect(determineCollection(record('a', CORE, { chunkType: 'readiness_assessment' }))).toBe('assessments');
    expect(determineCollection(record('b', GUIDE))).toBe('practitioner');
    expect(determineCollection(record('c', CORE))).toBe('foundation');
  });
});

describe('flattenMetadata', () => {
  it('should flatten to scalars and join lists', () => {
    const flat = flattenMetadata(record('f1', CORE));

    expect(flat).toMatchObject({
      chunk_id: 'f1',
      content_hash: 'hash-f1',
      certification_level: 'foundation',
      content_type: 'concept',
      difficulty_level: 'basic',
      document_title: 'C220-Part1e',
      source_directory: 'core_topics',
      page_number: 9,
      chapter_title: 'Phase B: Business Architecture',
      chapter_number: '5',
      section_title: '',
      foundation_part: 'part_1_architecture_development_method',
      practitioner_guide: '',
      adm_phases: 'phase_b',
    });
    expect(typeof flat.key_concepts).toBe('string');
    expect(String(flat.key_concepts).startsWith('ADM,Architecture Vision,')).toBe(true);
  });

  it('should leave out empty lists', () => {
    const flat = flattenMetadata(record('p1', GUIDE, { searchTags: [] }));

    expect(flat.practitioner_guide).toBe('risk_security_integration');
    expect('key_concepts' in flat).toBe(false);
    expect('search_tags' in flat).toBe(false);
  });
});

describe('ChromaVectorModel', () => {
  let stores: Map<string, FakeCollectionStore>;
  let admin: FakeAdmin;
  let created: string[];
  let model: ChromaVectorModel;

  const store = (name: string): FakeCollectionStore => {
    const found = stores.get(name);
    if (!found) throw new Error(`no store ${name}`);
    return found;
  };

  beforeEach(() => {
    stores = new Map();
    created = [];
    admin = new FakeAdmin();
    model = new ChromaVectorModel({
      chromaUrl: 'http://localhost:8000',
      embeddings: new FakeEmbeddingProvider(),
      client: admin,
      createStore: name => {
        created.push(name);
        const fake = new FakeCollectionStore(name);
        stores.set(name, fake);
        return fake;
      },
    });
  });

  it('should open one store per collection', () => {
    expect(created).toEqual(['togaf_foundation', 'togaf_practitioner', 'togaf_assessments']);
  });

  describe('storeEmbeddings', () => {
    it('should group records by collection', async () => {
      const counts = await model.storeEmbeddings([
        record('f1', CORE),
        record('p1', GUIDE),
        record('a1', CORE, { chunkType: 'assessment_part_0' }),
        record('f2', CORE),
      ]);

      expect(counts).toEqual({ foundation: 2, practitioner: 1, assessments: 1 });
      const foundation = store('togaf_foundation').added;
      expect(foundation).toHaveLength(1);
      expect(foundation[0].ids).toEqual(['f1', 'f2']);
      expect(foundation[0].vectors).toEqual([[0.1, 0.2, 0.3], [0.1, 0.2, 0.3]]);
      expect(foundation[0].documents[0].pageContent).toBe('Stakeholders are mapped early.');
      expect(foundation[0].documents[0].metadata.chunk_id).toBe('f1');
    });

    it('should do nothing for an empty batch', async () => {
      expect(await model.storeEmbeddings([])).toEqual({ foundation: 0, practitioner: 0, assessments: 0 });
      expect(store('togaf_foundation').added).toEqual([]);
    });

    it('should propagate a failed collection write', async () => {
      store('togaf_practitioner').failure = new Error('disk full');

      await expect(model.storeEmbeddings([record('p1', GUIDE)])).rejects.toThrow('disk full');
    });
  });

  describe('search', () => {
    it('should merge collections by relevance and skip failing ones', async () => {
      store('togaf_foundation').hits = [
        [new Document({ pageContent: 'foundation text', metadata: { chunk_id: 'f1', word_count: 10, nested: { x: 1 } } }), 0.4],
      ];
      store('togaf_practitioner').hits = [
        [new Document({ pageContent: 'guide text', metadata: { chunk_id: 'p1' } }), 0.1],
      ];
      store('togaf_assessments').failure = new Error('timeout');

      const results = await model.search([1, 0, 0], { nResults: 2, filters: { difficulty_level: 'basic' } });

      expect(results.map(result => [result.chunkId, result.collection, result.document])).toEqual([
        ['p1', 'practitioner', 'guide text'],
        ['f1', 'foundation', 'foundation text'],
      ]);
      expect(results[0].relevanceScore).toBeCloseTo(0.9);
      expect(results[1].relevanceScore).toBeCloseTo(0.6);
      expect(results[1].metadata).toEqual({ chunk_id: 'f1', word_count: 10 });
      expect(store('togaf_foundation').queries).toEqual([
        { query: [1, 0, 0], k: 2, filter: { difficulty_level: { $eq: 'basic' } } },
      ]);
    });

    it('should only query the requested collections', async () => {
      await model.search([1, 0, 0], { collections: ['practitioner'] });

      expect(store('togaf_foundation').queries).toEqual([]);
      expect(store('togaf_practitioner').queries).toEqual([{ query: [1, 0, 0], k: 10, filter: undefined }]);
    });
  });

  describe('deleteByIds', () => {
    it('should delete from every collection', async () => {
      await model.deleteByIds(['f1', 'p1']);

      expect([...stores.values()].map(fake => fake.deleted)).toEqual([[['f1', 'p1']], [['f1', 'p1']], [['f1', 'p1']]]);
    });

    it('should skip an empty id list', async () => {
      await model.deleteByIds([]);

      expect(store('togaf_foundation').deleted).toEqual([]);
    });
  });

  describe('administration', () => {
    it('should report counts and per-collection errors', async () => {
      store('togaf_foundation').count = 12;
      store('togaf_assessments').failure = new Error('missing');

      expect(await model.getCollectionStats()).toEqual({
        foundation: { name: 'foundation', documentCount: 12 },
        practitioner: { name: 'practitioner', documentCount: 0 },
        assessments: { name: 'assessments', documentCount: 0, error: 'missing' },
      });
    });

    it('should recreate a deleted collection', async () => {
      expect(await model.deleteCollection('practitioner')).toBe(true);

      expect(admin.deletedCollections).toEqual(['togaf_practitioner']);
      expect(created).toEqual(['togaf_foundation', 'togaf_practitioner', 'togaf_assessments', 'togaf_practitioner']);
    });

    it('should report a failed reset', async () => {
      admin.failDelete = true;

      expect(await model.resetAll()).toBe(false);
    });

    it('should reflect the heartbeat', async () => {
      expect(await model.isReady()).toBe(true);
      admin.healthy = false;
      expect(await model.isReady()).toBe(false);
    });
  });
});
