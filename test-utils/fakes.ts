import type { BaseMessage } from '@langchain/core/messages';
import type { IVectorStoreModel } from '../models/ChromaVectorModel';
import type {
  IChatProvider,
  IEmbeddingProvider,
  IEmbeddingProviderCapabilities,
  ILLMCompletionOptions,
  ILLMContext,
  LLMTaskType,
} from '../shared/llm-types';
import type {
  CollectionCounts,
  CollectionKey,
  CollectionStats,
  EmbeddingRecord,
  VectorSearchOptions,
  VectorSearchResult,
} from '../shared/types/vector.types';

export interface RecordedChatCall {
  messages: BaseMessage[];
  context: ILLMContext;
  options?: ILLMCompletionOptions;
}

type ChatReply = string | Error;

/**
 * Chat provider answering from a per-task script. Tasks without a scripted
 * reply get `defaultReply`.
 */
export class FakeChatProvider implements IChatProvider {
  readonly providerName = 'fake';
  readonly modelName = 'fake-chat';
  readonly calls: RecordedChatCall[] = [];

  constructor(
    private readonly replies: Partial<Record<LLMTaskType, ChatReply>> = {},
    private readonly defaultReply: ChatReply = 'OK'
  ) {}

  async chat(messages: BaseMessage[], context: ILLMContext, options?: ILLMCompletionOptions): Promise<string> {
    this.calls.push({ messages, context, options });
    const reply = this.replies[context.taskType] ?? this.defaultReply;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  callsFor(taskType: LLMTaskType): RecordedChatCall[] {
    return this.calls.filter(call => call.context.taskType === taskType);
  }
}

/** Deterministic three-dimensional vectors derived from text length. */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly providerName = 'fake';
  readonly modelName = 'fake-embedding';
  readonly capabilities: IEmbeddingProviderCapabilities = { dimensions: 3, maxInputTokensPerDocument: 8191 };
  readonly documentBatches: string[][] = [];
  readonly queries: string[] = [];
  failWith: Error | null = null;

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (this.failWith) throw this.failWith;
    this.documentBatches.push([...texts]);
    return texts.map(text => [text.length, 0, 1]);
  }

  async embedQuery(text: string): Promise<number[]> {
    if (this.failWith) throw this.failWith;
    this.queries.push(text);
    return [text.length, 0, 1];
  }
}

/** In-process vector store returning a fixed result list for every search. */
export class FakeVectorStore implements IVectorStoreModel {
  readonly stored: EmbeddingRecord[] = [];
  readonly searches: Array<{ queryVector: number[]; options?: VectorSearchOptions }> = [];
  readonly deletedIds: string[][] = [];
  results: VectorSearchResult[] = [];
  ready = true;
  failStore: Error | null = null;

  async storeEmbeddings(records: EmbeddingRecord[]): Promise<CollectionCounts> {
    if (this.failStore) throw this.failStore;
    this.stored.push(...records);
    const counts: CollectionCounts = { foundation: 0, practitioner: 0, assessments: 0 };
    for (const record of records) {
      counts[record.metadata.certificationLevel === 'practitioner' ? 'practitioner' : 'foundation'] += 1;
    }
    return counts;
  }

  async search(queryVector: number[], options?: VectorSearchOptions): Promise<VectorSearchResult[]> {
    this.searches.push({ queryVector, options });
    return this.results.slice(0, options?.nResults ?? this.results.length);
  }

  async deleteByIds(ids: string[]): Promise<void> {
    this.deletedIds.push([...ids]);
  }

  async getCollectionStats(): Promise<Record<CollectionKey, CollectionStats>> {
    const count = (key: CollectionKey) => this.stored.filter(record =>
      (record.metadata.certificationLevel === 'practitioner' ? 'practitioner' : 'foundation') === key).length;
    return {
      foundation: { name: 'foundation', documentCount: count('foundation') },
      practitioner: { name: 'practitioner', documentCount: count('practitioner') },
      assessments: { name: 'assessments', documentCount: 0 },
    };
  }

  async deleteCollection(): Promise<boolean> {
    return true;
  }

  async resetAll(): Promise<boolean> {
    this.stored.length = 0;
    return true;
  }

  async isReady(): Promise<boolean> {
    return this.ready;
  }
}

export function vectorHit(chunkId: string, document: string, overrides: Partial<VectorSearchResult> = {}): VectorSearchResult {
  return {
    chunkId,
    collection: 'foundation',
    document,
    metadata: {
      chunk_id: chunkId,
      certification_level: 'foundation',
      content_type: 'concept',
      source_file: 'adm.pdf',
      start_page: 3,
      end_page: 3,
      word_count: 40,
    },
    distance: 0.2,
    relevanceScore: 0.8,
    ...overrides,
  };
}
