import * as path from 'path';
import * as fs from 'fs-extra';
import PQueue from 'p-queue';
import { BaseService } from '../base/BaseService';
import type { ContentChunker } from './ContentChunker';
import { getChunkStatistics } from './ContentChunker';
import type { DocumentExtractor } from './DocumentExtractor';
import type { EmbeddingGenerator } from './EmbeddingGenerator';
import type { IVectorStoreModel } from '../../models/ChromaVectorModel';
import type {
  ContentChunk,
  DocumentIngestionResult,
  IngestionReport,
} from '../../shared/types/ingestion.types';

interface IngestionPipelineDeps {
  extractor: DocumentExtractor;
  chunker: ContentChunker;
  embeddings: EmbeddingGenerator;
  vectorStore: IVectorStoreModel;
  /** Documents processed at once. Defaults to 2. */
  concurrency?: number;
}

/** Subdirectories of the documents root that hold curriculum PDFs. */
export const INGESTED_DIRECTORIES = ['core_topics', 'extended_topics'] as const;

const DEFAULT_CONCURRENCY = 2;

/** PDF files directly inside `dir`, sorted by name. A missing directory yields none. */
export async function findPdfFiles(dir: string): Promise<string[]> {
  if (!(await fs.pathExists(dir))) {
    return [];
  }
  const entries = await fs.readdir(dir);
  return entries
    .filter(name => name.toLowerCase().endsWith('.pdf'))
    .sort()
    .map(name => path.join(dir, name));
}

/**
 * Offline ingestion: extract, chunk, embed and store every curriculum PDF
 * under a documents root.
 */
export class IngestionPipeline extends BaseService<IngestionPipelineDeps> {
  private readonly queue: PQueue;

  constructor(deps: IngestionPipelineDeps) {
    super('IngestionPipeline', deps);
    this.queue = new PQueue({ concurrency: deps.concurrency ?? DEFAULT_CONCURRENCY });
  }

  /**
   * Ingests `core_topics/*.pdf` and `extended_topics/*.pdf` under `rootDir`.
   * A document that fails is reported as failed and the rest continue.
   */
  async ingestDirectory(rootDir: string): Promise<IngestionReport> {
    return this.execute('ingestDirectory', async () => {
      const startedAt = new Date();
      this.deps.extractor.resetStats();

      const files: string[] = [];
      for (const directory of INGESTED_DIRECTORIES) {
        files.push(...await findPdfFiles(path.join(rootDir, directory)));
      }
      this.logInfo(`Found ${files.length} PDF documents under ${rootDir}`);

      const allChunks: ContentChunk[] = [];
      const documents = await Promise.all(files.map(filePath => this.queue.add(async () => {
        try {
          const { result, chunks } = await this.processDocument(filePath);
          allChunks.push(...chunks);
          return result;
        } catch (error) {
          this.logError(`Failed to ingest ${filePath}`, error);
          return this.failedResult(filePath, error);
        }
      })));

      const report: IngestionReport = {
        rootDir,
        documents,
        totalChunks: allChunks.length,
        chunkStatistics: getChunkStatistics(allChunks),
        extractionStats: this.deps.extractor.getStats(),
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - startedAt.getTime(),
      };

      const failed = documents.filter(document => document.status === 'failed').length;
      this.logInfo(`Ingested ${documents.length - failed}/${documents.length} documents, ${report.totalChunks} chunks in ${report.durationMs}ms`);
      return report;
    }, { rootDir });
  }

  /** Runs one document through the pipeline. Failures propagate. */
  async ingestDocument(filePath: string): Promise<DocumentIngestionResult> {
    const { result } = await this.processDocument(filePath);
    return result;
  }

  private async processDocument(filePath: string): Promise<{ result: DocumentIngestionResult; chunks: ContentChunk[] }> {
    const { extractor, chunker, embeddings, vectorStore } = this.deps;

    const pages = await extractor.extract(filePath);
    const chunks = await chunker.chunkDocument(pages, filePath);
    if (chunks.length === 0) {
      this.logWarn(`No content chunks produced for ${filePath}`);
      return {
        result: { filePath, status: 'skipped', pages: pages.length, chunks: 0, collections: {} },
        chunks,
      };
    }

    const records = await embeddings.generateEmbeddings(chunks);
    const collections = await this.withCompensation(
      () => vectorStore.storeEmbeddings(records),
      () => vectorStore.deleteByIds(records.map(record => record.chunkId))
    );

    return {
      result: { filePath, status: 'ingested', pages: pages.length, chunks: chunks.length, collections },
      chunks,
    };
  }

  private failedResult(filePath: string, error: unknown): DocumentIngestionResult {
    return {
      filePath,
      status: 'failed',
      pages: 0,
      chunks: 0,
      collections: {},
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
