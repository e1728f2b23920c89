import type { ContentMetadata } from './metadata.types';

export type ExtractionMethod = 'structured' | 'text_and_tables' | 'basic_text';

/** An embedded image found on a page. Bytes are PNG-encoded. */
export interface ExtractedImage {
  pageNumber: number;
  index: number;
  width: number;
  height: number;
  data: Uint8Array;
  savedPath?: string;
}

/** A table as rows of cell strings. */
export type ExtractedTable = string[][];

export interface PageStructureInfo {
  fonts: string[];
  bbox: [number, number, number, number] | null;
}

/** One page's raw extraction result. Consumed once by the chunker, never persisted. */
export interface ExtractedPage {
  pageNumber: number;
  text: string;
  images: ExtractedImage[];
  tables: ExtractedTable[];
  structureInfo: PageStructureInfo;
  method: ExtractionMethod;
  documentTitle: string;
  totalPages: number;
}

export interface ExtractionStats {
  attempts: Record<ExtractionMethod, { successes: number; failures: number }>;
  documentsProcessed: number;
  documentsFailed: number;
  totalPages: number;
}

export interface SectionInfo {
  number: string;
  title: string;
  fullHeader: string;
}

export type BaseChunkType = 'section' | 'paragraph' | 'table' | 'diagram' | 'content';


/** A bounded span of document text prepared for embedding. Immutable once created. */
export interface ContentChunk {
  readonly chunkId: string;
  readonly text: string;
  /** A BaseChunkType, or `<type>_part_<n>` / `merged_<a>_<b>` after optimization. */
  readonly chunkType: string;
  readonly startPage: number;
  readonly endPage: number;
  readonly images: readonly ExtractedImage[];
  readonly tables: readonly ExtractedTable[];
  readonly section: SectionInfo | null;
  readonly wordCount: number;
  readonly charCount: number;
  readonly sourceFile: string;
  readonly metadata: ContentMetadata;
}

export interface ChunkingOptions {
  chunkSize: number;
  chunkOverlap: number;
  maxChunkSize: number;
}

export interface ChunkStatistics {
  totalChunks: number;
  avgChunkSize: number;
  minChunkSize: number;
  maxChunkSize: number;
  avgWordCount: number;
  chunkTypes: Record<string, number>;
  totalImages: number;
  totalTables: number;
}

export type DocumentIngestionStatus = 'ingested' | 'skipped' | 'failed';

export interface DocumentIngestionResult {
  filePath: string;
  status: DocumentIngestionStatus;
  pages: number;
  chunks: number;
  /** Records written per collection key. */
  collections: Record<string, number>;
  error?: string;
}

export interface IngestionReport {
  rootDir: string;
  documents: DocumentIngestionResult[];
  totalChunks: number;
  chunkStatistics: ChunkStatistics;
  extractionStats: ExtractionStats;
  startedAt: string;
  durationMs: number;
}
