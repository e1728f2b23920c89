import { v4 as uuidv4 } from 'uuid';
import { BaseService } from '../base/BaseService';
import { ValidationError } from '../base/ServiceError';
import type { MetadataBuilder } from './MetadataBuilder';
import { countNonWhitespace, countWords } from '../../utils/text';
import type {
  BaseChunkType,
  ChunkStatistics,
  ChunkingOptions,
  ContentChunk,
  ExtractedImage,
  ExtractedPage,
  ExtractedTable,
  SectionInfo,
} from '../../shared/types/ingestion.types';

const SECTION_PATTERNS: readonly RegExp[] = [
  /^(\d+\.?\d*\.?\d*)\s+(.+)$/,
  /^([A-Z]\.?\d*)\s+(.+)$/,
];
const HEADER_SCAN_LINES = 10;
const MIN_SECTION_FLUSH_CHARS = 50;
const PARAGRAPH_WORD_LIMIT = 100;
const SENTENCE_OVERLAP = 2;

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  chunkSize: 2000,
  chunkOverlap: 200,
  maxChunkSize: 3000,
};

interface ContentChunkerDeps {
  metadataBuilder: MetadataBuilder;
  options?: Partial<ChunkingOptions>;
}

interface ChunkDraft {
  text: string;
  section: SectionInfo | null;
  startPage: number;
  endPage: number;
  images: ExtractedImage[];
  tables: ExtractedTable[];
}

interface DocumentContext {
  sourcePath: string;
  totalPages: number;
  processingMethod: string;
}

/**
 * Looks for a numbered (`2.3 Title`) or lettered (`A Title`) header within
 * the first ten non-blank lines of a page.
 */
export function extractSectionInfo(text: string): SectionInfo | null {
  if (!text) return null;
  const lines = text.split('\n').slice(0, HEADER_SCAN_LINES);
  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;
    for (const pattern of SECTION_PATTERNS) {
      const match = pattern.exec(line);
      if (match) {
        return { number: match[1], title: match[2].trim(), fullHeader: line };
      }
    }
  }
  return null;
}

export function determineChunkType(text: string, section: SectionInfo | null, imageCount: number, tableCount: number): BaseChunkType {
  if (tableCount > 0) return 'table';
  if (imageCount > 0) return 'diagram';
  if (section) return 'section';
  if (countWords(text) < PARAGRAPH_WORD_LIMIT) return 'paragraph';
  return 'content';
}

/**
 * Splits extracted pages into section-aligned chunks bounded by `maxChunkSize`,
 * then rebalances them: oversize chunks are split on paragraphs and undersized
 * neighbours are merged.
 */
export class ContentChunker extends BaseService<ContentChunkerDeps> {
  private readonly options: ChunkingOptions;

  constructor(deps: ContentChunkerDeps) {
    super('ContentChunker', deps);
    this.options = { ...DEFAULT_CHUNKING_OPTIONS, ...deps.options };
    if (this.options.chunkOverlap >= this.options.chunkSize) {
      throw new ValidationError('chunkOverlap must be smaller than chunkSize', this.options);
    }
    if (this.options.maxChunkSize < this.options.chunkSize) {
      throw new ValidationError('maxChunkSize must be at least chunkSize', this.options);
    }
  }

  getOptions(): ChunkingOptions {
    return { ...this.options };
  }

  async chunkDocument(pages: ExtractedPage[], sourcePath: string): Promise<ContentChunk[]> {
    return this.execute('chunkDocument', async () => {
      if (pages.length === 0) {
        return [];
      }
      const context: DocumentContext = {
        sourcePath,
        totalPages: pages[0].totalPages || pages.length,
        processingMethod: pages[0].method,
      };
      const chunks = this.optimizeChunks(this.buildDrafts(pages).map(draft => this.toChunk(draft, context)));
      this.logInfo(`Created ${chunks.length} chunks from ${pages.length} pages of ${sourcePath}`);
      return chunks;
    }, { sourcePath, pages: pages.length });
  }

  /**
   * Splits chunks over `maxChunkSize` on paragraph boundaries and folds
   * undersized chunks into their predecessor.
   *
   * Split and merged chunks keep the metadata of the chunk they started from,
   * so a merged chunk reports the chapter and section of its first half.
   */
  optimizeChunks(chunks: readonly ContentChunk[]): ContentChunk[] {
    const { chunkSize, maxChunkSize } = this.options;
    const split = chunks.flatMap(chunk => (chunk.text.length > maxChunkSize ? this.splitOversized(chunk) : [chunk]));

    const merged: ContentChunk[] = [];
    for (const chunk of split) {
      const previous = merged[merged.length - 1];
      const canMerge = previous !== undefined
        && chunk.text.length < chunkSize / 2
        && previous.text.length < chunkSize
        && previous.text.length + 2 + chunk.text.length <= maxChunkSize;
      if (canMerge) {
        const text = `${previous.text}\n\n${chunk.text}`;
        merged[merged.length - 1] = {
          ...previous,
          text,
          chunkType: `merged_${previous.chunkType}_${chunk.chunkType}`,
          endPage: chunk.endPage,
          images: [...previous.images, ...chunk.images],
          tables: [...previous.tables, ...chunk.tables],
          wordCount: countWords(text),
          charCount: text.length,
        };
      } else {
        merged.push(chunk);
      }
    }
    return merged;
  }

  private buildDrafts(pages: ExtractedPage[]): ChunkDraft[] {
    const { maxChunkSize, chunkOverlap } = this.options;
    const drafts: ChunkDraft[] = [];

    let buffer = '';
    let images: ExtractedImage[] = [];
    let tables: ExtractedTable[] = [];
    let section: SectionInfo | null = null;
    let startPage = pages[0].pageNumber;

    const flush = (text: string, endPage: number) => {
      if (text.trim()) {
        drafts.push({ text, section, startPage, endPage, images, tables });
      }
    };

    for (const page of pages) {
      const header = extractSectionInfo(page.text);

      if (header && buffer.trim()) {
        if (countNonWhitespace(buffer) > MIN_SECTION_FLUSH_CHARS) {
          flush(buffer, page.pageNumber - 1);
          buffer = '';
          images = [];
          tables = [];
          startPage = page.pageNumber;
        }
        // A buffer too small to stand alone is carried into the new section.
        section = header;
      } else if (header) {
        section = header;
        startPage = page.pageNumber;
      }

      buffer += `\n\n${page.text}`;
      images = [...images, ...page.images];
      tables = [...tables, ...page.tables];

      while (buffer.length > maxChunkSize) {
        flush(buffer.slice(0, maxChunkSize), page.pageNumber);
        buffer = buffer.slice(maxChunkSize - chunkOverlap);
        images = [];
        tables = [];
        startPage = page.pageNumber;
      }
    }

    flush(buffer, pages[pages.length - 1].pageNumber);
    return drafts.map(draft => ({ ...draft, text: draft.text.trim() }));
  }

  private splitOversized(chunk: ContentChunk): ContentChunk[] {
    const { maxChunkSize } = this.options;
    const paragraphs = chunk.text
      .split('\n\n')
      .filter(paragraph => paragraph.trim())
      .flatMap(paragraph => hardSplit(paragraph, maxChunkSize));

    const pieces: string[] = [];
    let current = '';
    for (const paragraph of paragraphs) {
      const candidate = current ? `${current}\n\n${paragraph}` : paragraph;
      if (candidate.length > maxChunkSize && current) {
        pieces.push(current.trim());
        const overlap = trailingSentences(current, SENTENCE_OVERLAP);
        const seeded = overlap ? `${overlap}\n\n${paragraph}` : paragraph;
        current = seeded.length <= maxChunkSize ? seeded : paragraph;
      } else {
        current = candidate;
      }
    }
    if (current.trim()) {
      pieces.push(current.trim());
    }

    return pieces.map((text, index) => ({
      ...chunk,
      chunkId: uuidv4(),
      text,
      chunkType: `${chunk.chunkType}_part_${index}`,
      images: index === 0 ? chunk.images : [],
      tables: index === 0 ? chunk.tables : [],
      wordCount: countWords(text),
      charCount: text.length,
    }));
  }

  private toChunk(draft: ChunkDraft, context: DocumentContext): ContentChunk {
    const metadata = this.deps.metadataBuilder.build({
      sourcePath: context.sourcePath,
      text: draft.text,
      imageCount: draft.images.length,
      tableCount: draft.tables.length,
      section: draft.section,
      pageNumber: draft.startPage,
      totalPages: context.totalPages,
      processingMethod: context.processingMethod,
    });

    return {
      chunkId: uuidv4(),
      text: draft.text,
      chunkType: determineChunkType(draft.text, draft.section, draft.images.length, draft.tables.length),
      startPage: draft.startPage,
      endPage: draft.endPage,
      images: draft.images,
      tables: draft.tables,
      section: draft.section,
      wordCount: countWords(draft.text),
      charCount: draft.text.length,
      sourceFile: context.sourcePath,
      metadata,
    };
  }
}

/** Cuts a paragraph longer than `limit` into consecutive `limit`-sized pieces. */
function hardSplit(paragraph: string, limit: number): string[] {
  if (paragraph.length <= limit) return [paragraph];
  const pieces: string[] = [];
  for (let offset = 0; offset < paragraph.length; offset += limit) {
    pieces.push(paragraph.slice(offset, offset + limit));
  }
  return pieces;
}

/** The last `count` `'. '`-separated sentences, or '' when the text has no more than that. */
function trailingSentences(text: string, count: number): string {
  const sentences = text.split('. ');
  if (sentences.length <= count) return '';
  return sentences.slice(-count).join('. ');
}

export function getChunkStatistics(chunks: readonly ContentChunk[]): ChunkStatistics {
  if (chunks.length === 0) {
    return {
      totalChunks: 0,
      avgChunkSize: 0,
      minChunkSize: 0,
      maxChunkSize: 0,
      avgWordCount: 0,
      chunkTypes: {},
      totalImages: 0,
      totalTables: 0,
    };
  }
  const sizes = chunks.map(chunk => chunk.text.length);
  const chunkTypes: Record<string, number> = {};
  for (const chunk of chunks) {
    chunkTypes[chunk.chunkType] = (chunkTypes[chunk.chunkType] ?? 0) + 1;
  }
  return {
    totalChunks: chunks.length,
    avgChunkSize: sizes.reduce((sum, size) => sum + size, 0) / chunks.length,
    minChunkSize: Math.min(...sizes),
    maxChunkSize: Math.max(...sizes),
    avgWordCount: chunks.reduce((sum, chunk) => sum + chunk.wordCount, 0) / chunks.length,
    chunkTypes,
    totalImages: chunks.reduce((sum, chunk) => sum + chunk.images.length, 0),
    totalTables: chunks.reduce((sum, chunk) => sum + chunk.tables.length, 0),
  };
}
