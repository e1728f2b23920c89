import { describe, it, expect, vi } from 'vitest';
import {
  ContentChunker,
  determineChunkType,
  extractSectionInfo,
  getChunkStatistics,
} from '../ContentChunker';
import { MetadataBuilder } from '../MetadataBuilder';
import { ValidationError } from '../../base/ServiceError';
import type { ContentChunk, ExtractedPage } from '../../../shared/types/ingestion.types';

vi.mock('../../../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const SOURCE = '/docs/core_topics/C220-Part1e.pdf';

function page(pageNumber: number, text: string): ExtractedPage {
  return {
    pageNumber,
    text,
    images: [],
    tables: [],
    structureInfo: { fonts: [], bbox: null },
    method: 'basic_text',
    documentTitle: 'C220-Part1e',
    totalPages: 3,
  };
}

function chunk(text: string, overrides: Partial<ContentChunk> = {}): ContentChunk {
  const metadata = new MetadataBuilder().build({
    sourcePath: SOURCE,
    text,
    imageCount: 0,
    tableCount: 0,
    section: null,
    pageNumber: 1,
    totalPages: 3,
    processingMethod: 'basic_text',
  });
  return {
    chunkId: 'chunk-1',
    text,
    chunkType: 'content',
    startPage: 1,
    endPage: 1,
    images: [],
    tables: [],
    section: null,
    wordCount: text.split(/\s+/).length,
    charCount: text.length,
    sourceFile: SOURCE,
    metadata,
    ...overrides,
  };
}

const INTRO = '1 Introduction\nThe framework organises enterprise architecture work into repeatable phases.';
const VISION = '2 Phase A: Architecture Vision\nThe vision phase sets scope and stakeholders.';
const AGREEMENT = 'Stakeholders agree on the target state.';

describe('extractSectionInfo', () => {
  it('should find numbered and lettered headers', () => {
    expect(extractSectionInfo('\n2.3 Stakeholder Map\nBody')).toEqual({
      number: '2.3',
      title: 'Stakeholder Map',
      fullHeader: '2.3 Stakeholder Map',
    });
    expect(extractSectionInfo('B Architecture Vision')).toEqual({
      number: 'B',
      title: 'Architecture Vision',
      fullHeader: 'B Architecture Vision',
    });
  });

  it('should only scan the top of the page', () => {
    const body = Array.from({ length: 10 }, () => 'plain text').join('\n');
    expect(extractSectionInfo(`${body}\n3 Late Header`)).toBeNull();
    expect(extractSectionInfo('')).toBeNull();
  });
});

describe('determineChunkType', () => {
  it('should rank tables, diagrams, sections and short paragraphs', () => {
    const section = { number: '1', title: 'Intro', fullHeader: '1 Intro' };
    expect(determineChunkType('text', section, 1, 1)).toBe('table');
    expect(determineChunkType('text', section, 1, 0)).toBe('diagram');
    expect(determineChunkType('text', section, 0, 0)).toBe('section');
    expect(determineChunkType('text', null, 0, 0)).toBe('paragraph');
    expect(determineChunkType(Array.from({ length: 100 }, () => 'word').join(' '), null, 0, 0)).toBe('content');
  });
});

describe('ContentChunker', () => {
  const metadataBuilder = new MetadataBuilder();

  it('should reject inconsistent options', () => {
    expect(() => new ContentChunker({ metadataBuilder, options: { chunkSize: 100, chunkOverlap: 100 } }))
      .toThrow(ValidationError);
    expect(() => new ContentChunker({ metadataBuilder, options: { chunkSize: 100, maxChunkSize: 50 } }))
      .toThrow(ValidationError);
  });

  it('should return nothing for a document without pages', async () => {
    const chunker = new ContentChunker({ metadataBuilder });
    expect(await chunker.chunkDocument([], SOURCE)).toEqual([]);
  });

  it('should start a new chunk at each section header', async () => {
    const chunker = new ContentChunker({
      metadataBuilder,
      options: { chunkSize: 60, chunkOverlap: 10, maxChunkSize: 3000 },
    });

    const chunks = await chunker.chunkDocument([page(1, INTRO), page(2, VISION), page(3, AGREEMENT)], SOURCE);

    expect(chunks.map(({ text, startPage, endPage, chunkType }) => ({ text, startPage, endPage, chunkType }))).toEqual([
      { text: INTRO, startPage: 1, endPage: 1, chunkType: 'section' },
      { text: `${VISION}\n\n${AGREEMENT}`, startPage: 2, endPage: 3, chunkType: 'section' },
    ]);
    expect(chunks[0].metadata.contentType).toBe('framework');
    expect(chunks[1].section?.title).toBe('Phase A: Architecture Vision');
    expect(chunks[1].metadata.semanticInfo.admPhases).toEqual(['phase_a']);
    expect(chunks[1].metadata.structuralInfo.pageNumber).toBe(2);
    expect(chunks[1].sourceFile).toBe(SOURCE);
  });

  it('should carry a short leading fragment into the next section', async () => {
    const chunker = new ContentChunker({ metadataBuilder });
    const business = '3 Business Architecture\nThe business layer describes capabilities.';

    const chunks = await chunker.chunkDocument([page(1, 'Short note.'), page(2, business)], SOURCE);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].text).toBe(`Short note.\n\n${business}`);
    expect(chunks[0].startPage).toBe(1);
    expect(chunks[0].endPage).toBe(2);
    expect(chunks[0].section?.number).toBe('3');
    expect(chunks[0].metadata.semanticInfo.admPhases).toEqual(['phase_b']);
  });

  it('should merge small neighbouring sections', async () => {
    const chunker = new ContentChunker({ metadataBuilder });

    const chunks = await chunker.chunkDocument([page(1, INTRO), page(2, VISION), page(3, AGREEMENT)], SOURCE);

    expect(chunks).toHaveLength(1);
    expect(chunks[0].chunkType).toBe('merged_section_section');
    expect(chunks[0].text).toBe(`${INTRO}\n\n${VISION}\n\n${AGREEMENT}`);
    expect(chunks[0].startPage).toBe(1);
    expect(chunks[0].endPage).toBe(3);
    expect(chunks[0].section?.number).toBe('1');
  });

  it('should window long pages with the configured overlap', async () => {
    const chunker = new ContentChunker({
      metadataBuilder,
      options: { chunkSize: 100, chunkOverlap: 20, maxChunkSize: 150 },
    });
    const text = 'abcdefghij'.repeat(32);

    const chunks = await chunker.chunkDocument([page(1, text)], SOURCE);

    expect(chunks.map(c => c.text)).toEqual([text.slice(0, 148), text.slice(128, 278), text.slice(258)]);
    expect(chunks.every(c => c.charCount <= 150)).toBe(true);
    expect(chunks.every(c => c.chunkType === 'paragraph')).toBe(true);

    expect(getChunkStatistics(chunks)).toEqual({
      totalChunks: 3,
      avgChunkSize: 120,
      minChunkSize: 62,
      maxChunkSize: 150,
      avgWordCount: 1,
      chunkTypes: { paragraph: 3 },
      totalImages: 0,
      totalTables: 0,
    });
  });

  describe('optimizeChunks', () => {
    const chunker = new ContentChunker({
      metadataBuilder,
      options: { chunkSize: 100, chunkOverlap: 20, maxChunkSize: 150 },
    });

    it('should split an oversized chunk on paragraphs with a sentence overlap', () => {
      const first = 'Scope is agreed first. Drivers are listed next.';
      const second = 'Principles are reviewed. Stakeholders are mapped. Risks are logged.';
      const third = 'The vision is approved by the sponsor and published widely.';
      const image = { pageNumber: 1, index: 0, width: 10, height: 10, data: new Uint8Array([1]) };

      const pieces = chunker.optimizeChunks([chunk(`${first}\n\n${second}\n\n${third}`, { images: [image] })]);

      expect(pieces.map(piece => piece.text)).toEqual([
        `${first}\n\n${second}`,
        `Stakeholders are mapped. Risks are logged.\n\n${third}`,
      ]);
      expect(pieces.map(piece => piece.chunkType)).toEqual(['content_part_0', 'content_part_1']);
      expect(pieces[0].images).toEqual([image]);
      expect(pieces[1].images).toEqual([]);
      expect(pieces[0].chunkId).not.toBe(pieces[1].chunkId);
    });

    it('should fold a small chunk into its predecessor', () => {
      const merged = chunker.optimizeChunks([
        chunk('Short one.', { chunkType: 'paragraph' }),
        chunk('Short two.', { chunkType: 'paragraph', startPage: 2, endPage: 2 }),
      ]);

      expect(merged).toHaveLength(1);
      expect(merged[0]).toMatchObject({
        text: 'Short one.\n\nShort two.',
        chunkType: 'merged_paragraph_paragraph',
        startPage: 1,
        endPage: 2,
        wordCount: 4,
        charCount: 22,
      });
    });
  });

  it('should report empty statistics for no chunks', () => {
    expect(getChunkStatistics([]).totalChunks).toBe(0);
  });
});
