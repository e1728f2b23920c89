import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs-extra';
import { DocumentExtractor, imageFileName, validateExtraction } from '../DocumentExtractor';
import { ExtractionError } from '../../base/ServiceError';
import { FakePdfReader } from '../../../test-utils/FakePdfReader';
import type { ExtractedPage } from '../../../shared/types/ingestion.types';

vi.mock('../../../utils/logger', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const LONG_TEXT = 'The Architecture Development Method describes a repeatable cycle of phases.';

function extractedPage(pageNumber: number, text: string): ExtractedPage {
  return {
    pageNumber,
    text,
    images: [],
    tables: [],
    structureInfo: { fonts: [], bbox: null },
    method: 'basic_text',
    documentTitle: 'doc',
    totalPages: 1,
  };
}

describe('validateExtraction', () => {
  it('should require half of the pages to carry real text', () => {
    expect(validateExtraction([])).toBe(false);
    expect(validateExtraction([extractedPage(1, LONG_TEXT), extractedPage(2, 'short')])).toBe(true);
    expect(validateExtraction([
      extractedPage(1, LONG_TEXT),
      extractedPage(2, 'short'),
      extractedPage(3, `   ${'x'.repeat(50)}   `),
    ])).toBe(false);
  });
});

describe('imageFileName', () => {
  it('should name images by document, page and index', () => {
    expect(imageFileName('C220-Part1e', 4, 2)).toBe('C220-Part1e_page4_img2.png');
  });
});

describe('DocumentExtractor', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'extractor-'));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  async function writePdf(name: string, key: string): Promise<string> {
    const filePath = path.join(tmpDir, name);
    await fs.writeFile(filePath, key, 'utf8');
    return filePath;
  }

  it('should assemble ordered pages with images and tables', async () => {
    const imagesDir = path.join(tmpDir, 'images');
    const reader = new FakePdfReader({
      full: {
        pages: [{ pageNumber: 2, text: LONG_TEXT }, { pageNumber: 1, text: LONG_TEXT }],
        images: [{ pageNumber: 1, images: [{ data: new Uint8Array([1, 2, 3]), width: 4, height: 5 }] }],
        tables: [{ pageNumber: 2, tables: [[['Phase', 'Output']], []] }],
      },
    });
    const extractor = new DocumentExtractor({ reader, imagesDir });
    const filePath = await writePdf('guide.pdf', 'full');

    const pages = await extractor.extract(filePath);

    expect(pages.map(p => p.pageNumber)).toEqual([1, 2]);
    expect(pages.every(p => p.method === 'structured' && p.documentTitle === 'guide' && p.totalPages === 2)).toBe(true);
    expect(pages[0].images).toHaveLength(1);
    expect(pages[0].images[0].savedPath).toBe(path.join(imagesDir, 'guide_page1_img0.png'));
    expect(await fs.pathExists(path.join(imagesDir, 'guide_page1_img0.png'))).toBe(true);
    expect(pages[1].tables).toEqual([[['Phase', 'Output']]]);
    expect(pages[1].images).toEqual([]);

    const stats = extractor.getStats();
    expect(stats.attempts.structured.successes).toBe(1);
    expect(stats.documentsProcessed).toBe(1);
    expect(stats.totalPages).toBe(2);
  });

  it('should fall back to text and tables when images cannot be read', async () => {
    const reader = new FakePdfReader({
      partial: {
        pages: [{ pageNumber: 1, text: LONG_TEXT }],
        imageError: new Error('image stream damaged'),
      },
    });
    const extractor = new DocumentExtractor({ reader });

    const pages = await extractor.extract(await writePdf('partial.pdf', 'partial'));

    expect(pages[0].method).toBe('text_and_tables');
    const stats = extractor.getStats();
    expect(stats.attempts.structured.failures).toBe(1);
    expect(stats.attempts.text_and_tables.successes).toBe(1);
  });

  it('should report every attempt when no method yields usable text', async () => {
    const reader = new FakePdfReader({ scanned: { pages: [{ pageNumber: 1, text: 'scan' }] } });
    const extractor = new DocumentExtractor({ reader });
    const filePath = await writePdf('scanned.pdf', 'scanned');

    const error = await extractor.extract(filePath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExtractionError);
    if (!(error instanceof ExtractionError)) return;
    expect(error.attempts).toEqual([
      { method: 'structured', error: 'validation failed' },
      { method: 'text_and_tables', error: 'validation failed' },
      { method: 'basic_text', error: 'validation failed' },
    ]);
    expect(error.message).toBe(
      `All extraction methods failed for ${filePath} (structured: validation failed; text_and_tables: validation failed; basic_text: validation failed)`
    );
    expect(extractor.getStats().documentsFailed).toBe(1);

    extractor.resetStats();
    expect(extractor.getStats().documentsFailed).toBe(0);
  });
});
