import * as path from 'path';
import * as fs from 'fs-extra';
import { BaseService } from '../base/BaseService';
import { ExtractionError, type ExtractionAttempt } from '../base/ServiceError';
import type { IPdfReader, PdfPageImages, PdfPageTables, PdfTextPage } from './PdfParseReader';
import type {
  ExtractedImage,
  ExtractedPage,
  ExtractedTable,
  ExtractionMethod,
  ExtractionStats,
} from '../../shared/types/ingestion.types';

const MIN_PAGE_TEXT_LENGTH = 50;
const MIN_VALID_PAGE_RATIO = 0.5;

interface DocumentExtractorDeps {
  reader: IPdfReader;
  /** When set, embedded images are written here as PNG files. */
  imagesDir?: string;
}

interface ExtractionStrategy {
  method: ExtractionMethod;
  run(data: Uint8Array, pdfName: string): Promise<ExtractedPage[]>;
}

/**
 * A page list is usable when it is non-empty and at least half of its pages
 * carry more than 50 characters of trimmed text.
 */
export function validateExtraction(pages: ExtractedPage[]): boolean {
  if (pages.length === 0) {
    return false;
  }
  const validPages = pages.filter(page => page.text.trim().length > MIN_PAGE_TEXT_LENGTH).length;
  return validPages / pages.length >= MIN_VALID_PAGE_RATIO;
}

export function imageFileName(pdfName: string, pageNumber: number, index: number): string {
  return `${pdfName}_page${pageNumber}_img${index}.png`;
}

/**
 * Extracts per-page text, images and tables from a PDF, cascading through
 * three strategies until one passes validation.
 */
export class DocumentExtractor extends BaseService<DocumentExtractorDeps> {
  private readonly strategies: ExtractionStrategy[];
  private stats: ExtractionStats = DocumentExtractor.emptyStats();

  constructor(deps: DocumentExtractorDeps) {
    super('DocumentExtractor', deps);
    this.strategies = [
      { method: 'structured', run: (data, name) => this.extractStructured(data, name) },
      { method: 'text_and_tables', run: (data, name) => this.extractTextAndTables(data, name) },
      { method: 'basic_text', run: (data, name) => this.extractBasicText(data, name) },
    ];
  }

  private static emptyStats(): ExtractionStats {
    return {
      attempts: {
        structured: { successes: 0, failures: 0 },
        text_and_tables: { successes: 0, failures: 0 },
        basic_text: { successes: 0, failures: 0 },
      },
      documentsProcessed: 0,
      documentsFailed: 0,
      totalPages: 0,
    };
  }

  /**
   * Extract an ordered page list from the document at `filePath`.
   * @throws ExtractionError when every strategy fails or produces invalid output
   */
  async extract(filePath: string): Promise<ExtractedPage[]> {
    return this.execute('extract', async () => {
      const data = new Uint8Array(await fs.readFile(filePath));
      const pdfName = path.basename(filePath, path.extname(filePath));
      const attempts: ExtractionAttempt[] = [];

      for (const strategy of this.strategies) {
        try {
          const pages = await strategy.run(data, pdfName);
          if (validateExtraction(pages)) {
            this.stats.attempts[strategy.method].successes++;
            this.stats.documentsProcessed++;
            this.stats.totalPages += pages.length;
            this.logInfo(`Extracted ${pages.length} pages from ${pdfName} using ${strategy.method}`);
            return pages;
          }
          attempts.push({ method: strategy.method, error: 'validation failed' });
        } catch (error) {
          attempts.push({ method: strategy.method, error: error instanceof Error ? error.message : String(error) });
        }
        this.stats.attempts[strategy.method].failures++;
        this.logWarn(`${strategy.method} extraction rejected for ${pdfName}, trying next method`);
      }

      this.stats.documentsFailed++;
      throw new ExtractionError(filePath, attempts);
    }, { filePath });
  }

  getStats(): ExtractionStats {
    return structuredClone(this.stats);
  }

  resetStats(): void {
    this.stats = DocumentExtractor.emptyStats();
  }

  private async extractStructured(data: Uint8Array, pdfName: string): Promise<ExtractedPage[]> {
    const [textPages, imagePages, tablePages] = await Promise.all([
      this.deps.reader.readPages(data),
      this.deps.reader.readImages(data),
      this.deps.reader.readTables(data),
    ]);
    const images = await this.collectImages(imagePages, pdfName);
    return this.assemblePages(textPages, 'structured', pdfName, images, tableMap(tablePages));
  }

  private async extractTextAndTables(data: Uint8Array, pdfName: string): Promise<ExtractedPage[]> {
    const [textPages, tablePages] = await Promise.all([
      this.deps.reader.readPages(data),
      this.deps.reader.readTables(data),
    ]);
    return this.assemblePages(textPages, 'text_and_tables', pdfName, new Map(), tableMap(tablePages));
  }

  private async extractBasicText(data: Uint8Array, pdfName: string): Promise<ExtractedPage[]> {
    const textPages = await this.deps.reader.readPages(data);
    return this.assemblePages(textPages, 'basic_text', pdfName, new Map(), new Map());
  }

  private assemblePages(
    textPages: PdfTextPage[],
    method: ExtractionMethod,
    pdfName: string,
    images: Map<number, ExtractedImage[]>,
    tables: Map<number, ExtractedTable[]>
  ): ExtractedPage[] {
    return [...textPages]
      .sort((a, b) => a.pageNumber - b.pageNumber)
      .map(page => ({
        pageNumber: page.pageNumber,
        text: page.text,
        images: images.get(page.pageNumber) ?? [],
        tables: tables.get(page.pageNumber) ?? [],
        structureInfo: { fonts: [], bbox: null },
        method,
        documentTitle: pdfName,
        totalPages: textPages.length,
      }));
  }

  private async collectImages(imagePages: PdfPageImages[], pdfName: string): Promise<Map<number, ExtractedImage[]>> {
    const byPage = new Map<number, ExtractedImage[]>();
    if (this.deps.imagesDir) {
      await fs.ensureDir(this.deps.imagesDir);
    }

    for (const page of imagePages) {
      const extracted: ExtractedImage[] = [];
      for (const [index, raw] of page.images.entries()) {
        const image: ExtractedImage = {
          pageNumber: page.pageNumber,
          index,
          width: raw.width,
          height: raw.height,
          data: raw.data,
        };
        if (this.deps.imagesDir) {
          const target = path.join(this.deps.imagesDir, imageFileName(pdfName, page.pageNumber, index));
          await fs.writeFile(target, raw.data);
          image.savedPath = target;
        }
        extracted.push(image);
      }
      if (extracted.length > 0) {
        byPage.set(page.pageNumber, extracted);
      }
    }
    return byPage;
  }
}

function tableMap(tablePages: PdfPageTables[]): Map<number, ExtractedTable[]> {
  const byPage = new Map<number, ExtractedTable[]>();
  for (const page of tablePages) {
    const tables = page.tables.filter(table => table.length > 0);
    if (tables.length > 0) {
      byPage.set(page.pageNumber, tables);
    }
  }
  return byPage;
}
