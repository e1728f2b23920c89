import type { IPdfReader, PdfPageImages, PdfPageTables, PdfTextPage } from '../services/ingestion/PdfParseReader';

export interface FakePdfDocument {
  pages?: PdfTextPage[];
  images?: PdfPageImages[];
  tables?: PdfPageTables[];
  /** Thrown by every read. */
  error?: Error;
  /** Thrown by readImages only. */
  imageError?: Error;
}

/**
 * PDF reader keyed by file content: the bytes of a test file are decoded as
 * UTF-8 and looked up in `documents`.
 */
export class FakePdfReader implements IPdfReader {
  readonly calls: Array<'pages' | 'images' | 'tables'> = [];

  constructor(private readonly documents: Record<string, FakePdfDocument>) {}

  async readPages(data: Uint8Array): Promise<PdfTextPage[]> {
    this.calls.push('pages');
    return this.lookup(data).pages ?? [];
  }

  async readImages(data: Uint8Array): Promise<PdfPageImages[]> {
    this.calls.push('images');
    const document = this.lookup(data);
    if (document.imageError) throw document.imageError;
    return document.images ?? [];
  }

  async readTables(data: Uint8Array): Promise<PdfPageTables[]> {
    this.calls.push('tables');
    return this.lookup(data).tables ?? [];
  }

  private lookup(data: Uint8Array): FakePdfDocument {
    const key = Buffer.from(data).toString('utf8');
    const document = this.documents[key];
    if (!document) {
      throw new Error(`Unknown test document '${key}'`);
    }
    if (document.error) throw document.error;
    return document;
  }
}
