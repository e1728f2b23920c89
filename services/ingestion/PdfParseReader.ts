import { PDFParse } from 'pdf-parse';

export interface PdfTextPage {
  pageNumber: number;
  text: string;
}

export interface PdfRawImage {
  data: Uint8Array;
  width: number;
  height: number;
}

export interface PdfPageImages {
  pageNumber: number;
  images: PdfRawImage[];
}

export interface PdfPageTables {
  pageNumber: number;
  tables: string[][][];
}

/** Low-level page access used by the extraction strategies. */
export interface IPdfReader {
  readPages(data: Uint8Array): Promise<PdfTextPage[]>;
  readImages(data: Uint8Array): Promise<PdfPageImages[]>;
  readTables(data: Uint8Array): Promise<PdfPageTables[]>;
}

/**
 * pdf-parse backed reader. Each call opens its own parser over a copy of the bytes,
 * since pdf.js transfers the buffer it is given.
 */
export class PdfParseReader implements IPdfReader {
  private async withParser<T>(data: Uint8Array, fn: (parser: PDFParse) => Promise<T>): Promise<T> {
    const parser = new PDFParse({ data: new Uint8Array(data) });
    try {
      return await fn(parser);
    } finally {
      await parser.destroy();
    }
  }

  async readPages(data: Uint8Array): Promise<PdfTextPage[]> {
    return this.withParser(data, async parser => {
      const result = await parser.getText();
      return result.pages.map(page => ({ pageNumber: page.num, text: page.text }));
    });
  }

  async readImages(data: Uint8Array): Promise<PdfPageImages[]> {
    return this.withParser(data, async parser => {
      const result = await parser.getImage();
      return result.pages.map(page => ({
        pageNumber: page.pageNumber,
        images: page.images.map(image => ({ data: image.data, width: image.width, height: image.height })),
      }));
    });
  }

  async readTables(data: Uint8Array): Promise<PdfPageTables[]> {
    return this.withParser(data, async parser => {
      const result = await parser.getTable();
      return result.pages.map(page => ({ pageNumber: page.num, tables: page.tables }));
    });
  }
}
