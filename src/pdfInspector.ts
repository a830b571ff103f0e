import { PDFDocument } from 'pdf-lib';
import { DocumentInfo, DocumentInspector, Size } from './models/types';

/**
 * Reads page count and page sizes (points) with pdf-lib.
 */
export class PdfDocumentInspector implements DocumentInspector {
  async inspect(document: Buffer): Promise<DocumentInfo> {
    const pdfDoc = await PDFDocument.load(document, { ignoreEncryption: true, updateMetadata: false });
    const pageSizes = new Map<number, Size>();
    pdfDoc.getPages().forEach((page, index) => {
      const { width, height } = page.getSize();
      pageSizes.set(index + 1, { width, height });
    });
    return {
      pageCount: pdfDoc.getPageCount(),
      pageSizes,
      creationDate: pdfDoc.getCreationDate()?.toISOString()
    };
  }
}
