import sharp from 'sharp';
import { pdfToPng } from 'pdf-to-png-converter';
import { POINTS_PER_INCH } from './coordinateTransformer';
import { PageRaster, PageRasterizer } from './models/types';

/**
 * Renders PDF pages to PNG in memory with pdf-to-png-converter.
 */
export class PdfPageRasterizer implements PageRasterizer {
  async rasterizePage(document: Buffer, pageNumber: number, dpi: number): Promise<PageRaster> {
    const pages = await this.render(document, dpi, [pageNumber]);
    const page = pages.find(p => p.pageNumber === pageNumber);
    if (!page) {
      throw new Error(`Page ${pageNumber} could not be rasterized`);
    }
    return page;
  }

  async rasterizeAll(document: Buffer, dpi: number): Promise<PageRaster[]> {
    return this.render(document, dpi);
  }

  private async render(document: Buffer, dpi: number, pagesToProcess?: number[]): Promise<PageRaster[]> {
    // pdfjs may detach the buffer it is given, so it gets a copy
    const pngPages = await pdfToPng(new Uint8Array(document).buffer, {
      viewportScale: dpi / POINTS_PER_INCH,
      pagesToProcess
    });

    const rasters: PageRaster[] = [];
    for (const page of pngPages) {
      if (!page.content || page.content.length === 0) {
        continue;
      }
      const { width, height } = await sharp(page.content).metadata();
      if (!width || !height) {
        continue;
      }
      rasters.push({
        pageNumber: page.pageNumber,
        pixelWidth: width,
        pixelHeight: height,
        image: page.content,
        mimeType: 'image/png',
        origin: 'rendered'
      });
    }
    return rasters;
  }
}
