import sharp from 'sharp';
import { PageRaster, PageRasterizer } from './models/types';
import logger from './utils/logger';

/**
 * Per-job cache of page rasters. Each page is rasterized at most once; a page
 * that failed stays missing for the rest of the job.
 */
export class PageRasterCache {
  private pages = new Map<number, Promise<PageRaster | undefined>>();

  constructor(
    private readonly rasterizer: PageRasterizer,
    private readonly document: Buffer,
    private readonly dpi: number,
    readonly pageCount: number
  ) {}

  /**
   * Registers a raster the extraction service already returned for a page.
   */
  async seed(pageNumber: number, image: Buffer): Promise<boolean> {
    if (image.length === 0 || this.pages.has(pageNumber)) {
      return false;
    }
    try {
      const { width, height, format } = await sharp(image).metadata();
      if (!width || !height) {
        logger.warn(`Service image for page ${pageNumber} has no readable dimensions, ignoring it`);
        return false;
      }
      this.pages.set(pageNumber, Promise.resolve({
        pageNumber,
        pixelWidth: width,
        pixelHeight: height,
        image,
        mimeType: format ? `image/${format}` : 'image/png',
        origin: 'service'
      }));
      return true;
    } catch (error) {
      logger.warn({ err: error }, `Could not decode service image for page ${pageNumber}`);
      return false;
    }
  }

  get(pageNumber: number): Promise<PageRaster | undefined> {
    const cached = this.pages.get(pageNumber);
    if (cached) {
      return cached;
    }
    const pending = this.load(pageNumber);
    this.pages.set(pageNumber, pending);
    return pending;
  }

  /**
   * Rasters for every page in order. When nothing is cached yet the whole
   * document is rasterized in one pass.
   */
  async getAll(): Promise<PageRaster[]> {
    if (this.pages.size === 0 && this.pageCount > 0) {
      try {
        const rendered = await this.rasterizer.rasterizeAll(this.document, this.dpi);
        for (const raster of rendered) {
          if (raster.image.length > 0 && raster.pageNumber >= 1 && raster.pageNumber <= this.pageCount) {
            this.pages.set(raster.pageNumber, Promise.resolve(raster));
          }
        }
      } catch (error) {
        logger.error({ err: error }, 'Failed to rasterize document, falling back to single pages');
      }
    }

    const rasters: PageRaster[] = [];
    for (let pageNumber = 1; pageNumber <= this.pageCount; pageNumber++) {
      const raster = await this.get(pageNumber);
      if (raster) {
        rasters.push(raster);
      }
    }
    return rasters;
  }

  get size(): number {
    return this.pages.size;
  }

  private async load(pageNumber: number): Promise<PageRaster | undefined> {
    if (pageNumber < 1 || pageNumber > this.pageCount) {
      logger.warn(`Page ${pageNumber} is outside the document (1-${this.pageCount})`);
      return undefined;
    }
    try {
      logger.debug(`Rasterizing page ${pageNumber} at ${this.dpi} DPI`);
      const raster = await this.rasterizer.rasterizePage(this.document, pageNumber, this.dpi);
      if (raster.image.length === 0 || raster.pixelWidth <= 0 || raster.pixelHeight <= 0) {
        logger.warn(`Rasterizer returned an empty image for page ${pageNumber}`);
        return undefined;
      }
      return raster;
    } catch (error) {
      logger.error({ err: error }, `Failed to rasterize page ${pageNumber}`);
      return undefined;
    }
  }
}
