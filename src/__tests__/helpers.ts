import * as os from 'os';
import * as path from 'path';
import * as fse from 'fs-extra';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { Entity, ExtractionService, PageRaster, PageRasterizer, ServiceInfo, ServiceResponse, Size } from '../models/types';

export async function solidPng(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 255, g: 255, b: 255 } } })
    .png()
    .toBuffer();
}

// Pseudo-random pixels so the PNG does not compress below the placeholder threshold
export async function noisyPng(width: number, height: number): Promise<Buffer> {
  const pixels = Buffer.alloc(width * height * 3);
  let seed = 7;
  for (let i = 0; i < pixels.length; i++) {
    seed = (seed * 48271) % 2147483647;
    pixels[i] = seed & 0xff;
  }
  return sharp(pixels, { raw: { width, height, channels: 3 } }).png().toBuffer();
}

export async function makePdf(pageCount: number): Promise<Buffer> {
  const pdfDoc = await PDFDocument.create();
  for (let i = 0; i < pageCount; i++) {
    pdfDoc.addPage([595, 842]);
  }
  return Buffer.from(await pdfDoc.save());
}

export interface PdfImage {
  data: Buffer;
  format: 'png' | 'jpg';
}

// One entry per page; each page draws its images in order
export async function makePdfWithImages(pages: PdfImage[][]): Promise<Buffer> {
  const pdfDoc = await PDFDocument.create();
  for (const images of pages) {
    const page = pdfDoc.addPage([595, 842]);
    for (const [index, image] of images.entries()) {
      const embedded = image.format === 'png' ? await pdfDoc.embedPng(image.data) : await pdfDoc.embedJpg(image.data);
      page.drawImage(embedded, { x: 20, y: 20 + index * 200, width: embedded.width, height: embedded.height });
    }
  }
  return Buffer.from(await pdfDoc.save());
}

export async function noisyJpeg(width: number, height: number): Promise<Buffer> {
  return sharp(await noisyPng(width, height)).jpeg().toBuffer();
}

export async function makeTempDir(): Promise<string> {
  return fse.mkdtemp(path.join(os.tmpdir(), 'criteria-test-'));
}

export function makeEntity(overrides: Partial<Entity> = {}): Entity {
  return {
    typeTag: 'VERTICAL_LIVE_LOADS',
    text: 'LIVE LOAD 5 kPa',
    confidence: 0.92,
    pageNumber: 1,
    ...overrides
  };
}

export function makeResponse(overrides: Partial<ServiceResponse> = {}): ServiceResponse {
  return {
    fullText: '',
    pages: [{ pageNumber: 1 }],
    entities: [],
    tables: [],
    images: [],
    ...overrides
  };
}

export class FakeService implements ExtractionService {
  calls = 0;

  constructor(private readonly respond: (document: Buffer) => Promise<ServiceResponse>) {}

  async process(document: Buffer): Promise<ServiceResponse> {
    this.calls++;
    return this.respond(document);
  }

  describe(): ServiceInfo {
    return { provider: 'fake', processorName: 'projects/test-project/locations/us/processors/test-processor', location: 'us', configured: true };
  }
}

/**
 * Renders blank pages of a fixed pixel size. `pageCalls` records single-page
 * renders; `allCalls` counts whole-document renders.
 */
export class FakeRasterizer implements PageRasterizer {
  pageCalls: number[] = [];
  allCalls = 0;

  constructor(
    private readonly pageCount: number,
    private readonly size: Size = { width: 1000, height: 2000 },
    private readonly failingPages: number[] = []
  ) {}

  async rasterizePage(_document: Buffer, pageNumber: number): Promise<PageRaster> {
    this.pageCalls.push(pageNumber);
    return this.render(pageNumber);
  }

  async rasterizeAll(): Promise<PageRaster[]> {
    this.allCalls++;
    const rasters: PageRaster[] = [];
    for (let pageNumber = 1; pageNumber <= this.pageCount; pageNumber++) {
      if (!this.failingPages.includes(pageNumber)) {
        rasters.push(await this.render(pageNumber));
      }
    }
    return rasters;
  }

  private async render(pageNumber: number): Promise<PageRaster> {
    if (this.failingPages.includes(pageNumber) || pageNumber > this.pageCount) {
      throw new Error(`render failed for page ${pageNumber}`);
    }
    return {
      pageNumber,
      pixelWidth: this.size.width,
      pixelHeight: this.size.height,
      image: await solidPng(this.size.width, this.size.height),
      mimeType: 'image/png',
      origin: 'rendered'
    };
  }
}
