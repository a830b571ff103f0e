import sharp from 'sharp';
import { PdfEmbeddedImageExtractor } from '../pdfImageExtractor';
import { makePdf, makePdfWithImages, noisyJpeg, noisyPng } from './helpers';

describe('PdfEmbeddedImageExtractor', () => {
  const extractor = new PdfEmbeddedImageExtractor();

  it('reads embedded PNG and JPEG images page by page', async () => {
    const document = await makePdfWithImages([
      [
        { data: await noisyPng(200, 150), format: 'png' },
        { data: await noisyPng(40, 40), format: 'png' }
      ],
      [{ data: await noisyJpeg(160, 120), format: 'jpg' }]
    ]);

    const images = await extractor.extract(document);

    expect(images.map(image => [image.id, image.identity, image.pageNumber, image.pixelWidth, image.pixelHeight])).toEqual([
      ['pdf_image_1_1', 'embedded:1_1', 1, 200, 150],
      ['pdf_image_1_2', 'embedded:1_2', 1, 40, 40],
      ['pdf_image_2_1', 'embedded:2_1', 2, 160, 120]
    ]);
    for (const image of images) {
      expect(image).toMatchObject({ source: 'document-raster-fallback', confidence: 1, mimeType: 'image/png' });
      expect(image.byteSize).toBe(image.data.length);
    }
  });

  it('re-encodes the pixels as PNG', async () => {
    const [image] = await extractor.extract(await makePdfWithImages([[{ data: await noisyPng(120, 100), format: 'png' }]]));

    const metadata = await sharp(image.data).metadata();
    expect(metadata).toMatchObject({ format: 'png', width: 120, height: 100 });
  });

  it('finds nothing in a PDF without images', async () => {
    expect(await extractor.extract(await makePdf(2))).toEqual([]);
  });

  it('returns nothing for bytes that are not a PDF', async () => {
    expect(await extractor.extract(Buffer.from('hello'))).toEqual([]);
  });
});
