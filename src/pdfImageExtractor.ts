import sharp from 'sharp';
import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFName,
  PDFNumber,
  PDFObject,
  PDFRawStream,
  PDFStream,
  decodePDFRawStream
} from 'pdf-lib';
import { EMBEDDED_IDENTITY_PREFIX } from './imageSourceReconciler';
import { EmbeddedImageSource, ResolvedImage } from './models/types';
import logger from './utils/logger';

type Channels = 1 | 3;

interface DecodedImage {
  data: Buffer;
  info: sharp.OutputInfo;
}

const IMAGE = PDFName.of('Image');
const DCT_DECODE = PDFName.of('DCTDecode');

function numberIn(dict: PDFDict, key: string): number | undefined {
  const value = dict.lookup(PDFName.of(key));
  return value instanceof PDFNumber ? value.asNumber() : undefined;
}

function filtersOf(dict: PDFDict): PDFObject[] {
  const filter = dict.lookup(PDFName.of('Filter'));
  if (filter instanceof PDFArray) {
    return filter.asArray();
  }
  return filter ? [filter] : [];
}

// PNG-style predictors are not undone by the stream decoder
function hasPredictor(dict: PDFDict): boolean {
  const parms = dict.lookup(PDFName.of('DecodeParms'));
  const all = parms instanceof PDFArray ? parms.asArray() : [parms];
  return all.some(p => p instanceof PDFDict && (numberIn(p, 'Predictor') ?? 1) > 1);
}

function colorChannels(colorSpace: PDFObject | undefined): Channels | undefined {
  if (colorSpace === PDFName.of('DeviceRGB')) {
    return 3;
  }
  if (colorSpace === PDFName.of('DeviceGray')) {
    return 1;
  }
  if (colorSpace instanceof PDFArray) {
    const family = colorSpace.lookup(0);
    if (family === PDFName.of('CalRGB')) {
      return 3;
    }
    if (family === PDFName.of('CalGray')) {
      return 1;
    }
    const profile = colorSpace.lookup(1);
    if (family === PDFName.of('ICCBased') && profile instanceof PDFStream) {
      const n = numberIn(profile.dict, 'N');
      return n === 1 || n === 3 ? n : undefined;
    }
  }
  return undefined;
}

/**
 * Re-encodes one image XObject as PNG. JPEG streams go to sharp as they are;
 * 8-bit gray and RGB sample data is inflated first. Returns `undefined` for
 * encodings it cannot read.
 */
async function decodeImage(stream: PDFRawStream): Promise<DecodedImage | undefined> {
  const { dict } = stream;
  const filters = filtersOf(dict);
  if (filters.length === 1 && filters[0] === DCT_DECODE) {
    return sharp(Buffer.from(stream.contents)).png().toBuffer({ resolveWithObject: true });
  }

  const width = numberIn(dict, 'Width');
  const height = numberIn(dict, 'Height');
  const channels = colorChannels(dict.lookup(PDFName.of('ColorSpace')));
  if (!width || !height || !channels || numberIn(dict, 'BitsPerComponent') !== 8 || hasPredictor(dict)) {
    return undefined;
  }

  const samples = decodePDFRawStream(stream).decode();
  const expected = width * height * channels;
  if (samples.length < expected) {
    return undefined;
  }
  return sharp(Buffer.from(samples.subarray(0, expected)), { raw: { width, height, channels } })
    .png()
    .toBuffer({ resolveWithObject: true });
}

/**
 * Reads the images a PDF embeds in its page resources with pdf-lib.
 * Every image found is returned; size thresholds are left to the reconciler.
 */
export class PdfEmbeddedImageExtractor implements EmbeddedImageSource {
  async extract(document: Buffer): Promise<ResolvedImage[]> {
    let pdfDoc: PDFDocument;
    try {
      pdfDoc = await PDFDocument.load(document, { ignoreEncryption: true, updateMetadata: false });
    } catch (error) {
      logger.warn({ err: error }, 'Could not open the PDF to read embedded images');
      return [];
    }

    const images: ResolvedImage[] = [];
    const pages = pdfDoc.getPages();
    for (let index = 0; index < pages.length; index++) {
      const pageNumber = index + 1;
      const xObjects = pages[index].node.Resources()?.lookupMaybe(PDFName.of('XObject'), PDFDict);
      if (!xObjects) {
        continue;
      }

      let imageIndex = 0;
      for (const name of xObjects.keys()) {
        const stream = xObjects.lookup(name);
        if (!(stream instanceof PDFRawStream) || stream.dict.lookup(PDFName.of('Subtype')) !== IMAGE) {
          continue;
        }
        imageIndex++;
        const image = await this.toImage(stream, pageNumber, imageIndex);
        if (image) {
          images.push(image);
        }
      }
    }

    logger.info(`Found ${images.length} embedded images across ${pages.length} pages`);
    return images;
  }

  private async toImage(stream: PDFRawStream, pageNumber: number, imageIndex: number): Promise<ResolvedImage | undefined> {
    const key = `${pageNumber}_${imageIndex}`;
    try {
      const decoded = await decodeImage(stream);
      if (!decoded) {
        logger.debug(`Skipping embedded image ${key}: unsupported encoding`);
        return undefined;
      }
      const { data, info } = decoded;
      return {
        id: `pdf_image_${key}`,
        identity: `${EMBEDDED_IDENTITY_PREFIX}${key}`,
        pageNumber,
        source: 'document-raster-fallback',
        confidence: 1.0,
        data,
        byteSize: data.length,
        mimeType: 'image/png',
        pixelWidth: info.width,
        pixelHeight: info.height,
        description: `Embedded image ${imageIndex} on page ${pageNumber}`
      };
    } catch (error) {
      logger.warn({ err: error }, `Failed to read embedded image ${key}`);
      return undefined;
    }
  }
}
