import sharp from 'sharp';
import { toPixelRect } from './coordinateTransformer';
import { DEFAULT_RESOLVER_CONFIG, ResolverConfig } from './models/configTypes';
import { BoundingBox, Entity, PageRasterizer, ResolvedImage, Size } from './models/types';
import { PageRasterCache } from './pageRasterCache';
import { JobWorkspace } from './utils/jobWorkspace';
import logger from './utils/logger';

/**
 * Everything the resolver keeps for one job. Nothing here is shared between jobs.
 */
export interface ResolverJob {
  jobId: string;
  rasters: PageRasterCache;
  // Reference page sizes for point-space boxes, keyed by page number
  pageSizes: Map<number, Size>;
  workspace?: JobWorkspace;
}

export interface RegionRequest {
  id: string;
  identity: string;
  pageNumber: number;
  boundingBox: BoundingBox;
  confidence: number;
  entityIndex?: number;
  typeTag?: string;
  description?: string;
}

function tagSlug(tag: string): string {
  return tag.toLowerCase().replace(/[^a-z0-9]/g, '') || 'entity';
}

export function entityImageId(entity: Entity, entityIndex: number): string {
  return `entity_${tagSlug(entity.typeTag)}_${entityIndex + 1}`;
}

function extensionFor(mimeType?: string): string {
  switch (mimeType) {
    case 'image/jpeg':
      return 'jpg';
    case 'image/tiff':
      return 'tiff';
    case 'image/gif':
      return 'gif';
    default:
      return 'png';
  }
}

/**
 * ImageRegionResolver
 * Crops the page region behind each entity bounding box out of a page raster,
 * rasterizing pages on first use.
 */
export class ImageRegionResolver {
  private config: ResolverConfig;

  constructor(private readonly rasterizer: PageRasterizer, config: Partial<ResolverConfig> = {}) {
    this.config = { ...DEFAULT_RESOLVER_CONFIG, ...config };
  }

  createJob(
    jobId: string,
    document: Buffer,
    pageCount: number,
    pageSizes: Map<number, Size> = new Map(),
    workspace?: JobWorkspace
  ): ResolverJob {
    return {
      jobId,
      rasters: new PageRasterCache(this.rasterizer, document, this.config.rasterDpi, pageCount),
      pageSizes,
      workspace
    };
  }

  /**
   * Resolves one crop per entity that has a bounding box. Entities without a
   * box, and boxes that convert to an empty rectangle, produce no image.
   */
  async resolve(entities: Entity[], job: ResolverJob): Promise<ResolvedImage[]> {
    const requests: RegionRequest[] = [];
    entities.forEach((entity, entityIndex) => {
      if (!entity.boundingBox) {
        logger.debug(`Entity ${entityIndex} (${entity.typeTag}) has no bounding box, skipping crop`);
        return;
      }
      requests.push({
        id: entityImageId(entity, entityIndex),
        identity: `entity:${entityIndex}`,
        pageNumber: entity.pageNumber,
        boundingBox: entity.boundingBox,
        confidence: entity.confidence,
        entityIndex,
        typeTag: entity.typeTag,
        description: entity.text
      });
    });
    return this.cropRegions(requests, job);
  }

  async cropRegions(requests: RegionRequest[], job: ResolverJob): Promise<ResolvedImage[]> {
    const images: ResolvedImage[] = [];
    // One crop at a time; crops on the same page share the cached raster
    for (const request of requests) {
      const image = await this.cropRegion(request, job);
      if (image) {
        images.push(image);
      }
    }
    logger.info(`Resolved ${images.length} of ${requests.length} image regions for job ${job.jobId}`);
    return images;
  }

  /**
   * Crops a single region. Returns `undefined` on any failure; the error is logged.
   */
  async cropRegion(request: RegionRequest, job: ResolverJob): Promise<ResolvedImage | undefined> {
    const raster = await job.rasters.get(request.pageNumber);
    if (!raster) {
      logger.warn(`No raster for page ${request.pageNumber}, skipping ${request.id}`);
      return undefined;
    }

    const result = toPixelRect(
      request.boundingBox,
      { width: raster.pixelWidth, height: raster.pixelHeight },
      job.pageSizes.get(request.pageNumber),
      this.config.cropBufferPx
    );
    if (!result.valid) {
      logger.warn(`Skipping ${request.id}: ${result.reason}`);
      return undefined;
    }
    const { rect } = result;
    if (rect.degraded) {
      logger.warn(`Page ${request.pageNumber} size unknown, ${request.id} was scaled against the fallback page size`);
    }

    try {
      const data = await sharp(raster.image)
        .extract({ left: rect.left, top: rect.top, width: rect.width, height: rect.height })
        .png()
        .toBuffer();
      if (data.length === 0) {
        logger.warn(`Crop for ${request.id} produced no data`);
        return undefined;
      }
      return {
        id: request.id,
        identity: request.identity,
        pageNumber: request.pageNumber,
        boundingBox: request.boundingBox,
        source: 'service-bbox-crop',
        confidence: request.confidence,
        data,
        byteSize: data.length,
        mimeType: 'image/png',
        entityIndex: request.entityIndex,
        typeTag: request.typeTag,
        description: request.description
      };
    } catch (error) {
      logger.error({ err: error }, `Failed to crop ${request.id} on page ${request.pageNumber}`);
      return undefined;
    }
  }

  /**
   * Whole-page rasters, one per page that could be rasterized.
   */
  async pageImages(job: ResolverJob): Promise<ResolvedImage[]> {
    const rasters = await job.rasters.getAll();
    return rasters.map(raster => {
      const { pageNumber } = raster;
      return {
        id: `page_${pageNumber}`,
        identity: `page:${pageNumber}`,
        pageNumber,
        source: 'document-raster-fallback' as const,
        confidence: 1.0,
        data: raster.image,
        byteSize: raster.image.length,
        mimeType: raster.mimeType,
        description: `Page ${pageNumber}`
      };
    });
  }

  /**
   * Writes images to the job directory and fills in their relative paths.
   * An image whose write failed keeps no `pixelPath`.
   */
  async persist(images: ResolvedImage[], job: ResolverJob): Promise<ResolvedImage[]> {
    const { workspace } = job;
    if (!workspace) {
      return images;
    }
    const persisted: ResolvedImage[] = [];
    for (const image of images) {
      const fileName = `${image.id}.${extensionFor(image.mimeType)}`;
      const written = await workspace.writeFile(fileName, image.data);
      persisted.push({ ...image, pixelPath: written ? workspace.relativePath(fileName) : undefined });
    }
    return persisted;
  }
}
