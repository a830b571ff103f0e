import { boxOverlap, isNormalizedBox } from './coordinateTransformer';
import { DEFAULT_RECONCILER_CONFIG, ReconcilerConfig } from './models/configTypes';
import { Entity, ResolvedImage } from './models/types';
import logger from './utils/logger';

/**
 * A named way of producing the job's image set. Strategies are tried in order
 * and the first one that yields qualifying images wins.
 */
export interface ImageStrategy {
  name: string;
  acquire(): Promise<ResolvedImage[]>;
}

export interface StrategyOutcome {
  strategy?: string;
  images: ResolvedImage[];
}

export const EMBEDDED_IDENTITY_PREFIX = 'embedded:';

export function dedupeKey(image: ResolvedImage): string {
  return `${image.pageNumber}|${image.identity}`;
}

/**
 * ImageSourceReconciler
 * Merges images the service returned with crops produced from page rasters.
 */
export class ImageSourceReconciler {
  private config: ReconcilerConfig;

  constructor(config: Partial<ReconcilerConfig> = {}) {
    this.config = { ...DEFAULT_RECONCILER_CONFIG, ...config };
  }

  get minNativeImageBytes(): number {
    return this.config.minNativeImageBytes;
  }

  /**
   * A service-native image only counts as real pixels above the byte threshold.
   * Images embedded in the PDF must reach the minimum width, height and size.
   * Anything else needs a non-empty payload.
   */
  qualifies(image: ResolvedImage): boolean {
    if (image.byteSize <= 0 || image.data.length === 0) {
      return false;
    }
    if (image.source === 'service-native') {
      return image.byteSize > this.config.minNativeImageBytes;
    }
    if (image.identity.startsWith(EMBEDDED_IDENTITY_PREFIX)) {
      return (image.pixelWidth ?? 0) >= this.config.minEmbeddedWidth
        && (image.pixelHeight ?? 0) >= this.config.minEmbeddedHeight
        && image.byteSize >= this.config.minEmbeddedBytes;
    }
    return true;
  }

  /**
   * Merges both sources into one de-duplicated list.
   * For each (page, identity) key the highest confidence wins; on a tie the
   * service-native entry is kept. Output is ordered by page, then entity order.
   */
  reconcile(resolverImages: ResolvedImage[], serviceNativeImages: ResolvedImage[]): ResolvedImage[] {
    const best = new Map<string, { image: ResolvedImage; order: number }>();
    let order = 0;

    const consider = (image: ResolvedImage) => {
      const position = order++;
      if (!this.qualifies(image)) {
        logger.info(`Rejecting ${image.source} image ${image.id} (${image.byteSize} bytes) as placeholder or empty`);
        return;
      }
      const key = dedupeKey(image);
      const current = best.get(key);
      if (!current || image.confidence > current.image.confidence) {
        best.set(key, { image, order: current ? current.order : position });
      }
    };

    serviceNativeImages.forEach(consider);
    resolverImages.forEach(consider);

    return Array.from(best.values())
      .sort((a, b) => compareImages(a.image, b.image) || a.order - b.order)
      .map(entry => entry.image);
  }

  /**
   * Gives service images the identity of the entity they overlap most on the
   * same page, so they compete with that entity's crop.
   */
  pairWithEntities(images: ResolvedImage[], entities: Entity[]): ResolvedImage[] {
    return images.map(image => {
      const box = image.boundingBox;
      if (!box) {
        return image;
      }
      let bestIndex = -1;
      let bestOverlap = 0;
      entities.forEach((entity, index) => {
        const entityBox = entity.boundingBox;
        if (!entityBox || entity.pageNumber !== image.pageNumber) {
          return;
        }
        if (isNormalizedBox(entityBox) !== isNormalizedBox(box)) {
          return;
        }
        const overlap = boxOverlap(box, entityBox);
        if (overlap > bestOverlap) {
          bestOverlap = overlap;
          bestIndex = index;
        }
      });

      if (bestIndex < 0 || bestOverlap < this.config.minRegionOverlap) {
        return image;
      }
      return {
        ...image,
        identity: `entity:${bestIndex}`,
        entityIndex: bestIndex,
        typeTag: image.typeTag ?? entities[bestIndex].typeTag
      };
    });
  }

  /**
   * Runs strategies in priority order until one yields qualifying images.
   */
  async selectFirstQualifying(strategies: ImageStrategy[]): Promise<StrategyOutcome> {
    for (const strategy of strategies) {
      const candidates = await strategy.acquire();
      const images = candidates.filter(image => this.qualifies(image));
      if (images.length > 0) {
        logger.info(`Image strategy '${strategy.name}' produced ${images.length} images`);
        return { strategy: strategy.name, images };
      }
      logger.info(`Image strategy '${strategy.name}' produced no qualifying images`);
    }
    return { images: [] };
  }
}

function identityRank(image: ResolvedImage): number {
  if (image.entityIndex !== undefined) {
    return 0;
  }
  return image.identity.startsWith('page:') ? 1 : 2;
}

function compareImages(a: ResolvedImage, b: ResolvedImage): number {
  if (a.pageNumber !== b.pageNumber) {
    return a.pageNumber - b.pageNumber;
  }
  const rank = identityRank(a) - identityRank(b);
  if (rank !== 0) {
    return rank;
  }
  return (a.entityIndex ?? 0) - (b.entityIndex ?? 0);
}
