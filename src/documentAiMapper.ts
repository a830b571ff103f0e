import type { protos } from '@google-cloud/documentai';
import { BoundingBox, CoordinateSpace, Entity, ServiceImage, ServicePage, ServiceResponse, TableData } from './models/types';

type IDocument = protos.google.cloud.documentai.v1.IDocument;
type IBoundingPoly = protos.google.cloud.documentai.v1.IBoundingPoly;
type ITextAnchor = protos.google.cloud.documentai.v1.Document.ITextAnchor;
type IEntity = protos.google.cloud.documentai.v1.Document.IEntity;
type IPage = protos.google.cloud.documentai.v1.Document.IPage;
type ITableRow = protos.google.cloud.documentai.v1.Document.Page.Table.ITableRow;

// Protobuf int64 fields arrive as number, string or Long
type IntLike = number | string | { toNumber(): number } | null | undefined;

const IMAGE_ELEMENT_TYPES = /image|figure|picture|photo|diagram|drawing/i;

export function toInt(value: IntLike): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return value.toNumber();
}

function toBuffer(content: Uint8Array | string | null | undefined): Buffer | undefined {
  if (!content || content.length === 0) {
    return undefined;
  }
  return typeof content === 'string' ? Buffer.from(content, 'base64') : Buffer.from(content);
}

/**
 * Bounding rectangle of a polygon. Normalized vertices win over pixel/point
 * vertices; fewer than three vertices or an empty area gives `undefined`.
 */
export function boundingBoxFromPoly(poly: IBoundingPoly | null | undefined): BoundingBox | undefined {
  if (!poly) {
    return undefined;
  }
  const normalized = poly.normalizedVertices ?? [];
  const useNormalized = normalized.length >= 3;
  const vertices: Array<{ x?: number | null; y?: number | null }> = useNormalized ? normalized : poly.vertices ?? [];
  if (vertices.length < 3) {
    return undefined;
  }
  const space: CoordinateSpace = useNormalized ? 'normalized' : 'points';

  const xs = vertices.map(v => v.x ?? 0);
  const ys = vertices.map(v => v.y ?? 0);
  const x = Math.min(...xs);
  const y = Math.min(...ys);
  const width = Math.max(...xs) - x;
  const height = Math.max(...ys) - y;
  if (width <= 0 || height <= 0) {
    return undefined;
  }
  return { x, y, width, height, space };
}

export function textFromAnchor(anchor: ITextAnchor | null | undefined, text: string): string {
  if (!anchor) {
    return '';
  }
  if (anchor.content) {
    return anchor.content;
  }
  return (anchor.textSegments ?? [])
    .map(segment => text.slice(toInt(segment.startIndex) ?? 0, toInt(segment.endIndex) ?? 0))
    .join('');
}

function mapEntity(entity: IEntity, text: string): Entity {
  const pageRef = entity.pageAnchor?.pageRefs?.[0];
  // Page references are 0-based indexes into document.pages
  const pageIndex = toInt(pageRef?.page) ?? 0;
  return {
    typeTag: entity.type ?? '',
    text: (entity.mentionText ?? textFromAnchor(entity.textAnchor, text)).trim(),
    confidence: entity.confidence ?? 0,
    pageNumber: pageIndex + 1,
    boundingBox: boundingBoxFromPoly(pageRef?.boundingPoly)
  };
}

function flattenEntities(entities: IEntity[], text: string): Entity[] {
  return entities.flatMap(entity => [
    mapEntity(entity, text),
    ...flattenEntities(entity.properties ?? [], text)
  ]);
}

function rowText(row: ITableRow, text: string): string[] {
  return (row.cells ?? []).map(cell => textFromAnchor(cell.layout?.textAnchor, text).trim());
}

function mapPage(page: IPage, index: number): ServicePage {
  return {
    pageNumber: page.pageNumber ?? index + 1,
    width: page.dimension?.width ?? undefined,
    height: page.dimension?.height ?? undefined,
    unit: page.dimension?.unit ?? undefined,
    image: toBuffer(page.image?.content)
  };
}

function pageImages(page: IPage, pageNumber: number): ServiceImage[] {
  const images: ServiceImage[] = [];
  const content = toBuffer(page.image?.content);
  if (content) {
    images.push({
      id: `service_page_${pageNumber}`,
      pageNumber,
      kind: 'page',
      confidence: page.layout?.confidence ?? 1.0,
      mimeType: page.image?.mimeType ?? undefined,
      content
    });
  }

  let regionIndex = 0;
  for (const element of page.visualElements ?? []) {
    if (!element.type || !IMAGE_ELEMENT_TYPES.test(element.type)) {
      continue;
    }
    const boundingBox = boundingBoxFromPoly(element.layout?.boundingPoly);
    if (!boundingBox) {
      continue;
    }
    regionIndex++;
    images.push({
      id: `region_${pageNumber}_${regionIndex}`,
      pageNumber,
      kind: 'region',
      boundingBox,
      confidence: element.layout?.confidence ?? 0
    });
  }
  return images;
}

/**
 * Converts a Document AI document into the service response the pipeline works on.
 */
export function mapDocument(document: IDocument): ServiceResponse {
  const text = document.text ?? '';
  const pages = document.pages ?? [];
  const tables: TableData[] = [];
  const images: ServiceImage[] = [];

  pages.forEach((page, index) => {
    const pageNumber = page.pageNumber ?? index + 1;
    for (const table of page.tables ?? []) {
      const header = table.headerRows?.[0];
      tables.push({
        tableId: `table_${tables.length + 1}`,
        pageNumber,
        headers: header ? rowText(header, text) : [],
        rows: (table.bodyRows ?? []).map(row => rowText(row, text)),
        boundingBox: boundingBoxFromPoly(table.layout?.boundingPoly),
        confidence: table.layout?.confidence ?? 0
      });
    }
    images.push(...pageImages(page, pageNumber));
  });

  return {
    fullText: text,
    pages: pages.map(mapPage),
    entities: flattenEntities(document.entities ?? [], text),
    tables,
    images
  };
}
