import type { protos } from '@google-cloud/documentai';
import { boundingBoxFromPoly, mapDocument, textFromAnchor, toInt } from '../documentAiMapper';

type IDocument = protos.google.cloud.documentai.v1.IDocument;

const TEXT = 'LIVE LOAD 5 kPa\nDRG NO S-101';
const PAGE_IMAGE = Buffer.from('page-image-bytes');

const DOCUMENT: IDocument = {
  text: TEXT,
  entities: [
    {
      type: 'VERTICAL_LIVE_LOADS',
      mentionText: ' LIVE LOAD 5 kPa ',
      confidence: 0.92,
      pageAnchor: {
        pageRefs: [
          {
            page: '0',
            boundingPoly: {
              normalizedVertices: [
                { x: 0.1, y: 0.1 },
                { x: 0.3, y: 0.1 },
                { x: 0.3, y: 0.2 },
                { x: 0.1, y: 0.2 }
              ]
            }
          }
        ]
      }
    },
    {
      type: 'DRG_NO',
      textAnchor: { textSegments: [{ startIndex: '16', endIndex: '28' }] },
      pageAnchor: { pageRefs: [{ page: 1 }] },
      properties: [{ type: 'TITLE', mentionText: 'Deck plan' }]
    }
  ],
  pages: [
    {
      pageNumber: 1,
      dimension: { width: 612, height: 792, unit: 'points' },
      tables: [
        {
          layout: { confidence: 0.8 },
          headerRows: [
            { cells: [{ layout: { textAnchor: { content: 'Load' } } }, { layout: { textAnchor: { content: 'Value' } } }] }
          ],
          bodyRows: [
            { cells: [{ layout: { textAnchor: { content: 'Live' } } }, { layout: { textAnchor: { content: ' 5 kPa' } } }] }
          ]
        }
      ],
      visualElements: [
        {
          type: 'figure',
          layout: {
            confidence: 0.6,
            boundingPoly: {
              vertices: [
                { x: 10, y: 20 },
                { x: 110, y: 20 },
                { x: 110, y: 70 },
                { x: 10, y: 70 }
              ]
            }
          }
        },
        {
          type: 'checkbox',
          layout: { boundingPoly: { vertices: [{ x: 1, y: 1 }, { x: 5, y: 1 }, { x: 5, y: 5 }] } }
        }
      ]
    },
    {
      pageNumber: 2,
      image: { content: PAGE_IMAGE, mimeType: 'image/png' }
    }
  ]
};

describe('mapDocument', () => {
  const response = mapDocument(DOCUMENT);

  it('converts 0-based page references and reads entity text', () => {
    expect(response.entities.map(e => [e.typeTag, e.text, e.pageNumber, e.confidence])).toEqual([
      ['VERTICAL_LIVE_LOADS', 'LIVE LOAD 5 kPa', 1, 0.92],
      ['DRG_NO', 'DRG NO S-101', 2, 0],
      ['TITLE', 'Deck plan', 1, 0]
    ]);
  });

  it('keeps normalized boxes in normalized space', () => {
    const box = response.entities[0].boundingBox;
    expect(box?.space).toBe('normalized');
    expect(box?.x).toBeCloseTo(0.1);
    expect(box?.y).toBeCloseTo(0.1);
    expect(box?.width).toBeCloseTo(0.2);
    expect(box?.height).toBeCloseTo(0.1);
    expect(response.entities[1].boundingBox).toBeUndefined();
  });

  it('reads tables with their header row', () => {
    expect(response.tables).toEqual([
      { tableId: 'table_1', pageNumber: 1, headers: ['Load', 'Value'], rows: [['Live', '5 kPa']], confidence: 0.8 }
    ]);
  });

  it('collects page images and figure regions', () => {
    expect(response.images).toEqual([
      {
        id: 'region_1_1',
        pageNumber: 1,
        kind: 'region',
        boundingBox: { x: 10, y: 20, width: 100, height: 50, space: 'points' },
        confidence: 0.6
      },
      {
        id: 'service_page_2',
        pageNumber: 2,
        kind: 'page',
        confidence: 1,
        mimeType: 'image/png',
        content: PAGE_IMAGE
      }
    ]);
  });

  it('maps page dimensions', () => {
    expect(response.pages).toEqual([
      { pageNumber: 1, width: 612, height: 792, unit: 'points' },
      { pageNumber: 2, image: PAGE_IMAGE }
    ]);
    expect(response.fullText).toBe(TEXT);
  });
});

describe('mapping helpers', () => {
  it('reads int64 values in any encoding', () => {
    expect(toInt(3)).toBe(3);
    expect(toInt('12')).toBe(12);
    expect(toInt({ toNumber: () => 7 })).toBe(7);
    expect(toInt('abc')).toBeUndefined();
    expect(toInt(null)).toBeUndefined();
  });

  it('ignores degenerate polygons', () => {
    expect(boundingBoxFromPoly({ vertices: [{ x: 0, y: 0 }, { x: 1, y: 1 }] })).toBeUndefined();
    expect(boundingBoxFromPoly({ vertices: [{ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 9, y: 0 }] })).toBeUndefined();
    expect(boundingBoxFromPoly(undefined)).toBeUndefined();
  });

  it('prefers inline anchor content over segments', () => {
    expect(textFromAnchor({ content: 'inline', textSegments: [{ startIndex: 0, endIndex: 4 }] }, TEXT)).toBe('inline');
    expect(textFromAnchor({ textSegments: [{ startIndex: 0, endIndex: 4 }] }, TEXT)).toBe('LIVE');
    expect(textFromAnchor(null, TEXT)).toBe('');
  });
});
