import {
  ClassifiedRecord,
  DesignCraneRecord,
  DesignCriteria,
  DesignVehicleRecord,
  DocumentMetadata,
  DrawingFieldRecord,
  Entity,
  GenericCategory,
  GenericTagRecord,
  ImageData,
  LoadRecord,
  PersistedOutputs,
  ResolvedImage,
  SeismicForceRecord,
  TableData
} from './models/types';
import { JobWorkspace } from './utils/jobWorkspace';
import logger from './utils/logger';

export const RESULTS_FILE = 'extraction_results.json';
export const TEXT_FILE = 'extracted_text.txt';
export const SUMMARY_FILE = 'summary_report.txt';

export interface AggregateInput {
  records: ClassifiedRecord[];
  images: ResolvedImage[];
  tables: TableData[];
  rawText: string;
  metadata: DocumentMetadata;
  documentConfidence?: number;
  entities?: Entity[];
  unclassified?: Entity[];
}

export function toImageData(image: ResolvedImage): ImageData {
  return {
    imageId: image.id,
    identity: image.identity,
    pageNumber: image.pageNumber,
    boundingBox: image.boundingBox,
    source: image.source,
    confidence: image.confidence,
    byteSize: image.byteSize,
    pixelPath: image.pixelPath,
    typeTag: image.typeTag,
    description: image.description
  };
}

function byCategory(records: ClassifiedRecord[], category: GenericCategory): GenericTagRecord[] {
  return records.filter((r): r is GenericTagRecord => r.kind === 'generic_tag' && r.category === category);
}

/**
 * Assembles classified records, images and tables into one DesignCriteria.
 * The confidence score is the service's document confidence, never recomputed.
 */
export function aggregate(input: AggregateInput): DesignCriteria {
  const { records } = input;
  const confidence = input.documentConfidence;

  return {
    loads: records.filter((r): r is LoadRecord => r.kind === 'load'),
    seismicForces: records.filter((r): r is SeismicForceRecord => r.kind === 'seismic_force'),
    designVehicles: records.filter((r): r is DesignVehicleRecord => r.kind === 'design_vehicle'),
    designCranes: records.filter((r): r is DesignCraneRecord => r.kind === 'design_crane'),
    structuralElements: byCategory(records, 'structural_element'),
    materialSpecifications: byCategory(records, 'material_specification'),
    safetyFactors: byCategory(records, 'safety_factor'),
    environmentalConditions: byCategory(records, 'environmental_condition'),
    drawingFields: records.filter((r): r is DrawingFieldRecord => r.kind === 'drawing_field'),
    tables: input.tables,
    images: input.images.map(toImageData),
    documentEntities: input.entities ?? [],
    unclassifiedEntities: input.unclassified ?? [],
    metadata: input.metadata,
    rawText: input.rawText,
    confidenceScore: confidence !== undefined && Number.isFinite(confidence) ? confidence : 0.0
  };
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Human-readable summary of a DesignCriteria, one fact per line.
 */
export function formatSummaryReport(criteria: DesignCriteria): string {
  const { metadata } = criteria;
  const lines: string[] = [
    'ENGINEERING DESIGN CRITERIA EXTRACTION REPORT',
    '='.repeat(50),
    '',
    'DOCUMENT INFORMATION',
    '-'.repeat(20),
    `Filename: ${metadata.filename}`,
    `File Size: ${metadata.fileSize} bytes`,
    `Page Count: ${metadata.pageCount}`,
    `Processing Date: ${metadata.processingDate}`,
    `Processor Version: ${metadata.processorVersion}`,
    `Overall Confidence: ${percent(criteria.confidenceScore)}`,
    ''
  ];

  const drawingNumber = criteria.drawingFields.find(f => f.field === 'drawing_number');
  const title = criteria.drawingFields.find(f => f.field === 'title');
  if (drawingNumber || title) {
    lines.push('DRAWING', '-'.repeat(20));
    if (drawingNumber) lines.push(`Drawing No: ${drawingNumber.value}`);
    if (title) lines.push(`Title: ${title.value}`);
    lines.push('');
  }

  lines.push(`LOADS (${criteria.loads.length})`, '-'.repeat(20));
  criteria.loads.forEach((load, i) => {
    const quantity = load.unit ? ` ${load.magnitude} ${load.unit}` : '';
    lines.push(`${i + 1}. ${load.loadType}${quantity} (confidence ${percent(load.confidence)})`);
  });
  lines.push('');

  const sections: Array<[string, number]> = [
    ['SEISMIC FORCES', criteria.seismicForces.length],
    ['DESIGN VEHICLES', criteria.designVehicles.length],
    ['DESIGN CRANES', criteria.designCranes.length],
    ['STRUCTURAL ELEMENTS', criteria.structuralElements.length],
    ['MATERIAL SPECIFICATIONS', criteria.materialSpecifications.length],
    ['SAFETY FACTORS', criteria.safetyFactors.length],
    ['ENVIRONMENTAL CONDITIONS', criteria.environmentalConditions.length],
    ['TABLES', criteria.tables.length],
    ['IMAGES', criteria.images.length],
    ['UNCLASSIFIED ENTITIES', criteria.unclassifiedEntities.length]
  ];
  lines.push('SUMMARY', '-'.repeat(20));
  for (const [label, count] of sections) {
    lines.push(`${label}: ${count}`);
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Writes the JSON snapshot, raw text and summary report to the job directory.
 * Each write is independent; a failed write is logged and left out of the result.
 */
export async function persistCriteria(
  snapshot: unknown,
  criteria: DesignCriteria,
  workspace: JobWorkspace
): Promise<PersistedOutputs> {
  const outputs: PersistedOutputs = {};

  const resultsJson = await workspace.writeJson(RESULTS_FILE, snapshot);
  if (resultsJson) outputs.resultsJson = resultsJson;

  const extractedText = await workspace.writeFile(TEXT_FILE, criteria.rawText);
  if (extractedText) outputs.extractedText = extractedText;

  const summaryReport = await workspace.writeFile(SUMMARY_FILE, formatSummaryReport(criteria));
  if (summaryReport) outputs.summaryReport = summaryReport;

  logger.info({ jobId: workspace.jobId, outputs }, 'Persisted extraction outputs');
  return outputs;
}
