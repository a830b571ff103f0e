import {
  ClassificationResult,
  ClassifiedRecord,
  CraneType,
  DesignCraneRecord,
  DesignVehicleRecord,
  DrawingField,
  Entity,
  GenericCategory,
  LoadRecord,
  LoadType,
  RecordOrigin,
  SeismicForceRecord,
  VehicleType
} from './models/types';
import { SegmentKind, TextPatternExtractor } from './textPatterns';

/**
 * Fields every record copies from the entity it came from.
 */
export interface RecordContext {
  entity: Entity;
  entityIndex: number;
  sourceTag: string;
  origin: RecordOrigin;
  // Text the record is built from; a composite segment or the full entity text
  text: string;
}

export type RecordFactory = (context: RecordContext, patterns?: TextPatternExtractor) => ClassifiedRecord;

export function normalizeTag(tag: string): string {
  return tag
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

function baseFields(context: RecordContext) {
  return {
    confidence: context.entity.confidence,
    boundingBox: context.entity.boundingBox,
    description: context.text.trim() || undefined,
    pageNumber: context.entity.pageNumber,
    sourceTag: context.sourceTag,
    origin: context.origin,
    entityIndex: context.entityIndex
  };
}

export function loadFactory(loadType: LoadType): RecordFactory {
  return (context, patterns): LoadRecord => {
    const quantity = loadType === LoadType.IMPACT_LOAD
      ? patterns?.findFactor(context.text)
      : patterns?.findLoad(context.text);
    return {
      kind: 'load',
      loadType,
      magnitude: quantity?.magnitude ?? 0,
      unit: quantity?.unit ?? '',
      ...baseFields(context)
    };
  };
}

export const seismicFactory: RecordFactory = (context, patterns): SeismicForceRecord => {
  const seismic = patterns?.findSeismic(context.text);
  return {
    kind: 'seismic_force',
    seismicZone: seismic?.seismicZone,
    accelerationCoefficient: seismic?.accelerationCoefficient,
    responseModificationFactor: seismic?.responseModificationFactor,
    importanceFactor: seismic?.importanceFactor,
    baseShear: seismic?.baseShear,
    unit: seismic?.unit ?? '',
    ...baseFields(context)
  };
};

export const vehicleFactory: RecordFactory = (context, patterns): DesignVehicleRecord => {
  const text = patterns ? patterns.truncateAtMarker(context.text) || context.text : context.text;
  const vehicle = patterns?.findVehicle(text);
  return {
    kind: 'design_vehicle',
    vehicleType: patterns ? patterns.findVehicleType(text) : VehicleType.TRUCK,
    axleLoads: vehicle?.axleLoads ?? [],
    totalWeight: vehicle?.totalWeight ?? 0,
    unit: vehicle?.unit ?? '',
    ...baseFields({ ...context, text })
  };
};

export const craneFactory: RecordFactory = (context, patterns): DesignCraneRecord => {
  const text = patterns ? patterns.truncateAtMarker(context.text) || context.text : context.text;
  const crane = patterns?.findCrane(text);
  return {
    kind: 'design_crane',
    craneType: patterns ? patterns.findCraneType(text) : CraneType.MOBILE_CRANE,
    capacity: crane?.capacity ?? 0,
    boomLength: crane?.boomLength,
    radius: crane?.radius,
    dimensions: crane?.dimensions ?? [],
    unit: crane?.unit ?? '',
    ...baseFields({ ...context, text })
  };
};

export function drawingFieldFactory(field: DrawingField): RecordFactory {
  return context => ({
    kind: 'drawing_field',
    field,
    value: context.text.trim(),
    ...baseFields(context)
  });
}

export function genericFactory(category: GenericCategory): RecordFactory {
  return context => ({
    kind: 'generic_tag',
    category,
    value: context.text.trim(),
    ...baseFields(context)
  });
}

export const DEFAULT_TAG_TABLE: ReadonlyMap<string, RecordFactory> = new Map<string, RecordFactory>([
  ['VERTICAL_DEAD_LOADS', loadFactory(LoadType.DEAD_LOAD)],
  ['VERTICAL_LIVE_LOADS', loadFactory(LoadType.LIVE_LOAD)],
  ['WIND_LOADS', loadFactory(LoadType.WIND_LOAD)],
  ['BERTHING_LOADS', loadFactory(LoadType.BERTHING_LOAD)],
  ['MOORING_LOADS', loadFactory(LoadType.MOORING_LOAD)],
  ['SNOW_LOADS', loadFactory(LoadType.SNOW_LOAD)],
  ['THERMAL_LOADS', loadFactory(LoadType.THERMAL_LOAD)],
  ['HYDROSTATIC_LOADS', loadFactory(LoadType.HYDROSTATIC_LOAD)],
  ['WAVE_LOADS', loadFactory(LoadType.WAVE_LOAD)],
  ['IMPACT_LOADS', loadFactory(LoadType.IMPACT_LOAD)],
  ['DYNAMIC_LOAD_ALLOWANCE', loadFactory(LoadType.IMPACT_LOAD)],
  ['SEISMIC_FORCES', seismicFactory],
  ['SEISMIC_LOADS', seismicFactory],
  ['DESIGN_VEHICLE', vehicleFactory],
  ['DESIGN_CRANE', craneFactory],
  ['DESIGN_CRITERIA', drawingFieldFactory('design_criteria')],
  ['DESIGN_LOADS', drawingFieldFactory('design_loads')],
  ['DRG_NO', drawingFieldFactory('drawing_number')],
  ['TITLE', drawingFieldFactory('title')],
  ['DATE', drawingFieldFactory('date')]
]);

// Tags whose text embeds several sub-fields separated by known markers
export const DEFAULT_COMPOSITE_TAGS: ReadonlySet<string> = new Set(['DESIGN_CRITERIA', 'DESIGN_LOADS']);

const SEGMENT_FACTORIES: Record<SegmentKind, RecordFactory> = {
  design_vehicle: vehicleFactory,
  design_crane: craneFactory,
  dynamic_load_allowance: loadFactory(LoadType.IMPACT_LOAD),
  live_load: loadFactory(LoadType.LIVE_LOAD)
};

export const DEFAULT_CATEGORY_KEYWORDS: ReadonlyArray<[GenericCategory, string[]]> = [
  ['structural_element', ['BEAM', 'COLUMN', 'SLAB', 'WALL', 'FOUNDATION', 'PILE', 'STRUCTURAL_ELEMENT']],
  ['material_specification', ['MATERIAL', 'STEEL', 'CONCRETE', 'WOOD', 'TIMBER', 'ALUMINUM', 'REINFORCEMENT', 'MATERIAL_SPEC']],
  ['safety_factor', ['SAFETY_FACTOR', 'FACTOR_OF_SAFETY', 'SAFETY_MARGIN', 'SAFETY_COEFFICIENT', 'LOAD_FACTOR']],
  ['environmental_condition', ['WIND_LOAD', 'SNOW_LOAD', 'TEMPERATURE', 'HUMIDITY', 'EXPOSURE', 'ENVIRONMENTAL_CONDITION']]
];

export interface ClassifierOptions {
  tagTable: ReadonlyMap<string, RecordFactory>;
  compositeTags: ReadonlySet<string>;
  categoryKeywords: ReadonlyArray<[GenericCategory, string[]]>;
  // Without a pattern extractor magnitudes stay at zero and units empty
  patterns?: TextPatternExtractor;
}

/**
 * EntityClassifier
 * Maps service entities onto typed engineering records through a tag lookup
 * table, with keyword categories as the fallback for tags it does not know.
 */
export class EntityClassifier {
  private options: ClassifierOptions;

  constructor(options: Partial<ClassifierOptions> = {}) {
    this.options = {
      tagTable: DEFAULT_TAG_TABLE,
      compositeTags: DEFAULT_COMPOSITE_TAGS,
      categoryKeywords: DEFAULT_CATEGORY_KEYWORDS,
      ...options
    };
  }

  /**
   * Classifies one entity. Returns an empty array for unrecognized tags.
   * @param entityIndex Position of the entity in the service response
   */
  classify(entity: Entity, entityIndex = 0): ClassifiedRecord[] {
    const tag = normalizeTag(entity.typeTag);
    const { patterns } = this.options;
    const context: RecordContext = { entity, entityIndex, sourceTag: tag, origin: 'entity', text: entity.text };

    const factory = this.options.tagTable.get(tag);
    if (factory) {
      const records = [factory(context, patterns)];
      if (this.options.compositeTags.has(tag)) {
        records.push(...this.splitComposite(context));
      }
      return records;
    }

    const category = this.categoryFor(tag);
    return category ? [genericFactory(category)(context, patterns)] : [];
  }

  classifyAll(entities: Entity[]): ClassificationResult {
    const records: ClassifiedRecord[] = [];
    const unclassified: Entity[] = [];

    entities.forEach((entity, index) => {
      const classified = this.classify(entity, index);
      if (classified.length === 0) {
        unclassified.push(entity);
      }
      records.push(...classified);
    });

    return { records, unclassified };
  }

  private splitComposite(parent: RecordContext): ClassifiedRecord[] {
    const splitter = this.options.patterns ?? new TextPatternExtractor();
    return splitter.splitSegments(parent.text).map(segment =>
      SEGMENT_FACTORIES[segment.kind](
        { ...parent, origin: 'composite_split', text: segment.text },
        this.options.patterns
      )
    );
  }

  private categoryFor(tag: string): GenericCategory | undefined {
    const hit = this.options.categoryKeywords.find(([, keywords]) =>
      keywords.some(keyword => tag.includes(keyword))
    );
    return hit?.[0];
  }
}

// Lower rank wins when two records carry the same fact
const ORIGIN_RANK: Record<RecordOrigin, number> = {
  entity: 0,
  composite_split: 1,
  text_pattern: 2
};

function quantityKey(kind: string, subtype: string, magnitude: number, unit: string): string {
  // Unparsed quantities differ only in their default unit
  return [kind, subtype, magnitude, magnitude === 0 ? '' : unit].join('|');
}

/**
 * The fact a record states, independent of where it was read from.
 */
export function recordSignature(record: ClassifiedRecord): string {
  switch (record.kind) {
    case 'load':
      return quantityKey(record.kind, record.loadType, record.magnitude, record.unit);
    case 'design_vehicle':
      return quantityKey(record.kind, record.vehicleType, record.totalWeight, record.unit);
    case 'design_crane':
      return quantityKey(record.kind, record.craneType, record.capacity, record.unit);
    case 'seismic_force':
      return [
        record.kind,
        record.seismicZone ?? '',
        record.accelerationCoefficient ?? '',
        record.responseModificationFactor ?? '',
        record.importanceFactor ?? '',
        record.baseShear ?? '',
        record.unit
      ].join('|');
    case 'generic_tag':
      return [record.kind, record.category, record.value].join('|');
    case 'drawing_field':
      return [record.kind, record.field, record.value].join('|');
  }
}

/**
 * Drops records that repeat a fact already stated by a record of a stronger
 * origin: composite segments yield to tagged entities, and text-pattern
 * records yield to both. Records of the same origin are all kept, in order.
 */
export function dropRepeatedRecords(records: ClassifiedRecord[]): ClassifiedRecord[] {
  const strongest = new Map<string, number>();
  for (const record of records) {
    const key = recordSignature(record);
    const rank = ORIGIN_RANK[record.origin];
    strongest.set(key, Math.min(strongest.get(key) ?? rank, rank));
  }
  return records.filter(record => ORIGIN_RANK[record.origin] === strongest.get(recordSignature(record)));
}
