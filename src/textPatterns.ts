import {
  ClassifiedRecord,
  CraneType,
  DesignCraneRecord,
  DesignVehicleRecord,
  LoadRecord,
  LoadType,
  VehicleType
} from './models/types';

export const TEXT_PATTERN_CONFIDENCE = 0.8;

export interface QuantityMatch {
  magnitude: number;
  unit: string;
}

export interface VehicleMatch {
  axleLoads: number[];
  totalWeight: number;
  unit: string;
}

export interface CraneMatch {
  capacity: number;
  boomLength?: number;
  radius?: number;
  dimensions: number[];
  unit: string;
}

export interface SeismicMatch {
  seismicZone?: string;
  accelerationCoefficient?: number;
  responseModificationFactor?: number;
  importanceFactor?: number;
  baseShear?: number;
  unit: string;
}

export type SegmentKind = 'design_vehicle' | 'design_crane' | 'dynamic_load_allowance' | 'live_load';

export interface SegmentMarker {
  kind: SegmentKind;
  pattern: RegExp;
}

export interface TextSegment {
  kind: SegmentKind;
  text: string;
}

/**
 * A phrasing that produces a record straight from free text.
 * `pattern` must carry the `g` flag; it is only used through `matchAll`.
 */
export interface SynthesisRule {
  name: string;
  pattern: RegExp;
  build(match: RegExpMatchArray, extractor: TextPatternExtractor, pageNumber: number): ClassifiedRecord | undefined;
}

export interface TextPatternRules {
  loadQuantity: RegExp;
  factor: RegExp;
  axleSequence: RegExp;
  weight: RegExp;
  craneCapacity: RegExp;
  boomLength: RegExp;
  radius: RegExp;
  metres: RegExp;
  seismicZone: RegExp;
  acceleration: RegExp;
  responseModification: RegExp;
  importance: RegExp;
  baseShear: RegExp;
  vehicleTypes: Array<[RegExp, VehicleType]>;
  craneTypes: Array<[RegExp, CraneType]>;
  markers: SegmentMarker[];
  synthesis: SynthesisRule[];
}

const NUMBER = String.raw`(\d+(?:\.\d+)?)`;

const UNIT_ALIASES: Record<string, string> = {
  'kn/m²': 'kN/m²',
  'kn/m2': 'kN/m²',
  'kn/m': 'kN/m',
  kpa: 'kPa',
  mpa: 'MPa',
  kn: 'kN',
  mn: 'MN',
  psf: 'psf',
  ksf: 'ksf',
  kip: 'kip',
  kips: 'kip',
  t: 't',
  tonne: 't',
  tonnes: 't'
};

export function canonicalUnit(unit: string): string {
  return UNIT_ALIASES[unit.toLowerCase()] ?? unit;
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export const SEGMENT_MARKERS: SegmentMarker[] = [
  { kind: 'design_vehicle', pattern: /DESIGN\s+VEHICLE\s*:?/i },
  { kind: 'design_crane', pattern: /DESIGN\s+CRANE\s*:?/i },
  { kind: 'dynamic_load_allowance', pattern: /DYNAMIC\s+LOAD\s+ALLOWAN(?:CE)?\s*:?/i },
  { kind: 'live_load', pattern: /LIVE\s+LOADS?\s*:?/i }
];

const DEFAULT_SYNTHESIS_RULES: SynthesisRule[] = [
  {
    name: 'live-load',
    pattern: new RegExp(String.raw`LIVE\s+LOAD[:\s]*${NUMBER}\s*(kPa|kN/m²|kN/m2)`, 'gi'),
    build: (match, _extractor, pageNumber): LoadRecord => ({
      kind: 'load',
      loadType: LoadType.LIVE_LOAD,
      magnitude: parseFloat(match[1]),
      unit: canonicalUnit(match[2]),
      confidence: TEXT_PATTERN_CONFIDENCE,
      description: match[0].trim(),
      pageNumber,
      sourceTag: 'LIVE_LOAD',
      origin: 'text_pattern'
    })
  },
  {
    name: 'deck-class',
    pattern: /CLASS\s+(\d+)\s+DECK/gi,
    build: (match, _extractor, pageNumber): LoadRecord => ({
      kind: 'load',
      loadType: LoadType.DEAD_LOAD,
      magnitude: parseFloat(match[1]),
      unit: 'class',
      confidence: TEXT_PATTERN_CONFIDENCE,
      description: match[0].trim(),
      pageNumber,
      sourceTag: 'DECK_CLASS',
      origin: 'text_pattern'
    })
  },
  {
    name: 'dynamic-load-allowance',
    pattern: new RegExp(String.raw`DYNAMIC\s+LOAD\s+ALLOWANCE[:\s]*${NUMBER}`, 'gi'),
    build: (match, _extractor, pageNumber): LoadRecord => ({
      kind: 'load',
      loadType: LoadType.IMPACT_LOAD,
      magnitude: parseFloat(match[1]),
      unit: 'factor',
      confidence: TEXT_PATTERN_CONFIDENCE,
      description: match[0].trim(),
      pageNumber,
      sourceTag: 'DYNAMIC_LOAD_ALLOWANCE',
      origin: 'text_pattern'
    })
  },
  {
    name: 'design-vehicle',
    pattern: /DESIGN\s+VEHICLE[:\s]*([^\n]+)/gi,
    build: (match, extractor, pageNumber): DesignVehicleRecord | undefined => {
      const description = extractor.truncateAtMarker(match[1]);
      if (!description) {
        return undefined;
      }
      const vehicle = extractor.findVehicle(description);
      return {
        kind: 'design_vehicle',
        vehicleType: extractor.findVehicleType(description),
        axleLoads: vehicle?.axleLoads ?? [],
        totalWeight: vehicle?.totalWeight ?? 0,
        unit: vehicle?.unit ?? 't',
        confidence: TEXT_PATTERN_CONFIDENCE,
        description,
        pageNumber,
        sourceTag: 'DESIGN_VEHICLE',
        origin: 'text_pattern'
      };
    }
  },
  {
    name: 'design-crane',
    pattern: /DESIGN\s+CRANE[:\s]*([^\n]+)/gi,
    build: (match, extractor, pageNumber): DesignCraneRecord | undefined => {
      const description = extractor.truncateAtMarker(match[1]);
      if (!description) {
        return undefined;
      }
      const crane = extractor.findCrane(description);
      return {
        kind: 'design_crane',
        craneType: extractor.findCraneType(description),
        capacity: crane?.capacity ?? 0,
        boomLength: crane?.boomLength,
        radius: crane?.radius,
        dimensions: crane?.dimensions ?? [],
        unit: crane?.unit ?? 'm',
        confidence: TEXT_PATTERN_CONFIDENCE,
        description,
        pageNumber,
        sourceTag: 'DESIGN_CRANE',
        origin: 'text_pattern'
      };
    }
  }
];

export const DEFAULT_TEXT_PATTERN_RULES: TextPatternRules = {
  loadQuantity: new RegExp(
    String.raw`${NUMBER}\s*(kN/m²|kN/m2|kN/m|kPa|MPa|kN|psf|ksf|tonnes|tonne|t)(?![A-Za-z0-9²])`,
    'i'
  ),
  factor: new RegExp(NUMBER),
  axleSequence: new RegExp(
    String.raw`(?:\d+(?:\.\d+)?\s*(?:t|kN)?\s*\+\s*)+\d+(?:\.\d+)?\s*(tonnes|tonne|t|kN)(?![A-Za-z])`,
    'i'
  ),
  weight: new RegExp(String.raw`${NUMBER}\s*(tonnes|tonne|t|kN)(?![A-Za-z])`, 'i'),
  craneCapacity: new RegExp(String.raw`${NUMBER}\s*(tonnes|tonne|t|kN)(?![A-Za-z])`, 'i'),
  boomLength: new RegExp(String.raw`BOOM(?:\s+LENGTH)?\s*[:=]?\s*${NUMBER}\s*m(?![A-Za-z])`, 'i'),
  radius: new RegExp(String.raw`RADIUS\s*[:=]?\s*${NUMBER}\s*m(?![A-Za-z])`, 'i'),
  metres: new RegExp(String.raw`${NUMBER}\s*m(?![A-Za-z0-9²/])`, 'gi'),
  seismicZone: /SEISMIC\s+ZONE\s*[:=]?\s*([0-9A-Z]+)|\bZONE\s*[:=]?\s*([0-9A-Z]+)/i,
  acceleration: new RegExp(
    String.raw`\b(?:ACCELERATION\s+COEFFICIENT|PGA|KP|Z|A)\s*[:=]\s*${NUMBER}`,
    'i'
  ),
  responseModification: new RegExp(String.raw`\bR\s*[:=]\s*${NUMBER}`, 'i'),
  importance: new RegExp(String.raw`\bI\s*[:=]\s*${NUMBER}`, 'i'),
  baseShear: new RegExp(String.raw`BASE\s+SHEAR\s*[:=]?\s*${NUMBER}\s*(kN|MN|kips?)(?![A-Za-z])`, 'i'),
  vehicleTypes: [
    [/\bBUS(ES)?\b/i, VehicleType.BUS],
    [/\bTRAILER\b/i, VehicleType.TRAILER],
    [/\b(EMERGENCY|FIRE\s+(TRUCK|ENGINE|APPLIANCE)|AMBULANCE)\b/i, VehicleType.EMERGENCY_VEHICLE],
    [/\bMILITARY\b/i, VehicleType.MILITARY_VEHICLE],
    [/\b(CONSTRUCTION|FORKLIFT|EXCAVATOR|LOADER)\b/i, VehicleType.CONSTRUCTION_VEHICLE],
    [/\b(PASSENGER\s+)?CARS?\b/i, VehicleType.PASSENGER_CAR]
  ],
  craneTypes: [
    [/\bTOWER\b/i, CraneType.TOWER_CRANE],
    [/\bGANTRY\b/i, CraneType.GANTRY_CRANE],
    [/\b(BRIDGE|OVERHEAD)\b/i, CraneType.BRIDGE_CRANE],
    [/\bJIB\b/i, CraneType.JIB_CRANE],
    [/\b(FLOATING|BARGE)\b/i, CraneType.FLOATING_CRANE]
  ],
  markers: SEGMENT_MARKERS,
  synthesis: DEFAULT_SYNTHESIS_RULES
};

/**
 * Best-effort extraction of magnitudes and units from free text.
 * Every lookup returns `undefined` when no phrasing matches.
 */
export class TextPatternExtractor {
  readonly rules: TextPatternRules;

  constructor(rules: Partial<TextPatternRules> = {}) {
    this.rules = { ...DEFAULT_TEXT_PATTERN_RULES, ...rules };
  }

  findLoad(text: string): QuantityMatch | undefined {
    const match = this.rules.loadQuantity.exec(text);
    if (!match) {
      return undefined;
    }
    return { magnitude: parseFloat(match[1]), unit: canonicalUnit(match[2]) };
  }

  findFactor(text: string): QuantityMatch | undefined {
    const match = this.rules.factor.exec(text);
    return match ? { magnitude: parseFloat(match[1]), unit: 'factor' } : undefined;
  }

  findVehicle(text: string): VehicleMatch | undefined {
    const axles = this.rules.axleSequence.exec(text);
    if (axles) {
      const axleLoads = (axles[0].match(/\d+(?:\.\d+)?/g) ?? []).map(v => parseFloat(v));
      const total = axleLoads.reduce((sum, load) => sum + load, 0);
      return { axleLoads, totalWeight: roundTo(total, 3), unit: canonicalUnit(axles[1]) };
    }

    const weight = this.rules.weight.exec(text);
    if (weight) {
      return { axleLoads: [], totalWeight: parseFloat(weight[1]), unit: canonicalUnit(weight[2]) };
    }
    return undefined;
  }

  findVehicleType(text: string): VehicleType {
    const hit = this.rules.vehicleTypes.find(([pattern]) => pattern.test(text));
    return hit ? hit[1] : VehicleType.TRUCK;
  }

  findCrane(text: string): CraneMatch | undefined {
    const capacityMatch = this.rules.craneCapacity.exec(text);
    const boomLength = toNumber(this.rules.boomLength.exec(text)?.[1]);
    const radius = toNumber(this.rules.radius.exec(text)?.[1]);
    const dimensions = Array.from(text.matchAll(this.rules.metres), m => parseFloat(m[1]));

    if (!capacityMatch && boomLength === undefined && radius === undefined && dimensions.length === 0) {
      return undefined;
    }

    return {
      capacity: capacityMatch ? parseFloat(capacityMatch[1]) : 0,
      boomLength,
      radius,
      dimensions,
      unit: capacityMatch ? canonicalUnit(capacityMatch[2]) : 'm'
    };
  }

  findCraneType(text: string): CraneType {
    const hit = this.rules.craneTypes.find(([pattern]) => pattern.test(text));
    return hit ? hit[1] : CraneType.MOBILE_CRANE;
  }

  findSeismic(text: string): SeismicMatch | undefined {
    const zone = this.rules.seismicZone.exec(text);
    const seismicZone = zone ? zone[1] ?? zone[2] : undefined;
    const accelerationCoefficient = toNumber(this.rules.acceleration.exec(text)?.[1]);
    const responseModificationFactor = toNumber(this.rules.responseModification.exec(text)?.[1]);
    const importanceFactor = toNumber(this.rules.importance.exec(text)?.[1]);
    const shear = this.rules.baseShear.exec(text);
    const baseShear = toNumber(shear?.[1]);

    const found = [seismicZone, accelerationCoefficient, responseModificationFactor, importanceFactor, baseShear]
      .some(v => v !== undefined);
    if (!found) {
      return undefined;
    }

    let unit = '';
    if (shear) {
      unit = canonicalUnit(shear[2]);
    } else if (accelerationCoefficient !== undefined) {
      unit = 'g';
    }

    return {
      seismicZone,
      accelerationCoefficient,
      responseModificationFactor,
      importanceFactor,
      baseShear,
      unit
    };
  }

  /**
   * Splits composite text on the known markers. Each segment runs from the end
   * of its marker to the start of the next one.
   */
  splitSegments(text: string): TextSegment[] {
    const hits: Array<{ kind: SegmentKind; start: number; end: number }> = [];
    for (const marker of this.rules.markers) {
      const global = new RegExp(marker.pattern.source, marker.pattern.flags.includes('g') ? marker.pattern.flags : `${marker.pattern.flags}g`);
      for (const match of text.matchAll(global)) {
        const start = match.index ?? 0;
        hits.push({ kind: marker.kind, start, end: start + match[0].length });
      }
    }

    hits.sort((a, b) => a.start - b.start);
    // A hit overlapping any kept hit is dropped
    let keptEnd = 0;
    const ordered = hits.filter(hit => {
      if (hit.start < keptEnd) {
        return false;
      }
      keptEnd = hit.end;
      return true;
    });

    const segments: TextSegment[] = [];
    ordered.forEach((hit, i) => {
      const next = ordered[i + 1];
      const segmentText = text.slice(hit.end, next ? next.start : text.length).trim();
      if (segmentText) {
        segments.push({ kind: hit.kind, text: segmentText });
      }
    });
    return segments;
  }

  // Cuts free text at the first marker so a captured phrase does not run into the next field
  truncateAtMarker(text: string): string {
    let cut = text.length;
    for (const marker of this.rules.markers) {
      const match = marker.pattern.exec(text);
      if (match && match.index < cut) {
        cut = match.index;
      }
    }
    return text.slice(0, cut).trim();
  }

  /**
   * Synthesizes records from full document text using the synthesis rules.
   */
  scan(text: string, pageNumber = 1): ClassifiedRecord[] {
    const records: ClassifiedRecord[] = [];
    for (const rule of this.rules.synthesis) {
      for (const match of text.matchAll(rule.pattern)) {
        const record = rule.build(match, this, pageNumber);
        if (record) {
          records.push(record);
        }
      }
    }
    return records;
  }
}
