import { EntityClassifier, dropRepeatedRecords, normalizeTag } from '../entityClassifier';
import { CraneType, LoadType, VehicleType } from '../models/types';
import { TextPatternExtractor } from '../textPatterns';
import { makeEntity } from './helpers';

describe('EntityClassifier', () => {
  const classifier = new EntityClassifier({ patterns: new TextPatternExtractor() });

  it('maps a live load entity to exactly one load record', () => {
    const records = classifier.classify(makeEntity({ typeTag: 'VERTICAL_LIVE_LOADS', confidence: 0.92 }));

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      kind: 'load',
      loadType: LoadType.LIVE_LOAD,
      magnitude: 5,
      unit: 'kPa',
      confidence: 0.92,
      pageNumber: 1,
      sourceTag: 'VERTICAL_LIVE_LOADS',
      origin: 'entity',
      entityIndex: 0
    });
  });

  it('normalizes tag spelling before the lookup', () => {
    const records = classifier.classify(makeEntity({ typeTag: 'vertical live-loads' }));
    expect(records[0]).toMatchObject({ kind: 'load', loadType: LoadType.LIVE_LOAD, sourceTag: 'VERTICAL_LIVE_LOADS' });
  });

  it('gives the same records for the same input', () => {
    const entity = makeEntity({ typeTag: 'DESIGN_CRANE', text: '100 t MOBILE CRANE, BOOM 30 m, RADIUS 12 m' });
    expect(classifier.classify(entity, 3)).toEqual(classifier.classify(entity, 3));
  });

  it('keeps magnitudes at zero without a pattern extractor', () => {
    const bare = new EntityClassifier();
    expect(bare.classify(makeEntity())[0]).toMatchObject({ kind: 'load', magnitude: 0, unit: '' });
  });

  it('reads seismic parameters', () => {
    const [record] = classifier.classify(
      makeEntity({ typeTag: 'SEISMIC_FORCES', text: 'SEISMIC ZONE 2, Z = 0.08, R = 3.5, I = 1.2' })
    );
    expect(record).toMatchObject({
      kind: 'seismic_force',
      seismicZone: '2',
      accelerationCoefficient: 0.08,
      responseModificationFactor: 3.5,
      importanceFactor: 1.2,
      unit: 'g'
    });
  });

  it('reads crane capacity and geometry', () => {
    const [record] = classifier.classify(
      makeEntity({ typeTag: 'DESIGN_CRANE', text: '100 t MOBILE CRANE, BOOM 30 m, RADIUS 12 m' })
    );
    expect(record).toMatchObject({
      kind: 'design_crane',
      craneType: CraneType.MOBILE_CRANE,
      capacity: 100,
      boomLength: 30,
      radius: 12,
      dimensions: [30, 12],
      unit: 't'
    });
  });

  it('splits composite design criteria into sub-records', () => {
    const entity = makeEntity({
      typeTag: 'DESIGN_CRITERIA',
      text: 'DESIGN VEHICLE: 12t + 18t + 18t TRUCK DYNAMIC LOAD ALLOWANCE: 0.3 LIVE LOAD: 5 kPa'
    });
    const records = classifier.classify(entity, 4);

    expect(records.map(r => [r.kind, r.origin])).toEqual([
      ['drawing_field', 'entity'],
      ['design_vehicle', 'composite_split'],
      ['load', 'composite_split'],
      ['load', 'composite_split']
    ]);
    expect(records[1]).toMatchObject({
      vehicleType: VehicleType.TRUCK,
      axleLoads: [12, 18, 18],
      totalWeight: 48,
      unit: 't',
      description: '12t + 18t + 18t TRUCK',
      entityIndex: 4
    });
    expect(records[2]).toMatchObject({ loadType: LoadType.IMPACT_LOAD, magnitude: 0.3, unit: 'factor' });
    expect(records[3]).toMatchObject({ loadType: LoadType.LIVE_LOAD, magnitude: 5, unit: 'kPa' });
  });

  it('falls back to keyword categories for unknown tags', () => {
    expect(classifier.classify(makeEntity({ typeTag: 'CONCRETE_GRADE', text: 'N40' }))[0])
      .toMatchObject({ kind: 'generic_tag', category: 'material_specification', value: 'N40' });
    expect(classifier.classify(makeEntity({ typeTag: 'STEEL_BEAM', text: '310UB40' }))[0])
      .toMatchObject({ kind: 'generic_tag', category: 'structural_element' });
    expect(classifier.classify(makeEntity({ typeTag: 'FACTOR_OF_SAFETY', text: '1.5' }))[0])
      .toMatchObject({ kind: 'generic_tag', category: 'safety_factor' });
    expect(classifier.classify(makeEntity({ typeTag: 'EXPOSURE_CLASS', text: 'B2' }))[0])
      .toMatchObject({ kind: 'generic_tag', category: 'environmental_condition' });
  });

  it('reports entities it cannot place as unclassified', () => {
    const notes = makeEntity({ typeTag: 'GENERAL_NOTES', text: 'All dimensions in mm' });
    const { records, unclassified } = classifier.classifyAll([makeEntity(), notes]);

    expect(records).toHaveLength(1);
    expect(unclassified).toEqual([notes]);
  });

  it('numbers records by their position in the entity list', () => {
    const { records } = classifier.classifyAll([
      makeEntity({ typeTag: 'TITLE', text: 'Wharf deck plan' }),
      makeEntity({ typeTag: 'DRG_NO', text: 'S-101' })
    ]);
    expect(records).toEqual([
      expect.objectContaining({ kind: 'drawing_field', field: 'title', value: 'Wharf deck plan', entityIndex: 0 }),
      expect.objectContaining({ kind: 'drawing_field', field: 'drawing_number', value: 'S-101', entityIndex: 1 })
    ]);
  });
});

describe('dropRepeatedRecords', () => {
  const patterns = new TextPatternExtractor();
  const classifier = new EntityClassifier({ patterns });

  it('keeps one record per fact, preferring tagged entities', () => {
    const composite = makeEntity({ typeTag: 'DESIGN_CRITERIA', text: 'DESIGN VEHICLE: 31 t TRUCK\nLIVE LOAD: 5 kPa' });
    const records = [
      ...classifier.classifyAll([composite, makeEntity()]).records,
      ...patterns.scan(`${composite.text}\nLIVE LOAD 5 kPa`)
    ];
    expect(records).toHaveLength(7);

    const kept = dropRepeatedRecords(records);

    expect(kept.map(r => [r.kind, r.origin])).toEqual([
      ['drawing_field', 'entity'],
      ['design_vehicle', 'composite_split'],
      ['load', 'entity']
    ]);
  });

  it('keeps repeats of the same origin and facts found only in the text', () => {
    const records = [
      ...classifier.classifyAll([makeEntity(), makeEntity({ pageNumber: 2 })]).records,
      ...patterns.scan('LIVE LOAD 7 kPa')
    ];

    expect(dropRepeatedRecords(records).map(r => [r.origin, r.pageNumber])).toEqual([
      ['entity', 1],
      ['entity', 2],
      ['text_pattern', 1]
    ]);
  });
});

describe('normalizeTag', () => {
  it('upper-cases and joins words with underscores', () => {
    expect(normalizeTag(' Design-Vehicle ')).toBe('DESIGN_VEHICLE');
    expect(normalizeTag('drg no.')).toBe('DRG_NO');
  });
});
