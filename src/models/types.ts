export type CoordinateSpace = 'normalized' | 'points';

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
  space?: CoordinateSpace;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * A tagged span of recognized text as returned by the extraction service.
 * `typeTag` comes from an open vocabulary configured on the service side.
 */
export interface Entity {
  typeTag: string;
  text: string;
  confidence: number;
  pageNumber: number;
  boundingBox?: BoundingBox;
}

// --- Classified records ---

export enum LoadType {
  DEAD_LOAD = 'dead_load',
  LIVE_LOAD = 'live_load',
  WIND_LOAD = 'wind_load',
  SNOW_LOAD = 'snow_load',
  SEISMIC_LOAD = 'seismic_load',
  HYDROSTATIC_LOAD = 'hydrostatic_load',
  WAVE_LOAD = 'wave_load',
  IMPACT_LOAD = 'impact_load',
  THERMAL_LOAD = 'thermal_load',
  BERTHING_LOAD = 'berthing_load',
  MOORING_LOAD = 'mooring_load',
  OTHER = 'other'
}

export enum VehicleType {
  PASSENGER_CAR = 'passenger_car',
  TRUCK = 'truck',
  BUS = 'bus',
  TRAILER = 'trailer',
  EMERGENCY_VEHICLE = 'emergency_vehicle',
  MILITARY_VEHICLE = 'military_vehicle',
  CONSTRUCTION_VEHICLE = 'construction_vehicle',
  OTHER = 'other'
}

export enum CraneType {
  MOBILE_CRANE = 'mobile_crane',
  TOWER_CRANE = 'tower_crane',
  GANTRY_CRANE = 'gantry_crane',
  BRIDGE_CRANE = 'bridge_crane',
  JIB_CRANE = 'jib_crane',
  FLOATING_CRANE = 'floating_crane',
  OTHER = 'other'
}

export type GenericCategory =
  | 'structural_element'
  | 'material_specification'
  | 'safety_factor'
  | 'environmental_condition';

export type DrawingField = 'design_criteria' | 'design_loads' | 'drawing_number' | 'title' | 'date';

export type RecordOrigin = 'entity' | 'composite_split' | 'text_pattern';

interface RecordBase {
  confidence: number;
  boundingBox?: BoundingBox;
  description?: string;
  pageNumber: number;
  sourceTag: string;
  origin: RecordOrigin;
  // Index of the entity in classification order; absent for text-pattern records
  entityIndex?: number;
}

export interface LoadRecord extends RecordBase {
  kind: 'load';
  loadType: LoadType;
  magnitude: number;
  unit: string;
}

export interface SeismicForceRecord extends RecordBase {
  kind: 'seismic_force';
  seismicZone?: string;
  accelerationCoefficient?: number;
  responseModificationFactor?: number;
  importanceFactor?: number;
  baseShear?: number;
  unit: string;
}

export interface DesignVehicleRecord extends RecordBase {
  kind: 'design_vehicle';
  vehicleType: VehicleType;
  axleLoads: number[];
  totalWeight: number;
  unit: string;
}

export interface DesignCraneRecord extends RecordBase {
  kind: 'design_crane';
  craneType: CraneType;
  capacity: number;
  boomLength?: number;
  radius?: number;
  dimensions: number[];
  unit: string;
}

export interface GenericTagRecord extends RecordBase {
  kind: 'generic_tag';
  category: GenericCategory;
  value: string;
}

export interface DrawingFieldRecord extends RecordBase {
  kind: 'drawing_field';
  field: DrawingField;
  value: string;
}

export type ClassifiedRecord =
  | LoadRecord
  | SeismicForceRecord
  | DesignVehicleRecord
  | DesignCraneRecord
  | GenericTagRecord
  | DrawingFieldRecord;

export interface ClassificationResult {
  records: ClassifiedRecord[];
  unclassified: Entity[];
}

// --- Images ---

export type ImageSource = 'service-native' | 'service-bbox-crop' | 'document-raster-fallback';

export interface PageRaster {
  pageNumber: number;
  pixelWidth: number;
  pixelHeight: number;
  image: Buffer;
  mimeType: string;
  origin: 'service' | 'rendered';
}

/**
 * An image candidate held in memory while a job runs.
 * `identity` is `entity:<i>`, `page:<n>`, `region:<id>` or `embedded:<page>_<n>`;
 * together with the page number it is the de-duplication key.
 */
export interface ResolvedImage {
  id: string;
  identity: string;
  pageNumber: number;
  boundingBox?: BoundingBox;
  source: ImageSource;
  confidence: number;
  data: Buffer;
  byteSize: number;
  mimeType?: string;
  pixelWidth?: number;
  pixelHeight?: number;
  pixelPath?: string;
  entityIndex?: number;
  typeTag?: string;
  description?: string;
}

// Serializable projection of a ResolvedImage as it appears in results
export interface ImageData {
  imageId: string;
  identity: string;
  pageNumber: number;
  boundingBox?: BoundingBox;
  source: ImageSource;
  confidence: number;
  byteSize: number;
  pixelPath?: string;
  typeTag?: string;
  description?: string;
}

// --- Upstream service ---

export interface TableData {
  tableId: string;
  pageNumber: number;
  headers: string[];
  rows: string[][];
  boundingBox?: BoundingBox;
  confidence: number;
}

export interface ServicePage {
  pageNumber: number;
  width?: number;
  height?: number;
  unit?: string;
  image?: Buffer;
}

export interface ServiceImage {
  id: string;
  pageNumber: number;
  kind: 'page' | 'region';
  boundingBox?: BoundingBox;
  confidence: number;
  mimeType?: string;
  content?: Buffer;
}

export interface ServiceResponse {
  fullText: string;
  pages: ServicePage[];
  entities: Entity[];
  tables: TableData[];
  images: ServiceImage[];
  documentConfidence?: number;
  processorVersion?: string;
}

export interface ServiceInfo {
  provider: string;
  processorName: string;
  location: string;
  // False while required connection settings are missing
  configured: boolean;
}

export interface ExtractionService {
  process(document: Buffer, mimeType: string): Promise<ServiceResponse>;
  describe(): ServiceInfo;
}

// --- Document collaborators ---

export interface PageRasterizer {
  rasterizePage(document: Buffer, pageNumber: number, dpi: number): Promise<PageRaster>;
  rasterizeAll(document: Buffer, dpi: number): Promise<PageRaster[]>;
}

export interface DocumentInfo {
  pageCount: number;
  // Page sizes in points keyed by 1-based page number
  pageSizes: Map<number, Size>;
  creationDate?: string;
}

export interface DocumentInspector {
  inspect(document: Buffer): Promise<DocumentInfo>;
}

// Pulls the raster images a PDF carries in its page resources
export interface EmbeddedImageSource {
  extract(document: Buffer): Promise<ResolvedImage[]>;
}

// --- Results ---

export interface DocumentMetadata {
  filename: string;
  fileSize: number;
  pageCount: number;
  documentType: string;
  creationDate?: string;
  processingDate: string;
  processorVersion: string;
}

export interface DesignCriteria {
  loads: LoadRecord[];
  seismicForces: SeismicForceRecord[];
  designVehicles: DesignVehicleRecord[];
  designCranes: DesignCraneRecord[];
  structuralElements: GenericTagRecord[];
  materialSpecifications: GenericTagRecord[];
  safetyFactors: GenericTagRecord[];
  environmentalConditions: GenericTagRecord[];
  drawingFields: DrawingFieldRecord[];
  tables: TableData[];
  images: ImageData[];
  documentEntities: Entity[];
  unclassifiedEntities: Entity[];
  metadata: DocumentMetadata;
  rawText: string;
  confidenceScore: number;
}

export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type JobStage =
  | 'validating'
  | 'extracting'
  | 'classifying'
  | 'resolving_images'
  | 'reconciling'
  | 'aggregating';

export interface PersistedOutputs {
  resultsJson?: string;
  extractedText?: string;
  summaryReport?: string;
}

export interface ExtractionResult {
  jobId: string;
  filename: string;
  status: 'completed' | 'failed';
  designCriteria?: DesignCriteria;
  errorMessage?: string;
  processingTimeMs: number;
  createdAt: string;
  updatedAt: string;
  outputs?: PersistedOutputs;
}

export interface JobState {
  jobId: string;
  filename: string;
  status: JobStatus;
  stage?: JobStage;
  progress: number;
  message: string;
  createdAt: string;
  updatedAt: string;
  result?: ExtractionResult;
}
