import settings from '../config/settings';

export interface ResolverConfig {
  rasterDpi: number;
  cropBufferPx: number;
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  rasterDpi: settings.rasterDpi,
  cropBufferPx: 10
};

export interface ReconcilerConfig {
  minNativeImageBytes: number; // Anything at or below this is treated as a placeholder render
  minRegionOverlap: number;
  // Images embedded in the PDF below these sizes are icons, logos or rules
  minEmbeddedWidth: number;
  minEmbeddedHeight: number;
  minEmbeddedBytes: number;
}

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  minNativeImageBytes: 2000,
  minRegionOverlap: 0.5,
  minEmbeddedWidth: 100,
  minEmbeddedHeight: 100,
  minEmbeddedBytes: 5000
};

export interface ExtractorConfig {
  outputDir: string;
  maxFileSizeMb: number;
  scanRawText: boolean;
  persistOutputs: boolean;
  processorVersion: string;
}

export const DEFAULT_EXTRACTOR_CONFIG: ExtractorConfig = {
  outputDir: settings.outputDir,
  maxFileSizeMb: settings.maxFileSizeMb,
  scanRawText: true,
  persistOutputs: true,
  processorVersion: '1.0.0'
};

export interface BatchConfig {
  maxWorkers: number;
}

export const DEFAULT_BATCH_CONFIG: BatchConfig = {
  maxWorkers: settings.batchMaxWorkers
};

export interface DocumentAiConfig {
  projectId: string;
  location: string;
  processorId: string;
}
