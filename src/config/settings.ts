// Environment-driven settings, read once at startup
function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export interface Settings {
  projectId: string;
  processorId: string;
  location: string;
  apiHost: string;
  apiPort: number;
  logLevel: string;
  outputDir: string;
  maxFileSizeMb: number;
  rasterDpi: number;
  batchMaxWorkers: number;
  maxBatchFiles: number;
}

const settings: Settings = {
  projectId: process.env.GOOGLE_CLOUD_PROJECT || '',
  processorId: process.env.DOCUMENT_AI_PROCESSOR_ID || '',
  location: process.env.DOCUMENT_AI_LOCATION || 'us',
  apiHost: process.env.API_HOST || '0.0.0.0',
  apiPort: intFromEnv('API_PORT', 8000),
  logLevel: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  outputDir: process.env.DEFAULT_OUTPUT_DIR || 'data/output',
  maxFileSizeMb: intFromEnv('MAX_FILE_SIZE_MB', 50),
  rasterDpi: intFromEnv('RASTER_DPI', 300),
  batchMaxWorkers: intFromEnv('BATCH_MAX_WORKERS', 4),
  maxBatchFiles: intFromEnv('MAX_BATCH_FILES', 10)
};

export default settings;
