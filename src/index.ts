export * from './models/types';
export * from './models/configTypes';
export * from './coordinateTransformer';
export * from './textPatterns';
export * from './entityClassifier';
export * from './pageRasterCache';
export * from './imageRegionResolver';
export * from './imageSourceReconciler';
export * from './criteriaAggregator';
export * from './jobRegistry';
export * from './criteriaExtractor';
export * from './batchProcessor';
export * from './documentAiMapper';
export * from './documentAiService';
export * from './pdfRasterizer';
export * from './pdfInspector';
export * from './pdfImageExtractor';
export * from './extractorFactory';
export * from './utils/errors';
export { JobWorkspace } from './utils/jobWorkspace';
export { default as settings } from './config/settings';
export { default as logger } from './utils/logger';
export { handleRequest, createServer, createApiContext } from './handler';
export type { ApiRequest, ApiResponse, ApiContext } from './handler';
