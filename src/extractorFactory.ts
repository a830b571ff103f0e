import settings from './config/settings';
import { CriteriaExtractor } from './criteriaExtractor';
import { DocumentAiService } from './documentAiService';
import { JobRegistry } from './jobRegistry';
import { DocumentAiConfig, ExtractorConfig } from './models/configTypes';
import { PdfEmbeddedImageExtractor } from './pdfImageExtractor';
import { PdfDocumentInspector } from './pdfInspector';
import { PdfPageRasterizer } from './pdfRasterizer';

export interface ExtractorOverrides {
  documentAi?: Partial<DocumentAiConfig>;
  config?: Partial<ExtractorConfig>;
  registry?: JobRegistry;
}

/**
 * Extractor wired to Document AI and the PDF collaborators, configured from
 * the environment unless overridden.
 */
export function createExtractor(overrides: ExtractorOverrides = {}): CriteriaExtractor {
  const documentAi: DocumentAiConfig = {
    projectId: settings.projectId,
    location: settings.location,
    processorId: settings.processorId,
    ...overrides.documentAi
  };
  return new CriteriaExtractor(
    {
      service: new DocumentAiService(documentAi),
      rasterizer: new PdfPageRasterizer(),
      inspector: new PdfDocumentInspector(),
      embeddedImages: new PdfEmbeddedImageExtractor(),
      registry: overrides.registry
    },
    overrides.config
  );
}
