import { DocumentProcessorServiceClient } from '@google-cloud/documentai';
import type { protos } from '@google-cloud/documentai';
import { mapDocument } from './documentAiMapper';
import { DocumentAiConfig } from './models/configTypes';
import { ExtractionService, ServiceInfo, ServiceResponse } from './models/types';
import { ConfigurationError, UpstreamServiceError, errorMessage } from './utils/errors';
import logger from './utils/logger';

type IProcessRequest = protos.google.cloud.documentai.v1.IProcessRequest;
type IProcessResponse = protos.google.cloud.documentai.v1.IProcessResponse;

export type ProcessDocumentFn = (request: IProcessRequest) => Promise<IProcessResponse>;

function clientProcessor(location: string): ProcessDocumentFn {
  const client = new DocumentProcessorServiceClient({ apiEndpoint: `${location}-documentai.googleapis.com` });
  return async request => {
    const [response] = await client.processDocument(request);
    return response;
  };
}

/**
 * Document AI backed extraction service. One network call per document, no retries.
 */
export class DocumentAiService implements ExtractionService {
  readonly processorName: string;
  private processDocument?: ProcessDocumentFn;

  constructor(private readonly config: DocumentAiConfig, processDocument?: ProcessDocumentFn) {
    this.processorName = `projects/${config.projectId}/locations/${config.location}/processors/${config.processorId}`;
    this.processDocument = processDocument;
  }

  describe(): ServiceInfo {
    return {
      provider: 'google-document-ai',
      processorName: this.processorName,
      location: this.config.location,
      configured: this.missingSettings().length === 0
    };
  }

  async process(document: Buffer, mimeType: string): Promise<ServiceResponse> {
    const missing = this.missingSettings();
    if (missing.length > 0) {
      throw new ConfigurationError(`Document AI is not configured: missing ${missing.join(', ')}`);
    }

    // Created lazily on first use
    this.processDocument ??= clientProcessor(this.config.location);

    logger.info(`Sending ${document.length} bytes to ${this.processorName}`);
    let response: IProcessResponse;
    try {
      response = await this.processDocument({
        name: this.processorName,
        rawDocument: { content: document.toString('base64'), mimeType }
      });
    } catch (error) {
      throw new UpstreamServiceError(errorMessage(error), error);
    }

    if (!response.document) {
      throw new UpstreamServiceError('Document AI returned no document');
    }
    const mapped = mapDocument(response.document);
    logger.info(`Document AI returned ${mapped.entities.length} entities across ${mapped.pages.length} pages`);
    return mapped;
  }

  private missingSettings(): string[] {
    return [
      ['project id', this.config.projectId],
      ['processor id', this.config.processorId],
      ['location', this.config.location]
    ].filter(([, value]) => !value).map(([name]) => name);
  }
}
