import http from 'http';
import * as path from 'path';
import { BatchProcessor, BatchUploadItem } from './batchProcessor';
import settings from './config/settings';
import { CriteriaExtractor } from './criteriaExtractor';
import { JobRegistry, isTerminal } from './jobRegistry';
import { errorMessage } from './utils/errors';
import logger from './utils/logger';

const API_PREFIX = '/api/v1';
const SERVICE_VERSION = '0.1.0';

export interface ApiRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

export interface ApiResponse {
  statusCode: number;
  body: string;
}

export interface ApiContext {
  extractor: CriteriaExtractor;
  batch: BatchProcessor;
  registry: JobRegistry;
  maxBodyBytes: number;
  // Batch bodies carry base64 documents, a third larger than the raw bytes
  maxBatchBodyBytes: number;
  maxBatchFiles: number;
  // Background jobs started by requests; awaited on shutdown
  inFlight: Set<Promise<unknown>>;
}

export function createApiContext(extractor: CriteriaExtractor): ApiContext {
  const maxBodyBytes = settings.maxFileSizeMb * 1024 * 1024;
  return {
    extractor,
    batch: new BatchProcessor(extractor),
    registry: extractor.registry,
    maxBodyBytes,
    maxBatchBodyBytes: Math.ceil((maxBodyBytes * 4) / 3) * settings.maxBatchFiles,
    maxBatchFiles: settings.maxBatchFiles,
    inFlight: new Set()
  };
}

interface UploadedFile {
  filename: string;
  contentBase64: string;
}

function isUploadedFile(value: unknown): value is UploadedFile {
  return typeof value === 'object' && value !== null
    && 'filename' in value && typeof value.filename === 'string' && value.filename.length > 0
    && 'contentBase64' in value && typeof value.contentBase64 === 'string';
}

function json(statusCode: number, payload: unknown): ApiResponse {
  return { statusCode, body: JSON.stringify(payload) };
}

function track(context: ApiContext, work: Promise<unknown>): void {
  const tracked = work
    .catch(error => logger.error({ err: error }, 'Background job crashed'))
    .finally(() => context.inFlight.delete(tracked));
  context.inFlight.add(tracked);
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function startExtraction(request: ApiRequest, query: URLSearchParams, context: ApiContext): ApiResponse {
  const filename = path.basename(headerValue(request.headers['x-filename']) || query.get('filename') || '');
  if (!filename) {
    return json(400, { error: 'Missing filename (x-filename header or filename query parameter)' });
  }
  if (request.body.length === 0) {
    return json(400, { error: 'Request body must contain the PDF document' });
  }

  const job = context.registry.create(filename);
  track(context, context.extractor.extractFromBuffer(request.body, filename, { jobId: job.jobId }));
  logger.info(`Accepted ${filename} (${request.body.length} bytes) as job ${job.jobId}`);
  return json(202, { jobId: job.jobId, status: job.status, message: 'Extraction started' });
}

function startBatch(request: ApiRequest, context: ApiContext): ApiResponse {
  let files: unknown;
  try {
    files = JSON.parse(request.body.toString('utf-8')).files;
  } catch (error) {
    return json(400, { error: `Invalid JSON body: ${errorMessage(error)}` });
  }
  if (!Array.isArray(files) || files.length === 0 || !files.every(isUploadedFile)) {
    return json(400, { error: 'Body must be {"files": [{"filename": <name>, "contentBase64": <PDF bytes>}, ...]}' });
  }
  if (files.length > context.maxBatchFiles) {
    return json(400, { error: `A batch takes at most ${context.maxBatchFiles} files, got ${files.length}` });
  }

  const items: BatchUploadItem[] = files.map((file: UploadedFile) => {
    const filename = path.basename(file.filename);
    return {
      document: Buffer.from(file.contentBase64, 'base64'),
      filename,
      jobId: context.registry.create(filename).jobId
    };
  });
  track(context, context.batch.processItems(items));
  logger.info(`Accepted batch of ${items.length} uploaded documents`);
  return json(202, { jobIds: items.map(item => item.jobId), count: items.length });
}

function jobStatus(jobId: string, context: ApiContext): ApiResponse {
  const job = context.registry.get(jobId);
  if (!job) {
    return json(404, { error: `Job not found: ${jobId}` });
  }
  const { result: _result, ...status } = job;
  return json(200, status);
}

function jobResult(jobId: string, context: ApiContext): ApiResponse {
  const job = context.registry.get(jobId);
  if (!job) {
    return json(404, { error: `Job not found: ${jobId}` });
  }
  if (!isTerminal(job.status) || !job.result) {
    return json(202, { jobId, status: job.status, progress: job.progress, message: 'Job not finished yet' });
  }
  return json(200, job.result);
}

/**
 * Routes one API request. Extraction runs in the background; clients poll
 * the status and results endpoints.
 */
export async function handleRequest(request: ApiRequest, context: ApiContext): Promise<ApiResponse> {
  const url = new URL(request.url, 'http://localhost');
  const route = url.pathname.replace(/\/+$/, '') || '/';

  if (request.method === 'GET' && route === '/') {
    return json(200, { message: 'Design Criteria Extractor API', version: SERVICE_VERSION, status: 'running' });
  }
  if (request.method === 'GET' && route === '/health') {
    return json(200, { status: 'healthy', version: SERVICE_VERSION, timestamp: new Date().toISOString() });
  }
  if (request.method === 'GET' && route === `${API_PREFIX}/processor/info`) {
    return json(200, context.extractor.describeService());
  }
  if (request.method === 'POST' && route === `${API_PREFIX}/extract`) {
    return startExtraction(request, url.searchParams, context);
  }
  if (request.method === 'POST' && route === `${API_PREFIX}/batch-extract`) {
    return startBatch(request, context);
  }

  const jobRoute = /^\/api\/v1\/(status|results)\/([^/]+)$/.exec(route);
  if (request.method === 'GET' && jobRoute) {
    const jobId = decodeURIComponent(jobRoute[2]);
    return jobRoute[1] === 'status' ? jobStatus(jobId, context) : jobResult(jobId, context);
  }

  return json(404, { error: `No route for ${request.method} ${route}` });
}

export function createServer(context: ApiContext): http.Server {
  return http.createServer((req, res) => {
    const limit = (req.url || '').startsWith(`${API_PREFIX}/batch-extract`)
      ? context.maxBatchBodyBytes
      : context.maxBodyBytes;
    const chunks: Buffer[] = [];
    let received = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      received += chunk.length;
      if (received > limit) {
        tooLarge = true;
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      const respond = (result: ApiResponse) => {
        res.statusCode = result.statusCode;
        res.setHeader('Content-Type', 'application/json');
        res.end(result.body);
      };
      if (tooLarge) {
        respond(json(413, { error: `Request body exceeds ${limit} bytes` }));
        return;
      }
      handleRequest(
        { method: req.method || 'GET', url: req.url || '/', headers: req.headers, body: Buffer.concat(chunks) },
        context
      )
        .then(respond)
        .catch(error => {
          logger.error({ err: error }, 'Unhandled error in request handler');
          respond(json(500, { error: errorMessage(error) }));
        });
    });
  });
}
