import * as path from 'path';
import * as fse from 'fs-extra';
import { aggregate, persistCriteria } from './criteriaAggregator';
import { EntityClassifier, dropRepeatedRecords } from './entityClassifier';
import { ImageRegionResolver, RegionRequest, ResolverJob } from './imageRegionResolver';
import { ImageSourceReconciler } from './imageSourceReconciler';
import { JobRegistry, isTerminal } from './jobRegistry';
import { DEFAULT_EXTRACTOR_CONFIG, ExtractorConfig } from './models/configTypes';
import {
  ClassifiedRecord,
  DocumentInfo,
  DocumentInspector,
  EmbeddedImageSource,
  ExtractionResult,
  ExtractionService,
  PageRasterizer,
  ResolvedImage,
  ServiceInfo,
  ServiceResponse,
  Size
} from './models/types';
import { PdfEmbeddedImageExtractor } from './pdfImageExtractor';
import { TextPatternExtractor } from './textPatterns';
import { InputValidationError, errorMessage } from './utils/errors';
import { JobWorkspace } from './utils/jobWorkspace';
import logger from './utils/logger';

const PDF_MIME_TYPE = 'application/pdf';
const PDF_MAGIC = '%PDF-';

export interface ExtractorDependencies {
  service: ExtractionService;
  rasterizer: PageRasterizer;
  inspector?: DocumentInspector;
  embeddedImages?: EmbeddedImageSource;
  registry?: JobRegistry;
  patterns?: TextPatternExtractor;
  classifier?: EntityClassifier;
  resolver?: ImageRegionResolver;
  reconciler?: ImageSourceReconciler;
}

export interface ExtractOptions {
  jobId?: string;
  outputDir?: string;
}

/**
 * Checks the bytes of an uploaded or loaded document.
 * @param label File path or name used in error messages
 */
export function validateDocument(document: Buffer, label: string, maxFileSizeMb: number): void {
  if (document.length === 0) {
    throw new InputValidationError(`File is empty: ${label}`);
  }
  if (document.length > maxFileSizeMb * 1024 * 1024) {
    throw new InputValidationError(`File exceeds maximum size of ${maxFileSizeMb} MB: ${label}`);
  }
  if (!document.subarray(0, 1024).toString('latin1').includes(PDF_MAGIC)) {
    throw new InputValidationError(`File is not a valid PDF document: ${label}`);
  }
}

/**
 * CriteriaExtractor
 * Runs one document end-to-end: service call, classification, image
 * resolution and reconciliation, aggregation and persistence.
 * Every call resolves to an ExtractionResult; failures are reported in it.
 */
export class CriteriaExtractor {
  readonly registry: JobRegistry;
  private config: ExtractorConfig;
  private service: ExtractionService;
  private inspector?: DocumentInspector;
  private embeddedImages: EmbeddedImageSource;
  private patterns: TextPatternExtractor;
  private classifier: EntityClassifier;
  private resolver: ImageRegionResolver;
  private reconciler: ImageSourceReconciler;

  constructor(deps: ExtractorDependencies, config: Partial<ExtractorConfig> = {}) {
    this.config = { ...DEFAULT_EXTRACTOR_CONFIG, ...config };
    this.service = deps.service;
    this.inspector = deps.inspector;
    this.embeddedImages = deps.embeddedImages ?? new PdfEmbeddedImageExtractor();
    this.registry = deps.registry ?? new JobRegistry();
    this.patterns = deps.patterns ?? new TextPatternExtractor();
    this.classifier = deps.classifier ?? new EntityClassifier({ patterns: this.patterns });
    this.resolver = deps.resolver ?? new ImageRegionResolver(deps.rasterizer);
    this.reconciler = deps.reconciler ?? new ImageSourceReconciler();
  }

  describeService(): ServiceInfo {
    return this.service.describe();
  }

  async extractFromFile(filePath: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
    return this.execute(path.basename(filePath), options, () => this.readInput(filePath));
  }

  async extractFromBuffer(document: Buffer, filename: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
    return this.execute(filename, options, async () => {
      if (path.extname(filename).toLowerCase() !== '.pdf') {
        throw new InputValidationError(`File must be a PDF: ${filename}`);
      }
      validateDocument(document, filename, this.config.maxFileSizeMb);
      return document;
    });
  }

  private async readInput(filePath: string): Promise<Buffer> {
    if (!(await fse.pathExists(filePath))) {
      throw new InputValidationError(`File not found: ${filePath}`);
    }
    if (path.extname(filePath).toLowerCase() !== '.pdf') {
      throw new InputValidationError(`File must be a PDF: ${filePath}`);
    }
    const stat = await fse.stat(filePath);
    if (!stat.isFile()) {
      throw new InputValidationError(`Not a regular file: ${filePath}`);
    }
    if (stat.size > this.config.maxFileSizeMb * 1024 * 1024) {
      throw new InputValidationError(`File exceeds maximum size of ${this.config.maxFileSizeMb} MB: ${filePath}`);
    }
    const document = await fse.readFile(filePath);
    validateDocument(document, filePath, this.config.maxFileSizeMb);
    return document;
  }

  private async execute(
    filename: string,
    options: ExtractOptions,
    load: () => Promise<Buffer>
  ): Promise<ExtractionResult> {
    const startedAt = Date.now();
    const existing = options.jobId ? this.registry.get(options.jobId) : undefined;
    const job = existing ?? this.registry.create(filename, options.jobId);
    const { jobId } = job;
    const log = logger.child({ jobId });

    try {
      this.registry.start(jobId);
      log.info(`---> Starting extraction for ${filename} <---`);

      this.registry.advance(jobId, 'validating');
      const document = await load();

      this.registry.advance(jobId, 'extracting');
      const response = await this.service.process(document, PDF_MIME_TYPE);

      const result = await this.runStages(jobId, filename, document, response, options, startedAt, job.createdAt);
      this.registry.complete(jobId, result);
      log.info(`Extraction completed in ${result.processingTimeMs} ms`);
      return result;
    } catch (error) {
      const message = errorMessage(error);
      log.error({ err: error }, `Extraction failed for ${filename}`);
      const result: ExtractionResult = {
        jobId,
        filename,
        status: 'failed',
        errorMessage: message,
        processingTimeMs: Date.now() - startedAt,
        createdAt: job.createdAt,
        updatedAt: new Date().toISOString()
      };
      const current = this.registry.get(jobId);
      if (current && !isTerminal(current.status)) {
        this.registry.fail(jobId, message, result);
      }
      return result;
    }
  }

  private async runStages(
    jobId: string,
    filename: string,
    document: Buffer,
    response: ServiceResponse,
    options: ExtractOptions,
    startedAt: number,
    createdAt: string
  ): Promise<ExtractionResult> {
    const info = await this.inspect(jobId, document);
    const pageCount = Math.max(response.pages.length, info?.pageCount ?? 0);
    const workspace = this.config.persistOutputs
      ? new JobWorkspace(options.outputDir ?? this.config.outputDir, jobId)
      : undefined;

    this.registry.advance(jobId, 'classifying');
    const { records, unclassified } = this.classifier.classifyAll(response.entities);
    const allRecords: ClassifiedRecord[] = dropRepeatedRecords(
      this.config.scanRawText ? [...records, ...this.patterns.scan(response.fullText)] : records
    );

    this.registry.advance(jobId, 'resolving_images');
    const resolverJob = this.resolver.createJob(jobId, document, pageCount, this.referenceSizes(response, info), workspace);
    await this.seedServiceRasters(response, resolverJob);
    const crops = await this.resolver.resolve(response.entities, resolverJob);
    const { native, regionCrops } = await this.serviceImages(response, resolverJob);

    this.registry.advance(jobId, 'reconciling');
    const outcome = await this.reconciler.selectFirstQualifying([
      {
        name: 'service-and-crops',
        acquire: async () => this.reconciler.reconcile([...crops, ...regionCrops], native)
      },
      {
        name: 'embedded-images',
        acquire: () => this.embeddedImages.extract(document)
      },
      {
        name: 'page-rasters',
        acquire: () => this.resolver.pageImages(resolverJob)
      }
    ]);
    const images = await this.resolver.persist(outcome.images, resolverJob);

    this.registry.advance(jobId, 'aggregating');
    const designCriteria = aggregate({
      records: allRecords,
      images,
      tables: response.tables,
      rawText: response.fullText,
      metadata: {
        filename,
        fileSize: document.length,
        pageCount,
        documentType: PDF_MIME_TYPE,
        creationDate: info?.creationDate,
        processingDate: new Date().toISOString(),
        processorVersion: response.processorVersion ?? this.config.processorVersion
      },
      documentConfidence: response.documentConfidence,
      entities: response.entities,
      unclassified
    });

    const result: ExtractionResult = {
      jobId,
      filename,
      status: 'completed',
      designCriteria,
      processingTimeMs: Date.now() - startedAt,
      createdAt,
      updatedAt: new Date().toISOString()
    };
    if (workspace) {
      result.outputs = await persistCriteria(result, designCriteria, workspace);
    }
    return result;
  }

  private async inspect(jobId: string, document: Buffer): Promise<DocumentInfo | undefined> {
    if (!this.inspector) {
      return undefined;
    }
    try {
      return await this.inspector.inspect(document);
    } catch (error) {
      logger.warn({ err: error, jobId }, 'Could not read page geometry from the PDF');
      return undefined;
    }
  }

  // Service page dimensions describe the space its vertices live in; PDF sizes fill the gaps
  private referenceSizes(response: ServiceResponse, info?: DocumentInfo): Map<number, Size> {
    const sizes = new Map<number, Size>(info?.pageSizes ?? []);
    for (const page of response.pages) {
      if (page.width && page.height) {
        sizes.set(page.pageNumber, { width: page.width, height: page.height });
      }
    }
    return sizes;
  }

  private async seedServiceRasters(response: ServiceResponse, job: ResolverJob): Promise<void> {
    for (const page of response.pages) {
      if (page.image && page.image.length > this.reconciler.minNativeImageBytes) {
        await job.rasters.seed(page.pageNumber, page.image);
      }
    }
  }

  /**
   * Splits service images into native candidates (carrying pixels) and
   * regions that have to be cropped from a page raster.
   */
  private async serviceImages(
    response: ServiceResponse,
    job: ResolverJob
  ): Promise<{ native: ResolvedImage[]; regionCrops: ResolvedImage[] }> {
    const native: ResolvedImage[] = [];
    const requests: RegionRequest[] = [];

    for (const image of response.images) {
      const identity = image.kind === 'page' ? `page:${image.pageNumber}` : `region:${image.id}`;
      if (image.content && image.content.length > 0) {
        native.push({
          id: image.id,
          identity,
          pageNumber: image.pageNumber,
          boundingBox: image.boundingBox,
          source: 'service-native',
          confidence: image.confidence,
          data: image.content,
          byteSize: image.content.length,
          mimeType: image.mimeType
        });
      } else if (image.boundingBox) {
        requests.push({
          id: image.id,
          identity,
          pageNumber: image.pageNumber,
          boundingBox: image.boundingBox,
          confidence: image.confidence
        });
      }
    }

    const regionCrops = await this.resolver.cropRegions(requests, job);
    return {
      native: this.reconciler.pairWithEntities(native, response.entities),
      regionCrops: this.reconciler.pairWithEntities(regionCrops, response.entities)
    };
  }
}
