import * as path from 'path';
import * as fse from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import { CriteriaExtractor, ExtractOptions } from './criteriaExtractor';
import { BatchConfig, DEFAULT_BATCH_CONFIG } from './models/configTypes';
import { ExtractionResult } from './models/types';
import { errorMessage } from './utils/errors';
import logger from './utils/logger';

export const BATCH_SUMMARY_JSON = 'batch_summary.json';
export const BATCH_SUMMARY_TEXT = 'batch_summary.txt';

export interface BatchFileItem {
  filePath: string;
  jobId?: string;
}

// A document received in memory, such as an upload
export interface BatchUploadItem {
  document: Buffer;
  filename: string;
  jobId?: string;
}

export type BatchItem = BatchFileItem | BatchUploadItem;

function itemName(item: BatchItem): string {
  return 'document' in item ? item.filename : item.filePath;
}

export interface BatchSummary {
  totalFiles: number;
  successful: number;
  failed: number;
  successRate: number;
  totalProcessingTimeMs: number;
  averageProcessingTimeMs: number;
  confidence?: {
    min: number;
    average: number;
    max: number;
  };
  jobs: Array<{
    jobId: string;
    filename: string;
    status: ExtractionResult['status'];
    confidenceScore?: number;
    errorMessage?: string;
  }>;
}

/**
 * BatchProcessor
 * Runs many documents through a CriteriaExtractor with a fixed number of workers.
 */
export class BatchProcessor {
  private config: BatchConfig;

  constructor(private readonly extractor: CriteriaExtractor, config: Partial<BatchConfig> = {}) {
    this.config = { ...DEFAULT_BATCH_CONFIG, ...config };
  }

  /**
   * Processes every file and returns one result per input, in input order.
   * A failing document never affects the others.
   */
  async processFiles(filePaths: string[], options: Omit<ExtractOptions, 'jobId'> = {}): Promise<ExtractionResult[]> {
    return this.processItems(filePaths.map(filePath => ({ filePath })), options);
  }

  /**
   * Same as processFiles, for items whose job ids were issued up front.
   */
  async processItems(items: BatchItem[], options: Omit<ExtractOptions, 'jobId'> = {}): Promise<ExtractionResult[]> {
    const results: ExtractionResult[] = new Array(items.length);
    const workerCount = Math.max(1, Math.min(this.config.maxWorkers, items.length));
    let next = 0;

    logger.info(`Processing ${items.length} documents with ${workerCount} workers`);

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        results[index] = await this.runOne(items[index], options);
      }
    };
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const failed = results.filter(r => r.status === 'failed').length;
    logger.info(`Batch finished: ${results.length - failed} completed, ${failed} failed`);
    return results;
  }

  private async runOne(item: BatchItem, options: Omit<ExtractOptions, 'jobId'>): Promise<ExtractionResult> {
    const { jobId } = item;
    try {
      return 'document' in item
        ? await this.extractor.extractFromBuffer(item.document, item.filename, { ...options, jobId })
        : await this.extractor.extractFromFile(item.filePath, { ...options, jobId });
    } catch (error) {
      // The extractor reports failures in its result; this only catches programming errors
      const now = new Date().toISOString();
      logger.error({ err: error }, `Unexpected error processing ${itemName(item)}`);
      return {
        jobId: jobId ?? uuidv4(),
        filename: path.basename(itemName(item)),
        status: 'failed',
        errorMessage: errorMessage(error),
        processingTimeMs: 0,
        createdAt: now,
        updatedAt: now
      };
    }
  }
}

export function summarizeBatch(results: ExtractionResult[]): BatchSummary {
  const successful = results.filter(r => r.status === 'completed');
  const totalProcessingTimeMs = results.reduce((sum, r) => sum + r.processingTimeMs, 0);
  const confidences = successful.flatMap(r => (r.designCriteria ? [r.designCriteria.confidenceScore] : []));

  return {
    totalFiles: results.length,
    successful: successful.length,
    failed: results.length - successful.length,
    successRate: results.length > 0 ? successful.length / results.length : 0,
    totalProcessingTimeMs,
    averageProcessingTimeMs: results.length > 0 ? totalProcessingTimeMs / results.length : 0,
    confidence: confidences.length > 0
      ? {
          min: Math.min(...confidences),
          average: confidences.reduce((sum, c) => sum + c, 0) / confidences.length,
          max: Math.max(...confidences)
        }
      : undefined,
    jobs: results.map(r => ({
      jobId: r.jobId,
      filename: r.filename,
      status: r.status,
      confidenceScore: r.designCriteria?.confidenceScore,
      errorMessage: r.errorMessage
    }))
  };
}

export function formatBatchSummary(summary: BatchSummary): string {
  const lines = [
    'BATCH PROCESSING SUMMARY',
    '='.repeat(40),
    `Total files: ${summary.totalFiles}`,
    `Successful: ${summary.successful}`,
    `Failed: ${summary.failed}`,
    `Success rate: ${(summary.successRate * 100).toFixed(1)}%`,
    `Total processing time: ${(summary.totalProcessingTimeMs / 1000).toFixed(2)}s`,
    `Average processing time: ${(summary.averageProcessingTimeMs / 1000).toFixed(2)}s`
  ];
  if (summary.confidence) {
    const { min, average, max } = summary.confidence;
    lines.push(`Confidence (min/avg/max): ${min.toFixed(3)} / ${average.toFixed(3)} / ${max.toFixed(3)}`);
  }
  lines.push('', 'JOBS', '-'.repeat(40));
  for (const job of summary.jobs) {
    lines.push(job.status === 'completed'
      ? `[OK] ${job.filename} (${job.jobId})`
      : `[FAILED] ${job.filename} (${job.jobId}): ${job.errorMessage ?? 'unknown error'}`);
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Writes batch_summary.json and batch_summary.txt. Returns the paths written.
 */
export async function writeBatchSummary(results: ExtractionResult[], outputDir: string): Promise<string[]> {
  const summary = summarizeBatch(results);
  const written: string[] = [];
  const files: Array<[string, string]> = [
    [BATCH_SUMMARY_JSON, JSON.stringify(summary, null, 2)],
    [BATCH_SUMMARY_TEXT, formatBatchSummary(summary)]
  ];
  for (const [name, content] of files) {
    const target = path.join(outputDir, name);
    try {
      await fse.ensureDir(outputDir);
      await fse.writeFile(target, content);
      written.push(target);
    } catch (error) {
      logger.error({ err: error }, `Failed to write ${target}`);
    }
  }
  return written;
}

/**
 * PDF files directly inside a directory, sorted by name.
 */
export async function collectPdfFiles(dir: string): Promise<string[]> {
  const entries = await fse.readdir(dir);
  return entries
    .filter(name => name.toLowerCase().endsWith('.pdf'))
    .sort()
    .map(name => path.join(dir, name));
}
