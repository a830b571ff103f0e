import * as path from 'path';
import * as fse from 'fs-extra';
import {
  BATCH_SUMMARY_JSON,
  BATCH_SUMMARY_TEXT,
  BatchProcessor,
  BatchSummary,
  collectPdfFiles,
  formatBatchSummary,
  summarizeBatch,
  writeBatchSummary
} from '../batchProcessor';
import { CriteriaExtractor } from '../criteriaExtractor';
import { FakeRasterizer, FakeService, makePdf, makeResponse, makeTempDir } from './helpers';

describe('BatchProcessor', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await fse.remove(tempDir);
  });

  async function writePdfs(names: string[]): Promise<string[]> {
    const document = await makePdf(1);
    return Promise.all(names.map(async name => {
      const filePath = path.join(tempDir, name);
      await fse.writeFile(filePath, document);
      return filePath;
    }));
  }

  it('returns one result per file in input order, isolating failures', async () => {
    const [first, second] = await writePdfs(['a.pdf', 'b.pdf']);
    const missing = path.join(tempDir, 'missing.pdf');
    const extractor = new CriteriaExtractor(
      { service: new FakeService(async () => makeResponse()), rasterizer: new FakeRasterizer(1) },
      { persistOutputs: false }
    );

    const results = await new BatchProcessor(extractor, { maxWorkers: 2 }).processFiles([first, missing, second]);

    expect(results.map(r => [r.filename, r.status])).toEqual([
      ['a.pdf', 'completed'],
      ['missing.pdf', 'failed'],
      ['b.pdf', 'completed']
    ]);
    expect(results[1].errorMessage).toBe(`File not found: ${missing}`);
    expect(new Set(results.map(r => r.jobId)).size).toBe(3);
  });

  it('never runs more documents at once than it has workers', async () => {
    const files = await writePdfs(['1.pdf', '2.pdf', '3.pdf', '4.pdf', '5.pdf']);
    let active = 0;
    let peak = 0;
    const service = new FakeService(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 20));
      active--;
      return makeResponse();
    });
    const extractor = new CriteriaExtractor({ service, rasterizer: new FakeRasterizer(1) }, { persistOutputs: false });

    const results = await new BatchProcessor(extractor, { maxWorkers: 2 }).processFiles(files);

    expect(results).toHaveLength(5);
    expect(service.calls).toBe(5);
    expect(peak).toBe(2);
  });

  it('uses the job ids it was given', async () => {
    const [file] = await writePdfs(['a.pdf']);
    const extractor = new CriteriaExtractor(
      { service: new FakeService(async () => makeResponse()), rasterizer: new FakeRasterizer(1) },
      { persistOutputs: false }
    );
    extractor.registry.create('a.pdf', 'job-a');

    const [result] = await new BatchProcessor(extractor).processItems([{ filePath: file, jobId: 'job-a' }]);

    expect(result.jobId).toBe('job-a');
    expect(extractor.registry.require('job-a').status).toBe('completed');
  });

  it('writes summary files', async () => {
    const [file] = await writePdfs(['a.pdf']);
    const extractor = new CriteriaExtractor(
      { service: new FakeService(async () => makeResponse({ documentConfidence: 0.8 })), rasterizer: new FakeRasterizer(1) },
      { persistOutputs: false }
    );
    const results = await new BatchProcessor(extractor).processFiles([file]);

    const written = await writeBatchSummary(results, path.join(tempDir, 'summary'));

    expect(written).toEqual([
      path.join(tempDir, 'summary', BATCH_SUMMARY_JSON),
      path.join(tempDir, 'summary', BATCH_SUMMARY_TEXT)
    ]);
    const saved = await fse.readJson(written[0]);
    expect(saved).toMatchObject({ totalFiles: 1, successful: 1, failed: 0, confidence: { min: 0.8, average: 0.8, max: 0.8 } });
  });
});

describe('summarizeBatch', () => {
  it('counts outcomes and leaves confidence out when nothing completed', () => {
    const summary = summarizeBatch([
      {
        jobId: 'job-1',
        filename: 'a.pdf',
        status: 'failed',
        errorMessage: 'File is empty: a.pdf',
        processingTimeMs: 40,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.040Z'
      }
    ]);

    expect(summary).toMatchObject({
      totalFiles: 1,
      successful: 0,
      failed: 1,
      successRate: 0,
      totalProcessingTimeMs: 40,
      averageProcessingTimeMs: 40
    });
    expect(summary.confidence).toBeUndefined();
  });
});

describe('formatBatchSummary', () => {
  it('prints totals and one line per job', () => {
    const summary: BatchSummary = {
      totalFiles: 2,
      successful: 1,
      failed: 1,
      successRate: 0.5,
      totalProcessingTimeMs: 3000,
      averageProcessingTimeMs: 1500,
      confidence: { min: 0.9, average: 0.9, max: 0.9 },
      jobs: [
        { jobId: 'job-1', filename: 'a.pdf', status: 'completed', confidenceScore: 0.9 },
        { jobId: 'job-2', filename: 'b.pdf', status: 'failed', errorMessage: 'File is empty: b.pdf' }
      ]
    };

    expect(formatBatchSummary(summary).split('\n')).toEqual([
      'BATCH PROCESSING SUMMARY',
      '='.repeat(40),
      'Total files: 2',
      'Successful: 1',
      'Failed: 1',
      'Success rate: 50.0%',
      'Total processing time: 3.00s',
      'Average processing time: 1.50s',
      'Confidence (min/avg/max): 0.900 / 0.900 / 0.900',
      '',
      'JOBS',
      '-'.repeat(40),
      '[OK] a.pdf (job-1)',
      '[FAILED] b.pdf (job-2): File is empty: b.pdf',
      ''
    ]);
  });
});

describe('collectPdfFiles', () => {
  it('lists PDFs in name order regardless of extension case', async () => {
    const dir = await makeTempDir();
    try {
      await Promise.all(['b.PDF', 'a.pdf', 'notes.txt'].map(name => fse.writeFile(path.join(dir, name), 'x')));
      expect(await collectPdfFiles(dir)).toEqual([path.join(dir, 'a.pdf'), path.join(dir, 'b.PDF')]);
    } finally {
      await fse.remove(dir);
    }
  });
});
