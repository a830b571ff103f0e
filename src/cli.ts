#!/usr/bin/env node
import { Command } from 'commander';
import * as fse from 'fs-extra';
import { BatchProcessor, collectPdfFiles, summarizeBatch, writeBatchSummary } from './batchProcessor';
import settings from './config/settings';
import { createExtractor } from './extractorFactory';
import { ExtractionResult } from './models/types';
import logger from './utils/logger';

interface CliOptions {
  input: string;
  output: string;
  projectId: string;
  processorId: string;
  location: string;
  workers: string;
  verbose?: boolean;
}

function printResult(result: ExtractionResult): void {
  if (result.status === 'failed') {
    console.error(`FAILED ${result.filename}: ${result.errorMessage}`);
    return;
  }
  const criteria = result.designCriteria;
  console.log(`Completed ${result.filename} (job ${result.jobId}) in ${result.processingTimeMs} ms`);
  if (criteria) {
    console.log(`  Loads: ${criteria.loads.length}`);
    console.log(`  Seismic forces: ${criteria.seismicForces.length}`);
    console.log(`  Design vehicles: ${criteria.designVehicles.length}`);
    console.log(`  Design cranes: ${criteria.designCranes.length}`);
    console.log(`  Images: ${criteria.images.length}`);
    console.log(`  Confidence: ${(criteria.confidenceScore * 100).toFixed(1)}%`);
  }
  if (result.outputs?.resultsJson) {
    console.log(`  Results: ${result.outputs.resultsJson}`);
  }
}

async function main() {
  const program = new Command();
  program
    .name('design-criteria')
    .description('Extract engineering design criteria from PDF drawings')
    .requiredOption('-i, --input <path>', 'PDF file or directory of PDF files')
    .option('-o, --output <dir>', 'Output directory', settings.outputDir)
    .option('--project-id <id>', 'Google Cloud project id', settings.projectId)
    .option('--processor-id <id>', 'Document AI processor id', settings.processorId)
    .option('--location <location>', 'Document AI location', settings.location)
    .option('-w, --workers <count>', 'Concurrent documents in batch mode', String(settings.batchMaxWorkers))
    .option('-v, --verbose', 'Debug logging')
    .parse(process.argv);

  const options = program.opts<CliOptions>();
  if (options.verbose) {
    logger.level = 'debug';
  }

  if (!(await fse.pathExists(options.input))) {
    console.error(`Input not found: ${options.input}`);
    process.exitCode = 1;
    return;
  }

  const extractor = createExtractor({
    documentAi: { projectId: options.projectId, processorId: options.processorId, location: options.location },
    config: { outputDir: options.output }
  });

  const stat = await fse.stat(options.input);
  if (!stat.isDirectory()) {
    const result = await extractor.extractFromFile(options.input);
    printResult(result);
    process.exitCode = result.status === 'completed' ? 0 : 1;
    return;
  }

  const files = await collectPdfFiles(options.input);
  if (files.length === 0) {
    console.error(`No PDF files found in ${options.input}`);
    process.exitCode = 1;
    return;
  }

  const workers = parseInt(options.workers, 10);
  const batch = new BatchProcessor(extractor, { maxWorkers: Number.isNaN(workers) ? settings.batchMaxWorkers : workers });
  console.log(`Processing ${files.length} PDF files from ${options.input}`);
  const results = await batch.processFiles(files);
  results.forEach(printResult);

  const written = await writeBatchSummary(results, options.output);
  const summary = summarizeBatch(results);
  console.log(`\n${summary.successful}/${summary.totalFiles} documents completed`);
  written.forEach(file => console.log(`Summary written to ${file}`));
  process.exitCode = summary.failed > 0 ? 1 : 0;
}

main().catch(error => {
  console.error('Unhandled error in main execution:', error);
  process.exit(1);
});
