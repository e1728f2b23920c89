#!/usr/bin/env node
import * as path from 'path';
import { initializeIngestion } from '../bootstrap/serviceBootstrap';
import { getConfig } from '../utils/config';
import { logger } from '../utils/logger';
import type { IngestionReport } from '../shared/types/ingestion.types';

const USAGE = `Usage: togaf-ingest [documentsDir] [--reset] [--stats]

  documentsDir  Folder holding core_topics/ and extended_topics/ (default: TOGAF_DOCUMENTS_DIR)
  --reset       Delete every collection before ingesting
  --stats       Print collection sizes and exit`;

export interface IngestArgs {
  documentsDir?: string;
  reset: boolean;
  statsOnly: boolean;
  help: boolean;
}

export function parseArgs(argv: readonly string[]): IngestArgs {
  const args: IngestArgs = { reset: false, statsOnly: false, help: false };
  for (const arg of argv) {
    if (arg === '--reset') args.reset = true;
    else if (arg === '--stats') args.statsOnly = true;
    else if (arg === '--help' || arg === '-h') args.help = true;
    else if (arg.startsWith('--')) throw new Error(`Unknown option ${arg}`);
    else args.documentsDir = arg;
  }
  return args;
}

export function summarizeReport(report: IngestionReport): string[] {
  const lines = report.documents.map(document => {
    const name = path.basename(document.filePath);
    if (document.status === 'failed') return `  FAILED   ${name}: ${document.error ?? 'unknown error'}`;
    if (document.status === 'skipped') return `  SKIPPED  ${name} (no content)`;
    return `  OK       ${name}: ${document.pages} pages, ${document.chunks} chunks`;
  });
  const stats = report.chunkStatistics;
  lines.push(
    `Chunks: ${report.totalChunks} (avg ${Math.round(stats.avgChunkSize)} chars, min ${stats.minChunkSize}, max ${stats.maxChunkSize})`,
    `Duration: ${(report.durationMs / 1000).toFixed(1)}s`
  );
  return lines;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    logger.info(USAGE);
    return;
  }

  const config = getConfig();
  const { pipeline, vectorStore, embeddings } = await initializeIngestion(config);

  if (!(await vectorStore.isReady())) {
    throw new Error(`Chroma is not reachable at ${config.chromaUrl}`);
  }

  if (args.statsOnly) {
    const stats = await vectorStore.getCollectionStats();
    for (const collection of Object.values(stats)) {
      logger.info(`${collection.name}: ${collection.documentCount} documents${collection.error ? ` (${collection.error})` : ''}`);
    }
    return;
  }

  if (args.reset) {
    logger.warn('[Ingest] Resetting all collections...');
    await vectorStore.resetAll();
  }

  const documentsDir = path.resolve(args.documentsDir ?? config.documentsDir);
  const report = await pipeline.ingestDirectory(documentsDir);
  for (const line of summarizeReport(report)) {
    logger.info(line);
  }

  const cache = embeddings.getCacheStats();
  logger.info(`Embedding cache: ${cache.cachedEmbeddings} vectors, ${cache.hits} hits, ${cache.misses} misses`);

  if (report.documents.some(document => document.status === 'failed')) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch(error => {
    logger.error('[Ingest] Ingestion failed:', error);
    process.exit(1);
  });
}
