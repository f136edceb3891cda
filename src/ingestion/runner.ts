/**
 * Process-level wiring for the ingestion worker: `.env` discovery, the
 * `--once` mode and signal handling. The script in scripts/ingestion is a thin
 * entry point over this module.
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import type { EnvironmentConfig } from '../config/environment';
import type { IngestionStore } from '../storage/types';
import { logger } from '../utils/logger';
import { runIngestionCycle, type CycleReport } from './ingestion-pipeline';
import { startIngestionWorker } from './scheduler';

/**
 * Nearest directory at or above `startDir` holding a package.json. Works for
 * both the TypeScript sources and the compiled copy under dist/.
 */
export function findProjectRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  while (!fs.existsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(startDir);
    dir = parent;
  }
  return dir;
}

/**
 * Load .env.local first, then .env. Values already set win.
 */
export function loadEnvFiles(projectRoot: string): void {
  dotenv.config({ path: path.join(projectRoot, '.env.local') });
  dotenv.config({ path: path.join(projectRoot, '.env') });
}

export function printReport(report: CycleReport) {
  console.log('═'.repeat(80));
  console.log('📊 Cycle results:');
  console.log(`   • Feeds listed: ${report.feedsListed}`);
  console.log(`   • Articles seen: ${report.articlesSeen}`);
  console.log(`   • New articles: ${report.inserted}`);
  console.log(`   • Already stored: ${report.existing}`);
  console.log(`   • Failed writes: ${report.failed}`);
  for (const outcome of report.outcomes.filter(o => o.status !== 'ingested')) {
    console.log(`   • ${outcome.status}: ${outcome.feedUrl}${outcome.error ? ` (${outcome.error})` : ''}`);
  }
  if (report.listError) {
    console.log(`   • Feed listing failed: ${report.listError}`);
  }
  console.log(`   • Duration: ${report.finishedAt.getTime() - report.startedAt.getTime()}ms`);
}

export interface RunnerOptions {
  argv: string[];
  config: EnvironmentConfig;
  store: IngestionStore;
}

/**
 * Run one cycle (`--once`) or the polling loop until SIGINT/SIGTERM.
 * @returns the process exit code
 */
export async function runIngestion({ argv, config, store }: RunnerOptions): Promise<number> {
  const deps = { store, options: config.ingestion };

  if (argv.includes('--once')) {
    const report = await runIngestionCycle(deps);
    printReport(report);
    return report.listError ? 1 : 0;
  }

  const worker = startIngestionWorker({
    ...deps,
    intervalSeconds: config.ingestion.intervalSeconds,
    onCycle: printReport
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, stopping after the current cycle`);
    worker.stop().catch(error => logger.error('Failed to stop ingestion worker', error));
  };
  const onSigint = () => shutdown('SIGINT');
  const onSigterm = () => shutdown('SIGTERM');
  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  try {
    await worker.finished;
  } finally {
    process.removeListener('SIGINT', onSigint);
    process.removeListener('SIGTERM', onSigterm);
  }
  return 0;
}
