#!/usr/bin/env tsx

/**
 * Runner for the ingestion worker
 * Loads environment variables, then polls feeds until SIGINT/SIGTERM.
 * Pass --once to run a single cycle and exit.
 */

import { loadEnvironmentConfig } from '../../src/config/environment';
import { findProjectRoot, loadEnvFiles, runIngestion } from '../../src/ingestion/runner';
import { createSupabaseStore } from '../../src/storage/supabase-store';
import { logger } from '../../src/utils/logger';

async function main() {
  // Resolves to the repository root from scripts/ and from dist/scripts/ alike
  loadEnvFiles(findProjectRoot(__dirname));

  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  const exitCode = await runIngestion({
    argv: process.argv.slice(2),
    config,
    store: createSupabaseStore(config)
  });
  process.exit(exitCode);
}

main().catch(error => {
  console.error('\n💥 INGESTION WORKER FAILED');
  console.error('Error:', error);
  process.exit(1);
});
