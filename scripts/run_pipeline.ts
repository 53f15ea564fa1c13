#!/usr/bin/env tsx
/**
 * Run the ranking pipeline over data/raw/*.json and publish the tables to
 * data/processed (ranked_models.json, ranked_models.csv, ranked_models_v2.csv,
 * model_candidates.json).
 *
 * Usage:
 *   npx tsx scripts/run_pipeline.ts --top 10
 *   npx tsx scripts/run_pipeline.ts --v1 --raw-dir ./threads --out-dir ./out
 */

import path from 'path';
import { formatTable, parseCliArgs, USAGE } from '../lib/cli';
import { processedDir, rawDir } from '../lib/env';
import { publishRun, readRawDir } from '../lib/files';
import { rankTable, toOutputRow } from '../lib/rank';
import { DocumentStore, PipelineRunner } from '../lib/store';

async function main() {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const inputDir = path.resolve(options.rawDir ?? rawDir);
  const outputDir = path.resolve(options.outDir ?? processedDir);

  console.log('='.repeat(60));
  console.log('🔊 ThreadTally pipeline');
  console.log('='.repeat(60));
  console.log(`Input:  ${inputDir}`);
  console.log(`Output: ${outputDir}\n`);

  const store = new DocumentStore();
  const { batches, failed } = readRawDir(inputDir);
  for (const batch of batches) {
    store.add(batch);
  }

  if (store.threadCount === 0) {
    console.log(`⚠️  No threads found in ${inputDir}${failed.length > 0 ? ` (${failed.length} unreadable files)` : ''}`);
  }

  const runner = new PipelineRunner(store, {
    publish: run => {
      publishRun(outputDir, run);
    }
  });
  const run = runner.run();

  const rows = rankTable(run.result.stats, { n: options.top, variant: options.variant, sortBy: options.sortBy })
    .map(toOutputRow);

  console.log(`\nTop ${rows.length} (${options.sortBy ?? (options.variant === 'v1' ? 'mentions' : 'score_v2')}):\n`);
  console.log(formatTable(rows));

  if (run.result.candidates.length > 0) {
    console.log(`\n${run.result.candidates.length} unmatched model-like tokens written for alias review`);
  }
  console.log(`\n✅ ${run.runId} (fingerprint ${run.result.fingerprint})`);
}

main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
