/**
 * Adoption Radar: Run Pipeline Script
 *
 * Collects metrics for every tracked technology, persists the run
 * snapshot and writes per-list and comparative reports.
 *
 * Usage:
 *   npm run pipeline                          # Both lists + comparison
 *   npm run pipeline -- --list fintech        # Single list
 *   npm run pipeline -- --dry-run             # Don't persist the snapshot
 *   npm run pipeline -- --store supabase      # Use the run_snapshots table
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { RunAbortError, errorMessage } from '../src/lib/errors';
import { loadCatalog, loadSettings } from '../src/lib/config';
import { USAGE, parseArgs } from '../src/cli';
import { createSnapshotStore } from '../src/db/snapshots';
import { writeReports } from '../src/delivery';
import { runPipeline } from '../src/pipeline';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const settings = loadSettings();
  if (options.store) {
    settings.snapshotStore = options.store;
  }

  const lists = await loadCatalog(options.configPath);
  const store = createSnapshotStore(settings);

  console.log('\n' + '='.repeat(60));
  console.log('ADOPTION RADAR');
  console.log('='.repeat(60));
  console.log(`Lists: ${options.list ?? lists.map(l => l.id).join(', ')}`);
  console.log(`Store: ${settings.snapshotStore}${options.dryRun ? ' (dry run)' : ''}`);
  console.log('='.repeat(60) + '\n');

  const startTime = Date.now();

  // Ctrl+C turns pending fetches into failed metrics; the run still finishes
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted: aborting pending fetches');
    controller.abort();
  });

  const result = await runPipeline(
    { settings, lists, onlyList: options.list },
    { store, signal: controller.signal },
    { dryRun: options.dryRun, skipReports: options.skipReports }
  );

  const written = options.skipReports ? [] : await writeReports(result.reports, settings.reportsDir);

  const duration = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log('\n' + '='.repeat(60));
  console.log('PIPELINE COMPLETE');
  console.log('='.repeat(60));
  console.log(`Run ID: ${result.runId}`);
  console.log(`Duration: ${duration}s`);
  console.log(`Metrics collected: ${result.metrics.filter(m => m.fetchSucceeded).length}/${result.metrics.length}`);
  console.log(`Snapshots in window: ${result.historySize}`);
  for (const file of written) {
    console.log(`Report: ${file.path}`);
  }
  console.log('='.repeat(60) + '\n');
}

main().catch((error: unknown) => {
  if (error instanceof RunAbortError) {
    logger.error('Pipeline aborted', { error: error.message });
    console.error(`\n${error.message}\n\n${USAGE}`);
  } else {
    logger.error('Pipeline failed', { error: errorMessage(error) });
  }
  process.exit(1);
});
