#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG_FILE, loadConfig, resolveDataPaths, writeDefaultConfig } from '../shared/config.js';
import { DaybriefError, errorMessage } from '../shared/errors.js';
import { resolveWindowHours } from '../shared/utils.js';
import { planBrief } from '../brief/generator.js';
import { buildStatusReport, sourceHealth } from '../state/report.js';
import { startServer } from '../api/server.js';
import { Scheduler } from '../schedule/scheduler.js';
import type { CollectionStats } from '../collect/coordinator.js';
import { loadRuntime, type Runtime } from './runtime.js';

const SAMPLE_SOURCES = `sources:
  - id: example-feed
    name: Example Feed
    type: rss
    url: https://example.com/feed.xml
    category: general
    enabled: false
`;

const program = new Command();

program
  .name('daybrief')
  .description('Collect feeds into flat files and summarize them into a daily brief')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create a default config and an example sources file in the working directory')
  .action(async () => {
    const configPath = path.resolve(DEFAULT_CONFIG_FILE);
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${DEFAULT_CONFIG_FILE} created`);
    } else {
      log(`✓ ${DEFAULT_CONFIG_FILE} already exists`);
    }

    const paths = resolveDataPaths(await loadConfig());
    if (!fs.existsSync(paths.sourcesFile)) {
      fs.mkdirSync(path.dirname(paths.sourcesFile), { recursive: true });
      fs.writeFileSync(paths.sourcesFile, SAMPLE_SOURCES, 'utf-8');
      log(`✓ ${paths.sourcesFile} created`);
    } else {
      log(`✓ ${paths.sourcesFile} already exists`);
    }
    fs.mkdirSync(paths.contentDir, { recursive: true });
    fs.mkdirSync(paths.briefsDir, { recursive: true });
    log(`✓ data directory ready at ${paths.dataDir}`);
  });

// === collect ===
program
  .command('collect')
  .description('Collect content from enabled sources')
  .option('-s, --source <id>', 'Collect from one source only')
  .option('-f, --force', 'Store items even if they were seen before', false)
  .action(async (opts: { source?: string; force: boolean }) => {
    const rt = await loadRuntime();

    let stats: CollectionStats | null;
    if (opts.source) {
      log(`Collecting from source: ${opts.source}`);
      stats = await rt.coordinator.collectById(opts.source, opts.force);
      if (!stats) {
        log(`Source '${opts.source}' not found`);
        process.exitCode = 1;
        return;
      }
    } else {
      log('Collecting from all enabled sources...');
      stats = await rt.coordinator.collectAll(opts.force);
    }

    log('\nCollection complete:');
    log(`  Sources processed:  ${stats.sourcesProcessed}`);
    log(`  Items fetched:      ${stats.itemsFetched}`);
    log(`  Items stored:       ${stats.itemsStored}`);
    log(`  Duplicates skipped: ${stats.itemsSkippedDuplicate}`);
    if (stats.errors > 0) {
      log(`  Errors:             ${stats.errors} (see: daybrief status)`);
    }
  });

// === status ===
program
  .command('status')
  .description('Show per-source fetch health')
  .option('-s, --source <id>', 'Show detail and history for one source')
  .action(async (opts: { source?: string }) => {
    const rt = await loadRuntime();

    if (opts.source) {
      const src = rt.registry.getSourceById(opts.source);
      if (!src) {
        log(`Source '${opts.source}' not found`);
        process.exitCode = 1;
        return;
      }
      const state = rt.state.getState(src.id);
      log(`\nSource: ${src.name} (${src.id})`);
      log(`  Type:    ${src.type}`);
      log(`  URL:     ${src.url}`);
      log(`  Enabled: ${src.enabled}`);

      if (!state) {
        log('\n  No fetch history yet');
        return;
      }
      log(`\n  Last attempt:         ${state.last_fetch_attempt ?? 'never'}`);
      log(`  Last success:         ${state.last_successful_fetch ?? 'never'}`);
      log(`  Status:               ${sourceHealth(state) === 'ok' ? 'OK' : 'FAILING'}`);
      if (state.last_error) {
        log(`  Last error:           ${state.last_error} (${state.last_error_type ?? 'unknown'})`);
      }
      log(`  Items (last run):     ${state.items_fetched_last_run}`);
      log(`  Items (total):        ${state.total_items_fetched}`);
      log(`  Consecutive failures: ${state.consecutive_failures}`);

      if (state.fetch_history.length > 0) {
        log('\n  Recent history:');
        for (const entry of state.fetch_history.slice(0, 5)) {
          const mark = entry.success ? 'OK  ' : 'FAIL';
          log(`    ${entry.timestamp}  ${mark} ${entry.items_fetched} items, ${entry.duration_ms}ms`);
        }
      }
      return;
    }

    const report = buildStatusReport(rt.registry.getAllSources(), rt.state);
    log(`\n${'Source'.padEnd(24)} ${'Last success'.padEnd(12)} ${'Status'.padEnd(9)} Items`);
    log('-'.repeat(60));
    for (const row of report.sources) {
      const lastSuccess = row.state?.last_successful_fetch?.slice(0, 10) ?? 'never';
      const mark = row.health === 'ok' ? '+ OK' : row.health === 'new' ? '? NEW' : '! FAILING';
      const items = String(row.state?.items_fetched_last_run ?? 0);
      log(`${row.id.padEnd(24)} ${lastSuccess.padEnd(12)} ${mark.padEnd(9)} ${items}`);
      if (row.state?.last_error) {
        log(`  Error: ${row.state.last_error.slice(0, 70)}`);
      }
    }
    log('-'.repeat(60));
    log(
      `${report.sources.length} sources, ${report.healthy} healthy, ` +
        `${report.needsAttention} need attention, ${report.neverFetched} never fetched`,
    );
    if (report.attention.length > 0) {
      log(`Needs attention: ${report.attention.join(', ')}`);
    }
  });

// === sources ===
program
  .command('sources')
  .description('List configured sources')
  .action(async () => {
    const rt = await loadRuntime();
    const sources = rt.registry.getAllSources();
    if (sources.length === 0) {
      log(`No sources configured. Edit ${rt.paths.sourcesFile}`);
      return;
    }
    for (const s of sources) {
      const status = s.enabled ? '●' : '○';
      log(`${status} ${s.id.padEnd(24)} ${s.name.padEnd(28)} ${s.category.padEnd(12)} ${s.url}`);
    }
    log(`\n${sources.length} sources total`);
  });

// === analyze ===
program
  .command('analyze')
  .description('Generate a brief from recently collected content')
  .option('-s, --since <window>', 'Content window in hours, e.g. 24h or 48 (default: analysis.window_hours)')
  .option('--dry-run', 'Show what would be analyzed without calling the model', false)
  .action(async (opts: { since?: string; dryRun: boolean }) => {
    const rt = await loadRuntime();
    const hours = resolveWindowHours(opts.since, rt.config.analysis.window_hours);
    if (hours === null) {
      log(`Invalid --since value: ${opts.since ?? ''}`);
      process.exitCode = 1;
      return;
    }

    if (opts.dryRun) {
      const plan = planBrief(rt.store, {
        windowHours: hours,
        excerptChars: rt.config.analysis.excerpt_chars,
        now: new Date(),
      });
      log(`Dry run: ${plan.items.length} items from the last ${hours} hours`);
      log(`Sources: ${plan.sourceIds.join(', ') || '(none)'}`);
      return;
    }

    log(`Generating brief from content in the last ${hours} hours...`);
    const result = await rt.briefGenerator(hours).generate();
    if (result.status === 'generated') {
      log(`\n✓ Brief generated: ${result.brief.file_path}`);
    } else {
      log('\nNo content found to analyze');
    }
  });

// === rebuild-index ===
program
  .command('rebuild-index')
  .description('Rebuild the duplicate index from stored content files')
  .action(async () => {
    const rt = await loadRuntime();
    const count = rt.dedup.rebuildFromStore(rt.store);
    log(`✓ Duplicate index rebuilt: ${count} identifiers`);
    if (rt.store.parseFailures > 0) {
      log(`  ${rt.store.parseFailures} content files could not be parsed and were skipped`);
    }
  });

// === serve ===
program
  .command('serve')
  .description('Start the read-only JSON API and the collection scheduler')
  .option('-p, --port <port>', 'Port to listen on')
  .option('-H, --host <host>', 'Host to bind to')
  .option('--no-schedule', 'Do not run scheduled collection')
  .action(async (opts: { port?: string; host?: string; schedule: boolean }) => {
    const rt = await loadRuntime();
    startServer(rt, {
      port: opts.port ? parseInt(opts.port, 10) : undefined,
      host: opts.host,
    });
    if (opts.schedule) {
      startScheduler(rt);
    }
  });

// === watch ===
program
  .command('watch')
  .description('Run collection (and briefs, if analyze_cron is set) on the configured schedule')
  .action(async () => {
    const rt = await loadRuntime();
    if (!startScheduler(rt)) {
      process.exitCode = 1;
    }
  });

function startScheduler(rt: Runtime): boolean {
  const scheduler = new Scheduler(rt.config.schedule, {
    coordinator: rt.coordinator,
    briefGenerator: () => rt.briefGenerator(),
  });
  if (!scheduler.start()) return false;

  const shutdown = (): void => {
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  return true;
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof DaybriefError) {
    log(`Error: ${err.message}`);
  } else {
    log(`Unexpected error: ${errorMessage(err)}`);
  }
  process.exitCode = 1;
});
