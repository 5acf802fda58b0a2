import type { Source, SourceCatalog } from '../source/registry.js';
import type { FetcherRegistry, FetchOutcome } from '../source/adapter.js';
import type { ContentStore } from '../storage/contentStore.js';
import type { DedupIndex } from '../storage/dedupIndex.js';
import type { SourceStateTracker } from '../state/sourceState.js';
import { CollectionBusyError, errorMessage } from '../shared/errors.js';
import { toEpoch, withConcurrency } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface CollectionStats {
  sourcesProcessed: number;
  itemsFetched: number;
  itemsStored: number;
  itemsSkippedDuplicate: number;
  errors: number;
  durationMs: number;
}

export interface CoordinatorDeps {
  registry: SourceCatalog;
  fetchers: FetcherRegistry;
  store: ContentStore;
  dedup: DedupIndex;
  state: SourceStateTracker;
}

export interface CoordinatorOptions {
  maxAgeDays?: number;
  /** Sources fetched at once. 1 processes them strictly in registry order. */
  concurrency?: number;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function emptyStats(): CollectionStats {
  return {
    sourcesProcessed: 0,
    itemsFetched: 0,
    itemsStored: 0,
    itemsSkippedDuplicate: 0,
    errors: 0,
    durationMs: 0,
  };
}

function addStats(total: CollectionStats, part: CollectionStats): void {
  total.sourcesProcessed += part.sourcesProcessed;
  total.itemsFetched += part.itemsFetched;
  total.itemsStored += part.itemsStored;
  total.itemsSkippedDuplicate += part.itemsSkippedDuplicate;
  total.errors += part.errors;
}

export class Coordinator {
  private readonly maxAgeDays: number;
  private readonly concurrency: number;
  private readonly now: () => Date;
  private running = false;

  constructor(
    private readonly deps: CoordinatorDeps,
    options: CoordinatorOptions = {},
  ) {
    this.maxAgeDays = options.maxAgeDays ?? 7;
    this.concurrency = options.concurrency ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  collectAll(force = false): Promise<CollectionStats> {
    return this.exclusive(() => this.runAll(force));
  }

  collectSource(source: Source, force = false): Promise<CollectionStats> {
    return this.exclusive(async () => {
      const startTime = Date.now();
      const stats = await this.runSource(source, force, this.cutoff());
      stats.durationMs = Date.now() - startTime;
      return stats;
    });
  }

  async collectById(sourceId: string, force = false): Promise<CollectionStats | null> {
    const source = this.deps.registry.getSourceById(sourceId);
    if (!source) return null;
    return this.collectSource(source, force);
  }

  /**
   * Runs never overlap; a second run started while one is in flight is rejected.
   */
  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.running) {
      throw new CollectionBusyError('A collection run is already in progress');
    }
    this.running = true;
    try {
      return await fn();
    } finally {
      this.running = false;
    }
  }

  private async runAll(force: boolean): Promise<CollectionStats> {
    const startTime = Date.now();
    const cutoff = this.cutoff();
    const sources = this.deps.registry.getEnabledSources();
    const stats = emptyStats();

    if (sources.length === 0) {
      logger.info('No enabled sources to collect');
    }

    await withConcurrency(sources, this.concurrency, async (source) => {
      addStats(stats, await this.runSource(source, force, cutoff));
    });

    stats.durationMs = Date.now() - startTime;
    logger.info(
      {
        sourcesProcessed: stats.sourcesProcessed,
        itemsStored: stats.itemsStored,
        itemsSkippedDuplicate: stats.itemsSkippedDuplicate,
        errors: stats.errors,
        durationMs: stats.durationMs,
      },
      'Collection complete',
    );
    return stats;
  }

  private cutoff(): number {
    return this.now().getTime() - this.maxAgeDays * DAY_MS;
  }

  private async runSource(source: Source, force: boolean, cutoff: number): Promise<CollectionStats> {
    const stats = emptyStats();
    stats.sourcesProcessed = 1;

    const fetcher = this.deps.fetchers.get(source.type);
    if (!fetcher) {
      // Configuration defect: the source was never attempted, so its state is left alone.
      logger.error({ source: source.id, type: source.type }, 'No fetcher registered for source type');
      stats.errors = 1;
      return stats;
    }

    const startTime = performance.now();
    let outcome: FetchOutcome;
    try {
      outcome = await fetcher.fetch(source);
    } catch (err) {
      outcome = { success: false, items: [], error_message: errorMessage(err), error_type: 'unexpected' };
    }
    const durationMs = performance.now() - startTime;

    if (!outcome.success) {
      const message = outcome.error_message ?? 'Unknown error';
      this.deps.state.recordFailure(source.id, { message, type: outcome.error_type ?? 'unknown' }, durationMs);
      logger.warn({ source: source.id, error: message }, 'Source fetch failed');
      stats.errors = 1;
      return stats;
    }

    // Everything below is synchronous, so a source's writes never interleave with another's.
    let stored = 0;
    for (const item of outcome.items) {
      stats.itemsFetched++;

      const published = toEpoch(item.published_at) ?? toEpoch(item.fetched_at);
      if (published !== null && published < cutoff) continue;

      if (!force && this.deps.dedup.exists(item.id)) {
        stats.itemsSkippedDuplicate++;
        continue;
      }

      const owner = this.deps.registry.getSourceById(item.source_id);
      this.deps.store.storeContent({
        ...item,
        source_name: owner?.name ?? item.source_id,
        category: source.category,
      });
      this.deps.dedup.add(item.id);
      stored++;
    }

    stats.itemsStored = stored;
    this.deps.state.recordSuccess(source.id, stored, durationMs);
    logger.info(
      { source: source.id, fetched: stats.itemsFetched, stored, skipped: stats.itemsSkippedDuplicate },
      'Source collected',
    );
    return stats;
  }
}
