import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Scheduler, runScheduledBrief, runScheduledCollect } from '../scheduler.js';
import { Coordinator } from '../../collect/coordinator.js';
import { SourceRegistry } from '../../source/registry.js';
import { FetcherRegistry, type FetchOutcome } from '../../source/adapter.js';
import { ContentStore } from '../../storage/contentStore.js';
import { DedupIndex } from '../../storage/dedupIndex.js';
import { SourceStateTracker } from '../../state/sourceState.js';
import { BriefGenerator } from '../../brief/generator.js';
import { LlmError } from '../../shared/errors.js';

describe('scheduler', () => {
  let dir: string;
  let store: ContentStore;
  let coordinator: Coordinator;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'daybrief-schedule-'));
    store = new ContentStore(path.join(dir, 'content'), path.join(dir, 'briefs'));
    coordinator = new Coordinator({
      registry: new SourceRegistry([]),
      fetchers: new FetcherRegistry(),
      store,
      dedup: new DedupIndex(path.join(dir, 'dedup.json')),
      state: new SourceStateTracker(path.join(dir, 'sources.json')),
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('runScheduledCollect', () => {
    it('runs a collection', async () => {
      const spy = vi.spyOn(coordinator, 'collectAll');
      await runScheduledCollect(coordinator);
      expect(spy).toHaveBeenCalledOnce();
    });

    it('skips the tick while a run is in progress', async () => {
      let release: () => void = () => undefined;
      const busy = new Coordinator({
        registry: new SourceRegistry([
          {
            id: 'slow',
            name: 'Slow',
            type: 'rss',
            url: 'https://example.com/slow.xml',
            category: 'general',
            enabled: true,
          },
        ]),
        fetchers: new FetcherRegistry([
          {
            kind: 'rss',
            fetch: () =>
              new Promise<FetchOutcome>((resolve) => {
                release = () => resolve({ success: true, items: [] });
              }),
          },
        ]),
        store,
        dedup: new DedupIndex(path.join(dir, 'dedup.json')),
        state: new SourceStateTracker(path.join(dir, 'sources.json')),
      });
      const running = busy.collectAll();
      const spy = vi.spyOn(busy, 'collectAll');

      await runScheduledCollect(busy);

      expect(spy).not.toHaveBeenCalled();
      release();
      await running;
    });

    it('does not reject when the run fails', async () => {
      vi.spyOn(coordinator, 'collectAll').mockRejectedValue(new Error('disk full'));
      await expect(runScheduledCollect(coordinator)).resolves.toBeUndefined();
    });
  });

  describe('runScheduledBrief', () => {
    it('does not reject when the model fails', async () => {
      const generator = new BriefGenerator(
        store,
        { model: 'test-model', complete: async () => Promise.reject(new LlmError('LLM request failed: down')) },
        { systemPrompt: 'sys', windowHours: 24, excerptChars: 100 },
      );
      store.storeContent({
        id: 'a',
        source_id: 'tech-news',
        source_name: 'Tech News',
        category: 'tech',
        title: 'A',
        content: 'body',
        url: 'https://example.com/a',
        published_at: new Date().toISOString(),
        fetched_at: new Date().toISOString(),
        metadata: {},
      });

      await expect(runScheduledBrief(() => generator)).resolves.toBeUndefined();
      expect(store.listBriefs()).toEqual([]);
    });

    it('does not reject when the generator cannot be built', async () => {
      const build = (): BriefGenerator => {
        throw new Error('LLM API key not found');
      };
      await expect(runScheduledBrief(build)).resolves.toBeUndefined();
    });
  });

  describe('Scheduler', () => {
    it('refuses an invalid collect expression', () => {
      const scheduler = new Scheduler({ collect_cron: 'every day', analyze_cron: '' }, { coordinator });
      expect(scheduler.start()).toBe(false);
    });

    it('refuses an invalid analyze expression', () => {
      const scheduler = new Scheduler({ collect_cron: '0 * * * *', analyze_cron: 'nope' }, { coordinator });
      expect(scheduler.start()).toBe(false);
    });

    it('starts and stops with valid expressions', () => {
      const build = (): BriefGenerator =>
        new BriefGenerator(
          store,
          { model: 'test-model', complete: async () => ({ content: 'x', model: 'test-model', token_count: 0 }) },
          { systemPrompt: 'sys', windowHours: 24, excerptChars: 100 },
        );
      const scheduler = new Scheduler(
        { collect_cron: '0 */4 * * *', analyze_cron: '0 7 * * *' },
        { coordinator, briefGenerator: build },
      );
      expect(scheduler.start()).toBe(true);
      scheduler.stop();
    });
  });
});
