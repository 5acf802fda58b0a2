import { loadConfig, resolveDataPaths, type Config, type DataPaths } from '../shared/config.js';
import { SourceRegistry } from '../source/registry.js';
import { FetcherRegistry } from '../source/adapter.js';
import { RssFetcher } from '../source/rss.js';
import { ContentStore } from '../storage/contentStore.js';
import { DedupIndex } from '../storage/dedupIndex.js';
import { SourceStateTracker } from '../state/sourceState.js';
import { Coordinator } from '../collect/coordinator.js';
import { BriefGenerator } from '../brief/generator.js';
import { LlmClient } from '../llm/client.js';
import { StaticCredentialProvider } from '../llm/credentials.js';

export interface Runtime {
  config: Config;
  paths: DataPaths;
  registry: SourceRegistry;
  store: ContentStore;
  dedup: DedupIndex;
  state: SourceStateTracker;
  coordinator: Coordinator;
  /** Resolves the API key on first call; throws `ConfigError` if there is none. */
  briefGenerator(windowHours?: number): BriefGenerator;
}

/**
 * Wire every component from one explicit config. This is the only place
 * paths and credentials are resolved.
 */
export function buildRuntime(config: Config): Runtime {
  const paths = resolveDataPaths(config);
  const registry = SourceRegistry.fromFile(paths.sourcesFile);
  const store = new ContentStore(paths.contentDir, paths.briefsDir);
  const dedup = new DedupIndex(paths.dedupIndexFile);
  const state = new SourceStateTracker(paths.stateFile, { maxHistory: config.state.max_history });

  const fetchers = new FetcherRegistry([
    new RssFetcher({
      timeoutMs: config.collection.fetch_timeout_ms,
      userAgent: config.collection.user_agent,
      enrichMinChars: config.collection.enrich_min_chars,
    }),
  ]);

  const coordinator = new Coordinator(
    { registry, fetchers, store, dedup, state },
    { maxAgeDays: config.collection.max_age_days, concurrency: config.collection.concurrency },
  );

  let llm: LlmClient | null = null;
  const briefGenerator = (windowHours?: number): BriefGenerator => {
    llm ??= new LlmClient(
      config.llm,
      StaticCredentialProvider.resolve({
        configValue: config.llm.api_key,
        keyFile: config.llm.api_key_file,
      }),
    );
    return new BriefGenerator(store, llm, {
      systemPrompt: config.analysis.system_prompt,
      windowHours: windowHours ?? config.analysis.window_hours,
      excerptChars: config.analysis.excerpt_chars,
    });
  };

  return { config, paths, registry, store, dedup, state, coordinator, briefGenerator };
}

export async function loadRuntime(): Promise<Runtime> {
  return buildRuntime(await loadConfig());
}
