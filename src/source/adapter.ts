import type { Source, SourceKind } from './registry.js';

/**
 * One unit of content produced by a fetch. Timestamps are ISO 8601 strings.
 */
export interface FetchedItem {
  id: string;
  source_id: string;
  title: string;
  content: string;
  url: string;
  published_at: string;
  fetched_at: string;
  author?: string;
  metadata: Record<string, unknown>;
}

/**
 * Result of a single fetch attempt. Fetchers report failures here instead of
 * rejecting.
 */
export interface FetchOutcome {
  success: boolean;
  items: FetchedItem[];
  error_message?: string;
  error_type?: string;
}

export function failedOutcome(message: string, type: string): FetchOutcome {
  return { success: false, items: [], error_message: message, error_type: type };
}

/**
 * Source fetcher interface. Implement one per source kind.
 */
export interface SourceFetcher {
  readonly kind: SourceKind;
  fetch(source: Source): Promise<FetchOutcome>;
}

export class FetcherRegistry {
  private readonly fetchers = new Map<SourceKind, SourceFetcher>();

  constructor(fetchers: readonly SourceFetcher[] = []) {
    for (const fetcher of fetchers) this.register(fetcher);
  }

  register(fetcher: SourceFetcher): this {
    this.fetchers.set(fetcher.kind, fetcher);
    return this;
  }

  get(kind: SourceKind): SourceFetcher | undefined {
    return this.fetchers.get(kind);
  }
}
