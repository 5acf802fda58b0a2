import Parser from 'rss-parser';
import type { Source } from './registry.js';
import type { FetchedItem, FetchOutcome, SourceFetcher } from './adapter.js';
import { failedOutcome } from './adapter.js';
import { extractArticleText, type ArticleExtractor } from './extract.js';
import { FetchError, errorMessage } from '../shared/errors.js';
import { toEpoch } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

interface FeedEntryFields {
  id?: string;
  author?: string;
  /** Raw `<category>` elements: strings or `{ _: text }` in RSS, `{ $: { term } }` in Atom. */
  categoryEntries?: unknown[];
  contentEncoded?: string;
  description?: string;
  published?: string;
  updated?: string;
}

type FeedEntry = FeedEntryFields & Parser.Item;

const parser = new Parser<Record<string, unknown>, FeedEntryFields>({
  customFields: {
    item: [
      ['content:encoded', 'contentEncoded'],
      ['category', 'categoryEntries', { keepArray: true }],
      ['description', 'description'],
      ['published', 'published'],
      ['updated', 'updated'],
    ],
  },
});

/** Bodies shorter than this are treated as teasers and enriched from the article page. */
export const TEASER_MAX_CHARS = 500;

export interface RssFetcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  enrichMinChars?: number;
  extractArticle?: ArticleExtractor;
  now?: () => Date;
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.trim().length > 0) return value;
  }
  return undefined;
}

function tagTerm(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (value === null || typeof value !== 'object') return undefined;
  if ('_' in value && typeof value._ === 'string') return value._.trim() || undefined;
  if ('$' in value) {
    const attrs: unknown = value.$;
    if (attrs !== null && typeof attrs === 'object' && 'term' in attrs && typeof attrs.term === 'string') {
      return attrs.term.trim() || undefined;
    }
  }
  return undefined;
}

export class RssFetcher implements SourceFetcher {
  readonly kind = 'rss';

  /** Entries skipped because they had no usable identifier or failed to normalize. */
  droppedEntries = 0;

  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly enrichMinChars: number;
  private readonly extractArticle: ArticleExtractor;
  private readonly now: () => Date;

  constructor(options: RssFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.userAgent = options.userAgent ?? 'daybrief/0.1';
    this.enrichMinChars = options.enrichMinChars ?? TEASER_MAX_CHARS;
    this.extractArticle = options.extractArticle ?? extractArticleText;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(source: Source): Promise<FetchOutcome> {
    try {
      const entries = await this.fetchFeed(source);
      const fetchedAt = this.now().toISOString();

      const items: FetchedItem[] = [];
      for (const entry of entries) {
        let item: FetchedItem | null = null;
        try {
          item = await this.toItem(entry, source, fetchedAt);
        } catch (err) {
          logger.debug({ source: source.id, error: errorMessage(err) }, 'Feed entry skipped');
        }
        if (item) {
          items.push(item);
        } else {
          this.droppedEntries++;
        }
      }

      logger.debug({ source: source.id, count: items.length }, 'Feed fetched');
      return { success: true, items };
    } catch (err) {
      if (err instanceof FetchError) {
        return failedOutcome(err.message, err.kind);
      }
      return failedOutcome(errorMessage(err), err instanceof Error ? err.name : 'unknown');
    }
  }

  private async fetchFeed(source: Source): Promise<FeedEntry[]> {
    const timeoutMs = source.timeout_ms ?? this.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let xml: string;
    try {
      const response = await fetch(source.url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new FetchError(`Feed fetch failed: ${response.status} from ${source.url}`, 'http', {
          url: source.url,
          status: response.status,
        });
      }

      xml = await response.text();
    } catch (err) {
      if (err instanceof FetchError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new FetchError(`Feed fetch timed out after ${timeoutMs}ms: ${source.url}`, 'timeout', {
          url: source.url,
          timeout: timeoutMs,
        });
      }
      throw new FetchError(`Feed fetch failed: ${errorMessage(err)}`, 'network', { url: source.url });
    } finally {
      clearTimeout(timer);
    }

    try {
      const feed = await parser.parseString(xml);
      return feed.items;
    } catch (err) {
      throw new FetchError(`Feed parse failed: ${errorMessage(err)}`, 'parse', { url: source.url });
    }
  }

  private async toItem(entry: FeedEntry, source: Source, fetchedAt: string): Promise<FetchedItem | null> {
    const title = entry.title?.trim();
    const url = entry.link?.trim() ?? '';
    const id = firstNonEmpty(entry.guid, entry.id, url, title)?.trim();
    if (!id) return null;

    // rss-parser puts an RSS description into `content`; only Atom has a real content element there.
    const explicitContent = entry.contentEncoded ?? (entry.description === undefined ? entry.content : undefined);
    let content = firstNonEmpty(explicitContent, entry.summary, entry.description) ?? '';

    if (url && (content.length < this.enrichMinChars || content.includes('<a href='))) {
      const article = await this.extractArticle(url, {
        timeoutMs: source.timeout_ms ?? this.timeoutMs,
        userAgent: this.userAgent,
      });
      if (article && article.length > content.length) {
        content = article;
      }
    }

    const publishedMs =
      toEpoch(entry.published) ?? toEpoch(entry.pubDate) ?? toEpoch(entry.updated) ?? toEpoch(fetchedAt);

    const categories: unknown[] = entry.categoryEntries ?? entry.categories ?? [];
    const tags = categories
      .map((c) => tagTerm(c))
      .filter((t): t is string => t !== undefined);

    const author = firstNonEmpty(entry.author, entry.creator)?.trim();

    return {
      id,
      source_id: source.id,
      title: title || 'Untitled',
      content,
      url,
      published_at: publishedMs === null ? fetchedAt : new Date(publishedMs).toISOString(),
      fetched_at: fetchedAt,
      ...(author ? { author } : {}),
      metadata: { tags },
    };
  }
}
