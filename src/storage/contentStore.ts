import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { FetchedItem } from '../source/adapter.js';
import { renderDocument, splitDocument } from './frontMatter.js';
import { StorageError, errorMessage } from '../shared/errors.js';
import { toEpoch, writeFileAtomic } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const ContentHeaderSchema = z.object({
  id: z.string().min(1),
  source_id: z.string(),
  source_name: z.string(),
  title: z.string(),
  url: z.string(),
  published_at: z.string(),
  fetched_at: z.string(),
  category: z.string(),
  author: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

const BriefHeaderSchema = z.object({
  generated_at: z.string(),
  content_window: z.object({ from: z.string(), to: z.string() }),
  sources_analyzed: z.number(),
  model: z.string(),
  source_map: z.record(z.string()).default({}),
});

export type BriefHeader = z.infer<typeof BriefHeaderSchema>;

export interface StoreContentInput extends FetchedItem {
  source_name: string;
  category: string;
}

export interface StoredContent extends StoreContentInput {
  /** Absolute path of the file. */
  file_path: string;
  /** Path relative to the content directory, always with `/` separators. */
  relative_path: string;
}

export interface StoreBriefInput extends BriefHeader {
  content: string;
}

export interface StoredBrief extends BriefHeader {
  date: string;
  content: string;
  file_path: string;
}

const BRIEF_SUFFIX = '-brief.md';
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const SLUG_MAX_LENGTH = 50;

/**
 * Lower-case, drop punctuation, turn whitespace and underscores into single
 * hyphens and cap the length.
 */
export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[\s_]+/g, '-')
    .replace(/-+/g, '-')
    .slice(0, SLUG_MAX_LENGTH)
    .replace(/^-+|-+$/g, '');
  return slug || 'untitled';
}

function datePart(iso: string, fallback: string): string {
  const ms = toEpoch(iso) ?? toEpoch(fallback) ?? Date.now();
  return new Date(ms).toISOString().slice(0, 10);
}

function byPublishedDesc(a: StoredContent, b: StoredContent): number {
  return (toEpoch(b.published_at) ?? 0) - (toEpoch(a.published_at) ?? 0);
}

/**
 * Flat-file store: one Markdown file per item under `<contentDir>/<source_id>/`,
 * each starting with a YAML header that fully describes the record.
 *
 * Two items from the same source with the same publish date and title slug map
 * to the same file; the later write replaces the earlier one.
 */
export class ContentStore {
  /** Files skipped during scans because their header could not be parsed. */
  parseFailures = 0;

  constructor(
    private readonly contentDir: string,
    private readonly briefsDir: string,
  ) {
    fs.mkdirSync(contentDir, { recursive: true });
    fs.mkdirSync(briefsDir, { recursive: true });
  }

  get root(): string {
    return this.contentDir;
  }

  storeContent(input: StoreContentInput): StoredContent {
    const fileName = `${datePart(input.published_at, input.fetched_at)}-${slugify(input.title)}.md`;
    const relativePath = `${input.source_id}/${fileName}`;
    const filePath = path.join(this.contentDir, input.source_id, fileName);

    const header: Record<string, unknown> = {
      id: input.id,
      source_id: input.source_id,
      source_name: input.source_name,
      title: input.title,
      url: input.url,
      published_at: input.published_at,
      fetched_at: input.fetched_at,
      category: input.category,
    };
    if (input.author) header['author'] = input.author;
    if (Object.keys(input.metadata).length > 0) header['metadata'] = input.metadata;

    try {
      writeFileAtomic(filePath, renderDocument(header, input.content));
    } catch (err) {
      throw new StorageError(`Failed to write content file: ${errorMessage(err)}`, { path: filePath });
    }

    return { ...input, file_path: filePath, relative_path: relativePath };
  }

  /**
   * Every parsable record fetched at or after `since`, newest publication first.
   */
  getContentSince(since: Date | string): StoredContent[] {
    const bound = typeof since === 'string' ? (toEpoch(since) ?? 0) : since.getTime();
    return this.scan()
      .filter((c) => (toEpoch(c.fetched_at) ?? -Infinity) >= bound)
      .sort(byPublishedDesc);
  }

  getContentBySource(sourceId: string): StoredContent[] {
    return this.scanSourceDir(sourceId).sort(byPublishedDesc);
  }

  getContentByPath(relativePath: string): StoredContent | null {
    const filePath = path.resolve(this.contentDir, relativePath);
    const rel = path.relative(this.contentDir, filePath);
    if (rel.startsWith('..') || path.isAbsolute(rel) || !rel.endsWith('.md')) return null;
    if (!fs.existsSync(filePath)) return null;
    return this.parseContentFile(filePath);
  }

  /**
   * Identifiers of every parsable content file.
   */
  listIdentifiers(): string[] {
    return this.scan().map((c) => c.id);
  }

  private scan(): StoredContent[] {
    if (!fs.existsSync(this.contentDir)) return [];
    const results: StoredContent[] = [];
    for (const entry of fs.readdirSync(this.contentDir, { withFileTypes: true })) {
      if (entry.isDirectory()) {
        results.push(...this.scanSourceDir(entry.name));
      }
    }
    return results;
  }

  private scanSourceDir(sourceId: string): StoredContent[] {
    const dir = path.join(this.contentDir, sourceId);
    if (!fs.existsSync(dir)) return [];
    const results: StoredContent[] = [];
    for (const file of fs.readdirSync(dir)) {
      if (!file.endsWith('.md')) continue;
      const parsed = this.parseContentFile(path.join(dir, file));
      if (parsed) results.push(parsed);
    }
    return results;
  }

  /**
   * Parse one content file. Malformed files are skipped rather than failing the
   * scan; each one is counted in `parseFailures`.
   */
  private parseContentFile(filePath: string): StoredContent | null {
    try {
      const doc = splitDocument(fs.readFileSync(filePath, 'utf-8'));
      const header = doc ? ContentHeaderSchema.safeParse(doc.header) : null;
      if (!doc || !header?.success) {
        this.parseFailures++;
        logger.debug({ path: filePath }, 'Skipping content file without a valid header');
        return null;
      }

      const { author, metadata, ...fields } = header.data;
      return {
        ...fields,
        ...(author !== undefined ? { author } : {}),
        metadata: metadata ?? {},
        content: doc.body,
        file_path: filePath,
        relative_path: path.relative(this.contentDir, filePath).split(path.sep).join('/'),
      };
    } catch (err) {
      this.parseFailures++;
      logger.debug({ path: filePath, error: errorMessage(err) }, 'Skipping unreadable content file');
      return null;
    }
  }

  // ================================================================
  // Briefs
  // ================================================================

  storeBrief(input: StoreBriefInput): StoredBrief {
    const { content, ...header } = input;
    const date = datePart(header.generated_at, header.generated_at);
    const filePath = path.join(this.briefsDir, `${date}${BRIEF_SUFFIX}`);

    try {
      writeFileAtomic(filePath, renderDocument(header, content));
    } catch (err) {
      throw new StorageError(`Failed to write brief: ${errorMessage(err)}`, { path: filePath });
    }

    return { ...header, date, content, file_path: filePath };
  }

  listBriefs(): Array<{ date: string; file_path: string }> {
    if (!fs.existsSync(this.briefsDir)) return [];
    return fs
      .readdirSync(this.briefsDir)
      .filter((f) => f.endsWith(BRIEF_SUFFIX))
      .map((f) => ({ date: f.slice(0, -BRIEF_SUFFIX.length), file_path: path.join(this.briefsDir, f) }))
      .filter((b) => DATE_PATTERN.test(b.date))
      .sort((a, b) => b.date.localeCompare(a.date));
  }

  getLatestBrief(): StoredBrief | null {
    const latest = this.listBriefs()[0];
    return latest ? this.parseBrief(latest.date, latest.file_path) : null;
  }

  getBriefByDate(date: string): StoredBrief | null {
    if (!DATE_PATTERN.test(date)) return null;
    const filePath = path.join(this.briefsDir, `${date}${BRIEF_SUFFIX}`);
    if (!fs.existsSync(filePath)) return null;
    return this.parseBrief(date, filePath);
  }

  private parseBrief(date: string, filePath: string): StoredBrief | null {
    try {
      const doc = splitDocument(fs.readFileSync(filePath, 'utf-8'));
      const header = doc ? BriefHeaderSchema.safeParse(doc.header) : null;
      if (!doc || !header?.success) return null;
      return { ...header.data, date, content: doc.body, file_path: filePath };
    } catch (err) {
      logger.debug({ path: filePath, error: errorMessage(err) }, 'Skipping unreadable brief');
      return null;
    }
  }
}
