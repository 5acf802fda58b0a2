import fs from 'node:fs';
import { z } from 'zod';
import type { ContentStore } from './contentStore.js';
import { StorageError, errorMessage } from '../shared/errors.js';
import { writeFileAtomic } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const IndexFileSchema = z.object({
  ids: z.array(z.string()),
});

/**
 * Persisted set of content identifiers that have already been stored.
 * The whole file is rewritten on every insert.
 */
export class DedupIndex {
  private ids = new Set<string>();

  constructor(private readonly indexPath: string) {
    this.load();
  }

  get size(): number {
    return this.ids.size;
  }

  exists(contentId: string): boolean {
    return this.ids.has(contentId);
  }

  add(contentId: string): void {
    this.ids.add(contentId);
    this.save();
  }

  /**
   * Replace the index with the identifiers found in the store's content files.
   */
  rebuildFromStore(store: ContentStore): number {
    this.ids = new Set(store.listIdentifiers());
    this.save();
    logger.info({ count: this.ids.size }, 'Duplicate index rebuilt from content store');
    return this.ids.size;
  }

  private load(): void {
    if (!fs.existsSync(this.indexPath)) return;
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.indexPath, 'utf-8'));
      const parsed = IndexFileSchema.safeParse(raw);
      if (parsed.success) {
        this.ids = new Set(parsed.data.ids);
        return;
      }
      logger.warn({ path: this.indexPath }, 'Duplicate index has an unexpected shape, starting empty');
    } catch (err) {
      logger.warn({ path: this.indexPath, error: errorMessage(err) }, 'Duplicate index unreadable, starting empty');
    }
  }

  private save(): void {
    try {
      writeFileAtomic(this.indexPath, JSON.stringify({ ids: [...this.ids] }));
    } catch (err) {
      throw new StorageError(`Failed to write duplicate index: ${errorMessage(err)}`, {
        path: this.indexPath,
      });
    }
  }
}
