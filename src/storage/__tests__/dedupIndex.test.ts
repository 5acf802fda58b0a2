import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DedupIndex } from '../dedupIndex.js';
import { ContentStore } from '../contentStore.js';

describe('DedupIndex', () => {
  let dir: string;
  let indexPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'daybrief-dedup-'));
    indexPath = path.join(dir, 'state', 'dedup_index.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when no file exists', () => {
    const index = new DedupIndex(indexPath);
    expect(index.size).toBe(0);
    expect(index.exists('anything')).toBe(false);
  });

  it('persists every insert', () => {
    const index = new DedupIndex(indexPath);
    index.add('guid-1');
    index.add('guid-2');

    const reloaded = new DedupIndex(indexPath);
    expect(reloaded.exists('guid-1')).toBe(true);
    expect(reloaded.exists('guid-2')).toBe(true);
    expect(reloaded.size).toBe(2);
  });

  it('ignores repeated inserts', () => {
    const index = new DedupIndex(indexPath);
    index.add('guid-1');
    index.add('guid-1');
    expect(index.size).toBe(1);
  });

  it('starts empty when the file is corrupt', () => {
    fs.mkdirSync(path.dirname(indexPath), { recursive: true });
    fs.writeFileSync(indexPath, '{not json');

    expect(new DedupIndex(indexPath).size).toBe(0);
  });

  it('starts empty when the file has the wrong shape', () => {
    fs.mkdirSync(path.dirname(indexPath), { recursive: true });
    fs.writeFileSync(indexPath, JSON.stringify(['guid-1']));

    expect(new DedupIndex(indexPath).size).toBe(0);
  });

  it('rebuilds from the identifiers of stored content', () => {
    const store = new ContentStore(path.join(dir, 'content'), path.join(dir, 'briefs'));
    for (const n of [1, 2, 3]) {
      store.storeContent({
        id: `guid-${n}`,
        source_id: 'tech-news',
        source_name: 'Tech News',
        category: 'tech',
        title: `Story ${n}`,
        content: 'body',
        url: `https://example.com/${n}`,
        published_at: '2024-03-05T10:00:00.000Z',
        fetched_at: '2024-03-05T11:00:00.000Z',
        metadata: {},
      });
    }

    const index = new DedupIndex(indexPath);
    index.add('stale-id');

    expect(index.rebuildFromStore(store)).toBe(3);
    expect(index.exists('stale-id')).toBe(false);
    expect(new DedupIndex(indexPath).exists('guid-2')).toBe(true);
  });
});
