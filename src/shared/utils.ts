import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

/**
 * Parse a timestamp string into epoch milliseconds, or null if it is not a date.
 */
export function toEpoch(value: string | undefined | null): number | null {
  if (!value) return null;
  const ms = Date.parse(value.trim());
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Parse a window length such as `24h`, `48` or `1.5h` into hours.
 */
export function parseHours(value: string): number | null {
  const match = /^(\d+(?:\.\d+)?)h?$/i.exec(value.trim());
  if (!match?.[1]) return null;
  const hours = Number(match[1]);
  return hours > 0 ? hours : null;
}

/**
 * The brief window for `analyze`: the `--since` value when given, else the configured hours.
 */
export function resolveWindowHours(since: string | undefined, configuredHours: number): number | null {
  return since === undefined ? configuredHours : parseHours(since);
}

/**
 * Write a file by writing a sibling temp file and renaming it over the target,
 * so readers never observe a partially written file.
 */
export function writeFileAtomic(filePath: string, data: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, data, 'utf-8');
  fs.renameSync(tmpPath, filePath);
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Items are started in order. After a call fails no further items are started;
 * calls already in flight are allowed to finish before the first error is rethrown.
 */
export async function withConcurrency<T>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  const queue = [...items];
  const workerCount = Math.min(Math.max(1, concurrency), queue.length);
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && queue.length > 0) {
      const item = queue.shift();
      if (item === undefined) continue;
      try {
        await fn(item);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  const results = await Promise.allSettled(workers);
  const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (rejected) {
    throw rejected.reason;
  }
}
