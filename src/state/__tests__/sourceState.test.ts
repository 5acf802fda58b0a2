import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SourceStateTracker } from '../sourceState.js';

function clock(start = Date.UTC(2024, 2, 5, 10)): () => Date {
  let minutes = 0;
  return () => new Date(start + minutes++ * 60_000);
}

describe('SourceStateTracker', () => {
  let dir: string;
  let stateFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'daybrief-state-'));
    stateFile = path.join(dir, 'state', 'sources.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('has no state for sources never fetched', () => {
    const tracker = new SourceStateTracker(stateFile);
    expect(tracker.getState('tech-news')).toBeUndefined();
    expect(tracker.getAllStates()).toEqual({});
  });

  it('records a success', () => {
    const tracker = new SourceStateTracker(stateFile, { now: clock() });
    const state = tracker.recordSuccess('tech-news', 5, 120.4);

    expect(state).toEqual({
      source_id: 'tech-news',
      last_fetch_attempt: '2024-03-05T10:00:00.000Z',
      last_successful_fetch: '2024-03-05T10:00:00.000Z',
      last_fetch_success: true,
      last_error: null,
      last_error_type: null,
      items_fetched_last_run: 5,
      total_items_fetched: 5,
      consecutive_failures: 0,
      fetch_history: [
        {
          timestamp: '2024-03-05T10:00:00.000Z',
          success: true,
          items_fetched: 5,
          error: null,
          duration_ms: 120,
        },
      ],
    });
  });

  it('counts consecutive failures and keeps the last success', () => {
    const tracker = new SourceStateTracker(stateFile, { now: clock() });
    tracker.recordSuccess('tech-news', 3, 10);
    tracker.recordFailure('tech-news', { message: 'Feed fetch failed: 503', type: 'http' }, 10);
    const state = tracker.recordFailure('tech-news', { message: 'timed out', type: 'timeout' }, 10);

    expect(state.consecutive_failures).toBe(2);
    expect(state.last_fetch_success).toBe(false);
    expect(state.last_error).toBe('timed out');
    expect(state.last_error_type).toBe('timeout');
    expect(state.items_fetched_last_run).toBe(0);
    expect(state.total_items_fetched).toBe(3);
    expect(state.last_successful_fetch).toBe('2024-03-05T10:00:00.000Z');
    expect(state.last_fetch_attempt).toBe('2024-03-05T10:02:00.000Z');
  });

  it('resets failures and errors on the next success', () => {
    const tracker = new SourceStateTracker(stateFile, { now: clock() });
    tracker.recordFailure('tech-news', { message: 'boom', type: 'network' }, 10);
    const state = tracker.recordSuccess('tech-news', 2, 10);

    expect(state.consecutive_failures).toBe(0);
    expect(state.last_error).toBeNull();
    expect(state.last_error_type).toBeNull();
    expect(state.total_items_fetched).toBe(2);
  });

  it('keeps history newest first and capped', () => {
    const tracker = new SourceStateTracker(stateFile, { maxHistory: 3, now: clock() });
    for (let i = 1; i <= 5; i++) {
      tracker.recordSuccess('tech-news', i, 1);
    }

    const history = tracker.getState('tech-news')?.fetch_history ?? [];
    expect(history.map((h) => h.items_fetched)).toEqual([5, 4, 3]);
  });

  it('writes through to disk on every record', () => {
    const tracker = new SourceStateTracker(stateFile, { now: clock() });
    tracker.recordFailure('tech-news', { message: 'boom', type: 'network' }, 42);

    const reloaded = new SourceStateTracker(stateFile);
    expect(reloaded.getState('tech-news')).toEqual(tracker.getState('tech-news'));
  });

  it('returns copies that do not affect stored state', () => {
    const tracker = new SourceStateTracker(stateFile, { now: clock() });
    tracker.recordSuccess('tech-news', 1, 1);

    const copy = tracker.getState('tech-news');
    copy?.fetch_history.push({ timestamp: 'x', success: false, items_fetched: 0, error: null, duration_ms: 0 });

    expect(tracker.getState('tech-news')?.fetch_history).toHaveLength(1);
  });

  it('lists sources that need attention', () => {
    const tracker = new SourceStateTracker(stateFile, { now: clock() });
    tracker.recordSuccess('healthy', 1, 1);
    tracker.recordFailure('broken', { message: 'boom', type: 'http' }, 1);

    expect(tracker.getSourcesNeedingAttention().map((s) => s.source_id)).toEqual(['broken']);
  });

  it('starts empty when the state file is corrupt', () => {
    fs.mkdirSync(path.dirname(stateFile), { recursive: true });
    fs.writeFileSync(stateFile, 'not json at all');

    const tracker = new SourceStateTracker(stateFile);
    expect(tracker.getAllStates()).toEqual({});

    tracker.recordSuccess('tech-news', 1, 1);
    expect(new SourceStateTracker(stateFile).getState('tech-news')?.total_items_fetched).toBe(1);
  });

  it('fills defaults for partial records', () => {
    fs.mkdirSync(path.dirname(stateFile), { recursive: true });
    fs.writeFileSync(stateFile, JSON.stringify({ 'tech-news': { source_id: 'tech-news', total_items_fetched: 7 } }));

    const state = new SourceStateTracker(stateFile).getState('tech-news');
    expect(state?.total_items_fetched).toBe(7);
    expect(state?.consecutive_failures).toBe(0);
    expect(state?.fetch_history).toEqual([]);
  });
});
