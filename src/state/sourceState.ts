import fs from 'node:fs';
import { z } from 'zod';
import { StorageError, errorMessage } from '../shared/errors.js';
import { writeFileAtomic } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const FetchHistoryEntrySchema = z.object({
  timestamp: z.string(),
  success: z.boolean(),
  items_fetched: z.number().int().min(0).default(0),
  error: z.string().nullable().default(null),
  duration_ms: z.number().min(0).default(0),
});

const SourceStateSchema = z.object({
  source_id: z.string(),
  last_fetch_attempt: z.string().nullable().default(null),
  last_successful_fetch: z.string().nullable().default(null),
  last_fetch_success: z.boolean().default(false),
  last_error: z.string().nullable().default(null),
  last_error_type: z.string().nullable().default(null),
  items_fetched_last_run: z.number().int().min(0).default(0),
  total_items_fetched: z.number().int().min(0).default(0),
  consecutive_failures: z.number().int().min(0).default(0),
  fetch_history: z.array(FetchHistoryEntrySchema).default([]),
});

const StateFileSchema = z.record(SourceStateSchema);

export type FetchHistoryEntry = z.infer<typeof FetchHistoryEntrySchema>;
export type SourceState = z.infer<typeof SourceStateSchema>;

export interface FetchFailure {
  message: string;
  type: string;
}

export const DEFAULT_MAX_HISTORY = 10;

export interface SourceStateOptions {
  maxHistory?: number;
  now?: () => Date;
}

function emptyState(sourceId: string): SourceState {
  return SourceStateSchema.parse({ source_id: sourceId });
}

/**
 * Per-source fetch health. Every record call rewrites the state file before
 * returning.
 */
export class SourceStateTracker {
  private readonly states = new Map<string, SourceState>();
  private readonly maxHistory: number;
  private readonly now: () => Date;

  constructor(
    private readonly stateFile: string,
    options: SourceStateOptions = {},
  ) {
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.now = options.now ?? (() => new Date());
    this.load();
  }

  getState(sourceId: string): SourceState | undefined {
    const state = this.states.get(sourceId);
    return state ? structuredClone(state) : undefined;
  }

  getAllStates(): Record<string, SourceState> {
    return Object.fromEntries(
      [...this.states].map(([id, state]) => [id, structuredClone(state)]),
    );
  }

  getSourcesNeedingAttention(): SourceState[] {
    return [...this.states.values()]
      .filter((s) => s.consecutive_failures > 0 || !s.last_fetch_success)
      .map((s) => structuredClone(s));
  }

  recordSuccess(sourceId: string, itemsFetched: number, durationMs: number): SourceState {
    const now = this.now().toISOString();
    const prior = this.states.get(sourceId) ?? emptyState(sourceId);
    const count = Math.max(0, Math.trunc(itemsFetched));

    const state: SourceState = {
      ...prior,
      last_fetch_attempt: now,
      last_successful_fetch: now,
      last_fetch_success: true,
      last_error: null,
      last_error_type: null,
      items_fetched_last_run: count,
      total_items_fetched: prior.total_items_fetched + count,
      consecutive_failures: 0,
      fetch_history: this.pushHistory(prior.fetch_history, {
        timestamp: now,
        success: true,
        items_fetched: count,
        error: null,
        duration_ms: Math.round(durationMs),
      }),
    };

    return this.commit(state);
  }

  recordFailure(sourceId: string, failure: FetchFailure, durationMs: number): SourceState {
    const now = this.now().toISOString();
    const prior = this.states.get(sourceId) ?? emptyState(sourceId);

    const state: SourceState = {
      ...prior,
      last_fetch_attempt: now,
      last_fetch_success: false,
      last_error: failure.message,
      last_error_type: failure.type,
      items_fetched_last_run: 0,
      consecutive_failures: prior.consecutive_failures + 1,
      fetch_history: this.pushHistory(prior.fetch_history, {
        timestamp: now,
        success: false,
        items_fetched: 0,
        error: failure.message,
        duration_ms: Math.round(durationMs),
      }),
    };

    return this.commit(state);
  }

  private pushHistory(history: FetchHistoryEntry[], entry: FetchHistoryEntry): FetchHistoryEntry[] {
    return [entry, ...history].slice(0, this.maxHistory);
  }

  private commit(state: SourceState): SourceState {
    this.states.set(state.source_id, state);
    this.save();
    return structuredClone(state);
  }

  /**
   * A missing or unreadable state file yields an empty map; first run and
   * recovery take the same path.
   */
  private load(): void {
    if (!fs.existsSync(this.stateFile)) return;
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.stateFile, 'utf-8'));
      const parsed = StateFileSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn({ path: this.stateFile }, 'Source state file has an unexpected shape, starting empty');
        return;
      }
      for (const [id, state] of Object.entries(parsed.data)) {
        this.states.set(id, { ...state, fetch_history: state.fetch_history.slice(0, this.maxHistory) });
      }
    } catch (err) {
      logger.warn({ path: this.stateFile, error: errorMessage(err) }, 'Source state file unreadable, starting empty');
    }
  }

  private save(): void {
    try {
      writeFileAtomic(this.stateFile, JSON.stringify(Object.fromEntries(this.states), null, 2));
    } catch (err) {
      throw new StorageError(`Failed to write source state: ${errorMessage(err)}`, {
        path: this.stateFile,
      });
    }
  }
}
