import type { Source } from '../source/registry.js';
import type { SourceState, SourceStateTracker } from './sourceState.js';

export type SourceHealth = 'ok' | 'failing' | 'new';

export interface SourceStatus {
  id: string;
  name: string;
  enabled: boolean;
  health: SourceHealth;
  state: SourceState | null;
}

export interface StatusReport {
  sources: SourceStatus[];
  healthy: number;
  needsAttention: number;
  neverFetched: number;
  /** Ids whose last attempt failed or that have failures outstanding, including ones no longer configured. */
  attention: string[];
}

export function sourceHealth(state: SourceState | undefined): SourceHealth {
  if (!state) return 'new';
  return state.last_fetch_success && state.consecutive_failures === 0 ? 'ok' : 'failing';
}

/**
 * Join the configured sources with their recorded fetch state.
 */
export function buildStatusReport(sources: Source[], tracker: SourceStateTracker): StatusReport {
  const states = tracker.getAllStates();
  const rows = sources.map((source): SourceStatus => {
    const state = states[source.id];
    return {
      id: source.id,
      name: source.name,
      enabled: source.enabled,
      health: sourceHealth(state),
      state: state ?? null,
    };
  });

  return {
    sources: rows,
    healthy: rows.filter((r) => r.health === 'ok').length,
    needsAttention: rows.filter((r) => r.health === 'failing').length,
    neverFetched: rows.filter((r) => r.health === 'new').length,
    attention: tracker.getSourcesNeedingAttention().map((s) => s.source_id),
  };
}
