export class DaybriefError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DaybriefError';
  }
}

export class ConfigError extends DaybriefError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export type FetchErrorKind = 'timeout' | 'http' | 'network' | 'parse';

export class FetchError extends DaybriefError {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class StorageError extends DaybriefError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

export class CollectionBusyError extends DaybriefError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'COLLECTION_BUSY', details);
    this.name = 'CollectionBusyError';
  }
}

export class LlmError extends DaybriefError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class BriefError extends DaybriefError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BRIEF_ERROR', details);
    this.name = 'BriefError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
