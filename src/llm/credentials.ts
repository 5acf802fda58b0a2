import fs from 'node:fs';
import { ConfigError } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';

export const API_KEY_ENV = 'DAYBRIEF_LLM_API_KEY';

export interface CredentialProvider {
  getApiKey(): string;
}

export interface CredentialSources {
  configValue?: string;
  env?: NodeJS.ProcessEnv;
  keyFile?: string;
}

/**
 * Resolve the API key once, in order: explicit config value, environment
 * variable, key file. Throws a `ConfigError` naming every place it looked.
 */
export function resolveApiKey(sources: CredentialSources): string {
  const fromConfig = sources.configValue?.trim();
  if (fromConfig) return fromConfig;

  const fromEnv = (sources.env ?? process.env)[API_KEY_ENV]?.trim();
  if (fromEnv) return fromEnv;

  if (sources.keyFile) {
    const keyPath = resolvePath(sources.keyFile);
    if (fs.existsSync(keyPath)) {
      const fromFile = fs.readFileSync(keyPath, 'utf-8').trim();
      if (fromFile) return fromFile;
    }
  }

  throw new ConfigError(
    `LLM API key not found. Set llm.api_key in the config, export ${API_KEY_ENV}` +
      (sources.keyFile ? `, or write the key to ${sources.keyFile}` : ''),
  );
}

export class StaticCredentialProvider implements CredentialProvider {
  constructor(private readonly apiKey: string) {}

  static resolve(sources: CredentialSources): StaticCredentialProvider {
    return new StaticCredentialProvider(resolveApiKey(sources));
  }

  getApiKey(): string {
    return this.apiKey;
  }
}
