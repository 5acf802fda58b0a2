import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  data_dir: z.string().default('./data'),
  sources_file: z.string().default('./config/sources.yaml'),

  collection: z
    .object({
      max_age_days: z.number().positive().default(7),
      concurrency: z.number().int().min(1).default(1),
      fetch_timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default('daybrief/0.1'),
      enrich_min_chars: z.number().int().min(0).default(500),
    })
    .default({}),

  state: z
    .object({
      max_history: z.number().int().min(1).default(10),
    })
    .default({}),

  analysis: z
    .object({
      window_hours: z.number().positive().default(24),
      excerpt_chars: z.number().int().positive().default(2000),
      system_prompt: z
        .string()
        .default(
          'You write a concise daily intelligence brief. Group related stories, ' +
            'cite every claim with its reference id in square brackets, e.g. [ref3].',
        ),
    })
    .default({}),

  llm: z
    .object({
      base_url: z.string().default(''),
      api_key: z.string().default(''),
      api_key_file: z.string().default('~/.daybrief/api_key'),
      model: z.string().default('gpt-4.1-mini'),
      max_tokens: z.number().int().positive().default(8000),
      temperature: z.number().default(0.3),
      timeout_ms: z.number().int().positive().default(120000),
    })
    .default({}),

  server: z
    .object({
      port: z.number().int().default(3000),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  schedule: z
    .object({
      collect_cron: z.string().default('0 */4 * * *'),
      analyze_cron: z.string().default(''),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Filesystem locations derived from the config once at start-up.
 */
export interface DataPaths {
  dataDir: string;
  contentDir: string;
  briefsDir: string;
  stateFile: string;
  dedupIndexFile: string;
  sourcesFile: string;
}

export function resolveDataPaths(config: Config): DataPaths {
  const dataDir = resolvePath(config.data_dir);
  return {
    dataDir,
    contentDir: path.join(dataDir, 'content'),
    briefsDir: path.join(dataDir, 'briefs'),
    stateFile: path.join(dataDir, 'state', 'sources.json'),
    dedupIndexFile: path.join(dataDir, 'state', 'dedup_index.json'),
    sourcesFile: resolvePath(config.sources_file),
  };
}

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export const DEFAULT_CONFIG_FILE = 'daybrief.config.yaml';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load the config from `DAYBRIEF_CONFIG` or the working directory.
 * The API key is not read here; see `llm/credentials.ts`.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const explorer = cosmiconfig('daybrief', {
    searchPlaces: [
      DEFAULT_CONFIG_FILE,
      'daybrief.config.yml',
      '.daybriefrc.yaml',
      '.daybriefrc.yml',
    ],
    stopDir: process.cwd(),
  });

  let rawConfig: Record<string, unknown> = {};
  const envConfigPath = env['DAYBRIEF_CONFIG'];

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    const loaded: unknown = result?.config;
    if (isRecord(loaded)) rawConfig = loaded;
  } else {
    const result = await explorer.search();
    const found: unknown = result?.config;
    if (isRecord(found)) {
      rawConfig = found;
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const envBaseUrl = env['DAYBRIEF_LLM_BASE_URL'];
  const envModel = env['DAYBRIEF_LLM_MODEL'];

  if (envBaseUrl || envModel) {
    const llm = isRecord(rawConfig['llm']) ? { ...rawConfig['llm'] } : {};
    if (envBaseUrl) llm['base_url'] = envBaseUrl;
    if (envModel) llm['model'] = envModel;
    rawConfig = { ...rawConfig, llm };
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  return parsed.data;
}
