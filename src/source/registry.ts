import { z } from 'zod';
import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { ConfigError } from '../shared/errors.js';

export const SOURCE_KINDS = ['rss'] as const;

export const SourceSchema = z.object({
  id: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/i, 'id must be a slug (letters, digits, "-" or "_")'),
  name: z.string().min(1),
  type: z.enum(SOURCE_KINDS).default('rss'),
  url: z.string().url(),
  category: z.string().default('general'),
  enabled: z.boolean().default(true),
  timeout_ms: z.number().int().positive().optional(),
});

export type Source = Readonly<z.infer<typeof SourceSchema>>;
export type SourceKind = Source['type'];

const SourcesFileSchema = z.object({
  sources: z.array(SourceSchema),
});

/**
 * The read-only view of the source list the collection pipeline depends on.
 */
export interface SourceCatalog {
  getEnabledSources(): Source[];
  getSourceById(id: string): Source | undefined;
}

/**
 * Ordered, validated source list. Order is the order of the YAML file.
 */
export class SourceRegistry implements SourceCatalog {
  private readonly sources: Map<string, Source>;

  constructor(sources: readonly Source[]) {
    this.sources = new Map();
    for (const source of sources) {
      if (this.sources.has(source.id)) {
        throw new ConfigError(`Duplicate source id: ${source.id}`, { id: source.id });
      }
      this.sources.set(source.id, Object.freeze({ ...source }));
    }
  }

  static fromYaml(yamlContent: string): SourceRegistry {
    const raw: unknown = yamlParse(yamlContent);
    const result = SourcesFileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError('Invalid sources file', {
        errors: result.error.flatten().fieldErrors,
      });
    }
    return new SourceRegistry(result.data.sources);
  }

  static fromFile(filePath: string): SourceRegistry {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Sources file not found: ${filePath}`);
    }
    return SourceRegistry.fromYaml(fs.readFileSync(filePath, 'utf-8'));
  }

  getAllSources(): Source[] {
    return [...this.sources.values()];
  }

  getEnabledSources(): Source[] {
    return this.getAllSources().filter((s) => s.enabled);
  }

  getSourceById(id: string): Source | undefined {
    return this.sources.get(id);
  }

  getSourcesByType(kind: SourceKind): Source[] {
    return this.getAllSources().filter((s) => s.type === kind);
  }
}
