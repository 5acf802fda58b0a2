import type { ContentStore, StoredBrief, StoredContent } from '../storage/contentStore.js';
import type { TextGenerator } from '../llm/client.js';
import { stripHtml } from '../source/extract.js';
import { BriefError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface BriefGeneratorOptions {
  systemPrompt: string;
  windowHours: number;
  excerptChars: number;
  now?: () => Date;
}

export interface BriefPlan {
  windowFrom: string;
  windowTo: string;
  items: StoredContent[];
  sourceIds: string[];
  prompt: string;
  sourceMap: Record<string, string>;
}

export type BriefResult =
  | { status: 'empty'; plan: BriefPlan }
  | { status: 'dry-run'; plan: BriefPlan }
  | { status: 'generated'; plan: BriefPlan; brief: StoredBrief };

function formatPublished(iso: string): string {
  return iso.replace('T', ' ').slice(0, 16);
}

/**
 * Number each item `ref1..refN` and lay it out for the model.
 */
export function buildPrompt(items: StoredContent[], excerptChars: number): string {
  const lines = ['Here are the articles to analyze:', ''];

  items.forEach((item, i) => {
    lines.push('---');
    lines.push(`Reference ID: ref${i + 1}`);
    lines.push(`Title: ${item.title}`);
    lines.push(`Source: ${item.source_name}`);
    lines.push(`Published: ${formatPublished(item.published_at)}`);
    lines.push(`URL: ${item.url}`);
    lines.push('');
    lines.push(stripHtml(item.content).slice(0, excerptChars));
    lines.push('');
  });

  lines.push('---');
  lines.push('');
  lines.push('Please generate a daily brief based on these articles.');
  return lines.join('\n');
}

/**
 * Select the content window and build the prompt and reference map without
 * calling the model.
 */
export function planBrief(
  store: ContentStore,
  options: { windowHours: number; excerptChars: number; now: Date },
): BriefPlan {
  const { now } = options;
  const from = new Date(now.getTime() - options.windowHours * 60 * 60 * 1000);
  const items = store.getContentSince(from);

  const sourceMap: Record<string, string> = {};
  items.forEach((item, i) => {
    sourceMap[`ref${i + 1}`] = item.relative_path;
  });

  return {
    windowFrom: from.toISOString(),
    windowTo: now.toISOString(),
    items,
    sourceIds: [...new Set(items.map((i) => i.source_id))],
    prompt: buildPrompt(items, options.excerptChars),
    sourceMap,
  };
}

export class BriefGenerator {
  private readonly now: () => Date;

  constructor(
    private readonly store: ContentStore,
    private readonly generator: TextGenerator,
    private readonly options: BriefGeneratorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  plan(): BriefPlan {
    return planBrief(this.store, {
      windowHours: this.options.windowHours,
      excerptChars: this.options.excerptChars,
      now: this.now(),
    });
  }

  async generate(options: { dryRun?: boolean } = {}): Promise<BriefResult> {
    const plan = this.plan();
    if (plan.items.length === 0) {
      logger.info({ from: plan.windowFrom }, 'No content in window, skipping brief');
      return { status: 'empty', plan };
    }
    if (options.dryRun) {
      return { status: 'dry-run', plan };
    }

    let content: string;
    try {
      const response = await this.generator.complete(this.options.systemPrompt, plan.prompt);
      content = response.content;
    } catch (err) {
      throw new BriefError(`Brief generation failed: ${errorMessage(err)}`, {
        items: plan.items.length,
      });
    }

    const brief = this.store.storeBrief({
      content,
      generated_at: plan.windowTo,
      content_window: { from: plan.windowFrom, to: plan.windowTo },
      sources_analyzed: plan.items.length,
      model: this.generator.model,
      source_map: plan.sourceMap,
    });

    logger.info({ path: brief.file_path, items: plan.items.length }, 'Brief generated');
    return { status: 'generated', plan, brief };
  }
}
