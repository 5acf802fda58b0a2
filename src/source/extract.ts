import { Readability } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Strip HTML tags and decode common entities.
 */
export function stripHtml(html: string): string {
  // Remove script/style blocks
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<[^>]+>/g, ' ');
  text = text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Pull the main article text out of an HTML document.
 * Paragraph breaks are kept; runs of spaces inside a line are collapsed.
 */
export function readArticle(html: string, url: string): string | null {
  const dom = new JSDOM(html, { url });
  const article = new Readability(dom.window.document).parse();
  const raw = article?.textContent;
  if (!raw) return null;

  const text = raw
    .split(/\n\s*\n/)
    .map((block) => block.replace(/\s+/g, ' ').trim())
    .filter((block) => block.length > 0)
    .join('\n\n');
  return text || null;
}

export interface ExtractOptions {
  timeoutMs?: number;
  userAgent?: string;
}

export type ArticleExtractor = (url: string, options?: ExtractOptions) => Promise<string | null>;

/**
 * Fetch a page and extract its article text.
 * Never throws; returns null when the page cannot be fetched or has no readable article.
 */
export const extractArticleText: ArticleExtractor = async (url, options = {}) => {
  const { timeoutMs = 15000, userAgent = 'daybrief/0.1' } = options;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html',
      },
      signal: controller.signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      logger.debug({ url, status: response.status }, 'Article fetch returned non-OK status');
      return null;
    }

    return readArticle(await response.text(), url);
  } catch (err) {
    logger.debug({ url, error: errorMessage(err) }, 'Article extraction failed');
    return null;
  } finally {
    clearTimeout(timer);
  }
};
