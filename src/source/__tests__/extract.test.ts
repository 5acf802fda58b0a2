import { describe, it, expect, vi, afterEach } from 'vitest';
import { stripHtml, readArticle, extractArticleText } from '../extract.js';

const ARTICLE_HTML = `<html><head><title>Test</title></head>
<body>
  <nav><a href="/">Home</a></nav>
  <article>
    <h1>Solar storage reaches a milestone</h1>
    <p>Grid operators reported that battery storage covered the evening peak for the first time this week, a shift that analysts had not expected for several more years.</p>
    <p>The change follows a year of rapid installation across three regions, where new capacity came online faster than transmission upgrades could be planned and approved.</p>
    <p>Utilities now expect storage to play a larger role in balancing demand, and regulators are reviewing how such assets should be paid for over their lifetime.</p>
  </article>
</body></html>`;

describe('stripHtml', () => {
  it('removes HTML tags', () => {
    expect(stripHtml('<p>Hello <b>world</b></p>')).toBe('Hello world');
  });

  it('removes script and style blocks', () => {
    expect(stripHtml('<script>alert(1)</script><style>.x{}</style><p>text</p>')).toBe('text');
  });

  it('decodes common entities', () => {
    expect(stripHtml('&amp; &lt; &gt; &quot; &#39; &nbsp;')).toBe('& < > " \'');
  });

  it('does not double-decode escaped entities', () => {
    expect(stripHtml('&amp;lt;tag&amp;gt;')).toBe('&lt;tag&gt;');
  });

  it('collapses whitespace', () => {
    expect(stripHtml('<p>a</p>\n\n<p>b</p>')).toBe('a b');
  });

  it('handles empty string', () => {
    expect(stripHtml('')).toBe('');
  });
});

describe('readArticle', () => {
  it('extracts the article text', () => {
    const text = readArticle(ARTICLE_HTML, 'https://example.com/solar');

    expect(text).toContain('battery storage covered the evening peak');
    expect(text).toContain('regulators are reviewing');
  });

  it('collapses runs of spaces inside lines', () => {
    const text = readArticle(ARTICLE_HTML, 'https://example.com/solar') ?? '';

    expect(text).not.toMatch(/ {2}/);
    expect(text).not.toMatch(/\n{3}/);
  });
});

describe('extractArticleText', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('returns the readable text of a fetched page', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response(ARTICLE_HTML, { status: 200, headers: { 'Content-Type': 'text/html' } }),
    );

    const text = await extractArticleText('https://example.com/solar');

    expect(text).toContain('battery storage covered the evening peak');
  });

  it('returns null on non-ok response', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('Forbidden', { status: 403 }));

    expect(await extractArticleText('https://example.com/solar')).toBeNull();
  });

  it('returns null when the request fails', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('Network error'));

    expect(await extractArticleText('https://example.com/solar')).toBeNull();
  });

  it('respects timeout', async () => {
    globalThis.fetch = vi.fn(
      (_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const err = new Error('This operation was aborted');
            err.name = 'AbortError';
            reject(err);
          });
        }),
    );

    expect(await extractArticleText('https://example.com/solar', { timeoutMs: 20 })).toBeNull();
  });

  it('sends the given user agent', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('Forbidden', { status: 403 }));
    globalThis.fetch = mockFetch;

    await extractArticleText('https://example.com/solar', { userAgent: 'test-agent/1.0' });

    const init: unknown = mockFetch.mock.calls[0]?.[1];
    expect(init).toMatchObject({ headers: { 'User-Agent': 'test-agent/1.0' } });
  });
});
