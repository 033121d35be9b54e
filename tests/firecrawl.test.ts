import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FirecrawlService, toWebsiteContent } from '../src/services/firecrawl.js';
import { DEFAULT_CONFIG } from '../src/types/config.js';
import { FetchError, MissingApiKeyError } from '../src/utils/errors.js';

const scrapeUrl = vi.hoisted(() => vi.fn());

vi.mock('@mendable/firecrawl-js', () => ({
  default: class {
    scrapeUrl(...args: unknown[]): unknown {
      return scrapeUrl(...args);
    }
  },
}));

const URL = 'https://example.com/post';
const CONFIG = { ...DEFAULT_CONFIG, firecrawl: { apiKey: 'test-secret' } };

describe('toWebsiteContent', () => {
  it('maps title, description, markdown and source URL', () => {
    const content = toWebsiteContent(
      {
        markdown: '# Big news\n\nWe launched.\n',
        metadata: {
          title: 'Big news',
          description: 'Launch recap',
          sourceURL: 'https://example.com/post?ref=1',
        },
      },
      URL
    );

    expect(content).toEqual({
      title: 'Big news',
      description: 'Launch recap',
      mainContent: '# Big news\n\nWe launched.',
      url: 'https://example.com/post?ref=1',
    });
  });

  it('falls back when metadata is missing', () => {
    expect(toWebsiteContent({ markdown: 'Body' }, URL)).toEqual({
      title: 'Untitled',
      description: '',
      mainContent: 'Body',
      url: URL,
    });
  });

  it('uses the og:description when there is no description', () => {
    const content = toWebsiteContent({ markdown: 'Body', metadata: { ogDescription: 'From OG' } }, URL);

    expect(content.description).toBe('From OG');
  });

  it('treats a page without content as a fetch error', () => {
    expect(() => toWebsiteContent({ markdown: '  \n' }, URL)).toThrow(FetchError);
    expect(() => toWebsiteContent({}, URL)).toThrow(`Failed to fetch ${URL}: page has no extractable content`);
  });
});

describe('FirecrawlService', () => {
  it('requires an API key', () => {
    expect(() => new FirecrawlService({ ...DEFAULT_CONFIG, firecrawl: {} })).toThrow(MissingApiKeyError);
  });
});

describe('FirecrawlService.fetch', () => {
  beforeEach(() => {
    scrapeUrl.mockReset();
  });

  it('asks for markdown and maps the page', async () => {
    scrapeUrl.mockResolvedValue({ success: true, markdown: 'Hello world', metadata: { title: 'Hello' } });

    const content = await new FirecrawlService(CONFIG).fetch(URL);

    expect(scrapeUrl).toHaveBeenCalledWith(URL, { formats: ['markdown'] });
    expect(content).toEqual({ title: 'Hello', description: '', mainContent: 'Hello world', url: URL });
  });

  it('wraps a rejected scrape and keeps the cause', async () => {
    const failure = new Error('socket hang up');
    scrapeUrl.mockRejectedValue(failure);

    const error: unknown = await new FirecrawlService(CONFIG).fetch(URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toHaveProperty('message', `Failed to fetch ${URL}: socket hang up`);
    expect(error).toHaveProperty('cause', failure);
  });

  it('turns an unsuccessful response into a fetch error', async () => {
    scrapeUrl.mockResolvedValue({ success: false, error: 'blocked' });

    await expect(new FirecrawlService(CONFIG).fetch(URL)).rejects.toThrow(`Failed to fetch ${URL}: blocked`);
  });
});
