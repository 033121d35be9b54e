import FirecrawlApp from '@mendable/firecrawl-js';
import type { Link2PostConfig } from '../types/config.js';
import type { WebsiteContent } from '../types/post.js';
import type { ContentSource } from './content-source.js';
import { FetchError, MissingApiKeyError, errorMessage } from '../utils/errors.js';

/** The parts of a Firecrawl scrape result we read. */
export interface ScrapedPage {
  markdown?: string;
  metadata?: {
    title?: string;
    description?: string;
    ogDescription?: string;
    sourceURL?: string;
  };
}

export function toWebsiteContent(page: ScrapedPage, requestedUrl: string): WebsiteContent {
  const markdown = page.markdown?.trim() ?? '';
  if (markdown.length === 0) {
    throw new FetchError(requestedUrl, 'page has no extractable content');
  }

  const metadata = page.metadata ?? {};
  return {
    title: metadata.title?.trim() || 'Untitled',
    description: metadata.description?.trim() || metadata.ogDescription?.trim() || '',
    mainContent: markdown,
    url: metadata.sourceURL || requestedUrl,
  };
}

export class FirecrawlService implements ContentSource {
  private client: FirecrawlApp;

  constructor(config: Link2PostConfig) {
    const apiKey = config.firecrawl?.apiKey;
    if (!apiKey) {
      throw new MissingApiKeyError('Firecrawl', 'FIRECRAWL_API_KEY');
    }

    this.client = new FirecrawlApp({
      apiKey,
      apiUrl: config.firecrawl?.apiUrl,
    });
  }

  async fetch(url: string): Promise<WebsiteContent> {
    const response = await this.client
      .scrapeUrl(url, { formats: ['markdown'] })
      .catch((error: unknown) => {
        throw new FetchError(url, errorMessage(error), { cause: error });
      });

    if (!response.success) {
      throw new FetchError(url, response.error || 'scrape failed');
    }

    return toWebsiteContent(response, url);
  }
}
