import type { WebsiteContent } from '../types/post.js';

/**
 * Extracts the readable content of a web page.
 * Implementations raise FetchError for anything that goes wrong upstream.
 */
export interface ContentSource {
  fetch(url: string): Promise<WebsiteContent>;
}
