import type { PlatformId } from '../types/platform.js';
import type { ContentPreferences, GenerationRequest, PlatformResult, WebsiteContent } from '../types/post.js';
import type { ContentSource } from './content-source.js';
import { adapt, validate } from './platform-adapter.js';
import { InvalidUrlError } from '../utils/errors.js';
import { getPlatformSpec } from '../utils/platforms.js';
import { isValidUrl } from '../utils/validation.js';

/** Anything that can turn a request into raw post text. */
export interface Generator {
  generate(request: GenerationRequest): Promise<string>;
}

export interface PipelineDeps {
  contentSource: ContentSource;
  generator: Generator;
  /** Called once the page has been fetched, before any generation starts. */
  onContent?: (content: WebsiteContent) => void;
}

export interface PipelineResult {
  content: WebsiteContent;
  results: PlatformResult[];
}

/**
 * Fetch the page once, draft one post per platform concurrently, then fit
 * each draft to its platform. Upstream errors propagate as thrown.
 */
export async function generateSocialPosts(
  url: string,
  preferences: ContentPreferences,
  platforms: readonly PlatformId[],
  deps: PipelineDeps
): Promise<PipelineResult> {
  if (!isValidUrl(url)) {
    throw new InvalidUrlError(url);
  }

  const specs = platforms.map(getPlatformSpec);
  const content = await deps.contentSource.fetch(url);
  deps.onContent?.(content);

  const results = await Promise.all(
    specs.map(async (platform): Promise<PlatformResult> => {
      const request: GenerationRequest = {
        sourceContent: content,
        platform,
        audience: preferences.audience,
        tone: preferences.tone,
        customHashtags: preferences.hashtags,
      };

      const raw = await deps.generator.generate(request);
      const post = adapt(raw, platform, request.customHashtags);
      return { platform, post, validation: validate(post) };
    })
  );

  return { content, results };
}
