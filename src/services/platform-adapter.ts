import type { PlatformRef } from '../types/platform.js';
import type { Post, ValidationResult, ValidationRule } from '../types/post.js';
import { EmptyContentError } from '../utils/errors.js';
import { extractHashtags, hashtagKey, isWellFormedHashtag, mergeHashtags } from '../utils/hashtags.js';
import { getPlatformSpec, resolvePlatformSpec } from '../utils/platforms.js';
import { truncateAtWordBoundary } from '../utils/text.js';

/**
 * Turns raw generated text into a post that fits its platform.
 *
 * Inline hashtags stay in the body and count toward the limit. Hashtags that
 * are not inline (custom ones, or inline ones lost to truncation) go into a
 * trailing line, which is trimmed from the end until it fits.
 *
 * @throws EmptyContentError when rawText is empty or whitespace
 * @throws UnknownPlatformError when platform is not one of the fixed specs
 */
export function adapt(rawText: string, platform: PlatformRef, customHashtags: Iterable<string> = []): Post {
  if (rawText.trim().length === 0) {
    throw new EmptyContentError();
  }

  const spec = resolvePlatformSpec(platform);
  const merged = mergeHashtags(extractHashtags(rawText), customHashtags);
  const { text: body, truncated } = truncateAtWordBoundary(rawText, spec.characterLimit);

  const inline = new Set(extractHashtags(body).map(hashtagKey));
  const trailing = merged.filter((tag) => !inline.has(hashtagKey(tag)));

  // Custom tags come last in the merged list, so they are dropped first.
  while (trailing.length > 0 && trailingLength(body, trailing) > spec.characterLimit) {
    trailing.pop();
  }

  const kept = new Set(trailing.map(hashtagKey));
  const hashtags = merged.filter((tag) => inline.has(hashtagKey(tag)) || kept.has(hashtagKey(tag)));

  return Object.freeze({
    platform: spec.identifier,
    body,
    hashtags: Object.freeze(hashtags),
    truncated,
  });
}

function trailingLength(body: string, tags: readonly string[]): number {
  return body.length + 1 + tags.join(' ').length;
}

/** Hashtags of the post that are not already written into its body. */
export function trailingHashtags(post: Post): string[] {
  const inline = new Set(extractHashtags(post.body).map(hashtagKey));
  return post.hashtags.filter((tag) => !inline.has(hashtagKey(tag)));
}

/** The text as it would be published: body plus the trailing hashtag line. */
export function composePostText(post: Post): string {
  const trailing = trailingHashtags(post);
  return trailing.length > 0 ? `${post.body}\n${trailing.join(' ')}` : post.body;
}

export function validate(post: Post): ValidationResult {
  const limit = getPlatformSpec(post.platform).characterLimit;
  const violations: ValidationRule[] = [];

  if (post.body.length > limit) {
    violations.push('body-within-limit');
  }

  if (!post.hashtags.every(isWellFormedHashtag)) {
    violations.push('hashtags-well-formed');
  }

  const keys = new Set(post.hashtags.map(hashtagKey));
  if (keys.size !== post.hashtags.length) {
    violations.push('hashtags-unique');
  }

  if (composePostText(post).length > limit) {
    violations.push('composed-within-limit');
  }

  return { valid: violations.length === 0, violations };
}
