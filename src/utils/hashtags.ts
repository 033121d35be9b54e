// Letters, digits and underscore in any script.
const HASHTAG_BODY = '[\\p{L}\\p{N}_]+';

// A '#' glued to a word ("C#", "page#top") or an HTML entity ("&#39;") is not a hashtag.
const HASHTAG_PATTERN = new RegExp(`(?<![\\p{L}\\p{N}_#&])#(${HASHTAG_BODY})`, 'gu');

const WELL_FORMED = new RegExp(`^#${HASHTAG_BODY}$`, 'u');
const DISALLOWED = /[^\p{L}\p{N}_]/gu;

export function hashtagKey(tag: string): string {
  return tag.toLowerCase();
}

export function isWellFormedHashtag(tag: string): boolean {
  return WELL_FORMED.test(tag);
}

/**
 * Hashtags in order of first appearance, deduplicated case-insensitively.
 * The first spelling seen wins.
 */
export function extractHashtags(text: string): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];

  for (const match of text.matchAll(HASHTAG_PATTERN)) {
    const tag = `#${match[1]}`;
    const key = hashtagKey(tag);
    if (!seen.has(key)) {
      seen.add(key);
      tags.push(tag);
    }
  }

  return tags;
}

/**
 * Turn user input into a hashtag: "startup" -> "#startup", "#ai-tools" -> "#aitools".
 * Returns null when nothing usable remains.
 */
export function normalizeHashtag(tag: string): string | null {
  const stripped = tag.trim().replace(/^#+/, '').replace(DISALLOWED, '');
  return stripped.length > 0 ? `#${stripped}` : null;
}

export function mergeHashtags(extracted: readonly string[], custom: Iterable<string>): string[] {
  const merged = [...extracted];
  const seen = new Set(extracted.map(hashtagKey));

  for (const raw of custom) {
    const tag = normalizeHashtag(raw);
    if (tag === null) continue;

    const key = hashtagKey(tag);
    if (!seen.has(key)) {
      seen.add(key);
      merged.push(tag);
    }
  }

  return merged;
}

export function parseHashtagList(input: string): string[] {
  return input
    .split(/[\s,]+/)
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}
