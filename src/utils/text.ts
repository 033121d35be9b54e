export const ELLIPSIS = '…';

export interface TruncationResult {
  text: string;
  truncated: boolean;
}

/**
 * Shorten text to at most `limit` characters, cutting only where the
 * original has whitespace and ending with an ellipsis.
 */
export function truncateAtWordBoundary(text: string, limit: number): TruncationResult {
  if (text.length <= limit) {
    return { text, truncated: false };
  }

  // Overflow made of trailing whitespace only
  const trimmed = text.trimEnd();
  if (trimmed.length <= limit) {
    return { text: trimmed, truncated: false };
  }

  const budget = Math.max(0, limit - ELLIPSIS.length);

  // text[budget] exists because text is longer than limit
  let cut = budget;
  while (cut > 0 && !/\s/.test(text[cut])) {
    cut--;
  }

  // No whitespace in the window: a single token longer than the limit.
  const kept = cut > 0 ? text.slice(0, cut).trimEnd() : '';
  const result = limit >= ELLIPSIS.length ? kept + ELLIPSIS : '';

  return { text: result, truncated: true };
}

/** Plain prefix for prompt input; no word-boundary handling needed there. */
export function clip(text: string, max: number): string {
  return text.length <= max ? text : text.slice(0, max);
}
