import { PLATFORM_IDS, PLATFORM_SPECS } from '../types/platform.js';
import type { PlatformId, PlatformRef, PlatformSpec } from '../types/platform.js';
import { UnknownPlatformError } from './errors.js';

export function isPlatformId(value: string): value is PlatformId {
  return PLATFORM_IDS.some((id) => id === value);
}

export function getPlatformSpec(identifier: string): PlatformSpec {
  if (!isPlatformId(identifier)) {
    throw new UnknownPlatformError(identifier, PLATFORM_IDS);
  }
  return PLATFORM_SPECS[identifier];
}

/**
 * Resolve a caller-supplied platform description to the canonical spec.
 * A known identifier with a different limit is rejected too: limits are fixed.
 */
export function resolvePlatformSpec(ref: PlatformRef): PlatformSpec {
  const spec = getPlatformSpec(ref.identifier);
  if (spec.characterLimit !== ref.characterLimit) {
    throw new UnknownPlatformError(`${ref.identifier} (limit ${ref.characterLimit})`, PLATFORM_IDS);
  }
  return spec;
}

/**
 * Parse "twitter, linkedin" style input. An empty list selects every platform.
 */
export function parsePlatformList(input: string): PlatformId[] {
  const names = input
    .split(/[\s,]+/)
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);

  if (names.length === 0) {
    return [...PLATFORM_IDS];
  }

  const selected: PlatformId[] = [];
  for (const name of names) {
    const id = getPlatformSpec(name).identifier;
    if (!selected.includes(id)) {
      selected.push(id);
    }
  }
  return selected;
}
