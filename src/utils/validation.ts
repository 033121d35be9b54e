import { existsSync } from 'fs';
import { join } from 'path';
import { isPlatformId } from './platforms.js';
import type { Link2PostConfig } from '../types/config.js';

export const CONFIG_FILE = '.link2postrc.json';

export function isLink2PostProject(cwd: string = process.cwd()): boolean {
  return existsSync(join(cwd, CONFIG_FILE));
}

export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isOptional(value: unknown, check: (v: unknown) => boolean): boolean {
  return value === undefined || check(value);
}

const isString = (v: unknown): boolean => typeof v === 'string';
const isPositiveNumber = (v: unknown): boolean => typeof v === 'number' && v > 0;

export function validateConfig(config: unknown): config is Link2PostConfig {
  if (!isRecord(config) || !isRecord(config.llm)) {
    return false;
  }

  const provider = config.llm.provider;
  if (provider !== 'ollama' && provider !== 'anthropic') {
    return false;
  }

  // Validate provider-specific config
  if (provider === 'ollama') {
    if (!isRecord(config.ollama)) {
      return false;
    }
    if (typeof config.ollama.host !== 'string' || typeof config.ollama.model !== 'string') {
      return false;
    }
  } else {
    if (!isRecord(config.anthropic) || typeof config.anthropic.model !== 'string') {
      return false;
    }
  }

  if (config.firecrawl !== undefined) {
    if (!isRecord(config.firecrawl)) return false;
    if (!isOptional(config.firecrawl.apiKey, isString) || !isOptional(config.firecrawl.apiUrl, isString)) {
      return false;
    }
  }

  if (!isRecord(config.generation)) {
    return false;
  }

  const generation = config.generation;
  if (
    !isOptional(generation.temperature, (v) => typeof v === 'number' && v >= 0 && v <= 2) ||
    !isOptional(generation.audience, isString) ||
    !isOptional(generation.tone, isString) ||
    !isOptional(generation.hashtags, isStringArray) ||
    !isOptional(generation.maxContentChars, isPositiveNumber)
  ) {
    return false;
  }

  if (generation.platforms !== undefined) {
    if (!isStringArray(generation.platforms) || !generation.platforms.every(isPlatformId)) {
      return false;
    }
  }

  if (config.output !== undefined) {
    if (!isRecord(config.output) || !isOptional(config.output.dir, isString)) {
      return false;
    }
  }

  return true;
}
