import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Link2PostConfig } from '../types/config.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { ConfigError, FileSystemError, errorMessage } from '../utils/errors.js';
import { CONFIG_FILE, validateConfig } from '../utils/validation.js';

export type PromptFile = 'system.md';

export class FileSystemService {
  private cwd: string;

  constructor(cwd: string = process.cwd()) {
    this.cwd = cwd;
  }

  /**
   * Load `.link2postrc.json` merged over the defaults. A directory without
   * one runs on the defaults.
   */
  loadConfig(): Link2PostConfig {
    const configPath = join(this.cwd, CONFIG_FILE);

    if (!existsSync(configPath)) {
      return structuredClone(DEFAULT_CONFIG);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new FileSystemError(`Failed to load config: ${errorMessage(error)}`, { cause: error });
    }

    // Fill defaults first so a partial file only has to name what it changes
    const candidate = isObject(parsed) ? mergeConfig(DEFAULT_CONFIG, parsed) : parsed;
    if (!validateConfig(candidate)) {
      throw new ConfigError(`Invalid configuration format in ${CONFIG_FILE}`);
    }

    return candidate;
  }

  saveConfig(config: Link2PostConfig): void {
    const configPath = join(this.cwd, CONFIG_FILE);

    try {
      writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new FileSystemError(`Failed to save config: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Read a prompt override from prompts/, or null when the project has none. */
  loadPrompt(filename: PromptFile): string | null {
    const promptPath = join(this.cwd, 'prompts', filename);

    if (!existsSync(promptPath)) {
      return null;
    }

    try {
      return readFileSync(promptPath, 'utf-8');
    } catch (error) {
      throw new FileSystemError(`Failed to load prompt ${filename}: ${errorMessage(error)}`, { cause: error });
    }
  }

  ensureDirectory(path: string): void {
    if (!existsSync(path)) {
      try {
        mkdirSync(path, { recursive: true });
      } catch (error) {
        throw new FileSystemError(`Failed to create directory ${path}: ${errorMessage(error)}`, { cause: error });
      }
    }
  }

  writeFile(path: string, content: string): void {
    try {
      writeFileSync(path, content, 'utf-8');
    } catch (error) {
      throw new FileSystemError(`Failed to write file ${path}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** One level deep: each top-level section is merged key by key. */
export function mergeConfig(base: Link2PostConfig, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  const keys = new Set([...Object.keys(base), ...Object.keys(override)]);

  for (const key of keys) {
    const baseValue: unknown = Object.entries(base).find(([k]) => k === key)?.[1];
    const overrideValue = override[key];

    if (isObject(baseValue) && isObject(overrideValue)) {
      merged[key] = { ...baseValue, ...overrideValue };
    } else if (overrideValue !== undefined) {
      merged[key] = overrideValue;
    } else if (isObject(baseValue)) {
      merged[key] = { ...baseValue };
    } else {
      merged[key] = baseValue;
    }
  }

  return merged;
}
