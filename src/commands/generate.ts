import { isAbsolute, join } from 'path';
import { FileSystemService } from '../services/file-system.js';
import { createLLMService } from '../services/llm-factory.js';
import { FirecrawlService } from '../services/firecrawl.js';
import { PostGenerator } from '../services/post-generator.js';
import { generateSocialPosts } from '../services/pipeline.js';
import { DEFAULT_AUDIENCE, DEFAULT_TONE } from '../types/config.js';
import type { Link2PostConfig } from '../types/config.js';
import type { PlatformId } from '../types/platform.js';
import type { ContentPreferences } from '../types/post.js';
import { applyEnvironment } from '../utils/env.js';
import { errorMessage } from '../utils/errors.js';
import { parseHashtagList } from '../utils/hashtags.js';
import { logger } from '../utils/logger.js';
import { savePostsMarkdown } from '../utils/markdown-export.js';
import { parsePlatformList } from '../utils/platforms.js';
import { renderPreview } from '../utils/preview.js';

export interface GenerateOptions {
  platforms?: string;
  audience?: string;
  tone?: string;
  hashtags?: string;
  model?: string;
  save?: boolean;
  verbose?: boolean;
}

export function resolvePreferences(config: Link2PostConfig, options: GenerateOptions): ContentPreferences {
  return {
    audience: options.audience?.trim() || config.generation.audience || DEFAULT_AUDIENCE,
    tone: options.tone?.trim() || config.generation.tone || DEFAULT_TONE,
    hashtags: options.hashtags !== undefined
      ? parseHashtagList(options.hashtags)
      : [...(config.generation.hashtags ?? [])],
  };
}

export function resolvePlatforms(config: Link2PostConfig, options: GenerateOptions): PlatformId[] {
  if (options.platforms !== undefined) {
    return parsePlatformList(options.platforms);
  }
  return parsePlatformList((config.generation.platforms ?? []).join(','));
}

function applyModelOverride(config: Link2PostConfig, model: string | undefined): void {
  if (!model) return;

  if (config.llm.provider === 'ollama' && config.ollama) {
    config.ollama.model = model;
  } else if (config.llm.provider === 'anthropic' && config.anthropic) {
    config.anthropic.model = model;
  }
}

export async function generateCommand(url: string, options: GenerateOptions): Promise<void> {
  const cwd = process.cwd();
  const fs = new FileSystemService(cwd);

  try {
    // Step 1: Configuration and services
    logger.section('[1/3] Checking environment...');

    const config = applyEnvironment(fs.loadConfig(), process.env);
    applyModelOverride(config, options.model);

    const preferences = resolvePreferences(config, options);
    const platforms = resolvePlatforms(config, options);

    const llm = createLLMService(config);
    await llm.ensureAvailable();
    logger.success(`Connected to ${llm.provider} (model: ${llm.getModelName()})`);

    const contentSource = new FirecrawlService(config);
    const systemPrompt = fs.loadPrompt('system.md');
    if (systemPrompt !== null && options.verbose) {
      logger.info('Using prompts/system.md');
    }
    const generator = new PostGenerator(llm, {
      systemPrompt: systemPrompt ?? undefined,
      maxContentChars: config.generation.maxContentChars,
    });

    if (options.verbose) {
      logger.info(`Audience: ${preferences.audience}`);
      logger.info(`Tone: ${preferences.tone}`);
      logger.info(`Platforms: ${platforms.join(', ')}`);
      logger.info(`Temperature: ${llm.getTemperature()}`);
    }

    // Step 2: Fetch and generate
    logger.section('[2/3] Generating posts...');
    logger.step(`Fetching ${url}`);

    const { results } = await generateSocialPosts(url, preferences, platforms, {
      contentSource,
      generator,
      onContent: (content) => {
        logger.success(`Fetched "${content.title}" (${content.mainContent.length} characters)`);
        logger.step(`Drafting ${platforms.length} post${platforms.length === 1 ? '' : 's'}...`);
      },
    });

    // Step 3: Show and save
    logger.section('[3/3] Results');
    logger.info(logger.style.dim(`Audience: ${preferences.audience}`));
    logger.info(logger.style.dim(`Tone: ${preferences.tone}`));

    for (const result of results) {
      renderPreview(result);
    }

    logger.blank();
    if (options.save !== false) {
      const dir = config.output?.dir ?? 'outputs';
      const outputDir = isAbsolute(dir) ? dir : join(cwd, dir);
      const filePath = savePostsMarkdown(fs, outputDir, url, preferences, results);
      logger.success(`Saved to ${filePath}`);
    }
  } catch (error) {
    logger.blank();
    logger.error(errorMessage(error));
    process.exit(1);
  }
}
