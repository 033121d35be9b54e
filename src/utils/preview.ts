import type { PlatformResult } from '../types/post.js';
import { composePostText } from '../services/platform-adapter.js';
import { logger } from './logger.js';

const BAR_WIDTH = 30;
const PANEL_WIDTH = 72;

/** "[#########.....................]" filled in proportion to used/limit. */
export function characterBar(used: number, limit: number, width: number = BAR_WIDTH): string {
  const ratio = limit > 0 ? Math.min(1, used / limit) : 1;
  const filled = Math.round(ratio * width);
  return `[${'#'.repeat(filled)}${'.'.repeat(width - filled)}]`;
}

export function renderPreview({ platform, post, validation }: PlatformResult): void {
  const text = composePostText(post);
  const { style, box } = logger;

  logger.blank();
  logger.info(style.cyan(box.top(PANEL_WIDTH)));
  logger.info(`  ${style.bold(platform.displayName)}`);
  logger.info(style.cyan(box.line(PANEL_WIDTH)));
  for (const line of text.split('\n')) {
    logger.info(`  ${line}`);
  }
  logger.info(style.cyan(box.bottom(PANEL_WIDTH)));

  if (post.hashtags.length > 0) {
    logger.info(`  ${style.blue('Hashtags:')} ${post.hashtags.join(' ')}`);
  }
  logger.info(`  ${characterBar(text.length, platform.characterLimit)} ${text.length} / ${platform.characterLimit}`);

  if (post.truncated) {
    logger.warn(`  Draft exceeded ${platform.characterLimit} characters and was shortened`);
  }
  if (!validation.valid) {
    logger.warn(`  Validation failed: ${validation.violations.join(', ')}`);
  }
}
