import { PLATFORM_IDS, PLATFORM_SPECS } from '../types/platform.js';
import { logger } from '../utils/logger.js';

export function platformsCommand(): void {
  logger.blank();
  logger.success(`Supported platforms (${PLATFORM_IDS.length})`);
  logger.blank();

  for (const id of PLATFORM_IDS) {
    const spec = PLATFORM_SPECS[id];
    const limit = spec.characterLimit.toLocaleString('en-US');
    logger.info(`  ${id.padEnd(10)} ${spec.displayName.padEnd(12)} ${logger.style.dim(`${limit} characters`)}`);
  }

  logger.blank();
  logger.info('Usage:');
  logger.info('  link2post generate <url> --platforms twitter,linkedin');
  logger.blank();
}
