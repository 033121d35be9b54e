import { join } from 'path';
import { FileSystemService } from '../services/file-system.js';
import { DEFAULT_SYSTEM_PROMPT } from '../services/post-generator.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { CONFIG_FILE, isLink2PostProject } from '../utils/validation.js';

export async function initCommand(): Promise<void> {
  const cwd = process.cwd();
  const fs = new FileSystemService(cwd);

  if (isLink2PostProject(cwd)) {
    logger.error(`Already initialized! ${CONFIG_FILE} exists in this directory.`);
    process.exit(1);
  }

  try {
    fs.ensureDirectory(join(cwd, 'prompts'));
    logger.success('Created directory: prompts/');

    fs.writeFile(join(cwd, 'prompts', 'system.md'), DEFAULT_SYSTEM_PROMPT + '\n');
    logger.success('Created file: prompts/system.md');

    fs.saveConfig(DEFAULT_CONFIG);
    logger.success(`Created configuration: ${CONFIG_FILE}`);

    logger.blank();
    logger.info('link2post initialized successfully!');
    logger.blank();
    logger.info('Next steps:');
    logger.info('1. Put FIRECRAWL_API_KEY (and ANTHROPIC_API_KEY if you use Anthropic) in .env');
    logger.info(`2. Pick your LLM provider, audience and tone in ${CONFIG_FILE}`);
    logger.info('3. Edit prompts/system.md to change how posts are written');
    logger.info('4. Run: link2post generate https://example.com');
  } catch (error) {
    logger.error(`Initialization failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
