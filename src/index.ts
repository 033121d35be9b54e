#!/usr/bin/env node

// Load environment variables from .env file
import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { initCommand } from './commands/init.js';
import { generateCommand } from './commands/generate.js';
import { platformsCommand } from './commands/platforms.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('link2post')
  .description('Turn any web page into platform-ready social media posts')
  .version(readVersion());

program
  .command('init')
  .description('Create .link2postrc.json and an editable system prompt in the current directory')
  .action(initCommand);

program
  .command('generate')
  .description('Fetch a URL and generate one post per platform')
  .argument('<url>', 'Web page to turn into posts')
  .option('-p, --platforms <list>', 'Comma-separated platforms (twitter, linkedin, facebook, instagram)')
  .option('-a, --audience <text>', 'Target audience')
  .option('-t, --tone <text>', 'Tone of voice')
  .option('--hashtags <list>', 'Hashtags to add to every post (comma-separated)')
  .option('-m, --model <model>', 'Override the LLM model')
  .option('--no-save', 'Do not write the Markdown report')
  .option('-v, --verbose', 'Verbose output')
  .action(generateCommand);

program
  .command('platforms')
  .description('List supported platforms and their character limits')
  .action(platformsCommand);

await program.parseAsync();
