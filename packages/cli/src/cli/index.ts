import { Command } from 'commander';
import { readPackageVersion } from '@quecat/core';
import { categorizeCommand } from './categorize.js';
import { categoriesCommand } from './categories.js';
import { checkCommand } from './check.js';
import { showBanner } from '../utils/banner.js';

export const program = new Command();

program
  .name('quecat')
  .description('Categorize customer questions by semantic similarity')
  .version(readPackageVersion(import.meta.url));

program
  .command('categorize')
  .description('Categorize a question')
  .argument('<question...>', 'Question text (words are joined with spaces)')
  .option('--json', 'Print the full result as JSON')
  .option('-m, --model <id>', 'Embedding model id')
  .option('-c, --categories <path>', 'Custom category catalog (JSON)')
  .option('--device <device>', 'Embedding device: cpu, gpu', 'cpu')
  .option('-v, --verbose', 'Show detailed logging')
  .action(categorizeCommand);

program
  .command('categories')
  .description('List the categories and their example counts')
  .option('--json', 'Print the catalog as JSON')
  .option('-c, --categories <path>', 'Custom category catalog (JSON)')
  .option('-v, --verbose', 'Show detailed error output')
  .action(categoriesCommand);

program
  .command('check')
  .description('Categorize one sample question per built-in category and summarize')
  .option('--json', 'Print the summary as JSON')
  .option('-m, --model <id>', 'Embedding model id')
  .option('-c, --categories <path>', 'Custom category catalog (JSON)')
  .option('--device <device>', 'Embedding device: cpu, gpu', 'cpu')
  .option('-v, --verbose', 'Show detailed logging')
  .hook('preAction', (_command, action) => {
    if (!action.opts().json) showBanner('Sample check');
  })
  .action(checkCommand);
