import chalk from 'chalk';
import { formatCategories } from './format.js';
import { loadCategorySet } from './engine.js';
import { formatCategoryCount, handleCommandError } from './utils.js';

export async function categoriesCommand(options: { categories?: string; json?: boolean; verbose?: boolean }) {
  try {
    const categories = await loadCategorySet(options.categories);

    if (options.json) {
      console.log(JSON.stringify(categories, null, 2));
      return;
    }

    console.log(chalk.bold(`${formatCategoryCount(categories.length)}\n`));
    console.log(formatCategories(categories).join('\n'));
  } catch (error) {
    handleCommandError(error, options.verbose);
    process.exitCode = 1;
  }
}
