import { serializeResult } from '@quecat/core';
import { formatResult } from './format.js';
import { withEngine, type EngineCommandOptions } from './engine.js';

export interface CategorizeCommandOptions extends EngineCommandOptions {
  json?: boolean;
}

export async function categorizeCommand(words: string[], options: CategorizeCommandOptions): Promise<void> {
  const question = words.join(' ');

  await withEngine(options, async engine => {
    const result = await engine.categorize(question);

    if (options.json) {
      console.log(JSON.stringify({ question, ...serializeResult(result) }, null, 2));
      return;
    }
    console.log(formatResult(question, result).join('\n'));
  });
}
