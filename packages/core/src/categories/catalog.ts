import fs from 'fs/promises';
import type { ZodIssue } from 'zod';
import { CategoryCatalogSchema } from './schema.js';
import { DEFAULT_CATEGORY_IDS, type Category } from './types.js';
import { ConfigError, getErrorMessage } from '../errors/index.js';
import builtInCatalog from './categories.json' with { type: 'json' };

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an already-parsed catalog object. Returned categories are frozen
 * and keep the file's order, which becomes the canonical order.
 */
export function parseCategoryCatalog(raw: unknown, source = '<inline>'): Category[] {
  const parsed = CategoryCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid category catalog (${source}): ${formatIssues(parsed.error.issues)}`, {
      source,
    });
  }

  return parsed.data.categories.map(category =>
    Object.freeze({
      id: category.id,
      displayName: category.displayName,
      examples: Object.freeze([...category.examples]),
    })
  );
}

/**
 * Read and validate a catalog file.
 */
export async function loadCategories(catalogPath: string): Promise<Category[]> {
  let content: string;
  try {
    content = await fs.readFile(catalogPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read category catalog: ${getErrorMessage(error)}`, { source: catalogPath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Category catalog is not valid JSON: ${getErrorMessage(error)}`, {
      source: catalogPath,
    });
  }

  return parseCategoryCatalog(raw, catalogPath);
}

/**
 * The nine built-in support categories, in canonical order. The catalog is
 * bundled as a JSON module, so it ships with the compiled output too.
 */
export async function loadDefaultCategories(): Promise<Category[]> {
  const categories = parseCategoryCatalog(builtInCatalog, 'built-in catalog');

  const ids = categories.map(category => category.id);
  const expected: readonly string[] = DEFAULT_CATEGORY_IDS;
  if (ids.length !== expected.length || ids.some((id, i) => id !== expected[i])) {
    throw new ConfigError('Built-in category catalog does not match the default category ids', {
      expected,
      actual: ids,
    });
  }

  return categories;
}
