import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

/**
 * Read the version of the package that owns the calling module.
 * Pass `import.meta.url`; package.json is looked up one and then two
 * directories above it (a module directly under src/ or dist/, or one level
 * deeper).
 */
export function readPackageVersion(moduleUrl: string): string {
  const here = dirname(fileURLToPath(moduleUrl));
  const require = createRequire(moduleUrl);

  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const packageJson: { version?: unknown } = require(join(here, candidate));
      if (typeof packageJson.version === 'string') {
        return packageJson.version;
      }
    } catch {
      // Try the next location
    }
  }
  return '0.0.0-unknown';
}
