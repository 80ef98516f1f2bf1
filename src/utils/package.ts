import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const PACKAGE_NAME = 'cargo-unify';

/**
 * Read the CLI version from the package.json above this module, whether it
 * runs from src/ or from dist/.
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));

  for (let i = 0; i < 5; i++) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (
        typeof parsed === 'object' && parsed !== null &&
        'name' in parsed && parsed.name === PACKAGE_NAME &&
        'version' in parsed && typeof parsed.version === 'string'
      ) {
        return parsed.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return '0.0.0';
}
