import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import { isJsonObject } from '../store/json.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  // dist/core and src/core both sit two levels below the package root
  const pkgPath = join(import.meta.dirname, '..', '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    return isJsonObject(pkg) && typeof pkg['version'] === 'string' ? pkg['version'] : '0.0.0';
  } catch (err) {
    getLogger('version').debug({ path: pkgPath, err: errorMessage(err) }, 'package.json not readable');
    return '0.0.0';
  }
}
