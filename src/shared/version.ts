/**
 * Package version, read from package.json at startup. Both src/ and dist/
 * sit two levels below the package root.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export const DEV_VERSION = '0.0.0-dev';

export function readPackageVersion(moduleUrl: string = import.meta.url): string {
  try {
    const packagePath = join(dirname(fileURLToPath(moduleUrl)), '..', '..', 'package.json');
    const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return DEV_VERSION;
  } catch {
    return DEV_VERSION;
  }
}
