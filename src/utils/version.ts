/**
 * Package version, read from package.json next to the sources or dist/.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const FALLBACK_VERSION = '0.0.0';

const log = createLogger('version');

function readPackageVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed) {
      return typeof parsed.version === 'string' ? parsed.version : FALLBACK_VERSION;
    }
    return FALLBACK_VERSION;
  } catch (error: unknown) {
    log.debug(`Could not read ${packageJsonPath}: ${getErrorMessage(error)}`);
    return FALLBACK_VERSION;
  }
}

export const VERSION = readPackageVersion();
