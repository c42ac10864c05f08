import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { errorMessage, logWarn } from './utils/logger.js';

// backend-api/package.json, one level above src/.
const packageJsonPath = fileURLToPath(new URL('../package.json', import.meta.url));

function readVersion(): string {
  try {
    const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (e) {
    logWarn('package.json unreadable', { path: packageJsonPath, error: errorMessage(e) });
    return '0.0.0';
  }
}

export const backendVersion = readVersion();
