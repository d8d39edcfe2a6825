/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PACKAGE_NAME = '@codeshare/relay';

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string().min(1),
});

/**
 * Reads the relay version from package.json.
 */
export function getRelayVersion(): string {
  // - "../package.json" works when running from dist/ (compiled)
  // - "../../package.json" works when running from src/utils/ (development)
  const candidates = ['../package.json', '../../package.json'];

  for (const candidate of candidates) {
    const version = readVersion(fileURLToPath(new URL(candidate, import.meta.url)));
    if (version) {
      return version;
    }
  }
  return 'unknown';
}

function readVersion(packageJsonPath: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
  } catch {
    // Missing or unreadable; try the next location
    return undefined;
  }

  // Verify it's the correct package.json by checking the name
  const result = PackageJsonSchema.safeParse(parsed);
  if (result.success && result.data.name === PACKAGE_NAME) {
    return result.data.version;
  }
  return undefined;
}
