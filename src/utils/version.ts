/**
 * Package version, read once from package.json.
 */

import * as fs from 'fs';
import * as path from 'path';

let cached: string | null = null;

export function getVersion(): string {
  if (cached !== null) return cached;
  // Same relative location from src/utils and dist/utils
  const packageJson = path.join(__dirname, '..', '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packageJson, 'utf8'));
    const version =
      typeof parsed === 'object' && parsed !== null && 'version' in parsed ? parsed.version : null;
    cached = typeof version === 'string' ? version : '0.0.0';
  } catch {
    cached = '0.0.0';
  }
  return cached;
}
