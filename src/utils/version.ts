/**
 * Package version, read from package.json beside src/ or dist/
 */

import * as fs from 'fs';
import * as path from 'path';

let cachedVersion: string | null = null;

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  const pkgPath = path.join(__dirname, '..', '..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
  cachedVersion =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : '0.0.0';
  return cachedVersion;
}
