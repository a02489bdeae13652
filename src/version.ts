import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

/**
 * Package version read from package.json, resolved relative to this file so it
 * works both from src/ (tsx) and dist/src/ (node). SERVICE_VERSION overrides.
 */
function readPackageVersion(relative: string): string | undefined {
  try {
    const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(new URL(relative, import.meta.url)), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  readPackageVersion('../package.json') ??
  readPackageVersion('../../package.json') ??
  '0.0.0';
