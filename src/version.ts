import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// package.json sits one level above both src/ and dist/
const PACKAGE_JSON = fileURLToPath(new URL('../package.json', import.meta.url));

export function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(PACKAGE_JSON, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Fall through to the placeholder below
  }
  return '0.0.0';
}
