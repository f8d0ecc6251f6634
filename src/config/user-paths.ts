import path, { dirname } from 'path';
import { fileURLToPath } from 'url';
import fsExtra from 'fs-extra';

const { pathExistsSync } = fsExtra;

// Define __dirname for ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let packageRootCache: string | null = null;

/**
 * Nearest directory above this module holding a package.json.
 * From sources that is <root>/src/config -> <root>; from the build, <root>/dist/src/config -> <root>.
 */
export function getPackageRoot(): string {
  if (packageRootCache) {
    return packageRootCache;
  }

  let dir = __dirname;
  while (!pathExistsSync(path.join(dir, 'package.json'))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      // filesystem root reached; fall back to the layout of the sources
      return path.join(__dirname, '..', '..');
    }
    dir = parent;
  }

  packageRootCache = dir;
  return dir;
}
