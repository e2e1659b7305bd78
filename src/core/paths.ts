import fs from 'fs-extra';
import path from 'path';

export function findPackageRoot(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

/** Bundled corpus, query set, topics and stop words live in <package>/data. */
export function defaultDataDir(): string {
  const root = findPackageRoot(__dirname) ?? process.cwd();
  return path.join(root, 'data');
}

export function dataFile(name: string): string {
  return path.join(defaultDataDir(), name);
}

export function sanitizeSegment(s: string): string {
  return s.replace(/[^a-zA-Z0-9._-]+/g, '_').slice(0, 120);
}
