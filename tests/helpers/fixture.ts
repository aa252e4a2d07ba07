import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';

let counter = 0;

export function createFixture(name: string): string {
  const root = join(tmpdir(), `treescribe-test-${name}-${Date.now()}-${counter++}`);
  mkdirSync(root, { recursive: true });
  return root;
}

/**
 * Write files under `root`. Keys are POSIX relative paths; a key ending in
 * `/` creates an empty directory.
 */
export function writeFiles(root: string, files: Record<string, string | Uint8Array>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const path = join(root, ...relativePath.split('/'));
    if (relativePath.endsWith('/')) {
      mkdirSync(path, { recursive: true });
      continue;
    }
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }
}
