import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';

export type WalkOptions = {
  extensions?: string[];
  excludeSuffixes?: string[];
  ignoreDirNames?: string[];
};

export function toPosixPath(filePath: string): string {
  return filePath.replaceAll(path.sep, '/');
}

function matchesSuffix(name: string, suffixes: string[] | undefined): boolean {
  return Boolean(suffixes?.some((s) => name.endsWith(s)));
}

/** Files under rootDir, sorted by path so callers see a stable order. */
export async function walkFiles(rootDir: string, options: WalkOptions = {}): Promise<string[]> {
  const extensions = options.extensions?.map((e) => (e.startsWith('.') ? e : `.${e}`));
  const ignoreDirNames = new Set(options.ignoreDirNames ?? []);

  const results: string[] = [];
  const stack: string[] = [rootDir];

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) continue;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      // The root itself must be readable; unreadable subdirectories are skipped.
      if (current === rootDir) throw error;
      continue;
    }

    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (ignoreDirNames.has(entry.name)) continue;
        stack.push(fullPath);
        continue;
      }

      if (!entry.isFile()) continue;
      if (extensions && !matchesSuffix(entry.name, extensions)) continue;
      if (matchesSuffix(entry.name, options.excludeSuffixes)) continue;
      results.push(fullPath);
    }
  }

  return results.sort((a, b) => a.localeCompare(b));
}
