import fs from 'node:fs/promises';
import path from 'node:path';

import { DEFAULT_OUTPUT_ROOT } from './defaults.js';
import { ensureDir, writeJsonFile } from './io.js';
import { toPosixPath } from './walk.js';

export type RunRegistryEntry = {
  runId: string;
  outputDir: string; // relative to the repo root, posix separators
  entry?: { className: string; methodName: string };
};

const RUN_ID_PATTERN = /^[A-Za-z0-9._-]+$/u;

function errorCode(error: unknown): string | undefined {
  return error && typeof error === 'object' && 'code' in error ? (error as { code?: string }).code : undefined;
}

/**
 * Where analysis runs are written and how they are found again. One instance
 * is created by whoever starts an analysis and handed to it explicitly.
 */
export class RunRegistry {
  readonly repoRoot: string;
  readonly outputRoot: string;

  constructor(repoRoot: string, outputRoot: string = DEFAULT_OUTPUT_ROOT) {
    this.repoRoot = path.resolve(repoRoot);
    this.outputRoot = outputRoot;
  }

  private registryDir(): string {
    return path.resolve(this.repoRoot, this.outputRoot, '_runs');
  }

  outputDirFor(...segments: string[]): { abs: string; rel: string } {
    const rel = path.join(this.outputRoot, ...segments);
    return { abs: path.resolve(this.repoRoot, rel), rel: toPosixPath(rel) };
  }

  async list(): Promise<RunRegistryEntry[]> {
    const dir = this.registryDir();
    let names: string[] = [];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return [];
      throw error;
    }

    const items: Array<{ entry: RunRegistryEntry; mtimeMs: number }> = [];
    for (const name of names) {
      if (!name.endsWith('.json')) continue;
      if (name === 'latest.json') continue;

      const filePath = path.join(dir, name);
      try {
        const [text, stat] = await Promise.all([fs.readFile(filePath, 'utf8'), fs.stat(filePath)]);
        const parsed = JSON.parse(text) as Partial<RunRegistryEntry>;
        const runId =
          typeof parsed.runId === 'string' && parsed.runId.trim() ? parsed.runId.trim() : name.slice(0, -'.json'.length);
        const outputDir = typeof parsed.outputDir === 'string' ? parsed.outputDir : '';
        items.push({ entry: { runId, outputDir, entry: parsed.entry }, mtimeMs: stat.mtimeMs });
      } catch {
        // Broken registry files are left for the user to inspect; they are not listed.
        continue;
      }
    }

    items.sort((a, b) => b.mtimeMs - a.mtimeMs || b.entry.runId.localeCompare(a.entry.runId));
    return items.map((item) => item.entry);
  }

  async register(entry: RunRegistryEntry): Promise<void> {
    const dir = this.registryDir();
    await ensureDir(dir);
    await writeJsonFile(path.join(dir, `${entry.runId}.json`), entry);
    await writeJsonFile(path.join(dir, 'latest.json'), entry);
  }

  /** Output directory of `runId`, or of the latest run when omitted. */
  async resolveOutputDir(runId?: string): Promise<string> {
    if (runId !== undefined && !RUN_ID_PATTERN.test(runId)) throw new Error(`非法 runId=${runId}`);
    const fileName = runId ? `${runId}.json` : 'latest.json';

    let text: string;
    try {
      text = await fs.readFile(path.join(this.registryDir(), fileName), 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') throw new Error(runId ? `未知 runId=${runId}` : '尚无分析记录');
      throw error;
    }
    const entry = JSON.parse(text) as RunRegistryEntry;
    return path.resolve(this.repoRoot, entry.outputDir);
  }
}
