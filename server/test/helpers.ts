import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { buildProgramModel } from '../src/analyzer/program/programModel.js';
import { parseProgramSnapshot } from '../src/analyzer/program/snapshot.js';
import type { ProgramModel } from '../src/analyzer/program/types.js';

// A calls B and C, both call D, and D calls back into A.
export const DIAMOND_SNAPSHOT = {
  classes: [
    { name: 'demo.A', methods: [{ name: 'main', calls: ['demo.B.b', 'demo.C.c'] }] },
    { name: 'demo.B', methods: [{ name: 'b', calls: ['demo.D.d'] }] },
    { name: 'demo.C', methods: [{ name: 'c', calls: ['demo.D.d'] }] },
    {
      name: 'demo.D',
      methods: [{ name: 'd', calls: ['demo.A.main', 'java.io.PrintStream.println(java.lang.String)'] }],
    },
  ],
};

export const DIAMOND_TREE_TEXT = [
  'demo.A.main',
  '  demo.B.b',
  '    demo.D.d',
  '      demo.A.main (recursive call, stopping here)',
  '      java.io.PrintStream.println(java.lang.String) (external or unresolved)',
  '  demo.C.c',
  '    demo.D.d',
  '      demo.A.main (recursive call, stopping here)',
  '      java.io.PrintStream.println(java.lang.String) (external or unresolved)',
  '',
].join('\n');

export function modelOf(snapshot: unknown): ProgramModel {
  return buildProgramModel(parseProgramSnapshot(snapshot, 'test.json'));
}

export async function makeTmpDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeFiles(rootDir: string, files: Record<string, string>): Promise<void> {
  for (const [rel, text] of Object.entries(files)) {
    const filePath = path.join(rootDir, rel);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, text, 'utf8');
  }
}
