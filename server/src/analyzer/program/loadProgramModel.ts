import type { Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { ProgramLoadError, asErrorText } from '../errors.js';
import { stripBom } from '../io.js';
import { buildProgramModel } from './programModel.js';
import { parseProgramSnapshot } from './snapshot.js';
import { loadTypeScriptProgram } from './tsProgramLoader.js';
import type { ProgramModel } from './types.js';

export type ProgramSourceKind = 'snapshot' | 'typescript';

export type LoadedProgram = {
  location: string; // absolute
  kind: ProgramSourceKind;
  model: ProgramModel;
};

async function loadSnapshotFile(filePath: string): Promise<ProgramModel> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ProgramLoadError(filePath, `读取失败：${asErrorText(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripBom(text)) as unknown;
  } catch (error) {
    throw new ProgramLoadError(filePath, `JSON 解析失败：${asErrorText(error)}`);
  }
  return buildProgramModel(parseProgramSnapshot(raw, filePath));
}

/**
 * Loads the program found at `location`: a snapshot `.json` file or a
 * directory of TypeScript sources. Any failure here aborts the analysis.
 */
export async function loadProgramModel(location: string): Promise<LoadedProgram> {
  const abs = path.resolve(location);

  let stat: Stats;
  try {
    stat = await fs.stat(abs);
  } catch {
    throw new ProgramLoadError(abs, '路径不存在或无法访问');
  }

  if (stat.isDirectory()) {
    try {
      return { location: abs, kind: 'typescript', model: await loadTypeScriptProgram(abs) };
    } catch (error) {
      if (error instanceof ProgramLoadError) throw error;
      throw new ProgramLoadError(abs, asErrorText(error));
    }
  }

  if (stat.isFile() && abs.toLowerCase().endsWith('.json')) {
    return { location: abs, kind: 'snapshot', model: await loadSnapshotFile(abs) };
  }

  throw new ProgramLoadError(abs, '仅支持程序快照 .json 文件或 TypeScript 源码目录');
}
