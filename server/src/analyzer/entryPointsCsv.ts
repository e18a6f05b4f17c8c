import fs from 'node:fs/promises';
import { parse } from 'csv-parse/sync';

import { AnalyzeRequestError, asErrorText } from './errors.js';
import { stripBom } from './io.js';
import type { CallTreeEntry } from './callTree/types.js';

type EntryRow = { class?: string; method?: string };

/**
 * Reads a batch of entry points from a CSV file with `class` and `method`
 * columns. Rows missing either cell are skipped.
 */
export async function loadEntryPointsCsv(filePath: string): Promise<CallTreeEntry[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new AnalyzeRequestError(`入口列表读取失败：${asErrorText(error)}`);
  }
  return parseEntryPointsCsv(text);
}

export function parseEntryPointsCsv(text: string): CallTreeEntry[] {
  let rows: EntryRow[];
  try {
    rows = parse(stripBom(text), {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    }) as EntryRow[];
  } catch (error) {
    throw new AnalyzeRequestError(`入口列表 CSV 解析失败：${asErrorText(error)}`);
  }

  const entries: CallTreeEntry[] = [];
  for (const row of rows) {
    const className = row.class?.trim();
    const methodName = row.method?.trim();
    if (!className || !methodName) continue;
    entries.push({ className, methodName });
  }
  return entries;
}
