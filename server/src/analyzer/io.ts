import fs from 'node:fs/promises';
import path from 'node:path';

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf8');
  return JSON.parse(text) as unknown;
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, text, 'utf8');
}

export function stripBom(s: string): string {
  return s.charCodeAt(0) === 0xfeff ? s.slice(1) : s;
}

export function escapeCsvCell(value: unknown): string {
  const raw = value === null || value === undefined ? '' : String(value);
  const needsQuoting = /[",\n\r]/.test(raw);
  if (!needsQuoting) return raw;
  return `"${raw.replaceAll('"', '""')}"`;
}

export async function writeCsvFile<Row extends object>(filePath: string, headers: string[], rows: Row[]): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const lines: string[] = [];
  lines.push(headers.map(escapeCsvCell).join(','));
  for (const row of rows) {
    const cells = new Map<string, unknown>(Object.entries(row));
    lines.push(headers.map((h) => escapeCsvCell(cells.get(h))).join(','));
  }
  const bom = '\ufeff';
  await fs.writeFile(filePath, `${bom}${lines.join('\n')}\n`, 'utf8');
}
