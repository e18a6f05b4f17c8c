import { ProgramLoadError } from '../errors.js';
import type { ProgramSnapshot, SnapshotCall, SnapshotClass, SnapshotMethod } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function optionalLine(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined;
}

function parseCall(raw: unknown, where: string, fail: (msg: string) => never): SnapshotCall {
  if (typeof raw === 'string' && raw.trim()) return raw.trim();
  if (isRecord(raw) && typeof raw.signature === 'string' && raw.signature.trim()) {
    const call: { signature: string; line?: number; code?: string } = { signature: raw.signature.trim() };
    const line = optionalLine(raw.line);
    if (line !== undefined) call.line = line;
    if (typeof raw.code === 'string') call.code = raw.code;
    return call;
  }
  return fail(`${where} 不是合法的调用（需要非空字符串或 { signature }）`);
}

function parseMethod(raw: unknown, where: string, fail: (msg: string) => never): SnapshotMethod {
  if (!isRecord(raw)) return fail(`${where} 必须是对象`);
  if (typeof raw.name !== 'string' || !raw.name.trim()) return fail(`${where}.name 不能为空`);

  const method: SnapshotMethod = { name: raw.name.trim(), calls: [] };
  if (raw.parameterTypes !== undefined) {
    if (!Array.isArray(raw.parameterTypes) || !raw.parameterTypes.every((t) => typeof t === 'string')) {
      return fail(`${where}.parameterTypes 必须是字符串数组`);
    }
    method.parameterTypes = raw.parameterTypes.map((t: string) => t.trim());
  }
  const line = optionalLine(raw.line);
  if (line !== undefined) method.line = line;

  const calls = raw.calls ?? [];
  if (!Array.isArray(calls)) return fail(`${where}.calls 必须是数组`);
  method.calls = calls.map((c, idx) => parseCall(c, `${where}.calls[${idx}]`, fail));
  return method;
}

function parseClass(raw: unknown, where: string, fail: (msg: string) => never): SnapshotClass {
  if (!isRecord(raw)) return fail(`${where} 必须是对象`);
  if (typeof raw.name !== 'string' || !raw.name.trim()) return fail(`${where}.name 不能为空`);
  const methods = raw.methods ?? [];
  if (!Array.isArray(methods)) return fail(`${where}.methods 必须是数组`);

  const cls: SnapshotClass = {
    name: raw.name.trim(),
    methods: methods.map((m, idx) => parseMethod(m, `${where}.methods[${idx}]`, fail)),
  };
  if (typeof raw.file === 'string' && raw.file.trim()) cls.file = raw.file.trim();
  return cls;
}

/**
 * Validates a program snapshot document, e.g. the JSON a bytecode tool
 * exported for a compiled program.
 */
export function parseProgramSnapshot(raw: unknown, location: string): ProgramSnapshot {
  const fail = (msg: string): never => {
    throw new ProgramLoadError(location, msg);
  };

  if (!isRecord(raw)) return fail('快照根节点必须是对象');
  if (!Array.isArray(raw.classes)) return fail('快照缺少 classes 数组');

  const classes = raw.classes.map((c, idx) => parseClass(c, `classes[${idx}]`, fail));
  const seen = new Set<string>();
  for (const c of classes) {
    if (seen.has(c.name)) fail(`类 ${c.name} 重复定义`);
    seen.add(c.name);
  }
  return { classes };
}
