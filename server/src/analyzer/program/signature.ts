import type { MethodSignature } from './types.js';

// <pkg.Class: returnType name(T1,T2)> as printed by JVM analysis tools
const JVM_SIGNATURE_PATTERN = /^<([^:<>\s]+):\s*\S+\s+([^\s(]+)\((.*)\)>$/u;

function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i]!;
    if (ch === '<' || ch === '(' || ch === '[' || ch === '{') depth += 1;
    else if ((ch === '>' && text[i - 1] !== '=') || ch === ')' || ch === ']' || ch === '}') depth -= 1;

    if (ch === ',' && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

function normalizeTypeText(typeText: string): string {
  return typeText.replace(/\s+/gu, '');
}

export function parseMethodSignature(text: string): MethodSignature | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const jvm = JVM_SIGNATURE_PATTERN.exec(trimmed);
  if (jvm) {
    return {
      className: jvm[1]!,
      methodName: jvm[2]!,
      parameterTypes: splitTopLevel(jvm[3]!),
    };
  }

  const openParen = trimmed.indexOf('(');
  let head = trimmed;
  let parameterTypes: string[] | null = null;
  if (openParen >= 0) {
    if (!trimmed.endsWith(')')) return null;
    head = trimmed.slice(0, openParen);
    parameterTypes = splitTopLevel(trimmed.slice(openParen + 1, -1));
  }

  const dot = head.lastIndexOf('.');
  if (dot <= 0 || dot === head.length - 1) return null;
  return {
    className: head.slice(0, dot),
    methodName: head.slice(dot + 1),
    parameterTypes,
  };
}

export function formatMethodKey(signature: MethodSignature): string {
  const base = `${signature.className}.${signature.methodName}`;
  if (signature.parameterTypes === null) return base;
  return `${base}(${signature.parameterTypes.map(normalizeTypeText).join(',')})`;
}

export function formatMethodSignature(signature: MethodSignature): string {
  const base = `${signature.className}.${signature.methodName}`;
  if (signature.parameterTypes === null) return base;
  return `${base}(${signature.parameterTypes.join(', ')})`;
}

export function parameterTypesCompatible(a: string[] | null, b: string[] | null): boolean {
  if (a === null || b === null) return true;
  if (a.length !== b.length) return false;
  return a.every((t, idx) => normalizeTypeText(t) === normalizeTypeText(b[idx]!));
}
