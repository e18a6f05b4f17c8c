import { parameterTypesCompatible, parseMethodSignature } from '../program/signature.js';
import type { ClassDescriptor, InvocationSite, MethodDescriptor, ProgramModel } from '../program/types.js';
import type { ResolutionMode } from './types.js';

export type CalleeResolution =
  | { status: 'resolved'; method: MethodDescriptor }
  | { status: 'ambiguous'; candidates: MethodDescriptor[] }
  | { status: 'unresolved' };

export type EntryResolution =
  | { status: 'resolved'; cls: ClassDescriptor; method: MethodDescriptor }
  | { status: 'ambiguous'; cls: ClassDescriptor; candidates: MethodDescriptor[] }
  | { status: 'methodNotFound'; cls: ClassDescriptor }
  | { status: 'classNotFound' };

function pickCandidate(candidates: MethodDescriptor[], mode: ResolutionMode): CalleeResolution {
  if (candidates.length === 0) return { status: 'unresolved' };
  if (candidates.length === 1 || mode === 'first') return { status: 'resolved', method: candidates[0]! };
  return { status: 'ambiguous', candidates };
}

/**
 * Maps a call site to its target. Exact signature lookup first; a site whose
 * parameter list is missing (or does not match exactly) falls back to the
 * overloads of that name in the named class. In 'first' mode the first
 * declared overload wins, in 'strict' mode several candidates are reported.
 */
export function resolveCallee(program: ProgramModel, site: InvocationSite, mode: ResolutionMode = 'first'): CalleeResolution {
  const exact = program.resolveInvocation(site);
  if (exact) return { status: 'resolved', method: exact };

  const signature = parseMethodSignature(site.signatureText);
  if (!signature) return { status: 'unresolved' };

  const cls = program.findClass(signature.className);
  // Simple-name matches are for entry lookup only; call sites must name the class exactly.
  if (!cls || cls.qualifiedName !== signature.className) return { status: 'unresolved' };

  const candidates = program
    .findMethodsByName(cls, signature.methodName)
    .filter((m) => parameterTypesCompatible(m.signature.parameterTypes, signature.parameterTypes));
  return pickCandidate(candidates, mode);
}

/**
 * Resolves the entry point. `methodSpec` is a bare name (`login`) or a name
 * with parameter types (`login(string, number)`).
 */
export function resolveEntry(
  program: ProgramModel,
  className: string,
  methodSpec: string,
  mode: ResolutionMode = 'first',
): EntryResolution {
  const cls = program.findClass(className);
  if (!cls) return { status: 'classNotFound' };

  const signature = parseMethodSignature(`${cls.qualifiedName}.${methodSpec.trim()}`);
  if (!signature || signature.className !== cls.qualifiedName) return { status: 'methodNotFound', cls };

  if (signature.parameterTypes === null && mode === 'first') {
    const method = program.findMethodByName(cls, signature.methodName);
    return method ? { status: 'resolved', cls, method } : { status: 'methodNotFound', cls };
  }

  const candidates = program
    .findMethodsByName(cls, signature.methodName)
    .filter((m) => parameterTypesCompatible(m.signature.parameterTypes, signature.parameterTypes));
  const picked = pickCandidate(candidates, mode);
  if (picked.status === 'resolved') return { status: 'resolved', cls, method: picked.method };
  if (picked.status === 'ambiguous') return { status: 'ambiguous', cls, candidates: picked.candidates };
  return { status: 'methodNotFound', cls };
}
