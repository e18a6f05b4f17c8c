import { formatMethodKey, parseMethodSignature } from './signature.js';
import type {
  ClassDescriptor,
  InvocationSite,
  MethodDescriptor,
  ProgramModel,
  ProgramSnapshot,
} from './types.js';

function simpleNameOf(qualifiedName: string): string {
  const dot = qualifiedName.lastIndexOf('.');
  return dot >= 0 ? qualifiedName.slice(dot + 1) : qualifiedName;
}

export class InMemoryProgramModel implements ProgramModel {
  private classesByName = new Map<string, ClassDescriptor>();
  private classesBySimpleName = new Map<string, ClassDescriptor[]>();
  private methodsByKey = new Map<string, MethodDescriptor>();

  constructor(classes: ClassDescriptor[]) {
    for (const cls of classes) {
      if (this.classesByName.has(cls.qualifiedName)) continue;
      this.classesByName.set(cls.qualifiedName, cls);
      const list = this.classesBySimpleName.get(cls.simpleName) ?? [];
      list.push(cls);
      this.classesBySimpleName.set(cls.simpleName, list);

      for (const method of cls.methods) {
        // Keep the first declaration when two members share a key.
        if (!this.methodsByKey.has(method.key)) this.methodsByKey.set(method.key, method);
      }
    }
  }

  findClass(qualifiedName: string): ClassDescriptor | null {
    const name = qualifiedName.trim();
    const exact = this.classesByName.get(name);
    if (exact) return exact;

    const bySimple = this.classesBySimpleName.get(name) ?? [];
    const classes = bySimple.filter((c) => c.kind === 'class');
    if (classes.length === 1) return classes[0]!;
    if (classes.length === 0 && bySimple.length === 1) return bySimple[0]!;
    return null;
  }

  findMethodByName(cls: ClassDescriptor, methodName: string): MethodDescriptor | null {
    return cls.methods.find((m) => m.signature.methodName === methodName) ?? null;
  }

  findMethodsByName(cls: ClassDescriptor, methodName: string): MethodDescriptor[] {
    return cls.methods.filter((m) => m.signature.methodName === methodName);
  }

  resolveInvocation(site: InvocationSite): MethodDescriptor | null {
    const signature = parseMethodSignature(site.signatureText);
    if (!signature) return null;
    return this.methodsByKey.get(formatMethodKey(signature)) ?? null;
  }

  listClasses(): ClassDescriptor[] {
    return Array.from(this.classesByName.values());
  }
}

export function buildProgramModel(snapshot: ProgramSnapshot): InMemoryProgramModel {
  const classes: ClassDescriptor[] = snapshot.classes.map((c) => ({
    qualifiedName: c.name,
    simpleName: simpleNameOf(c.name),
    kind: 'class',
    filePath: c.file,
    methods: c.methods.map((m) => {
      const signature = {
        className: c.name,
        methodName: m.name,
        parameterTypes: m.parameterTypes ?? null,
      };
      const invocations: InvocationSite[] = m.calls.map((call) =>
        typeof call === 'string'
          ? { signatureText: call }
          : { signatureText: call.signature, line: call.line, code: call.code },
      );
      return {
        signature,
        key: formatMethodKey(signature),
        invocations,
        filePath: c.file,
        line: m.line,
      };
    }),
  }));
  return new InMemoryProgramModel(classes);
}
