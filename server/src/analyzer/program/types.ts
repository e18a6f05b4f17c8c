export type MethodSignature = {
  className: string; // qualified name of the declaring class
  methodName: string;
  parameterTypes: string[] | null; // null when only the name is known
};

export type InvocationSite = {
  signatureText: string; // target signature as written at the call site
  line?: number; // 1-based line of the call in its file
  code?: string;
};

export type MethodDescriptor = {
  signature: MethodSignature;
  key: string;
  invocations: InvocationSite[];
  filePath?: string;
  line?: number;
};

export type ClassKind = 'class' | 'module';

export type ClassDescriptor = {
  qualifiedName: string;
  simpleName: string;
  kind: ClassKind; // 'module' groups the top-level functions of a source file
  filePath?: string;
  methods: MethodDescriptor[]; // declaration order
};

/**
 * Read-only view over a loaded program. Everything the explorer needs to know
 * about classes and call targets goes through this surface.
 */
export interface ProgramModel {
  findClass(qualifiedName: string): ClassDescriptor | null;
  findMethodByName(cls: ClassDescriptor, methodName: string): MethodDescriptor | null;
  findMethodsByName(cls: ClassDescriptor, methodName: string): MethodDescriptor[];
  resolveInvocation(site: InvocationSite): MethodDescriptor | null;
  listClasses(): ClassDescriptor[];
}

export type SnapshotCall = string | { signature: string; line?: number; code?: string };

export type SnapshotMethod = {
  name: string;
  parameterTypes?: string[];
  line?: number;
  calls: SnapshotCall[];
};

export type SnapshotClass = {
  name: string;
  file?: string;
  methods: SnapshotMethod[];
};

export type ProgramSnapshot = {
  classes: SnapshotClass[];
};
