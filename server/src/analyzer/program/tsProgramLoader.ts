import path from 'node:path';
import ts from 'typescript';

import { SCAN_IGNORE_DIR_NAMES, TS_DECLARATION_SUFFIXES, TS_SOURCE_EXTENSIONS } from '../defaults.js';
import { ProgramLoadError } from '../errors.js';
import { toPosixPath, walkFiles } from '../walk.js';
import { InMemoryProgramModel } from './programModel.js';
import { formatMethodKey, formatMethodSignature } from './signature.js';
import type { ClassDescriptor, InvocationSite, MethodDescriptor, MethodSignature } from './types.js';

type FunctionLike =
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.FunctionDeclaration
  | ts.ArrowFunction
  | ts.FunctionExpression;

type MemberInfo = {
  descriptor: MethodDescriptor;
  fn: FunctionLike;
  sourceFile: ts.SourceFile;
};

const TYPE_FORMAT_FLAGS = ts.TypeFormatFlags.NoTruncation;

function modulePathOf(rootDir: string, filePath: string): string {
  const rel = toPosixPath(path.relative(rootDir, filePath));
  return rel.replace(/\.[^./]+$/u, '').split('/').filter(Boolean).join('.');
}

function getLineTextAt(sourceFile: ts.SourceFile, line1Based: number): string {
  const lines = sourceFile.text.split(/\r?\n/u);
  const idx = line1Based - 1;
  if (idx < 0 || idx >= lines.length) return '';
  return lines[idx]!.trim();
}

function lineOf(sourceFile: ts.SourceFile, node: ts.Node): number {
  return sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;
}

function nameText(name: ts.Node | undefined): string | null {
  if (!name) return null;
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return null;
}

function isAbstract(node: ts.Node): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return (ts.getModifiers(node) ?? []).some((m) => m.kind === ts.SyntaxKind.AbstractKeyword);
}

function isFunctionInitializer(node: ts.Expression | undefined): node is ts.ArrowFunction | ts.FunctionExpression {
  return node !== undefined && (ts.isArrowFunction(node) || ts.isFunctionExpression(node));
}

function parameterTypesOf(checker: ts.TypeChecker, fn: FunctionLike): string[] {
  return fn.parameters
    .filter((p) => nameText(p.name) !== 'this')
    .map((p) => checker.typeToString(checker.getTypeAtLocation(p), p, TYPE_FORMAT_FLAGS));
}

/**
 * Calls of a member body in evaluation order: receiver and arguments are
 * visited before the call that consumes them. Nested functions and classes
 * are separate units and are not descended into.
 */
function collectCallNodes(body: ts.Node): Array<ts.CallExpression | ts.NewExpression> {
  const calls: Array<ts.CallExpression | ts.NewExpression> = [];
  const visit = (node: ts.Node): void => {
    if (ts.isFunctionLike(node) || ts.isClassLike(node)) return;
    ts.forEachChild(node, visit);
    if (ts.isCallExpression(node) || ts.isNewExpression(node)) calls.push(node);
  };
  visit(body);
  return calls;
}

function containerNameOf(decl: ts.Node): string | null {
  const parent = decl.parent;
  if (!parent) return null;
  if ((ts.isClassLike(parent) || ts.isInterfaceDeclaration(parent)) && parent.name) return parent.name.text;
  if (ts.isModuleBlock(parent)) return nameText(parent.parent.name);
  if (ts.isVariableDeclaration(parent)) return nameText(parent.name);
  return null;
}

class TypeScriptProgramReader {
  private checker: ts.TypeChecker;
  private textByDeclaration = new Map<ts.Node, string>();
  private members: MemberInfo[] = [];
  private classes: ClassDescriptor[] = [];

  constructor(
    private rootDir: string,
    private program: ts.Program,
    private rootFiles: Set<string>,
  ) {
    this.checker = program.getTypeChecker();
  }

  read(): ClassDescriptor[] {
    for (const sourceFile of this.program.getSourceFiles()) {
      if (!this.rootFiles.has(path.resolve(sourceFile.fileName))) continue;
      this.readSourceFile(sourceFile);
    }
    this.assertUniqueNames();
    for (const member of this.members) {
      member.descriptor.invocations.push(...this.readInvocations(member));
    }
    return this.classes;
  }

  private readSourceFile(sourceFile: ts.SourceFile): void {
    const modulePath = modulePathOf(this.rootDir, sourceFile.fileName);
    const fileRel = toPosixPath(path.relative(this.rootDir, sourceFile.fileName));

    const moduleClass: ClassDescriptor = {
      qualifiedName: modulePath,
      simpleName: path.basename(modulePath.replaceAll('.', '/')),
      kind: 'module',
      filePath: fileRel,
      methods: [],
    };

    const visitClass = (node: ts.ClassDeclaration): void => {
      const className = nameText(node.name);
      if (!className) return;
      const cls: ClassDescriptor = {
        qualifiedName: `${modulePath}.${className}`,
        simpleName: className,
        kind: 'class',
        filePath: fileRel,
        methods: [],
      };
      this.readClassMembers(node, cls, sourceFile);
      this.classes.push(cls);
    };

    // Overload signatures share the implementation's identity.
    const overloads = new Map<string, ts.Node[]>();
    for (const stmt of sourceFile.statements) {
      if (!ts.isFunctionDeclaration(stmt) || stmt.body) continue;
      const name = nameText(stmt.name);
      if (!name) continue;
      overloads.set(name, [...(overloads.get(name) ?? []), stmt]);
    }

    for (const stmt of sourceFile.statements) {
      if (ts.isClassDeclaration(stmt)) {
        visitClass(stmt);
        continue;
      }

      if (ts.isFunctionDeclaration(stmt) && stmt.body) {
        const name = nameText(stmt.name);
        if (name) this.addMember(moduleClass, name, stmt, [stmt, ...(overloads.get(name) ?? [])], sourceFile);
        continue;
      }

      if (ts.isVariableStatement(stmt)) {
        for (const decl of stmt.declarationList.declarations) {
          const name = nameText(decl.name);
          if (!name || !isFunctionInitializer(decl.initializer)) continue;
          this.addMember(moduleClass, name, decl.initializer, [decl.initializer], sourceFile);
        }
      }
    }

    if (moduleClass.methods.length > 0) this.classes.push(moduleClass);
  }

  private assertUniqueNames(): void {
    const fileByName = new Map<string, string>();
    for (const cls of this.classes) {
      const seen = fileByName.get(cls.qualifiedName);
      if (seen !== undefined) {
        throw new ProgramLoadError(this.rootDir, `限定名 ${cls.qualifiedName} 重复（${seen}、${cls.filePath ?? ''}）`);
      }
      fileByName.set(cls.qualifiedName, cls.filePath ?? '');
    }
  }

  private readClassMembers(node: ts.ClassDeclaration, cls: ClassDescriptor, sourceFile: ts.SourceFile): void {
    // Overload signatures share the implementation's identity.
    const overloads = new Map<string, ts.Node[]>();
    for (const member of node.members) {
      if ((ts.isMethodDeclaration(member) || ts.isConstructorDeclaration(member)) && !member.body && !isAbstract(member)) {
        const name = ts.isConstructorDeclaration(member) ? 'constructor' : nameText(member.name);
        if (!name) continue;
        const list = overloads.get(name) ?? [];
        list.push(member);
        overloads.set(name, list);
      }
    }

    for (const member of node.members) {
      if (ts.isConstructorDeclaration(member)) {
        if (!member.body) continue;
        this.addMember(cls, 'constructor', member, [member, ...(overloads.get('constructor') ?? [])], sourceFile);
        continue;
      }

      if (ts.isMethodDeclaration(member)) {
        const name = nameText(member.name);
        if (!name) continue;
        if (!member.body && !isAbstract(member)) continue;
        this.addMember(cls, name, member, [member, ...(member.body ? (overloads.get(name) ?? []) : [])], sourceFile);
        continue;
      }

      if (ts.isPropertyDeclaration(member) && isFunctionInitializer(member.initializer)) {
        const name = nameText(member.name);
        if (!name) continue;
        this.addMember(cls, name, member.initializer, [member.initializer, member], sourceFile);
      }
    }
  }

  private addMember(
    cls: ClassDescriptor,
    methodName: string,
    fn: FunctionLike,
    declarations: ts.Node[],
    sourceFile: ts.SourceFile,
  ): void {
    const signature: MethodSignature = {
      className: cls.qualifiedName,
      methodName,
      parameterTypes: parameterTypesOf(this.checker, fn),
    };
    const descriptor: MethodDescriptor = {
      signature,
      key: formatMethodKey(signature),
      invocations: [],
      filePath: cls.filePath,
      line: lineOf(sourceFile, fn),
    };
    cls.methods.push(descriptor);
    this.members.push({ descriptor, fn, sourceFile });

    const text = formatMethodSignature(signature);
    for (const decl of declarations) this.textByDeclaration.set(decl, text);
  }

  private readInvocations(member: MemberInfo): InvocationSite[] {
    const body = member.fn.body;
    if (!body) return [];

    return collectCallNodes(body).map((call) => {
      const line = lineOf(member.sourceFile, call);
      return {
        signatureText: this.describeCallTarget(call, member.sourceFile),
        line,
        code: getLineTextAt(member.sourceFile, line),
      };
    });
  }

  private describeCallTarget(call: ts.CallExpression | ts.NewExpression, sourceFile: ts.SourceFile): string {
    const resolved = this.checker.getResolvedSignature(call);
    const decl = resolved?.declaration;
    if (decl) {
      const known = this.textByDeclaration.get(decl);
      if (known) return known;
    }

    // Chained callees may span lines; labels are single-line.
    const calleeText = call.expression.getText(sourceFile).replace(/\s+/gu, '');
    if (!resolved || !decl || ts.isJSDocSignature(decl)) return calleeText;

    const parameterTypes = resolved
      .getParameters()
      .map((p) => this.checker.typeToString(this.checker.getTypeOfSymbolAtLocation(p, call), call, TYPE_FORMAT_FLAGS));

    if (ts.isNewExpression(call)) {
      return formatMethodSignature({ className: calleeText, methodName: 'constructor', parameterTypes });
    }

    const methodName = nameText(ts.getNameOfDeclaration(decl));
    const container = containerNameOf(decl);
    if (!methodName || !container) return calleeText;
    return formatMethodSignature({ className: container, methodName, parameterTypes });
  }
}

export async function loadTypeScriptProgram(rootDir: string): Promise<InMemoryProgramModel> {
  const rootAbs = path.resolve(rootDir);
  const files = await walkFiles(rootAbs, {
    extensions: TS_SOURCE_EXTENSIONS,
    excludeSuffixes: TS_DECLARATION_SUFFIXES,
    ignoreDirNames: SCAN_IGNORE_DIR_NAMES,
  });

  if (files.length === 0) {
    throw new ProgramLoadError(rootDir, '目录中没有 TypeScript 源文件');
  }

  const program = ts.createProgram(files, {
    noEmit: true,
    allowJs: false,
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.ESNext,
    moduleResolution: ts.ModuleResolutionKind.Bundler,
    jsx: ts.JsxEmit.Preserve,
    skipLibCheck: true,
    strict: true,
  });

  const reader = new TypeScriptProgramReader(rootAbs, program, new Set(files.map((f) => path.resolve(f))));
  return new InMemoryProgramModel(reader.read());
}
