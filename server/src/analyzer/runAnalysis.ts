import path from 'node:path';

import { exploreCallTree } from './callTree/exploreCallTree.js';
import { flattenCallTree, renderCallTree, summarizeCallTree } from './callTree/renderCallTree.js';
import type {
  CallTreeDocument,
  CallTreeEntry,
  CallTreeNode,
  ExploreOptions,
  ResolutionMode,
} from './callTree/types.js';
import { CALLTREE_CSV_HEADERS, CALLTREE_FILES, resolveBudgetDefaults } from './defaults.js';
import { AnalyzeRequestError } from './errors.js';
import { writeCsvFile, writeJsonFile, writeTextFile } from './io.js';
import { loadProgramModel, type LoadedProgram } from './program/loadProgramModel.js';
import type { RunRegistry } from './runRegistry.js';
import { formatTimestampForDir } from './time.js';
import type {
  AnalyzeHooks,
  AnalyzeRequest,
  AnalyzeResponse,
  AnalyzeSettings,
  BatchAnalyzeRequest,
  BatchAnalyzeResponse,
} from './types.js';

function parseResolution(value: unknown): ResolutionMode {
  if (value === undefined || value === null || value === '') return 'first';
  if (value === 'first' || value === 'strict') return value;
  throw new AnalyzeRequestError(`非法 resolution=${String(value)}（可选 first / strict）`);
}

function parseLimit(value: unknown, label: string, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
  if (!Number.isFinite(n) || n < 1) throw new AnalyzeRequestError(`${label} 必须是不小于 1 的数字`);
  return Math.floor(n);
}

function requireText(value: unknown, label: string): string {
  const text = typeof value === 'string' ? value.trim() : '';
  if (!text) throw new AnalyzeRequestError(`${label} 不能为空`);
  return text;
}

export function normalizeAnalyzeSettings(req: Omit<AnalyzeRequest, 'className' | 'methodName'>): AnalyzeSettings {
  const defaults = resolveBudgetDefaults();
  return {
    programPath: requireText(req.programPath, 'programPath'),
    resolution: parseResolution(req.resolution),
    maxNodes: parseLimit(req.maxNodes, 'maxNodes', defaults.maxNodes),
    maxDepth: parseLimit(req.maxDepth, 'maxDepth', defaults.maxDepth),
  };
}

export function normalizeEntry(req: { className?: unknown; methodName?: unknown }): CallTreeEntry {
  return {
    className: requireText(req.className, 'className'),
    methodName: requireText(req.methodName, 'methodName'),
  };
}

function inferProgramName(location: string): string {
  const base = path.basename(location.replace(/[\\/]+$/u, '')).replace(/\.json$/iu, '');
  const safe = base.replace(/[^A-Za-z0-9._-]+/gu, '_').replace(/^[._]+/u, '');
  return safe || 'program';
}

/** Loads the program at `programLocation` and explores the entry method. */
export async function analyzeCallStack(
  programLocation: string,
  className: string,
  methodName: string,
  options: ExploreOptions = {},
): Promise<CallTreeNode> {
  const program = await loadProgramModel(programLocation);
  return exploreCallTree(program.model, className, methodName, options);
}

/** Same as analyzeCallStack, and writes the rendered tree to `out`. */
export async function printCallStack(
  programLocation: string,
  className: string,
  methodName: string,
  options: ExploreOptions = {},
  out: NodeJS.WritableStream = process.stdout,
): Promise<CallTreeNode> {
  const tree = await analyzeCallStack(programLocation, className, methodName, options);
  out.write(renderCallTree(tree));
  return tree;
}

export function buildCallTreeDocument(args: {
  runId: string;
  program: string;
  entry: CallTreeEntry;
  settings: AnalyzeSettings;
  root: CallTreeNode;
}): CallTreeDocument {
  const counts = summarizeCallTree(args.root);
  return {
    meta: {
      runId: args.runId,
      generatedAt: new Date().toISOString(),
      program: args.program,
      entry: args.entry,
      resolution: args.settings.resolution,
      budget: { maxNodes: args.settings.maxNodes, maxDepth: args.settings.maxDepth },
      truncated: counts.budgetExceeded > 0,
      counts,
    },
    root: args.root,
  };
}

async function exploreAndPersist(args: {
  registry: RunRegistry;
  program: LoadedProgram;
  settings: AnalyzeSettings;
  entry: CallTreeEntry;
  runId: string;
  outputSegments: string[];
}): Promise<AnalyzeResponse> {
  const root = exploreCallTree(args.program.model, args.entry.className, args.entry.methodName, {
    resolution: args.settings.resolution,
    maxNodes: args.settings.maxNodes,
    maxDepth: args.settings.maxDepth,
  });
  const document = buildCallTreeDocument({
    runId: args.runId,
    program: args.program.location,
    entry: args.entry,
    settings: args.settings,
    root,
  });

  const outputDir = args.registry.outputDirFor(...args.outputSegments);
  await writeJsonFile(path.join(outputDir.abs, CALLTREE_FILES.json), document);
  await writeTextFile(path.join(outputDir.abs, CALLTREE_FILES.text), renderCallTree(root));
  await writeCsvFile(path.join(outputDir.abs, CALLTREE_FILES.csv), CALLTREE_CSV_HEADERS, flattenCallTree(root));
  await writeJsonFile(path.join(outputDir.abs, CALLTREE_FILES.meta), {
    runId: args.runId,
    input: {
      programPath: args.settings.programPath,
      programKind: args.program.kind,
      className: args.entry.className,
      methodName: args.entry.methodName,
      resolution: args.settings.resolution,
      maxNodes: args.settings.maxNodes,
      maxDepth: args.settings.maxDepth,
    },
    scan: { classes: args.program.model.listClasses().length },
    counts: document.meta.counts,
  });

  await args.registry.register({ runId: args.runId, outputDir: outputDir.rel, entry: args.entry });

  return {
    runId: args.runId,
    outputDir: outputDir.rel,
    entry: args.entry,
    truncated: document.meta.truncated,
    counts: document.meta.counts,
  };
}

export async function runCallStackAnalysis(
  req: AnalyzeRequest,
  registry: RunRegistry,
  hooks: AnalyzeHooks = {},
): Promise<AnalyzeResponse> {
  const settings = normalizeAnalyzeSettings(req);
  const entry = normalizeEntry(req);

  hooks.onProgress?.({ stage: '加载程序', percent: 10 });
  const program = await loadProgramModel(path.resolve(registry.repoRoot, settings.programPath));

  hooks.onProgress?.({ stage: '展开调用树', percent: 50 });
  const programName = inferProgramName(program.location);
  const timestamp = formatTimestampForDir(new Date());
  return exploreAndPersist({
    registry,
    program,
    settings,
    entry,
    runId: `${programName}_${timestamp}`,
    outputSegments: [programName, timestamp],
  });
}

/** Loads the program once and persists one run per entry point. */
export async function runBatchAnalysis(
  req: BatchAnalyzeRequest,
  registry: RunRegistry,
  hooks: AnalyzeHooks = {},
): Promise<BatchAnalyzeResponse> {
  const settings = normalizeAnalyzeSettings(req);
  const entries = req.entries.map((e) => normalizeEntry(e));
  if (entries.length === 0) throw new AnalyzeRequestError('入口列表为空');

  hooks.onProgress?.({ stage: '加载程序', percent: 10 });
  const program = await loadProgramModel(path.resolve(registry.repoRoot, settings.programPath));
  const programName = inferProgramName(program.location);
  const timestamp = formatTimestampForDir(new Date());

  const runs: AnalyzeResponse[] = [];
  for (const [idx, entry] of entries.entries()) {
    const seq = String(idx + 1);
    hooks.onProgress?.({
      stage: `展开调用树 ${seq}/${entries.length}`,
      percent: 10 + Math.floor((80 * idx) / entries.length),
    });
    runs.push(
      await exploreAndPersist({
        registry,
        program,
        settings,
        entry,
        runId: `${programName}_${timestamp}_${seq}`,
        outputSegments: [programName, timestamp, seq],
      }),
    );
  }

  return { runs };
}
