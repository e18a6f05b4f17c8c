#!/usr/bin/env node
/**
 * call-stack: prints the static call tree of a method.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { exploreCallTree } from './analyzer/callTree/exploreCallTree.js';
import { renderCallTree } from './analyzer/callTree/renderCallTree.js';
import { CALLTREE_FILES, resolveOutputRoot } from './analyzer/defaults.js';
import { loadEntryPointsCsv } from './analyzer/entryPointsCsv.js';
import { asErrorText } from './analyzer/errors.js';
import { loadProgramModel } from './analyzer/program/loadProgramModel.js';
import { formatMethodSignature } from './analyzer/program/signature.js';
import { RunRegistry } from './analyzer/runRegistry.js';
import {
  buildCallTreeDocument,
  normalizeAnalyzeSettings,
  normalizeEntry,
  runBatchAnalysis,
  runCallStackAnalysis,
} from './analyzer/runAnalysis.js';
import type { AnalyzeProgress } from './analyzer/types.js';

type AnalyzeOptions = {
  json?: boolean;
  save?: boolean;
  strict?: boolean;
  maxNodes?: string;
  maxDepth?: string;
};

type BatchOptions = Omit<AnalyzeOptions, 'json' | 'save'>;

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const pkg = JSON.parse(readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8')) as { version?: string };

function createRegistry(): RunRegistry {
  return new RunRegistry(process.cwd(), resolveOutputRoot());
}

function progressToStderr(p: AnalyzeProgress): void {
  console.error(`[${String(p.percent).padStart(3)}%] ${p.stage}`);
}

const program = new Command();

program.name('call-stack').description('Static call tree explorer').version(pkg.version ?? '0.0.0');

program
  .command('analyze')
  .description('Print the call tree of <class>.<method>')
  .argument('<program>', 'program snapshot (.json) or TypeScript source directory')
  .argument('<class>', 'qualified or simple class name')
  .argument('<method>', 'method name, optionally with parameter types')
  .option('-j, --json', 'print the call tree document as JSON')
  .option('-s, --save', 'persist the run under the output root')
  .option('--strict', 'report ambiguous call targets instead of taking the first match')
  .option('--max-nodes <n>', 'stop expanding after this many nodes')
  .option('--max-depth <n>', 'stop expanding below this depth')
  .action(async (programPath: string, className: string, methodName: string, options: AnalyzeOptions) => {
    const request = {
      programPath,
      className,
      methodName,
      resolution: options.strict ? 'strict' : 'first',
      maxNodes: options.maxNodes,
      maxDepth: options.maxDepth,
    };

    if (options.save) {
      const registry = createRegistry();
      const result = await runCallStackAnalysis(request, registry, { onProgress: progressToStderr });
      const outputDir = path.resolve(registry.repoRoot, result.outputDir);
      const file = options.json ? CALLTREE_FILES.json : CALLTREE_FILES.text;
      process.stdout.write(await fs.readFile(path.join(outputDir, file), 'utf8'));
      console.error(`saved ${result.runId} -> ${result.outputDir}`);
      return;
    }

    const settings = normalizeAnalyzeSettings(request);
    const entry = normalizeEntry(request);
    const loaded = await loadProgramModel(settings.programPath);
    const root = exploreCallTree(loaded.model, entry.className, entry.methodName, settings);

    if (options.json) {
      const document = buildCallTreeDocument({ runId: '', program: loaded.location, entry, settings, root });
      console.log(JSON.stringify(document, null, 2));
      return;
    }
    process.stdout.write(renderCallTree(root));
  });

program
  .command('batch')
  .description('Persist one call tree per row of a CSV file with class,method columns')
  .argument('<program>', 'program snapshot (.json) or TypeScript source directory')
  .argument('<entries>', 'CSV file of entry points')
  .option('--strict', 'report ambiguous call targets instead of taking the first match')
  .option('--max-nodes <n>', 'stop expanding after this many nodes')
  .option('--max-depth <n>', 'stop expanding below this depth')
  .action(async (programPath: string, entriesPath: string, options: BatchOptions) => {
    const entries = await loadEntryPointsCsv(entriesPath);
    const result = await runBatchAnalysis(
      {
        programPath,
        entries,
        resolution: options.strict ? 'strict' : 'first',
        maxNodes: options.maxNodes,
        maxDepth: options.maxDepth,
      },
      createRegistry(),
      { onProgress: progressToStderr },
    );

    for (const run of result.runs) {
      const flag = run.truncated ? ' (truncated)' : '';
      console.log(`${run.runId}\t${run.entry.className}.${run.entry.methodName}\t${run.counts.nodes} nodes${flag}\t${run.outputDir}`);
    }
  });

program
  .command('classes')
  .description('List the classes and methods of a program')
  .argument('<program>', 'program snapshot (.json) or TypeScript source directory')
  .action(async (programPath: string) => {
    const loaded = await loadProgramModel(programPath);
    for (const cls of loaded.model.listClasses()) {
      console.log(cls.kind === 'module' ? `${cls.qualifiedName} (module)` : cls.qualifiedName);
      for (const method of cls.methods) {
        console.log(`  ${formatMethodSignature(method.signature)}`);
      }
    }
  });

program
  .command('runs')
  .description('List persisted runs, newest first')
  .action(async () => {
    const runs = await createRegistry().list();
    if (runs.length === 0) {
      console.error('No runs yet.');
      return;
    }
    for (const run of runs) {
      const entry = run.entry ? `${run.entry.className}.${run.entry.methodName}` : '-';
      console.log(`${run.runId}\t${entry}\t${run.outputDir}`);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${asErrorText(error)}`);
  process.exitCode = 1;
});
