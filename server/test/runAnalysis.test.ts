import fs from 'node:fs/promises';
import path from 'node:path';
import { Writable } from 'node:stream';
import { beforeEach, describe, expect, it } from 'vitest';

import { parseEntryPointsCsv } from '../src/analyzer/entryPointsCsv.js';
import { AnalyzeRequestError } from '../src/analyzer/errors.js';
import { analyzeCallStack, printCallStack, runBatchAnalysis, runCallStackAnalysis } from '../src/analyzer/runAnalysis.js';
import { RunRegistry } from '../src/analyzer/runRegistry.js';
import { DIAMOND_SNAPSHOT, DIAMOND_TREE_TEXT, makeTmpDir } from './helpers.js';

let repoRoot: string;
let registry: RunRegistry;

beforeEach(async () => {
  repoRoot = await makeTmpDir('csx-run-');
  await fs.writeFile(path.join(repoRoot, 'demo.json'), JSON.stringify(DIAMOND_SNAPSHOT), 'utf8');
  registry = new RunRegistry(repoRoot);
});

describe('analyzeCallStack', () => {
  it('returns a notFound root for a missing entry class', async () => {
    const tree = await analyzeCallStack(path.join(repoRoot, 'demo.json'), 'NoSuch.Class', 'foo');
    expect(tree).toEqual({ kind: 'notFound', missing: 'class', name: 'NoSuch.Class', children: [] });
  });

  it('applies exploration options', async () => {
    const tree = await analyzeCallStack(path.join(repoRoot, 'demo.json'), 'demo.A', 'main', { maxDepth: 1 });
    expect(tree.children.map((c) => c.kind)).toEqual(['expanded', 'expanded']);
    expect(tree.children[0]?.children.map((c) => c.kind)).toEqual(['budgetExceeded']);
  });
});

describe('printCallStack', () => {
  it('writes the rendered tree to the given stream', async () => {
    const chunks: string[] = [];
    const out = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });

    const tree = await printCallStack(path.join(repoRoot, 'demo.json'), 'demo.A', 'main', {}, out);
    expect(chunks.join('')).toBe(DIAMOND_TREE_TEXT);
    expect(tree.kind).toBe('expanded');
  });
});

describe('runCallStackAnalysis', () => {
  it('persists the tree and registers the run', async () => {
    const stages: string[] = [];
    const result = await runCallStackAnalysis({ programPath: 'demo.json', className: 'demo.A', methodName: 'main' }, registry, {
      onProgress: (p) => stages.push(p.stage),
    });

    expect(stages).toEqual(['加载程序', '展开调用树']);
    expect(result.runId).toMatch(/^demo_\d{8}-\d{6}-\d{3}$/u);
    expect(result.outputDir).toBe(`output/demo/${result.runId.slice('demo_'.length)}`);
    expect(result.truncated).toBe(false);
    expect(result.counts.nodes).toBe(9);

    const outputDir = path.join(repoRoot, result.outputDir);
    expect(await fs.readFile(path.join(outputDir, 'calltree.txt'), 'utf8')).toBe(DIAMOND_TREE_TEXT);

    const csvLines = (await fs.readFile(path.join(outputDir, 'calltree.csv'), 'utf8')).split('\n');
    expect(csvLines[0]).toBe('\ufeffdepth,kind,label,key,line');
    expect(csvLines[1]).toBe('0,expanded,demo.A.main,demo.A.main,');
    expect(csvLines[5]).toBe(
      '3,externalUnresolved,java.io.PrintStream.println(java.lang.String) (external or unresolved),java.io.PrintStream.println(java.lang.String),',
    );

    const document = JSON.parse(await fs.readFile(path.join(outputDir, 'calltree.json'), 'utf8')) as {
      meta: { runId: string; entry: unknown; resolution: string; budget: unknown };
    };
    expect(document.meta.runId).toBe(result.runId);
    expect(document.meta.entry).toEqual({ className: 'demo.A', methodName: 'main' });
    expect(document.meta.resolution).toBe('first');
    expect(document.meta.budget).toEqual({ maxNodes: 100_000, maxDepth: 512 });

    expect(await registry.list()).toEqual([
      { runId: result.runId, outputDir: result.outputDir, entry: { className: 'demo.A', methodName: 'main' } },
    ]);
    expect(await registry.resolveOutputDir()).toBe(outputDir);
    expect(await registry.resolveOutputDir(result.runId)).toBe(outputDir);
  });

  it('marks runs cut by the budget as truncated', async () => {
    const result = await runCallStackAnalysis(
      { programPath: 'demo.json', className: 'demo.A', methodName: 'main', maxNodes: '1' },
      registry,
    );
    expect(result.truncated).toBe(true);
    expect(result.counts.budgetExceeded).toBe(2);
    expect(result.counts.nodes).toBe(3);
  });

  it('rejects invalid requests before loading anything', async () => {
    await expect(
      runCallStackAnalysis({ programPath: 'demo.json', className: 'demo.A' }, registry),
    ).rejects.toThrow(new AnalyzeRequestError('methodName 不能为空'));
    await expect(
      runCallStackAnalysis({ programPath: 'demo.json', className: 'demo.A', methodName: 'main', maxNodes: 'abc' }, registry),
    ).rejects.toThrow('maxNodes 必须是不小于 1 的数字');
    await expect(
      runCallStackAnalysis({ programPath: 'demo.json', className: 'demo.A', methodName: 'main', resolution: 'fuzzy' }, registry),
    ).rejects.toThrow('非法 resolution=fuzzy（可选 first / strict）');
    await expect(runCallStackAnalysis({ className: 'demo.A', methodName: 'main' }, registry)).rejects.toThrow(
      'programPath 不能为空',
    );
  });

  it('reports unknown runs', async () => {
    await expect(registry.resolveOutputDir()).rejects.toThrow('尚无分析记录');
    await expect(registry.resolveOutputDir('nope')).rejects.toThrow('未知 runId=nope');
    await expect(registry.resolveOutputDir('../etc')).rejects.toThrow('非法 runId=../etc');
  });
});

describe('runBatchAnalysis', () => {
  it('writes one numbered run per entry', async () => {
    const result = await runBatchAnalysis(
      {
        programPath: 'demo.json',
        entries: [
          { className: 'demo.A', methodName: 'main' },
          { className: 'demo.Nope', methodName: 'x' },
        ],
      },
      registry,
    );

    expect(result.runs.map((r) => r.runId.slice(-2))).toEqual(['_1', '_2']);
    expect(result.runs[1]?.outputDir.endsWith('/2')).toBe(true);
    expect(result.runs[1]?.counts.notFound).toBe(1);

    const second = result.runs[1];
    if (!second) return;
    const text = await fs.readFile(path.join(repoRoot, second.outputDir, 'calltree.txt'), 'utf8');
    expect(text).toBe('Class not found: demo.Nope\n');
    expect((await registry.list()).length).toBe(2);
  });

  it('needs at least one entry', async () => {
    await expect(runBatchAnalysis({ programPath: 'demo.json', entries: [] }, registry)).rejects.toThrow('入口列表为空');
  });
});

describe('parseEntryPointsCsv', () => {
  it('reads class and method columns and skips incomplete rows', () => {
    const text = '\ufeffclass,method\ndemo.A,main\n,skip\n demo.B , b \n';
    expect(parseEntryPointsCsv(text)).toEqual([
      { className: 'demo.A', methodName: 'main' },
      { className: 'demo.B', methodName: 'b' },
    ]);
  });

  it('rejects malformed CSV', () => {
    expect(() => parseEntryPointsCsv('class,method\n"demo.A,main\n')).toThrow('入口列表 CSV 解析失败');
  });
});
