import { describe, expect, it } from 'vitest';

import { exploreCallTree } from '../src/analyzer/callTree/exploreCallTree.js';
import { flattenCallTree, renderCallTree, summarizeCallTree } from '../src/analyzer/callTree/renderCallTree.js';
import { VisitedPath } from '../src/analyzer/callTree/visitedPath.js';
import { DIAMOND_SNAPSHOT, DIAMOND_TREE_TEXT, modelOf } from './helpers.js';

function chainSnapshot(length: number): unknown {
  const methods = Array.from({ length }, (_, idx) => ({
    name: `m${idx}`,
    calls: idx + 1 < length ? [`demo.L.m${idx + 1}`] : [],
  }));
  return { classes: [{ name: 'demo.L', methods }] };
}

const OVERLOADS = {
  classes: [
    {
      name: 'demo.O',
      methods: [
        { name: 'put', parameterTypes: ['int'] },
        { name: 'put', parameterTypes: ['java.lang.String'] },
        { name: 'go', calls: ['demo.O.put'] },
      ],
    },
  ],
};

describe('VisitedPath', () => {
  it('shares prefixes without leaking between branches', () => {
    const base = VisitedPath.of('a').with('b');
    const left = base.with('c');
    const right = base.with('d');

    expect(left.has('c')).toBe(true);
    expect(left.has('d')).toBe(false);
    expect(right.has('c')).toBe(false);
    expect(base.has('c')).toBe(false);
    expect(right.has('a')).toBe(true);
    expect(VisitedPath.of('b').has('a')).toBe(false);
  });
});

describe('exploreCallTree', () => {
  it('cuts direct self-recursion', () => {
    const model = modelOf({ classes: [{ name: 'demo.A', methods: [{ name: 'f', calls: [{ signature: 'demo.A.f', line: 7 }] }] }] });
    const tree = exploreCallTree(model, 'demo.A', 'f');

    expect(renderCallTree(tree)).toBe('demo.A.f\n  demo.A.f (recursive call, stopping here)\n');
    expect(flattenCallTree(tree)).toEqual([
      { depth: 0, kind: 'expanded', label: 'demo.A.f', key: 'demo.A.f', line: '' },
      { depth: 1, kind: 'recursiveCut', label: 'demo.A.f (recursive call, stopping here)', key: 'demo.A.f', line: 7 },
    ]);
  });

  it('expands a shared callee under every path and cuts per path', () => {
    const tree = exploreCallTree(modelOf(DIAMOND_SNAPSHOT), 'demo.A', 'main');
    expect(renderCallTree(tree)).toBe(DIAMOND_TREE_TEXT);
    expect(summarizeCallTree(tree)).toEqual({
      nodes: 9,
      maxDepth: 3,
      expanded: 5,
      recursiveCut: 2,
      externalUnresolved: 2,
      notFound: 0,
      budgetExceeded: 0,
      ambiguous: 0,
    });
  });

  it('expands a method again when reached from another entry', () => {
    const tree = exploreCallTree(modelOf(DIAMOND_SNAPSHOT), 'demo.B', 'b');
    expect(renderCallTree(tree)).toBe(
      [
        'demo.B.b',
        '  demo.D.d',
        '    demo.A.main',
        '      demo.B.b (recursive call, stopping here)',
        '      demo.C.c',
        '        demo.D.d (recursive call, stopping here)',
        '    java.io.PrintStream.println(java.lang.String) (external or unresolved)',
        '',
      ].join('\n'),
    );
  });

  it('accepts a simple class name for the entry', () => {
    const tree = exploreCallTree(modelOf(DIAMOND_SNAPSHOT), 'A', 'main');
    expect(tree.kind).toBe('expanded');
    expect(renderCallTree(tree)).toBe(DIAMOND_TREE_TEXT);
  });

  it('reports a missing entry as a single node', () => {
    const model = modelOf(DIAMOND_SNAPSHOT);
    expect(renderCallTree(exploreCallTree(model, 'demo.Nope', 'main'))).toBe('Class not found: demo.Nope\n');
    expect(renderCallTree(exploreCallTree(model, 'demo.A', 'nope'))).toBe('Method not found: nope\n');
    expect(exploreCallTree(model, 'demo.A', 'nope')).toEqual({ kind: 'notFound', missing: 'method', name: 'nope', children: [] });
  });

  it('keeps call order and gives the same tree on every run', () => {
    const model = modelOf({
      classes: [
        { name: 'demo.S', methods: [{ name: 'run', calls: ['demo.S.c', 'x.Y.z', 'demo.S.a', 'demo.S.b'] }, { name: 'a' }, { name: 'b' }, { name: 'c' }] },
      ],
    });
    const first = exploreCallTree(model, 'demo.S', 'run');
    const second = exploreCallTree(model, 'demo.S', 'run');

    expect(renderCallTree(first)).toBe('demo.S.run\n  demo.S.c\n  x.Y.z (external or unresolved)\n  demo.S.a\n  demo.S.b\n');
    expect(second).toEqual(first);
    expect(renderCallTree(second)).toBe(renderCallTree(first));
  });

  it('stops at the depth budget', () => {
    const tree = exploreCallTree(modelOf(chainSnapshot(6)), 'demo.L', 'm0', { maxDepth: 2 });
    expect(renderCallTree(tree)).toBe(
      'demo.L.m0\n  demo.L.m1\n    demo.L.m2\n      demo.L.m3 (budget exceeded, stopping here)\n',
    );
  });

  it('stops at the node budget', () => {
    const tree = exploreCallTree(modelOf(chainSnapshot(6)), 'demo.L', 'm0', { maxNodes: 2 });
    expect(renderCallTree(tree)).toBe('demo.L.m0\n  demo.L.m1\n    demo.L.m2 (budget exceeded, stopping here)\n');
    expect(summarizeCallTree(tree).budgetExceeded).toBe(1);
  });

  it('still gives the remaining sites of expanded methods a leaf once the node budget is spent', () => {
    const model = modelOf({
      classes: [
        {
          name: 'demo.W',
          methods: [
            { name: 'main', calls: ['demo.W.a', 'demo.W.b', 'ext.X.y'] },
            { name: 'a', calls: [] },
            { name: 'b', calls: [] },
          ],
        },
      ],
    });
    const tree = exploreCallTree(model, 'demo.W', 'main', { maxNodes: 2 });

    expect(renderCallTree(tree)).toBe(
      [
        'demo.W.main',
        '  demo.W.a',
        '  demo.W.b (budget exceeded, stopping here)',
        '  ext.X.y (external or unresolved)',
        '',
      ].join('\n'),
    );
    expect(summarizeCallTree(tree)).toMatchObject({ nodes: 4, expanded: 2, budgetExceeded: 1, externalUnresolved: 1 });
  });

  it('walks long acyclic chains without exhausting the host stack', () => {
    const tree = exploreCallTree(modelOf(chainSnapshot(10_000)), 'demo.L', 'm0');
    const counts = summarizeCallTree(tree);
    expect(counts.nodes).toBe(10_000);
    expect(counts.maxDepth).toBe(9_999);
    expect(counts.expanded).toBe(10_000);
  });

  it('takes the first overload by default', () => {
    const tree = exploreCallTree(modelOf(OVERLOADS), 'demo.O', 'go');
    expect(renderCallTree(tree)).toBe('demo.O.go\n  demo.O.put\n');
    expect(tree.children[0]).toMatchObject({ kind: 'expanded', key: 'demo.O.put(int)' });
  });

  it('reports ambiguous call targets in strict mode', () => {
    const model = modelOf(OVERLOADS);
    const tree = exploreCallTree(model, 'demo.O', 'go', { resolution: 'strict' });

    expect(renderCallTree(tree)).toBe('demo.O.go\n  demo.O.put (ambiguous: 2 candidates)\n');
    expect(tree.children[0]).toEqual({
      kind: 'ambiguous',
      text: 'demo.O.put',
      candidates: ['demo.O.put(int)', 'demo.O.put(java.lang.String)'],
      line: undefined,
      children: [],
    });
    expect(renderCallTree(exploreCallTree(model, 'demo.O', 'put', { resolution: 'strict' }))).toBe(
      'demo.O.put (ambiguous: 2 candidates)\n',
    );
  });

  it('selects an overload by parameter types', () => {
    const tree = exploreCallTree(modelOf(OVERLOADS), 'demo.O', 'put(java.lang.String)', { resolution: 'strict' });
    expect(tree).toMatchObject({ kind: 'expanded', key: 'demo.O.put(java.lang.String)' });
  });

  it('leaves calls into unknown overloads unresolved', () => {
    const model = modelOf({
      classes: [
        {
          name: 'demo.P',
          methods: [{ name: 'put', parameterTypes: ['int'] }, { name: 'go', calls: ['demo.P.put(long)', 'demo.Q.put(int)'] }],
        },
      ],
    });
    expect(renderCallTree(exploreCallTree(model, 'demo.P', 'go'))).toBe(
      'demo.P.go\n  demo.P.put(long) (external or unresolved)\n  demo.Q.put(int) (external or unresolved)\n',
    );
  });
});
