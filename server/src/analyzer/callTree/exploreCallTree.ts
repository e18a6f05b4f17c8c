import type { MethodDescriptor, ProgramModel } from '../program/types.js';
import { resolveCallee, resolveEntry } from './resolveMethod.js';
import type { CallTreeNode, ExpandedNode, ExploreOptions, ResolutionMode } from './types.js';
import { VisitedPath } from './visitedPath.js';

type Frame = {
  node: ExpandedNode;
  method: MethodDescriptor;
  nextSite: number;
  path: VisitedPath;
  depth: number;
};

type Budget = {
  maxNodes: number;
  maxDepth: number;
};

function normalizeLimit(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return Number.POSITIVE_INFINITY;
  return Math.max(1, Math.floor(value));
}

function expandedNode(method: MethodDescriptor, line?: number): ExpandedNode {
  return { kind: 'expanded', signature: method.signature, key: method.key, line, children: [] };
}

/**
 * Depth-first expansion of the calls reachable from `root`.
 *
 * Cycle detection is scoped to the current call chain: a method reached
 * through two different chains is expanded under both, and a callee is cut
 * only when it already sits on its own chain. Frames replace host recursion,
 * so deep acyclic chains do not hit the call-stack limit; children are still
 * appended in body order and subtrees are completed before later siblings.
 */
function expandFrom(program: ProgramModel, root: MethodDescriptor, mode: ResolutionMode, budget: Budget): ExpandedNode {
  const rootNode = expandedNode(root);
  let nodeCount = 1;
  const stack: Frame[] = [{ node: rootNode, method: root, nextSite: 0, path: VisitedPath.of(root.key), depth: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const site = frame?.method.invocations[frame.nextSite];
    if (!frame || !site) {
      stack.pop();
      continue;
    }
    frame.nextSite += 1;

    const resolution = resolveCallee(program, site, mode);
    let child: CallTreeNode;

    if (resolution.status === 'unresolved') {
      child = { kind: 'externalUnresolved', text: site.signatureText, line: site.line, children: [] };
    } else if (resolution.status === 'ambiguous') {
      child = {
        kind: 'ambiguous',
        text: site.signatureText,
        candidates: resolution.candidates.map((m) => m.key),
        line: site.line,
        children: [],
      };
    } else {
      const callee = resolution.method;
      if (frame.path.has(callee.key)) {
        child = { kind: 'recursiveCut', signature: callee.signature, key: callee.key, line: site.line, children: [] };
      } else if (nodeCount >= budget.maxNodes || frame.depth + 1 > budget.maxDepth) {
        child = { kind: 'budgetExceeded', signature: callee.signature, key: callee.key, line: site.line, children: [] };
      } else {
        const expanded = expandedNode(callee, site.line);
        frame.node.children.push(expanded);
        nodeCount += 1;
        stack.push({
          node: expanded,
          method: callee,
          nextSite: 0,
          path: frame.path.with(callee.key),
          depth: frame.depth + 1,
        });
        continue;
      }
    }

    frame.node.children.push(child);
    nodeCount += 1;
  }

  return rootNode;
}

/**
 * Builds the call tree of `entryClass.entryMethod`. A missing entry is a
 * result (a single notFound node), not an error.
 */
export function exploreCallTree(
  program: ProgramModel,
  entryClass: string,
  entryMethod: string,
  options: ExploreOptions = {},
): CallTreeNode {
  const mode = options.resolution ?? 'first';
  const entry = resolveEntry(program, entryClass, entryMethod, mode);

  if (entry.status === 'classNotFound') return { kind: 'notFound', missing: 'class', name: entryClass, children: [] };
  if (entry.status === 'methodNotFound') return { kind: 'notFound', missing: 'method', name: entryMethod, children: [] };
  if (entry.status === 'ambiguous') {
    return {
      kind: 'ambiguous',
      text: `${entry.cls.qualifiedName}.${entryMethod}`,
      candidates: entry.candidates.map((m) => m.key),
      children: [],
    };
  }

  return expandFrom(program, entry.method, mode, {
    maxNodes: normalizeLimit(options.maxNodes),
    maxDepth: normalizeLimit(options.maxDepth),
  });
}
