import type { MethodSignature } from '../program/types.js';
import type { CallTreeCounts, CallTreeNode, CallTreeRow } from './types.js';

const INDENT = '  ';

function methodLabel(signature: MethodSignature): string {
  return `${signature.className}.${signature.methodName}`;
}

export function labelOf(node: CallTreeNode): string {
  switch (node.kind) {
    case 'expanded':
      return methodLabel(node.signature);
    case 'recursiveCut':
      return `${methodLabel(node.signature)} (recursive call, stopping here)`;
    case 'budgetExceeded':
      return `${methodLabel(node.signature)} (budget exceeded, stopping here)`;
    case 'externalUnresolved':
      return `${node.text} (external or unresolved)`;
    case 'ambiguous':
      return `${node.text} (ambiguous: ${node.candidates.length} candidates)`;
    case 'notFound':
      return node.missing === 'class' ? `Class not found: ${node.name}` : `Method not found: ${node.name}`;
  }
}

function keyOf(node: CallTreeNode): string {
  if (node.kind === 'externalUnresolved' || node.kind === 'ambiguous') return node.text;
  if (node.kind === 'notFound') return node.name;
  return node.key;
}

/** Pre-order walk without recursion; visits children in order. */
function walkPreOrder(root: CallTreeNode, visit: (node: CallTreeNode, depth: number) => void): void {
  const stack: Array<{ node: CallTreeNode; depth: number }> = [{ node: root, depth: 0 }];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) continue;
    const { node, depth } = current;
    visit(node, depth);
    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      stack.push({ node: node.children[i]!, depth: depth + 1 });
    }
  }
}

/** One line per node, two spaces per level; every line ends with "\n". */
export function renderCallTree(root: CallTreeNode): string {
  const lines: string[] = [];
  walkPreOrder(root, (node, depth) => {
    lines.push(`${INDENT.repeat(depth)}${labelOf(node)}\n`);
  });
  return lines.join('');
}

export function flattenCallTree(root: CallTreeNode): CallTreeRow[] {
  const rows: CallTreeRow[] = [];
  walkPreOrder(root, (node, depth) => {
    rows.push({
      depth,
      kind: node.kind,
      label: labelOf(node),
      key: keyOf(node),
      line: node.kind !== 'notFound' && node.line !== undefined ? node.line : '',
    });
  });
  return rows;
}

export function summarizeCallTree(root: CallTreeNode): CallTreeCounts {
  const counts: CallTreeCounts = {
    nodes: 0,
    maxDepth: 0,
    expanded: 0,
    recursiveCut: 0,
    externalUnresolved: 0,
    notFound: 0,
    budgetExceeded: 0,
    ambiguous: 0,
  };
  walkPreOrder(root, (node, depth) => {
    counts.nodes += 1;
    counts[node.kind] += 1;
    if (depth > counts.maxDepth) counts.maxDepth = depth;
  });
  return counts;
}
