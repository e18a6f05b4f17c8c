import type { MethodSignature } from '../program/types.js';

export type CallTreeNodeKind =
  | 'expanded'
  | 'recursiveCut'
  | 'externalUnresolved'
  | 'notFound'
  | 'budgetExceeded'
  | 'ambiguous';

type CallSiteInfo = {
  line?: number; // line of the call in the caller, absent for the root
};

export type ExpandedNode = CallSiteInfo & {
  kind: 'expanded';
  signature: MethodSignature;
  key: string;
  children: CallTreeNode[];
};

export type RecursiveCutNode = CallSiteInfo & {
  kind: 'recursiveCut';
  signature: MethodSignature;
  key: string;
  children: [];
};

export type BudgetExceededNode = CallSiteInfo & {
  kind: 'budgetExceeded';
  signature: MethodSignature;
  key: string;
  children: [];
};

export type ExternalUnresolvedNode = CallSiteInfo & {
  kind: 'externalUnresolved';
  text: string; // call-site signature text as found in the body
  children: [];
};

export type AmbiguousNode = CallSiteInfo & {
  kind: 'ambiguous';
  text: string;
  candidates: string[]; // method keys, declaration order
  children: [];
};

export type NotFoundNode = {
  kind: 'notFound';
  missing: 'class' | 'method';
  name: string;
  children: [];
};

export type CallTreeNode =
  | ExpandedNode
  | RecursiveCutNode
  | BudgetExceededNode
  | ExternalUnresolvedNode
  | AmbiguousNode
  | NotFoundNode;

export type ResolutionMode = 'first' | 'strict';

export type ExploreOptions = {
  resolution?: ResolutionMode;
  maxNodes?: number; // callees are expanded only while the tree holds fewer nodes; later sites still get leaves
  maxDepth?: number; // deepest expanded node, root = 0
};

export type CallTreeCounts = Record<CallTreeNodeKind, number> & {
  nodes: number;
  maxDepth: number;
};

export type CallTreeEntry = {
  className: string;
  methodName: string;
};

export type CallTreeDocument = {
  meta: {
    runId: string;
    generatedAt: string;
    program: string;
    entry: CallTreeEntry;
    resolution: ResolutionMode;
    budget: { maxNodes: number | null; maxDepth: number | null };
    truncated: boolean;
    counts: CallTreeCounts;
  };
  root: CallTreeNode;
};

export type CallTreeRow = {
  depth: number;
  kind: CallTreeNodeKind;
  label: string;
  key: string;
  line: number | '';
};
