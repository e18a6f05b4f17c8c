import type { CallTreeCounts, CallTreeEntry, ResolutionMode } from './callTree/types.js';

export type AnalyzeRequest = {
  programPath?: string;
  className?: string;
  methodName?: string;
  resolution?: string;
  maxNodes?: number | string;
  maxDepth?: number | string;
};

export type BatchAnalyzeRequest = Omit<AnalyzeRequest, 'className' | 'methodName'> & {
  entries: CallTreeEntry[];
};

export type AnalyzeSettings = {
  programPath: string;
  resolution: ResolutionMode;
  maxNodes: number;
  maxDepth: number;
};

export type AnalyzeResponse = {
  runId: string;
  outputDir: string;
  entry: CallTreeEntry;
  truncated: boolean;
  counts: CallTreeCounts;
};

export type BatchAnalyzeResponse = {
  runs: AnalyzeResponse[];
};

export type AnalyzeProgress = {
  stage: string;
  percent: number;
};

export type AnalyzeHooks = {
  onProgress?: (p: AnalyzeProgress) => void;
};
