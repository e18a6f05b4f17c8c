export const DEFAULT_OUTPUT_ROOT = 'output';

export const TS_SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts'];
export const TS_DECLARATION_SUFFIXES = ['.d.ts', '.d.mts', '.d.cts'];
export const SCAN_IGNORE_DIR_NAMES = ['node_modules', '.git', 'build', 'dist', 'out', 'coverage'];

// Applied by the CLI and API when the caller gives no budget; exploreCallTree itself is unbounded.
export const DEFAULT_MAX_NODES = 100_000;
export const DEFAULT_MAX_DEPTH = 512;

export const CALLTREE_FILES = {
  json: 'calltree.json',
  text: 'calltree.txt',
  csv: 'calltree.csv',
  meta: 'meta.json',
} as const;

export const CALLTREE_CSV_HEADERS = ['depth', 'kind', 'label', 'key', 'line'];

function readPositiveIntEnv(name: string): number | undefined {
  const raw = process.env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 1 ? Math.floor(value) : undefined;
}

export function resolveBudgetDefaults(): { maxNodes: number; maxDepth: number } {
  return {
    maxNodes: readPositiveIntEnv('CALL_STACK_MAX_NODES') ?? DEFAULT_MAX_NODES,
    maxDepth: readPositiveIntEnv('CALL_STACK_MAX_DEPTH') ?? DEFAULT_MAX_DEPTH,
  };
}

export function resolveOutputRoot(): string {
  return process.env.CALL_STACK_OUTPUT_ROOT?.trim() || DEFAULT_OUTPUT_ROOT;
}
