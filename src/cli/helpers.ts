import path from 'path';
import fs from 'fs-extra';
import { DATA_DIR } from '../core/paths';
import type { CrossRefGraph } from '../core/types';
import { loadSymbolGraph } from '../core/symbolGraph';
import { error, ErrorHints, ErrorReasons, type CLIError } from './types';

export interface RepoContext {
  repoRoot: string;
  graph: CrossRefGraph;
}

/**
 * Walk up from `start` to the nearest directory holding `.refgraph` or
 * `.git`; without one, `start` itself is the root.
 */
export function findRepoRoot(start: string): string {
  const origin = path.resolve(start);
  let dir = origin;
  for (;;) {
    if (fs.existsSync(path.join(dir, DATA_DIR)) || fs.existsSync(path.join(dir, '.git'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return origin;
    dir = parent;
  }
}

/**
 * Resolve the repository root from a path inside it.
 *
 * @param startPath - Path inside the repository (default: '.')
 */
export function resolveRepoRoot(startPath: string = '.'): string | CLIError {
  const resolved = path.resolve(startPath);
  let stat: fs.Stats;
  try {
    stat = fs.statSync(resolved);
  } catch {
    return error(ErrorReasons.REPO_NOT_FOUND, {
      message: `${resolved} does not exist`,
      hint: ErrorHints.REPO_NOT_FOUND,
    });
  }
  return findRepoRoot(stat.isDirectory() ? resolved : path.dirname(resolved));
}

/**
 * Repository root plus its persisted graph. Fails with `graph_not_ready`
 * when nothing has been indexed yet.
 */
export function resolveRepoContext(startPath: string = '.'): RepoContext | CLIError {
  const repoRoot = resolveRepoRoot(startPath);
  if (typeof repoRoot !== 'string') return repoRoot;
  const graph = loadSymbolGraph(repoRoot);
  if (graph.fileTable.size === 0) {
    return error(ErrorReasons.GRAPH_NOT_READY, {
      message: `No cross-reference graph under ${path.join(repoRoot, DATA_DIR)}`,
      hint: ErrorHints.GRAPH_NOT_READY,
      repoRoot,
    });
  }
  return { repoRoot, graph };
}

/**
 * Format an error for CLI output
 *
 * @param code - Optional error code for categorization
 */
export function formatError(e: unknown, code?: string): CLIError {
  const err = e instanceof Error
    ? { name: e.name, message: e.message }
    : { message: String(e) };

  return {
    ok: false,
    reason: code || ErrorReasons.INTERNAL_ERROR,
    ...err,
  };
}
