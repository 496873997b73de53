import path from 'path';

/** Repo-local directory holding the persisted graph and configuration. */
export const DATA_DIR = '.refgraph';
export const GRAPH_FILE = 'graph.json';
export const CONFIG_FILE = 'config.json';
export const IGNORE_FILE = '.refgraphignore';

export function toPosixPath(p: string): string {
  return String(p).replace(/\\/g, '/');
}

export function dataDir(repoRoot: string): string {
  return path.join(repoRoot, DATA_DIR);
}

export function graphPath(repoRoot: string): string {
  return path.join(dataDir(repoRoot), GRAPH_FILE);
}

export function configPath(repoRoot: string): string {
  return path.join(dataDir(repoRoot), CONFIG_FILE);
}

/**
 * Resolve a repository-relative path, refusing anything that escapes the root.
 * Returns null for an escaping path.
 */
export function resolveInsideRepo(repoRoot: string, relPath: string): string | null {
  const root = path.resolve(repoRoot);
  const resolved = path.resolve(root, relPath);
  if (resolved !== root && !resolved.startsWith(root + path.sep)) return null;
  return resolved;
}

export function toRepoRelative(repoRoot: string, absPath: string): string {
  return toPosixPath(path.relative(path.resolve(repoRoot), absPath));
}
