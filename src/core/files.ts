import { globSync } from 'glob';
import path from 'path';
import type { RefGraphConfig } from './config';
import { toPosixPath } from './paths';

function extensionGlob(extensions: readonly string[]): string {
  const bare = [...new Set(extensions.map(e => e.replace(/^\./, '')))].sort();
  if (bare.length === 1) return `**/*.${bare[0]}`;
  return `**/*.{${bare.join(',')}}`;
}

/**
 * Repository-relative posix paths of every source file with one of
 * `extensions`, outside the configured ignore directories and patterns,
 * sorted.
 */
export function listSourceFiles(repoRoot: string, extensions: readonly string[], config: RefGraphConfig): string[] {
  if (extensions.length === 0) return [];
  const ignore = [
    ...config.ignoreDirs.flatMap(dir => [`${dir}/**`, `**/${dir}/**`]),
    ...config.ignorePatterns,
  ];
  const files = globSync(extensionGlob(extensions), {
    cwd: path.resolve(repoRoot),
    nodir: true,
    dot: true,
    ignore,
  });
  return files.map(toPosixPath).sort();
}
