import fs from 'fs-extra';
import os from 'os';
import path from 'path';

process.env.REFGRAPH_LOG_LEVEL = 'silent';

/**
 * Temp repository holding `files` (relative path -> content). An empty
 * `.git` directory pins the repository root.
 */
export function createTempRepo(files: Record<string, string>, prefix = 'refgraph-'): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  fs.ensureDirSync(path.join(root, '.git'));
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    fs.ensureDirSync(path.dirname(abs));
    fs.writeFileSync(abs, content, 'utf-8');
  }
  return root;
}

export function readRepoFile(root: string, rel: string): string {
  return fs.readFileSync(path.join(root, rel), 'utf-8');
}

export function removeTempRepo(root: string): void {
  fs.removeSync(root);
}

/** Files of the query/rename/migration scenarios. */
export const GREET_FILES = {
  'a.py': 'def greet(name):\n    return "Hello " + name\n',
  'b.py': 'from a import greet\n\ngreet("x")\n',
} as const;
