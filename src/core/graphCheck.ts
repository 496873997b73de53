import fs from 'fs-extra';
import path from 'path';
import { loadConfig } from './config';
import { sha256Hex } from './crypto';
import { listSourceFiles } from './files';
import { getDefaultRegistry } from './parser/registry';
import { graphPath } from './paths';
import { GraphDocumentSchema, graphFromDocument, SCHEMA_VERSION } from './symbolGraph';

export interface GraphCheckResult {
  ok: boolean;
  problems: string[];
  expected: { schemaVersion: number };
  found: {
    graphPath: string;
    schemaVersion: number | null;
    files: number;
    symbols: number;
  };
  /** Indexed files whose content changed since the last build. */
  stale: string[];
  /** Indexed files that no longer exist. */
  missing: string[];
  /** Source files the graph does not know. */
  untracked: string[];
  hint: string;
}

/** Freshness report of the persisted graph against the working tree. */
export function checkGraph(repoRoot: string): GraphCheckResult {
  const root = path.resolve(repoRoot);
  const file = graphPath(root);
  const problems: string[] = [];
  const result: GraphCheckResult = {
    ok: false,
    problems,
    expected: { schemaVersion: SCHEMA_VERSION },
    found: { graphPath: file, schemaVersion: null, files: 0, symbols: 0 },
    stale: [],
    missing: [],
    untracked: [],
    hint: '',
  };

  let raw: unknown = null;
  if (fs.existsSync(file)) {
    try {
      raw = fs.readJsonSync(file);
    } catch {
      problems.push('graph_unreadable');
    }
  } else {
    problems.push('missing_graph');
  }

  const parsed = raw === null ? null : GraphDocumentSchema.safeParse(raw);
  if (parsed && !parsed.success) problems.push('graph_invalid');
  const doc = parsed?.success ? parsed.data : null;

  if (doc) {
    result.found.schemaVersion = doc.schemaVersion;
    if (doc.schemaVersion !== SCHEMA_VERSION) {
      problems.push(`schema_version_mismatch(found=${doc.schemaVersion}, expected=${SCHEMA_VERSION})`);
    }
    const graph = graphFromDocument(doc);
    result.found.files = graph.fileTable.size;
    result.found.symbols = graph.crossRefs.size;

    const onDisk = listSourceFiles(root, getDefaultRegistry().extensions(), loadConfig(root));
    const known = new Set(graph.fileHash.keys());
    for (const rel of onDisk) {
      if (!known.has(rel)) {
        result.untracked.push(rel);
        continue;
      }
      known.delete(rel);
      try {
        if (sha256Hex(fs.readFileSync(path.join(root, rel))) !== graph.fileHash.get(rel)) result.stale.push(rel);
      } catch {
        result.stale.push(rel);
      }
    }
    result.missing = [...known].sort();
    if (result.stale.length || result.missing.length || result.untracked.length) problems.push('graph_out_of_date');
  }

  result.ok = problems.length === 0;
  result.hint = result.ok ? 'Graph is up to date.' : 'Run `refgraph index` to rebuild the cross-reference graph.';
  return result;
}
