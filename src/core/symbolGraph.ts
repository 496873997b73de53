import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { loadConfig, type RefGraphConfig } from './config';
import { sha256Hex } from './crypto';
import { listSourceFiles } from './files';
import { createLogger } from './log';
import { getDefaultRegistry, type ParserRegistry } from './parser/registry';
import { graphPath } from './paths';
import type { CrossRefGraph, FileSymbolTable, SymbolOccurrence } from './types';

export const SCHEMA_VERSION = 2;

const OccurrenceKindSchema = z.enum(['definition', 'call', 'ref', 'attr', 'store']);

const FileSymbolTableSchema = z.object({
  language: z.string(),
  confidence: z.enum(['exact-grammar', 'heuristic']),
  functions: z.array(z.object({
    name: z.string(),
    start: z.number().int(),
    end: z.number().int(),
    params: z.array(z.string()),
    signature: z.string(),
    doc: z.string(),
    decorators: z.array(z.string()),
    isAsync: z.boolean(),
    parent: z.string().optional(),
  })),
  classes: z.array(z.object({
    name: z.string(),
    start: z.number().int(),
    end: z.number().int(),
    bases: z.array(z.string()),
    methods: z.array(z.string()),
    doc: z.string(),
  })),
  variables: z.array(z.object({ name: z.string(), line: z.number().int(), valueRepr: z.string() })),
  imports: z.array(z.object({
    name: z.string(),
    source: z.string(),
    line: z.number().int(),
    kind: z.enum(['import', 'from', 'require', 'include']),
  })),
  assignments: z.array(z.object({ target: z.string(), line: z.number().int(), valueRepr: z.string() })),
  annotations: z.array(z.object({ name: z.string(), annotation: z.string(), line: z.number().int() })),
});

export const GraphDocumentSchema = z.object({
  schemaVersion: z.number().int(),
  files: z.record(z.object({ hash: z.string(), table: FileSymbolTableSchema })),
  /** `[name, occurrences]` pairs sorted by name; entries, not an object, so any name survives a round trip. */
  crossRefs: z.array(z.tuple([
    z.string(),
    z.array(z.object({
      file: z.string(),
      line: z.number().int(),
      kind: OccurrenceKindSchema,
    })),
  ])),
});

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;

export interface BuildOptions {
  /** Reuse cached tables of files whose hash is unchanged. Defaults to true. */
  incremental?: boolean;
  config?: RefGraphConfig;
  registry?: ParserRegistry;
}

export interface BuildStats {
  files: number;
  symbols: number;
  reindexed: number;
  skipped: number;
}

export function emptyGraph(): CrossRefGraph {
  return {
    schemaVersion: SCHEMA_VERSION,
    fileHash: new Map(),
    fileTable: new Map(),
    crossRefs: new Map(),
  };
}

/** Plain JSON form; keys are sorted so equal graphs serialize identically. */
export function graphToDocument(graph: CrossRefGraph): GraphDocument {
  const fileEntries: Array<[string, GraphDocument['files'][string]]> = [];
  for (const file of [...graph.fileTable.keys()].sort()) {
    const table = graph.fileTable.get(file);
    if (table) fileEntries.push([file, { hash: graph.fileHash.get(file) ?? '', table }]);
  }
  const files: GraphDocument['files'] = Object.fromEntries(fileEntries);
  const crossRefs = [...graph.crossRefs.keys()].sort().map((name): GraphDocument['crossRefs'][number] => [
    name,
    (graph.crossRefs.get(name) ?? []).map(o => ({ file: o.file, line: o.line, kind: o.kind })),
  ]);
  return { schemaVersion: graph.schemaVersion, files, crossRefs };
}

export function graphFromDocument(doc: GraphDocument): CrossRefGraph {
  const graph = emptyGraph();
  graph.schemaVersion = doc.schemaVersion;
  for (const [file, entry] of Object.entries(doc.files)) {
    graph.fileHash.set(file, entry.hash);
    graph.fileTable.set(file, entry.table);
  }
  for (const [name, occurrences] of doc.crossRefs) {
    graph.crossRefs.set(name, occurrences.map(o => ({ ...o, name })));
  }
  return graph;
}

/** The persisted graph, or an empty one when it is missing, unreadable or of another schema version. */
export function loadSymbolGraph(repoRoot: string): CrossRefGraph {
  const log = createLogger({ component: 'symbol_graph' });
  const file = graphPath(repoRoot);
  if (!fs.existsSync(file)) return emptyGraph();
  try {
    const parsed = GraphDocumentSchema.safeParse(fs.readJsonSync(file));
    if (!parsed.success) {
      log.warn('graph_invalid', { file, issues: parsed.error.issues.length });
      return emptyGraph();
    }
    if (parsed.data.schemaVersion !== SCHEMA_VERSION) {
      log.info('graph_schema_mismatch', { found: parsed.data.schemaVersion, expected: SCHEMA_VERSION });
      return emptyGraph();
    }
    return graphFromDocument(parsed.data);
  } catch (e) {
    log.warn('graph_unreadable', { file, err: e instanceof Error ? e.message : String(e) });
    return emptyGraph();
  }
}

/** Returns false when the graph could not be written; the failure is logged. */
export function saveSymbolGraph(repoRoot: string, graph: CrossRefGraph): boolean {
  const file = graphPath(repoRoot);
  try {
    fs.ensureDirSync(path.dirname(file));
    fs.writeFileSync(file, JSON.stringify(graphToDocument(graph), null, 2) + '\n', 'utf-8');
    return true;
  } catch (e) {
    createLogger({ component: 'symbol_graph' }).warn('graph_save_failed', {
      file,
      err: e instanceof Error ? e.message : String(e),
    });
    return false;
  }
}

export function buildSymbolGraphWithStats(repoRoot: string, options: BuildOptions = {}): { graph: CrossRefGraph; stats: BuildStats } {
  const log = createLogger({ component: 'symbol_graph' });
  const root = path.resolve(repoRoot);
  const config = options.config ?? loadConfig(root);
  const registry = options.registry ?? getDefaultRegistry();
  const incremental = options.incremental ?? true;

  return log.spanSync('symbol_graph_build', { repoRoot: root, incremental }, () => {
    const previous = incremental ? loadSymbolGraph(root) : emptyGraph();
    const graph = emptyGraph();
    const stats: BuildStats = { files: 0, symbols: 0, reindexed: 0, skipped: 0 };
    const extractOptions = { docMaxChars: config.docMaxChars, valueMaxChars: config.valueMaxChars };
    const perFile: Array<[string, SymbolOccurrence[]]> = [];

    for (const rel of listSourceFiles(root, registry.extensions(), config)) {
      const parser = registry.forFile(rel);
      if (!parser) continue;
      let bytes: Buffer;
      try {
        bytes = fs.readFileSync(path.join(root, rel));
      } catch (e) {
        log.debug('file_unreadable', { file: rel, err: e instanceof Error ? e.message : String(e) });
        stats.skipped++;
        continue;
      }
      const hash = sha256Hex(bytes);
      const source = bytes.toString('utf-8');

      let table: FileSymbolTable | undefined;
      if (incremental && previous.fileHash.get(rel) === hash) table = previous.fileTable.get(rel);
      if (!table) {
        table = parser.extract(source, extractOptions);
        stats.reindexed++;
      }
      graph.fileHash.set(rel, hash);
      graph.fileTable.set(rel, table);

      const occurrences = parser
        .occurrences(source)
        .filter(o => o.name.length >= config.minSymbolLength)
        .map((o): SymbolOccurrence => ({ file: rel, line: o.line, kind: o.kind, name: o.name }));
      perFile.push([rel, occurrences]);
    }

    const byName = new Map<string, SymbolOccurrence[]>();
    for (const [, occurrences] of perFile) {
      for (const occ of occurrences) {
        const list = byName.get(occ.name);
        if (list) list.push(occ);
        else byName.set(occ.name, [occ]);
      }
    }
    for (const name of [...byName.keys()].sort()) graph.crossRefs.set(name, byName.get(name) ?? []);

    stats.files = graph.fileTable.size;
    stats.symbols = graph.crossRefs.size;
    saveSymbolGraph(root, graph);
    log.info('symbol_graph_ready', { ...stats });
    return { graph, stats };
  });
}

/** Builds, persists and returns the graph. Tables of vanished files are dropped. */
export function buildSymbolGraph(repoRoot: string, options: BuildOptions = {}): CrossRefGraph {
  return buildSymbolGraphWithStats(repoRoot, options).graph;
}

/** The persisted graph, built first when nothing usable is stored. */
export function ensureSymbolGraph(repoRoot: string, options: BuildOptions = {}): CrossRefGraph {
  const graph = loadSymbolGraph(repoRoot);
  if (graph.fileTable.size > 0) return graph;
  return buildSymbolGraph(repoRoot, options);
}
