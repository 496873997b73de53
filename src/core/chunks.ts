import fs from 'fs-extra';
import path from 'path';
import { loadConfig, type RefGraphConfig } from './config';
import { listSourceFiles } from './files';
import { createLogger } from './log';
import { getDefaultRegistry, type ParserRegistry } from './parser/registry';
import { LineIndex } from './parser/utils';
import { resolveInsideRepo } from './paths';
import type { Chunk, CrossRefGraph } from './types';

const SCORED_SOURCE_CHARS = 400;
const EXACT_SYMBOL_BOOST = 3.0;
const EXACT_HIT_FILES = 5;
const PREFIX_HIT_FILES = 2;
const BUNDLE_SOURCE_CHARS = 500;

export interface ChunkOptions {
  graph?: CrossRefGraph;
  /** Character budget over the selected chunks' source. Defaults to `config.maxChunkChars`. */
  maxChars?: number;
  config?: RefGraphConfig;
  registry?: ParserRegistry;
}

/** Lowercase identifier-like words longer than one character. */
export function tokenize(text: string): string[] {
  return (text.match(/[A-Za-z][A-Za-z0-9_]*/g) ?? []).filter(t => t.length > 1).map(t => t.toLowerCase());
}

export function scoreChunk(chunk: Chunk, queryTokens: readonly string[]): number {
  const chunkTokens = new Set(tokenize(`${chunk.symbol} ${chunk.doc} ${chunk.sourceText.slice(0, SCORED_SOURCE_CHARS)}`));
  if (chunkTokens.size === 0) return 0;
  const query = new Set(queryTokens.map(t => t.toLowerCase()));
  let overlap = 0;
  for (const t of query) if (chunkTokens.has(t)) overlap++;
  const boost = query.has(chunk.symbol.toLowerCase()) ? EXACT_SYMBOL_BOOST : 0;
  return overlap / Math.max(query.size, 1) + boost;
}

/** Files referenced by query tokens: exact symbol hits first, then prefix hits. */
export function candidateFiles(graph: CrossRefGraph, queryTokens: readonly string[]): string[] {
  const out: string[] = [];
  const add = (file: string) => {
    if (!out.includes(file)) out.push(file);
  };
  for (const token of queryTokens) {
    for (const occ of (graph.crossRefs.get(token) ?? []).slice(0, EXACT_HIT_FILES)) add(occ.file);
    for (const [name, occurrences] of graph.crossRefs) {
      if (!name.toLowerCase().startsWith(token)) continue;
      for (const occ of occurrences.slice(0, PREFIX_HIT_FILES)) add(occ.file);
    }
  }
  return out;
}

function chunksOfFile(root: string, file: string, config: RefGraphConfig, registry: ParserRegistry): Chunk[] {
  const parser = registry.forFile(file);
  const abs = resolveInsideRepo(root, file);
  if (!parser || !abs) return [];
  try {
    return parser.chunks(fs.readFileSync(abs, 'utf-8'), file, config);
  } catch (e) {
    createLogger({ component: 'chunks' }).debug('file_unreadable', { file, err: e instanceof Error ? e.message : String(e) });
    return [];
  }
}

/**
 * Ranked chunks for `query`, accumulated while they fit in the budget. The
 * best chunk is always returned, even alone over budget.
 */
export function getRelevantChunks(query: string, repoRoot: string, options: ChunkOptions = {}): Chunk[] {
  const tokens = tokenize(query);
  if (tokens.length === 0) return [];
  const root = path.resolve(repoRoot);
  const config = options.config ?? loadConfig(root);
  const registry = options.registry ?? getDefaultRegistry();
  const maxChars = options.maxChars ?? config.maxChunkChars;

  let files = options.graph ? candidateFiles(options.graph, tokens) : [];
  if (files.length === 0) {
    files = options.graph && options.graph.fileTable.size > 0
      ? [...options.graph.fileTable.keys()].sort()
      : listSourceFiles(root, registry.extensions(), config);
  }

  const scored = files
    .slice(0, config.maxCandidateFiles)
    .flatMap(file => chunksOfFile(root, file, config, registry))
    .map(chunk => ({ ...chunk, relevanceScore: scoreChunk(chunk, tokens) }))
    .filter(chunk => chunk.relevanceScore > 0)
    .sort((a, b) => b.relevanceScore - a.relevanceScore);

  const selected: Chunk[] = [];
  let total = 0;
  for (const chunk of scored) {
    const size = chunk.sourceText.length;
    if (selected.length > 0 && total + size > maxChars) break;
    selected.push(chunk);
    total += size;
  }
  return selected;
}

/**
 * Source of the definition of `symbol`, decorators included. Without a
 * definition, the lines around the first line mentioning it.
 */
export function extractChunk(source: string, symbol: string, file: string, registry: ParserRegistry = getDefaultRegistry()): string {
  const index = new LineIndex(source);
  const span = registry.forFile(file)?.definitionSpan(source, symbol);
  if (span) return index.sliceLines(span.start, span.end);

  for (let line = 1; line <= index.lineCount; line++) {
    if (index.lineText(line).includes(symbol)) {
      return index.sliceLines(Math.max(1, line - 3), Math.min(index.lineCount, line + 19));
    }
  }
  return '';
}

/** Block defining `symbol` in `file`; empty when the file or symbol is not there. */
export function loadSymbolChunk(repoRoot: string, file: string, symbol: string): string {
  const abs = resolveInsideRepo(repoRoot, file);
  if (!abs || !fs.existsSync(abs)) return '';
  try {
    return extractChunk(fs.readFileSync(abs, 'utf-8'), symbol, file);
  } catch (e) {
    createLogger({ component: 'chunks' }).debug('file_unreadable', { file, err: e instanceof Error ? e.message : String(e) });
    return '';
  }
}

export interface DefinitionLocation {
  file: string;
  start: number;
  end: number;
}

/** First function or class named `name`, in file order. */
export function locateDefinition(
  repoRoot: string,
  name: string,
  options: { config?: RefGraphConfig; registry?: ParserRegistry } = {},
): DefinitionLocation | null {
  const root = path.resolve(repoRoot);
  const config = options.config ?? loadConfig(root);
  const registry = options.registry ?? getDefaultRegistry();
  for (const file of listSourceFiles(root, registry.extensions(), config)) {
    const parser = registry.forFile(file);
    if (!parser) continue;
    let source: string;
    try {
      source = fs.readFileSync(path.join(root, file), 'utf-8');
    } catch {
      continue;
    }
    if (!source.includes(name)) continue;
    const table = parser.extract(source, config);
    const hit = table.functions.find(f => f.name === name) ?? table.classes.find(c => c.name === name);
    if (hit) return { file, start: hit.start, end: hit.end };
  }
  return null;
}

export interface FunctionSlice extends DefinitionLocation {
  sliceStart: number;
  sliceEnd: number;
  code: string;
}

/** Lines of the definition of `name` plus `context` lines on either side. */
export function loadFunctionSlice(repoRoot: string, name: string, context = 5, options: { config?: RefGraphConfig; registry?: ParserRegistry } = {}): FunctionSlice | null {
  const loc = locateDefinition(repoRoot, name, options);
  if (!loc) return null;
  let content: string;
  try {
    content = fs.readFileSync(path.join(path.resolve(repoRoot), loc.file), 'utf-8');
  } catch {
    return null;
  }
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  const sliceStart = Math.max(1, loc.start - context);
  const sliceEnd = Math.min(lines.length, loc.end + context);
  return { ...loc, sliceStart, sliceEnd, code: lines.slice(sliceStart - 1, sliceEnd).join('\n') };
}

/** Prompt-ready text for `chunks`; empty when there are none. */
export function formatContextBundle(chunks: readonly Chunk[]): string {
  if (chunks.length === 0) return '';
  const parts = ['[RELEVANT CODE CHUNKS]'];
  for (const c of chunks) {
    parts.push(`\n# ${c.file}::${c.symbol} (L${c.startLine}–${c.endLine})`);
    parts.push(c.sourceText.slice(0, BUNDLE_SOURCE_CHARS));
  }
  parts.push('[/RELEVANT CODE CHUNKS]');
  return parts.join('\n');
}

export function loadContextForQuery(query: string, repoRoot: string, options: ChunkOptions = {}): string {
  return formatContextBundle(getRelevantChunks(query, repoRoot, options));
}
