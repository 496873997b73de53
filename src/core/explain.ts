import { loadSymbolChunk } from './chunks';
import { findAllUsages, findDefinitions, symbolsInFile, type UsageEntry } from './graphQuery';
import { LineIndex } from './parser/utils';
import type { CrossRefGraph, SymbolOccurrence } from './types';

const MAX_DEFINITIONS = 3;
const MAX_CALLERS = 8;
const PREVIEW_CHARS = 600;

export interface SymbolExplanation {
  symbol: string;
  found: boolean;
  definitions: SymbolOccurrence[];
  doc: string;
  summary: string;
  preview: string;
  /** Call and read sites, at most eight. */
  callers: UsageEntry[];
}

/** One-line structural description of the lines `startLine..endLine`. */
export function summarizeBlock(content: string, startLine: number, endLine: number): string {
  const block = new LineIndex(content).sliceLines(startLine, endLine).replace(/\n$/, '');
  if (!block.trim()) return '';
  const lines = block.split('\n');
  const first = (lines[0] ?? '').trim();
  const n = lines.length;

  const fn = first.match(/^(?:export\s+)?(?:async\s+)?(?:def|function|func)\s+(?:\([^)]*\)\s*)?([\w$]+)\s*\(([^)]*)\)/);
  if (fn) return `Function '${fn[1]}' taking (${fn[2]}), ${n} lines`;
  const cls = first.match(/^(?:export\s+)?(?:abstract\s+)?(?:class|interface)\s+([\w$]+)/);
  if (cls) return `Class '${cls[1]}', ${n} lines`;
  if (/^(?:for|while)\b/.test(first)) return `Loop block, ${n} lines`;
  if (/^if\b/.test(first)) return `Conditional block, ${n} lines`;
  return `Code block, ${n} lines starting with: ${first.slice(0, 60)}`;
}

/** Where `symbol` is defined, what it looks like, and who uses it. */
export function explainSymbol(repoRoot: string, graph: CrossRefGraph, symbol: string): SymbolExplanation {
  const definitions = findDefinitions(graph, symbol).slice(0, MAX_DEFINITIONS);
  const callers = findAllUsages(repoRoot, graph, symbol)
    .filter(u => u.kind === 'call' || u.kind === 'ref')
    .slice(0, MAX_CALLERS);
  const out: SymbolExplanation = {
    symbol,
    found: definitions.length > 0 || callers.length > 0,
    definitions,
    doc: '',
    summary: '',
    preview: '',
    callers,
  };

  const first = definitions[0];
  if (!first) return out;
  const table = symbolsInFile(graph, first.file);
  const decl = table?.functions.find(f => f.name === symbol && f.start === first.line)
    ?? table?.classes.find(c => c.name === symbol && c.start === first.line)
    ?? table?.functions.find(f => f.name === symbol)
    ?? table?.classes.find(c => c.name === symbol);
  out.doc = decl?.doc ?? '';

  const chunk = loadSymbolChunk(repoRoot, first.file, symbol);
  out.preview = chunk.slice(0, PREVIEW_CHARS);
  if (chunk) {
    const lines = chunk.replace(/\n$/, '').split('\n');
    const defAt = Math.max(1, lines.findIndex(l => l.includes(symbol)) + 1);
    out.summary = summarizeBlock(chunk, defAt, lines.length);
  }
  return out;
}

export function formatExplanation(e: SymbolExplanation): string {
  if (!e.found) return `Symbol '${e.symbol}' not found in repository.`;
  const parts: string[] = [];
  if (e.definitions.length) {
    parts.push(e.definitions.length > 1 ? 'DEFINITIONS:' : 'DEFINITION:');
    for (const d of e.definitions) parts.push(`  ${d.file}:${d.line}`);
  }
  if (e.summary) parts.push(`\nSUMMARY:\n  ${e.summary}`);
  if (e.doc) parts.push(`\nDOCSTRING:\n  ${e.doc}`);
  if (e.preview) parts.push(`\nSOURCE PREVIEW:\n${e.preview}`);
  if (e.callers.length) {
    parts.push(`\nCALLED / USED IN (${e.callers.length} shown):`);
    for (const u of e.callers) parts.push(`  ${u.file}:${u.line}  ${u.context.slice(0, 80)}`);
  }
  return parts.join('\n');
}
