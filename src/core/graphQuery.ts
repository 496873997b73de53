import fs from 'fs-extra';
import path from 'path';
import type { CrossRefGraph, FileSymbolTable, OccurrenceKind, SymbolOccurrence } from './types';

export interface UsageEntry {
  file: string;
  line: number;
  kind: OccurrenceKind;
  /** The source line, trimmed. */
  context: string;
}

/** Every occurrence of `name`, exact match. */
export function querySymbol(graph: CrossRefGraph, name: string): readonly SymbolOccurrence[] {
  return graph.crossRefs.get(name) ?? [];
}

export function findDefinitions(graph: CrossRefGraph, name: string): SymbolOccurrence[] {
  return querySymbol(graph, name).filter(o => o.kind === 'definition');
}

export function findUsages(graph: CrossRefGraph, name: string): SymbolOccurrence[] {
  return querySymbol(graph, name).filter(o => o.kind !== 'definition');
}

export function symbolsInFile(graph: CrossRefGraph, relPath: string): FileSymbolTable | null {
  return graph.fileTable.get(relPath) ?? null;
}

/** Symbol names starting with `prefix`, case-insensitive, in key order. */
export function searchSymbolsByPrefix(graph: CrossRefGraph, prefix: string): string[] {
  const p = prefix.toLowerCase();
  return [...graph.crossRefs.keys()].filter(k => k.toLowerCase().startsWith(p));
}

/** e.g. `classes: Greeter | functions: greet, main | vars: DEFAULT_NAME` */
export function getFileSummary(graph: CrossRefGraph, relPath: string): string {
  const table = symbolsInFile(graph, relPath);
  if (!table) return '(empty)';
  const classes = table.classes.slice(0, 4).map(c => c.name);
  const functions = table.functions.slice(0, 8).map(f => f.name);
  const vars = table.variables.slice(0, 6).map(v => v.name);
  const parts: string[] = [];
  if (classes.length) parts.push(`classes: ${classes.join(', ')}`);
  if (functions.length) parts.push(`functions: ${functions.join(', ')}`);
  if (vars.length) parts.push(`vars: ${vars.join(', ')}`);
  return parts.join(' | ') || '(empty)';
}

/** Occurrences of `name` with the text of their line; unreadable files give an empty context. */
export function findAllUsages(repoRoot: string, graph: CrossRefGraph, name: string): UsageEntry[] {
  const linesByFile = new Map<string, string[]>();
  const linesOf = (file: string): string[] => {
    let lines = linesByFile.get(file);
    if (!lines) {
      try {
        lines = fs.readFileSync(path.join(repoRoot, file), 'utf-8').split('\n');
      } catch {
        lines = [];
      }
      linesByFile.set(file, lines);
    }
    return lines;
  };
  return querySymbol(graph, name).map(o => ({
    file: o.file,
    line: o.line,
    kind: o.kind,
    context: (linesOf(o.file)[o.line - 1] ?? '').trim(),
  }));
}
