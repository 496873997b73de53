import path from 'path';
import { explainSymbol, formatExplanation } from '../../core/explain';
import {
  findAllUsages,
  getFileSummary,
  querySymbol,
  searchSymbolsByPrefix,
  symbolsInFile,
} from '../../core/graphQuery';
import { createLogger } from '../../core/log';
import { toPosixPath, toRepoRelative } from '../../core/paths';
import type { CrossRefGraph, OccurrenceKind } from '../../core/types';
import { resolveRepoContext } from '../helpers';
import type { CLIResult, CLIError } from '../types';
import { success, error, isCLIError, ErrorReasons } from '../types';

type KindFilter = 'all' | 'definitions' | 'usages';

function matchesKind(kind: OccurrenceKind, filter: KindFilter): boolean {
  if (filter === 'definitions') return kind === 'definition';
  if (filter === 'usages') return kind !== 'definition';
  return true;
}

/** Graph key for a file given relative to the repo root or to the working directory. */
export function graphFileKey(graph: CrossRefGraph, repoRoot: string, file: string): string | null {
  const direct = toPosixPath(file).replace(/^\.\//, '');
  if (graph.fileTable.has(direct)) return direct;
  const fromCwd = toRepoRelative(repoRoot, path.resolve(file));
  return graph.fileTable.has(fromCwd) ? fromCwd : null;
}

export async function handleQuerySymbol(input: {
  name: string;
  path: string;
  kind: KindFilter;
  context: boolean;
  limit: number;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'query' });
  const startedAt = Date.now();

  const ctx = resolveRepoContext(input.path);
  if (isCLIError(ctx)) return ctx;

  try {
    const occurrences = input.context
      ? findAllUsages(ctx.repoRoot, ctx.graph, input.name).filter(u => matchesKind(u.kind, input.kind))
      : querySymbol(ctx.graph, input.name)
        .filter(o => matchesKind(o.kind, input.kind))
        .map(o => ({ file: o.file, line: o.line, kind: o.kind }));
    const rows = occurrences.slice(0, input.limit);

    log.info('query_symbol', {
      ok: true,
      repoRoot: ctx.repoRoot,
      name: input.name,
      count: occurrences.length,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      repoRoot: ctx.repoRoot,
      name: input.name,
      kind: input.kind,
      count: occurrences.length,
      truncated: rows.length < occurrences.length,
      occurrences: rows,
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('query', { ok: false, err: message });
    return error(ErrorReasons.INTERNAL_ERROR, { message });
  }
}

export async function handleFindSymbols(input: {
  prefix: string;
  path: string;
  limit: number;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'find' });
  const startedAt = Date.now();

  const ctx = resolveRepoContext(input.path);
  if (isCLIError(ctx)) return ctx;

  const names = searchSymbolsByPrefix(ctx.graph, input.prefix);
  const symbols = names.slice(0, input.limit).map(name => {
    const occurrences = querySymbol(ctx.graph, name);
    return {
      name,
      definitions: occurrences.filter(o => o.kind === 'definition').length,
      usages: occurrences.filter(o => o.kind !== 'definition').length,
    };
  });

  log.info('find_symbols', {
    ok: true,
    repoRoot: ctx.repoRoot,
    prefix: input.prefix,
    count: names.length,
    duration_ms: Date.now() - startedAt,
  });

  return success({
    repoRoot: ctx.repoRoot,
    prefix: input.prefix,
    count: names.length,
    truncated: symbols.length < names.length,
    symbols,
  });
}

export async function handleFileSummary(input: {
  file: string;
  path: string;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'summary' });

  const ctx = resolveRepoContext(input.path);
  if (isCLIError(ctx)) return ctx;

  const key = graphFileKey(ctx.graph, ctx.repoRoot, input.file);
  const table = key === null ? null : symbolsInFile(ctx.graph, key);
  if (key === null || !table) {
    log.info('file_summary', { ok: false, file: input.file });
    return error(ErrorReasons.FILE_NOT_FOUND, {
      message: `${input.file} is not in the cross-reference graph`,
      hint: 'Only indexed source files have summaries; run "refgraph index" after adding files',
    });
  }

  log.info('file_summary', { ok: true, repoRoot: ctx.repoRoot, file: key });
  return success({
    repoRoot: ctx.repoRoot,
    file: key,
    summary: getFileSummary(ctx.graph, key),
    language: table.language,
    confidence: table.confidence,
    classes: table.classes.map(c => ({ name: c.name, start: c.start, end: c.end, bases: c.bases, methods: c.methods })),
    functions: table.functions.map(f => ({ name: f.name, start: f.start, end: f.end, signature: f.signature, parent: f.parent })),
    variables: table.variables,
    imports: table.imports,
  });
}

export async function handleExplainSymbol(input: {
  symbol: string;
  path: string;
  json: boolean;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'explain' });
  const startedAt = Date.now();

  const ctx = resolveRepoContext(input.path);
  if (isCLIError(ctx)) return ctx;

  try {
    const explanation = explainSymbol(ctx.repoRoot, ctx.graph, input.symbol);
    log.info('explain_symbol', {
      ok: true,
      symbol: input.symbol,
      found: explanation.found,
      duration_ms: Date.now() - startedAt,
    });
    return success({
      repoRoot: ctx.repoRoot,
      ...explanation,
      ...(input.json ? {} : { textOutput: formatExplanation(explanation) }),
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('explain', { ok: false, err: message });
    return error(ErrorReasons.INTERNAL_ERROR, { message });
  }
}
