import { checkGraph } from '../../core/graphCheck';
import { createLogger } from '../../core/log';
import { graphPath } from '../../core/paths';
import { buildSymbolGraphWithStats } from '../../core/symbolGraph';
import { resolveRepoRoot } from '../helpers';
import type { CLIResult, CLIError } from '../types';
import { success, error, isCLIError, ErrorReasons } from '../types';

export async function handleIndexRepo(input: {
  path: string;
  full: boolean;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'index' });
  const startedAt = Date.now();

  const repoRoot = resolveRepoRoot(input.path);
  if (isCLIError(repoRoot)) return repoRoot;

  try {
    const { stats } = buildSymbolGraphWithStats(repoRoot, { incremental: !input.full });
    log.info('index_repo', {
      ok: true,
      repoRoot,
      full: input.full,
      ...stats,
      duration_ms: Date.now() - startedAt,
    });
    return success({ repoRoot, graphPath: graphPath(repoRoot), full: input.full, ...stats });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('index', { ok: false, err: message });
    return error(ErrorReasons.INDEX_FAILED, { message });
  }
}

export async function handleStatus(input: {
  path: string;
  json: boolean;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'status' });
  const startedAt = Date.now();

  const repoRoot = resolveRepoRoot(input.path);
  if (isCLIError(repoRoot)) return repoRoot;

  try {
    const { ok: upToDate, ...res } = checkGraph(repoRoot);
    const lines: string[] = [];
    lines.push(`repo: ${repoRoot}`);
    lines.push(`graph: ${upToDate ? 'ok' : 'not_ready'}`);
    if (res.found.schemaVersion !== null) {
      lines.push(`schema: ${res.found.schemaVersion} (expected ${res.expected.schemaVersion})`);
      lines.push(`files: ${res.found.files}`);
      lines.push(`symbols: ${res.found.symbols}`);
    } else {
      lines.push(`graph file: ${res.found.graphPath}`);
    }
    if (res.stale.length > 0) lines.push(`changed: ${res.stale.join(', ')}`);
    if (res.missing.length > 0) lines.push(`deleted: ${res.missing.join(', ')}`);
    if (res.untracked.length > 0) lines.push(`new: ${res.untracked.join(', ')}`);
    if (!upToDate) {
      lines.push(`problems: ${res.problems.join(', ')}`);
      lines.push(`hint: ${res.hint}`);
    }

    log.info('status', {
      upToDate,
      repoRoot,
      duration_ms: Date.now() - startedAt,
    });

    return success({ repoRoot, upToDate, ...res, ...(input.json ? {} : { textOutput: lines.join('\n') }) });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('status', { ok: false, err: message });
    return error(ErrorReasons.INTERNAL_ERROR, { message });
  }
}
