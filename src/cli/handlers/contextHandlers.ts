import { formatContextBundle, getRelevantChunks, loadFunctionSlice } from '../../core/chunks';
import { loadConfig } from '../../core/config';
import { createLogger } from '../../core/log';
import { loadSymbolGraph } from '../../core/symbolGraph';
import { resolveRepoRoot } from '../helpers';
import type { CLIResult, CLIError } from '../types';
import { success, error, isCLIError, ErrorHints, ErrorReasons } from '../types';

export async function handleContext(input: {
  queryParts: string[];
  path: string;
  maxChars?: number;
  json: boolean;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'context' });
  const startedAt = Date.now();

  const repoRoot = resolveRepoRoot(input.path);
  if (isCLIError(repoRoot)) return repoRoot;

  try {
    const query = input.queryParts.join(' ');
    const config = loadConfig(repoRoot);
    // an empty graph falls back to scanning the source files
    const graph = loadSymbolGraph(repoRoot);
    const chunks = getRelevantChunks(query, repoRoot, { graph, config, maxChars: input.maxChars });
    const bundle = formatContextBundle(chunks);

    log.info('context', {
      ok: true,
      repoRoot,
      chunks: chunks.length,
      chars: bundle.length,
      duration_ms: Date.now() - startedAt,
    });

    return success({
      repoRoot,
      query,
      maxChars: input.maxChars ?? config.maxChunkChars,
      chunks: chunks.map(c => ({
        file: c.file,
        symbol: c.symbol,
        kind: c.kind,
        startLine: c.startLine,
        endLine: c.endLine,
        relevanceScore: c.relevanceScore,
      })),
      bundle,
      ...(input.json ? {} : { textOutput: bundle }),
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    log.error('context', { ok: false, err: message });
    return error(ErrorReasons.INTERNAL_ERROR, { message });
  }
}

export async function handleSlice(input: {
  name: string;
  path: string;
  context: number;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'slice' });

  const repoRoot = resolveRepoRoot(input.path);
  if (isCLIError(repoRoot)) return repoRoot;

  const slice = loadFunctionSlice(repoRoot, input.name, input.context);
  if (!slice) {
    log.info('slice', { ok: false, name: input.name });
    return error(ErrorReasons.SYMBOL_NOT_FOUND, {
      message: `No function or class named '${input.name}'`,
      hint: ErrorHints.SYMBOL_NOT_FOUND,
    });
  }
  log.info('slice', { ok: true, name: input.name, file: slice.file });
  return success({ repoRoot, name: input.name, ...slice });
}
