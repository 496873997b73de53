import fs from 'fs-extra';
import path from 'path';
import { createMutationRequest, fixedApprover, runGatedMutation } from '../../core/approval';
import { createLogger } from '../../core/log';
import { migrateSignature } from '../../core/migrate';
import { parseSearchReplace, patchFile, type PatchFileResult, type SearchReplaceBlock } from '../../core/patch';
import { graphPath } from '../../core/paths';
import { renameSymbol } from '../../core/rename';
import { buildSymbolGraphWithStats } from '../../core/symbolGraph';
import type { MigrationResult, RenameResult } from '../../core/types';
import { resolveRepoRoot } from '../helpers';
import type { CLIResult, CLIError } from '../types';
import { success, error, isCLIError, ErrorHints, ErrorReasons } from '../types';

/** Re-index an already indexed repo after a write so queries see the new names. */
function refreshGraph(repoRoot: string): boolean {
  if (!fs.existsSync(graphPath(repoRoot))) return false;
  try {
    buildSymbolGraphWithStats(repoRoot, { incremental: true });
    return true;
  } catch (e) {
    createLogger({ component: 'cli' }).warn('graph_refresh_failed', { err: e instanceof Error ? e.message : String(e) });
    return false;
  }
}

export async function handleRename(input: {
  oldName: string;
  newName: string;
  path: string;
  apply: boolean;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'rename' });
  const startedAt = Date.now();

  const repoRoot = resolveRepoRoot(input.path);
  if (isCLIError(repoRoot)) return repoRoot;

  const request = createMutationRequest('rename', `rename ${input.oldName} -> ${input.newName}`);
  const outcome = await runGatedMutation<RenameResult>(
    request,
    fixedApprover(input.apply),
    () => renameSymbol(repoRoot, input.oldName, input.newName, { dryRun: true }),
    () => renameSymbol(repoRoot, input.oldName, input.newName, { dryRun: false }),
  );
  const result = outcome.result;

  log.info('rename', {
    ok: result.errors.length === 0,
    repoRoot,
    edits: result.edits.length,
    applied: result.applied,
    duration_ms: Date.now() - startedAt,
  });

  if (result.errors.length > 0) {
    return error(ErrorReasons.RENAME_FAILED, {
      message: result.errors[0],
      requestId: request.id,
      ...result,
    });
  }
  const graphRefreshed = result.applied ? refreshGraph(repoRoot) : false;
  return success({ repoRoot, requestId: request.id, dryRun: !input.apply, ...result, graphRefreshed });
}

export async function handleMigrate(input: {
  functionName: string;
  params: string[];
  path: string;
  apply: boolean;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'migrate' });
  const startedAt = Date.now();

  const repoRoot = resolveRepoRoot(input.path);
  if (isCLIError(repoRoot)) return repoRoot;

  const request = createMutationRequest('migrate', `migrate ${input.functionName}(${input.params.join(', ')})`);
  const outcome = await runGatedMutation<MigrationResult>(
    request,
    fixedApprover(input.apply),
    () => migrateSignature(repoRoot, input.functionName, input.params, { dryRun: true }),
    () => migrateSignature(repoRoot, input.functionName, input.params, { dryRun: false }),
  );
  const result = outcome.result;

  log.info('migrate', {
    ok: result.errors.length === 0,
    repoRoot,
    edits: result.edits.length,
    flagged: result.flagged.length,
    applied: result.applied,
    duration_ms: Date.now() - startedAt,
  });

  if (result.errors.length > 0) {
    const notFound = result.errors[0]?.startsWith('Could not find definition') ?? false;
    return error(notFound ? ErrorReasons.SYMBOL_NOT_FOUND : ErrorReasons.MIGRATION_FAILED, {
      message: result.errors[0],
      requestId: request.id,
      ...(notFound ? { hint: ErrorHints.SYMBOL_NOT_FOUND } : {}),
      ...result,
    });
  }
  const graphRefreshed = result.applied ? refreshGraph(repoRoot) : false;
  return success({ repoRoot, requestId: request.id, dryRun: !input.apply, ...result, graphRefreshed });
}

const patchFailureReasons: Record<Extract<PatchFileResult, { ok: false }>['reason'], string> = {
  outside_repo: ErrorReasons.OUTSIDE_REPO,
  not_found: ErrorReasons.FILE_NOT_FOUND,
  no_match: ErrorReasons.PATCH_NO_MATCH,
  write_failed: ErrorReasons.PATCH_FAILED,
};

export async function handlePatch(input: {
  file: string;
  path: string;
  search?: string;
  replace?: string;
  blocks?: string;
  dryRun: boolean;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'patch' });

  const repoRoot = resolveRepoRoot(input.path);
  if (isCLIError(repoRoot)) return repoRoot;

  let blocks: SearchReplaceBlock[];
  if (input.blocks !== undefined) {
    let text: string;
    try {
      text = fs.readFileSync(path.resolve(input.blocks), 'utf-8');
    } catch (e) {
      return error(ErrorReasons.FILE_NOT_FOUND, { message: e instanceof Error ? e.message : String(e) });
    }
    blocks = parseSearchReplace(text);
    if (blocks.length === 0) {
      return error(ErrorReasons.VALIDATION_ERROR, {
        message: `No search/replace blocks in ${input.blocks}`,
        hint: 'Use <<<<<<< SEARCH / ======= / >>>>>>> REPLACE blocks',
      });
    }
  } else {
    blocks = [{ search: input.search ?? '', replace: input.replace ?? '' }];
  }

  const request = createMutationRequest('patch', `patch ${input.file} (${blocks.length} block(s))`);
  const outcome = await runGatedMutation<PatchFileResult>(
    request,
    fixedApprover(!input.dryRun),
    () => patchFile(repoRoot, input.file, blocks, { dryRun: true }),
    () => patchFile(repoRoot, input.file, blocks, { dryRun: false }),
  );
  const result = outcome.result;

  if (!result.ok) {
    log.info('patch', { ok: false, file: input.file, reason: result.reason });
    return error(patchFailureReasons[result.reason], {
      message: result.message,
      file: result.file,
      requestId: request.id,
      ...(result.reason === 'no_match' ? { hint: ErrorHints.PATCH_NO_MATCH } : {}),
    });
  }

  log.info('patch', { ok: true, file: result.file, changed: result.changed, written: result.written });
  const graphRefreshed = result.written ? refreshGraph(repoRoot) : false;
  return success({
    repoRoot,
    requestId: request.id,
    file: result.file,
    blocks: blocks.length,
    changed: result.changed,
    written: result.written,
    dryRun: input.dryRun,
    graphRefreshed,
    ...(input.dryRun ? { text: result.text } : {}),
  });
}
