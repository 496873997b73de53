import fs from 'fs-extra';
import path from 'path';
import { loadConfig, type RefGraphConfig } from './config';
import { commitEditPlans, editAt, type FileEditPlan } from './edits';
import { listSourceFiles } from './files';
import { createLogger } from './log';
import { getDefaultRegistry, type ParserRegistry } from './parser/registry';
import { isIdentifier, LineIndex } from './parser/utils';
import type { Edit, RenameResult } from './types';

export interface MutationOptions {
  /** Collect edits without writing. Defaults to true. */
  dryRun?: boolean;
  config?: RefGraphConfig;
  registry?: ParserRegistry;
}

/**
 * Rename every identifier token `oldName` to `newName` across the
 * repository. Exact-grammar files never touch strings or comments.
 */
export function renameSymbol(repoRoot: string, oldName: string, newName: string, options: MutationOptions = {}): RenameResult {
  const log = createLogger({ component: 'rename' });
  const root = path.resolve(repoRoot);
  const dryRun = options.dryRun ?? true;
  const result: RenameResult = { oldName, newName, edits: [], errors: [], applied: false };

  if (!isIdentifier(oldName)) {
    result.errors.push(`'${oldName}' is not an identifier`);
    return result;
  }
  if (!isIdentifier(newName)) {
    result.errors.push(`'${newName}' is not a valid identifier`);
    return result;
  }
  if (oldName === newName) return result;

  const config = options.config ?? loadConfig(root);
  const registry = options.registry ?? getDefaultRegistry();
  const plans: FileEditPlan[] = [];
  const reservedIn = new Set<string>();

  for (const file of listSourceFiles(root, registry.extensions(), config)) {
    const parser = registry.forFile(file);
    if (!parser) continue;
    let source: string;
    try {
      source = fs.readFileSync(path.join(root, file), 'utf-8');
    } catch (e) {
      log.debug('file_unreadable', { file, err: e instanceof Error ? e.message : String(e) });
      continue;
    }
    if (!source.includes(oldName)) continue;

    const spans = parser.identifierSpans(source, oldName);
    if (spans.length === 0) continue;
    if (parser.reservedWords.has(newName)) {
      if (!reservedIn.has(parser.id)) result.errors.push(`'${newName}' is a reserved word in ${parser.id}`);
      reservedIn.add(parser.id);
      continue;
    }
    const index = new LineIndex(source);
    // right to left within each line
    const ordered = [...spans].sort((a, b) => (a.line - b.line) || (b.start - a.start));
    const edits: Edit[] = ordered.map(s => editAt(file, source, index, s.start, s.end, newName));
    plans.push({ file, source, edits });
    result.edits.push(...edits);
  }

  // a reserved target blocks the whole batch
  if (!dryRun && result.errors.length === 0) {
    result.errors.push(...commitEditPlans(root, plans, log));
    result.applied = result.errors.length === 0;
  }

  log.info('rename_symbol', {
    oldName,
    newName,
    edits: result.edits.length,
    files: plans.length,
    dryRun,
    applied: result.applied,
  });
  return result;
}
