import fs from 'fs-extra';
import path from 'path';
import type { Logger } from './log';
import { applyEdits } from './patch';
import { LineIndex } from './parser/utils';
import type { Edit } from './types';

const CONTEXT_MAX = 120;

/** Edits planned for one file against the content they were computed from. */
export interface FileEditPlan {
  file: string;
  source: string;
  edits: Edit[];
}

export function lineContext(index: LineIndex, line: number): string {
  return index.lineText(line).trimEnd().slice(0, CONTEXT_MAX);
}

/** Edit replacing `source[start, end)` with `newText`. */
export function editAt(file: string, source: string, index: LineIndex, start: number, end: number, newText: string): Edit {
  const from = index.positionOf(start);
  const to = index.positionOf(end);
  return {
    file,
    line: from.line,
    endLine: to.line,
    columnSpan: { start: from.column, end: to.column },
    oldText: source.slice(start, end),
    newText,
    context: lineContext(index, from.line),
  };
}

/**
 * Write every plan. A file is skipped with an error when its content moved
 * since planning or an edit no longer matches; write failures are collected
 * and the remaining files are still processed. Nothing is rolled back.
 */
export function commitEditPlans(repoRoot: string, plans: readonly FileEditPlan[], log: Logger): string[] {
  const errors: string[] = [];
  for (const plan of plans) {
    const abs = path.join(repoRoot, plan.file);
    let current: string;
    try {
      current = fs.readFileSync(abs, 'utf-8');
    } catch (e) {
      errors.push(`${plan.file}: ${e instanceof Error ? e.message : String(e)}`);
      continue;
    }
    if (current !== plan.source) {
      errors.push(`${plan.file}: changed since it was scanned`);
      continue;
    }
    const res = applyEdits(current, plan.edits);
    if (!res.ok) {
      errors.push(`${plan.file}:${res.edit.line}: ${res.reason === 'stale' ? 'text no longer matches' : 'overlapping edits'}`);
      continue;
    }
    try {
      fs.writeFileSync(abs, res.text, 'utf-8');
      log.info('file_updated', { file: plan.file, edits: plan.edits.length });
    } catch (e) {
      errors.push(`${plan.file}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  return errors;
}
