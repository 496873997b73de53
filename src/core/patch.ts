import fs from 'fs-extra';
import { createLogger } from './log';
import { LineIndex } from './parser/utils';
import { resolveInsideRepo } from './paths';
import type { Edit } from './types';

export interface PatchApplied {
  ok: true;
  text: string;
  /** False when the replacement equals the matched text. */
  changed: boolean;
}

export interface NoMatch {
  ok: false;
  reason: 'no_match';
}

export type PatchResult = PatchApplied | NoMatch;

export const NO_MATCH: NoMatch = { ok: false, reason: 'no_match' };

/**
 * Replace the first exact occurrence of `search` with `replace`. No
 * whitespace or fuzzy fallback; an empty `search` never matches.
 */
export function applyPatch(original: string, search: string, replace: string): PatchResult {
  if (search.length === 0) return NO_MATCH;
  const at = original.indexOf(search);
  if (at < 0) return NO_MATCH;
  return {
    ok: true,
    text: original.slice(0, at) + replace + original.slice(at + search.length),
    changed: search !== replace,
  };
}

export type EditApplication =
  | { ok: true; text: string }
  | { ok: false; reason: 'stale' | 'overlap'; edit: Edit };

/**
 * Apply located edits right to left. Every edit's `oldText` must equal the
 * text at its location; otherwise nothing is applied.
 */
export function applyEdits(source: string, edits: readonly Edit[]): EditApplication {
  const index = new LineIndex(source);
  const located = edits.map((edit) => ({
    edit,
    start: index.offsetOf(edit.line, edit.columnSpan.start),
    end: index.offsetOf(edit.endLine, edit.columnSpan.end),
  }));
  for (const l of located) {
    if (source.slice(l.start, l.end) !== l.edit.oldText) return { ok: false, reason: 'stale', edit: l.edit };
  }
  located.sort((a, b) => b.start - a.start);
  let text = source;
  let floor = Infinity;
  for (const l of located) {
    if (l.end > floor) return { ok: false, reason: 'overlap', edit: l.edit };
    text = text.slice(0, l.start) + l.edit.newText + text.slice(l.end);
    floor = l.start;
  }
  return { ok: true, text };
}

export interface SearchReplaceBlock {
  search: string;
  replace: string;
}

const BLOCK_PATTERNS: readonly RegExp[] = [
  /<{7}\s*SEARCH\r?\n([\s\S]*?)\r?\n={7}\r?\n([\s\S]*?)\r?\n>{7}\s*REPLACE/g,
  /<{7}[^\n]*\r?\n([\s\S]*?)\r?\n={7}\r?\n([\s\S]*?)\r?\n>{7}[^\n]*/g,
  /SEARCH:\s*\n([\s\S]*?)\nREPLACE:\s*\n([\s\S]*?)(?=\nSEARCH:|$)/g,
];

const trimNewlines = (s: string) => s.replace(/^\n+|\n+$/g, '');

/**
 * Blocks from text in one of the accepted layouts: `<<<<<<< SEARCH` /
 * `=======` / `>>>>>>> REPLACE`, bare conflict markers, or `SEARCH:` /
 * `REPLACE:` sections. The first layout that yields blocks wins.
 */
export function parseSearchReplace(text: string): SearchReplaceBlock[] {
  for (const pattern of BLOCK_PATTERNS) {
    const blocks = [...text.matchAll(pattern)].map(m => ({
      search: trimNewlines(m[1] ?? ''),
      replace: trimNewlines(m[2] ?? ''),
    }));
    if (blocks.length) return blocks;
  }
  return [];
}

export type BlocksResult =
  | { ok: true; text: string; changed: boolean }
  | { ok: false; reason: 'no_match'; block: number };

function appendBlock(original: string, addition: string): string {
  if (!original.trim()) return addition.trim() + '\n';
  return original.trimEnd() + '\n\n' + addition.trim() + '\n';
}

/** Apply blocks in order; a block with an empty search appends its replacement. */
export function applySearchReplaceBlocks(original: string, blocks: readonly SearchReplaceBlock[]): BlocksResult {
  let text = original;
  for (const [i, block] of blocks.entries()) {
    if (!block.search.trim()) {
      text = appendBlock(text, block.replace);
      continue;
    }
    const res = applyPatch(text, block.search, block.replace);
    if (!res.ok) return { ok: false, reason: 'no_match', block: i };
    text = res.text;
  }
  return { ok: true, text, changed: text !== original };
}

export type PatchFileResult =
  | { ok: true; file: string; changed: boolean; written: boolean; text: string }
  | { ok: false; file: string; reason: 'outside_repo' | 'not_found' | 'no_match' | 'write_failed'; message: string };

export interface PatchFileOptions {
  dryRun?: boolean;
}

/** Read `file`, apply `blocks`, and write the result unless `dryRun`. */
export function patchFile(
  repoRoot: string,
  file: string,
  blocks: readonly SearchReplaceBlock[],
  options: PatchFileOptions = {},
): PatchFileResult {
  const log = createLogger({ component: 'patch' });
  const abs = resolveInsideRepo(repoRoot, file);
  if (!abs) return { ok: false, file, reason: 'outside_repo', message: `${file} is outside the repository` };

  let original: string;
  try {
    original = fs.readFileSync(abs, 'utf-8');
  } catch (e) {
    return { ok: false, file, reason: 'not_found', message: e instanceof Error ? e.message : String(e) };
  }

  const res = applySearchReplaceBlocks(original, blocks);
  if (!res.ok) {
    return { ok: false, file, reason: 'no_match', message: `search block ${res.block + 1} not found in ${file}` };
  }
  if (options.dryRun || !res.changed) {
    return { ok: true, file, changed: res.changed, written: false, text: res.text };
  }
  try {
    fs.writeFileSync(abs, res.text, 'utf-8');
  } catch (e) {
    return { ok: false, file, reason: 'write_failed', message: e instanceof Error ? e.message : String(e) };
  }
  log.info('patch_applied', { file, blocks: blocks.length });
  return { ok: true, file, changed: true, written: true, text: res.text };
}
