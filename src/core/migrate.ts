import fs from 'fs-extra';
import path from 'path';
import { loadConfig } from './config';
import { commitEditPlans, editAt, lineContext, type FileEditPlan } from './edits';
import { listSourceFiles } from './files';
import { createLogger } from './log';
import type { CallSite, ExactGrammarParser } from './parser/adapter';
import { getDefaultRegistry } from './parser/registry';
import { isIdentifier, LineIndex } from './parser/utils';
import type { MutationOptions } from './rename';
import type { FunctionDecl, MigrationResult } from './types';

/** Placeholder for a new parameter that has neither an argument nor a default. */
export const MISSING_ARGUMENT = 'None';

export interface ParamSpec {
  name: string;
  default?: string;
}

/** `"name"` or `"name=default"`; the default is everything after the first `=`. */
export function parseParamSpec(spec: string): ParamSpec {
  const eq = spec.indexOf('=');
  const name = (eq < 0 ? spec : spec.slice(0, eq)).trim().replace(/^\*+/, '');
  if (eq < 0) return { name };
  return { name, default: spec.slice(eq + 1).trim() };
}

interface SourceFile {
  file: string;
  source: string;
  parser: ExactGrammarParser;
}

/** Positional names the call sites map onto; a method's `self`/`cls` is not passed at the call. */
function callableParams(fn: FunctionDecl): string[] {
  const first = fn.params[0];
  if (fn.parent && (first === 'self' || first === 'cls') && !fn.decorators.includes('staticmethod')) {
    return fn.params.slice(1);
  }
  return [...fn.params];
}

/** Argument texts of one call under the new parameter list. */
function remapArguments(
  oldParams: readonly string[],
  newParams: readonly ParamSpec[],
  site: CallSite,
  argText: (start: number, end: number) => string,
): string[] {
  const positional = site.args.filter(a => a.kind === 'positional').map(a => argText(a.start, a.end));
  const keywords = site.args.filter(a => a.kind === 'keyword');
  const passedByKeyword = new Set(keywords.map(a => a.keyword ?? ''));

  const out: string[] = [];
  let skipped = false;
  for (const param of newParams) {
    if (passedByKeyword.has(param.name)) {
      skipped = true;
      continue;
    }
    const oldPos = oldParams.indexOf(param.name);
    const value = oldPos >= 0 && oldPos < positional.length
      ? (positional[oldPos] ?? MISSING_ARGUMENT)
      : (param.default ?? MISSING_ARGUMENT);
    out.push(skipped ? `${param.name}=${value}` : value);
  }
  for (const kw of keywords) out.push(argText(kw.start, kw.end));
  return out;
}

/**
 * Rewrite every call of `functionName` to match `newParamSpecs`. Only the
 * parenthesised argument list of a call changes; calls that unpack
 * arguments, and calls needing a rewrite around a comment, are reported in
 * `flagged` and left alone.
 */
export function migrateSignature(
  repoRoot: string,
  functionName: string,
  newParamSpecs: readonly string[],
  options: MutationOptions = {},
): MigrationResult {
  const log = createLogger({ component: 'migrate' });
  const root = path.resolve(repoRoot);
  const dryRun = options.dryRun ?? true;
  const newParams = newParamSpecs.map(parseParamSpec);
  const result: MigrationResult = {
    functionName,
    oldParams: [],
    newParams: newParams.map(p => p.name),
    edits: [],
    flagged: [],
    errors: [],
    applied: false,
  };

  const badName = newParams.find(p => !isIdentifier(p.name));
  if (badName) {
    result.errors.push(`'${badName.name}' is not a valid parameter name`);
    return result;
  }

  const config = options.config ?? loadConfig(root);
  const registry = options.registry ?? getDefaultRegistry();
  const files: SourceFile[] = [];
  for (const file of listSourceFiles(root, registry.extensions(), config)) {
    const parser = registry.forFile(file);
    if (!parser || parser.kind !== 'exact-grammar') continue;
    try {
      const source = fs.readFileSync(path.join(root, file), 'utf-8');
      if (source.includes(functionName)) files.push({ file, source, parser });
    } catch (e) {
      log.debug('file_unreadable', { file, err: e instanceof Error ? e.message : String(e) });
    }
  }

  // Step 1: the first definition in file order is taken as the signature.
  const definitions: Array<{ file: string; fn: FunctionDecl }> = [];
  for (const f of files) {
    const table = f.parser.extract(f.source, config);
    for (const fn of table.functions) {
      if (fn.name === functionName) definitions.push({ file: f.file, fn });
    }
  }
  const chosen = definitions[0];
  if (!chosen) {
    result.errors.push(`Could not find definition of '${functionName}'`);
    return result;
  }
  if (definitions.length > 1) {
    log.warn('ambiguous_definition', {
      functionName,
      chosen: `${chosen.file}:${chosen.fn.start}`,
      others: definitions.slice(1).map(d => `${d.file}:${d.fn.start}`),
    });
  }
  const oldParams = callableParams(chosen.fn);
  result.oldParams = oldParams;

  // Step 2: rewrite call sites.
  const plans: FileEditPlan[] = [];
  for (const f of files) {
    const sites = f.parser.callSites(f.source, functionName);
    if (sites.length === 0) continue;
    const index = new LineIndex(f.source);
    const rendered = new Map<CallSite, string>();

    const directChildren = (start: number, end: number, self?: CallSite): CallSite[] => {
      const inside = sites.filter(s => s !== self && s.argsStart >= start && s.argsEnd <= end);
      return inside.filter(s => !inside.some(o => o !== s && o.argsStart <= s.argsStart && s.argsEnd <= o.argsEnd));
    };

    // Source text of [start, end) with nested call rewrites applied.
    const textWithRewrites = (start: number, end: number, self?: CallSite): string => {
      let out = '';
      let cursor = start;
      for (const child of directChildren(start, end, self)) {
        out += f.source.slice(cursor, child.argsStart) + render(child);
        cursor = child.argsEnd;
      }
      return out + f.source.slice(cursor, end);
    };

    const render = (site: CallSite): string => {
      const cached = rendered.get(site);
      if (cached !== undefined) return cached;
      let text = textWithRewrites(site.argsStart, site.argsEnd, site);
      if (!site.unsupported) {
        const args = remapArguments(oldParams, newParams, site, (s, e) => textWithRewrites(s, e));
        const before = site.args.map(a => textWithRewrites(a.start, a.end));
        const changed = args.length !== before.length || args.some((a, i) => a !== before[i]);
        if (changed && site.hasComments) {
          result.flagged.push({
            file: f.file,
            line: site.line,
            reason: 'comment in arguments',
            context: lineContext(index, site.line),
          });
        } else if (changed) {
          text = `(${args.join(', ')})`;
        }
      }
      rendered.set(site, text);
      return text;
    };

    for (const site of sites) {
      if (site.unsupported) {
        result.flagged.push({
          file: f.file,
          line: site.line,
          reason: site.unsupported,
          context: lineContext(index, site.line),
        });
      }
    }

    const edits = directChildren(0, f.source.length)
      .map(site => ({ site, text: render(site) }))
      .filter(({ site, text }) => text !== f.source.slice(site.argsStart, site.argsEnd))
      .map(({ site, text }) => editAt(f.file, f.source, index, site.argsStart, site.argsEnd, text));
    if (edits.length === 0) continue;
    plans.push({ file: f.file, source: f.source, edits });
    result.edits.push(...edits);
  }

  // Step 3: write.
  if (!dryRun) {
    result.errors.push(...commitEditPlans(root, plans, log));
    result.applied = result.errors.length === 0;
  }

  log.info('migrate_signature', {
    functionName,
    oldParams,
    newParams: result.newParams,
    edits: result.edits.length,
    flagged: result.flagged.length,
    dryRun,
    applied: result.applied,
  });
  return result;
}
