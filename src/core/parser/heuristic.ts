import type { Chunk, FileSymbolTable, FunctionDecl, ImportDecl, RawOccurrence } from '../types';
import {
  DEFAULT_EXTRACT_OPTIONS,
  type ExtractOptions,
  type HeuristicSourceParser,
  type LineSpan,
  type TokenSpan,
} from './adapter';
import type { HeuristicGrammar } from './grammars';
import { bracketsBalanced, maskNonCode, matchBracket } from './lexical';
import { collapseWhitespace, emptyTable, escapeRegex, LineIndex, splitTopLevel, truncate } from './utils';

const BLOCK_LINES = 20;
const BLOCK_CHARS = 400;

interface Declaration {
  kind: 'function' | 'class';
  name: string;
  line: number;
  /** First decorator line, or `line`. */
  outerStart: number;
  endLine: number;
  nameStart: number;
  decorators: string[];
  doc: string;
  /** Parameter list offsets, parentheses excluded. */
  params?: { start: number; end: number };
  fn?: FunctionDecl;
  bases?: string[];
}

interface Analysis {
  source: string;
  masked: string;
  index: LineIndex;
  declarations: Declaration[];
  imports: ImportDecl[];
  importLines: Set<number>;
  variables: Array<{ name: string; line: number; value: string; annotation: string }>;
}

interface ClassScope {
  name: string;
  bodyDepth: number;
  start: number;
  end: number;
}

function cleanComment(lines: string[]): string {
  return lines
    .map(l => l.trim().replace(/^\/\*\*?/, '').replace(/\*\/$/, '').replace(/^\/\/\/?/, '').replace(/^\*\s?/, '').trim())
    .filter(Boolean)
    .join('\n');
}

/**
 * Line-pattern parser for brace languages. Declarations come from the
 * grammar's regular expressions, block ends from brace balance over the
 * text with strings and comments masked.
 */
export class HeuristicParser implements HeuristicSourceParser {
  readonly kind = 'heuristic' as const;
  readonly id: string;
  readonly extensions: readonly string[];
  readonly reservedWords: ReadonlySet<string>;

  constructor(private readonly grammar: HeuristicGrammar) {
    this.id = grammar.id;
    this.extensions = grammar.extensions;
    this.reservedWords = grammar.reserved;
  }

  private analyze(source: string, options: ExtractOptions): Analysis {
    const g = this.grammar;
    const masked = maskNonCode(source, g.lexical);
    const index = new LineIndex(source);
    const lines = source.split('\n');
    const maskedLines = masked.split('\n');

    const depthAtLine: number[] = [0];
    let depth = 0;
    for (const l of maskedLines) {
      for (const c of l) {
        if (c === '{') depth++;
        else if (c === '}') depth = Math.max(0, depth - 1);
      }
      depthAtLine.push(depth);
    }
    // depthAtLine[i] is the depth at the start of line i + 1
    const depthBefore = (offset: number): number => {
      const pos = index.positionOf(offset);
      let d = depthAtLine[pos.line - 1] ?? 0;
      for (let k = index.lineStart(pos.line); k < offset; k++) {
        if (masked[k] === '{') d++;
        else if (masked[k] === '}') d--;
      }
      return d;
    };
    const lineOf = (offset: number) => index.positionOf(offset).line;

    // Offset of the body's `{` after `from`, or -1 when a `;` or another line ends the header first.
    const bodyOpen = (from: number, allowLines: number): number => {
      const limitLine = lineOf(from) + allowLines;
      for (let k = from; k < masked.length; k++) {
        const c = masked[k];
        if (c === '{') return k;
        if (c === ';' || c === '}') return -1;
        if (c === '\n' && lineOf(k) >= limitLine) return -1;
      }
      return -1;
    };

    const leading = (line: number): { outerStart: number; decorators: string[]; doc: string } => {
      const decorators: string[] = [];
      let cursor = line - 1;
      while (cursor >= 1 && (lines[cursor - 1] ?? '').trim().startsWith('@')) {
        decorators.unshift((lines[cursor - 1] ?? '').trim().replace(/^@\s*/, ''));
        cursor--;
      }
      const outerStart = cursor + 1;
      const comment: string[] = [];
      const above = (lines[cursor - 1] ?? '').trim();
      if (cursor >= 1 && above.endsWith('*/')) {
        let k = cursor;
        while (k >= 1) {
          const l = lines[k - 1] ?? '';
          comment.unshift(l);
          if (l.includes('/*')) break;
          k--;
        }
      } else {
        let k = cursor;
        while (k >= 1 && (lines[k - 1] ?? '').trim().startsWith('//')) {
          comment.unshift(lines[k - 1] ?? '');
          k--;
        }
      }
      return { outerStart, decorators, doc: truncate(cleanComment(comment), options.docMaxChars) };
    };

    const declarations: Declaration[] = [];
    const imports: ImportDecl[] = [];
    const importLines = new Set<number>();
    const variables: Analysis['variables'] = [];
    const classes: ClassScope[] = [];

    const enclosingClass = (line: number): ClassScope | undefined => {
      let found: ClassScope | undefined;
      for (const c of classes) {
        if (line > c.start && line <= c.end && (!found || c.start > found.start)) found = c;
      }
      return found;
    };

    for (let i = 0; i < lines.length; i++) {
      const lineNo = i + 1;
      const text = lines[i] ?? '';
      const mtext = maskedLines[i] ?? '';
      const lineStart = index.lineStart(lineNo);
      if (!mtext.trim()) continue;

      const imported = g.matchImport(lines, maskedLines, i);
      if (imported) {
        for (const decl of imported.imports) imports.push({ ...decl, line: lineNo });
        for (let k = 0; k < imported.lines; k++) importLines.add(lineNo + k);
        i += imported.lines - 1;
        continue;
      }

      const cls = g.classes.exec(mtext);
      const clsName = cls?.groups?.name;
      const clsAt = cls?.indices?.groups?.name;
      if (cls && clsName && clsAt && !g.keywords.has(clsName)) {
        const nameStart = lineStart + clsAt[0];
        const open = bodyOpen(nameStart, 3);
        const close = open >= 0 ? matchBracket(masked, open) : -1;
        const endLine = close >= 0 ? lineOf(close) : lineNo;
        const lead = leading(lineNo);
        declarations.push({
          kind: 'class',
          name: clsName,
          line: lineNo,
          outerStart: lead.outerStart,
          endLine,
          nameStart,
          decorators: lead.decorators,
          doc: lead.doc,
          bases: g.basesOf(cls.groups?.rest ?? ''),
        });
        if (open >= 0) classes.push({ name: clsName, bodyDepth: depthBefore(open) + 1, start: lineNo, end: endLine });
        continue;
      }

      const scope = enclosingClass(lineNo);
      let matchedFunction = false;
      for (const pattern of g.functions) {
        if (pattern.memberOnly && (!scope || depthAtLine[i] !== scope.bodyDepth)) continue;
        const m = pattern.re.exec(mtext);
        const name = m?.groups?.name;
        const at = m?.indices?.groups?.name;
        if (!m || !name || !at || g.keywords.has(name)) continue;

        const parenOpen = lineStart + m.index + m[0].length - 1;
        const parenClose = matchBracket(masked, parenOpen);
        if (parenClose < 0) continue;
        let bodyFrom = parenClose + 1;
        if (pattern.arrow) {
          const arrow = masked.slice(bodyFrom, bodyFrom + 200).match(/^\s*(?::[^=;{]*)?=>/);
          if (!arrow) continue;
          bodyFrom += arrow[0].length;
        }
        const open = pattern.arrow
          ? (/^\s*\{/.test(masked.slice(bodyFrom, bodyFrom + 200)) ? masked.indexOf('{', bodyFrom) : -1)
          : bodyOpen(bodyFrom, 3);
        const close = open >= 0 ? matchBracket(masked, open) : -1;
        const endLine = close >= 0 ? lineOf(close) : lineOf(parenClose);
        const closeLine = lineOf(parenClose);
        const headerEnd = open >= 0
          ? open
          : closeLine < index.lineCount ? index.lineStart(closeLine + 1) : source.length;
        const signature = collapseWhitespace(source.slice(lineStart, headerEnd)).replace(/[\s{]+$/, '');

        const params: string[] = [];
        for (const part of splitTopLevel(source.slice(parenOpen + 1, parenClose))) {
          const p = g.paramName(part);
          if (p === null) break;
          params.push(p);
        }

        const receiver = m.groups?.receiver;
        const parent = receiver && g.receiverType
          ? g.receiverType(receiver)
          : pattern.memberOnly ? scope?.name : undefined;

        const lead = leading(lineNo);
        const fn: FunctionDecl = {
          name,
          start: lineNo,
          end: endLine,
          params,
          signature,
          doc: lead.doc,
          decorators: lead.decorators,
          isAsync: /\basync\b/.test(mtext.slice(0, at[0])),
        };
        if (parent) fn.parent = parent;
        declarations.push({
          kind: 'function',
          name,
          line: lineNo,
          outerStart: lead.outerStart,
          endLine,
          nameStart: lineStart + at[0],
          decorators: lead.decorators,
          doc: lead.doc,
          params: { start: parenOpen + 1, end: parenClose },
          fn,
        });
        matchedFunction = true;
        break;
      }

      if (!matchedFunction && g.variables && depthAtLine[i] === 0) {
        const v = g.variables.exec(mtext);
        const name = v?.groups?.name;
        const valueAt = v?.indices?.groups?.value;
        const annotationAt = v?.indices?.groups?.annotation;
        if (v && name && !g.keywords.has(name)) {
          variables.push({
            name,
            line: lineNo,
            value: valueAt ? text.slice(valueAt[0], valueAt[1]).trim() : '',
            annotation: annotationAt ? text.slice(annotationAt[0], annotationAt[1]).trim() : '',
          });
        }
      }
    }

    return { source, masked, index, declarations, imports, importLines, variables };
  }

  extract(source: string, options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS): FileSymbolTable {
    const table = emptyTable(this.id, this.kind);
    const a = this.analyze(source, options);
    for (const d of a.declarations) {
      if (d.kind === 'function' && d.fn) table.functions.push(d.fn);
    }
    for (const d of a.declarations) {
      if (d.kind !== 'class') continue;
      table.classes.push({
        name: d.name,
        start: d.line,
        end: d.endLine,
        bases: d.bases ?? [],
        methods: table.functions.filter(f => f.parent === d.name).map(f => f.name),
        doc: d.doc,
      });
    }
    for (const v of a.variables) {
      const valueRepr = truncate(v.value, options.valueMaxChars);
      table.variables.push({ name: v.name, line: v.line, valueRepr });
      table.assignments.push({ target: v.name, line: v.line, valueRepr });
      if (v.annotation) table.annotations.push({ name: v.name, annotation: v.annotation, line: v.line });
    }
    table.imports.push(...a.imports);
    return table;
  }

  occurrences(source: string): RawOccurrence[] {
    const a = this.analyze(source, DEFAULT_EXTRACT_OPTIONS);
    const definitions = new Set(a.declarations.map(d => d.nameStart));
    const paramRanges = a.declarations.flatMap(d => (d.params ? [d.params] : []));
    const out: RawOccurrence[] = [];
    const masked = a.masked;

    for (const m of masked.matchAll(/(?<![\w$])[A-Za-z_$][\w$]*/g)) {
      const name = m[0];
      const start = m.index ?? 0;
      if (this.grammar.keywords.has(name)) continue;
      const line = a.index.positionOf(start).line;
      if (a.importLines.has(line)) continue;
      if (definitions.has(start)) {
        out.push({ name, line, kind: 'definition' });
        continue;
      }
      if (paramRanges.some(r => start >= r.start && start < r.end)) continue;

      const before = masked.slice(Math.max(0, start - 40), start).trimEnd();
      const after = masked.slice(start + name.length, start + name.length + 4).trimStart();
      const member = before.endsWith('.') && !before.endsWith('..');
      if (after.startsWith('(')) out.push({ name, line, kind: 'call' });
      else if (member) out.push({ name, line, kind: 'attr' });
      else if (/^(?::=|=(?![=>])|[+\-*/%&|^]=)/.test(after)) out.push({ name, line, kind: 'store' });
      else out.push({ name, line, kind: 'ref' });
    }
    return out;
  }

  identifierSpans(source: string, name: string): TokenSpan[] {
    if (!name || !source.includes(name)) return [];
    const masked = maskNonCode(source, this.grammar.lexical);
    const index = new LineIndex(source);
    const re = new RegExp(`(?<![\\w$])${escapeRegex(name)}(?![\\w$])`, 'g');
    const spans: TokenSpan[] = [];
    for (const m of masked.matchAll(re)) {
      const start = m.index ?? 0;
      spans.push({ line: index.positionOf(start).line, start, end: start + name.length });
    }
    return spans;
  }

  definitionSpan(source: string, name: string): LineSpan | null {
    const a = this.analyze(source, DEFAULT_EXTRACT_OPTIONS);
    const d = a.declarations.find(x => x.name === name);
    return d ? { start: d.outerStart, end: d.endLine } : null;
  }

  /** One block per declaration: up to 20 lines from its header, capped at 400 chars. */
  chunks(source: string, file: string, options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS): Chunk[] {
    const a = this.analyze(source, options);
    const named = [
      ...a.declarations.map(d => ({ symbol: d.name, line: d.line, doc: d.doc })),
      ...a.variables.map(v => ({ symbol: v.name, line: v.line, doc: '' })),
    ].sort((x, y) => x.line - y.line);
    return named.map((n) => {
      const endLine = Math.min(n.line + BLOCK_LINES - 1, a.index.lineCount);
      return {
        file,
        symbol: n.symbol,
        kind: 'block' as const,
        startLine: n.line,
        endLine,
        sourceText: truncate(a.index.sliceLines(n.line, endLine), BLOCK_CHARS),
        doc: n.doc,
        relevanceScore: 0,
      };
    });
  }

  checkSyntax(source: string): boolean {
    return bracketsBalanced(maskNonCode(source, this.grammar.lexical));
  }
}
