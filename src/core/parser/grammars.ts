import type { ImportDecl } from '../types';
import keywords from './keywords.json';
import type { LexicalRules } from './lexical';
import { splitTopLevel } from './utils';

export interface FunctionPattern {
  /** Must end at the opening parenthesis of the parameter list; needs a `name` group. */
  re: RegExp;
  /** Only matches at the top depth of a class body. */
  memberOnly?: boolean;
  /** Only a function if `=>` follows the parameter list. */
  arrow?: boolean;
}

export type ImportMatch = {
  imports: Array<Omit<ImportDecl, 'line'>>;
  /** Number of lines the statement spans. */
  lines: number;
};

export interface HeuristicGrammar {
  id: string;
  extensions: readonly string[];
  lexical: LexicalRules;
  keywords: ReadonlySet<string>;
  /** Words that can never name a declaration. */
  reserved: ReadonlySet<string>;
  functions: FunctionPattern[];
  /** Class-like declarations; `name` group, optional `rest` for the heritage clause. */
  classes: RegExp;
  /** Module-level variables; `name`, optional `annotation` and `value` groups. */
  variables?: RegExp;
  basesOf(rest: string): string[];
  /** Positional parameter name, or null when no further parameter is positional. */
  paramName(part: string): string | null;
  /** Parent type of a function whose match carries a `receiver` group. */
  receiverType?(receiver: string): string | undefined;
  matchImport(lines: readonly string[], masked: readonly string[], at: number): ImportMatch | null;
}

const IDENT = '[A-Za-z_$][\\w$]*';

function lastSegment(path: string, sep: string): string {
  const parts = path.split(sep).filter(Boolean);
  return parts[parts.length - 1] ?? path;
}

function heritage(rest: string): string[] {
  const out: string[] = [];
  const re = /\b(?:extends|implements)\s+([^{]+?)(?=\b(?:extends|implements)\b|\{|$)/g;
  for (const m of rest.matchAll(re)) {
    for (const part of splitTopLevel(m[1] ?? '')) out.push(part.trim());
  }
  return out;
}

function parseJsImportClause(clause: string, source: string, kind: ImportDecl['kind']): Array<Omit<ImportDecl, 'line'>> {
  const out: Array<Omit<ImportDecl, 'line'>> = [];
  let rest = clause.trim().replace(/^type\s+/, '');
  const braces = rest.match(/\{([\s\S]*)\}/);
  if (braces) {
    for (const item of splitTopLevel(braces[1] ?? '')) {
      const spec = item.replace(/^type\s+/, '').trim();
      const aliased = spec.match(/^([\w$]+)\s*(?:as|:)\s*([\w$]+)$/);
      out.push({ name: aliased?.[2] ?? spec, source, kind });
    }
    rest = rest.replace(braces[0], '');
  }
  for (const item of splitTopLevel(rest)) {
    const ns = item.match(/^\*\s+as\s+([\w$]+)$/);
    if (ns?.[1]) out.push({ name: ns[1], source, kind });
    else if (/^[\w$]+$/.test(item)) out.push({ name: item, source, kind });
  }
  return out;
}

export const javascriptGrammar: HeuristicGrammar = {
  id: 'javascript',
  extensions: ['.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs'],
  lexical: { quotes: `"'`, template: 'interpolated' },
  keywords: new Set(keywords.javascript),
  reserved: new Set(keywords.reserved.javascript),
  functions: [
    { re: new RegExp(`^\\s*(?:export\\s+)?(?:default\\s+)?(?:async\\s+)?function\\s*\\*?\\s*(?<name>${IDENT})\\s*(?:<[^>]*>)?\\s*\\(`, 'd') },
    {
      re: new RegExp(`^\\s*(?:export\\s+)?(?:const|let|var)\\s+(?<name>${IDENT})\\s*(?::[^=]+)?=\\s*(?:async\\s+)?function\\b\\s*\\*?\\s*(?:${IDENT})?\\s*\\(`, 'd'),
    },
    {
      re: new RegExp(`^\\s*(?:export\\s+)?(?:const|let|var)\\s+(?<name>${IDENT})\\s*(?::[^=]+)?=\\s*(?:async\\s+)?(?:<[^>]*>\\s*)?\\(`, 'd'),
      arrow: true,
    },
    {
      re: new RegExp(`^\\s*(?:(?:public|private|protected|static|readonly|abstract|override|async|get|set)\\s+)*\\*?(?<name>${IDENT})\\s*\\??\\s*(?:<[^>]*>)?\\s*\\(`, 'd'),
      memberOnly: true,
    },
  ],
  classes: new RegExp(`^\\s*(?:export\\s+)?(?:default\\s+)?(?:declare\\s+)?(?:abstract\\s+)?(?:class|interface)\\s+(?<name>${IDENT})(?<rest>[^{]*)`, 'd'),
  variables: new RegExp(`^(?:export\\s+)?(?:const|let|var)\\s+(?<name>${IDENT})\\s*(?::\\s*(?<annotation>[^=]+?))?\\s*=\\s*(?<value>.*?);?\\s*$`, 'd'),
  basesOf: heritage,
  paramName(part) {
    const p = part.replace(/^(?:public|private|protected|readonly|override)\s+/, '').trim();
    if (p.startsWith('...')) return null;
    const m = p.match(/^([\w$]+)\s*\??/);
    return m?.[1] ?? p.split('=')[0]?.trim() ?? p;
  },
  matchImport(lines, masked, at) {
    const head = (masked[at] ?? '').trim();
    if (/^import\b(?!\s*\()/.test(head)) {
      let text = lines[at] ?? '';
      let end = at;
      const complete = /(?:from\s*|import\s*)(['"])([^'"]+)\1/;
      while (!complete.test(text) && end + 1 < lines.length && end - at < 30) {
        end++;
        text += '\n' + (lines[end] ?? '');
      }
      const m = text.match(/^\s*import\s+([\s\S]+?)\s+from\s*(['"])([^'"]+)\2/);
      if (m) {
        return { imports: parseJsImportClause(m[1] ?? '', m[3] ?? '', 'import'), lines: end - at + 1 };
      }
      const bare = text.match(/^\s*import\s*(['"])([^'"]+)\1/);
      const source = bare?.[2];
      return { imports: source ? [{ name: source, source, kind: 'import' }] : [], lines: end - at + 1 };
    }
    if (/\brequire\s*\(/.test(masked[at] ?? '')) {
      const m = (lines[at] ?? '').match(/^\s*(?:export\s+)?(?:const|let|var)\s+(.+?)\s*=\s*require\s*\(\s*(['"])([^'"]+)\2\s*\)/);
      if (m) return { imports: parseJsImportClause(m[1] ?? '', m[3] ?? '', 'require'), lines: 1 };
    }
    return null;
  },
};

export const javaGrammar: HeuristicGrammar = {
  id: 'java',
  extensions: ['.java'],
  lexical: { quotes: `"'`, template: null },
  keywords: new Set(keywords.java),
  reserved: new Set(keywords.reserved.java),
  functions: [
    {
      re: new RegExp(
        `^\\s*(?:@${IDENT}(?:\\([^)]*\\))?\\s+)*(?:(?:public|private|protected|static|final|abstract|synchronized|native|default|strictfp)\\s+)*(?:<[^>]+>\\s+)?(?:[\\w$.\\[\\]?,]+(?:\\s*<[^>]*>)?(?:\\[\\])*\\s+)?(?<name>${IDENT})\\s*\\(`,
        'd',
      ),
      memberOnly: true,
    },
  ],
  classes: new RegExp(`^\\s*(?:@${IDENT}\\s+)*(?:(?:public|private|protected|static|final|abstract|sealed|non-sealed)\\s+)*(?:class|interface|enum|record)\\s+(?<name>${IDENT})(?<rest>[^{]*)`, 'd'),
  basesOf: heritage,
  paramName(part) {
    const p = part.replace(/@\w+(?:\([^)]*\))?\s*/g, '').replace(/\bfinal\s+/, '').trim();
    if (p.includes('...')) return null;
    const m = p.match(/([\w$]+)\s*(?:\[\])*$/);
    return m?.[1] ?? null;
  },
  matchImport(lines, masked, at) {
    if (!/^\s*import\s/.test(masked[at] ?? '')) return null;
    const m = (lines[at] ?? '').match(/^\s*import\s+(?:static\s+)?([\w$.]+(?:\.\*)?)\s*;/);
    if (!m?.[1]) return { imports: [], lines: 1 };
    return { imports: [{ name: lastSegment(m[1], '.'), source: m[1], kind: 'import' }], lines: 1 };
  },
};

function goImport(line: string): Omit<ImportDecl, 'line'> | null {
  const m = line.match(/^\s*(?:import\s+)?(?:([\w.]+)\s+)?"([^"]+)"/);
  if (!m?.[2]) return null;
  return { name: m[1] ?? lastSegment(m[2], '/'), source: m[2], kind: 'import' };
}

export const goGrammar: HeuristicGrammar = {
  id: 'go',
  extensions: ['.go'],
  lexical: { quotes: `"'`, template: 'raw' },
  keywords: new Set(keywords.go),
  reserved: new Set(keywords.reserved.go),
  functions: [
    { re: new RegExp(`^func\\s+(?:\\((?<receiver>[^)]*)\\)\\s*)?(?<name>${IDENT})\\s*(?:\\[[^\\]]*\\])?\\s*\\(`, 'd') },
  ],
  classes: new RegExp(`^type\\s+(?<name>${IDENT})(?:\\[[^\\]]*\\])?\\s+(?:struct|interface)\\b(?<rest>)`, 'd'),
  variables: new RegExp(`^(?:var|const)\\s+(?<name>${IDENT})(?:\\s+(?<annotation>[^=]+?))?\\s*=\\s*(?<value>.+?)\\s*$`, 'd'),
  basesOf: () => [],
  paramName(part) {
    const p = part.trim();
    if (p.includes('...')) return null;
    return p.split(/\s+/)[0] ?? null;
  },
  receiverType(receiver) {
    const type = receiver.trim().split(/\s+/).pop();
    return type ? type.replace(/^\*/, '').replace(/\[.*$/, '') : undefined;
  },
  matchImport(lines, masked, at) {
    const head = masked[at] ?? '';
    if (!/^import\b/.test(head)) return null;
    if (/^import\s*\(/.test(head)) {
      const imports: Array<Omit<ImportDecl, 'line'>> = [];
      let end = at + 1;
      while (end < lines.length && !/^\s*\)/.test(masked[end] ?? '')) {
        const decl = goImport(lines[end] ?? '');
        if (decl) imports.push(decl);
        end++;
      }
      return { imports, lines: Math.min(end, lines.length - 1) - at + 1 };
    }
    const decl = goImport(lines[at] ?? '');
    return { imports: decl ? [decl] : [], lines: 1 };
  },
};

export const HEURISTIC_GRAMMARS: readonly HeuristicGrammar[] = [javascriptGrammar, javaGrammar, goGrammar];
