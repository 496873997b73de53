import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { createLogger } from '../log';
import keywords from './keywords.json';
import type { Chunk, ClassDecl, FileSymbolTable, FunctionDecl, RawOccurrence } from '../types';
import {
  DEFAULT_EXTRACT_OPTIONS,
  type CallArgument,
  type CallSite,
  type ExactGrammarParser,
  type ExtractOptions,
  type LineSpan,
  type TokenSpan,
} from './adapter';
import { collapseWhitespace, emptyTable, isUpperConstantName, LineIndex, truncate } from './utils';

type Node = Parser.SyntaxNode;

const SKIPPED_STATEMENTS = new Set([
  'import_statement',
  'import_from_statement',
  'future_import_statement',
  'global_statement',
  'nonlocal_statement',
  'comment',
]);

function line(n: Node): number {
  return n.startPosition.row + 1;
}

function endLine(n: Node): number {
  return n.endPosition.row + 1;
}

function field(n: Node, name: string): Node | null {
  return n.childForFieldName(name);
}

/** Unwraps `decorated_definition` into its definition plus decorator texts. */
function unwrapDecorated(n: Node): { def: Node; outer: Node; decorators: string[] } {
  if (n.type !== 'decorated_definition') return { def: n, outer: n, decorators: [] };
  const def = field(n, 'definition') ?? n;
  const decorators = n.namedChildren
    .filter(c => c.type === 'decorator')
    .map(c => c.text.replace(/^@\s*/, '').trim());
  return { def, outer: n, decorators };
}

function stringValue(text: string): string | null {
  const m = text.match(/^[A-Za-z]*("""|'''|"|')([\s\S]*)\1$/);
  return m ? (m[2] ?? '') : null;
}

function docstringOf(body: Node | null, max: number): string {
  if (!body) return '';
  const first = body.namedChildren.find(c => c.type !== 'comment');
  if (!first || first.type !== 'expression_statement') return '';
  const expr = first.namedChild(0);
  if (!expr || expr.type !== 'string') return '';
  const value = stringValue(expr.text);
  return value === null ? '' : truncate(value.trim(), max);
}

/** Names of the parameters that may be passed positionally. */
function positionalParams(params: Node | null): string[] {
  if (!params) return [];
  const out: string[] = [];
  for (const p of params.namedChildren) {
    switch (p.type) {
      case 'identifier':
        out.push(p.text);
        break;
      case 'typed_parameter': {
        const inner = p.namedChild(0);
        if (!inner || inner.type !== 'identifier') return out;
        out.push(inner.text);
        break;
      }
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = field(p, 'name');
        if (name) out.push(name.text);
        break;
      }
      case 'positional_separator':
      case 'comment':
        break;
      default:
        // `*`, `*args`, `**kwargs`: nothing after them is positional
        return out;
    }
  }
  return out;
}

function headerText(def: Node): string {
  const body = field(def, 'body');
  const raw = body ? def.text.slice(0, body.startIndex - def.startIndex) : def.text;
  return collapseWhitespace(raw).replace(/:$/, '').trim();
}

/**
 * Python support on tree-sitter. All operations are pure; unparseable input
 * yields empty results.
 */
export class PythonParser implements ExactGrammarParser {
  readonly id = 'python';
  readonly kind = 'exact-grammar' as const;
  readonly extensions = ['.py', '.pyi'] as const;
  readonly reservedWords: ReadonlySet<string> = new Set(keywords.reserved.python);

  private parser: Parser;
  private log = createLogger({ component: 'parser', lang: 'python' });

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  private parse(source: string): Parser.Tree | null {
    try {
      return this.parser.parse(source);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      if (!msg.includes('Invalid argument')) {
        this.log.debug('parse_failed', { err: msg });
        return null;
      }
      try {
        return this.parser.parse(source, undefined, { bufferSize: Math.max(1024 * 1024, source.length + 1) });
      } catch (retry) {
        this.log.debug('parse_failed', { err: retry instanceof Error ? retry.message : String(retry) });
        return null;
      }
    }
  }

  checkSyntax(source: string): boolean {
    const tree = this.parse(source);
    if (!tree) return false;
    const sexp = tree.rootNode.toString();
    return !sexp.includes('(ERROR') && !sexp.includes('(MISSING');
  }

  extract(source: string, options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS): FileSymbolTable {
    const table = emptyTable(this.id, this.kind);
    const tree = this.parse(source);
    if (!tree) return table;
    const root = tree.rootNode;

    const recordFunction = (def: Node, decorators: string[], parent?: string) => {
      const nameNode = field(def, 'name');
      if (!nameNode) return;
      const fn: FunctionDecl = {
        name: nameNode.text,
        start: line(def),
        end: endLine(def),
        params: positionalParams(field(def, 'parameters')),
        signature: headerText(def),
        doc: docstringOf(field(def, 'body'), options.docMaxChars),
        decorators,
        isAsync: def.children.some(c => c.type === 'async'),
      };
      if (parent) fn.parent = parent;
      table.functions.push(fn);
    };

    const recordClass = (def: Node): string | null => {
      const nameNode = field(def, 'name');
      if (!nameNode) return null;
      const body = field(def, 'body');
      const supers = field(def, 'superclasses');
      const cls: ClassDecl = {
        name: nameNode.text,
        start: line(def),
        end: endLine(def),
        bases: supers ? supers.namedChildren.filter(c => c.type !== 'keyword_argument' && c.type !== 'comment').map(c => c.text) : [],
        methods: [],
        doc: docstringOf(body, options.docMaxChars),
      };
      for (const item of body?.namedChildren ?? []) {
        const { def: inner } = unwrapDecorated(item);
        if (inner.type !== 'function_definition') continue;
        const methodName = field(inner, 'name');
        if (methodName) cls.methods.push(methodName.text);
      }
      table.classes.push(cls);
      return cls.name;
    };

    const recordImport = (n: Node) => {
      const at = line(n);
      if (n.type === 'import_statement') {
        for (const item of n.childrenForFieldName('name')) {
          if (item.type === 'aliased_import') {
            const name = field(item, 'name');
            const alias = field(item, 'alias');
            if (name) table.imports.push({ name: alias?.text ?? name.text, source: name.text, line: at, kind: 'import' });
          } else {
            table.imports.push({ name: item.text, source: item.text, line: at, kind: 'import' });
          }
        }
        return;
      }
      const moduleNode = field(n, 'module_name');
      const source = n.type === 'future_import_statement' ? '__future__' : (moduleNode?.text ?? '');
      if (n.namedChildren.some(c => c.type === 'wildcard_import')) {
        table.imports.push({ name: '*', source, line: at, kind: 'from' });
      }
      for (const item of n.childrenForFieldName('name')) {
        if (item.type === 'aliased_import') {
          const name = field(item, 'name');
          const alias = field(item, 'alias');
          if (name) table.imports.push({ name: alias?.text ?? name.text, source, line: at, kind: 'from' });
        } else {
          table.imports.push({ name: item.text, source, line: at, kind: 'from' });
        }
      }
    };

    const recordModuleAssignment = (stmt: Node) => {
      const expr = stmt.namedChild(0);
      if (!expr) return;
      if (expr.type === 'augmented_assignment') {
        const left = field(expr, 'left');
        const right = field(expr, 'right');
        if (left) table.assignments.push({ target: left.text, line: line(expr), valueRepr: truncate(right?.text ?? '', options.valueMaxChars) });
        return;
      }
      if (expr.type !== 'assignment') return;

      // a = b = value: every left side is a target, the innermost right side is the value
      const lefts: Node[] = [];
      let cursor: Node | null = expr;
      let annotation: Node | null = null;
      let value: Node | null = null;
      while (cursor && cursor.type === 'assignment') {
        const left = field(cursor, 'left');
        if (left) lefts.push(left);
        annotation = annotation ?? field(cursor, 'type');
        value = field(cursor, 'right');
        cursor = value;
      }
      const valueRepr = truncate(value?.text ?? '', options.valueMaxChars);
      const at = line(expr);
      for (const left of lefts) {
        table.assignments.push({ target: left.text, line: at, valueRepr });
        const names = left.type === 'identifier'
          ? [left]
          : (left.type === 'pattern_list' || left.type === 'tuple_pattern')
            ? left.namedChildren.filter(c => c.type === 'identifier')
            : [];
        for (const n of names) table.variables.push({ name: n.text, line: at, valueRepr });
      }
      const first = lefts[0];
      if (annotation && first) {
        table.annotations.push({ name: first.text, annotation: annotation.text, line: at });
      }
    };

    const walk = (n: Node, classCtx: string | undefined) => {
      if (n.type === 'import_statement' || n.type === 'import_from_statement' || n.type === 'future_import_statement') {
        recordImport(n);
        return;
      }
      const { def, decorators } = unwrapDecorated(n);
      if (def.type === 'function_definition') {
        recordFunction(def, decorators, classCtx);
        const body = field(def, 'body');
        if (body) walk(body, undefined);
        return;
      }
      if (def.type === 'class_definition') {
        const name = recordClass(def);
        const body = field(def, 'body');
        if (body) walk(body, name ?? undefined);
        return;
      }
      for (const c of n.namedChildren) walk(c, classCtx);
    };

    for (const stmt of root.namedChildren) {
      if (stmt.type === 'expression_statement') recordModuleAssignment(stmt);
    }
    walk(root, undefined);
    return table;
  }

  occurrences(source: string): RawOccurrence[] {
    const tree = this.parse(source);
    if (!tree) return [];
    const out: RawOccurrence[] = [];
    const push = (n: Node, kind: RawOccurrence['kind']) => {
      out.push({ name: n.text, line: line(n), kind });
    };

    const visitParameters = (params: Node) => {
      for (const p of params.namedChildren) {
        const type = field(p, 'type');
        const value = field(p, 'value');
        if (type) visit(type, false);
        if (value) visit(value, false);
      }
    };

    const visitExcept = (n: Node, skip: Array<Node | null>) => {
      for (const c of n.namedChildren) {
        if (skip.some(s => s !== null && s.id === c.id)) continue;
        visit(c, false);
      }
    };

    const visit = (n: Node, store: boolean): void => {
      if (SKIPPED_STATEMENTS.has(n.type)) return;
      switch (n.type) {
        case 'identifier':
          push(n, store ? 'store' : 'ref');
          return;
        case 'function_definition':
        case 'class_definition': {
          const name = field(n, 'name');
          if (name) out.push({ name: name.text, line: line(n), kind: 'definition' });
          const params = field(n, 'parameters');
          if (params) visitParameters(params);
          visitExcept(n, [name, params]);
          return;
        }
        case 'lambda': {
          const params = field(n, 'parameters');
          if (params) visitParameters(params);
          const body = field(n, 'body');
          if (body) visit(body, false);
          return;
        }
        case 'call': {
          const fn = field(n, 'function');
          if (fn?.type === 'identifier') {
            push(fn, 'call');
          } else if (fn?.type === 'attribute') {
            const obj = field(fn, 'object');
            const attr = field(fn, 'attribute');
            if (obj) visit(obj, false);
            if (attr) push(attr, 'call');
          } else if (fn) {
            visit(fn, false);
          }
          const args = field(n, 'arguments');
          if (args) visit(args, false);
          return;
        }
        case 'attribute': {
          const obj = field(n, 'object');
          const attr = field(n, 'attribute');
          if (obj) visit(obj, false);
          if (attr) push(attr, 'attr');
          return;
        }
        case 'subscript':
          for (const c of n.namedChildren) visit(c, false);
          return;
        case 'assignment':
        case 'augmented_assignment':
        case 'for_statement':
        case 'for_in_clause': {
          const left = field(n, 'left');
          if (left) visit(left, true);
          visitExcept(n, [left]);
          return;
        }
        case 'named_expression': {
          const name = field(n, 'name');
          const value = field(n, 'value');
          if (name) visit(name, true);
          if (value) visit(value, false);
          return;
        }
        case 'as_pattern': {
          const alias = field(n, 'alias');
          if (alias) visit(alias, true);
          visitExcept(n, [alias]);
          return;
        }
        case 'keyword_argument': {
          const value = field(n, 'value');
          if (value) visit(value, false);
          return;
        }
        case 'dotted_name':
          return;
        default:
          for (const c of n.namedChildren) visit(c, store);
      }
    };

    visit(tree.rootNode, false);
    return out.sort((a, b) => a.line - b.line);
  }

  identifierSpans(source: string, name: string): TokenSpan[] {
    if (!name || !source.includes(name)) return [];
    const tree = this.parse(source);
    if (!tree) return [];
    const index = new LineIndex(source);
    const spans: TokenSpan[] = [];
    const visit = (n: Node) => {
      if (n.type === 'identifier') {
        if (n.text === name && source.slice(n.startIndex, n.endIndex) === name) {
          spans.push({ line: index.positionOf(n.startIndex).line, start: n.startIndex, end: n.endIndex });
        }
        return;
      }
      for (const c of n.children) visit(c);
    };
    visit(tree.rootNode);
    return spans.sort((a, b) => a.start - b.start);
  }

  callSites(source: string, name: string): CallSite[] {
    if (!name || !source.includes(name)) return [];
    const tree = this.parse(source);
    if (!tree) return [];
    const sites: CallSite[] = [];

    const calleeName = (fn: Node | null): string | null => {
      if (!fn) return null;
      if (fn.type === 'identifier') return fn.text;
      if (fn.type === 'attribute') return field(fn, 'attribute')?.text ?? null;
      return null;
    };

    const visit = (n: Node) => {
      if (n.type === 'call' && calleeName(field(n, 'function')) === name) {
        const argsNode = field(n, 'arguments');
        if (argsNode) sites.push(this.toCallSite(argsNode));
      }
      for (const c of n.namedChildren) visit(c);
    };
    visit(tree.rootNode);
    return sites.sort((a, b) => a.argsStart - b.argsStart);
  }

  private toCallSite(argsNode: Node): CallSite {
    const site: CallSite = {
      line: line(argsNode),
      argsStart: argsNode.startIndex,
      argsEnd: argsNode.endIndex,
      args: [],
    };
    if (argsNode.type !== 'argument_list') {
      site.unsupported = 'generator argument';
      return site;
    }
    for (const a of argsNode.namedChildren) {
      if (a.type === 'comment') {
        site.hasComments = true;
        continue;
      }
      const arg: CallArgument = { kind: 'positional', text: a.text, start: a.startIndex, end: a.endIndex };
      if (a.type === 'keyword_argument') {
        arg.kind = 'keyword';
        arg.keyword = field(a, 'name')?.text ?? '';
      } else if (a.type === 'list_splat' || a.type === 'dictionary_splat') {
        arg.kind = 'unpacked';
        site.unsupported = 'unpacked argument';
      } else if (a.type === 'generator_expression') {
        site.unsupported = 'generator argument';
      }
      site.args.push(arg);
    }
    return site;
  }

  definitionSpan(source: string, name: string): LineSpan | null {
    const tree = this.parse(source);
    if (!tree) return null;
    let found: LineSpan | null = null;
    const visit = (n: Node) => {
      if (found) return;
      const { def, outer } = unwrapDecorated(n);
      if ((def.type === 'function_definition' || def.type === 'class_definition') && field(def, 'name')?.text === name) {
        found = { start: line(outer), end: endLine(outer) };
        return;
      }
      for (const c of n.namedChildren) visit(c);
    };
    visit(tree.rootNode);
    return found;
  }

  chunks(source: string, file: string, options: ExtractOptions = DEFAULT_EXTRACT_OPTIONS): Chunk[] {
    const tree = this.parse(source);
    if (!tree) return [];
    const index = new LineIndex(source);
    const out: Chunk[] = [];

    const push = (symbol: string, kind: Chunk['kind'], outer: Node, doc: string) => {
      out.push({
        file,
        symbol,
        kind,
        startLine: line(outer),
        endLine: endLine(outer),
        sourceText: index.sliceLines(line(outer), endLine(outer)),
        doc,
        relevanceScore: 0,
      });
    };

    for (const stmt of tree.rootNode.namedChildren) {
      const { def, outer } = unwrapDecorated(stmt);
      const name = field(def, 'name')?.text;
      if (def.type === 'function_definition' && name) {
        push(name, 'function', outer, docstringOf(field(def, 'body'), options.docMaxChars));
      } else if (def.type === 'class_definition' && name) {
        const body = field(def, 'body');
        push(name, 'class', outer, docstringOf(body, options.docMaxChars));
        for (const item of body?.namedChildren ?? []) {
          const method = unwrapDecorated(item);
          const methodName = field(method.def, 'name')?.text;
          if (method.def.type !== 'function_definition' || !methodName) continue;
          push(`${name}.${methodName}`, 'method', method.outer, docstringOf(field(method.def, 'body'), options.docMaxChars));
        }
      } else if (stmt.type === 'expression_statement') {
        const expr = stmt.namedChild(0);
        const left = expr?.type === 'assignment' ? field(expr, 'left') : null;
        const right = expr ? field(expr, 'right') : null;
        if (!expr || !left || left.type !== 'identifier' || !isUpperConstantName(left.text)) continue;
        out.push({
          file,
          symbol: left.text,
          kind: 'variable',
          startLine: line(expr),
          endLine: line(expr),
          sourceText: `${left.text} = ${truncate(right?.text ?? '', options.valueMaxChars)}`,
          doc: '',
          relevanceScore: 0,
        });
      }
    }
    return out;
  }
}
