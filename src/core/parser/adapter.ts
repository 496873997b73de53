import type { Chunk, FileSymbolTable, RawOccurrence } from '../types';

export interface ExtractOptions {
  docMaxChars: number;
  valueMaxChars: number;
}

export const DEFAULT_EXTRACT_OPTIONS: ExtractOptions = {
  docMaxChars: 200,
  valueMaxChars: 80,
};

/** Identifier token location; `start`/`end` are source offsets. */
export interface TokenSpan {
  line: number;
  start: number;
  end: number;
}

export interface LineSpan {
  start: number;
  end: number;
}

export type CallArgumentKind = 'positional' | 'keyword' | 'unpacked';

export interface CallArgument {
  kind: CallArgumentKind;
  text: string;
  start: number;
  end: number;
  keyword?: string;
}

export interface CallSite {
  line: number;
  /** Offsets of the parenthesised argument list, parentheses included. */
  argsStart: number;
  argsEnd: number;
  args: CallArgument[];
  /** Set when the call cannot be rewritten positionally. */
  unsupported?: string;
  /** A comment sits between the arguments; rewriting the list would drop it. */
  hasComments?: boolean;
}

interface BaseSourceParser {
  readonly id: string;
  readonly extensions: readonly string[];
  /** Reserved words of the language; never valid as a new name. */
  readonly reservedWords: ReadonlySet<string>;
  extract(source: string, options?: ExtractOptions): FileSymbolTable;
  occurrences(source: string): RawOccurrence[];
  identifierSpans(source: string, name: string): TokenSpan[];
  chunks(source: string, file: string, options?: ExtractOptions): Chunk[];
  /** Span of the first function or class named `name`, decorators included. */
  definitionSpan(source: string, name: string): LineSpan | null;
  checkSyntax(source: string): boolean;
}

/** Parser backed by a real grammar: token-accurate and able to locate calls. */
export interface ExactGrammarParser extends BaseSourceParser {
  readonly kind: 'exact-grammar';
  callSites(source: string, name: string): CallSite[];
}

/** Line-pattern parser. Results may over- or under-count. */
export interface HeuristicSourceParser extends BaseSourceParser {
  readonly kind: 'heuristic';
}

export type SourceParser = ExactGrammarParser | HeuristicSourceParser;
