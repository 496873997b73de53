export type OccurrenceKind = 'definition' | 'call' | 'ref' | 'attr' | 'store';

export interface SymbolOccurrence {
  readonly file: string;
  readonly line: number;
  readonly kind: OccurrenceKind;
  readonly name: string;
}

/** Occurrence as produced by a parser, before it is bound to a file. */
export interface RawOccurrence {
  name: string;
  line: number;
  kind: OccurrenceKind;
}

export type ParserKind = 'exact-grammar' | 'heuristic';

export interface FunctionDecl {
  name: string;
  start: number;
  end: number;
  /** Parameters that can be passed positionally, in declaration order. */
  params: string[];
  signature: string;
  doc: string;
  decorators: string[];
  isAsync: boolean;
  /** Enclosing class name for methods. */
  parent?: string;
}

export interface ClassDecl {
  name: string;
  start: number;
  end: number;
  bases: string[];
  methods: string[];
  doc: string;
}

export interface VariableDecl {
  name: string;
  line: number;
  valueRepr: string;
}

export type ImportKind = 'import' | 'from' | 'require' | 'include';

export interface ImportDecl {
  name: string;
  source: string;
  line: number;
  kind: ImportKind;
}

export interface AssignmentDecl {
  target: string;
  line: number;
  valueRepr: string;
}

export interface AnnotationDecl {
  name: string;
  annotation: string;
  line: number;
}

export interface FileSymbolTable {
  language: string;
  confidence: ParserKind;
  functions: FunctionDecl[];
  classes: ClassDecl[];
  variables: VariableDecl[];
  imports: ImportDecl[];
  assignments: AssignmentDecl[];
  annotations: AnnotationDecl[];
}

export interface CrossRefGraph {
  schemaVersion: number;
  fileHash: Map<string, string>;
  fileTable: Map<string, FileSymbolTable>;
  crossRefs: Map<string, SymbolOccurrence[]>;
}

export type ChunkKind = 'function' | 'class' | 'method' | 'variable' | 'block';

export interface Chunk {
  file: string;
  symbol: string;
  kind: ChunkKind;
  startLine: number;
  endLine: number;
  sourceText: string;
  doc: string;
  relevanceScore: number;
}

export interface ColumnSpan {
  start: number;
  end: number;
}

/**
 * One textual change. `line`/`endLine` are 1-based; `columnSpan.start` is a
 * column on `line` and `columnSpan.end` a column on `endLine`, both 0-based.
 */
export interface Edit {
  file: string;
  line: number;
  endLine: number;
  columnSpan: ColumnSpan;
  oldText: string;
  newText: string;
  context: string;
}

export interface RenameResult {
  oldName: string;
  newName: string;
  edits: Edit[];
  errors: string[];
  applied: boolean;
}

export interface FlaggedCallSite {
  file: string;
  line: number;
  reason: string;
  context: string;
}

export interface MigrationResult {
  functionName: string;
  oldParams: string[];
  newParams: string[];
  edits: Edit[];
  flagged: FlaggedCallSite[];
  errors: string[];
  applied: boolean;
}
