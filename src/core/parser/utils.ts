import type { FileSymbolTable, ParserKind } from '../types';

export interface TextPosition {
  /** 1-based */
  line: number;
  /** 0-based, UTF-16 code units */
  column: number;
}

/** Offset ↔ line/column conversions over one source text. */
export class LineIndex {
  private readonly starts: number[];

  constructor(private readonly text: string) {
    this.starts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.starts.push(i + 1);
    }
  }

  get lineCount(): number {
    return this.starts.length;
  }

  lineStart(line: number): number {
    const idx = Math.min(Math.max(line, 1), this.starts.length) - 1;
    return this.starts[idx] ?? 0;
  }

  offsetOf(line: number, column: number): number {
    return this.lineStart(line) + column;
  }

  positionOf(offset: number): TextPosition {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.starts[mid] ?? 0) <= offset) lo = mid;
      else hi = mid - 1;
    }
    return { line: lo + 1, column: offset - (this.starts[lo] ?? 0) };
  }

  /** Line text without its trailing newline. */
  lineText(line: number): string {
    if (line < 1 || line > this.starts.length) return '';
    const start = this.lineStart(line);
    const next = line < this.starts.length ? this.lineStart(line + 1) - 1 : this.text.length;
    return this.text.slice(start, next);
  }

  /** Inclusive line range, newline characters kept. */
  sliceLines(startLine: number, endLine: number): string {
    if (endLine < startLine) return '';
    const start = this.lineStart(startLine);
    const end = endLine < this.starts.length ? this.lineStart(endLine + 1) : this.text.length;
    return this.text.slice(start, end);
  }
}

export function truncate(s: string, max: number): string {
  return s.length > max ? s.slice(0, max) : s;
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function emptyTable(language: string, confidence: ParserKind): FileSymbolTable {
  return {
    language,
    confidence,
    functions: [],
    classes: [],
    variables: [],
    imports: [],
    assignments: [],
    annotations: [],
  };
}

/** Split on commas that are not nested in brackets or quotes. */
export function splitTopLevel(s: string, sep = ','): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;
  let quote: string | null = null;
  for (const char of s) {
    if (quote) {
      current += char;
      if (char === quote) quote = null;
      continue;
    }
    if (char === '"' || char === "'" || char === '`') quote = char;
    else if (char === '(' || char === '[' || char === '{' || char === '<') depth++;
    else if (char === ')' || char === ']' || char === '}' || char === '>') depth--;

    if (char === sep && depth === 0) {
      if (current.trim()) parts.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  if (current.trim()) parts.push(current.trim());
  return parts;
}

export function isUpperConstantName(name: string): boolean {
  return /[A-Z]/.test(name) && name === name.toUpperCase();
}

export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isIdentifier(name: string): boolean {
  return /^[A-Za-z_$][A-Za-z0-9_$]*$/.test(name);
}
