export interface LexicalRules {
  /** Single-line string delimiters, e.g. `"'`. */
  quotes: string;
  /**
   * Backtick strings: `interpolated` keeps `${...}` expressions as code,
   * `raw` blanks the whole literal, `null` treats backticks as code.
   */
  template: 'interpolated' | 'raw' | null;
}

/**
 * Returns `source` with comment text and string contents replaced by spaces.
 * Length and newlines are preserved, so offsets and line numbers carry over
 * to the original text. String delimiters are kept.
 */
export function maskNonCode(source: string, rules: LexicalRules): string {
  const out = source.split('');
  const n = source.length;
  const blank = (from: number, to: number) => {
    for (let k = from; k < Math.min(to, n); k++) {
      if (out[k] !== '\n' && out[k] !== '\r') out[k] = ' ';
    }
  };

  // brace depth at which each open `${` started
  const interpolations: number[] = [];
  let depth = 0;

  const maskTemplate = (from: number): number => {
    let j = from;
    while (j < n) {
      const c = source[j];
      if (c === '\\') {
        blank(j, j + 2);
        j += 2;
        continue;
      }
      if (c === '`') return j + 1;
      if (rules.template === 'interpolated' && c === '$' && source[j + 1] === '{') {
        interpolations.push(depth);
        return j + 2;
      }
      blank(j, j + 1);
      j++;
    }
    return n;
  };

  let i = 0;
  while (i < n) {
    const c = source[i];
    const next = source[i + 1];
    if (c === '/' && next === '/') {
      let end = source.indexOf('\n', i);
      if (end < 0) end = n;
      blank(i, end);
      i = end;
      continue;
    }
    if (c === '/' && next === '*') {
      const close = source.indexOf('*/', i + 2);
      const end = close < 0 ? n : close + 2;
      blank(i, end);
      i = end;
      continue;
    }
    if (c !== undefined && rules.quotes.includes(c)) {
      let j = i + 1;
      while (j < n && source[j] !== c && source[j] !== '\n') {
        j += source[j] === '\\' ? 2 : 1;
      }
      blank(i + 1, j);
      i = j + 1;
      continue;
    }
    if (c === '`' && rules.template) {
      i = maskTemplate(i + 1);
      continue;
    }
    if (c === '{') depth++;
    if (c === '}') {
      const top = interpolations[interpolations.length - 1];
      if (top !== undefined && top === depth) {
        interpolations.pop();
        i = maskTemplate(i + 1);
        continue;
      }
      depth--;
    }
    i++;
  }
  return out.join('');
}

/** Offset of the bracket closing the one at `openAt`, or -1. */
export function matchBracket(masked: string, openAt: number): number {
  const open = masked[openAt];
  const close = open === '(' ? ')' : open === '[' ? ']' : open === '{' ? '}' : null;
  if (!open || !close) return -1;
  let depth = 0;
  for (let i = openAt; i < masked.length; i++) {
    const c = masked[i];
    if (c === open) depth++;
    else if (c === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** True when every bracket in the masked text is closed in order. */
export function bracketsBalanced(masked: string): boolean {
  const pairs: Record<string, string> = { ')': '(', ']': '[', '}': '{' };
  const stack: string[] = [];
  for (const c of masked) {
    if (c === '(' || c === '[' || c === '{') stack.push(c);
    else if (c === ')' || c === ']' || c === '}') {
      if (stack.pop() !== pairs[c]) return false;
    }
  }
  return stack.length === 0;
}
