import path from 'path';
import type { SourceParser } from './adapter';
import { goGrammar, javaGrammar, javascriptGrammar } from './grammars';
import { HeuristicParser } from './heuristic';
import { PythonParser } from './python';

/** Extension-keyed parser lookup. Later registrations win for an extension. */
export class ParserRegistry {
  private byExtension = new Map<string, SourceParser>();

  register(parser: SourceParser): this {
    for (const ext of parser.extensions) this.byExtension.set(ext.toLowerCase(), parser);
    return this;
  }

  forFile(filePath: string): SourceParser | null {
    return this.byExtension.get(path.extname(filePath).toLowerCase()) ?? null;
  }

  extensions(): string[] {
    return [...this.byExtension.keys()].sort();
  }
}

let defaultRegistry: ParserRegistry | null = null;

export function createDefaultRegistry(): ParserRegistry {
  return new ParserRegistry()
    .register(new PythonParser())
    .register(new HeuristicParser(javascriptGrammar))
    .register(new HeuristicParser(javaGrammar))
    .register(new HeuristicParser(goGrammar));
}

/** Shared registry; the tree-sitter parser is created on first use. */
export function getDefaultRegistry(): ParserRegistry {
  if (!defaultRegistry) defaultRegistry = createDefaultRegistry();
  return defaultRegistry;
}
