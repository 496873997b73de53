export * from './core/types';
export { loadConfig, defaultConfig, mergeConfig, parseIgnorePatterns, type RefGraphConfig } from './core/config';
export { createLogger, type Logger, type LogLevel } from './core/log';
export { DATA_DIR, graphPath, configPath, resolveInsideRepo } from './core/paths';
export { ParserRegistry, createDefaultRegistry, getDefaultRegistry } from './core/parser/registry';
export type { SourceParser, ExactGrammarParser, HeuristicSourceParser, CallSite, TokenSpan } from './core/parser/adapter';
export {
  SCHEMA_VERSION,
  buildSymbolGraph,
  buildSymbolGraphWithStats,
  ensureSymbolGraph,
  loadSymbolGraph,
  saveSymbolGraph,
  type BuildOptions,
  type BuildStats,
} from './core/symbolGraph';
export { checkGraph, type GraphCheckResult } from './core/graphCheck';
export {
  querySymbol,
  findDefinitions,
  findUsages,
  findAllUsages,
  symbolsInFile,
  searchSymbolsByPrefix,
  getFileSummary,
  type UsageEntry,
} from './core/graphQuery';
export { renameSymbol, type MutationOptions } from './core/rename';
export { migrateSignature, parseParamSpec, MISSING_ARGUMENT, type ParamSpec } from './core/migrate';
export {
  applyPatch,
  applyEdits,
  applySearchReplaceBlocks,
  parseSearchReplace,
  patchFile,
  NO_MATCH,
  type PatchResult,
  type SearchReplaceBlock,
} from './core/patch';
export {
  getRelevantChunks,
  extractChunk,
  loadSymbolChunk,
  loadFunctionSlice,
  formatContextBundle,
  loadContextForQuery,
  type ChunkOptions,
  type FunctionSlice,
} from './core/chunks';
export { explainSymbol, formatExplanation, summarizeBlock, type SymbolExplanation } from './core/explain';
export {
  createMutationRequest,
  runGatedMutation,
  fixedApprover,
  ApprovalError,
  type MutationRequest,
  type Approver,
  type GatedOutcome,
} from './core/approval';
