import { registerHandler, type HandlerRegistration } from './types';
import { IndexRepoSchema, StatusSchema } from './schemas/indexSchemas';
import { handleIndexRepo, handleStatus } from './handlers/indexHandlers';
import {
  QuerySymbolSchema,
  FindSymbolsSchema,
  FileSummarySchema,
  ExplainSymbolSchema,
} from './schemas/graphSchemas';
import {
  handleQuerySymbol,
  handleFindSymbols,
  handleFileSummary,
  handleExplainSymbol,
} from './handlers/graphHandlers';
import { ContextSchema, SliceSchema } from './schemas/contextSchemas';
import { handleContext, handleSlice } from './handlers/contextHandlers';
import { RenameSchema, MigrateSchema, PatchSchema } from './schemas/refactorSchemas';
import { handleRename, handleMigrate, handlePatch } from './handlers/refactorHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Maps command keys to their schema + handler implementations.
 * Command keys use the command names as typed on the command line.
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  // Graph lifecycle
  'index': registerHandler(IndexRepoSchema, handleIndexRepo),
  'status': registerHandler(StatusSchema, handleStatus),
  // Graph queries
  'query': registerHandler(QuerySymbolSchema, handleQuerySymbol),
  'find': registerHandler(FindSymbolsSchema, handleFindSymbols),
  'summary': registerHandler(FileSummarySchema, handleFileSummary),
  'explain': registerHandler(ExplainSymbolSchema, handleExplainSymbol),
  // Context retrieval
  'context': registerHandler(ContextSchema, handleContext),
  'slice': registerHandler(SliceSchema, handleSlice),
  // Mutations
  'rename': registerHandler(RenameSchema, handleRename),
  'migrate': registerHandler(MigrateSchema, handleMigrate),
  'patch': registerHandler(PatchSchema, handlePatch),
};
