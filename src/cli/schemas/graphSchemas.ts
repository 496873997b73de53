import { z } from 'zod';

export const QuerySymbolSchema = z.object({
  name: z.string().min(1, 'Symbol name is required'),
  path: z.string().default('.'),
  kind: z.enum(['all', 'definitions', 'usages']).default('all'),
  context: z.boolean().default(false),
  limit: z.coerce.number().int().positive().default(200),
});

export const FindSymbolsSchema = z.object({
  prefix: z.string().min(1, 'Prefix is required'),
  path: z.string().default('.'),
  limit: z.coerce.number().int().positive().default(50),
});

export const FileSummarySchema = z.object({
  file: z.string().min(1, 'File path is required'),
  path: z.string().default('.'),
});

export const ExplainSymbolSchema = z.object({
  symbol: z.string().min(1, 'Symbol name is required'),
  path: z.string().default('.'),
  json: z.boolean().default(false),
});
