import { z } from 'zod';

export const ContextSchema = z.object({
  queryParts: z.array(z.string()).min(1, 'Query text is required'),
  path: z.string().default('.'),
  maxChars: z.coerce.number().int().positive().optional(),
  json: z.boolean().default(false),
});

export const SliceSchema = z.object({
  name: z.string().min(1, 'Function or class name is required'),
  path: z.string().default('.'),
  context: z.coerce.number().int().min(0).default(5),
});
