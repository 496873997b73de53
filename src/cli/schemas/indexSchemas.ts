import { z } from 'zod';

export const IndexRepoSchema = z.object({
  path: z.string().default('.'),
  full: z.boolean().default(false),
});

export const StatusSchema = z.object({
  path: z.string().default('.'),
  json: z.boolean().default(false),
});
