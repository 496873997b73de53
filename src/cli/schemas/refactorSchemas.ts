import { z } from 'zod';

export const RenameSchema = z.object({
  oldName: z.string().min(1, 'Old name is required'),
  newName: z.string().min(1, 'New name is required'),
  path: z.string().default('.'),
  apply: z.boolean().default(false),
});

export const MigrateSchema = z.object({
  functionName: z.string().min(1, 'Function name is required'),
  params: z.array(z.string().min(1)).default([]),
  path: z.string().default('.'),
  apply: z.boolean().default(false),
});

export const PatchSchema = z
  .object({
    file: z.string().min(1, 'File path is required'),
    path: z.string().default('.'),
    search: z.string().optional(),
    replace: z.string().optional(),
    blocks: z.string().optional(),
    dryRun: z.boolean().default(false),
  })
  .refine(v => v.blocks !== undefined || (v.search !== undefined && v.replace !== undefined), {
    message: 'Pass --search and --replace, or --blocks <file>',
    path: ['search'],
  });
