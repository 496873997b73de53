import { Command } from 'commander';
import { executeHandler } from '../types';

export const renameCommand = new Command('rename')
  .description('Rename an identifier across the repository (dry run unless --apply)')
  .argument('<old>', 'Current name')
  .argument('<new>', 'New name')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--apply', 'Write the edits', false)
  .action(async (oldName, newName, options) => {
    await executeHandler('rename', { oldName, newName, ...options });
  });

export const migrateCommand = new Command('migrate')
  .description('Rewrite call sites of a function for a new parameter list (dry run unless --apply)')
  .argument('<function>', 'Function name')
  .argument('[params...]', 'New parameters, in order: name or name=default')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--apply', 'Write the edits', false)
  .action(async (functionName, params, options) => {
    await executeHandler('migrate', { functionName, params, ...options });
  });

export const patchCommand = new Command('patch')
  .description('Apply exact search/replace edits to one file')
  .argument('<file>', 'File path, relative to the repository root')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--search <text>', 'Text to find (first occurrence, exact)')
  .option('--replace <text>', 'Replacement text')
  .option('--blocks <file>', 'File holding SEARCH/REPLACE blocks')
  .option('--dry-run', 'Report the result without writing', false)
  .action(async (file, options) => {
    await executeHandler('patch', { file, ...options });
  });
