import { Command } from 'commander';
import { executeHandler } from '../types';

export const queryCommand = new Command('query')
  .description('List every occurrence of a symbol name')
  .argument('<name>', 'Symbol name (exact match)')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--kind <kind>', 'all, definitions or usages', 'all')
  .option('--context', 'Include the source line of each occurrence', false)
  .option('--limit <n>', 'Limit results', '200')
  .action(async (name, options) => {
    await executeHandler('query', { name, ...options });
  });

export const findCommand = new Command('find')
  .description('Find symbol names by prefix (case-insensitive)')
  .argument('<prefix>', 'Name prefix')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--limit <n>', 'Limit results', '50')
  .action(async (prefix, options) => {
    await executeHandler('find', { prefix, ...options });
  });

export const summaryCommand = new Command('summary')
  .description('Summarize the classes, functions and variables of one file')
  .argument('<file>', 'File path, relative to the repository root')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .action(async (file, options) => {
    await executeHandler('summary', { file, ...options });
  });

export const explainCommand = new Command('explain')
  .description('Explain a symbol: definition, docstring, source preview and callers')
  .argument('<symbol>', 'Symbol name')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (symbol, options) => {
    await executeHandler('explain', { symbol, ...options });
  });
