import { Command } from 'commander';
import { executeHandler } from '../types';

export const contextCommand = new Command('context')
  .description('Select the code chunks most relevant to a query within a character budget')
  .argument('<query...>', 'Free-text query')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--max-chars <n>', 'Character budget over the selected chunks')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (queryParts, options) => {
    await executeHandler('context', { queryParts, ...options });
  });

export const sliceCommand = new Command('slice')
  .description('Print the definition of a function or class with surrounding lines')
  .argument('<name>', 'Function or class name')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--context <n>', 'Lines of context on each side', '5')
  .action(async (name, options) => {
    await executeHandler('slice', { name, ...options });
  });
