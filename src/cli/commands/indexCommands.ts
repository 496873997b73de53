import { Command } from 'commander';
import { executeHandler } from '../types';

export const indexCommand = new Command('index')
  .description('Build or refresh the cross-reference graph (.refgraph/graph.json)')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--full', 'Re-parse every file instead of only changed ones', false)
  .action(async (options) => {
    await executeHandler('index', options);
  });

export const statusCommand = new Command('status')
  .description('Show whether the graph matches the working tree')
  .option('-p, --path <path>', 'Path inside the repository', '.')
  .option('--json', 'Output machine-readable JSON', false)
  .action(async (options) => {
    await executeHandler('status', options);
  });
