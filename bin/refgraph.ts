#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { indexCommand, statusCommand } from '../src/cli/commands/indexCommands';
import { queryCommand, findCommand, summaryCommand, explainCommand } from '../src/cli/commands/graphCommands';
import { contextCommand, sliceCommand } from '../src/cli/commands/contextCommands';
import { renameCommand, migrateCommand, patchCommand } from '../src/cli/commands/refactorCommands';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readVersionFromPackageJson(): string {
  const pkgPath = findPackageJson(__dirname);
  if (!pkgPath) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function main() {
  const program = new Command();
  program
    .name('refgraph')
    .description('refgraph: symbol cross-references, safe renames and signature migrations')
    .version(readVersionFromPackageJson());

  program
    .addCommand(indexCommand)
    .addCommand(statusCommand)
    .addCommand(queryCommand)
    .addCommand(findCommand)
    .addCommand(summaryCommand)
    .addCommand(explainCommand)
    .addCommand(contextCommand)
    .addCommand(sliceCommand)
    .addCommand(renameCommand)
    .addCommand(migrateCommand)
    .addCommand(patchCommand);

  program.parseAsync(process.argv).catch((e: unknown) => {
    process.stderr.write(`${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(1);
  });
}

main();
