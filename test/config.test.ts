import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'path';
import { createTempRepo, removeTempRepo } from './helpers';
import { defaultConfig, loadConfig, parseIgnorePatterns } from '../src/core/config';
import { listSourceFiles } from '../src/core/files';
import { getDefaultRegistry } from '../src/core/parser/registry';
import { buildSymbolGraph } from '../src/core/symbolGraph';

test('defaults apply without a config file', () => {
  const root = createTempRepo({});
  try {
    const config = loadConfig(root);
    assert.deepEqual(config, defaultConfig());
    assert.equal(config.maxChunkChars, 3000);
    assert.equal(config.minSymbolLength, 2);
    assert.ok(config.ignoreDirs.includes('.refgraph'));
  } finally {
    removeTempRepo(root);
  }
});

test('.refgraph/config.json overrides defaults', () => {
  const root = createTempRepo({ '.refgraph/config.json': JSON.stringify({ maxChunkChars: 500, ignoreDirs: ['vendor'] }) });
  try {
    const config = loadConfig(root);
    assert.equal(config.maxChunkChars, 500);
    assert.deepEqual(config.ignoreDirs, ['vendor']);
    assert.equal(config.docMaxChars, 200);
  } finally {
    removeTempRepo(root);
  }
});

test('invalid or malformed config falls back to defaults', () => {
  const invalid = createTempRepo({ '.refgraph/config.json': JSON.stringify({ maxChunkChars: -1 }) });
  const malformed = createTempRepo({ '.refgraph/config.json': '{ not json' });
  try {
    assert.deepEqual(loadConfig(invalid), defaultConfig());
    assert.deepEqual(loadConfig(malformed), defaultConfig());
  } finally {
    removeTempRepo(invalid);
    removeTempRepo(malformed);
  }
});

test('parseIgnorePatterns skips comments and negations', () => {
  assert.deepEqual(parseIgnorePatterns('generated/\n# comment\n!keep.py\n\n/build.py\n'), ['generated/**', 'build.py']);
});

test('listSourceFiles honours ignore directories and .refgraphignore', () => {
  const root = createTempRepo({
    'a.py': 'x = 1\n',
    'src/b.ts': 'export const y = 2;\n',
    'node_modules/dep/index.js': 'module.exports = {};\n',
    'generated/g.py': 'z = 3\n',
    'notes.txt': 'not source\n',
    '.refgraphignore': 'generated/\n',
  });
  try {
    const files = listSourceFiles(root, getDefaultRegistry().extensions(), loadConfig(root));
    assert.deepEqual(files, ['a.py', 'src/b.ts']);
    fs.removeSync(path.join(root, '.refgraphignore'));
    const all = listSourceFiles(root, getDefaultRegistry().extensions(), loadConfig(root));
    assert.deepEqual(all, ['a.py', 'generated/g.py', 'src/b.ts']);
  } finally {
    removeTempRepo(root);
  }
});

test('an unreadable .refgraphignore is ignored and the build still runs', () => {
  const root = createTempRepo({ 'a.py': 'def greet():\n    pass\n' });
  try {
    fs.ensureDirSync(path.join(root, '.refgraphignore'));
    assert.deepEqual(loadConfig(root).ignorePatterns, []);
    const graph = buildSymbolGraph(root);
    assert.deepEqual([...graph.fileTable.keys()], ['a.py']);
    assert.ok(graph.crossRefs.has('greet'));
  } finally {
    removeTempRepo(root);
  }
});
