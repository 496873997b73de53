import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'path';
import { createTempRepo, GREET_FILES, removeTempRepo } from './helpers';
import {
  buildSymbolGraph,
  buildSymbolGraphWithStats,
  ensureSymbolGraph,
  GraphDocumentSchema,
  loadSymbolGraph,
  saveSymbolGraph,
  SCHEMA_VERSION,
} from '../src/core/symbolGraph';
import { checkGraph } from '../src/core/graphCheck';
import { graphPath } from '../src/core/paths';

test('build persists the graph and load restores it', () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    const graph = buildSymbolGraph(root);
    assert.equal(graph.schemaVersion, SCHEMA_VERSION);
    assert.deepEqual([...graph.fileTable.keys()], ['a.py', 'b.py']);
    assert.ok(fs.existsSync(graphPath(root)));

    const loaded = loadSymbolGraph(root);
    assert.deepEqual([...loaded.crossRefs.keys()], [...graph.crossRefs.keys()]);
    assert.deepEqual(loaded.crossRefs.get('greet'), graph.crossRefs.get('greet'));
    assert.deepEqual(loaded.fileHash, graph.fileHash);
  } finally {
    removeTempRepo(root);
  }
});

test('rebuilding unchanged files yields an identical persisted graph', () => {
  const root = createTempRepo({ ...GREET_FILES, 'c.js': 'export function hi() { return greet(1); }\n' });
  try {
    buildSymbolGraph(root, { incremental: false });
    const first = fs.readFileSync(graphPath(root), 'utf-8');
    buildSymbolGraph(root, { incremental: true });
    const second = fs.readFileSync(graphPath(root), 'utf-8');
    buildSymbolGraph(root, { incremental: false });
    const third = fs.readFileSync(graphPath(root), 'utf-8');
    assert.equal(second, first);
    assert.equal(third, first);
  } finally {
    removeTempRepo(root);
  }
});

test('incremental build re-extracts only changed files', () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    const first = buildSymbolGraphWithStats(root);
    assert.deepEqual(first.stats, { files: 2, symbols: first.graph.crossRefs.size, reindexed: 2, skipped: 0 });

    const again = buildSymbolGraphWithStats(root);
    assert.equal(again.stats.reindexed, 0);

    fs.writeFileSync(path.join(root, 'b.py'), 'from a import greet\n\ngreet("y")\n');
    const changed = buildSymbolGraphWithStats(root);
    assert.equal(changed.stats.reindexed, 1);
  } finally {
    removeTempRepo(root);
  }
});

test('occurrences of edited or deleted files do not survive a rebuild', () => {
  const root = createTempRepo({ ...GREET_FILES, 'c.py': 'def farewell():\n    return greet("bye")\n' });
  try {
    const before = buildSymbolGraph(root);
    assert.deepEqual(before.crossRefs.get('farewell')?.map(o => o.file), ['c.py']);
    assert.equal(before.crossRefs.get('greet')?.length, 3);

    fs.removeSync(path.join(root, 'c.py'));
    fs.writeFileSync(path.join(root, 'b.py'), 'print("no calls")\n');
    const after = buildSymbolGraph(root);
    assert.equal(after.crossRefs.has('farewell'), false);
    assert.equal(after.fileTable.has('c.py'), false);
    assert.deepEqual(after.crossRefs.get('greet'), [{ file: 'a.py', line: 1, kind: 'definition', name: 'greet' }]);
  } finally {
    removeTempRepo(root);
  }
});

test('names shorter than the minimum length are not indexed', () => {
  const root = createTempRepo({ 'm.py': 'x = 1\nvalue = x\n' });
  try {
    const graph = buildSymbolGraph(root);
    assert.equal(graph.crossRefs.has('x'), false);
    assert.deepEqual(graph.crossRefs.get('value'), [{ file: 'm.py', line: 2, kind: 'store', name: 'value' }]);
  } finally {
    removeTempRepo(root);
  }
});

test('a graph of another schema version loads as empty', () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    fs.ensureDirSync(path.dirname(graphPath(root)));
    fs.writeJsonSync(graphPath(root), { schemaVersion: 99, files: {}, crossRefs: [] });
    assert.equal(loadSymbolGraph(root).fileTable.size, 0);

    const check = checkGraph(root);
    assert.equal(check.ok, false);
    assert.deepEqual(check.problems, ['schema_version_mismatch(found=99, expected=2)', 'graph_out_of_date']);

    const rebuilt = ensureSymbolGraph(root);
    assert.equal(rebuilt.fileTable.size, 2);
    assert.equal(fs.readJsonSync(graphPath(root)).schemaVersion, SCHEMA_VERSION);
  } finally {
    removeTempRepo(root);
  }
});

test('checkGraph reports missing, fresh and stale graphs', () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    const missing = checkGraph(root);
    assert.deepEqual(missing.problems, ['missing_graph']);
    assert.equal(missing.hint, 'Run `refgraph index` to rebuild the cross-reference graph.');

    buildSymbolGraph(root);
    const fresh = checkGraph(root);
    assert.equal(fresh.ok, true);
    assert.equal(fresh.found.files, 2);
    assert.equal(fresh.hint, 'Graph is up to date.');

    fs.appendFileSync(path.join(root, 'a.py'), '\n\ndef extra():\n    pass\n');
    fs.writeFileSync(path.join(root, 'new.py'), 'y = 2\n');
    fs.removeSync(path.join(root, 'b.py'));
    const stale = checkGraph(root);
    assert.deepEqual(stale.problems, ['graph_out_of_date']);
    assert.deepEqual(stale.stale, ['a.py']);
    assert.deepEqual(stale.missing, ['b.py']);
    assert.deepEqual(stale.untracked, ['new.py']);
  } finally {
    removeTempRepo(root);
  }
});

test('a name matching an Object.prototype key survives a reload', () => {
  const root = createTempRepo({ 'p.py': '__proto__ = 1\nprint(__proto__)\n', 'q.py': 'constructor = 2\n' });
  try {
    const graph = buildSymbolGraph(root);
    assert.deepEqual(graph.crossRefs.get('__proto__')?.map(o => o.line), [1, 2]);

    const persisted = GraphDocumentSchema.parse(fs.readJsonSync(graphPath(root)));
    assert.deepEqual(persisted.crossRefs.map(([name]) => name).filter(n => n === '__proto__' || n === 'constructor'), ['__proto__', 'constructor']);

    const loaded = loadSymbolGraph(root);
    assert.deepEqual(loaded.crossRefs.get('__proto__'), graph.crossRefs.get('__proto__'));
    assert.deepEqual(loaded.crossRefs.get('constructor'), graph.crossRefs.get('constructor'));
  } finally {
    removeTempRepo(root);
  }
});

test('a graph that cannot be saved is still returned', () => {
  const root = createTempRepo({ ...GREET_FILES, '.refgraph': 'not a directory\n' });
  try {
    const graph = buildSymbolGraph(root);
    assert.deepEqual([...graph.fileTable.keys()], ['a.py', 'b.py']);
    assert.equal(graph.crossRefs.get('greet')?.length, 2);
    assert.equal(saveSymbolGraph(root, graph), false);
    assert.equal(fs.readFileSync(path.join(root, '.refgraph'), 'utf-8'), 'not a directory\n');
  } finally {
    removeTempRepo(root);
  }
});

test('an unreadable source file is skipped', () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    fs.symlinkSync(path.join(root, 'missing.py'), path.join(root, 'gone.py'));
    const { graph, stats } = buildSymbolGraphWithStats(root);
    assert.equal(stats.skipped, 1);
    assert.equal(stats.files, 2);
    assert.equal(graph.fileTable.has('gone.py'), false);
  } finally {
    removeTempRepo(root);
  }
});

test('a file with syntax errors does not stop the build', () => {
  const root = createTempRepo({ ...GREET_FILES, 'bad.py': 'def broken(:\n    pass\n' });
  try {
    const graph = buildSymbolGraph(root);
    assert.deepEqual([...graph.fileTable.keys()], ['a.py', 'b.py', 'bad.py']);
    assert.equal(graph.fileTable.get('bad.py')?.language, 'python');
    assert.equal(graph.crossRefs.get('greet')?.length, 2);
  } finally {
    removeTempRepo(root);
  }
});
