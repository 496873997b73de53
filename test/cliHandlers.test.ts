import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import { z } from 'zod';
import { createTempRepo, GREET_FILES, readRepoFile, removeTempRepo } from './helpers';
import { cliHandlers } from '../src/cli/registry';
import { handleIndexRepo, handleStatus } from '../src/cli/handlers/indexHandlers';
import { handleFileSummary, handleFindSymbols, handleQuerySymbol } from '../src/cli/handlers/graphHandlers';
import { handleContext, handleSlice } from '../src/cli/handlers/contextHandlers';
import { handlePatch } from '../src/cli/handlers/refactorHandlers';
import { resolveRepoRoot } from '../src/cli/helpers';
import { graphPath } from '../src/core/paths';

function run(command: string, input: Record<string, unknown>) {
  const registration = cliHandlers[command];
  if (!registration) throw new Error(`no handler for ${command}`);
  return registration.run(input);
}

test('a missing path is repo_not_found', () => {
  const res = resolveRepoRoot(path.join('/nonexistent', 'refgraph-test'));
  assert.equal(typeof res === 'string' ? res : res.reason, 'repo_not_found');
});

test('queries before indexing report graph_not_ready', async () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    const res = await handleQuerySymbol({ name: 'greet', path: root, kind: 'all', context: false, limit: 200 });
    assert.equal(res.ok, false);
    assert.equal(res.reason, 'graph_not_ready');
  } finally {
    removeTempRepo(root);
  }
});

test('index, status, query and find work against one repo', async () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    const indexed = await handleIndexRepo({ path: root, full: false });
    assert.equal(indexed.ok, true);
    assert.equal(indexed.graphPath, graphPath(root));
    assert.equal(indexed.files, 2);
    assert.equal(indexed.reindexed, 2);

    const status = await handleStatus({ path: root, json: false });
    assert.equal(status.ok, true);
    assert.equal(status.upToDate, true);
    assert.equal(typeof status.textOutput, 'string');
    assert.ok(String(status.textOutput).startsWith(`repo: ${root}\ngraph: ok\nschema: 2 (expected 2)\nfiles: 2\n`));
    const statusJson = await handleStatus({ path: root, json: true });
    assert.equal(statusJson.textOutput, undefined);

    const all = await handleQuerySymbol({ name: 'greet', path: root, kind: 'all', context: false, limit: 200 });
    assert.equal(all.count, 2);
    assert.equal(all.truncated, false);
    assert.deepEqual(all.occurrences, [
      { file: 'a.py', line: 1, kind: 'definition' },
      { file: 'b.py', line: 3, kind: 'call' },
    ]);

    const usages = await handleQuerySymbol({ name: 'greet', path: root, kind: 'usages', context: true, limit: 200 });
    assert.deepEqual(usages.occurrences, [{ file: 'b.py', line: 3, kind: 'call', context: 'greet("x")' }]);

    const limited = await handleQuerySymbol({ name: 'greet', path: root, kind: 'all', context: false, limit: 1 });
    assert.equal(limited.truncated, true);

    const found = await handleFindSymbols({ prefix: 'gre', path: root, limit: 50 });
    assert.deepEqual(found.symbols, [{ name: 'greet', definitions: 1, usages: 1 }]);
  } finally {
    removeTempRepo(root);
  }
});

test('summary and slice report missing targets', async () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    await handleIndexRepo({ path: root, full: true });
    const summary = await handleFileSummary({ file: 'a.py', path: root });
    assert.equal(summary.summary, 'functions: greet');
    const missing = await handleFileSummary({ file: 'zz.py', path: root });
    assert.equal(missing.reason, 'file_not_found');

    const slice = await handleSlice({ name: 'greet', path: root, context: 0 });
    assert.equal(slice.code, 'def greet(name):\n    return "Hello " + name');
    const noSlice = await handleSlice({ name: 'nope', path: root, context: 0 });
    assert.equal(noSlice.reason, 'symbol_not_found');
  } finally {
    removeTempRepo(root);
  }
});

test('context prints the bundle unless json is asked for', async () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    const res = await handleContext({ queryParts: ['greet'], path: root, json: false });
    assert.equal(res.ok, true);
    assert.equal(res.textOutput, res.bundle);
    assert.ok(String(res.bundle).startsWith('[RELEVANT CODE CHUNKS]\n\n# a.py::greet (L1–2)\n'));
  } finally {
    removeTempRepo(root);
  }
});

test('rename previews by default and refreshes the graph once applied', async () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    await handleIndexRepo({ path: root, full: false });
    const preview = await run('rename', { oldName: 'greet', newName: 'hello', path: root });
    assert.equal(preview.ok, true);
    assert.equal(preview.dryRun, true);
    assert.equal(preview.applied, false);
    assert.equal(readRepoFile(root, 'b.py'), GREET_FILES['b.py']);

    const applied = await run('rename', { oldName: 'greet', newName: 'hello', path: root, apply: true });
    assert.equal(applied.applied, true);
    assert.equal(applied.graphRefreshed, true);
    const after = await handleQuerySymbol({ name: 'hello', path: root, kind: 'all', context: false, limit: 200 });
    assert.equal(after.count, 2);
  } finally {
    removeTempRepo(root);
  }
});

test('migrate of an unknown function is symbol_not_found', async () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    const res = await run('migrate', { functionName: 'nope', params: ['x'], path: root });
    assert.equal(res.reason, 'symbol_not_found');
    assert.equal(res.message, "Could not find definition of 'nope'");
  } finally {
    removeTempRepo(root);
  }
});

test('patch validates its input and maps failures to reasons', async () => {
  const root = createTempRepo({ ...GREET_FILES });
  try {
    await assert.rejects(run('patch', { file: 'a.py', path: root }), z.ZodError);

    const ok = await handlePatch({ file: 'a.py', path: root, search: 'Hello', replace: 'Hi', dryRun: false });
    assert.equal(ok.written, true);
    assert.equal(ok.graphRefreshed, false);
    assert.equal(readRepoFile(root, 'a.py'), 'def greet(name):\n    return "Hi " + name\n');

    const noMatch = await handlePatch({ file: 'a.py', path: root, search: 'Hello', replace: 'Hi', dryRun: false });
    assert.equal(noMatch.reason, 'patch_no_match');
    assert.equal(noMatch.message, 'search block 1 not found in a.py');

    const outside = await handlePatch({ file: '../x.py', path: root, search: 'a', replace: 'b', dryRun: true });
    assert.equal(outside.reason, 'outside_repo');
  } finally {
    removeTempRepo(root);
  }
});
