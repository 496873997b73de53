import test from 'node:test';
import assert from 'node:assert/strict';
import { createTempRepo, readRepoFile, removeTempRepo } from './helpers';
import {
  applyEdits,
  applyPatch,
  applySearchReplaceBlocks,
  NO_MATCH,
  parseSearchReplace,
  patchFile,
} from '../src/core/patch';
import { editAt } from '../src/core/edits';
import { LineIndex } from '../src/core/parser/utils';

test('applyPatch replaces the single exact match', () => {
  assert.deepEqual(applyPatch('a\nb\nc\n', 'b', 'B'), { ok: true, text: 'a\nB\nc\n', changed: true });
});

test('applyPatch reports no_match for absent text', () => {
  assert.deepEqual(applyPatch('a\nb\nc\n', 'z', 'Z'), NO_MATCH);
  assert.deepEqual(applyPatch('a\nb\nc\n', 'b ', 'B'), NO_MATCH);
  assert.deepEqual(applyPatch('abc', '', 'x'), NO_MATCH);
});

test('applyPatch result length is len(T) - len(S) + len(R)', () => {
  const cases: Array<[string, string, string]> = [
    ['def f():\n    return 1\n', 'return 1', 'return 42'],
    ['x = [1, 2, 3]', '[1, 2, 3]', '[]'],
    ['one two three', 'two', ''],
  ];
  for (const [t, s, r] of cases) {
    const res = applyPatch(t, s, r);
    assert.ok(res.ok);
    if (res.ok) assert.equal(res.text.length, t.length - s.length + r.length);
  }
});

test('applyPatch touches only the first occurrence', () => {
  const res = applyPatch('x x x', 'x', 'y');
  assert.ok(res.ok);
  if (res.ok) assert.equal(res.text, 'y x x');
});

test('applyPatch inserts replacement text literally', () => {
  const res = applyPatch('a.b', '.', '$&$&');
  assert.ok(res.ok);
  if (res.ok) assert.equal(res.text, 'a$&$&b');
});

test('applyPatch marks identical replacement as unchanged', () => {
  assert.deepEqual(applyPatch('keep', 'keep', 'keep'), { ok: true, text: 'keep', changed: false });
});

test('parseSearchReplace reads SEARCH/REPLACE blocks', () => {
  const text = [
    '<<<<<<< SEARCH',
    'old line',
    '=======',
    'new line',
    '>>>>>>> REPLACE',
    '',
    '<<<<<<< SEARCH',
    'second',
    '=======',
    'SECOND',
    '>>>>>>> REPLACE',
  ].join('\n');
  assert.deepEqual(parseSearchReplace(text), [
    { search: 'old line', replace: 'new line' },
    { search: 'second', replace: 'SECOND' },
  ]);
});

test('parseSearchReplace reads SEARCH:/REPLACE: sections', () => {
  assert.deepEqual(parseSearchReplace('SEARCH:\nfoo\nREPLACE:\nbar\n'), [{ search: 'foo', replace: 'bar' }]);
});

test('parseSearchReplace returns nothing for plain text', () => {
  assert.deepEqual(parseSearchReplace('just some words'), []);
});

test('applySearchReplaceBlocks applies in order and appends on empty search', () => {
  const res = applySearchReplaceBlocks('a\nb\nc\n', [
    { search: 'b', replace: 'B' },
    { search: '', replace: 'd' },
  ]);
  assert.deepEqual(res, { ok: true, text: 'a\nB\nc\n\nd\n', changed: true });
});

test('applySearchReplaceBlocks names the failing block', () => {
  const res = applySearchReplaceBlocks('a\nb\n', [
    { search: 'a', replace: 'A' },
    { search: 'zz', replace: 'ZZ' },
  ]);
  assert.deepEqual(res, { ok: false, reason: 'no_match', block: 1 });
});

test('applyEdits applies same-line edits right to left', () => {
  const source = 'foo(foo)\n';
  const index = new LineIndex(source);
  const edits = [editAt('f.js', source, index, 0, 3, 'bar'), editAt('f.js', source, index, 4, 7, 'bar')];
  assert.deepEqual(applyEdits(source, edits), { ok: true, text: 'bar(bar)\n' });
});

test('applyEdits refuses stale and overlapping edits', () => {
  const source = 'alpha beta\n';
  const index = new LineIndex(source);
  const stale = { ...editAt('f.js', source, index, 0, 5, 'x'), oldText: 'gamma' };
  const stRes = applyEdits(source, [stale]);
  assert.equal(stRes.ok, false);
  if (!stRes.ok) assert.equal(stRes.reason, 'stale');

  const overlapping = [editAt('f.js', source, index, 0, 5, 'x'), editAt('f.js', source, index, 2, 7, 'y')];
  const ovRes = applyEdits(source, overlapping);
  assert.equal(ovRes.ok, false);
  if (!ovRes.ok) assert.equal(ovRes.reason, 'overlap');
});

test('patchFile previews, writes and refuses paths outside the repo', () => {
  const root = createTempRepo({ 'mod.py': 'x = 1\ny = 2\n' });
  try {
    const preview = patchFile(root, 'mod.py', [{ search: 'y = 2', replace: 'y = 3' }], { dryRun: true });
    assert.deepEqual(preview, { ok: true, file: 'mod.py', changed: true, written: false, text: 'x = 1\ny = 3\n' });
    assert.equal(readRepoFile(root, 'mod.py'), 'x = 1\ny = 2\n');

    const applied = patchFile(root, 'mod.py', [{ search: 'y = 2', replace: 'y = 3' }]);
    assert.equal(applied.ok && applied.written, true);
    assert.equal(readRepoFile(root, 'mod.py'), 'x = 1\ny = 3\n');

    const missing = patchFile(root, 'mod.py', [{ search: 'y = 2', replace: 'y = 4' }]);
    assert.equal(missing.ok, false);
    if (!missing.ok) {
      assert.equal(missing.reason, 'no_match');
      assert.equal(missing.message, 'search block 1 not found in mod.py');
    }

    const outside = patchFile(root, '../elsewhere.py', [{ search: 'a', replace: 'b' }]);
    assert.equal(outside.ok, false);
    if (!outside.ok) assert.equal(outside.reason, 'outside_repo');

    const absent = patchFile(root, 'nope.py', [{ search: 'a', replace: 'b' }]);
    assert.equal(absent.ok, false);
    if (!absent.ok) assert.equal(absent.reason, 'not_found');
  } finally {
    removeTempRepo(root);
  }
});
