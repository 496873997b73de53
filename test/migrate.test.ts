import test from 'node:test';
import assert from 'node:assert/strict';
import { createTempRepo, GREET_FILES, readRepoFile, removeTempRepo } from './helpers';
import { migrateSignature, parseParamSpec } from '../src/core/migrate';

const CALLS = {
  'a.py': GREET_FILES['a.py'],
  'b.py': 'from a import greet\n\ngreet("x")\ngreet("x", loud=True)\n',
};

test('parseParamSpec splits on the first equals sign', () => {
  assert.deepEqual(parseParamSpec('name'), { name: 'name' });
  assert.deepEqual(parseParamSpec('sep=a=b'), { name: 'sep', default: 'a=b' });
  assert.deepEqual(parseParamSpec(' *rest '), { name: 'rest' });
});

test('a new parameter with a default is appended to positional calls', () => {
  const root = createTempRepo({ ...CALLS });
  try {
    const result = migrateSignature(root, 'greet', ['name', 'loud=False']);
    assert.deepEqual(result.oldParams, ['name']);
    assert.deepEqual(result.newParams, ['name', 'loud']);
    assert.deepEqual(result.edits, [{
      file: 'b.py',
      line: 3,
      endLine: 3,
      columnSpan: { start: 5, end: 10 },
      oldText: '("x")',
      newText: '("x", False)',
      context: 'greet("x")',
    }]);
    assert.equal(readRepoFile(root, 'b.py'), CALLS['b.py']);

    const applied = migrateSignature(root, 'greet', ['name', 'loud=False'], { dryRun: false });
    assert.equal(applied.applied, true);
    assert.equal(readRepoFile(root, 'b.py'), 'from a import greet\n\ngreet("x", False)\ngreet("x", loud=True)\n');
  } finally {
    removeTempRepo(root);
  }
});

test('parameters without a value get the placeholder', () => {
  const root = createTempRepo({ ...CALLS });
  try {
    const result = migrateSignature(root, 'greet', ['prefix', 'name']);
    assert.deepEqual(result.edits.map(e => e.newText), ['(None, "x")', '(None, "x", loud=True)']);
  } finally {
    removeTempRepo(root);
  }
});

test('parameters after one passed by keyword are named', () => {
  const root = createTempRepo({ 'a.py': GREET_FILES['a.py'], 'b.py': 'greet(name="x")\n' });
  try {
    const result = migrateSignature(root, 'greet', ['name', 'loud=False']);
    assert.deepEqual(result.edits.map(e => e.newText), ['(loud=False, name="x")']);
  } finally {
    removeTempRepo(root);
  }
});

test('nested calls are rewritten in one edit', () => {
  const root = createTempRepo({ 'a.py': GREET_FILES['a.py'], 'c.py': 'greet(greet("a"))\n' });
  try {
    const result = migrateSignature(root, 'greet', ['name', 'loud=False'], { dryRun: false });
    assert.equal(result.edits.length, 1);
    assert.equal(result.edits[0]?.oldText, '(greet("a"))');
    assert.equal(readRepoFile(root, 'c.py'), 'greet(greet("a", False), False)\n');
  } finally {
    removeTempRepo(root);
  }
});

test('unpacked and generator arguments are flagged, not rewritten', () => {
  const root = createTempRepo({
    'a.py': GREET_FILES['a.py'],
    'd.py': 'greet(*args)\ngreet(n for n in names)\n',
  });
  try {
    const result = migrateSignature(root, 'greet', ['name', 'loud=False']);
    assert.deepEqual(result.edits, []);
    assert.deepEqual(result.flagged, [
      { file: 'd.py', line: 1, reason: 'unpacked argument', context: 'greet(*args)' },
      { file: 'd.py', line: 2, reason: 'generator argument', context: 'greet(n for n in names)' },
    ]);
  } finally {
    removeTempRepo(root);
  }
});

test('a method signature skips self', () => {
  const root = createTempRepo({ 'g.py': 'class G:\n    def hi(self, who):\n        pass\n\n\nG().hi("a")\n' });
  try {
    const result = migrateSignature(root, 'hi', ['who', 'n=1'], { dryRun: false });
    assert.deepEqual(result.oldParams, ['who']);
    assert.equal(readRepoFile(root, 'g.py'), 'class G:\n    def hi(self, who):\n        pass\n\n\nG().hi("a", 1)\n');
  } finally {
    removeTempRepo(root);
  }
});

test('an unknown function or parameter name is an error', () => {
  const root = createTempRepo({ ...CALLS });
  try {
    assert.deepEqual(migrateSignature(root, 'nope', ['x']).errors, ["Could not find definition of 'nope'"]);
    assert.deepEqual(migrateSignature(root, 'greet', ['bad-name']).errors, ["'bad-name' is not a valid parameter name"]);
  } finally {
    removeTempRepo(root);
  }
});

test('calls with comments between arguments are flagged when they need a rewrite', () => {
  const root = createTempRepo({
    'a.py': GREET_FILES['a.py'],
    'e.py': 'greet(\n    "y",  # who\n)\n',
  });
  try {
    const grown = migrateSignature(root, 'greet', ['name', 'loud=False'], { dryRun: false });
    assert.deepEqual(grown.edits, []);
    assert.deepEqual(grown.flagged, [{ file: 'e.py', line: 1, reason: 'comment in arguments', context: 'greet(' }]);
    assert.equal(readRepoFile(root, 'e.py'), 'greet(\n    "y",  # who\n)\n');

    const same = migrateSignature(root, 'greet', ['name']);
    assert.deepEqual(same.edits, []);
    assert.deepEqual(same.flagged, []);
  } finally {
    removeTempRepo(root);
  }
});
