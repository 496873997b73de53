import test from 'node:test';
import assert from 'node:assert/strict';
import { createTempRepo, removeTempRepo } from './helpers';
import { buildSymbolGraph } from '../src/core/symbolGraph';
import {
  candidateFiles,
  extractChunk,
  formatContextBundle,
  getRelevantChunks,
  loadContextForQuery,
  loadFunctionSlice,
  scoreChunk,
  tokenize,
} from '../src/core/chunks';
import type { Chunk } from '../src/core/types';

const LIB = [
  'def greet(name):',
  '    """Say hello."""',
  '    return "Hello " + name',
  '',
  '',
  'def farewell(name):',
  '    return "Bye " + name',
  '',
  '',
  'class Greeter:',
  '    def greet_all(self, names):',
  '        return [greet(n) for n in names]',
  '',
].join('\n');

const APP = 'from lib import greet\n\n\ndef main():\n    print(greet("x"))\n';

function chunk(partial: Partial<Chunk>): Chunk {
  return {
    file: 'm.py',
    symbol: 'sym',
    kind: 'function',
    startLine: 1,
    endLine: 1,
    sourceText: '',
    doc: '',
    relevanceScore: 0,
    ...partial,
  };
}

test('tokenize keeps lowercase words longer than one character', () => {
  assert.deepEqual(tokenize('Load the CSV_file, x 2y'), ['load', 'the', 'csv_file']);
  assert.deepEqual(tokenize('1 2 3'), []);
});

test('scoreChunk adds the exact-symbol boost to the overlap ratio', () => {
  const c = chunk({ symbol: 'load', sourceText: 'def load(path): return path' });
  assert.equal(scoreChunk(c, ['load', 'path']), 4);
  assert.equal(scoreChunk(c, ['path', 'missing']), 0.5);
  assert.equal(scoreChunk(chunk({ symbol: '' }), ['load']), 0);
});

test('chunks are ranked by score', () => {
  const root = createTempRepo({ 'lib.py': LIB });
  try {
    const chunks = getRelevantChunks('greet someone', root);
    assert.deepEqual(chunks.map(c => [c.symbol, c.relevanceScore]), [
      ['greet', 3.5],
      ['Greeter', 0.5],
      ['Greeter.greet_all', 0.5],
    ]);
    assert.deepEqual(getRelevantChunks('!!', root), []);
  } finally {
    removeTempRepo(root);
  }
});

test('the budget stops accumulation but the best chunk is always kept', () => {
  const root = createTempRepo({ 'lib.py': LIB });
  try {
    const chunks = getRelevantChunks('greet someone', root, { maxChars: 10 });
    assert.deepEqual(chunks.map(c => c.symbol), ['greet']);
  } finally {
    removeTempRepo(root);
  }
});

test('candidate files come from exact and prefix symbol hits', () => {
  const root = createTempRepo({ 'lib.py': LIB, 'app.py': APP });
  try {
    const graph = buildSymbolGraph(root);
    assert.deepEqual(candidateFiles(graph, ['greet']), ['app.py', 'lib.py']);
    assert.deepEqual(candidateFiles(graph, ['farew']), ['lib.py']);
    assert.deepEqual(candidateFiles(graph, ['zzz']), []);

    const chunks = getRelevantChunks('farewell', root, { graph });
    assert.deepEqual(chunks.map(c => `${c.file}::${c.symbol}`), ['lib.py::farewell']);
  } finally {
    removeTempRepo(root);
  }
});

test('extractChunk includes decorators and falls back to nearby lines', () => {
  const py = '@cache\ndef f():\n    return 1\n\nx = f()\n';
  assert.equal(extractChunk(py, 'f', 'm.py'), '@cache\ndef f():\n    return 1\n');

  const text = 'a\nb\nc\nd\nneedle here\ne\n';
  assert.equal(extractChunk(text, 'needle', 'notes.txt'), 'b\nc\nd\nneedle here\ne\n');
  assert.equal(extractChunk(text, 'absent', 'notes.txt'), '');
});

test('formatContextBundle renders a header per chunk', () => {
  const bundle = formatContextBundle([
    chunk({ file: 'lib.py', symbol: 'greet', startLine: 1, endLine: 3, sourceText: 'def greet(name):\n' }),
  ]);
  assert.equal(bundle, '[RELEVANT CODE CHUNKS]\n\n# lib.py::greet (L1–3)\ndef greet(name):\n\n[/RELEVANT CODE CHUNKS]');
  assert.equal(formatContextBundle([]), '');
});

test('loadContextForQuery is empty when nothing matches', () => {
  const root = createTempRepo({ 'lib.py': LIB });
  try {
    assert.equal(loadContextForQuery('unrelated words', root), '');
  } finally {
    removeTempRepo(root);
  }
});

test('loadFunctionSlice returns the definition with surrounding lines', () => {
  const root = createTempRepo({ 'lib.py': LIB });
  try {
    const slice = loadFunctionSlice(root, 'farewell', 1);
    assert.deepEqual(slice, {
      file: 'lib.py',
      start: 6,
      end: 7,
      sliceStart: 5,
      sliceEnd: 8,
      code: '\ndef farewell(name):\n    return "Bye " + name\n',
    });
    assert.equal(loadFunctionSlice(root, 'missing'), null);
  } finally {
    removeTempRepo(root);
  }
});
