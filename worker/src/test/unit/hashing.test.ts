import assert from 'node:assert/strict';
import test from 'node:test';
import {
  chunkId,
  hashContent,
  isSegmentOf,
  segmentAncestors,
  segmentId,
} from '../../ingest/hashing.js';

const ABC_SHA256 =
  'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

test('hashContent is sha256 of the utf-8 text', () => {
  assert.equal(hashContent('abc'), ABC_SHA256);
});

test('chunk ids join unit id and index', () => {
  assert.equal(chunkId('notes/a.txt', 0), 'notes/a.txt_0');
  assert.equal(chunkId('notes/a.txt_02', 11), 'notes/a.txt_02_11');
});

test('segment ids append a zero-padded ordinal', () => {
  assert.equal(segmentId('doc.txt', 1), 'doc.txt_01');
  assert.equal(segmentId('doc.txt_02', 12), 'doc.txt_02_12');
  assert.equal(segmentId('doc.txt', 100), 'doc.txt_100');
});

test('segment ancestry only follows ordinal suffixes', () => {
  assert.deepEqual(segmentAncestors('notes.txt_01_02'), [
    'notes.txt_01',
    'notes.txt',
  ]);
  assert.deepEqual(segmentAncestors('notes.txt_v2.md'), []);
  assert.deepEqual(segmentAncestors('notes.txt_2'), []);
  assert.equal(isSegmentOf('notes.txt', 'notes.txt_01_02'), true);
  assert.equal(isSegmentOf('notes.txt', 'notes.txt_v2.md'), false);
  assert.equal(isSegmentOf('notes.txt', 'notes.txt'), false);
  assert.equal(isSegmentOf('notes', 'notes.txt_01'), false);
});
