import assert from 'node:assert/strict';
import path from 'node:path';
import test, { afterEach, beforeEach } from 'node:test';
import { CheckpointStore } from '../../ingest/checkpoint.js';
import { buildStatusReport } from '../../ingest/status.js';
import { WorkQueue } from '../../ingest/workQueue.js';
import { MemoryVectorStore } from '../support/memoryVectorStore.js';
import { silentLogger } from '../support/silentLogger.js';
import { makeTempDir, removeTempDir } from '../support/tempDir.js';

let dir = '';
let queue: WorkQueue;
let checkpoint: CheckpointStore;

beforeEach(async () => {
  dir = await makeTempDir();
  queue = new WorkQueue(path.join(dir, 'queue.json'), {
    maxAttempts: 3,
    leaseMs: 60_000,
    logger: silentLogger,
  });
  checkpoint = new CheckpointStore(path.join(dir, 'checkpoint.json'));
});

afterEach(async () => {
  await removeTempDir(dir);
});

test('an untouched pipeline reports zeros', async () => {
  const report = await buildStatusReport(
    queue,
    checkpoint,
    new MemoryVectorStore(),
  );
  assert.deepEqual(report, {
    queue: {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      total: 0,
      progressPct: 0,
      processingIds: [],
      failedIds: [],
    },
    checkpoint: { processed: 0, skipped: 0 },
    collection: { count: 0 },
  });
});

test('progress counts terminal entries against the whole queue', async () => {
  for (const id of ['a.txt', 'b.txt', 'c.txt', 'd.txt']) {
    await queue.enqueue(id);
  }
  await queue.complete((await queue.dequeue()) ?? '');
  await queue.fail((await queue.dequeue()) ?? '');
  await queue.dequeue();
  await checkpoint.mark('a.txt', true);
  await checkpoint.mark('b.txt', false);

  const report = await buildStatusReport(queue, checkpoint, {
    count: async () => 42,
  });

  assert.equal(report.queue.pending, 1);
  assert.equal(report.queue.processing, 1);
  assert.equal(report.queue.total, 4);
  assert.equal(report.queue.progressPct, 50);
  assert.deepEqual(report.queue.processingIds, ['c.txt']);
  assert.deepEqual(report.queue.failedIds, ['b.txt']);
  assert.deepEqual(report.checkpoint, { processed: 1, skipped: 1 });
  assert.deepEqual(report.collection, { count: 42 });
});

test('progress is rounded to one decimal', async () => {
  for (const id of ['a.txt', 'b.txt', 'c.txt']) await queue.enqueue(id);
  await queue.complete((await queue.dequeue()) ?? '');

  const report = await buildStatusReport(queue, checkpoint, {
    count: async () => 0,
  });
  assert.equal(report.queue.progressPct, 33.3);
});

test('an unreachable collection is reported instead of thrown', async () => {
  const store = new MemoryVectorStore();
  store.down = true;

  const report = await buildStatusReport(queue, checkpoint, store);
  assert.deepEqual(report.collection, {
    error: 'connect ECONNREFUSED 127.0.0.1:8000',
  });
});
