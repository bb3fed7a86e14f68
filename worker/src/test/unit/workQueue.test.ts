import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import test, { afterEach, beforeEach } from 'node:test';
import { QueueFileError } from '../../ingest/errors.js';
import { WorkQueue } from '../../ingest/workQueue.js';
import { silentLogger } from '../support/silentLogger.js';
import { makeTempDir, removeTempDir } from '../support/tempDir.js';

let dir = '';
let queueFile = '';
let clock = 0;

const LEASE_MS = 60_000;

const openQueue = (
  maxAttempts = 3,
  onParked?: (ids: string[]) => Promise<void>,
) =>
  new WorkQueue(queueFile, {
    maxAttempts,
    leaseMs: LEASE_MS,
    logger: silentLogger,
    now: () => clock,
    onParked,
  });

beforeEach(async () => {
  clock = 1_000;
  dir = await makeTempDir();
  queueFile = path.join(dir, 'checkpoints', 'file_queue.json');
});

afterEach(async () => {
  await removeTempDir(dir);
});

test('a missing file is an empty queue', async () => {
  const queue = openQueue();
  assert.deepEqual(await queue.snapshot(), {
    pending: [],
    processing: [],
    completed: [],
    failed: [],
    attempts: {},
    startedAt: {},
  });
  assert.equal(await queue.dequeue(), null);
});

test('enqueue is idempotent', async () => {
  const queue = openQueue();
  assert.equal(await queue.enqueue('a.txt'), true);
  assert.equal(await queue.enqueue('a.txt'), false);
  assert.deepEqual((await queue.snapshot()).pending, ['a.txt']);
});

test('dequeue hands out the oldest pending id and counts the attempt', async () => {
  const queue = openQueue();
  await queue.enqueue('a.txt');
  await queue.enqueue('b.txt');

  assert.equal(await queue.dequeue(), 'a.txt');
  const snapshot = await queue.snapshot();
  assert.deepEqual(snapshot.pending, ['b.txt']);
  assert.deepEqual(snapshot.processing, ['a.txt']);
  assert.deepEqual(snapshot.attempts, { 'a.txt': 1 });
  assert.deepEqual(snapshot.startedAt, { 'a.txt': 1_000 });
});

test('complete moves to completed and later enqueues are ignored', async () => {
  const queue = openQueue();
  await queue.enqueue('a.txt');
  await queue.dequeue();
  await queue.complete('a.txt');
  await queue.complete('a.txt');

  assert.equal(await queue.enqueue('a.txt'), false);
  assert.deepEqual(await queue.snapshot(), {
    pending: [],
    processing: [],
    completed: ['a.txt'],
    failed: [],
    attempts: {},
    startedAt: {},
  });
});

test('a failed id goes back to pending when enqueued again', async () => {
  const queue = openQueue();
  await queue.enqueue('a.txt');
  await queue.dequeue();
  await queue.fail('a.txt');
  assert.deepEqual((await queue.snapshot()).failed, ['a.txt']);

  assert.equal(await queue.enqueue('a.txt'), true);
  const snapshot = await queue.snapshot();
  assert.deepEqual(snapshot.pending, ['a.txt']);
  assert.deepEqual(snapshot.failed, []);
});

test('recover leaves entries another worker holds a live lease on', async () => {
  const first = openQueue();
  await first.enqueue('a.txt');
  assert.equal(await first.dequeue(), 'a.txt');

  clock += LEASE_MS - 1;
  const second = openQueue();
  assert.deepEqual(await second.recover(), []);
  const snapshot = await second.snapshot();
  assert.deepEqual(snapshot.processing, ['a.txt']);
  assert.deepEqual(snapshot.pending, []);
  assert.equal(await second.dequeue(), null);
});

test('recover returns interrupted entries to the head of pending', async () => {
  const first = openQueue();
  await first.enqueue('a.txt');
  await first.enqueue('b.txt');
  assert.equal(await first.dequeue(), 'a.txt');

  // A new process after a crash, once the lease has run out.
  clock += LEASE_MS;
  const second = openQueue();
  assert.deepEqual(await second.recover(), ['a.txt']);
  const snapshot = await second.snapshot();
  assert.deepEqual(snapshot.pending, ['a.txt', 'b.txt']);
  assert.deepEqual(snapshot.processing, []);
  assert.deepEqual(snapshot.startedAt, {});
  assert.equal(await second.dequeue(), 'a.txt');
  assert.equal(await second.attemptsFor('a.txt'), 2);
});

test('entries without a start time are always reclaimed', async () => {
  await fs.mkdir(path.dirname(queueFile), { recursive: true });
  await fs.writeFile(
    queueFile,
    JSON.stringify({ pending: [], processing: ['a.txt'], completed: [], failed: [] }),
  );
  const queue = openQueue();
  assert.deepEqual(await queue.recover(), ['a.txt']);
  assert.deepEqual((await queue.snapshot()).pending, ['a.txt']);
});

test('an id that keeps getting interrupted is parked in failed', async () => {
  const parked: string[][] = [];
  const queue = openQueue(2, async (ids) => {
    parked.push(ids);
  });
  await queue.enqueue('poison.txt');
  await queue.enqueue('fine.txt');
  assert.equal(await queue.dequeue(), 'poison.txt');
  clock += LEASE_MS;
  await queue.recover();
  assert.equal(await queue.dequeue(), 'poison.txt');
  clock += LEASE_MS;
  await queue.recover();

  assert.equal(await queue.dequeue(), 'fine.txt');
  const snapshot = await queue.snapshot();
  assert.deepEqual(snapshot.failed, ['poison.txt']);
  assert.deepEqual(snapshot.processing, ['fine.txt']);
  assert.equal(snapshot.attempts['poison.txt'], 3);
  assert.equal(snapshot.startedAt['poison.txt'], undefined);
  assert.deepEqual(parked, [['poison.txt']]);
});

test('reaching a terminal list clears the attempt count', async () => {
  const queue = openQueue();
  await queue.enqueue('a.txt');
  await queue.dequeue();
  assert.equal(await queue.attemptsFor('a.txt'), 1);
  await queue.fail('a.txt');
  assert.equal(await queue.attemptsFor('a.txt'), 0);

  await queue.enqueue('a.txt');
  await queue.dequeue();
  assert.equal(await queue.attemptsFor('a.txt'), 1);
});

test('requeueFailed resets attempt counters', async () => {
  const queue = openQueue(1);
  await queue.enqueue('a.txt');
  await queue.dequeue();
  await queue.fail('a.txt');

  assert.deepEqual(await queue.requeueFailed(), ['a.txt']);
  const snapshot = await queue.snapshot();
  assert.deepEqual(snapshot.pending, ['a.txt']);
  assert.deepEqual(snapshot.failed, []);
  assert.deepEqual(snapshot.attempts, {});
  assert.equal(await queue.dequeue(), 'a.txt');
});

test('forget drops an id from every list', async () => {
  const queue = openQueue();
  await queue.enqueue('a.txt');
  await queue.dequeue();
  await queue.complete('a.txt');

  assert.equal(await queue.forget('a.txt'), true);
  assert.equal(await queue.forget('a.txt'), false);
  assert.equal(await queue.enqueue('a.txt'), true);
});

test('persists the four lists, attempts and start times as json', async () => {
  const queue = openQueue();
  await queue.enqueue('a.txt');
  await queue.dequeue();

  const raw: unknown = JSON.parse(await fs.readFile(queueFile, 'utf8'));
  assert.deepEqual(raw, {
    pending: [],
    processing: ['a.txt'],
    completed: [],
    failed: [],
    attempts: { 'a.txt': 1 },
    startedAt: { 'a.txt': 1_000 },
  });
});

test('an invalid queue file is an error, not an empty queue', async () => {
  await fs.mkdir(path.dirname(queueFile), { recursive: true });
  await fs.writeFile(queueFile, '{"pending": 5}');
  const queue = openQueue();

  await assert.rejects(queue.snapshot(), QueueFileError);
  await assert.rejects(queue.enqueue('a.txt'), QueueFileError);
  assert.equal(await fs.readFile(queueFile, 'utf8'), '{"pending": 5}');
});

test('a file written before attempts existed still loads', async () => {
  await fs.mkdir(path.dirname(queueFile), { recursive: true });
  await fs.writeFile(
    queueFile,
    JSON.stringify({ pending: ['a.txt'], processing: [], completed: [], failed: [] }),
  );
  const queue = openQueue();
  assert.equal(await queue.dequeue(), 'a.txt');
});
