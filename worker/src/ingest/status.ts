import type { CheckpointStore } from './checkpoint.js';
import { getErrorMessage } from './errors.js';
import type { VectorStore } from './vectorStore.js';
import type { WorkQueue } from './workQueue.js';

export type StatusReport = {
  queue: {
    pending: number;
    processing: number;
    completed: number;
    failed: number;
    total: number;
    /** Share of queue entries that reached a terminal state, 0-100. */
    progressPct: number;
    processingIds: string[];
    failedIds: string[];
  };
  checkpoint: { processed: number; skipped: number };
  collection: { count: number } | { error: string };
};

export async function buildStatusReport(
  queue: WorkQueue,
  checkpoint: CheckpointStore,
  store: Pick<VectorStore, 'count'>,
): Promise<StatusReport> {
  const snapshot = await queue.snapshot();
  const ledger = await checkpoint.snapshot();
  const total =
    snapshot.pending.length +
    snapshot.processing.length +
    snapshot.completed.length +
    snapshot.failed.length;
  const done = snapshot.completed.length + snapshot.failed.length;

  let collection: StatusReport['collection'];
  try {
    collection = { count: await store.count() };
  } catch (err) {
    collection = { error: getErrorMessage(err) ?? 'unavailable' };
  }

  return {
    queue: {
      pending: snapshot.pending.length,
      processing: snapshot.processing.length,
      completed: snapshot.completed.length,
      failed: snapshot.failed.length,
      total,
      progressPct: total ? Math.round((done / total) * 1000) / 10 : 0,
      processingIds: [...snapshot.processing],
      failedIds: [...snapshot.failed],
    },
    checkpoint: {
      processed: ledger.processed.length,
      skipped: ledger.skipped.length,
    },
    collection,
  };
}
