import { baseLogger, type IngestLogger } from '../logger.js';
import type { CheckpointStore } from './checkpoint.js';
import { chunkId, segmentAncestors } from './hashing.js';
import type { VectorStore } from './vectorStore.js';
import type { WorkQueue } from './workQueue.js';

export type ReconcileDeps = {
  checkpoint: CheckpointStore;
  store: VectorStore;
  queue: WorkQueue;
  batchSize: number;
  logger?: IngestLogger;
};

export type ReconcileResult = {
  /** Processed documents whose vectors were looked up. */
  checked: number;
  /** Processed units whose first chunk is not in the collection. */
  missing: string[];
  requeued: string[];
};

/**
 * Find documents the checkpoint calls processed but whose vectors are gone
 * from the collection, forget the affected units and queue the documents
 * again. A unit counts as present when its first chunk id exists; a split
 * document is checked through its deepest processed segments, so only the
 * missing segments are ingested on the next run.
 */
export async function reconcileCheckpoint(
  deps: ReconcileDeps,
): Promise<ReconcileResult> {
  const logger = deps.logger ?? baseLogger;
  const { processed, skipped } = await deps.checkpoint.snapshot();
  const known = new Set([...processed, ...skipped]);

  const documents = processed.filter(
    (id) => !segmentAncestors(id).some((ancestor) => known.has(ancestor)),
  );
  const documentOf = new Map<string, string>();
  for (const documentId of documents) {
    const family = processed.filter(
      (id) => id === documentId || segmentAncestors(id).includes(documentId),
    );
    const parents = new Set(family.map((id) => segmentAncestors(id)[0]));
    for (const id of family) {
      if (!parents.has(id)) documentOf.set(id, documentId);
    }
  }

  const leaves = [...documentOf.keys()];
  const missing: string[] = [];
  for (let i = 0; i < leaves.length; i += deps.batchSize) {
    const batch = leaves.slice(i, i + deps.batchSize);
    const existing = await deps.store.getExistingIds(
      batch.map((id) => chunkId(id, 0)),
    );
    missing.push(...batch.filter((id) => !existing.has(chunkId(id, 0))));
  }

  const requeued: string[] = [];
  for (const documentId of documents) {
    const lost = missing.filter((id) => documentOf.get(id) === documentId);
    if (!lost.length) continue;
    // The missing unit and every ancestor up to the document lose their
    // processed mark; sibling segments that still have vectors keep theirs.
    const stale = new Set<string>();
    for (const id of lost) {
      stale.add(id);
      for (const ancestor of segmentAncestors(id)) {
        stale.add(ancestor);
        if (ancestor === documentId) break;
      }
    }
    await deps.checkpoint.unmark([...stale]);
    await deps.queue.forget(documentId);
    await deps.queue.enqueue(documentId);
    requeued.push(documentId);
    logger.warn(
      { documentId, missingUnits: lost },
      'processed document has no vectors; requeued',
    );
  }

  logger.info(
    {
      checked: documents.length,
      missing: missing.length,
      requeued: requeued.length,
    },
    'checkpoint reconciled with collection',
  );
  return { checked: documents.length, missing, requeued };
}
