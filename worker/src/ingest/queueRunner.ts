import { baseLogger, type IngestLogger } from '../logger.js';
import type { CheckpointStore } from './checkpoint.js';
import { loadDocument } from './discovery.js';
import { getErrorMessage, RetryExhaustedError } from './errors.js';
import type { RecursiveSplitter } from './recursiveSplitter.js';
import type { IngestUnit, SplitOutcome } from './types.js';
import type { WorkQueue } from './workQueue.js';

export type RunSummary = {
  processed: number;
  completed: string[];
  failed: string[];
  alreadyProcessed: string[];
  recovered: string[];
  /** Units attempted per recursion level. */
  levels: Record<number, number>;
  segmentsCreated: number;
  /** Set when a backend stayed unreachable and the run stopped early. */
  aborted?: string;
};

export type RunQueueDeps = {
  queue: WorkQueue;
  checkpoint: CheckpointStore;
  splitter: RecursiveSplitter;
  documentsRoot: string;
  logger?: IngestLogger;
};

export function documentUnit(doc: {
  id: string;
  sourcePath: string;
  byteSize: number;
  text: string;
}): IngestUnit {
  return {
    id: doc.id,
    documentId: doc.id,
    parentId: null,
    level: 0,
    text: doc.text,
    byteSize: doc.byteSize,
    sourcePath: doc.sourcePath,
  };
}

function collectStats(outcome: SplitOutcome, summary: RunSummary) {
  if (outcome.attempted) {
    summary.levels[outcome.level] = (summary.levels[outcome.level] ?? 0) + 1;
  }
  summary.segmentsCreated += outcome.children.length;
  for (const child of outcome.children) collectStats(child, summary);
}

/**
 * Drain up to `maxIterations` documents from the queue (0 means until the
 * queue is empty). Entries left in `processing` by a previous run are
 * recovered first once their lease has run out. A document handed out
 * again after such a run goes straight to splitting rather than repeating
 * the whole-document attempt that died.
 */
export async function runQueue(
  deps: RunQueueDeps,
  maxIterations: number,
): Promise<RunSummary> {
  const logger = deps.logger ?? baseLogger;
  const summary: RunSummary = {
    processed: 0,
    completed: [],
    failed: [],
    alreadyProcessed: [],
    recovered: await deps.queue.recover(),
    levels: {},
    segmentsCreated: 0,
  };
  if (summary.recovered.length) {
    logger.warn(
      { ids: summary.recovered },
      'recovered entries left in processing by an interrupted run',
    );
  }

  while (maxIterations === 0 || summary.processed < maxIterations) {
    const id = await deps.queue.dequeue();
    if (id === null) break;
    summary.processed += 1;

    if (await deps.checkpoint.isProcessed(id)) {
      logger.info({ id }, 'document already processed; completing entry');
      await deps.queue.complete(id);
      summary.alreadyProcessed.push(id);
      continue;
    }

    let unit: IngestUnit;
    try {
      unit = documentUnit(await loadDocument(deps.documentsRoot, id));
    } catch (err) {
      logger.error({ id, err }, 'document could not be read');
      await deps.queue.fail(id);
      summary.failed.push(id);
      continue;
    }

    const attempts = await deps.queue.attemptsFor(id);
    const interrupted = attempts > 1;
    logger.info(
      { id, byteSize: unit.byteSize, attempts },
      'document ingest started',
    );
    let outcome: SplitOutcome;
    try {
      outcome = await deps.splitter.splitRecursive(unit, 0, {
        assumeOversized: interrupted,
      });
    } catch (err) {
      if (!(err instanceof RetryExhaustedError)) throw err;
      logger.error({ id, err }, 'backend unavailable; stopping run');
      await deps.queue.fail(id);
      await deps.checkpoint.mark(id, false);
      summary.failed.push(id);
      summary.aborted = getErrorMessage(err);
      break;
    }

    collectStats(outcome, summary);
    if (outcome.success) {
      await deps.queue.complete(id);
      summary.completed.push(id);
      logger.info({ id }, 'document ingest completed');
    } else {
      await deps.queue.fail(id);
      summary.failed.push(id);
      logger.warn(
        { id, failedSegments: outcome.failedLeaves },
        'document ingest failed',
      );
    }
  }

  logger.info(
    {
      processed: summary.processed,
      completed: summary.completed.length,
      failed: summary.failed.length,
      levels: summary.levels,
      segmentsCreated: summary.segmentsCreated,
    },
    'queue run finished',
  );
  return summary;
}
