import { baseLogger, type IngestLogger } from '../logger.js';
import { byteMeasure, splitSemantic } from './boundaries.js';
import type { CheckpointStore } from './checkpoint.js';
import type { SplitConfig } from './config.js';
import { isRetryableError } from './errors.js';
import { segmentId } from './hashing.js';
import type { IngestionWorker } from './ingestWorker.js';
import { runWithRetry, type RetryPolicy } from './retry.js';
import type { IngestOutcome, IngestUnit, SplitOutcome } from './types.js';
import type { VectorStore } from './vectorStore.js';

export type RecursiveSplitterOptions = SplitConfig & {
  retry: RetryPolicy;
  logger?: IngestLogger;
  sleep?: (ms: number) => Promise<void>;
};

export type SplitRecursiveOptions = {
  /**
   * Skip the whole-unit attempt and split straight away, for a unit whose
   * last attempt took its worker down.
   */
  assumeOversized?: boolean;
};

/**
 * Ingests a unit whole when it can, and otherwise halves it along semantic
 * boundaries and ingests the halves, down to `maxDepth`.
 */
export class RecursiveSplitter {
  private readonly logger: IngestLogger;

  constructor(
    private readonly worker: IngestionWorker,
    private readonly store: VectorStore,
    private readonly checkpoint: CheckpointStore,
    private readonly opts: RecursiveSplitterOptions,
  ) {
    this.logger = opts.logger ?? baseLogger;
  }

  async splitRecursive(
    unit: IngestUnit,
    level: number = unit.level,
    options: SplitRecursiveOptions = {},
  ): Promise<SplitOutcome> {
    if (await this.checkpoint.isProcessed(unit.id)) {
      this.logger.debug({ unitId: unit.id, level }, 'unit already processed');
      return {
        unitId: unit.id,
        level,
        success: true,
        attempted: false,
        children: [],
        failedLeaves: [],
      };
    }

    // Segments already in the ledger mean an earlier run split this unit;
    // ingesting it whole now would duplicate what they hold.
    const resumed = await this.checkpoint.hasSegments(unit.id);
    if (resumed || options.assumeOversized) {
      this.logger.info(
        { unitId: unit.id, level, resumed },
        'skipping whole-unit attempt',
      );
    }

    let previous: IngestOutcome | undefined;
    if (
      !resumed &&
      !options.assumeOversized &&
      unit.byteSize <= this.opts.maxInitialBytes
    ) {
      previous = await this.worker.ingest(unit);
      if (previous.status === 'completed') {
        return this.leaf(unit, level, previous);
      }
    }

    if (level >= this.opts.maxDepth) {
      this.logger.warn(
        { unitId: unit.id, level, byteSize: unit.byteSize },
        'maximum split depth reached; ingesting as-is',
      );
      const outcome =
        previous ?? (await this.worker.ingest(unit, { force: true }));
      return this.leaf(unit, level, outcome);
    }

    if (previous && previous.failureKind !== 'size-exceeded') {
      await this.ensureBackendAlive(unit.id);
    }

    const target = Math.max(
      Math.floor(unit.byteSize / 2),
      this.opts.minSegmentBytes,
    );
    const pieces = splitSemantic(unit.text, {
      limit: target,
      overlap: 0,
      measure: byteMeasure,
    });

    if (pieces.length <= 1) {
      this.logger.info(
        { unitId: unit.id, level, byteSize: unit.byteSize },
        'unit has no further split point; ingesting as-is',
      );
      const outcome =
        previous ?? (await this.worker.ingest(unit, { force: true }));
      return this.leaf(unit, level, outcome);
    }

    if (previous && this.opts.discardPartialOnSplit) {
      await this.store.delete(previous.chunkIds);
    }

    this.logger.info(
      {
        unitId: unit.id,
        level,
        byteSize: unit.byteSize,
        targetBytes: target,
        segments: pieces.length,
        reason: previous?.failureKind ?? this.splitReason(resumed, options),
      },
      'splitting unit',
    );

    const children: SplitOutcome[] = [];
    for (const [i, piece] of pieces.entries()) {
      const child: IngestUnit = {
        id: segmentId(unit.id, i + 1),
        documentId: unit.documentId,
        parentId: unit.id,
        level: level + 1,
        text: piece.text,
        byteSize: piece.size,
        sourcePath: unit.sourcePath,
      };
      children.push(await this.splitRecursive(child, level + 1));
    }

    const success = children.every((child) => child.success);
    await this.checkpoint.mark(unit.id, success);
    return {
      unitId: unit.id,
      level,
      success,
      attempted: true,
      ingest: previous,
      children,
      failedLeaves: children.flatMap((child) => child.failedLeaves),
    };
  }

  private async leaf(
    unit: IngestUnit,
    level: number,
    outcome: IngestOutcome,
  ): Promise<SplitOutcome> {
    const success = outcome.status === 'completed';
    await this.checkpoint.mark(unit.id, success);
    return {
      unitId: unit.id,
      level,
      success,
      attempted: true,
      ingest: outcome,
      children: [],
      failedLeaves: success ? [] : [unit.id],
    };
  }

  private splitReason(resumed: boolean, options: SplitRecursiveOptions) {
    if (resumed) return 'resumed';
    return options.assumeOversized ? 'interrupted' : 'size-exceeded';
  }

  private async ensureBackendAlive(unitId: string) {
    await runWithRetry({
      operation: 'heartbeat',
      maxAttempts: this.opts.retry.maxAttempts,
      baseDelayMs: this.opts.retry.baseDelayMs,
      sleep: this.opts.sleep,
      isRetryableError,
      runStep: () => this.store.heartbeat(),
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.logger.warn(
          { unitId, attempt, maxAttempts, delayMs, err: error },
          'vector store unreachable before split; retrying',
        );
      },
    });
  }
}
