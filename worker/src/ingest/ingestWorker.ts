import path from 'path';
import { createChunkMetadata } from '@ragingest/common';
import type { Embedder } from '../lmstudio/embedder.js';
import { baseLogger, type IngestLogger } from '../logger.js';
import { chunkText } from './chunker.js';
import type { ChunkingConfig } from './config.js';
import {
  classifyFailure,
  getErrorMessage,
  isRetryableError,
} from './errors.js';
import { chunkId } from './hashing.js';
import { runWithRetry, type RetryPolicy } from './retry.js';
import type { Tokenizer } from './tokenizer.js';
import type {
  ChunkFailure,
  IngestOutcome,
  IngestUnit,
  TextChunk,
} from './types.js';
import type { VectorRecord, VectorStore } from './vectorStore.js';

export type IngestionWorkerOptions = {
  chunking: ChunkingConfig;
  maxInitialBytes: number;
  insertBatchSize: number;
  dedupBatchSize: number;
  retry: RetryPolicy;
  logger?: IngestLogger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

type PendingChunk = { id: string; record: VectorRecord; index: number };

function batches<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export class IngestionWorker {
  private readonly logger: IngestLogger;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    private readonly tokenizer: Tokenizer,
    private readonly opts: IngestionWorkerOptions,
  ) {
    this.logger = opts.logger ?? baseLogger;
  }

  /**
   * Chunk, embed and insert one unit. Chunks already in the store are left
   * alone, so re-running a unit only adds what is missing. `force` lifts the
   * size guard for units the splitter cannot cut any further.
   */
  async ingest(
    unit: IngestUnit,
    options: { force?: boolean } = {},
  ): Promise<IngestOutcome> {
    const outcome: IngestOutcome = {
      unitId: unit.id,
      status: 'completed',
      chunks: 0,
      inserted: 0,
      skippedExisting: 0,
      failedChunks: [],
      chunkIds: [],
    };

    if (!options.force && unit.byteSize > this.opts.maxInitialBytes) {
      this.logger.info(
        {
          unitId: unit.id,
          byteSize: unit.byteSize,
          limit: this.opts.maxInitialBytes,
        },
        'unit exceeds initial size limit',
      );
      return { ...outcome, status: 'failed', failureKind: 'size-exceeded' };
    }

    let chunks: TextChunk[];
    try {
      chunks = chunkText(unit.text, this.opts.chunking, this.tokenizer);
    } catch (err) {
      return this.failWhole(outcome, err, 'chunking failed');
    }
    outcome.chunks = chunks.length;
    outcome.chunkIds = chunks.map((chunk) => chunkId(unit.id, chunk.index));
    if (!chunks.length) {
      this.logger.info({ unitId: unit.id }, 'unit has no text to ingest');
      return outcome;
    }

    let existing: Set<string>;
    try {
      existing = await this.findExisting(outcome.chunkIds);
    } catch (err) {
      return this.failWhole(outcome, err, 'existence check failed');
    }
    outcome.skippedExisting = existing.size;

    const ingestedAt = (this.opts.now?.() ?? new Date()).toISOString();
    const filename = path.basename(unit.sourcePath);
    let pending: PendingChunk[] = [];

    const flush = async () => {
      if (!pending.length) return;
      const batch = pending;
      pending = [];
      try {
        await this.store.add(batch.map((entry) => entry.record));
        outcome.inserted += batch.length;
      } catch (err) {
        const kind = classifyFailure(err);
        const message = getErrorMessage(err) ?? 'insert failed';
        this.logger.error(
          { unitId: unit.id, ids: batch.map((entry) => entry.id), err },
          'batch insert failed',
        );
        for (const entry of batch) {
          outcome.failedChunks.push({ index: entry.index, kind, message });
        }
      }
    };

    for (const chunk of chunks) {
      const id = chunkId(unit.id, chunk.index);
      if (existing.has(id)) continue;

      let embedding: number[];
      try {
        embedding = await this.embedWithRetry(chunk.text, id);
      } catch (err) {
        const failure: ChunkFailure = {
          index: chunk.index,
          kind: classifyFailure(err),
          message: getErrorMessage(err) ?? 'embedding failed',
        };
        this.logger.error(
          { unitId: unit.id, chunkId: id, kind: failure.kind, err },
          'chunk embedding failed',
        );
        outcome.failedChunks.push(failure);
        continue;
      }

      pending.push({
        id,
        index: chunk.index,
        record: {
          id,
          embedding,
          document: chunk.text,
          metadata: createChunkMetadata({
            documentId: unit.documentId,
            unitId: unit.id,
            filename,
            sourcePath: unit.sourcePath,
            chunkIndex: chunk.index,
            totalChunks: chunks.length,
            recursionLevel: unit.level,
            tokenCount: chunk.tokenCount,
            contentHash: chunk.contentHash,
            embeddingModel: this.embedder.modelId,
            ingestedAt,
          }),
        },
      });
      if (pending.length >= this.opts.insertBatchSize) await flush();
    }
    await flush();

    if (outcome.failedChunks.length) {
      outcome.status = 'failed';
      outcome.failureKind = outcome.failedChunks.some(
        (failure) => failure.kind === 'size-exceeded',
      )
        ? 'size-exceeded'
        : 'permanent';
    }

    this.logger.info(
      {
        unitId: unit.id,
        level: unit.level,
        status: outcome.status,
        chunks: outcome.chunks,
        inserted: outcome.inserted,
        skippedExisting: outcome.skippedExisting,
        failedChunks: outcome.failedChunks.length,
      },
      'unit ingest finished',
    );
    return outcome;
  }

  private async findExisting(ids: string[]): Promise<Set<string>> {
    const existing = new Set<string>();
    for (const group of batches(ids, this.opts.dedupBatchSize)) {
      const found = await this.store.getExistingIds(group);
      for (const id of found) existing.add(id);
    }
    return existing;
  }

  private embedWithRetry(text: string, id: string): Promise<number[]> {
    return runWithRetry({
      operation: 'embed',
      maxAttempts: this.opts.retry.maxAttempts,
      baseDelayMs: this.opts.retry.baseDelayMs,
      sleep: this.opts.sleep,
      isRetryableError,
      runStep: async () => {
        const embedding = await this.embedder.embed(text);
        if (!embedding.length) {
          throw new Error(`empty embedding returned for ${id}`);
        }
        return embedding;
      },
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.logger.warn(
          { chunkId: id, attempt, maxAttempts, delayMs, err: error },
          'embedding failed; retrying',
        );
      },
    });
  }

  private failWhole(
    outcome: IngestOutcome,
    err: unknown,
    message: string,
  ): IngestOutcome {
    const kind =
      classifyFailure(err) === 'size-exceeded' ? 'size-exceeded' : 'permanent';
    this.logger.error({ unitId: outcome.unitId, kind, err }, message);
    return { ...outcome, status: 'failed', failureKind: kind };
  }
}
