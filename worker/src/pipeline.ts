import { CheckpointStore } from './ingest/checkpoint.js';
import { ChromaVectorStore } from './ingest/chromaVectorStore.js';
import type { IngestConfig } from './ingest/config.js';
import { toDocumentId } from './ingest/discovery.js';
import { IngestionWorker } from './ingest/ingestWorker.js';
import { RecursiveSplitter } from './ingest/recursiveSplitter.js';
import { createTokenizer, type Tokenizer } from './ingest/tokenizer.js';
import type { VectorStore } from './ingest/vectorStore.js';
import { WorkQueue } from './ingest/workQueue.js';
import { closeAll } from './lmstudio/clientPool.js';
import { LmStudioEmbedder, type Embedder } from './lmstudio/embedder.js';
import { childLogger, type IngestLogger } from './logger.js';

export type Pipeline = {
  config: Readonly<IngestConfig>;
  embedder: Embedder;
  store: VectorStore;
  tokenizer: Tokenizer;
  queue: WorkQueue;
  checkpoint: CheckpointStore;
  worker: IngestionWorker;
  splitter: RecursiveSplitter;
  logger: IngestLogger;
  /** Remove a document's vectors and ledger entries so it can be re-ingested. */
  removeDocument(
    filePath: string,
  ): Promise<{ documentId: string; vectors: number; checkpoint: string[] }>;
  close(): Promise<void>;
};

export type PipelineOverrides = {
  embedder?: Embedder;
  store?: VectorStore;
  logger?: IngestLogger;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Wire every component from one resolved config. Callers own the returned
 * pipeline and must `close()` it.
 */
export function createPipeline(
  config: Readonly<IngestConfig>,
  overrides: PipelineOverrides = {},
): Pipeline {
  const logger =
    overrides.logger ?? childLogger({ collection: config.chroma.collection });
  const lock = { staleMs: config.queue.staleLockMs };
  const embedder =
    overrides.embedder ??
    new LmStudioEmbedder(config.embedding.model, config.embedding.baseUrl);
  const store =
    overrides.store ??
    new ChromaVectorStore({
      url: config.chroma.url,
      collection: config.chroma.collection,
      embedder,
      retry: config.retry,
      logger,
      sleep: overrides.sleep,
    });
  const tokenizer = createTokenizer(config.tokenizer);
  const checkpoint = new CheckpointStore(config.checkpointFile, lock);
  const queue = new WorkQueue(config.queueFile, {
    maxAttempts: config.queue.maxAttempts,
    leaseMs: config.queue.leaseMs,
    lock,
    logger,
    onParked: async (ids) => {
      for (const id of ids) await checkpoint.mark(id, false);
    },
  });
  const worker = new IngestionWorker(embedder, store, tokenizer, {
    chunking: config.chunking,
    maxInitialBytes: config.split.maxInitialBytes,
    insertBatchSize: config.insertBatchSize,
    dedupBatchSize: config.dedupBatchSize,
    retry: config.retry,
    logger,
    sleep: overrides.sleep,
  });
  const splitter = new RecursiveSplitter(worker, store, checkpoint, {
    ...config.split,
    retry: config.retry,
    logger,
    sleep: overrides.sleep,
  });

  return {
    config,
    embedder,
    store,
    tokenizer,
    queue,
    checkpoint,
    worker,
    splitter,
    logger,
    async removeDocument(filePath) {
      const documentId = toDocumentId(config.documentsRoot, filePath);
      const vectors = await store.deleteByDocument(documentId);
      const cleared = await checkpoint.clear(documentId);
      await queue.forget(documentId);
      logger.info(
        { documentId, vectors, checkpointEntries: cleared.length },
        'document removed for re-ingestion',
      );
      return { documentId, vectors, checkpoint: cleared };
    },
    async close() {
      await closeAll();
    },
  };
}
