import {
  ChromaClient,
  type Collection,
  type EmbeddingFunction,
} from 'chromadb';
import type { Embedder } from '../lmstudio/embedder.js';
import { baseLogger, type IngestLogger } from '../logger.js';
import { isRetryableError } from './errors.js';
import { runWithRetry, type RetryPolicy } from './retry.js';
import type { VectorRecord, VectorStore } from './vectorStore.js';

export function toChromaClientArgs(connectionString: string): {
  host: string;
  port: number;
  ssl: boolean;
} {
  const normalized = connectionString.includes('://')
    ? connectionString
    : `http://${connectionString}`;
  const url = new URL(normalized);
  const ssl = url.protocol === 'https:';
  const port = url.port ? Number(url.port) : 8000;
  return { host: url.hostname, port, ssl };
}

/**
 * Lets Chroma embed query text with the same model the ingest used, so the
 * collection can be searched by text as well as by vector.
 */
export class EmbedderFunction implements EmbeddingFunction {
  constructor(private readonly embedder: Embedder) {}

  async generate(texts: string[]): Promise<number[][]> {
    const results: number[][] = [];
    for (const text of texts) {
      results.push(await this.embedder.embed(text));
    }
    return results;
  }
}

export type ChromaVectorStoreOptions = {
  url: string;
  collection: string;
  embedder: Embedder;
  retry: RetryPolicy;
  logger?: IngestLogger;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Chroma collection behind the VectorStore interface. Every call goes
 * through the retry loop, and a retry only resumes once the server answers
 * a liveness check again.
 */
export class ChromaVectorStore implements VectorStore {
  private readonly client: ChromaClient;
  private readonly logger: IngestLogger;
  private collection: Collection | null = null;

  constructor(private readonly opts: ChromaVectorStoreOptions) {
    this.client = new ChromaClient(toChromaClientArgs(opts.url));
    this.logger = opts.logger ?? baseLogger;
  }

  async heartbeat(): Promise<void> {
    await this.client.listCollections();
  }

  async getExistingIds(ids: string[]): Promise<Set<string>> {
    if (!ids.length) return new Set();
    const result = await this.withCollection('get', (col) => col.get({ ids }));
    return new Set(result.ids);
  }

  async add(records: VectorRecord[]): Promise<void> {
    if (!records.length) return;
    await this.withCollection('add', (col) =>
      col.add({
        ids: records.map((r) => r.id),
        embeddings: records.map((r) => r.embedding),
        documents: records.map((r) => r.document),
        metadatas: records.map((r) => r.metadata),
      }),
    );
  }

  async count(): Promise<number> {
    return this.withCollection('count', (col) => col.count());
  }

  async delete(ids: string[]): Promise<void> {
    if (!ids.length) return;
    await this.withCollection('delete', (col) => col.delete({ ids }));
  }

  async deleteByDocument(documentId: string): Promise<number> {
    return this.withCollection('deleteByDocument', async (col) => {
      const existing = await col.get({ where: { documentId } });
      if (existing.ids.length) await col.delete({ ids: existing.ids });
      return existing.ids.length;
    });
  }

  private async getCollection(): Promise<Collection> {
    if (!this.collection) {
      this.collection = await this.client.getOrCreateCollection({
        name: this.opts.collection,
        metadata: { 'hnsw:space': 'cosine' },
        embeddingFunction: new EmbedderFunction(this.opts.embedder),
      });
    }
    return this.collection;
  }

  private withCollection<T>(
    operation: string,
    fn: (col: Collection) => Promise<T>,
  ): Promise<T> {
    return runWithRetry({
      operation: `chroma.${operation}`,
      maxAttempts: this.opts.retry.maxAttempts,
      baseDelayMs: this.opts.retry.baseDelayMs,
      sleep: this.opts.sleep,
      isRetryableError,
      runStep: async () => fn(await this.getCollection()),
      beforeRetry: () => this.heartbeat(),
      onRetry: ({ attempt, maxAttempts, error, delayMs }) => {
        this.logger.warn(
          { operation, attempt, maxAttempts, delayMs, err: error },
          'chroma call failed; retrying',
        );
      },
      onExhausted: ({ maxAttempts, error }) => {
        this.logger.error(
          { operation, maxAttempts, err: error },
          'chroma call exhausted retries',
        );
      },
    });
  }
}
