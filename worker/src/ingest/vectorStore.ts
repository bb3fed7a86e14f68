import type { ChunkMetadata } from '@ragingest/common';

export type VectorRecord = {
  id: string;
  embedding: number[];
  document: string;
  metadata: ChunkMetadata;
};

/**
 * What the pipeline needs from a vector index. `add` is insert-only: callers
 * check `getExistingIds` first and never overwrite an id.
 */
export interface VectorStore {
  heartbeat(): Promise<void>;
  getExistingIds(ids: string[]): Promise<Set<string>>;
  add(records: VectorRecord[]): Promise<void>;
  count(): Promise<number>;
  delete(ids: string[]): Promise<void>;
  deleteByDocument(documentId: string): Promise<number>;
}
