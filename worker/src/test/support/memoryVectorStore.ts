import type {
  VectorRecord,
  VectorStore,
} from '../../ingest/vectorStore.js';

/** In-process VectorStore with switches for simulating backend trouble. */
export class MemoryVectorStore implements VectorStore {
  readonly records = new Map<string, VectorRecord>();
  readonly addBatches: string[][] = [];
  readonly existenceBatches: string[][] = [];
  readonly deletedIds: string[] = [];
  heartbeats = 0;
  /** While true, every call rejects like an unreachable server. */
  down = false;
  /** Return an error to make that `add` call reject. */
  failAdd?: (records: VectorRecord[]) => Error | undefined;

  async heartbeat(): Promise<void> {
    this.heartbeats += 1;
    this.assertUp();
  }

  async getExistingIds(ids: string[]): Promise<Set<string>> {
    this.assertUp();
    this.existenceBatches.push([...ids]);
    return new Set(ids.filter((id) => this.records.has(id)));
  }

  async add(records: VectorRecord[]): Promise<void> {
    this.assertUp();
    const failure = this.failAdd?.(records);
    if (failure) throw failure;
    for (const record of records) {
      if (this.records.has(record.id)) {
        throw new Error(`duplicate id ${record.id}`);
      }
    }
    for (const record of records) this.records.set(record.id, record);
    this.addBatches.push(records.map((record) => record.id));
  }

  async count(): Promise<number> {
    this.assertUp();
    return this.records.size;
  }

  async delete(ids: string[]): Promise<void> {
    this.assertUp();
    for (const id of ids) {
      if (this.records.delete(id)) this.deletedIds.push(id);
    }
  }

  async deleteByDocument(documentId: string): Promise<number> {
    this.assertUp();
    const ids = [...this.records.values()]
      .filter((record) => record.metadata.documentId === documentId)
      .map((record) => record.id);
    await this.delete(ids);
    return ids.length;
  }

  idsFor(unitId: string): string[] {
    return [...this.records.keys()]
      .filter((id) => id.startsWith(`${unitId}_`))
      .sort();
  }

  private assertUp() {
    if (this.down) throw new Error('connect ECONNREFUSED 127.0.0.1:8000');
  }
}
