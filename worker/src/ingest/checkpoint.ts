import {
  emptyCheckpointFile,
  parseCheckpointFile,
  type CheckpointFile,
} from '@ragingest/common';
import type { FileLockOptions } from './fileLock.js';
import { isSegmentOf } from './hashing.js';
import { JsonStateFile } from './stateFile.js';

function insertSorted(list: string[], id: string): string[] {
  if (list.includes(id)) return list;
  return [...list, id].sort();
}

/**
 * Ledger of unit ids that were fully ingested (`processed`) or given up on
 * (`skipped`). Independent of the queue: a processed id is never ingested
 * again, whatever the queue says.
 */
export class CheckpointStore {
  private readonly file: JsonStateFile<CheckpointFile>;

  constructor(filePath: string, lock?: FileLockOptions) {
    this.file = new JsonStateFile(
      filePath,
      parseCheckpointFile,
      emptyCheckpointFile,
      lock,
    );
  }

  get filePath() {
    return this.file.filePath;
  }

  async isProcessed(id: string): Promise<boolean> {
    const state = await this.file.read();
    return state.processed.includes(id);
  }

  /** True when any segment of `id` is recorded, processed or skipped. */
  async hasSegments(id: string): Promise<boolean> {
    const state = await this.file.read();
    return [...state.processed, ...state.skipped].some((entry) =>
      isSegmentOf(id, entry),
    );
  }

  async mark(id: string, success: boolean): Promise<void> {
    await this.file.update((state) => {
      const [target, other] = success
        ? (['processed', 'skipped'] as const)
        : (['skipped', 'processed'] as const);
      // Failures never demote an id that already made it into `processed`.
      if (!success && state.processed.includes(id)) {
        return { changed: false, result: undefined };
      }
      if (state[target].includes(id) && !state[other].includes(id)) {
        return { changed: false, result: undefined };
      }
      state[target] = insertSorted(state[target], id);
      state[other] = state[other].filter((entry) => entry !== id);
      return { changed: true, result: undefined };
    });
  }

  /**
   * Forgets `id` and every segment id derived from it. Only used for an
   * explicit re-ingestion.
   */
  async clear(id: string): Promise<string[]> {
    return this.unmark(
      (entry) => entry === id || isSegmentOf(id, entry),
    );
  }

  /** Drops the given ids from both lists; returns the ones it found. */
  async unmark(
    ids: readonly string[] | ((entry: string) => boolean),
  ): Promise<string[]> {
    const matches =
      typeof ids === 'function' ? ids : (entry: string) => ids.includes(entry);
    return this.file.update<string[]>((state) => {
      const removed = [...state.processed, ...state.skipped].filter(matches);
      if (!removed.length) return { changed: false, result: [] };
      state.processed = state.processed.filter((entry) => !matches(entry));
      state.skipped = state.skipped.filter((entry) => !matches(entry));
      return { changed: true, result: removed.sort() };
    });
  }

  async snapshot(): Promise<CheckpointFile> {
    return this.file.read();
  }
}
