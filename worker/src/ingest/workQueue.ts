import {
  emptyQueueFile,
  parseQueueFile,
  QUEUE_LISTS,
  type QueueFile,
  type QueueListName,
} from '@ragingest/common';
import { baseLogger, type IngestLogger } from '../logger.js';
import type { FileLockOptions } from './fileLock.js';
import { JsonStateFile } from './stateFile.js';

export type WorkQueueOptions = {
  /** Dequeues allowed per id before it is parked in `failed`. */
  maxAttempts: number;
  /**
   * How long a `processing` entry belongs to the worker that took it.
   * `recover` only reclaims entries older than this.
   */
  leaseMs: number;
  lock?: FileLockOptions;
  logger?: IngestLogger;
  now?: () => number;
  /** Called with the ids `dequeue` parked in `failed`, after the write. */
  onParked?: (ids: string[]) => Promise<void>;
};

export type QueueSnapshot = QueueFile;

function without(list: string[], id: string) {
  return list.filter((entry) => entry !== id);
}

function listOf(state: QueueFile, id: string): QueueListName | null {
  return QUEUE_LISTS.find((name) => state[name].includes(id)) ?? null;
}

/**
 * Durable `pending -> processing -> completed | failed` queue of document
 * ids, persisted as one JSON file shared by every worker process.
 */
export class WorkQueue {
  private readonly file: JsonStateFile<QueueFile>;
  private readonly logger: IngestLogger;
  private readonly now: () => number;

  constructor(
    filePath: string,
    private readonly opts: WorkQueueOptions,
  ) {
    this.file = new JsonStateFile(
      filePath,
      parseQueueFile,
      emptyQueueFile,
      opts.lock,
    );
    this.logger = opts.logger ?? baseLogger;
    this.now = opts.now ?? Date.now;
  }

  get filePath() {
    return this.file.filePath;
  }

  /**
   * Adds `id` to `pending`. No-op when it is already pending, processing or
   * completed; a failed id goes back to `pending`.
   */
  async enqueue(id: string): Promise<boolean> {
    return this.file.update((state) => {
      const current = listOf(state, id);
      if (current && current !== 'failed') {
        return { changed: false, result: false };
      }
      state.failed = without(state.failed, id);
      state.pending.push(id);
      return { changed: true, result: true };
    });
  }

  /**
   * Moves the first pending id to `processing` and returns it, or null when
   * nothing is pending. Ids that have used up their attempts are moved to
   * `failed` instead of being handed out again and reported to `onParked`.
   */
  async dequeue(): Promise<string | null> {
    const parked: string[] = [];
    const next = await this.file.update<string | null>((state) => {
      let changed = false;
      for (;;) {
        const id = state.pending.shift();
        if (id === undefined) return { changed, result: null };
        changed = true;
        const attempts = (state.attempts[id] ?? 0) + 1;
        state.attempts[id] = attempts;
        if (attempts > this.opts.maxAttempts) {
          this.logger.warn(
            { id, attempts, maxAttempts: this.opts.maxAttempts },
            'queue entry exceeded attempt budget; marking failed',
          );
          state.failed = [...without(state.failed, id), id];
          delete state.startedAt[id];
          parked.push(id);
          continue;
        }
        state.processing.push(id);
        state.startedAt[id] = this.now();
        return { changed, result: id };
      }
    });
    if (parked.length && this.opts.onParked) await this.opts.onParked(parked);
    return next;
  }

  /**
   * Times `id` has been handed out since it last reached a terminal list.
   * More than one while it is processing means an earlier run died on it.
   */
  async attemptsFor(id: string): Promise<number> {
    const state = await this.file.read();
    return state.attempts[id] ?? 0;
  }

  async complete(id: string): Promise<void> {
    await this.moveToTerminal(id, 'completed');
  }

  async fail(id: string): Promise<void> {
    await this.moveToTerminal(id, 'failed');
  }

  /**
   * Returns `processing` ids whose lease has run out to the head of
   * `pending`. Entries without a start time predate leases and are always
   * reclaimed.
   */
  async recover(): Promise<string[]> {
    const now = this.now();
    return this.file.update<string[]>((state) => {
      const recovered = state.processing.filter((id) => {
        const started = state.startedAt[id];
        return started === undefined || now - started >= this.opts.leaseMs;
      });
      if (!recovered.length) return { changed: false, result: [] };
      state.pending = [
        ...recovered,
        ...state.pending.filter((id) => !recovered.includes(id)),
      ];
      state.processing = state.processing.filter(
        (id) => !recovered.includes(id),
      );
      for (const id of recovered) delete state.startedAt[id];
      return { changed: true, result: recovered };
    });
  }

  async requeueFailed(): Promise<string[]> {
    return this.file.update<string[]>((state) => {
      const failed = [...state.failed];
      if (!failed.length) return { changed: false, result: [] };
      for (const id of failed) {
        delete state.attempts[id];
        if (!state.pending.includes(id)) state.pending.push(id);
      }
      state.failed = [];
      return { changed: true, result: failed };
    });
  }

  /** Drops `id` from every list, for explicit re-ingestion. */
  async forget(id: string): Promise<boolean> {
    return this.file.update((state) => {
      if (!listOf(state, id) && state.attempts[id] === undefined) {
        return { changed: false, result: false };
      }
      for (const name of QUEUE_LISTS) state[name] = without(state[name], id);
      delete state.attempts[id];
      delete state.startedAt[id];
      return { changed: true, result: true };
    });
  }

  async snapshot(): Promise<QueueSnapshot> {
    return this.file.read();
  }

  private async moveToTerminal(id: string, target: 'completed' | 'failed') {
    await this.file.update((state) => {
      const elsewhere = QUEUE_LISTS.some(
        (name) => name !== target && state[name].includes(id),
      );
      if (state[target].includes(id) && !elsewhere) {
        return { changed: false, result: undefined };
      }
      for (const name of QUEUE_LISTS) state[name] = without(state[name], id);
      state[target].push(id);
      delete state.attempts[id];
      delete state.startedAt[id];
      return { changed: true, result: undefined };
    });
  }
}
