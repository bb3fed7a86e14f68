import fs from 'fs/promises';
import path from 'path';
import type { ParseResult } from '@ragingest/common';
import { QueueFileError } from './errors.js';
import { withFileLock, type FileLockOptions } from './fileLock.js';

/**
 * A JSON document on disk, read and rewritten under a sibling `.lock` file.
 * Writes go to a temp file first and are renamed into place, so a reader
 * never sees a half-written document.
 */
export class JsonStateFile<T> {
  readonly lockPath: string;

  constructor(
    readonly filePath: string,
    private readonly parse: (jsonText: string) => ParseResult<T>,
    private readonly empty: () => T,
    private readonly lockOptions: FileLockOptions = {},
  ) {
    this.lockPath = `${filePath}.lock`;
  }

  async read(): Promise<T> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (
        err &&
        typeof err === 'object' &&
        'code' in err &&
        err.code === 'ENOENT'
      ) {
        return this.empty();
      }
      throw err;
    }
    const parsed = this.parse(text);
    if (!parsed.ok) throw new QueueFileError(this.filePath, parsed.error);
    return parsed.value;
  }

  /** Load, apply `fn`, and save when it reports a change. */
  async update<R>(
    fn: (state: T) => { changed: boolean; result: R },
  ): Promise<R> {
    return withFileLock(
      this.lockPath,
      async () => {
        const state = await this.read();
        const { changed, result } = fn(state);
        if (changed) await this.write(state);
        return result;
      },
      this.lockOptions,
    );
  }

  private async write(state: T) {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
    await fs.rename(tmp, this.filePath);
  }
}
