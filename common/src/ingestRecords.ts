import { z } from 'zod';

const idList = z.array(z.string()).default([]);

/**
 * On-disk shape of the work queue. Older files written before the attempt
 * counter or the lease timestamps existed parse with empty maps.
 * `startedAt` holds the epoch milliseconds at which each `processing` id
 * was handed out.
 */
export const QueueFileSchema = z.object({
  pending: idList,
  processing: idList,
  completed: idList,
  failed: idList,
  attempts: z.record(z.string(), z.number().int().nonnegative()).default({}),
  startedAt: z.record(z.string(), z.number().nonnegative()).default({}),
});

export type QueueFile = z.infer<typeof QueueFileSchema>;

export type QueueListName = 'pending' | 'processing' | 'completed' | 'failed';

export const QUEUE_LISTS: readonly QueueListName[] = [
  'pending',
  'processing',
  'completed',
  'failed',
];

export function emptyQueueFile(): QueueFile {
  return {
    pending: [],
    processing: [],
    completed: [],
    failed: [],
    attempts: {},
    startedAt: {},
  };
}

/** `processed` and `skipped` are disjoint. */
export const CheckpointFileSchema = z.object({
  processed: idList,
  skipped: idList,
});

export type CheckpointFile = z.infer<typeof CheckpointFileSchema>;

export function emptyCheckpointFile(): CheckpointFile {
  return { processed: [], skipped: [] };
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

function parseJsonRecord<T>(
  jsonText: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ParseResult<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(jsonText);
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    return { ok: false, error };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error };
  }
  return { ok: true, value: parsed.data };
}

export function parseQueueFile(jsonText: string): ParseResult<QueueFile> {
  return parseJsonRecord(jsonText, QueueFileSchema);
}

export function parseCheckpointFile(
  jsonText: string,
): ParseResult<CheckpointFile> {
  return parseJsonRecord(jsonText, CheckpointFileSchema);
}
