import path from 'node:path';
import { z } from 'zod';

const defaultIncludes = ['txt', 'md'];

const defaultExcludes = ['node_modules', '.git', '.segments'];

const csv = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      const values =
        raw
          ?.split(',')
          .map((s) => s.trim().replace(/^\./, '').toLowerCase())
          .filter(Boolean) ?? [];
      return values.length ? values : fallback;
    });

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      const v = (raw ?? '').trim().toLowerCase();
      if (!v) return fallback;
      return v === '1' || v === 'true' || v === 'yes' || v === 'on';
    });

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  INGEST_ROOT: z.string().trim().min(1).default('./documents'),
  INGEST_INCLUDE: csv(defaultIncludes),
  INGEST_EXCLUDE: z.string().optional(),
  INGEST_QUEUE_FILE: z
    .string()
    .trim()
    .min(1)
    .default('./checkpoints/file_queue.json'),
  INGEST_CHECKPOINT_FILE: z
    .string()
    .trim()
    .min(1)
    .default('./checkpoints/ingest_checkpoint.json'),
  CHROMA_URL: z.string().trim().min(1).default('http://localhost:8000'),
  INGEST_COLLECTION: z.string().trim().min(3).default('documents'),
  LMSTUDIO_BASE_URL: z.string().trim().min(1).default('ws://localhost:1234'),
  INGEST_EMBED_MODEL: z
    .string()
    .trim()
    .min(1)
    .default('text-embedding-nomic-embed-text-v1.5'),
  INGEST_TOKENIZER: z.enum(['cl100k_base', 'whitespace']).default('cl100k_base'),
  INGEST_CHUNK_TOKENS: positiveInt(1000),
  INGEST_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  INGEST_INSERT_BATCH: positiveInt(10),
  INGEST_DEDUP_BATCH: positiveInt(100),
  INGEST_RETRY_ATTEMPTS: positiveInt(5),
  INGEST_RETRY_BASE_MS: z.coerce.number().nonnegative().default(1000),
  INGEST_MAX_INITIAL_MB: z.coerce.number().positive().default(10),
  INGEST_MIN_SEGMENT_KB: z.coerce.number().positive().default(50),
  INGEST_MAX_DEPTH: z.coerce.number().int().nonnegative().default(5),
  INGEST_DISCARD_PARTIAL: flag(true),
  INGEST_QUEUE_ATTEMPTS: positiveInt(3),
  INGEST_LOCK_STALE_MS: positiveInt(30 * 60 * 1000),
  INGEST_QUEUE_LEASE_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(2 * 60 * 60 * 1000),
  INGEST_MAX_ITERATIONS: z.coerce.number().int().nonnegative().default(1),
});

export type TokenizerName = 'cl100k_base' | 'whitespace';

export type ChunkingConfig = {
  maxTokens: number;
  overlapTokens: number;
};

export type RetryConfig = {
  maxAttempts: number;
  baseDelayMs: number;
};

export type SplitConfig = {
  maxInitialBytes: number;
  minSegmentBytes: number;
  maxDepth: number;
  discardPartialOnSplit: boolean;
};

export type IngestConfig = {
  documentsRoot: string;
  includes: string[];
  excludes: string[];
  queueFile: string;
  checkpointFile: string;
  chroma: { url: string; collection: string };
  embedding: { baseUrl: string; model: string };
  tokenizer: TokenizerName;
  chunking: ChunkingConfig;
  insertBatchSize: number;
  dedupBatchSize: number;
  retry: RetryConfig;
  split: SplitConfig;
  queue: { maxAttempts: number; staleLockMs: number; leaseMs: number };
  run: { maxIterations: number };
  /** Adjustments made while resolving, for the caller to log. */
  warnings: string[];
};

export class ConfigError extends Error {
  code = 'CONFIG_INVALID' as const;
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the one configuration object for a process. Called once at start-up;
 * components receive the resolved values and never read the environment.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
): Readonly<IngestConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; '),
    );
  }
  const e = parsed.data;
  const warnings: string[] = [];

  const envExcludes =
    e.INGEST_EXCLUDE?.split(',')
      .map((s) => s.trim())
      .filter(Boolean) ?? [];
  const excludes = Array.from(new Set([...defaultExcludes, ...envExcludes]));

  const maxTokens = e.INGEST_CHUNK_TOKENS;
  let overlapTokens = e.INGEST_CHUNK_OVERLAP;
  if (overlapTokens >= maxTokens) {
    const fallback = Math.max(0, Math.floor(maxTokens * 0.15));
    warnings.push(
      `INGEST_CHUNK_OVERLAP (=${overlapTokens}) >= INGEST_CHUNK_TOKENS (=${maxTokens}); using ${fallback}`,
    );
    overlapTokens = fallback;
  }

  return Object.freeze({
    documentsRoot: path.resolve(e.INGEST_ROOT),
    includes: e.INGEST_INCLUDE,
    excludes,
    queueFile: path.resolve(e.INGEST_QUEUE_FILE),
    checkpointFile: path.resolve(e.INGEST_CHECKPOINT_FILE),
    chroma: { url: e.CHROMA_URL, collection: e.INGEST_COLLECTION },
    embedding: { baseUrl: e.LMSTUDIO_BASE_URL, model: e.INGEST_EMBED_MODEL },
    tokenizer: e.INGEST_TOKENIZER,
    chunking: { maxTokens, overlapTokens },
    insertBatchSize: e.INGEST_INSERT_BATCH,
    dedupBatchSize: e.INGEST_DEDUP_BATCH,
    retry: {
      maxAttempts: e.INGEST_RETRY_ATTEMPTS,
      baseDelayMs: e.INGEST_RETRY_BASE_MS,
    },
    split: {
      maxInitialBytes: Math.floor(e.INGEST_MAX_INITIAL_MB * 1024 * 1024),
      minSegmentBytes: Math.floor(e.INGEST_MIN_SEGMENT_KB * 1024),
      maxDepth: e.INGEST_MAX_DEPTH,
      discardPartialOnSplit: e.INGEST_DISCARD_PARTIAL,
    },
    queue: {
      maxAttempts: e.INGEST_QUEUE_ATTEMPTS,
      staleLockMs: e.INGEST_LOCK_STALE_MS,
      leaseMs: e.INGEST_QUEUE_LEASE_MS,
    },
    run: { maxIterations: e.INGEST_MAX_ITERATIONS },
    warnings,
  });
}
