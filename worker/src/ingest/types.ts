import type { FailureKind } from './errors.js';

export type Document = {
  /** Path relative to the documents root, `/` separated. */
  id: string;
  sourcePath: string;
  byteSize: number;
  text: string;
};

/** A whole document (level 0) or one of its segments. */
export type IngestUnit = {
  id: string;
  documentId: string;
  parentId: string | null;
  level: number;
  text: string;
  byteSize: number;
  sourcePath: string;
};

export type TextChunk = {
  index: number;
  text: string;
  tokenCount: number;
  /** Tokens at the head of this chunk repeated from the previous one. */
  overlapTokens: number;
  contentHash: string;
};

export type ChunkFailure = {
  index: number;
  kind: FailureKind;
  message: string;
};

export type IngestOutcome = {
  unitId: string;
  status: 'completed' | 'failed';
  failureKind?: FailureKind;
  chunks: number;
  inserted: number;
  skippedExisting: number;
  failedChunks: ChunkFailure[];
  chunkIds: string[];
};

export type SplitOutcome = {
  unitId: string;
  level: number;
  success: boolean;
  /** False when the unit was already checkpointed and nothing ran. */
  attempted: boolean;
  ingest?: IngestOutcome;
  children: SplitOutcome[];
  failedLeaves: string[];
};

export type DiscoveredFile = { absPath: string; relPath: string; ext: string };
