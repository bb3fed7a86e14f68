import { splitSemantic } from './boundaries.js';
import type { ChunkingConfig } from './config.js';
import { hashContent } from './hashing.js';
import type { Tokenizer } from './tokenizer.js';
import type { TextChunk } from './types.js';

/**
 * Cut text into token-bounded passages along paragraph, line, sentence and
 * clause boundaries. Text that already fits comes back as a single chunk.
 */
export function chunkText(
  text: string,
  cfg: ChunkingConfig,
  tokenizer: Tokenizer,
): TextChunk[] {
  if (cfg.overlapTokens >= cfg.maxTokens) {
    throw new Error(
      `overlapTokens (${cfg.overlapTokens}) must be below maxTokens (${cfg.maxTokens})`,
    );
  }

  const trimmed = text.trim();
  if (!trimmed) return [];

  const total = tokenizer.count(trimmed);
  if (total <= cfg.maxTokens) {
    return [
      {
        index: 0,
        text: trimmed,
        tokenCount: total,
        overlapTokens: 0,
        contentHash: hashContent(trimmed),
      },
    ];
  }

  return splitSemantic(trimmed, {
    limit: cfg.maxTokens,
    overlap: cfg.overlapTokens,
    measure: tokenizer,
  }).map((piece, index) => ({
    index,
    text: piece.text,
    tokenCount: piece.size,
    overlapTokens: piece.overlap,
    contentHash: hashContent(piece.text),
  }));
}
