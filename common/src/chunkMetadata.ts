import { z } from 'zod';

const nonEmptyString = z
  .string()
  .transform((value) => value.trim())
  .refine((value) => value.length > 0, { message: 'must not be empty' });

/**
 * Metadata stored beside every vector. Downstream citation lookups key on
 * `documentId` + `chunkIndex`; `unitId` names the document or segment the
 * chunk was cut from.
 */
export const ChunkMetadataSchema = z
  .object({
    documentId: nonEmptyString,
    unitId: nonEmptyString,
    filename: nonEmptyString,
    sourcePath: nonEmptyString,
    section: nonEmptyString,
    chunkIndex: z.number().int().nonnegative(),
    totalChunks: z.number().int().positive(),
    recursionLevel: z.number().int().nonnegative(),
    tokenCount: z.number().int().nonnegative(),
    contentHash: z.string().regex(/^[0-9a-f]{64}$/),
    embeddingModel: nonEmptyString,
    ingestedAt: z.string().datetime(),
  })
  .strict()
  .refine((meta) => meta.chunkIndex < meta.totalChunks, {
    message: 'chunkIndex must be below totalChunks',
    path: ['chunkIndex'],
  });

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;

export type ChunkMetadataInput = Omit<ChunkMetadata, 'section'> & {
  section?: string;
};

export function sectionLabel(chunkIndex: number): string {
  return `chunk_${chunkIndex + 1}`;
}

/** Throws a ZodError when the record is malformed. */
export function createChunkMetadata(input: ChunkMetadataInput): ChunkMetadata {
  return ChunkMetadataSchema.parse({
    ...input,
    section: input.section ?? sectionLabel(input.chunkIndex),
  });
}
