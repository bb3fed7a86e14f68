import crypto from 'crypto';

export function hashContent(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

/** Stable vector id: the same unit and index always map to the same id. */
export function chunkId(unitId: string, chunkIndex: number): string {
  return `${unitId}_${chunkIndex}`;
}

export function segmentId(parentId: string, ordinal: number): string {
  return `${parentId}_${String(ordinal).padStart(2, '0')}`;
}

const SEGMENT_SUFFIX = /_\d{2,}$/;

/**
 * Every id `id` could be a segment of, nearest first. A document named
 * `notes.txt_v2.md` has none; `notes.txt_01_02` has `notes.txt_01` and
 * `notes.txt`.
 */
export function segmentAncestors(id: string): string[] {
  const ancestors: string[] = [];
  let current = id;
  while (SEGMENT_SUFFIX.test(current)) {
    current = current.replace(SEGMENT_SUFFIX, '');
    ancestors.push(current);
  }
  return ancestors;
}

export function isSegmentOf(parentId: string, id: string): boolean {
  return segmentAncestors(id).includes(parentId);
}
