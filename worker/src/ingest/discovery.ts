import fs from 'fs/promises';
import path from 'path';
import { baseLogger, type IngestLogger } from '../logger.js';
import type { CheckpointStore } from './checkpoint.js';
import type { IngestConfig } from './config.js';
import { segmentAncestors } from './hashing.js';
import type { DiscoveredFile, Document } from './types.js';
import type { WorkQueue } from './workQueue.js';

type DiscoveryConfig = Pick<IngestConfig, 'includes' | 'excludes'>;

function matchesExclude(relPath: string, excludes: string[]): boolean {
  const segments = relPath.split(path.sep);
  const base = segments[segments.length - 1];
  return excludes.some((pattern) => {
    if (!pattern) return false;
    if (pattern.includes('*')) {
      const trimmed = pattern.replace(/^\*/, '');
      return base.endsWith(trimmed);
    }
    return segments.includes(pattern) || base === pattern;
  });
}

function isAllowedExtension(filePath: string, includeExts: string[]): boolean {
  const ext = path.extname(filePath).replace('.', '').toLowerCase();
  return includeExts.includes(ext);
}

async function isLikelyText(filePath: string): Promise<boolean> {
  const sampleSize = 2048;
  const fd = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(sampleSize);
    const { bytesRead } = await fd.read(buffer, 0, sampleSize, 0);
    for (let i = 0; i < bytesRead; i += 1) {
      if (buffer[i] === 0) return false;
    }
    return true;
  } finally {
    await fd.close();
  }
}

async function walkDir(root: string, excludes: string[]): Promise<string[]> {
  const results: string[] = [];
  async function walk(current: string) {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const abs = path.join(current, entry.name);
      const rel = path.relative(root, abs);
      if (entry.isDirectory()) {
        if (!matchesExclude(rel, excludes)) await walk(abs);
      } else if (entry.isFile()) {
        results.push(rel);
      }
    }
  }
  await walk(root);
  return results;
}

/** Document id for a path: relative to the root with `/`, else absolute. */
export function toDocumentId(documentsRoot: string, filePath: string): string {
  const abs = path.resolve(documentsRoot, filePath);
  const rel = path.relative(documentsRoot, abs);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) return abs;
  return rel.split(path.sep).join('/');
}

export function toSourcePath(documentsRoot: string, documentId: string) {
  return path.resolve(documentsRoot, ...documentId.split('/'));
}

export async function discoverFiles(
  root: string,
  config: DiscoveryConfig,
): Promise<DiscoveredFile[]> {
  const relPaths = await walkDir(root, config.excludes);
  const files: DiscoveredFile[] = [];

  for (const relPath of relPaths) {
    if (matchesExclude(relPath, config.excludes)) continue;
    if (!isAllowedExtension(relPath, config.includes)) continue;
    const absPath = path.join(root, relPath);
    if (!(await isLikelyText(absPath))) continue;
    files.push({
      absPath,
      relPath: relPath.split(path.sep).join('/'),
      ext: path.extname(relPath).replace('.', '').toLowerCase(),
    });
  }

  return files.sort((a, b) => a.relPath.localeCompare(b.relPath));
}

export async function loadDocument(
  documentsRoot: string,
  documentId: string,
): Promise<Document> {
  const sourcePath = path.isAbsolute(documentId)
    ? documentId
    : toSourcePath(documentsRoot, documentId);
  const data = await fs.readFile(sourcePath);
  return {
    id: documentId,
    sourcePath,
    byteSize: data.byteLength,
    text: data.toString('utf8'),
  };
}

export type ScanResult = {
  discovered: number;
  enqueued: string[];
  alreadyProcessed: number;
  /** Documents left out because their id reads as a segment of another. */
  conflicts: string[];
};

/**
 * Enqueue every discovered document the checkpoint has not processed.
 * Segment ids append `_NN` to their parent's id, so a file named like a
 * segment of another discovered file (`a.txt_01` next to `a.txt`) would
 * share its vector ids and is skipped.
 */
export async function scanDocuments(
  config: Pick<IngestConfig, 'documentsRoot' | 'includes' | 'excludes'>,
  queue: WorkQueue,
  checkpoint: CheckpointStore,
  logger: IngestLogger = baseLogger,
): Promise<ScanResult> {
  const files = await discoverFiles(config.documentsRoot, config);
  const processed = new Set((await checkpoint.snapshot()).processed);
  const ids = new Set(files.map((file) => file.relPath));
  const result: ScanResult = {
    discovered: files.length,
    enqueued: [],
    alreadyProcessed: 0,
    conflicts: [],
  };

  for (const file of files) {
    const owner = segmentAncestors(file.relPath).find((id) => ids.has(id));
    if (owner) {
      logger.warn(
        { id: file.relPath, collidesWith: owner },
        'document id has the form of a segment id; skipping',
      );
      result.conflicts.push(file.relPath);
      continue;
    }
    if (processed.has(file.relPath)) {
      result.alreadyProcessed += 1;
      continue;
    }
    if (await queue.enqueue(file.relPath)) result.enqueued.push(file.relPath);
  }

  logger.info(
    {
      root: config.documentsRoot,
      discovered: result.discovered,
      enqueued: result.enqueued.length,
      alreadyProcessed: result.alreadyProcessed,
      conflicts: result.conflicts.length,
    },
    'scan finished',
  );
  return result;
}
