export * from './chunkMetadata.js';
export * from './ingestRecords.js';
