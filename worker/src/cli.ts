import path from 'path';
import chalk from 'chalk';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  ConfigError,
  resolveConfig,
  type IngestConfig,
} from './ingest/config.js';
import { loadDocument, scanDocuments, toDocumentId } from './ingest/discovery.js';
import { getErrorMessage, RetryExhaustedError } from './ingest/errors.js';
import { documentUnit, runQueue } from './ingest/queueRunner.js';
import { reconcileCheckpoint } from './ingest/reconcile.js';
import { buildStatusReport } from './ingest/status.js';
import type { IngestUnit } from './ingest/types.js';
import { createPipeline, type Pipeline } from './pipeline.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  openPipeline?: (config: Readonly<IngestConfig>) => Pipeline;
  print?: (line: string) => void;
  cwd?: string;
};

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('expected a non-negative integer');
  }
  return parsed;
}

/** Parse `argv`, run one command and resolve to the process exit code. */
export async function runCli(
  argv: string[],
  deps: CliDeps = {},
): Promise<number> {
  const env = deps.env ?? process.env;
  const open = deps.openPipeline ?? ((config) => createPipeline(config));
  const print =
    deps.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  const cwd = deps.cwd ?? process.cwd();
  let exitCode = EXIT_OK;

  const withPipeline = async (fn: (pipeline: Pipeline) => Promise<number>) => {
    let config: Readonly<IngestConfig>;
    try {
      config = resolveConfig(env);
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      print(chalk.red(`Invalid configuration: ${err.message}`));
      exitCode = EXIT_USAGE;
      return;
    }
    const pipeline = open(config);
    for (const warning of config.warnings) pipeline.logger.warn({}, warning);
    try {
      exitCode = await fn(pipeline);
    } finally {
      await pipeline.close();
    }
  };

  const program = new Command();
  program
    .name('ragingest')
    .description('Chunk, embed and index text documents into Chroma')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => print(str.trimEnd()),
      writeErr: (str) => print(str.trimEnd()),
    });

  program
    .command('ingest')
    .description('Ingest one document, splitting it as needed')
    .argument('<path>', 'document to ingest')
    .action((filePath: string) =>
      withPipeline(async (pipeline) => {
        const root = pipeline.config.documentsRoot;
        const documentId = toDocumentId(root, path.resolve(cwd, filePath));
        let unit: IngestUnit;
        try {
          unit = documentUnit(await loadDocument(root, documentId));
        } catch (err) {
          print(chalk.red(`Cannot read ${filePath}: ${getErrorMessage(err)}`));
          return EXIT_FAILURE;
        }
        try {
          const outcome = await pipeline.splitter.splitRecursive(unit, 0);
          if (outcome.success) {
            print(chalk.green(`Ingested ${documentId}`));
            return EXIT_OK;
          }
          print(
            chalk.red(
              `Failed ${documentId}; failed segments: ${outcome.failedLeaves.join(', ')}`,
            ),
          );
          return EXIT_FAILURE;
        } catch (err) {
          if (!(err instanceof RetryExhaustedError)) throw err;
          await pipeline.checkpoint.mark(documentId, false);
          print(chalk.red(`Backend unavailable: ${err.message}`));
          return EXIT_FAILURE;
        }
      }),
    );

  program
    .command('scan')
    .description('Enqueue documents under the root that are not yet ingested')
    .action(() =>
      withPipeline(async (pipeline) => {
        const result = await scanDocuments(
          pipeline.config,
          pipeline.queue,
          pipeline.checkpoint,
          pipeline.logger,
        );
        print(
          `Discovered ${result.discovered}, enqueued ${result.enqueued.length}, already processed ${result.alreadyProcessed}`,
        );
        if (result.conflicts.length) {
          print(
            chalk.yellow(
              `Skipped names that collide with segment ids: ${result.conflicts.join(', ')}`,
            ),
          );
        }
        return EXIT_OK;
      }),
    );

  program
    .command('process')
    .description('Ingest queued documents')
    .option('--max <n>', 'documents to process (0 = until empty)', parseCount)
    .action((opts: { max?: number }) =>
      withPipeline(async (pipeline) => {
        const summary = await runQueue(
          {
            queue: pipeline.queue,
            checkpoint: pipeline.checkpoint,
            splitter: pipeline.splitter,
            documentsRoot: pipeline.config.documentsRoot,
            logger: pipeline.logger,
          },
          opts.max ?? pipeline.config.run.maxIterations,
        );
        print(
          `Processed ${summary.processed}: ${chalk.green(`${summary.completed.length} completed`)}, ${chalk.red(`${summary.failed.length} failed`)}`,
        );
        for (const id of summary.failed) print(chalk.red(`  failed: ${id}`));
        if (summary.aborted) {
          print(chalk.red(`Stopped early: ${summary.aborted}`));
          return EXIT_FAILURE;
        }
        return EXIT_OK;
      }),
    );

  program
    .command('status')
    .description('Show queue, checkpoint and collection counts')
    .action(() =>
      withPipeline(async (pipeline) => {
        const report = await buildStatusReport(
          pipeline.queue,
          pipeline.checkpoint,
          pipeline.store,
        );
        const { queue, checkpoint, collection } = report;
        print(chalk.bold('Queue'));
        print(`  pending:    ${queue.pending}`);
        print(`  processing: ${queue.processing}`);
        print(`  completed:  ${chalk.green(String(queue.completed))}`);
        print(`  failed:     ${chalk.red(String(queue.failed))}`);
        print(`  progress:   ${queue.progressPct}%`);
        for (const id of queue.processingIds) print(`  in progress: ${id}`);
        print(chalk.bold('Checkpoint'));
        print(`  processed:  ${checkpoint.processed}`);
        print(`  skipped:    ${checkpoint.skipped}`);
        print(chalk.bold('Collection'));
        print(
          'count' in collection
            ? `  vectors:    ${collection.count}`
            : chalk.yellow(`  unavailable: ${collection.error}`),
        );
        return EXIT_OK;
      }),
    );

  program
    .command('requeue-failed')
    .description('Move failed queue entries back to pending')
    .action(() =>
      withPipeline(async (pipeline) => {
        const ids = await pipeline.queue.requeueFailed();
        print(`Requeued ${ids.length} failed document(s)`);
        return EXIT_OK;
      }),
    );

  program
    .command('reconcile')
    .description('Requeue processed documents whose vectors are missing')
    .action(() =>
      withPipeline(async (pipeline) => {
        const result = await reconcileCheckpoint({
          checkpoint: pipeline.checkpoint,
          store: pipeline.store,
          queue: pipeline.queue,
          batchSize: pipeline.config.dedupBatchSize,
          logger: pipeline.logger,
        });
        print(
          `Checked ${result.checked} document(s), requeued ${result.requeued.length}`,
        );
        for (const id of result.requeued) {
          print(chalk.yellow(`  requeued: ${id}`));
        }
        return EXIT_OK;
      }),
    );

  program
    .command('remove')
    .description('Delete a document from the index so it can be re-ingested')
    .argument('<path>', 'document to remove')
    .action((filePath: string) =>
      withPipeline(async (pipeline) => {
        const removed = await pipeline.removeDocument(
          path.resolve(cwd, filePath),
        );
        print(
          `Removed ${removed.documentId}: ${removed.vectors} vector(s), ${removed.checkpoint.length} checkpoint entr${removed.checkpoint.length === 1 ? 'y' : 'ies'}`,
        );
        return EXIT_OK;
      }),
    );

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw err;
  }
  return exitCode;
}
