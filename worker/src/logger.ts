import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import pinoRoll from 'pino-roll';

export type LogConfig = {
  level: string;
  filePath?: string;
  rotate: boolean;
};

export function resolveLogConfig(env: NodeJS.ProcessEnv = process.env) {
  const filePath = env.LOG_FILE_PATH?.trim() || undefined;
  return {
    level: env.LOG_LEVEL?.trim() || 'info',
    filePath,
    rotate: env.LOG_FILE_ROTATE !== 'false',
  } satisfies LogConfig;
}

/**
 * Structured logger surface the pipeline components depend on. Context
 * object first, message second, as with pino.
 */
export type IngestLogger = {
  debug: (context: Record<string, unknown>, message: string) => void;
  info: (context: Record<string, unknown>, message: string) => void;
  warn: (context: Record<string, unknown>, message: string) => void;
  error: (context: Record<string, unknown>, message: string) => void;
};

async function createDestination(cfg: LogConfig) {
  if (!cfg.filePath) return pino.destination(1);
  fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
  if (!cfg.rotate) return pino.destination(cfg.filePath);
  return pinoRoll({ file: cfg.filePath, frequency: 'daily', mkdir: true });
}

const logConfig = resolveLogConfig();

export const baseLogger = pino(
  {
    level: logConfig.level,
    base: { app: 'ragingest' },
  },
  await createDestination(logConfig),
);

export function childLogger(bindings: Record<string, unknown>) {
  return baseLogger.child(bindings);
}
