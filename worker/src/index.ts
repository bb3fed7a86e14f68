#!/usr/bin/env -S node --import tsx
import 'dotenv/config';
import { runCli } from './cli.js';
import { baseLogger } from './logger.js';

try {
  process.exitCode = await runCli(process.argv);
} catch (err) {
  baseLogger.error({ err }, 'ragingest failed');
  process.exitCode = 1;
}
