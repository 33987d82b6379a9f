#!/usr/bin/env node
import { main } from './cli.js';
import { createLogger } from './logger.js';

main(process.argv.slice(2)).then(
  (exitCode) => process.exit(exitCode),
  (err: unknown) => {
    createLogger().fatal({ error: err }, 'Fatal entrypoint error');
    process.exit(1);
  }
);
