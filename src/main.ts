#!/usr/bin/env node
import { buildProgram, createLogger, wasReported } from './cli';

buildProgram({ out: text => process.stdout.write(`${text}\n`) })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (!wasReported(error)) {
      createLogger(false).error({ err: error }, 'Command failed');
    }
    process.exitCode = 1;
  });
