#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { CLI_NAME, run } from './cli/cli';

run(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    new Logger(CLI_NAME).error(error instanceof Error ? error.stack : String(error));
    process.exitCode = 1;
  });
