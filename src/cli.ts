#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { errorMessage } from './common/errors';
import { runCli } from './cli/main';

runCli(process.argv.slice(2), process.env).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    new Logger('docs-deploy').error(errorMessage(err));
    process.exitCode = 1;
  },
);
