#!/usr/bin/env node
import { describeError } from '../common/errors';
import { getLogger } from '../common/logger';
import { EXIT_CONFIG_ERROR, runCli } from './index';

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    getLogger('cli').error(`Sanitization failed: ${describeError(error)}`);
    process.exitCode = EXIT_CONFIG_ERROR;
  });
