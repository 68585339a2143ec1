#!/usr/bin/env node
/**
 * lossplot CLI entry point
 */

import { ExitCode } from '../../shared/constants.js';
import { error } from '../../shared/ui/index.js';
import { getErrorMessage } from '../../shared/utils/index.js';
import { main } from './main.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    error(getErrorMessage(e));
    process.exitCode = ExitCode.Failure;
  });
