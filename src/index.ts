#!/usr/bin/env node
import { createHelperProgram } from './cli/helper';
import { handleError } from './errors/handler';
import { logger } from './utils/logger';

createHelperProgram()
  .parseAsync()
  .catch((error: unknown) => {
    handleError(error, logger.isDebugEnabled());
    process.exitCode = 1;
  });
