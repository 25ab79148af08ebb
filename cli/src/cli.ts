#!/usr/bin/env node
/**
 * stageflow CLI
 *
 * Usage:
 *   stageflow run <workflow>       Run a workflow
 *   stageflow validate <workflow>  Validate a workflow
 *   stageflow plan <workflow>      Show the execution plan
 */

import { ExitCode } from '@stageflow/engine';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(ExitCode.INTERNAL_ERROR);
  });
