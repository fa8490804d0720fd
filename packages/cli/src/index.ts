#!/usr/bin/env node

/**
 * sqltrail CLI entry point
 */

import { createProgram, reportCommandError } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => reportCommandError(error));
