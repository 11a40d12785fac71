#!/usr/bin/env node

import { Errors } from '@vulnrank/core';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('❌ Fatal error:', Errors.errorMessage(error));
    process.exit(1);
  });
