#!/usr/bin/env node

import { buildProgram } from './program';
import * as output from './output';

buildProgram()
  .parseAsync()
  .catch((error: unknown) => {
    output.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
