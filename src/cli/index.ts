#!/usr/bin/env node
import { createProgram } from './cli.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
