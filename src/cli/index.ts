#!/usr/bin/env node
import { buildProgram } from './program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('[tiff-reel] fatal:', error);
    process.exitCode = 1;
  });
