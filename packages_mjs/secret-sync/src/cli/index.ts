#!/usr/bin/env node
import { createProgram } from './program.js';
import { describeError } from '../errors.js';

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        process.stderr.write(`Error: ${describeError(error)}\n`);
        process.exitCode = 1;
    });
