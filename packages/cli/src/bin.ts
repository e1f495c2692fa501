#!/usr/bin/env -S node --import tsx
import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
