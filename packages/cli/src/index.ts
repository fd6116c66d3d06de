#!/usr/bin/env node
// packages/cli/src/index.ts — zosjobs entry point

import { createProgram } from './program.js';

await createProgram().parseAsync();
