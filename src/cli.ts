#!/usr/bin/env node

import { createProgram } from './commands.js';

await createProgram().parseAsync(process.argv);
