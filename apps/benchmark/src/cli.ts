#!/usr/bin/env node

import { createProgram } from './app.js';

await createProgram().parseAsync();
