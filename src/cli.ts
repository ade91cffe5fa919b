#!/usr/bin/env node

import { createProgram } from './program.js';

createProgram().parseAsync().catch((error: Error) => {
  console.error('❌ Failed to start server:', error.message);
  process.exit(1);
});
