#!/usr/bin/env node

// src/index.ts - git-lfs entry point

// Check Node.js version before running anything
const nodeVersion = process.version;
const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0], 10);
if (majorVersion < 20) {
  console.error(`❌ Node.js 20+ required. Current: ${nodeVersion}`);
  console.error(`   Upgrade: https://nodejs.org/`);
  process.exit(1);
}

import { run } from './cli/runner.js';

process.exitCode = await run();
