#!/usr/bin/env node

import * as path from 'path';
import * as fs from 'fs';
import * as dotenv from 'dotenv';

import * as log from '../utils/logger';
import { createProgram } from './program';

// ────────────────────────────────────────────
// environment
// ────────────────────────────────────────────
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  log.error(`[cli] run failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
