import * as fs from 'fs';
import * as path from 'path';

function timestamp(now: Date = new Date()): string {
  return now.toISOString().replace(/[:.]/g, '-');
}

/** `<artifactsDir>/<iso-timestamp>_<stage>`, created on demand. */
export function createFailureRunDir(artifactsDir: string, stage: string, now: Date = new Date()): string {
  const root = path.resolve(artifactsDir);
  const runDir = path.join(root, `${timestamp(now)}_${stage}`);
  fs.mkdirSync(runDir, { recursive: true });
  return runDir;
}
