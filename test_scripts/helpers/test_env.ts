import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { configureLogger } from '../../src/common/logger';
import { loadConfig, type AppConfig, type EnvMap } from '../../src/common/config';

export const SHARE_URL = 'https://example.com/read/abc123';
export const LIBRARY_URL = 'https://example.sharepoint.com/sites/team/Shared Documents';

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

/** Logs go to a throwaway directory so tests never write under the repo. */
export function useTempLogs(): string {
  const dir = makeTempDir('sync-logs');
  configureLogger({ level: 'DEBUG', baseDir: dir });
  return dir;
}

export function testConfig(workDir: string, env: EnvMap = {}): AppConfig {
  return loadConfig(
    {
      OVERLEAF_URL: SHARE_URL,
      SHAREPOINT_URL: LIBRARY_URL,
      MICROSOFT_USERNAME: 'user@example.com',
      MICROSOFT_PASSWORD: 'test-secret',
      ARTIFACTS_DIR: 'artifacts',
      ...env,
    },
    workDir,
  );
}
