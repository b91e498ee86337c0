import * as log from '../utils/logger';
import { createFailureRunDir } from '../common/debug_paths';
import type { PageDriver } from './page_driver';

/** Screenshot + HTML for a failed step. Never throws; the stage error is what matters. */
export async function captureStageFailure(
  driver: PageDriver,
  artifactsDir: string,
  stage: string,
  stepName: string,
): Promise<string | null> {
  let dir: string;
  try {
    dir = createFailureRunDir(artifactsDir, stage);
  } catch (error) {
    log.warn(`[${stage}] failure artifacts dir unavailable: ${String(error)}`);
    return null;
  }
  await driver.captureFailure(`${stage}_${stepName}`, dir);
  log.info(`[${stage}] failure artifacts: ${dir}`);
  return dir;
}
