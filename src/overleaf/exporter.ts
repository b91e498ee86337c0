import * as fs from 'fs';
import * as path from 'path';
import * as log from '../utils/logger';
import type { AppConfig } from '../common/config';
import { ConfigurationError, DownloadTimeoutError, NavigationError, describeError } from '../common/errors';
import { captureStageFailure } from '../browser/failure_capture';
import type { BrowserLauncher } from '../browser/page_driver';
import { DOWNLOAD_PDF_BUTTON, PDF_VIEWER } from './selectors';

export type ExportSettings = Pick<
  AppConfig,
  'overleafUrl' | 'downloadPath' | 'headless' | 'slowMo' | 'artifactsDir' | 'timeouts'
>;

export interface ExportResult {
  path: string;
  sizeBytes: number;
  suggestedFilename: string;
}

const TOTAL_STEPS = 4;

/**
 * Opens the read-only share link, waits for the compiled PDF to render, and saves the
 * download to `downloadPath`, replacing any earlier file.
 */
export async function exportDocument(config: ExportSettings, launcher: BrowserLauncher): Promise<ExportResult> {
  if (!config.overleafUrl) {
    throw new ConfigurationError('OVERLEAF_URL is not set', ['OVERLEAF_URL']);
  }

  const driver = await launcher.launch({ headless: config.headless, slowMo: config.slowMo });
  let currentStep = 'navigate';
  try {
    log.step(1, TOTAL_STEPS, `Navigating to share link ${config.overleafUrl}`);
    await driver.navigate(config.overleafUrl, config.timeouts.navigationMs);

    currentStep = 'render';
    log.step(2, TOTAL_STEPS, 'Waiting for the PDF preview to render. This may take a while...');
    const rendered = await driver.waitForEvent(PDF_VIEWER, config.timeouts.renderMs);
    if (!rendered) {
      throw new NavigationError(config.overleafUrl, `PDF preview not rendered within ${config.timeouts.renderMs}ms`);
    }

    currentStep = 'download';
    log.step(3, TOTAL_STEPS, 'Clicking download button');
    const button = await driver.findControl(DOWNLOAD_PDF_BUTTON, config.timeouts.navigationMs);
    const [download] = await Promise.all([
      driver.waitForDownload(config.timeouts.downloadMs),
      driver.click(button),
    ]);

    currentStep = 'save';
    const target = path.resolve(config.downloadPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    log.step(4, TOTAL_STEPS, `Saving PDF to ${target}`);
    await download.saveAs(target);

    const sizeBytes = fs.existsSync(target) ? fs.statSync(target).size : 0;
    if (sizeBytes === 0) {
      throw new DownloadTimeoutError(`download finished but ${target} is empty`);
    }

    const result = { path: target, sizeBytes, suggestedFilename: download.suggestedFilename() };
    log.info(`Retrieved PDF '${result.suggestedFilename}' of size ${sizeBytes} bytes`);
    return result;
  } catch (error) {
    const { name } = describeError(error);
    log.error(`[export] step=${currentStep} failed: ${name}`);
    await captureStageFailure(driver, config.artifactsDir, 'export', currentStep);
    throw error;
  } finally {
    await driver.close();
  }
}
