import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as log from '../utils/logger';
import type { AppConfig } from '../common/config';
import { ConfigurationError, NavigationError, UploadTimeoutError, describeError } from '../common/errors';
import type { BrowserLauncher, PageDriver } from '../browser/page_driver';
import { captureStageFailure } from '../browser/failure_capture';
import { persistSessionState, readSessionState } from '../browser/session_state';
import { isLoginFormVisible, logIn } from './login';
import { AUTH_STATE, UPLOAD_BUTTON, UPLOAD_CONFIRMATION, UPLOAD_FILES_MENU_ITEM } from './selectors';

export type UploadSettings = Pick<
  AppConfig,
  | 'sharepointUrl'
  | 'username'
  | 'password'
  | 'cookiesFile'
  | 'persistSession'
  | 'timestampUploadName'
  | 'headless'
  | 'slowMo'
  | 'artifactsDir'
  | 'timeouts'
>;

export interface UploadResult {
  uploadedName: string;
  sessionRestored: boolean;
  loginPerformed: boolean;
  verificationPrompted: boolean;
}

const TOTAL_STEPS = 5;

/** `document.pdf` -> `document-1700000000.pdf` */
export function buildUploadName(filePath: string, timestamped: boolean, nowMs: number = Date.now()): string {
  const base = path.basename(filePath);
  if (!timestamped) return base;
  const ext = path.extname(base);
  const stem = base.slice(0, base.length - ext.length);
  return `${stem}-${Math.floor(nowMs / 1000)}${ext}`;
}

function normalizeLocation(raw: string): string | null {
  try {
    const url = new URL(raw);
    const location = `${url.origin}${decodeURIComponent(url.pathname)}`.replace(/\/+$/, '');
    // library views name the open folder in `id`
    const folder = (url.searchParams.get('id') ?? '').replace(/\/+$/, '');
    return (folder ? `${location}?id=${folder}` : location).toLowerCase();
  } catch {
    return null;
  }
}

/** The library path and the `id` folder parameter decide; other query parameters are ignored. */
export function isOnTargetLocation(currentUrl: string, targetUrl: string): boolean {
  const current = normalizeLocation(currentUrl);
  const target = normalizeLocation(targetUrl);
  return current !== null && current === target;
}

function assertUploadInputs(config: UploadSettings, filePath: string): void {
  const missing: string[] = [];
  if (!config.sharepointUrl) missing.push('SHAREPOINT_URL');
  if (!config.username) missing.push('MICROSOFT_USERNAME');
  if (!config.password) missing.push('MICROSOFT_PASSWORD');
  if (missing.length > 0) {
    throw new ConfigurationError(`missing ${missing.join(', ')}`, missing);
  }
  if (!filePath || !fs.existsSync(filePath) || fs.statSync(filePath).size === 0) {
    throw new ConfigurationError(`upload source ${filePath || '(none)'} is missing or empty`);
  }
}

function stageUploadFile(filePath: string, uploadName: string): { dir: string; filePath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'share-link-sync-'));
  const staged = path.join(dir, uploadName);
  fs.copyFileSync(filePath, staged);
  return { dir, filePath: staged };
}

async function chooseAndSubmit(driver: PageDriver, stagedPath: string, timeoutMs: number): Promise<void> {
  const uploadButton = await driver.findControl(UPLOAD_BUTTON, timeoutMs);
  await driver.click(uploadButton);
  const filesItem = await driver.findControl(UPLOAD_FILES_MENU_ITEM, timeoutMs);
  const [chooser] = await Promise.all([
    driver.waitForFileChooser(timeoutMs),
    driver.click(filesItem),
  ]);
  await chooser.setFiles([stagedPath]);
}

/**
 * Signs in to the document library (reusing the saved session when there is one) and
 * uploads `filePath` through the library's own upload control.
 */
export async function uploadDocument(
  config: UploadSettings,
  launcher: BrowserLauncher,
  filePath: string,
): Promise<UploadResult> {
  assertUploadInputs(config, filePath);

  const sessionState = config.cookiesFile ? readSessionState(config.cookiesFile) : null;
  const uploadName = buildUploadName(filePath, config.timestampUploadName);
  const staging = stageUploadFile(filePath, uploadName);

  let currentStep = 'launch';
  try {
    const driver = await launcher.launch({
      headless: config.headless,
      slowMo: config.slowMo,
      sessionState,
    });
    try {
      currentStep = 'navigate';
      log.step(1, TOTAL_STEPS, `Navigating to document library ${config.sharepointUrl}`);
      await driver.navigate(config.sharepointUrl, config.timeouts.navigationMs);
      // the sign-in form is drawn by script after domcontentloaded
      const settled = await driver.waitForEvent(AUTH_STATE, config.timeouts.navigationMs);
      if (!settled) {
        throw new NavigationError(
          config.sharepointUrl,
          `neither the sign-in form nor the library appeared within ${config.timeouts.navigationMs}ms`,
        );
      }

      currentStep = 'login';
      let loginPerformed = false;
      let verificationPrompted = false;
      if (await isLoginFormVisible(driver)) {
        log.step(2, TOTAL_STEPS, sessionState ? 'Saved session rejected, signing in' : 'Signing in');
        const outcome = await logIn(
          driver,
          { username: config.username, password: config.password },
          config.timeouts,
        );
        loginPerformed = true;
        verificationPrompted = outcome.verificationPrompted;
        if (config.persistSession) {
          await persistSessionState(driver, config.cookiesFile);
        }
      } else {
        log.step(2, TOTAL_STEPS, 'Already signed in');
      }

      currentStep = 'open_library';
      if (!isOnTargetLocation(driver.currentUrl(), config.sharepointUrl)) {
        log.step(3, TOTAL_STEPS, `Returning to document library from ${driver.currentUrl()}`);
        await driver.navigate(config.sharepointUrl, config.timeouts.navigationMs);
      } else {
        log.step(3, TOTAL_STEPS, 'Document library open');
      }

      currentStep = 'upload';
      log.step(4, TOTAL_STEPS, `Uploading ${uploadName}`);
      await chooseAndSubmit(driver, staging.filePath, config.timeouts.navigationMs);

      currentStep = 'confirm';
      log.step(5, TOTAL_STEPS, 'Waiting for upload confirmation');
      const confirmed = await driver.waitForEvent(UPLOAD_CONFIRMATION, config.timeouts.uploadMs);
      if (!confirmed) {
        throw new UploadTimeoutError(`"${uploadName}" not confirmed within ${config.timeouts.uploadMs}ms`);
      }
      log.info(`File uploaded: ${uploadName}`);

      if (config.persistSession) {
        await persistSessionState(driver, config.cookiesFile);
      }
      return {
        uploadedName: uploadName,
        sessionRestored: sessionState !== null && !loginPerformed,
        loginPerformed,
        verificationPrompted,
      };
    } catch (error) {
      log.error(`[upload] step=${currentStep} failed: ${describeError(error).name}`);
      await captureStageFailure(driver, config.artifactsDir, 'upload', currentStep);
      throw error;
    } finally {
      await driver.close();
    }
  } finally {
    fs.rmSync(staging.dir, { recursive: true, force: true });
  }
}
