import * as fs from 'fs';
import { chromium, errors, Browser, BrowserContext, Locator, Page } from 'playwright';
import * as log from '../utils/logger';
import { artifactPath } from '../utils/logger';
import { DownloadTimeoutError, ElementNotFoundError, NavigationError } from '../common/errors';
import type {
  BrowserLauncher,
  ControlDescriptor,
  ControlHandle,
  DownloadHandle,
  FileChooserHandle,
  LaunchOptions,
  PageDriver,
} from './page_driver';
import type { SessionState } from './session_state';

class PlaywrightControl implements ControlHandle {
  constructor(
    readonly descriptor: ControlDescriptor,
    readonly locator: Locator,
  ) {}
}

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

export class PlaywrightPageDriver implements PageDriver {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {}

  private locatorFor(descriptor: ControlDescriptor): Locator {
    const [first, ...rest] = descriptor.selectors;
    if (first === undefined) {
      throw new ElementNotFoundError(descriptor.name, [], 0);
    }
    return rest
      .reduce((acc, selector) => acc.or(this.page.locator(selector)), this.page.locator(first))
      .first();
  }

  private unwrap(control: ControlHandle): Locator {
    if (!(control instanceof PlaywrightControl)) {
      throw new Error(`control "${control.descriptor.name}" was not produced by this driver`);
    }
    return control.locator;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    try {
      const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      if (response && response.status() >= 400) {
        throw new NavigationError(url, `HTTP ${response.status()}`);
      }
    } catch (error) {
      if (error instanceof NavigationError) throw error;
      throw new NavigationError(url, isTimeout(error) ? `timed out after ${timeoutMs}ms` : String(error));
    }
  }

  async findControl(descriptor: ControlDescriptor, timeoutMs: number): Promise<ControlHandle> {
    const locator = this.locatorFor(descriptor);
    try {
      await locator.waitFor({ state: 'visible', timeout: timeoutMs });
    } catch (error) {
      if (!isTimeout(error)) throw error;
      throw new ElementNotFoundError(descriptor.name, descriptor.selectors, timeoutMs);
    }
    log.debug(`[driver] control found: ${descriptor.name}`);
    return new PlaywrightControl(descriptor, locator);
  }

  async probeControl(descriptor: ControlDescriptor): Promise<ControlHandle | null> {
    const locator = this.locatorFor(descriptor);
    const visible = await locator.isVisible().catch(() => false);
    return visible ? new PlaywrightControl(descriptor, locator) : null;
  }

  async click(control: ControlHandle): Promise<void> {
    await this.unwrap(control).click();
  }

  async fill(control: ControlHandle, value: string): Promise<void> {
    await this.unwrap(control).fill(value);
  }

  async waitForDownload(timeoutMs: number): Promise<DownloadHandle> {
    try {
      return await this.page.waitForEvent('download', { timeout: timeoutMs });
    } catch (error) {
      if (!isTimeout(error)) throw error;
      throw new DownloadTimeoutError(`no download started within ${timeoutMs}ms`);
    }
  }

  async waitForFileChooser(timeoutMs: number): Promise<FileChooserHandle> {
    try {
      return await this.page.waitForEvent('filechooser', { timeout: timeoutMs });
    } catch (error) {
      if (!isTimeout(error)) throw error;
      throw new ElementNotFoundError('file chooser', [], timeoutMs);
    }
  }

  async waitForEvent(descriptor: ControlDescriptor, timeoutMs: number): Promise<boolean> {
    try {
      await this.locatorFor(descriptor).waitFor({ state: 'visible', timeout: timeoutMs });
      return true;
    } catch (error) {
      if (isTimeout(error)) return false;
      throw error;
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async exportSessionState(): Promise<SessionState> {
    const state = await this.context.storageState();
    return {
      cookies: state.cookies.map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
        expires: cookie.expires,
        httpOnly: cookie.httpOnly,
        secure: cookie.secure,
        sameSite: cookie.sameSite,
      })),
      origins: state.origins.map((origin) => ({
        origin: origin.origin,
        localStorage: origin.localStorage.map(({ name, value }) => ({ name, value })),
      })),
    };
  }

  async captureFailure(stepName: string, dir: string): Promise<void> {
    try {
      const screenshotPath = artifactPath(dir, `fail_${stepName}`, 'png');
      await this.page.screenshot({ path: screenshotPath, fullPage: true });
      log.error(`Screenshot saved: ${screenshotPath}`);
    } catch (e) {
      log.error(`Failed to capture screenshot: ${e}`);
    }

    try {
      const htmlPath = artifactPath(dir, `fail_${stepName}`, 'html');
      fs.writeFileSync(htmlPath, await this.page.content(), 'utf-8');
      log.error(`HTML dump saved: ${htmlPath}`);
    } catch (e) {
      log.error(`Failed to capture HTML: ${e}`);
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export class PlaywrightLauncher implements BrowserLauncher {
  async launch(opts: LaunchOptions): Promise<PageDriver> {
    log.info(`[driver] launching chromium headless=${opts.headless} slowMo=${opts.slowMo}`);
    const browser = await chromium.launch({ headless: opts.headless, slowMo: opts.slowMo });
    try {
      const context = await browser.newContext({
        acceptDownloads: true,
        ...(opts.sessionState ? { storageState: opts.sessionState } : {}),
      });
      const page = await context.newPage();
      return new PlaywrightPageDriver(browser, context, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
