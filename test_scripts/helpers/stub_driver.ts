import * as fs from 'fs';
import type {
  BrowserLauncher,
  ControlDescriptor,
  ControlHandle,
  DownloadHandle,
  FileChooserHandle,
  LaunchOptions,
  PageDriver,
} from '../../src/browser/page_driver';
import type { SessionState } from '../../src/browser/session_state';
import { DownloadTimeoutError, ElementNotFoundError, NavigationError } from '../../src/common/errors';

export type StubReaction = (driver: StubPageDriver) => void;

export interface StubScript {
  /** runs after every successful navigate */
  onNavigate?: (driver: StubPageDriver, url: string) => void;
  /** keyed by ControlDescriptor.name */
  onClick?: Record<string, StubReaction>;
  /** keyed by ControlDescriptor.name; runs after the value is filled */
  onFill?: Record<string, StubReaction>;
  /** keyed by ControlDescriptor.name; runs once, on the first wait for that descriptor */
  onFirstWait?: Record<string, StubReaction>;
  onSetFiles?: (driver: StubPageDriver, files: string[]) => void;
  navigateError?: string;
  /** null means no download ever starts */
  download?: { filename: string; bytes: Buffer } | null;
  exportedState?: SessionState;
}

class StubControl implements ControlHandle {
  constructor(readonly descriptor: ControlDescriptor) {}
}

export class StubPageDriver implements PageDriver {
  readonly visible = new Set<string>();
  readonly calls: string[] = [];
  readonly fills: Array<{ control: string; value: string }> = [];
  readonly uploadedFiles: string[][] = [];
  url = 'about:blank';
  closed = false;

  constructor(
    readonly launchOptions: LaunchOptions,
    private readonly script: StubScript,
  ) {}

  show(...descriptors: ControlDescriptor[]): void {
    for (const d of descriptors) d.selectors.forEach((s) => this.visible.add(s));
  }

  hide(...descriptors: ControlDescriptor[]): void {
    for (const d of descriptors) d.selectors.forEach((s) => this.visible.delete(s));
  }

  isVisible(descriptor: ControlDescriptor): boolean {
    return descriptor.selectors.some((s) => this.visible.has(s));
  }

  clicked(name: string): number {
    return this.calls.filter((c) => c === `click:${name}`).length;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    this.calls.push(`navigate:${url}`);
    if (this.script.navigateError) {
      throw new NavigationError(url, this.script.navigateError);
    }
    this.url = url;
    this.script.onNavigate?.(this, url);
  }

  async findControl(descriptor: ControlDescriptor, timeoutMs: number): Promise<ControlHandle> {
    if (!this.isVisible(descriptor)) {
      throw new ElementNotFoundError(descriptor.name, descriptor.selectors, timeoutMs);
    }
    return new StubControl(descriptor);
  }

  async probeControl(descriptor: ControlDescriptor): Promise<ControlHandle | null> {
    return this.isVisible(descriptor) ? new StubControl(descriptor) : null;
  }

  async click(control: ControlHandle): Promise<void> {
    this.calls.push(`click:${control.descriptor.name}`);
    this.script.onClick?.[control.descriptor.name]?.(this);
  }

  async fill(control: ControlHandle, value: string): Promise<void> {
    this.fills.push({ control: control.descriptor.name, value });
    this.script.onFill?.[control.descriptor.name]?.(this);
  }

  async waitForDownload(timeoutMs: number): Promise<DownloadHandle> {
    const download = this.script.download;
    if (!download) {
      throw new DownloadTimeoutError(`no download started within ${timeoutMs}ms`);
    }
    return {
      suggestedFilename: () => download.filename,
      saveAs: async (filePath: string) => {
        fs.writeFileSync(filePath, download.bytes);
      },
    };
  }

  async waitForFileChooser(timeoutMs: number): Promise<FileChooserHandle> {
    return {
      setFiles: async (files: string[]) => {
        this.uploadedFiles.push(files);
        this.script.onSetFiles?.(this, files);
      },
    };
  }

  async waitForEvent(descriptor: ControlDescriptor, timeoutMs: number): Promise<boolean> {
    const firstWait = !this.calls.some((c) => c.startsWith(`wait:${descriptor.name}:`));
    this.calls.push(`wait:${descriptor.name}:${timeoutMs}`);
    if (firstWait) this.script.onFirstWait?.[descriptor.name]?.(this);
    return this.isVisible(descriptor);
  }

  currentUrl(): string {
    return this.url;
  }

  async exportSessionState(): Promise<SessionState> {
    return this.script.exportedState ?? {
      cookies: [{
        name: 'FedAuth',
        value: 'test-cookie',
        domain: '.example.sharepoint.com',
        path: '/',
        expires: -1,
        httpOnly: true,
        secure: true,
        sameSite: 'None',
      }],
      origins: [],
    };
  }

  async captureFailure(stepName: string, dir: string): Promise<void> {
    this.calls.push(`capture:${stepName}`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class StubLauncher implements BrowserLauncher {
  readonly drivers: StubPageDriver[] = [];

  constructor(private readonly scriptFor: (opts: LaunchOptions) => StubScript) {}

  async launch(opts: LaunchOptions): Promise<PageDriver> {
    const driver = new StubPageDriver(opts, this.scriptFor(opts));
    this.drivers.push(driver);
    return driver;
  }

  get last(): StubPageDriver {
    const driver = this.drivers[this.drivers.length - 1];
    if (!driver) throw new Error('no browser was launched');
    return driver;
  }
}
