import type { SessionState } from './session_state';

/**
 * A UI control to look for. Selectors are tried as alternatives (CSS or `xpath=`/`//`
 * XPath); the first visible match wins. They describe the vendor's current markup and
 * are expected to change with it.
 */
export interface ControlDescriptor {
  name: string;
  selectors: string[];
}

export interface ControlHandle {
  readonly descriptor: ControlDescriptor;
}

export interface DownloadHandle {
  suggestedFilename(): string;
  saveAs(filePath: string): Promise<void>;
}

export interface FileChooserHandle {
  setFiles(filePaths: string[]): Promise<void>;
}

export interface PageDriver {
  /** Rejects with NavigationError when the page does not load in time. */
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** Rejects with ElementNotFoundError when nothing matching becomes visible in time. */
  findControl(descriptor: ControlDescriptor, timeoutMs: number): Promise<ControlHandle>;
  /** Immediate check without waiting. */
  probeControl(descriptor: ControlDescriptor): Promise<ControlHandle | null>;
  click(control: ControlHandle): Promise<void>;
  fill(control: ControlHandle, value: string): Promise<void>;
  /** Arm before the click that triggers the download; rejects with DownloadTimeoutError. */
  waitForDownload(timeoutMs: number): Promise<DownloadHandle>;
  /** Arm before the click that opens the chooser; rejects with ElementNotFoundError. */
  waitForFileChooser(timeoutMs: number): Promise<FileChooserHandle>;
  /** Resolves true once the described element is visible, false on timeout. */
  waitForEvent(descriptor: ControlDescriptor, timeoutMs: number): Promise<boolean>;
  currentUrl(): string;
  exportSessionState(): Promise<SessionState>;
  /** Best effort screenshot and HTML dump into `dir`. Never rejects. */
  captureFailure(stepName: string, dir: string): Promise<void>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  slowMo: number;
  sessionState?: SessionState | null;
}

export interface BrowserLauncher {
  launch(opts: LaunchOptions): Promise<PageDriver>;
}
