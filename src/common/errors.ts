export type PipelineErrorCode =
  | 'CONFIGURATION_INVALID'
  | 'NAVIGATION_FAILED'
  | 'ELEMENT_NOT_FOUND'
  | 'DOWNLOAD_TIMEOUT'
  | 'AUTHENTICATION_FAILED'
  | 'UPLOAD_TIMEOUT';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(`[${code}] ${message}`);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export class ConfigurationError extends PipelineError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super('CONFIGURATION_INVALID', message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

export class NavigationError extends PipelineError {
  readonly url: string;

  constructor(url: string, detail: string) {
    super('NAVIGATION_FAILED', `${url}: ${detail}`);
    this.name = 'NavigationError';
    this.url = url;
  }
}

export class ElementNotFoundError extends PipelineError {
  readonly control: string;
  readonly triedSelectors: string[];

  constructor(control: string, triedSelectors: string[], timeoutMs: number) {
    super('ELEMENT_NOT_FOUND', `control "${control}" not visible within ${timeoutMs}ms`);
    this.name = 'ElementNotFoundError';
    this.control = control;
    this.triedSelectors = triedSelectors;
  }
}

export class DownloadTimeoutError extends PipelineError {
  constructor(detail: string) {
    super('DOWNLOAD_TIMEOUT', detail);
    this.name = 'DownloadTimeoutError';
  }
}

export class AuthenticationError extends PipelineError {
  readonly reason: string;

  constructor(reason: string, detail: string) {
    super('AUTHENTICATION_FAILED', `${reason}: ${detail}`);
    this.name = 'AuthenticationError';
    this.reason = reason;
  }
}

export class UploadTimeoutError extends PipelineError {
  constructor(detail: string) {
    super('UPLOAD_TIMEOUT', detail);
    this.name = 'UploadTimeoutError';
  }
}

export function describeError(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'UnknownError', message: String(error) };
}
