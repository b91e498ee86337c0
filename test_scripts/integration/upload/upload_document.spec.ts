import * as fs from 'fs';
import * as path from 'path';
import { uploadDocument } from '../../../src/sharepoint/uploader';
import { writeSessionState } from '../../../src/browser/session_state';
import { AuthenticationError, ConfigurationError, NavigationError, UploadTimeoutError } from '../../../src/common/errors';
import type { EnvMap } from '../../../src/common/config';
import { StubLauncher } from '../../helpers/stub_driver';
import { portalScript, type PortalOptions } from '../../helpers/portal';
import { LIBRARY_URL, makeTempDir, testConfig, useTempLogs } from '../../helpers/test_env';

type Fixture = {
  workDir: string;
  filePath: string;
  cookiesFile: string;
  launcher: StubLauncher;
};

function setup(prefix: string, portal: PortalOptions = {}): Fixture {
  const workDir = makeTempDir(prefix);
  const filePath = path.join(workDir, 'document.pdf');
  fs.writeFileSync(filePath, 'pdf-bytes');
  return {
    workDir,
    filePath,
    cookiesFile: path.join(workDir, 'session.json'),
    launcher: new StubLauncher(portalScript(portal)),
  };
}

function configFor(fx: Fixture, env: EnvMap = {}) {
  return testConfig(fx.workDir, { COOKIES_FILE: fx.cookiesFile, ...env });
}

function saveValidSession(file: string): void {
  writeSessionState(file, {
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
  });
}

describe('uploadDocument', () => {
  beforeAll(() => {
    useTempLogs();
  });

  test('signs in, uploads a timestamped copy and saves the session', async () => {
    const fx = setup('upload-login');

    const result = await uploadDocument(configFor(fx), fx.launcher, fx.filePath);
    const driver = fx.launcher.last;

    expect(result.loginPerformed).toBe(true);
    expect(result.sessionRestored).toBe(false);
    expect(result.verificationPrompted).toBe(false);
    expect(result.uploadedName).toMatch(/^document-\d+\.pdf$/);
    expect(driver.fills).toEqual([
      { control: 'email input', value: 'user@example.com' },
      { control: 'password input', value: 'test-secret' },
    ]);
    expect(driver.launchOptions.sessionState).toBeNull();

    expect(driver.uploadedFiles).toHaveLength(1);
    const staged = driver.uploadedFiles[0][0];
    expect(path.basename(staged)).toBe(result.uploadedName);
    expect(fs.existsSync(path.dirname(staged))).toBe(false);

    expect(JSON.parse(fs.readFileSync(fx.cookiesFile, 'utf-8')).cookies[0].name).toBe('FedAuth');
    expect(fs.existsSync(fx.filePath)).toBe(true);
    expect(driver.closed).toBe(true);
  });

  test('waits for a sign-in form that is drawn after the page loads', async () => {
    const fx = setup('upload-late-form', { lateSignInForm: true });

    const result = await uploadDocument(configFor(fx), fx.launcher, fx.filePath);
    const driver = fx.launcher.last;

    expect(result.loginPerformed).toBe(true);
    expect(driver.calls).toContain('wait:auth state:30000');
    expect(driver.fills.map((f) => f.control)).toEqual(['email input', 'password input']);
    expect(driver.uploadedFiles).toHaveLength(1);
  });

  test('a page showing neither sign-in nor library is a NavigationError', async () => {
    const fx = setup('upload-blank');
    const launcher = new StubLauncher(() => ({}));

    const error = await uploadDocument(configFor(fx, { NAVIGATION_TIMEOUT_MS: '5000' }), launcher, fx.filePath)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NavigationError);
    expect(launcher.last.calls).toContain('wait:auth state:5000');
    expect(launcher.last.calls).toContain('capture:upload_navigate');
    expect(launcher.last.fills).toEqual([]);
  });

  test('a saved session skips the login form entirely', async () => {
    const fx = setup('upload-session');
    saveValidSession(fx.cookiesFile);

    const result = await uploadDocument(configFor(fx), fx.launcher, fx.filePath);
    const driver = fx.launcher.last;

    expect(result.sessionRestored).toBe(true);
    expect(result.loginPerformed).toBe(false);
    expect(driver.fills).toEqual([]);
    expect(driver.clicked('sign-in submit')).toBe(0);
    expect(driver.launchOptions.sessionState?.cookies.map((c) => c.name)).toEqual(['FedAuth']);
  });

  test('an expired session falls back to the login form', async () => {
    const fx = setup('upload-expired', { sessionValid: false });
    saveValidSession(fx.cookiesFile);

    const result = await uploadDocument(configFor(fx), fx.launcher, fx.filePath);

    expect(result.loginPerformed).toBe(true);
    expect(result.sessionRestored).toBe(false);
  });

  test('missing SHAREPOINT_URL fails without opening a browser', async () => {
    const fx = setup('upload-nourl');

    const error = await uploadDocument(configFor(fx, { SHAREPOINT_URL: '' }), fx.launcher, fx.filePath)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.missing).toEqual(['SHAREPOINT_URL']);
    }
    expect(fx.launcher.drivers).toHaveLength(0);
  });

  test('missing credentials are reported together', async () => {
    const fx = setup('upload-nocreds');

    await expect(
      uploadDocument(configFor(fx, { MICROSOFT_USERNAME: '', MICROSOFT_PASSWORD: '' }), fx.launcher, fx.filePath),
    ).rejects.toThrow('[CONFIGURATION_INVALID] missing MICROSOFT_USERNAME, MICROSOFT_PASSWORD');
    expect(fx.launcher.drivers).toHaveLength(0);
  });

  test('a missing or empty source file fails before the browser starts', async () => {
    const fx = setup('upload-nofile');
    const empty = path.join(fx.workDir, 'empty.pdf');
    fs.writeFileSync(empty, '');

    await expect(uploadDocument(configFor(fx), fx.launcher, path.join(fx.workDir, 'absent.pdf')))
      .rejects.toBeInstanceOf(ConfigurationError);
    await expect(uploadDocument(configFor(fx), fx.launcher, empty)).rejects.toBeInstanceOf(ConfigurationError);
    expect(fx.launcher.drivers).toHaveLength(0);
  });

  test('rejected credentials are an AuthenticationError', async () => {
    const fx = setup('upload-badpw', { acceptPassword: false });

    const error = await uploadDocument(configFor(fx), fx.launcher, fx.filePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    if (error instanceof AuthenticationError) {
      expect(error.reason).toBe('CREDENTIALS_REJECTED');
    }
    expect(fx.launcher.last.calls).toContain('capture:upload_login');
    expect(fx.launcher.last.closed).toBe(true);
    expect(fs.existsSync(fx.cookiesFile)).toBe(false);
  });

  test('an approved verification prompt and "stay signed in" are handled', async () => {
    const fx = setup('upload-mfa', { verification: 'approved' });

    const result = await uploadDocument(configFor(fx), fx.launcher, fx.filePath);

    expect(result.verificationPrompted).toBe(true);
    expect(fx.launcher.last.clicked('stay signed in accept')).toBe(1);
  });

  test('a verification prompt left pending times out as an AuthenticationError', async () => {
    const fx = setup('upload-mfa-pending', { verification: 'pending' });
    const config = configFor(fx, { MFA_TIMEOUT_MS: '2000' });

    const error = await uploadDocument(config, fx.launcher, fx.filePath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    if (error instanceof AuthenticationError) {
      expect(error.reason).toBe('VERIFICATION_TIMEOUT');
    }
    expect(fx.launcher.last.calls).toContain('wait:post-verification signal:2000');
  });

  test('lands back on the library when sign-in redirects elsewhere', async () => {
    const fx = setup('upload-redirect', { landingUrl: 'https://example.sharepoint.com/sites/team/SitePages/Home.aspx' });

    await uploadDocument(configFor(fx), fx.launcher, fx.filePath);

    const navigations = fx.launcher.last.calls.filter((c) => c.startsWith('navigate:'));
    expect(navigations).toEqual([`navigate:${LIBRARY_URL}`, `navigate:${LIBRARY_URL}`]);
  });

  test('no confirmation within the timeout is an UploadTimeoutError', async () => {
    const fx = setup('upload-noconfirm', { confirmUpload: false });

    await expect(uploadDocument(configFor(fx, { UPLOAD_TIMEOUT_MS: '3000' }), fx.launcher, fx.filePath))
      .rejects.toBeInstanceOf(UploadTimeoutError);
    expect(fx.launcher.last.calls).toContain('wait:upload confirmation:3000');
    expect(fx.launcher.last.calls).toContain('capture:upload_confirm');
    expect(fs.existsSync(fx.filePath)).toBe(true);
  });

  test('session saving and renaming can be switched off', async () => {
    const fx = setup('upload-plain');

    const result = await uploadDocument(
      configFor(fx, { PERSIST_SESSION: 'false', UPLOAD_TIMESTAMP_SUFFIX: 'false' }),
      fx.launcher,
      fx.filePath,
    );

    expect(result.uploadedName).toBe('document.pdf');
    expect(fs.existsSync(fx.cookiesFile)).toBe(false);
  });
});
