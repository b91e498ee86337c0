import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  getSessionStateSummary,
  normalizeCookie,
  parseSessionState,
  persistSessionState,
  readSessionState,
  writeSessionState,
} from '../../src/browser/session_state';
import { StubPageDriver } from '../helpers/stub_driver';
import { useTempLogs } from '../helpers/test_env';

describe('parseSessionState', () => {
  test('a bare cookie array gets defaults for missing fields', () => {
    const state = parseSessionState([{ name: 'FedAuth', value: 'v', domain: '.example.sharepoint.com' }]);
    expect(state).toEqual({
      cookies: [{
        name: 'FedAuth',
        value: 'v',
        domain: '.example.sharepoint.com',
        path: '/',
        expires: -1,
        httpOnly: false,
        secure: false,
        sameSite: 'Lax',
      }],
      origins: [],
    });
  });

  test('storage-state objects keep origins and drop malformed entries', () => {
    const state = parseSessionState({
      cookies: [
        { name: 'rtFa', value: 'x', domain: '.example.com', sameSite: 'no_restriction', secure: true },
        { name: 'broken', value: 'x' },
        'not-a-cookie',
      ],
      origins: [
        { origin: 'https://example.sharepoint.com', localStorage: [{ name: 'k', value: 'v' }, { name: 1 }] },
        { localStorage: [] },
      ],
    });
    expect(state?.cookies.map((c) => [c.name, c.sameSite, c.secure])).toEqual([['rtFa', 'None', true]]);
    expect(state?.origins).toEqual([
      { origin: 'https://example.sharepoint.com', localStorage: [{ name: 'k', value: 'v' }] },
    ]);
  });

  test('nothing usable means no session', () => {
    expect(parseSessionState([])).toBeNull();
    expect(parseSessionState({})).toBeNull();
    expect(parseSessionState({ cookies: [{ name: 'a' }] })).toBeNull();
    expect(parseSessionState('cookies')).toBeNull();
  });

  test('sameSite is matched case-insensitively', () => {
    expect(normalizeCookie({ name: 'a', value: '', domain: 'x', sameSite: 'STRICT' })?.sameSite).toBe('Strict');
  });
});

describe('session state files', () => {
  beforeAll(() => {
    useTempLogs();
  });

  test('missing and malformed files read as no session', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-read-'));
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{not json', 'utf-8');

    expect(readSessionState(path.join(dir, 'absent.json'))).toBeNull();
    expect(readSessionState(broken)).toBeNull();
    expect(readSessionState('')).toBeNull();
  });

  test('written state reads back and is summarised', () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'session-write-')), 'nested', 'state.json');
    const state = {
      cookies: [{
        name: 'FedAuth', value: 'v', domain: '.example.com', path: '/',
        expires: -1, httpOnly: true, secure: true, sameSite: 'None' as const,
      }],
      origins: [],
    };
    writeSessionState(file, state);

    expect(readSessionState(file)).toEqual(state);
    const summary = getSessionStateSummary(file);
    expect(summary.exists).toBe(true);
    expect(summary.cookieCount).toBe(1);
    expect(summary.fileSize).toBeGreaterThan(0);
  });

  const ownerOnly = process.platform === 'win32' ? test.skip : test;

  ownerOnly('session files are readable by the owner only, including overwrites', () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'session-mode-')), 'state.json');
    fs.writeFileSync(file, '[]', { mode: 0o644 });
    fs.chmodSync(file, 0o644);

    writeSessionState(file, { cookies: [], origins: [] });

    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  test('persistSessionState saves what the browser exports', async () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'session-persist-')), 'state.json');
    const driver = new StubPageDriver({ headless: true, slowMo: 0 }, {});

    await expect(persistSessionState(driver, file)).resolves.toBe(true);
    const saved = readSessionState(file);
    expect(saved?.cookies.map((c) => c.name)).toEqual(['FedAuth']);
  });

  test('persistSessionState without a path does nothing', async () => {
    const driver = new StubPageDriver({ headless: true, slowMo: 0 }, {});
    await expect(persistSessionState(driver, '')).resolves.toBe(false);
  });
});
