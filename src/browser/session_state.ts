import * as fs from 'fs';
import * as path from 'path';
import * as log from '../utils/logger';
import type { PageDriver } from './page_driver';

export type SameSite = 'Strict' | 'Lax' | 'None';

export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: SameSite;
}

export interface OriginState {
  origin: string;
  localStorage: Array<{ name: string; value: string }>;
}

/** Same shape as Playwright's storage state, so it can be handed to `newContext` as-is. */
export interface SessionState {
  cookies: SessionCookie[];
  origins: OriginState[];
}

export type SessionStateSummary = {
  path: string;
  exists: boolean;
  fileSize: number;
  cookieCount: number;
};

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  return typeof value === 'string' ? value : null;
}

function normalizeSameSite(value: unknown): SameSite {
  if (typeof value !== 'string') return 'Lax';
  const lower = value.toLowerCase();
  if (lower === 'strict') return 'Strict';
  if (lower === 'none' || lower === 'no_restriction') return 'None';
  return 'Lax';
}

export function normalizeCookie(raw: unknown): SessionCookie | null {
  if (!isObject(raw)) return null;
  const name = stringField(raw, 'name');
  const value = stringField(raw, 'value');
  const domain = stringField(raw, 'domain');
  if (!name || value === null || !domain) return null;
  return {
    name,
    value,
    domain,
    path: stringField(raw, 'path') || '/',
    expires: typeof raw.expires === 'number' ? raw.expires : -1,
    httpOnly: raw.httpOnly === true,
    secure: raw.secure === true,
    sameSite: normalizeSameSite(raw.sameSite),
  };
}

function normalizeOrigin(raw: unknown): OriginState | null {
  if (!isObject(raw)) return null;
  const origin = stringField(raw, 'origin');
  if (!origin) return null;
  const entries = Array.isArray(raw.localStorage) ? raw.localStorage : [];
  const localStorage: OriginState['localStorage'] = [];
  for (const entry of entries) {
    if (!isObject(entry)) continue;
    const name = stringField(entry, 'name');
    const value = stringField(entry, 'value');
    if (name !== null && value !== null) localStorage.push({ name, value });
  }
  return { origin, localStorage };
}

/**
 * Accepts either a storage-state object (`{ cookies, origins }`) or a bare cookie array.
 * Returns null when nothing usable is found.
 */
export function parseSessionState(raw: unknown): SessionState | null {
  let cookieList: unknown[];
  let originList: unknown[] = [];
  if (Array.isArray(raw)) {
    cookieList = raw;
  } else if (isObject(raw) && Array.isArray(raw.cookies)) {
    cookieList = raw.cookies;
    originList = Array.isArray(raw.origins) ? raw.origins : [];
  } else {
    return null;
  }

  const cookies = cookieList
    .map(normalizeCookie)
    .filter((cookie): cookie is SessionCookie => cookie !== null);
  const origins = originList
    .map(normalizeOrigin)
    .filter((origin): origin is OriginState => origin !== null);
  if (cookies.length === 0 && origins.length === 0) return null;
  return { cookies, origins };
}

export function getSessionStateSummary(statePath: string): SessionStateSummary {
  const resolvedPath = path.resolve(statePath);
  if (!fs.existsSync(resolvedPath)) {
    return { path: resolvedPath, exists: false, fileSize: 0, cookieCount: 0 };
  }

  let fileSize = 0;
  let cookieCount = 0;
  try {
    fileSize = fs.statSync(resolvedPath).size;
    const parsed = parseSessionState(JSON.parse(fs.readFileSync(resolvedPath, 'utf-8')));
    cookieCount = parsed ? parsed.cookies.length : 0;
  } catch {
    cookieCount = 0;
  }
  return { path: resolvedPath, exists: true, fileSize, cookieCount };
}

/** Missing, unreadable or malformed files all mean "no saved session". */
export function readSessionState(statePath: string): SessionState | null {
  if (!statePath) return null;
  const resolvedPath = path.resolve(statePath);
  if (!fs.existsSync(resolvedPath)) {
    log.info(`[session] no saved session at ${resolvedPath}`);
    return null;
  }
  try {
    const state = parseSessionState(JSON.parse(fs.readFileSync(resolvedPath, 'utf-8')));
    if (!state) {
      log.warn(`[session] saved session has no usable cookies: ${resolvedPath}`);
      return null;
    }
    log.info(`[session] loaded ${state.cookies.length} cookies from ${resolvedPath}`);
    return state;
  } catch (error) {
    log.warn(`[session] saved session unreadable, ignoring: ${resolvedPath} reason=${String(error)}`);
    return null;
  }
}

export function writeSessionState(statePath: string, state: SessionState): void {
  const resolvedPath = path.resolve(statePath);
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  fs.writeFileSync(resolvedPath, JSON.stringify(state, null, 2), { encoding: 'utf-8', mode: 0o600 });
  // mode only applies on create
  fs.chmodSync(resolvedPath, 0o600);
}

/** Saving the session is a convenience for later runs; a failed write only warns. */
export async function persistSessionState(driver: PageDriver, statePath: string): Promise<boolean> {
  if (!statePath) return false;
  try {
    writeSessionState(statePath, await driver.exportSessionState());
    const summary = getSessionStateSummary(statePath);
    if (summary.fileSize === 0) {
      log.warn(`[session] storage_state_saved_zero_bytes path=${summary.path}`);
    }
    log.info(
      `[session] storage_state_saved=true path=${summary.path} file_size=${summary.fileSize} cookie_count=${summary.cookieCount}`,
    );
    return true;
  } catch (error) {
    log.warn(`[session] storage_state_saved=false reason=${error}`);
    return false;
  }
}
