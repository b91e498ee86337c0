import * as path from 'path';
import type { LogThreshold } from './logger';
import { getCurrentLogDir } from './logger';

export type EnvMap = Record<string, string | undefined>;

export interface StageTimeouts {
  navigationMs: number;
  renderMs: number;
  downloadMs: number;
  uploadMs: number;
  /** how long a pending verification (MFA) prompt may take; may need a human at the keyboard */
  verificationMs: number;
}

export interface AppConfig {
  headless: boolean;
  slowMo: number;
  logLevel: LogThreshold;
  overleafUrl: string;
  sharepointUrl: string;
  username: string;
  password: string;
  /** empty string disables session reuse */
  cookiesFile: string;
  downloadPath: string;
  persistSession: boolean;
  timestampUploadName: boolean;
  artifactsDir: string;
  timeouts: StageTimeouts;
}

export const DEFAULT_DOWNLOAD_FILENAME = 'document.pdf';

export const DEFAULT_TIMEOUTS: StageTimeouts = {
  navigationMs: 30_000,
  renderMs: 61_000,
  downloadMs: 60_000,
  uploadMs: 120_000,
  verificationMs: 120_000,
};

const LOG_THRESHOLDS: readonly LogThreshold[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

function readString(env: EnvMap, name: string): string {
  return (env[name] ?? '').trim();
}

function parseBoolEnv(env: EnvMap, name: string, defaultValue: boolean): boolean {
  const raw = readString(env, name);
  if (!raw) return defaultValue;
  return raw.toLowerCase() !== 'false';
}

function parseIntEnv(env: EnvMap, name: string, defaultValue: number, min: number): number {
  const raw = readString(env, name);
  if (!/^\d+$/.test(raw)) return defaultValue;
  const value = parseInt(raw, 10);
  return value >= min ? value : defaultValue;
}

const LOG_LEVEL_ALIASES: Record<string, LogThreshold> = {
  WARNING: 'WARN',
  CRITICAL: 'ERROR',
  FATAL: 'ERROR',
};

export function parseLogLevel(raw: string): LogThreshold {
  const upper = raw.trim().toUpperCase();
  return LOG_THRESHOLDS.find((level) => level === upper) ?? LOG_LEVEL_ALIASES[upper] ?? 'INFO';
}

/**
 * Builds the process configuration from an environment map. Never throws: anything
 * missing or malformed takes its default, and required inputs are checked by the stage
 * that needs them.
 */
export function loadConfig(env: EnvMap = process.env, cwd: string = process.cwd()): AppConfig {
  const downloadPath = readString(env, 'DOWNLOAD_PATH');
  const artifactsDir = readString(env, 'ARTIFACTS_DIR');
  return {
    headless: parseBoolEnv(env, 'HEADLESS', true),
    slowMo: parseIntEnv(env, 'SLOW_MO', 0, 0),
    logLevel: parseLogLevel(readString(env, 'LOG_LEVEL')),
    overleafUrl: readString(env, 'OVERLEAF_URL'),
    sharepointUrl: readString(env, 'SHAREPOINT_URL'),
    username: readString(env, 'MICROSOFT_USERNAME'),
    password: readString(env, 'MICROSOFT_PASSWORD'),
    cookiesFile: readString(env, 'COOKIES_FILE'),
    downloadPath: downloadPath
      ? path.resolve(cwd, downloadPath)
      : path.join(cwd, DEFAULT_DOWNLOAD_FILENAME),
    persistSession: parseBoolEnv(env, 'PERSIST_SESSION', true),
    timestampUploadName: parseBoolEnv(env, 'UPLOAD_TIMESTAMP_SUFFIX', true),
    artifactsDir: artifactsDir
      ? path.resolve(cwd, artifactsDir)
      : path.join(getCurrentLogDir(), 'failures'),
    timeouts: {
      navigationMs: parseIntEnv(env, 'NAVIGATION_TIMEOUT_MS', DEFAULT_TIMEOUTS.navigationMs, 1),
      renderMs: parseIntEnv(env, 'RENDER_TIMEOUT_MS', DEFAULT_TIMEOUTS.renderMs, 1),
      downloadMs: parseIntEnv(env, 'DOWNLOAD_TIMEOUT_MS', DEFAULT_TIMEOUTS.downloadMs, 1),
      uploadMs: parseIntEnv(env, 'UPLOAD_TIMEOUT_MS', DEFAULT_TIMEOUTS.uploadMs, 1),
      verificationMs: parseIntEnv(env, 'MFA_TIMEOUT_MS', DEFAULT_TIMEOUTS.verificationMs, 1),
    },
  };
}
