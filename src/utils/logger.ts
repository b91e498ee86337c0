import * as fs from 'fs';
import * as path from 'path';
import type { LogLevel } from '../common/logger';
import { writeLog } from '../common/logger';

type ActivityHook = (level: LogLevel, msg: string) => void;
let activityHook: ActivityHook | null = null;

const MODULE_NAME = 'sync';

export function setLogActivityHook(hook: ActivityHook | null): void {
  activityHook = hook;
}

function emit(level: LogLevel, msg: string): void {
  const line = writeLog(level, MODULE_NAME, msg);
  if (line === null || !activityHook) return;
  try {
    activityHook(level, msg);
  } catch {
    // activity hook failure must not break main flow
  }
}

export function debug(msg: string): void {
  emit('DEBUG', msg);
}

export function info(msg: string): void {
  emit('INFO', msg);
}

export function success(msg: string): void {
  emit('SUCCESS', msg);
}

export function warn(msg: string): void {
  emit('WARN', msg);
}

export function error(msg: string): void {
  emit('ERROR', msg);
}

export function step(current: number, total: number, msg: string): void {
  emit('STEP', `[${current}/${total}] ${msg}`);
}

/** Timestamped file path under the artifacts directory. */
export function artifactPath(artifactsDir: string, prefix: string, ext: string): string {
  fs.mkdirSync(artifactsDir, { recursive: true });
  const ts = new Date().toISOString().replace(/[:.]/g, '').slice(0, 15);
  return path.join(artifactsDir, `${prefix}_${ts}.${ext}`);
}

// ── structured log helpers ─────────────────────────────────────────

export type StructuredLogPayload = Record<string, unknown>;

const secrets: string[] = [];

/** Values registered here are replaced in every structured payload. */
export function registerSecrets(values: string[]): void {
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed && !secrets.includes(trimmed)) secrets.push(trimmed);
  }
}

export function clearSecrets(): void {
  secrets.length = 0;
}

export function sanitizeLogPayload(data: StructuredLogPayload): StructuredLogPayload {
  const redacted: unknown = JSON.parse(
    JSON.stringify(data, (key, val: unknown) => {
      if (typeof val === 'string') {
        if (/^(password|secret|cookie_value|session_token)$/i.test(key)) return '[REDACTED]';
        let out = val;
        for (const secret of secrets) {
          out = out.split(secret).join('[REDACTED]');
        }
        return out;
      }
      return val;
    }),
  );
  if (typeof redacted !== 'object' || redacted === null || Array.isArray(redacted)) return {};
  return Object.fromEntries(Object.entries(redacted));
}

export function logStructured(event: string, data: StructuredLogPayload): void {
  info(`${event}: ${JSON.stringify(sanitizeLogPayload(data))}`);
}
