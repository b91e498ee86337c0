import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'SUCCESS' | 'STEP';
export type LogThreshold = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_FILES = ['app.log', 'error.log'] as const;
type LogFile = typeof LOG_FILES[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  SUCCESS: 20,
  STEP: 20,
  WARN: 30,
  ERROR: 40,
};

let lastUsedDate = '';
let currentLogDir = '';
let fileDescriptors: Record<LogFile, number> | null = null;
let shutdownHookRegistered = false;
let minLevel: LogThreshold = 'INFO';
let baseDirOverride: string | null = null;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

export function getDateKey(now: Date = new Date()): string {
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
}

function getTimestamp(now: Date): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
}

function closeStreams(): void {
  if (!fileDescriptors) return;
  for (const fd of Object.values(fileDescriptors)) {
    fs.closeSync(fd);
  }
  fileDescriptors = null;
}

function registerShutdownHook(): void {
  if (shutdownHookRegistered) return;
  shutdownHookRegistered = true;
  process.once('beforeExit', closeStreams);
  process.once('exit', closeStreams);
}

/**
 * Sets the minimum level written and, optionally, the directory that holds the dated
 * log folders. Called once by the CLI after the configuration is loaded.
 */
export function configureLogger(opts: { level?: LogThreshold; baseDir?: string | null }): void {
  if (opts.level) minLevel = opts.level;
  if (opts.baseDir !== undefined) {
    baseDirOverride = opts.baseDir ? path.resolve(opts.baseDir) : null;
    closeStreams();
    lastUsedDate = '';
  }
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export function getLogBaseDir(): string {
  return baseDirOverride ?? path.resolve(process.cwd(), 'logs');
}

export function getCurrentLogDir(now: Date = new Date()): string {
  return path.join(getLogBaseDir(), getDateKey(now));
}

export function resolveTodayLogFile(file: LogFile, now: Date = new Date()): string {
  return path.join(getCurrentLogDir(now), file);
}

function ensureTodayDir(now: Date): string {
  registerShutdownHook();
  const dateKey = getDateKey(now);
  const nextLogDir = getCurrentLogDir(now);

  if (dateKey !== lastUsedDate || !fileDescriptors || currentLogDir !== nextLogDir) {
    closeStreams();
    fs.mkdirSync(nextLogDir, { recursive: true });
    fileDescriptors = {
      'app.log': fs.openSync(path.join(nextLogDir, 'app.log'), 'a'),
      'error.log': fs.openSync(path.join(nextLogDir, 'error.log'), 'a'),
    };
    currentLogDir = nextLogDir;
    lastUsedDate = dateKey;
  } else if (!fs.existsSync(nextLogDir)) {
    fs.mkdirSync(nextLogDir, { recursive: true });
  }

  return currentLogDir;
}

function filesFor(level: LogLevel): LogFile[] {
  const files = new Set<LogFile>(['app.log']);
  if (level === 'ERROR') {
    files.add('error.log');
  }
  return [...files];
}

function stringifyMessage(message: unknown): string {
  if (typeof message === 'string') return message;
  try {
    return JSON.stringify(message);
  } catch {
    return String(message);
  }
}

export function formatLine(level: LogLevel, moduleName: string, message: unknown, now: Date): string {
  return `[${getTimestamp(now)}] [${level}] [${moduleName}] ${stringifyMessage(message)}`;
}

/** Returns the written line, or null when the level is filtered out. */
export function writeLog(level: LogLevel, moduleName: string, message: unknown): string | null {
  if (!isLevelEnabled(level)) return null;
  const now = new Date();
  ensureTodayDir(now);
  const line = formatLine(level, moduleName, message, now);
  if (!fileDescriptors) {
    throw new Error('logger stream is not initialized');
  }
  for (const file of filesFor(level)) {
    fs.writeSync(fileDescriptors[file], `${line}\n`);
  }
  if (level === 'ERROR') {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
  return line;
}
