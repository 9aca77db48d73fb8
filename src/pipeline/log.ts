/* Structured logger with step timing & ETA; JSON lines or pretty console output */
import { AsyncLocalStorage } from 'async_hooks';
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';
import { ENV } from './env';

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(v: string): v is LogLevel {
  return v in LEVEL_ORDER;
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER[l];
}

interface InternalConfig {
  format: 'json' | 'pretty';
  progressIntervalMs: number;
}

let currentLevel: LogLevel = isLogLevel(ENV.logLevel) ? ENV.logLevel : 'info';
const config: InternalConfig = {
  format: ENV.logFormat === 'pretty' ? 'pretty' : 'json',
  progressIntervalMs: ENV.progressIntervalMs,
};

export function setLogLevel(l: LogLevel) {
  currentLevel = l;
}

function ts() { return new Date().toISOString(); }

export interface StepTimer {
  end: (extra?: LogMeta) => void;
  eta: (done: number, total: number) => void;
}

function color(level: LogLevel, s: string) {
  if (config.format !== 'pretty') return s;
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
  };
  const reset = '\u001b[0m';
  return map[level] + s + reset;
}

const lastProgress: Record<string, number> = {};

// Run log of the job whose async context is emitting; jobs never share one
const runLog = new AsyncLocalStorage<{ fd: number | null }>();

function openLogFile(filePath: string): number | null {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    return fs.openSync(filePath, 'a');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('Failed to open log file', filePath, e);
    return null;
  }
}

/**
 * Run `fn` with every log line it emits, directly or through anything it
 * awaits, mirrored to `filePath`. The file is closed when `fn` settles.
 */
export async function withLogFile<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const scope = { fd: openLogFile(filePath) };
  try {
    return await runLog.run(scope, fn);
  } finally {
    if (scope.fd !== null) fs.closeSync(scope.fd);
    scope.fd = null;
  }
}

function serializeMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = v instanceof Error ? { name: v.name, message: v.message } : v;
  }
  return out;
}

export function log(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const rest = serializeMeta(meta || {});
  const payload = { t: ts(), level, msg, ...rest };
  const line = JSON.stringify(payload);
  if (config.format === 'json') {
    // eslint-disable-next-line no-console
    console.log(line);
  } else {
    const base = `${payload.t} ${level.toUpperCase()} ${msg}`;
    const metaStr = Object.keys(rest).length ? ' ' + JSON.stringify(rest) : '';
    // eslint-disable-next-line no-console
    console.log(color(level, base) + metaStr);
  }
  const fd = runLog.getStore()?.fd;
  if (fd !== undefined && fd !== null) {
    fs.writeSync(fd, line + '\n');
  }
}

export function shouldEmitProgress(key: string) {
  const now = performance.now();
  const last = lastProgress[key] || 0;
  if (now - last < config.progressIntervalMs) return false;
  lastProgress[key] = now;
  return true;
}

export function debug(msg: string, meta?: LogMeta) {
  log("debug", msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log("info", msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log("warn", msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log("error", msg, meta);
}

export function startStep(name: string, meta?: LogMeta): StepTimer {
  const start = performance.now();
  info(`start:${name}`, meta);
  return {
    end: (extra?: LogMeta) => {
      const durMs = performance.now() - start;
      info(`end:${name}`, { ms: Math.round(durMs), ...meta, ...extra });
    },
    eta: (done: number, total: number) => {
      if (total <= 0) return;
      const elapsed = performance.now() - start;
      const rate = done > 0 ? elapsed / done : 0;
      const remaining = done > 0 ? rate * (total - done) : 0;
      if (shouldEmitProgress(name)) {
        info(`progress:${name}`, {
          done,
          total,
          pct: Number(((done / total) * 100).toFixed(2)),
          etaMs: Math.round(remaining),
        });
      }
    },
  };
}
