/**
 * Console logger with level filtering and secret redaction.
 * API keys, the feed JWT and the snapshot auth token never reach the console.
 */

import { inspect } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const AUTHORIZATION_HEADER_PATTERN = /(?<=Authorization:\s*(?:Bearer\s+)?)\S+/gi;

const secretFragments: string[] = [];
let secretPattern: RegExp | null = null;

/** Register a secret value so it is redacted from all log output. */
export function registerSecret(secret: string): void {
  if (secret && secret.length >= 8) {
    secretFragments.push(secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'));
    secretPattern = new RegExp(secretFragments.join('|'), 'g');
  }
}

/** Forget registered secrets (tests only). */
export function clearSecrets(): void {
  secretFragments.length = 0;
  secretPattern = null;
}

export function sanitize(message: string): string {
  let result = message.replace(AUTHORIZATION_HEADER_PATTERN, '[REDACTED]');
  if (secretPattern) {
    result = result.replace(secretPattern, '[REDACTED]');
  }
  return result;
}

function formatArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) {
        return sanitize(arg.stack ?? arg.message);
      }
      if (typeof arg === 'string') {
        return sanitize(arg);
      }
      return sanitize(inspect(arg, { depth: 3, breakLength: Infinity }));
    })
    .join(' ');
}

/** A level name, case and surrounding spaces ignored; null when unknown. */
export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const value = raw?.trim().toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return null;
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? (process.env.DEBUG ? 'debug' : 'info');

/** Change the minimum level at runtime (config load, tests). */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function timestamp(): string {
  return new Date().toISOString();
}

export const logger = {
  info(...args: unknown[]): void {
    if (enabled('info')) console.log(`[${timestamp()}] [INFO]`, formatArgs(args));
  },
  warn(...args: unknown[]): void {
    if (enabled('warn')) console.warn(`[${timestamp()}] [WARN]`, formatArgs(args));
  },
  error(...args: unknown[]): void {
    if (enabled('error')) console.error(`[${timestamp()}] [ERROR]`, formatArgs(args));
  },
  debug(...args: unknown[]): void {
    if (enabled('debug')) console.debug(`[${timestamp()}] [DEBUG]`, formatArgs(args));
  },
};
