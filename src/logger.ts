/**
 * Console logger with secret redaction.
 *
 * The profile password travels in `bb-auth` frames and in config, so every
 * line passes through `sanitize` before it reaches the console.
 */

import { inspect } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const PASSWORD_FIELD_PATTERN = /("?password"?\s*[:=]\s*)("[^"]*"|'[^']*'|[^\s,}&]+)/gi;

const secretFragments: string[] = [];
let secretPattern: RegExp | null = null;

/** Register a secret value so it is redacted from all log output. */
export function registerSecret(secret: string): void {
  if (!secret || secret.length < 4) return;
  const escaped = secret.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  if (secretFragments.includes(escaped)) return;
  secretFragments.push(escaped);
  secretPattern = new RegExp(secretFragments.join('|'), 'g');
}

export function sanitize(message: string): string {
  let result = message.replace(PASSWORD_FIELD_PATTERN, '$1[REDACTED]');
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

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function activeLevel(): LogLevel {
  if (process.env.DEBUG) return 'debug';
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel()];
}

function timestamp(): string {
  return new Date().toISOString();
}

export const logger = {
  debug(...args: unknown[]): void {
    if (enabled('debug')) console.debug(`[${timestamp()}] [DEBUG]`, formatArgs(args));
  },
  info(...args: unknown[]): void {
    if (enabled('info')) console.log(`[${timestamp()}] [INFO]`, formatArgs(args));
  },
  warn(...args: unknown[]): void {
    if (enabled('warn')) console.warn(`[${timestamp()}] [WARN]`, formatArgs(args));
  },
  error(...args: unknown[]): void {
    if (enabled('error')) console.error(`[${timestamp()}] [ERROR]`, formatArgs(args));
  },
};
