/**
 * Structured JSON logger for the controller.
 * One line per entry; errors go to stderr, everything else to stdout.
 *
 * Buffers in the data are written as `[redacted N bytes]`, so an epoch secret
 * or PSK passed by mistake never reaches the log. Errors are written as their
 * message.
 */

import { z } from 'zod';

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevel>;

const LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function envLevel(): LogLevel {
  const parsed = LogLevel.safeParse(process.env['LOG_LEVEL']);
  return parsed.success ? parsed.data : 'info';
}

let minLevel: LogLevel = envLevel();

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

// `this[key]` is the value before Buffer#toJSON runs
function redact(this: Record<string, unknown>, key: string, value: unknown): unknown {
  const raw = this[key];
  if (Buffer.isBuffer(raw)) return `[redacted ${raw.length} bytes]`;
  if (raw instanceof Error) return raw.message;
  return value;
}

export function log(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    component,
    msg: message,
    ...data,
  };
  const line = JSON.stringify(entry, redact);
  if (level === 'error') process.stderr.write(line + '\n');
  else process.stdout.write(line + '\n');
}

export const meshLog = {
  debug: (component: string, msg: string, data?: Record<string, unknown>) => log('debug', component, msg, data),
  info: (component: string, msg: string, data?: Record<string, unknown>) => log('info', component, msg, data),
  warn: (component: string, msg: string, data?: Record<string, unknown>) => log('warn', component, msg, data),
  error: (component: string, msg: string, data?: Record<string, unknown>) => log('error', component, msg, data),
};
