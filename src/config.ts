/**
 * Controller configuration, read once from the environment at startup.
 */

import { z } from 'zod';
import { PreconditionViolation } from './errors.js';
import { LogLevel } from './logger.js';

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform(raw => (raw === undefined || raw === '' ? fallback : Number(raw)));

export const ControllerConfig = z.object({
  threshold: numberFromEnv(0.7).pipe(z.number().min(0).max(1)),
  maxBenchmarkAgeSeconds: numberFromEnv(120).pipe(z.number().int().nonnegative()),
  // setTimeout cannot wait longer than 2^31-1 ms
  epochSeconds: numberFromEnv(60).pipe(z.number().int().min(1).max(2_147_483)),
  secretLength: numberFromEnv(32).pipe(z.number().int().min(16).max(64)),
  keyLength: numberFromEnv(32).pipe(z.number().int().min(16).max(64)),
  participants: z
    .string()
    .optional()
    .transform(raw =>
      (raw ?? 'node-a,node-b,node-c')
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0),
    ),
  statusFile: z.string().min(1).default('./artifacts/status.json'),
  port: numberFromEnv(8000).pipe(z.number().int().min(0).max(65535)),
  logLevel: LogLevel.default('info'),
});
export type ControllerConfig = z.output<typeof ControllerConfig>;

const ENV_KEYS: Record<keyof ControllerConfig, string> = {
  threshold: 'THRESHOLD',
  maxBenchmarkAgeSeconds: 'MAX_BENCHMARK_AGE',
  epochSeconds: 'EPOCH_SECONDS',
  secretLength: 'SECRET_LENGTH',
  keyLength: 'KEY_LENGTH',
  participants: 'PARTICIPANTS',
  statusFile: 'STATUS_FILE',
  port: 'PORT',
  logLevel: 'LOG_LEVEL',
};

const ENV_KEY_BY_FIELD = new Map<string, string>(Object.entries(ENV_KEYS));

/** Parse the environment. Bad values are configuration bugs, so this throws PreconditionViolation. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ControllerConfig {
  const raw: Record<string, string | undefined> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    raw[field] = env[key];
  }
  const parsed = ControllerConfig.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => {
        const field = String(issue.path[0] ?? '');
        return `${ENV_KEY_BY_FIELD.get(field) ?? field}: ${issue.message}`;
      })
      .join('; ');
    throw new PreconditionViolation(`invalid configuration: ${details}`);
  }
  return parsed.data;
}
