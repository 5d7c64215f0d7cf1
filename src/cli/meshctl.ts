#!/usr/bin/env node
/**
 * meshctl: operator CLI for a running controller.
 *
 * Usage:
 *   meshctl status           current epoch and verdicts
 *   meshctl config <nodeId>  one node's membership and whether a PSK is issued
 *   meshctl rotate           force a rotation
 *
 * MESHGATE_URL selects the controller (default http://localhost:8000).
 */

import 'dotenv/config';
import chalk from 'chalk';
import {
  EpochView,
  NodeConfigView,
  RotateView,
  formatEpoch,
  formatNodeConfig,
  formatRotate,
} from './format.js';

const DEFAULT_URL = 'http://localhost:8000';
const REQUEST_TIMEOUT_MS = 5000;

async function request<T>(
  baseUrl: string,
  method: 'GET' | 'POST',
  path: string,
  schema: { parse(data: unknown): T },
): Promise<T> {
  const res = await fetch(new URL(path, baseUrl), {
    method,
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });
  const body: unknown = await res.json();
  if (!res.ok) {
    throw new Error(`${method} ${path} failed: ${res.status} ${JSON.stringify(body)}`);
  }
  return schema.parse(body);
}

function usage(): string {
  return [
    'Usage:',
    '  meshctl status',
    '  meshctl config <nodeId>',
    '  meshctl rotate',
  ].join('\n');
}

async function main(): Promise<void> {
  const baseUrl = process.env['MESHGATE_URL'] || DEFAULT_URL;
  const [command, arg] = process.argv.slice(2);

  switch (command) {
    case 'status': {
      const view = await request(baseUrl, 'GET', '/v1/epoch', EpochView);
      console.log(formatEpoch(view));
      return;
    }
    case 'config': {
      if (!arg) {
        console.error(usage());
        process.exit(2);
      }
      const view = await request(baseUrl, 'GET', `/v1/config/${encodeURIComponent(arg)}`, NodeConfigView);
      console.log(formatNodeConfig(view));
      return;
    }
    case 'rotate': {
      const view = await request(baseUrl, 'POST', '/v1/rotate', RotateView);
      console.log(formatRotate(view));
      return;
    }
    default:
      console.error(usage());
      process.exit(2);
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exit(1);
});
