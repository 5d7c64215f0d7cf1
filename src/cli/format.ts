import chalk, { type ChalkInstance } from 'chalk';
import { z } from 'zod';

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const Membership = z.enum(['ALLOWED', 'DENIED']);

export const EpochView = z.object({
  epoch_id: z.number().int(),
  expiry_utc: z.string(),
  secret_hash: z.string(),
  nodes: z.record(z.string(), z.object({ membership: Membership, reason: z.string() })),
});
export type EpochView = z.infer<typeof EpochView>;

export const NodeConfigView = z.object({
  node_id: z.string(),
  epoch_id: z.number().int(),
  allowed: z.boolean(),
  reason: z.string(),
  psk_base64: z.string().optional(),
});
export type NodeConfigView = z.infer<typeof NodeConfigView>;

export const RotateView = z.object({ status: z.literal('rotated'), epoch_id: z.number().int() });
export type RotateView = z.infer<typeof RotateView>;

// ============================================================================
// FORMATTERS
// ============================================================================

function badge(c: ChalkInstance, membership: 'ALLOWED' | 'DENIED'): string {
  return membership === 'ALLOWED' ? c.green(membership) : c.red(membership);
}

export function formatEpoch(view: EpochView, c: ChalkInstance = chalk): string {
  const ids = Object.keys(view.nodes).sort();
  const width = Math.max(4, ...ids.map(id => id.length));
  const lines = [
    c.bold(`Epoch ${view.epoch_id}`) + c.dim(` (expires ${view.expiry_utc})`),
    `  secret ${view.secret_hash}`,
  ];
  if (ids.length === 0) {
    lines.push(c.dim('  no participants'));
  }
  for (const id of ids) {
    const node = view.nodes[id];
    if (!node) continue;
    lines.push(`  ${id.padEnd(width)}  ${badge(c, node.membership)}  ${c.dim(node.reason)}`);
  }
  return lines.join('\n');
}

/** The PSK itself is never printed; only whether one was issued. */
export function formatNodeConfig(view: NodeConfigView, c: ChalkInstance = chalk): string {
  const membership = view.allowed ? 'ALLOWED' : 'DENIED';
  const psk = view.psk_base64 ? c.green('issued') : c.dim('none');
  return [
    `${c.bold(view.node_id)} epoch=${view.epoch_id} ${badge(c, membership)}`,
    `  reason ${view.reason}`,
    `  psk    ${psk}`,
  ].join('\n');
}

export function formatRotate(view: RotateView, c: ChalkInstance = chalk): string {
  return c.yellow(`rotated -> epoch ${view.epoch_id}`);
}
