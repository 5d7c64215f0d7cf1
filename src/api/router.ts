/**
 * Controller API routes, independent of the HTTP transport.
 *
 *   POST /v1/benchmarks/:nodeId   submit a benchmark
 *   GET  /v1/epoch                epoch info + per-node membership
 *   GET  /v1/config/:nodeId       membership + PSK (only when ALLOWED)
 *   POST /v1/rotate               force an immediate rotation
 *   GET  /health                  liveness
 */

import { z } from 'zod';
import { RotationError, ValidationError } from '../errors.js';
import { meshLog } from '../logger.js';
import type { EpochManager } from '../epoch/manager.js';
import type { ScoreStore } from '../membership/scoreStore.js';

// ============================================================================
// TYPES
// ============================================================================

export interface RouteRequest {
  method: string;
  /** Request target; a query string is ignored */
  url: string;
  body?: unknown;
}

export interface RouteResponse {
  status: number;
  body: Record<string, unknown>;
}

export interface ApiContext {
  store: ScoreStore;
  epochs: EpochManager;
}

export interface EpochResponse {
  epoch_id: number;
  expiry_utc: string;
  secret_hash: string;
  nodes: Record<string, { membership: 'ALLOWED' | 'DENIED'; reason: string }>;
}

export interface NodeConfigResponse {
  node_id: string;
  epoch_id: number;
  allowed: boolean;
  reason: string;
  psk_base64?: string;
}

const SubmissionIds = z
  .object({
    participant_id: z.unknown().optional(),
    node_id: z.unknown().optional(),
  })
  .passthrough();

// ============================================================================
// HANDLERS
// ============================================================================

function submitBenchmark(ctx: ApiContext, nodeId: string, body: unknown): RouteResponse {
  const payload = SubmissionIds.safeParse(body);
  if (!payload.success) {
    return { status: 400, body: { error: 'request body must be a JSON object' } };
  }
  const claimed = payload.data.participant_id ?? payload.data.node_id;
  if (claimed !== undefined && claimed !== nodeId) {
    return { status: 400, body: { error: 'node_id mismatch' } };
  }

  try {
    const record = ctx.store.submit({ ...payload.data, participant_id: nodeId });
    meshLog.info('api', 'Received benchmark', {
      participantId: record.participantId,
      overall: record.scores['overall'],
      suiteVersion: record.suiteVersion,
      signed: record.signature.kind === 'signed',
    });
    return { status: 200, body: { status: 'received', node_id: nodeId, epoch_id: ctx.epochs.getEpochId() } };
  } catch (err) {
    if (err instanceof ValidationError) {
      meshLog.warn('api', 'Benchmark rejected', { participantId: nodeId, error: err.message });
      return { status: 400, body: { error: err.message, issues: err.issues } };
    }
    throw err;
  }
}

export function describeEpoch(epochs: EpochManager): EpochResponse {
  const snapshot = epochs.getSnapshot();
  const nodes: EpochResponse['nodes'] = {};
  for (const [participantId, verdict] of Object.entries(snapshot.verdicts)) {
    nodes[participantId] = { membership: verdict.status, reason: verdict.reason };
  }
  return {
    epoch_id: snapshot.epochId,
    expiry_utc: new Date(snapshot.expiresAt).toISOString(),
    secret_hash: snapshot.secretFingerprint,
    nodes,
  };
}

export function describeNodeConfig(epochs: EpochManager, nodeId: string): NodeConfigResponse {
  const verdict = epochs.getVerdict(nodeId);
  const material = epochs.getKeyMaterial(nodeId);
  const response: NodeConfigResponse = {
    node_id: nodeId,
    epoch_id: epochs.getEpochId(),
    allowed: verdict?.status === 'ALLOWED',
    reason: verdict?.reason ?? 'no membership decision',
  };
  if (material) {
    response.psk_base64 = material.key.toString('base64');
    material.key.fill(0);
  }
  return response;
}

function forceRotate(ctx: ApiContext): RouteResponse {
  try {
    const snapshot = ctx.epochs.forceRotate();
    return { status: 200, body: { status: 'rotated', epoch_id: snapshot.epochId } };
  } catch (err) {
    if (err instanceof RotationError) {
      return { status: 500, body: { error: err.message, epoch_id: ctx.epochs.getEpochId() } };
    }
    throw err;
  }
}

// ============================================================================
// ROUTER
// ============================================================================

function splitPath(url: string): string[] | null {
  const path = url.split('?')[0] ?? '';
  try {
    return path.split('/').filter(segment => segment.length > 0).map(decodeURIComponent);
  } catch {
    return null;
  }
}

export function handleRoute(ctx: ApiContext, req: RouteRequest): RouteResponse {
  const segments = splitPath(req.url);
  if (!segments) return { status: 400, body: { error: 'malformed path' } };

  const method = req.method.toUpperCase();
  const [head, resource, id, ...rest] = segments;

  if (method === 'GET' && head === 'health' && segments.length === 1) {
    return { status: 200, body: { status: 'ok', epoch_id: ctx.epochs.getEpochId() } };
  }

  if (head === 'v1' && rest.length === 0) {
    if (method === 'POST' && resource === 'benchmarks' && id) {
      return submitBenchmark(ctx, id, req.body);
    }
    if (method === 'GET' && resource === 'epoch' && !id) {
      return { status: 200, body: { ...describeEpoch(ctx.epochs) } };
    }
    if (method === 'GET' && resource === 'config' && id) {
      return { status: 200, body: { ...describeNodeConfig(ctx.epochs, id) } };
    }
    if (method === 'POST' && resource === 'rotate' && !id) {
      return forceRotate(ctx);
    }
  }

  return { status: 404, body: { error: 'not found' } };
}
