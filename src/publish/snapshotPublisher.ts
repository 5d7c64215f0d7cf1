/**
 * Snapshot Publishers
 *
 * Receive the immutable snapshot produced by each rotation.
 * - MemorySnapshotPublisher: keeps the history in memory (tests, embedding hosts)
 * - FileSnapshotPublisher: writes status.json for observability
 */

import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { TransientPublishError } from '../errors.js';
import type { Snapshot } from '../membership/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SnapshotPublisher {
  publish(snapshot: Snapshot): Promise<void>;
}

export interface NodeStatus {
  membership: 'ALLOWED' | 'DENIED';
  reason: string;
  psk_valid: boolean;
  last_update_utc: string;
  last_benchmark?: {
    overall: number | null;
    timestamp: string;
    suite_version: string;
  };
}

export interface StatusDocument {
  epoch: {
    id: number;
    expiry_utc: string;
    secret_hash: string;
  };
  nodes: Record<string, NodeStatus>;
}

// ============================================================================
// STATUS DOCUMENT
// ============================================================================

export function renderStatus(snapshot: Snapshot): StatusDocument {
  const nodes: Record<string, NodeStatus> = {};
  for (const [participantId, verdict] of Object.entries(snapshot.verdicts)) {
    const status: NodeStatus = {
      membership: verdict.status,
      reason: verdict.reason,
      psk_valid: verdict.status === 'ALLOWED',
      last_update_utc: new Date(verdict.evaluatedAt).toISOString(),
    };
    const benchmark = snapshot.benchmarks[participantId];
    if (benchmark) {
      status.last_benchmark = {
        overall: benchmark.overall,
        timestamp: new Date(benchmark.submittedAt).toISOString(),
        suite_version: benchmark.suiteVersion,
      };
    }
    nodes[participantId] = status;
  }
  return {
    epoch: {
      id: snapshot.epochId,
      expiry_utc: new Date(snapshot.expiresAt).toISOString(),
      secret_hash: snapshot.secretFingerprint,
    },
    nodes,
  };
}

// ============================================================================
// IMPLEMENTATIONS
// ============================================================================

export class MemorySnapshotPublisher implements SnapshotPublisher {
  private history: Snapshot[] = [];
  private limit: number;

  constructor(limit = 100) {
    this.limit = limit;
  }

  async publish(snapshot: Snapshot): Promise<void> {
    this.history.push(snapshot);
    if (this.history.length > this.limit) this.history.shift();
  }

  latest(): Snapshot | undefined {
    return this.history[this.history.length - 1];
  }

  all(): Snapshot[] {
    return [...this.history];
  }
}

export class FileSnapshotPublisher implements SnapshotPublisher {
  private path: string;
  private queue: Promise<void> = Promise.resolve();
  private lastWrittenEpoch = 0;

  constructor(path: string) {
    this.path = path;
  }

  /**
   * Writes run one at a time in call order, and a snapshot older than the
   * last one written is skipped, so status.json never moves backwards.
   */
  publish(snapshot: Snapshot): Promise<void> {
    const write = this.queue.then(() => this.write(snapshot));
    // The caller gets the failure through `write`; the queue moves on.
    this.queue = write.catch(() => undefined);
    return write;
  }

  /** Written to a sibling temp file first, then renamed over the target. */
  private async write(snapshot: Snapshot): Promise<void> {
    if (snapshot.epochId < this.lastWrittenEpoch) return;
    const body = JSON.stringify(renderStatus(snapshot), null, 2);
    const tmpPath = `${this.path}.${snapshot.epochId}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, body + '\n', 'utf8');
      await rename(tmpPath, this.path);
      this.lastWrittenEpoch = snapshot.epochId;
    } catch (err) {
      throw new TransientPublishError(
        snapshot.epochId,
        `failed to write ${this.path}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }
}
