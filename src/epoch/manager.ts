/**
 * Epoch Manager
 *
 * Owns the rotation clock, the live epoch secret and the verdict set.
 * Each rotation:
 *   new secret -> epochId + 1 -> read scores -> evaluate -> derive PSKs
 *   -> build snapshot -> swap -> hand snapshot to the publisher
 *
 * Everything up to the swap is built off to the side; readers only ever see a
 * whole CommittedEpoch. The swap is one assignment and nothing between the
 * score read and the swap awaits, so no reader can see a half-rotated epoch.
 */

import { EventEmitter } from 'eventemitter3';
import {
  DEFAULT_KEY_LENGTH,
  DEFAULT_SECRET_LENGTH,
  createSecret,
  derivePsk,
  secretFingerprint,
} from '../crypto/psk.js';
import { PreconditionViolation, RotationError, TransientPublishError } from '../errors.js';
import { meshLog } from '../logger.js';
import type { MembershipStrategy } from '../membership/engine.js';
import type { ScoreStore } from '../membership/scoreStore.js';
import {
  VERDICT_REASONS,
  type BenchmarkSummary,
  type EpochState,
  type KeyMaterial,
  type MembershipVerdict,
  type Snapshot,
} from '../membership/types.js';
import type { SnapshotPublisher } from '../publish/snapshotPublisher.js';
import { RotationScheduler } from './scheduler.js';

// ============================================================================
// TYPES
// ============================================================================

export type RotationTrigger = 'initial' | 'scheduled' | 'manual';

export interface EpochManagerConfig {
  epochDurationMs: number;
  /** Participants evaluated every epoch, whether or not they have submitted */
  participants: string[];
  /** Also evaluate anyone who has submitted a score. Default: true */
  includeSubmitters?: boolean;
  secretLength?: number;
  keyLength?: number;
}

export interface EpochManagerDeps {
  store: ScoreStore;
  strategy: MembershipStrategy;
  publisher?: SnapshotPublisher;
  clock?: () => number;
  /** Source of fresh epoch secrets. Default: CSPRNG */
  createSecret?: (length: number) => Buffer;
}

export interface EpochManagerEvents {
  'epoch:rotated': (snapshot: Snapshot, trigger: RotationTrigger) => void;
  'rotation:failed': (error: RotationError, trigger: RotationTrigger) => void;
  'publish:failed': (error: TransientPublishError) => void;
  fatal: (error: PreconditionViolation) => void;
}

interface CommittedEpoch {
  state: EpochState;
  snapshot: Snapshot;
  verdicts: ReadonlyMap<string, MembershipVerdict>;
  keys: ReadonlyMap<string, KeyMaterial>;
}

const MIN_EPOCH_DURATION_MS = 1000;

// ============================================================================
// EPOCH MANAGER
// ============================================================================

export class EpochManager extends EventEmitter<EpochManagerEvents> {
  private config: Required<EpochManagerConfig>;
  private store: ScoreStore;
  private strategy: MembershipStrategy;
  private publisher?: SnapshotPublisher;
  private clock: () => number;
  private secretSource: (length: number) => Buffer;
  private committed: CommittedEpoch;
  private scheduler?: RotationScheduler;
  private initialPublished = false;

  constructor(config: EpochManagerConfig, deps: EpochManagerDeps) {
    super();
    this.config = {
      epochDurationMs: config.epochDurationMs,
      participants: [...config.participants],
      includeSubmitters: config.includeSubmitters ?? true,
      secretLength: config.secretLength ?? DEFAULT_SECRET_LENGTH,
      keyLength: config.keyLength ?? DEFAULT_KEY_LENGTH,
    };
    if (!Number.isFinite(this.config.epochDurationMs) || this.config.epochDurationMs < MIN_EPOCH_DURATION_MS) {
      throw new PreconditionViolation(
        `epoch duration must be at least ${MIN_EPOCH_DURATION_MS}ms, got ${this.config.epochDurationMs}`,
      );
    }
    this.store = deps.store;
    this.strategy = deps.strategy;
    this.publisher = deps.publisher;
    this.clock = deps.clock ?? (() => Date.now());
    this.secretSource = deps.createSecret ?? createSecret;

    this.committed = this.initialEpoch();
    this.logRotation(this.committed, 'initial');
  }

  private initialEpoch(): CommittedEpoch {
    const secret = this.secretSource(this.config.secretLength);
    try {
      return this.buildEpoch(1, secret, this.clock());
    } catch (err) {
      secret.fill(0);
      throw err;
    }
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /** Publish the initial snapshot and arm the rotation timer. */
  start(): void {
    if (this.scheduler) return;
    if (!this.initialPublished) {
      this.initialPublished = true;
      this.publish(this.committed.snapshot);
    }
    this.scheduler = new RotationScheduler({
      tick: () => this.tick(),
      maxBackoffMs: this.config.epochDurationMs,
      clock: this.clock,
    });
    this.scheduler.on('tick:failed', info => {
      meshLog.warn('epoch', 'Scheduled rotation failed, retrying', info);
    });
    this.scheduler.start(this.committed.state.expiresAt);
    meshLog.info('epoch', 'Rotation scheduler started', {
      epochId: this.committed.state.epochId,
      epochSeconds: this.config.epochDurationMs / 1000,
    });
  }

  /**
   * Stop the rotation timer. Rotation runs synchronously, so there is never a
   * half-finished rotation to abandon.
   */
  stop(): void {
    this.scheduler?.stop();
    this.scheduler = undefined;
  }

  isRunning(): boolean {
    return this.scheduler !== undefined;
  }

  // ==========================================================================
  // ROTATION
  // ==========================================================================

  /** Rotate if the live epoch has expired. Returns when the next check is due. */
  tick(): number {
    if (this.clock() >= this.committed.state.expiresAt) {
      this.rotate('scheduled');
    }
    return this.committed.state.expiresAt;
  }

  /**
   * Rotate now, ahead of schedule. The next scheduled rotation moves to one
   * epoch duration after this one.
   */
  forceRotate(): Snapshot {
    meshLog.warn('epoch', 'Forced rotation triggered', { epochId: this.committed.state.epochId });
    const snapshot = this.rotate('manual');
    this.scheduler?.rearm(this.committed.state.expiresAt);
    return snapshot;
  }

  private rotate(trigger: RotationTrigger): Snapshot {
    const previous = this.committed;
    const epochId = previous.state.epochId + 1;

    let next: CommittedEpoch;
    let secret: Buffer | undefined;
    try {
      secret = this.secretSource(this.config.secretLength);
      next = this.buildEpoch(epochId, secret, this.clock());
    } catch (err) {
      secret?.fill(0);
      if (err instanceof PreconditionViolation) {
        meshLog.error('epoch', 'Precondition violated during rotation', { epochId, error: err.message });
        this.stop();
        this.emit('fatal', err);
        throw err;
      }
      const error = new RotationError(epochId, { cause: err });
      meshLog.error('epoch', 'Rotation aborted, previous epoch still live', {
        epochId: previous.state.epochId,
        trigger,
        error: error.message,
      });
      this.emit('rotation:failed', error, trigger);
      throw error;
    }

    this.committed = next;
    discard(previous);

    this.logRotation(next, trigger);
    this.emit('epoch:rotated', next.snapshot, trigger);
    this.publish(next.snapshot);
    return next.snapshot;
  }

  private buildEpoch(epochId: number, secret: Buffer, now: number): CommittedEpoch {
    if (secret.length !== this.config.secretLength) {
      throw new PreconditionViolation(
        `epoch secret must be ${this.config.secretLength} bytes, got ${secret.length}`,
      );
    }

    const records = this.store.snapshotAll();
    const knownIds = new Set(this.config.participants);
    if (this.config.includeSubmitters) {
      for (const id of [...records.keys()].sort()) knownIds.add(id);
    }

    const evaluated = this.strategy.evaluate(records, { knownIds, now, epochId });
    const verdicts = new Map<string, MembershipVerdict>();
    const benchmarks: Record<string, BenchmarkSummary> = {};
    const keys = new Map<string, KeyMaterial>();

    try {
      for (const [participantId, verdict] of evaluated) {
        if (verdict.epochId !== epochId || verdict.participantId !== participantId) {
          throw new Error(`strategy "${this.strategy.name}" returned a mismatched verdict for ${participantId}`);
        }
        verdicts.set(participantId, Object.freeze({ ...verdict }));
        const record = records.get(participantId);
        if (record && verdict.reason !== VERDICT_REASONS.noBenchmark) {
          benchmarks[participantId] = Object.freeze({
            overall: record.scores['overall'] ?? null,
            submittedAt: record.submittedAt,
            suiteVersion: record.suiteVersion,
          });
        }
        if (verdict.status === 'ALLOWED') {
          const key = derivePsk(secret, participantId, {
            keyLength: this.config.keyLength,
            secretLength: this.config.secretLength,
          });
          keys.set(participantId, Object.freeze({ participantId, epochId, key }));
        }
      }
    } catch (err) {
      for (const material of keys.values()) material.key.fill(0);
      throw err;
    }

    const state: EpochState = Object.freeze({
      epochId,
      secret,
      createdAt: now,
      expiresAt: now + this.config.epochDurationMs,
    });
    const snapshot: Snapshot = Object.freeze({
      epochId,
      createdAt: state.createdAt,
      expiresAt: state.expiresAt,
      secretFingerprint: secretFingerprint(secret),
      verdicts: Object.freeze(Object.fromEntries(verdicts)),
      benchmarks: Object.freeze(benchmarks),
    });
    return { state, snapshot, verdicts, keys };
  }

  private publish(snapshot: Snapshot): void {
    const publisher = this.publisher;
    if (!publisher) return;
    void Promise.resolve()
      .then(() => publisher.publish(snapshot))
      .catch((err: unknown) => {
        const error = err instanceof TransientPublishError
          ? err
          : new TransientPublishError(snapshot.epochId, err instanceof Error ? err.message : String(err), { cause: err });
        meshLog.warn('publish', 'Snapshot publish failed', { epochId: snapshot.epochId, error: error.message });
        this.emit('publish:failed', error);
      });
  }

  private logRotation(epoch: CommittedEpoch, trigger: RotationTrigger): void {
    let allowed = 0;
    for (const verdict of epoch.verdicts.values()) {
      if (verdict.status === 'ALLOWED') allowed++;
      meshLog.info('membership', 'Verdict', {
        epochId: verdict.epochId,
        participantId: verdict.participantId,
        membership: verdict.status,
        reason: verdict.reason,
      });
    }
    meshLog.info('epoch', trigger === 'initial' ? 'Epoch initialized' : 'Epoch rotated', {
      epochId: epoch.state.epochId,
      trigger,
      expiry: new Date(epoch.state.expiresAt).toISOString(),
      secretHash: epoch.snapshot.secretFingerprint,
      allowed,
      denied: epoch.verdicts.size - allowed,
    });
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  getSnapshot(): Snapshot {
    return this.committed.snapshot;
  }

  getEpochId(): number {
    return this.committed.state.epochId;
  }

  getExpiresAt(): number {
    return this.committed.state.expiresAt;
  }

  getSecretFingerprint(): string {
    return this.committed.snapshot.secretFingerprint;
  }

  getVerdict(participantId: string): MembershipVerdict | undefined {
    return this.committed.verdicts.get(participantId);
  }

  /** A copy of the participant's PSK; undefined when DENIED or unknown. */
  getKeyMaterial(participantId: string): KeyMaterial | undefined {
    const material = this.committed.keys.get(participantId);
    if (!material) return undefined;
    return { participantId: material.participantId, epochId: material.epochId, key: Buffer.from(material.key) };
  }

  getNextRotationAt(): number | undefined {
    return this.scheduler?.getNextRunAt();
  }
}

/** Zero the replaced secret and keys so nothing can read them again. */
function discard(epoch: CommittedEpoch): void {
  epoch.state.secret.fill(0);
  for (const material of epoch.keys.values()) material.key.fill(0);
}
