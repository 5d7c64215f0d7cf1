import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EpochManager } from '../../src/epoch/manager.js';
import { ScoreStore } from '../../src/membership/scoreStore.js';
import { ThresholdStrategy, type EvaluationContext, type MembershipStrategy } from '../../src/membership/engine.js';
import { derivePsk, secretFingerprint } from '../../src/crypto/psk.js';
import { MemorySnapshotPublisher, type SnapshotPublisher } from '../../src/publish/snapshotPublisher.js';
import { PreconditionViolation, RotationError, TransientPublishError } from '../../src/errors.js';
import { setLogLevel } from '../../src/logger.js';
import type { MembershipVerdict, ScoreRecord, Snapshot } from '../../src/membership/types.js';

// ============================================================================
// HELPERS
// ============================================================================

const T0 = Date.parse('2026-01-05T12:00:00Z');
const EPOCH_MS = 60_000;
const MAX_AGE_MS = 120_000;

function threshold(): ThresholdStrategy {
  return new ThresholdStrategy({ threshold: 0.7, maxAgeMs: MAX_AGE_MS });
}

/** Wraps the threshold strategy; fails on the listed call numbers (1 = construction). */
class FlakyStrategy implements MembershipStrategy {
  readonly name = 'flaky';
  calls = 0;
  private inner = threshold();
  private failOn: Set<number>;
  onEvaluate?: () => void;

  constructor(failOn: number[] = []) {
    this.failOn = new Set(failOn);
  }

  evaluate(records: ReadonlyMap<string, ScoreRecord>, context: EvaluationContext): Map<string, MembershipVerdict> {
    this.calls++;
    this.onEvaluate?.();
    if (this.failOn.has(this.calls)) throw new Error('evaluation exploded');
    return this.inner.evaluate(records, context);
  }
}

interface SetupOptions {
  participants?: string[];
  strategy?: MembershipStrategy;
  publisher?: SnapshotPublisher;
  secretLengths?: number[];
}

/** Secrets are Buffer.alloc(len, n) for the n-th secret, so tests can recompute them. */
function setup(opts: SetupOptions = {}) {
  const clock = { now: T0 };
  const store = new ScoreStore();
  const issued: Buffer[] = [];
  const createSecret = (length: number): Buffer => {
    const n = issued.length + 1;
    const secret = Buffer.alloc(opts.secretLengths?.[n - 1] ?? length, n);
    issued.push(secret);
    return secret;
  };
  const manager = new EpochManager(
    { epochDurationMs: EPOCH_MS, participants: opts.participants ?? [] },
    {
      store,
      strategy: opts.strategy ?? threshold(),
      publisher: opts.publisher,
      clock: () => clock.now,
      createSecret,
    },
  );
  const submit = (participantId: string, overall: number, at: number = clock.now) =>
    store.submit({
      node_id: participantId,
      timestamp: new Date(at).toISOString(),
      suite_version: 'poc-0.1',
      scores: { overall },
    });
  return { clock, store, manager, issued, submit };
}

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

// ============================================================================
// TESTS
// ============================================================================

describe('EpochManager', () => {
  let manager: EpochManager | undefined;

  afterEach(() => {
    manager?.stop();
    manager = undefined;
  });

  describe('initial epoch', () => {
    it('starts at epoch 1 with every known participant denied', () => {
      const env = setup({ participants: ['node-a', 'node-b'] });
      manager = env.manager;
      const snapshot = manager.getSnapshot();

      expect(snapshot.epochId).toBe(1);
      expect(snapshot.createdAt).toBe(T0);
      expect(snapshot.expiresAt).toBe(T0 + EPOCH_MS);
      expect(snapshot.secretFingerprint).toBe(secretFingerprint(Buffer.alloc(32, 1)));
      expect(Object.keys(snapshot.verdicts)).toEqual(['node-a', 'node-b']);
      for (const verdict of Object.values(snapshot.verdicts)) {
        expect(verdict.status).toBe('DENIED');
        expect(verdict.reason).toBe('no benchmark submitted');
        expect(verdict.epochId).toBe(1);
      }
      expect(manager.getKeyMaterial('node-a')).toBeUndefined();
    });

    it('rejects a secret source that yields the wrong length', () => {
      expect(() => setup({ secretLengths: [16] })).toThrow(PreconditionViolation);
    });

    it('rejects an epoch duration under one second', () => {
      expect(
        () => new EpochManager({ epochDurationMs: 10, participants: [] }, { store: new ScoreStore(), strategy: threshold() }),
      ).toThrow(PreconditionViolation);
    });
  });

  describe('rotation', () => {
    it('issues keys only to allowed participants', () => {
      const env = setup();
      manager = env.manager;
      env.submit('a', 0.91);
      env.submit('c', 0.4);

      env.clock.now = T0 + 60_000;
      const snapshot = manager.forceRotate();

      expect(snapshot.epochId).toBe(2);
      expect(snapshot.verdicts['a']?.status).toBe('ALLOWED');
      expect(snapshot.verdicts['a']?.reason).toBe('score and freshness satisfied');
      expect(snapshot.verdicts['c']?.status).toBe('DENIED');
      expect(snapshot.verdicts['c']?.reason).toBe('score below threshold');

      const material = manager.getKeyMaterial('a');
      expect(material?.epochId).toBe(2);
      expect(material?.key.equals(derivePsk(Buffer.alloc(32, 2), 'a'))).toBe(true);
      expect(manager.getKeyMaterial('c')).toBeUndefined();
      expect(manager.getKeyMaterial('nobody')).toBeUndefined();
    });

    it('captures the benchmarks it evaluated in the snapshot', () => {
      const env = setup({ participants: ['b'] });
      manager = env.manager;
      env.submit('a', 0.91, T0 - 5_000);

      env.clock.now = T0 + 60_000;
      const snapshot = manager.forceRotate();
      env.submit('b', 0.99);

      expect(snapshot.benchmarks).toEqual({
        a: { overall: 0.91, submittedAt: T0 - 5_000, suiteVersion: 'poc-0.1' },
      });
      expect(Object.isFrozen(snapshot.benchmarks)).toBe(true);
      expect(manager.getSnapshot().benchmarks['b']).toBeUndefined();
    });

    it('denies a participant whose benchmark went stale', () => {
      const env = setup();
      manager = env.manager;
      env.submit('b', 0.95);

      env.clock.now = T0 + 60_000;
      manager.forceRotate();
      expect(manager.getVerdict('b')?.status).toBe('ALLOWED');

      env.clock.now = T0 + 185_000;
      manager.forceRotate();
      expect(manager.getVerdict('b')?.status).toBe('DENIED');
      expect(manager.getVerdict('b')?.reason).toBe('benchmark stale');
      expect(manager.getKeyMaterial('b')).toBeUndefined();
    });

    it('advances by exactly one per forced rotation with a fresh secret each time', () => {
      manager = new EpochManager({ epochDurationMs: EPOCH_MS, participants: ['node-a'] }, {
        store: new ScoreStore(),
        strategy: threshold(),
      });
      const first = manager.forceRotate();
      const second = manager.forceRotate();

      expect(first.epochId).toBe(2);
      expect(second.epochId).toBe(3);
      expect(second.secretFingerprint).not.toBe(first.secretFingerprint);
    });

    it('tick rotates only once the epoch has expired', () => {
      const env = setup();
      manager = env.manager;

      env.clock.now = T0 + EPOCH_MS - 1;
      expect(manager.tick()).toBe(T0 + EPOCH_MS);
      expect(manager.getEpochId()).toBe(1);

      env.clock.now = T0 + EPOCH_MS;
      expect(manager.tick()).toBe(T0 + 2 * EPOCH_MS);
      expect(manager.getEpochId()).toBe(2);
    });

    it('epoch ids never skip or repeat across manual and scheduled rotations', () => {
      const env = setup();
      manager = env.manager;
      const seen: number[] = [];
      manager.on('epoch:rotated', snapshot => seen.push(snapshot.epochId));

      manager.forceRotate();
      env.clock.now = T0 + EPOCH_MS;
      manager.tick();
      manager.forceRotate();
      env.clock.now = T0 + 3 * EPOCH_MS;
      manager.tick();

      expect(seen).toEqual([2, 3, 4, 5]);
    });

    it('zeroes the replaced secret', () => {
      const env = setup();
      manager = env.manager;
      manager.forceRotate();

      expect(env.issued[0]?.every(byte => byte === 0)).toBe(true);
      expect(env.issued[1]?.every(byte => byte === 2)).toBe(true);
    });

    it('hands out key copies that survive the next rotation', () => {
      const env = setup();
      manager = env.manager;
      env.submit('a', 0.9);
      manager.forceRotate();
      const material = manager.getKeyMaterial('a');

      manager.forceRotate();
      expect(material?.key.equals(derivePsk(Buffer.alloc(32, 2), 'a'))).toBe(true);
      expect(manager.getKeyMaterial('a')?.key.equals(derivePsk(Buffer.alloc(32, 3), 'a'))).toBe(true);
    });

    it('publishes frozen snapshots', () => {
      const env = setup({ participants: ['node-a'] });
      manager = env.manager;
      const snapshot = manager.forceRotate();

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.verdicts)).toBe(true);
      expect(Object.isFrozen(snapshot.verdicts['node-a'])).toBe(true);
    });

    it('can restrict evaluation to configured participants', () => {
      const store = new ScoreStore();
      store.submit({ node_id: 'stranger', timestamp: new Date(T0).toISOString(), suite_version: 'v', scores: { overall: 1 } });
      manager = new EpochManager(
        { epochDurationMs: EPOCH_MS, participants: ['node-a'], includeSubmitters: false },
        { store, strategy: threshold(), clock: () => T0 },
      );
      expect(Object.keys(manager.getSnapshot().verdicts)).toEqual(['node-a']);
      expect(manager.getVerdict('stranger')).toBeUndefined();
    });
  });

  describe('atomicity', () => {
    it('readers during a rotation see the whole previous epoch', () => {
      const strategy = new FlakyStrategy();
      const env = setup({ participants: ['node-a'], strategy });
      manager = env.manager;
      const live = manager;
      const observed: Array<{ epochId: number; verdictEpochs: number[]; fingerprint: string }> = [];
      strategy.onEvaluate = () => {
        const snapshot = live.getSnapshot();
        observed.push({
          epochId: live.getEpochId(),
          verdictEpochs: Object.values(snapshot.verdicts).map(v => v.epochId),
          fingerprint: live.getSecretFingerprint(),
        });
      };

      manager.forceRotate();

      expect(observed).toEqual([
        { epochId: 1, verdictEpochs: [1], fingerprint: secretFingerprint(Buffer.alloc(32, 1)) },
      ]);
      expect(manager.getEpochId()).toBe(2);
    });

    it('a failed rotation leaves the previous epoch fully in effect', () => {
      const strategy = new FlakyStrategy([2]);
      const env = setup({ strategy });
      manager = env.manager;
      env.submit('a', 0.9);
      const before = manager.getSnapshot();
      const failures: RotationError[] = [];
      manager.on('rotation:failed', err => failures.push(err));

      expect(() => manager?.forceRotate()).toThrow('rotation to epoch 2 aborted: evaluation exploded');

      expect(manager.getSnapshot()).toBe(before);
      expect(manager.getEpochId()).toBe(1);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(RotationError);
      // the discarded candidate secret is wiped, the live one is untouched
      expect(env.issued[1]?.every(byte => byte === 0)).toBe(true);
      expect(env.issued[0]?.every(byte => byte === 1)).toBe(true);

      expect(manager.forceRotate().epochId).toBe(2);
    });

    it('rejects verdicts stamped with another epoch', () => {
      const stale: MembershipStrategy = {
        name: 'stale',
        evaluate: (_records, context) => {
          const verdicts = new Map<string, MembershipVerdict>();
          for (const id of context.knownIds) {
            verdicts.set(id, { participantId: id, status: 'ALLOWED', reason: 'score and freshness satisfied', evaluatedAt: context.now, epochId: 1 });
          }
          return verdicts;
        },
      };
      const env = setup({ participants: ['node-a'], strategy: stale });
      manager = env.manager;

      expect(() => manager?.forceRotate()).toThrow(RotationError);
      expect(manager.getEpochId()).toBe(1);
    });

    it('treats a bad secret during rotation as fatal and keeps the live epoch', () => {
      const env = setup({ secretLengths: [32, 8] });
      manager = env.manager;
      const fatal = vi.fn();
      manager.on('fatal', fatal);

      expect(() => manager?.forceRotate()).toThrow(PreconditionViolation);
      expect(fatal).toHaveBeenCalledOnce();
      expect(manager.getEpochId()).toBe(1);
    });
  });

  describe('publishing', () => {
    it('publishes the initial snapshot on start and each rotation after', async () => {
      const publisher = new MemorySnapshotPublisher();
      const env = setup({ publisher });
      manager = env.manager;

      manager.start();
      manager.forceRotate();
      await flush();

      expect(publisher.all().map(s => s.epochId)).toEqual([1, 2]);
      expect(publisher.latest()).toBe(manager.getSnapshot());
    });

    it('reports publish failures without undoing the rotation', async () => {
      const publisher: SnapshotPublisher = {
        publish: async () => {
          throw new Error('disk full');
        },
      };
      const env = setup({ publisher });
      manager = env.manager;
      const failures: TransientPublishError[] = [];
      manager.on('publish:failed', err => failures.push(err));

      manager.forceRotate();
      await flush();

      expect(manager.getEpochId()).toBe(2);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(TransientPublishError);
      expect(failures[0]?.epochId).toBe(2);
      expect(failures[0]?.message).toBe('disk full');
    });

    it('survives a publisher that throws synchronously', async () => {
      const publisher: SnapshotPublisher = {
        publish(): Promise<void> {
          throw new Error('boom');
        },
      };
      const env = setup({ publisher });
      manager = env.manager;
      const failed = vi.fn();
      manager.on('publish:failed', failed);

      expect(manager.forceRotate().epochId).toBe(2);
      await flush();
      expect(failed).toHaveBeenCalledOnce();
    });

    it('never waits on a slow publisher', () => {
      const publisher: SnapshotPublisher = { publish: () => new Promise<void>(() => {}) };
      const env = setup({ publisher });
      manager = env.manager;

      manager.forceRotate();
      manager.forceRotate();
      expect(manager.getEpochId()).toBe(3);
    });
  });

  describe('secret confidentiality', () => {
    it('never exposes the secret in snapshots, verdicts, key material or logs', async () => {
      const output: string[] = [];
      const capture = (chunk: string | Uint8Array): boolean => {
        output.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'));
        return true;
      };
      vi.spyOn(process.stdout, 'write').mockImplementation(capture);
      vi.spyOn(process.stderr, 'write').mockImplementation(capture);
      setLogLevel('info');

      const published: Snapshot[] = [];
      const publisher: SnapshotPublisher = { publish: async snapshot => { published.push(snapshot); } };
      const env = setup({ participants: ['a', 'c'], publisher });
      manager = env.manager;
      env.submit('a', 0.9);
      env.submit('c', 0.2);
      manager.forceRotate();
      await flush();

      const secret = Buffer.alloc(32, 2);
      const forms = [secret.toString('hex'), secret.toString('base64')];
      const exposed = [
        JSON.stringify(manager.getSnapshot()),
        JSON.stringify(published),
        JSON.stringify(manager.getVerdict('a')),
        JSON.stringify({ ...manager.getKeyMaterial('a'), key: manager.getKeyMaterial('a')?.key.toString('hex') }),
        output.join(''),
      ];
      for (const text of exposed) {
        for (const form of forms) {
          expect(text).not.toContain(form);
        }
      }
      expect(output.join('')).toContain(secretFingerprint(secret));
    });
  });
});

describe('EpochManager scheduling', () => {
  let manager: EpochManager | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    manager?.stop();
    manager = undefined;
    vi.useRealTimers();
  });

  function create(strategy: MembershipStrategy = threshold(), store = new ScoreStore()): EpochManager {
    return new EpochManager({ epochDurationMs: EPOCH_MS, participants: ['node-a'] }, { store, strategy });
  }

  it('rotates every epoch duration once started', () => {
    manager = create();
    manager.start();
    expect(manager.getNextRotationAt()).toBe(T0 + EPOCH_MS);

    vi.advanceTimersByTime(EPOCH_MS - 1);
    expect(manager.getEpochId()).toBe(1);
    vi.advanceTimersByTime(1);
    expect(manager.getEpochId()).toBe(2);
    vi.advanceTimersByTime(EPOCH_MS);
    expect(manager.getEpochId()).toBe(3);
  });

  it('re-evaluates freshness on each scheduled rotation', () => {
    const store = new ScoreStore();
    store.submit({ node_id: 'node-b', timestamp: new Date(T0).toISOString(), suite_version: 'poc-0.1', scores: { overall: 0.95 } });
    manager = create(threshold(), store);
    manager.start();

    vi.advanceTimersByTime(EPOCH_MS);
    expect(manager.getVerdict('node-b')?.status).toBe('ALLOWED');
    vi.advanceTimersByTime(EPOCH_MS);
    expect(manager.getVerdict('node-b')?.status).toBe('ALLOWED');
    vi.advanceTimersByTime(EPOCH_MS);
    expect(manager.getVerdict('node-b')?.reason).toBe('benchmark stale');
  });

  it('moves the schedule after a forced rotation', () => {
    manager = create();
    manager.start();

    vi.advanceTimersByTime(30_000);
    manager.forceRotate();
    expect(manager.getEpochId()).toBe(2);
    expect(manager.getNextRotationAt()).toBe(T0 + 30_000 + EPOCH_MS);

    vi.advanceTimersByTime(EPOCH_MS - 1);
    expect(manager.getEpochId()).toBe(2);
    vi.advanceTimersByTime(1);
    expect(manager.getEpochId()).toBe(3);
  });

  it('retries a failed scheduled rotation with backoff', () => {
    manager = create(new FlakyStrategy([2]));
    const failed = vi.fn();
    manager.on('rotation:failed', failed);
    manager.start();

    vi.advanceTimersByTime(EPOCH_MS);
    expect(manager.getEpochId()).toBe(1);
    expect(failed).toHaveBeenCalledOnce();
    expect(failed.mock.calls[0][1]).toBe('scheduled');

    vi.advanceTimersByTime(2000);
    expect(manager.getEpochId()).toBe(2);
    expect(manager.getExpiresAt()).toBe(T0 + EPOCH_MS + 2000 + EPOCH_MS);
  });

  it('stops rotating after stop()', () => {
    manager = create();
    manager.start();
    manager.stop();
    expect(manager.isRunning()).toBe(false);

    vi.advanceTimersByTime(5 * EPOCH_MS);
    expect(manager.getEpochId()).toBe(1);
  });
});
