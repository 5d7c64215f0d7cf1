/**
 * Membership Engine
 *
 * Turns the latest score records into one verdict per known participant.
 * Rules, checked in order:
 * 1. No record                      -> DENIED "no benchmark submitted"
 * 2. now - submittedAt > maxAge     -> DENIED "benchmark stale"
 * 3. scores.overall < threshold     -> DENIED "score below threshold"
 * 4. otherwise                      -> ALLOWED
 *
 * A record dated in the future (negative age) counts as fresh.
 */

import { PreconditionViolation } from '../errors.js';
import { meshLog } from '../logger.js';
import {
  ScoreRecord,
  VERDICT_REASONS,
  type MembershipVerdict,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EvaluationContext {
  knownIds: Iterable<string>;
  now: number;
  epochId: number;
}

/** Any policy the epoch manager can delegate verdicts to. */
export interface MembershipStrategy {
  readonly name: string;
  evaluate(records: ReadonlyMap<string, ScoreRecord>, context: EvaluationContext): Map<string, MembershipVerdict>;
}

export interface ThresholdPolicy {
  /** Minimum `overall` score, inclusive */
  threshold: number;
  /** Maximum benchmark age, inclusive */
  maxAgeMs: number;
}

export interface EvaluationInput extends EvaluationContext, ThresholdPolicy {
  records: ReadonlyMap<string, ScoreRecord>;
}

// ============================================================================
// EVALUATION
// ============================================================================

function wellFormed(participantId: string, record: ScoreRecord): ScoreRecord | undefined {
  const parsed = ScoreRecord.safeParse(record);
  if (!parsed.success || parsed.data.participantId !== participantId) {
    meshLog.warn('membership', 'Ignoring malformed score record', { participantId });
    return undefined;
  }
  return parsed.data;
}

function evaluateOne(
  participantId: string,
  candidate: ScoreRecord | undefined,
  input: EvaluationInput,
): MembershipVerdict {
  const base = { participantId, evaluatedAt: input.now, epochId: input.epochId };
  const record = candidate ? wellFormed(participantId, candidate) : undefined;

  if (!record) {
    return { ...base, status: 'DENIED', reason: VERDICT_REASONS.noBenchmark };
  }

  const age = input.now - record.submittedAt;
  const benchmarkAgeMs = Math.max(0, age);
  const overall = record.scores['overall'];

  if (age > input.maxAgeMs) {
    return { ...base, status: 'DENIED', reason: VERDICT_REASONS.stale, benchmarkAgeMs, overall };
  }
  if (overall === undefined || overall < input.threshold) {
    return { ...base, status: 'DENIED', reason: VERDICT_REASONS.belowThreshold, benchmarkAgeMs, overall };
  }
  return { ...base, status: 'ALLOWED', reason: VERDICT_REASONS.satisfied, benchmarkAgeMs, overall };
}

/** Pure: the same input always yields the same verdicts. */
export function evaluateMembership(input: EvaluationInput): Map<string, MembershipVerdict> {
  const verdicts = new Map<string, MembershipVerdict>();
  for (const participantId of input.knownIds) {
    if (verdicts.has(participantId)) continue;
    verdicts.set(participantId, evaluateOne(participantId, input.records.get(participantId), input));
  }
  return verdicts;
}

// ============================================================================
// STRATEGIES
// ============================================================================

export class ThresholdStrategy implements MembershipStrategy {
  readonly name = 'threshold';
  private policy: ThresholdPolicy;

  constructor(policy: ThresholdPolicy) {
    if (!Number.isFinite(policy.threshold) || policy.threshold < 0 || policy.threshold > 1) {
      throw new PreconditionViolation(`threshold must be within [0, 1], got ${policy.threshold}`);
    }
    if (!Number.isFinite(policy.maxAgeMs) || policy.maxAgeMs < 0) {
      throw new PreconditionViolation(`maxAgeMs must be a non-negative number, got ${policy.maxAgeMs}`);
    }
    this.policy = { ...policy };
  }

  evaluate(records: ReadonlyMap<string, ScoreRecord>, context: EvaluationContext): Map<string, MembershipVerdict> {
    return evaluateMembership({ ...context, ...this.policy, records });
  }
}
