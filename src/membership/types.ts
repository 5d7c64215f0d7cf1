import { z } from 'zod';

// ============================================================================
// SUBMISSIONS
// ============================================================================

/** Tagged signature envelope. Signed submissions are recorded, not verified. */
export const SignatureEnvelope = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('unsigned') }),
  z.object({ kind: z.literal('signed'), signature: z.string().min(1) }),
]);
export type SignatureEnvelope = z.infer<typeof SignatureEnvelope>;

export const ScoreMap = z
  .record(z.string(), z.number().finite().min(0).max(1))
  .refine(scores => Object.prototype.hasOwnProperty.call(scores, 'overall'), {
    message: 'scores must include "overall"',
  });
export type ScoreMap = z.infer<typeof ScoreMap>;

export const ScoreRecord = z.object({
  participantId: z.string().min(1),
  /** Submission time, ms since the Unix epoch, as claimed by the submitter */
  submittedAt: z.number().finite(),
  suiteVersion: z.string().min(1),
  scores: ScoreMap,
  notes: z.string().optional(),
  signature: SignatureEnvelope,
});
export type ScoreRecord = z.infer<typeof ScoreRecord>;

/**
 * Wire payload posted by a node. `node_id` is accepted as an alias of
 * `participant_id`; `timestamp` is ISO-8601.
 */
export const SubmissionPayload = z
  .object({
    participant_id: z.string().min(1).optional(),
    node_id: z.string().min(1).optional(),
    timestamp: z.string().datetime({ offset: true }),
    suite_version: z.string().min(1),
    scores: ScoreMap,
    notes: z.string().nullish(),
    /** null or absent means unsigned */
    signature: z.string().min(1).nullish(),
  })
  .transform((payload, ctx): ScoreRecord => {
    const participantId = payload.participant_id ?? payload.node_id;
    if (!participantId) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['participant_id'], message: 'participant id is required' });
      return z.NEVER;
    }
    if (payload.participant_id && payload.node_id && payload.participant_id !== payload.node_id) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['node_id'], message: 'node_id and participant_id disagree' });
      return z.NEVER;
    }
    const submittedAt = Date.parse(payload.timestamp);
    if (Number.isNaN(submittedAt)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['timestamp'], message: 'unparsable timestamp' });
      return z.NEVER;
    }
    return {
      participantId,
      submittedAt,
      suiteVersion: payload.suite_version,
      scores: payload.scores,
      notes: payload.notes ?? undefined,
      signature: payload.signature
        ? { kind: 'signed', signature: payload.signature }
        : { kind: 'unsigned' },
    };
  });
export type SubmissionPayload = z.input<typeof SubmissionPayload>;

// ============================================================================
// VERDICTS
// ============================================================================

export type MembershipStatus = 'ALLOWED' | 'DENIED';

export const VERDICT_REASONS = {
  noBenchmark: 'no benchmark submitted',
  stale: 'benchmark stale',
  belowThreshold: 'score below threshold',
  satisfied: 'score and freshness satisfied',
} as const;
export type VerdictReason = (typeof VERDICT_REASONS)[keyof typeof VERDICT_REASONS];

export interface MembershipVerdict {
  readonly participantId: string;
  readonly status: MembershipStatus;
  readonly reason: VerdictReason;
  readonly evaluatedAt: number;
  readonly epochId: number;
  /** Age of the benchmark that decided the verdict; absent when there was none */
  readonly benchmarkAgeMs?: number;
  readonly overall?: number;
}

// ============================================================================
// EPOCHS
// ============================================================================

export interface EpochState {
  readonly epochId: number;
  readonly secret: Buffer;
  readonly createdAt: number;
  readonly expiresAt: number;
}

export interface KeyMaterial {
  readonly participantId: string;
  readonly epochId: number;
  readonly key: Buffer;
}

/** The benchmark a verdict was decided on, as read at rotation time. */
export interface BenchmarkSummary {
  readonly overall: number | null;
  readonly submittedAt: number;
  readonly suiteVersion: string;
}

/** What leaves the core after each rotation. Never carries the secret. */
export interface Snapshot {
  readonly epochId: number;
  readonly createdAt: number;
  readonly expiresAt: number;
  readonly secretFingerprint: string;
  readonly verdicts: Readonly<Record<string, MembershipVerdict>>;
  /** Only for participants whose verdict used a benchmark */
  readonly benchmarks: Readonly<Record<string, BenchmarkSummary>>;
}
