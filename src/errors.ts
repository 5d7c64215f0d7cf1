/**
 * Error taxonomy for the controller.
 *
 * - ValidationError: a submission was malformed; nothing changed.
 * - PreconditionViolation: a configuration bug (bad secret or key length). Fatal.
 * - TransientPublishError: the snapshot publisher failed; the epoch stays committed.
 * - RotationError: a rotation aborted before commit; the prior epoch is still live.
 */

import type { ZodError } from 'zod';

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZod(message: string, error: ZodError): ValidationError {
    const issues = error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return new ValidationError(message, issues);
  }
}

export class PreconditionViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionViolation';
  }
}

export class TransientPublishError extends Error {
  readonly epochId: number;

  constructor(epochId: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientPublishError';
    this.epochId = epochId;
  }
}

export class RotationError extends Error {
  readonly attemptedEpochId: number;

  constructor(attemptedEpochId: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`rotation to epoch ${attemptedEpochId} aborted: ${reason}`, options);
    this.name = 'RotationError';
    this.attemptedEpochId = attemptedEpochId;
  }
}
