/**
 * Score Store
 *
 * Holds the latest benchmark submission per participant. A new submission
 * replaces the previous one wholesale, in arrival order (the embedded
 * timestamp is not consulted, so a node with a lagging clock can still
 * overwrite a fresher record).
 */

import { EventEmitter } from 'eventemitter3';
import { ValidationError } from '../errors.js';
import { ScoreRecord, SubmissionPayload } from './types.js';

export interface ScoreStoreEvents {
  'score:submitted': (record: ScoreRecord) => void;
  'score:rejected': (error: ValidationError) => void;
}

function freezeRecord(record: ScoreRecord): ScoreRecord {
  return Object.freeze({
    ...record,
    scores: Object.freeze({ ...record.scores }),
    signature: Object.freeze({ ...record.signature }),
  });
}

export class ScoreStore extends EventEmitter<ScoreStoreEvents> {
  private records = new Map<string, ScoreRecord>();

  /** Validate a wire payload and store it. Throws ValidationError without touching state. */
  submit(payload: unknown): ScoreRecord {
    const parsed = SubmissionPayload.safeParse(payload);
    if (!parsed.success) {
      const error = ValidationError.fromZod('invalid benchmark submission', parsed.error);
      this.emit('score:rejected', error);
      throw error;
    }
    return this.put(parsed.data);
  }

  /** Store an already-structured record (re-validated). */
  put(record: ScoreRecord): ScoreRecord {
    const parsed = ScoreRecord.safeParse(record);
    if (!parsed.success) {
      const error = ValidationError.fromZod('invalid score record', parsed.error);
      this.emit('score:rejected', error);
      throw error;
    }
    const frozen = freezeRecord(parsed.data);
    this.records.set(frozen.participantId, frozen);
    this.emit('score:submitted', frozen);
    return frozen;
  }

  get(participantId: string): ScoreRecord | undefined {
    return this.records.get(participantId);
  }

  /** Point-in-time copy; later submissions do not show through it. */
  snapshotAll(): ReadonlyMap<string, ScoreRecord> {
    return new Map(this.records);
  }

  participantIds(): string[] {
    return Array.from(this.records.keys());
  }

  get size(): number {
    return this.records.size;
  }
}
