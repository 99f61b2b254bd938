/**
 * Job records and their lifecycle.
 *
 *   PENDING ──▶ RUNNING ──▶ COMPLETED
 *      │           │
 *      └───────────┴──────▶ FAILED
 *
 * Status never moves backwards. COMPLETED and FAILED are terminal.
 */

import { compareStrings } from "../audit/canonical.js";
import { IllegalTransitionError, type JobError } from "../errors.js";
import type { SealedAuditPackage } from "../package/types.js";

export type JobStatus = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED";

export interface JobRecord {
  id: string;
  ownerId: string;
  agentVersion: string;
  status: JobStatus;
  submittedAt: string;
  startedAt: string | null;
  completedAt: string | null;
  error: JobError | null;
  /** Frozen sealed package; shared rather than copied. */
  result: SealedAuditPackage | null;
}

export interface JobStatusView {
  id: string;
  status: JobStatus;
  submittedAt: string;
  completedAt: string | null;
  error: JobError | null;
}

export interface JobUpdate {
  startedAt?: string;
  completedAt?: string;
  error?: JobError;
  result?: SealedAuditPackage;
}

export interface JobStore {
  create(record: JobRecord): void;
  get(id: string): JobRecord | undefined;
  /** Move `id` to `to`, applying `update`. Throws IllegalTransitionError. */
  transition(id: string, to: JobStatus, update?: JobUpdate): JobRecord;
  list(): JobRecord[];
}

const ALLOWED: Record<JobStatus, ReadonlyArray<JobStatus>> = {
  PENDING: ["RUNNING", "FAILED"],
  RUNNING: ["COMPLETED", "FAILED"],
  COMPLETED: [],
  FAILED: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return ALLOWED[status].length === 0;
}

function copyRecord(record: JobRecord): JobRecord {
  return {
    ...record,
    error: record.error ? structuredClone(record.error) : null,
  };
}

export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, JobRecord>();

  create(record: JobRecord): void {
    if (this.jobs.has(record.id)) {
      throw new Error(`Job already exists: ${record.id}`);
    }
    this.jobs.set(record.id, copyRecord(record));
  }

  get(id: string): JobRecord | undefined {
    const record = this.jobs.get(id);
    return record ? copyRecord(record) : undefined;
  }

  transition(id: string, to: JobStatus, update: JobUpdate = {}): JobRecord {
    const current = this.jobs.get(id);
    if (!current) {
      throw new IllegalTransitionError(id, "UNKNOWN", to);
    }
    if (!canTransition(current.status, to)) {
      throw new IllegalTransitionError(id, current.status, to);
    }
    const next: JobRecord = {
      ...current,
      status: to,
      startedAt: update.startedAt ?? current.startedAt,
      completedAt: update.completedAt ?? current.completedAt,
      error: update.error ?? current.error,
      result: update.result ?? current.result,
    };
    this.jobs.set(id, copyRecord(next));
    return copyRecord(next);
  }

  list(): JobRecord[] {
    return [...this.jobs.values()]
      .sort((a, b) => compareStrings(a.submittedAt, b.submittedAt) || compareStrings(a.id, b.id))
      .map(copyRecord);
  }
}
