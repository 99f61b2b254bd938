/**
 * Error taxonomy for the audit pipeline.
 *
 * Fixed codes, one class per failure family. Every error names the
 * pipeline stage it aborted so a FAILED job can be traced back to it.
 */

export type AuditErrorCode =
  | "VALIDATION_FAILED"
  | "COMPLIANCE_VIOLATION"
  | "EXTERNAL_SERVICE_UNAVAILABLE"
  | "INTEGRITY_MISMATCH"
  | "JOB_TIMEOUT"
  | "JOB_CANCELLED"
  | "JOB_NOT_FOUND"
  | "JOB_NOT_COMPLETED"
  | "UNSUPPORTED_FORMAT"
  | "ILLEGAL_TRANSITION"
  | "MANAGER_CLOSED"
  | "PACKAGE_SEALED";

export type PipelineStage =
  | "validation"
  | "compliance_gate"
  | "session_source"
  | "decryption"
  | "signing"
  | "integrity"
  | "timeout"
  | "cancelled"
  | "retrieval"
  | "internal";

export class AuditError extends Error {
  public readonly code: AuditErrorCode;
  public readonly stage: PipelineStage;
  public readonly retryable: boolean;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: AuditErrorCode,
    stage: PipelineStage,
    details?: Record<string, unknown>,
    retryable = false,
  ) {
    super(message);
    this.name = "AuditError";
    this.code = code;
    this.stage = stage;
    this.retryable = retryable;
    this.details = details ?? {};
  }
}

/** Malformed or referentially inconsistent input. Raised before any job is scheduled. */
export class ValidationError extends AuditError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], details?: Record<string, unknown>) {
    super(message, "VALIDATION_FAILED", "validation", { ...details, issues });
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * A gating requirement is uncovered or failed. This is the expected
 * outcome for a non-compliant release, not a defect.
 */
export class ComplianceViolation extends AuditError {
  public readonly failingRequirementIds: string[];

  constructor(failingRequirementIds: string[], strictMode = false) {
    super(
      `Compliance gate failed for requirement(s): ${failingRequirementIds.join(", ")}`,
      "COMPLIANCE_VIOLATION",
      "compliance_gate",
      { failingRequirementIds, strictMode },
    );
    this.name = "ComplianceViolation";
    this.failingRequirementIds = failingRequirementIds;
  }
}

export class ExternalServiceError extends AuditError {
  public readonly service: string;

  constructor(
    message: string,
    stage: "session_source" | "decryption" | "signing",
    service: string,
    cause?: unknown,
  ) {
    super(
      message,
      "EXTERNAL_SERVICE_UNAVAILABLE",
      stage,
      { service, cause: describeCause(cause) },
      true,
    );
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

/** Post-seal digest mismatch. Indicates a canonicalization defect; never retried. */
export class IntegrityError extends AuditError {
  constructor(expected: string, actual: string, packageId: string) {
    super(
      `Document hash mismatch after sealing package ${packageId}: expected ${expected}, got ${actual}`,
      "INTEGRITY_MISMATCH",
      "integrity",
      { expected, actual, packageId },
    );
    this.name = "IntegrityError";
  }
}

/** Attempt to seal or mutate a package that already carries a seal. */
export class PackageSealedError extends AuditError {
  constructor(packageId: string) {
    super(
      `Package ${packageId} is already sealed; produce a new package instead`,
      "PACKAGE_SEALED",
      "integrity",
      { packageId },
    );
    this.name = "PackageSealedError";
  }
}

export class TimeoutError extends AuditError {
  constructor(budgetMs: number) {
    super(
      `Job exceeded its wall-clock budget of ${budgetMs}ms`,
      "JOB_TIMEOUT",
      "timeout",
      { budgetMs },
    );
    this.name = "TimeoutError";
  }
}

export class JobCancelledError extends AuditError {
  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled`, "JOB_CANCELLED", "cancelled", { jobId });
    this.name = "JobCancelledError";
  }
}

export class JobNotFoundError extends AuditError {
  constructor(jobId: string) {
    super(`Job not found: ${jobId}`, "JOB_NOT_FOUND", "retrieval", { jobId });
    this.name = "JobNotFoundError";
  }
}

export class JobNotReadyError extends AuditError {
  constructor(jobId: string, status: string) {
    super(
      `Job ${jobId} has no artifact yet (status ${status})`,
      "JOB_NOT_COMPLETED",
      "retrieval",
      { jobId, status },
    );
    this.name = "JobNotReadyError";
  }
}

export class UnsupportedFormatError extends AuditError {
  constructor(format: string, supported: string[]) {
    super(
      `Unsupported export format "${format}" (supported: ${supported.join(", ")})`,
      "UNSUPPORTED_FORMAT",
      "retrieval",
      { format, supported },
    );
    this.name = "UnsupportedFormatError";
  }
}

export class IllegalTransitionError extends AuditError {
  constructor(jobId: string, from: string, to: string) {
    super(
      `Illegal job transition for ${jobId}: ${from} -> ${to}`,
      "ILLEGAL_TRANSITION",
      "internal",
      { jobId, from, to },
    );
    this.name = "IllegalTransitionError";
  }
}

/** Submission after `shutdown()`. */
export class ManagerClosedError extends AuditError {
  constructor() {
    super("JobManager is shut down", "MANAGER_CLOSED", "internal");
    this.name = "ManagerClosedError";
  }
}

// ---------------------------------------------------------------------------
// Job error records
// ---------------------------------------------------------------------------

/** Structured error attached to a FAILED job. */
export interface JobError {
  code: AuditErrorCode | "INTERNAL_ERROR";
  stage: PipelineStage;
  message: string;
  details: Record<string, unknown>;
}

export function toJobError(err: unknown): JobError {
  if (err instanceof AuditError) {
    return {
      code: err.code,
      stage: err.stage,
      message: err.message,
      details: { ...err.details },
    };
  }
  return {
    code: "INTERNAL_ERROR",
    stage: "internal",
    message: err instanceof Error ? err.message : String(err),
    details: {},
  };
}

function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}
