/**
 * Coverage Mapper: requirement → test traceability and the release gate.
 *
 * Pure functions. No I/O and no dependency on the job layer.
 *
 * INVARIANT: a critical requirement that is not COVERED_PASSED can never
 * produce an overall status other than COVERED_FAILED. There is no
 * configuration that relaxes this; `strictMode` only tightens the gate.
 */

import { compareStrings } from "../audit/canonical.js";
import { ComplianceViolation, ValidationError } from "../errors.js";
import type {
  CoverageLink,
  Requirement,
  TestResult,
} from "../contracts/schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CoverageStatus = "UNCOVERED" | "COVERED_PASSED" | "COVERED_FAILED";

export interface CoverageEntry {
  requirementId: string;
  critical: boolean;
  coveringTestIds: string[];
  status: CoverageStatus;
}

/** A non-blocking coverage gap on a non-critical requirement. */
export interface CoverageWarning {
  requirementId: string;
  status: Exclude<CoverageStatus, "COVERED_PASSED">;
  message: string;
}

export interface TraceabilityMatrix {
  requirements: Requirement[];
  /** Only tests referenced by at least one link, ordered by testId. */
  tests: TestResult[];
  coverageMap: Record<string, string[]>;
  entries: CoverageEntry[];
  overallStatus: CoverageStatus;
  warnings: CoverageWarning[];
}

export interface GateOptions {
  /** Block sealing on non-critical gaps as well. */
  strictMode: boolean;
}

// ---------------------------------------------------------------------------
// Referential validation
// ---------------------------------------------------------------------------

/**
 * Verify ids are unique and every link resolves. Collects every problem
 * before throwing so the caller sees the full list at once.
 */
export function validateCoverageInputs(
  requirements: ReadonlyArray<Requirement>,
  tests: ReadonlyArray<TestResult>,
  links: ReadonlyArray<CoverageLink>,
): void {
  const issues: string[] = [];

  const requirementIds = new Set<string>();
  for (const req of requirements) {
    if (requirementIds.has(req.id)) {
      issues.push(`Duplicate requirement id '${req.id}'`);
    }
    requirementIds.add(req.id);
  }

  const testIds = new Set<string>();
  for (const test of tests) {
    if (testIds.has(test.testId)) {
      issues.push(`Duplicate test id '${test.testId}'`);
    }
    testIds.add(test.testId);
  }

  for (const link of links) {
    if (!requirementIds.has(link.requirementId)) {
      issues.push(`Requirement ID '${link.requirementId}' in coverage links not found in requirements`);
    }
    if (!testIds.has(link.testId)) {
      issues.push(`Test ID '${link.testId}' linked to requirement '${link.requirementId}' not found in test results`);
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(
      `Coverage inputs are inconsistent: ${issues.join("; ")}`,
      issues,
    );
  }
}

// ---------------------------------------------------------------------------
// Status rules
// ---------------------------------------------------------------------------

/**
 * Zero linked tests → UNCOVERED. Any FAIL → COVERED_FAILED, no matter how
 * many others pass. Otherwise COVERED_PASSED.
 */
export function requirementStatus(
  linkedTests: ReadonlyArray<TestResult>,
): CoverageStatus {
  if (linkedTests.length === 0) return "UNCOVERED";
  if (linkedTests.some((t) => t.outcome === "FAIL")) return "COVERED_FAILED";
  return "COVERED_PASSED";
}

/**
 * Aggregate entries into the gate decision:
 *   - any critical entry not COVERED_PASSED → COVERED_FAILED
 *   - every entry COVERED_PASSED           → COVERED_PASSED (vacuously true when empty)
 *   - otherwise                            → UNCOVERED (report proceeds, gap flagged)
 */
export function evaluateGate(entries: ReadonlyArray<CoverageEntry>): CoverageStatus {
  if (entries.some((e) => e.critical && e.status !== "COVERED_PASSED")) {
    return "COVERED_FAILED";
  }
  if (entries.every((e) => e.status === "COVERED_PASSED")) {
    return "COVERED_PASSED";
  }
  return "UNCOVERED";
}

// ---------------------------------------------------------------------------
// Matrix
// ---------------------------------------------------------------------------

export function computeTraceabilityMatrix(
  requirements: ReadonlyArray<Requirement>,
  tests: ReadonlyArray<TestResult>,
  links: ReadonlyArray<CoverageLink>,
): TraceabilityMatrix {
  validateCoverageInputs(requirements, tests, links);

  const testsById = new Map(tests.map((t) => [t.testId, t]));

  const linked = new Map<string, Set<string>>();
  for (const link of links) {
    let set = linked.get(link.requirementId);
    if (!set) {
      set = new Set();
      linked.set(link.requirementId, set);
    }
    set.add(link.testId);
  }

  const sortedRequirements = [...requirements]
    .sort((a, b) => compareStrings(a.id, b.id))
    .map((r) => ({ ...r }));

  const coverageMap: Record<string, string[]> = {};
  const entries: CoverageEntry[] = [];
  const warnings: CoverageWarning[] = [];
  const referencedTestIds = new Set<string>();

  for (const req of sortedRequirements) {
    const coveringTestIds = [...(linked.get(req.id) ?? [])].sort(compareStrings);
    const linkedTests: TestResult[] = [];
    for (const testId of coveringTestIds) {
      const test = testsById.get(testId);
      if (test) linkedTests.push(test);
      referencedTestIds.add(testId);
    }

    const status = requirementStatus(linkedTests);
    coverageMap[req.id] = coveringTestIds;
    entries.push({
      requirementId: req.id,
      critical: req.critical,
      coveringTestIds: [...coveringTestIds],
      status,
    });

    if (!req.critical && status !== "COVERED_PASSED") {
      warnings.push({
        requirementId: req.id,
        status,
        message:
          status === "UNCOVERED"
            ? `Non-critical requirement '${req.id}' has no covering test`
            : `Non-critical requirement '${req.id}' has a failing covering test`,
      });
    }
  }

  const matrixTests = tests
    .filter((t) => referencedTestIds.has(t.testId))
    .sort((a, b) => compareStrings(a.testId, b.testId))
    .map((t) => ({ ...t }));

  return {
    requirements: sortedRequirements,
    tests: matrixTests,
    coverageMap,
    entries,
    overallStatus: evaluateGate(entries),
    warnings,
  };
}

// ---------------------------------------------------------------------------
// Gate enforcement
// ---------------------------------------------------------------------------

/** Ids that block sealing under the given options, in entry order. */
export function blockingRequirementIds(
  matrix: TraceabilityMatrix,
  options: GateOptions,
): string[] {
  return matrix.entries
    .filter((e) => e.status !== "COVERED_PASSED" && (e.critical || options.strictMode))
    .map((e) => e.requirementId);
}

/**
 * Throw ComplianceViolation when the matrix must not be sealed.
 *
 * COVERED_FAILED always blocks (failing ids = critical gaps). UNCOVERED
 * blocks only under `strictMode` (failing ids = non-critical gaps).
 */
export function enforceGate(matrix: TraceabilityMatrix, options: GateOptions): void {
  if (matrix.overallStatus === "COVERED_PASSED") return;
  if (matrix.overallStatus === "UNCOVERED" && !options.strictMode) return;

  const failing = blockingRequirementIds(matrix, options);
  throw new ComplianceViolation(failing, options.strictMode);
}
