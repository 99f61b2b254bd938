/**
 * Zod schema for a serialized AuditPackage, used when a package re-enters
 * the process (verification of an exported file, re-sealing).
 */

import { z } from "zod";
import {
  ConfigChangeSchema,
  DeviationEventSchema,
  RequirementSchema,
  SessionTurnSchema,
  TestResultSchema,
  iso8601Utc,
} from "../contracts/schemas.js";
import { SHA256_HEX_RE } from "../audit/hashing.js";
import type { AuditPackage } from "./types.js";

const CoverageStatusSchema = z.enum(["UNCOVERED", "COVERED_PASSED", "COVERED_FAILED"]);

const InventoryComponentSchema = z.object({
  kind: z.enum(["adapter", "dataset", "dependency", "model"]),
  identifier: z.string().min(1),
  version: z.string().nullable(),
  contentHash: z.string().nullable(),
});

const TraceabilityMatrixSchema = z.object({
  requirements: z.array(RequirementSchema),
  tests: z.array(TestResultSchema),
  coverageMap: z.record(z.string(), z.array(z.string())),
  entries: z.array(
    z.object({
      requirementId: z.string(),
      critical: z.boolean(),
      coveringTestIds: z.array(z.string()),
      status: CoverageStatusSchema,
    }),
  ),
  overallStatus: CoverageStatusSchema,
  warnings: z.array(
    z.object({
      requirementId: z.string(),
      status: z.enum(["UNCOVERED", "COVERED_FAILED"]),
      message: z.string(),
    }),
  ),
});

const SessionNarrativeSchema = z.object({
  sessionId: z.string(),
  turns: z.array(
    SessionTurnSchema.extend({
      annotations: z.array(
        z.object({
          label: z.string(),
          annotator: z.string(),
          timestamp: z.string(),
        }),
      ),
    }),
  ),
});

const ReplayWarningSchema = z.object({
  kind: z.enum([
    "annotation_unmatched",
    "duplicate_sequence",
    "decryption_failed",
    "session_not_found",
  ]),
  sessionId: z.string(),
  sequenceNo: z.number().int().optional(),
  message: z.string(),
});

export const AuditPackageSchema: z.ZodType<AuditPackage, z.ZodTypeDef, unknown> = z.object({
  schemaVersion: z.string().min(1),
  id: z.string().min(1),
  agentVersion: z.string().min(1),
  generatedAt: iso8601Utc,
  generatedBy: z.string().min(1),
  modelIdentity: z.string(),
  inventory: z.array(InventoryComponentSchema),
  matrix: TraceabilityMatrixSchema,
  deviations: z.array(DeviationEventSchema),
  humanInterventionCount: z.number().int().min(0),
  sessions: z.array(SessionNarrativeSchema),
  configChanges: z.array(ConfigChangeSchema),
  replayWarnings: z.array(ReplayWarningSchema),
  documentHash: z.string().regex(SHA256_HEX_RE, "Must be 64-char lowercase hex SHA-256").nullable(),
  signature: z.string().min(1).nullable(),
});
