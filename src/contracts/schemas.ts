/**
 * Zod schemas for every record that crosses the pipeline boundary.
 *
 * Domain types are inferred from these schemas so the validated shape and
 * the compiled shape can never drift apart. Input objects are strict at
 * the leaves that carry identifiers; descriptive payloads pass through.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Shared field-level schemas
// ---------------------------------------------------------------------------

const truncateFraction = (s: string): string => s.replace(/(\.\d{3})\d+/, "$1");

/**
 * ISO 8601 datetime with `Z` or a numeric offset, normalised to UTC at
 * millisecond precision so the same instant always serializes to the same
 * string. Sub-millisecond digits are truncated.
 */
export const iso8601Utc = z
  .string()
  .datetime({ offset: true, message: "Must be ISO 8601 datetime (YYYY-MM-DDTHH:mm:ss[.fff](Z|±HH:MM))" })
  .refine((s) => !isNaN(Date.parse(truncateFraction(s))), "Must be a parseable datetime")
  .transform((s) => new Date(truncateFraction(s)).toISOString());

const identifier = z.string().trim().min(1).max(200);

// ---------------------------------------------------------------------------
// Requirements, tests, coverage
// ---------------------------------------------------------------------------

export const RequirementSchema = z.object({
  id: identifier,
  description: z.string().max(2000).default(""),
  critical: z.boolean().default(true),
});

export const TestOutcomeSchema = z.enum(["PASS", "FAIL"]);

export const TestResultSchema = z.object({
  testId: identifier,
  outcome: TestOutcomeSchema,
  evidenceRef: z.string().max(2000).optional(),
});

export const CoverageLinkSchema = z.object({
  requirementId: identifier,
  testId: identifier,
});

/**
 * Agent configuration: declared requirements plus coverage, given either as
 * a `coverageMap` (requirement id → test ids) or as explicit `links`.
 */
export const AgentConfigSchema = z.object({
  requirements: z.array(RequirementSchema),
  coverageMap: z.record(identifier, z.array(identifier)).default({}),
  links: z.array(CoverageLinkSchema).default([]),
});

export const AssayReportSchema = z.object({
  results: z.array(TestResultSchema),
  generatedAt: iso8601Utc.optional(),
});

// ---------------------------------------------------------------------------
// Inventory seed data
// ---------------------------------------------------------------------------

export const AdapterSeedSchema = z.object({
  name: identifier,
  sha: z.string().min(1).max(200),
});

export const BomSeedSchema = z.object({
  modelName: identifier,
  modelVersion: z.string().min(1).max(100),
  modelSha: z.string().min(1).max(200),
  adapters: z.array(AdapterSeedSchema).default([]),
  dataLineage: z.array(identifier).default([]),
  softwareDependencies: z.array(z.string().trim().min(1).max(300)).default([]),
});

// ---------------------------------------------------------------------------
// Operational events (session source)
// ---------------------------------------------------------------------------

export const RISK_LEVELS = ["LOW", "MEDIUM", "HIGH", "CRITICAL"] as const;

export const RiskLevelSchema = z.enum(RISK_LEVELS);

export const DeviationKindSchema = z.enum(["refusal", "error", "intervention"]);

export const DeviationEventSchema = z.object({
  sessionId: identifier,
  timestamp: iso8601Utc,
  riskLevel: RiskLevelSchema,
  kind: DeviationKindSchema,
  detail: z.string().max(10_000).default(""),
});

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

export const SessionPhaseSchema = z.enum(["input", "thought", "action", "outcome"]);

export const SessionTurnSchema = z.object({
  sessionId: identifier,
  sequenceNo: z.number().int().min(0),
  phase: SessionPhaseSchema,
  payload: z.string(),
  /** Free-form; only string values are ever decrypted. */
  metadata: z.record(z.string(), JsonValueSchema).default({}),
  recordedAt: iso8601Utc.optional(),
});

export const TurnRefSchema = z.object({
  sessionId: identifier,
  sequenceNo: z.number().int().min(0),
});

export const AnnotationSchema = z.object({
  turnRef: TurnRefSchema,
  label: z.string().min(1).max(500),
  annotator: identifier,
  timestamp: iso8601Utc,
});

export const ConfigChangeSchema = z.object({
  changeId: identifier,
  timestamp: iso8601Utc,
  userId: identifier,
  fieldChanged: z.string().min(1).max(200),
  oldValue: z.string(),
  newValue: z.string(),
  reason: z.string().default(""),
  status: z.string().min(1).max(100),
});

// ---------------------------------------------------------------------------
// Generation request
// ---------------------------------------------------------------------------

export const GenerationRequestSchema = z.object({
  agentVersion: z.string().trim().min(1).max(100),
  agentConfig: AgentConfigSchema,
  assayReport: AssayReportSchema,
  bom: BomSeedSchema,
});

// ---------------------------------------------------------------------------
// Type exports (inferred from schemas)
// ---------------------------------------------------------------------------

export type Requirement = z.infer<typeof RequirementSchema>;
export type TestOutcome = z.infer<typeof TestOutcomeSchema>;
export type TestResult = z.infer<typeof TestResultSchema>;
export type CoverageLink = z.infer<typeof CoverageLinkSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AssayReport = z.infer<typeof AssayReportSchema>;
export type AdapterSeed = z.infer<typeof AdapterSeedSchema>;
export type BomSeed = z.infer<typeof BomSeedSchema>;
export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type DeviationKind = z.infer<typeof DeviationKindSchema>;
export type DeviationEvent = z.infer<typeof DeviationEventSchema>;
export type SessionPhase = z.infer<typeof SessionPhaseSchema>;
export type SessionTurn = z.infer<typeof SessionTurnSchema>;
export type TurnRef = z.infer<typeof TurnRefSchema>;
export type Annotation = z.infer<typeof AnnotationSchema>;
export type ConfigChange = z.infer<typeof ConfigChangeSchema>;
export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;

/** Pre-validation shape accepted at the submission boundary. */
export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;
