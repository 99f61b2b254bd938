export * from "./errors.js";
export * from "./contracts/schemas.js";
export { coverageLinksFromConfig, formatIssues, parseGenerationRequest, parseWith } from "./contracts/validation.js";
export { canonicalJson, compareStrings, sha256, sha256Bytes } from "./audit/index.js";
export * from "./coverage/coverage-mapper.js";
export * from "./inventory/inventory.js";
export * from "./deviations/deviation-filter.js";
export * from "./session/reconstruct.js";
export type { Decryptor, EventQuery, SessionSource } from "./session/source.js";
export { SessionReplayer, orderConfigChanges, type ReplayOptions, type ReplayResult } from "./session/replayer.js";
export { SESSION_STORE_SCHEMA_SQL, SqliteSessionSource } from "./session/sqlite-source.js";
export * from "./package/types.js";
export { assemblePackage, type AssembledPackage, type PackageParts } from "./package/assembler.js";
export { CANONICAL_FIELD_ORDER, canonicalPackageBytes, computeDocumentHash } from "./package/canonical.js";
export { AuditPackageSchema } from "./package/schema.js";
export * from "./seal/sealer.js";
export { HmacSigner } from "./seal/hmac-signer.js";
export * from "./export/renderers.js";
export * from "./jobs/job-store.js";
export { runAuditPipeline, type PipelineCapabilities, type PipelineOptions } from "./jobs/pipeline.js";
export * from "./jobs/job-manager.js";
export * from "./storage/archive-store.js";
export { backoffDelay, withRetry, type RetryOptions, type RetryPolicy } from "./retry.js";
export { createLogger, silentLogger, type Logger, type LoggerOptions } from "./logging/logger.js";
