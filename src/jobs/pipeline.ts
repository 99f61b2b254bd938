/**
 * The audit pipeline for one job:
 *
 *   1. traceability matrix + compliance gate   (abort on violation)
 *   2. inventory ║ deviations + session replay (concurrent)
 *   3. assemble package + canonical bytes
 *   4. seal
 *
 * Nothing is persisted here; the caller owns the result.
 */

import type { Logger } from "pino";
import type { GenerationRequest, RiskLevel } from "../contracts/schemas.js";
import { coverageLinksFromConfig } from "../contracts/validation.js";
import { computeTraceabilityMatrix, enforceGate } from "../coverage/coverage-mapper.js";
import { assembleInventory, describeModelIdentity } from "../inventory/inventory.js";
import { assemblePackage } from "../package/assembler.js";
import type { SealedAuditPackage } from "../package/types.js";
import type { RetryPolicy } from "../retry.js";
import { Sealer, type SigningCapability } from "../seal/sealer.js";
import { SessionReplayer, type ReplayResult } from "../session/replayer.js";
import type { Decryptor, SessionSource } from "../session/source.js";

export interface PipelineCapabilities {
  signer: SigningCapability;
  /** Without a session source the package carries no deviations or sessions. */
  sessionSource?: SessionSource | null;
  decryptor?: Decryptor | null;
}

export interface PipelineOptions {
  packageId: string;
  generatedBy: string;
  generatedAt: Date;
  strictMode: boolean;
  riskThreshold: RiskLevel;
  maxDeviationSessions: number;
  retry: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
}

const EMPTY_REPLAY: ReplayResult = {
  deviations: [],
  humanInterventionCount: 0,
  sessions: [],
  configChanges: [],
  warnings: [],
};

export async function runAuditPipeline(
  request: GenerationRequest,
  capabilities: PipelineCapabilities,
  options: PipelineOptions,
): Promise<SealedAuditPackage> {
  const { logger, signal } = options;

  const matrix = computeTraceabilityMatrix(
    request.agentConfig.requirements,
    request.assayReport.results,
    coverageLinksFromConfig(request.agentConfig),
  );
  enforceGate(matrix, { strictMode: options.strictMode });
  for (const warning of matrix.warnings) {
    logger.warn({ requirementId: warning.requirementId, status: warning.status }, warning.message);
  }
  signal?.throwIfAborted();

  const source = capabilities.sessionSource;
  const [inventory, replay] = await Promise.all([
    Promise.resolve(assembleInventory(request.bom)),
    source
      ? new SessionReplayer(source, capabilities.decryptor ?? null, logger).replay({
          agentVersion: request.agentVersion,
          riskThreshold: options.riskThreshold,
          maxDeviationSessions: options.maxDeviationSessions,
          retry: options.retry,
          signal,
        })
      : Promise.resolve(EMPTY_REPLAY),
  ]);
  signal?.throwIfAborted();

  const { pkg, canonicalBytes } = assemblePackage({
    id: options.packageId,
    agentVersion: request.agentVersion,
    generatedAt: options.generatedAt,
    generatedBy: options.generatedBy,
    modelIdentity: describeModelIdentity(request.bom),
    inventory,
    matrix,
    deviationReport: {
      deviations: replay.deviations,
      humanInterventionCount: replay.humanInterventionCount,
    },
    sessions: replay.sessions,
    configChanges: replay.configChanges,
    replayWarnings: replay.warnings,
  });

  const sealer = new Sealer(capabilities.signer, { retry: options.retry, logger });
  return sealer.seal(pkg, canonicalBytes, signal);
}
