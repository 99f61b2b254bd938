/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments and the resolved configuration
 *   - calls library functions (no business logic here)
 *   - writes through a CliIo
 *   - returns an exit code (0 = success, 1 = error, 2 = compliance violation)
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { Logger } from "pino";
import { canonicalJson } from "../audit/canonical.js";
import { parseWith } from "../contracts/validation.js";
import { AuditError, ValidationError } from "../errors.js";
import { JobManager } from "../jobs/job-manager.js";
import { silentLogger } from "../logging/logger.js";
import { AuditPackageSchema } from "../package/schema.js";
import type { AuditPackage } from "../package/types.js";
import { HmacSigner } from "../seal/hmac-signer.js";
import { verifySeal } from "../seal/sealer.js";
import { SqliteSessionSource } from "../session/sqlite-source.js";
import { ArchiveStore } from "../storage/archive-store.js";
import { type AuditorConfig, ensureDataDirs } from "./config.js";

/** Signer id of the local HMAC signer used by the CLI. */
export const LOCAL_SIGNER_ID = "sealgate-local";

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  /** Informational line on stderr. */
  info(line: string): void;
  /** Raw bytes to stdout (exported packages). */
  write(bytes: Uint8Array): void;
}

export const processIo: CliIo = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(`error: ${line}\n`),
  info: (line) => process.stderr.write(line + "\n"),
  write: (bytes) => process.stdout.write(bytes),
};

export interface GenerateDeps {
  logger?: Logger;
  clock?: () => Date;
  generateId?: () => string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function requireFlag(flags: Map<string, string>, name: string, io: CliIo): string | undefined {
  const v = flags.get(name);
  if (!v || v === "true") {
    io.err(`missing required flag: --${name}`);
    return undefined;
  }
  return v;
}

/** JSON, or YAML for `.yaml` / `.yml` files. */
export function readStructuredFile(path: string): unknown {
  const abs = resolve(path);
  if (!existsSync(abs)) {
    throw new Error(`File not found: ${abs}`);
  }
  const raw = readFileSync(abs, "utf8");
  const ext = extname(abs).toLowerCase();
  if (ext === ".yaml" || ext === ".yml") {
    return parseYaml(raw);
  }
  const data: unknown = JSON.parse(raw);
  return data;
}

function reportError(e: unknown, io: CliIo): number {
  if (e instanceof ValidationError) {
    io.err(e.message.split(":")[0] ?? e.message);
    for (const issue of e.issues) {
      io.err(`  ${issue}`);
    }
    return 1;
  }
  io.err(e instanceof Error ? e.message : String(e));
  return 1;
}

// ---------------------------------------------------------------------------
// init
// ---------------------------------------------------------------------------

export function cmdInit(config: AuditorConfig, io: CliIo = processIo): number {
  ensureDataDirs(config);
  io.out(`Initialized sealgate at ${config.baseDir}`);
  io.out(`  Archive:   ${config.archiveRoot}`);
  io.out(`  Sessions:  ${config.sessionDbPath ?? "(none)"}`);
  return 0;
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(config: AuditorConfig, json: boolean, io: CliIo = processIo): number {
  const shown = { ...config, signingKey: config.signingKey ? "[redacted]" : null };
  if (json) {
    io.out(canonicalJson(shown));
  } else {
    io.out(`baseDir:              ${shown.baseDir}`);
    io.out(`sessionDbPath:        ${shown.sessionDbPath ?? "(none)"}`);
    io.out(`archiveRoot:          ${shown.archiveRoot}`);
    io.out(`riskThreshold:        ${shown.riskThreshold}`);
    io.out(`maxDeviationSessions: ${shown.maxDeviationSessions}`);
    io.out(`strictMode:           ${shown.strictMode}`);
    io.out(`jobTimeoutMs:         ${shown.jobTimeoutMs}`);
    io.out(`maxConcurrentJobs:    ${shown.maxConcurrentJobs}`);
    io.out(`retry:                ${shown.retry.maxRetries} x ${shown.retry.backoffMs}ms`);
    io.out(`logLevel:             ${shown.logLevel}`);
    io.out(`defaultUserId:        ${shown.defaultUserId}`);
    io.out(`signingKey:           ${shown.signingKey ?? "(unset)"}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// generate
// ---------------------------------------------------------------------------

export async function cmdGenerate(
  flags: Map<string, string>,
  config: AuditorConfig,
  io: CliIo = processIo,
  deps: GenerateDeps = {},
): Promise<number> {
  const agentConfigPath = requireFlag(flags, "agent-config", io);
  const assayPath = requireFlag(flags, "assay-report", io);
  const bomPath = requireFlag(flags, "bom", io);
  const agentVersion = requireFlag(flags, "agent-version", io);
  if (!agentConfigPath || !assayPath || !bomPath || !agentVersion) return 1;

  if (!config.signingKey) {
    io.err("SEALGATE_SIGNING_KEY is required to seal packages");
    return 1;
  }

  const format = flags.get("format") ?? "json";
  const outPath = flags.get("out");
  const userId = flags.get("user") ?? config.defaultUserId;

  let input: unknown;
  try {
    input = {
      agentVersion,
      agentConfig: readStructuredFile(agentConfigPath),
      assayReport: readStructuredFile(assayPath),
      bom: readStructuredFile(bomPath),
    };
  } catch (e: unknown) {
    return reportError(e, io);
  }

  let sessionSource: SqliteSessionSource | null;
  try {
    sessionSource = config.sessionDbPath ? new SqliteSessionSource(config.sessionDbPath) : null;
  } catch (e: unknown) {
    return reportError(e, io);
  }
  const manager = new JobManager({
    signer: new HmacSigner(LOCAL_SIGNER_ID, config.signingKey),
    sessionSource,
    settings: config,
    logger: deps.logger ?? silentLogger(),
    clock: deps.clock,
    generateId: deps.generateId,
  });

  try {
    if (!manager.formats().includes(format)) {
      io.err(`unsupported format "${format}" (supported: ${manager.formats().join(", ")})`);
      return 1;
    }

    let jobId: string;
    try {
      jobId = manager.submit(input, { userId });
    } catch (e: unknown) {
      return reportError(e, io);
    }

    await manager.drain();

    const status = manager.getStatus(jobId);
    if (status?.status !== "COMPLETED") {
      const error = status?.error;
      if (!error) {
        io.err(`job ${jobId} did not complete`);
        return 1;
      }
      io.err(`[${error.code}] ${error.stage}: ${error.message}`);
      return error.code === "COMPLIANCE_VIOLATION" ? 2 : 1;
    }

    const pkg = manager.getResult(jobId);
    const artifact = await manager.retrieve(jobId, format);

    // With no --out the package itself goes to stdout and the summary to stderr.
    const summary = (line: string): void => (outPath ? io.out(line) : io.info(line));
    if (outPath) {
      writeFileSync(resolve(outPath), artifact.bytes);
    } else {
      io.write(artifact.bytes);
    }
    summary(`package:      ${pkg.id}`);
    summary(`documentHash: ${pkg.documentHash}`);
    summary(`coverage:     ${pkg.matrix.overallStatus}`);
    summary(`deviations:   ${pkg.deviations.length} (${pkg.humanInterventionCount} intervention(s))`);
    if (outPath) {
      summary(`written:      ${resolve(outPath)}`);
    }

    if (flags.has("archive")) {
      const record = new ArchiveStore(config.archiveRoot).putArtifact(artifact);
      summary(`archived:     ${record.digest}${record.created ? "" : " (already present)"}`);
    }
    return 0;
  } catch (e: unknown) {
    return reportError(e, io);
  } finally {
    await manager.shutdown();
    sessionSource?.close();
  }
}

// ---------------------------------------------------------------------------
// verify
// ---------------------------------------------------------------------------

export async function cmdVerify(
  filePath: string,
  config: AuditorConfig,
  json: boolean,
  io: CliIo = processIo,
): Promise<number> {
  let pkg: AuditPackage;
  try {
    pkg = parseWith(AuditPackageSchema, readStructuredFile(filePath), "audit package");
  } catch (e: unknown) {
    return reportError(e, io);
  }

  const seal = verifySeal(pkg);
  let signatureValid: boolean | null = null;
  if (config.signingKey && pkg.documentHash && pkg.signature) {
    signatureValid = await new HmacSigner(LOCAL_SIGNER_ID, config.signingKey).verify(
      pkg.documentHash,
      pkg.signature,
    );
  }
  const ok = seal.valid && signatureValid !== false;

  if (json) {
    io.out(
      canonicalJson({
        packageId: pkg.id,
        hashValid: seal.valid,
        expectedHash: seal.expected,
        embeddedHash: seal.actual,
        signatureValid,
        ok,
      }),
    );
  } else {
    io.out(`package:   ${pkg.id}`);
    io.out(`hash:      ${seal.valid ? "valid" : `MISMATCH (expected ${seal.expected}, embedded ${seal.actual ?? "none"})`}`);
    io.out(
      `signature: ${signatureValid === null ? "not checked" : signatureValid ? "valid" : "INVALID"}`,
    );
  }
  return ok ? 0 : 1;
}

/** Exit code for an error that escaped a command. */
export function exitCodeFor(e: unknown): number {
  return e instanceof AuditError && e.code === "COMPLIANCE_VIOLATION" ? 2 : 1;
}
