/**
 * Job Manager: asynchronous front door of the auditor.
 *
 * `submit` validates synchronously and returns a job id at once; the
 * pipeline runs in the background under a concurrency cap and a wall-clock
 * budget. Status and results are read from the JobStore without side
 * effects.
 */

import pLimit from "p-limit";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import type { GenerationRequest, RiskLevel } from "../contracts/schemas.js";
import { coverageLinksFromConfig, parseGenerationRequest } from "../contracts/validation.js";
import { validateCoverageInputs } from "../coverage/coverage-mapper.js";
import {
  JobCancelledError,
  JobNotFoundError,
  JobNotReadyError,
  ManagerClosedError,
  TimeoutError,
  ValidationError,
  toJobError,
} from "../errors.js";
import { RendererRegistry, type RenderedArtifact } from "../export/renderers.js";
import { silentLogger } from "../logging/logger.js";
import type { SealedAuditPackage } from "../package/types.js";
import type { RetryPolicy } from "../retry.js";
import type { SigningCapability } from "../seal/sealer.js";
import type { Decryptor, SessionSource } from "../session/source.js";
import { raceAbort } from "./abort.js";
import {
  InMemoryJobStore,
  isTerminal,
  type JobStatus,
  type JobStatusView,
  type JobStore,
  type JobUpdate,
} from "./job-store.js";
import { runAuditPipeline } from "./pipeline.js";

export interface JobSettings {
  riskThreshold: RiskLevel;
  maxDeviationSessions: number;
  strictMode: boolean;
  jobTimeoutMs: number;
  maxConcurrentJobs: number;
  retry: RetryPolicy;
}

export const DEFAULT_JOB_SETTINGS: JobSettings = {
  riskThreshold: "HIGH",
  maxDeviationSessions: 10,
  strictMode: false,
  jobTimeoutMs: 300_000,
  maxConcurrentJobs: 4,
  retry: { maxRetries: 3, backoffMs: 200 },
};

export interface JobManagerOptions {
  signer: SigningCapability;
  sessionSource?: SessionSource | null;
  decryptor?: Decryptor | null;
  renderers?: RendererRegistry;
  store?: JobStore;
  settings?: Partial<JobSettings>;
  logger?: Logger;
  clock?: () => Date;
  /** Used for job ids and package ids. */
  generateId?: () => string;
}

export interface SubmitContext {
  /** Authenticated submitter; recorded as job owner and package author. */
  userId: string;
}

export interface ShutdownOptions {
  /** Cancel jobs that are already running instead of letting them finish. */
  cancelRunning?: boolean;
}

export class JobManager {
  private readonly store: JobStore;
  private readonly renderers: RendererRegistry;
  private readonly settings: JobSettings;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly controllers = new Map<string, AbortController>();
  private readonly inFlight = new Set<Promise<void>>();
  private closed = false;

  constructor(private readonly options: JobManagerOptions) {
    this.store = options.store ?? new InMemoryJobStore();
    this.renderers = options.renderers ?? new RendererRegistry();
    this.settings = { ...DEFAULT_JOB_SETTINGS, ...options.settings };
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => uuidv4());
    this.limit = pLimit(this.settings.maxConcurrentJobs);
  }

  // -----------------------------------------------------------------------
  // Submission
  // -----------------------------------------------------------------------

  /**
   * Validate `input` and schedule a generation job.
   * Invalid input throws ValidationError and creates no job.
   */
  submit(input: unknown, context: SubmitContext): string {
    if (this.closed) {
      throw new ManagerClosedError();
    }
    const ownerId = context.userId.trim();
    if (ownerId.length === 0) {
      throw new ValidationError("A non-empty userId is required to submit a job", [
        "userId: Required",
      ]);
    }

    const request = parseGenerationRequest(input);
    validateCoverageInputs(
      request.agentConfig.requirements,
      request.assayReport.results,
      coverageLinksFromConfig(request.agentConfig),
    );

    const id = this.generateId();
    this.store.create({
      id,
      ownerId,
      agentVersion: request.agentVersion,
      status: "PENDING",
      submittedAt: this.clock().toISOString(),
      startedAt: null,
      completedAt: null,
      error: null,
      result: null,
    });
    this.logger.info({ jobId: id, status: "PENDING", ownerId }, "job submitted");

    const run: Promise<void> = this.limit(() => this.execute(id, request, ownerId)).finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
    return id;
  }

  // -----------------------------------------------------------------------
  // Queries
  // -----------------------------------------------------------------------

  getStatus(id: string): JobStatusView | undefined {
    const job = this.store.get(id);
    if (!job) return undefined;
    return {
      id: job.id,
      status: job.status,
      submittedAt: job.submittedAt,
      completedAt: job.completedAt,
      error: job.error,
    };
  }

  getResult(id: string): SealedAuditPackage {
    const job = this.store.get(id);
    if (!job) throw new JobNotFoundError(id);
    if (job.status !== "COMPLETED" || !job.result) {
      throw new JobNotReadyError(id, job.status);
    }
    return job.result;
  }

  async retrieve(id: string, format = "json"): Promise<RenderedArtifact> {
    const pkg = this.getResult(id);
    return this.renderers.render(pkg, format);
  }

  formats(): string[] {
    return this.renderers.formats();
  }

  // -----------------------------------------------------------------------
  // Cancellation and shutdown
  // -----------------------------------------------------------------------

  /**
   * Fail a PENDING or RUNNING job with JOB_CANCELLED. Returns false when the
   * job had already reached a terminal state.
   */
  cancel(id: string): boolean {
    const job = this.store.get(id);
    if (!job) throw new JobNotFoundError(id);
    if (isTerminal(job.status)) return false;

    const error = new JobCancelledError(id);
    this.store.transition(id, "FAILED", {
      completedAt: this.clock().toISOString(),
      error: toJobError(error),
    });
    this.controllers.get(id)?.abort(error);
    this.logger.info({ jobId: id, status: "FAILED", from: job.status }, "job cancelled");
    return true;
  }

  /** Resolve once every scheduled job has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /**
   * Stop accepting jobs, fail the ones still queued and wait for the rest.
   */
  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    this.closed = true;
    for (const job of this.store.list()) {
      if (job.status === "PENDING" || (options.cancelRunning && job.status === "RUNNING")) {
        this.cancel(job.id);
      }
    }
    await this.drain();
  }

  // -----------------------------------------------------------------------
  // Execution
  // -----------------------------------------------------------------------

  private async execute(id: string, request: GenerationRequest, ownerId: string): Promise<void> {
    // Cancelled while queued.
    if (this.store.get(id)?.status !== "PENDING") return;

    const controller = new AbortController();
    this.controllers.set(id, controller);
    this.store.transition(id, "RUNNING", { startedAt: this.clock().toISOString() });
    this.logger.info({ jobId: id, status: "RUNNING" }, "job started");

    const budgetMs = this.settings.jobTimeoutMs;
    const timer = setTimeout(() => controller.abort(new TimeoutError(budgetMs)), budgetMs);

    try {
      const work = runAuditPipeline(
        request,
        {
          signer: this.options.signer,
          sessionSource: this.options.sessionSource,
          decryptor: this.options.decryptor,
        },
        {
          packageId: this.generateId(),
          generatedBy: ownerId,
          generatedAt: this.clock(),
          strictMode: this.settings.strictMode,
          riskThreshold: this.settings.riskThreshold,
          maxDeviationSessions: this.settings.maxDeviationSessions,
          retry: this.settings.retry,
          logger: this.logger.child({ jobId: id }),
          signal: controller.signal,
        },
      );
      const result = await raceAbort(work, controller.signal);
      this.finish(id, "COMPLETED", { result });
    } catch (err: unknown) {
      const error = toJobError(err);
      this.logger.error({ err, jobId: id, stage: error.stage, code: error.code }, "job failed");
      this.finish(id, "FAILED", { error });
    } finally {
      clearTimeout(timer);
      this.controllers.delete(id);
    }
  }

  /** Record the outcome unless the job left RUNNING in the meantime. */
  private finish(id: string, to: Extract<JobStatus, "COMPLETED" | "FAILED">, update: JobUpdate): void {
    if (this.store.get(id)?.status !== "RUNNING") return;
    this.store.transition(id, to, { ...update, completedAt: this.clock().toISOString() });
    this.logger.info({ jobId: id, status: to }, "job finished");
  }
}
