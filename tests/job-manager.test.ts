import { describe, it, expect, vi } from "vitest";
import { setTimeout as sleep } from "node:timers/promises";
import { JobManager, type JobManagerOptions } from "../src/jobs/job-manager.js";
import { verifySeal, type SignatureRequest, type SigningCapability } from "../src/seal/sealer.js";
import {
  JobNotFoundError,
  JobNotReadyError,
  ManagerClosedError,
  UnsupportedFormatError,
  ValidationError,
} from "../src/errors.js";
import { silentLogger } from "../src/logging/logger.js";
import {
  FakeSessionSource,
  FakeSigner,
  FIXED_NOW,
  event,
  failingRequest,
  fixedClock,
  passingRequest,
  prefixDecryptor,
  sequentialIds,
  turn,
} from "./helpers.js";

const USER = { userId: "auditor-1" };

function manager(overrides: Partial<JobManagerOptions> = {}): JobManager {
  return new JobManager({
    signer: new FakeSigner(),
    logger: silentLogger(),
    clock: fixedClock(),
    generateId: sequentialIds("id"),
    ...overrides,
    settings: { retry: { maxRetries: 1, backoffMs: 1 }, ...overrides.settings },
  });
}

class CountingSigner implements SigningCapability {
  readonly signerId = "counting";
  active = 0;
  maxActive = 0;

  async sign(request: SignatureRequest): Promise<string> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await sleep(20);
    this.active--;
    return `sig:${request.documentHash}`;
  }
}

describe("JobManager.submit", () => {
  it("returns a PENDING job and completes it in the background", async () => {
    const jobs = manager();
    const id = jobs.submit(passingRequest(), USER);

    expect(id).toBe("id-1");
    expect(jobs.getStatus(id)).toEqual({
      id: "id-1",
      status: "PENDING",
      submittedAt: FIXED_NOW,
      completedAt: null,
      error: null,
    });

    await jobs.drain();

    expect(jobs.getStatus(id)?.status).toBe("COMPLETED");
    expect(jobs.getStatus(id)?.completedAt).toBe(FIXED_NOW);

    const pkg = jobs.getResult(id);
    expect(pkg.id).toBe("id-2");
    expect(pkg.agentVersion).toBe("2.4.0");
    expect(pkg.generatedBy).toBe("auditor-1");
    expect(pkg.generatedAt).toBe(FIXED_NOW);
    expect(pkg.modelIdentity).toBe("base-model@aaa111 + safety-lora@bbb222");
    expect(pkg.matrix.overallStatus).toBe("COVERED_PASSED");
    expect(verifySeal(pkg).valid).toBe(true);
    expect(Object.isFrozen(pkg)).toBe(true);
  });

  it("rejects invalid input synchronously without creating a job", () => {
    const jobs = manager();
    expect(() => jobs.submit({ agentVersion: "2.4.0" }, USER)).toThrow(ValidationError);
    expect(jobs.getStatus("id-1")).toBeUndefined();
  });

  it("rejects coverage links to unknown tests", () => {
    const input = passingRequest();
    input.agentConfig.coverageMap = { "1.1": ["T-404"] };
    expect(() => manager().submit(input, USER)).toThrow(
      "Test ID 'T-404' linked to requirement '1.1' not found in test results",
    );
  });

  it("requires a submitting user", () => {
    expect(() => manager().submit(passingRequest(), { userId: "  " })).toThrow(
      "A non-empty userId is required to submit a job",
    );
  });

  it("refuses work after shutdown", async () => {
    const jobs = manager();
    await jobs.shutdown();
    expect(() => jobs.submit(passingRequest(), USER)).toThrow(ManagerClosedError);
    expect(() => jobs.submit(passingRequest(), USER)).toThrow("JobManager is shut down");
  });
});

describe("compliance gate", () => {
  it("fails the job when a critical requirement has a failing test", async () => {
    const jobs = manager();
    const id = jobs.submit(failingRequest(true), USER);
    await jobs.drain();

    expect(jobs.getStatus(id)?.status).toBe("FAILED");
    expect(jobs.getStatus(id)?.error).toEqual({
      code: "COMPLIANCE_VIOLATION",
      stage: "compliance_gate",
      message: "Compliance gate failed for requirement(s): 1.1",
      details: { failingRequirementIds: ["1.1"], strictMode: false },
    });
    expect(() => jobs.getResult(id)).toThrow(JobNotReadyError);
  });

  it("hands out status views that cannot rewrite the job", async () => {
    const jobs = manager();
    const id = jobs.submit(failingRequest(true), USER);
    await jobs.drain();

    const ids = jobs.getStatus(id)?.error?.details["failingRequirementIds"];
    if (Array.isArray(ids)) ids.push("1.9");

    expect(jobs.getStatus(id)?.error?.details["failingRequirementIds"]).toEqual(["1.1"]);
  });

  it("seals with a flagged warning when the failing requirement is non-critical", async () => {
    const jobs = manager();
    const id = jobs.submit(failingRequest(false), USER);
    await jobs.drain();

    const pkg = jobs.getResult(id);
    expect(pkg.matrix.overallStatus).toBe("UNCOVERED");
    expect(pkg.matrix.warnings.map((w) => w.requirementId)).toEqual(["1.1"]);
  });

  it("blocks non-critical gaps in strict mode", async () => {
    const jobs = manager({ settings: { strictMode: true } });
    const id = jobs.submit(failingRequest(false), USER);
    await jobs.drain();
    expect(jobs.getStatus(id)?.error?.code).toBe("COMPLIANCE_VIOLATION");
  });
});

describe("session replay", () => {
  it("includes deviations and reconstructed sessions", async () => {
    const source = new FakeSessionSource({
      events: [
        event("s1", "2025-02-01T10:00:00.000Z", "CRITICAL", "refusal"),
        event("s2", "2025-02-01T10:01:00.000Z", "LOW", "intervention"),
      ],
      turns: [turn("s1", 1, "enc:second"), turn("s1", 0, "enc:first", "input")],
    });
    const jobs = manager({ sessionSource: source, decryptor: prefixDecryptor });
    const id = jobs.submit(passingRequest(), USER);
    await jobs.drain();

    const pkg = jobs.getResult(id);
    expect(source.queries).toEqual([{ agentVersion: "2.4.0" }]);
    expect(pkg.deviations.map((d) => d.sessionId)).toEqual(["s1"]);
    expect(pkg.humanInterventionCount).toBe(1);
    expect(pkg.sessions[0]?.turns.map((t) => t.payload)).toEqual(["first", "second"]);
    expect(pkg.replayWarnings).toEqual([]);
  });

  it("seals turns carrying non-string metadata", async () => {
    const source = new FakeSessionSource({
      events: [event("s1", "2025-02-01T10:00:00.000Z", "HIGH", "refusal")],
      turns: [{ ...turn("s1", 0, "enc:plan", "thought"), metadata: { score: 0.9, attempts: 2 } }],
    });
    const jobs = manager({ sessionSource: source, decryptor: prefixDecryptor });
    const id = jobs.submit(passingRequest(), USER);
    await jobs.drain();

    const pkg = jobs.getResult(id);
    expect(pkg.sessions[0]?.turns[0]?.metadata).toEqual({ score: "0.9", attempts: 2 });
    expect(verifySeal(pkg).valid).toBe(true);
  });

  it("fails the job when the session source stays unavailable", async () => {
    const source = new FakeSessionSource();
    source.failListEvents = 10;
    const jobs = manager({ sessionSource: source });
    const id = jobs.submit(passingRequest(), USER);
    await jobs.drain();

    expect(jobs.getStatus(id)?.error).toMatchObject({
      code: "EXTERNAL_SERVICE_UNAVAILABLE",
      stage: "session_source",
    });
    expect(source.queries).toHaveLength(2);
  });
});

describe("timeouts and cancellation", () => {
  it("fails a job that exceeds its budget", async () => {
    const jobs = manager({
      signer: new FakeSigner({ delayMs: 5_000 }),
      settings: { jobTimeoutMs: 20 },
    });
    const id = jobs.submit(passingRequest(), USER);
    await jobs.drain();

    expect(jobs.getStatus(id)?.error).toEqual({
      code: "JOB_TIMEOUT",
      stage: "timeout",
      message: "Job exceeded its wall-clock budget of 20ms",
      details: { budgetMs: 20 },
    });
  });

  it("cancels a running job", async () => {
    const jobs = manager({ signer: new FakeSigner({ delayMs: 5_000 }) });
    const id = jobs.submit(passingRequest(), USER);
    await vi.waitFor(() => expect(jobs.getStatus(id)?.status).toBe("RUNNING"));

    expect(jobs.cancel(id)).toBe(true);
    await jobs.drain();

    expect(jobs.getStatus(id)?.status).toBe("FAILED");
    expect(jobs.getStatus(id)?.error?.code).toBe("JOB_CANCELLED");
    expect(jobs.cancel(id)).toBe(false);
  });

  it("cancels a queued job before it starts", async () => {
    const signer = new FakeSigner({ delayMs: 10 });
    const jobs = manager({ signer, settings: { maxConcurrentJobs: 1 } });
    const first = jobs.submit(passingRequest(), USER);
    const second = jobs.submit(passingRequest(), USER);

    expect(jobs.cancel(second)).toBe(true);
    await jobs.drain();

    expect(jobs.getStatus(first)?.status).toBe("COMPLETED");
    expect(jobs.getStatus(second)?.error?.code).toBe("JOB_CANCELLED");
    expect(signer.requests).toHaveLength(1);
  });

  it("rejects cancellation of an unknown job", () => {
    expect(() => manager().cancel("nope")).toThrow(JobNotFoundError);
  });
});

describe("concurrency", () => {
  it("runs at most maxConcurrentJobs at once", async () => {
    const signer = new CountingSigner();
    const jobs = manager({ signer, settings: { maxConcurrentJobs: 2 } });
    const ids = [1, 2, 3, 4].map(() => jobs.submit(passingRequest(), USER));
    await jobs.drain();

    expect(ids.map((id) => jobs.getStatus(id)?.status)).toEqual([
      "COMPLETED",
      "COMPLETED",
      "COMPLETED",
      "COMPLETED",
    ]);
    expect(signer.maxActive).toBe(2);
  });
});

describe("retrieval", () => {
  it("renders a completed package as canonical JSON", async () => {
    const jobs = manager();
    const id = jobs.submit(passingRequest(), USER);
    await jobs.drain();

    const artifact = await jobs.retrieve(id, "json");
    expect(artifact.mediaType).toBe("application/json");
    expect(JSON.parse(artifact.bytes.toString("utf8")).id).toBe("id-2");
  });

  it("distinguishes unknown, unfinished and unsupported", async () => {
    const jobs = manager({ signer: new FakeSigner({ delayMs: 50 }) });
    await expect(jobs.retrieve("nope")).rejects.toBeInstanceOf(JobNotFoundError);

    const id = jobs.submit(passingRequest(), USER);
    await expect(jobs.retrieve(id)).rejects.toBeInstanceOf(JobNotReadyError);

    await jobs.drain();
    await expect(jobs.retrieve(id, "pdf")).rejects.toBeInstanceOf(UnsupportedFormatError);
  });
});
