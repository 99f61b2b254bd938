/**
 * Shared fixtures and in-process fakes for the external capabilities.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type {
  Annotation,
  ConfigChange,
  DeviationEvent,
  GenerationRequestInput,
  SessionTurn,
} from "../src/contracts/schemas.js";
import type { SignatureRequest, SigningCapability } from "../src/seal/sealer.js";
import type { Decryptor, EventQuery, SessionSource } from "../src/session/source.js";

export const FIXED_NOW = "2025-03-01T12:00:00.000Z";

export function fixedClock(iso: string = FIXED_NOW): () => Date {
  return () => new Date(iso);
}

export function sequentialIds(prefix = "id"): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

// ---------------------------------------------------------------------------
// Generation requests
// ---------------------------------------------------------------------------

/** Two critical requirements, both covered by passing tests. */
export function passingRequest(agentVersion = "2.4.0"): GenerationRequestInput {
  return {
    agentVersion,
    agentConfig: {
      requirements: [
        { id: "1.1", description: "Refuses unsafe requests" },
        { id: "1.2", description: "Logs every tool call" },
      ],
      coverageMap: { "1.1": ["T-100"], "1.2": ["T-200"] },
    },
    assayReport: {
      results: [
        { testId: "T-100", outcome: "PASS" },
        { testId: "T-200", outcome: "PASS" },
      ],
    },
    bom: {
      modelName: "base-model",
      modelVersion: "7b",
      modelSha: "aaa111",
      adapters: [{ name: "safety-lora", sha: "bbb222" }],
      dataLineage: ["ft-job-9"],
      softwareDependencies: ["numpy==1.26.0", "torch==2.2.1"],
    },
  };
}

/** Requirement 1.1 linked to one passing and one failing test. */
export function failingRequest(critical: boolean): GenerationRequestInput {
  return {
    agentVersion: "2.4.0",
    agentConfig: {
      requirements: [{ id: "1.1", critical }],
      coverageMap: { "1.1": ["T-100", "T-102"] },
    },
    assayReport: {
      results: [
        { testId: "T-100", outcome: "PASS" },
        { testId: "T-102", outcome: "FAIL" },
      ],
    },
    bom: { modelName: "base-model", modelVersion: "7b", modelSha: "aaa111" },
  };
}

// ---------------------------------------------------------------------------
// Signer
// ---------------------------------------------------------------------------

export interface FakeSignerOptions {
  /** Number of leading calls that throw before signing succeeds. */
  failures?: number;
  /** Delay before each answer; honours the abort signal. */
  delayMs?: number;
}

export class FakeSigner implements SigningCapability {
  readonly signerId = "fake-signer";
  readonly requests: SignatureRequest[] = [];
  private remainingFailures: number;

  constructor(private readonly options: FakeSignerOptions = {}) {
    this.remainingFailures = options.failures ?? 0;
  }

  async sign(request: SignatureRequest, signal?: AbortSignal): Promise<string> {
    this.requests.push(request);
    if (this.options.delayMs) {
      await sleep(this.options.delayMs, undefined, signal ? { signal } : undefined);
    }
    if (this.remainingFailures > 0) {
      this.remainingFailures--;
      throw new Error("signing authority unavailable");
    }
    return `sig:${request.documentHash}`;
  }
}

// ---------------------------------------------------------------------------
// Session source
// ---------------------------------------------------------------------------

export interface FakeSessionData {
  events?: DeviationEvent[];
  turns?: SessionTurn[];
  annotations?: Annotation[];
  configChanges?: ConfigChange[];
}

export class FakeSessionSource implements SessionSource {
  readonly queries: EventQuery[] = [];
  /** Number of leading listEvents calls that fail. */
  failListEvents = 0;

  constructor(private readonly data: FakeSessionData = {}) {}

  async listEvents(query: EventQuery): Promise<DeviationEvent[]> {
    this.queries.push(query);
    if (this.failListEvents > 0) {
      this.failListEvents--;
      throw new Error("connection reset");
    }
    return (this.data.events ?? []).map((e) => ({ ...e }));
  }

  async fetchSession(sessionId: string): Promise<SessionTurn[]> {
    return (this.data.turns ?? []).filter((t) => t.sessionId === sessionId).map((t) => ({ ...t }));
  }

  async listAnnotations(sessionId: string): Promise<Annotation[]> {
    return (this.data.annotations ?? []).filter((a) => a.turnRef.sessionId === sessionId);
  }

  async listConfigChanges(): Promise<ConfigChange[]> {
    return (this.data.configChanges ?? []).map((c) => ({ ...c }));
  }
}

/** Strips an `enc:` prefix; anything else fails to decrypt. */
export const prefixDecryptor: Decryptor = {
  async decrypt(field: string): Promise<string> {
    if (!field.startsWith("enc:")) {
      throw new Error("not an encrypted field");
    }
    return field.slice(4);
  },
};

export function turn(
  sessionId: string,
  sequenceNo: number,
  payload: string,
  phase: SessionTurn["phase"] = "action",
): SessionTurn {
  return { sessionId, sequenceNo, phase, payload, metadata: {} };
}

export function event(
  sessionId: string,
  timestamp: string,
  riskLevel: DeviationEvent["riskLevel"],
  kind: DeviationEvent["kind"] = "refusal",
): DeviationEvent {
  return { sessionId, timestamp, riskLevel, kind, detail: "" };
}
