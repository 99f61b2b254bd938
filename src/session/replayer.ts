/**
 * Session replay: pulls operational events from the read-only session
 * source, extracts deviations and rebuilds the narratives of the sessions
 * they occurred in.
 *
 * The calls to the session source and the decryptor are the only
 * suspension points; everything between them is synchronous.
 */

import type { Logger } from "pino";
import type { ConfigChange, JsonValue, RiskLevel, SessionTurn } from "../contracts/schemas.js";
import { compareStrings } from "../audit/canonical.js";
import { filterDeviations, selectDeviationSessions, type DeviationReport } from "../deviations/deviation-filter.js";
import { AuditError, ExternalServiceError } from "../errors.js";
import { withRetry, type RetryPolicy } from "../retry.js";
import { compareWarnings, reconstructSessions, type ReplayWarning, type SessionNarrative } from "./reconstruct.js";
import type { Decryptor, SessionSource } from "./source.js";

export interface ReplayOptions {
  agentVersion: string;
  riskThreshold: RiskLevel;
  /** Maximum number of deviating sessions to reconstruct. */
  maxDeviationSessions: number;
  retry: RetryPolicy;
  signal?: AbortSignal;
}

export interface ReplayResult extends DeviationReport {
  sessions: SessionNarrative[];
  configChanges: ConfigChange[];
  warnings: ReplayWarning[];
}

/** Newest first; ties broken by change id so the order never depends on the source. */
export function orderConfigChanges(changes: ReadonlyArray<ConfigChange>): ConfigChange[] {
  return [...changes]
    .sort(
      (a, b) =>
        compareStrings(b.timestamp, a.timestamp) || compareStrings(a.changeId, b.changeId),
    )
    .map((c) => ({ ...c }));
}

export class SessionReplayer {
  constructor(
    private readonly source: SessionSource,
    private readonly decryptor: Decryptor | null,
    private readonly logger: Logger,
  ) {}

  async replay(options: ReplayOptions): Promise<ReplayResult> {
    const [events, configChanges] = await Promise.all([
      this.call("listEvents", options, () =>
        this.source.listEvents({ agentVersion: options.agentVersion }),
      ),
      this.call("listConfigChanges", options, () => this.source.listConfigChanges()),
    ]);

    const report = filterDeviations(events, options.riskThreshold);
    const sessionIds = selectDeviationSessions(report.deviations, options.maxDeviationSessions);

    const warnings: ReplayWarning[] = [];
    const sessions: SessionNarrative[] = [];
    const rebuilt = await Promise.all(
      sessionIds.map((id) => this.reconstructSession(id, options)),
    );
    for (const [i, result] of rebuilt.entries()) {
      warnings.push(...result.warnings);
      if (result.narrative) {
        sessions.push(result.narrative);
      } else {
        const sessionId = sessionIds[i] ?? "";
        warnings.push({
          kind: "session_not_found",
          sessionId,
          message: `Session ${sessionId} referenced by a deviation has no recorded turns`,
        });
      }
    }

    sessions.sort((a, b) => compareStrings(a.sessionId, b.sessionId));
    warnings.sort(compareWarnings);

    this.logger.info(
      {
        deviations: report.deviations.length,
        interventions: report.humanInterventionCount,
        sessions: sessions.length,
        warnings: warnings.length,
      },
      "session replay finished",
    );

    return {
      ...report,
      sessions,
      configChanges: orderConfigChanges(configChanges),
      warnings,
    };
  }

  /**
   * Fetch, decrypt and order a single session. `narrative` is null when the
   * source has no turns for the id.
   */
  async reconstructSession(
    sessionId: string,
    options: Pick<ReplayOptions, "retry" | "signal">,
  ): Promise<{ narrative: SessionNarrative | null; warnings: ReplayWarning[] }> {
    const [turns, annotations] = await Promise.all([
      this.call("fetchSession", options, () => this.source.fetchSession(sessionId)),
      this.call("listAnnotations", options, () => this.source.listAnnotations(sessionId)),
    ]);

    if (turns.length === 0) {
      this.logger.warn({ sessionId }, "session not found");
      return { narrative: null, warnings: [] };
    }

    const warnings: ReplayWarning[] = [];
    const decrypted = await this.decryptTurns(turns, warnings);
    const result = reconstructSessions(decrypted, annotations);
    warnings.push(...result.warnings);

    for (const warning of warnings) {
      this.logger.warn({ sessionId: warning.sessionId, kind: warning.kind }, warning.message);
    }

    return { narrative: result.narratives.get(sessionId) ?? null, warnings };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /**
   * Each field is decrypted on its own. A field that fails keeps its stored
   * value and is reported; plaintext fields in mixed stores fail decryption
   * routinely. Non-string metadata values are never passed to the decryptor.
   */
  private async decryptTurns(
    turns: ReadonlyArray<SessionTurn>,
    warnings: ReplayWarning[],
  ): Promise<SessionTurn[]> {
    const decryptor = this.decryptor;
    if (!decryptor) return turns.map((t) => structuredClone(t));

    return Promise.all(
      turns.map(async (turn) => {
        const decryptField = async (field: string, value: string): Promise<string> => {
          if (!value) return value;
          try {
            return await decryptor.decrypt(value);
          } catch (err: unknown) {
            warnings.push({
              kind: "decryption_failed",
              sessionId: turn.sessionId,
              sequenceNo: turn.sequenceNo,
              message: `Turn ${turn.sessionId}#${turn.sequenceNo} ${field} kept as stored: ${err instanceof Error ? err.message : String(err)}`,
            });
            return value;
          }
        };

        const payload = await decryptField("payload", turn.payload);
        const metadata: Record<string, JsonValue> = {};
        for (const [key, value] of Object.entries(turn.metadata)) {
          metadata[key] =
            typeof value === "string"
              ? await decryptField(`metadata.${key}`, value)
              : structuredClone(value);
        }
        return { ...turn, payload, metadata };
      }),
    );
  }

  private call<T>(
    operation: string,
    options: Pick<ReplayOptions, "retry" | "signal">,
    fn: () => Promise<T>,
  ): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (err: unknown) {
          if (err instanceof AuditError) throw err;
          throw new ExternalServiceError(
            `Session source call ${operation} failed`,
            "session_source",
            "session-source",
            err,
          );
        }
      },
      options.retry,
      {
        signal: options.signal,
        onRetry: (err, attempt, delayMs) =>
          this.logger.warn({ operation, attempt, delayMs, err: err.message }, "retrying session source"),
      },
    );
  }
}
