/**
 * Session narrative reconstruction: pure ordering and annotation overlay.
 *
 * Turns are ordered strictly by `sequenceNo`. Arrival order, `recordedAt`
 * and clock skew never influence narrative order.
 */

import { compareStrings } from "../audit/canonical.js";
import type { Annotation, SessionTurn } from "../contracts/schemas.js";

export interface TurnAnnotation {
  label: string;
  annotator: string;
  timestamp: string;
}

export interface AnnotatedTurn extends SessionTurn {
  annotations: TurnAnnotation[];
}

export interface SessionNarrative {
  sessionId: string;
  turns: AnnotatedTurn[];
}

export type ReplayWarningKind =
  | "annotation_unmatched"
  | "duplicate_sequence"
  | "decryption_failed"
  | "session_not_found";

/** Non-fatal problem found while rebuilding sessions. */
export interface ReplayWarning {
  kind: ReplayWarningKind;
  sessionId: string;
  sequenceNo?: number;
  message: string;
}

export interface ReconstructionResult {
  /** Keyed by session id; insertion order is ascending session id. */
  narratives: Map<string, SessionNarrative>;
  warnings: ReplayWarning[];
}

/** Deterministic warning order; warnings are part of the sealed record. */
export function compareWarnings(a: ReplayWarning, b: ReplayWarning): number {
  return (
    compareStrings(a.sessionId, b.sessionId) ||
    (a.sequenceNo ?? -1) - (b.sequenceNo ?? -1) ||
    compareStrings(a.kind, b.kind) ||
    compareStrings(a.message, b.message)
  );
}

function compareAnnotations(a: TurnAnnotation, b: TurnAnnotation): number {
  return (
    compareStrings(a.timestamp, b.timestamp) ||
    compareStrings(a.annotator, b.annotator) ||
    compareStrings(a.label, b.label)
  );
}

export function reconstructSessions(
  turns: ReadonlyArray<SessionTurn>,
  annotations: ReadonlyArray<Annotation> = [],
): ReconstructionResult {
  const warnings: ReplayWarning[] = [];

  // 1. Group ------------------------------------------------------------
  const groups = new Map<string, AnnotatedTurn[]>();
  for (const turn of turns) {
    let group = groups.get(turn.sessionId);
    if (!group) {
      group = [];
      groups.set(turn.sessionId, group);
    }
    group.push({ ...turn, metadata: structuredClone(turn.metadata), annotations: [] });
  }

  // 2. Order within each session ------------------------------------------
  const narratives = new Map<string, SessionNarrative>();
  for (const sessionId of [...groups.keys()].sort(compareStrings)) {
    const group = groups.get(sessionId) ?? [];
    group.sort((a, b) => a.sequenceNo - b.sequenceNo);

    for (let i = 1; i < group.length; i++) {
      const prev = group[i - 1];
      const curr = group[i];
      if (prev && curr && prev.sequenceNo === curr.sequenceNo) {
        warnings.push({
          kind: "duplicate_sequence",
          sessionId,
          sequenceNo: curr.sequenceNo,
          message: `Session ${sessionId} has more than one turn with sequence number ${curr.sequenceNo}`,
        });
      }
    }

    narratives.set(sessionId, { sessionId, turns: group });
  }

  // 3. Annotation overlay -------------------------------------------------
  for (const annotation of annotations) {
    const { sessionId, sequenceNo } = annotation.turnRef;
    const targets =
      narratives.get(sessionId)?.turns.filter((t) => t.sequenceNo === sequenceNo) ?? [];
    if (targets.length === 0) {
      warnings.push({
        kind: "annotation_unmatched",
        sessionId,
        sequenceNo,
        message: `Annotation "${annotation.label}" by ${annotation.annotator} references missing turn ${sessionId}#${sequenceNo}`,
      });
      continue;
    }
    for (const target of targets) {
      target.annotations.push({
        label: annotation.label,
        annotator: annotation.annotator,
        timestamp: annotation.timestamp,
      });
    }
  }

  for (const narrative of narratives.values()) {
    for (const turn of narrative.turns) {
      turn.annotations.sort(compareAnnotations);
    }
  }

  return { narratives, warnings: warnings.sort(compareWarnings) };
}
