/**
 * Deviation Filter: above-threshold risk events and the human
 * intervention tally.
 *
 * Interventions are always counted, even below threshold, but only appear
 * in the filtered list when they also meet the threshold.
 */

import type { DeviationEvent, RiskLevel } from "../contracts/schemas.js";

export interface DeviationReport {
  deviations: DeviationEvent[];
  humanInterventionCount: number;
}

const RISK_RANK: Readonly<Record<RiskLevel, number>> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

export function meetsThreshold(level: RiskLevel, threshold: RiskLevel): boolean {
  return RISK_RANK[level] >= RISK_RANK[threshold];
}

/**
 * Retain events at or above `threshold` in timestamp order. The sort is
 * stable, so events sharing a timestamp keep their source order.
 */
export function filterDeviations(
  events: ReadonlyArray<DeviationEvent>,
  threshold: RiskLevel,
): DeviationReport {
  let humanInterventionCount = 0;
  const retained: DeviationEvent[] = [];

  for (const event of events) {
    if (event.kind === "intervention") humanInterventionCount++;
    if (meetsThreshold(event.riskLevel, threshold)) {
      retained.push({ ...event });
    }
  }

  retained.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));

  return { deviations: retained, humanInterventionCount };
}

/** First `limit` distinct session ids, in deviation order. */
export function selectDeviationSessions(
  deviations: ReadonlyArray<DeviationEvent>,
  limit: number,
): string[] {
  const selected: string[] = [];
  const seen = new Set<string>();
  for (const event of deviations) {
    if (selected.length >= limit) break;
    if (seen.has(event.sessionId)) continue;
    seen.add(event.sessionId);
    selected.push(event.sessionId);
  }
  return selected;
}
